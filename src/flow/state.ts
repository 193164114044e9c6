import type {StartPoint} from "../git.js";
import type {WorktreeRecord} from "../worktree.js";

export type FlowKey =
  | {kind: "esc"}
  | {kind: "ctrlC"}
  | {kind: "enter"}
  | {kind: "up"}
  | {kind: "down"}
  | {kind: "left"}
  | {kind: "right"}
  | {kind: "space"}
  | {kind: "tab"}
  | {kind: "backspace"}
  | {kind: "char"; value: string};

export interface WorktreeRow {
  record: WorktreeRecord;
  sessionRunning: boolean;
  /** Path gone from disk or no longer a git worktree of this repository. */
  missing: boolean;
}

export type RootAction = "new" | "list" | "attach" | "delete";

export const ROOT_ACTIONS: readonly {action: RootAction; title: string}[] = [
  {action: "new", title: "New worktree"},
  {action: "list", title: "List worktrees"},
  {action: "attach", title: "Attach session"},
  {action: "delete", title: "Delete worktree"}
];

export interface Notice {
  message: string;
  tone: "info" | "error";
}

/** Shared by every flow screen: last error, and a label while an effect runs. */
export interface FlowStatus {
  error?: string;
  busy?: string;
}

export interface RootState {
  screen: "root";
  selected: number;
  notice?: Notice;
}

export type NewStep = "gitignore" | "name" | "start" | "pick" | "extras" | "connect" | "confirm";

export type StartChoice = StartPoint["kind"];

export const START_CHOICES: readonly {choice: StartChoice; title: string}[] = [
  {choice: "head", title: "Current branch (HEAD)"},
  {choice: "branch", title: "Existing branch"},
  {choice: "commit", title: "Commit"}
];

export type RefKind = "branch" | "commit";

export interface PickerItem {
  value: string;
  label: string;
}

export interface Picker {
  kind: RefKind;
  /** Query the current items were loaded with. */
  query: string;
  /** Search text while it is being edited. */
  search?: string;
  items: PickerItem[];
  cursor: number;
}

export interface NewFlowState extends FlowStatus {
  screen: "new";
  step: NewStep;
  /** .gitignore lacks `worktrees/`, so the flow asks whether to add it. */
  offerGitignore: boolean;
  addGitignore: boolean;
  name: string;
  startCursor: number;
  startPoint?: StartPoint;
  picker?: Picker;
  candidates: string[];
  filter: string;
  editingFilter: boolean;
  cursor: number;
  selected: string[];
  connectNow: boolean;
}

export interface ListState extends FlowStatus {
  screen: "list";
  rows: WorktreeRow[] | null;
}

export type AttachStep = "select" | "confirm";

export interface AttachState extends FlowStatus {
  screen: "attach";
  step: AttachStep;
  rows: WorktreeRow[] | null;
  cursor: number;
}

export type DeleteStep = "select" | "confirm" | "options" | "forceWorktree" | "forceBranch";

export type DeleteOption = "killSession" | "deleteBranch";

export const DELETE_OPTIONS: readonly {option: DeleteOption; title: string}[] = [
  {option: "killSession", title: "Kill tmux session"},
  {option: "deleteBranch", title: "Delete branch (safe, merged only)"}
];

export interface DeleteState extends FlowStatus {
  screen: "delete";
  step: DeleteStep;
  rows: WorktreeRow[] | null;
  cursor: number;
  optionCursor: number;
  killSession: boolean;
  deleteBranch: boolean;
  /** Why git refused the safe removal; shown on the force prompts. */
  refusal?: string;
  /** What the delete has done so far, carried through the force prompts. */
  notes?: string[];
}

/** The interactive loop must suspend and hand the terminal to tmux. */
export interface HandoffState {
  screen: "handoff";
  session: string;
}

export interface ExitState {
  screen: "exit";
}

export type FlowState =
  | RootState
  | NewFlowState
  | ListState
  | AttachState
  | DeleteState
  | HandoffState
  | ExitState;

export type RowsFor = "list" | "attach" | "delete";

export interface CreateRequest {
  name: string;
  startPoint: StartPoint;
  extras: string[];
  addGitignore: boolean;
  connectNow: boolean;
}

export interface DeleteRequest {
  record: WorktreeRecord;
  killSession: boolean;
  deleteBranch: boolean;
  force: boolean;
  notes: string[];
}

export type FlowEffect =
  | {type: "loadRows"; for: RowsFor}
  | {type: "prepareNew"}
  | {type: "checkName"; name: string}
  | {type: "queryRefs"; kind: RefKind; query: string}
  | {type: "skipBucket"; bucket: string}
  | ({type: "createWorktree"} & CreateRequest)
  | {type: "attach"; record: WorktreeRecord}
  | ({type: "delete"} & DeleteRequest)
  | {type: "forceDeleteBranch"; name: string; notes: string[]};

export type FlowEvent =
  | {type: "key"; key: FlowKey}
  | {type: "rowsLoaded"; rows: WorktreeRow[]}
  | {type: "newPrepared"; offerGitignore: boolean}
  | {type: "nameAccepted"; candidates: string[]}
  | {type: "refsLoaded"; kind: RefKind; query: string; items: PickerItem[]}
  | {type: "bucketSaved"; bucket: string}
  | {type: "failed"; message: string; step?: NewStep}
  | {type: "worktreeRefused"; reason: string; notes: string[]}
  | {type: "branchRefused"; reason: string; notes: string[]}
  | {type: "completed"; notice: Notice}
  | {type: "handoff"; session: string};

export interface Transition {
  state: FlowState;
  effect?: FlowEffect;
}

export function initialState(notice?: Notice): RootState {
  return notice ? {screen: "root", selected: 0, notice} : {screen: "root", selected: 0};
}

export function newFlowState(): NewFlowState {
  return {
    screen: "new",
    step: "name",
    offerGitignore: false,
    addGitignore: true,
    name: "",
    startCursor: 0,
    candidates: [],
    filter: "",
    editingFilter: false,
    cursor: 0,
    selected: [],
    connectNow: true
  };
}

export function deletedNotice(name: string, notes: readonly string[]): Notice {
  const suffix = notes.length > 0 ? ` (${notes.join("; ")})` : "";
  return {tone: "info", message: `Deleted worktree '${name}'${suffix}.`};
}

/** Extras shown under the current filter (substring, case-insensitive). */
export function visibleCandidates(state: Pick<NewFlowState, "candidates" | "filter">): string[] {
  const needle = state.filter.trim().toLowerCase();
  if (needle === "") return state.candidates;
  return state.candidates.filter((candidate) => candidate.toLowerCase().includes(needle));
}

export function key(value: FlowKey | string): FlowEvent {
  return {type: "key", key: typeof value === "string" ? {kind: "char", value} : value};
}
