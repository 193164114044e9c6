/**
 * Presentational components for each flow screen. They only read state;
 * all key handling lives in the flow engine.
 */
import type {ReactElement} from "react";
import {Box, Text} from "ink";
import type {StartPoint} from "../git.js";
import {
  DELETE_OPTIONS,
  ROOT_ACTIONS,
  START_CHOICES,
  visibleCandidates,
  type AttachState,
  type DeleteState,
  type FlowState,
  type ListState,
  type NewFlowState,
  type Picker,
  type RootState,
  type WorktreeRow
} from "../flow/state.js";
import {POINTER, colors} from "./theme.js";

function Title({children}: {children: string}): ReactElement {
  return (
    <Box marginBottom={1}>
      <Text color={colors.title} bold>
        {children}
      </Text>
    </Box>
  );
}

function Hint({children}: {children: string}): ReactElement {
  return (
    <Box marginTop={1}>
      <Text color={colors.dim}>{children}</Text>
    </Box>
  );
}

function Status({busy, error}: {busy?: string; error?: string}): ReactElement | null {
  if (busy) return <Text color={colors.warning}>{busy}...</Text>;
  if (error) return <Text color={colors.error}>Error: {error}</Text>;
  return null;
}

function MenuItem({active, label}: {active: boolean; label: string}): ReactElement {
  return (
    <Text color={active ? colors.selected : undefined}>
      {active ? POINTER : " "} {label}
    </Text>
  );
}

function Checkbox({checked, active, label}: {checked: boolean; active: boolean; label: string}): ReactElement {
  return <MenuItem active={active} label={`[${checked ? "x" : " "}] ${label}`} />;
}

export function rowLabel(row: WorktreeRow): string {
  const session = row.sessionRunning ? "running" : "stopped";
  const missing = row.missing ? " [missing]" : "";
  return `${row.record.name}  ${session}  ${row.record.path}${missing}`;
}

function RootScreen({state}: {state: RootState}): ReactElement {
  return (
    <Box flexDirection="column">
      <Title>seshmux</Title>
      {ROOT_ACTIONS.map((item, index) => (
        <MenuItem key={item.action} active={index === state.selected} label={item.title} />
      ))}
      {state.notice && (
        <Box marginTop={1}>
          <Text color={state.notice.tone === "error" ? colors.error : colors.info}>
            {state.notice.message}
          </Text>
        </Box>
      )}
      <Hint>up/down move, enter select, esc or q quit</Hint>
    </Box>
  );
}

function YesNo({question, yes}: {question: string; yes: boolean}): ReactElement {
  return (
    <Text>
      {question}{" "}
      <Text color={yes ? colors.selected : colors.dim}>{yes ? "[Yes]" : " Yes "}</Text>{" "}
      <Text color={yes ? colors.dim : colors.selected}>{yes ? " No " : "[No]"}</Text>
    </Text>
  );
}

export function startPointLabel(start: StartPoint | undefined): string {
  switch (start?.kind) {
    case "branch":
      return `branch ${start.name}`;
    case "commit":
      return `commit ${start.hash}`;
    default:
      return "current branch (HEAD)";
  }
}

function PickerView({picker}: {picker: Picker}): ReactElement {
  const noun = picker.kind === "branch" ? "branches" : "commits";
  return (
    <Box flexDirection="column">
      {picker.search !== undefined ? (
        <Text>
          Search {noun}: <Text color={colors.selected}>{picker.search}</Text>
          <Text color={colors.dim}>_</Text>
        </Text>
      ) : (
        <Text color={colors.dim}>{picker.query ? `Matching '${picker.query}':` : `Recent ${noun}:`}</Text>
      )}
      {picker.items.length === 0 ? (
        <Text color={colors.dim}>No {noun} found.</Text>
      ) : (
        picker.items.map((item, index) => (
          <MenuItem key={item.value} active={index === picker.cursor} label={item.label} />
        ))
      )}
    </Box>
  );
}

function ExtrasView({state}: {state: NewFlowState}): ReactElement {
  if (state.candidates.length === 0) {
    return <Text color={colors.dim}>No untracked or ignored files to copy.</Text>;
  }
  const visible = visibleCandidates(state);
  return (
    <Box flexDirection="column">
      <Text>Copy into the new worktree:</Text>
      {(state.editingFilter || state.filter) && (
        <Text color={colors.dim}>
          Filter: {state.filter}
          {state.editingFilter ? "_" : ""}
        </Text>
      )}
      {visible.map((candidate, index) => (
        <Checkbox
          key={candidate}
          active={index === state.cursor}
          checked={state.selected.includes(candidate)}
          label={candidate}
        />
      ))}
    </Box>
  );
}

function newStepView(state: NewFlowState): {body: ReactElement | null; hint: string} {
  switch (state.step) {
    case "gitignore":
      return {
        body: <YesNo question="Add worktrees/ to .gitignore?" yes={state.addGitignore} />,
        hint: "y/n choose, enter continue, esc back"
      };
    case "name":
      return {
        body: (
          <Text>
            Worktree name: <Text color={colors.selected}>{state.name}</Text>
            <Text color={colors.dim}>_</Text>
          </Text>
        ),
        hint: "enter continue, esc back"
      };
    case "start":
      return {
        body: (
          <Box flexDirection="column">
            <Text>Start the branch '{state.name}' from:</Text>
            {START_CHOICES.map((item, index) => (
              <MenuItem key={item.choice} active={index === state.startCursor} label={item.title} />
            ))}
          </Box>
        ),
        hint: "enter choose, esc back"
      };
    case "pick":
      return {
        body: state.picker ? <PickerView picker={state.picker} /> : null,
        hint:
          state.picker?.search !== undefined
            ? "enter search, esc stop searching"
            : "enter choose, / search, esc back"
      };
    case "extras":
      return {
        body: <ExtrasView state={state} />,
        hint: state.editingFilter
          ? "type to filter, enter or esc done"
          : "space toggle, a all, n none, tab toggle all, / filter, x always skip, enter continue, esc back"
      };
    case "connect":
      return {
        body: <YesNo question="Attach to the tmux session now?" yes={state.connectNow} />,
        hint: "y/n choose, enter continue, esc back"
      };
    case "confirm":
      return {
        body: (
          <Box flexDirection="column">
            <Text>Create worktree '{state.name}'?</Text>
            <Text color={colors.dim}>Start point: {startPointLabel(state.startPoint)}</Text>
            {state.offerGitignore && (
              <Text color={colors.dim}>Add .gitignore entry: {state.addGitignore ? "yes" : "no"}</Text>
            )}
            <Text color={colors.dim}>
              {state.selected.length === 0 ? "No extras selected." : `Extras: ${state.selected.join(", ")}`}
            </Text>
            <Text color={colors.dim}>Attach now: {state.connectNow ? "yes" : "no"}</Text>
          </Box>
        ),
        hint: "enter create, esc back"
      };
  }
}

function NewScreen({state}: {state: NewFlowState}): ReactElement {
  const {body, hint} = newStepView(state);
  return (
    <Box flexDirection="column">
      <Title>New worktree</Title>
      {body}
      <Status busy={state.busy} error={state.error} />
      <Hint>{hint}</Hint>
    </Box>
  );
}

function Rows({rows, cursor}: {rows: WorktreeRow[]; cursor?: number}): ReactElement {
  if (rows.length === 0) {
    return <Text color={colors.dim}>No worktrees registered.</Text>;
  }
  return (
    <Box flexDirection="column">
      {rows.map((row, index) =>
        cursor === undefined ? (
          <Text key={row.record.name} color={row.missing ? colors.warning : undefined}>
            {"  "}
            {rowLabel(row)}
          </Text>
        ) : (
          <MenuItem key={row.record.name} active={index === cursor} label={rowLabel(row)} />
        )
      )}
    </Box>
  );
}

function ListScreen({state}: {state: ListState}): ReactElement {
  return (
    <Box flexDirection="column">
      <Title>Worktrees</Title>
      {state.rows && <Rows rows={state.rows} />}
      <Status busy={state.busy} error={state.error} />
      <Hint>enter or esc back</Hint>
    </Box>
  );
}

function AttachScreen({state}: {state: AttachState}): ReactElement {
  const row = state.rows?.[state.cursor];
  return (
    <Box flexDirection="column">
      <Title>Attach session</Title>
      {state.step === "select" && state.rows && <Rows rows={state.rows} cursor={state.cursor} />}
      {state.step === "confirm" && row && (
        <Text>
          {row.sessionRunning ? "Attach to" : "Start and attach"} session '{row.record.name}'?
        </Text>
      )}
      <Status busy={state.busy} error={state.error} />
      <Hint>{state.step === "select" ? "enter choose, esc back" : "enter attach, esc back"}</Hint>
    </Box>
  );
}

function deleteHint(state: DeleteState): string {
  switch (state.step) {
    case "options":
      return "space toggle, enter delete, esc back";
    case "forceWorktree":
      return "y force delete, n cancel, esc back";
    case "forceBranch":
      return "y force delete, n or esc keep branch";
    default:
      return "enter continue, esc back";
  }
}

function DeleteScreen({state}: {state: DeleteState}): ReactElement {
  const row = state.rows?.[state.cursor];
  return (
    <Box flexDirection="column">
      <Title>Delete worktree</Title>
      {state.step === "select" && state.rows && <Rows rows={state.rows} cursor={state.cursor} />}
      {state.step === "confirm" && row && (
        <Text>
          Remove worktree '{row.record.name}' at {row.record.path}? (y/n)
        </Text>
      )}
      {state.step === "options" && (
        <Box flexDirection="column">
          {DELETE_OPTIONS.map((item, index) => (
            <Checkbox
              key={item.option}
              active={index === state.optionCursor}
              checked={state[item.option]}
              label={item.title}
            />
          ))}
        </Box>
      )}
      {state.step === "forceWorktree" && row && (
        <Box flexDirection="column">
          <Text color={colors.warning}>Safe removal failed: {state.refusal}</Text>
          <Text>Force delete worktree '{row.record.name}' and discard its changes? (y/n)</Text>
        </Box>
      )}
      {state.step === "forceBranch" && row && (
        <Box flexDirection="column">
          <Text color={colors.warning}>Worktree deleted. Safe branch delete failed: {state.refusal}</Text>
          <Text>Force delete branch '{row.record.name}'? (y/n)</Text>
        </Box>
      )}
      <Status busy={state.busy} error={state.error} />
      <Hint>{deleteHint(state)}</Hint>
    </Box>
  );
}

export function FlowView({state}: {state: FlowState}): ReactElement | null {
  switch (state.screen) {
    case "root":
      return <RootScreen state={state} />;
    case "new":
      return <NewScreen state={state} />;
    case "list":
      return <ListScreen state={state} />;
    case "attach":
      return <AttachScreen state={state} />;
    case "delete":
      return <DeleteScreen state={state} />;
    case "handoff":
      return <Text color={colors.dim}>Attaching to '{state.session}'...</Text>;
    case "exit":
      return null;
  }
}
