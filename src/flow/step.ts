import {filterSkipped} from "../extras.js";
import type {StartPoint} from "../git.js";
import {worktreeNameProblem} from "../names.js";
import {
  DELETE_OPTIONS,
  ROOT_ACTIONS,
  START_CHOICES,
  deletedNotice,
  initialState,
  newFlowState,
  visibleCandidates,
  type AttachState,
  type DeleteState,
  type FlowEvent,
  type FlowKey,
  type FlowState,
  type ListState,
  type NewFlowState,
  type Picker,
  type RootState,
  type Transition,
  type WorktreeRow
} from "./state.js";

const DELETE_CANCELED = "Delete canceled. No changes were made.";

function isChar(key: FlowKey, ...values: string[]): boolean {
  return key.kind === "char" && values.includes(key.value.toLowerCase());
}

function isUp(key: FlowKey): boolean {
  return key.kind === "up" || (key.kind === "char" && key.value === "k");
}

function isDown(key: FlowKey): boolean {
  return key.kind === "down" || (key.kind === "char" && key.value === "j");
}

function isYes(key: FlowKey): boolean {
  return key.kind === "right" || isChar(key, "y", "l");
}

function isNo(key: FlowKey): boolean {
  return key.kind === "left" || isChar(key, "n", "h");
}

function moveCursor(cursor: number, length: number, key: FlowKey): number {
  if (length === 0) return 0;
  if (isUp(key)) return (cursor - 1 + length) % length;
  if (isDown(key)) return (cursor + 1) % length;
  return cursor;
}

/** Apply a text-editing key; undefined when the key does not edit. */
function editText(text: string, key: FlowKey): string | undefined {
  if (key.kind === "backspace") return text.slice(0, -1);
  if (key.kind === "char") return text + key.value;
  if (key.kind === "space") return `${text} `;
  return undefined;
}

function stay(state: FlowState): Transition {
  return {state};
}

function toRoot(message?: string, tone: "info" | "error" = "info"): Transition {
  return {state: initialState(message ? {message, tone} : undefined)};
}

/**
 * Pure transition function of the interactive flow. Side effects are
 * described in the returned `effect` and run by the controller, which feeds
 * their outcome back in as another event.
 */
export function step(state: FlowState, event: FlowEvent): Transition {
  if (state.screen === "handoff" || state.screen === "exit") {
    return stay(state);
  }

  if (event.type !== "key") {
    return applyResult(state, event);
  }

  if (state.screen === "root") {
    return rootKey(state, event.key);
  }

  // Keys are not read while a subprocess runs.
  if (state.busy) {
    return stay(state);
  }

  if (event.key.kind === "ctrlC") {
    return toRoot();
  }

  switch (state.screen) {
    case "new":
      return newKey(state, event.key);
    case "list":
      return listKey(state, event.key);
    case "attach":
      return attachKey(state, event.key);
    case "delete":
      return deleteKey(state, event.key);
  }
}

function rootKey(state: RootState, key: FlowKey): Transition {
  if (key.kind === "esc" || (key.kind === "char" && key.value === "q")) {
    return {state: {screen: "exit"}};
  }
  if (isUp(key) || isDown(key)) {
    return {state: {screen: "root", selected: moveCursor(state.selected, ROOT_ACTIONS.length, key)}};
  }
  if (key.kind !== "enter") {
    return stay(state);
  }

  const action = ROOT_ACTIONS[state.selected]?.action ?? "new";
  switch (action) {
    case "new":
      return {
        state: {...newFlowState(), busy: "Preparing"},
        effect: {type: "prepareNew"}
      };
    case "list":
      return {
        state: {screen: "list", rows: null, busy: "Loading worktrees"},
        effect: {type: "loadRows", for: "list"}
      };
    case "attach":
      return {
        state: {screen: "attach", step: "select", rows: null, cursor: 0, busy: "Loading worktrees"},
        effect: {type: "loadRows", for: "attach"}
      };
    case "delete":
      return {
        state: {
          screen: "delete",
          step: "select",
          rows: null,
          cursor: 0,
          optionCursor: 0,
          killSession: true,
          deleteBranch: false,
          busy: "Loading worktrees"
        },
        effect: {type: "loadRows", for: "delete"}
      };
  }
}

function newKey(state: NewFlowState, key: FlowKey): Transition {
  const base: NewFlowState = {...state, error: undefined};

  switch (state.step) {
    case "gitignore": {
      if (key.kind === "esc") return toRoot();
      if (isYes(key)) return {state: {...base, addGitignore: true}};
      if (isNo(key)) return {state: {...base, addGitignore: false}};
      if (key.kind === "enter") return {state: {...base, step: "name"}};
      return stay(state);
    }

    case "name": {
      if (key.kind === "esc") {
        return state.offerGitignore ? {state: {...base, step: "gitignore"}} : toRoot();
      }
      if (key.kind === "enter") {
        const name = state.name.trim();
        const problem = worktreeNameProblem(name);
        if (problem) {
          return {state: {...base, name, error: problem}};
        }
        return {
          state: {...base, name, busy: "Checking name"},
          effect: {type: "checkName", name}
        };
      }
      const edited = key.kind === "space" ? undefined : editText(state.name, key);
      return edited === undefined ? stay(state) : {state: {...base, name: edited}};
    }

    case "start": {
      if (key.kind === "esc") return {state: {...base, step: "name", startPoint: undefined}};
      if (key.kind !== "enter") {
        return {state: {...base, startCursor: moveCursor(state.startCursor, START_CHOICES.length, key)}};
      }
      const choice = START_CHOICES[state.startCursor]?.choice ?? "head";
      if (choice === "head") {
        return {state: {...base, step: "extras", startPoint: {kind: "head"}, picker: undefined}};
      }
      return {
        state: {...base, busy: choice === "branch" ? "Loading branches" : "Loading commits"},
        effect: {type: "queryRefs", kind: choice, query: ""}
      };
    }

    case "pick":
      return pickKey(base, key);

    case "extras":
      return extrasKey(base, key);

    case "connect": {
      if (key.kind === "esc") return {state: {...base, step: "extras"}};
      if (isYes(key)) return {state: {...base, connectNow: true}};
      if (isNo(key)) return {state: {...base, connectNow: false}};
      if (key.kind === "enter") return {state: {...base, step: "confirm"}};
      return stay(state);
    }

    case "confirm": {
      if (key.kind === "esc") return {state: {...base, step: "connect"}};
      if (key.kind !== "enter" || !state.startPoint) return stay(state);
      return {
        state: {...base, busy: "Creating worktree"},
        effect: {
          type: "createWorktree",
          name: state.name,
          startPoint: state.startPoint,
          extras: [...state.selected],
          addGitignore: state.offerGitignore && state.addGitignore,
          connectNow: state.connectNow
        }
      };
    }
  }
}

function pickKey(state: NewFlowState, key: FlowKey): Transition {
  const picker = state.picker;
  if (!picker) return {state: {...state, step: "start"}};
  const withPicker = (next: Picker): Transition => ({state: {...state, picker: next}});

  if (picker.search !== undefined) {
    if (key.kind === "esc") return withPicker({...picker, search: undefined});
    if (key.kind === "enter") {
      const query = picker.search.trim();
      return {
        state: {...state, busy: picker.kind === "branch" ? "Searching branches" : "Searching commits"},
        effect: {type: "queryRefs", kind: picker.kind, query}
      };
    }
    const search = editText(picker.search, key);
    return search === undefined ? stay(state) : withPicker({...picker, search});
  }

  if (key.kind === "esc") return {state: {...state, step: "start", picker: undefined}};
  if (key.kind === "char" && key.value === "/") return withPicker({...picker, search: picker.query});
  if (key.kind === "enter") {
    const item = picker.items[picker.cursor];
    if (!item) return stay(state);
    const startPoint: StartPoint =
      picker.kind === "branch" ? {kind: "branch", name: item.value} : {kind: "commit", hash: item.value};
    return {state: {...state, step: "extras", startPoint}};
  }
  return withPicker({...picker, cursor: moveCursor(picker.cursor, picker.items.length, key)});
}

function extrasKey(state: NewFlowState, key: FlowKey): Transition {
  if (state.editingFilter) {
    if (key.kind === "esc" || key.kind === "enter") return {state: {...state, editingFilter: false}};
    const filter = editText(state.filter, key);
    return filter === undefined ? stay(state) : {state: {...state, filter, cursor: 0}};
  }

  const visible = visibleCandidates(state);
  const highlighted = visible[state.cursor];

  if (key.kind === "esc") {
    return {
      state: {
        ...state,
        step: state.startPoint?.kind === "head" || !state.picker ? "start" : "pick",
        selected: [],
        filter: "",
        cursor: 0
      }
    };
  }
  if (key.kind === "enter") return {state: {...state, step: "connect", connectNow: true}};
  if (key.kind === "space") {
    if (highlighted === undefined) return stay(state);
    const selected = state.selected.includes(highlighted)
      ? state.selected.filter((entry) => entry !== highlighted)
      : [...state.selected, highlighted];
    return {state: {...state, selected: ordered(state.candidates, selected)}};
  }
  if (key.kind === "char" && key.value === "x") {
    if (highlighted === undefined) return stay(state);
    return {
      state: {...state, busy: `Saving skip bucket '${highlighted}'`},
      effect: {type: "skipBucket", bucket: highlighted}
    };
  }
  if (key.kind === "char" && key.value === "/") return {state: {...state, editingFilter: true}};
  if (key.kind === "char" && key.value === "a") {
    return {state: {...state, selected: ordered(state.candidates, [...state.selected, ...visible])}};
  }
  if (key.kind === "char" && key.value === "n") {
    return {state: {...state, selected: state.selected.filter((entry) => !visible.includes(entry))}};
  }
  if (key.kind === "tab") {
    const all = state.selected.length === state.candidates.length;
    return {state: {...state, selected: all ? [] : [...state.candidates]}};
  }
  return {state: {...state, cursor: moveCursor(state.cursor, visible.length, key)}};
}

function ordered(candidates: readonly string[], selected: readonly string[]): string[] {
  return candidates.filter((candidate) => selected.includes(candidate));
}

function listKey(state: ListState, key: FlowKey): Transition {
  if (key.kind === "esc" || key.kind === "enter" || (key.kind === "char" && key.value === "q")) {
    return toRoot();
  }
  return stay(state);
}

function attachKey(state: AttachState, key: FlowKey): Transition {
  const rows = state.rows ?? [];
  const base: AttachState = {...state, error: undefined};

  if (state.step === "select") {
    if (key.kind === "esc") return toRoot();
    if (key.kind === "enter") {
      return rows[state.cursor] ? {state: {...base, step: "confirm"}} : stay(state);
    }
    return {state: {...base, cursor: moveCursor(state.cursor, rows.length, key)}};
  }

  if (key.kind === "esc") return {state: {...base, step: "select"}};
  if (key.kind !== "enter") return stay(state);

  const row = rows[state.cursor];
  if (!row) return {state: {...base, step: "select"}};
  if (row.missing) {
    return {
      state: {
        ...base,
        error: `worktree '${row.record.name}' is missing at ${row.record.path}; delete it to clean up the registry`
      }
    };
  }
  return {
    state: {...base, busy: `Opening session '${row.record.name}'`},
    effect: {type: "attach", record: row.record}
  };
}

function deleteKey(state: DeleteState, key: FlowKey): Transition {
  const rows = state.rows ?? [];
  const base: DeleteState = {...state, error: undefined};
  const row = rows[state.cursor];

  switch (state.step) {
    case "select": {
      if (key.kind === "esc") return toRoot();
      if (key.kind === "enter") {
        return row ? {state: {...base, step: "confirm"}} : stay(state);
      }
      return {state: {...base, cursor: moveCursor(state.cursor, rows.length, key)}};
    }

    case "confirm": {
      if (key.kind === "esc") return {state: {...base, step: "select"}};
      if (isChar(key, "n")) return toRoot(DELETE_CANCELED);
      if (key.kind === "enter" || isChar(key, "y")) {
        return {state: {...base, step: "options"}};
      }
      return stay(state);
    }

    case "options": {
      if (key.kind === "esc") {
        return {
          state: {...base, step: "confirm", optionCursor: 0, killSession: true, deleteBranch: false}
        };
      }
      if (key.kind === "space") {
        const option = DELETE_OPTIONS[state.optionCursor]?.option;
        if (option === "killSession") return {state: {...base, killSession: !state.killSession}};
        if (option === "deleteBranch") return {state: {...base, deleteBranch: !state.deleteBranch}};
        return stay(state);
      }
      if (key.kind === "enter") {
        if (!row) return {state: {...base, step: "select"}};
        return {
          state: {...base, busy: `Deleting '${row.record.name}'`},
          effect: {
            type: "delete",
            record: row.record,
            killSession: state.killSession,
            deleteBranch: state.deleteBranch,
            force: false,
            notes: []
          }
        };
      }
      return {
        state: {...base, optionCursor: moveCursor(state.optionCursor, DELETE_OPTIONS.length, key)}
      };
    }

    case "forceWorktree": {
      const cleared: DeleteState = {...base, refusal: undefined, notes: undefined};
      if (key.kind === "esc") return {state: {...cleared, step: "confirm"}};
      if (isChar(key, "n")) return toRoot(DELETE_CANCELED);
      if (!isChar(key, "y") || !row) return stay(state);
      return {
        state: {...base, busy: `Force deleting '${row.record.name}'`},
        effect: {
          type: "delete",
          record: row.record,
          // The first attempt already dealt with the session.
          killSession: false,
          deleteBranch: state.deleteBranch,
          force: true,
          notes: state.notes ?? []
        }
      };
    }

    case "forceBranch": {
      const name = row?.record.name ?? "";
      const notes = state.notes ?? [];
      if (key.kind === "esc" || isChar(key, "n")) {
        return {state: initialState(deletedNotice(name, [...notes, `branch kept: ${state.refusal ?? ""}`]))};
      }
      if (!isChar(key, "y")) return stay(state);
      return {
        state: {...base, busy: `Force deleting branch '${name}'`},
        effect: {type: "forceDeleteBranch", name, notes}
      };
    }
  }
}

function withRows<T extends ListState | AttachState | DeleteState>(state: T, rows: WorktreeRow[]): T {
  return {...state, rows, busy: undefined, error: undefined};
}

function applyResult(state: FlowState, event: Exclude<FlowEvent, {type: "key"}>): Transition {
  if (state.screen === "handoff" || state.screen === "exit") {
    return stay(state);
  }

  switch (event.type) {
    case "rowsLoaded":
      if (state.screen === "list" || state.screen === "attach" || state.screen === "delete") {
        return {state: withRows(state, event.rows)};
      }
      return stay(state);

    case "newPrepared":
      if (state.screen !== "new") return stay(state);
      return {
        state: {
          ...state,
          step: event.offerGitignore ? "gitignore" : "name",
          offerGitignore: event.offerGitignore,
          busy: undefined,
          error: undefined
        }
      };

    case "nameAccepted":
      if (state.screen !== "new") return stay(state);
      return {
        state: {
          ...state,
          step: "start",
          candidates: event.candidates,
          filter: "",
          editingFilter: false,
          cursor: 0,
          selected: [],
          busy: undefined,
          error: undefined
        }
      };

    case "refsLoaded":
      if (state.screen !== "new") return stay(state);
      return {
        state: {
          ...state,
          step: "pick",
          picker: {kind: event.kind, query: event.query, items: event.items, cursor: 0},
          busy: undefined,
          error: undefined
        }
      };

    case "bucketSaved": {
      if (state.screen !== "new") return stay(state);
      const candidates = filterSkipped(state.candidates, [event.bucket]);
      const visible = visibleCandidates({candidates, filter: state.filter});
      return {
        state: {
          ...state,
          candidates,
          selected: ordered(candidates, state.selected),
          cursor: Math.min(state.cursor, Math.max(visible.length - 1, 0)),
          busy: undefined,
          error: undefined
        }
      };
    }

    case "failed":
      if (state.screen === "root") {
        return {state: {...state, notice: {message: event.message, tone: "error"}}};
      }
      if (state.screen === "new" && event.step) {
        return {state: {...state, step: event.step, busy: undefined, error: event.message}};
      }
      return {state: {...state, busy: undefined, error: event.message}};

    case "worktreeRefused":
      if (state.screen !== "delete") return stay(state);
      return {
        state: {...state, step: "forceWorktree", refusal: event.reason, notes: event.notes, busy: undefined}
      };

    case "branchRefused":
      if (state.screen !== "delete") return stay(state);
      return {
        state: {...state, step: "forceBranch", refusal: event.reason, notes: event.notes, busy: undefined}
      };

    case "completed":
      return {state: initialState(event.notice)};

    case "handoff":
      return {state: {screen: "handoff", session: event.session}};
  }
}
