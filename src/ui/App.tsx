import {useEffect, useState, type ReactElement} from "react";
import {useApp, useInput} from "ink";
import type {FlowController} from "../flow/controller.js";
import {toFlowKey} from "../flow/keys.js";
import type {FlowState} from "../flow/state.js";
import {FlowView} from "./screens.js";

export type AppOutcome = {kind: "exit"} | {kind: "handoff"; session: string};

export interface AppProps {
  controller: FlowController;
  onDone: (outcome: AppOutcome) => void;
}

function outcomeOf(state: FlowState): AppOutcome | null {
  if (state.screen === "exit") return {kind: "exit"};
  if (state.screen === "handoff") return {kind: "handoff", session: state.session};
  return null;
}

export function App({controller, onDone}: AppProps): ReactElement | null {
  const {exit} = useApp();
  const [state, setState] = useState<FlowState>(controller.getState());

  useEffect(() => controller.subscribe(setState), [controller]);

  useEffect(() => {
    const outcome = outcomeOf(state);
    if (outcome) {
      onDone(outcome);
      exit();
    }
  }, [state, onDone, exit]);

  useInput((input, key) => {
    const flowKey = toFlowKey(input, key);
    if (!flowKey) return;
    controller.dispatch({type: "key", key: flowKey}).catch((error: unknown) => {
      exit(error instanceof Error ? error : new Error(String(error)));
    });
  });

  return <FlowView state={state} />;
}
