import type {Key} from "ink";
import type {FlowKey} from "./state.js";

/** Translate an ink keypress into a flow key, or null when it has no meaning. */
export function toFlowKey(input: string, key: Key): FlowKey | null {
  if (key.ctrl && input === "c") return {kind: "ctrlC"};
  if (key.escape) return {kind: "esc"};
  if (key.return) return {kind: "enter"};
  if (key.upArrow) return {kind: "up"};
  if (key.downArrow) return {kind: "down"};
  if (key.leftArrow) return {kind: "left"};
  if (key.rightArrow) return {kind: "right"};
  if (key.tab) return {kind: "tab"};
  if (key.backspace || key.delete) return {kind: "backspace"};
  if (input === " ") return {kind: "space"};
  if (key.ctrl || key.meta || input.length !== 1) return null;
  return {kind: "char", value: input};
}
