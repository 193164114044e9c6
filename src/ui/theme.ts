export const colors = {
  title: "cyan",
  selected: "green",
  dim: "gray",
  error: "red",
  info: "green",
  warning: "yellow"
} as const;

export const POINTER = ">";
