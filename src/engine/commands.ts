export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "SoftDrop" }
  | { kind: "HardDrop" }
  | { kind: "RotateCW" }
  | { kind: "RotateCCW" }
  | { kind: "ToggleDebugOverlay" }
  | { kind: "TogglePause" }
  | { kind: "Reset" }
  | { kind: "Quit" };

export type CommandKind = Command["kind"];
