import type { DurationMs } from "../types/brands";
import type { PieceId } from "./types";

export type TimerKind = "gravity" | "lockDelay";

export type EngineEvent =
  | { kind: "RequestRedraw" }
  | {
      kind: "GameOverNotification";
      score: number;
      level: number;
      lines: number;
    }
  | { kind: "TimerReconfigure"; timer: TimerKind; durationMs: DurationMs }
  | { kind: "TimerStop"; timer: TimerKind }
  | { kind: "PieceSpawned"; pieceId: PieceId }
  | { kind: "PieceLocked"; pieceId: PieceId }
  | { kind: "LinesCleared"; rows: ReadonlyArray<number>; scoreDelta: number }
  | { kind: "LevelUp"; level: number }
  | { kind: "PauseToggled"; paused: boolean }
  | { kind: "QuitRequested" };
