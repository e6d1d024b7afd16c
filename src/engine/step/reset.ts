import { spawnRandomPiece } from "../core/spawning";
import { gravityIntervalMs } from "../physics/gravity";
import { isLockPending } from "../types";

import type { EngineEvent } from "../events";
import type { GameState, StepResult } from "../types";

/**
 * Back to a fresh session from any phase. The generator keeps advancing and
 * the ghost/debug preferences survive.
 */
export function resetSession(state: GameState): StepResult<EngineEvent> {
  const spawned = spawnRandomPiece(state.rng, state.playfield.cellSize);
  const events: Array<EngineEvent> = [];

  if (isLockPending(state)) {
    events.push({ kind: "TimerStop", timer: "lockDelay" });
  }
  events.push(
    {
      durationMs: gravityIntervalMs(state.cfg.gravityIntervalsMs, 0),
      kind: "TimerReconfigure",
      timer: "gravity",
    },
    { kind: "PieceSpawned", pieceId: spawned.piece.id },
    { kind: "RequestRedraw" },
  );

  return {
    events,
    state: {
      ...state,
      level: 0,
      linesTowardLevel: 0,
      paused: false,
      phase: "falling",
      pieces: [spawned.piece],
      rng: spawned.rng,
      score: 0,
      totalLines: 0,
    },
  };
}
