import { collides } from "../core/board";
import { movePiece } from "../core/piece";
import { startLockDelay } from "../physics/lock-delay";
import { activePiece, replaceActive } from "../types";

import type { EngineEvent } from "../events";
import type { GameState, StepResult } from "../types";

/**
 * One periodic gravity step. Only a falling, unpaused game moves; a blocked
 * step is undone and hands over to the lock delay.
 */
export function onGravityTick(state: GameState): StepResult<EngineEvent> {
  if (state.paused || state.phase !== "falling") return { events: [], state };

  const moved = movePiece(activePiece(state), 0, state.playfield.cellSize);
  if (collides(state.playfield, state.pieces, moved)) {
    return startLockDelay(state);
  }
  return { events: [{ kind: "RequestRedraw" }], state: replaceActive(state, moved) };
}
