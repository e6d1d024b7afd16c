import { debugLog } from "../../utils/debug";

import type { EngineEvent } from "../events";
import type { GameState, StepResult } from "../types";

/**
 * Falling → lockPending: stop gravity and arm the one-shot lock timer.
 * A delay that is already running is left alone.
 */
export function startLockDelay(state: GameState): StepResult<EngineEvent> {
  if (state.phase !== "falling") return { events: [], state };
  debugLog("lock", "lock delay started", { lockDelayMs: state.cfg.lockDelayMs });
  return {
    events: [
      { kind: "TimerStop", timer: "gravity" },
      {
        durationMs: state.cfg.lockDelayMs,
        kind: "TimerReconfigure",
        timer: "lockDelay",
      },
    ],
    state: { ...state, phase: "lockPending" },
  };
}
