import { createInitialState, defaultEngineConfig } from "./init";
import { gravityIntervalMs } from "./physics/gravity";

import type { EngineEvent } from "./events";
import type {
  EngineConfig,
  GameState,
  PieceRandomGenerator,
  StepResult,
} from "./types";

export { applyCommand, applyCommands } from "./step/apply-commands";
export { onGravityTick } from "./step/gravity-tick";
export { onLockDelayExpired } from "./step/resolve-lock";

/**
 * Start a session. The host arms gravity at the level-0 interval and draws
 * the first frame from the returned events.
 */
export function init(
  cfg: EngineConfig = defaultEngineConfig,
  rng?: PieceRandomGenerator,
): StepResult<EngineEvent> {
  const state = createInitialState(cfg, rng);
  return {
    events: [
      {
        durationMs: gravityIntervalMs(cfg.gravityIntervalsMs, 0),
        kind: "TimerReconfigure",
        timer: "gravity",
      },
      { kind: "RequestRedraw" },
    ],
    state,
  };
}

/**
 * Ghost preview is a host preference, not a game command.
 */
export function setGhostEnabled(
  state: GameState,
  enabled: boolean,
): StepResult<EngineEvent> {
  if (state.ghostEnabled === enabled) return { events: [], state };
  return {
    events: [{ kind: "RequestRedraw" }],
    state: { ...state, ghostEnabled: enabled },
  };
}
