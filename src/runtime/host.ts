import {
  applyCommand,
  init,
  onGravityTick,
  onLockDelayExpired,
  setGhostEnabled,
} from "../engine";
import { selectSnapshot } from "../engine/selectors";
import { assertNever } from "../engine/types";
import { durationMsAsNumber } from "../types/brands";
import { debugLog } from "../utils/debug";

import { TimerMachineService } from "./timers.machine";

import type { Command } from "../engine/commands";
import type { EngineEvent } from "../engine/events";
import type { Snapshot } from "../engine/selectors";
import type {
  EngineConfig,
  GameState,
  PieceRandomGenerator,
  StepResult,
} from "../engine/types";

export type GameOverSummary = Readonly<{
  score: number;
  level: number;
  lines: number;
}>;

export type HostListeners = Partial<{
  onRedraw: (snapshot: Snapshot) => void;
  onGameOver: (summary: GameOverSummary) => void;
  onQuit: () => void;
  // Every engine event, informational ones included
  onEvent: (event: EngineEvent) => void;
}>;

export type GameHostOptions = Partial<{
  config: EngineConfig;
  rng: PieceRandomGenerator;
  ghostEnabled: boolean;
  listeners: HostListeners;
}>;

/**
 * Reference host: holds the current state, feeds it commands and timer
 * callbacks, and turns engine events into real timers and listener calls.
 */
export class GameHost {
  private state: GameState;
  private readonly timers: TimerMachineService;
  private readonly listeners: HostListeners;
  private pending: ReadonlyArray<EngineEvent>;
  private started = false;
  private disposed = false;

  constructor(options: GameHostOptions = {}) {
    const initial = init(options.config, options.rng);
    this.state = setGhostEnabled(
      initial.state,
      options.ghostEnabled ?? false,
    ).state;
    this.pending = initial.events;
    this.listeners = options.listeners ?? {};
    this.timers = new TimerMachineService({
      onGravityTick: () => {
        this.run(onGravityTick(this.state));
      },
      onLockDelayExpired: () => {
        this.run(onLockDelayExpired(this.state));
      },
    });
  }

  /** Arm the first gravity timer and draw the first frame. */
  start(): void {
    if (this.started || this.disposed) return;
    this.started = true;
    const events = this.pending;
    this.pending = [];
    this.run({ events, state: this.state });
  }

  dispatch(cmd: Command): void {
    if (!this.started) {
      throw new Error("GameHost.dispatch called before start()");
    }
    this.run(applyCommand(this.state, cmd));
  }

  setGhostEnabled(enabled: boolean): void {
    this.run(setGhostEnabled(this.state, enabled));
  }

  snapshot(): Snapshot {
    return selectSnapshot(this.state);
  }

  getState(): GameState {
    return this.state;
  }

  getTimerState(): ReturnType<TimerMachineService["getState"]> {
    return this.timers.getState();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.timers.dispose();
  }

  private run(result: StepResult<EngineEvent>): void {
    if (this.disposed) return;
    this.state = result.state;
    let redraw = false;
    for (const event of result.events) {
      this.listeners.onEvent?.(event);
      if (event.kind === "RequestRedraw") {
        redraw = true;
      } else {
        this.handle(event);
      }
    }
    // One frame per batch, after the state has settled
    if (redraw) this.listeners.onRedraw?.(this.snapshot());
  }

  private handle(event: Exclude<EngineEvent, { kind: "RequestRedraw" }>): void {
    switch (event.kind) {
      case "TimerReconfigure": {
        const ms = durationMsAsNumber(event.durationMs);
        this.timers.send(
          event.timer === "gravity"
            ? { intervalMs: ms, type: "ARM_GRAVITY" }
            : { delayMs: ms, type: "ARM_LOCK_DELAY" },
        );
        return;
      }
      case "TimerStop":
        this.timers.send(
          event.timer === "gravity"
            ? { type: "STOP_GRAVITY" }
            : { type: "STOP_LOCK_DELAY" },
        );
        return;
      case "GameOverNotification":
        debugLog("engine", "game over", event);
        this.listeners.onGameOver?.({
          level: event.level,
          lines: event.lines,
          score: event.score,
        });
        return;
      case "QuitRequested":
        this.listeners.onQuit?.();
        return;
      case "PieceSpawned":
      case "PieceLocked":
      case "LinesCleared":
      case "LevelUp":
      case "PauseToggled":
        return;
      default:
        assertNever(event);
    }
  }
}
