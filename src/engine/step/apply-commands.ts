import { collides, dropToBottom } from "../core/board";
import { movePiece, rotatePieceCCW, rotatePieceCW } from "../core/piece";
import { startLockDelay } from "../physics/lock-delay";
import {
  activePiece,
  assertNever,
  isGameOver,
  isLockPending,
  replaceActive,
} from "../types";
import { debugLog } from "../../utils/debug";

import { resetSession } from "./reset";

import type { Command } from "../commands";
import type { EngineEvent } from "../events";
import type { GameState, Piece, StepResult } from "../types";

type CommandResult = StepResult<EngineEvent>;

const unchanged = (state: GameState): CommandResult => ({ events: [], state });

const redraw = (state: GameState): CommandResult => ({
  events: [{ kind: "RequestRedraw" }],
  state,
});

// Piece and overlay commands only reach a live, unpaused game
function isControllable(state: GameState): boolean {
  return !state.paused && !isGameOver(state);
}

/**
 * Apply a transform to the active piece, or leave the state untouched when
 * the result would collide.
 */
function tryTransform(
  state: GameState,
  transform: (piece: Piece) => Piece,
): CommandResult {
  if (!isControllable(state)) return unchanged(state);
  const next = transform(activePiece(state));
  if (collides(state.playfield, state.pieces, next)) return unchanged(state);
  return redraw(replaceActive(state, next));
}

/**
 * Handles SoftDrop: one cell down; a blocked step starts the lock delay
 */
function handleSoftDrop(state: GameState): CommandResult {
  if (!isControllable(state)) return unchanged(state);
  const moved = movePiece(activePiece(state), 0, state.playfield.cellSize);
  if (collides(state.playfield, state.pieces, moved)) {
    return startLockDelay(state);
  }
  return redraw(replaceActive(state, moved));
}

/**
 * Handles HardDrop: straight to the landing spot, lock delay armed at once
 */
function handleHardDrop(state: GameState): CommandResult {
  if (!isControllable(state)) return unchanged(state);
  const dropped = dropToBottom(state.playfield, state.pieces, activePiece(state));
  const lock = startLockDelay(replaceActive(state, dropped));
  return {
    events: [{ kind: "RequestRedraw" }, ...lock.events],
    state: lock.state,
  };
}

function handleToggleDebugOverlay(state: GameState): CommandResult {
  if (!isControllable(state)) return unchanged(state);
  return redraw({ ...state, debugOverlay: !state.debugOverlay });
}

/**
 * Handles TogglePause. Timers keep their schedule; a lock expiry that lands
 * while paused is dropped, so resuming into lockPending re-arms the delay.
 */
function handleTogglePause(state: GameState): CommandResult {
  if (isGameOver(state)) return unchanged(state);
  const paused = !state.paused;
  const events: Array<EngineEvent> = [{ kind: "PauseToggled", paused }];
  if (!paused && isLockPending(state)) {
    events.push({
      durationMs: state.cfg.lockDelayMs,
      kind: "TimerReconfigure",
      timer: "lockDelay",
    });
  }
  events.push({ kind: "RequestRedraw" });
  debugLog("engine", paused ? "paused" : "resumed", { phase: state.phase });
  return { events, state: { ...state, paused } };
}

/**
 * Maps commands to their appropriate handlers
 */
export function applyCommand(state: GameState, cmd: Command): CommandResult {
  const cell = state.playfield.cellSize;
  switch (cmd.kind) {
    case "MoveLeft":
      return tryTransform(state, (p) => movePiece(p, -cell, 0));
    case "MoveRight":
      return tryTransform(state, (p) => movePiece(p, cell, 0));
    case "RotateCW":
      return tryTransform(state, (p) => rotatePieceCW(p, cell));
    case "RotateCCW":
      return tryTransform(state, (p) => rotatePieceCCW(p, cell));
    case "SoftDrop":
      return handleSoftDrop(state);
    case "HardDrop":
      return handleHardDrop(state);
    case "ToggleDebugOverlay":
      return handleToggleDebugOverlay(state);
    case "TogglePause":
      return handleTogglePause(state);
    case "Reset":
      return resetSession(state);
    case "Quit":
      if (state.paused) return unchanged(state);
      return { events: [{ kind: "QuitRequested" }], state };
    default:
      return assertNever(cmd);
  }
}

export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): CommandResult {
  let s = state;
  const events: Array<EngineEvent> = [];
  for (const cmd of cmds) {
    const result = applyCommand(s, cmd);
    s = result.state;
    events.push(...result.events);
  }
  return { events, state: s };
}
