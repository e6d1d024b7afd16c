import { clearLines, collides, findFilledLines } from "../core/board";
import { movePiece } from "../core/piece";
import { isSpawnBlocked, spawnRandomPiece } from "../core/spawning";
import { gravityIntervalMs, maxLevelFor } from "../physics/gravity";
import { advanceLevel } from "../scoring/level";
import { scoreForLines } from "../scoring/score";
import { activePiece, isLockPending, replaceActive } from "../types";
import { debugLog } from "../../utils/debug";

import type { EngineEvent } from "../events";
import type { GameState, StepResult } from "../types";

function gravityRestart(state: GameState): EngineEvent {
  return {
    durationMs: gravityIntervalMs(state.cfg.gravityIntervalsMs, state.level),
    kind: "TimerReconfigure",
    timer: "gravity",
  };
}

function enterGameOver(
  state: GameState,
  locked: EngineEvent,
): StepResult<EngineEvent> {
  debugLog("lock", "spawn blocked, game over", { score: state.score });
  return {
    events: [
      locked,
      {
        kind: "GameOverNotification",
        level: state.level,
        lines: state.totalLines,
        score: state.score,
      },
      { kind: "RequestRedraw" },
    ],
    state: { ...state, phase: "gameOver" },
  };
}

/**
 * Lock-delay expiry. If the piece can still fall (it was nudged off its
 * support during the delay) the lock is called off and gravity resumes.
 * Otherwise the piece locks: next piece drawn, top-out checked, lines
 * scored and cleared, level advanced, new piece appended.
 */
export function onLockDelayExpired(state: GameState): StepResult<EngineEvent> {
  if (state.paused || !isLockPending(state)) {
    return { events: [], state };
  }

  const { cellSize } = state.playfield;
  const active = activePiece(state);
  const lowered = movePiece(active, 0, cellSize);

  if (!collides(state.playfield, state.pieces, lowered)) {
    debugLog("lock", "lock aborted, piece is airborne again");
    const resumed: GameState = {
      ...replaceActive(state, lowered),
      phase: "falling",
    };
    return {
      events: [gravityRestart(resumed), { kind: "RequestRedraw" }],
      state: resumed,
    };
  }

  const locked: EngineEvent = { kind: "PieceLocked", pieceId: active.id };
  const spawned = spawnRandomPiece(state.rng, cellSize);
  if (isSpawnBlocked(state.playfield, state.pieces, spawned.piece)) {
    return enterGameOver({ ...state, rng: spawned.rng }, locked);
  }

  const lines = findFilledLines(state.playfield, state.pieces);
  const scoreDelta = scoreForLines(lines.length, state.level);
  const remaining = clearLines(state.playfield, lines, state.pieces);
  const { leveledUp, progress } = advanceLevel(
    state,
    lines.length,
    maxLevelFor(state.cfg.gravityIntervalsMs),
    state.cfg.linesPerLevel,
  );

  const next: GameState = {
    ...state,
    level: progress.level,
    linesTowardLevel: progress.linesTowardLevel,
    phase: "falling",
    pieces: [...remaining, spawned.piece],
    rng: spawned.rng,
    score: state.score + scoreDelta,
    totalLines: progress.totalLines,
  };

  const events: Array<EngineEvent> = [locked];
  if (lines.length > 0) {
    events.push({
      kind: "LinesCleared",
      rows: lines.map((line) => line.y / cellSize),
      scoreDelta,
    });
  }
  if (leveledUp) events.push({ kind: "LevelUp", level: next.level });
  events.push(
    { kind: "PieceSpawned", pieceId: spawned.piece.id },
    gravityRestart(next),
    { kind: "RequestRedraw" },
  );

  debugLog("lock", "piece locked", { lines: lines.length, score: next.score });
  return { events, state: next };
}
