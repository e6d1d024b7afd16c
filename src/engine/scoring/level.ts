export const DEFAULT_LINES_PER_LEVEL = 15 as const;

export type LevelProgress = Readonly<{
  level: number;
  linesTowardLevel: number;
  totalLines: number;
}>;

/**
 * Accumulate cleared lines. Reaching the threshold resets the toward-level
 * counter to zero (leftover lines are not carried) and bumps the level,
 * which never passes maxLevel.
 */
export function advanceLevel(
  progress: LevelProgress,
  lines: number,
  maxLevel: number,
  linesPerLevel: number = DEFAULT_LINES_PER_LEVEL,
): { progress: LevelProgress; leveledUp: boolean } {
  const totalLines = progress.totalLines + lines;
  const toward = progress.linesTowardLevel + lines;

  if (toward < linesPerLevel) {
    return {
      leveledUp: false,
      progress: { ...progress, linesTowardLevel: toward, totalLines },
    };
  }

  const level = Math.min(progress.level + 1, maxLevel);
  return {
    leveledUp: level !== progress.level,
    progress: { level, linesTowardLevel: 0, totalLines },
  };
}
