// Base points per lines cleared in one lock, multiplied by (level + 1)
export const LINE_CLEAR_POINTS: Readonly<Record<1 | 2 | 3 | 4, number>> = {
  1: 30,
  2: 150,
  3: 400,
  4: 1500,
};

function isScoringCount(n: number): n is 1 | 2 | 3 | 4 {
  return n === 1 || n === 2 || n === 3 || n === 4;
}

export function scoreForLines(lines: number, level: number): number {
  if (!isScoringCount(lines)) return 0;
  return LINE_CLEAR_POINTS[lines] * (level + 1);
}
