import type { Direction, DirectionScores } from './types';

/**
 * Fixed scan order for arg-max selection. Ties go to the direction that
 * comes first here.
 */
export const DIRECTION_ORDER: readonly Direction[] = ['UP', 'RIGHT', 'DOWN', 'LEFT'];

export function isDirection(s: string): s is Direction {
  return s === 'UP' || s === 'DOWN' || s === 'LEFT' || s === 'RIGHT';
}

export function zeroScores(): DirectionScores {
  return { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 0 };
}

export function sumScores(s: DirectionScores) {
  let t = 0;
  for (const d of DIRECTION_ORDER) t += s[d];
  return t;
}

/** Scale so the values sum to 1. A map summing to 0 comes back unchanged. */
export function normalizeScores(s: DirectionScores): DirectionScores {
  const total = sumScores(s);
  if (total === 0) return { ...s };
  const out = zeroScores();
  for (const d of DIRECTION_ORDER) out[d] = s[d] / total;
  return out;
}

/** target[d] += weight * s[d], in place. */
export function addWeighted(target: DirectionScores, s: Partial<DirectionScores>, weight: number) {
  for (const d of DIRECTION_ORDER) target[d] += weight * (s[d] ?? 0);
}

/** Direction with the strictly greatest score, scanning DIRECTION_ORDER. */
export function pickDirection(s: Partial<DirectionScores>): Direction {
  let best: Direction = DIRECTION_ORDER[0];
  let bestValue = -Infinity;
  for (const d of DIRECTION_ORDER) {
    const v = s[d] ?? 0;
    if (v > bestValue) { best = d; bestValue = v; }
  }
  return best;
}
