export type EloTable = Record<string, number>;

export const DEFAULT_ELO = 1000;
export const K_FACTOR = 24;

/** Return a rating for id, creating it if absent */
export function getElo(tbl: EloTable, id: string): number {
  if (typeof tbl[id] !== 'number') tbl[id] = DEFAULT_ELO;
  return tbl[id];
}

/** Expected score A vs B (0..1) */
export function expectedScore(ra: number, rb: number): number {
  return 1 / (1 + Math.pow(10, (rb - ra) / 400));
}

/** Update Elo for A vs B with scoreA in {1,0.5,0} */
export function updateElo(tbl: EloTable, aId: string, bId: string, scoreA: number, k: number = K_FACTOR) {
  const ra = getElo(tbl, aId);
  const rb = getElo(tbl, bId);
  const expA = expectedScore(ra, rb);
  tbl[aId] = ra + k * (scoreA - expA);
  tbl[bId] = rb + k * ((1 - scoreA) - (1 - expA));
}
