import type { Coord, Direction } from './types';

export const DELTAS: Record<Direction, Coord> = {
  UP: { x: 0, y: -1 },
  RIGHT: { x: 1, y: 0 },
  DOWN: { x: 0, y: 1 },
  LEFT: { x: -1, y: 0 },
};

export function move(c: Coord, d: Direction): Coord { const v = DELTAS[d]; return { x: c.x + v.x, y: c.y + v.y }; }
export function sameCoord(a: Coord, b: Coord) { return a.x === b.x && a.y === b.y; }
