import type { Coord, DirectionScores } from '@lightcycle/shared';
import type { Grid, Strategy } from '@lightcycle/engine';

/** Free cells along a straight ray, starting one step away from `x,y`. */
export function rayLength(grid: Grid, x: number, y: number, dx: number, dy: number): number {
  let n = 0;
  x += dx; y += dy;
  while (grid.isFree(x, y)) {
    n++;
    x += dx; y += dy;
  }
  return n;
}

/** Scores each direction by how far the cycle can go straight before hitting anything. */
export class DistanceStrategy implements Strategy {
  readonly name = 'distance';

  calculate({ x, y }: Coord, grid: Grid): DirectionScores {
    return {
      UP: rayLength(grid, x, y, 0, -1),
      RIGHT: rayLength(grid, x, y, 1, 0),
      DOWN: rayLength(grid, x, y, 0, 1),
      LEFT: rayLength(grid, x, y, -1, 0),
    };
  }
}
