import { DEFAULT_SPACE_DEPTH, FLOOD_MARK, move, zeroScores, type Coord, type Direction, type DirectionScores } from '@lightcycle/shared';
import type { Grid, Strategy } from '@lightcycle/engine';

// Directions share one scratch grid, so a region already counted from an
// earlier neighbour scores 0 for the later ones.
const FLOOD_ORDER: readonly Direction[] = ['LEFT', 'UP', 'RIGHT', 'DOWN'];

/** Depth-bounded 4-connected fill over free cells; marks what it counts. */
export function floodArea(grid: Grid, x: number, y: number, steps: number): number {
  if (steps <= 0 || !grid.isFree(x, y)) return 0;
  grid.set(x, y, FLOOD_MARK);
  return 1
    + floodArea(grid, x + 1, y, steps - 1)
    + floodArea(grid, x - 1, y, steps - 1)
    + floodArea(grid, x, y + 1, steps - 1)
    + floodArea(grid, x, y - 1, steps - 1);
}

/** Reachable area behind each neighbouring cell, explored on a private clone. */
export class SpaceStrategy implements Strategy {
  readonly name = 'space';
  readonly depth: number;

  constructor(depth = DEFAULT_SPACE_DEPTH) {
    this.depth = depth;
  }

  calculate(position: Coord, grid: Grid): DirectionScores {
    const scratch = grid.clone();
    const scores = zeroScores();
    for (const d of FLOOD_ORDER) {
      const n = move(position, d);
      scores[d] = floodArea(scratch, n.x, n.y, this.depth);
    }
    return scores;
  }
}
