import type { Coord, DirectionScores } from '@lightcycle/shared';
import type { Grid } from './grid';

/**
 * A scoring heuristic. Implementations must treat `grid` as read-only; a
 * heuristic that needs scratch space works on `grid.clone()`.
 */
export interface Strategy {
  readonly name: string;
  calculate(position: Coord, grid: Grid): DirectionScores | Promise<DirectionScores>;
}
