import type { Coord, DirectionScores } from '@lightcycle/shared';
import type { Grid, Strategy } from '@lightcycle/engine';

/**
 * Prefers moves that keep a wall or trail alongside. Every direction starts
 * at 1 and gains 1 per occupied diagonal touching it. A direction with both
 * diagonals occupied is a pocket entrance and drops back to 1. Moves into an
 * occupied cell score 0 whatever else applies. Off-board cells count as
 * occupied.
 */
export class WallHugStrategy implements Strategy {
  readonly name = 'wallHug';

  calculate({ x, y }: Coord, grid: Grid): DirectionScores {
    const blocked = (cx: number, cy: number) => !grid.isFree(cx, cy);
    let up = 1, right = 1, down = 1, left = 1;

    if (blocked(x + 1, y - 1)) { right++; up++; }
    if (blocked(x + 1, y + 1)) { right++; down++; }
    if (blocked(x - 1, y + 1)) { left++; down++; }
    if (blocked(x - 1, y - 1)) { left++; up++; }

    if (up === 3) up = 1;
    if (right === 3) right = 1;
    if (down === 3) down = 1;
    if (left === 3) left = 1;

    if (blocked(x, y - 1)) up = 0;
    if (blocked(x + 1, y)) right = 0;
    if (blocked(x, y + 1)) down = 0;
    if (blocked(x - 1, y)) left = 0;

    return { UP: up, RIGHT: right, DOWN: down, LEFT: left };
  }
}
