import { pickDirection, FREE, type Coord, type Direction } from '@lightcycle/shared';
import type { Grid } from './grid';
import type { Strategy } from './strategy';

/** A tracked agent: current head, trail, and the strategy that steers it. */
export class Cycle {
  readonly id: number;
  private readonly grid: Grid;
  private readonly trail: Coord[] = [];
  private head: Coord | undefined;
  private strategy: Strategy | undefined;

  constructor(grid: Grid, id: number) {
    this.grid = grid;
    this.id = id;
  }

  /** Marker written to the grid for this agent's trail. */
  get marker() { return this.id + 1; }

  get position(): Coord | undefined { return this.head; }

  get path(): readonly Coord[] { return this.trail; }

  touch(x: number, y: number) {
    this.head = { x, y };
    this.trail.push(this.head);
    this.grid.set(x, y, this.marker);
  }

  /** Free every trail cell and forget the trail. */
  destroy() {
    for (const c of this.trail) this.grid.set(c.x, c.y, FREE);
    this.trail.length = 0;
  }

  setStrategy(strategy: Strategy) { this.strategy = strategy; }

  hasStrategy() { return this.strategy !== undefined; }

  /** Asks the assigned strategy for scores and returns the arg-max direction. */
  async choose(): Promise<Direction> {
    if (!this.strategy) throw new Error(`cycle ${this.id} has no strategy`);
    if (!this.head) throw new Error(`cycle ${this.id} has no position`);
    const scores = await this.strategy.calculate(this.head, this.grid);
    return pickDirection(scores);
  }
}
