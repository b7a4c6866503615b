import { FLOOD_MARK, FREE, MAX_AGENTS, OUT_OF_RANGE } from '@lightcycle/shared';
import { Cycle } from './cycle';

/**
 * Occupancy board. Cell value 0 is free, k >= 1 is the trail of agent k-1.
 * Reads outside the board return OUT_OF_RANGE; writes there are ignored.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  private readonly cells: Uint8Array;
  private readonly players: Map<number, Cycle>;

  constructor(width: number, height: number, cells?: Uint8Array, players?: Map<number, Cycle>) {
    this.width = width;
    this.height = height;
    if (cells && cells.length !== width * height) {
      throw new RangeError(`expected ${width * height} cells for ${width}x${height}, got ${cells.length}`);
    }
    this.cells = cells ?? new Uint8Array(width * height);
    this.players = players ?? new Map();
  }

  private inside(x: number, y: number) {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  get(x: number, y: number): number {
    if (!this.inside(x, y)) return OUT_OF_RANGE;
    return this.cells[y * this.width + x];
  }

  /** `value` is FREE, an agent marker or FLOOD_MARK; OUT_OF_RANGE is never stored. */
  set(x: number, y: number, value: number) {
    if (!Number.isInteger(value) || value < FREE || value > FLOOD_MARK) {
      throw new RangeError(`cell value ${value} outside ${FREE}..${FLOOD_MARK}`);
    }
    if (!this.inside(x, y)) return;
    this.cells[y * this.width + x] = value;
  }

  isFree(x: number, y: number) { return this.get(x, y) === FREE; }

  /** Copy of the raw cells, row-major. */
  snapshot(): Uint8Array {
    return this.cells.slice();
  }

  /** Copy of the cells; the agent registry is shared by reference. */
  clone(): Grid {
    return new Grid(this.width, this.height, this.cells.slice(), new Map(this.players));
  }

  getOrCreateAgent(id: number): Cycle {
    if (!Number.isInteger(id) || id < 0 || id >= MAX_AGENTS) {
      throw new RangeError(`agent id ${id} outside 0..${MAX_AGENTS - 1}`);
    }
    let cycle = this.players.get(id);
    if (!cycle) {
      cycle = new Cycle(this, id);
      this.players.set(id, cycle);
    }
    return cycle;
  }

  agents(): Cycle[] {
    return [...this.players.values()];
  }

  /** One line per row, cell values as digits (debug dumps). */
  render(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = '';
      for (let x = 0; x < this.width; x++) {
        const v = this.get(x, y);
        line += v === FREE ? '.' : v <= 9 ? String(v) : '#';
      }
      rows.push(line);
    }
    return rows;
  }
}
