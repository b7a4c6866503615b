import { BOARD_W, BOARD_H, FREE, XorShift32, move, type Coord, type Direction } from '@lightcycle/shared';
import { Grid } from './grid';

export type PlayerState = {
  id: number;
  alive: boolean;
  start: Coord;
  head: Coord;
  trail: Coord[];
  eliminatedAt: number | null; // tick of elimination
};

export type GameState = {
  seed: number;
  tick: number;
  width: number;
  height: number;
  maxTicks: number;
  players: PlayerState[];
  grid: Grid;
  gameOver: boolean;
};

export type InitOpts = {
  seed?: number;
  players: number;
  width?: number;
  height?: number;
  /** Fixed start cells; random distinct cells are drawn for the rest. */
  starts?: Coord[];
};

export type MovesByPlayer = Array<Direction | undefined>; // index aligned with player ids

export function initGame({ seed = 1, players, width = BOARD_W, height = BOARD_H, starts = [] }: InitOpts): GameState {
  if (players < 1 || players > 4) throw new Error(`players must be 1..4, got ${players}`);
  const grid = new Grid(width, height);
  const rng = new XorShift32(seed);
  const ps: PlayerState[] = [];
  for (let id = 0; id < players; id++) {
    let start = starts[id];
    if (!start) {
      do {
        start = { x: rng.below(width), y: rng.below(height) };
      } while (!grid.isFree(start.x, start.y));
    }
    grid.set(start.x, start.y, id + 1);
    ps.push({ id, alive: true, start, head: start, trail: [start], eliminatedAt: null });
  }
  return { seed, tick: 0, width, height, maxTicks: width * height, players: ps, grid, gameOver: players < 2 };
}

function eliminate(next: GameState, p: PlayerState) {
  for (const c of p.trail) next.grid.set(c.x, c.y, FREE);
  p.trail = [];
  p.alive = false;
  p.eliminatedAt = next.tick;
}

/**
 * Advance one tick. Players move in id order, so a later player sees the
 * cells taken earlier in the same tick. Leaving the board, entering any
 * occupied cell, or not moving at all eliminates the player and frees its trail.
 */
export function step(state: GameState, moves: MovesByPlayer): GameState {
  const next: GameState = {
    ...state,
    grid: state.grid.clone(),
    players: state.players.map(p => ({ ...p, trail: [...p.trail] })),
  };
  for (const p of next.players) {
    if (!p.alive) continue;
    const dir = moves[p.id];
    if (!dir) { eliminate(next, p); continue; }
    const to = move(p.head, dir);
    if (!next.grid.isFree(to.x, to.y)) { eliminate(next, p); continue; }
    next.grid.set(to.x, to.y, p.id + 1);
    p.head = to;
    p.trail.push(to);
  }
  next.tick = state.tick + 1;
  const alive = next.players.filter(p => p.alive).length;
  next.gameOver = alive <= 1 || next.tick >= next.maxTicks;
  return next;
}

/**
 * Player ids best first: survivors, then by later elimination. Players
 * eliminated on the same tick share a place and keep id order.
 */
export function ranking(state: GameState): number[] {
  return [...state.players]
    .sort((a, b) => {
      const ea = a.eliminatedAt ?? Infinity, eb = b.eliminatedAt ?? Infinity;
      return ea === eb ? a.id - b.id : eb - ea;
    })
    .map(p => p.id);
}
