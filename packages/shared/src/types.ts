export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

/** Per-direction score; heuristics return raw values, the job layer normalises them. */
export type DirectionScores = Record<Direction, number>;

export type Coord = { readonly x: number; readonly y: number };

/** One player's entry in a turn: start/current positions, or null once eliminated. */
export type PlayerReport =
  | { eliminated: true }
  | { eliminated: false; start: Coord; current: Coord };

export type TurnFrame = {
  playerCount: number;
  me: number;
  players: PlayerReport[]; // index aligned with player ids
};
