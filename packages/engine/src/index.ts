export { Grid } from './grid';
export { Cycle } from './cycle';
export type { Strategy } from './strategy';
export { initGame, step, ranking } from './engine';
export type { GameState, PlayerState, InitOpts, MovesByPlayer } from './engine';
export { turnLinesForPlayer } from './perception';
