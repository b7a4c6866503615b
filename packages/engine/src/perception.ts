import type { GameState } from './engine';

/** Turn input for one player: `N P`, then `X0 Y0 X1 Y1` per player. */
export function turnLinesForPlayer(state: GameState, playerId: number): string[] {
  const lines = [`${state.players.length} ${playerId}`];
  for (const p of state.players) {
    lines.push(p.alive ? `${p.start.x} ${p.start.y} ${p.head.x} ${p.head.y}` : '-1 -1 -1 -1');
  }
  return lines;
}
