import { initGame, step, turnLinesForPlayer, type GameState, type MovesByPlayer } from '@lightcycle/engine';
import { createLogger, describeError, type Bot, type BotConfig } from '@lightcycle/agents';
import type { Coord } from '@lightcycle/shared';
import { loadMany } from './loadBots';

const log = createLogger('sim');

export interface RunOpts {
  seed: number;
  episodes: number;
  /** 2..4 bot names; index is the player id. */
  bots: string[];
  width?: number;
  height?: number;
  starts?: Coord[];
  botConfig?: Partial<BotConfig>;
  onTick?: (state: GameState) => void;
}

export type EpisodeResult = {
  seed: number;
  ticks: number;
  /** 1-based place per player; players out on the same tick share it. */
  places: number[];
  winner: number | null;
};

export type RunResult = {
  bots: string[];
  wins: number[];
  draws: number;
  avgRank: number[];
  episodes: EpisodeResult[];
};

export function placesOf(state: GameState): number[] {
  const outAt = state.players.map(p => p.eliminatedAt ?? Infinity);
  return outAt.map(t => 1 + outAt.filter(o => o > t).length);
}

async function ask(bot: Bot, state: GameState, id: number) {
  try {
    return await bot.act(turnLinesForPlayer(state, id));
  } catch (err) {
    log.warn(`${bot.meta.name} (player ${id}) failed: ${describeError(err)}`);
    return undefined;
  }
}

export async function playEpisode(opts: RunOpts, seed: number): Promise<EpisodeResult> {
  let state = initGame({ seed, players: opts.bots.length, width: opts.width, height: opts.height, starts: opts.starts });
  const bots = loadMany(opts.bots, { ...opts.botConfig, width: state.width, height: state.height }, seed);
  try {
    while (!state.gameOver) {
      const current = state;
      const moves: MovesByPlayer = await Promise.all(
        current.players.map(p => (p.alive ? ask(bots[p.id], current, p.id) : undefined)),
      );
      state = step(current, moves);
      opts.onTick?.(state);
    }
  } finally {
    await Promise.all(bots.map(b => b.close()));
  }
  const places = placesOf(state);
  const firsts = places.filter(p => p === 1).length;
  return { seed, ticks: state.tick, places, winner: firsts === 1 ? places.indexOf(1) : null };
}

export async function runEpisodes(opts: RunOpts): Promise<RunResult> {
  if (opts.bots.length < 2 || opts.bots.length > 4) throw new Error(`Need 2..4 bots, got ${opts.bots.length}`);
  const wins = opts.bots.map(() => 0);
  const rankSum = opts.bots.map(() => 0);
  const episodes: EpisodeResult[] = [];
  let draws = 0;

  for (let ep = 0; ep < opts.episodes; ep++) {
    const res = await playEpisode(opts, opts.seed + ep);
    episodes.push(res);
    if (res.winner === null) draws++;
    else wins[res.winner]++;
    res.places.forEach((p, i) => { rankSum[i] += p; });
    log.debug(`episode ${ep} seed ${res.seed}: ${res.ticks} ticks, places ${res.places.join(' ')}`);
  }

  const n = Math.max(1, opts.episodes);
  return { bots: [...opts.bots], wins, draws, avgRank: rankSum.map(s => s / n), episodes };
}
