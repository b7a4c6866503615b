import type { BotConfig } from '@lightcycle/agents';
import type { Coord } from '@lightcycle/shared';
import { getElo, updateElo, type EloTable } from './elo';
import { runEpisodes } from './runEpisodes';

export type MatchResult = {
  a: string; b: string;
  seed: number;
  episodes: number;
  winsA: number; winsB: number;
};

export type Standings = {
  bots: string[];
  ranked: string[];
  points: Record<string, number>;
  wins: Record<string, number>;
  losses: Record<string, number>;
  draws: Record<string, number>;
  elo: EloTable;
  matches: MatchResult[];
};

export type RoundRobinOpts = {
  bots: string[];
  seed: number;
  seedsPerPair: number;        // same seeds for every pair
  episodesPerSeed: number;
  width?: number;
  height?: number;
  starts?: Coord[];
  botConfig?: Partial<BotConfig>;
};

const zeros = (ids: string[]) => Object.fromEntries(ids.map(id => [id, 0]));

export async function runRoundRobin(opts: RoundRobinOpts): Promise<Standings> {
  const ids = [...new Set(opts.bots)];
  if (ids.length < 2) throw new Error('A tournament needs at least two distinct bots');

  const elo: EloTable = {};
  for (const id of ids) getElo(elo, id);
  const points = zeros(ids), wins = zeros(ids), losses = zeros(ids), draws = zeros(ids);
  const matches: MatchResult[] = [];
  const seeds = Array.from({ length: opts.seedsPerPair }, (_, i) => opts.seed + i);

  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      const A = ids[i], B = ids[j];
      let aggA = 0, aggB = 0;

      for (const s of seeds) {
        const res = await runEpisodes({
          seed: s,
          episodes: opts.episodesPerSeed,
          bots: [A, B],
          width: opts.width,
          height: opts.height,
          starts: opts.starts,
          botConfig: opts.botConfig,
        });
        aggA += res.wins[0]; aggB += res.wins[1];
        matches.push({ a: A, b: B, seed: s, episodes: opts.episodesPerSeed, winsA: res.wins[0], winsB: res.wins[1] });
      }

      // decide the pairing on aggregate wins
      const diff = aggA - aggB;
      if (diff > 0) {
        points[A] += 3; wins[A]++; losses[B]++;
        updateElo(elo, A, B, 1);
      } else if (diff < 0) {
        points[B] += 3; wins[B]++; losses[A]++;
        updateElo(elo, A, B, 0);
      } else {
        points[A] += 1; points[B] += 1; draws[A]++; draws[B]++;
        updateElo(elo, A, B, 0.5);
      }
    }
  }

  const ranked = [...ids].sort((a, b) => {
    const dp = points[b] - points[a];
    return dp !== 0 ? dp : elo[b] - elo[a];
  });
  return { bots: ids, ranked, points, wins, losses, draws, elo, matches };
}
