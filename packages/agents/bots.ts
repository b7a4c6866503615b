import { DIRECTION_ORDER, XorShift32, move, zeroScores, type Coord, type Direction, type DirectionScores } from '@lightcycle/shared';
import type { Grid, Strategy } from '@lightcycle/engine';
import { DEFAULT_CONFIG, type BotConfig, type StrategyWeights } from './config';
import { parseFrame } from './protocol';
import { Session, type StrategyFactory } from './session';

/** A bot that plays from raw turn lines, as a separate process would. */
export type Bot = {
  meta: { name: string };
  act(lines: readonly string[]): Promise<Direction>;
  close(): Promise<void>;
};

export type BotFactory = (cfg?: Partial<BotConfig>, seed?: number) => Bot;

/** Random free move; scores blocked directions 0. */
export class RandomStrategy implements Strategy {
  readonly name = 'random';
  private readonly rng: XorShift32;

  constructor(seed = 1) {
    this.rng = new XorShift32(seed);
  }

  calculate(position: Coord, grid: Grid): DirectionScores {
    const scores = zeroScores();
    for (const d of DIRECTION_ORDER) {
      const to = move(position, d);
      if (grid.isFree(to.x, to.y)) scores[d] = this.rng.float() + 1e-9;
    }
    return scores;
  }
}

function sessionBot(name: string, cfg: BotConfig, factory?: StrategyFactory): Bot {
  const session = new Session(cfg, factory);
  return {
    meta: { name },
    async act(lines) {
      const frame = parseFrame(lines);
      session.ingestFrame(frame);
      return session.decide(frame.me);
    },
    close: () => session.close(),
  };
}

function withWeights(cfg: Partial<BotConfig> | undefined, weights?: StrategyWeights): BotConfig {
  const base: BotConfig = { ...DEFAULT_CONFIG, ...cfg };
  return weights ? { ...base, weights } : base;
}

export const BOTS: Record<string, BotFactory> = {
  combined: (cfg) => sessionBot('combined', withWeights(cfg)),
  distance: (cfg) => sessionBot('distance', withWeights(cfg, { distance: 1, space: 0, wallHug: 0 })),
  space: (cfg) => sessionBot('space', withWeights(cfg, { distance: 0, space: 1, wallHug: 0 })),
  wallhug: (cfg) => sessionBot('wallhug', withWeights(cfg, { distance: 0, space: 0, wallHug: 1 })),
  random: (cfg, seed = 1) => sessionBot('random', withWeights(cfg), () => new RandomStrategy(seed)),
};

export function createBot(name: string, cfg?: Partial<BotConfig>, seed?: number): Bot {
  const factory = BOTS[name];
  if (!factory) throw new Error(`Unknown bot "${name}". Try one of: ${Object.keys(BOTS).join(', ')}`);
  return factory(cfg, seed);
}
