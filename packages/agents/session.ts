import { sameCoord, type Coord, type Direction, type TurnFrame } from '@lightcycle/shared';
import { Grid, type Strategy } from '@lightcycle/engine';
import { CombinedStrategy, type WeightedHeuristic } from './combined-strategy';
import { DEFAULT_CONFIG, type BotConfig } from './config';
import { createLogger, type Logger } from './lib/log';

/** A strategy the session may need to release when the game ends. */
export type SessionStrategy = Strategy & { close?(): Promise<void> };

export type StrategyFactory = (cfg: BotConfig, log: Logger) => SessionStrategy;

/** Heuristics with a positive weight, in a fixed order. */
export function weightedHeuristics(cfg: BotConfig): WeightedHeuristic[] {
  const out: WeightedHeuristic[] = [];
  if (cfg.weights.distance > 0) out.push({ heuristic: 'distance', weight: cfg.weights.distance });
  if (cfg.weights.space > 0) out.push({ heuristic: 'space', options: { depth: cfg.spaceDepth }, weight: cfg.weights.space });
  if (cfg.weights.wallHug > 0) out.push({ heuristic: 'wallHug', weight: cfg.weights.wallHug });
  return out;
}

export const createCombinedStrategy: StrategyFactory = (cfg, log) =>
  new CombinedStrategy(weightedHeuristics(cfg), { timeoutMs: cfg.timeoutMs, workers: cfg.workers, log });

/**
 * Everything one bot process keeps between turns: the board and the
 * strategy steering our own cycle.
 */
export class Session {
  readonly grid: Grid;
  readonly config: BotConfig;
  private readonly log: Logger;
  private readonly factory: StrategyFactory;
  private strategy: SessionStrategy | undefined;

  constructor(config: BotConfig = DEFAULT_CONFIG, factory: StrategyFactory = createCombinedStrategy) {
    this.config = config;
    this.grid = new Grid(config.width, config.height);
    this.log = createLogger('session', config.debug);
    this.factory = factory;
  }

  /**
   * Applies one player's report. `null` for either position means the player
   * is out and its trail is cleared. A player seen for the first time away
   * from its start gets the start cell marked as well.
   */
  ingestTurn(agentId: number, prev: Coord | null, current: Coord | null) {
    const cycle = this.grid.getOrCreateAgent(agentId);
    if (!prev || !current) {
      cycle.destroy();
      return;
    }
    if (cycle.path.length === 0 && !sameCoord(prev, current)) cycle.touch(prev.x, prev.y);
    const head = cycle.position;
    if (cycle.path.length > 0 && head && sameCoord(head, current)) return;
    cycle.touch(current.x, current.y);
  }

  ingestFrame(frame: TurnFrame) {
    frame.players.forEach((p, id) => {
      if (p.eliminated) this.ingestTurn(id, null, null);
      else this.ingestTurn(id, p.start, p.current);
    });
  }

  async decide(agentId: number): Promise<Direction> {
    const me = this.grid.getOrCreateAgent(agentId);
    if (!me.hasStrategy()) {
      this.strategy ??= this.factory(this.config, createLogger(`bot${agentId}`, this.config.debug));
      me.setStrategy(this.strategy);
    }
    const dir = await me.choose();
    this.log.debug(`agent ${agentId} at ${JSON.stringify(me.position)} -> ${dir}`);
    return dir;
  }

  async close() {
    await this.strategy?.close?.();
  }
}
