import { normalizeScores, zeroScores, type Coord, type DirectionScores } from '@lightcycle/shared';
import type { Grid } from '@lightcycle/engine';
import type { Logger } from './lib/log';
import type { Job } from './lib/pool';
import type { HeuristicOptions, HeuristicReply } from './lib/thread';

/** A heuristic by registry name, as a worker thread builds it. */
export type HeuristicRef = { heuristic: string; options?: HeuristicOptions };

/** Receives normalised results; returns false when the report was dropped. */
export interface ResultSink {
  reportResult(job: StrategyJob, scores: DirectionScores, epoch: number): boolean;
}

/**
 * Binds one heuristic to its aggregator. Each decision gets its own bound
 * job from `attach`, carrying a copy of the board and the decision's epoch,
 * so a run still in flight from an earlier decision keeps its own context.
 */
export class StrategyJob {
  readonly index: number;
  readonly ref: HeuristicRef;
  private readonly sink: ResultSink;
  private readonly log: Logger;

  constructor(index: number, ref: HeuristicRef, sink: ResultSink, log: Logger) {
    this.index = index;
    this.ref = ref;
    this.sink = sink;
    this.log = log;
  }

  get name() { return this.ref.heuristic; }

  attach(position: Coord, grid: Grid, epoch: number): Job {
    return {
      task: {
        heuristic: this.ref.heuristic,
        options: this.ref.options ?? {},
        position: { x: position.x, y: position.y },
        width: grid.width,
        height: grid.height,
        cells: grid.snapshot(),
      },
      settle: reply => { this.settle(reply, epoch); },
    };
  }

  /** Normalises a reply to a sum of 1 and reports it. A failed run reports zeros. */
  settle(reply: HeuristicReply, epoch: number): boolean {
    let raw: DirectionScores;
    if (reply.ok) {
      raw = reply.scores;
    } else {
      this.log.warn(`${this.name} failed, counting it as zero: ${reply.error}`);
      raw = zeroScores();
    }
    return this.sink.reportResult(this, normalizeScores(raw), epoch);
  }
}
