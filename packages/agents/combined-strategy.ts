import { DEFAULT_TIMEOUT_MS, addWeighted, zeroScores, type Coord, type DirectionScores } from '@lightcycle/shared';
import type { Grid, Strategy } from '@lightcycle/engine';
import { createLogger, type Logger } from './lib/log';
import { WorkerPool } from './lib/pool';
import { StrategyJob, type HeuristicRef, type ResultSink } from './strategy-job';

export type WeightedHeuristic = HeuristicRef & { weight: number };

export type CombinedOpts = {
  timeoutMs?: number;
  /** Shared pool; when omitted the strategy owns a pool of `workers` (default: one per strategy). */
  pool?: WorkerPool;
  workers?: number;
  /** Worker entry module for an owned pool. */
  script?: URL;
  log?: Logger;
};

export type RunOutcome = 'COMPLETED' | 'TIMED_OUT';

export type RunSummary = {
  outcome: RunOutcome;
  contributions: number;
  elapsedMs: number;
};

/** Resolves true if `done` settles first, false once `ms` pass. */
async function settledWithin(done: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>(resolve => { timer = setTimeout(() => resolve(false), ms); });
  try {
    return await Promise.race([done.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fans one job per weighted heuristic out to the worker threads and sums the
 * normalised results by weight. `calculate` returns when every heuristic
 * has reported or the timeout passes, whichever is first; whatever arrived
 * by then is the answer. Reports for an earlier call, or after the wait has
 * ended, are dropped.
 *
 * The clock starts once the workers are up, so the first call also waits
 * for them to load. One `calculate` at a time per instance.
 */
export class CombinedStrategy implements Strategy, ResultSink {
  readonly name = 'combined';
  readonly timeoutMs: number;
  private readonly jobs: StrategyJob[];
  private readonly weights: number[]; // index aligned with jobs
  private readonly pool: WorkerPool;
  private readonly ownsPool: boolean;
  private readonly log: Logger;

  private epoch = 0;
  private pending = 0;
  private timedOut = true;
  private reported: boolean[] = [];
  private merged: DirectionScores = zeroScores();
  private wake: (() => void) | undefined;
  private dropped = 0;
  private last: RunSummary | undefined;

  constructor(entries: WeightedHeuristic[], opts: CombinedOpts = {}) {
    if (entries.length === 0) throw new Error('combined strategy needs at least one strategy');
    for (const e of entries) {
      if (!(e.weight > 0) || !Number.isFinite(e.weight)) {
        throw new RangeError(`weight for ${e.heuristic} must be a positive number, got ${e.weight}`);
      }
    }
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts.log ?? createLogger('combined');
    this.jobs = entries.map((e, i) => new StrategyJob(i, { heuristic: e.heuristic, options: e.options }, this, this.log));
    this.weights = entries.map(e => e.weight);
    this.ownsPool = !opts.pool;
    this.pool = opts.pool ?? new WorkerPool(opts.workers ?? entries.length, { log: this.log, script: opts.script });
  }

  get size() { return this.jobs.length; }
  /** Outcome of the most recent `calculate`. */
  get lastRun() { return this.last; }
  /** Reports discarded because they arrived late. */
  get droppedReports() { return this.dropped; }

  /** Resolves once the pool's workers have loaded. */
  ready(): Promise<void> {
    return this.pool.ready();
  }

  async calculate(position: Coord, grid: Grid): Promise<DirectionScores> {
    if (this.pool.isShutdown) throw new Error('combined strategy used after its worker pool shut down');
    await this.pool.ready();
    const epoch = ++this.epoch;
    this.pending = this.jobs.length;
    this.merged = zeroScores();
    this.reported = this.jobs.map(() => false);
    this.timedOut = false;
    const started = performance.now();

    const allIn = new Promise<void>(resolve => { this.wake = resolve; });
    for (const job of this.jobs) {
      if (!this.pool.submit(job.attach(position, grid, epoch))) {
        this.timedOut = true;
        throw new Error('combined strategy used after its worker pool shut down');
      }
    }

    const finished = await settledWithin(allIn, this.timeoutMs);
    this.timedOut = true;
    this.wake = undefined;

    const summary: RunSummary = {
      outcome: finished ? 'COMPLETED' : 'TIMED_OUT',
      contributions: this.jobs.length - this.pending,
      elapsedMs: performance.now() - started,
    };
    this.last = summary;
    if (!finished) this.log.debug(`timed out after ${this.timeoutMs}ms, ${this.pending} of ${this.jobs.length} missing`);
    const result = { ...this.merged };
    this.log.debug(`merged ${JSON.stringify(result)} in ${summary.elapsedMs.toFixed(1)}ms`);
    return result;
  }

  reportResult(job: StrategyJob, scores: DirectionScores, epoch: number): boolean {
    if (this.timedOut || epoch !== this.epoch || this.jobs[job.index] !== job || this.reported[job.index]) {
      this.dropped++;
      this.log.debug(`dropped late ${job.name} report (epoch ${epoch}, current ${this.epoch})`);
      return false;
    }
    this.reported[job.index] = true;
    addWeighted(this.merged, scores, this.weights[job.index]);
    this.pending--;
    if (this.pending === 0) this.wake?.();
    return true;
  }

  /** Shuts the pool down if this instance created it. */
  async close(): Promise<void> {
    if (this.ownsPool) await this.pool.shutdown();
  }
}
