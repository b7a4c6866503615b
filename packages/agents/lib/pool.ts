import { Worker } from 'node:worker_threads';
import { createLogger, describeError, type Logger } from './log';
import type { HeuristicReply, HeuristicTask, TaskMessage, WorkerMessage } from './thread';

/** A task for the pool plus the callback that receives its reply. */
export interface Job {
  readonly task: HeuristicTask;
  settle(reply: HeuristicReply): void;
}

export type PoolOpts = {
  log?: Logger;
  /** Worker entry module; it must call `serveHeuristics`. */
  script?: URL;
};

const DEFAULT_SCRIPT = new URL('./heuristic-worker.ts', import.meta.url);

type Slot = {
  worker: Worker;
  up: boolean;
  dead: boolean;
  job: Job | undefined;
  jobId: number;
};

/**
 * Fixed set of long-lived worker threads draining one FIFO queue. Each
 * worker holds at most one job; a finished worker takes the next queued one.
 * A worker that dies mid-job fails that job and is replaced.
 */
export class WorkerPool {
  readonly size: number;
  private readonly queue: Job[] = [];
  private readonly slots: Slot[] = [];
  private readonly log: Logger;
  private readonly script: URL;
  private readonly started: Promise<void>;
  private readonly drainWaiters: Array<() => void> = [];
  private closing: Promise<void> | undefined;
  private stopped = false;
  private terminating = false;
  private nextId = 0;

  constructor(size: number, opts: PoolOpts = {}) {
    if (!Number.isInteger(size) || size < 1) throw new RangeError(`pool size must be a positive integer, got ${size}`);
    this.size = size;
    this.log = opts.log ?? createLogger('pool');
    this.script = opts.script ?? DEFAULT_SCRIPT;
    const starts: Promise<void>[] = [];
    for (let i = 0; i < size; i++) starts.push(this.spawn(i));
    this.started = Promise.all(starts).then(() => undefined);
    void this.started.catch(err => this.log.warn(`pool failed to start: ${describeError(err)}`));
  }

  /** Jobs waiting for a worker. */
  get pending() { return this.queue.length; }
  /** Started workers with no job. */
  get idle() { return this.slots.filter(s => s.up && !s.dead && !s.job).length; }
  get isShutdown() { return this.stopped; }

  /** Resolves once every worker has loaded; rejects if one fails to start. */
  ready(): Promise<void> {
    return this.started;
  }

  submit(job: Job): boolean {
    if (this.stopped) {
      this.log.warn('job rejected: pool is shut down');
      return false;
    }
    this.queue.push(job);
    this.pump();
    return true;
  }

  /** Stops accepting jobs; resolves once queued and running jobs are done and every worker has exited. */
  shutdown(): Promise<void> {
    this.closing ??= this.close();
    return this.closing;
  }

  private async close() {
    this.stopped = true;
    await new Promise<void>(resolve => {
      this.drainWaiters.push(resolve);
      this.checkDrained();
    });
    this.terminating = true;
    await Promise.all(this.slots.map(s => s.worker.terminate()));
  }

  private spawn(index: number): Promise<void> {
    const worker = new Worker(this.script);
    const slot: Slot = { worker, up: false, dead: false, job: undefined, jobId: 0 };
    this.slots[index] = slot;

    return new Promise<void>((resolve, reject) => {
      worker.on('message', (msg: WorkerMessage) => {
        if (msg.type === 'ready') {
          slot.up = true;
          resolve();
          this.pump();
          return;
        }
        const job = slot.job;
        if (!job || msg.id !== slot.jobId) return;
        slot.job = undefined;
        this.settle(job, msg.reply);
        this.pump();
      });

      worker.on('error', err => {
        this.log.warn(`worker ${index}: ${describeError(err)}`);
        if (!slot.up) reject(err);
      });

      worker.on('exit', code => {
        if (this.slots[index] !== slot || this.terminating) return;
        slot.dead = true;
        const job = slot.job;
        slot.job = undefined;
        if (job) this.settle(job, { ok: false, error: `worker ${index} exited with code ${code}` });
        if (!slot.up) {
          reject(new Error(`worker ${index} exited with code ${code} before it was ready`));
        } else {
          this.log.warn(`worker ${index} exited with code ${code}; restarting`);
          void this.spawn(index).catch(err => this.log.warn(`worker ${index} failed to restart: ${describeError(err)}`));
        }
        this.pump();
      });
    });
  }

  private settle(job: Job, reply: HeuristicReply) {
    try {
      job.settle(reply);
    } catch (err) {
      this.log.warn(`job callback failed: ${describeError(err)}`);
    }
  }

  private pump() {
    for (const slot of this.slots) {
      if (this.queue.length === 0) break;
      if (!slot.up || slot.dead || slot.job) continue;
      const job = this.queue.shift();
      if (!job) break;
      slot.job = job;
      slot.jobId = ++this.nextId;
      const msg: TaskMessage = { id: slot.jobId, task: job.task };
      slot.worker.postMessage(msg);
    }
    if (this.slots.every(s => s.dead)) {
      for (const job of this.queue.splice(0)) this.settle(job, { ok: false, error: 'no live workers' });
    }
    this.checkDrained();
  }

  private checkDrained() {
    if (this.queue.length > 0 || this.slots.some(s => s.job)) return;
    for (const wake of this.drainWaiters.splice(0)) wake();
  }
}
