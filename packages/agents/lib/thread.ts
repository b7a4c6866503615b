import { parentPort } from 'node:worker_threads';
import type { Coord, DirectionScores } from '@lightcycle/shared';
import { Grid, type Strategy } from '@lightcycle/engine';
import { describeError } from './log';

/** Structured-clone-safe settings handed to a heuristic factory. */
export type HeuristicOptions = Record<string, unknown>;

export type HeuristicFactory = (options: HeuristicOptions) => Strategy;

/** One heuristic run: which heuristic, and a private copy of the board. */
export type HeuristicTask = {
  heuristic: string;
  options: HeuristicOptions;
  position: Coord;
  width: number;
  height: number;
  cells: Uint8Array;
};

export type HeuristicReply =
  | { ok: true; scores: DirectionScores }
  | { ok: false; error: string };

export type TaskMessage = { id: number; task: HeuristicTask };

export type WorkerMessage =
  | { type: 'ready' }
  | { type: 'done'; id: number; reply: HeuristicReply };

/**
 * Worker-thread side of the pool: builds heuristics from `registry` on first
 * use, runs one task per message and posts the raw scores back.
 */
export function serveHeuristics(registry: Readonly<Record<string, HeuristicFactory>>) {
  const port = parentPort;
  if (!port) throw new Error('serveHeuristics must run inside a worker thread');
  const cache = new Map<string, Strategy>();

  const strategyFor = (name: string, options: HeuristicOptions): Strategy => {
    const key = `${name}:${JSON.stringify(options)}`;
    let strategy = cache.get(key);
    if (!strategy) {
      const factory = registry[name];
      if (!factory) throw new Error(`Unknown heuristic "${name}"`);
      strategy = factory(options);
      cache.set(key, strategy);
    }
    return strategy;
  };

  port.on('message', async (msg: TaskMessage) => {
    let reply: HeuristicReply;
    try {
      const { heuristic, options, position, width, height, cells } = msg.task;
      const scores = await strategyFor(heuristic, options).calculate(position, new Grid(width, height, cells));
      reply = { ok: true, scores };
    } catch (err) {
      reply = { ok: false, error: describeError(err) };
    }
    const done: WorkerMessage = { type: 'done', id: msg.id, reply };
    port.postMessage(done);
  });

  const ready: WorkerMessage = { type: 'ready' };
  port.postMessage(ready);
}
