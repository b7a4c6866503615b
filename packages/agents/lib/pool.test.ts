import { test } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { Grid } from '@lightcycle/engine';
import { WorkerPool } from './pool';
import { createLogger } from './log';
import type { HeuristicReply, HeuristicTask } from './thread';

const quiet = createLogger('pool-test', false);
const FIXTURE = new URL('../fixtures/worker.ts', import.meta.url);

function task(heuristic: string, options: Record<string, unknown> = {}, grid = new Grid(3, 3)): HeuristicTask {
  return { heuristic, options, position: { x: 1, y: 1 }, width: grid.width, height: grid.height, cells: grid.snapshot() };
}

function run(pool: WorkerPool, t: HeuristicTask): Promise<HeuristicReply> {
  return new Promise(resolve => { pool.submit({ task: t, settle: resolve }); });
}

test('runs a built-in heuristic on a worker thread and returns its raw scores', async () => {
  const pool = new WorkerPool(1, { log: quiet });
  try {
    const reply = await run(pool, { ...task('distance'), position: { x: 2, y: 2 }, width: 5, height: 5, cells: new Grid(5, 5).snapshot() });
    assert.deepEqual(reply, { ok: true, scores: { UP: 2, RIGHT: 2, DOWN: 2, LEFT: 2 } });
  } finally {
    await pool.shutdown();
  }
});

test('the board reaches the thread as sent', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  const grid = new Grid(4, 2);
  grid.set(0, 0, 3);
  try {
    assert.deepEqual(await run(pool, task('echo', {}, grid)), { ok: true, scores: { UP: 1, RIGHT: 1, DOWN: 3, LEFT: 4 } });
  } finally {
    await pool.shutdown();
  }
});

test('a single worker runs jobs in FIFO order', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  const seen: number[] = [];
  for (const n of [1, 2, 3, 4]) {
    pool.submit({ task: task('fixed', { scores: { UP: n } }), settle: r => { if (r.ok) seen.push(r.scores.UP); } });
  }
  await pool.shutdown();
  assert.deepEqual(seen, [1, 2, 3, 4]);
});

test('started workers are idle until work arrives', async () => {
  const pool = new WorkerPool(3, { log: quiet, script: FIXTURE });
  await pool.ready();
  assert.equal(pool.idle, 3);
  assert.equal(pool.pending, 0);
  await pool.shutdown();
});

test('a busy worker does not block the other workers or the caller', async () => {
  const pool = new WorkerPool(2, { log: quiet, script: FIXTURE });
  await pool.ready();
  const order: string[] = [];
  const busy = run(pool, task('busy', { ms: 400 })).then(() => { order.push('busy'); });
  const fast = run(pool, task('fixed')).then(() => { order.push('fixed'); });

  const before = performance.now();
  await sleep(20);
  assert.ok(performance.now() - before < 200, 'timers still fire while a heuristic spins');

  await Promise.all([busy, fast]);
  assert.deepEqual(order, ['fixed', 'busy']);
  await pool.shutdown();
});

test('a throwing heuristic fails its job and the worker carries on', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  try {
    const failed = await run(pool, task('faulty'));
    assert.equal(failed.ok, false);
    assert.match(failed.ok ? '' : failed.error, /bad heuristic/);
    assert.deepEqual(await run(pool, task('fixed', { scores: { LEFT: 2 } })), { ok: true, scores: { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 2 } });
  } finally {
    await pool.shutdown();
  }
});

test('a worker that dies mid-job fails the job and is replaced', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  try {
    const crashed = await run(pool, task('crash'));
    assert.equal(crashed.ok, false);
    assert.match(crashed.ok ? '' : crashed.error, /exited with code 3/);
    assert.deepEqual(await run(pool, task('fixed', { scores: { DOWN: 1 } })), { ok: true, scores: { UP: 0, RIGHT: 0, DOWN: 1, LEFT: 0 } });
  } finally {
    await pool.shutdown();
  }
});

test('an unknown heuristic name fails its job', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  try {
    const reply = await run(pool, task('nope'));
    assert.match(reply.ok ? '' : reply.error, /Unknown heuristic "nope"/);
  } finally {
    await pool.shutdown();
  }
});

test('shutdown drains queued jobs, waits for running ones and rejects new ones', async () => {
  const pool = new WorkerPool(1, { log: quiet, script: FIXTURE });
  const seen: string[] = [];
  pool.submit({ task: task('sleepy', { ms: 30 }), settle: () => { seen.push('slow'); } });
  pool.submit({ task: task('fixed'), settle: () => { seen.push('queued'); } });
  const done = pool.shutdown();
  assert.equal(pool.isShutdown, true);
  assert.equal(pool.submit({ task: task('fixed'), settle: () => { seen.push('late'); } }), false);
  await done;
  assert.deepEqual(seen, ['slow', 'queued']);
});

test('pool size must be a positive integer', () => {
  assert.throws(() => new WorkerPool(0, { log: quiet }), RangeError);
  assert.throws(() => new WorkerPool(1.5, { log: quiet }), RangeError);
});
