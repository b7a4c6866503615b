import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Grid } from '@lightcycle/engine';
import type { DirectionScores } from '@lightcycle/shared';
import { StrategyJob, type ResultSink } from './strategy-job';
import { createLogger } from './lib/log';

const quiet = createLogger('job-test', false);

function recorder() {
  const reports: Array<{ index: number; scores: DirectionScores; epoch: number }> = [];
  const sink: ResultSink = {
    reportResult(job, scores, epoch) { reports.push({ index: job.index, scores, epoch }); return true; },
  };
  return { sink, reports };
}

test('attach packs the heuristic and a private copy of the board', () => {
  const { sink } = recorder();
  const grid = new Grid(2, 2);
  grid.set(1, 1, 2);
  const job = new StrategyJob(0, { heuristic: 'space', options: { depth: 5 } }, sink, quiet).attach({ x: 0, y: 1 }, grid, 4);
  grid.set(0, 0, 1);
  assert.deepEqual(job.task, {
    heuristic: 'space',
    options: { depth: 5 },
    position: { x: 0, y: 1 },
    width: 2,
    height: 2,
    cells: new Uint8Array([0, 0, 0, 2]),
  });
});

test('reports the heuristic output normalised to sum 1', () => {
  const { sink, reports } = recorder();
  const job = new StrategyJob(2, { heuristic: 'distance' }, sink, quiet);
  job.attach({ x: 1, y: 1 }, new Grid(3, 3), 7).settle({ ok: true, scores: { UP: 2, RIGHT: 0, DOWN: 6, LEFT: 0 } });
  assert.deepEqual(reports, [{ index: 2, scores: { UP: 0.25, RIGHT: 0, DOWN: 0.75, LEFT: 0 }, epoch: 7 }]);
});

test('an all-zero result is reported unchanged', () => {
  const { sink, reports } = recorder();
  const job = new StrategyJob(0, { heuristic: 'distance' }, sink, quiet);
  job.attach({ x: 0, y: 0 }, new Grid(1, 1), 1).settle({ ok: true, scores: { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 0 } });
  assert.deepEqual(reports[0].scores, { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 0 });
});

test('a failed run becomes a zero report', () => {
  const { sink, reports } = recorder();
  const job = new StrategyJob(1, { heuristic: 'wallHug' }, sink, quiet);
  job.attach({ x: 0, y: 0 }, new Grid(2, 2), 3).settle({ ok: false, error: 'bad heuristic' });
  assert.deepEqual(reports, [{ index: 1, scores: { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 0 }, epoch: 3 }]);
});

test('each attached job reports under its own epoch', () => {
  const { sink, reports } = recorder();
  const job = new StrategyJob(0, { heuristic: 'distance' }, sink, quiet);
  const first = job.attach({ x: 1, y: 0 }, new Grid(5, 5), 1);
  const second = job.attach({ x: 4, y: 0 }, new Grid(5, 5), 2);
  assert.deepEqual([first.task.position.x, second.task.position.x], [1, 4]);
  second.settle({ ok: true, scores: { UP: 1, RIGHT: 0, DOWN: 0, LEFT: 0 } });
  first.settle({ ok: true, scores: { UP: 1, RIGHT: 0, DOWN: 0, LEFT: 0 } });
  assert.deepEqual(reports.map(r => r.epoch), [2, 1]);
});
