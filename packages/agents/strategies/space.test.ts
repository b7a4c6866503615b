import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Grid } from '@lightcycle/engine';
import { SpaceStrategy } from './space';

function walledBoard() {
  // 5x5, agent 0 holds the whole middle column with its head at (2,2)
  const grid = new Grid(5, 5);
  const me = grid.getOrCreateAgent(0);
  for (let y = 0; y < 5; y++) me.touch(2, y);
  me.touch(2, 2);
  return grid;
}

test('counts the area behind each neighbour', () => {
  const grid = walledBoard();
  const scores = new SpaceStrategy(50).calculate({ x: 2, y: 2 }, grid);
  assert.deepEqual(scores, { UP: 0, RIGHT: 10, DOWN: 0, LEFT: 10 });
});

test('never mutates the input grid', () => {
  const grid = walledBoard();
  const before = grid.render();
  new SpaceStrategy(50).calculate({ x: 2, y: 2 }, grid);
  assert.deepEqual(grid.render(), before);
  assert.equal(grid.get(0, 0), 0);
});

test('an open region is credited to the first neighbour that reaches it', () => {
  const grid = new Grid(5, 5);
  grid.getOrCreateAgent(0).touch(2, 2);
  const scores = new SpaceStrategy(50).calculate({ x: 2, y: 2 }, grid);
  assert.deepEqual(scores, { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 24 });
});

test('the depth bound caps exploration along a corridor', () => {
  const grid = new Grid(20, 1);
  grid.set(0, 0, 1);
  assert.equal(new SpaceStrategy().depth, 12);
  const scores = new SpaceStrategy().calculate({ x: 0, y: 0 }, grid);
  assert.deepEqual(scores, { UP: 0, RIGHT: 12, DOWN: 0, LEFT: 0 });
  const deeper = new SpaceStrategy(30).calculate({ x: 0, y: 0 }, grid);
  assert.equal(deeper.RIGHT, 19);
});
