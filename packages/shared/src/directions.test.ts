import { test } from 'node:test';
import assert from 'node:assert/strict';
import { addWeighted, isDirection, normalizeScores, pickDirection, zeroScores } from './directions';

test('normalizeScores scales values to sum to 1', () => {
  const n = normalizeScores({ UP: 1, RIGHT: 3, DOWN: 0, LEFT: 4 });
  assert.deepEqual(n, { UP: 0.125, RIGHT: 0.375, DOWN: 0, LEFT: 0.5 });
});

test('normalizeScores leaves an all-zero map unchanged', () => {
  assert.deepEqual(normalizeScores(zeroScores()), { UP: 0, RIGHT: 0, DOWN: 0, LEFT: 0 });
});

test('addWeighted treats missing keys as zero', () => {
  const acc = zeroScores();
  addWeighted(acc, { UP: 0.5, LEFT: 0.25 }, 2);
  assert.deepEqual(acc, { UP: 1, RIGHT: 0, DOWN: 0, LEFT: 0.5 });
});

test('pickDirection breaks ties in UP, RIGHT, DOWN, LEFT order', () => {
  assert.equal(pickDirection({ UP: 1, RIGHT: 1, DOWN: 1, LEFT: 1 }), 'UP');
  assert.equal(pickDirection({ UP: 0, RIGHT: 2, DOWN: 2, LEFT: 2 }), 'RIGHT');
  assert.equal(pickDirection({ UP: 0, RIGHT: 0, DOWN: 3, LEFT: 3 }), 'DOWN');
  assert.equal(pickDirection(zeroScores()), 'UP');
});

test('pickDirection is independent of key insertion order', () => {
  const a = pickDirection({ LEFT: 2, DOWN: 2, RIGHT: 1, UP: 0 });
  const b = pickDirection({ UP: 0, RIGHT: 1, DOWN: 2, LEFT: 2 });
  assert.equal(a, 'DOWN');
  assert.equal(b, 'DOWN');
});

test('isDirection accepts only the four labels', () => {
  assert.ok(isDirection('LEFT'));
  assert.ok(!isDirection('left'));
  assert.ok(!isDirection('WAIT'));
});
