import { test } from 'node:test';
import assert from 'node:assert/strict';
import { parseFrame, parseHeader, parsePlayerLine, readFrame } from './protocol';

async function* linesOf(...lines: string[]) {
  for (const l of lines) yield l;
}

test('parseHeader reads player count and own id', () => {
  assert.deepEqual(parseHeader('3 1'), { playerCount: 3, me: 1 });
  assert.throws(() => parseHeader('2 2'), /Invalid turn header/);
  assert.throws(() => parseHeader('2'), /Expected 2 integers/);
});

test('parsePlayerLine treats any negative value as eliminated', () => {
  assert.deepEqual(parsePlayerLine('1 2 3 4'), { eliminated: false, start: { x: 1, y: 2 }, current: { x: 3, y: 4 } });
  assert.deepEqual(parsePlayerLine('-1 -1 -1 -1'), { eliminated: true });
  assert.deepEqual(parsePlayerLine('1 2 -1 4'), { eliminated: true });
  assert.throws(() => parsePlayerLine('1 2 x 4'), /Expected 4 integers/);
});

test('parseFrame checks the number of player lines', () => {
  const frame = parseFrame(['2 0', '0 0 0 1', '-1 -1 -1 -1']);
  assert.equal(frame.me, 0);
  assert.equal(frame.players.length, 2);
  assert.throws(() => parseFrame(['2 0', '0 0 0 1']), /Expected 2 player lines/);
});

test('readFrame skips blank lines and stops cleanly at end of input', async () => {
  const it = linesOf('', '2 1', '0 0 1 0', '5 5 5 6', '2 1', '0 0 2 0', '5 5 5 7');
  const a = await readFrame(it);
  const b = await readFrame(it);
  const c = await readFrame(it);
  assert.equal(a?.me, 1);
  assert.deepEqual(b?.players[0], { eliminated: false, start: { x: 0, y: 0 }, current: { x: 2, y: 0 } });
  assert.equal(c, undefined);
});

test('readFrame rejects a truncated turn', async () => {
  await assert.rejects(readFrame(linesOf('3 0', '0 0 0 0')), /after 1 of 3 player lines/);
});
