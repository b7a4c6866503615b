import { test } from 'node:test';
import assert from 'node:assert/strict';
import readline from 'node:readline';
import { PassThrough } from 'node:stream';
import { parseArgs, parseDirection, readLines } from './cg-driver';

test('parseDirection accepts the four labels in any case', () => {
  assert.equal(parseDirection('UP'), 'UP');
  assert.equal(parseDirection(' left \n'), 'LEFT');
  assert.equal(parseDirection('WAIT'), undefined);
  assert.equal(parseDirection(''), undefined);
});

test('readLines returns what arrived before the time limit', async () => {
  const s0 = new PassThrough();
  const s1 = new PassThrough();
  const rl0 = readline.createInterface({ input: s0 });
  const rl1 = readline.createInterface({ input: s1 });

  const p0 = readLines(rl0, 1, 100);
  const p1 = readLines(rl1, 1, 100);
  const start = Date.now();
  s0.write('RIGHT\n');

  const [lines0, lines1] = await Promise.all([p0, p1]);
  rl0.close(); rl1.close(); s0.end(); s1.end();

  assert.deepEqual(lines0, ['RIGHT']);
  assert.deepEqual(lines1, []);
  const elapsed = Date.now() - start;
  assert.ok(elapsed >= 90 && elapsed < 1000);
});

test('parseArgs separates bot commands from flags', () => {
  const { bots, cfg } = parseArgs(['bot-a', '--seed', '7', 'bot-b', '--turn-ms=500']);
  assert.deepEqual(bots, ['bot-a', 'bot-b']);
  assert.equal(cfg.seed, 7);
  assert.equal(cfg.turnMs, 500);
  assert.throws(() => parseArgs(['--turn-ms', '0']), /turn-ms/);
});
