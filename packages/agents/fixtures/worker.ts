/* Worker entry for tests: the built-in heuristics plus a few with scripted behaviour. */
import { setTimeout as sleep } from 'node:timers/promises';
import { DIRECTION_ORDER, isRecord, zeroScores, type DirectionScores } from '@lightcycle/shared';
import { BUILTIN_HEURISTICS } from '../strategies';
import { serveHeuristics, type HeuristicOptions } from '../lib/thread';

function scoresFrom(options: HeuristicOptions): DirectionScores {
  const out = zeroScores();
  const { scores } = options;
  if (isRecord(scores)) {
    for (const d of DIRECTION_ORDER) {
      const v = scores[d];
      if (typeof v === 'number') out[d] = v;
    }
  }
  return out;
}

const msOf = (options: HeuristicOptions) => (typeof options.ms === 'number' ? options.ms : 0);

serveHeuristics({
  ...BUILTIN_HEURISTICS,
  fixed: options => ({ name: 'fixed', calculate: () => scoresFrom(options) }),
  // holds the thread without yielding, like the real heuristics on a big board
  busy: options => ({
    name: 'busy',
    calculate: () => {
      const until = Date.now() + msOf(options);
      while (Date.now() < until);
      return scoresFrom(options);
    },
  }),
  sleepy: options => ({
    name: 'sleepy',
    calculate: async () => {
      await sleep(msOf(options));
      return scoresFrom(options);
    },
  }),
  faulty: () => ({ name: 'faulty', calculate: () => { throw new Error('bad heuristic'); } }),
  crash: () => ({ name: 'crash', calculate: () => process.exit(3) }),
  // position and the top-left cell, so tests can see what reached the thread
  echo: () => ({
    name: 'echo',
    calculate: (position, grid) => ({ UP: position.x, RIGHT: position.y, DOWN: grid.get(0, 0), LEFT: grid.width }),
  }),
});
