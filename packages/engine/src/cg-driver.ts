import { spawn } from 'node:child_process';
import readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { isDirection, readJsonObject, BOARD_W, BOARD_H, type Direction } from '@lightcycle/shared';
import { initGame, step, ranking, type MovesByPlayer } from './engine';
import { turnLinesForPlayer } from './perception';

export function parseDirection(line: string): Direction | undefined {
  const cmd = line.trim().toUpperCase();
  return isDirection(cmd) ? cmd : undefined;
}

/** Resolves with up to `count` lines; missing ones are left out when the time limit passes. */
export async function readLines(rl: readline.Interface, count: number, timeoutMs = 100): Promise<string[]> {
  return new Promise((resolve) => {
    const lines: string[] = [];
    const finish = () => {
      clearTimeout(timer);
      rl.removeListener('line', onLine);
      resolve(lines);
    };
    const onLine = (line: string) => {
      lines.push(line.trim());
      if (lines.length === count) finish();
    };
    const timer = setTimeout(finish, timeoutMs);
    rl.on('line', onLine);
  });
}

const DEFAULT_SEED = 1;
const DEFAULT_TURN_MS = 2000;

export function parseArgs(argv: string[]) {
  const cfg = { seed: DEFAULT_SEED, turnMs: DEFAULT_TURN_MS, width: BOARD_W, height: BOARD_H };
  const bots: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--seed' && i + 1 < argv.length) { cfg.seed = Number(argv[++i]); }
    else if (a.startsWith('--seed=')) { cfg.seed = Number(a.split('=')[1]); }
    else if (a === '--turn-ms' && i + 1 < argv.length) { cfg.turnMs = Number(argv[++i]); }
    else if (a.startsWith('--turn-ms=')) { cfg.turnMs = Number(a.split('=')[1]); }
    else if (a === '--config' && i + 1 < argv.length) {
      const f = readJsonObject(argv[++i]);
      if (typeof f.seed === 'number') cfg.seed = f.seed;
      if (typeof f.turnMs === 'number') cfg.turnMs = f.turnMs;
      if (typeof f.width === 'number') cfg.width = f.width;
      if (typeof f.height === 'number') cfg.height = f.height;
    } else {
      bots.push(a);
    }
  }
  if (!Number.isFinite(cfg.seed)) throw new Error('Invalid --seed');
  if (!(cfg.turnMs > 0)) throw new Error('Invalid --turn-ms');
  return { bots, cfg };
}

async function main() {
  const { bots: botCmds, cfg } = parseArgs(process.argv.slice(2));
  if (botCmds.length < 2 || botCmds.length > 4) {
    console.error('Usage: tsx cg-driver.ts <bot0> <bot1> [<bot2> <bot3>] [--seed <n>] [--turn-ms <n>] [--config <file>]');
    process.exit(1);
  }

  const bots = botCmds.map(cmd => spawn(cmd, { stdio: ['pipe', 'pipe', 'inherit'], shell: true }));
  const readers = bots.map(b => readline.createInterface({ input: b.stdout }));

  let state = initGame({ seed: cfg.seed, players: bots.length, width: cfg.width, height: cfg.height });

  while (!state.gameOver) {
    const live = state.players.filter(p => p.alive);
    for (const p of live) {
      bots[p.id].stdin.write(turnLinesForPlayer(state, p.id).join('\n') + '\n');
    }
    const answers = await Promise.all(live.map(p => readLines(readers[p.id], 1, cfg.turnMs)));

    const moves: MovesByPlayer = [];
    live.forEach((p, i) => {
      const dir = parseDirection(answers[i][0] ?? '');
      if (!dir) console.error(`Bot ${p.id} gave no valid move on tick ${state.tick}`);
      moves[p.id] = dir;
    });
    state = step(state, moves);
  }

  console.log(`Ranking: ${ranking(state).join(' > ')} after ${state.tick} ticks`);
  bots.forEach(b => b.kill());
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
