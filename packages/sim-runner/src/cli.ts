// packages/sim-runner/src/cli.ts
import { fileURLToPath } from 'node:url';
import { describeError } from '@lightcycle/agents';
import { parseBotList } from './loadBots';
import { runEpisodes } from './runEpisodes';
import { runRoundRobin } from './tournament';

/* --------------------- CLI helpers --------------------- */
export function getFlag(args: string[], name: string, def?: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i < 0) return def;
  const v = args[i + 1];
  return v === undefined || v.startsWith('--') ? def : v;
}

export function getBool(args: string[], name: string, def = false): boolean {
  return args.includes(`--${name}`) ? true : def;
}

export function getInt(args: string[], name: string, def: number): number {
  const raw = getFlag(args, name);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`Invalid --${name}: ${raw}`);
  return n;
}

function boardFlags(args: string[]) {
  return { width: getInt(args, 'width', 30), height: getInt(args, 'height', 20) };
}

function botConfigFlags(args: string[]) {
  return { timeoutMs: getInt(args, 'timeout', 1750), debug: getBool(args, 'debug') };
}

const USAGE = `Usage:
  # Play episodes between 2-4 bots
  tsx src/cli.ts match --bots combined,random [--seed 42] [--episodes 3] [--width 30] [--height 20] [--timeout 1750]

  # Round-robin tournament
  tsx src/cli.ts tournament --bots combined,distance,space,wallhug,random [--seed 123] [--seeds 5] [--episodes 1]
`;

/** Runs one command; resolves with the JSON-ready result, or null after printing usage. */
export async function runCli(argv: string[]): Promise<unknown> {
  const [mode, ...rest] = argv;

  if (mode === 'match') {
    return runEpisodes({
      bots: parseBotList(getFlag(rest, 'bots', 'combined,random') ?? ''),
      seed: getInt(rest, 'seed', 42),
      episodes: getInt(rest, 'episodes', 3),
      ...boardFlags(rest),
      botConfig: botConfigFlags(rest),
    });
  }

  if (mode === 'tournament') {
    return runRoundRobin({
      bots: parseBotList(getFlag(rest, 'bots', 'combined,distance,space,wallhug,random') ?? ''),
      seed: getInt(rest, 'seed', 123),
      seedsPerPair: getInt(rest, 'seeds', 5),
      episodesPerSeed: getInt(rest, 'episodes', 1),
      ...boardFlags(rest),
      botConfig: botConfigFlags(rest),
    });
  }

  console.log(USAGE);
  return null;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2))
    .then(res => {
      if (res !== null) console.log(JSON.stringify(res, null, 2));
    })
    .catch(err => {
      console.error(describeError(err));
      process.exit(1);
    });
}
