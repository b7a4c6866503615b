import { BOTS, createBot, type Bot, type BotConfig } from '@lightcycle/agents';

/** Splits `a,b,c` into bot names, rejecting unknown ones up front. */
export function parseBotList(arg: string): string[] {
  const names = arg.split(',').map(s => s.trim()).filter(Boolean);
  for (const n of names) {
    if (!(n in BOTS)) throw new Error(`Unknown bot "${n}". Try one of: ${Object.keys(BOTS).join(', ')}`);
  }
  return names;
}

/** Fresh bots for one game; each keeps its own board. */
export function loadMany(names: readonly string[], cfg: Partial<BotConfig>, seed: number): Bot[] {
  return names.map((n, i) => createBot(n, cfg, seed + i));
}
