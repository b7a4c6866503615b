import { BOARD_W, BOARD_H, DEFAULT_SPACE_DEPTH, DEFAULT_TIMEOUT_MS, DEFAULT_WEIGHTS, isRecord, readJsonObject } from '@lightcycle/shared';

export type StrategyWeights = { distance: number; space: number; wallHug: number };

export type BotConfig = {
  width: number;
  height: number;
  timeoutMs: number;
  spaceDepth: number;
  weights: StrategyWeights;
  /** Pool size; defaults to one worker per active strategy. */
  workers?: number;
  debug: boolean;
};

export const DEFAULT_CONFIG: BotConfig = {
  width: BOARD_W,
  height: BOARD_H,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  spaceDepth: DEFAULT_SPACE_DEPTH,
  weights: { ...DEFAULT_WEIGHTS },
  debug: false,
};

const WEIGHT_NAMES: readonly (keyof StrategyWeights)[] = ['distance', 'space', 'wallHug'];

function isWeightName(s: string): s is keyof StrategyWeights {
  return WEIGHT_NAMES.some(n => n === s);
}

function positiveInt(flag: string, v: unknown): number {
  const n = typeof v === 'string' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 1) throw new Error(`Invalid ${flag}: ${String(v)}`);
  return n;
}

function positiveNumber(flag: string, v: unknown): number {
  const n = typeof v === 'string' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isFinite(n) || n <= 0) throw new Error(`Invalid ${flag}: ${String(v)}`);
  return n;
}

function weight(name: string, v: unknown): number {
  const n = typeof v === 'string' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isFinite(n) || n < 0) throw new Error(`Invalid weight for ${name}: ${String(v)}`);
  return n;
}

/** `distance=1,space=2,wallHug=2`; names left out keep their current weight. */
export function parseWeights(spec: string, base: StrategyWeights = DEFAULT_CONFIG.weights): StrategyWeights {
  const out = { ...base };
  for (const part of spec.split(',').map(s => s.trim()).filter(Boolean)) {
    const [name, value] = part.split('=');
    if (!isWeightName(name)) throw new Error(`Unknown strategy in --weights: ${name}`);
    out[name] = weight(name, value);
  }
  return out;
}

/** Overlay a parsed JSON config object onto `cfg`. */
export function mergeConfig(cfg: BotConfig, obj: Record<string, unknown>): BotConfig {
  const out: BotConfig = { ...cfg, weights: { ...cfg.weights } };
  if (obj.width !== undefined) out.width = positiveInt('width', obj.width);
  if (obj.height !== undefined) out.height = positiveInt('height', obj.height);
  if (obj.timeoutMs !== undefined) out.timeoutMs = positiveNumber('timeoutMs', obj.timeoutMs);
  if (obj.spaceDepth !== undefined) out.spaceDepth = positiveInt('spaceDepth', obj.spaceDepth);
  if (obj.workers !== undefined) out.workers = positiveInt('workers', obj.workers);
  if (obj.debug !== undefined) out.debug = obj.debug === true;
  if (obj.weights !== undefined) {
    if (!isRecord(obj.weights)) throw new Error('Invalid weights: expected an object');
    for (const [name, v] of Object.entries(obj.weights)) {
      if (!isWeightName(name)) throw new Error(`Unknown strategy in weights: ${name}`);
      out.weights[name] = weight(name, v);
    }
  }
  return out;
}

export function validateConfig(cfg: BotConfig): BotConfig {
  if (!WEIGHT_NAMES.some(n => cfg.weights[n] > 0)) throw new Error('At least one strategy weight must be positive');
  return cfg;
}

/**
 * Reads `--width --height --timeout --depth --workers --weights --debug` and
 * `--config <file.json>`, in order, so later flags override earlier ones.
 * Both `--flag value` and `--flag=value` work. LIGHTCYCLE_DEBUG=1 turns on
 * debug output.
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): BotConfig {
  let cfg: BotConfig = { ...DEFAULT_CONFIG, weights: { ...DEFAULT_CONFIG.weights } };
  if (env.LIGHTCYCLE_DEBUG === '1') cfg.debug = true;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) throw new Error(`Unexpected argument: ${a}`);
    const eq = a.indexOf('=');
    const name = eq >= 0 ? a.slice(2, eq) : a.slice(2);
    if (name === 'debug') { cfg.debug = true; continue; }
    const value = eq >= 0 ? a.slice(eq + 1) : argv[++i];
    if (value === undefined) throw new Error(`Missing value for --${name}`);
    switch (name) {
      case 'width': cfg.width = positiveInt('--width', value); break;
      case 'height': cfg.height = positiveInt('--height', value); break;
      case 'timeout': cfg.timeoutMs = positiveNumber('--timeout', value); break;
      case 'depth': cfg.spaceDepth = positiveInt('--depth', value); break;
      case 'workers': cfg.workers = positiveInt('--workers', value); break;
      case 'weights': cfg.weights = parseWeights(value, cfg.weights); break;
      case 'config': cfg = mergeConfig(cfg, readJsonObject(value)); break;
      default: throw new Error(`Unknown flag --${name}`);
    }
  }
  return validateConfig(cfg);
}
