/** Tagged stderr logger. stdout belongs to the turn protocol, so nothing here writes to it. */
export type Logger = {
  readonly enabled: boolean;
  debug(msg: string): void;
  warn(msg: string): void;
};

export function createLogger(tag: string, enabled = process.env.LIGHTCYCLE_DEBUG === '1'): Logger {
  return {
    enabled,
    debug(msg) { if (enabled) console.error(`[${tag}] ${msg}`); },
    warn(msg) { console.error(`[${tag}] WARN ${msg}`); },
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? (err.stack ?? err.message) : String(err);
}
