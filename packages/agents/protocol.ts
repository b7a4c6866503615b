import type { Coord, PlayerReport, TurnFrame } from '@lightcycle/shared';

function ints(line: string, count: number): number[] {
  const parts = line.trim().split(/\s+/);
  const nums = parts.map(Number);
  if (parts.length !== count || nums.some(n => !Number.isInteger(n))) {
    throw new Error(`Expected ${count} integers, got: "${line}"`);
  }
  return nums;
}

/** `N P`: player count and our own id. */
export function parseHeader(line: string): { playerCount: number; me: number } {
  const [playerCount, me] = ints(line, 2);
  if (playerCount < 1 || me < 0 || me >= playerCount) throw new Error(`Invalid turn header: "${line}"`);
  return { playerCount, me };
}

/** `X0 Y0 X1 Y1`; any negative value means the player is out. */
export function parsePlayerLine(line: string): PlayerReport {
  const [x0, y0, x1, y1] = ints(line, 4);
  if ((x0 | y0 | x1 | y1) < 0) return { eliminated: true };
  const start: Coord = { x: x0, y: y0 };
  const current: Coord = { x: x1, y: y1 };
  return { eliminated: false, start, current };
}

export function parseFrame(lines: readonly string[]): TurnFrame {
  if (lines.length === 0) throw new Error('Empty turn');
  const { playerCount, me } = parseHeader(lines[0]);
  if (lines.length !== playerCount + 1) throw new Error(`Expected ${playerCount} player lines, got ${lines.length - 1}`);
  return { playerCount, me, players: lines.slice(1).map(parsePlayerLine) };
}

/**
 * Pulls one turn off a line iterator. Resolves undefined at a clean end of
 * input; a turn cut short is an error.
 */
export async function readFrame(lines: AsyncIterator<string>): Promise<TurnFrame | undefined> {
  let header: string | undefined;
  while (header === undefined) {
    const r = await lines.next();
    if (r.done) return undefined;
    if (r.value.trim()) header = r.value;
  }
  const { playerCount } = parseHeader(header);
  const body: string[] = [];
  while (body.length < playerCount) {
    const r = await lines.next();
    if (r.done) throw new Error(`Input ended after ${body.length} of ${playerCount} player lines`);
    body.push(r.value);
  }
  return parseFrame([header, ...body]);
}
