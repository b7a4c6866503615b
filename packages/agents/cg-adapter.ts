/* Process entry point for the turn protocol.
   Each turn on stdin:
   - `N P`: player count and our player id
   - N lines `X0 Y0 X1 Y1`: start and current cell per player, all -1 once a player is out
   We answer with one line: UP, DOWN, LEFT or RIGHT. Diagnostics go to stderr.
*/
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { parseArgs, type BotConfig } from './config';
import { describeError } from './lib/log';
import { readFrame } from './protocol';
import { Session } from './session';

/** Plays until input ends; resolves with the number of turns answered. */
export async function runAdapter(input: Readable, output: Writable, config: BotConfig): Promise<number> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  const session = new Session(config);
  let turns = 0;
  try {
    for (let frame = await readFrame(lines); frame; frame = await readFrame(lines)) {
      session.ingestFrame(frame);
      output.write(`${await session.decide(frame.me)}\n`);
      turns++;
    }
  } finally {
    rl.close();
    await session.close();
  }
  return turns;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  Promise.resolve()
    .then(() => runAdapter(process.stdin, process.stdout, parseArgs(process.argv.slice(2))))
    .catch(err => {
      console.error(describeError(err));
      process.exit(1);
    });
}
