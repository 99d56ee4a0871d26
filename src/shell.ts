import readline from 'node:readline';
import { executeLine, ShellContext } from './commands';

export const GREETING = 'Welcome to the assistant bot!';

// Reads commands line by line until close/exit or end of input.
export async function runShell(
  ctx: ShellContext,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
  output.write(GREETING + '\n');
  try {
    for await (const line of rl) {
      const { reply, exit } = executeLine(ctx, line);
      if (reply) output.write(reply + '\n');
      if (exit) break;
    }
  } finally {
    rl.close();
  }
}
