import { createInterface } from 'readline/promises';
import type { CliIO } from './chat-cli';

/**
 * CliIO over stdin/stdout. Ctrl-C and Ctrl-D both end input.
 */
export function createTerminalIO(): CliIO & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  let closed = false;
  const whenClosed = new Promise<null>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  rl.on('SIGINT', () => rl.close());

  return {
    ask(prompt: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }
      return Promise.race([rl.question(prompt), whenClosed]);
    },
    print(line = ''): void {
      process.stdout.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    }
  };
}
