import * as readline from "node:readline";
import type { LineReader } from "../notes/types.js";

/**
 * Line-at-a-time reader over stdin. Lines that arrive before they are asked
 * for (a pipe, a paste) wait in a queue; once the input closes every pending
 * and later read resolves to null.
 */
export class ConsoleLineReader implements LineReader {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on("line", (line) => {
      const resolve = this.waiting;
      if (resolve) {
        this.waiting = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on("close", () => {
      this.ended = true;
      const resolve = this.waiting;
      this.waiting = null;
      resolve?.(null);
    });
  }

  readLine(message: string): Promise<string | null> {
    this.output.write(message + "\n");

    const next = this.queued.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }
}
