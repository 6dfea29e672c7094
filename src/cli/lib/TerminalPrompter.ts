/**
 * Terminal Prompter
 *
 * readline-backed Prompter for the safety gate and the commit menu. Lines
 * are queued as they arrive so answers piped in ahead of their questions
 * are not lost; once input closes every pending and future question
 * resolves to null.
 */

import * as readline from 'readline';
import type { Prompter } from '../../promotion/SafetyGate.js';

export class TerminalPrompter implements Prompter {
  private rl: readline.Interface | null = null;
  private readonly buffered: string[] = [];
  private readonly waiting: Array<(answer: string | null) => void> = [];
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string | null> {
    this.output.write(question);
    this.open();

    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  write(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl?.close();
  }

  private open(): void {
    if (this.rl || this.closed) return;

    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on('line', (line) => {
      const resolve = this.waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
    this.rl = rl;
  }
}
