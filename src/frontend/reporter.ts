import { formatProgress } from '../capture/stats.js';
import type { ProgressUpdate, StatusReporter } from '../types.js';

export interface TextOutput {
  write(chunk: string): unknown;
}

/**
 * Status lines go to the output as-is; progress overwrites one line in
 * place with `\r` until the next status line ends it.
 */
export class ConsoleReporter implements StatusReporter {
  #progressActive = false;

  constructor(private readonly output: TextOutput = process.stdout) {}

  status(line: string): void {
    if (this.#progressActive) {
      this.output.write('\n');
      this.#progressActive = false;
    }
    this.output.write(`${line}\n`);
  }

  progress(update: ProgressUpdate): void {
    this.output.write(`\r${formatProgress(update)}`);
    this.#progressActive = true;
  }
}
