import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { SinkError, describeError } from '../errors.js';
import type { LineSink } from '../types.js';

/**
 * Append-only line file. Every record goes to the OS in its own write, so a
 * crash mid-session loses at most the record in flight.
 */
export class FileLineSink implements LineSink {
  readonly path: string;
  #handle: FileHandle | null = null;
  #linesWritten = 0;
  #closed = false;

  constructor(filepath: string) {
    this.path = path.resolve(filepath);
  }

  get linesWritten(): number {
    return this.#linesWritten;
  }

  get isOpen(): boolean {
    return this.#handle !== null;
  }

  async open(header: string): Promise<void> {
    if (this.#handle || this.#closed) {
      throw new SinkError(`sink ${this.path} was already opened`);
    }
    try {
      await mkdir(path.dirname(this.path), { recursive: true });
      this.#handle = await open(this.path, 'w');
      await this.#handle.write(`${header}\n`);
    } catch (error) {
      await this.close();
      throw new SinkError(`failed to open ${this.path}: ${describeError(error)}`, { cause: error });
    }
  }

  async writeLine(line: string): Promise<void> {
    const handle = this.#handle;
    if (!handle) {
      throw new SinkError(`sink ${this.path} is not open`);
    }
    try {
      await handle.write(`${line}\n`);
    } catch (error) {
      throw new SinkError(`write to ${this.path} failed: ${describeError(error)}`, { cause: error });
    }
    this.#linesWritten += 1;
  }

  async close(): Promise<void> {
    this.#closed = true;
    const handle = this.#handle;
    if (!handle) return;
    this.#handle = null;
    try {
      await handle.close();
    } catch (error) {
      throw new SinkError(`close of ${this.path} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
