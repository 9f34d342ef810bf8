import { ChannelError } from '../errors.js';
import { withTimeoutSignal } from '../utils/abort.js';

interface Waiter {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

/**
 * Buffers framed lines between the transport's push side and the single
 * reader. A failure is delivered after any lines buffered before it.
 */
export class LineQueue {
  #lines: string[] = [];
  #waiter: Waiter | null = null;
  #failure: Error | null = null;

  get size(): number {
    return this.#lines.length;
  }

  push(line: string): void {
    if (this.#failure) return;
    const waiter = this.#waiter;
    if (waiter) {
      this.#waiter = null;
      waiter.resolve(line);
      return;
    }
    this.#lines.push(line);
  }

  fail(error: Error): void {
    if (this.#failure) return;
    this.#failure = error;
    const waiter = this.#waiter;
    this.#waiter = null;
    waiter?.reject(error);
  }

  clear(): number {
    const dropped = this.#lines.length;
    this.#lines = [];
    return dropped;
  }

  next(options: { timeoutMs: number; signal?: AbortSignal }): Promise<string | null> {
    if (this.#waiter) {
      return Promise.reject(new ChannelError('a read is already pending; the channel allows one reader'));
    }
    const buffered = this.#lines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.#failure) return Promise.reject(this.#failure);

    const bounded = withTimeoutSignal({ signal: options.signal, timeoutMs: options.timeoutMs });
    if (bounded.signal.aborted) {
      bounded.cleanup();
      return Promise.resolve(null);
    }

    return new Promise<string | null>((resolve, reject) => {
      const settle = () => {
        bounded.signal.removeEventListener('abort', onAbort);
        bounded.cleanup();
      };
      const waiter: Waiter = {
        resolve: (line) => {
          settle();
          resolve(line);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };
      const onAbort = () => {
        if (this.#waiter === waiter) this.#waiter = null;
        settle();
        resolve(null);
      };
      this.#waiter = waiter;
      bounded.signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
