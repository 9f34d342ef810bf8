import type { CancellationSource } from '../types.js';

/** Anything that emits typed lines, such as a `readline` interface on stdin. */
export interface LineSource {
  on(event: 'line', listener: (line: string) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'line', listener: (line: string) => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

/**
 * Cancellation requested by typing `keyword` (case-insensitive) and ENTER.
 * The source closing (EOF) is not a request.
 */
export function createLineCancellation(source: LineSource, keyword = 'q'): CancellationSource {
  const expected = keyword.trim().toLowerCase();
  return {
    wait(signal) {
      return new Promise<boolean>((resolve) => {
        if (signal.aborted) {
          resolve(false);
          return;
        }
        const settle = (requested: boolean) => {
          source.off('line', onLine);
          source.off('close', onClose);
          signal.removeEventListener('abort', onAbort);
          resolve(requested);
        };
        const onLine = (line: string) => {
          if (line.trim().toLowerCase() === expected) settle(true);
        };
        const onClose = () => settle(false);
        const onAbort = () => settle(false);

        source.on('line', onLine);
        source.on('close', onClose);
        signal.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}
