import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Derives a signal that aborts when either the parent signal aborts or
 * `timeoutMs` elapses.
 */
export function withTimeoutSignal(
  options: { signal?: AbortSignal; timeoutMs: number }
): { signal: AbortSignal; cleanup: () => void } {
  const { signal, timeoutMs } = options;
  const controller = new AbortController();

  const propagateAbort = () => {
    controller.abort(signal?.reason);
  };

  if (signal) {
    if (signal.aborted) {
      propagateAbort();
    } else {
      signal.addEventListener('abort', propagateAbort, { once: true });
    }
  }

  let timer: NodeJS.Timeout | null = null;
  if (Number.isFinite(timeoutMs) && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${timeoutMs}ms`));
    }, Math.max(0, timeoutMs));
    timer.unref?.();
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      if (timer) clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', propagateAbort);
      }
    },
  };
}

/** Sleeps for `ms`, returning early (without throwing) when the signal aborts. */
export async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}
