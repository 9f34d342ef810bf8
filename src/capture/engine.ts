import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { classifyLine } from '../protocol/tokens.js';
import type { CaptureExitReason, LineChannel, LineSink, StatusReporter } from '../types.js';
import { computeRate } from './stats.js';

export const TIMEOUT_REASON = 'timeout';

export interface CaptureLoopOptions {
  channel: LineChannel;
  sink: LineSink;
  /** Shared cancellation flag; aborting it is the only cross-task signal. */
  controller: AbortController;
  maxDurationMs: number;
  pollIntervalMs: number;
  progressEvery: number;
  reporter?: StatusReporter;
  now?: () => number;
  startedAt?: number;
  onRecord?: (payload: string, samples: number) => void;
}

export interface CaptureOutcome {
  reason: CaptureExitReason;
  samples: number;
  elapsedMs: number;
  error?: Error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reads framed lines until cancelled, the duration ceiling is hit, or the
 * channel or sink fails. Data records reach the sink in receipt order.
 */
export async function runCaptureLoop(options: CaptureLoopOptions): Promise<CaptureOutcome> {
  const { channel, sink, controller, reporter } = options;
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();
  const { signal } = controller;
  let samples = 0;

  const finish = (reason: CaptureExitReason, error?: Error): CaptureOutcome => {
    const elapsedMs = now() - startedAt;
    logger.info({ event: 'capture_loop_exit', reason, samples, elapsedMs, message: error?.message });
    return error ? { reason, samples, elapsedMs, error } : { reason, samples, elapsedMs };
  };

  for (;;) {
    if (signal.aborted) {
      return finish(signal.reason === TIMEOUT_REASON ? 'timeout' : 'cancelled');
    }

    const elapsedMs = now() - startedAt;
    if (elapsedMs >= options.maxDurationMs) {
      controller.abort(TIMEOUT_REASON);
      reporter?.status(
        `Maximum recording time (${(options.maxDurationMs / 60_000).toFixed(1)} minutes) reached!`
      );
      return finish('timeout');
    }

    let raw: string | null;
    try {
      raw = await channel.readLine({
        timeoutMs: Math.min(options.pollIntervalMs, options.maxDurationMs - elapsedMs),
        signal,
      });
    } catch (error) {
      reporter?.status(`Error during data collection: ${describeError(error)}`);
      return finish('channel_error', toError(error));
    }
    if (raw === null) continue;

    const line = classifyLine(raw);
    if (line.kind !== 'data') continue;

    try {
      await sink.writeLine(line.payload);
    } catch (error) {
      reporter?.status(`Failed to write ${sink.path}: ${describeError(error)}`);
      return finish('sink_error', toError(error));
    }
    samples += 1;
    options.onRecord?.(line.payload, samples);

    if (samples % options.progressEvery === 0 && reporter) {
      const elapsedSec = (now() - startedAt) / 1000;
      reporter.progress({ samples, elapsedSec, rateHz: computeRate(samples, elapsedSec) });
    }
  }
}
