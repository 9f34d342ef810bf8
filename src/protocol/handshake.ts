import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { pause } from '../utils/abort.js';
import type { LineChannel, ProtocolLine, StartOutcome, StatusReporter, StopOutcome } from '../types.js';
import { classifyLine } from './tokens.js';

export type StartState = 'awaiting_ack' | 'confirmed' | 'exhausted' | 'cancelled';

/** What the start handshake does with one read result while awaiting the ack. */
export type StartStep = 'confirm' | 'resend' | 'ignore';

export interface StartHandshakeOptions {
  attempts: number;
  attemptTimeoutMs: number;
  flushPauseMs: number;
  /** Aborting ends the exchange without another START; pending reads return at once. */
  signal?: AbortSignal;
  reporter?: StatusReporter;
}

export function nextStartStep(line: ProtocolLine): StartStep {
  if (line.kind === 'empty') return 'resend';
  if (line.kind === 'control') {
    if (line.token === 'STARTED') return 'confirm';
    // READY re-announced after the probe: the START crossed it on the wire
    if (line.token === 'READY') return 'resend';
  }
  return 'ignore';
}

/**
 * Sends START and waits for STARTED, resending on READY or silence. Gives up
 * after `attempts` bounded reads; no START is sent that would not be waited on,
 * and none at all once `signal` has aborted.
 */
export async function startSession(
  channel: LineChannel,
  options: StartHandshakeOptions
): Promise<StartOutcome> {
  const { reporter, signal } = options;
  let startsSent = 0;
  let attempts = 0;
  const cancelled = (): StartOutcome => {
    logger.info({ event: 'start_handshake_cancelled', attempts, startsSent, reason: signal?.reason });
    return { status: 'cancelled', attempts, startsSent };
  };

  if (signal?.aborted) return cancelled();
  await channel.discardInput();
  await pause(options.flushPauseMs, signal);
  if (signal?.aborted) return cancelled();

  const sendStart = async () => {
    await channel.writeLine('START');
    startsSent += 1;
  };

  await sendStart();
  let state: StartState = 'awaiting_ack';

  while (state === 'awaiting_ack') {
    if (signal?.aborted) {
      state = 'cancelled';
      break;
    }
    if (attempts >= options.attempts) {
      state = 'exhausted';
      break;
    }
    attempts += 1;

    let line: ProtocolLine;
    try {
      const raw = await channel.readLine({ timeoutMs: options.attemptTimeoutMs, signal });
      if (raw === null && signal?.aborted) continue;
      line = raw === null ? { kind: 'empty' } : classifyLine(raw);
    } catch (error) {
      logger.warn({ event: 'start_ack_read_failed', attempt: attempts, message: describeError(error) });
      reporter?.status(`Communication error: ${describeError(error)}`);
      continue;
    }

    const step = nextStartStep(line);
    logger.debug({ event: 'start_ack_step', attempt: attempts, line, step });
    const retriesLeft = attempts < options.attempts;

    switch (step) {
      case 'confirm':
        state = 'confirmed';
        reporter?.status('Device confirmed START');
        break;
      case 'resend':
        if (retriesLeft && !signal?.aborted) {
          reporter?.status(
            line.kind === 'control' ? 'Got READY, sending START again...' : 'No response, retrying START...'
          );
          await sendStart();
        }
        break;
      case 'ignore':
        logger.info({
          event: 'start_ack_unexpected',
          attempt: attempts,
          line: line.kind === 'data' ? line.payload : line.kind,
        });
        break;
    }
  }

  if (state === 'cancelled') return cancelled();
  logger.info({ event: 'start_handshake_finished', state, attempts, startsSent });
  if (state === 'confirmed') {
    return { status: 'confirmed', attempts, startsSent };
  }
  reporter?.status('Failed to get START confirmation from device');
  return { status: 'exhausted', attempts, startsSent };
}

/**
 * Sends STOP once and reads a single reply. Anything other than STOPPED is an
 * ack mismatch, which callers log and otherwise ignore.
 */
export async function stopSession(
  channel: LineChannel,
  options: { timeoutMs?: number; reporter?: StatusReporter } = {}
): Promise<StopOutcome> {
  let response: string | null;
  try {
    await channel.writeLine('STOP');
    response = await channel.readLine({ timeoutMs: options.timeoutMs });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.warn({ event: 'stop_ack_failed', message: cause.message });
    return { status: 'ack_mismatch', response: null, error: cause };
  }

  const line = response === null ? null : classifyLine(response);
  if (line?.kind === 'control' && line.token === 'STOPPED') {
    options.reporter?.status('Device stopped successfully');
    return { status: 'stopped' };
  }

  const received = line === null || line.kind === 'empty' ? null : line.kind === 'control' ? line.token : line.payload;
  logger.warn({ event: 'stop_ack_mismatch', received });
  return { status: 'ack_mismatch', response: received };
}
