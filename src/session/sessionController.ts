import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../config.js';
import { FileLineSink } from '../capture/fileSink.js';
import { runCaptureLoop } from '../capture/engine.js';
import type { CaptureOutcome } from '../capture/engine.js';
import { computeStats, formatStats } from '../capture/stats.js';
import { CancelledError, HandshakeError, SinkError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { startSession, stopSession } from '../protocol/handshake.js';
import type {
  CancellationSource,
  LineChannel,
  LineSink,
  SessionFailureReason,
  SessionResult,
  StartOutcome,
  StatusReporter,
  StopOutcome,
} from '../types.js';

export const OPERATOR_REASON = 'operator';

export type SessionState = 'idle' | 'starting' | 'capturing' | 'finalizing' | 'terminal';

export interface SessionRequest {
  channel: LineChannel;
  sinkTarget: string;
  config: AppConfig;
  cancellation?: CancellationSource;
  reporter?: StatusReporter;
  createSink?: (target: string) => LineSink;
  now?: () => number;
  sessionId?: string;
  onRecord?: (payload: string, samples: number) => void;
}

function reasonLabel(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === 'string' ? reason : OPERATOR_REASON;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One recording attempt. The session owns the channel and the sink from the
 * start handshake on and releases both on every exit path.
 */
export class CaptureSession {
  readonly id: string;
  readonly controller = new AbortController();

  readonly #request: SessionRequest;
  readonly #sink: LineSink;
  readonly #now: () => number;
  readonly #detachWatcher = new AbortController();
  #state: SessionState = 'idle';
  #run: Promise<SessionResult> | null = null;
  #capture: Promise<CaptureOutcome> | null = null;
  #finalizing: Promise<SessionResult> | null = null;
  #startedAt = new Date().toISOString();
  #captureStartedAt = 0;
  #samples = 0;

  constructor(request: SessionRequest) {
    this.#request = request;
    this.id = request.sessionId ?? randomUUID();
    this.#now = request.now ?? Date.now;
    this.#sink = (request.createSink ?? ((target) => new FileLineSink(target)))(request.sinkTarget);
  }

  get state(): SessionState {
    return this.#state;
  }

  get samples(): number {
    return this.#samples;
  }

  run(): Promise<SessionResult> {
    this.#run ??= this.#execute();
    return this.#run;
  }

  /** Requests an early stop and waits for the session to finish finalizing. */
  async abort(reason: string = OPERATOR_REASON): Promise<SessionResult | null> {
    if (!this.controller.signal.aborted) this.controller.abort(reason);
    return this.#run;
  }

  /**
   * Stops the device, closes the sink and the channel, and computes the
   * statistics. Runs once; later calls resolve to the same result. Before
   * capture has begun it cancels the start and resolves with the run result.
   */
  finalize(): Promise<SessionResult> {
    if (!this.#finalizing && (this.#state === 'idle' || this.#state === 'starting')) {
      if (!this.controller.signal.aborted) this.controller.abort(OPERATOR_REASON);
      return this.run();
    }
    this.#finalizing ??= this.#finalize();
    return this.#finalizing;
  }

  async #execute(): Promise<SessionResult> {
    const { channel, config, reporter } = this.#request;
    this.#state = 'starting';
    this.#startedAt = new Date().toISOString();
    logger.info({ event: 'session_starting', sessionId: this.id, device: channel.path, sink: this.#sink.path });

    const { signal } = this.controller;
    let started: StartOutcome;
    try {
      started = await startSession(channel, {
        attempts: config.handshake.startAttempts,
        attemptTimeoutMs: config.handshake.attemptTimeoutMs,
        flushPauseMs: config.handshake.flushPauseMs,
        signal,
        reporter,
      });
    } catch (error) {
      reporter?.status(`Failed to start recording: ${describeError(error)}`);
      return this.#fail('handshake_failed', toError(error), false);
    }
    if (started.status === 'exhausted') {
      return this.#fail('handshake_failed', new HandshakeError(started.attempts), false);
    }
    // no sink once a stop was requested
    if (started.status === 'cancelled' || signal.aborted) {
      reporter?.status('Recording cancelled before it started');
      return this.#fail('cancelled', new CancelledError(reasonLabel(signal)), started.startsSent > 0);
    }

    try {
      await this.#sink.open(config.capture.header);
    } catch (error) {
      reporter?.status(`Failed to start recording: ${describeError(error)}`);
      const sinkError = error instanceof SinkError ? error : new SinkError(describeError(error), { cause: error });
      return this.#fail('sink_error', sinkError, true);
    }

    this.#state = 'capturing';
    this.#captureStartedAt = this.#now();
    reporter?.status(`Recording started - ${this.#sink.path}`);
    reporter?.status(`Max recording time: ${(config.capture.maxDurationMs / 60_000).toFixed(1)} minutes`);
    this.#watchCancellation();

    this.#capture = runCaptureLoop({
      channel,
      sink: this.#sink,
      controller: this.controller,
      maxDurationMs: config.capture.maxDurationMs,
      pollIntervalMs: config.capture.pollIntervalMs,
      progressEvery: config.capture.progressEvery,
      reporter,
      now: this.#now,
      startedAt: this.#captureStartedAt,
      onRecord: (payload, samples) => {
        this.#samples = samples;
        this.#request.onRecord?.(payload, samples);
      },
    });
    await this.#capture;
    return this.finalize();
  }

  #watchCancellation(): void {
    const source = this.#request.cancellation;
    if (!source) return;
    // Not awaited: the session ends on the capture loop alone; a late watcher only sets the flag.
    void source
      .wait(this.#detachWatcher.signal)
      .then((requested) => {
        if (requested && !this.controller.signal.aborted) {
          this.#request.reporter?.status('Stopping recording...');
          this.controller.abort(OPERATOR_REASON);
        }
      })
      .catch((error: unknown) => {
        logger.warn({ event: 'cancellation_watcher_failed', sessionId: this.id, message: describeError(error) });
      });
  }

  async #finalize(): Promise<SessionResult> {
    const { channel, reporter } = this.#request;
    this.#state = 'finalizing';
    if (!this.controller.signal.aborted) this.controller.abort(OPERATOR_REASON);
    this.#detachWatcher.abort();

    // statistics only once the loop has fully stopped
    const outcome = this.#capture ? await this.#capture : null;
    const stop = await stopSession(channel, { reporter });
    let error = outcome?.error;

    try {
      await this.#sink.close();
    } catch (closeError) {
      error ??= toError(closeError);
      logger.error({ event: 'sink_close_failed', sessionId: this.id, message: describeError(closeError) });
    }
    await this.#releaseChannel();

    const samples = outcome?.samples ?? this.#samples;
    const elapsedMs = outcome?.elapsedMs ?? this.#now() - this.#captureStartedAt;
    const stats = computeStats(samples, elapsedMs);
    const reason = outcome?.reason ?? 'cancelled';
    this.#state = 'terminal';

    reporter?.status('Recording completed!');
    for (const line of formatStats(stats)) reporter?.status(line);
    logger.info({ event: 'session_finished', sessionId: this.id, reason, stop: stop.status, ...stats });

    return {
      status: 'completed',
      sessionId: this.id,
      reason,
      sinkPath: this.#sink.path,
      devicePath: channel.path,
      stats,
      stop,
      startedAt: this.#startedAt,
      endedAt: new Date().toISOString(),
      ...(error ? { error } : {}),
    };
  }

  #fail(reason: SessionFailureReason, error: Error, deviceStreaming: boolean): Promise<SessionResult> {
    this.#finalizing ??= this.#failAndRelease(reason, error, deviceStreaming);
    return this.#finalizing;
  }

  async #failAndRelease(
    reason: SessionFailureReason,
    error: Error,
    deviceStreaming: boolean
  ): Promise<SessionResult> {
    const { channel } = this.#request;
    this.#state = 'finalizing';
    let stop: StopOutcome | null = null;
    if (deviceStreaming) {
      stop = await stopSession(channel, { reporter: this.#request.reporter });
    }
    await this.#releaseChannel();
    this.#state = 'terminal';
    logger.warn({ event: 'session_failed', sessionId: this.id, reason, stop: stop?.status, message: error.message });
    return {
      status: 'failed',
      sessionId: this.id,
      reason,
      sinkPath: this.#sink.path,
      devicePath: channel.path,
      error,
      startedAt: this.#startedAt,
      endedAt: new Date().toISOString(),
    };
  }

  async #releaseChannel(): Promise<void> {
    try {
      await this.#request.channel.close();
    } catch (error) {
      logger.error({ event: 'channel_close_failed', sessionId: this.id, message: describeError(error) });
    }
  }
}

export function runSession(request: SessionRequest): Promise<SessionResult> {
  return new CaptureSession(request).run();
}
