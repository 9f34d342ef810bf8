export const INBOUND_CONTROL_TOKENS = ['READY', 'STARTED', 'STOPPED'] as const;

export type InboundControlToken = (typeof INBOUND_CONTROL_TOKENS)[number];

export type ProtocolLine =
  | { kind: 'empty' }
  | { kind: 'control'; token: InboundControlToken }
  | { kind: 'data'; payload: string };

export interface ReadLineOptions {
  /** Falls back to the channel's configured read timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * An opened, line-framed duplex connection to exactly one device.
 * Only one `readLine` may be pending at a time.
 */
export interface LineChannel {
  readonly path: string;
  readonly isOpen: boolean;
  writeLine(text: string): Promise<void>;
  /** Resolves `null` when no line arrived within the timeout or the signal aborted. */
  readLine(options?: ReadLineOptions): Promise<string | null>;
  discardInput(): Promise<void>;
  close(): Promise<void>;
}

export interface EndpointInfo {
  path: string;
  description: string;
}

export interface LineSink {
  readonly path: string;
  readonly linesWritten: number;
  readonly isOpen: boolean;
  open(header: string): Promise<void>;
  writeLine(line: string): Promise<void>;
  close(): Promise<void>;
}

export interface ProgressUpdate {
  samples: number;
  elapsedSec: number;
  rateHz: number;
}

/** Operator-facing status output. Calls must not block capture. */
export interface StatusReporter {
  status(line: string): void;
  progress(update: ProgressUpdate): void;
}

/** An external stop request, e.g. the operator typing `q`. */
export interface CancellationSource {
  /**
   * Resolves once cancellation is requested. When `signal` aborts the
   * source detaches and the promise settles without requesting anything.
   */
  wait(signal: AbortSignal): Promise<boolean>;
}

export interface CaptureStats {
  samples: number;
  elapsedSec: number;
  rateHz: number;
}

export type CaptureExitReason = 'cancelled' | 'timeout' | 'channel_error' | 'sink_error';

export type StartOutcome =
  | { status: 'confirmed'; attempts: number; startsSent: number }
  | { status: 'exhausted'; attempts: number; startsSent: number }
  | { status: 'cancelled'; attempts: number; startsSent: number };

export type StopOutcome =
  | { status: 'stopped' }
  | { status: 'ack_mismatch'; response: string | null; error?: Error };

/** `cancelled` here means the stop request arrived before capture began. */
export type SessionFailureReason = 'handshake_failed' | 'sink_error' | 'cancelled';

export type SessionResult =
  | {
      status: 'completed';
      sessionId: string;
      reason: CaptureExitReason;
      sinkPath: string;
      devicePath: string;
      stats: CaptureStats;
      stop: StopOutcome;
      startedAt: string;
      endedAt: string;
      error?: Error;
    }
  | {
      status: 'failed';
      sessionId: string;
      reason: SessionFailureReason;
      sinkPath: string;
      devicePath: string;
      error: Error;
      startedAt: string;
      endedAt: string;
    };

export interface SessionHistoryEntry {
  sessionId: string;
  status: SessionResult['status'];
  reason: CaptureExitReason | SessionFailureReason;
  sinkPath: string;
  devicePath: string;
  samples: number;
  elapsedSec: number;
  rateHz: number;
  startedAt: string;
  endedAt: string;
}
