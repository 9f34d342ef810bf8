export type CaptureErrorCode =
  | 'HANDSHAKE_FAILED'
  | 'CANCELLED'
  | 'CHANNEL_ERROR'
  | 'SINK_ERROR';

export class CaptureError extends Error {
  code: CaptureErrorCode;

  constructor(code: CaptureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureError';
    this.code = code;
  }
}

export class HandshakeError extends CaptureError {
  attempts: number;

  constructor(attempts: number) {
    super('HANDSHAKE_FAILED', `device did not confirm START after ${attempts} attempts`);
    this.name = 'HandshakeError';
    this.attempts = attempts;
  }
}

export class CancelledError extends CaptureError {
  constructor(reason: string) {
    super('CANCELLED', `recording cancelled (${reason}) before capture started`);
    this.name = 'CancelledError';
  }
}

export class ChannelError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CHANNEL_ERROR', message, options);
    this.name = 'ChannelError';
  }
}

export class SinkError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SINK_ERROR', message, options);
    this.name = 'SinkError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
