import { INBOUND_CONTROL_TOKENS } from '../types.js';
import type { InboundControlToken, ProtocolLine } from '../types.js';

const CONTROL_TOKENS: ReadonlySet<string> = new Set(INBOUND_CONTROL_TOKENS);

export function isControlToken(value: string): value is InboundControlToken {
  return CONTROL_TOKENS.has(value);
}

/** Strips the line terminator and surrounding whitespace from a decoded line. */
export function normalizeLine(raw: string): string {
  return raw.trim();
}

export function classifyLine(raw: string): ProtocolLine {
  const line = normalizeLine(raw);
  if (line.length === 0) return { kind: 'empty' };
  if (isControlToken(line)) return { kind: 'control', token: line };
  return { kind: 'data', payload: line };
}

/** A probe response counts when it is any control token or carries the firmware marker. */
export function isProbeResponse(raw: string, marker: string): boolean {
  const line = normalizeLine(raw);
  return isControlToken(line) || line.includes(marker);
}
