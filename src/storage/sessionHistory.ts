import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { SessionHistoryEntry, SessionResult } from '../types.js';

const historyEntrySchema = z.object({
  sessionId: z.string(),
  status: z.enum(['completed', 'failed']),
  reason: z.enum(['cancelled', 'timeout', 'channel_error', 'sink_error', 'handshake_failed']),
  sinkPath: z.string(),
  devicePath: z.string(),
  samples: z.number(),
  elapsedSec: z.number(),
  rateHz: z.number(),
  startedAt: z.string(),
  endedAt: z.string(),
});

function parseRow(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    logger.debug({ event: 'history_row_unparseable', message: describeError(error) });
    return null;
  }
}

export function toHistoryEntry(result: SessionResult): SessionHistoryEntry {
  const stats =
    result.status === 'completed' ? result.stats : { samples: 0, elapsedSec: 0, rateHz: 0 };
  return {
    sessionId: result.sessionId,
    status: result.status,
    reason: result.reason,
    sinkPath: result.sinkPath,
    devicePath: result.devicePath,
    ...stats,
    startedAt: result.startedAt,
    endedAt: result.endedAt,
  };
}

/**
 * JSONL log of finished sessions (one summary per line, never the records
 * themselves), trimmed to the newest `maxRows` entries.
 */
export class SessionHistory {
  constructor(
    private readonly filepath: string,
    private readonly maxRows: number
  ) {}

  get path(): string {
    return this.filepath;
  }

  async init(): Promise<void> {
    await mkdir(path.dirname(this.filepath), { recursive: true });
  }

  async append(entry: SessionHistoryEntry): Promise<void> {
    await appendFile(this.filepath, `${JSON.stringify(entry)}\n`);
    await this.prune();
  }

  async readAll(): Promise<SessionHistoryEntry[]> {
    let data: string;
    try {
      data = await readFile(this.filepath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw error;
    }
    const entries: SessionHistoryEntry[] = [];
    let skipped = 0;
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;
      const parsed = historyEntrySchema.safeParse(parseRow(line));
      // truncated rows and rows from an older layout are skipped
      if (parsed.success) entries.push(parsed.data);
      else skipped += 1;
    }
    if (skipped > 0) {
      logger.warn({ event: 'history_rows_skipped', path: this.filepath, skipped });
    }
    return entries;
  }

  async readRecent(limit: number): Promise<SessionHistoryEntry[]> {
    const all = await this.readAll();
    if (limit <= 0) return all.reverse();
    return all.slice(-limit).reverse();
  }

  private async prune(): Promise<void> {
    const all = await this.readAll();
    if (all.length <= this.maxRows) return;
    const kept = all.slice(-this.maxRows);
    const tmpPath = `${this.filepath}.${randomUUID()}.tmp`;
    await writeFile(tmpPath, kept.map((row) => JSON.stringify(row)).join('\n') + '\n', 'utf-8');
    await rename(tmpPath, this.filepath);
  }
}

export function formatHistoryEntry(entry: SessionHistoryEntry): string {
  return [
    entry.endedAt,
    `${entry.status}/${entry.reason}`,
    `${entry.samples} samples`,
    `${entry.elapsedSec.toFixed(1)}s`,
    `${entry.rateHz.toFixed(1)} Hz`,
    entry.sinkPath,
  ].join('  ');
}
