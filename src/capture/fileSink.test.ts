import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { SinkError } from '../errors.js';
import { FileLineSink } from './fileSink.js';

describe('FileLineSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'capture-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header then each record on its own line', async () => {
    const sink = new FileLineSink(path.join(dir, 'run.csv'));
    await sink.open('Timestamp,AccelX');
    await sink.writeLine('1,0.5');
    await sink.writeLine('2,0.6');

    // visible before close: nothing is held back in user space
    expect(await readFile(sink.path, 'utf-8')).toBe('Timestamp,AccelX\n1,0.5\n2,0.6\n');
    expect(sink.linesWritten).toBe(2);
    await sink.close();
  });

  it('creates missing parent directories and truncates an existing file', async () => {
    const target = path.join(dir, 'nested', 'run.csv');
    const first = new FileLineSink(target);
    await first.open('H');
    await first.writeLine('old');
    await first.close();

    const second = new FileLineSink(target);
    await second.open('H');
    await second.close();

    expect(await readFile(target, 'utf-8')).toBe('H\n');
  });

  it('is closed exactly once and refuses writes afterwards', async () => {
    const sink = new FileLineSink(path.join(dir, 'run.csv'));
    await sink.open('H');
    await sink.close();
    await sink.close();

    expect(sink.isOpen).toBe(false);
    await expect(sink.writeLine('late')).rejects.toBeInstanceOf(SinkError);
    await expect(sink.open('H')).rejects.toBeInstanceOf(SinkError);
  });

  it('wraps open failures in SinkError', async () => {
    const blocker = path.join(dir, 'file');
    await writeFile(blocker, 'x');
    const sink = new FileLineSink(path.join(blocker, 'run.csv'));

    await expect(sink.open('H')).rejects.toBeInstanceOf(SinkError);
    expect(sink.isOpen).toBe(false);
  });
});
