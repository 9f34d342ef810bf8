import { describe, expect, it, vi } from 'vitest';
import { ChannelError, SinkError } from '../errors.js';
import { MemorySink } from '../testing/memorySink.js';
import { ScriptedChannel } from '../testing/scriptedChannel.js';
import { runCaptureLoop } from './engine.js';

const baseOptions = { maxDurationMs: 60_000, pollIntervalMs: 10, progressEvery: 100 };

describe('runCaptureLoop', () => {
  it('counts and stores only data records, in receipt order', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('Timestamp,AccelX');
    channel.emit('READY', '', '1,0.1', 'STARTED', '2,0.2\r', '   ', 'STOPPED', '3,0.3');
    channel.fail(new ChannelError('device unplugged'));

    const outcome = await runCaptureLoop({ ...baseOptions, channel, sink, controller: new AbortController() });

    expect(outcome.reason).toBe('channel_error');
    expect(outcome.error?.message).toBe('device unplugged');
    expect(outcome.samples).toBe(3);
    expect(sink.contents()).toBe('Timestamp,AccelX\n1,0.1\n2,0.2\n3,0.3\n');
  });

  it('stops itself at the duration ceiling and raises the shared flag', async () => {
    let clock = 0;
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');
    const controller = new AbortController();
    channel.emit('a', 'b', 'c', 'd', 'e');

    const outcome = await runCaptureLoop({
      ...baseOptions,
      maxDurationMs: 120_000,
      channel,
      sink,
      controller,
      now: () => clock,
      startedAt: 0,
      onRecord: () => {
        clock += 40_000;
      },
    });

    expect(outcome).toEqual({ reason: 'timeout', samples: 3, elapsedMs: 120_000 });
    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBe('timeout');
    expect(sink.lines).toEqual(['a', 'b', 'c']);
  });

  it('ends on the ceiling even when the device is silent', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');

    const outcome = await runCaptureLoop({
      ...baseOptions,
      maxDurationMs: 30,
      channel,
      sink,
      controller: new AbortController(),
    });

    expect(outcome.reason).toBe('timeout');
    expect(outcome.samples).toBe(0);
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(30);
  });

  it('honours cancellation before the next record', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');
    const controller = new AbortController();
    channel.emit('1', '2', '3', '4', '5');

    const outcome = await runCaptureLoop({
      ...baseOptions,
      channel,
      sink,
      controller,
      onRecord: (_payload, samples) => {
        if (samples === 2) controller.abort('operator');
      },
    });

    expect(outcome.reason).toBe('cancelled');
    expect(outcome.samples).toBe(2);
    expect(sink.lines).toEqual(['1', '2']);
  });

  it('wakes a pending read when cancelled', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');
    const controller = new AbortController();
    setTimeout(() => controller.abort('operator'), 10);

    const started = Date.now();
    const outcome = await runCaptureLoop({
      ...baseOptions,
      pollIntervalMs: 10_000,
      channel,
      sink,
      controller,
    });

    expect(outcome.reason).toBe('cancelled');
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('reports progress every N records', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');
    const reporter = { status: vi.fn(), progress: vi.fn() };
    channel.emit('1', '2', '3', '4', '5');
    channel.fail(new ChannelError('eof'));

    await runCaptureLoop({
      ...baseOptions,
      progressEvery: 2,
      channel,
      sink,
      reporter,
      controller: new AbortController(),
    });

    expect(reporter.progress).toHaveBeenCalledTimes(2);
    expect(reporter.progress.mock.calls.map(([update]) => update.samples)).toEqual([2, 4]);
  });

  it('stops on a sink failure without counting the lost record', async () => {
    const channel = new ScriptedChannel();
    const sink = new MemorySink();
    await sink.open('H');
    sink.failOnWrite = 1;
    channel.emit('1', '2', '3');

    const outcome = await runCaptureLoop({ ...baseOptions, channel, sink, controller: new AbortController() });

    expect(outcome.reason).toBe('sink_error');
    expect(outcome.error).toBeInstanceOf(SinkError);
    expect(outcome.samples).toBe(1);
  });
});
