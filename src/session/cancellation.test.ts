import { describe, expect, it } from 'vitest';
import { EventEmitter } from 'node:events';
import { createLineCancellation } from './cancellation.js';

describe('createLineCancellation', () => {
  it('resolves true on the keyword and ignores other input', async () => {
    const input = new EventEmitter();
    const pending = createLineCancellation(input).wait(new AbortController().signal);

    input.emit('line', 'hello');
    input.emit('line', '  Q ');

    await expect(pending).resolves.toBe(true);
    expect(input.listenerCount('line')).toBe(0);
  });

  it('treats end of input as no request', async () => {
    const input = new EventEmitter();
    const pending = createLineCancellation(input).wait(new AbortController().signal);

    input.emit('close');

    await expect(pending).resolves.toBe(false);
  });

  it('detaches when the session signal aborts', async () => {
    const input = new EventEmitter();
    const detach = new AbortController();
    const pending = createLineCancellation(input, 'stop').wait(detach.signal);

    detach.abort();

    await expect(pending).resolves.toBe(false);
    expect(input.listenerCount('line')).toBe(0);
    expect(input.listenerCount('close')).toBe(0);
  });
});
