import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import { ChannelError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { EndpointInfo, LineChannel, ReadLineOptions } from '../types.js';
import { LineQueue } from './lineQueue.js';

/** The slice of a serialport stream the channel drives; `SerialPortMock` satisfies it too. */
export interface SerialPortLike {
  readonly path: string;
  readonly isOpen: boolean;
  write(data: string, callback?: (error: Error | null | undefined) => void): boolean;
  drain(callback?: (error: Error | null) => void): void;
  flush(callback?: (error: Error | null) => void): void;
  close(callback?: (error: Error | null) => void): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export interface SerialChannelOptions {
  readTimeoutMs: number;
}

export class SerialChannel implements LineChannel {
  readonly #port: SerialPortLike;
  readonly #queue = new LineQueue();
  readonly #readTimeoutMs: number;
  #closed = false;

  constructor(port: SerialPortLike, options: SerialChannelOptions) {
    this.#port = port;
    this.#readTimeoutMs = options.readTimeoutMs;

    const parser = port.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }));
    parser.on('data', (chunk: string | Buffer) => {
      this.#queue.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    port.on('error', (error) => {
      logger.warn({ event: 'serial_port_error', path: port.path, message: error.message });
      this.#queue.fail(new ChannelError(`serial port error on ${port.path}: ${error.message}`, { cause: error }));
    });
    port.on('close', () => {
      this.#queue.fail(new ChannelError(`serial port ${port.path} closed`));
    });
  }

  get path(): string {
    return this.#port.path;
  }

  get isOpen(): boolean {
    return !this.#closed && this.#port.isOpen;
  }

  async writeLine(text: string): Promise<void> {
    if (!this.isOpen) {
      throw new ChannelError(`cannot write "${text}" to closed port ${this.path}`);
    }
    await new Promise<void>((resolve, reject) => {
      const fail = (error: Error) =>
        reject(new ChannelError(`write to ${this.path} failed: ${error.message}`, { cause: error }));
      this.#port.write(`${text}\n`, (error) => {
        if (error) fail(error);
      });
      this.#port.drain((error) => (error ? fail(error) : resolve()));
    });
    logger.debug({ event: 'serial_line_sent', path: this.path, line: text });
  }

  readLine(options: ReadLineOptions = {}): Promise<string | null> {
    return this.#queue.next({
      timeoutMs: options.timeoutMs ?? this.#readTimeoutMs,
      signal: options.signal,
    });
  }

  async discardInput(): Promise<void> {
    const dropped = this.#queue.clear();
    if (dropped > 0) {
      logger.debug({ event: 'serial_input_discarded', path: this.path, lines: dropped });
    }
    if (!this.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.#port.flush((error) =>
        error ? reject(new ChannelError(`flush of ${this.path} failed: ${error.message}`, { cause: error })) : resolve()
      );
    });
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#queue.fail(new ChannelError(`channel ${this.path} closed`));
    if (!this.#port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.#port.close((error) =>
        error ? reject(new ChannelError(`close of ${this.path} failed: ${error.message}`, { cause: error })) : resolve()
      );
    });
    logger.debug({ event: 'serial_port_closed', path: this.path });
  }
}

export async function openSerialChannel(
  path: string,
  options: SerialChannelOptions & { baudRate: number }
): Promise<SerialChannel> {
  const port = new SerialPort({ path, baudRate: options.baudRate, autoOpen: false });
  await new Promise<void>((resolve, reject) => {
    port.open((error) =>
      error ? reject(new ChannelError(`failed to open ${path}: ${describeError(error)}`, { cause: error })) : resolve()
    );
  });
  return new SerialChannel(port, { readTimeoutMs: options.readTimeoutMs });
}

export async function listSerialEndpoints(): Promise<EndpointInfo[]> {
  const ports = await SerialPort.list();
  return ports.map((port) => ({
    path: port.path,
    description: [port.manufacturer, port.pnpId]
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join(' '),
  }));
}
