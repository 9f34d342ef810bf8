#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { createInterface } from 'node:readline/promises';
import { Command } from 'commander';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { describeError } from './errors.js';
import { CaptureMenu } from './frontend/menu.js';
import { createReadlinePrompter } from './frontend/prompt.js';
import { ConsoleReporter } from './frontend/reporter.js';
import { logger } from './logger.js';
import { createLineCancellation } from './session/cancellation.js';
import { CaptureSession } from './session/sessionController.js';
import { SessionHistory, formatHistoryEntry } from './storage/sessionHistory.js';
import { discoverDevice, discoveryOptionsFromConfig, isCandidate } from './transport/discovery.js';
import { listSerialEndpoints, openSerialChannel } from './transport/serialChannel.js';
import { loadEnvironment } from './utils/env.js';

interface GlobalOptions {
  config?: string;
  port?: string;
}

async function resolveConfig(options: GlobalOptions): Promise<AppConfig> {
  const config = await loadConfig(options.config);
  if (!options.port) return config;
  return { ...config, serial: { ...config.serial, port: options.port } };
}

function openHistory(config: AppConfig): SessionHistory | undefined {
  if (!config.history.enabled) return undefined;
  return new SessionHistory(path.resolve(config.history.path), config.history.maxRows);
}

async function recordCommand(options: GlobalOptions): Promise<number> {
  const config = await resolveConfig(options);
  const reporter = new ConsoleReporter();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const prompt = createReadlinePrompter(rl);
  const cancellation = createLineCancellation(rl);
  const history = openHistory(config);
  await history?.init();

  const discovery = discoveryOptionsFromConfig(config);
  const serialOptions = { baudRate: config.serial.baudRate, readTimeoutMs: config.serial.readTimeoutMs };

  const menu = new CaptureMenu({
    prompt,
    reporter,
    history,
    sinkTarget: { directory: config.output.directory, extension: config.output.extension },
    discover: () =>
      discoverDevice(
        {
          listEndpoints: listSerialEndpoints,
          openChannel: (devicePath) => openSerialChannel(devicePath, serialOptions),
          reporter,
        },
        discovery
      ),
    createSession: (channel, sinkTarget) =>
      new CaptureSession({ channel, sinkTarget, config, cancellation, reporter }),
  });

  const onInterrupt = () => {
    if (menu.activeSession) {
      menu.interrupt().catch((error: unknown) => {
        logger.error({ event: 'interrupt_failed', message: describeError(error) });
      });
      return;
    }
    reporter.status('Program interrupted by user');
    rl.close();
  };
  // readline takes Ctrl+C on a TTY; the process handler covers piped input
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);

  try {
    return await menu.run();
  } finally {
    process.off('SIGINT', onInterrupt);
    rl.close();
  }
}

async function portsCommand(options: GlobalOptions): Promise<number> {
  const config = await resolveConfig(options);
  const reporter = new ConsoleReporter();
  const endpoints = await listSerialEndpoints();
  if (endpoints.length === 0) {
    reporter.status('No serial ports found.');
    return 0;
  }
  for (const endpoint of endpoints) {
    const verdict = isCandidate(endpoint, config.discovery) ? 'candidate' : '-';
    reporter.status(`${endpoint.path}\t${verdict}\t${endpoint.description}`);
  }
  return 0;
}

async function historyCommand(options: GlobalOptions & { limit: string }): Promise<number> {
  const config = await resolveConfig(options);
  const reporter = new ConsoleReporter();
  const limit = Number.parseInt(options.limit, 10);
  if (!Number.isFinite(limit) || limit < 0) {
    reporter.status(`Invalid --limit: ${options.limit}`);
    return 1;
  }
  const history = new SessionHistory(path.resolve(config.history.path), config.history.maxRows);
  const entries = await history.readRecent(limit);
  if (entries.length === 0) {
    reporter.status('No sessions recorded yet.');
    return 0;
  }
  for (const entry of entries) {
    reporter.status(formatHistoryEntry(entry));
  }
  return 0;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('sensor-capture')
    .description('Record bounded capture sessions from a serial sensor device')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to capture.config.json')
    .option('-p, --port <path>', 'Serial port to use instead of discovery');

  program
    .command('record', { isDefault: true })
    .description('Discover the device and run the interactive recording menu')
    .action(async () => {
      process.exitCode = await recordCommand(program.opts<GlobalOptions>());
    });

  program
    .command('ports')
    .description('List serial ports and whether discovery would try them')
    .action(async () => {
      process.exitCode = await portsCommand(program.opts<GlobalOptions>());
    });

  program
    .command('history')
    .description('Show recently recorded sessions')
    .option('-n, --limit <count>', 'Number of sessions to show', '10')
    .action(async (commandOptions: { limit: string }) => {
      process.exitCode = await historyCommand({ ...program.opts<GlobalOptions>(), ...commandOptions });
    });

  return program;
}

if (process.env.NODE_ENV !== 'test') {
  loadEnvironment();
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error({ event: 'cli_failed', message: describeError(error) });
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = 1;
    });
}
