import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { readEnvNumber } from './utils/env.js';

export const DEFAULT_CONFIG_PATH = 'capture.config.json';
export const DEFAULT_HEADER = 'Timestamp,AccelX,AccelY,AccelZ,GyroX,GyroY,GyroZ';

const serialSchema = z
  .object({
    baudRate: z.number().int().positive().default(115_200),
    readTimeoutMs: z.number().int().min(1).default(2_000),
    settleDelayMs: z.number().int().min(0).default(3_000),
    /** Explicit port; skips the discovery heuristic when set. */
    port: z.string().min(1).optional(),
  })
  .default({});

const discoverySchema = z
  .object({
    keywords: z.array(z.string().min(1)).default(['arduino', 'nano', 'usb serial']),
    pathPatterns: z.array(z.string().min(1)).default(['cu.usbmodem', 'ttyACM']),
    marker: z.string().min(1).default('TT'),
    probeAttempts: z.number().int().min(1).max(100).default(10),
    probeIntervalMs: z.number().int().min(1).default(500),
  })
  .default({});

const handshakeSchema = z
  .object({
    startAttempts: z.number().int().min(1).max(100).default(10),
    attemptTimeoutMs: z.number().int().min(1).default(500),
    flushPauseMs: z.number().int().min(0).default(100),
  })
  .default({});

const captureSchema = z
  .object({
    maxDurationMs: z.number().int().min(1).default(120_000),
    pollIntervalMs: z.number().int().min(1).max(5_000).default(100),
    progressEvery: z.number().int().min(1).default(100),
    header: z.string().min(1).default(DEFAULT_HEADER),
  })
  .default({});

const outputSchema = z
  .object({
    directory: z.string().default('.'),
    extension: z.string().regex(/^\.[A-Za-z0-9]+$/).default('.csv'),
  })
  .default({});

const historySchema = z
  .object({
    enabled: z.boolean().default(true),
    path: z.string().default('./sessions.jsonl'),
    maxRows: z.number().int().min(1).max(100_000).default(500),
  })
  .default({});

export const configSchema = z.object({
  serial: serialSchema,
  discovery: discoverySchema,
  handshake: handshakeSchema,
  capture: captureSchema,
  output: outputSchema,
  history: historySchema,
});

export type AppConfig = z.infer<typeof configSchema>;

let cachedConfig: AppConfig | null = null;

async function readConfigFile(configPath: string, required: boolean): Promise<unknown> {
  try {
    const raw = await readFile(configPath, 'utf-8');
    return JSON.parse(raw);
  } catch (error) {
    if (!required && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    throw error;
  }
}

function applyEnvOverrides(config: AppConfig): AppConfig {
  const port = process.env.CAPTURE_PORT?.trim();
  const outputDir = process.env.CAPTURE_OUTPUT_DIR?.trim();
  const maxDurationMs = readEnvNumber('CAPTURE_MAX_DURATION_MS');
  return configSchema.parse({
    ...config,
    serial: { ...config.serial, ...(port ? { port } : {}) },
    output: { ...config.output, ...(outputDir ? { directory: outputDir } : {}) },
    capture: {
      ...config.capture,
      ...(maxDurationMs !== undefined ? { maxDurationMs } : {}),
    },
  });
}

/**
 * Loads and caches the capture configuration. A missing default config file
 * yields the built-in defaults; an explicitly named file must exist.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const explicitPath = configPath ?? process.env.CAPTURE_CONFIG;
  const resolved = path.resolve(explicitPath ?? DEFAULT_CONFIG_PATH);
  const parsed = configSchema.parse(await readConfigFile(resolved, explicitPath !== undefined));
  cachedConfig = applyEnvOverrides(parsed);
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}
