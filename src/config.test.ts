import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_HEADER, defaultConfig, loadConfig, reloadConfig } from './config.js';

const ENV_KEYS = ['CAPTURE_CONFIG', 'CAPTURE_PORT', 'CAPTURE_OUTPUT_DIR', 'CAPTURE_MAX_DURATION_MS'] as const;

describe('loadConfig', () => {
  let tempDir: string;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(async () => {
    reloadConfig();
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    tempDir = await mkdtemp(path.join(tmpdir(), 'capture-config-'));
  });

  afterEach(async () => {
    reloadConfig();
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    await rm(tempDir, { recursive: true, force: true });
  });

  const writeConfig = async (payload: unknown) => {
    const configPath = path.join(tempDir, 'capture.config.json');
    await writeFile(configPath, JSON.stringify(payload), 'utf-8');
    return configPath;
  };

  it('fills every section with defaults', () => {
    const config = defaultConfig();
    expect(config.serial).toEqual({ baudRate: 115_200, readTimeoutMs: 2_000, settleDelayMs: 3_000 });
    expect(config.handshake).toEqual({ startAttempts: 10, attemptTimeoutMs: 500, flushPauseMs: 100 });
    expect(config.capture).toEqual({
      maxDurationMs: 120_000,
      pollIntervalMs: 100,
      progressEvery: 100,
      header: DEFAULT_HEADER,
    });
    expect(config.discovery.marker).toBe('TT');
    expect(config.output).toEqual({ directory: '.', extension: '.csv' });
  });

  it('merges a partial file over the defaults', async () => {
    const configPath = await writeConfig({ serial: { baudRate: 9600 }, capture: { progressEvery: 50 } });

    const config = await loadConfig(configPath);

    expect(config.serial.baudRate).toBe(9600);
    expect(config.serial.readTimeoutMs).toBe(2_000);
    expect(config.capture.progressEvery).toBe(50);
    expect(config.capture.maxDurationMs).toBe(120_000);
  });

  it('applies environment overrides on top of the file', async () => {
    const configPath = await writeConfig({ serial: { port: '/dev/ttyACM0' } });
    process.env.CAPTURE_CONFIG = configPath;
    process.env.CAPTURE_PORT = '/dev/ttyUSB1';
    process.env.CAPTURE_OUTPUT_DIR = '/data/runs';
    process.env.CAPTURE_MAX_DURATION_MS = '30000';

    const config = await loadConfig();

    expect(config.serial.port).toBe('/dev/ttyUSB1');
    expect(config.output.directory).toBe('/data/runs');
    expect(config.capture.maxDurationMs).toBe(30_000);
  });

  it('rejects a non-numeric duration override', async () => {
    const configPath = await writeConfig({});
    process.env.CAPTURE_MAX_DURATION_MS = 'two minutes';

    await expect(loadConfig(configPath)).rejects.toThrow('CAPTURE_MAX_DURATION_MS must be a number, got "two minutes"');
  });

  it('requires an explicitly named file to exist', async () => {
    await expect(loadConfig(path.join(tempDir, 'missing.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects values outside their range', async () => {
    const configPath = await writeConfig({ handshake: { startAttempts: 0 } });
    await expect(loadConfig(configPath)).rejects.toThrow();
  });

  it('caches until reloaded', async () => {
    const configPath = await writeConfig({ serial: { baudRate: 9600 } });
    const first = await loadConfig(configPath);
    await writeConfig({ serial: { baudRate: 57_600 } });

    expect(await loadConfig(configPath)).toBe(first);
    reloadConfig();
    expect((await loadConfig(configPath)).serial.baudRate).toBe(57_600);
  });
});
