import type { AppConfig } from '../config.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { isProbeResponse, normalizeLine } from '../protocol/tokens.js';
import { pause } from '../utils/abort.js';
import type { EndpointInfo, LineChannel, StatusReporter } from '../types.js';

export interface DiscoveryOptions {
  keywords: readonly string[];
  pathPatterns: readonly string[];
  marker: string;
  probeAttempts: number;
  probeIntervalMs: number;
  settleDelayMs: number;
  /** When set, only this endpoint is tried and the heuristic is skipped. */
  port?: string;
}

export interface DiscoveryDeps {
  listEndpoints: () => Promise<EndpointInfo[]>;
  openChannel: (path: string) => Promise<LineChannel>;
  reporter?: StatusReporter;
}

export function discoveryOptionsFromConfig(config: AppConfig): DiscoveryOptions {
  return {
    ...config.discovery,
    settleDelayMs: config.serial.settleDelayMs,
    port: config.serial.port,
  };
}

export function isCandidate(endpoint: EndpointInfo, options: Pick<DiscoveryOptions, 'keywords' | 'pathPatterns'>) {
  const description = endpoint.description.toLowerCase();
  if (options.keywords.some((keyword) => description.includes(keyword.toLowerCase()))) {
    return true;
  }
  return options.pathPatterns.some((pattern) => endpoint.path.includes(pattern));
}

export function selectCandidates(endpoints: EndpointInfo[], options: DiscoveryOptions): EndpointInfo[] {
  if (options.port) {
    const listed = endpoints.find((endpoint) => endpoint.path === options.port);
    return [listed ?? { path: options.port, description: 'configured port' }];
  }
  return endpoints.filter((endpoint) => isCandidate(endpoint, options));
}

export type ProbeResult = { accepted: true; response: string } | { accepted: false; responses: number };

/**
 * Liveness probe: let the device boot, drop whatever it printed meanwhile,
 * send TEST and poll for a control token or the firmware marker.
 */
export async function probeChannel(
  channel: LineChannel,
  options: DiscoveryOptions,
  reporter?: StatusReporter
): Promise<ProbeResult> {
  await pause(options.settleDelayMs);
  await channel.discardInput();
  await channel.writeLine('TEST');

  let responses = 0;
  for (let attempt = 1; attempt <= options.probeAttempts; attempt += 1) {
    const raw = await channel.readLine({ timeoutMs: options.probeIntervalMs });
    if (raw === null) continue;
    const line = normalizeLine(raw);
    responses += 1;
    reporter?.status(`Device response: '${line}'`);
    logger.debug({ event: 'probe_response', path: channel.path, attempt, line });
    if (isProbeResponse(line, options.marker)) {
      return { accepted: true, response: line };
    }
  }
  return { accepted: false, responses };
}

async function closeQuietly(channel: LineChannel): Promise<void> {
  try {
    await channel.close();
  } catch (error) {
    logger.warn({ event: 'probe_close_failed', path: channel.path, message: describeError(error) });
  }
}

/** Returns the first candidate that answers the probe, or null when none does. */
export async function discoverDevice(deps: DiscoveryDeps, options: DiscoveryOptions): Promise<LineChannel | null> {
  const { reporter } = deps;
  reporter?.status('Scanning for device...');

  const endpoints = await deps.listEndpoints();
  const candidates = selectCandidates(endpoints, options);
  logger.info({
    event: 'discovery_candidates',
    endpoints: endpoints.length,
    candidates: candidates.map((candidate) => candidate.path),
  });

  if (candidates.length === 0) {
    reporter?.status('No device found. Please check the connection.');
    return null;
  }

  for (const candidate of candidates) {
    reporter?.status(`Trying ${candidate.path}...`);
    let channel: LineChannel;
    try {
      channel = await deps.openChannel(candidate.path);
    } catch (error) {
      reporter?.status(`Failed to connect to ${candidate.path}: ${describeError(error)}`);
      logger.warn({ event: 'discovery_open_failed', path: candidate.path, message: describeError(error) });
      continue;
    }

    try {
      const probe = await probeChannel(channel, options, reporter);
      if (probe.accepted) {
        reporter?.status(`Device connected on ${candidate.path}`);
        logger.info({ event: 'discovery_accepted', path: candidate.path, response: probe.response });
        return channel;
      }
      if (probe.responses === 0) {
        reporter?.status(`No response from ${candidate.path}`);
      }
      logger.info({ event: 'discovery_rejected', path: candidate.path, responses: probe.responses });
    } catch (error) {
      reporter?.status(`Failed to probe ${candidate.path}: ${describeError(error)}`);
      logger.warn({ event: 'discovery_probe_failed', path: candidate.path, message: describeError(error) });
    }
    await closeQuietly(channel);
  }

  reporter?.status('No device found with the expected firmware.');
  return null;
}
