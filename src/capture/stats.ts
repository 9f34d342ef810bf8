import type { CaptureStats, ProgressUpdate } from '../types.js';

export function computeRate(samples: number, elapsedSec: number): number {
  return elapsedSec > 0 ? samples / elapsedSec : 0;
}

export function computeStats(samples: number, elapsedMs: number): CaptureStats {
  const elapsedSec = Math.max(0, elapsedMs) / 1000;
  return { samples, elapsedSec, rateHz: computeRate(samples, elapsedSec) };
}

export function formatProgress(update: ProgressUpdate): string {
  return `Samples: ${update.samples.toLocaleString('en-US')} | Time: ${update.elapsedSec.toFixed(1)}s | Rate: ${update.rateHz.toFixed(1)} Hz`;
}

export function formatStats(stats: CaptureStats): string[] {
  return [
    `Samples collected: ${stats.samples}`,
    `Duration: ${stats.elapsedSec.toFixed(1)} seconds`,
    `Average sample rate: ${stats.rateHz.toFixed(1)} Hz`,
  ];
}
