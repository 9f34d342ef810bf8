import { describe, expect, it } from 'vitest';
import { computeStats, formatProgress, formatStats } from './stats.js';

describe('computeStats', () => {
  it('derives the effective rate from count and elapsed time', () => {
    expect(computeStats(6000, 120_000)).toEqual({ samples: 6000, elapsedSec: 120, rateHz: 50 });
  });

  it('reports a zero rate instead of dividing by zero', () => {
    expect(computeStats(0, 0)).toEqual({ samples: 0, elapsedSec: 0, rateHz: 0 });
    expect(computeStats(5, 0).rateHz).toBe(0);
  });

  it('clamps a negative elapsed time from a clock step', () => {
    expect(computeStats(3, -10)).toEqual({ samples: 3, elapsedSec: 0, rateHz: 0 });
  });
});

describe('formatting', () => {
  it('renders the progress line', () => {
    expect(formatProgress({ samples: 1200, elapsedSec: 24.04, rateHz: 49.916 })).toBe(
      'Samples: 1,200 | Time: 24.0s | Rate: 49.9 Hz'
    );
  });

  it('renders the end-of-session summary', () => {
    expect(formatStats({ samples: 6000, elapsedSec: 120, rateHz: 50 })).toEqual([
      'Samples collected: 6000',
      'Duration: 120.0 seconds',
      'Average sample rate: 50.0 Hz',
    ]);
  });
});
