import { describe, expect, it } from 'vitest';
import { ConsoleReporter } from './reporter.js';

describe('ConsoleReporter', () => {
  it('overwrites the progress line and ends it before the next status line', () => {
    const chunks: string[] = [];
    const reporter = new ConsoleReporter({ write: (chunk: string) => chunks.push(chunk) });

    reporter.status('Recording started - /data/run.csv');
    reporter.progress({ samples: 100, elapsedSec: 2, rateHz: 50 });
    reporter.progress({ samples: 1200, elapsedSec: 24, rateHz: 50 });
    reporter.status('Recording completed!');

    expect(chunks.join('')).toBe(
      'Recording started - /data/run.csv\n' +
        '\rSamples: 100 | Time: 2.0s | Rate: 50.0 Hz' +
        '\rSamples: 1,200 | Time: 24.0s | Rate: 50.0 Hz' +
        '\nRecording completed!\n'
    );
  });
});
