import { describe, it, expect } from 'vitest';
import { CliUsageError, parseReportFlags, parseRunFlags } from '../cli.js';

const argv = (...args: string[]) => ['node', 'scripts/run_pipeline.ts', ...args];

/* ============= parseRunFlags ============= */

describe('parseRunFlags', () => {
  it('defaults to running both sources', () => {
    expect(parseRunFlags(argv())).toEqual({ skipProfiles: false, skipTranscripts: false });
  });

  it('reads every flag', () => {
    expect(parseRunFlags(argv(
      '--profiles=data/p',
      '--transcripts=data/t',
      '--skip-profiles',
      '--chamber=s',
      '--metrics-out=.reports/metrics.prom',
    ))).toEqual({
      profiles: 'data/p',
      transcripts: 'data/t',
      skipProfiles: true,
      skipTranscripts: false,
      chamber: 'S',
      metricsOut: '.reports/metrics.prom',
    });
  });

  it('keeps "=" inside a value', () => {
    expect(parseRunFlags(argv('--profiles=a=b')).profiles).toBe('a=b');
  });

  it('rejects an unknown chamber', () => {
    expect(() => parseRunFlags(argv('--chamber=X'))).toThrow('--chamber must be C or S, got "X"');
  });

  it('rejects unknown arguments', () => {
    expect(() => parseRunFlags(argv('--fast'))).toThrow(CliUsageError);
  });
});

/* ============= parseReportFlags ============= */

describe('parseReportFlags', () => {
  it('reads --out', () => {
    expect(parseReportFlags(argv('--out=.reports/unmatched.json'))).toEqual({ out: '.reports/unmatched.json' });
  });

  it('accepts no arguments', () => {
    expect(parseReportFlags(argv())).toEqual({});
  });
});
