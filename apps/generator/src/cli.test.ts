import { describe, it, expect } from 'vitest';
import { parseCli, USAGE } from './cli.js';
import { ConfigurationError } from './lib/errors.js';

describe('parseCli', () => {
  it('takes the command from the first positional', () => {
    expect(parseCli(['base'])).toEqual({
      command: 'base',
      input: {},
      load: false,
      help: false,
    });
  });

  it('maps flags onto the config input', () => {
    const invocation = parseCli([
      'all',
      '--seed', '7',
      '--reference-date', '2025-01-01',
      '--patients', '50',
      '--providers', '10',
      '--medications', '25',
      '--abnormal-fraction', '0.2',
      '--partitions', '4',
      '--executor', 'threads',
      '--timeout-ms', '60000',
      '--output-dir', '/tmp/out',
      '--load',
      '--no-verify',
    ]);

    expect(invocation).toEqual({
      command: 'all',
      input: {
        seed: 7,
        referenceDate: '2025-01-01',
        patientCount: 50,
        providerCount: 10,
        medicationCount: 25,
        abnormalFraction: 0.2,
        strategy: { kind: 'partitioned', partitions: 4 },
        executor: 'threads',
        partitionTimeoutMs: 60000,
        verify: false,
      },
      outputDir: '/tmp/out',
      load: true,
      help: false,
    });
  });

  it('lets flags override environment defaults', () => {
    const invocation = parseCli(['encounters', '--seed', '9', '--encounters', '120'], {
      seed: 1,
      patientCount: 80,
      encounters: { perPatient: { min: 1, max: 3 } },
    });

    expect(invocation.input).toEqual({
      seed: 9,
      patientCount: 80,
      encounters: { perPatient: { min: 1, max: 3 }, total: 120 },
    });
  });

  it('returns help before looking at the command', () => {
    const invocation = parseCli(['-h'], { seed: 3 });
    expect(invocation.help).toBe(true);
    expect(invocation.input).toEqual({ seed: 3 });
  });

  it('rejects an unknown command with the usage text', () => {
    expect(() => parseCli(['deploy'])).toThrow(ConfigurationError);
    expect(() => parseCli(['deploy'])).toThrow(`Unknown command "deploy"\n\n${USAGE}`);
    expect(() => parseCli([])).toThrow('Unknown command ""');
  });

  it('rejects a flag that is not a number', () => {
    expect(() => parseCli(['base', '--seed', 'abc'])).toThrow('--seed expects a number, got "abc"');
    expect(() => parseCli(['base', '--patients', ' '])).toThrow(
      '--patients expects a number, got " "',
    );
  });

  it('rejects an unknown executor', () => {
    expect(() => parseCli(['all', '--executor', 'fork'])).toThrow(
      '--executor must be inline or threads, got "fork"',
    );
  });

  it('reports unknown options as configuration errors', () => {
    expect(() => parseCli(['base', '--bogus'])).toThrow(ConfigurationError);
  });
});
