import { describe, it, expect } from 'vitest';
import { configFromEnv, resolveRunConfig } from './config.js';
import type { Env } from './env.js';
import { ConfigurationError } from './errors.js';

const NOW = new Date('2025-06-01T12:00:00.750Z');

function baseEnv(overrides: Partial<Env> = {}): Env {
  return {
    GENERATOR_EXECUTOR: 'threads',
    GENERATOR_OUTPUT_DIR: 'data/raw',
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    ...overrides,
  };
}

describe('resolveRunConfig', () => {
  it('fills defaults and pins the reference date to now', () => {
    const config = resolveRunConfig({}, NOW);
    expect(config.seed).toBe(42);
    expect(config.patientCount).toBe(1000);
    expect(config.strategy).toEqual({ kind: 'sequential' });
    expect(config.executor).toBe('inline');
    expect(config.verify).toBe(true);
    expect(config.encounters.perPatient).toEqual({ min: 1, max: 5 });
    expect(config.encounters.historyDays).toBe(730);
    expect(config.referenceDate.toISOString()).toBe('2025-06-01T12:00:00.000Z');
  });

  it('accepts an ISO string reference date and floors it', () => {
    const config = resolveRunConfig({ referenceDate: '2024-12-31T23:59:59.999Z' }, NOW);
    expect(config.referenceDate.toISOString()).toBe('2024-12-31T23:59:59.000Z');
  });

  it('accepts a Date reference date', () => {
    const config = resolveRunConfig({ referenceDate: new Date('2024-01-01T00:00:00Z') }, NOW);
    expect(config.referenceDate.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('rejects an unparseable reference date', () => {
    expect(() => resolveRunConfig({ referenceDate: 'not-a-date' }, NOW)).toThrow(ConfigurationError);
  });

  it('rejects a non-positive patient count', () => {
    try {
      resolveRunConfig({ patientCount: 0 }, NOW);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ code: 'CONFIGURATION_ERROR', message: 'Invalid generator configuration' });
    }
  });

  it('accepts seeds up to 2^32 - 1 and rejects larger ones', () => {
    expect(resolveRunConfig({ seed: 2 ** 32 - 1 }, NOW).seed).toBe(4294967295);
    expect(() => resolveRunConfig({ seed: 2 ** 32 }, NOW)).toThrow(ConfigurationError);
    expect(() => resolveRunConfig({ seed: 2 ** 32 + 1 }, NOW)).toThrow(ConfigurationError);
  });

  it('rejects fractions outside [0, 1]', () => {
    expect(() => resolveRunConfig({ abnormalFraction: 1.5 }, NOW)).toThrow(ConfigurationError);
    expect(() => resolveRunConfig({ missedDoseFraction: -0.1 }, NOW)).toThrow(ConfigurationError);
  });

  it('rejects an inverted per-patient range', () => {
    expect(() =>
      resolveRunConfig({ encounters: { perPatient: { min: 4, max: 2 } } }, NOW),
    ).toThrow(ConfigurationError);
  });

  it('rejects encounter type weights that are all zero', () => {
    expect(() =>
      resolveRunConfig(
        {
          encounters: {
            typeWeights: { Inpatient: 0, Outpatient: 0, Emergency: 0, Observation: 0 },
          },
        },
        NOW,
      ),
    ).toThrow(ConfigurationError);
  });

  it('rejects a partitioned strategy with zero partitions', () => {
    expect(() =>
      resolveRunConfig({ strategy: { kind: 'partitioned', partitions: 0 } }, NOW),
    ).toThrow(ConfigurationError);
  });
});

describe('configFromEnv', () => {
  it('maps only the variables that are set', () => {
    expect(configFromEnv(baseEnv())).toEqual({ executor: 'threads' });
  });

  it('maps generator variables onto config fields', () => {
    const input = configFromEnv(
      baseEnv({
        GENERATOR_SEED: 7,
        GENERATOR_REFERENCE_DATE: '2025-01-01T00:00:00Z',
        GENERATOR_PATIENTS: 50,
        GENERATOR_ENCOUNTERS: 80,
        GENERATOR_PARTITIONS: 4,
        GENERATOR_EXECUTOR: 'inline',
        GENERATOR_PARTITION_TIMEOUT_MS: 5000,
      }),
    );
    expect(input).toEqual({
      seed: 7,
      referenceDate: '2025-01-01T00:00:00Z',
      patientCount: 50,
      encounters: { total: 80 },
      strategy: { kind: 'partitioned', partitions: 4 },
      executor: 'inline',
      partitionTimeoutMs: 5000,
    });
  });
});
