import {
  generatorConfigSchema,
  type GeneratorConfigInput,
} from '@clinical-synth/shared/schemas/generator.schema.js';
import type { RunConfig } from '../domains/dataset/dataset.types.js';
import type { Env } from './env.js';
import { ConfigurationError } from './errors.js';
import { floorToSecond } from './time.js';

/**
 * Validates a generator config and pins its reference date. Without an
 * explicit reference date the run uses `now`, floored to the second.
 */
export function resolveRunConfig(input: GeneratorConfigInput, now: Date = new Date()): RunConfig {
  const result = generatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid generator configuration', result.error.flatten());
  }

  const { referenceDate, ...rest } = result.data;
  return { ...rest, referenceDate: floorToSecond(referenceDate ?? now) };
}

/** Config defaults taken from GENERATOR_* environment variables. */
export function configFromEnv(env: Env): GeneratorConfigInput {
  const input: GeneratorConfigInput = {};

  if (env.GENERATOR_SEED !== undefined) input.seed = env.GENERATOR_SEED;
  if (env.GENERATOR_REFERENCE_DATE !== undefined) {
    input.referenceDate = env.GENERATOR_REFERENCE_DATE;
  }
  if (env.GENERATOR_PATIENTS !== undefined) input.patientCount = env.GENERATOR_PATIENTS;
  if (env.GENERATOR_PROVIDERS !== undefined) input.providerCount = env.GENERATOR_PROVIDERS;
  if (env.GENERATOR_MEDICATIONS !== undefined) input.medicationCount = env.GENERATOR_MEDICATIONS;
  if (env.GENERATOR_ENCOUNTERS !== undefined) {
    input.encounters = { total: env.GENERATOR_ENCOUNTERS };
  }
  if (env.GENERATOR_ABNORMAL_FRACTION !== undefined) {
    input.abnormalFraction = env.GENERATOR_ABNORMAL_FRACTION;
  }
  if (env.GENERATOR_PARTITIONS !== undefined) {
    input.strategy = { kind: 'partitioned', partitions: env.GENERATOR_PARTITIONS };
  }
  input.executor = env.GENERATOR_EXECUTOR;
  if (env.GENERATOR_PARTITION_TIMEOUT_MS !== undefined) {
    input.partitionTimeoutMs = env.GENERATOR_PARTITION_TIMEOUT_MS;
  }

  return input;
}
