import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { EXECUTOR_KINDS, MAX_SEED } from '@clinical-synth/shared/schemas/generator.schema.js';
import { ConfigurationError } from './errors.js';

// Load .env from monorepo root
dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../../.env'),
});

const envSchema = z.object({
  GENERATOR_SEED: z.coerce.number().int().min(0).max(MAX_SEED).optional(),
  GENERATOR_REFERENCE_DATE: z.string().min(1).optional(),
  GENERATOR_PATIENTS: z.coerce.number().int().min(1).optional(),
  GENERATOR_PROVIDERS: z.coerce.number().int().min(1).optional(),
  GENERATOR_MEDICATIONS: z.coerce.number().int().min(1).optional(),
  GENERATOR_ENCOUNTERS: z.coerce.number().int().min(0).optional(),
  GENERATOR_ABNORMAL_FRACTION: z.coerce.number().min(0).max(1).optional(),
  GENERATOR_PARTITIONS: z.coerce.number().int().min(1).optional(),
  GENERATOR_EXECUTOR: z.enum(EXECUTOR_KINDS).default('threads'),
  GENERATOR_PARTITION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  GENERATOR_OUTPUT_DIR: z.string().min(1).default('data/raw'),
  DATABASE_URL: z.string().min(1).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      throw new ConfigurationError(
        'Invalid environment variables',
        result.error.flatten().fieldErrors,
      );
    }
    _env = result.data;
  }
  return _env;
}
