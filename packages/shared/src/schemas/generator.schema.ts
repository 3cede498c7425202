// ============================================================================
// Generator Configuration — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  EncounterType,
  DEFAULT_ENCOUNTER_TYPE_WEIGHTS,
  DEFAULT_LENGTH_OF_STAY_HOURS,
  DEFAULT_HISTORY_DAYS,
  DEFAULT_ENCOUNTERS_PER_PATIENT,
  DEFAULT_ACTIVE_FRACTION,
  DEFAULT_CANCELLED_FRACTION,
  DEFAULT_ENCOUNTER_NUMBER_DIGITS,
  DEFAULT_MAX_IDENTIFIER_RETRIES,
} from '../constants/encounter.constants.js';
import {
  DEFAULT_ABNORMAL_FRACTION,
  DEFAULT_MISSED_DOSE_FRACTION,
} from '../constants/clinical.constants.js';

// --- Building blocks ---

const fraction = z.number().min(0).max(1);

/** Seeds are unsigned 32-bit integers; stream seeds are derived in that space. */
export const MAX_SEED = 0xffff_ffff;

const countRange = z
  .object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
  })
  .refine((r) => r.min <= r.max, {
    message: 'min must not exceed max',
  });

const hoursRange = (defaults: { min: number; max: number }) =>
  z
    .object({
      min: z.number().positive(),
      max: z.number().positive(),
    })
    .refine((r) => r.min <= r.max, { message: 'min must not exceed max' })
    .default(defaults);

const weight = z.number().min(0);

// ============================================================================
// Execution Strategy
// ============================================================================

export const EXECUTOR_KINDS = ['inline', 'threads'] as const;
export type ExecutorKind = (typeof EXECUTOR_KINDS)[number];

export const strategySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sequential') }),
  z.object({
    kind: z.literal('partitioned'),
    partitions: z.number().int().min(1),
  }),
]);

export type Strategy = z.infer<typeof strategySchema>;

// ============================================================================
// Encounter Scheduling
// ============================================================================

export const encounterConfigSchema = z
  .object({
    total: z.number().int().min(0).optional(),
    perPatient: countRange.default({ ...DEFAULT_ENCOUNTERS_PER_PATIENT }),
    historyDays: z.number().int().positive().default(DEFAULT_HISTORY_DAYS),
    typeWeights: z
      .object({
        [EncounterType.INPATIENT]: weight.default(DEFAULT_ENCOUNTER_TYPE_WEIGHTS.Inpatient),
        [EncounterType.OUTPATIENT]: weight.default(DEFAULT_ENCOUNTER_TYPE_WEIGHTS.Outpatient),
        [EncounterType.EMERGENCY]: weight.default(DEFAULT_ENCOUNTER_TYPE_WEIGHTS.Emergency),
        [EncounterType.OBSERVATION]: weight.default(DEFAULT_ENCOUNTER_TYPE_WEIGHTS.Observation),
      })
      .refine((w) => Object.values(w).some((value) => value > 0), {
        message: 'at least one encounter type weight must be positive',
      })
      .default({}),
    lengthOfStayHours: z
      .object({
        [EncounterType.INPATIENT]: hoursRange(DEFAULT_LENGTH_OF_STAY_HOURS.Inpatient),
        [EncounterType.OUTPATIENT]: hoursRange(DEFAULT_LENGTH_OF_STAY_HOURS.Outpatient),
        [EncounterType.EMERGENCY]: hoursRange(DEFAULT_LENGTH_OF_STAY_HOURS.Emergency),
        [EncounterType.OBSERVATION]: hoursRange(DEFAULT_LENGTH_OF_STAY_HOURS.Observation),
      })
      .default({}),
    activeFraction: fraction.default(DEFAULT_ACTIVE_FRACTION),
    cancelledFraction: fraction.default(DEFAULT_CANCELLED_FRACTION),
  })
  .default({});

export type EncounterConfig = z.infer<typeof encounterConfigSchema>;

// ============================================================================
// Generator Configuration
// ============================================================================

export const generatorConfigSchema = z.object({
  seed: z.number().int().min(0).max(MAX_SEED).default(42),
  /** Run's notion of "now"; resolved to wall-clock time when absent. */
  referenceDate: z.union([z.date(), z.string().min(1)]).pipe(z.coerce.date()).optional(),
  patientCount: z.number().int().min(1).default(1000),
  providerCount: z.number().int().min(1).default(200),
  medicationCount: z.number().int().min(1).default(100),
  encounters: encounterConfigSchema,
  abnormalFraction: fraction.default(DEFAULT_ABNORMAL_FRACTION),
  missedDoseFraction: fraction.default(DEFAULT_MISSED_DOSE_FRACTION),
  pediatricFraction: fraction.default(0.1),
  allergyPrevalence: fraction.default(0.3),
  encounterNumberDigits: z
    .number()
    .int()
    .min(1)
    .max(12)
    .default(DEFAULT_ENCOUNTER_NUMBER_DIGITS),
  maxIdentifierRetries: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_IDENTIFIER_RETRIES),
  strategy: strategySchema.default({ kind: 'sequential' }),
  executor: z.enum(EXECUTOR_KINDS).default('inline'),
  partitionTimeoutMs: z.number().int().positive().optional(),
  verify: z.boolean().default(true),
});

export type GeneratorConfigInput = z.input<typeof generatorConfigSchema>;
export type GeneratorConfig = z.output<typeof generatorConfigSchema>;
