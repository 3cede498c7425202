// ============================================================================
// Parallel Orchestrator — planning, execution, merge
// ============================================================================

import type { ExecutorKind } from '@clinical-synth/shared/schemas/generator.schema.js';
import { ConfigurationError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { RandomStream, StreamSalt, deriveSeed } from '../../lib/random.js';
import type {
  Dataset,
  PatientRecord,
  ReferenceData,
  RunConfig,
} from '../dataset/dataset.types.js';
import { allocateEncounters } from '../encounter/encounter.allocation.js';
import { suffixRangeFor } from '../encounter/encounter.numbers.js';
import type { PartitionExecutor } from './executors/executor.types.js';
import { createInlineExecutor } from './executors/inline.executor.js';
import { createThreadExecutor } from './executors/thread.executor.js';
import { mergePartitions } from './merge.js';
import type { PartitionTask } from './partition.runner.js';

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export interface PatientSlice {
  /** Inclusive start index into the patient list. */
  start: number;
  /** Exclusive end index. */
  end: number;
}

/**
 * Splits `patientCount` patients into `partitions` contiguous slices whose
 * sizes differ by at most one; earlier slices take the remainder.
 */
export function planPartitions(patientCount: number, partitions: number): PatientSlice[] {
  if (partitions > patientCount) {
    throw new ConfigurationError(
      `Cannot split ${patientCount} patients into ${partitions} partitions`,
      { patientCount, partitions },
    );
  }

  const base = Math.floor(patientCount / partitions);
  const remainder = patientCount % partitions;
  const slices: PatientSlice[] = [];
  let start = 0;
  for (let i = 0; i < partitions; i++) {
    const size = base + (i < remainder ? 1 : 0);
    slices.push({ start, end: start + size });
    start += size;
  }
  return slices;
}

export function partitionCountFor(config: Pick<RunConfig, 'strategy'>): number {
  return config.strategy.kind === 'partitioned' ? config.strategy.partitions : 1;
}

export function buildPartitionTasks(
  config: RunConfig,
  reference: ReferenceData,
  patients: readonly PatientRecord[],
  encounterCounts: readonly number[],
): PartitionTask[] {
  const partitionCount = partitionCountFor(config);

  return planPartitions(patients.length, partitionCount).map((slice, index) => ({
    index,
    seed: deriveSeed(config.seed, StreamSalt.PARTITION, index),
    config,
    reference,
    patients: patients.slice(slice.start, slice.end),
    encounterCounts: encounterCounts.slice(slice.start, slice.end),
    suffixRange: suffixRangeFor(config.encounterNumberDigits, index, partitionCount),
  }));
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
  logger: Logger;
  executors?: Partial<Record<ExecutorKind, PartitionExecutor>>;
}

export interface OrchestratorResult {
  dataset: Dataset;
  partitions: number;
  executor: ExecutorKind;
}

function resolveExecutor(kind: ExecutorKind, deps: OrchestratorDeps): PartitionExecutor {
  const injected = deps.executors?.[kind];
  if (injected) return injected;
  return kind === 'threads' ? createThreadExecutor() : createInlineExecutor();
}

/**
 * Generates encounters and every clinical event for `patients`. Allocation
 * runs once on the run's main stream; the per-patient work runs in
 * partitions. The sequential strategy is a single partition on the inline
 * executor, so it shares every code path with the partitioned one.
 */
export async function generateEncounterData(
  config: RunConfig,
  reference: ReferenceData,
  patients: readonly PatientRecord[],
  deps: OrchestratorDeps,
  opts: { signal?: AbortSignal } = {},
): Promise<OrchestratorResult> {
  const allocationStream = new RandomStream(config.seed).fork(StreamSalt.ALLOCATION);
  const encounterCounts = allocateEncounters(patients.length, config.encounters, allocationStream);

  const tasks = buildPartitionTasks(config, reference, patients, encounterCounts);
  const kind: ExecutorKind = config.strategy.kind === 'sequential' ? 'inline' : config.executor;
  const executor = resolveExecutor(kind, deps);

  deps.logger.info(
    { partitions: tasks.length, executor: kind, encounters: sum(encounterCounts) },
    'Generating encounters',
  );

  const outputs = await executor.execute(tasks, {
    timeoutMs: config.partitionTimeoutMs,
    signal: opts.signal,
  });

  outputs.forEach((output, partition) => {
    deps.logger.debug(
      { partition, encounters: output.encounters.length, skipped: output.skipped },
      'Partition complete',
    );
  });

  return {
    dataset: mergePartitions(reference, patients, outputs),
    partitions: tasks.length,
    executor: kind,
  };
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
