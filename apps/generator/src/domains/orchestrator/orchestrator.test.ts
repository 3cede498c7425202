import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DischargeDisposition,
  EncounterStatus,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import {
  ConfigurationError,
  InvariantViolationError,
  PartitionFailedError,
  PartitionTimeoutError,
} from '../../lib/errors.js';
import { silentLogger } from '../../lib/logger.js';
import { RandomStream, StreamSalt } from '../../lib/random.js';
import {
  makeConfig,
  makeEncounter,
  makePatient,
  makePatients,
  makeReference,
} from '../../../test/helpers/fixtures.js';
import {
  emptySkipCounters,
  type DiagnosisRecord,
  type EncounterEvents,
} from '../dataset/dataset.types.js';
import { allocateEncounters } from '../encounter/encounter.allocation.js';
import type { PartitionExecutor } from './executors/executor.types.js';
import { createInlineExecutor } from './executors/inline.executor.js';
import { mergePartitions } from './merge.js';
import {
  buildPartitionTasks,
  generateEncounterData,
  partitionCountFor,
  planPartitions,
} from './orchestrator.service.js';
import { runPartition } from './partition.runner.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function emptyEvents(overrides: Partial<EncounterEvents> = {}): EncounterEvents {
  return {
    encounters: [],
    diagnoses: [],
    medicationAdministrations: [],
    labResults: [],
    vitalSigns: [],
    nursingAssessments: [],
    allergies: [],
    skipped: emptySkipCounters(),
    ...overrides,
  };
}

function makeDiagnosis(overrides: Partial<DiagnosisRecord> = {}): DiagnosisRecord {
  return {
    diagnosisId: 1,
    encounterId: 1,
    icd10Code: 'I10',
    diagnosisDescription: 'Essential (primary) hypertension',
    diagnosisType: 'Primary',
    diagnosedDate: new Date('2025-05-01T09:00:00.000Z'),
    diagnosedByProviderId: 1,
    isResolved: false,
    resolvedDate: null,
    ...overrides,
  };
}

function tasksFor(partitions: number) {
  const config = makeConfig({ strategy: { kind: 'partitioned', partitions } });
  const patients = makePatients(config);
  const counts = allocateEncounters(
    patients.length,
    config.encounters,
    new RandomStream(config.seed).fork(StreamSalt.ALLOCATION),
  );
  return buildPartitionTasks(config, makeReference(config), patients, counts);
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

describe('planPartitions', () => {
  it('splits patients into contiguous slices, remainder first', () => {
    expect(planPartitions(10, 3)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 7 },
      { start: 7, end: 10 },
    ]);
  });

  it('allows one patient per partition', () => {
    expect(planPartitions(3, 3)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
    ]);
  });

  it('rejects more partitions than patients', () => {
    expect(() => planPartitions(2, 3)).toThrow(ConfigurationError);
  });
});

describe('partitionCountFor', () => {
  it('runs the sequential strategy as one partition', () => {
    expect(partitionCountFor({ strategy: { kind: 'sequential' } })).toBe(1);
    expect(partitionCountFor({ strategy: { kind: 'partitioned', partitions: 6 } })).toBe(6);
  });
});

describe('buildPartitionTasks', () => {
  const tasks = tasksFor(4);

  it('covers every patient exactly once, in order', () => {
    expect(tasks.flatMap((t) => t.patients.map((p) => p.patientId))).toEqual(
      Array.from({ length: 20 }, (_, i) => i + 1),
    );
    expect(tasks.map((t) => t.patients.length)).toEqual([5, 5, 5, 5]);
  });

  it('gives partitions distinct seeds and disjoint suffix ranges', () => {
    expect(new Set(tasks.map((t) => t.seed)).size).toBe(4);
    for (let i = 1; i < tasks.length; i++) {
      expect(tasks[i].suffixRange.start).toBe(tasks[i - 1].suffixRange.end + 1);
    }
  });
});

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

describe('mergePartitions', () => {
  const reference = makeReference(makeConfig());
  const patients = [makePatient({ patientId: 1 }), makePatient({ patientId: 2, mrn: 'MRN0000002' })];

  it('renumbers ids and encounter references in partition order', () => {
    const first = emptyEvents({
      encounters: [
        makeEncounter({ encounterId: 1, encounterNumber: 'IP00000001' }),
        makeEncounter({ encounterId: 2, encounterNumber: 'IP00000002' }),
      ],
      diagnoses: [makeDiagnosis({ diagnosisId: 1, encounterId: 2 })],
      skipped: { ...emptySkipCounters(), lab_results: 13 },
    });
    const second = emptyEvents({
      encounters: [makeEncounter({ encounterId: 1, patientId: 2, encounterNumber: 'IP50000001' })],
      diagnoses: [makeDiagnosis({ diagnosisId: 1, encounterId: 1 })],
      skipped: { ...emptySkipCounters(), lab_results: 13, vital_signs: 1 },
    });

    const merged = mergePartitions(reference, patients, [first, second]);

    expect(merged.encounters.map((e) => [e.encounterId, e.encounterNumber])).toEqual([
      [1, 'IP00000001'],
      [2, 'IP00000002'],
      [3, 'IP50000001'],
    ]);
    expect(merged.diagnoses.map((d) => [d.diagnosisId, d.encounterId])).toEqual([
      [1, 2],
      [2, 3],
    ]);
    expect(merged.skipped).toEqual({ ...emptySkipCounters(), lab_results: 26, vital_signs: 1 });
  });

  it('deactivates patients whose latest encounter ended in death', () => {
    const partition = emptyEvents({
      encounters: [
        makeEncounter({
          encounterId: 1,
          patientId: 1,
          encounterNumber: 'IP00000001',
          admitDate: new Date('2024-01-01T00:00:00Z'),
          dischargeDate: new Date('2024-01-05T00:00:00Z'),
          dischargeDisposition: DischargeDisposition.EXPIRED,
        }),
        makeEncounter({
          encounterId: 2,
          patientId: 2,
          encounterNumber: 'IP00000002',
          admitDate: new Date('2024-01-01T00:00:00Z'),
          dischargeDate: new Date('2024-01-05T00:00:00Z'),
          dischargeDisposition: DischargeDisposition.EXPIRED,
        }),
        makeEncounter({
          encounterId: 3,
          patientId: 2,
          encounterNumber: 'IP00000003',
          admitDate: new Date('2024-03-01T00:00:00Z'),
          dischargeDate: null,
          encounterStatus: EncounterStatus.ACTIVE,
        }),
      ],
    });

    const merged = mergePartitions(reference, patients, [partition]);
    expect(merged.patients.map((p) => p.isActive)).toEqual([false, true]);
    expect(patients.every((p) => p.isActive)).toBe(true);
  });

  it('rejects encounter numbers that collide across partitions', () => {
    const a = emptyEvents({ encounters: [makeEncounter({ encounterNumber: 'IP00000001' })] });
    const b = emptyEvents({ encounters: [makeEncounter({ encounterNumber: 'IP00000001' })] });
    expect(() => mergePartitions(reference, patients, [a, b])).toThrow(InvariantViolationError);
  });
});

// ---------------------------------------------------------------------------
// Inline executor
// ---------------------------------------------------------------------------

describe('createInlineExecutor', () => {
  const tasks = tasksFor(3);

  it('runs tasks in order', async () => {
    const run = vi.fn((task: (typeof tasks)[number]) =>
      emptyEvents({ skipped: { ...emptySkipCounters(), allergies: task.index } }),
    );
    const outputs = await createInlineExecutor({ run }).execute(tasks);
    expect(outputs.map((o) => o.skipped.allergies)).toEqual([0, 1, 2]);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('reports the index of the failing partition and stops', async () => {
    const run = vi.fn((task: (typeof tasks)[number]) => {
      if (task.index === 1) throw new Error('boom');
      return emptyEvents();
    });

    await expect(createInlineExecutor({ run }).execute(tasks)).rejects.toMatchObject({
      name: 'PartitionFailedError',
      partitionIndex: 1,
      message: 'Partition 1 failed: boom',
    });
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('fails a partition that overruns its budget', async () => {
    vi.spyOn(Date, 'now').mockReturnValueOnce(0).mockReturnValue(10_000);
    const run = vi.fn(() => emptyEvents());

    const failure = await createInlineExecutor({ run })
      .execute(tasks, { timeoutMs: 50 })
      .catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(PartitionFailedError);
    expect(failure).toMatchObject({ partitionIndex: 0 });
    expect(failure instanceof PartitionFailedError && failure.cause).toBeInstanceOf(PartitionTimeoutError);
    expect(run).not.toHaveBeenCalled();
  });

  it('checks the deadline from inside the partition', async () => {
    vi.spyOn(Date, 'now').mockReturnValueOnce(0).mockReturnValueOnce(0).mockReturnValue(10_000);
    const run = vi.fn((_task: (typeof tasks)[number], opts?: { checkpoint?: () => void }) => {
      opts?.checkpoint?.();
      return emptyEvents();
    });

    await expect(createInlineExecutor({ run }).execute(tasks, { timeoutMs: 50 })).rejects.toMatchObject({
      partitionIndex: 0,
      message: 'Partition 0 failed: Partition exceeded its 50 ms budget',
    });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('stops on an aborted signal', async () => {
    const controller = new AbortController();
    const reason = new Error('Interrupted');
    controller.abort(reason);
    const run = vi.fn(() => emptyEvents());

    const failure = await createInlineExecutor({ run })
      .execute(tasks, { signal: controller.signal })
      .catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(PartitionFailedError);
    expect(failure instanceof PartitionFailedError && failure.cause).toBe(reason);
    expect(run).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Partition runner
// ---------------------------------------------------------------------------

describe('runPartition', () => {
  it('returns the same output for the same task', () => {
    const [task] = tasksFor(2);
    expect(runPartition(task)).toEqual(runPartition(task));
  });

  it('calls the checkpoint once per patient', () => {
    const [task] = tasksFor(2);
    const checkpoint = vi.fn();
    runPartition(task, { checkpoint });
    expect(checkpoint).toHaveBeenCalledTimes(task.patients.length);
  });

  it('numbers encounters locally from 1', () => {
    const [, second] = tasksFor(2);
    const output = runPartition(second);
    expect(output.encounters.map((e) => e.encounterId)).toEqual(
      output.encounters.map((_, i) => i + 1),
    );
  });
});

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

describe('generateEncounterData', () => {
  function failingExecutor(): PartitionExecutor {
    return { kind: 'threads', execute: vi.fn(() => Promise.reject(new Error('not expected'))) };
  }

  it('runs the sequential strategy inline whatever executor is configured', async () => {
    const config = makeConfig({ executor: 'threads' });
    const threads = failingExecutor();

    const result = await generateEncounterData(config, makeReference(config), makePatients(config), {
      logger: silentLogger,
      executors: { threads },
    });

    expect(result.executor).toBe('inline');
    expect(result.partitions).toBe(1);
    expect(threads.execute).not.toHaveBeenCalled();
  });

  it('hands partitioned runs to the configured executor', async () => {
    const config = makeConfig({ executor: 'threads', strategy: { kind: 'partitioned', partitions: 2 } });
    const inline = createInlineExecutor();
    const threads: PartitionExecutor = { kind: 'threads', execute: vi.fn(inline.execute) };

    const result = await generateEncounterData(config, makeReference(config), makePatients(config), {
      logger: silentLogger,
      executors: { threads },
    });

    expect(result.executor).toBe('threads');
    expect(result.partitions).toBe(2);
    expect(threads.execute).toHaveBeenCalledTimes(1);
  });

  it('allocates the same encounter count for any partition count', async () => {
    const counts: number[] = [];
    for (const partitions of [1, 3, 5]) {
      const config = makeConfig({
        strategy: { kind: 'partitioned', partitions },
        encounters: { total: 37 },
      });
      const { dataset } = await generateEncounterData(
        config,
        makeReference(config),
        makePatients(config),
        { logger: silentLogger },
      );
      counts.push(dataset.encounters.length);
    }
    expect(counts).toEqual([37, 37, 37]);
  });
});
