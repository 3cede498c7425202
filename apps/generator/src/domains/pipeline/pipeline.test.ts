import { describe, it, expect, vi } from 'vitest';
import path from 'node:path';
import { silentLogger } from '../../lib/logger.js';
import { makeConfig } from '../../../test/helpers/fixtures.js';
import { emptySkipCounters } from '../dataset/dataset.types.js';
import type { BulkLoadRepository } from '../export/bulk-load.repository.js';
import type { writeCsvFile } from '../export/csv.writer.js';
import { PipelineCommand, runPipeline } from './pipeline.service.js';

function fakeWriter() {
  return vi.fn<typeof writeCsvFile>(async (dir, table) => path.join(dir, `${table}.csv`));
}

function steppingClock(step: number): () => number {
  let now = 1_000;
  return () => {
    now += step;
    return now;
  };
}

describe('runPipeline', () => {
  it('writes only the base tables for the base command', async () => {
    const config = makeConfig();
    const writeCsv = fakeWriter();
    const { dataset, report } = await runPipeline(
      config,
      { command: PipelineCommand.BASE, outputDir: '/out' },
      { logger: silentLogger, writeCsv, clock: steppingClock(5) },
    );

    expect(dataset.encounters).toEqual([]);
    expect(report).toEqual({
      command: 'base',
      seed: 42,
      referenceDate: '2025-06-01 12:00:00',
      partitions: 0,
      executor: 'none',
      records: {
        providers: dataset.reference.providers.length,
        units: 16,
        medications: dataset.reference.medications.length,
        patients: 20,
      },
      skipped: emptySkipCounters(),
      files: [
        path.join('/out', 'providers.csv'),
        path.join('/out', 'units.csv'),
        path.join('/out', 'medications.csv'),
        path.join('/out', 'patients.csv'),
      ],
      loaded: [],
      durationMs: 5,
    });
    expect(writeCsv).toHaveBeenCalledTimes(4);
    expect(writeCsv.mock.calls[1][2]).toEqual([
      'unit_id',
      'unit_code',
      'unit_name',
      'unit_type',
      'floor',
      'building',
      'phone',
      'total_beds',
      'is_active',
    ]);
  });

  it('writes no files without an output directory', async () => {
    const writeCsv = fakeWriter();
    const { report } = await runPipeline(
      makeConfig(),
      { command: PipelineCommand.ENCOUNTERS },
      { logger: silentLogger, writeCsv },
    );

    expect(writeCsv).not.toHaveBeenCalled();
    expect(report.files).toEqual([]);
    expect(report.partitions).toBe(1);
    expect(report.executor).toBe('inline');
    expect(Object.keys(report.records)).toEqual([
      'patients',
      'encounters',
      'diagnoses',
      'medication_administrations',
      'lab_results',
      'vital_signs',
      'nursing_assessments',
      'allergies',
    ]);
  });

  it('regenerates the same base data for the encounters command', async () => {
    const config = makeConfig();
    const base = await runPipeline(config, { command: PipelineCommand.BASE }, { logger: silentLogger });
    const encounters = await runPipeline(
      config,
      { command: PipelineCommand.ENCOUNTERS },
      { logger: silentLogger },
    );

    expect(encounters.dataset.reference).toEqual(base.dataset.reference);
    expect(encounters.dataset.patients.map((p) => p.mrn)).toEqual(
      base.dataset.patients.map((p) => p.mrn),
    );
    expect(encounters.report.records.patients).toBe(base.report.records.patients);
  });

  it('hands the dataset and stages to the bulk loader', async () => {
    const loaded = [{ table: 'providers', rows: 12, chunks: 1 }];
    const loadDataset = vi.fn<BulkLoadRepository['loadDataset']>(async () => loaded);
    const bulkLoad: BulkLoadRepository = {
      loadDataset,
      markPatientsInactive: vi.fn<BulkLoadRepository['markPatientsInactive']>(async () => undefined),
    };

    const { dataset, report } = await runPipeline(
      makeConfig(),
      { command: PipelineCommand.ALL },
      { logger: silentLogger, bulkLoad },
    );

    expect(loadDataset).toHaveBeenCalledWith(dataset, ['base', 'encounters']);
    expect(report.loaded).toBe(loaded);
    expect(Object.keys(report.records)).toHaveLength(11);
  });
});
