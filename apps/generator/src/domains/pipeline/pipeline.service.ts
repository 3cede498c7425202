// ============================================================================
// Pipeline — config → reference → patients → orchestrator → validate → export
// ============================================================================

import type { Logger } from '../../lib/logger.js';
import { RandomStream, StreamSalt } from '../../lib/random.js';
import { formatTimestamp } from '../../lib/time.js';
import {
  emptySkipCounters,
  type Dataset,
  type RunConfig,
  type SkipCounters,
} from '../dataset/dataset.types.js';
import { verifyDataset } from '../dataset/dataset.validator.js';
import type { BulkLoadRepository, TableLoadResult } from '../export/bulk-load.repository.js';
import { writeCsvFile } from '../export/csv.writer.js';
import { ExportGroup, exportsFor } from '../export/export.columns.js';
import type { OrchestratorDeps } from '../orchestrator/orchestrator.service.js';
import { generateEncounterData } from '../orchestrator/orchestrator.service.js';
import { generatePatients } from '../patient/patient.generator.js';
import { generateReferenceData } from '../reference/reference.generator.js';

export const PipelineCommand = {
  BASE: 'base',
  ENCOUNTERS: 'encounters',
  ALL: 'all',
} as const;

export type PipelineCommand = (typeof PipelineCommand)[keyof typeof PipelineCommand];

const COMMAND_GROUPS: Record<PipelineCommand, readonly ExportGroup[]> = {
  [PipelineCommand.BASE]: [ExportGroup.BASE],
  [PipelineCommand.ENCOUNTERS]: [ExportGroup.ENCOUNTERS],
  [PipelineCommand.ALL]: [ExportGroup.BASE, ExportGroup.ENCOUNTERS],
};

export interface PipelineDeps extends OrchestratorDeps {
  /** Present when the run should load into PostgreSQL. */
  bulkLoad?: BulkLoadRepository;
  writeCsv?: typeof writeCsvFile;
  clock?: () => number;
}

export interface PipelineOptions {
  command: PipelineCommand;
  /** CSV destination; no files are written without one. */
  outputDir?: string;
  signal?: AbortSignal;
}

export interface PipelineReport {
  command: PipelineCommand;
  seed: number;
  referenceDate: string;
  partitions: number;
  executor: string;
  records: Record<string, number>;
  skipped: SkipCounters;
  files: string[];
  loaded: TableLoadResult[];
  durationMs: number;
}

export interface PipelineResult {
  dataset: Dataset;
  report: PipelineReport;
}

/**
 * Runs one generation command end to end. Base data is regenerated from the
 * seed on every command, so `encounters` on its own sees the same providers
 * and patients a previous `base` run wrote.
 */
export async function runPipeline(
  config: RunConfig,
  opts: PipelineOptions,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  const clock = deps.clock ?? Date.now;
  const startedAt = clock();
  const log = deps.logger.child({ command: opts.command, seed: config.seed });

  // --- Base data ---
  const root = new RandomStream(config.seed);
  const reference = generateReferenceData(config, root.fork(StreamSalt.REFERENCE));
  const patients = generatePatients(
    { ...config, historyDays: config.encounters.historyDays },
    root.fork(StreamSalt.PATIENTS),
  );
  log.info(
    {
      providers: reference.providers.length,
      units: reference.units.length,
      medications: reference.medications.length,
      patients: patients.length,
    },
    'Base data generated',
  );

  // --- Encounters and events ---
  let dataset: Dataset;
  let partitions = 0;
  let executor = 'none';

  if (opts.command === PipelineCommand.BASE) {
    dataset = {
      reference,
      patients,
      encounters: [],
      diagnoses: [],
      medicationAdministrations: [],
      labResults: [],
      vitalSigns: [],
      nursingAssessments: [],
      allergies: [],
      skipped: emptySkipCounters(),
    };
  } else {
    const result = await generateEncounterData(config, reference, patients, deps, {
      signal: opts.signal,
    });
    dataset = result.dataset;
    partitions = result.partitions;
    executor = result.executor;
  }

  // --- Verification ---
  if (config.verify) {
    verifyDataset(dataset, config.referenceDate);
    log.debug('Dataset passed invariant checks');
  }

  // --- Export ---
  const groups = COMMAND_GROUPS[opts.command];
  const tables = exportsFor(groups);
  const writeCsv = deps.writeCsv ?? writeCsvFile;
  const records: Record<string, number> = {};
  const files: string[] = [];

  for (const table of tables) {
    const rows = table.rows(dataset);
    records[table.name] = rows.length;
    if (opts.outputDir !== undefined) {
      files.push(await writeCsv(opts.outputDir, table.name, table.header, rows));
      log.debug({ entity: table.name, rows: rows.length }, 'CSV written');
    }
  }

  let loaded: TableLoadResult[] = [];
  if (deps.bulkLoad) {
    loaded = await deps.bulkLoad.loadDataset(dataset, groups);
    log.info({ tables: loaded.length }, 'Dataset loaded');
  }

  const report: PipelineReport = {
    command: opts.command,
    seed: config.seed,
    referenceDate: formatTimestamp(config.referenceDate),
    partitions,
    executor,
    records,
    skipped: dataset.skipped,
    files,
    loaded,
    durationMs: clock() - startedAt,
  };

  return { dataset, report };
}
