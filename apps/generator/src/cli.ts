// ============================================================================
// clinical-synth CLI
// ============================================================================

import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import type { GeneratorConfigInput } from '@clinical-synth/shared/schemas/generator.schema.js';
import { createBulkLoadRepository } from './domains/export/bulk-load.repository.js';
import { PipelineCommand, runPipeline } from './domains/pipeline/pipeline.service.js';
import { configFromEnv, resolveRunConfig } from './lib/config.js';
import { createDatabase, type DatabaseHandle } from './lib/db.js';
import { getEnv } from './lib/env.js';
import { ConfigurationError, GeneratorError } from './lib/errors.js';
import { createLogger, type Logger } from './lib/logger.js';

export const USAGE = `Usage: clinical-synth <base|encounters|all> [options]

Options:
  --seed <n>                 Random seed, 0 to 4294967295
  --reference-date <date>    The run's "now" (ISO 8601)
  --patients <n>             Patient count
  --providers <n>            Provider count
  --medications <n>          Medication count
  --encounters <n>           Total encounters across all patients
  --abnormal-fraction <p>    Share of abnormal labs and unstable vitals
  --partitions <n>           Generate encounters in n partitions
  --executor <kind>          inline | threads
  --timeout-ms <n>           Wall-clock budget per partition
  --output-dir <dir>         CSV destination
  --load                     Load into DATABASE_URL
  --no-verify                Skip the invariant checks
  -h, --help                 Show this message`;

const COMMANDS: readonly string[] = Object.values(PipelineCommand);

function isCommand(value: string | undefined): value is PipelineCommand {
  return value !== undefined && COMMANDS.includes(value);
}

export interface CliInvocation {
  command: PipelineCommand;
  input: GeneratorConfigInput;
  outputDir?: string;
  load: boolean;
  help: boolean;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        seed: { type: 'string' },
        'reference-date': { type: 'string' },
        patients: { type: 'string' },
        providers: { type: 'string' },
        medications: { type: 'string' },
        encounters: { type: 'string' },
        'abnormal-fraction': { type: 'string' },
        partitions: { type: 'string' },
        executor: { type: 'string' },
        'timeout-ms': { type: 'string' },
        'output-dir': { type: 'string' },
        load: { type: 'boolean' },
        'no-verify': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

/** Parses argv on top of environment defaults. Flags win. */
export function parseCli(argv: readonly string[], defaults: GeneratorConfigInput = {}): CliInvocation {
  const { values, positionals } = readArgs(argv);
  const [command] = positionals;

  if (values.help === true) {
    return { command: PipelineCommand.ALL, input: defaults, load: false, help: true };
  }
  if (!isCommand(command)) {
    throw new ConfigurationError(`Unknown command "${command ?? ''}"\n\n${USAGE}`);
  }

  const input: GeneratorConfigInput = { ...defaults };
  const seed = toNumber('seed', values.seed);
  const patients = toNumber('patients', values.patients);
  const providers = toNumber('providers', values.providers);
  const medications = toNumber('medications', values.medications);
  const encounters = toNumber('encounters', values.encounters);
  const abnormalFraction = toNumber('abnormal-fraction', values['abnormal-fraction']);
  const partitions = toNumber('partitions', values.partitions);
  const timeoutMs = toNumber('timeout-ms', values['timeout-ms']);

  if (seed !== undefined) input.seed = seed;
  if (values['reference-date'] !== undefined) input.referenceDate = values['reference-date'];
  if (patients !== undefined) input.patientCount = patients;
  if (providers !== undefined) input.providerCount = providers;
  if (medications !== undefined) input.medicationCount = medications;
  if (encounters !== undefined) input.encounters = { ...input.encounters, total: encounters };
  if (abnormalFraction !== undefined) input.abnormalFraction = abnormalFraction;
  if (partitions !== undefined) input.strategy = { kind: 'partitioned', partitions };
  if (values.executor === 'inline' || values.executor === 'threads') {
    input.executor = values.executor;
  } else if (values.executor !== undefined) {
    throw new ConfigurationError(`--executor must be inline or threads, got "${values.executor}"`);
  }
  if (timeoutMs !== undefined) input.partitionTimeoutMs = timeoutMs;
  if (values['no-verify'] === true) input.verify = false;

  return {
    command,
    input,
    outputDir: values['output-dir'],
    load: values.load === true,
    help: false,
  };
}

function reportFailure(logger: Logger, err: unknown): void {
  if (err instanceof GeneratorError) {
    logger.error({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ err }, 'Generation failed');
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let logger = createLogger();
  let database: DatabaseHandle | undefined;

  try {
    const env = getEnv();
    logger = createLogger(env.LOG_LEVEL);

    const invocation = parseCli(argv, configFromEnv(env));
    if (invocation.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }

    const config = resolveRunConfig(invocation.input);

    if (invocation.load) {
      if (!env.DATABASE_URL) {
        throw new ConfigurationError('--load requires DATABASE_URL');
      }
      database = createDatabase(env.DATABASE_URL);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

    const { report } = await runPipeline(
      config,
      {
        command: invocation.command,
        outputDir: invocation.outputDir ?? env.GENERATOR_OUTPUT_DIR,
        signal: controller.signal,
      },
      {
        logger,
        bulkLoad: database ? createBulkLoadRepository(database.db) : undefined,
      },
    );

    logger.info(report, 'Generation complete');
    return 0;
  } catch (err) {
    reportFailure(logger, err);
    return 1;
  } finally {
    await database?.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await main(process.argv.slice(2));
}
