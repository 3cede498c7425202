// ============================================================================
// Parallel Orchestrator — single partition
// Pure with respect to its task: same task, same output, on any thread.
// ============================================================================

import { IdSequence } from '../../lib/id-sequence.js';
import { RandomStream, StreamSalt } from '../../lib/random.js';
import {
  emptySkipCounters,
  type EncounterEvents,
  type PatientRecord,
  type ReferenceData,
  type RunConfig,
} from '../dataset/dataset.types.js';
import { createClinicalEventIds, generateEncounterEvents } from '../clinical/clinical.generator.js';
import { generatePatientEncounters } from '../encounter/encounter.generator.js';
import { createEncounterNumberAllocator, type SuffixRange } from '../encounter/encounter.numbers.js';
import { generateAllergies } from '../patient/allergy.generator.js';
import { createReferenceLookup } from '../reference/reference.lookup.js';

export interface PartitionTask {
  index: number;
  seed: number;
  config: RunConfig;
  reference: ReferenceData;
  patients: PatientRecord[];
  /** Encounter count per patient, aligned with `patients`. */
  encounterCounts: number[];
  suffixRange: SuffixRange;
}

export interface PartitionRunOptions {
  /** Called between patients; throws to cancel the partition. */
  checkpoint?: () => void;
}

export function runPartition(
  task: PartitionTask,
  opts: PartitionRunOptions = {},
): EncounterEvents {
  const { config } = task;
  const root = new RandomStream(task.seed);
  const encounterStream = root.fork(StreamSalt.ENCOUNTERS);
  const eventStream = root.fork(StreamSalt.EVENTS);
  const allergyStream = root.fork(StreamSalt.ALLERGIES);

  const lookup = createReferenceLookup(task.reference);
  const encounterIds = new IdSequence();
  const eventIds = createClinicalEventIds();
  const numbers = createEncounterNumberAllocator({
    digits: config.encounterNumberDigits,
    range: task.suffixRange,
    maxRetries: config.maxIdentifierRetries,
    stream: encounterStream,
  });

  const output: EncounterEvents = {
    encounters: [],
    diagnoses: [],
    medicationAdministrations: [],
    labResults: [],
    vitalSigns: [],
    nursingAssessments: [],
    allergies: [],
    skipped: emptySkipCounters(),
  };

  task.patients.forEach((patient, i) => {
    opts.checkpoint?.();

    const encounters = generatePatientEncounters(
      patient,
      task.encounterCounts[i] ?? 0,
      encounterStream,
      {
        referenceDate: config.referenceDate,
        encounters: config.encounters,
        lookup,
        numbers,
        ids: encounterIds,
      },
    );
    output.encounters.push(...encounters);

    for (const encounter of encounters) {
      generateEncounterEvents(encounter, patient, eventStream, eventIds, output, {
        referenceDate: config.referenceDate,
        abnormalFraction: config.abnormalFraction,
        missedDoseFraction: config.missedDoseFraction,
        lookup,
      });
    }
  });

  const allergies = generateAllergies(task.patients, allergyStream, {
    referenceDate: config.referenceDate,
    allergyPrevalence: config.allergyPrevalence,
    reporters: lookup.prescribers,
  });
  output.allergies = allergies.allergies;
  output.skipped.allergies += allergies.skipped;

  return output;
}
