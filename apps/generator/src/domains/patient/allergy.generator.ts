import {
  ALLERGEN_CATALOGUE,
  ALLERGIES_PER_PATIENT,
} from '@clinical-synth/shared/constants/patient.constants.js';
import type { RandomStream } from '../../lib/random.js';
import { YEAR_MS, addMs, formatDate, maxDate, parseDate } from '../../lib/time.js';
import type {
  AllergyRecord,
  PatientRecord,
  ProviderRecord,
} from '../dataset/dataset.types.js';

const ONSET_EARLIEST_YEARS = 10;
const ONSET_LATEST_YEARS = 1;

export interface AllergyGenerationOptions {
  referenceDate: Date;
  allergyPrevalence: number;
  reporters: readonly ProviderRecord[];
}

export interface AllergyGenerationResult {
  allergies: AllergyRecord[];
  /** Planned allergies that had no valid onset window (patients under a year old). */
  skipped: number;
}

/**
 * Patient-keyed allergies. Ids are local to the call, starting at 1.
 */
export function generateAllergies(
  patients: readonly PatientRecord[],
  stream: RandomStream,
  opts: AllergyGenerationOptions,
): AllergyGenerationResult {
  const allergies: AllergyRecord[] = [];
  let skipped = 0;

  const onsetLatest = addMs(opts.referenceDate, -ONSET_LATEST_YEARS * YEAR_MS);
  const onsetEarliest = addMs(opts.referenceDate, -ONSET_EARLIEST_YEARS * YEAR_MS);

  for (const patient of patients) {
    if (!stream.chance(opts.allergyPrevalence)) continue;

    const count = stream.int(ALLERGIES_PER_PATIENT.min, ALLERGIES_PER_PATIENT.max);
    const onsetFrom = maxDate(onsetEarliest, parseDate(patient.dateOfBirth));
    if (onsetFrom.getTime() > onsetLatest.getTime()) {
      skipped += count;
      continue;
    }

    for (const definition of stream.sample(ALLERGEN_CATALOGUE, count)) {
      allergies.push({
        allergyId: allergies.length + 1,
        patientId: patient.patientId,
        allergen: definition.allergen,
        allergyType: definition.allergyType,
        reaction: definition.reaction,
        severity: definition.severity,
        onsetDate: formatDate(stream.dateBetween(onsetFrom, onsetLatest)),
        reportedDate: stream.dateBetween(onsetLatest, opts.referenceDate),
        reportedByProviderId: stream.pick(opts.reporters).providerId,
        isActive: true,
      });
    }
  }

  return { allergies, skipped };
}
