import {
  DiagnosisType,
  DIAGNOSIS_CATALOGUE,
  DIAGNOSES_PER_ENCOUNTER,
  EncounterStatus,
  EncounterType,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import { DAY_MS, addMs, minDate } from '../../lib/time.js';
import type { DiagnosisRecord, EncounterRecord } from '../dataset/dataset.types.js';
import { isPlaceable, type EventWindow, type PlacementResult } from './event-window.js';

const ADMISSION_DIAGNOSIS_TYPES: readonly EncounterType[] = [
  EncounterType.INPATIENT,
  EncounterType.EMERGENCY,
];
const ADMISSION_DIAGNOSIS_PROBABILITY = 0.5;
const RESOLVED_AT_DISCHARGE_PROBABILITY = 0.3;

export function generateDiagnoses(
  encounter: EncounterRecord,
  window: EventWindow,
  stream: RandomStream,
  ids: IdSequence,
): PlacementResult<DiagnosisRecord> {
  const count = stream.int(DIAGNOSES_PER_ENCOUNTER.min, DIAGNOSES_PER_ENCOUNTER.max);
  if (!isPlaceable(window)) {
    return { records: [], skipped: count };
  }

  // Working-up period: the first day of the stay, bounded by the window.
  const diagnosedBy = minDate(addMs(window.start, DAY_MS), window.end);
  const discharged = encounter.encounterStatus === EncounterStatus.DISCHARGED;
  const records: DiagnosisRecord[] = [];

  stream.sample(DIAGNOSIS_CATALOGUE, count).forEach((entry, index) => {
    const resolved = discharged && stream.chance(RESOLVED_AT_DISCHARGE_PROBABILITY);
    records.push({
      diagnosisId: ids.next(),
      encounterId: encounter.encounterId,
      icd10Code: entry.icd10Code,
      diagnosisDescription: entry.description,
      diagnosisType: index === 0 ? DiagnosisType.PRIMARY : DiagnosisType.SECONDARY,
      diagnosedDate: stream.dateBetween(window.start, diagnosedBy),
      diagnosedByProviderId: encounter.attendingProviderId,
      isResolved: resolved,
      resolvedDate: resolved ? window.end : null,
    });
  });

  const primary = records[0];
  if (
    ADMISSION_DIAGNOSIS_TYPES.includes(encounter.encounterType) &&
    stream.chance(ADMISSION_DIAGNOSIS_PROBABILITY)
  ) {
    records.push({
      diagnosisId: ids.next(),
      encounterId: encounter.encounterId,
      icd10Code: primary.icd10Code,
      diagnosisDescription: primary.diagnosisDescription,
      diagnosisType: DiagnosisType.ADMISSION,
      diagnosedDate: window.start,
      diagnosedByProviderId: encounter.admittingProviderId,
      isResolved: false,
      resolvedDate: null,
    });
  }

  return { records, skipped: 0 };
}
