// ============================================================================
// Clinical Events — per-encounter generation
// ============================================================================

import { DiagnosisType, EncounterStatus } from '@clinical-synth/shared/constants/encounter.constants.js';
import { MedicationRoute } from '@clinical-synth/shared/constants/reference.constants.js';
import { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import type {
  DiagnosisRecord,
  EncounterRecord,
  LabResultRecord,
  MedicationAdministrationRecord,
  NursingAssessmentRecord,
  PatientRecord,
  SkipCounters,
  VitalSignRecord,
} from '../dataset/dataset.types.js';
import type { ReferenceLookup } from '../reference/reference.lookup.js';
import { generateDiagnoses } from './diagnosis.generator.js';
import { eventWindow } from './event-window.js';
import { generateLabResults } from './lab.generator.js';
import { generateMedicationAdministrations } from './medication.generator.js';
import { generateNursingAssessments } from './nursing.generator.js';
import { generateVitalSigns } from './vitals.generator.js';

export interface ClinicalEventSink {
  diagnoses: DiagnosisRecord[];
  medicationAdministrations: MedicationAdministrationRecord[];
  labResults: LabResultRecord[];
  vitalSigns: VitalSignRecord[];
  nursingAssessments: NursingAssessmentRecord[];
  skipped: SkipCounters;
}

export interface ClinicalEventIds {
  diagnoses: IdSequence;
  medicationAdministrations: IdSequence;
  labResults: IdSequence;
  vitalSigns: IdSequence;
  nursingAssessments: IdSequence;
}

export function createClinicalEventIds(): ClinicalEventIds {
  return {
    diagnoses: new IdSequence(),
    medicationAdministrations: new IdSequence(),
    labResults: new IdSequence(),
    vitalSigns: new IdSequence(),
    nursingAssessments: new IdSequence(),
  };
}

export interface ClinicalEventOptions {
  referenceDate: Date;
  abnormalFraction: number;
  missedDoseFraction: number;
  lookup: ReferenceLookup;
}

/**
 * Generates every encounter-keyed event for one encounter into `sink`.
 * Cancelled encounters get nothing; encounters with an empty window add
 * their planned counts to the skip counters instead.
 */
export function generateEncounterEvents(
  encounter: EncounterRecord,
  patient: PatientRecord,
  stream: RandomStream,
  ids: ClinicalEventIds,
  sink: ClinicalEventSink,
  opts: ClinicalEventOptions,
): void {
  if (encounter.encounterStatus === EncounterStatus.CANCELLED) return;

  const window = eventWindow(encounter, opts.referenceDate);

  const diagnoses = generateDiagnoses(encounter, window, stream, ids.diagnoses);
  sink.diagnoses.push(...diagnoses.records);
  sink.skipped.diagnoses += diagnoses.skipped;

  const meds = generateMedicationAdministrations(
    encounter,
    window,
    stream,
    ids.medicationAdministrations,
    { lookup: opts.lookup, missedDoseFraction: opts.missedDoseFraction },
  );
  sink.medicationAdministrations.push(...meds.records);
  sink.skipped.medication_administrations += meds.skipped;

  const labs = generateLabResults(encounter, window, stream, ids.labResults, {
    referenceDate: opts.referenceDate,
    abnormalFraction: opts.abnormalFraction,
  });
  sink.labResults.push(...labs.records);
  sink.skipped.lab_results += labs.skipped;

  const vitals = generateVitalSigns(encounter, patient, window, stream, ids.vitalSigns, {
    lookup: opts.lookup,
    abnormalFraction: opts.abnormalFraction,
  });
  sink.vitalSigns.push(...vitals.records);
  sink.skipped.vital_signs += vitals.skipped;

  const nursing = generateNursingAssessments(encounter, window, stream, ids.nursingAssessments, {
    lookup: opts.lookup,
    context: {
      hasSecondaryDiagnosis: diagnoses.records.some(
        (d) => d.diagnosisType === DiagnosisType.SECONDARY,
      ),
      hasIvAccess: meds.records.some((m) => m.orderedRoute === MedicationRoute.IV),
    },
  });
  sink.nursingAssessments.push(...nursing.records);
  sink.skipped.nursing_assessments += nursing.skipped;
}
