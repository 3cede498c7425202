// ============================================================================
// Dataset Validator
// Re-checks the load contract over a merged dataset: keys, references,
// temporal windows, value ranges and derived fields.
// ============================================================================

import {
  ANTHROPOMETRIC_RANGES,
  AdminStatus,
  BRADEN_SCORE_RANGE,
  FALL_RISK_SCORE_RANGE,
  VITAL_SIGN_RANGES,
  type NumericRange,
} from '@clinical-synth/shared/constants/clinical.constants.js';
import { EncounterStatus } from '@clinical-synth/shared/constants/encounter.constants.js';
import { validateNpi } from '@clinical-synth/shared/utils/npi.utils.js';
import { InvariantViolationError, type InvariantViolation } from '../../lib/errors.js';
import { parseDate } from '../../lib/time.js';
import { classifyLabValue, fallRiskLevelFor, holdReasonFor } from '../clinical/clinical.derivations.js';
import { eventWindow, isWithin, type EventWindow } from '../clinical/event-window.js';
import type { Dataset, EncounterRecord } from './dataset.types.js';

type Entity = InvariantViolation['entity'];

const VITAL_FIELDS = [
  'temperatureF',
  'heartRate',
  'respiratoryRate',
  'bloodPressureSystolic',
  'bloodPressureDiastolic',
  'oxygenSaturation',
  'painScale',
] as const satisfies ReadonlyArray<keyof typeof VITAL_SIGN_RANGES>;

const ANTHROPOMETRIC_FIELDS = ['weightKg', 'heightCm', 'bmi'] as const satisfies ReadonlyArray<
  keyof typeof ANTHROPOMETRIC_RANGES
>;

function inclusive(value: number, range: NumericRange): boolean {
  return value >= range.min && value <= range.max;
}

function exclusive(value: number, range: NumericRange): boolean {
  return value > range.min && value < range.max;
}

/**
 * Returns every invariant the dataset breaks. An empty list means the
 * dataset loads into the target schema as is.
 */
export function findViolations(dataset: Dataset, referenceDate: Date): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const violate = (entity: Entity, rule: string, recordId: number | string, message: string) => {
    violations.push({ entity, rule, recordId, message });
  };

  const providerIds = new Set(dataset.reference.providers.map((p) => p.providerId));
  const unitIds = new Set(dataset.reference.units.map((u) => u.unitId));
  const medicationIds = new Set(dataset.reference.medications.map((m) => m.medicationId));
  const patientById = new Map(dataset.patients.map((p) => [p.patientId, p]));
  const encounterById = new Map<number, EncounterRecord>();
  const windows = new Map<number, EventWindow>();

  const checkUnique = <T>(
    entity: Entity,
    rule: string,
    records: readonly T[],
    key: (record: T) => string,
    id: (record: T) => number,
  ) => {
    const seen = new Set<string>();
    for (const record of records) {
      const k = key(record);
      if (seen.has(k)) violate(entity, rule, id(record), `Duplicate key ${k}`);
      seen.add(k);
    }
  };

  const checkProvider = (entity: Entity, recordId: number, providerId: number) => {
    if (!providerIds.has(providerId)) {
      violate(entity, 'provider_fk', recordId, `Unknown provider ${providerId}`);
    }
  };

  // --- Reference data ---

  checkUnique('providers', 'unique_npi', dataset.reference.providers, (p) => p.npi, (p) => p.providerId);
  for (const provider of dataset.reference.providers) {
    const npi = validateNpi(provider.npi);
    if (!npi.valid) {
      violate('providers', 'valid_npi', provider.providerId, npi.error ?? 'Invalid NPI');
    }
  }
  checkUnique('units', 'unique_unit_code', dataset.reference.units, (u) => u.unitCode, (u) => u.unitId);
  checkUnique(
    'medications',
    'unique_medication',
    dataset.reference.medications,
    (m) => `${m.medicationName}|${m.genericName}`,
    (m) => m.medicationId,
  );

  // --- Patients ---

  checkUnique('patients', 'unique_mrn', dataset.patients, (p) => p.mrn, (p) => p.patientId);

  // --- Encounters ---

  checkUnique(
    'encounters',
    'unique_encounter_number',
    dataset.encounters,
    (e) => e.encounterNumber,
    (e) => e.encounterId,
  );

  const latestByPatient = new Map<number, EncounterRecord>();
  const activeByPatient = new Map<number, EncounterRecord[]>();

  for (const encounter of dataset.encounters) {
    const id = encounter.encounterId;
    encounterById.set(id, encounter);
    windows.set(id, eventWindow(encounter, referenceDate));

    if (!patientById.has(encounter.patientId)) {
      violate('encounters', 'patient_fk', id, `Unknown patient ${encounter.patientId}`);
    }
    checkProvider('encounters', id, encounter.admittingProviderId);
    checkProvider('encounters', id, encounter.attendingProviderId);
    if (!unitIds.has(encounter.currentUnitId)) {
      violate('encounters', 'unit_fk', id, `Unknown unit ${encounter.currentUnitId}`);
    }

    const { dischargeDate } = encounter;
    if (dischargeDate && dischargeDate.getTime() < encounter.admitDate.getTime()) {
      violate('encounters', 'valid_dates', id, 'discharge_date precedes admit_date');
    }
    if (encounter.admitDate.getTime() > referenceDate.getTime()) {
      violate('encounters', 'admit_not_future', id, 'admit_date after the reference date');
    }

    if (encounter.encounterStatus === EncounterStatus.DISCHARGED) {
      if (!dischargeDate) {
        violate('encounters', 'discharged_has_date', id, 'Discharged encounter without discharge_date');
      }
    } else if (dischargeDate || encounter.dischargeDisposition) {
      violate(
        'encounters',
        'open_has_no_discharge',
        id,
        `${encounter.encounterStatus} encounter carries discharge data`,
      );
    }

    const latest = latestByPatient.get(encounter.patientId);
    if (!latest || encounter.admitDate.getTime() >= latest.admitDate.getTime()) {
      latestByPatient.set(encounter.patientId, encounter);
    }
    if (encounter.encounterStatus === EncounterStatus.ACTIVE) {
      const active = activeByPatient.get(encounter.patientId) ?? [];
      active.push(encounter);
      activeByPatient.set(encounter.patientId, active);
    }
  }

  for (const [patientId, active] of activeByPatient) {
    if (active.length > 1) {
      violate('patients', 'single_active_encounter', patientId, `${active.length} active encounters`);
    }
    const latest = latestByPatient.get(patientId);
    for (const encounter of active) {
      if (latest && latest.encounterId !== encounter.encounterId) {
        violate('encounters', 'active_is_latest', encounter.encounterId, 'Active encounter is not the latest');
      }
    }
  }

  // Resolves the encounter an event hangs off and checks its timestamp.
  const checkEvent = (entity: Entity, recordId: number, encounterId: number, at: Date) => {
    const encounter = encounterById.get(encounterId);
    const window = windows.get(encounterId);
    if (!encounter || !window) {
      violate(entity, 'encounter_fk', recordId, `Unknown encounter ${encounterId}`);
      return;
    }
    if (encounter.encounterStatus === EncounterStatus.CANCELLED) {
      violate(entity, 'no_events_on_cancelled', recordId, `Event on cancelled encounter ${encounterId}`);
    }
    if (!isWithin(at, window)) {
      violate(entity, 'event_in_window', recordId, `Timestamp outside encounter ${encounterId}`);
    }
  };

  // --- Diagnoses ---

  checkUnique(
    'diagnoses',
    'unique_diagnosis',
    dataset.diagnoses,
    (d) => `${d.encounterId}|${d.icd10Code}|${d.diagnosisType}`,
    (d) => d.diagnosisId,
  );
  for (const d of dataset.diagnoses) {
    checkEvent('diagnoses', d.diagnosisId, d.encounterId, d.diagnosedDate);
    checkProvider('diagnoses', d.diagnosisId, d.diagnosedByProviderId);
    if (d.isResolved !== (d.resolvedDate !== null)) {
      violate('diagnoses', 'resolved_has_date', d.diagnosisId, 'is_resolved disagrees with resolved_date');
    }
    if (d.resolvedDate && d.resolvedDate.getTime() < d.diagnosedDate.getTime()) {
      violate('diagnoses', 'valid_resolved_date', d.diagnosisId, 'resolved_date precedes diagnosed_date');
    }
  }

  // --- Medication administrations ---

  for (const m of dataset.medicationAdministrations) {
    checkEvent('medication_administrations', m.adminId, m.encounterId, m.adminDate);
    checkProvider('medication_administrations', m.adminId, m.orderingProviderId);
    checkProvider('medication_administrations', m.adminId, m.administeringProviderId);
    if (!medicationIds.has(m.medicationId)) {
      violate('medication_administrations', 'medication_fk', m.adminId, `Unknown medication ${m.medicationId}`);
    }
    if (m.adminStatus !== AdminStatus.GIVEN && !m.holdReason) {
      violate('medication_administrations', 'hold_reason_required', m.adminId, `${m.adminStatus} without hold_reason`);
    } else if (m.holdReason !== holdReasonFor(m.adminStatus)) {
      violate('medication_administrations', 'hold_reason_derived', m.adminId, 'hold_reason does not match status');
    }
  }

  // --- Lab results ---

  for (const l of dataset.labResults) {
    checkEvent('lab_results', l.labId, l.encounterId, l.collectedDate);
    checkProvider('lab_results', l.labId, l.orderingProviderId);
    if (l.referenceRangeLow >= l.referenceRangeHigh) {
      violate('lab_results', 'valid_reference_range', l.labId, 'reference_range_low >= reference_range_high');
    }
    const expected = classifyLabValue(l.resultValue, l.referenceRangeLow, l.referenceRangeHigh);
    if (l.abnormalFlag !== expected) {
      violate('lab_results', 'abnormal_flag_derived', l.labId, `Flag ${l.abnormalFlag}, expected ${expected}`);
    }
    if (l.resultedDate) {
      if (l.resultedDate.getTime() < l.collectedDate.getTime()) {
        violate('lab_results', 'valid_result_date', l.labId, 'resulted_date precedes collected_date');
      }
      if (l.resultedDate.getTime() > referenceDate.getTime()) {
        violate('lab_results', 'result_not_future', l.labId, 'resulted_date after the reference date');
      }
    }
  }

  // --- Vital signs ---

  for (const v of dataset.vitalSigns) {
    checkEvent('vital_signs', v.vitalId, v.encounterId, v.recordedDate);
    checkProvider('vital_signs', v.vitalId, v.recordedByProviderId);
    for (const field of VITAL_FIELDS) {
      const value = v[field];
      const range = VITAL_SIGN_RANGES[field];
      if (!inclusive(value, range)) {
        violate('vital_signs', `valid_${field}`, v.vitalId, `${field}=${value} outside ${range.min}-${range.max}`);
      }
    }
    for (const field of ANTHROPOMETRIC_FIELDS) {
      const value = v[field];
      const range = ANTHROPOMETRIC_RANGES[field];
      if (value !== null && !exclusive(value, range)) {
        violate('vital_signs', `valid_${field}`, v.vitalId, `${field}=${value} outside ${range.min}-${range.max}`);
      }
    }
    if (v.bloodPressureDiastolic >= v.bloodPressureSystolic) {
      violate('vital_signs', 'diastolic_below_systolic', v.vitalId, 'Diastolic not below systolic');
    }
  }

  // --- Nursing assessments ---

  for (const n of dataset.nursingAssessments) {
    checkEvent('nursing_assessments', n.assessmentId, n.encounterId, n.assessmentDate);
    checkProvider('nursing_assessments', n.assessmentId, n.assessingProviderId);
    if (!inclusive(n.fallRiskScore, FALL_RISK_SCORE_RANGE)) {
      violate('nursing_assessments', 'valid_fall_risk', n.assessmentId, `fall_risk_score=${n.fallRiskScore}`);
    }
    if (n.fallRiskLevel !== fallRiskLevelFor(n.fallRiskScore)) {
      violate('nursing_assessments', 'fall_risk_level_derived', n.assessmentId, 'fall_risk_level disagrees with score');
    }
    if (!inclusive(n.bradenScore, BRADEN_SCORE_RANGE)) {
      violate('nursing_assessments', 'valid_braden', n.assessmentId, `braden_score=${n.bradenScore}`);
    }
  }

  // --- Allergies ---

  checkUnique(
    'allergies',
    'unique_allergen',
    dataset.allergies,
    (a) => `${a.patientId}|${a.allergen}`,
    (a) => a.allergyId,
  );
  for (const a of dataset.allergies) {
    checkProvider('allergies', a.allergyId, a.reportedByProviderId);
    const patient = patientById.get(a.patientId);
    if (!patient) {
      violate('allergies', 'patient_fk', a.allergyId, `Unknown patient ${a.patientId}`);
    } else if (parseDate(a.onsetDate).getTime() < parseDate(patient.dateOfBirth).getTime()) {
      violate('allergies', 'onset_after_birth', a.allergyId, 'onset_date precedes date_of_birth');
    }
  }

  return violations;
}

/** Throws InvariantViolationError when the dataset breaks any invariant. */
export function verifyDataset(dataset: Dataset, referenceDate: Date): void {
  const violations = findViolations(dataset, referenceDate);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations);
  }
}
