// ============================================================================
// Parallel Orchestrator — merge
// ============================================================================

import { DischargeDisposition } from '@clinical-synth/shared/constants/encounter.constants.js';
import { InvariantViolationError, type InvariantViolation } from '../../lib/errors.js';
import {
  EVENT_ENTITIES,
  emptySkipCounters,
  type Dataset,
  type EncounterRecord,
  type PatientRecord,
  type ReferenceData,
} from '../dataset/dataset.types.js';
import type { EncounterEvents } from '../dataset/dataset.types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Patients whose final encounter ended in death. */
function expiredPatientIds(encounters: readonly EncounterRecord[]): Set<number> {
  const latest = new Map<number, EncounterRecord>();
  for (const encounter of encounters) {
    const current = latest.get(encounter.patientId);
    if (!current || encounter.admitDate.getTime() >= current.admitDate.getTime()) {
      latest.set(encounter.patientId, encounter);
    }
  }

  const expired = new Set<number>();
  for (const [patientId, encounter] of latest) {
    if (encounter.dischargeDisposition === DischargeDisposition.EXPIRED) {
      expired.add(patientId);
    }
  }
  return expired;
}

function encounterNumberCollisions(encounters: readonly EncounterRecord[]): InvariantViolation[] {
  const seen = new Set<string>();
  const violations: InvariantViolation[] = [];
  for (const encounter of encounters) {
    if (seen.has(encounter.encounterNumber)) {
      violations.push({
        entity: 'encounters',
        rule: 'unique_encounter_number',
        recordId: encounter.encounterId,
        message: `Duplicate encounter number ${encounter.encounterNumber}`,
      });
    }
    seen.add(encounter.encounterNumber);
  }
  return violations;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Concatenates partition outputs in partition order. Partition ids are local
 * (each starts at 1), so every id is shifted by the running total of the
 * partitions before it and encounter references are shifted with them.
 */
export function mergePartitions(
  reference: ReferenceData,
  patients: readonly PatientRecord[],
  partitions: readonly EncounterEvents[],
): Dataset {
  const merged: Dataset = {
    reference,
    patients: [],
    encounters: [],
    diagnoses: [],
    medicationAdministrations: [],
    labResults: [],
    vitalSigns: [],
    nursingAssessments: [],
    allergies: [],
    skipped: emptySkipCounters(),
  };

  for (const part of partitions) {
    const encounterOffset = merged.encounters.length;
    const diagnosisOffset = merged.diagnoses.length;
    const adminOffset = merged.medicationAdministrations.length;
    const labOffset = merged.labResults.length;
    const vitalOffset = merged.vitalSigns.length;
    const assessmentOffset = merged.nursingAssessments.length;
    const allergyOffset = merged.allergies.length;

    for (const e of part.encounters) {
      merged.encounters.push({ ...e, encounterId: e.encounterId + encounterOffset });
    }
    for (const d of part.diagnoses) {
      merged.diagnoses.push({
        ...d,
        diagnosisId: d.diagnosisId + diagnosisOffset,
        encounterId: d.encounterId + encounterOffset,
      });
    }
    for (const m of part.medicationAdministrations) {
      merged.medicationAdministrations.push({
        ...m,
        adminId: m.adminId + adminOffset,
        encounterId: m.encounterId + encounterOffset,
      });
    }
    for (const l of part.labResults) {
      merged.labResults.push({
        ...l,
        labId: l.labId + labOffset,
        encounterId: l.encounterId + encounterOffset,
      });
    }
    for (const v of part.vitalSigns) {
      merged.vitalSigns.push({
        ...v,
        vitalId: v.vitalId + vitalOffset,
        encounterId: v.encounterId + encounterOffset,
      });
    }
    for (const n of part.nursingAssessments) {
      merged.nursingAssessments.push({
        ...n,
        assessmentId: n.assessmentId + assessmentOffset,
        encounterId: n.encounterId + encounterOffset,
      });
    }
    for (const a of part.allergies) {
      merged.allergies.push({ ...a, allergyId: a.allergyId + allergyOffset });
    }
    for (const entity of EVENT_ENTITIES) {
      merged.skipped[entity] += part.skipped[entity];
    }
  }

  const collisions = encounterNumberCollisions(merged.encounters);
  if (collisions.length > 0) {
    throw new InvariantViolationError(collisions);
  }

  const expired = expiredPatientIds(merged.encounters);
  merged.patients = patients.map((p) =>
    expired.has(p.patientId) ? { ...p, isActive: false } : { ...p },
  );

  return merged;
}
