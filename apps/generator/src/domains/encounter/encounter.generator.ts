// ============================================================================
// Encounter Scheduling — per-patient timeline generation
// ============================================================================

import {
  EncounterType,
  EncounterStatus,
  CHIEF_COMPLAINTS,
  ADMISSION_SOURCES,
  DISCHARGE_DISPOSITION_WEIGHTS,
  TERMINAL_DISPOSITIONS,
  BED_LABELS,
  ENCOUNTER_TYPES,
  type DischargeDisposition,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import type { EncounterConfig } from '@clinical-synth/shared/schemas/generator.schema.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import {
  HOUR_MS,
  SECOND_MS,
  addMs,
  ageInYears,
  maxDate,
  minDate,
} from '../../lib/time.js';
import type { EncounterRecord, PatientRecord } from '../dataset/dataset.types.js';
import { historyWindowStart, patientHistoryStart } from '../patient/patient.generator.js';
import type { ReferenceLookup } from '../reference/reference.lookup.js';
import type { EncounterNumberAllocator } from './encounter.numbers.js';

const PEDIATRIC_MAX_AGE = 17;

const NON_TERMINAL_DISPOSITIONS = DISCHARGE_DISPOSITION_WEIGHTS.filter(
  (d) => !TERMINAL_DISPOSITIONS.includes(d.value),
);

export interface EncounterGenerationContext {
  referenceDate: Date;
  encounters: EncounterConfig;
  lookup: ReferenceLookup;
  numbers: EncounterNumberAllocator;
  ids: IdSequence;
}

interface Stay {
  type: EncounterType;
  admit: Date;
  losMs: number;
  cancelled: boolean;
}

function drawLengthOfStayMs(
  type: EncounterType,
  config: EncounterConfig,
  stream: RandomStream,
): number {
  const range = config.lengthOfStayHours[type];
  const hours = stream.float(range.min, range.max);
  return Math.round((hours * HOUR_MS) / SECOND_MS) * SECOND_MS;
}

/**
 * Generates `count` encounters for one patient, oldest first.
 *
 * Admits are uniform over the patient's history window and sorted; a
 * non-final stay is cut short at the next admit. The final encounter may be
 * Active, in which case its admit moves into the current stay.
 */
export function generatePatientEncounters(
  patient: PatientRecord,
  count: number,
  stream: RandomStream,
  ctx: EncounterGenerationContext,
): EncounterRecord[] {
  if (count <= 0) return [];

  const ref = ctx.referenceDate;
  const config = ctx.encounters;
  const typeWeights = ENCOUNTER_TYPES.map((type) => ({
    value: type,
    weight: config.typeWeights[type],
  })).filter((w) => w.weight > 0);

  const historyStart = maxDate(
    historyWindowStart(ref, config.historyDays),
    patientHistoryStart(patient),
  );
  const latestAdmit = addMs(ref, -SECOND_MS);

  const stays: Stay[] = Array.from({ length: count }, () =>
    stream.dateBetween(historyStart, latestAdmit),
  )
    .sort((a, b) => a.getTime() - b.getTime())
    .map((admit) => {
      const type = stream.weighted(typeWeights);
      return {
        type,
        admit,
        losMs: drawLengthOfStayMs(type, config, stream),
        cancelled: stream.chance(config.cancelledFraction),
      };
    });

  const records: EncounterRecord[] = [];
  let previousEnd = historyStart;

  stays.forEach((stay, index) => {
    const isFinal = index === stays.length - 1;
    let admit = stay.admit;
    let discharge: Date | null = null;
    let status: EncounterStatus = EncounterStatus.DISCHARGED;

    if (stay.cancelled) {
      status = EncounterStatus.CANCELLED;
    } else if (!isFinal) {
      discharge = minDate(addMs(admit, stay.losMs), stays[index + 1].admit);
    } else if (stream.chance(config.activeFraction)) {
      // Currently admitted: the stay is still running at the reference date.
      admit = stream.dateBetween(
        maxDate(previousEnd, addMs(ref, -stay.losMs)),
        latestAdmit,
      );
      status = EncounterStatus.ACTIVE;
    } else {
      const end = addMs(admit, stay.losMs);
      if (end.getTime() > ref.getTime()) {
        status = EncounterStatus.ACTIVE;
      } else {
        discharge = end;
      }
    }

    let disposition: DischargeDisposition | null = null;
    if (status === EncounterStatus.DISCHARGED) {
      disposition = stream.weighted(
        isFinal ? DISCHARGE_DISPOSITION_WEIGHTS : NON_TERMINAL_DISPOSITIONS,
      );
    }

    const pediatric = ageInYears(patient.dateOfBirth, admit) <= PEDIATRIC_MAX_AGE;
    const unit = stream.pick(ctx.lookup.eligibleUnits(stay.type, pediatric));

    records.push({
      encounterId: ctx.ids.next(),
      patientId: patient.patientId,
      encounterNumber: ctx.numbers.next(stay.type),
      encounterType: stay.type,
      admitDate: admit,
      dischargeDate: discharge,
      admittingProviderId: stream.pick(ctx.lookup.prescribers).providerId,
      attendingProviderId: stream.pick(ctx.lookup.prescribers).providerId,
      currentUnitId: unit.unitId,
      roomNumber: String(stream.int(100, 499)),
      bedNumber: stream.pick(BED_LABELS),
      chiefComplaint: stream.pick(CHIEF_COMPLAINTS),
      admissionSource:
        stay.type === EncounterType.EMERGENCY
          ? 'Emergency Department'
          : stream.pick(ADMISSION_SOURCES),
      dischargeDisposition: disposition,
      encounterStatus: status,
      createdAt: admit,
    });

    previousEnd = discharge ?? admit;
  });

  return records;
}
