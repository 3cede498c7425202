import {
  MIN_PULSE_PRESSURE,
  PAIN_SCALE_DRAWS,
  STABLE_VITALS,
  UNSTABLE_VITALS,
  VITALS_INTERVAL_HOURS,
  VITAL_POSITIONS,
} from '@clinical-synth/shared/constants/clinical.constants.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import { HOUR_MS, ageInYears } from '../../lib/time.js';
import type {
  EncounterRecord,
  PatientRecord,
  VitalSignRecord,
} from '../dataset/dataset.types.js';
import type { ReferenceLookup } from '../reference/reference.lookup.js';
import { clamp, computeBmi, oxygenSupportFor, roundTo } from './clinical.derivations.js';
import { cadence, isPlaceable, type EventWindow, type PlacementResult } from './event-window.js';

const DEFAULT_INTERVAL_HOURS = 4;

type VitalParameters = typeof STABLE_VITALS | typeof UNSTABLE_VITALS;

interface GaussianParams {
  mean: number;
  sd: number;
  clamp: { min: number; max: number };
}

function draw(params: GaussianParams, stream: RandomStream): number {
  return clamp(stream.gaussian(params.mean, params.sd), params.clamp.min, params.clamp.max);
}

export interface Anthropometrics {
  weightKg: number;
  heightCm: number;
  bmi: number;
}

/**
 * Weight and height by age: growth-curve approximations under 18, clamped
 * normal draws for adults.
 */
export function drawAnthropometrics(ageYears: number, stream: RandomStream): Anthropometrics {
  let weightKg: number;
  let heightCm: number;
  if (ageYears < 18) {
    heightCm = ageYears === 0 ? 50 : 75 + 6 * ageYears;
    weightKg = ageYears === 0 ? 3.5 : 2 * ageYears + 8;
  } else {
    weightKg = roundTo(clamp(stream.gaussian(75, 15), 45, 180), 2);
    heightCm = roundTo(clamp(stream.gaussian(170, 10), 140, 205), 2);
  }
  return { weightKg, heightCm, bmi: computeBmi(weightKg, heightCm) };
}

export function vitalsIntervalHours(encounter: EncounterRecord, lookup: ReferenceLookup): number {
  const unit = lookup.unitById.get(encounter.currentUnitId);
  return unit ? VITALS_INTERVAL_HOURS[unit.unitType] : DEFAULT_INTERVAL_HOURS;
}

export function generateVitalSigns(
  encounter: EncounterRecord,
  patient: PatientRecord,
  window: EventWindow,
  stream: RandomStream,
  ids: IdSequence,
  opts: { lookup: ReferenceLookup; abnormalFraction: number },
): PlacementResult<VitalSignRecord> {
  if (!isPlaceable(window)) {
    return { records: [], skipped: 1 };
  }

  const stepMs = vitalsIntervalHours(encounter, opts.lookup) * HOUR_MS;
  const records: VitalSignRecord[] = [];

  cadence(window, stepMs).forEach((recordedDate, index) => {
    const params: VitalParameters = stream.chance(opts.abnormalFraction)
      ? UNSTABLE_VITALS
      : STABLE_VITALS;

    const systolic = Math.round(draw(params.bloodPressureSystolic, stream));
    const diastolic = Math.min(
      Math.round(draw(params.bloodPressureDiastolic, stream)),
      systolic - MIN_PULSE_PRESSURE,
    );
    const saturation = Math.round(draw(params.oxygenSaturation, stream));
    const oxygen = oxygenSupportFor(saturation);
    const body =
      index === 0
        ? drawAnthropometrics(ageInYears(patient.dateOfBirth, window.start), stream)
        : null;

    records.push({
      vitalId: ids.next(),
      encounterId: encounter.encounterId,
      temperatureF: roundTo(draw(params.temperatureF, stream), 1),
      heartRate: Math.round(draw(params.heartRate, stream)),
      respiratoryRate: Math.round(draw(params.respiratoryRate, stream)),
      bloodPressureSystolic: systolic,
      bloodPressureDiastolic: diastolic,
      oxygenSaturation: saturation,
      painScale: stream.pick(PAIN_SCALE_DRAWS),
      weightKg: body?.weightKg ?? null,
      heightCm: body?.heightCm ?? null,
      bmi: body?.bmi ?? null,
      position: stream.pick(VITAL_POSITIONS),
      oxygenDelivery: oxygen.delivery,
      oxygenFlowRate: oxygen.flowRate,
      recordedDate,
      recordedByProviderId: stream.pick(opts.lookup.nurses).providerId,
    });
  });

  return { records, skipped: 0 };
}
