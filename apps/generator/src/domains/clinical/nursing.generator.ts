import {
  ActivityLevel,
  AssessmentType,
  ASSISTIVE_DEVICES,
  BRADEN_BY_ACTIVITY,
  CONSCIOUSNESS_WEIGHTS,
  ConsciousnessLevel,
  FallRiskLevel,
  ORIENTATIONS,
  PRESSURE_ULCER_BRADEN_MAX,
  SHIFT_ASSESSMENT_INTERVAL_HOURS,
  SHIFT_NOTE_STATES,
} from '@clinical-synth/shared/constants/clinical.constants.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import { HOUR_MS } from '../../lib/time.js';
import type {
  EncounterRecord,
  NursingAssessmentRecord,
} from '../dataset/dataset.types.js';
import type { ReferenceLookup } from '../reference/reference.lookup.js';
import {
  computeFallRiskScore,
  fallRiskLevelFor,
  skinIntegrityFor,
  type AmbulatoryAid,
  type GaitQuality,
} from './clinical.derivations.js';
import { cadence, isPlaceable, type EventWindow, type PlacementResult } from './event-window.js';

const ACTIVITY_LEVELS = Object.values(ActivityLevel);

const AID_WEIGHTS: ReadonlyArray<{ value: AmbulatoryAid; weight: number }> = [
  { value: 'none', weight: 6 },
  { value: 'device', weight: 3 },
  { value: 'furniture', weight: 1 },
];

const GAIT_WEIGHTS: ReadonlyArray<{ value: GaitQuality; weight: number }> = [
  { value: 'normal', weight: 6 },
  { value: 'weak', weight: 3 },
  { value: 'impaired', weight: 1 },
];

const FALL_HISTORY_PROBABILITY = 0.2;
const PRESSURE_ULCER_PROBABILITY = 0.3;
const RESTRAINT_PROBABILITY = 0.02;

/** Encounter facts that feed the fall-risk factors. */
export interface NursingContext {
  hasSecondaryDiagnosis: boolean;
  hasIvAccess: boolean;
}

export function generateNursingAssessments(
  encounter: EncounterRecord,
  window: EventWindow,
  stream: RandomStream,
  ids: IdSequence,
  opts: { lookup: ReferenceLookup; context: NursingContext },
): PlacementResult<NursingAssessmentRecord> {
  if (!isPlaceable(window)) {
    return { records: [], skipped: 1 };
  }

  const fallHistory = stream.chance(FALL_HISTORY_PROBABILITY);
  const records: NursingAssessmentRecord[] = [];

  cadence(window, SHIFT_ASSESSMENT_INTERVAL_HOURS * HOUR_MS).forEach((assessmentDate, index) => {
    const assessmentType = index === 0 ? AssessmentType.ADMISSION : AssessmentType.SHIFT;
    const consciousness = stream.weighted(CONSCIOUSNESS_WEIGHTS);
    const alert = consciousness === ConsciousnessLevel.ALERT;
    const ambulatoryAid = stream.weighted(AID_WEIGHTS);
    const gait = stream.weighted(GAIT_WEIGHTS);

    const fallRiskScore = computeFallRiskScore({
      fallHistory,
      secondaryDiagnosis: opts.context.hasSecondaryDiagnosis,
      ambulatoryAid,
      ivAccess: opts.context.hasIvAccess,
      gait,
      impairedMentalStatus: !alert,
    });
    const fallRiskLevel = fallRiskLevelFor(fallRiskScore);

    const activityLevel = stream.pick(ACTIVITY_LEVELS);
    const bradenRange = BRADEN_BY_ACTIVITY[activityLevel];
    const bradenScore = stream.int(bradenRange.min, bradenRange.max);
    const pressureUlcerPresent =
      bradenScore <= PRESSURE_ULCER_BRADEN_MAX && stream.chance(PRESSURE_ULCER_PROBABILITY);

    records.push({
      assessmentId: ids.next(),
      encounterId: encounter.encounterId,
      assessmentDate,
      assessmentType,
      levelOfConsciousness: consciousness,
      orientation: alert ? ORIENTATIONS[0] : stream.pick(ORIENTATIONS.slice(1)),
      fallRiskScore,
      fallRiskLevel,
      bedAlarmOn: fallRiskLevel === FallRiskLevel.HIGH,
      restraintsInUse: stream.chance(RESTRAINT_PROBABILITY),
      skinIntegrity: skinIntegrityFor(pressureUlcerPresent),
      pressureUlcerPresent,
      bradenScore,
      activityLevel,
      gaitSteady: gait === 'normal',
      assistiveDevice: ambulatoryAid === 'device' ? stream.pick(ASSISTIVE_DEVICES) : null,
      assessmentNotes: `${assessmentType} assessment: patient ${stream.pick(SHIFT_NOTE_STATES)}`,
      assessingProviderId: stream.pick(opts.lookup.nurses).providerId,
      createdAt: assessmentDate,
    });
  });

  return { records, skipped: 0 };
}
