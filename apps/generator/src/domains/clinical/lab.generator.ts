import {
  ABNORMAL_HIGH_SPAN,
  ABNORMAL_LOW_SPAN,
  CBC_EVERY_DAYS,
  LAB_CATALOGUE,
  LabPanel,
  ResultStatus,
  type LabTestDefinition,
} from '@clinical-synth/shared/constants/clinical.constants.js';
import { EncounterType } from '@clinical-synth/shared/constants/encounter.constants.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import { DAY_MS, HOUR_MS, addMs, minDate } from '../../lib/time.js';
import type { EncounterRecord, LabResultRecord } from '../dataset/dataset.types.js';
import { classifyLabValue, roundTo } from './clinical.derivations.js';
import { isPlaceable, type EventWindow, type PlacementResult } from './event-window.js';

export const LAB_ENCOUNTER_TYPES: readonly EncounterType[] = [
  EncounterType.INPATIENT,
  EncounterType.EMERGENCY,
];

const BASIC_METABOLIC_PANEL = LAB_CATALOGUE.filter((t) => t.panel === LabPanel.BMP);
const COMPLETE_BLOOD_COUNT = LAB_CATALOGUE.filter((t) => t.panel === LabPanel.CBC);

/** Tests drawn on the first day of a stay. */
export const FIRST_DAY_LAB_COUNT = BASIC_METABOLIC_PANEL.length + COMPLETE_BLOOD_COUNT.length;

/** Collection happens within the first hour of each day of the stay. */
const COLLECTION_SPREAD_MS = HOUR_MS;

/**
 * Draws a result value: inside the reference range, or with probability
 * `abnormalFraction` just outside it (up to 30% beyond either limit).
 */
export function drawLabValue(
  test: LabTestDefinition,
  abnormalFraction: number,
  stream: RandomStream,
): number {
  const { referenceLow: low, referenceHigh: high } = test;
  let value: number;
  if (stream.chance(abnormalFraction)) {
    value = low > 0 && stream.chance(0.5)
      ? stream.float(low * ABNORMAL_LOW_SPAN, low)
      : stream.float(high, high * ABNORMAL_HIGH_SPAN);
  } else {
    value = stream.float(low, high);
  }
  return roundTo(value, 2);
}

export function generateLabResults(
  encounter: EncounterRecord,
  window: EventWindow,
  stream: RandomStream,
  ids: IdSequence,
  opts: { referenceDate: Date; abnormalFraction: number },
): PlacementResult<LabResultRecord> {
  if (!LAB_ENCOUNTER_TYPES.includes(encounter.encounterType)) {
    return { records: [], skipped: 0 };
  }
  if (!isPlaceable(window)) {
    return { records: [], skipped: FIRST_DAY_LAB_COUNT };
  }

  const records: LabResultRecord[] = [];

  for (
    let day = 0, dayStart = window.start;
    dayStart.getTime() <= window.end.getTime();
    day++, dayStart = addMs(dayStart, DAY_MS)
  ) {
    const collected = stream.dateBetween(
      dayStart,
      minDate(addMs(dayStart, COLLECTION_SPREAD_MS), window.end),
    );
    const tests =
      day % CBC_EVERY_DAYS === 0
        ? [...BASIC_METABOLIC_PANEL, ...COMPLETE_BLOOD_COUNT]
        : BASIC_METABOLIC_PANEL;

    for (const test of tests) {
      const value = drawLabValue(test, opts.abnormalFraction, stream);
      const resulted = addMs(collected, test.turnaroundHours * HOUR_MS);
      const pending = resulted.getTime() > opts.referenceDate.getTime();

      records.push({
        labId: ids.next(),
        encounterId: encounter.encounterId,
        loincCode: test.loincCode,
        testName: test.testName,
        testCategory: test.testCategory,
        resultValue: value,
        resultUnit: test.unit,
        resultStatus: pending ? ResultStatus.PRELIMINARY : ResultStatus.FINAL,
        abnormalFlag: classifyLabValue(value, test.referenceLow, test.referenceHigh),
        referenceRangeLow: test.referenceLow,
        referenceRangeHigh: test.referenceHigh,
        collectedDate: collected,
        resultedDate: pending ? null : resulted,
        orderingProviderId: encounter.attendingProviderId,
        createdAt: collected,
      });
    }
  }

  return { records, skipped: 0 };
}
