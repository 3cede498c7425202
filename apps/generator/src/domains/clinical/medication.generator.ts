import {
  AdminStatus,
  AS_NEEDED_DOSES_PER_DAY,
  DOSES_PER_DAY,
  MEDICATION_FREQUENCIES,
  MEDICATIONS_PER_ENCOUNTER,
  MISSED_ADMIN_STATUSES,
  ORDERED_DOSES,
} from '@clinical-synth/shared/constants/clinical.constants.js';
import {
  INJECTION_ROUTES,
  INJECTION_SITES,
} from '@clinical-synth/shared/constants/reference.constants.js';
import type { IdSequence } from '../../lib/id-sequence.js';
import type { RandomStream } from '../../lib/random.js';
import { DAY_MS, HOUR_MS, addMs, minDate } from '../../lib/time.js';
import type {
  EncounterRecord,
  MedicationAdministrationRecord,
  MedicationRecord,
} from '../dataset/dataset.types.js';
import type { ReferenceLookup } from '../reference/reference.lookup.js';
import { holdReasonFor } from './clinical.derivations.js';
import { cadence, isPlaceable, type EventWindow, type PlacementResult } from './event-window.js';

/** Scheduled or as-needed administration times for one order. */
function administrationTimes(
  perDay: number | null,
  window: EventWindow,
  stream: RandomStream,
): Date[] {
  if (perDay !== null) {
    return cadence(window, (24 / perDay) * HOUR_MS);
  }

  const times: Date[] = [];
  for (let dayStart = window.start; dayStart.getTime() <= window.end.getTime(); dayStart = addMs(dayStart, DAY_MS)) {
    const dayEnd = minDate(addMs(dayStart, DAY_MS), window.end);
    const doses = stream.int(AS_NEEDED_DOSES_PER_DAY.min, AS_NEEDED_DOSES_PER_DAY.max);
    for (let i = 0; i < doses; i++) {
      times.push(stream.dateBetween(dayStart, dayEnd));
    }
  }
  return times.sort((a, b) => a.getTime() - b.getTime());
}

export function generateMedicationAdministrations(
  encounter: EncounterRecord,
  window: EventWindow,
  stream: RandomStream,
  ids: IdSequence,
  opts: { lookup: ReferenceLookup; missedDoseFraction: number },
): PlacementResult<MedicationAdministrationRecord> {
  const orderCount = stream.int(
    MEDICATIONS_PER_ENCOUNTER.min,
    Math.min(MEDICATIONS_PER_ENCOUNTER.max, opts.lookup.medications.length),
  );
  if (!isPlaceable(window)) {
    return { records: [], skipped: orderCount };
  }

  const records: MedicationAdministrationRecord[] = [];
  const orders: readonly MedicationRecord[] = stream.sample(opts.lookup.medications, orderCount);

  for (const medication of orders) {
    const frequency = stream.pick(MEDICATION_FREQUENCIES);
    const { dose, unit } = stream.pick(ORDERED_DOSES);
    const route = medication.defaultRoute;

    for (const adminDate of administrationTimes(DOSES_PER_DAY[frequency], window, stream)) {
      const status = stream.chance(opts.missedDoseFraction)
        ? stream.pick(MISSED_ADMIN_STATUSES)
        : AdminStatus.GIVEN;
      const given = status === AdminStatus.GIVEN;

      records.push({
        adminId: ids.next(),
        encounterId: encounter.encounterId,
        medicationId: medication.medicationId,
        orderedDose: dose,
        orderedUnit: unit,
        orderedRoute: route,
        orderedFrequency: frequency,
        adminDate,
        adminDose: given ? dose : null,
        adminUnit: given ? unit : null,
        adminRoute: given ? route : null,
        adminSite: given && INJECTION_ROUTES.includes(route) ? stream.pick(INJECTION_SITES) : null,
        orderingProviderId: encounter.attendingProviderId,
        administeringProviderId: stream.pick(opts.lookup.nurses).providerId,
        adminStatus: status,
        holdReason: holdReasonFor(status),
        createdAt: adminDate,
      });
    }
  }

  return { records, skipped: 0 };
}
