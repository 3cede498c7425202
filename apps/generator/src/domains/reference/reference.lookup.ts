import {
  PRESCRIBER_TITLES,
  NURSING_TITLES,
} from '@clinical-synth/shared/constants/provider.constants.js';
import { UnitPopulation } from '@clinical-synth/shared/constants/reference.constants.js';
import type { EncounterType } from '@clinical-synth/shared/constants/encounter.constants.js';
import { ConfigurationError } from '../../lib/errors.js';
import type {
  MedicationRecord,
  ProviderRecord,
  ReferenceData,
  UnitRecord,
} from '../dataset/dataset.types.js';

export interface ReferenceLookup {
  prescribers: readonly ProviderRecord[];
  nurses: readonly ProviderRecord[];
  medications: readonly MedicationRecord[];
  medicationById: ReadonlyMap<number, MedicationRecord>;
  unitById: ReadonlyMap<number, UnitRecord>;
  /** Units that accept the encounter type for an adult or pediatric patient. */
  eligibleUnits(type: EncounterType, pediatric: boolean): readonly UnitRecord[];
}

/**
 * Indexes reference data for the role and eligibility queries the event
 * generators make. Throws when a role has no candidate.
 */
export function createReferenceLookup(reference: ReferenceData): ReferenceLookup {
  const prescribers = reference.providers.filter((p) =>
    PRESCRIBER_TITLES.includes(p.title),
  );
  const nurses = reference.providers.filter((p) =>
    NURSING_TITLES.includes(p.title),
  );
  if (prescribers.length === 0 || nurses.length === 0) {
    throw new ConfigurationError(
      'Reference data needs at least one prescriber and one nurse',
      { prescribers: prescribers.length, nurses: nurses.length },
    );
  }
  if (reference.medications.length === 0) {
    throw new ConfigurationError('Reference data has no medications');
  }

  const cache = new Map<string, readonly UnitRecord[]>();

  function eligibleUnits(type: EncounterType, pediatric: boolean): readonly UnitRecord[] {
    const key = `${type}|${pediatric}`;
    const cached = cache.get(key);
    if (cached) return cached;

    const wanted = pediatric ? UnitPopulation.PEDIATRIC : UnitPopulation.ADULT;
    const matching = reference.units.filter(
      (u) =>
        u.encounterTypes.includes(type) &&
        (u.population === UnitPopulation.ALL || u.population === wanted),
    );
    if (matching.length === 0) {
      throw new ConfigurationError(
        `No unit accepts ${pediatric ? 'pediatric' : 'adult'} ${type} encounters`,
      );
    }
    cache.set(key, matching);
    return matching;
  }

  return {
    prescribers,
    nurses,
    medications: reference.medications,
    medicationById: new Map(reference.medications.map((m) => [m.medicationId, m])),
    unitById: new Map(reference.units.map((u) => [u.unitId, u])),
    eligibleUnits,
  };
}
