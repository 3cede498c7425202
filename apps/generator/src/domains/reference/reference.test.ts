import { describe, it, expect } from 'vitest';
import {
  NURSING_TITLES,
  PRESCRIBER_TITLES,
  ProviderTitle,
} from '@clinical-synth/shared/constants/provider.constants.js';
import {
  CORE_FORMULARY,
  UNIT_CATALOGUE,
  UnitPopulation,
} from '@clinical-synth/shared/constants/reference.constants.js';
import { EncounterType } from '@clinical-synth/shared/constants/encounter.constants.js';
import { validateNpi } from '@clinical-synth/shared/utils/npi.utils.js';
import { ConfigurationError } from '../../lib/errors.js';
import { RandomStream } from '../../lib/random.js';
import { addDays, parseDate } from '../../lib/time.js';
import { REFERENCE_DATE, makeConfig, makeReference } from '../../../test/helpers/fixtures.js';
import {
  generateMedications,
  generateProviders,
  generateReferenceData,
  generateUnits,
} from './reference.generator.js';
import { createReferenceLookup } from './reference.lookup.js';

const PROVIDER_OPTS = { referenceDate: REFERENCE_DATE, maxIdentifierRetries: 50 };

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

describe('generateProviders', () => {
  it('numbers providers from 1 and fills the MD and RN seats first', () => {
    const providers = generateProviders(25, new RandomStream(1), PROVIDER_OPTS);
    expect(providers.map((p) => p.providerId)).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
    expect(providers[0].title).toBe(ProviderTitle.MD);
    expect(providers[1].title).toBe(ProviderTitle.RN);
  });

  it('issues unique, Luhn-valid NPIs', () => {
    const providers = generateProviders(200, new RandomStream(2), PROVIDER_OPTS);
    expect(new Set(providers.map((p) => p.npi)).size).toBe(200);
    for (const provider of providers) {
      expect(validateNpi(provider.npi).valid).toBe(true);
    }
  });

  it('gives nurses and pharmacists their own specialties', () => {
    const providers = generateProviders(100, new RandomStream(3), PROVIDER_OPTS);
    for (const provider of providers) {
      if (provider.title === ProviderTitle.RN) expect(provider.specialty).toBe('Nursing');
      if (provider.title === ProviderTitle.PHARMD) expect(provider.specialty).toBe('Pharmacy');
    }
  });

  it('hires every provider at least 30 days before the reference date', () => {
    const latest = addDays(REFERENCE_DATE, -30).getTime();
    for (const provider of generateProviders(50, new RandomStream(4), PROVIDER_OPTS)) {
      expect(parseDate(provider.hireDate).getTime()).toBeLessThanOrEqual(latest);
    }
  });

  it('rejects a directory too small for both roles', () => {
    expect(() => generateProviders(1, new RandomStream(1), PROVIDER_OPTS)).toThrow(ConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// Units
// ---------------------------------------------------------------------------

describe('generateUnits', () => {
  it('builds one unit per catalogue entry with unique codes', () => {
    const units = generateUnits(new RandomStream(1));
    expect(units).toHaveLength(UNIT_CATALOGUE.length);
    expect(new Set(units.map((u) => u.unitCode)).size).toBe(UNIT_CATALOGUE.length);
    expect(units[0]).toMatchObject({ unitId: 1, unitCode: 'ICU', totalBeds: 20, isActive: true });
  });
});

// ---------------------------------------------------------------------------
// Medications
// ---------------------------------------------------------------------------

describe('generateMedications', () => {
  it('starts with the core formulary and tops up with unique synthetic entries', () => {
    const medications = generateMedications(60, new RandomStream(1), { maxIdentifierRetries: 50 });
    expect(medications).toHaveLength(60);
    expect(medications.slice(0, CORE_FORMULARY.length).map((m) => m.medicationName)).toEqual(
      CORE_FORMULARY.map((m) => m.medicationName),
    );
    const keys = medications.map((m) => `${m.medicationName}|${m.genericName}`);
    expect(new Set(keys).size).toBe(60);
  });

  it('rejects a count smaller than the core formulary', () => {
    expect(() =>
      generateMedications(CORE_FORMULARY.length - 1, new RandomStream(1), { maxIdentifierRetries: 50 }),
    ).toThrow(ConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// Reference data set
// ---------------------------------------------------------------------------

describe('generateReferenceData', () => {
  it('is reproducible for a seed', () => {
    const config = makeConfig();
    expect(makeReference(config)).toEqual(makeReference(config));
  });

  it('keeps providers unchanged when only the medication count changes', () => {
    const small = generateReferenceData(makeConfig({ medicationCount: 25 }), new RandomStream(9));
    const large = generateReferenceData(makeConfig({ medicationCount: 80 }), new RandomStream(9));
    expect(large.providers).toEqual(small.providers);
    expect(large.units).toEqual(small.units);
    expect(large.medications.slice(0, 25)).toEqual(small.medications);
  });
});

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

describe('createReferenceLookup', () => {
  const reference = makeReference(makeConfig());
  const lookup = createReferenceLookup(reference);

  it('splits providers into prescribers and nurses', () => {
    expect(lookup.prescribers.length).toBeGreaterThan(0);
    expect(lookup.nurses.length).toBeGreaterThan(0);
    expect(lookup.prescribers.every((p) => PRESCRIBER_TITLES.includes(p.title))).toBe(true);
    expect(lookup.nurses.every((p) => NURSING_TITLES.includes(p.title))).toBe(true);
  });

  it('routes emergency encounters to the emergency department', () => {
    expect(lookup.eligibleUnits(EncounterType.EMERGENCY, false).map((u) => u.unitCode)).toEqual(['ED']);
  });

  it('keeps pediatric patients out of adult-only units', () => {
    const units = lookup.eligibleUnits(EncounterType.INPATIENT, true);
    expect(units.map((u) => u.unitCode)).toEqual(['NICU', 'PEDS']);
    expect(units.every((u) => u.population !== UnitPopulation.ADULT)).toBe(true);
  });

  it('throws when no nurse is available', () => {
    const withoutNurses = {
      ...reference,
      providers: reference.providers.filter((p) => p.title !== ProviderTitle.RN),
    };
    expect(() => createReferenceLookup(withoutNurses)).toThrow(ConfigurationError);
  });
});
