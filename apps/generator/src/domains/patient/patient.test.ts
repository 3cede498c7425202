import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../lib/errors.js';
import { RandomStream } from '../../lib/random.js';
import { addDays, ageInYears, parseDate } from '../../lib/time.js';
import {
  REFERENCE_DATE,
  makeConfig,
  makePatient,
  makePatients,
  makeReference,
} from '../../../test/helpers/fixtures.js';
import { createReferenceLookup } from '../reference/reference.lookup.js';
import { generateAllergies } from './allergy.generator.js';
import {
  generatePatients,
  historyWindowStart,
  patientHistoryStart,
} from './patient.generator.js';

const OPTS = {
  patientCount: 60,
  pediatricFraction: 0.1,
  referenceDate: REFERENCE_DATE,
  maxIdentifierRetries: 50,
  historyDays: 730,
};

// ---------------------------------------------------------------------------
// Patients
// ---------------------------------------------------------------------------

describe('generatePatients', () => {
  it('numbers patients from 1 with unique MRNs', () => {
    const patients = generatePatients(OPTS, new RandomStream(5));
    expect(patients.map((p) => p.patientId)).toEqual(Array.from({ length: 60 }, (_, i) => i + 1));
    expect(new Set(patients.map((p) => p.mrn)).size).toBe(60);
    for (const patient of patients) {
      expect(patient.mrn).toMatch(/^MRN\d{7}$/);
      expect(patient.isActive).toBe(true);
    }
  });

  it('is reproducible for a seed', () => {
    expect(generatePatients(OPTS, new RandomStream(5))).toEqual(generatePatients(OPTS, new RandomStream(5)));
  });

  it('registers every patient no earlier than birth and no later than the history window', () => {
    const windowStart = historyWindowStart(REFERENCE_DATE, OPTS.historyDays).getTime();
    for (const patient of generatePatients(OPTS, new RandomStream(6))) {
      const born = parseDate(patient.dateOfBirth).getTime();
      expect(patient.createdAt.getTime()).toBeGreaterThanOrEqual(born);
      expect(patient.createdAt.getTime()).toBeLessThanOrEqual(Math.max(born, windowStart));
    }
  });

  it('draws pediatric ages when the pediatric fraction is 1', () => {
    const patients = generatePatients({ ...OPTS, pediatricFraction: 1 }, new RandomStream(7));
    for (const patient of patients) {
      // Birthdays are stored as dates, so an age can round up by a day.
      expect(ageInYears(patient.dateOfBirth, REFERENCE_DATE)).toBeLessThanOrEqual(18);
    }
  });

  it('draws adult ages when the pediatric fraction is 0', () => {
    const patients = generatePatients({ ...OPTS, pediatricFraction: 0 }, new RandomStream(8));
    for (const patient of patients) {
      expect(ageInYears(patient.dateOfBirth, REFERENCE_DATE)).toBeGreaterThanOrEqual(17);
    }
  });

  it('rejects more patients than the MRN space holds', () => {
    expect(() =>
      generatePatients({ ...OPTS, patientCount: 10_000_001 }, new RandomStream(1)),
    ).toThrow(ConfigurationError);
  });
});

describe('patientHistoryStart', () => {
  it('is the registration time for patients registered after birth', () => {
    const patient = makePatient({ createdAt: new Date('2021-02-03T04:05:06Z') });
    expect(patientHistoryStart(patient).toISOString()).toBe('2021-02-03T04:05:06.000Z');
  });

  it('is the birth date when registration precedes it', () => {
    const patient = makePatient({
      dateOfBirth: '2024-09-10',
      createdAt: new Date('2024-09-01T00:00:00Z'),
    });
    expect(patientHistoryStart(patient).toISOString()).toBe('2024-09-10T00:00:00.000Z');
  });
});

// ---------------------------------------------------------------------------
// Allergies
// ---------------------------------------------------------------------------

describe('generateAllergies', () => {
  const config = makeConfig();
  const lookup = createReferenceLookup(makeReference(config));
  const patients = makePatients(config);

  it('generates nothing at zero prevalence', () => {
    const result = generateAllergies(patients, new RandomStream(1), {
      referenceDate: REFERENCE_DATE,
      allergyPrevalence: 0,
      reporters: lookup.prescribers,
    });
    expect(result).toEqual({ allergies: [], skipped: 0 });
  });

  it('gives allergic patients distinct allergens with onset after birth', () => {
    const adults = [
      makePatient({ patientId: 1, dateOfBirth: '1970-01-01' }),
      makePatient({ patientId: 2, dateOfBirth: '1990-07-04' }),
      makePatient({ patientId: 3, dateOfBirth: '2018-12-25' }),
    ];
    const { allergies, skipped } = generateAllergies(adults, new RandomStream(2), {
      referenceDate: REFERENCE_DATE,
      allergyPrevalence: 1,
      reporters: lookup.prescribers,
    });

    expect(skipped).toBe(0);
    expect(allergies.map((a) => a.allergyId)).toEqual(allergies.map((_, i) => i + 1));
    const reporterIds = new Set(lookup.prescribers.map((p) => p.providerId));
    for (const patient of adults) {
      const own = allergies.filter((a) => a.patientId === patient.patientId);
      expect(own.length).toBeGreaterThanOrEqual(1);
      expect(own.length).toBeLessThanOrEqual(3);
      expect(new Set(own.map((a) => a.allergen)).size).toBe(own.length);
      for (const allergy of own) {
        expect(parseDate(allergy.onsetDate).getTime()).toBeGreaterThanOrEqual(
          parseDate(patient.dateOfBirth).getTime(),
        );
        expect(allergy.reportedDate.getTime()).toBeLessThanOrEqual(REFERENCE_DATE.getTime());
        expect(reporterIds.has(allergy.reportedByProviderId)).toBe(true);
      }
    }
  });

  it('skips planned allergies of patients born within the last year', () => {
    const newborn = makePatient({ dateOfBirth: '2025-03-01', createdAt: addDays(REFERENCE_DATE, -90) });
    const result = generateAllergies([newborn], new RandomStream(3), {
      referenceDate: REFERENCE_DATE,
      allergyPrevalence: 1,
      reporters: lookup.prescribers,
    });
    expect(result.allergies).toEqual([]);
    expect(result.skipped).toBeGreaterThanOrEqual(1);
    expect(result.skipped).toBeLessThanOrEqual(3);
  });
});
