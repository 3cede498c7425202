// ============================================================================
// Patient Registry — Patient Generation
// ============================================================================

import {
  Sex,
  MRN_PREFIX,
  MRN_DIGITS,
  PEDIATRIC_AGE_RANGE,
  ADULT_AGE_RANGE,
  REGISTRATION_LEAD_DAYS,
  RACES,
  ETHNICITIES,
  PRIMARY_LANGUAGES,
  EMERGENCY_CONTACT_RELATIONSHIPS,
  INSURANCE_PROVIDERS,
} from '@clinical-synth/shared/constants/patient.constants.js';
import { ConfigurationError, UniquenessExhaustedError } from '../../lib/errors.js';
import type { RandomStream } from '../../lib/random.js';
import { addDays, formatDate, maxDate, parseDate } from '../../lib/time.js';
import type { PatientRecord, RunConfig } from '../dataset/dataset.types.js';

const MRN_SPACE = 10 ** MRN_DIGITS;

const SEX_WEIGHTS: ReadonlyArray<{ value: Sex; weight: number }> = [
  { value: Sex.MALE, weight: 49 },
  { value: Sex.FEMALE, weight: 49 },
  { value: Sex.OTHER, weight: 2 },
];

const FAKER_SEX: Record<Sex, 'male' | 'female' | undefined> = {
  [Sex.MALE]: 'male',
  [Sex.FEMALE]: 'female',
  [Sex.OTHER]: undefined,
};

export type PatientGenerationOptions = Pick<
  RunConfig,
  | 'patientCount'
  | 'pediatricFraction'
  | 'referenceDate'
  | 'maxIdentifierRetries'
> & { historyDays: number };

/** Start of the encounter history window. */
export function historyWindowStart(referenceDate: Date, historyDays: number): Date {
  return addDays(referenceDate, -historyDays);
}

/**
 * Earliest instant at which a patient may have an encounter: registration,
 * which is never before birth.
 */
export function patientHistoryStart(patient: PatientRecord): Date {
  return maxDate(patient.createdAt, parseDate(patient.dateOfBirth));
}

export function generatePatients(
  opts: PatientGenerationOptions,
  stream: RandomStream,
): PatientRecord[] {
  if (opts.patientCount > MRN_SPACE) {
    throw new ConfigurationError(
      `patientCount exceeds the ${MRN_SPACE} available MRNs`,
      { patientCount: opts.patientCount },
    );
  }

  const windowStart = historyWindowStart(opts.referenceDate, opts.historyDays);
  const usedMrns = new Set<string>();
  const patients: PatientRecord[] = [];

  for (let i = 0; i < opts.patientCount; i++) {
    let mrn = '';
    let attempts = 0;
    do {
      if (attempts >= opts.maxIdentifierRetries) {
        throw new UniquenessExhaustedError('patient MRN', attempts);
      }
      mrn = `${MRN_PREFIX}${stream.digits(MRN_DIGITS)}`;
      attempts++;
    } while (usedMrns.has(mrn));
    usedMrns.add(mrn);

    const sex = stream.weighted(SEX_WEIGHTS);
    const ages = stream.chance(opts.pediatricFraction)
      ? PEDIATRIC_AGE_RANGE
      : ADULT_AGE_RANGE;
    const dateOfBirth = formatDate(
      stream.faker.date.birthdate({
        mode: 'age',
        min: ages.min,
        max: ages.max,
        refDate: opts.referenceDate,
      }),
    );
    const born = parseDate(dateOfBirth);

    // Registered before the history window, or at birth for patients born inside it.
    const createdAt = stream.dateBetween(
      maxDate(born, addDays(windowStart, -REGISTRATION_LEAD_DAYS)),
      maxDate(born, windowStart),
    );

    const firstName = stream.faker.person.firstName(FAKER_SEX[sex]);
    const lastName = stream.faker.person.lastName();

    patients.push({
      patientId: i + 1,
      mrn,
      firstName,
      lastName,
      middleName: stream.chance(0.4)
        ? stream.faker.person.middleName(FAKER_SEX[sex])
        : null,
      dateOfBirth,
      sex,
      race: stream.pick(RACES),
      ethnicity: stream.pick(ETHNICITIES),
      primaryLanguage: stream.pick(PRIMARY_LANGUAGES),
      ssnLast4: stream.digits(4),
      streetAddress: stream.faker.location.streetAddress(),
      city: stream.faker.location.city(),
      state: stream.faker.location.state({ abbreviated: true }),
      zipCode: stream.faker.location.zipCode('#####'),
      phonePrimary: stream.faker.phone.number({ style: 'national' }),
      phoneSecondary: stream.chance(0.3)
        ? stream.faker.phone.number({ style: 'national' })
        : null,
      email: stream.faker.internet
        .email({ firstName, lastName, provider: 'mail.example' })
        .toLowerCase(),
      emergencyContactName: stream.faker.person.fullName(),
      emergencyContactRelationship: stream.pick(EMERGENCY_CONTACT_RELATIONSHIPS),
      emergencyContactPhone: stream.faker.phone.number({ style: 'national' }),
      insuranceProvider: stream.pick(INSURANCE_PROVIDERS),
      insurancePolicyNumber: `${stream.faker.string.alpha({ length: 3, casing: 'upper' })}${stream.digits(9)}`,
      createdAt,
      isActive: true,
    });
  }

  return patients;
}
