// ============================================================================
// Reference Data — Providers, Units, Medications
// ============================================================================

import {
  ProviderTitle,
  PROVIDER_TITLE_WEIGHTS,
  MIN_PROVIDER_COUNT,
  SPECIALTIES,
  DEPARTMENTS,
  NPI_BODY_MIN,
  NPI_BODY_MAX,
} from '@clinical-synth/shared/constants/provider.constants.js';
import {
  UNIT_CATALOGUE,
  UNIT_FLOORS,
  UNIT_BUILDINGS,
  MedicationRoute,
  CORE_FORMULARY,
  SYNTHETIC_MEDICATION_SUFFIXES,
  SYNTHETIC_BRAND_SUFFIXES,
  SYNTHETIC_MEDICATION_CLASSES,
} from '@clinical-synth/shared/constants/reference.constants.js';
import { buildNpi } from '@clinical-synth/shared/utils/npi.utils.js';
import { ConfigurationError, UniquenessExhaustedError } from '../../lib/errors.js';
import type { RandomStream } from '../../lib/random.js';
import { addDays, formatDate, YEAR_MS, addMs } from '../../lib/time.js';
import type {
  MedicationRecord,
  ProviderRecord,
  ReferenceData,
  RunConfig,
  UnitRecord,
} from '../dataset/dataset.types.js';

// Sub-stream salts: each table draws from its own stream so that changing one
// count leaves the others untouched.
const PROVIDER_STREAM = 1;
const UNIT_STREAM = 2;
const MEDICATION_STREAM = 3;

const NPI_BODY_SPACE = NPI_BODY_MAX - NPI_BODY_MIN + 1;
const PROVIDER_EMAIL_DOMAIN = 'hospital.example';

const CLINICIAN_SPECIALTIES = SPECIALTIES.filter(
  (s) => s !== 'Nursing' && s !== 'Pharmacy',
);

const SYNTHETIC_ROUTES = [
  MedicationRoute.PO,
  MedicationRoute.IV,
  MedicationRoute.IM,
  MedicationRoute.SUBQ,
  MedicationRoute.TOPICAL,
] as const;

const FORMS_BY_ROUTE: Record<MedicationRoute, readonly string[]> = {
  [MedicationRoute.PO]: ['tablet', 'capsule', 'solution'],
  [MedicationRoute.IV]: ['injection'],
  [MedicationRoute.IM]: ['injection'],
  [MedicationRoute.SUBQ]: ['injection'],
  [MedicationRoute.TOPICAL]: ['cream'],
  [MedicationRoute.PR]: ['suppository'],
  [MedicationRoute.SL]: ['tablet'],
};

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export function generateProviders(
  count: number,
  stream: RandomStream,
  opts: { referenceDate: Date; maxIdentifierRetries: number },
): ProviderRecord[] {
  if (count < MIN_PROVIDER_COUNT) {
    throw new ConfigurationError(
      `providerCount must be at least ${MIN_PROVIDER_COUNT}`,
      { providerCount: count },
    );
  }
  if (count > NPI_BODY_SPACE) {
    throw new ConfigurationError(
      `providerCount exceeds the ${NPI_BODY_SPACE} available NPI bodies`,
      { providerCount: count },
    );
  }

  const usedNpis = new Set<string>();
  const providers: ProviderRecord[] = [];

  for (let i = 0; i < count; i++) {
    // Seat 1 is a prescriber and seat 2 a nurse so every role has a candidate.
    const title =
      i === 0
        ? ProviderTitle.MD
        : i === 1
          ? ProviderTitle.RN
          : stream.weighted(PROVIDER_TITLE_WEIGHTS);

    let npi = '';
    let attempts = 0;
    do {
      if (attempts >= opts.maxIdentifierRetries) {
        throw new UniquenessExhaustedError('provider NPI', attempts);
      }
      npi = buildNpi(String(stream.int(NPI_BODY_MIN, NPI_BODY_MAX)));
      attempts++;
    } while (usedNpis.has(npi));
    usedNpis.add(npi);

    const firstName = stream.faker.person.firstName();
    const lastName = stream.faker.person.lastName();
    const hireDate = stream.dateBetween(
      addMs(opts.referenceDate, -30 * YEAR_MS),
      addDays(opts.referenceDate, -30),
    );

    providers.push({
      providerId: i + 1,
      npi,
      firstName,
      lastName,
      middleName: stream.chance(0.5) ? stream.faker.person.middleName() : null,
      title,
      specialty:
        title === ProviderTitle.RN
          ? 'Nursing'
          : title === ProviderTitle.PHARMD
            ? 'Pharmacy'
            : stream.pick(CLINICIAN_SPECIALTIES),
      department: stream.pick(DEPARTMENTS),
      phone: stream.faker.phone.number({ style: 'national' }),
      email: stream.faker.internet
        .email({ firstName, lastName, provider: PROVIDER_EMAIL_DOMAIN })
        .toLowerCase(),
      pager: stream.chance(0.5) ? stream.digits(7) : null,
      hireDate: formatDate(hireDate),
      isActive: true,
    });
  }

  return providers;
}

// ---------------------------------------------------------------------------
// Units
// ---------------------------------------------------------------------------

export function generateUnits(stream: RandomStream): UnitRecord[] {
  return UNIT_CATALOGUE.map((definition, i) => ({
    unitId: i + 1,
    unitCode: definition.unitCode,
    unitName: definition.unitName,
    unitType: definition.unitType,
    floor: stream.pick(UNIT_FLOORS),
    building: stream.pick(UNIT_BUILDINGS),
    phone: stream.faker.phone.number({ style: 'national' }),
    totalBeds: definition.totalBeds,
    isActive: true,
    population: definition.population,
    encounterTypes: definition.encounterTypes,
  }));
}

// ---------------------------------------------------------------------------
// Medications
// ---------------------------------------------------------------------------

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function generateMedications(
  count: number,
  stream: RandomStream,
  opts: { maxIdentifierRetries: number },
): MedicationRecord[] {
  if (count < CORE_FORMULARY.length) {
    throw new ConfigurationError(
      `medicationCount must be at least ${CORE_FORMULARY.length} (the core formulary)`,
      { medicationCount: count },
    );
  }

  const medications: MedicationRecord[] = CORE_FORMULARY.map((entry, i) => ({
    medicationId: i + 1,
    ...entry,
    isActive: true,
  }));
  const usedKeys = new Set(
    medications.map((m) => `${m.medicationName}|${m.genericName}`),
  );

  while (medications.length < count) {
    let name = '';
    let attempts = 0;
    do {
      if (attempts >= opts.maxIdentifierRetries) {
        throw new UniquenessExhaustedError('medication name', attempts);
      }
      const stem = stream.faker.string.alpha({
        length: { min: 3, max: 6 },
        casing: 'lower',
      });
      name = capitalize(`${stem}${stream.pick(SYNTHETIC_MEDICATION_SUFFIXES)}`);
      attempts++;
    } while (usedKeys.has(`${name}|${name.toLowerCase()}`));

    const genericName = name.toLowerCase();
    usedKeys.add(`${name}|${genericName}`);

    const route = stream.pick(SYNTHETIC_ROUTES);
    const brandStem = stream.faker.string.alpha({ length: 4, casing: 'lower' });

    medications.push({
      medicationId: medications.length + 1,
      medicationName: name,
      genericName,
      brandName: capitalize(`${brandStem}${stream.pick(SYNTHETIC_BRAND_SUFFIXES)}`),
      medicationClass: stream.pick(SYNTHETIC_MEDICATION_CLASSES),
      controlledSubstanceSchedule: null,
      defaultRoute: route,
      defaultForm: stream.pick(FORMS_BY_ROUTE[route]),
      isHighAlert: stream.chance(0.05),
      isActive: true,
    });
  }

  return medications;
}

// ---------------------------------------------------------------------------
// Reference data set
// ---------------------------------------------------------------------------

/** Builds all reference tables; runs before any patient or encounter work. */
export function generateReferenceData(
  config: Pick<
    RunConfig,
    'providerCount' | 'medicationCount' | 'referenceDate' | 'maxIdentifierRetries'
  >,
  stream: RandomStream,
): ReferenceData {
  return {
    providers: generateProviders(config.providerCount, stream.fork(PROVIDER_STREAM), {
      referenceDate: config.referenceDate,
      maxIdentifierRetries: config.maxIdentifierRetries,
    }),
    units: generateUnits(stream.fork(UNIT_STREAM)),
    medications: generateMedications(
      config.medicationCount,
      stream.fork(MEDICATION_STREAM),
      { maxIdentifierRetries: config.maxIdentifierRetries },
    ),
  };
}
