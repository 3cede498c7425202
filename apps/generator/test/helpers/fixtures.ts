// ============================================================================
// Test fixtures — small deterministic runs and hand-built records
// ============================================================================

import { Sex } from '@clinical-synth/shared/constants/patient.constants.js';
import {
  EncounterStatus,
  EncounterType,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import type { GeneratorConfigInput } from '@clinical-synth/shared/schemas/generator.schema.js';
import { resolveRunConfig } from '../../src/lib/config.js';
import { RandomStream, StreamSalt } from '../../src/lib/random.js';
import type {
  EncounterRecord,
  PatientRecord,
  ReferenceData,
  RunConfig,
} from '../../src/domains/dataset/dataset.types.js';
import { generateReferenceData } from '../../src/domains/reference/reference.generator.js';
import { generatePatients } from '../../src/domains/patient/patient.generator.js';

export const REFERENCE_DATE = new Date('2025-06-01T12:00:00.000Z');

export function makeConfig(overrides: GeneratorConfigInput = {}): RunConfig {
  return resolveRunConfig({
    seed: 42,
    referenceDate: REFERENCE_DATE,
    patientCount: 20,
    providerCount: 12,
    medicationCount: 30,
    ...overrides,
  });
}

export function makeReference(config: RunConfig): ReferenceData {
  return generateReferenceData(config, new RandomStream(config.seed).fork(StreamSalt.REFERENCE));
}

export function makePatients(config: RunConfig): PatientRecord[] {
  return generatePatients(
    { ...config, historyDays: config.encounters.historyDays },
    new RandomStream(config.seed).fork(StreamSalt.PATIENTS),
  );
}

export function makePatient(overrides: Partial<PatientRecord> = {}): PatientRecord {
  return {
    patientId: 1,
    mrn: 'MRN0000001',
    firstName: 'Test',
    lastName: 'Patient',
    middleName: null,
    dateOfBirth: '1980-03-15',
    sex: Sex.FEMALE,
    race: 'White',
    ethnicity: 'Non-Hispanic',
    primaryLanguage: 'English',
    ssnLast4: '0000',
    streetAddress: '1 Test Street',
    city: 'Springfield',
    state: 'IL',
    zipCode: '00000',
    phonePrimary: '(555) 555-0100',
    phoneSecondary: null,
    email: 'test.patient@mail.example',
    emergencyContactName: 'Test Contact',
    emergencyContactRelationship: 'Spouse',
    emergencyContactPhone: '(555) 555-0101',
    insuranceProvider: 'Medicare',
    insurancePolicyNumber: 'ABC000000000',
    createdAt: new Date('2020-01-01T00:00:00.000Z'),
    isActive: true,
    ...overrides,
  };
}

export function makeEncounter(overrides: Partial<EncounterRecord> = {}): EncounterRecord {
  const admitDate = overrides.admitDate ?? new Date('2025-05-01T08:00:00.000Z');
  return {
    encounterId: 1,
    patientId: 1,
    encounterNumber: 'IP00000001',
    encounterType: EncounterType.INPATIENT,
    admitDate,
    dischargeDate: new Date('2025-05-04T08:00:00.000Z'),
    admittingProviderId: 1,
    attendingProviderId: 1,
    currentUnitId: 1,
    roomNumber: '101',
    bedNumber: 'A',
    chiefComplaint: 'Chest pain',
    admissionSource: 'Physician Referral',
    dischargeDisposition: null,
    encounterStatus: EncounterStatus.DISCHARGED,
    createdAt: admitDate,
    ...overrides,
  };
}
