// ============================================================================
// Dataset — In-memory record types
// Field names follow the Drizzle columns; numeric columns stay numbers until
// export or load.
// ============================================================================

import type { GeneratorConfig } from '@clinical-synth/shared/schemas/generator.schema.js';
import type { ProviderTitle } from '@clinical-synth/shared/constants/provider.constants.js';
import type {
  UnitType,
  UnitPopulation,
  MedicationRoute,
} from '@clinical-synth/shared/constants/reference.constants.js';
import type {
  Sex,
  AllergySeverity,
  AllergyType,
} from '@clinical-synth/shared/constants/patient.constants.js';
import type {
  EncounterType,
  EncounterStatus,
  DischargeDisposition,
  DiagnosisType,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import type {
  AbnormalFlag,
  ResultStatus,
  AdminStatus,
  AssessmentType,
  FallRiskLevel,
  MedicationFrequency,
  OxygenDelivery,
} from '@clinical-synth/shared/constants/clinical.constants.js';

// ---------------------------------------------------------------------------
// Run configuration
// ---------------------------------------------------------------------------

/** Generator configuration with the reference date pinned. */
export type RunConfig = Omit<GeneratorConfig, 'referenceDate'> & {
  referenceDate: Date;
};

// ---------------------------------------------------------------------------
// Reference data
// ---------------------------------------------------------------------------

export interface ProviderRecord {
  providerId: number;
  npi: string;
  firstName: string;
  lastName: string;
  middleName: string | null;
  title: ProviderTitle;
  specialty: string;
  department: string;
  phone: string;
  email: string;
  pager: string | null;
  hireDate: string;
  isActive: boolean;
}

export interface UnitRecord {
  unitId: number;
  unitCode: string;
  unitName: string;
  unitType: UnitType;
  floor: string;
  building: string;
  phone: string;
  totalBeds: number;
  isActive: boolean;
  population: UnitPopulation;
  encounterTypes: readonly EncounterType[];
}

export interface MedicationRecord {
  medicationId: number;
  medicationName: string;
  genericName: string;
  brandName: string;
  medicationClass: string;
  controlledSubstanceSchedule: string | null;
  defaultRoute: MedicationRoute;
  defaultForm: string;
  isHighAlert: boolean;
  isActive: boolean;
}

export interface ReferenceData {
  providers: ProviderRecord[];
  units: UnitRecord[];
  medications: MedicationRecord[];
}

// ---------------------------------------------------------------------------
// Patients
// ---------------------------------------------------------------------------

export interface PatientRecord {
  patientId: number;
  mrn: string;
  firstName: string;
  lastName: string;
  middleName: string | null;
  dateOfBirth: string;
  sex: Sex;
  race: string;
  ethnicity: string;
  primaryLanguage: string;
  ssnLast4: string;
  streetAddress: string;
  city: string;
  state: string;
  zipCode: string;
  phonePrimary: string;
  phoneSecondary: string | null;
  email: string;
  emergencyContactName: string;
  emergencyContactRelationship: string;
  emergencyContactPhone: string;
  insuranceProvider: string;
  insurancePolicyNumber: string;
  createdAt: Date;
  isActive: boolean;
}

export interface AllergyRecord {
  allergyId: number;
  patientId: number;
  allergen: string;
  allergyType: AllergyType;
  reaction: string;
  severity: AllergySeverity;
  onsetDate: string;
  reportedDate: Date;
  reportedByProviderId: number;
  isActive: boolean;
}

// ---------------------------------------------------------------------------
// Encounters
// ---------------------------------------------------------------------------

export interface EncounterRecord {
  encounterId: number;
  patientId: number;
  encounterNumber: string;
  encounterType: EncounterType;
  admitDate: Date;
  dischargeDate: Date | null;
  admittingProviderId: number;
  attendingProviderId: number;
  currentUnitId: number;
  roomNumber: string;
  bedNumber: string;
  chiefComplaint: string;
  admissionSource: string;
  dischargeDisposition: DischargeDisposition | null;
  encounterStatus: EncounterStatus;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Encounter-keyed clinical events
// ---------------------------------------------------------------------------

export interface DiagnosisRecord {
  diagnosisId: number;
  encounterId: number;
  icd10Code: string;
  diagnosisDescription: string;
  diagnosisType: DiagnosisType;
  diagnosedDate: Date;
  diagnosedByProviderId: number;
  isResolved: boolean;
  resolvedDate: Date | null;
}

export interface MedicationAdministrationRecord {
  adminId: number;
  encounterId: number;
  medicationId: number;
  orderedDose: string;
  orderedUnit: string;
  orderedRoute: MedicationRoute;
  orderedFrequency: MedicationFrequency;
  adminDate: Date;
  adminDose: string | null;
  adminUnit: string | null;
  adminRoute: MedicationRoute | null;
  adminSite: string | null;
  orderingProviderId: number;
  administeringProviderId: number;
  adminStatus: AdminStatus;
  holdReason: string | null;
  createdAt: Date;
}

export interface LabResultRecord {
  labId: number;
  encounterId: number;
  loincCode: string;
  testName: string;
  testCategory: string;
  resultValue: number;
  resultUnit: string;
  resultStatus: ResultStatus;
  abnormalFlag: AbnormalFlag;
  referenceRangeLow: number;
  referenceRangeHigh: number;
  collectedDate: Date;
  resultedDate: Date | null;
  orderingProviderId: number;
  createdAt: Date;
}

export interface VitalSignRecord {
  vitalId: number;
  encounterId: number;
  temperatureF: number;
  heartRate: number;
  respiratoryRate: number;
  bloodPressureSystolic: number;
  bloodPressureDiastolic: number;
  oxygenSaturation: number;
  painScale: number;
  weightKg: number | null;
  heightCm: number | null;
  bmi: number | null;
  position: string;
  oxygenDelivery: OxygenDelivery;
  oxygenFlowRate: number | null;
  recordedDate: Date;
  recordedByProviderId: number;
}

export interface NursingAssessmentRecord {
  assessmentId: number;
  encounterId: number;
  assessmentDate: Date;
  assessmentType: AssessmentType;
  levelOfConsciousness: string;
  orientation: string;
  fallRiskScore: number;
  fallRiskLevel: FallRiskLevel;
  bedAlarmOn: boolean;
  restraintsInUse: boolean;
  skinIntegrity: string;
  pressureUlcerPresent: boolean;
  bradenScore: number;
  activityLevel: string;
  gaitSteady: boolean;
  assistiveDevice: string | null;
  assessmentNotes: string;
  assessingProviderId: number;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Skip accounting
// ---------------------------------------------------------------------------

export const EVENT_ENTITIES = [
  'diagnoses',
  'medication_administrations',
  'lab_results',
  'vital_signs',
  'nursing_assessments',
  'allergies',
] as const;

export type EventEntity = (typeof EVENT_ENTITIES)[number];

export type SkipCounters = Record<EventEntity, number>;

export function emptySkipCounters(): SkipCounters {
  return {
    diagnoses: 0,
    medication_administrations: 0,
    lab_results: 0,
    vital_signs: 0,
    nursing_assessments: 0,
    allergies: 0,
  };
}

// ---------------------------------------------------------------------------
// Generated output
// ---------------------------------------------------------------------------

export interface EncounterEvents {
  encounters: EncounterRecord[];
  diagnoses: DiagnosisRecord[];
  medicationAdministrations: MedicationAdministrationRecord[];
  labResults: LabResultRecord[];
  vitalSigns: VitalSignRecord[];
  nursingAssessments: NursingAssessmentRecord[];
  allergies: AllergyRecord[];
  skipped: SkipCounters;
}

export interface Dataset extends EncounterEvents {
  reference: ReferenceData;
  patients: PatientRecord[];
}
