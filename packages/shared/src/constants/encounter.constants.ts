// ============================================================================
// Encounter Scheduling — Constants
// ============================================================================

// --- Encounter Type ---

export const EncounterType = {
  INPATIENT: 'Inpatient',
  OUTPATIENT: 'Outpatient',
  EMERGENCY: 'Emergency',
  OBSERVATION: 'Observation',
} as const;

export type EncounterType = (typeof EncounterType)[keyof typeof EncounterType];

export const ENCOUNTER_TYPES = [
  EncounterType.INPATIENT,
  EncounterType.OUTPATIENT,
  EncounterType.EMERGENCY,
  EncounterType.OBSERVATION,
] as const;

/** Prefix of the encounter number, matching the encounter_types lookup codes. */
export const ENCOUNTER_TYPE_CODES: Record<EncounterType, string> = {
  [EncounterType.INPATIENT]: 'IP',
  [EncounterType.OUTPATIENT]: 'OP',
  [EncounterType.EMERGENCY]: 'ED',
  [EncounterType.OBSERVATION]: 'OBS',
};

// --- Encounter Status ---

export const EncounterStatus = {
  ACTIVE: 'Active',
  DISCHARGED: 'Discharged',
  CANCELLED: 'Cancelled',
} as const;

export type EncounterStatus =
  (typeof EncounterStatus)[keyof typeof EncounterStatus];

// --- Defaults (documented configuration surface, not fixed law) ---

export const DEFAULT_ENCOUNTER_TYPE_WEIGHTS: Record<EncounterType, number> = {
  [EncounterType.INPATIENT]: 40,
  [EncounterType.EMERGENCY]: 30,
  [EncounterType.OUTPATIENT]: 20,
  [EncounterType.OBSERVATION]: 10,
};

/** Uniform length-of-stay ranges, in hours. */
export const DEFAULT_LENGTH_OF_STAY_HOURS: Record<
  EncounterType,
  { min: number; max: number }
> = {
  [EncounterType.INPATIENT]: { min: 48, max: 336 },
  [EncounterType.EMERGENCY]: { min: 3, max: 24 },
  [EncounterType.OBSERVATION]: { min: 12, max: 48 },
  [EncounterType.OUTPATIENT]: { min: 1, max: 6 },
};

export const DEFAULT_HISTORY_DAYS = 730;
export const DEFAULT_ENCOUNTERS_PER_PATIENT = { min: 1, max: 5 } as const;
export const DEFAULT_ACTIVE_FRACTION = 0.1;
export const DEFAULT_CANCELLED_FRACTION = 0.02;
export const DEFAULT_ENCOUNTER_NUMBER_DIGITS = 8;
export const DEFAULT_MAX_IDENTIFIER_RETRIES = 50;

// --- Clinical context value sets ---

export const CHIEF_COMPLAINTS = [
  'Chest pain',
  'Shortness of breath',
  'Abdominal pain',
  'Fever',
  'Headache',
  'Back pain',
  'Dizziness',
  'Nausea and vomiting',
  'Weakness',
  'Cough',
  'Altered mental status',
  'Fall',
  'Syncope',
  'Palpitations',
  'Leg swelling',
  'Difficulty urinating',
] as const;

export const ADMISSION_SOURCES = [
  'Emergency Department',
  'Direct Admission',
  'Transfer from Hospital',
  'Physician Referral',
  'Walk-in',
  'Transfer from SNF',
] as const;

export const DischargeDisposition = {
  HOME: 'Home',
  HOME_HEALTH: 'Home with Home Health',
  SNF: 'Skilled Nursing Facility',
  REHAB: 'Rehabilitation Facility',
  TRANSFER: 'Transferred to Hospital',
  AMA: 'Left Against Medical Advice',
  EXPIRED: 'Expired',
  HOSPICE: 'Hospice',
} as const;

export type DischargeDisposition =
  (typeof DischargeDisposition)[keyof typeof DischargeDisposition];

export const DISCHARGE_DISPOSITION_WEIGHTS: ReadonlyArray<{
  value: DischargeDisposition;
  weight: number;
}> = [
  { value: DischargeDisposition.HOME, weight: 60 },
  { value: DischargeDisposition.HOME_HEALTH, weight: 12 },
  { value: DischargeDisposition.SNF, weight: 9 },
  { value: DischargeDisposition.REHAB, weight: 7 },
  { value: DischargeDisposition.TRANSFER, weight: 5 },
  { value: DischargeDisposition.AMA, weight: 3 },
  { value: DischargeDisposition.EXPIRED, weight: 2 },
  { value: DischargeDisposition.HOSPICE, weight: 2 },
];

/** Dispositions that end a patient's encounter history. */
export const TERMINAL_DISPOSITIONS: readonly DischargeDisposition[] = [
  DischargeDisposition.EXPIRED,
  DischargeDisposition.HOSPICE,
];

export const BED_LABELS = ['A', 'B', '1', '2'] as const;

// --- Diagnoses ---

export const DiagnosisType = {
  PRIMARY: 'Primary',
  SECONDARY: 'Secondary',
  ADMISSION: 'Admission',
  WORKING: 'Working',
} as const;

export type DiagnosisType = (typeof DiagnosisType)[keyof typeof DiagnosisType];

export const DIAGNOSIS_CATALOGUE: ReadonlyArray<{
  icd10Code: string;
  description: string;
}> = [
  { icd10Code: 'I10', description: 'Essential (primary) hypertension' },
  { icd10Code: 'E11.9', description: 'Type 2 diabetes mellitus without complications' },
  { icd10Code: 'J44.1', description: 'Chronic obstructive pulmonary disease with acute exacerbation' },
  { icd10Code: 'N18.3', description: 'Chronic kidney disease, stage 3' },
  { icd10Code: 'I50.9', description: 'Heart failure, unspecified' },
  { icd10Code: 'J18.9', description: 'Pneumonia, unspecified organism' },
  { icd10Code: 'A41.9', description: 'Sepsis, unspecified organism' },
  { icd10Code: 'N39.0', description: 'Urinary tract infection, site not specified' },
  { icd10Code: 'K92.2', description: 'Gastrointestinal hemorrhage, unspecified' },
  { icd10Code: 'I21.9', description: 'Acute myocardial infarction, unspecified' },
  { icd10Code: 'I63.9', description: 'Cerebral infarction, unspecified' },
  { icd10Code: 'E87.6', description: 'Hypokalemia' },
  { icd10Code: 'D64.9', description: 'Anemia, unspecified' },
  { icd10Code: 'F32.9', description: 'Major depressive disorder, single episode' },
  { icd10Code: 'M79.3', description: 'Myalgia' },
  { icd10Code: 'R50.9', description: 'Fever, unspecified' },
  { icd10Code: 'R06.02', description: 'Shortness of breath' },
  { icd10Code: 'R07.9', description: 'Chest pain, unspecified' },
  { icd10Code: 'R42', description: 'Dizziness and giddiness' },
  { icd10Code: 'G93.1', description: 'Anoxic brain damage, not elsewhere classified' },
];

export const DIAGNOSES_PER_ENCOUNTER = { min: 1, max: 5 } as const;
