export {
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
  AllergySeverity,
  AllergyType,
  ALLERGEN_CATALOGUE,
  ALLERGIES_PER_PATIENT,
} from './patient.constants.js';
export type { AllergenDefinition } from './patient.constants.js';

export {
  ProviderTitle,
  PRESCRIBER_TITLES,
  NURSING_TITLES,
  PROVIDER_TITLE_WEIGHTS,
  MIN_PROVIDER_COUNT,
  SPECIALTIES,
  DEPARTMENTS,
  NPI_LUHN_PREFIX,
  NPI_BODY_DIGITS,
  NPI_BODY_MIN,
  NPI_BODY_MAX,
} from './provider.constants.js';

export {
  UnitType,
  UnitPopulation,
  UNIT_CATALOGUE,
  UNIT_FLOORS,
  UNIT_BUILDINGS,
  MedicationRoute,
  INJECTION_ROUTES,
  INJECTION_SITES,
  CORE_FORMULARY,
  SYNTHETIC_MEDICATION_SUFFIXES,
  SYNTHETIC_BRAND_SUFFIXES,
  SYNTHETIC_MEDICATION_CLASSES,
} from './reference.constants.js';
export type { UnitDefinition, FormularyEntry } from './reference.constants.js';

export {
  EncounterType,
  ENCOUNTER_TYPES,
  ENCOUNTER_TYPE_CODES,
  EncounterStatus,
  DEFAULT_ENCOUNTER_TYPE_WEIGHTS,
  DEFAULT_LENGTH_OF_STAY_HOURS,
  DEFAULT_HISTORY_DAYS,
  DEFAULT_ENCOUNTERS_PER_PATIENT,
  DEFAULT_ACTIVE_FRACTION,
  DEFAULT_CANCELLED_FRACTION,
  DEFAULT_ENCOUNTER_NUMBER_DIGITS,
  DEFAULT_MAX_IDENTIFIER_RETRIES,
  CHIEF_COMPLAINTS,
  ADMISSION_SOURCES,
  DischargeDisposition,
  DISCHARGE_DISPOSITION_WEIGHTS,
  TERMINAL_DISPOSITIONS,
  BED_LABELS,
  DiagnosisType,
  DIAGNOSIS_CATALOGUE,
  DIAGNOSES_PER_ENCOUNTER,
} from './encounter.constants.js';

export {
  AbnormalFlag,
  CRITICAL_FLAGS,
  ResultStatus,
  CRITICAL_LOW_FACTOR,
  CRITICAL_HIGH_FACTOR,
  ABNORMAL_LOW_SPAN,
  ABNORMAL_HIGH_SPAN,
  LabPanel,
  LAB_CATALOGUE,
  CBC_EVERY_DAYS,
  DEFAULT_ABNORMAL_FRACTION,
  VITAL_SIGN_RANGES,
  ANTHROPOMETRIC_RANGES,
  STABLE_VITALS,
  UNSTABLE_VITALS,
  MIN_PULSE_PRESSURE,
  PAIN_SCALE_DRAWS,
  VITAL_POSITIONS,
  OxygenDelivery,
  ROOM_AIR_SATURATION_THRESHOLD,
  SUPPLEMENTAL_FLOW_RATES,
  VITALS_INTERVAL_HOURS,
  AdminStatus,
  MISSED_ADMIN_STATUSES,
  ADMIN_STATUS_REASONS,
  DEFAULT_MISSED_DOSE_FRACTION,
  MEDICATION_FREQUENCIES,
  DOSES_PER_DAY,
  AS_NEEDED_DOSES_PER_DAY,
  ORDERED_DOSES,
  MEDICATIONS_PER_ENCOUNTER,
  AssessmentType,
  SHIFT_ASSESSMENT_INTERVAL_HOURS,
  FallRiskLevel,
  FALL_RISK_SCORE_RANGE,
  FALL_RISK_MODERATE_THRESHOLD,
  FALL_RISK_HIGH_THRESHOLD,
  FALL_RISK_POINTS,
  BRADEN_SCORE_RANGE,
  PRESSURE_ULCER_BRADEN_MAX,
  ConsciousnessLevel,
  CONSCIOUSNESS_WEIGHTS,
  ORIENTATIONS,
  ActivityLevel,
  BRADEN_BY_ACTIVITY,
  ASSISTIVE_DEVICES,
  SkinIntegrity,
  SHIFT_NOTE_STATES,
} from './clinical.constants.js';
export type {
  LabTestDefinition,
  NumericRange,
  MedicationFrequency,
} from './clinical.constants.js';
