// ============================================================================
// Clinical Events — Constants
// Lab catalogue, vital sign bounds, MAR statuses, nursing scales.
// ============================================================================

import { UnitType } from './reference.constants.js';

// ---------------------------------------------------------------------------
// Lab Results
// ---------------------------------------------------------------------------

export const AbnormalFlag = {
  NORMAL: 'Normal',
  LOW: 'Low',
  HIGH: 'High',
  CRITICAL_LOW: 'Critical Low',
  CRITICAL_HIGH: 'Critical High',
} as const;

export type AbnormalFlag = (typeof AbnormalFlag)[keyof typeof AbnormalFlag];

export const CRITICAL_FLAGS: readonly AbnormalFlag[] = [
  AbnormalFlag.CRITICAL_LOW,
  AbnormalFlag.CRITICAL_HIGH,
];

export const ResultStatus = {
  FINAL: 'Final',
  PRELIMINARY: 'Preliminary',
  CORRECTED: 'Corrected',
  CANCELLED: 'Cancelled',
} as const;

export type ResultStatus = (typeof ResultStatus)[keyof typeof ResultStatus];

/** Values below low × 0.8 or above high × 1.2 are critical. */
export const CRITICAL_LOW_FACTOR = 0.8;
export const CRITICAL_HIGH_FACTOR = 1.2;

/** Abnormal draws land in [low × 0.7, low) or (high, high × 1.3]. */
export const ABNORMAL_LOW_SPAN = 0.7;
export const ABNORMAL_HIGH_SPAN = 1.3;

export const LabPanel = {
  BMP: 'BMP',
  CBC: 'CBC',
  OTHER: 'OTHER',
} as const;

export type LabPanel = (typeof LabPanel)[keyof typeof LabPanel];

export interface LabTestDefinition {
  loincCode: string;
  testName: string;
  testCategory: string;
  unit: string;
  referenceLow: number;
  referenceHigh: number;
  panel: LabPanel;
  /** Hours from collection to result. */
  turnaroundHours: number;
}

export const LAB_CATALOGUE: readonly LabTestDefinition[] = [
  { loincCode: '2160-0', testName: 'Creatinine', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 0.6, referenceHigh: 1.2, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '2823-3', testName: 'Potassium', testCategory: 'Chemistry', unit: 'mEq/L', referenceLow: 3.5, referenceHigh: 5.0, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '2951-2', testName: 'Sodium', testCategory: 'Chemistry', unit: 'mEq/L', referenceLow: 136, referenceHigh: 145, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '2028-9', testName: 'CO2', testCategory: 'Chemistry', unit: 'mEq/L', referenceLow: 22, referenceHigh: 28, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '1742-6', testName: 'ALT', testCategory: 'Chemistry', unit: 'U/L', referenceLow: 10, referenceHigh: 40, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '1920-8', testName: 'AST', testCategory: 'Chemistry', unit: 'U/L', referenceLow: 10, referenceHigh: 34, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '1975-2', testName: 'Bilirubin Total', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 0.3, referenceHigh: 1.2, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '2345-7', testName: 'Glucose', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 70, referenceHigh: 110, panel: LabPanel.BMP, turnaroundHours: 2 },
  { loincCode: '789-8', testName: 'Erythrocytes', testCategory: 'Hematology', unit: 'x10^6/uL', referenceLow: 4.2, referenceHigh: 5.4, panel: LabPanel.CBC, turnaroundHours: 1 },
  { loincCode: '6690-2', testName: 'WBC', testCategory: 'Hematology', unit: 'x10^3/uL', referenceLow: 4.5, referenceHigh: 11.0, panel: LabPanel.CBC, turnaroundHours: 1 },
  { loincCode: '777-3', testName: 'Platelets', testCategory: 'Hematology', unit: 'x10^3/uL', referenceLow: 150, referenceHigh: 400, panel: LabPanel.CBC, turnaroundHours: 1 },
  { loincCode: '718-7', testName: 'Hemoglobin', testCategory: 'Hematology', unit: 'g/dL', referenceLow: 12.0, referenceHigh: 16.0, panel: LabPanel.CBC, turnaroundHours: 1 },
  { loincCode: '4544-3', testName: 'Hematocrit', testCategory: 'Hematology', unit: '%', referenceLow: 36, referenceHigh: 46, panel: LabPanel.CBC, turnaroundHours: 1 },
  { loincCode: '2085-9', testName: 'HDL Cholesterol', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 40, referenceHigh: 60, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '2093-3', testName: 'Cholesterol Total', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 100, referenceHigh: 200, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '2571-8', testName: 'Triglycerides', testCategory: 'Chemistry', unit: 'mg/dL', referenceLow: 50, referenceHigh: 150, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '1988-5', testName: 'CRP', testCategory: 'Immunology', unit: 'mg/L', referenceLow: 0, referenceHigh: 3, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '2532-0', testName: 'LDH', testCategory: 'Chemistry', unit: 'U/L', referenceLow: 140, referenceHigh: 280, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '6768-6', testName: 'Alkaline Phosphatase', testCategory: 'Chemistry', unit: 'U/L', referenceLow: 44, referenceHigh: 147, panel: LabPanel.OTHER, turnaroundHours: 4 },
  { loincCode: '1759-0', testName: 'Albumin', testCategory: 'Chemistry', unit: 'g/dL', referenceLow: 3.5, referenceHigh: 5.0, panel: LabPanel.OTHER, turnaroundHours: 4 },
];

/** CBC is drawn on even days counted from admission. */
export const CBC_EVERY_DAYS = 2;

export const DEFAULT_ABNORMAL_FRACTION = 0.2;

// ---------------------------------------------------------------------------
// Vital Signs
// ---------------------------------------------------------------------------

export interface NumericRange {
  min: number;
  max: number;
}

/** Inclusive bounds mirrored from the vital_signs CHECK constraints. */
export const VITAL_SIGN_RANGES = {
  temperatureF: { min: 90, max: 110 },
  heartRate: { min: 20, max: 300 },
  respiratoryRate: { min: 4, max: 60 },
  bloodPressureSystolic: { min: 50, max: 300 },
  bloodPressureDiastolic: { min: 20, max: 200 },
  oxygenSaturation: { min: 0, max: 100 },
  painScale: { min: 0, max: 10 },
} as const satisfies Record<string, NumericRange>;

/** Exclusive bounds for anthropometrics. */
export const ANTHROPOMETRIC_RANGES = {
  weightKg: { min: 0, max: 1000 },
  heightCm: { min: 0, max: 300 },
  bmi: { min: 10, max: 100 },
} as const satisfies Record<string, NumericRange>;

/** Gaussian parameters for a stable patient, followed by the clamp applied at draw time. */
export const STABLE_VITALS = {
  temperatureF: { mean: 98.6, sd: 0.8, clamp: { min: 95, max: 104 } },
  heartRate: { mean: 75, sd: 12, clamp: { min: 40, max: 180 } },
  respiratoryRate: { mean: 16, sd: 2.5, clamp: { min: 8, max: 40 } },
  bloodPressureSystolic: { mean: 120, sd: 14, clamp: { min: 70, max: 200 } },
  bloodPressureDiastolic: { mean: 78, sd: 9, clamp: { min: 40, max: 120 } },
  oxygenSaturation: { mean: 97, sd: 1.5, clamp: { min: 85, max: 100 } },
} as const;

/** Parameters for an unstable (SIRS-like) set. */
export const UNSTABLE_VITALS = {
  temperatureF: { mean: 101.8, sd: 1.2, clamp: { min: 95, max: 106 } },
  heartRate: { mean: 118, sd: 14, clamp: { min: 40, max: 200 } },
  respiratoryRate: { mean: 25, sd: 4, clamp: { min: 8, max: 45 } },
  bloodPressureSystolic: { mean: 92, sd: 14, clamp: { min: 60, max: 200 } },
  bloodPressureDiastolic: { mean: 55, sd: 9, clamp: { min: 30, max: 120 } },
  oxygenSaturation: { mean: 90, sd: 3, clamp: { min: 75, max: 100 } },
} as const;

export const MIN_PULSE_PRESSURE = 10;

/** Mostly low pain scores. */
export const PAIN_SCALE_DRAWS = [0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8] as const;

export const VITAL_POSITIONS = ['Sitting', 'Supine', 'Standing'] as const;

export const OxygenDelivery = {
  ROOM_AIR: 'Room Air',
  NASAL_CANNULA: 'Nasal Cannula',
  FACE_MASK: 'Face Mask',
} as const;

export type OxygenDelivery = (typeof OxygenDelivery)[keyof typeof OxygenDelivery];

/** Saturation above this breathes room air. */
export const ROOM_AIR_SATURATION_THRESHOLD = 93;
export const SUPPLEMENTAL_FLOW_RATES = [2, 4, 6] as const;

/** Hours between vital sign sets, keyed by unit type. */
export const VITALS_INTERVAL_HOURS: Record<UnitType, number> = {
  [UnitType.ICU]: 1,
  [UnitType.NICU]: 1,
  [UnitType.ED]: 2,
  [UnitType.OR]: 2,
  [UnitType.PACU]: 2,
  [UnitType.LABOR_DELIVERY]: 4,
  [UnitType.TELEMETRY]: 4,
  [UnitType.ONCOLOGY]: 4,
  [UnitType.ORTHOPEDICS]: 4,
  [UnitType.MEDSURG]: 4,
  [UnitType.PEDS]: 4,
};

// ---------------------------------------------------------------------------
// Medication Administration Record
// ---------------------------------------------------------------------------

export const AdminStatus = {
  GIVEN: 'Given',
  HELD: 'Held',
  REFUSED: 'Refused',
  NOT_GIVEN: 'Not Given',
} as const;

export type AdminStatus = (typeof AdminStatus)[keyof typeof AdminStatus];

export const MISSED_ADMIN_STATUSES = [
  AdminStatus.HELD,
  AdminStatus.REFUSED,
  AdminStatus.NOT_GIVEN,
] as const;

export const ADMIN_STATUS_REASONS: Record<
  Exclude<AdminStatus, typeof AdminStatus.GIVEN>,
  string
> = {
  [AdminStatus.HELD]: 'Patient NPO',
  [AdminStatus.REFUSED]: 'Patient refused',
  [AdminStatus.NOT_GIVEN]: 'Medication unavailable',
};

export const DEFAULT_MISSED_DOSE_FRACTION = 0.05;

export const MEDICATION_FREQUENCIES = [
  'Daily',
  'BID',
  'TID',
  'QID',
  'Q6H',
  'Q8H',
  'Q12H',
  'PRN',
  'STAT',
] as const;

export type MedicationFrequency = (typeof MEDICATION_FREQUENCIES)[number];

/** Scheduled doses per day; null means as-needed (0–2 per day). */
export const DOSES_PER_DAY: Record<MedicationFrequency, number | null> = {
  Daily: 1,
  BID: 2,
  TID: 3,
  QID: 4,
  Q6H: 4,
  Q8H: 3,
  Q12H: 2,
  PRN: null,
  STAT: null,
};

export const AS_NEEDED_DOSES_PER_DAY = { min: 0, max: 2 } as const;

export const ORDERED_DOSES: ReadonlyArray<{ dose: string; unit: string }> = [
  { dose: '325', unit: 'mg' },
  { dose: '500', unit: 'mg' },
  { dose: '1', unit: 'g' },
  { dose: '5', unit: 'mg' },
  { dose: '10', unit: 'mg' },
  { dose: '20', unit: 'mg' },
  { dose: '40', unit: 'mg' },
  { dose: '80', unit: 'mg' },
  { dose: '100', unit: 'mg' },
];

export const MEDICATIONS_PER_ENCOUNTER = { min: 3, max: 10 } as const;

// ---------------------------------------------------------------------------
// Nursing Assessments
// ---------------------------------------------------------------------------

export const AssessmentType = {
  ADMISSION: 'Admission',
  SHIFT: 'Shift',
  FALL_RISK: 'Fall Risk',
  SKIN: 'Skin',
  DISCHARGE: 'Discharge',
} as const;

export type AssessmentType = (typeof AssessmentType)[keyof typeof AssessmentType];

export const SHIFT_ASSESSMENT_INTERVAL_HOURS = 12;

export const FallRiskLevel = {
  LOW: 'Low',
  MODERATE: 'Moderate',
  HIGH: 'High',
} as const;

export type FallRiskLevel = (typeof FallRiskLevel)[keyof typeof FallRiskLevel];

export const FALL_RISK_SCORE_RANGE = { min: 0, max: 25 } as const;
/** Scores at or above these thresholds map to Moderate and High. */
export const FALL_RISK_MODERATE_THRESHOLD = 7;
export const FALL_RISK_HIGH_THRESHOLD = 13;

/** Morse-style factor points, scaled to a 25-point maximum. */
export const FALL_RISK_POINTS = {
  fallHistory: 5,
  secondaryDiagnosis: 3,
  ambulatoryAid: { none: 0, device: 3, furniture: 6 },
  ivAccess: 4,
  gait: { normal: 0, weak: 2, impaired: 4 },
  impairedMentalStatus: 3,
} as const;

export const BRADEN_SCORE_RANGE = { min: 6, max: 23 } as const;
/** Pressure ulcers appear only at or below this Braden score. */
export const PRESSURE_ULCER_BRADEN_MAX = 14;

export const ConsciousnessLevel = {
  ALERT: 'Alert',
  CONFUSED: 'Confused',
  LETHARGIC: 'Lethargic',
} as const;

export type ConsciousnessLevel =
  (typeof ConsciousnessLevel)[keyof typeof ConsciousnessLevel];

export const CONSCIOUSNESS_WEIGHTS: ReadonlyArray<{
  value: ConsciousnessLevel;
  weight: number;
}> = [
  { value: ConsciousnessLevel.ALERT, weight: 3 },
  { value: ConsciousnessLevel.CONFUSED, weight: 1 },
  { value: ConsciousnessLevel.LETHARGIC, weight: 1 },
];

export const ORIENTATIONS = [
  'Person, Place, Time',
  'Person, Place',
  'Person',
  'Confused',
] as const;

export const ActivityLevel = {
  AMBULATORY: 'Ambulatory',
  AMBULATORY_ASSIST: 'Ambulatory with assistance',
  CHAIR: 'Chair',
  BEDREST: 'Bedrest',
} as const;

export type ActivityLevel = (typeof ActivityLevel)[keyof typeof ActivityLevel];

/** Braden draw range by activity level. */
export const BRADEN_BY_ACTIVITY: Record<ActivityLevel, { min: number; max: number }> = {
  [ActivityLevel.AMBULATORY]: { min: 18, max: 23 },
  [ActivityLevel.AMBULATORY_ASSIST]: { min: 15, max: 21 },
  [ActivityLevel.CHAIR]: { min: 12, max: 19 },
  [ActivityLevel.BEDREST]: { min: 6, max: 16 },
};

export const ASSISTIVE_DEVICES = ['Walker', 'Cane', 'Wheelchair'] as const;

export const SkinIntegrity = {
  INTACT: 'Intact',
  IMPAIRED: 'Impaired',
} as const;

export type SkinIntegrity = (typeof SkinIntegrity)[keyof typeof SkinIntegrity];

export const SHIFT_NOTE_STATES = ['stable', 'improving', 'no acute distress'] as const;
