// ============================================================================
// Clinical Events — Drizzle DB Schema
// MAR, lab results, vital signs, nursing assessments.
// ============================================================================

import {
  serial,
  integer,
  varchar,
  text,
  numeric,
  boolean,
  timestamp,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { clinicalSchema, medications } from './reference.schema.js';
import { providers } from './provider.schema.js';
import { encounters } from './encounter.schema.js';

const encounterRef = () => encounters.encounterId;
const cascade = { onUpdate: 'cascade', onDelete: 'cascade' } as const;

// --- Medication Administrations Table (MAR) ---
// Non-Given rows carry a hold reason and no administered dose.

export const medicationAdministrations = clinicalSchema.table(
  'medication_administrations',
  {
    adminId: serial('admin_id').primaryKey(),
    encounterId: integer('encounter_id').notNull().references(encounterRef, cascade),
    medicationId: integer('medication_id')
      .notNull()
      .references(() => medications.medicationId, {
        onUpdate: 'cascade',
        onDelete: 'restrict',
      }),
    orderedDose: varchar('ordered_dose', { length: 50 }).notNull(),
    orderedUnit: varchar('ordered_unit', { length: 20 }).notNull(),
    orderedRoute: varchar('ordered_route', { length: 50 }).notNull(),
    orderedFrequency: varchar('ordered_frequency', { length: 50 }).notNull(),
    adminDate: timestamp('admin_date').notNull(),
    adminDose: varchar('admin_dose', { length: 50 }),
    adminUnit: varchar('admin_unit', { length: 20 }),
    adminRoute: varchar('admin_route', { length: 50 }),
    adminSite: varchar('admin_site', { length: 50 }),
    orderingProviderId: integer('ordering_provider_id').references(
      () => providers.providerId,
    ),
    administeringProviderId: integer('administering_provider_id').references(
      () => providers.providerId,
    ),
    adminStatus: varchar('admin_status', { length: 20 }).default('Given'),
    holdReason: text('hold_reason'),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [
    check(
      'medication_administrations_status_check',
      sql`${table.adminStatus} IN ('Given', 'Held', 'Refused', 'Not Given')`,
    ),
    check(
      'medication_administrations_hold_reason_check',
      sql`${table.adminStatus} = 'Given' OR ${table.holdReason} IS NOT NULL`,
    ),
    index('medication_administrations_encounter_date_idx').on(
      table.encounterId,
      table.adminDate,
    ),
  ],
);

// --- Lab Results Table ---

export const labResults = clinicalSchema.table(
  'lab_results',
  {
    labId: serial('lab_id').primaryKey(),
    encounterId: integer('encounter_id').notNull().references(encounterRef, cascade),
    loincCode: varchar('loinc_code', { length: 20 }),
    testName: varchar('test_name', { length: 200 }).notNull(),
    testCategory: varchar('test_category', { length: 100 }),
    resultValue: varchar('result_value', { length: 50 }),
    resultUnit: varchar('result_unit', { length: 50 }),
    resultStatus: varchar('result_status', { length: 20 }),
    abnormalFlag: varchar('abnormal_flag', { length: 20 }),
    referenceRangeLow: numeric('reference_range_low'),
    referenceRangeHigh: numeric('reference_range_high'),
    collectedDate: timestamp('collected_date').notNull(),
    resultedDate: timestamp('resulted_date'),
    orderingProviderId: integer('ordering_provider_id').references(
      () => providers.providerId,
    ),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [
    check(
      'lab_results_status_check',
      sql`${table.resultStatus} IN ('Final', 'Preliminary', 'Corrected', 'Cancelled')`,
    ),
    check(
      'lab_results_abnormal_flag_check',
      sql`${table.abnormalFlag} IN ('Normal', 'Low', 'High', 'Critical Low', 'Critical High', 'Abnormal')`,
    ),
    check(
      'lab_results_reference_range_check',
      sql`${table.referenceRangeLow} IS NULL OR ${table.referenceRangeHigh} IS NULL OR ${table.referenceRangeLow} < ${table.referenceRangeHigh}`,
    ),
    check(
      'lab_results_resulted_after_collected_check',
      sql`${table.resultedDate} IS NULL OR ${table.resultedDate} >= ${table.collectedDate}`,
    ),
    index('lab_results_encounter_collected_idx').on(
      table.encounterId,
      table.collectedDate,
    ),
  ],
);

// --- Vital Signs Table ---

export const vitalSigns = clinicalSchema.table(
  'vital_signs',
  {
    vitalId: serial('vital_id').primaryKey(),
    encounterId: integer('encounter_id').notNull().references(encounterRef, cascade),
    temperatureF: numeric('temperature_f', { precision: 4, scale: 1 }),
    heartRate: integer('heart_rate'),
    respiratoryRate: integer('respiratory_rate'),
    bloodPressureSystolic: integer('blood_pressure_systolic'),
    bloodPressureDiastolic: integer('blood_pressure_diastolic'),
    oxygenSaturation: integer('oxygen_saturation'),
    painScale: integer('pain_scale'),
    weightKg: numeric('weight_kg', { precision: 5, scale: 2 }),
    heightCm: numeric('height_cm', { precision: 5, scale: 2 }),
    bmi: numeric('bmi', { precision: 4, scale: 1 }),
    position: varchar('position', { length: 50 }),
    oxygenDelivery: varchar('oxygen_delivery', { length: 50 }),
    oxygenFlowRate: numeric('oxygen_flow_rate', { precision: 3, scale: 1 }),
    recordedDate: timestamp('recorded_date').notNull(),
    recordedByProviderId: integer('recorded_by_provider_id').references(
      () => providers.providerId,
    ),
  },
  (table) => [
    check('valid_temp', sql`${table.temperatureF} IS NULL OR (${table.temperatureF} >= 90 AND ${table.temperatureF} <= 110)`),
    check('valid_hr', sql`${table.heartRate} IS NULL OR (${table.heartRate} >= 20 AND ${table.heartRate} <= 300)`),
    check('valid_rr', sql`${table.respiratoryRate} IS NULL OR (${table.respiratoryRate} >= 4 AND ${table.respiratoryRate} <= 60)`),
    check('valid_bp_sys', sql`${table.bloodPressureSystolic} IS NULL OR (${table.bloodPressureSystolic} >= 50 AND ${table.bloodPressureSystolic} <= 300)`),
    check('valid_bp_dia', sql`${table.bloodPressureDiastolic} IS NULL OR (${table.bloodPressureDiastolic} >= 20 AND ${table.bloodPressureDiastolic} <= 200)`),
    check('valid_o2_sat', sql`${table.oxygenSaturation} IS NULL OR (${table.oxygenSaturation} >= 0 AND ${table.oxygenSaturation} <= 100)`),
    check('valid_pain', sql`${table.painScale} IS NULL OR (${table.painScale} >= 0 AND ${table.painScale} <= 10)`),
    check('valid_weight', sql`${table.weightKg} IS NULL OR (${table.weightKg} > 0 AND ${table.weightKg} < 1000)`),
    check('valid_height', sql`${table.heightCm} IS NULL OR (${table.heightCm} > 0 AND ${table.heightCm} < 300)`),
    check('valid_bmi', sql`${table.bmi} IS NULL OR (${table.bmi} > 10 AND ${table.bmi} < 100)`),
    index('vital_signs_encounter_recorded_idx').on(
      table.encounterId,
      table.recordedDate,
    ),
  ],
);

// --- Nursing Assessments Table ---

export const nursingAssessments = clinicalSchema.table(
  'nursing_assessments',
  {
    assessmentId: serial('assessment_id').primaryKey(),
    encounterId: integer('encounter_id').notNull().references(encounterRef, cascade),
    assessmentDate: timestamp('assessment_date').notNull(),
    assessmentType: varchar('assessment_type', { length: 50 }),
    levelOfConsciousness: varchar('level_of_consciousness', { length: 50 }),
    orientation: varchar('orientation', { length: 50 }),
    fallRiskScore: integer('fall_risk_score'),
    fallRiskLevel: varchar('fall_risk_level', { length: 20 }),
    bedAlarmOn: boolean('bed_alarm_on'),
    restraintsInUse: boolean('restraints_in_use'),
    skinIntegrity: varchar('skin_integrity', { length: 50 }),
    pressureUlcerPresent: boolean('pressure_ulcer_present'),
    bradenScore: integer('braden_score'),
    activityLevel: varchar('activity_level', { length: 50 }),
    gaitSteady: boolean('gait_steady'),
    assistiveDevice: varchar('assistive_device', { length: 50 }),
    assessmentNotes: text('assessment_notes'),
    assessingProviderId: integer('assessing_provider_id').references(
      () => providers.providerId,
    ),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [
    check(
      'valid_fall_risk_score',
      sql`${table.fallRiskScore} IS NULL OR (${table.fallRiskScore} >= 0 AND ${table.fallRiskScore} <= 25)`,
    ),
    check(
      'valid_braden_score',
      sql`${table.bradenScore} IS NULL OR (${table.bradenScore} >= 6 AND ${table.bradenScore} <= 23)`,
    ),
    index('nursing_assessments_encounter_date_idx').on(
      table.encounterId,
      table.assessmentDate,
    ),
  ],
);

// --- Inferred Types ---

export type InsertMedicationAdministration =
  typeof medicationAdministrations.$inferInsert;
export type SelectMedicationAdministration =
  typeof medicationAdministrations.$inferSelect;

export type InsertLabResult = typeof labResults.$inferInsert;
export type SelectLabResult = typeof labResults.$inferSelect;

export type InsertVitalSign = typeof vitalSigns.$inferInsert;
export type SelectVitalSign = typeof vitalSigns.$inferSelect;

export type InsertNursingAssessment = typeof nursingAssessments.$inferInsert;
export type SelectNursingAssessment = typeof nursingAssessments.$inferSelect;
