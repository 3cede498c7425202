// ============================================================================
// Encounters & Diagnoses — Drizzle DB Schema
// ============================================================================

import {
  serial,
  integer,
  varchar,
  text,
  boolean,
  timestamp,
  unique,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { clinicalSchema, units } from './reference.schema.js';
import { providers } from './provider.schema.js';
import { patients } from './patient.schema.js';

// --- Encounters Table ---
// Active and Cancelled encounters carry no discharge date and no disposition.

export const encounters = clinicalSchema.table(
  'encounters',
  {
    encounterId: serial('encounter_id').primaryKey(),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.patientId, {
        onUpdate: 'cascade',
        onDelete: 'restrict',
      }),
    encounterNumber: varchar('encounter_number', { length: 30 })
      .notNull()
      .unique(),
    encounterType: varchar('encounter_type', { length: 20 }).notNull(),
    admitDate: timestamp('admit_date').notNull(),
    dischargeDate: timestamp('discharge_date'),
    admittingProviderId: integer('admitting_provider_id').references(
      () => providers.providerId,
    ),
    attendingProviderId: integer('attending_provider_id').references(
      () => providers.providerId,
    ),
    currentUnitId: integer('current_unit_id').references(() => units.unitId, {
      onUpdate: 'cascade',
      onDelete: 'set null',
    }),
    roomNumber: varchar('room_number', { length: 20 }),
    bedNumber: varchar('bed_number', { length: 10 }),
    chiefComplaint: text('chief_complaint'),
    admissionSource: varchar('admission_source', { length: 50 }),
    dischargeDisposition: varchar('discharge_disposition', { length: 50 }),
    encounterStatus: varchar('encounter_status', { length: 20 }).default('Active'),
    createdAt: timestamp('created_at').defaultNow(),
    updatedAt: timestamp('updated_at').defaultNow(),
  },
  (table) => [
    check(
      'encounters_type_check',
      sql`${table.encounterType} IN ('Inpatient', 'Outpatient', 'Emergency', 'Observation')`,
    ),
    check(
      'encounters_status_check',
      sql`${table.encounterStatus} IN ('Active', 'Discharged', 'Cancelled')`,
    ),
    check(
      'encounters_discharge_after_admit_check',
      sql`${table.dischargeDate} IS NULL OR ${table.dischargeDate} >= ${table.admitDate}`,
    ),
    index('encounters_patient_admit_idx').on(table.patientId, table.admitDate),
  ],
);

// --- Diagnoses Table ---

export const diagnoses = clinicalSchema.table(
  'diagnoses',
  {
    diagnosisId: serial('diagnosis_id').primaryKey(),
    encounterId: integer('encounter_id')
      .notNull()
      .references(() => encounters.encounterId, {
        onUpdate: 'cascade',
        onDelete: 'cascade',
      }),
    icd10Code: varchar('icd10_code', { length: 10 }).notNull(),
    diagnosisDescription: text('diagnosis_description').notNull(),
    diagnosisType: varchar('diagnosis_type', { length: 20 }),
    diagnosedDate: timestamp('diagnosed_date').defaultNow(),
    diagnosedByProviderId: integer('diagnosed_by_provider_id').references(
      () => providers.providerId,
    ),
    isResolved: boolean('is_resolved').default(false),
    resolvedDate: timestamp('resolved_date'),
  },
  (table) => [
    unique('diagnoses_encounter_code_type_uniq').on(
      table.encounterId,
      table.icd10Code,
      table.diagnosisType,
    ),
    check(
      'diagnoses_type_check',
      sql`${table.diagnosisType} IN ('Primary', 'Secondary', 'Admission', 'Working')`,
    ),
    check(
      'diagnoses_resolved_after_diagnosed_check',
      sql`${table.resolvedDate} IS NULL OR ${table.resolvedDate} >= ${table.diagnosedDate}`,
    ),
  ],
);

// --- Inferred Types ---

export type InsertEncounter = typeof encounters.$inferInsert;
export type SelectEncounter = typeof encounters.$inferSelect;

export type InsertDiagnosis = typeof diagnoses.$inferInsert;
export type SelectDiagnosis = typeof diagnoses.$inferSelect;
