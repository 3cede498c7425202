// ============================================================================
// Patient Registry — Drizzle DB Schema
// ============================================================================

import {
  serial,
  integer,
  varchar,
  char,
  boolean,
  timestamp,
  date,
  unique,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { clinicalSchema } from './reference.schema.js';
import { providers } from './provider.schema.js';

// --- Patients Table ---
// MRN is the natural key. is_active is cleared when the final encounter ends in death.

export const patients = clinicalSchema.table(
  'patients',
  {
    patientId: serial('patient_id').primaryKey(),
    mrn: varchar('mrn', { length: 20 }).notNull().unique(),
    firstName: varchar('first_name', { length: 50 }).notNull(),
    lastName: varchar('last_name', { length: 50 }).notNull(),
    middleName: varchar('middle_name', { length: 50 }),
    dateOfBirth: date('date_of_birth', { mode: 'string' }).notNull(),
    sex: char('sex', { length: 1 }),
    race: varchar('race', { length: 50 }),
    ethnicity: varchar('ethnicity', { length: 50 }),
    primaryLanguage: varchar('primary_language', { length: 20 }).default('English'),
    ssnLast4: char('ssn_last4', { length: 4 }),
    streetAddress: varchar('street_address', { length: 100 }),
    city: varchar('city', { length: 50 }),
    state: char('state', { length: 2 }),
    zipCode: varchar('zip_code', { length: 10 }),
    phonePrimary: varchar('phone_primary', { length: 30 }),
    phoneSecondary: varchar('phone_secondary', { length: 30 }),
    email: varchar('email', { length: 100 }),
    emergencyContactName: varchar('emergency_contact_name', { length: 100 }),
    emergencyContactRelationship: varchar('emergency_contact_relationship', {
      length: 50,
    }),
    emergencyContactPhone: varchar('emergency_contact_phone', { length: 30 }),
    insuranceProvider: varchar('insurance_provider', { length: 100 }),
    insurancePolicyNumber: varchar('insurance_policy_number', { length: 50 }),
    createdAt: timestamp('created_at').defaultNow(),
    updatedAt: timestamp('updated_at').defaultNow(),
    isActive: boolean('is_active').default(true),
  },
  (table) => [
    check('patients_sex_check', sql`${table.sex} IN ('M', 'F', 'O')`),
    index('patients_last_first_idx').on(table.lastName, table.firstName),
  ],
);

// --- Allergies Table ---

export const allergies = clinicalSchema.table(
  'allergies',
  {
    allergyId: serial('allergy_id').primaryKey(),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.patientId, {
        onUpdate: 'cascade',
        onDelete: 'cascade',
      }),
    allergen: varchar('allergen', { length: 200 }).notNull(),
    allergyType: varchar('allergy_type', { length: 50 }),
    reaction: varchar('reaction', { length: 200 }),
    severity: varchar('severity', { length: 20 }),
    onsetDate: date('onset_date', { mode: 'string' }),
    reportedDate: timestamp('reported_date').defaultNow(),
    reportedByProviderId: integer('reported_by_provider_id').references(
      () => providers.providerId,
    ),
    isActive: boolean('is_active').default(true),
  },
  (table) => [
    unique('allergies_patient_allergen_uniq').on(
      table.patientId,
      table.allergen,
    ),
    check(
      'allergies_severity_check',
      sql`${table.severity} IN ('Mild', 'Moderate', 'Severe', 'Life-threatening')`,
    ),
  ],
);

// --- Inferred Types ---

export type InsertPatient = typeof patients.$inferInsert;
export type SelectPatient = typeof patients.$inferSelect;

export type InsertAllergy = typeof allergies.$inferInsert;
export type SelectAllergy = typeof allergies.$inferSelect;
