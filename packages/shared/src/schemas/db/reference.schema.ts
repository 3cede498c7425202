// ============================================================================
// Reference Data — Drizzle DB Schema (units, medications)
// ============================================================================

import {
  pgSchema,
  serial,
  varchar,
  integer,
  boolean,
  unique,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// All target tables live in the `clinical` schema.
export const clinicalSchema = pgSchema('clinical');

// --- Units Table ---

export const units = clinicalSchema.table(
  'units',
  {
    unitId: serial('unit_id').primaryKey(),
    unitCode: varchar('unit_code', { length: 20 }).notNull().unique(),
    unitName: varchar('unit_name', { length: 100 }).notNull(),
    unitType: varchar('unit_type', { length: 50 }),
    floor: varchar('floor', { length: 10 }),
    building: varchar('building', { length: 50 }),
    phone: varchar('phone', { length: 30 }),
    totalBeds: integer('total_beds'),
    isActive: boolean('is_active').default(true),
  },
  (table) => [
    check('units_total_beds_check', sql`${table.totalBeds} IS NULL OR ${table.totalBeds} > 0`),
  ],
);

// --- Medications Table ---
// Formulary. (medication_name, generic_name) is the natural key.

export const medications = clinicalSchema.table(
  'medications',
  {
    medicationId: serial('medication_id').primaryKey(),
    medicationName: varchar('medication_name', { length: 200 }).notNull(),
    genericName: varchar('generic_name', { length: 200 }),
    brandName: varchar('brand_name', { length: 200 }),
    medicationClass: varchar('medication_class', { length: 100 }),
    controlledSubstanceSchedule: varchar('controlled_substance_schedule', {
      length: 10,
    }),
    defaultRoute: varchar('default_route', { length: 50 }),
    defaultForm: varchar('default_form', { length: 50 }),
    isHighAlert: boolean('is_high_alert').default(false),
    isActive: boolean('is_active').default(true),
  },
  (table) => [
    unique('medications_name_generic_uniq').on(
      table.medicationName,
      table.genericName,
    ),
  ],
);

// --- Inferred Types ---

export type InsertUnit = typeof units.$inferInsert;
export type SelectUnit = typeof units.$inferSelect;

export type InsertMedication = typeof medications.$inferInsert;
export type SelectMedication = typeof medications.$inferSelect;
