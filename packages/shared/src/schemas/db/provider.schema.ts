// ============================================================================
// Provider Directory — Drizzle DB Schema
// ============================================================================

import {
  serial,
  char,
  varchar,
  date,
  boolean,
  timestamp,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { clinicalSchema } from './reference.schema.js';

// --- Providers Table ---
// NPI is 10 digits with a Luhn check digit over the 80840 prefix.

export const providers = clinicalSchema.table(
  'providers',
  {
    providerId: serial('provider_id').primaryKey(),
    npi: char('npi', { length: 10 }).unique(),
    firstName: varchar('first_name', { length: 50 }).notNull(),
    lastName: varchar('last_name', { length: 50 }).notNull(),
    middleName: varchar('middle_name', { length: 50 }),
    title: varchar('title', { length: 20 }),
    specialty: varchar('specialty', { length: 100 }),
    department: varchar('department', { length: 100 }),
    phone: varchar('phone', { length: 30 }),
    email: varchar('email', { length: 100 }),
    pager: varchar('pager', { length: 20 }),
    hireDate: date('hire_date', { mode: 'string' }),
    isActive: boolean('is_active').default(true),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [
    check('providers_npi_format_check', sql`${table.npi} ~ '^[0-9]{10}$'`),
  ],
);

// --- Inferred Types ---

export type InsertProvider = typeof providers.$inferInsert;
export type SelectProvider = typeof providers.$inferSelect;
