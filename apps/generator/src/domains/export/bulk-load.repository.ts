// ============================================================================
// Export — bulk loader
// Inserts a generated dataset into the clinical schema in foreign-key order,
// one transaction per table, then moves each serial sequence past the
// explicit ids.
// ============================================================================

import { inArray, sql } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  allergies,
  diagnoses,
  encounters,
  labResults,
  medicationAdministrations,
  medications,
  nursingAssessments,
  patients,
  providers,
  units,
  vitalSigns,
  type InsertLabResult,
  type InsertUnit,
  type InsertVitalSign,
} from '@clinical-synth/shared/schemas/db/index.js';
import type {
  Dataset,
  LabResultRecord,
  UnitRecord,
  VitalSignRecord,
} from '../dataset/dataset.types.js';
import { ExportGroup } from './export.columns.js';

export const DEFAULT_CHUNK_SIZE = 1000;

type Transaction = Parameters<Parameters<NodePgDatabase['transaction']>[0]>[0];

export interface TableLoadResult {
  table: string;
  rows: number;
  chunks: number;
}

// ---------------------------------------------------------------------------
// Row mapping (numeric columns travel as strings)
// ---------------------------------------------------------------------------

function numericOrNull(value: number | null): string | null {
  return value === null ? null : String(value);
}

export function toUnitRow(unit: UnitRecord): InsertUnit {
  const { population: _population, encounterTypes: _types, ...row } = unit;
  return row;
}

export function toLabResultRow(lab: LabResultRecord): InsertLabResult {
  return {
    ...lab,
    resultValue: String(lab.resultValue),
    referenceRangeLow: String(lab.referenceRangeLow),
    referenceRangeHigh: String(lab.referenceRangeHigh),
  };
}

export function toVitalSignRow(vital: VitalSignRecord): InsertVitalSign {
  return {
    ...vital,
    temperatureF: String(vital.temperatureF),
    weightKg: numericOrNull(vital.weightKg),
    heightCm: numericOrNull(vital.heightCm),
    bmi: numericOrNull(vital.bmi),
    oxygenFlowRate: numericOrNull(vital.oxygenFlowRate),
  };
}

export function chunk<T>(rows: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// Bulk Load Repository
// ---------------------------------------------------------------------------

export function createBulkLoadRepository(db: NodePgDatabase) {
  async function loadTable<T>(
    table: string,
    rows: readonly T[],
    chunkSize: number,
    insert: (tx: Transaction, batch: T[]) => Promise<unknown>,
  ): Promise<TableLoadResult> {
    const batches = chunk(rows, chunkSize);
    await db.transaction(async (tx) => {
      for (const batch of batches) {
        await insert(tx, batch);
      }
    });
    return { table, rows: rows.length, chunks: batches.length };
  }

  async function syncSequence(table: string, idColumn: string): Promise<void> {
    const qualified = `clinical.${table}`;
    await db.execute(sql`
      SELECT setval(
        pg_get_serial_sequence(${qualified}, ${idColumn}),
        COALESCE((SELECT MAX(${sql.identifier(idColumn)}) FROM ${sql.identifier('clinical')}.${sql.identifier(table)}), 1),
        (SELECT COUNT(*) > 0 FROM ${sql.identifier('clinical')}.${sql.identifier(table)})
      )
    `);
  }

  async function markPatientsInactive(patientIds: readonly number[]): Promise<void> {
    for (const batch of chunk(patientIds, DEFAULT_CHUNK_SIZE)) {
      await db
        .update(patients)
        .set({ isActive: false })
        .where(inArray(patients.patientId, batch));
    }
  }

  return {
    markPatientsInactive,

    /**
     * Insert the tables of the given stages. Loading only the encounters
     * stage assumes the base tables are already present and updates the
     * patients' is_active flags in place.
     */
    async loadDataset(
      dataset: Dataset,
      groups: readonly ExportGroup[],
      chunkSize: number = DEFAULT_CHUNK_SIZE,
    ): Promise<TableLoadResult[]> {
      const results: TableLoadResult[] = [];
      const sequences: Array<[string, string]> = [];

      if (groups.includes(ExportGroup.BASE)) {
        results.push(
          await loadTable('providers', dataset.reference.providers, chunkSize, (tx, batch) =>
            tx.insert(providers).values(batch),
          ),
          await loadTable('units', dataset.reference.units.map(toUnitRow), chunkSize, (tx, batch) =>
            tx.insert(units).values(batch),
          ),
          await loadTable('medications', dataset.reference.medications, chunkSize, (tx, batch) =>
            tx.insert(medications).values(batch),
          ),
          await loadTable('patients', dataset.patients, chunkSize, (tx, batch) =>
            tx.insert(patients).values(batch),
          ),
        );
        sequences.push(
          ['providers', 'provider_id'],
          ['units', 'unit_id'],
          ['medications', 'medication_id'],
          ['patients', 'patient_id'],
        );
      }

      if (groups.includes(ExportGroup.ENCOUNTERS)) {
        if (!groups.includes(ExportGroup.BASE)) {
          await markPatientsInactive(
            dataset.patients.filter((p) => !p.isActive).map((p) => p.patientId),
          );
        }

        results.push(
          await loadTable('encounters', dataset.encounters, chunkSize, (tx, batch) =>
            tx.insert(encounters).values(batch),
          ),
          await loadTable('diagnoses', dataset.diagnoses, chunkSize, (tx, batch) =>
            tx.insert(diagnoses).values(batch),
          ),
          await loadTable(
            'medication_administrations',
            dataset.medicationAdministrations,
            chunkSize,
            (tx, batch) => tx.insert(medicationAdministrations).values(batch),
          ),
          await loadTable('lab_results', dataset.labResults.map(toLabResultRow), chunkSize, (tx, batch) =>
            tx.insert(labResults).values(batch),
          ),
          await loadTable('vital_signs', dataset.vitalSigns.map(toVitalSignRow), chunkSize, (tx, batch) =>
            tx.insert(vitalSigns).values(batch),
          ),
          await loadTable('nursing_assessments', dataset.nursingAssessments, chunkSize, (tx, batch) =>
            tx.insert(nursingAssessments).values(batch),
          ),
          await loadTable('allergies', dataset.allergies, chunkSize, (tx, batch) =>
            tx.insert(allergies).values(batch),
          ),
        );
        sequences.push(
          ['encounters', 'encounter_id'],
          ['diagnoses', 'diagnosis_id'],
          ['medication_administrations', 'admin_id'],
          ['lab_results', 'lab_id'],
          ['vital_signs', 'vital_id'],
          ['nursing_assessments', 'assessment_id'],
          ['allergies', 'allergy_id'],
        );
      }

      for (const [table, idColumn] of sequences) {
        await syncSequence(table, idColumn);
      }

      return results;
    },
  };
}

export type BulkLoadRepository = ReturnType<typeof createBulkLoadRepository>;
