import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import { getTableColumns } from 'drizzle-orm';
import { silentLogger } from '../../lib/logger.js';
import { makeConfig, makePatients, makeReference } from '../../../test/helpers/fixtures.js';
import type { Dataset, LabResultRecord, UnitRecord, VitalSignRecord } from '../dataset/dataset.types.js';
import { generateEncounterData } from '../orchestrator/orchestrator.service.js';
import {
  chunk,
  createBulkLoadRepository,
  toLabResultRow,
  toUnitRow,
  toVitalSignRow,
} from './bulk-load.repository.js';
import { escapeCsvValue, formatCsvValue, toCsv, writeCsvFile } from './csv.writer.js';
import { ExportGroup, TABLE_EXPORTS, exportsFor, toSnakeCase } from './export.columns.js';

// ---------------------------------------------------------------------------
// Column contract
// ---------------------------------------------------------------------------

describe('TABLE_EXPORTS', () => {
  it('uses the Drizzle column names in table order', () => {
    for (const entry of TABLE_EXPORTS) {
      const tableColumns = Object.values(getTableColumns(entry.table)).map((c) => c.name);
      expect(tableColumns.filter((name) => entry.header.includes(name))).toEqual(entry.header);
    }
  });

  it('has one header per record key', () => {
    for (const entry of TABLE_EXPORTS) {
      expect(entry.header).toHaveLength(entry.columns.length);
    }
  });
});

describe('toSnakeCase', () => {
  it('converts record keys to column names', () => {
    expect(toSnakeCase('bloodPressureSystolic')).toBe('blood_pressure_systolic');
    expect(toSnakeCase('icd10Code')).toBe('icd10_code');
    expect(toSnakeCase('ssnLast4')).toBe('ssn_last4');
    expect(toSnakeCase('npi')).toBe('npi');
  });
});

describe('exportsFor', () => {
  it('selects the base tables', () => {
    expect(exportsFor([ExportGroup.BASE]).map((t) => t.name)).toEqual([
      'providers',
      'units',
      'medications',
      'patients',
    ]);
  });

  it('rewrites patients with the encounter tables', () => {
    expect(exportsFor([ExportGroup.ENCOUNTERS]).map((t) => t.name)).toEqual([
      'patients',
      'encounters',
      'diagnoses',
      'medication_administrations',
      'lab_results',
      'vital_signs',
      'nursing_assessments',
      'allergies',
    ]);
  });

  it('returns every table once for both stages', () => {
    expect(exportsFor([ExportGroup.BASE, ExportGroup.ENCOUNTERS])).toHaveLength(11);
  });
});

// ---------------------------------------------------------------------------
// CSV encoding
// ---------------------------------------------------------------------------

describe('escapeCsvValue', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvValue('Chest pain')).toBe('Chest pain');
  });

  it('quotes commas, quotes and newlines', () => {
    expect(escapeCsvValue('Doe, Jane')).toBe('"Doe, Jane"');
    expect(escapeCsvValue('said "no"')).toBe('"said ""no"""');
    expect(escapeCsvValue('line one\nline two')).toBe('"line one\nline two"');
  });
});

describe('formatCsvValue', () => {
  it('writes null as an empty field', () => {
    expect(formatCsvValue(null)).toBe('');
  });

  it('writes timestamps in UTC without milliseconds', () => {
    expect(formatCsvValue(new Date('2025-01-02T03:04:05.678Z'))).toBe('2025-01-02 03:04:05');
  });

  it('writes booleans and numbers', () => {
    expect(formatCsvValue(true)).toBe('true');
    expect(formatCsvValue(false)).toBe('false');
    expect(formatCsvValue(98.6)).toBe('98.6');
    expect(formatCsvValue(0)).toBe('0');
  });
});

describe('toCsv', () => {
  it('writes a header and one line per row with a trailing newline', () => {
    const csv = toCsv(
      ['id', 'name', 'active'],
      [
        [1, 'Smith, John', true],
        [2, null, false],
      ],
    );
    expect(csv).toBe('id,name,active\n1,"Smith, John",true\n2,,false\n');
  });

  it('writes only the header for no rows', () => {
    expect(toCsv(['id'], [])).toBe('id\n');
  });
});

describe('writeCsvFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'csv-writer-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and writes <table>.csv', async () => {
    const target = path.join(dir, 'nested');
    const filePath = await writeCsvFile(target, 'units', ['unit_id', 'unit_code'], [[1, 'ICU']]);
    expect(filePath).toBe(path.join(target, 'units.csv'));
    expect(await readFile(filePath, 'utf8')).toBe('unit_id,unit_code\n1,ICU\n');
  });
});

// ---------------------------------------------------------------------------
// Row mapping for the loader
// ---------------------------------------------------------------------------

describe('row mapping', () => {
  it('drops placement metadata from units', () => {
    const unit: UnitRecord = {
      unitId: 1,
      unitCode: 'ICU',
      unitName: 'Intensive Care Unit',
      unitType: 'ICU',
      floor: '3',
      building: 'Main',
      phone: '(555) 555-0300',
      totalBeds: 20,
      isActive: true,
      population: 'ADULT',
      encounterTypes: ['Inpatient'],
    };
    expect(toUnitRow(unit)).toEqual({
      unitId: 1,
      unitCode: 'ICU',
      unitName: 'Intensive Care Unit',
      unitType: 'ICU',
      floor: '3',
      building: 'Main',
      phone: '(555) 555-0300',
      totalBeds: 20,
      isActive: true,
    });
  });

  it('sends lab numerics as strings', () => {
    const lab: LabResultRecord = {
      labId: 1,
      encounterId: 1,
      loincCode: '2951-2',
      testName: 'Sodium',
      testCategory: 'Chemistry',
      resultValue: 140.5,
      resultUnit: 'mmol/L',
      resultStatus: 'Final',
      abnormalFlag: 'Normal',
      referenceRangeLow: 136,
      referenceRangeHigh: 145,
      collectedDate: new Date('2025-05-01T06:00:00Z'),
      resultedDate: null,
      orderingProviderId: 1,
      createdAt: new Date('2025-05-01T06:00:00Z'),
    };
    expect(toLabResultRow(lab)).toMatchObject({
      resultValue: '140.5',
      referenceRangeLow: '136',
      referenceRangeHigh: '145',
      resultedDate: null,
    });
  });

  it('keeps missing vital measurements null', () => {
    const vital: VitalSignRecord = {
      vitalId: 1,
      encounterId: 1,
      temperatureF: 98.6,
      heartRate: 72,
      respiratoryRate: 16,
      bloodPressureSystolic: 120,
      bloodPressureDiastolic: 80,
      oxygenSaturation: 98,
      painScale: 0,
      weightKg: 70.2,
      heightCm: null,
      bmi: null,
      position: 'Sitting',
      oxygenDelivery: 'Room Air',
      oxygenFlowRate: null,
      recordedDate: new Date('2025-05-01T08:00:00Z'),
      recordedByProviderId: 1,
    };
    expect(toVitalSignRow(vital)).toMatchObject({
      temperatureF: '98.6',
      weightKg: '70.2',
      heightCm: null,
      bmi: null,
      oxygenFlowRate: null,
    });
  });
});

describe('chunk', () => {
  it('splits rows into batches of the given size', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Bulk loader against a recording client
// ---------------------------------------------------------------------------

interface RecordedStatement {
  text: string;
  params: unknown[];
}

function recordingDatabase() {
  const statements: RecordedStatement[] = [];
  const client = Object.assign(new pg.Client(), {
    query: async (config: string | { text: string }, params: unknown[] = []) => {
      statements.push({ text: typeof config === 'string' ? config : config.text, params });
      return { rows: [], rowCount: 0, command: '', oid: 0, fields: [] };
    },
  });
  return { db: drizzle(client), statements };
}

function insertsInto(statements: RecordedStatement[], table: string): RecordedStatement[] {
  return statements.filter((s) => s.text.startsWith(`insert into "clinical"."${table}"`));
}

describe('createBulkLoadRepository', () => {
  let dataset: Dataset;

  beforeAll(async () => {
    const config = makeConfig({ patientCount: 3 });
    const result = await generateEncounterData(config, makeReference(config), makePatients(config), {
      logger: silentLogger,
    });
    dataset = result.dataset;
  });

  it('loads the base tables in batches, one transaction per table', async () => {
    const { db, statements } = recordingDatabase();
    const results = await createBulkLoadRepository(db).loadDataset(dataset, [ExportGroup.BASE], 2);

    expect(results).toEqual([
      {
        table: 'providers',
        rows: dataset.reference.providers.length,
        chunks: Math.ceil(dataset.reference.providers.length / 2),
      },
      { table: 'units', rows: 16, chunks: 8 },
      {
        table: 'medications',
        rows: dataset.reference.medications.length,
        chunks: Math.ceil(dataset.reference.medications.length / 2),
      },
      { table: 'patients', rows: 3, chunks: 2 },
    ]);
    expect(statements.filter((s) => s.text.startsWith('begin'))).toHaveLength(4);
    expect(statements.filter((s) => s.text.startsWith('commit'))).toHaveLength(4);
    expect(insertsInto(statements, 'units')).toHaveLength(8);
    expect(statements.filter((s) => s.text.includes('setval'))).toHaveLength(4);
    expect(statements.filter((s) => s.text.startsWith('update'))).toEqual([]);
  });

  it('updates patient activity when loading encounters on their own', async () => {
    const copy = structuredClone(dataset);
    copy.patients[0].isActive = false;
    const { db, statements } = recordingDatabase();
    const results = await createBulkLoadRepository(db).loadDataset(copy, [ExportGroup.ENCOUNTERS]);

    expect(results.map((r) => r.table)).toEqual([
      'encounters',
      'diagnoses',
      'medication_administrations',
      'lab_results',
      'vital_signs',
      'nursing_assessments',
      'allergies',
    ]);
    const updates = statements.filter((s) => s.text.startsWith('update "clinical"."patients"'));
    expect(updates).toHaveLength(1);
    expect(updates[0].params).toContain(false);
    expect(updates[0].params).toContain(copy.patients[0].patientId);
    expect(insertsInto(statements, 'patients')).toEqual([]);
    expect(statements.filter((s) => s.text.includes('setval'))).toHaveLength(7);
  });

  it('inserts patients instead of updating them when loading everything', async () => {
    const copy = structuredClone(dataset);
    copy.patients[0].isActive = false;
    const { db, statements } = recordingDatabase();
    const results = await createBulkLoadRepository(db).loadDataset(copy, [
      ExportGroup.BASE,
      ExportGroup.ENCOUNTERS,
    ]);

    expect(results).toHaveLength(11);
    expect(statements.filter((s) => s.text.startsWith('update'))).toEqual([]);
    expect(insertsInto(statements, 'patients')).toHaveLength(1);
  });
});
