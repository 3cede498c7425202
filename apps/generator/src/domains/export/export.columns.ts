// ============================================================================
// Export — table load contract
// Column order per table is the order the bulk loader and the CSV files use;
// it matches the Drizzle table definitions column for column.
// ============================================================================

import type { PgTable } from 'drizzle-orm/pg-core';
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
} from '@clinical-synth/shared/schemas/db/index.js';
import type { Dataset } from '../dataset/dataset.types.js';
import type { CsvValue } from './csv.writer.js';

export const ExportGroup = {
  BASE: 'base',
  ENCOUNTERS: 'encounters',
} as const;

export type ExportGroup = (typeof ExportGroup)[keyof typeof ExportGroup];

export interface TableExport {
  /** Target table name, also the CSV file name. */
  name: string;
  table: PgTable;
  /** Record keys in load order. */
  columns: readonly string[];
  /** snake_case column names in load order. */
  header: readonly string[];
  /** Generation stages whose output includes this table. */
  groups: readonly ExportGroup[];
  rows(dataset: Dataset): CsvValue[][];
}

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
}

function defineExport<K extends string, T extends { [P in K]: CsvValue }>(definition: {
  name: string;
  table: PgTable;
  groups: readonly ExportGroup[];
  columns: readonly K[];
  records: (dataset: Dataset) => readonly T[];
}): TableExport {
  return {
    name: definition.name,
    table: definition.table,
    columns: definition.columns,
    header: definition.columns.map(toSnakeCase),
    groups: definition.groups,
    rows: (dataset) => definition.records(dataset).map((record) => definition.columns.map((key) => record[key])),
  };
}

const BASE = [ExportGroup.BASE] as const;
const ENCOUNTERS = [ExportGroup.ENCOUNTERS] as const;

// Patients are rewritten by the encounters stage: merge updates is_active.
const BOTH = [ExportGroup.BASE, ExportGroup.ENCOUNTERS] as const;

// ---------------------------------------------------------------------------
// Tables, in foreign-key order
// ---------------------------------------------------------------------------

export const TABLE_EXPORTS: readonly TableExport[] = [
  defineExport({
    name: 'providers',
    table: providers,
    groups: BASE,
    columns: [
      'providerId', 'npi', 'firstName', 'lastName', 'middleName', 'title', 'specialty',
      'department', 'phone', 'email', 'pager', 'hireDate', 'isActive',
    ],
    records: (d) => d.reference.providers,
  }),
  defineExport({
    name: 'units',
    table: units,
    groups: BASE,
    columns: [
      'unitId', 'unitCode', 'unitName', 'unitType', 'floor', 'building', 'phone',
      'totalBeds', 'isActive',
    ],
    records: (d) => d.reference.units,
  }),
  defineExport({
    name: 'medications',
    table: medications,
    groups: BASE,
    columns: [
      'medicationId', 'medicationName', 'genericName', 'brandName', 'medicationClass',
      'controlledSubstanceSchedule', 'defaultRoute', 'defaultForm', 'isHighAlert', 'isActive',
    ],
    records: (d) => d.reference.medications,
  }),
  defineExport({
    name: 'patients',
    table: patients,
    groups: BOTH,
    columns: [
      'patientId', 'mrn', 'firstName', 'lastName', 'middleName', 'dateOfBirth', 'sex',
      'race', 'ethnicity', 'primaryLanguage', 'ssnLast4', 'streetAddress', 'city', 'state',
      'zipCode', 'phonePrimary', 'phoneSecondary', 'email', 'emergencyContactName',
      'emergencyContactRelationship', 'emergencyContactPhone', 'insuranceProvider',
      'insurancePolicyNumber', 'createdAt', 'isActive',
    ],
    records: (d) => d.patients,
  }),
  defineExport({
    name: 'encounters',
    table: encounters,
    groups: ENCOUNTERS,
    columns: [
      'encounterId', 'patientId', 'encounterNumber', 'encounterType', 'admitDate',
      'dischargeDate', 'admittingProviderId', 'attendingProviderId', 'currentUnitId',
      'roomNumber', 'bedNumber', 'chiefComplaint', 'admissionSource', 'dischargeDisposition',
      'encounterStatus', 'createdAt',
    ],
    records: (d) => d.encounters,
  }),
  defineExport({
    name: 'diagnoses',
    table: diagnoses,
    groups: ENCOUNTERS,
    columns: [
      'diagnosisId', 'encounterId', 'icd10Code', 'diagnosisDescription', 'diagnosisType',
      'diagnosedDate', 'diagnosedByProviderId', 'isResolved', 'resolvedDate',
    ],
    records: (d) => d.diagnoses,
  }),
  defineExport({
    name: 'medication_administrations',
    table: medicationAdministrations,
    groups: ENCOUNTERS,
    columns: [
      'adminId', 'encounterId', 'medicationId', 'orderedDose', 'orderedUnit', 'orderedRoute',
      'orderedFrequency', 'adminDate', 'adminDose', 'adminUnit', 'adminRoute', 'adminSite',
      'orderingProviderId', 'administeringProviderId', 'adminStatus', 'holdReason', 'createdAt',
    ],
    records: (d) => d.medicationAdministrations,
  }),
  defineExport({
    name: 'lab_results',
    table: labResults,
    groups: ENCOUNTERS,
    columns: [
      'labId', 'encounterId', 'loincCode', 'testName', 'testCategory', 'resultValue',
      'resultUnit', 'resultStatus', 'abnormalFlag', 'referenceRangeLow', 'referenceRangeHigh',
      'collectedDate', 'resultedDate', 'orderingProviderId', 'createdAt',
    ],
    records: (d) => d.labResults,
  }),
  defineExport({
    name: 'vital_signs',
    table: vitalSigns,
    groups: ENCOUNTERS,
    columns: [
      'vitalId', 'encounterId', 'temperatureF', 'heartRate', 'respiratoryRate',
      'bloodPressureSystolic', 'bloodPressureDiastolic', 'oxygenSaturation', 'painScale',
      'weightKg', 'heightCm', 'bmi', 'position', 'oxygenDelivery', 'oxygenFlowRate',
      'recordedDate', 'recordedByProviderId',
    ],
    records: (d) => d.vitalSigns,
  }),
  defineExport({
    name: 'nursing_assessments',
    table: nursingAssessments,
    groups: ENCOUNTERS,
    columns: [
      'assessmentId', 'encounterId', 'assessmentDate', 'assessmentType',
      'levelOfConsciousness', 'orientation', 'fallRiskScore', 'fallRiskLevel', 'bedAlarmOn',
      'restraintsInUse', 'skinIntegrity', 'pressureUlcerPresent', 'bradenScore',
      'activityLevel', 'gaitSteady', 'assistiveDevice', 'assessmentNotes',
      'assessingProviderId', 'createdAt',
    ],
    records: (d) => d.nursingAssessments,
  }),
  defineExport({
    name: 'allergies',
    table: allergies,
    groups: ENCOUNTERS,
    columns: [
      'allergyId', 'patientId', 'allergen', 'allergyType', 'reaction', 'severity',
      'onsetDate', 'reportedDate', 'reportedByProviderId', 'isActive',
    ],
    records: (d) => d.allergies,
  }),
];

/** Tables written by any of the given stages, in foreign-key order. */
export function exportsFor(groups: readonly ExportGroup[]): TableExport[] {
  return TABLE_EXPORTS.filter((t) => t.groups.some((g) => groups.includes(g)));
}
