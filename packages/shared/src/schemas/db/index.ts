// Barrel export for Drizzle DB schemas
export { clinicalSchema, units, medications } from './reference.schema.js';
export type {
  InsertUnit,
  SelectUnit,
  InsertMedication,
  SelectMedication,
} from './reference.schema.js';

export { providers } from './provider.schema.js';
export type { InsertProvider, SelectProvider } from './provider.schema.js';

export { patients, allergies } from './patient.schema.js';
export type {
  InsertPatient,
  SelectPatient,
  InsertAllergy,
  SelectAllergy,
} from './patient.schema.js';

export { encounters, diagnoses } from './encounter.schema.js';
export type {
  InsertEncounter,
  SelectEncounter,
  InsertDiagnosis,
  SelectDiagnosis,
} from './encounter.schema.js';

export {
  medicationAdministrations,
  labResults,
  vitalSigns,
  nursingAssessments,
} from './clinical.schema.js';
export type {
  InsertMedicationAdministration,
  SelectMedicationAdministration,
  InsertLabResult,
  SelectLabResult,
  InsertVitalSign,
  SelectVitalSign,
  InsertNursingAssessment,
  SelectNursingAssessment,
} from './clinical.schema.js';
