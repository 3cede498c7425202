// ============================================================================
// Reference Data — Units & Formulary Constants
// ============================================================================

import { EncounterType } from './encounter.constants.js';

// --- Unit Types ---

export const UnitType = {
  ICU: 'ICU',
  ED: 'ED',
  MEDSURG: 'MEDSURG',
  TELEMETRY: 'TELEMETRY',
  ONCOLOGY: 'ONCOLOGY',
  ORTHOPEDICS: 'ORTHOPEDICS',
  PACU: 'PACU',
  OR: 'OR',
  LABOR_DELIVERY: 'L&D',
  NICU: 'NICU',
  PEDS: 'PEDS',
} as const;

export type UnitType = (typeof UnitType)[keyof typeof UnitType];

export const UnitPopulation = {
  ADULT: 'ADULT',
  PEDIATRIC: 'PEDIATRIC',
  ALL: 'ALL',
} as const;

export type UnitPopulation =
  (typeof UnitPopulation)[keyof typeof UnitPopulation];

export interface UnitDefinition {
  unitCode: string;
  unitName: string;
  unitType: UnitType;
  totalBeds: number;
  population: UnitPopulation;
  encounterTypes: readonly EncounterType[];
}

const { INPATIENT, OUTPATIENT, EMERGENCY, OBSERVATION } = EncounterType;

export const UNIT_CATALOGUE: readonly UnitDefinition[] = [
  { unitCode: 'ICU', unitName: 'Intensive Care Unit', unitType: UnitType.ICU, totalBeds: 20, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'MICU', unitName: 'Medical ICU', unitType: UnitType.ICU, totalBeds: 16, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'SICU', unitName: 'Surgical ICU', unitType: UnitType.ICU, totalBeds: 16, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'CCU', unitName: 'Cardiac Care Unit', unitType: UnitType.ICU, totalBeds: 12, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'ED', unitName: 'Emergency Department', unitType: UnitType.ED, totalBeds: 30, population: UnitPopulation.ALL, encounterTypes: [EMERGENCY] },
  { unitCode: 'PACU', unitName: 'Post-Anesthesia Care Unit', unitType: UnitType.PACU, totalBeds: 10, population: UnitPopulation.ALL, encounterTypes: [OUTPATIENT] },
  { unitCode: 'OR', unitName: 'Operating Room', unitType: UnitType.OR, totalBeds: 8, population: UnitPopulation.ALL, encounterTypes: [OUTPATIENT] },
  { unitCode: 'L&D', unitName: 'Labor & Delivery', unitType: UnitType.LABOR_DELIVERY, totalBeds: 15, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT, OBSERVATION] },
  { unitCode: 'NICU', unitName: 'Neonatal ICU', unitType: UnitType.NICU, totalBeds: 20, population: UnitPopulation.PEDIATRIC, encounterTypes: [INPATIENT] },
  { unitCode: 'MS1', unitName: 'Medical Surgical 1', unitType: UnitType.MEDSURG, totalBeds: 30, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT, OBSERVATION] },
  { unitCode: 'MS2', unitName: 'Medical Surgical 2', unitType: UnitType.MEDSURG, totalBeds: 30, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT, OBSERVATION] },
  { unitCode: 'MS3', unitName: 'Medical Surgical 3', unitType: UnitType.MEDSURG, totalBeds: 30, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT, OBSERVATION] },
  { unitCode: 'TELE', unitName: 'Telemetry', unitType: UnitType.TELEMETRY, totalBeds: 24, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT, OBSERVATION] },
  { unitCode: 'ONCO', unitName: 'Oncology', unitType: UnitType.ONCOLOGY, totalBeds: 20, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'ORTHO', unitName: 'Orthopedics', unitType: UnitType.ORTHOPEDICS, totalBeds: 25, population: UnitPopulation.ADULT, encounterTypes: [INPATIENT] },
  { unitCode: 'PEDS', unitName: 'Pediatrics', unitType: UnitType.PEDS, totalBeds: 18, population: UnitPopulation.PEDIATRIC, encounterTypes: [INPATIENT, OBSERVATION] },
];

export const UNIT_FLOORS = ['1', '2', '3', '4', '5', 'B', 'G'] as const;
export const UNIT_BUILDINGS = ['Main', 'North', 'South', 'East', 'West'] as const;

// --- Medication Routes & Forms ---

export const MedicationRoute = {
  PO: 'PO',
  IV: 'IV',
  IM: 'IM',
  SUBQ: 'SubQ',
  TOPICAL: 'Topical',
  PR: 'PR',
  SL: 'SL',
} as const;

export type MedicationRoute =
  (typeof MedicationRoute)[keyof typeof MedicationRoute];

export const INJECTION_ROUTES: readonly MedicationRoute[] = [
  MedicationRoute.IM,
  MedicationRoute.SUBQ,
];

export const INJECTION_SITES = ['Left arm', 'Right arm', 'Abdomen', 'Left thigh', 'Right thigh'] as const;

// --- Core Formulary ---

export interface FormularyEntry {
  medicationName: string;
  genericName: string;
  brandName: string;
  medicationClass: string;
  controlledSubstanceSchedule: string | null;
  defaultRoute: MedicationRoute;
  defaultForm: string;
  isHighAlert: boolean;
}

const { PO, IV, SUBQ } = MedicationRoute;

export const CORE_FORMULARY: readonly FormularyEntry[] = [
  { medicationName: 'Acetaminophen', genericName: 'Acetaminophen', brandName: 'Tylenol', medicationClass: 'Analgesic', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
  { medicationName: 'Aspirin', genericName: 'Aspirin', brandName: 'Bayer', medicationClass: 'Antiplatelet', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
  { medicationName: 'Atorvastatin', genericName: 'Atorvastatin', brandName: 'Lipitor', medicationClass: 'Statin', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
  { medicationName: 'Metoprolol', genericName: 'Metoprolol', brandName: 'Lopressor', medicationClass: 'Beta Blocker', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
  { medicationName: 'Lisinopril', genericName: 'Lisinopril', brandName: 'Prinivil', medicationClass: 'ACE Inhibitor', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
  { medicationName: 'Furosemide', genericName: 'Furosemide', brandName: 'Lasix', medicationClass: 'Loop Diuretic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Warfarin', genericName: 'Warfarin', brandName: 'Coumadin', medicationClass: 'Anticoagulant', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: true },
  { medicationName: 'Insulin Regular', genericName: 'Insulin Regular', brandName: 'Humulin R', medicationClass: 'Insulin', controlledSubstanceSchedule: null, defaultRoute: SUBQ, defaultForm: 'injection', isHighAlert: true },
  { medicationName: 'Morphine', genericName: 'Morphine', brandName: 'MS Contin', medicationClass: 'Opioid', controlledSubstanceSchedule: 'II', defaultRoute: IV, defaultForm: 'injection', isHighAlert: true },
  { medicationName: 'Fentanyl', genericName: 'Fentanyl', brandName: 'Sublimaze', medicationClass: 'Opioid', controlledSubstanceSchedule: 'II', defaultRoute: IV, defaultForm: 'injection', isHighAlert: true },
  { medicationName: 'Midazolam', genericName: 'Midazolam', brandName: 'Versed', medicationClass: 'Benzodiazepine', controlledSubstanceSchedule: 'IV', defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Propofol', genericName: 'Propofol', brandName: 'Diprivan', medicationClass: 'Anesthetic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Vancomycin', genericName: 'Vancomycin', brandName: 'Vancocin', medicationClass: 'Antibiotic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Piperacillin-Tazobactam', genericName: 'Piperacillin-Tazobactam', brandName: 'Zosyn', medicationClass: 'Antibiotic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Ceftriaxone', genericName: 'Ceftriaxone', brandName: 'Rocephin', medicationClass: 'Antibiotic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Heparin', genericName: 'Heparin', brandName: 'Heparin', medicationClass: 'Anticoagulant', controlledSubstanceSchedule: null, defaultRoute: SUBQ, defaultForm: 'injection', isHighAlert: true },
  { medicationName: 'Enoxaparin', genericName: 'Enoxaparin', brandName: 'Lovenox', medicationClass: 'Anticoagulant', controlledSubstanceSchedule: null, defaultRoute: SUBQ, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Omeprazole', genericName: 'Omeprazole', brandName: 'Prilosec', medicationClass: 'Proton Pump Inhibitor', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'capsule', isHighAlert: false },
  { medicationName: 'Ondansetron', genericName: 'Ondansetron', brandName: 'Zofran', medicationClass: 'Antiemetic', controlledSubstanceSchedule: null, defaultRoute: IV, defaultForm: 'injection', isHighAlert: false },
  { medicationName: 'Metformin', genericName: 'Metformin', brandName: 'Glucophage', medicationClass: 'Antidiabetic', controlledSubstanceSchedule: null, defaultRoute: PO, defaultForm: 'tablet', isHighAlert: false },
];

// Synthetic formulary entries beyond the core list
export const SYNTHETIC_MEDICATION_SUFFIXES = ['azole', 'mycin', 'cillin', 'pril', 'olol'] as const;
export const SYNTHETIC_BRAND_SUFFIXES = ['ex', 'in', 'ol', 'an'] as const;
export const SYNTHETIC_MEDICATION_CLASSES = [
  'Antibiotic',
  'Analgesic',
  'Antihypertensive',
  'Anticoagulant',
] as const;
