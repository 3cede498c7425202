// ============================================================================
// Patient Registry — Constants
// ============================================================================

// --- Sex (target column is CHAR(1) with CHECK IN ('M','F','O')) ---

export const Sex = {
  MALE: 'M',
  FEMALE: 'F',
  OTHER: 'O',
} as const;

export type Sex = (typeof Sex)[keyof typeof Sex];

// --- MRN format ---

export const MRN_PREFIX = 'MRN';
export const MRN_DIGITS = 7;

// --- Age bands ---

export const PEDIATRIC_AGE_RANGE = { min: 0, max: 17 } as const;
export const ADULT_AGE_RANGE = { min: 18, max: 95 } as const;

/** Years before the encounter history window in which a patient may be registered. */
export const REGISTRATION_LEAD_DAYS = 365;

// --- Demographic value sets ---

export const RACES = ['White', 'Black', 'Asian', 'Hispanic', 'Other'] as const;

export const ETHNICITIES = ['Hispanic', 'Non-Hispanic'] as const;

export const PRIMARY_LANGUAGES = [
  'English',
  'Spanish',
  'Chinese',
  'Vietnamese',
  'Arabic',
] as const;

export const EMERGENCY_CONTACT_RELATIONSHIPS = [
  'Spouse',
  'Parent',
  'Child',
  'Sibling',
  'Friend',
] as const;

export const INSURANCE_PROVIDERS = [
  'Blue Cross',
  'Aetna',
  'UnitedHealth',
  'Cigna',
  'Medicare',
  'Medicaid',
] as const;

// --- Allergies ---

export const AllergySeverity = {
  MILD: 'Mild',
  MODERATE: 'Moderate',
  SEVERE: 'Severe',
  LIFE_THREATENING: 'Life-threatening',
} as const;

export type AllergySeverity =
  (typeof AllergySeverity)[keyof typeof AllergySeverity];

export const AllergyType = {
  DRUG: 'Drug',
  FOOD: 'Food',
  ENVIRONMENTAL: 'Environmental',
} as const;

export type AllergyType = (typeof AllergyType)[keyof typeof AllergyType];

export interface AllergenDefinition {
  allergen: string;
  allergyType: AllergyType;
  reaction: string;
  severity: AllergySeverity;
}

export const ALLERGEN_CATALOGUE: readonly AllergenDefinition[] = [
  { allergen: 'Penicillin', allergyType: AllergyType.DRUG, reaction: 'Rash', severity: AllergySeverity.MODERATE },
  { allergen: 'Sulfa', allergyType: AllergyType.DRUG, reaction: 'Hives', severity: AllergySeverity.MODERATE },
  { allergen: 'Morphine', allergyType: AllergyType.DRUG, reaction: 'Nausea', severity: AllergySeverity.MILD },
  { allergen: 'Aspirin', allergyType: AllergyType.DRUG, reaction: 'GI upset', severity: AllergySeverity.MILD },
  { allergen: 'Iodine', allergyType: AllergyType.DRUG, reaction: 'Anaphylaxis', severity: AllergySeverity.LIFE_THREATENING },
  { allergen: 'Peanuts', allergyType: AllergyType.FOOD, reaction: 'Anaphylaxis', severity: AllergySeverity.LIFE_THREATENING },
  { allergen: 'Shellfish', allergyType: AllergyType.FOOD, reaction: 'Hives', severity: AllergySeverity.MODERATE },
  { allergen: 'Eggs', allergyType: AllergyType.FOOD, reaction: 'GI upset', severity: AllergySeverity.MILD },
  { allergen: 'Latex', allergyType: AllergyType.ENVIRONMENTAL, reaction: 'Rash', severity: AllergySeverity.MODERATE },
  { allergen: 'Bee stings', allergyType: AllergyType.ENVIRONMENTAL, reaction: 'Swelling', severity: AllergySeverity.SEVERE },
];

export const ALLERGIES_PER_PATIENT = { min: 1, max: 3 } as const;
