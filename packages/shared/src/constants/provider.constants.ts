// ============================================================================
// Provider Directory — Constants
// ============================================================================

// --- Titles ---

export const ProviderTitle = {
  MD: 'MD',
  DO: 'DO',
  NP: 'NP',
  PA: 'PA',
  RN: 'RN',
  PHARMD: 'PharmD',
} as const;

export type ProviderTitle = (typeof ProviderTitle)[keyof typeof ProviderTitle];

/** Titles allowed to admit, attend, order and diagnose. */
export const PRESCRIBER_TITLES: readonly ProviderTitle[] = [
  ProviderTitle.MD,
  ProviderTitle.DO,
  ProviderTitle.NP,
  ProviderTitle.PA,
];

/** Titles that administer medications and document nursing assessments. */
export const NURSING_TITLES: readonly ProviderTitle[] = [ProviderTitle.RN];

// Relative draw weights once the fixed MD/RN seats are filled.
export const PROVIDER_TITLE_WEIGHTS: ReadonlyArray<{
  value: ProviderTitle;
  weight: number;
}> = [
  { value: ProviderTitle.MD, weight: 30 },
  { value: ProviderTitle.DO, weight: 8 },
  { value: ProviderTitle.NP, weight: 12 },
  { value: ProviderTitle.PA, weight: 8 },
  { value: ProviderTitle.RN, weight: 35 },
  { value: ProviderTitle.PHARMD, weight: 7 },
];

/** Minimum directory size: one prescriber seat and one nursing seat. */
export const MIN_PROVIDER_COUNT = 2;

export const SPECIALTIES = [
  'Internal Medicine',
  'Emergency Medicine',
  'Critical Care',
  'Cardiology',
  'Pulmonology',
  'Nephrology',
  'Gastroenterology',
  'Neurology',
  'Surgery',
  'Orthopedics',
  'Anesthesiology',
  'Nursing',
  'Pharmacy',
] as const;

export const DEPARTMENTS = [
  'Medicine',
  'Surgery',
  'Emergency',
  'ICU',
  'Pediatrics',
] as const;

// --- NPI ---

/** NPI check digits are computed over this prefix plus the 9-digit body. */
export const NPI_LUHN_PREFIX = '80840';
export const NPI_BODY_DIGITS = 9;
/** First body digit is 1 or 2 for real NPIs. */
export const NPI_BODY_MIN = 100_000_000;
export const NPI_BODY_MAX = 299_999_999;
