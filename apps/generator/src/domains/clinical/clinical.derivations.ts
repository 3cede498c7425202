// ============================================================================
// Clinical Events — Derived fields
// Pure functions of sampled values; the generators never sample these directly.
// ============================================================================

import {
  AbnormalFlag,
  AdminStatus,
  ADMIN_STATUS_REASONS,
  ANTHROPOMETRIC_RANGES,
  CRITICAL_HIGH_FACTOR,
  CRITICAL_LOW_FACTOR,
  FALL_RISK_HIGH_THRESHOLD,
  FALL_RISK_MODERATE_THRESHOLD,
  FALL_RISK_POINTS,
  FALL_RISK_SCORE_RANGE,
  FallRiskLevel,
  OxygenDelivery,
  ROOM_AIR_SATURATION_THRESHOLD,
  SUPPLEMENTAL_FLOW_RATES,
  SkinIntegrity,
} from '@clinical-synth/shared/constants/clinical.constants.js';

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, fractionDigits: number): number {
  const factor = 10 ** fractionDigits;
  return Math.round(value * factor) / factor;
}

// ---------------------------------------------------------------------------
// Lab results
// ---------------------------------------------------------------------------

export function classifyLabValue(value: number, low: number, high: number): AbnormalFlag {
  if (value < low * CRITICAL_LOW_FACTOR) return AbnormalFlag.CRITICAL_LOW;
  if (value < low) return AbnormalFlag.LOW;
  if (value > high * CRITICAL_HIGH_FACTOR) return AbnormalFlag.CRITICAL_HIGH;
  if (value > high) return AbnormalFlag.HIGH;
  return AbnormalFlag.NORMAL;
}

// ---------------------------------------------------------------------------
// Vital signs
// ---------------------------------------------------------------------------

/** BMI to one decimal, kept strictly inside the column's CHECK bounds. */
export function computeBmi(weightKg: number, heightCm: number): number {
  const meters = heightCm / 100;
  const bmi = roundTo(weightKg / (meters * meters), 1);
  return clamp(bmi, ANTHROPOMETRIC_RANGES.bmi.min + 0.1, ANTHROPOMETRIC_RANGES.bmi.max - 0.1);
}

export interface OxygenSupport {
  delivery: OxygenDelivery;
  flowRate: number | null;
}

export function oxygenSupportFor(saturation: number): OxygenSupport {
  if (saturation > ROOM_AIR_SATURATION_THRESHOLD) {
    return { delivery: OxygenDelivery.ROOM_AIR, flowRate: null };
  }
  const [low, medium, high] = SUPPLEMENTAL_FLOW_RATES;
  if (saturation >= 90) {
    return { delivery: OxygenDelivery.NASAL_CANNULA, flowRate: low };
  }
  if (saturation >= 85) {
    return { delivery: OxygenDelivery.NASAL_CANNULA, flowRate: medium };
  }
  return { delivery: OxygenDelivery.FACE_MASK, flowRate: high };
}

// ---------------------------------------------------------------------------
// Medication administration
// ---------------------------------------------------------------------------

export function holdReasonFor(status: AdminStatus): string | null {
  return status === AdminStatus.GIVEN ? null : ADMIN_STATUS_REASONS[status];
}

// ---------------------------------------------------------------------------
// Nursing
// ---------------------------------------------------------------------------

export type AmbulatoryAid = keyof typeof FALL_RISK_POINTS.ambulatoryAid;
export type GaitQuality = keyof typeof FALL_RISK_POINTS.gait;

export interface FallRiskFactors {
  fallHistory: boolean;
  secondaryDiagnosis: boolean;
  ambulatoryAid: AmbulatoryAid;
  ivAccess: boolean;
  gait: GaitQuality;
  impairedMentalStatus: boolean;
}

export function computeFallRiskScore(factors: FallRiskFactors): number {
  const score =
    (factors.fallHistory ? FALL_RISK_POINTS.fallHistory : 0) +
    (factors.secondaryDiagnosis ? FALL_RISK_POINTS.secondaryDiagnosis : 0) +
    FALL_RISK_POINTS.ambulatoryAid[factors.ambulatoryAid] +
    (factors.ivAccess ? FALL_RISK_POINTS.ivAccess : 0) +
    FALL_RISK_POINTS.gait[factors.gait] +
    (factors.impairedMentalStatus ? FALL_RISK_POINTS.impairedMentalStatus : 0);
  return clamp(score, FALL_RISK_SCORE_RANGE.min, FALL_RISK_SCORE_RANGE.max);
}

export function fallRiskLevelFor(score: number): FallRiskLevel {
  if (score >= FALL_RISK_HIGH_THRESHOLD) return FallRiskLevel.HIGH;
  if (score >= FALL_RISK_MODERATE_THRESHOLD) return FallRiskLevel.MODERATE;
  return FallRiskLevel.LOW;
}

export function skinIntegrityFor(pressureUlcerPresent: boolean): SkinIntegrity {
  return pressureUlcerPresent ? SkinIntegrity.IMPAIRED : SkinIntegrity.INTACT;
}
