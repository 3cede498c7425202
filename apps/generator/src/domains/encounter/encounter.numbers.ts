import {
  ENCOUNTER_TYPE_CODES,
  type EncounterType,
} from '@clinical-synth/shared/constants/encounter.constants.js';
import { ConfigurationError, UniquenessExhaustedError } from '../../lib/errors.js';
import type { RandomStream } from '../../lib/random.js';

export interface SuffixRange {
  start: number;
  end: number;
}

/**
 * Splits the suffix space of `digits` digits into `partitionCount` disjoint
 * ranges and returns the one owned by `partitionIndex`.
 */
export function suffixRangeFor(
  digits: number,
  partitionIndex: number,
  partitionCount: number,
): SuffixRange {
  const span = Math.floor(10 ** digits / partitionCount);
  if (span < 1) {
    throw new ConfigurationError(
      `encounterNumberDigits=${digits} leaves no suffixes for ${partitionCount} partitions`,
      { digits, partitionCount },
    );
  }
  const start = partitionIndex * span;
  return { start, end: start + span - 1 };
}

export interface EncounterNumberAllocator {
  next(type: EncounterType): string;
}

export function formatEncounterNumber(
  type: EncounterType,
  suffix: number,
  digits: number,
): string {
  return `${ENCOUNTER_TYPE_CODES[type]}${String(suffix).padStart(digits, '0')}`;
}

/**
 * Hands out encounter numbers unique within the allocator. Numbers from
 * different partitions cannot collide because their suffix ranges are disjoint.
 */
export function createEncounterNumberAllocator(opts: {
  digits: number;
  range: SuffixRange;
  maxRetries: number;
  stream: RandomStream;
}): EncounterNumberAllocator {
  const used = new Set<string>();

  return {
    next(type) {
      for (let attempt = 0; attempt < opts.maxRetries; attempt++) {
        const suffix = opts.stream.int(opts.range.start, opts.range.end);
        const candidate = formatEncounterNumber(type, suffix, opts.digits);
        if (!used.has(candidate)) {
          used.add(candidate);
          return candidate;
        }
      }
      throw new UniquenessExhaustedError('encounter number', opts.maxRetries);
    },
  };
}
