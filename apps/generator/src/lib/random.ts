import { Faker, base, en } from '@faker-js/faker';

// ---------------------------------------------------------------------------
// Seed derivation
// ---------------------------------------------------------------------------

/** Salts that separate the independent random streams of a run. */
export const StreamSalt = {
  REFERENCE: 0x5245_4600,
  PATIENTS: 0x5041_5400,
  ALLOCATION: 0x414c_4c00,
  PARTITION: 0x5041_5200,
  ENCOUNTERS: 0x454e_4300,
  EVENTS: 0x4556_5400,
  ALLERGIES: 0x414c_4700,
} as const;

/**
 * Mixes a base seed with salts into a 32-bit unsigned seed.
 * Same inputs always yield the same seed; neighbouring salts diverge.
 */
export function deriveSeed(seed: number, ...salts: number[]): number {
  let h = (seed ^ 0x9e3779b9) >>> 0;
  for (const salt of salts) {
    h = Math.imul(h ^ (salt >>> 0), 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
  }
  return h >>> 0;
}

// ---------------------------------------------------------------------------
// RandomStream
// ---------------------------------------------------------------------------

/**
 * An explicitly seeded source of randomness. Each stream owns its own Faker
 * instance, so no generator touches global random state.
 */
export class RandomStream {
  readonly faker: Faker;

  constructor(readonly seed: number) {
    this.faker = new Faker({ locale: [en, base] });
    this.faker.seed(seed);
  }

  /** Child stream whose sequence depends only on this seed and the salts. */
  fork(...salts: number[]): RandomStream {
    return new RandomStream(deriveSeed(this.seed, ...salts));
  }

  int(min: number, max: number): number {
    return this.faker.number.int({ min, max });
  }

  float(min: number, max: number, fractionDigits?: number): number {
    return this.faker.number.float({ min, max, fractionDigits });
  }

  /** Always consumes one draw, whatever the probability. */
  chance(probability: number): boolean {
    return this.faker.number.float({ min: 0, max: 1 }) < probability;
  }

  pick<T>(items: readonly T[]): T {
    return this.faker.helpers.arrayElement(items);
  }

  /** `count` distinct elements in random order. */
  sample<T>(items: readonly T[], count: number): T[] {
    return this.faker.helpers.arrayElements(items, count);
  }

  weighted<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T {
    return this.faker.helpers.weightedArrayElement(entries);
  }

  /** Box–Muller normal draw. */
  gaussian(mean: number, sd: number): number {
    const u1 = 1 - this.faker.number.float({ min: 0, max: 1 });
    const u2 = this.faker.number.float({ min: 0, max: 1 });
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * sd;
  }

  /** Instant in [from, to] at whole-second resolution. */
  dateBetween(from: Date, to: Date): Date {
    const lo = Math.ceil(from.getTime() / 1000);
    const hi = Math.floor(to.getTime() / 1000);
    if (hi <= lo) {
      return new Date(lo * 1000);
    }
    return new Date(this.int(lo, hi) * 1000);
  }

  digits(length: number): string {
    return this.faker.string.numeric({ length, allowLeadingZeros: true });
  }
}
