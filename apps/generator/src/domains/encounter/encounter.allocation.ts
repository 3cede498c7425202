import type { EncounterConfig } from '@clinical-synth/shared/schemas/generator.schema.js';
import { ConfigurationError } from '../../lib/errors.js';
import type { RandomStream } from '../../lib/random.js';

/**
 * Decides how many encounters each patient gets. Runs on the main stream
 * before partitioning, so the allocation never depends on the partition count.
 *
 * - no total: each patient draws uniformly in perPatient.min..max
 * - total < patients: a sampled subset of `total` patients gets one each
 * - otherwise: one each, extras spread over patients still under perPatient.max
 */
export function allocateEncounters(
  patientCount: number,
  config: Pick<EncounterConfig, 'total' | 'perPatient'>,
  stream: RandomStream,
): number[] {
  const { min, max } = config.perPatient;

  if (config.total === undefined) {
    return Array.from({ length: patientCount }, () => stream.int(min, max));
  }

  const total = config.total;
  if (total > patientCount * max) {
    throw new ConfigurationError(
      `encounters.total (${total}) exceeds patients × perPatient.max (${patientCount * max})`,
      { total, patientCount, perPatientMax: max },
    );
  }

  const counts = new Array<number>(patientCount).fill(0);
  const indices = Array.from({ length: patientCount }, (_, i) => i);

  if (total < patientCount) {
    for (const i of stream.sample(indices, total)) {
      counts[i] = 1;
    }
    return counts;
  }

  counts.fill(1);
  const open = max > 1 ? indices : [];
  for (let remaining = total - patientCount; remaining > 0; remaining--) {
    const slot = stream.int(0, open.length - 1);
    const patient = open[slot];
    counts[patient] += 1;
    if (counts[patient] >= max) {
      open[slot] = open[open.length - 1];
      open.pop();
    }
  }
  return counts;
}
