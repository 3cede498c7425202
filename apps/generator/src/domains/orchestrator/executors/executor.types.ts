import type { EncounterEvents } from '../../dataset/dataset.types.js';
import type { PartitionTask } from '../partition.runner.js';

export interface ExecuteOptions {
  /** Wall-clock budget per partition. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs partition tasks and resolves with their outputs in task order. The
 * first failure rejects with a PartitionFailedError and abandons the rest.
 */
export interface PartitionExecutor {
  readonly kind: 'inline' | 'threads';
  execute(tasks: readonly PartitionTask[], opts?: ExecuteOptions): Promise<EncounterEvents[]>;
}

/** Message a partition worker posts back to the main thread. */
export type PartitionWorkerResponse =
  | { ok: true; events: EncounterEvents }
  | { ok: false; error: { name: string; code?: string; message: string } };
