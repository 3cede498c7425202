import { PartitionFailedError, PartitionTimeoutError } from '../../../lib/errors.js';
import type { EncounterEvents } from '../../dataset/dataset.types.js';
import { runPartition, type PartitionTask } from '../partition.runner.js';
import type { ExecuteOptions, PartitionExecutor } from './executor.types.js';

/**
 * Runs partitions one after another on the calling thread. Timers cannot
 * interrupt a synchronous partition, so the deadline and the abort signal are
 * checked between patients instead.
 */
export function createInlineExecutor(
  deps: { run?: typeof runPartition } = {},
): PartitionExecutor {
  const run = deps.run ?? runPartition;

  return {
    kind: 'inline',

    async execute(tasks: readonly PartitionTask[], opts: ExecuteOptions = {}) {
      const { timeoutMs, signal } = opts;
      const results: EncounterEvents[] = [];

      for (const task of tasks) {
        const startedAt = Date.now();
        const checkpoint = () => {
          signal?.throwIfAborted();
          if (timeoutMs !== undefined && Date.now() - startedAt > timeoutMs) {
            throw new PartitionTimeoutError(timeoutMs);
          }
        };

        try {
          checkpoint();
          results.push(run(task, { checkpoint }));
        } catch (err) {
          throw new PartitionFailedError(task.index, err);
        }

        // Let other work (and abort listeners) run between partitions
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      return results;
    },
  };
}
