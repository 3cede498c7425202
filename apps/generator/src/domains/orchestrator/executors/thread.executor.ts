import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import {
  GeneratorError,
  PartitionFailedError,
  PartitionTimeoutError,
} from '../../../lib/errors.js';
import type { EncounterEvents } from '../../dataset/dataset.types.js';
import type { PartitionTask } from '../partition.runner.js';
import type {
  ExecuteOptions,
  PartitionExecutor,
  PartitionWorkerResponse,
} from './executor.types.js';

/** The worker module beside this one, with the same extension (.ts under tsx, .js once built). */
function defaultWorkerUrl(): URL {
  const ext = path.extname(fileURLToPath(import.meta.url));
  return new URL(`../partition.worker${ext}`, import.meta.url);
}

/**
 * Worker threads do not inherit the parent's loader hooks, so a `.ts` worker
 * is started from a script that imports it through tsx.
 */
function spawnWorker(workerUrl: URL): Worker {
  if (!workerUrl.pathname.endsWith('.ts')) {
    return new Worker(workerUrl);
  }
  const bootstrap =
    `import('tsx/esm/api').then(({ tsImport }) => ` +
    `tsImport(${JSON.stringify(workerUrl.href)}, ${JSON.stringify(import.meta.url)}));`;
  return new Worker(bootstrap, { eval: true });
}

function reviveError(error: { name: string; code?: string; message: string }): Error {
  const revived =
    error.code !== undefined ? new GeneratorError(error.code, error.message) : new Error(error.message);
  revived.name = error.name;
  return revived;
}

/**
 * One worker_threads worker per partition. Tasks and results cross the thread
 * boundary by structured clone, so workers share no mutable state.
 */
export function createThreadExecutor(opts: { workerUrl?: URL } = {}): PartitionExecutor {
  const workerUrl = opts.workerUrl ?? defaultWorkerUrl();

  function runInWorker(
    task: PartitionTask,
    workers: Worker[],
    { timeoutMs, signal }: ExecuteOptions,
  ): Promise<EncounterEvents> {
    return new Promise<EncounterEvents>((resolve, reject) => {
      const worker = spawnWorker(workerUrl);
      workers.push(worker);

      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => fail(signal?.reason);

      const settle = () => {
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const fail = (cause: unknown) => {
        if (settled) return;
        settle();
        reject(new PartitionFailedError(task.index, cause));
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => fail(new PartitionTimeoutError(timeoutMs)), timeoutMs);
      }
      if (signal?.aborted) {
        fail(signal.reason);
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      worker.on('message', (response: PartitionWorkerResponse) => {
        if (settled) return;
        if (response.ok) {
          settle();
          resolve(response.events);
        } else {
          fail(reviveError(response.error));
        }
      });
      worker.on('error', fail);
      worker.on('exit', (code) => fail(new Error(`Worker exited with code ${code}`)));

      worker.postMessage(task);
    });
  }

  return {
    kind: 'threads',

    async execute(tasks: readonly PartitionTask[], executeOpts: ExecuteOptions = {}) {
      const workers: Worker[] = [];
      try {
        return await Promise.all(tasks.map((task) => runInWorker(task, workers, executeOpts)));
      } finally {
        // Stops the survivors after a failure; finished workers exit on their own
        await Promise.all(workers.map((worker) => worker.terminate()));
      }
    },
  };
}
