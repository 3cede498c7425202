// ============================================================================
// Worker-thread entry point: runs one partition task posted by the parent.
// ============================================================================

import { parentPort } from 'node:worker_threads';
import { GeneratorError } from '../../lib/errors.js';
import type { PartitionWorkerResponse } from './executors/executor.types.js';
import { runPartition, type PartitionTask } from './partition.runner.js';

function toResponse(task: PartitionTask): PartitionWorkerResponse {
  try {
    return { ok: true, events: runPartition(task) };
  } catch (err) {
    if (err instanceof GeneratorError) {
      return { ok: false, error: { name: err.name, code: err.code, message: err.message } };
    }
    const error = err instanceof Error ? err : new Error(String(err));
    return { ok: false, error: { name: error.name, message: error.message } };
  }
}

if (parentPort) {
  const port = parentPort;
  port.once('message', (task: PartitionTask) => {
    port.postMessage(toResponse(task));
  });
}
