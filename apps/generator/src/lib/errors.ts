export class GeneratorError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends GeneratorError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

export class UniquenessExhaustedError extends GeneratorError {
  constructor(
    public entity: string,
    public attempted: number
  ) {
    super(
      'UNIQUENESS_EXHAUSTED',
      `Could not generate a unique ${entity} after ${attempted} attempts`,
      { entity, attempted }
    );
  }
}

export class PartitionFailedError extends GeneratorError {
  constructor(
    public partitionIndex: number,
    public cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'PARTITION_FAILED',
      `Partition ${partitionIndex} failed: ${reason}`,
      { partitionIndex, reason }
    );
  }
}

export class PartitionTimeoutError extends GeneratorError {
  constructor(public timeoutMs: number) {
    super('PARTITION_TIMEOUT', `Partition exceeded its ${timeoutMs} ms budget`, { timeoutMs });
  }
}

export interface InvariantViolation {
  entity: string;
  rule: string;
  recordId?: number | string;
  message: string;
}

export class InvariantViolationError extends GeneratorError {
  constructor(public violations: InvariantViolation[]) {
    super(
      'INVARIANT_VIOLATION',
      `Dataset failed ${violations.length} invariant check(s)`,
      { violations: violations.slice(0, 20) }
    );
  }
}
