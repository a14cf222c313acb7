/**
 * Error classes for conditions callers are expected to tell apart.
 * Expected mutation failures (invalid reading, bad index, ...) are not errors;
 * they travel as `MutationResult` values.
 */

export class UnknownMetricTypeError extends Error {
  readonly metricType: string;

  constructor(metricType: string) {
    super(`Unknown metric type: ${metricType}`);
    this.name = 'UnknownMetricTypeError';
    this.metricType = metricType;
  }
}

export class SyncTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
    this.name = 'SyncTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteStoreError extends Error {
  readonly collection: string;

  constructor(collection: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteStoreError';
    this.collection = collection;
  }
}

export class BackupFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackupFormatError';
  }
}
