export class VellumError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VellumError';
  }
}

export class ConfigNotFoundError extends VellumError {
  constructor(path: string) {
    super(
      `No .vellum/ directory found at ${path}. Run "vellum init" to create a journal.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ValidationError extends VellumError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EntryNotFoundError extends VellumError {
  constructor(id: string) {
    super(`Entry not found: "${id}". Run "vellum entry list" to see saved entries.`);
    this.name = 'EntryNotFoundError';
  }
}

export class DuplicateEntryError extends VellumError {
  constructor(id: string) {
    super(`Entry "${id}" is already in the catalog.`);
    this.name = 'DuplicateEntryError';
  }
}

export class InvalidEntryError extends VellumError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEntryError';
  }
}

export class MediaIOError extends VellumError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MediaIOError';
  }
}

export class CatalogSerializationError extends VellumError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CatalogSerializationError';
  }
}

export class AccountUnavailableError extends VellumError {
  constructor(reason: string) {
    super(`Remote account unavailable: ${reason}`);
    this.name = 'AccountUnavailableError';
  }
}

export class RemoteServiceError extends VellumError {
  constructor(
    operation: string,
    public readonly cause?: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? 'unknown error' : String(cause);
    super(`Remote ${operation} failed: ${detail}`);
    this.name = 'RemoteServiceError';
  }
}

export class PartialBatchFailureError extends VellumError {
  constructor(
    public readonly batchIndex: number,
    public readonly batchCount: number,
    public readonly cause?: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Upload batch ${batchIndex + 1} of ${batchCount} failed: ${detail}`);
    this.name = 'PartialBatchFailureError';
  }
}

export class InvalidSyncTransitionError extends VellumError {
  constructor(from: string, to: string) {
    super(`Sync status cannot move from "${from}" to "${to}".`);
    this.name = 'InvalidSyncTransitionError';
  }
}

export class TranscriptionError extends VellumError {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptionError';
  }
}

export class AmbiguousRefError extends VellumError {
  constructor(input: string, matchCount: number) {
    super(`"${input}" matches ${matchCount} entries. Use more characters of the id.`);
    this.name = 'AmbiguousRefError';
  }
}
