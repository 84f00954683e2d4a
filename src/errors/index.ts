/**
 * Failures raised by ragprep. `code` is stable and meant for callers that
 * branch on the kind of failure rather than its message.
 */
export class RagprepError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'RagprepError';
  }
}

// Bad caller input: extraction or CLI options, a blank document id, a config value out of range
export class ValidationError extends RagprepError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Unusable settings: unordered chunk bounds, a malformed .ragprep.ini, a bad scoring regex
export class ConfigError extends RagprepError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// An accumulator used out of order, e.g. written to after finalize()
export class ProcessingError extends RagprepError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Normalizes a thrown value; non-Error values are wrapped with the context they were caught in
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

export function isRagprepError(e: unknown): e is RagprepError {
  return e instanceof RagprepError;
}
