export type StoreErrorCode =
  | 'STORE_LIST_FAILED'
  | 'STORE_READ_FAILED'
  | 'STORE_WRITE_FAILED'
  | 'STORE_STALE_HANDLE'
  | 'STORE_NOT_FOUND';

/**
 * Failure talking to the object store. Scoped to one key unless raised by a listing.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly key?: string;

  constructor(code: StoreErrorCode, message: string, options?: { key?: string; cause?: unknown }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'StoreError';
    this.code = code;
    if (options?.key !== undefined) this.key = options.key;
  }
}

/**
 * Invalid settings, detected before any scan starts
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
