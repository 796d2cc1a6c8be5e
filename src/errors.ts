/**
 * Raised before any work is attempted: unknown dataset, unknown platform,
 * missing platform configuration.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Raised by the step executor once every attempt has failed.
 * The message mirrors the last attempt's error.
 */
export class RetriesExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(lastError.message);
    this.name = 'RetriesExhaustedError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * "<Name>: <message>", unwrapping exhausted retries to the error that caused them.
 */
export function describeError(err: unknown): string {
  const error = err instanceof RetriesExhaustedError ? err.lastError : toError(err);
  return `${error.name}: ${error.message}`;
}
