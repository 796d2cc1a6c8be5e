import { describe, expect, it } from 'vitest';

import { describeError, PreconditionError, RetriesExhaustedError } from '../../errors';

describe('describeError', () => {
  it('prefixes the error name', () => {
    expect(describeError(new PreconditionError('Missing config'))).toBe('PreconditionError: Missing config');
    expect(describeError(new TypeError('nope'))).toBe('TypeError: nope');
  });

  it('unwraps exhausted retries to the last failure', () => {
    const err = new RetriesExhaustedError(3, new Error('HTTP 503: unavailable'));
    expect(describeError(err)).toBe('Error: HTTP 503: unavailable');
  });

  it('handles thrown non-errors', () => {
    expect(describeError('boom')).toBe('Error: boom');
  });
});
