/**
 * Error codes, the VCardError class and the Result type returned by every
 * builder and by the validator.
 */

/** Failure categories, first match wins while parsing */
export type VCardErrorCode =
  | 'InvalidInputSource'
  | 'InvalidCardStructure'
  | 'InvalidProperty'
  | 'InvalidDateTime'
  | 'ResourceExhausted'
  | 'WriteFailure';

const DESCRIPTIONS: Record<VCardErrorCode, string> = {
  InvalidInputSource: 'The input file cannot be read or is not a .vcf/.vcard file.',
  InvalidCardStructure: 'The card breaks the BEGIN/VERSION/FN/END structure or contains a malformed line.',
  InvalidProperty: 'A property is not allowed here or its parameters or values are malformed.',
  InvalidDateTime: 'A birthday or anniversary value is malformed or misplaced.',
  ResourceExhausted: 'The card could not be built because memory ran out.',
  WriteFailure: 'The card could not be written to its destination.',
};

/** One-sentence, human-readable description of an error code */
export function describeError(code: VCardErrorCode): string {
  return DESCRIPTIONS[code];
}

/** Raised by the throwing wrappers; carried inside a failed Result otherwise */
export class VCardError extends Error {
  constructor(
    public readonly code: VCardErrorCode,
    message: string = describeError(code),
    public readonly property?: string,
    public readonly line?: number,
  ) {
    super(message);
    this.name = 'VCardError';
  }
}

// ── Result ─────────────────────────────────────────────────────────────────

export type Result<T = undefined> =
  | { ok: true; value: T }
  | { ok: false; error: VCardError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/** Successful Result with no payload (validation passes) */
export const PASS: Result = { ok: true, value: undefined };

/** Failed Result; assignable to a Result of any payload type */
export function fail(
  code: VCardErrorCode,
  message?: string,
  property?: string,
  line?: number,
): Result<never> {
  return { ok: false, error: new VCardError(code, message, property, line) };
}

/**
 * Map an unexpected exception from a builder to a failed Result.
 * Only allocation failures (`RangeError`) are translated; anything else is a
 * bug and is rethrown.
 */
export function fromException(err: unknown): Result<never> {
  if (err instanceof RangeError) {
    return fail('ResourceExhausted', err.message);
  }
  throw err;
}

/** Return the value of a Result or throw its error */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
