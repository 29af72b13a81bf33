/**
 * OT Error class - Custom error for text operations
 *
 * Every failure raised by the package is an OTError carrying one of the
 * codes below, so callers can branch on `error.code` instead of parsing
 * messages.
 */

// Error codes - used for programmatic error handling
export const ERROR_CODES = {
  // Algebra errors
  ERR_OT_INCOMPATIBLE_OPERATION: 'ERR_OT_INCOMPATIBLE_OPERATION',
  ERR_OT_INVARIANT_VIOLATED: 'ERR_OT_INVARIANT_VIOLATED',

  // Operation errors
  ERR_OT_OP_BADLY_FORMED: 'ERR_OT_OP_BADLY_FORMED',

  // Registry errors
  ERR_DOC_TYPE_NOT_RECOGNIZED: 'ERR_DOC_TYPE_NOT_RECOGNIZED',

  // Configuration errors
  ERR_CONFIG_INVALID: 'ERR_CONFIG_INVALID',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Custom error class for OT operations.
 * Extends Error with a code property for programmatic handling.
 */
export class OTError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'OTError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised when an operation and a document, or two operations, do not
 * belong together: the lengths they imply disagree.
 *
 * Callers should treat this as "wrong base revision" and not retry with
 * the same inputs.
 */
export class IncompatibleOperationError extends OTError {
  constructor(message: string) {
    super(ERROR_CODES.ERR_OT_INCOMPATIBLE_OPERATION, message);
    this.name = 'IncompatibleOperationError';
  }
}
