/**
 * Error taxonomy for the library.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    INTERNAL_ERROR: 'INTERNAL_ERROR',

    // nvlist codec
    UNSUPPORTED_VALUE_TYPE: 'UNSUPPORTED_VALUE_TYPE',
    TYPE_MISMATCH: 'TYPE_MISMATCH',
    VALUE_OUT_OF_RANGE: 'VALUE_OUT_OF_RANGE',
    ALLOC_FAILED: 'ALLOC_FAILED',
    ADD_FAILED: 'ADD_FAILED',
    DECODE_FAILED: 'DECODE_FAILED',

    // management operations
    NAME_INVALID: 'NAME_INVALID',
    NAME_TOO_LONG: 'NAME_TOO_LONG',
    PROPERTY_INVALID: 'PROPERTY_INVALID',
    POOLS_DIFFER: 'POOLS_DIFFER',
    FILESYSTEM_EXISTS: 'FILESYSTEM_EXISTS',
    DATASET_EXISTS: 'DATASET_EXISTS',
    SNAPSHOT_EXISTS: 'SNAPSHOT_EXISTS',
    HOLD_EXISTS: 'HOLD_EXISTS',
    BOOKMARK_EXISTS: 'BOOKMARK_EXISTS',
    FILESYSTEM_NOT_FOUND: 'FILESYSTEM_NOT_FOUND',
    DATASET_NOT_FOUND: 'DATASET_NOT_FOUND',
    SNAPSHOT_NOT_FOUND: 'SNAPSHOT_NOT_FOUND',
    POOL_NOT_FOUND: 'POOL_NOT_FOUND',
    PARENT_NOT_FOUND: 'PARENT_NOT_FOUND',
    HOLD_NOT_FOUND: 'HOLD_NOT_FOUND',
    DATASET_BUSY: 'DATASET_BUSY',
    SNAPSHOT_IS_HELD: 'SNAPSHOT_IS_HELD',
    SNAPSHOT_IS_CLONED: 'SNAPSHOT_IS_CLONED',
    DUPLICATE_SNAPSHOTS: 'DUPLICATE_SNAPSHOTS',
    SNAPSHOT_MISMATCH: 'SNAPSHOT_MISMATCH',
    BOOKMARK_MISMATCH: 'BOOKMARK_MISMATCH',
    BOOKMARK_NOT_SUPPORTED: 'BOOKMARK_NOT_SUPPORTED',
    FEATURE_NOT_SUPPORTED: 'FEATURE_NOT_SUPPORTED',
    BAD_HOLD_CLEANUP_FD: 'BAD_HOLD_CLEANUP_FD',
    QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
    NO_SPACE: 'NO_SPACE',
    READ_ONLY_POOL: 'READ_ONLY_POOL',
    SUSPENDED_POOL: 'SUSPENDED_POOL',
    STREAM_MISMATCH: 'STREAM_MISMATCH',
    STREAM_FEATURE_NOT_SUPPORTED: 'STREAM_FEATURE_NOT_SUPPORTED',
    BAD_STREAM: 'BAD_STREAM',
    DESTINATION_MODIFIED: 'DESTINATION_MODIFIED',
    GENERIC_FAILURE: 'GENERIC_FAILURE',

    // batch operations
    SNAPSHOT_FAILURE: 'SNAPSHOT_FAILURE',
    SNAPSHOT_DESTRUCTION_FAILURE: 'SNAPSHOT_DESTRUCTION_FAILURE',
    HOLD_FAILURE: 'HOLD_FAILURE',
    HOLD_RELEASE_FAILURE: 'HOLD_RELEASE_FAILURE',
    BOOKMARK_FAILURE: 'BOOKMARK_FAILURE',
    BOOKMARK_DESTRUCTION_FAILURE: 'BOOKMARK_DESTRUCTION_FAILURE',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic metadata attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public readonly cause?: unknown;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** ValidationError indicates caller input or configuration failed schema or semantic validation. */
export class ValidationError extends AppError {
    /**
     * @param message string - Description of validation failure
     * @param details ErrorDetails|undefined - Offending field info, schema path, etc.
     */
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details, cause);
    }
}

/** Generic internal error wrapper when an invariant of the library itself is broken. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}
