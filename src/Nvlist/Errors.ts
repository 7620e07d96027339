import { AppError, ERROR_CODES, type ErrorDetails } from '../Common/Errors.js';

/** Codes an NvlistTypeError can carry. */
export type NvlistTypeCode =
    | typeof ERROR_CODES.UNSUPPORTED_VALUE_TYPE
    | typeof ERROR_CODES.TYPE_MISMATCH
    | typeof ERROR_CODES.VALUE_OUT_OF_RANGE;

/** NvlistTypeError: a host value has no wire representation. Raised before the value reaches any accessor. */
export class NvlistTypeError extends AppError {
    constructor(code: NvlistTypeCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
    }
}

/** NvlistMemoryError: the container library refused an allocation or an add. */
export class NvlistMemoryError extends AppError {
    /**
     * @param code ALLOC_FAILED | ADD_FAILED
     * @param message string - Summary naming the failed accessor
     * @param status number - Status the accessor returned
     */
    constructor(
        code: typeof ERROR_CODES.ALLOC_FAILED | typeof ERROR_CODES.ADD_FAILED,
        message: string,
        public readonly status: number,
        details?: ErrorDetails,
    ) {
        super(code, message, { status, ...details });
    }
}

/** NvlistDecodeError: an entry could not be read back into a host value. */
export class NvlistDecodeError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.DECODE_FAILED, message, details, cause);
    }
}
