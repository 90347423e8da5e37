/**
 * Elimination errors.
 *
 * Everything the engine throws is an EliminationError, so callers can
 * catch the whole family or switch on `code`.
 */

export const ERROR_CODES = {
    INVALID_INPUT: 'INVALID_INPUT',
    NUMERIC_INSTABILITY: 'NUMERIC_INSTABILITY',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class EliminationError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, string | number | boolean> = {}
    ) {
        super(message)
        this.name = 'EliminationError'
    }
}

/** Malformed or degenerate arguments. Raised before any query or weight work. */
export class InvalidInputError extends EliminationError {
    constructor(
        message: string,
        public readonly field: string,
        public readonly value: unknown
    ) {
        super(`${field}: ${message}`, ERROR_CODES.INVALID_INPUT, { field })
        this.name = 'InvalidInputError'
    }
}

/** A radius or weight came out non-finite although validation passed */
export class NumericInstabilityError extends EliminationError {
    constructor(message: string, context: Record<string, string | number | boolean> = {}) {
        super(message, ERROR_CODES.NUMERIC_INSTABILITY, context)
        this.name = 'NumericInstabilityError'
    }
}
