/**
 * @module core/errors
 * @description Error codes and error classes shared by the optimizer and its task layer
 *
 * Numerical trouble inside a run (a non-finite objective, a step that underflows)
 * is reported through the run's termination status, not thrown. Only malformed
 * caller input and programming errors surface as exceptions.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Validation Errors
    /** Malformed run or comparison request */
    VALIDATION_ERROR: 'VALIDATION_ERROR',

    // Runtime Errors
    /** Scenario preset not found */
    SCENARIO_NOT_FOUND: 'SCENARIO_NOT_FOUND',
    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class
 */
export class DescentError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'DescentError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, DescentError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Validation error (malformed request, start point or settings)
 */
export class ValidationError extends DescentError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(ErrorCodes.VALIDATION_ERROR, message, { issues });
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/**
 * Lookup of a scenario preset that does not exist
 */
export class ScenarioNotFoundError extends DescentError {
    constructor(id: string | number, available: number) {
        super(
            ErrorCodes.SCENARIO_NOT_FOUND,
            `Scenario ${id} not found (available: 0..${available - 1})`,
            { id, available }
        );
        this.name = 'ScenarioNotFoundError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a DescentError
 */
export function isDescentError(error: unknown): error is DescentError {
    return error instanceof DescentError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isDescentError(error) && error.code === code;
}

/**
 * Wrap any error into a DescentError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): DescentError {
    if (isDescentError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new DescentError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new DescentError(defaultCode, String(error));
}
