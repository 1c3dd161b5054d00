/**
 * Error types for tentative.
 *
 * Each failure mode gets its own class and a stable `code`, so callers can
 * branch on `instanceof` or on the code when errors cross a serialization boundary.
 */

/**
 * Base class for all tentative errors.
 */
export class TentativeError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'TentativeError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, TentativeError);
        }
    }
}

/**
 * Thrown when options passed to a constructor are invalid.
 */
export class ConfigurationError extends TentativeError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Returned by `OptimisticValue.update` when no snapshot has been observed yet.
 */
export class StateUninitializedError extends TentativeError {
    constructor(message: string = 'State has not been initialized: no snapshot observed yet') {
        super(message, 'STATE_UNINITIALIZED');
        this.name = 'StateUninitializedError';
    }
}

/**
 * Thrown by `unwrap()` on a Failure or an Absent value.
 * This is a programmer error, not an outcome to recover from.
 */
export class UnwrapError extends TentativeError {
    constructor(message: string, public readonly cause?: unknown) {
        super(message, 'UNWRAP_ERROR');
        this.name = 'UnwrapError';
    }
}

/**
 * Produced when a pending outcome does not settle in time.
 */
export class TimeoutError extends TentativeError {
    constructor(public readonly ms: number) {
        super(`Operation timed out after ${ms}ms`, 'TIMEOUT_ERROR');
        this.name = 'TimeoutError';
    }
}

/**
 * Produced by aggregates that need at least one member.
 */
export class EmptyInputError extends TentativeError {
    constructor(message: string = 'No tasks provided') {
        super(message, 'EMPTY_INPUT');
        this.name = 'EmptyInputError';
    }
}

/**
 * Produced by `firstSuccess` when every member failed.
 */
export class AllTasksFailedError extends TentativeError {
    constructor(public readonly errors: readonly unknown[]) {
        super(`All tasks failed: ${errors.map(describeError).join(', ')}`, 'ALL_TASKS_FAILED');
        this.name = 'AllTasksFailedError';
    }
}

/**
 * Thrown by `runSetup` when a bootstrap task fails.
 */
export class SetupError extends TentativeError {
    constructor(message: string, public readonly cause?: unknown) {
        super(cause === undefined ? message : `${message}: ${describeError(cause)}`, 'SETUP_ERROR');
        this.name = 'SetupError';
    }
}

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(thrown: unknown): Error {
    return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/** Human-readable one-liner for an opaque error payload. */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
