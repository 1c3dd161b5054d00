/**
 * Outcome - a two-variant success/failure container.
 *
 * Fallible operations return an Outcome instead of throwing, so failures travel
 * through the same channel as values and can be transformed, recovered or
 * inspected on the way.
 *
 * @example
 * ```typescript
 * const parsed = attempt(() => JSON.parse(raw))
 *     .map((json) => json.count)
 *     .recover(() => 0);
 *
 * parsed.match({
 *     success: (count) => render(count),
 *     failure: (error) => report(error),
 * });
 * ```
 */

import { UnwrapError, describeError, toError } from '../errors';
import { absent, present, type Optional } from '../optional/Optional';
import { AsyncOutcome } from './AsyncOutcome';

export type Outcome<T, E = Error> = Success<T, E> | Failure<T, E>;

export interface OutcomeHandlers<T, E, R> {
    success(value: T): R;
    failure(error: E, trace?: string): R;
}

abstract class OutcomeBase<T, E> {
    abstract readonly kind: 'success' | 'failure';

    /** Calls the handler for the active variant. */
    abstract match<R>(handlers: OutcomeHandlers<T, E, R>): R;

    protected abstract self(): Outcome<T, E>;

    isSuccess(): this is Success<T, E> {
        return this.kind === 'success';
    }

    isFailure(): this is Failure<T, E> {
        return this.kind === 'failure';
    }

    map<U>(transform: (value: T) => U): Outcome<U, E> {
        return this.match<Outcome<U, E>>({
            success: (value) => new Success<U, E>(transform(value)),
            failure: (error, trace) => new Failure<U, E>(error, trace),
        });
    }

    mapError<F>(transform: (error: E) => F): Outcome<T, F> {
        return this.match<Outcome<T, F>>({
            success: (value) => new Success<T, F>(value),
            failure: (error, trace) => new Failure<T, F>(transform(error), trace),
        });
    }

    flatMap<U, F = E>(transform: (value: T) => Outcome<U, F>): Outcome<U, E | F> {
        return this.match<Outcome<U, E | F>>({
            success: (value) => transform(value),
            failure: (error, trace) => new Failure<U, E | F>(error, trace),
        });
    }

    recover(recovery: (error: E) => T): Outcome<T, E> {
        return this.match<Outcome<T, E>>({
            success: () => this.self(),
            failure: (error) => new Success<T, E>(recovery(error)),
        });
    }

    recoverWith<F>(recovery: (error: E) => Outcome<T, F>): Outcome<T, F> {
        return this.match<Outcome<T, F>>({
            success: (value) => new Success<T, F>(value),
            failure: (error) => recovery(error),
        });
    }

    /**
     * Returns the success value.
     * @throws {UnwrapError} on a Failure; the original error is the `cause`.
     */
    unwrap(): T {
        return this.match({
            success: (value) => value,
            failure: (error) => {
                throw new UnwrapError(`Called unwrap on Failure: ${describeError(error)}`, error);
            },
        });
    }

    unwrapOr(fallback: T): T {
        return this.match({
            success: (value) => value,
            failure: () => fallback,
        });
    }

    unwrapOrElse(orElse: (error: E) => T): T {
        return this.match({
            success: (value) => value,
            failure: (error) => orElse(error),
        });
    }

    /** Runs `inspector` on the success value and returns this outcome unchanged. */
    inspect(inspector: (value: T) => void): Outcome<T, E> {
        if (this.isSuccess()) inspector(this.value);
        return this.self();
    }

    /** Runs `inspector` on the error and returns this outcome unchanged. */
    inspectError(inspector: (error: E) => void): Outcome<T, E> {
        if (this.isFailure()) inspector(this.error);
        return this.self();
    }

    /** Success becomes Present, Failure becomes Absent. */
    toOptional(): Optional<T> {
        return this.match<Optional<T>>({
            success: (value) => present(value),
            failure: () => absent<T>(),
        });
    }

    /** Lifts this settled outcome into the async vocabulary. */
    async(): AsyncOutcome<T, E> {
        return AsyncOutcome.of(this.self());
    }

    toString(): string {
        return this.match({
            success: (value) => `Success(${String(value)})`,
            failure: (error) => `Failure(${describeError(error)})`,
        });
    }
}

export class Success<T, E = Error> extends OutcomeBase<T, E> {
    readonly kind = 'success' as const;

    constructor(readonly value: T) {
        super();
        Object.freeze(this);
    }

    match<R>(handlers: OutcomeHandlers<T, E, R>): R {
        return handlers.success(this.value);
    }

    protected self(): Outcome<T, E> {
        return this;
    }
}

export class Failure<T, E = Error> extends OutcomeBase<T, E> {
    readonly kind = 'failure' as const;

    constructor(readonly error: E, readonly trace?: string) {
        super();
        Object.freeze(this);
    }

    match<R>(handlers: OutcomeHandlers<T, E, R>): R {
        return handlers.failure(this.error, this.trace);
    }

    protected self(): Outcome<T, E> {
        return this;
    }
}

// =============================================================================
// Factories
// =============================================================================

export function success<T, E = never>(value: T): Success<T, E> {
    return new Success<T, E>(value);
}

export function failure<E, T = never>(error: E, trace?: string): Failure<T, E> {
    return new Failure<T, E>(error, trace);
}

/**
 * Runs `fn` and captures a throw as a Failure carrying the thrown error's stack.
 */
export function attempt<T>(fn: () => T): Outcome<T, Error> {
    try {
        return success(fn());
    } catch (thrown) {
        const error = toError(thrown);
        return failure(error, error.stack);
    }
}
