import { TimeoutError, toError } from '../errors';
import { AsyncOptional } from '../optional/AsyncOptional';
import { failure, success, type Outcome } from './Outcome';

/** A pending Outcome. */
export type Task<T, E = Error> = Promise<Outcome<T, E>>;

/**
 * AsyncOutcome: the Outcome vocabulary over a pending result.
 *
 * Awaiting it yields the settled Outcome. Every combinator comes in a plain form
 * and an `*Async` form whose callback may itself suspend; the chain waits for the
 * callback before producing the next Outcome.
 *
 * @example
 * ```typescript
 * const name = await AsyncOutcome.fromPromise(fetchUser(id))
 *     .map((user) => user.name)
 *     .recover(() => 'Unknown User')
 *     .unwrap();
 * ```
 */
export class AsyncOutcome<T, E = Error> implements PromiseLike<Outcome<T, E>> {
    private constructor(private readonly pending: Promise<Outcome<T, E>>) {}

    // ---------------------------------------------------------------------------
    // Factories
    // ---------------------------------------------------------------------------

    static of<T, E = Error>(outcome: Outcome<T, E> | PromiseLike<Outcome<T, E>>): AsyncOutcome<T, E> {
        return new AsyncOutcome<T, E>(Promise.resolve(outcome));
    }

    static success<T, E = never>(value: T): AsyncOutcome<T, E> {
        return new AsyncOutcome<T, E>(Promise.resolve(success<T, E>(value)));
    }

    static failure<E, T = never>(error: E, trace?: string): AsyncOutcome<T, E> {
        return new AsyncOutcome<T, E>(Promise.resolve(failure<E, T>(error, trace)));
    }

    /**
     * Fulfilment becomes Success; rejection becomes Failure of the thrown
     * error, with its stack as the trace.
     */
    static fromPromise<T>(promise: PromiseLike<T>): AsyncOutcome<T, Error> {
        return new AsyncOutcome<T, Error>(
            Promise.resolve(promise).then(
                (value) => success<T, Error>(value),
                (thrown: unknown) => captured<T>(thrown)
            )
        );
    }

    /** Like `fromPromise`, but also captures a synchronous throw from `fn`. */
    static attempt<T>(fn: () => PromiseLike<T>): AsyncOutcome<T, Error> {
        try {
            return AsyncOutcome.fromPromise(fn());
        } catch (thrown) {
            return new AsyncOutcome<T, Error>(Promise.resolve(captured<T>(thrown)));
        }
    }

    // ---------------------------------------------------------------------------
    // PromiseLike
    // ---------------------------------------------------------------------------

    then<R1 = Outcome<T, E>, R2 = never>(
        onfulfilled?: ((outcome: Outcome<T, E>) => R1 | PromiseLike<R1>) | null,
        onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
    ): Promise<R1 | R2> {
        return this.pending.then(onfulfilled, onrejected);
    }

    // ---------------------------------------------------------------------------
    // Transforms
    // ---------------------------------------------------------------------------

    map<U>(transform: (value: T) => U): AsyncOutcome<U, E> {
        return this.chain((outcome) => outcome.map(transform));
    }

    mapAsync<U>(transform: (value: T) => PromiseLike<U>): AsyncOutcome<U, E> {
        return this.chain(async (outcome): Promise<Outcome<U, E>> => {
            if (outcome.isFailure()) return failure<E, U>(outcome.error, outcome.trace);
            return success<U, E>(await transform(outcome.value));
        });
    }

    mapError<F>(transform: (error: E) => F): AsyncOutcome<T, F> {
        return this.chain((outcome) => outcome.mapError(transform));
    }

    mapErrorAsync<F>(transform: (error: E) => PromiseLike<F>): AsyncOutcome<T, F> {
        return this.chain(async (outcome): Promise<Outcome<T, F>> => {
            if (outcome.isSuccess()) return success<T, F>(outcome.value);
            return failure<F, T>(await transform(outcome.error), outcome.trace);
        });
    }

    flatMap<U, F = E>(transform: (value: T) => Outcome<U, F>): AsyncOutcome<U, E | F> {
        return this.chain((outcome) => outcome.flatMap(transform));
    }

    flatMapAsync<U, F = E>(transform: (value: T) => PromiseLike<Outcome<U, F>>): AsyncOutcome<U, E | F> {
        return this.chain(async (outcome): Promise<Outcome<U, E | F>> => {
            if (outcome.isFailure()) return failure<E | F, U>(outcome.error, outcome.trace);
            return transform(outcome.value);
        });
    }

    recover(recovery: (error: E) => T): AsyncOutcome<T, E> {
        return this.chain((outcome) => outcome.recover(recovery));
    }

    recoverAsync(recovery: (error: E) => PromiseLike<T>): AsyncOutcome<T, E> {
        return this.chain(async (outcome): Promise<Outcome<T, E>> => {
            if (outcome.isSuccess()) return outcome;
            return success<T, E>(await recovery(outcome.error));
        });
    }

    recoverWith<F>(recovery: (error: E) => Outcome<T, F>): AsyncOutcome<T, F> {
        return this.chain((outcome) => outcome.recoverWith(recovery));
    }

    recoverWithAsync<F>(recovery: (error: E) => PromiseLike<Outcome<T, F>>): AsyncOutcome<T, F> {
        return this.chain(async (outcome): Promise<Outcome<T, F>> => {
            if (outcome.isSuccess()) return success<T, F>(outcome.value);
            return recovery(outcome.error);
        });
    }

    inspect(inspector: (value: T) => void): AsyncOutcome<T, E> {
        return this.chain((outcome) => outcome.inspect(inspector));
    }

    inspectError(inspector: (error: E) => void): AsyncOutcome<T, E> {
        return this.chain((outcome) => outcome.inspectError(inspector));
    }

    /**
     * Settles to `onTimeout()` (default: Failure(TimeoutError)) when the outcome
     * is still pending after `ms` milliseconds. The underlying work is not cancelled.
     */
    withTimeout(ms: number, onTimeout?: () => Outcome<T, E>): AsyncOutcome<T, E | TimeoutError> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expired = new Promise<Outcome<T, E | TimeoutError>>((resolve) => {
            timer = setTimeout(() => {
                resolve(onTimeout ? onTimeout() : failure<TimeoutError, T>(new TimeoutError(ms)));
            }, ms);
        });
        return new AsyncOutcome<T, E | TimeoutError>(
            Promise.race([this.pending, expired]).finally(() => clearTimeout(timer))
        );
    }

    // ---------------------------------------------------------------------------
    // Extraction
    // ---------------------------------------------------------------------------

    /** Resolves to the success value; rejects with UnwrapError on a Failure. */
    unwrap(): Promise<T> {
        return this.pending.then((outcome) => outcome.unwrap());
    }

    unwrapOr(fallback: T): Promise<T> {
        return this.pending.then((outcome) => outcome.unwrapOr(fallback));
    }

    unwrapOrElse(orElse: (error: E) => T): Promise<T> {
        return this.pending.then((outcome) => outcome.unwrapOrElse(orElse));
    }

    async unwrapOrElseAsync(orElse: (error: E) => PromiseLike<T>): Promise<T> {
        const outcome = await this.pending;
        return outcome.isSuccess() ? outcome.value : orElse(outcome.error);
    }

    isSuccess(): Promise<boolean> {
        return this.pending.then((outcome) => outcome.isSuccess());
    }

    isFailure(): Promise<boolean> {
        return this.pending.then((outcome) => outcome.isFailure());
    }

    toOptional(): AsyncOptional<T> {
        return AsyncOptional.of(this.pending.then((outcome) => outcome.toOptional()));
    }

    private chain<U, F>(
        step: (outcome: Outcome<T, E>) => Outcome<U, F> | PromiseLike<Outcome<U, F>>
    ): AsyncOutcome<U, F> {
        return new AsyncOutcome<U, F>(this.pending.then(step));
    }
}

function captured<T>(thrown: unknown): Outcome<T, Error> {
    const error = toError(thrown);
    return failure<Error, T>(error, error.stack);
}
