import { AsyncOutcome } from '../outcome/AsyncOutcome';
import { absent, fromNullable, present, type Optional } from './Optional';

/**
 * The Optional vocabulary over a pending value. Awaiting it yields the Optional.
 *
 * @example
 * ```typescript
 * const user = await AsyncOptional.fromNullable(users.findByEmail(email))
 *     .filter((u) => u.active)
 *     .toOutcome(new Error('No active user'));
 * ```
 */
export class AsyncOptional<T> implements PromiseLike<Optional<T>> {
    private constructor(private readonly pending: Promise<Optional<T>>) {}

    static of<T>(optional: Optional<T> | PromiseLike<Optional<T>>): AsyncOptional<T> {
        return new AsyncOptional<T>(Promise.resolve(optional));
    }

    static present<T>(value: T): AsyncOptional<T> {
        return new AsyncOptional<T>(Promise.resolve(present(value)));
    }

    static absent<T = never>(): AsyncOptional<T> {
        return new AsyncOptional<T>(Promise.resolve(absent<T>()));
    }

    /** A pending nullable value: `null`/`undefined` become Absent. */
    static fromNullable<T>(promise: PromiseLike<T | null | undefined>): AsyncOptional<T> {
        return new AsyncOptional<T>(Promise.resolve(promise).then((value) => fromNullable(value)));
    }

    then<R1 = Optional<T>, R2 = never>(
        onfulfilled?: ((optional: Optional<T>) => R1 | PromiseLike<R1>) | null,
        onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
    ): Promise<R1 | R2> {
        return this.pending.then(onfulfilled, onrejected);
    }

    map<U>(transform: (value: T) => U): AsyncOptional<U> {
        return this.chain((optional) => optional.map(transform));
    }

    mapAsync<U>(transform: (value: T) => PromiseLike<U>): AsyncOptional<U> {
        return this.chain(async (optional): Promise<Optional<U>> =>
            optional.isPresent() ? present(await transform(optional.value)) : absent<U>()
        );
    }

    flatMap<U>(transform: (value: T) => Optional<U>): AsyncOptional<U> {
        return this.chain((optional) => optional.flatMap(transform));
    }

    flatMapAsync<U>(transform: (value: T) => PromiseLike<Optional<U>>): AsyncOptional<U> {
        return this.chain(async (optional): Promise<Optional<U>> =>
            optional.isPresent() ? transform(optional.value) : absent<U>()
        );
    }

    filter(predicate: (value: T) => boolean): AsyncOptional<T> {
        return this.chain((optional) => optional.filter(predicate));
    }

    filterAsync(predicate: (value: T) => PromiseLike<boolean>): AsyncOptional<T> {
        return this.chain(async (optional): Promise<Optional<T>> => {
            if (optional.isPresent() && !(await predicate(optional.value))) return absent<T>();
            return optional;
        });
    }

    inspect(inspector: (value: T) => void): AsyncOptional<T> {
        return this.chain((optional) => optional.inspect(inspector));
    }

    /** Settles to `onTimeout()` (default: Absent) when still pending after `ms`. */
    withTimeout(ms: number, onTimeout?: () => Optional<T>): AsyncOptional<T> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expired = new Promise<Optional<T>>((resolve) => {
            timer = setTimeout(() => resolve(onTimeout ? onTimeout() : absent<T>()), ms);
        });
        return new AsyncOptional<T>(Promise.race([this.pending, expired]).finally(() => clearTimeout(timer)));
    }

    unwrap(): Promise<T> {
        return this.pending.then((optional) => optional.unwrap());
    }

    unwrapOr(fallback: T): Promise<T> {
        return this.pending.then((optional) => optional.unwrapOr(fallback));
    }

    async unwrapOrElseAsync(orElse: () => PromiseLike<T>): Promise<T> {
        const optional = await this.pending;
        return optional.isPresent() ? optional.value : orElse();
    }

    isPresent(): Promise<boolean> {
        return this.pending.then((optional) => optional.isPresent());
    }

    isAbsent(): Promise<boolean> {
        return this.pending.then((optional) => optional.isAbsent());
    }

    toNullable(): Promise<T | null> {
        return this.pending.then((optional) => optional.toNullable());
    }

    toOutcome<E>(error: E): AsyncOutcome<T, E> {
        return AsyncOutcome.of(this.pending.then((optional) => optional.toOutcome(error)));
    }

    toOutcomeElse<E>(errorFactory: () => E): AsyncOutcome<T, E> {
        return AsyncOutcome.of(this.pending.then((optional) => optional.toOutcomeElse(errorFactory)));
    }

    private chain<U>(step: (optional: Optional<T>) => Optional<U> | PromiseLike<Optional<U>>): AsyncOptional<U> {
        return new AsyncOptional<U>(this.pending.then(step));
    }
}
