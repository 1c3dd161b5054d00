/**
 * Optional - a present/absent container.
 *
 * Unlike `T | undefined`, an Optional can wrap `undefined` or `null` as a real
 * value, and converts to an Outcome once the caller decides what absence means.
 */

import { UnwrapError } from '../errors';
import { failure, success, type Outcome } from '../outcome/Outcome';

export type Optional<T> = Present<T> | Absent<T>;

export interface OptionalHandlers<T, R> {
    present(value: T): R;
    absent(): R;
}

abstract class OptionalBase<T> {
    abstract readonly kind: 'present' | 'absent';

    abstract match<R>(handlers: OptionalHandlers<T, R>): R;

    protected abstract self(): Optional<T>;

    isPresent(): this is Present<T> {
        return this.kind === 'present';
    }

    isAbsent(): this is Absent<T> {
        return this.kind === 'absent';
    }

    /** @throws {UnwrapError} when absent */
    unwrap(): T {
        return this.match({
            present: (value) => value,
            absent: () => {
                throw new UnwrapError('Called unwrap on Absent');
            },
        });
    }

    unwrapOr(fallback: T): T {
        return this.match({
            present: (value) => value,
            absent: () => fallback,
        });
    }

    unwrapOrElse(orElse: () => T): T {
        return this.match({
            present: (value) => value,
            absent: orElse,
        });
    }

    map<U>(transform: (value: T) => U): Optional<U> {
        return this.match<Optional<U>>({
            present: (value) => new Present(transform(value)),
            absent: () => new Absent<U>(),
        });
    }

    flatMap<U>(transform: (value: T) => Optional<U>): Optional<U> {
        return this.match<Optional<U>>({
            present: transform,
            absent: () => new Absent<U>(),
        });
    }

    filter(predicate: (value: T) => boolean): Optional<T> {
        if (this.isPresent() && !predicate(this.value)) return new Absent<T>();
        return this.self();
    }

    inspect(inspector: (value: T) => void): Optional<T> {
        if (this.isPresent()) inspector(this.value);
        return this.self();
    }

    toNullable(): T | null {
        return this.match<T | null>({
            present: (value) => value,
            absent: () => null,
        });
    }

    /** Present becomes Success; Absent becomes Failure(error). */
    toOutcome<E>(error: E): Outcome<T, E> {
        return this.match<Outcome<T, E>>({
            present: (value) => success<T, E>(value),
            absent: () => failure<E, T>(error),
        });
    }

    /** Like `toOutcome`, building the error only when absent. */
    toOutcomeElse<E>(errorFactory: () => E): Outcome<T, E> {
        return this.match<Outcome<T, E>>({
            present: (value) => success<T, E>(value),
            absent: () => failure<E, T>(errorFactory()),
        });
    }

    toString(): string {
        return this.match({
            present: (value) => `Present(${String(value)})`,
            absent: () => 'Absent',
        });
    }
}

export class Present<T> extends OptionalBase<T> {
    readonly kind = 'present' as const;

    constructor(readonly value: T) {
        super();
        Object.freeze(this);
    }

    match<R>(handlers: OptionalHandlers<T, R>): R {
        return handlers.present(this.value);
    }

    protected self(): Optional<T> {
        return this;
    }
}

export class Absent<T> extends OptionalBase<T> {
    readonly kind = 'absent' as const;

    constructor() {
        super();
        Object.freeze(this);
    }

    match<R>(handlers: OptionalHandlers<T, R>): R {
        return handlers.absent();
    }

    protected self(): Optional<T> {
        return this;
    }
}

export function present<T>(value: T): Present<T> {
    return new Present(value);
}

export function absent<T = never>(): Absent<T> {
    return new Absent<T>();
}

/** `null` and `undefined` become Absent, anything else Present. */
export function fromNullable<T>(value: T | null | undefined): Optional<T> {
    return value === null || value === undefined ? new Absent<T>() : new Present(value);
}
