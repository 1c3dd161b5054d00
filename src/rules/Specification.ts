import { failure, success, type Outcome } from '../outcome/Outcome';

/** A boolean rule over candidates of type T. */
export interface Specification<T> {
    isSatisfiedBy(candidate: T): boolean;
}

/**
 * Base for specifications that compose with `and`, `or` and `not`.
 *
 * @example
 * ```typescript
 * const billable = spec<Order>((o) => o.total > 0)
 *     .and(spec((o) => o.status === 'confirmed'))
 *     .and(spec<Order>((o) => o.refunded).not());
 * ```
 */
export abstract class CompositeSpecification<T> implements Specification<T> {
    abstract isSatisfiedBy(candidate: T): boolean;

    and(other: Specification<T>): CompositeSpecification<T> {
        return new AndSpecification(this, other);
    }

    or(other: Specification<T>): CompositeSpecification<T> {
        return new OrSpecification(this, other);
    }

    not(): CompositeSpecification<T> {
        return new NotSpecification(this);
    }
}

export class AndSpecification<T> extends CompositeSpecification<T> {
    constructor(private readonly left: Specification<T>, private readonly right: Specification<T>) {
        super();
    }

    isSatisfiedBy(candidate: T): boolean {
        return this.left.isSatisfiedBy(candidate) && this.right.isSatisfiedBy(candidate);
    }
}

export class OrSpecification<T> extends CompositeSpecification<T> {
    constructor(private readonly left: Specification<T>, private readonly right: Specification<T>) {
        super();
    }

    isSatisfiedBy(candidate: T): boolean {
        return this.left.isSatisfiedBy(candidate) || this.right.isSatisfiedBy(candidate);
    }
}

export class NotSpecification<T> extends CompositeSpecification<T> {
    constructor(private readonly inner: Specification<T>) {
        super();
    }

    isSatisfiedBy(candidate: T): boolean {
        return !this.inner.isSatisfiedBy(candidate);
    }
}

class PredicateSpecification<T> extends CompositeSpecification<T> {
    constructor(private readonly predicate: (candidate: T) => boolean) {
        super();
    }

    isSatisfiedBy(candidate: T): boolean {
        return this.predicate(candidate);
    }
}

/** Wraps a predicate as a composable specification. */
export function spec<T>(predicate: (candidate: T) => boolean): CompositeSpecification<T> {
    return new PredicateSpecification(predicate);
}

/** Success(candidate) when the rule holds, Failure(error) otherwise. */
export function check<T, E>(candidate: T, specification: Specification<T>, error: E): Outcome<T, E> {
    return specification.isSatisfiedBy(candidate) ? success<T, E>(candidate) : failure<E, T>(error);
}
