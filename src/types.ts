/**
 * tentative - Type Definitions
 *
 * Shared shapes for the stream plumbing and the engine options.
 */

// =============================================================================
// Streams
// =============================================================================

/** Detaches a subscription. Calling it twice is harmless. */
export type Unsubscribe = () => void;

/** Receiver of a push-based sequence. */
export interface Observer<T> {
    next(value: T): void;
    error?(error: unknown): void;
    complete?(): void;
}

/** Anything that pushes values to observers. */
export interface Subscribable<T> {
    subscribe(observer: Observer<T> | ((value: T) => void)): Unsubscribe;
}

/**
 * A producer of state snapshots: either push-based or an async iterable
 * (async generator, Node readable in object mode, a Channel...).
 */
export type Source<T> = Subscribable<T> | AsyncIterable<T>;

/** Read side of a broadcast: push subscription or async iteration. */
export interface Stream<T> extends Subscribable<T>, AsyncIterable<T> {}

// =============================================================================
// Configuration
// =============================================================================

/** Options accepted by `OptimisticValue` */
export interface OptimisticValueOptions {
    /** Tag used for the engine's child logger */
    name?: string;
    /** Enable debug logging */
    debug?: boolean;
    /** Run `update` calls one at a time, in call order */
    serialize?: boolean;
}
