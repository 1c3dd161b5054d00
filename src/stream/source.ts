import { logger } from '../utils/Logger';
import type { Observer, Source, Subscribable, Unsubscribe } from '../types';

export function isSubscribable<T>(source: Source<T>): source is Subscribable<T> {
    return 'subscribe' in source && typeof source.subscribe === 'function';
}

/**
 * Attaches `observer` to either kind of source.
 *
 * Async iterables are pulled until exhausted, failed, or unsubscribed; on
 * unsubscribe the iterator's `return()` is called so generators can clean up.
 */
export function subscribeTo<T>(source: Source<T>, observer: Observer<T>): Unsubscribe {
    if (isSubscribable(source)) {
        return source.subscribe(observer);
    }

    const iterator = source[Symbol.asyncIterator]();
    let active = true;

    const pump = async (): Promise<void> => {
        try {
            for (;;) {
                const step = await iterator.next();
                if (!active) return;
                if (step.done) {
                    active = false;
                    observer.complete?.();
                    return;
                }
                observer.next(step.value);
            }
        } catch (error) {
            if (!active) return;
            active = false;
            observer.error?.(error);
        }
    };
    void pump();

    return () => {
        if (!active) return;
        active = false;
        if (!iterator.return) return;
        void Promise.resolve(iterator.return()).catch((error: unknown) => {
            logger.warn('Source iterator failed to close', error);
        });
    };
}
