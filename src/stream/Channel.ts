import { EventEmitter } from '../utils/EventEmitter';
import type { Observer, Stream, Unsubscribe } from '../types';

interface ChannelEvents<T> {
    next: [T];
    error: [unknown];
    complete: [];
}

type Delivery<T> =
    | { kind: 'next'; value: T }
    | { kind: 'error'; error: unknown }
    | { kind: 'complete' };

type Waiter<T> = {
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: unknown) => void;
};

/**
 * Channel: a broadcast, no-replay push stream.
 *
 * `push` delivers synchronously to whoever is subscribed at that moment;
 * subscribers that arrive later never see earlier values. Once closed, the
 * channel ignores further pushes.
 *
 * Deliveries never nest: a push made by a subscriber while a value is being
 * delivered is queued and broadcast after every subscriber has received the
 * current one, so all subscribers observe the same sequence.
 */
export class Channel<T> implements Stream<T> {
    private readonly emitter = new EventEmitter<ChannelEvents<T>>();
    private isClosed = false;
    private readonly pending: Delivery<T>[] = [];
    private delivering = false;

    get closed(): boolean {
        return this.isClosed;
    }

    get subscriberCount(): number {
        return this.emitter.listenerCount('next');
    }

    /**
     * Broadcasts `value`.
     * @returns false when the channel is closed and nothing was delivered
     */
    push(value: T): boolean {
        if (this.isClosed) return false;
        this.deliver({ kind: 'next', value });
        return true;
    }

    /** Reports an error to subscribers. The channel stays open. */
    fail(error: unknown): boolean {
        if (this.isClosed) return false;
        this.deliver({ kind: 'error', error });
        return true;
    }

    /** Completes every subscriber and drops them. Idempotent. */
    close(): void {
        if (this.isClosed) return;
        this.isClosed = true;
        this.deliver({ kind: 'complete' });
    }

    subscribe(observer: Observer<T> | ((value: T) => void)): Unsubscribe {
        const target: Observer<T> = typeof observer === 'function' ? { next: observer } : observer;
        if (this.isClosed) {
            target.complete?.();
            return () => {};
        }

        const offs = [
            this.emitter.on('next', (value) => target.next(value)),
            this.emitter.on('error', (error) => target.error?.(error)),
            this.emitter.on('complete', () => target.complete?.()),
        ];
        return () => offs.forEach((off) => off());
    }

    private deliver(delivery: Delivery<T>): void {
        this.pending.push(delivery);
        if (this.delivering) return;

        this.delivering = true;
        try {
            for (let next = this.pending.shift(); next; next = this.pending.shift()) {
                this.dispatch(next);
            }
        } finally {
            this.delivering = false;
        }
    }

    private dispatch(delivery: Delivery<T>): void {
        switch (delivery.kind) {
            case 'next':
                this.emitter.emit('next', delivery.value);
                break;
            case 'error':
                this.emitter.emit('error', delivery.error);
                break;
            case 'complete':
                this.emitter.emit('complete');
                this.emitter.removeAllListeners();
                break;
        }
    }

    /**
     * Each iterator buffers the values it has not consumed yet. Iteration ends
     * when the channel closes; an error rejects the pending `next()` and ends it.
     */
    [Symbol.asyncIterator](): AsyncIterator<T> {
        const buffer: { value: T }[] = [];
        const waiting: Waiter<T>[] = [];
        let finished = false;
        let failed: { error: unknown } | undefined;

        const finish = () => {
            finished = true;
            for (const waiter of waiting.splice(0)) waiter.resolve({ value: undefined, done: true });
        };

        const unsubscribe = this.subscribe({
            next: (value) => {
                const waiter = waiting.shift();
                if (waiter) waiter.resolve({ value, done: false });
                else buffer.push({ value });
            },
            error: (error) => {
                const waiter = waiting.shift();
                if (waiter) waiter.reject(error);
                else failed = { error };
                unsubscribe();
                finish();
            },
            complete: finish,
        });

        return {
            next: (): Promise<IteratorResult<T>> => {
                const entry = buffer.shift();
                if (entry) return Promise.resolve({ value: entry.value, done: false });
                if (failed) {
                    const { error } = failed;
                    failed = undefined;
                    return Promise.reject(error);
                }
                if (finished) return Promise.resolve({ value: undefined, done: true });
                return new Promise((resolve, reject) => waiting.push({ resolve, reject }));
            },
            return: (): Promise<IteratorResult<T>> => {
                unsubscribe();
                buffer.length = 0;
                finish();
                return Promise.resolve({ value: undefined, done: true });
            },
        };
    }
}
