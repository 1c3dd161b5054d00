import { logger } from './Logger';

/**
 * A tiny, type-safe event emitter backing the broadcast channels.
 *
 * Event names and argument tuples are checked at compile time, a throwing
 * handler does not stop delivery to the others, and `on` returns its own
 * unsubscribe function.
 *
 * @example
 * ```typescript
 * interface MyEvents { data: [string]; error: [Error] }
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('data', (msg) => console.log(msg));
 * emitter.emit('data', 'hello');
 * unsub(); // Clean up
 * ```
 */
export class EventEmitter<T extends { [K in keyof T]: unknown[] }> {
    private listeners: { [K in keyof T]?: Set<(...args: T[K]) => void> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    /**
     * Unsubscribe from an event.
     */
    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    /**
     * Emit an event.
     */
    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`[EventEmitter] Error in listener for ${String(event)}:`, err);
            }
        }
    }

    /**
     * Number of handlers currently attached to an event.
     */
    listenerCount<K extends keyof T>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }

    /**
     * Remove all listeners.
     */
    removeAllListeners(): void {
        this.listeners = {};
    }
}
