import { logger } from './Logger';

/**
 * A tiny, type-safe event emitter.
 *
 * Event names and argument tuples come from the event map `T`; a listener
 * that throws is logged and does not stop the others.
 *
 * @example
 * ```typescript
 * type MyEvents = { data: [string]; error: [Error] };
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('data', (msg) => console.log(msg));
 * emitter.emit('data', 'hello');
 * unsub();
 * ```
 */
export class EventEmitter<T extends Record<string, unknown[]>> {
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

    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`Error in listener for ${String(event)}:`, err);
            }
        }
    }

    once<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        const wrapper = (...args: T[K]) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }
}
