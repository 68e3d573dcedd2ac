import type { EventMap, EventName, TypedEventEmitter } from '../core/events.js'

export interface ActivityMessage<K extends EventName = EventName> {
    type: K
    data: EventMap[K]
    /** ISO time the event was emitted. */
    timestamp: string
}

export type ActivityListener = (message: ActivityMessage) => void

/**
 * Fan-out of loop events as `{ type, data, timestamp }` messages, in emission
 * order, to any number of listeners. Late joiners get only what follows;
 * they resync through the status query.
 */
export class ActivityStream {
    private listeners = new Set<ActivityListener>()
    private detach: (() => void) | null = null

    constructor(
        events: TypedEventEmitter,
        private now: () => Date = () => new Date()
    ) {
        this.detach = events.onAny((type, data) => this.publish({ type, data, timestamp: this.now().toISOString() }))
    }

    subscribe(listener: ActivityListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    get size(): number {
        return this.listeners.size
    }

    private publish(message: ActivityMessage): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(message)
            } catch {
                // drop listeners that throw
                this.listeners.delete(listener)
            }
        }
    }

    close(): void {
        this.detach?.()
        this.detach = null
        this.listeners.clear()
    }
}
