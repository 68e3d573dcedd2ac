import type { LoopState, RoundStatus } from './types.js'

export type EventMap = {
    status: { state: LoopState; round: number; message?: string; nextIn?: number }
    'round:start': { round: number; startedAt: string }
    'round:complete': {
        round: number
        status: RoundStatus
        toolsUsed: number
        duration: number
        notebookSaved: boolean
        summary: string
    }
    'tool:call': { round: number; id: string; name: string; args: unknown }
    'tool:result': { round: number; id: string; name: string; ok: boolean; result: string; duration: number }
    'thought:chunk': { round: number; text: string }
    'thought:done': { round: number; text: string }
    log: { text: string; level: 'info' | 'warn' }
    error: { round?: number; message: string }
}

export type EventName = keyof EventMap

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in EventName]?: Set<EventHandler<EventMap[K]>> }

export type AnyEventHandler = (event: EventName, data: EventMap[EventName]) => void

export class TypedEventEmitter {
    private handlers: HandlerSets = {}
    private anyHandlers = new Set<AnyEventHandler>()

    on<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> = this.handlers[event] ?? new Set()
        set.add(handler)
        this.handlers[event] = set
    }

    off<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    /** Receives every event, in emission order, after the per-event handlers. */
    onAny(handler: AnyEventHandler): () => void {
        this.anyHandlers.add(handler)
        return () => {
            this.anyHandlers.delete(handler)
        }
    }

    emit<K extends EventName>(event: K, data: EventMap[K]): void {
        const set = this.handlers[event]
        if (set) {
            for (const handler of set) {
                try {
                    handler(data)
                } catch {
                    // cross-cutting listeners should not crash the main flow
                }
            }
        }
        for (const handler of this.anyHandlers) {
            try {
                handler(event, data)
            } catch {
                // same as above
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
        this.anyHandlers.clear()
    }
}
