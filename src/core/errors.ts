export type ErrorKind = 'transient' | 'permanent'

export class WakeloopError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'WakeloopError'
        this.kind = kind
    }
}

export class TransientError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

/** A dispatched tool failed. Always converted to result text before it reaches the LLM. */
export class ToolExecutionError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ToolExecutionError'
    }
}

/** The LLM provider could not produce a usable response. Ends the current round as `error`. */
export class TransportError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'TransportError'
    }
}

export class PersistenceError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PersistenceError'
    }
}

export class SnapshotUpdateError extends WakeloopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'SnapshotUpdateError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function isNotFoundError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof WakeloopError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return classifyHttpError(error.status)
    }
    return 'permanent'
}
