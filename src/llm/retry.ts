import { classifyError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 60000,
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export async function withRetry<T>(fn: () => Promise<T>, opts = DEFAULT_RETRY_OPTIONS): Promise<T> {
    let attempt = 0
    for (;;) {
        try {
            return await fn()
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            await sleep(delay + delay * 0.1 * Math.random())
            attempt++
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

/** Trips after `threshold` consecutive failures and rejects calls until `cooldownMs` has passed. */
export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private lastFailure = 0

    constructor(
        private threshold: number = 5,
        private cooldownMs: number = 30000
    ) {}

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            if (Date.now() - this.lastFailure <= this.cooldownMs) {
                throw new Error('Circuit breaker is open')
            }
            this.state = 'half_open'
        }

        try {
            const result = await fn()
            this.failures = 0
            this.state = 'closed'
            return result
        } catch (error) {
            this.failures++
            this.lastFailure = Date.now()
            if (this.failures >= this.threshold || this.state === 'half_open') {
                this.state = 'open'
            }
            throw error
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
