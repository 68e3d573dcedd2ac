import { setTimeout as sleep } from 'node:timers/promises'
import { errorMessage, isAbortError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { LoopState } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/store.js'
import type { RoundLog, TimelineEntry } from '../memory/types.js'
import type { SnapshotAuditor } from '../snapshot/auditor.js'
import type { RoundResult, RoundRunner } from './round.js'

export interface LoopStatus {
    state: LoopState
    /** Current round, or the last one when not running. 0 before the first. */
    round: number
    roundStartedAt: string | null
    toolsUsed: number
    totalRounds: number
    lastSummary: string
    lastError: string | null
}

export interface LoopDeps {
    rounds: RoundRunner
    memory: MemoryStore
    auditor?: SnapshotAuditor
    events: TypedEventEmitter
    logger: Logger
    /** Seconds between rounds. */
    interval: number
    /** Runs before the first round of every cycle: open stores, bootstrap the agent home. */
    prepare: () => Promise<void>
}

/** One start-to-idle stretch of the loop. A new start gets a fresh one, so a finishing cycle cannot act on the next. */
interface Cycle {
    stop: boolean
    wake: AbortController
    done: Promise<void>
}

function roundDuration(result: RoundResult): number {
    const ms = Date.parse(result.finishedAt) - Date.parse(result.startedAt)
    return Math.round(Math.max(0, ms) / 100) / 10
}

/**
 * The activation state machine: idle -> running -> (waiting | stopping) -> idle,
 * with error reachable when a cycle cannot start. One round at a time; round
 * numbers continue from the store and are never handed out twice, even after a
 * round is deleted.
 */
export class ActivationLoop {
    private state: LoopState = 'idle'
    private cycle: Cycle | null = null
    private current: { round: number; startedAt: string; toolsUsed: number } | null = null
    private lastSummary = ''
    private lastError: string | null = null
    private lastIssued = 0

    constructor(private deps: LoopDeps) {}

    status(): LoopStatus {
        return {
            state: this.state,
            round: this.current?.round ?? 0,
            roundStartedAt: this.state === 'running' || this.state === 'stopping' ? (this.current?.startedAt ?? null) : null,
            toolsUsed: this.current?.toolsUsed ?? 0,
            totalRounds: this.deps.memory.totalRounds(),
            lastSummary: this.lastSummary,
            lastError: this.lastError,
        }
    }

    get isActive(): boolean {
        return this.state !== 'idle' && this.state !== 'error'
    }

    /** Begins the round cycle. No-op while a cycle is active. */
    start(): LoopStatus {
        if (this.isActive) return this.status()

        const cycle = this.beginCycle()
        cycle.done = this.runCycle(cycle)
        return this.status()
    }

    /**
     * Requests a graceful stop. While waiting the loop goes idle at once; while
     * running the current tool call finishes and the round ends early.
     */
    stop(): LoopStatus {
        const cycle = this.cycle
        if (!cycle || !this.isActive) return this.status()

        cycle.stop = true
        if (this.state === 'waiting') {
            cycle.wake.abort()
            this.cycle = null
            this.setState('idle', 'stopped while waiting')
        } else if (this.state === 'running') {
            this.setState('stopping', 'stop requested, finishing current step')
        }
        return this.status()
    }

    /** Resolves once the active cycle, if any, has settled. */
    async settled(): Promise<void> {
        await this.cycle?.done
    }

    async restart(): Promise<LoopStatus> {
        const cycle = this.cycle
        this.stop()
        await cycle?.done
        return this.start()
    }

    /** Runs exactly one round, without scheduling another. Undefined when a cycle is already active. */
    async runOnce(): Promise<TimelineEntry | undefined> {
        if (this.isActive) return undefined
        const cycle = this.beginCycle()
        let entry: TimelineEntry | undefined
        cycle.done = (async () => {
            try {
                await this.deps.prepare()
                entry = await this.executeRound(cycle)
            } catch (error) {
                this.fail(cycle, error)
                return
            }
            this.finishCycle(cycle)
        })()
        await cycle.done
        return entry
    }

    private beginCycle(): Cycle {
        const cycle: Cycle = { stop: false, wake: new AbortController(), done: Promise.resolve() }
        this.cycle = cycle
        this.lastError = null
        this.setState('running')
        return cycle
    }

    private async runCycle(cycle: Cycle): Promise<void> {
        try {
            await this.deps.prepare()
        } catch (error) {
            this.fail(cycle, error)
            return
        }

        try {
            while (!cycle.stop) {
                await this.executeRound(cycle)
                if (cycle.stop) break

                const interval = this.deps.interval
                if (interval > 0) {
                    this.setState('waiting', undefined, interval)
                    await this.wait(interval * 1000, cycle.wake.signal)
                }
            }
        } catch (error) {
            this.fail(cycle, error)
            return
        }
        this.finishCycle(cycle)
    }

    private finishCycle(cycle: Cycle): void {
        if (this.cycle !== cycle) return
        this.cycle = null
        this.setState('idle')
    }

    private fail(cycle: Cycle, error: unknown): void {
        this.deps.logger.error({ error }, 'activation loop failed')
        if (this.cycle !== cycle) return
        this.cycle = null
        this.lastError = errorMessage(error)
        this.deps.events.emit('error', { message: this.lastError })
        this.setState('error', this.lastError)
    }

    private async wait(ms: number, signal: AbortSignal): Promise<void> {
        try {
            await sleep(ms, undefined, { signal })
        } catch (error) {
            if (!isAbortError(error)) throw error
        }
    }

    private async executeRound(cycle: Cycle): Promise<TimelineEntry> {
        const round = Math.max(this.deps.memory.nextRound(), this.lastIssued + 1)
        this.lastIssued = round
        const current = { round, startedAt: new Date().toISOString(), toolsUsed: 0 }
        this.current = current
        this.setState(cycle.stop ? 'stopping' : 'running')

        const result = await this.deps.rounds.run(round, {
            stopRequested: () => cycle.stop,
            onToolUsed: (toolsUsed) => {
                current.toolsUsed = toolsUsed
            },
        })
        current.startedAt = result.startedAt
        return this.finalize(result)
    }

    private async finalize(result: RoundResult): Promise<TimelineEntry> {
        const { memory, events, logger, auditor } = this.deps
        const { round } = result

        const notebookSaved = memory.hasNote(round)
        if (!notebookSaved) {
            logger.warn({ round }, 'round ended without a notebook entry')
            events.emit('log', { text: `Round ${round}: notebook not saved`, level: 'warn' })
        }

        const duration = roundDuration(result)
        const entry: TimelineEntry = {
            round,
            timestamp: result.finishedAt,
            status: result.status,
            toolsUsed: result.toolsUsed,
            duration,
            summary: result.summary,
            notebookSaved,
            ...(result.error !== undefined ? { error: result.error } : {}),
        }
        const log: RoundLog = {
            round,
            startedAt: result.startedAt,
            finishedAt: result.finishedAt,
            status: result.status,
            actions: result.actions,
            summary: result.summary,
        }

        try {
            await memory.recordRound(entry, log)
        } catch (error) {
            logger.error({ round, error }, 'failed to record round')
            events.emit('error', { round, message: errorMessage(error) })
        }

        this.lastSummary = result.summary
        if (result.error !== undefined) this.lastError = result.error

        events.emit('round:complete', {
            round,
            status: result.status,
            toolsUsed: result.toolsUsed,
            duration,
            notebookSaved,
            summary: result.summary,
        })

        if (auditor && (result.status !== 'error' || result.actions.length > 0)) {
            try {
                await auditor.update(log)
            } catch (error) {
                logger.warn({ round, error: errorMessage(error) }, 'snapshot update failed')
                events.emit('error', { round, message: errorMessage(error) })
            }
        }

        return entry
    }

    private setState(state: LoopState, message?: string, nextIn?: number): void {
        this.state = state
        this.deps.events.emit('status', {
            state,
            round: this.current?.round ?? 0,
            ...(message !== undefined ? { message } : {}),
            ...(nextIn !== undefined ? { nextIn } : {}),
        })
    }
}
