import path from 'node:path'
import type { ZodType } from 'zod'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { Page } from './types.js'

interface Keyed {
    round: number
}

/**
 * Append-only JSON Lines file keyed by round, mirrored in memory. The latest
 * line for a round wins; `rounds` stays sorted so recent reads are a slice.
 * Appends and removals run one at a time, so a rewrite never drops a line
 * appended while it was in flight.
 */
export class JsonlLog<T extends Keyed> {
    private byRound = new Map<number, T>()
    private rounds: number[] = []
    private loaded = false
    private queue: Promise<void> = Promise.resolve()

    constructor(
        private fs: FileSystem,
        readonly file: string,
        private schema: ZodType<T>,
        private logger: Logger
    ) {}

    async load(): Promise<void> {
        if (this.loaded) return
        this.byRound.clear()
        let content = ''
        try {
            content = await this.fs.readText(this.file)
        } catch (error) {
            if (!isNotFoundError(error)) throw error
        }

        let skipped = 0
        for (const line of content.split('\n')) {
            if (!line.trim()) continue
            const parsed = this.parseLine(line)
            if (parsed) this.byRound.set(parsed.round, parsed)
            else skipped++
        }
        if (skipped > 0) this.logger.warn({ file: this.file, skipped }, 'skipped unreadable lines')

        this.rounds = [...this.byRound.keys()].sort((a, b) => a - b)
        this.loaded = true
    }

    private parseLine(line: string): T | undefined {
        try {
            const result = this.schema.safeParse(JSON.parse(line))
            return result.success ? result.data : undefined
        } catch {
            return undefined
        }
    }

    private serialize<R>(task: () => Promise<R>): Promise<R> {
        const run = this.queue.then(task)
        // the caller gets the failure; the next write still runs
        this.queue = run.then(
            () => undefined,
            () => undefined
        )
        return run
    }

    append(entry: T): Promise<void> {
        return this.serialize(async () => {
            await this.load()
            await this.fs.mkdir(path.dirname(this.file))
            await this.fs.appendText(this.file, `${JSON.stringify(entry)}\n`)
            if (!this.byRound.has(entry.round)) this.insertRound(entry.round)
            this.byRound.set(entry.round, entry)
        })
    }

    private insertRound(round: number): void {
        // rounds are appended in order; only out-of-order writes need a scan
        const last = this.rounds[this.rounds.length - 1]
        if (last === undefined || round > last) {
            this.rounds.push(round)
            return
        }
        const index = this.rounds.findIndex((r) => r > round)
        this.rounds.splice(index === -1 ? this.rounds.length : index, 0, round)
    }

    get(round: number): T | undefined {
        return this.byRound.get(round)
    }

    has(round: number): boolean {
        return this.byRound.has(round)
    }

    lastRound(): number {
        return this.rounds[this.rounds.length - 1] ?? 0
    }

    count(): number {
        return this.rounds.length
    }

    /** The `n` newest entries, newest first. */
    recent(n: number): T[] {
        if (n <= 0) return []
        const items: T[] = []
        for (let i = this.rounds.length - 1; i >= 0 && items.length < n; i--) {
            const round = this.rounds[i]
            const entry = round === undefined ? undefined : this.byRound.get(round)
            if (entry) items.push(entry)
        }
        return items
    }

    /** Newest-first page. */
    page(offset: number, limit: number): Page<T> {
        const total = this.rounds.length
        const items: T[] = []
        const start = total - 1 - Math.max(0, offset)
        for (let i = start; i >= 0 && items.length < limit; i--) {
            const round = this.rounds[i]
            const entry = round === undefined ? undefined : this.byRound.get(round)
            if (entry) items.push(entry)
        }
        return { items, total, offset, limit }
    }

    /**
     * Rewrites the file without `round` through a temp file and a rename.
     * Returns false and touches nothing when the round is absent.
     */
    remove(round: number): Promise<boolean> {
        return this.serialize(() => this.rewriteWithout(round))
    }

    private async rewriteWithout(round: number): Promise<boolean> {
        await this.load()
        if (!this.byRound.has(round)) return false

        const kept = this.rounds.filter((r) => r !== round)
        const body = kept
            .map((r) => this.byRound.get(r))
            .filter((entry): entry is T => entry !== undefined)
            .map((entry) => `${JSON.stringify(entry)}\n`)
            .join('')
        const temp = `${this.file}.tmp`
        await this.fs.writeText(temp, body)
        await this.fs.rename(temp, this.file)

        this.byRound.delete(round)
        this.rounds = kept
        return true
    }
}
