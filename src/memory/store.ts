import path from 'node:path'
import { errorMessage, PersistenceError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { InspirationBox } from './inspiration.js'
import { JsonlLog } from './jsonl-log.js'
import { RoundLogStore } from './round-logs.js'
import {
    type DeleteResult,
    type NotebookEntry,
    NotebookEntrySchema,
    type Page,
    type RoundDetail,
    type RoundLog,
    type TimelineEntry,
    TimelineEntrySchema,
} from './types.js'

/** Something that keeps a per-round section of text, such as the operator log. */
export interface RoundSections {
    deleteRoundSection(round: number): Promise<boolean>
}

interface MemoryStoreOptions {
    fs: FileSystem
    dataDir: string
    logger: Logger
    sections?: RoundSections
    now?: () => Date
}

/**
 * Durable record of the agent's life: notebook, timeline, per-round action
 * logs and the pending inspiration. The activation loop is its only writer.
 */
export class MemoryStore {
    readonly dataDir: string
    private fs: FileSystem
    private logger: Logger
    private notebook: JsonlLog<NotebookEntry>
    private timeline: JsonlLog<TimelineEntry>
    private roundLogs: RoundLogStore
    private inspiration: InspirationBox
    private sections?: RoundSections
    private now: () => Date

    constructor(options: MemoryStoreOptions) {
        this.fs = options.fs
        this.dataDir = options.dataDir
        this.logger = options.logger
        this.sections = options.sections
        this.now = options.now ?? (() => new Date())
        this.notebook = new JsonlLog(this.fs, path.join(this.dataDir, 'notebook.jsonl'), NotebookEntrySchema, this.logger)
        this.timeline = new JsonlLog(this.fs, path.join(this.dataDir, 'timeline.jsonl'), TimelineEntrySchema, this.logger)
        this.roundLogs = new RoundLogStore(this.fs, this.dataDir, this.logger)
        this.inspiration = new InspirationBox(this.fs, this.dataDir)
    }

    async init(): Promise<void> {
        try {
            await this.fs.mkdir(this.dataDir)
            await this.notebook.load()
            await this.timeline.load()
        } catch (error) {
            throw new PersistenceError(`cannot open data dir ${this.dataDir}: ${errorMessage(error)}`, { cause: error })
        }
    }

    /** The number the next round takes: one past the highest round on record. */
    nextRound(): number {
        return Math.max(this.notebook.lastRound(), this.timeline.lastRound()) + 1
    }

    async saveNotebook(round: number, content: string): Promise<NotebookEntry> {
        const entry: NotebookEntry = { round, timestamp: this.now().toISOString(), content }
        await this.notebook.append(entry)
        return entry
    }

    getNote(round: number): NotebookEntry | undefined {
        return this.notebook.get(round)
    }

    hasNote(round: number): boolean {
        return this.notebook.has(round)
    }

    /** The `n` latest notebook entries, newest first. */
    recentNotes(n: number): NotebookEntry[] {
        return this.notebook.recent(n)
    }

    notebookPage(offset: number, limit: number): Page<NotebookEntry> {
        return this.notebook.page(offset, limit)
    }

    async recordRound(entry: TimelineEntry, log: RoundLog): Promise<void> {
        try {
            await this.timeline.append(entry)
            await this.roundLogs.save(log)
        } catch (error) {
            throw new PersistenceError(`cannot record round ${entry.round}: ${errorMessage(error)}`, { cause: error })
        }
    }

    timelinePage(offset: number, limit: number): Page<TimelineEntry> {
        return this.timeline.page(offset, limit)
    }

    totalRounds(): number {
        return this.timeline.count()
    }

    async getRound(round: number): Promise<RoundDetail | undefined> {
        const timeline = this.timeline.get(round)
        const notebook = this.notebook.get(round)
        const log = await this.roundLogs.get(round)
        if (!timeline && !notebook && !log) return undefined
        return { timeline, notebook, log }
    }

    /**
     * Removes every trace of a round. The timeline entry goes last so a failed
     * delete can be retried without leaving parts that point at a missing round.
     */
    async deleteRound(round: number): Promise<DeleteResult> {
        try {
            const log = await this.roundLogs.remove(round)
            const notebook = await this.notebook.remove(round)
            const operatorLog = this.sections ? await this.sections.deleteRoundSection(round) : false
            const timeline = await this.timeline.remove(round)
            if (timeline || notebook || log) this.logger.info({ round }, 'round deleted')
            return { timeline, notebook, log, operatorLog }
        } catch (error) {
            throw new PersistenceError(`failed to delete round ${round}: ${errorMessage(error)}`, { cause: error })
        }
    }

    writeInspiration(message: string): Promise<void> {
        return this.inspiration.write(message)
    }

    peekInspiration(): Promise<string | undefined> {
        return this.inspiration.peek()
    }

    takeInspiration(): Promise<string | undefined> {
        return this.inspiration.take()
    }
}
