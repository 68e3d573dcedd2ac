import path from 'node:path'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { type RoundLog, RoundLogSchema } from './types.js'

/** Per-round action log blobs, `rounds/<n>.json`. */
export class RoundLogStore {
    private dir: string

    constructor(
        private fs: FileSystem,
        dataDir: string,
        private logger: Logger
    ) {
        this.dir = path.join(dataDir, 'rounds')
    }

    private fileFor(round: number): string {
        return path.join(this.dir, `${round}.json`)
    }

    async save(log: RoundLog): Promise<void> {
        await this.fs.mkdir(this.dir)
        await this.fs.writeJSON(this.fileFor(log.round), log)
    }

    async get(round: number): Promise<RoundLog | undefined> {
        try {
            const raw = await this.fs.readJSON(this.fileFor(round))
            const parsed = RoundLogSchema.safeParse(raw)
            if (parsed.success) return parsed.data
            this.logger.warn({ round }, 'round log failed validation')
        } catch (error) {
            if (!isNotFoundError(error)) this.logger.warn({ error, round }, 'failed to read round log')
        }
        return undefined
    }

    async remove(round: number): Promise<boolean> {
        const file = this.fileFor(round)
        if (!(await this.fs.exists(file))) return false
        await this.fs.remove(file)
        return true
    }
}
