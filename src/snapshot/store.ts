import path from 'node:path'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { emptySnapshot, type Snapshot, SnapshotSchema } from './schema.js'

export class SnapshotStore {
    readonly file: string

    constructor(
        private fs: FileSystem,
        dataDir: string,
        private logger: Logger
    ) {
        this.file = path.join(dataDir, 'snapshot.json')
    }

    /** The current inventory; empty when none was saved or the file is unreadable. */
    async load(): Promise<Snapshot> {
        try {
            const parsed = SnapshotSchema.safeParse(await this.fs.readJSON(this.file))
            if (parsed.success) return parsed.data
            this.logger.warn({ file: this.file }, 'snapshot failed validation, starting empty')
        } catch (error) {
            if (!isNotFoundError(error)) this.logger.warn({ error, file: this.file }, 'unreadable snapshot, starting empty')
        }
        return emptySnapshot()
    }

    async save(snapshot: Snapshot): Promise<void> {
        await this.fs.mkdir(path.dirname(this.file))
        await this.fs.writeJSON(this.file, snapshot)
    }
}

export function isEmptySnapshot(snapshot: Snapshot): boolean {
    return (
        snapshot.meta.round === 0 &&
        snapshot.services.length === 0 &&
        snapshot.projects.length === 0 &&
        snapshot.tools.length === 0 &&
        snapshot.documents.length === 0 &&
        snapshot.issues.length === 0
    )
}
