import path from 'node:path'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'

/** One pending operator hint, consumed by the next round. */
export class InspirationBox {
    private file: string

    constructor(
        private fs: FileSystem,
        dataDir: string
    ) {
        this.file = path.join(dataDir, 'inspiration.txt')
    }

    async write(message: string): Promise<void> {
        await this.fs.mkdir(path.dirname(this.file))
        await this.fs.writeText(this.file, message.trim())
    }

    async peek(): Promise<string | undefined> {
        try {
            const text = (await this.fs.readText(this.file)).trim()
            return text || undefined
        } catch (error) {
            if (isNotFoundError(error)) return undefined
            throw error
        }
    }

    /** Reads and clears. */
    async take(): Promise<string | undefined> {
        const text = await this.peek()
        if (await this.fs.exists(this.file)) await this.fs.remove(this.file)
        return text
    }
}
