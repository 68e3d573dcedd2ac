import path from 'node:path'
import type { EventMap, EventName, TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from './index.js'

const SEPARATOR = '='.repeat(50)

function preview(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text
}

/**
 * Human-readable run log, one file per UTC day under `logs/`. Each round opens
 * with a separator header so a round's section can be located and removed.
 */
export class OperatorLog {
    private queue: Promise<void> = Promise.resolve()

    constructor(
        private fs: FileSystem,
        private logDir: string,
        private logger: Logger,
        private now: () => Date = () => new Date()
    ) {}

    attach(events: TypedEventEmitter): () => void {
        return events.onAny((event, data) => {
            const line = this.format(event, data)
            if (line !== null) this.write(line)
        })
    }

    write(text: string): void {
        const file = this.pathFor(this.now())
        this.queue = this.queue
            .then(async () => {
                await this.fs.mkdir(this.logDir)
                await this.fs.appendText(file, `${text}\n`)
            })
            .catch((error: unknown) => {
                this.logger.warn({ error, file }, 'operator log write failed')
            })
    }

    /** Resolves once every line written so far has reached the file. */
    flush(): Promise<void> {
        return this.queue
    }

    async tail(lines: number): Promise<string[]> {
        await this.flush()
        const files = await this.logFiles()
        const latest = files[files.length - 1]
        if (!latest) return []
        const content = await this.fs.readText(path.join(this.logDir, latest))
        return content.replace(/\n$/, '').split('\n').slice(-lines)
    }

    /**
     * Removes round `round`'s section from every day file. Returns whether any
     * section existed. Queued behind pending writes, and writes made meanwhile
     * wait for it.
     */
    deleteRoundSection(round: number): Promise<boolean> {
        const run = this.queue.then(() => this.removeSection(round))
        // the caller gets the failure; later writes still run
        this.queue = run.then(
            () => undefined,
            () => undefined
        )
        return run
    }

    private async removeSection(round: number): Promise<boolean> {
        let found = false
        for (const name of await this.logFiles()) {
            const file = path.join(this.logDir, name)
            const lines = (await this.fs.readText(file)).split('\n')
            const start = findHeader(lines, (r) => r === round, 0)
            if (start === -1) continue
            const next = findHeader(lines, () => true, start + 3)
            const end = next === -1 ? lines.length : next
            const kept = [...lines.slice(0, start), ...lines.slice(end)]
            await this.fs.writeText(file, next === -1 && start > 0 ? `${kept.join('\n')}\n` : kept.join('\n'))
            found = true
        }
        return found
    }

    private async logFiles(): Promise<string[]> {
        if ((await this.fs.kind(this.logDir)) !== 'directory') return []
        return (await this.fs.listDir(this.logDir)).filter((name) => name.endsWith('.log'))
    }

    private pathFor(date: Date): string {
        return path.join(this.logDir, `${date.toISOString().slice(0, 10)}.log`)
    }

    private format(event: EventName, data: EventMap[EventName]): string | null {
        const ts = `[${this.now().toISOString().slice(11, 19)}]`
        if ('text' in data && event === 'log') return `${ts} ${data.text}`
        if ('startedAt' in data && 'round' in data) {
            return ['', SEPARATOR, `Round ${data.round} | ${data.startedAt.slice(0, 19).replace('T', ' ')}`, SEPARATOR].join('\n')
        }
        if ('notebookSaved' in data) {
            return (
                `${ts} [DONE] Round ${data.round} ${data.status} | Tools: ${data.toolsUsed} | ` +
                `Time: ${data.duration.toFixed(1)}s | Notebook: ${data.notebookSaved ? 'saved' : 'NOT SAVED'}`
            )
        }
        if ('args' in data) return `${ts} [TOOL] ${data.name}(${preview(JSON.stringify(data.args) ?? '', 200)})`
        if ('result' in data) return `${ts} [RESULT] ${preview(data.result, 500)}`
        if ('text' in data && event === 'thought:done') return `${ts} [THOUGHT] ${preview(data.text, 1000)}`
        if ('state' in data && data.state === 'waiting' && data.nextIn !== undefined) {
            return `${ts} [WAIT] Next activation in ${data.nextIn}s...`
        }
        if (event === 'error' && 'message' in data) return `${ts} [ERROR] ${data.message}`
        return null
    }
}

function findHeader(lines: string[], match: (round: number) => boolean, from: number): number {
    for (let i = Math.max(from, 1); i + 1 < lines.length; i++) {
        const header = /^Round (\d+) \| /.exec(lines[i] ?? '')
        if (!header || lines[i - 1] !== SEPARATOR || lines[i + 1] !== SEPARATOR) continue
        if (match(Number(header[1]))) {
            // section begins at the blank line before the opening separator
            return i >= 2 && lines[i - 2] === '' ? i - 2 : i - 1
        }
    }
    return -1
}
