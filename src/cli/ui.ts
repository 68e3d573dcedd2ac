import pc from 'picocolors'
import type { LoopStatus } from '../activation/loop.js'
import type { NotebookEntry, TimelineEntry } from '../memory/types.js'
import type { ActivityMessage } from '../service/activity-stream.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    tool: (name: string) => pc.blue(name),
}

export function banner(version: string): string {
    return `${colors.brand('wakeloop')} ${colors.dim(`v${version}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

function clip(text: string, max: number): string {
    const line = text.replace(/\s+/g, ' ').trim()
    return line.length > max ? `${line.slice(0, max)}...` : line
}

const STATUS_COLOR: Record<TimelineEntry['status'], (text: string) => string> = {
    completed: colors.success,
    stopped: colors.warn,
    error: colors.error,
    running: colors.dim,
}

/** One line per activity message; null for messages not worth printing, such as stream chunks. */
export function formatActivity(message: ActivityMessage): string | null {
    const time = colors.dim(message.timestamp.slice(11, 19))
    const data = message.data
    if ('state' in data) {
        const next = data.nextIn !== undefined ? colors.dim(` (next round in ${data.nextIn}s)`) : ''
        return `${time} ${colors.dim(`state: ${data.state}`)}${next}`
    }
    if ('startedAt' in data) return `\n${colors.bold(`Round ${data.round}`)} ${colors.dim(data.startedAt)}`
    if ('args' in data) return `${time} ${colors.tool(data.name)} ${colors.dim(clip(JSON.stringify(data.args) ?? '', 120))}`
    if ('result' in data) {
        const text = clip(data.result, 160)
        return `${time}   ${data.ok ? colors.dim(text) : colors.warn(text)}`
    }
    if ('notebookSaved' in data) {
        const paint = STATUS_COLOR[data.status]
        const notebook = data.notebookSaved ? 'notebook saved' : colors.warn('notebook NOT saved')
        return `${time} ${paint(`round ${data.round} ${data.status}`)} | tools ${data.toolsUsed} | ${data.duration.toFixed(1)}s | ${notebook}`
    }
    if ('level' in data) return `${time} ${data.level === 'warn' ? colors.warn(data.text) : data.text}`
    if ('message' in data) return `${time} ${formatError(data.message)}`
    if (message.type === 'thought:done' && 'text' in data) return `${time} ${clip(data.text, 300)}`
    return null
}

export function formatStatus(status: LoopStatus): string {
    const parts = [`state: ${status.state}`, `round: ${status.round}`, `tools used: ${status.toolsUsed}`, `rounds on record: ${status.totalRounds}`]
    if (status.lastError) parts.push(colors.error(`last error: ${status.lastError}`))
    return parts.join(' | ')
}

export function formatTimelineEntry(entry: TimelineEntry): string {
    const paint = STATUS_COLOR[entry.status]
    const head = `${colors.bold(`#${entry.round}`)} ${paint(entry.status)} ${colors.dim(entry.timestamp)} tools ${entry.toolsUsed} | ${entry.duration.toFixed(1)}s | notebook ${entry.notebookSaved ? 'yes' : colors.warn('no')}`
    return entry.summary ? `${head}\n  ${clip(entry.summary, 200)}` : head
}

export function formatNote(entry: NotebookEntry): string {
    return `${colors.bold(`--- Round ${entry.round}`)} ${colors.dim(entry.timestamp)}\n${entry.content}`
}
