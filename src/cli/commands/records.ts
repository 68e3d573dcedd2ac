import type { Container } from '../../core/container.js'
import type { Snapshot } from '../../snapshot/schema.js'
import { renderSnapshot } from '../../snapshot/render.js'
import { isEmptySnapshot } from '../../snapshot/store.js'
import { colors, formatNote, formatTimelineEntry } from '../ui.js'

export interface PageOptions {
    offset: string
    limit: string
}

export function parseRound(value: string): number {
    const round = Number(value)
    if (!Number.isInteger(round) || round < 1) throw new Error(`invalid round number: ${value}`)
    return round
}

function parsePage(options: PageOptions): [number, number] {
    const offset = Number.parseInt(options.offset, 10)
    const limit = Number.parseInt(options.limit, 10)
    return [Number.isNaN(offset) ? 0 : offset, Number.isNaN(limit) ? 20 : limit]
}

function pageFooter(shown: number, offset: number, total: number): string {
    if (total === 0) return ''
    return colors.dim(`\n${offset + 1}-${offset + shown} of ${total}`)
}

export async function historyCommand(container: Container, options: PageOptions): Promise<void> {
    const page = await container.service.history(...parsePage(options))
    if (page.total === 0) {
        console.log(colors.dim('No rounds yet.'))
        return
    }
    console.log(page.items.map(formatTimelineEntry).join('\n'))
    console.log(pageFooter(page.items.length, page.offset, page.total))
}

export async function notebookCommand(container: Container, options: PageOptions): Promise<void> {
    const page = await container.service.notebook(...parsePage(options))
    if (page.total === 0) {
        console.log(colors.dim('The notebook is empty.'))
        return
    }
    console.log(page.items.map(formatNote).join('\n\n'))
    console.log(pageFooter(page.items.length, page.offset, page.total))
}

export async function roundCommand(container: Container, value: string): Promise<void> {
    const detail = await container.service.round(parseRound(value))
    if (detail.timeline) console.log(formatTimelineEntry(detail.timeline))
    if (detail.notebook) console.log(`\n${formatNote(detail.notebook)}`)
    if (detail.log) {
        console.log(colors.bold(`\nActions (${detail.log.actions.length})`))
        for (const action of detail.log.actions) {
            const mark = action.ok ? colors.success('ok') : colors.error('failed')
            console.log(`  ${colors.tool(action.name)} ${mark} ${colors.dim(JSON.stringify(action.args))}`)
        }
    }
}

export async function deleteRoundCommand(container: Container, value: string): Promise<void> {
    const round = parseRound(value)
    const result = await container.service.deleteRound(round)
    const removed = Object.entries(result)
        .filter(([, done]) => done)
        .map(([part]) => part)
    console.log(colors.success(`Round ${round} deleted`) + colors.dim(` (${removed.join(', ')})`))
}

export async function snapshotCommand(container: Container, options: { json?: boolean }): Promise<void> {
    const snapshot: Snapshot = await container.service.snapshot()
    if (options.json) {
        console.log(JSON.stringify(snapshot, null, 2))
        return
    }
    if (isEmptySnapshot(snapshot)) {
        console.log(colors.dim('No snapshot yet.'))
        return
    }
    console.log(renderSnapshot(snapshot))
}

export async function inspireCommand(container: Container, message: string): Promise<void> {
    await container.service.inspire(message)
    console.log(colors.success('Inspiration queued for the next round.'))
}

export async function skillsCommand(container: Container): Promise<void> {
    const skills = await container.service.listSkills()
    if (skills.length === 0) {
        console.log(colors.dim('No skills installed.'))
        return
    }
    for (const skill of skills) {
        const state = skill.enabled ? colors.success('enabled') : colors.dim('disabled')
        console.log(`${colors.bold(skill.name)} ${state}${skill.description ? ` - ${skill.description}` : ''}`)
    }
}
