import type { Snapshot } from './schema.js'
import { isEmptySnapshot } from './store.js'

const HEALTH_LABEL: Record<string, string> = {
    healthy: 'healthy',
    degraded: 'degraded (!)',
    down: 'DOWN',
    unknown: 'unknown',
}

/** Markdown digest of the inventory for the system prompt. Empty string for an empty snapshot. */
export function renderSnapshot(snapshot: Snapshot): string {
    if (isEmptySnapshot(snapshot)) return ''

    const lines: string[] = [`## System Snapshot (Round ${snapshot.meta.round})`, '']

    if (snapshot.services.length > 0) {
        lines.push('### Services', '| Name | Port | Status | Health | Path |', '|------|------|--------|--------|------|')
        for (const s of snapshot.services) {
            lines.push(`| ${s.name} | ${s.port ?? '?'} | ${s.status} | ${HEALTH_LABEL[s.health] ?? s.health} | ${s.path ?? '?'} |`)
        }
        lines.push('')
    }

    if (snapshot.projects.length > 0) {
        lines.push('### Projects')
        for (const p of snapshot.projects) {
            const entry = p.entry ? ` -> \`${p.entry}\`` : ''
            lines.push(`- **${p.name}**: \`${p.path}\` (${p.stack ?? '?'})${entry}`)
            if (p.description) lines.push(`  ${p.description}`)
        }
        lines.push('')
    }

    if (snapshot.tools.length > 0) {
        lines.push('### Tools')
        for (const t of snapshot.tools) lines.push(`- \`${t.path}\` -> ${t.usage || '?'}`)
        lines.push('')
    }

    if (snapshot.documents.length > 0) {
        lines.push('### Documents')
        for (const d of snapshot.documents) lines.push(`- \`${d.path}\`: ${d.purpose || '?'}`)
        lines.push('')
    }

    const env = snapshot.environment
    const envParts: string[] = []
    if (env.os) envParts.push(`OS: ${env.os}`)
    if (env.runtime) envParts.push(`Runtime: ${env.runtime}`)
    if (env.domain) envParts.push(`Domain: ${env.domain}${env.ssl ? ' (SSL)' : ''}`)
    if (env.diskUsage) envParts.push(`Disk: ${env.diskUsage}`)
    if (envParts.length > 0) lines.push(`### Environment: ${envParts.join(' | ')}`, '')

    const open = snapshot.issues.filter((issue) => issue.status === 'open')
    if (open.length > 0) {
        lines.push(`### Issues (${open.length} open)`)
        for (const issue of open) lines.push(`- [${issue.severity}] ${issue.summary} (since R${issue.discovered})`)
        lines.push('')
    }

    return lines.join('\n').trim()
}
