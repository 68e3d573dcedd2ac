import { errorMessage, SnapshotUpdateError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { ChatMessage, LLMClient } from '../llm/types.js'
import type { RoundLog } from '../memory/types.js'
import { type Snapshot, SnapshotSchema } from './schema.js'
import { isEmptySnapshot, type SnapshotStore } from './store.js'

const RESULT_PREVIEW = 800

export const AUDITOR_PROMPT = `You are a system auditor for an autonomous AI agent's Linux server.
Given the agent's action log from this round and the current system snapshot, produce an UPDATED snapshot as JSON.

## Rules
1. Incremental update: only change what changed. Remove entries only when the agent explicitly deleted something.
2. Facts only: record only what the log confirms. Never invent files, services or paths.
3. Services: a process the agent started that listens on a port goes into "services".
4. Health: a 200 response means healthy; 404, 500 or connection refused means degraded or down.
5. Issues: errors and anomalies in the log go into "issues". Mark an earlier issue "resolved" once the log shows it fixed.
6. Keep descriptions short.
7. Output ONLY the JSON object. No Markdown fences, no commentary.

## JSON shape
{
  "meta": { "lastUpdated": string, "round": number },
  "services": [{ "name": string, "port": number|null, "domain": string|null,
                 "status": "running"|"stopped"|"error", "health": "healthy"|"degraded"|"down"|"unknown",
                 "healthNote": string|null, "path": string|null, "startCmd": string|null }],
  "projects": [{ "name": string, "path": string, "stack": string|null, "entry": string|null, "description": string|null }],
  "tools": [{ "path": string, "usage": string }],
  "documents": [{ "path": string, "purpose": string }],
  "environment": { "os": string|null, "runtime": string|null, "domain": string|null, "ssl": boolean,
                   "diskUsage": string|null, "keyPackages": string[] },
  "issues": [{ "severity": "critical"|"high"|"medium"|"low", "summary": string, "detail": string|null,
               "discovered": number, "status": "open"|"resolved" }]
}`

function formatActions(log: RoundLog): string {
    if (log.actions.length === 0) return '(no tool calls this round)'
    return log.actions
        .map((action, i) => {
            const result = action.result.length > RESULT_PREVIEW ? `${action.result.slice(0, RESULT_PREVIEW)}...` : action.result
            return `[${i + 1}] ${action.name}(${JSON.stringify(action.args)})\n${result}`
        })
        .join('\n\n')
}

export function buildAuditorMessages(current: Snapshot, log: RoundLog): ChatMessage[] {
    const snapshotText = isEmptySnapshot(current)
        ? '(empty: this is the first snapshot)'
        : JSON.stringify(current, null, 2)
    return [
        { role: 'system', content: AUDITOR_PROMPT },
        {
            role: 'user',
            content:
                `## Current snapshot\n${snapshotText}\n\n` +
                `## Round ${log.round} action log (status: ${log.status})\n${formatActions(log)}\n\n` +
                `## Agent summary\n${log.summary || '(none)'}`,
        },
    ]
}

/** Parses an auditor reply, tolerating a Markdown fence around the JSON. */
export function parseSnapshotReply(content: string): Snapshot {
    const fenced = /```(?:json)?\s*\n([\s\S]*?)```/.exec(content)
    const raw = (fenced?.[1] ?? content).trim()
    const data: unknown = JSON.parse(raw)
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new Error('reply is not a JSON object')
    }
    return SnapshotSchema.parse(data)
}

interface AuditorOptions {
    llm: LLMClient
    store: SnapshotStore
    logger: Logger
    model: string
    snapshotModel?: string
    now?: () => Date
}

/**
 * Keeps the asset inventory current. Tries the snapshot model first and the
 * main model second; raises SnapshotUpdateError when both fail.
 */
export class SnapshotAuditor {
    constructor(private options: AuditorOptions) {}

    models(): string[] {
        const { model, snapshotModel } = this.options
        const primary = snapshotModel ?? model
        return primary === model ? [primary] : [primary, model]
    }

    async update(log: RoundLog): Promise<Snapshot> {
        const { llm, store, logger } = this.options
        const now = this.options.now ?? (() => new Date())
        const messages = buildAuditorMessages(await store.load(), log)

        let lastError: unknown
        for (const [i, model] of this.models().entries()) {
            if (i > 0) logger.info({ model }, 'snapshot: falling back to main model')
            try {
                const response = await llm.chat({ model, messages, temperature: 0.1 })
                const snapshot = parseSnapshotReply(response.content ?? '')
                snapshot.meta = { lastUpdated: now().toISOString(), round: log.round }
                await store.save(snapshot)
                logger.info(
                    {
                        round: log.round,
                        services: snapshot.services.length,
                        projects: snapshot.projects.length,
                        openIssues: snapshot.issues.filter((issue) => issue.status === 'open').length,
                    },
                    'snapshot updated'
                )
                return snapshot
            } catch (error) {
                lastError = error
                logger.warn({ model, error: errorMessage(error) }, 'snapshot update attempt failed')
            }
        }
        throw new SnapshotUpdateError(`snapshot update failed on all models: ${errorMessage(lastError)}`, {
            cause: lastError,
        })
    }
}
