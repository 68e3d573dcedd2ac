import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { RoundStatus } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { collectStream } from '../llm/stream.js'
import type { ChatMessage, ChatResponse, LLMClient, ToolCall, ToolDefinition } from '../llm/types.js'
import type { MemoryStore } from '../memory/store.js'
import type { ToolCallRecord } from '../memory/types.js'
import type { StealthFilter } from '../security/stealth.js'
import type { SkillCatalog } from '../skills/catalog.js'
import { renderSnapshot } from '../snapshot/render.js'
import type { SnapshotStore } from '../snapshot/store.js'
import { formatToolResult, type ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import type { CommandRunner } from '../tools/shell/runner.js'
import type { ToolContext } from '../tools/types.js'
import { loadKnowledgeIndex } from './home.js'
import { buildSystemPrompt, buildUserMessage, loadPersona } from './prompt.js'
import { BUDGET_REFUSAL, budgetHint, SUMMARY_REQUEST, SummaryBuilder } from './summary.js'

export type RoundConfig = Pick<
    ResolvedConfig,
    | 'dataDir'
    | 'agentHome'
    | 'persona'
    | 'maxToolCalls'
    | 'shellTimeout'
    | 'maxOutputChars'
    | 'notebookInject'
    | 'malformedRetries'
    | 'maxTurns'
    | 'summaryMaxChars'
    | 'knowledgeIndexMaxChars'
    | 'promptTokenBudget'
    | 'streaming'
>

export interface RoundDeps {
    config: RoundConfig
    llm: LLMClient
    registry: ToolRegistry
    executor: ToolExecutor
    memory: MemoryStore
    skills: SkillCatalog
    snapshots: SnapshotStore
    stealth: StealthFilter
    runner: CommandRunner
    fs: FileSystem
    /** Sanitized environment for agent commands. */
    env: Record<string, string>
    events: TypedEventEmitter
    logger: Logger
    now?: () => Date
}

/** How the loop steers a running round. */
export interface RoundControl {
    stopRequested(): boolean
    onToolUsed(toolsUsed: number): void
}

export interface RoundResult {
    round: number
    status: Exclude<RoundStatus, 'running'>
    startedAt: string
    finishedAt: string
    toolsUsed: number
    actions: ToolCallRecord[]
    summary: string
    error?: string
}

type ParsedCalls = { ok: true; calls: { call: ToolCall; args: unknown }[] } | { ok: false; error: string }

function parseToolCalls(calls: ToolCall[]): ParsedCalls {
    const parsed: { call: ToolCall; args: unknown }[] = []
    for (const call of calls) {
        const raw = call.function.arguments.trim()
        if (!raw) {
            parsed.push({ call, args: {} })
            continue
        }
        try {
            parsed.push({ call, args: JSON.parse(raw) })
        } catch {
            return { ok: false, error: `malformed arguments for ${call.function.name}: ${raw.slice(0, 200)}` }
        }
    }
    return { ok: true, calls: parsed }
}

function argsRecord(args: unknown): Record<string, unknown> {
    if (typeof args === 'object' && args !== null && !Array.isArray(args)) return Object.fromEntries(Object.entries(args))
    return { value: args }
}

/**
 * Drives one round's conversation: prompt assembly, LLM turns, tool dispatch
 * under the budget, stop checkpoints. Persistence of the outcome is the
 * loop's job.
 */
export class RoundRunner {
    private now: () => Date

    constructor(private deps: RoundDeps) {
        this.now = deps.now ?? (() => new Date())
    }

    maxTurns(): number {
        const { config } = this.deps
        return config.maxTurns ?? config.maxToolCalls + config.malformedRetries + 5
    }

    async run(round: number, control: RoundControl): Promise<RoundResult> {
        const { config, events, logger } = this.deps
        const startedAt = this.now().toISOString()
        events.emit('round:start', { round, startedAt })

        const actions: ToolCallRecord[] = []
        const summary = new SummaryBuilder()
        let status: RoundResult['status'] = 'completed'
        let error: string | undefined

        try {
            const messages = await this.assemblePrompt(round)
            const tools = this.deps.registry.getToolDefinitions()
            const ctx = this.toolContext(round)
            let malformed = 0

            for (let turn = 0; ; turn++) {
                if (control.stopRequested()) {
                    status = 'stopped'
                    break
                }
                if (turn >= this.maxTurns()) {
                    logger.warn({ round, turns: turn }, 'turn cap reached, ending round')
                    break
                }

                const response = await this.complete(round, messages, tools)
                if (response.toolCalls.length === 0) {
                    summary.add(response.content, response.reasoning)
                    break
                }

                const parsed = parseToolCalls(response.toolCalls)
                if (!parsed.ok) {
                    if (malformed < config.malformedRetries) {
                        malformed++
                        logger.warn({ round, attempt: malformed, error: parsed.error }, 'malformed tool call, asking again')
                        continue
                    }
                    logger.warn({ round, error: parsed.error }, 'malformed tool calls persist, taking text as final')
                    summary.add(response.content, response.reasoning)
                    break
                }
                malformed = 0
                summary.add(response.content, response.reasoning)

                messages.push({
                    role: 'assistant',
                    content: response.content,
                    tool_calls: response.toolCalls,
                    ...(response.reasoning ? { reasoning_content: response.reasoning } : {}),
                })

                let exhausted = false
                let stopped = false
                for (const { call, args } of parsed.calls) {
                    if (control.stopRequested()) {
                        stopped = true
                        break
                    }
                    if (actions.length >= config.maxToolCalls) {
                        messages.push({ role: 'tool', tool_call_id: call.id, content: BUDGET_REFUSAL })
                        exhausted = true
                        continue
                    }

                    const record = await this.dispatch(round, call, args, ctx)
                    actions.push(record)
                    control.onToolUsed(actions.length)
                    messages.push({
                        role: 'tool',
                        tool_call_id: call.id,
                        content: `${budgetHint(actions.length, config.maxToolCalls)}\n${record.result}`,
                    })
                }

                if (stopped) {
                    status = 'stopped'
                    break
                }
                if (exhausted && control.stopRequested()) {
                    status = 'stopped'
                    break
                }
                if (exhausted) {
                    logger.info({ round, toolsUsed: actions.length }, 'tool budget exhausted, requesting summary')
                    messages.push({ role: 'user', content: SUMMARY_REQUEST })
                    const final = await this.complete(round, messages, undefined)
                    summary.add(final.content, final.reasoning)
                    break
                }
            }
        } catch (caught) {
            status = 'error'
            error = errorMessage(caught)
            logger.error({ round, error: caught }, 'round failed')
            events.emit('error', { round, message: `Round ${round} failed: ${error}` })
        }

        return {
            round,
            status,
            startedAt,
            finishedAt: this.now().toISOString(),
            toolsUsed: actions.length,
            actions,
            summary: summary.build(config.summaryMaxChars),
            error,
        }
    }

    private async assemblePrompt(round: number): Promise<ChatMessage[]> {
        const { config, fs, memory, skills, snapshots, logger } = this.deps

        const { prompt, manifest } = buildSystemPrompt({
            persona: await loadPersona(fs, config.dataDir, config.persona),
            skills: await skills.enabled(),
            snapshot: renderSnapshot(await snapshots.load()),
            tokenBudget: config.promptTokenBudget,
        })
        const dropped = manifest.sections.filter((s) => !s.included).map((s) => s.key)
        if (dropped.length > 0) logger.warn({ round, dropped }, 'system prompt over budget, sections dropped')

        const inspiration = await memory.takeInspiration()
        if (inspiration) logger.info({ round }, 'inspiration delivered')

        const user = buildUserMessage({
            now: this.now(),
            round,
            maxToolCalls: config.maxToolCalls,
            recentNotes: memory.recentNotes(config.notebookInject),
            inspiration,
            knowledgeIndex: await loadKnowledgeIndex(fs, config.agentHome, config.knowledgeIndexMaxChars),
        })

        return [
            { role: 'system', content: prompt },
            { role: 'user', content: user },
        ]
    }

    private toolContext(round: number): Omit<ToolContext, 'signal'> {
        const { config, fs, stealth, runner, env, memory, skills } = this.deps
        return {
            fs,
            home: config.agentHome,
            round,
            stealth,
            runner,
            env,
            memory,
            skills,
            maxOutputChars: config.maxOutputChars,
            shellTimeout: config.shellTimeout * 1000,
        }
    }

    private async complete(round: number, messages: ChatMessage[], tools: ToolDefinition[] | undefined): Promise<ChatResponse> {
        const { llm, events, config } = this.deps
        const response = config.streaming
            ? await collectStream(llm.chatStream({ messages, tools }), (text) => events.emit('thought:chunk', { round, text }))
            : await llm.chat({ messages, tools })

        const text = response.content?.trim()
        if (text) events.emit('thought:done', { round, text })
        return response
    }

    private async dispatch(
        round: number,
        call: ToolCall,
        args: unknown,
        ctx: Omit<ToolContext, 'signal'>
    ): Promise<ToolCallRecord> {
        const { executor, events, logger } = this.deps
        const name = call.function.name
        events.emit('tool:call', { round, id: call.id, name, args })

        const startedAt = this.now()
        const started = Date.now()
        const result = await executor.executeSafe(name, args, ctx)
        const duration = Date.now() - started
        const text = formatToolResult(result)

        logger.debug({ round, tool: name, ok: result.ok, duration }, 'tool call finished')
        events.emit('tool:result', { round, id: call.id, name, ok: result.ok, result: text, duration })

        return { id: call.id, name, args: argsRecord(args), result: text, startedAt: startedAt.toISOString(), duration, ok: result.ok }
    }
}
