import type { ZodError } from 'zod'
import { errorMessage, ToolExecutionError } from '../core/errors.js'
import type { Result } from '../core/result.js'
import { err, ok } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { ToolRegistry } from './registry.js'
import type { AnyTool, TimeoutClass, ToolContext } from './types.js'

/** Milliseconds per timeout class. */
export type ToolTimeouts = Record<TimeoutClass, number>

function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')
}

export function formatToolResult(result: Result<string>): string {
    if (result.ok) return result.value
    return `(error: ${result.error})`
}

/**
 * Runs one tool call under its own timeout. Never throws: unknown tools,
 * invalid arguments, tool failures and timeouts all come back as `err`.
 */
export class ToolExecutor {
    constructor(
        private registry: ToolRegistry,
        private timeouts: ToolTimeouts,
        private logger: Logger
    ) {}

    async executeSafe(name: string, args: unknown, ctx: Omit<ToolContext, 'signal'>): Promise<Result<string>> {
        const tool = this.registry.get(name)
        if (!tool) {
            return err(`unknown tool '${name}'`)
        }

        const parsed = tool.parameters.safeParse(args)
        if (!parsed.success) {
            return err(`invalid arguments for ${name}: ${describeIssues(parsed.error)}`)
        }

        const limit = this.timeouts[tool.timeout]
        const controller = new AbortController()
        let timer: NodeJS.Timeout | undefined
        const expired = new Promise<Result<string>>((resolve) => {
            timer = setTimeout(() => {
                controller.abort()
                resolve(err(`timed out after ${limit / 1000}s`))
            }, limit)
        })

        try {
            return await Promise.race([this.run(tool, parsed.data, { ...ctx, signal: controller.signal }), expired])
        } finally {
            clearTimeout(timer)
        }
    }

    private async run(tool: AnyTool, input: unknown, ctx: ToolContext): Promise<Result<string>> {
        try {
            return ok(await tool.execute(input, ctx))
        } catch (error) {
            if (ctx.signal.aborted) return err(`timed out after ${this.timeouts[tool.timeout] / 1000}s`)
            if (!(error instanceof ToolExecutionError)) {
                this.logger.warn({ error, tool: tool.name }, 'tool failed')
            }
            return err(errorMessage(error))
        }
    }
}
