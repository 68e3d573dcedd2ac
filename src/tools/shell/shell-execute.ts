import { z } from 'zod'
import { ToolExecutionError } from '../../core/errors.js'
import { truncateOutput } from '../output.js'
import type { ToolContext, Tool } from '../types.js'
import type { RunRequest } from './runner.js'

const ShellInput = z.object({
    command: z.string().min(1).describe('Shell command line, run with sh -c in your home directory'),
})

type ShellInput = z.infer<typeof ShellInput>

/**
 * Runs a command for the agent and returns what it may see of the output:
 * stealth filtered, a placeholder when empty, truncated.
 */
export async function runForAgent(
    ctx: ToolContext,
    request: Pick<RunRequest, 'command' | 'args'>,
    displayCommand: string
): Promise<string> {
    const result = await ctx.runner.run({
        ...request,
        cwd: ctx.home,
        env: ctx.env,
        timeout: ctx.shellTimeout,
        signal: ctx.signal,
    })
    if (result.timedOut) throw new ToolExecutionError(`timed out after ${ctx.shellTimeout / 1000}s`)

    const output = ctx.stealth.filterOutput(displayCommand, result.output)
    if (!output.trim()) return `(no output, exit code: ${result.exitCode ?? -1})`
    return truncateOutput(output, ctx.maxOutputChars)
}

export const shellExecuteTool: Tool<ShellInput> = {
    name: 'shell_execute',
    description: 'Execute a shell command in your home directory and return its combined stdout and stderr',
    parameters: ShellInput,
    timeout: 'shell',
    async execute(input, ctx) {
        const blocked = ctx.stealth.interceptCommand(input.command)
        if (blocked !== null) return blocked
        return runForAgent(ctx, { command: input.command }, input.command)
    },
}
