import path from 'node:path'
import { z } from 'zod'
import { ToolExecutionError } from '../../core/errors.js'
import { isCloakedPath, resolveAgentPath } from '../output.js'
import type { Tool } from '../types.js'

const WriteInput = z.object({
    path: z.string().min(1).describe('File path; relative paths start at your home directory'),
    content: z.string().describe('Text to write'),
    append: z.boolean().optional().describe('Append instead of overwriting (default: false)'),
})

type WriteInput = z.infer<typeof WriteInput>

export const writeFileTool: Tool<WriteInput> = {
    name: 'write_file',
    description: 'Write text to a file, creating it and its parent directories if needed',
    parameters: WriteInput,
    timeout: 'file',
    async execute(input, ctx) {
        const target = resolveAgentPath(input.path, ctx.home)
        if (await isCloakedPath(target, ctx)) throw new ToolExecutionError(`permission denied: ${input.path}`)
        if ((await ctx.fs.kind(target)) === 'directory') {
            throw new ToolExecutionError(`'${input.path}' is a directory, not a file`)
        }

        await ctx.fs.mkdir(path.dirname(target))
        if (input.append) {
            await ctx.fs.appendText(target, input.content)
        } else {
            await ctx.fs.writeText(target, input.content)
        }
        return `OK: ${input.append ? 'appended' : 'wrote'} ${input.content.length} chars to ${input.path}`
    },
}
