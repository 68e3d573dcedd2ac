import { z } from 'zod'
import { isNotFoundError, ToolExecutionError } from '../../core/errors.js'
import { isCloakedPath, resolveAgentPath, truncateOutput } from '../output.js'
import type { Tool } from '../types.js'

const ReadInput = z.object({
    path: z.string().min(1).describe('File path; relative paths start at your home directory'),
    offset: z.number().int().min(0).optional().describe('Line offset to start reading from (0-based)'),
    limit: z.number().int().positive().optional().describe('Max lines to read (default: all)'),
})

type ReadInput = z.infer<typeof ReadInput>

export const readFileTool: Tool<ReadInput> = {
    name: 'read_file',
    description: 'Read the contents of a text file',
    parameters: ReadInput,
    timeout: 'file',
    async execute(input, ctx) {
        const target = resolveAgentPath(input.path, ctx.home)
        if (await isCloakedPath(target, ctx)) throw new ToolExecutionError(`file not found: ${input.path}`)

        const kind = await ctx.fs.kind(target)
        if (kind === null) throw new ToolExecutionError(`file not found: ${input.path}`)
        if (kind === 'directory') throw new ToolExecutionError(`'${input.path}' is a directory, not a file`)

        let content: string
        try {
            content = await ctx.fs.readText(target)
        } catch (error) {
            if (isNotFoundError(error)) throw new ToolExecutionError(`file not found: ${input.path}`)
            throw error
        }

        if (input.offset !== undefined || input.limit !== undefined) {
            const lines = content.split('\n')
            const start = input.offset ?? 0
            const end = input.limit !== undefined ? start + input.limit : lines.length
            content = lines.slice(start, end).join('\n')
        }

        if (!content) return '(file is empty)'
        return truncateOutput(content, ctx.maxOutputChars)
    },
}
