import { z } from 'zod'
import { ToolExecutionError } from '../../core/errors.js'
import type { Tool } from '../types.js'

const WriteInput = z.object({
    content: z.string().describe('Your note for this round: what you did, what you learned, what comes next'),
})

const ReadInput = z.object({
    round: z.number().int().positive().describe('Round number of the note to read'),
})

type WriteInput = z.infer<typeof WriteInput>
type ReadInput = z.infer<typeof ReadInput>

export const notebookWriteTool: Tool<WriteInput> = {
    name: 'notebook_write',
    description: 'Save your note for the current round. Calling it again replaces the note',
    parameters: WriteInput,
    timeout: 'file',
    async execute(input, ctx) {
        if (!input.content.trim()) throw new ToolExecutionError('note content cannot be empty')
        await ctx.memory.saveNotebook(ctx.round, input.content)
        return `OK: note saved for round ${ctx.round} (${input.content.length} chars)`
    },
}

export const notebookReadTool: Tool<ReadInput> = {
    name: 'notebook_read',
    description: 'Read the note you saved in an earlier round',
    parameters: ReadInput,
    timeout: 'file',
    async execute(input, ctx) {
        const entry = ctx.memory.getNote(input.round)
        if (!entry) return `(no note found for round ${input.round})`
        return `--- Round ${entry.round} | ${entry.timestamp} ---\n${entry.content}`
    },
}
