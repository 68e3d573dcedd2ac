import { z } from 'zod'
import { ToolExecutionError } from '../../core/errors.js'
import { isCloakedPath, resolveAgentPath } from '../output.js'
import type { Tool } from '../types.js'

const EditInput = z.object({
    path: z.string().min(1).describe('File path; relative paths start at your home directory'),
    find: z.string().min(1).describe('Exact text to replace; must occur exactly once in the file'),
    replace: z.string().describe('Replacement text'),
})

type EditInput = z.infer<typeof EditInput>

function countOccurrences(haystack: string, needle: string): number {
    let count = 0
    for (let i = haystack.indexOf(needle); i !== -1; i = haystack.indexOf(needle, i + 1)) count++
    return count
}

export const editFileTool: Tool<EditInput> = {
    name: 'edit_file',
    description: 'Replace one exact occurrence of text in a file. Fails when the text is missing or occurs more than once',
    parameters: EditInput,
    timeout: 'file',
    async execute(input, ctx) {
        const target = resolveAgentPath(input.path, ctx.home)
        if (await isCloakedPath(target, ctx)) throw new ToolExecutionError(`permission denied: ${input.path}`)
        if ((await ctx.fs.kind(target)) !== 'file') throw new ToolExecutionError(`file not found: ${input.path}`)

        const content = await ctx.fs.readText(target)
        const count = countOccurrences(content, input.find)
        if (count === 0) throw new ToolExecutionError(`text to replace not found in ${input.path}`)
        if (count > 1) {
            throw new ToolExecutionError(
                `text to replace occurs ${count} times in ${input.path}; include more context so it matches once`
            )
        }

        const index = content.indexOf(input.find)
        const updated = content.slice(0, index) + input.replace + content.slice(index + input.find.length)
        await ctx.fs.writeText(target, updated)
        return `OK: edited ${input.path}`
    },
}
