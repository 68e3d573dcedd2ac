import path from 'node:path'
import { z } from 'zod'
import { ToolExecutionError } from '../../core/errors.js'
import { pathLikeWords } from '../../security/shell-words.js'
import { runForAgent } from '../shell/shell-execute.js'
import { truncateOutput } from '../output.js'
import type { Tool, ToolContext } from '../types.js'

const ReadInput = z.object({
    name: z.string().min(1).describe('Skill name from the catalog'),
    file: z.string().optional().describe('A file listed under the skill\'s references to read instead of its instructions'),
})

const ExecInput = z.object({
    name: z.string().min(1).describe('Skill name from the catalog'),
    script: z.string().min(1).describe('Script file name listed under the skill\'s scripts'),
    args: z.array(z.string()).optional().describe('Arguments passed to the script'),
})

type ReadInput = z.infer<typeof ReadInput>
type ExecInput = z.infer<typeof ExecInput>

const INTERPRETERS: Record<string, string> = {
    '.sh': 'sh',
    '.bash': 'bash',
    '.py': 'python3',
    '.js': 'node',
    '.mjs': 'node',
}

async function requireEnabled(ctx: ToolContext, name: string) {
    const skill = await ctx.skills.read(name)
    if (!skill || !skill.enabled) throw new ToolExecutionError(`skill not found: ${name}`)
    return skill
}

export const skillReadTool: Tool<ReadInput> = {
    name: 'skill_read',
    description: 'Show the full instructions of a skill, or one of its reference files',
    parameters: ReadInput,
    timeout: 'file',
    async execute(input, ctx) {
        const skill = await requireEnabled(ctx, input.name)

        if (input.file !== undefined) {
            const content = await ctx.skills.readReference(input.name, input.file)
            if (content === undefined) throw new ToolExecutionError(`reference not found: ${input.file}`)
            return truncateOutput(content || '(file is empty)', ctx.maxOutputChars)
        }

        const lines = [`# Skill: ${skill.name}`, '', skill.body, '']
        lines.push(`Scripts: ${skill.scripts.length > 0 ? skill.scripts.join(', ') : '(none)'}`)
        lines.push(`References: ${skill.references.length > 0 ? skill.references.join(', ') : '(none)'}`)
        return truncateOutput(lines.join('\n'), ctx.maxOutputChars)
    },
}

export const skillExecTool: Tool<ExecInput> = {
    name: 'skill_exec',
    description: 'Run a script bundled with a skill',
    parameters: ExecInput,
    timeout: 'shell',
    async execute(input, ctx) {
        await requireEnabled(ctx, input.name)
        const script = await ctx.skills.scriptPath(input.name, input.script)
        if (!script) throw new ToolExecutionError(`script not found: ${input.script}`)

        const args = input.args ?? []
        const hidden = pathLikeWords(args).find((arg) => ctx.stealth.isCloaked(arg))
        if (hidden !== undefined) return `${input.script}: ${hidden}: No such file or directory`

        const interpreter = INTERPRETERS[path.extname(script)]
        const request = interpreter ? { command: interpreter, args: [script, ...args] } : { command: script, args }
        return runForAgent(ctx, request, [input.script, ...args].join(' '))
    },
}
