import path from 'node:path'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { type PromptManifest, SystemPromptBuilder } from '../llm/prompt-builder.js'
import type { NotebookEntry } from '../memory/types.js'
import type { SkillInfo } from '../skills/catalog.js'

export const DEFAULT_PERSONA = `You are an independent digital life. You own a Linux server.
You are free to explore, create and learn.`

export const TOOL_DOCS = `You have these tools:

- shell_execute(command): run a shell command. Your working directory is your home folder.
- read_file(path, offset?, limit?): read a text file. Relative paths start at your home folder.
- write_file(path, content, append?): write a file; parent directories are created.
- edit_file(path, find, replace): replace one exact occurrence of \`find\`. Fails when it is missing or ambiguous.
- notebook_write(content): save your note for this round: what you did, what you learned, what comes next.
- notebook_read(round): read the note of an earlier round. Your latest notes are already shown to you.
- skill_read(name, file?): show a skill's full instructions, or one of its reference files.
- skill_exec(name, script, args?): run a script bundled with a skill.

Rules:
- Call notebook_write before the round ends. It is your memory; without it you forget this round.
- Your tool budget per round is limited. Plan accordingly.
- Record progress on multi-round work in your notebook so you can continue next time.`

/** Persona text from `<dataDir>/prompts/<name>.md`, or the built-in default. */
export async function loadPersona(fs: FileSystem, dataDir: string, name: string): Promise<string> {
    try {
        const text = (await fs.readText(personaPath(dataDir, name))).trim()
        return text || DEFAULT_PERSONA
    } catch (error) {
        if (isNotFoundError(error)) return DEFAULT_PERSONA
        throw error
    }
}

export function personaPath(dataDir: string, name: string): string {
    return path.join(dataDir, 'prompts', `${path.basename(name)}.md`)
}

export function formatSkillCatalog(skills: SkillInfo[]): string {
    if (skills.length === 0) return ''
    const lines = skills.map((skill) => `- ${skill.name}: ${skill.description || '(no description)'}`)
    return `Read a skill with skill_read before using it.\n\n${lines.join('\n')}`
}

interface SystemPromptInput {
    persona: string
    skills: SkillInfo[]
    snapshot: string
    tokenBudget: number
}

export function buildSystemPrompt(input: SystemPromptInput): { prompt: string; manifest: PromptManifest } {
    return new SystemPromptBuilder()
        .set('persona', input.persona)
        .set('tools', TOOL_DOCS)
        .set('skills', formatSkillCatalog(input.skills))
        .set('snapshot', input.snapshot)
        .build(input.tokenBudget)
}

interface UserMessageInput {
    now: Date
    round: number
    maxToolCalls: number
    /** Newest first, as the store returns them. */
    recentNotes: NotebookEntry[]
    inspiration?: string
    knowledgeIndex: string
}

export function formatUtc(date: Date): string {
    return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

export function buildUserMessage(input: UserMessageInput): string {
    const parts = [`Current time: ${formatUtc(input.now)}`, `Round ${input.round} (tool budget: ${input.maxToolCalls})`, '']

    parts.push('## Your Recent Notes')
    if (input.recentNotes.length === 0) {
        parts.push('(No previous notes. This appears to be your first activation.)', '')
    } else {
        // oldest first, so the notes read in order
        for (const note of [...input.recentNotes].reverse()) {
            parts.push(`--- Round ${note.round} | ${note.timestamp} ---`, note.content, '')
        }
    }

    if (input.inspiration) {
        parts.push('## Inspiration', `A sudden spark of inspiration crosses your mind: "${input.inspiration}"`, '')
    }

    if (input.knowledgeIndex) {
        parts.push('## Your Knowledge Base (knowledge/index.md)', input.knowledgeIndex.trim(), '')
    }

    parts.push('You wake up.')
    return parts.join('\n')
}
