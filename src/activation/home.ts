import path from 'node:path'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'

export const WAKEUP_NOTE_FILE = 'WAKE-UP-NOTE.md'
export const KNOWLEDGE_INDEX = path.join('knowledge', 'index.md')

const WAKEUP_NOTE = `# Wake-up note

If you are reading this, you have just woken up.

## About your memory

You only remember the notebook entries of the last few rounds. Anything older,
what you built, what you learned, what you planned, is gone unless you wrote
it down somewhere you will look again.

## Your room

Your home is \`{home}\`. Everything you create here stays between rounds.
Edit this file and keep pointers to what matters; it is never overwritten.
`

const KNOWLEDGE_TEMPLATE = `# Knowledge Base

Your own knowledge base. It persists across rounds.

## How to use

- This file is shown to you at the start of every round. Keep it short.
- Treat it as a catalog: list what you know and where it lives.
- Put details in separate files here and read them with \`read_file\` when needed.

## Rules

- Past the character limit the end of this file is cut off.
- Update it before a round ends.
`

/** Creates the agent home, the wake-up note and the knowledge index when missing. Never overwrites. */
export async function ensureAgentHome(fs: FileSystem, home: string): Promise<void> {
    await fs.mkdir(home)

    const note = path.join(home, WAKEUP_NOTE_FILE)
    if (!(await fs.exists(note))) await fs.writeText(note, WAKEUP_NOTE.replace('{home}', home))

    const index = path.join(home, KNOWLEDGE_INDEX)
    if (!(await fs.exists(index))) {
        await fs.mkdir(path.dirname(index))
        await fs.writeText(index, KNOWLEDGE_TEMPLATE)
    }
}

/** The knowledge index for the prompt, cut at `maxChars` with a notice. Empty when absent. */
export async function loadKnowledgeIndex(fs: FileSystem, home: string, maxChars: number): Promise<string> {
    let content: string
    try {
        content = await fs.readText(path.join(home, KNOWLEDGE_INDEX))
    } catch (error) {
        if (isNotFoundError(error)) return ''
        throw error
    }
    if (!content.trim()) return ''
    if (content.length <= maxChars) return content
    return (
        `${content.slice(0, maxChars)}\n\n` +
        `[TRUNCATED: index.md exceeds the ${maxChars}-character limit. Trim it to avoid losing information.]`
    )
}
