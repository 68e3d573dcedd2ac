import path from 'node:path'
import { expandHome } from '../security/stealth.js'
import type { ToolContext } from './types.js'

export function truncateOutput(text: string, max: number): string {
    if (text.length <= max) return text
    return `${text.slice(0, max)}\n... (truncated, total ${text.length} chars)`
}

/** Resolves an agent-supplied path: `~` and relative paths start at the agent home. */
export function resolveAgentPath(target: string, home: string): string {
    return path.resolve(home, expandHome(target, home))
}

/** True when the path as written, or where its symlinks lead, is hidden. */
export async function isCloakedPath(target: string, ctx: Pick<ToolContext, 'fs' | 'stealth'>): Promise<boolean> {
    if (ctx.stealth.isCloaked(target)) return true
    return ctx.stealth.isCloaked(await ctx.fs.realpath(target))
}
