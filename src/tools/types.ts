import type { ZodType } from 'zod'
import type { FileSystem } from '../core/fs.js'
import type { ToolName } from '../core/types.js'
import type { MemoryStore } from '../memory/store.js'
import type { StealthFilter } from '../security/stealth.js'
import type { SkillCatalog } from '../skills/catalog.js'
import type { CommandRunner } from './shell/runner.js'

export interface ToolContext {
    fs: FileSystem
    /** Agent home: working directory and base for relative paths. */
    home: string
    round: number
    /** Fires when the dispatcher's timeout for this call expires. */
    signal: AbortSignal
    stealth: StealthFilter
    runner: CommandRunner
    /** Sanitized environment for spawned commands. */
    env: Record<string, string>
    memory: MemoryStore
    skills: SkillCatalog
    maxOutputChars: number
    /** Milliseconds. */
    shellTimeout: number
}

export type TimeoutClass = 'shell' | 'file'

export interface Tool<TInput = unknown> {
    name: ToolName
    description: string
    parameters: ZodType<TInput>
    /** Which configured timeout bounds a call. */
    timeout: TimeoutClass
    execute(input: TInput, ctx: ToolContext): Promise<string>
}

export type AnyTool = Tool<unknown>
