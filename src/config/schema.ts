import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const ConfigSchema = z.object({
    model: z.string().optional(),
    snapshotModel: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    agentHome: z.string().optional(),
    dataDir: z.string().optional(),
    persona: z.string().optional(),
    port: z.number().int().positive().optional(),
    interval: z.number().min(0).optional(),
    maxToolCalls: z.number().int().positive().optional(),
    shellTimeout: z.number().positive().optional(),
    fileTimeout: z.number().positive().optional(),
    maxOutputChars: z.number().int().positive().optional(),
    notebookInject: z.number().int().min(0).optional(),
    malformedRetries: z.number().int().min(0).optional(),
    maxTurns: z.number().int().positive().optional(),
    summaryMaxChars: z.number().int().positive().optional(),
    knowledgeIndexMaxChars: z.number().int().positive().optional(),
    promptTokenBudget: z.number().int().positive().optional(),
    streaming: z.boolean().optional(),
    envPassthrough: z.array(z.string()).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    model: string
    snapshotModel?: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    /** The platform's own installation directory: hidden from the agent. */
    installDir: string
    dataDir: string
    agentHome: string
    persona: string
    port: number
    /** Seconds between rounds; 0 starts the next round immediately. */
    interval: number
    maxToolCalls: number
    /** Seconds. */
    shellTimeout: number
    /** Seconds. */
    fileTimeout: number
    maxOutputChars: number
    notebookInject: number
    malformedRetries: number
    /** Conversation turn cap; derived from the tool budget when unset. */
    maxTurns?: number
    summaryMaxChars: number
    knowledgeIndexMaxChars: number
    /** Estimated-token cap for the system prompt. */
    promptTokenBudget: number
    streaming: boolean
    envPassthrough: string[]
}
