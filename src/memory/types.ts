import { z } from 'zod'

export const NotebookEntrySchema = z.object({
    round: z.number().int().positive(),
    timestamp: z.string(),
    content: z.string(),
})

export type NotebookEntry = z.infer<typeof NotebookEntrySchema>

export const ROUND_STATUSES = ['running', 'completed', 'stopped', 'error'] as const

export const TimelineEntrySchema = z.object({
    round: z.number().int().positive(),
    timestamp: z.string(),
    status: z.enum(ROUND_STATUSES),
    toolsUsed: z.number().int().min(0),
    /** Seconds, one decimal. */
    duration: z.number().min(0),
    summary: z.string(),
    notebookSaved: z.boolean(),
    error: z.string().optional(),
})

export type TimelineEntry = z.infer<typeof TimelineEntrySchema>

export const ToolCallRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    args: z.record(z.unknown()),
    result: z.string(),
    startedAt: z.string(),
    /** Milliseconds. */
    duration: z.number().min(0),
    ok: z.boolean(),
})

export type ToolCallRecord = z.infer<typeof ToolCallRecordSchema>

export const RoundLogSchema = z.object({
    round: z.number().int().positive(),
    startedAt: z.string(),
    finishedAt: z.string(),
    status: z.enum(ROUND_STATUSES),
    actions: z.array(ToolCallRecordSchema),
    summary: z.string(),
})

export type RoundLog = z.infer<typeof RoundLogSchema>

export interface Page<T> {
    items: T[]
    total: number
    offset: number
    limit: number
}

export interface RoundDetail {
    timeline?: TimelineEntry
    notebook?: NotebookEntry
    log?: RoundLog
}

export interface DeleteResult {
    notebook: boolean
    timeline: boolean
    log: boolean
    operatorLog: boolean
}
