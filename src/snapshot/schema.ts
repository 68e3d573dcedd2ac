import { type ZodType, z } from 'zod'

const optionalText = z.string().nullish().catch(null)

/** Keeps the items that validate and drops the rest, so one bad entry does not erase a list. */
function lenientArray<T>(item: ZodType<T, z.ZodTypeDef, unknown>) {
    return z
        .array(z.unknown())
        .transform((items) =>
            items.flatMap((value) => {
                const parsed = item.safeParse(value)
                return parsed.success ? [parsed.data] : []
            })
        )
        .catch([])
        .default([])
}

export const ServiceSchema = z.object({
    name: z.string(),
    port: z.number().int().nullish().catch(null),
    domain: optionalText,
    status: z.enum(['running', 'stopped', 'error']).catch('running'),
    health: z.enum(['healthy', 'degraded', 'down', 'unknown']).catch('unknown'),
    healthNote: optionalText,
    path: optionalText,
    startCmd: optionalText,
})

export const ProjectSchema = z.object({
    name: z.string(),
    path: z.string(),
    stack: optionalText,
    entry: optionalText,
    description: optionalText,
})

export const ToolEntrySchema = z.object({
    path: z.string(),
    usage: z.string().catch(''),
})

export const DocumentSchema = z.object({
    path: z.string(),
    purpose: z.string().catch(''),
})

export const EnvironmentSchema = z.object({
    os: optionalText,
    runtime: optionalText,
    domain: optionalText,
    ssl: z.boolean().catch(false).default(false),
    diskUsage: optionalText,
    keyPackages: z.array(z.string()).catch([]).default([]),
})

export const IssueSchema = z.object({
    severity: z.enum(['critical', 'high', 'medium', 'low']).catch('medium'),
    summary: z.string(),
    detail: optionalText,
    discovered: z.number().int().catch(0),
    status: z.enum(['open', 'resolved']).catch('open'),
})

export const SnapshotSchema = z.object({
    meta: z
        .object({
            lastUpdated: z.string().catch(''),
            round: z.number().int().catch(0),
        })
        .catch({ lastUpdated: '', round: 0 })
        .default({ lastUpdated: '', round: 0 }),
    services: lenientArray(ServiceSchema),
    projects: lenientArray(ProjectSchema),
    tools: lenientArray(ToolEntrySchema),
    documents: lenientArray(DocumentSchema),
    environment: EnvironmentSchema.catch({ ssl: false, keyPackages: [] }).default({}),
    issues: lenientArray(IssueSchema),
})

export type Snapshot = z.infer<typeof SnapshotSchema>
export type Service = z.infer<typeof ServiceSchema>
export type Issue = z.infer<typeof IssueSchema>

export function emptySnapshot(): Snapshot {
    return SnapshotSchema.parse({})
}
