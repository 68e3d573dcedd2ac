export const BUDGET_REFUSAL =
    '(error: tool budget exhausted for this round. No more tool calls are possible; write your final summary now.)'

export const SUMMARY_REQUEST =
    'Your tool budget for this round is used up. Reply with a short summary of what you did this round. Do not call any tools.'

/** Prefix for each tool result the agent sees. Never stored in the action log. */
export function budgetHint(used: number, max: number): string {
    const remaining = Math.max(0, max - used)
    if (remaining === 0) {
        return `[System: ${used} tool calls used, 0 remaining. Budget exhausted: finish with your summary.]`
    }
    if (remaining <= 3) {
        return `[System: ${used} tool calls used, ${remaining} remaining. Budget almost spent: save your notebook now if you have not.]`
    }
    return `[System: ${used} tool calls used, ${remaining} remaining]`
}

/**
 * Accumulates the assistant's visible text over a round. Reasoning from
 * thinking models goes under `[Thinking]`, formal text under `[Output]`.
 */
export class SummaryBuilder {
    private thinking: string[] = []
    private output: string[] = []

    add(content: string | null | undefined, reasoning?: string | null): void {
        if (reasoning?.trim()) this.thinking.push(reasoning.trim())
        if (content?.trim()) this.output.push(content.trim())
    }

    get lastOutput(): string {
        return this.output[this.output.length - 1] ?? ''
    }

    /** Joined summary cut to `max` chars, keeping the tail where the conclusion is. */
    build(max: number): string {
        const parts: string[] = []
        if (this.thinking.length > 0) parts.push(`[Thinking]\n${this.thinking.join('\n\n')}`)
        if (this.output.length > 0) {
            const text = this.output.join('\n\n')
            parts.push(this.thinking.length > 0 ? `[Output]\n${text}` : text)
        }
        const summary = parts.join('\n\n')
        if (summary.length <= max) return summary
        return `...${summary.slice(summary.length - max + 3)}`
    }
}
