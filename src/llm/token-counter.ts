// Rough estimate: ~4 chars per token for English prose, ~3 for code and paths.
// Good enough to keep a prompt under budget, not for billing.
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 3.5)
}
