import type { ChatChunk, ChatResponse, FinishReason, ToolCall } from './types.js'

function toFinishReason(reason: string | undefined, hasToolCalls: boolean): FinishReason {
    if (reason === 'tool_calls' || reason === 'length') return reason
    return hasToolCalls ? 'tool_calls' : 'stop'
}

/**
 * Drains a chat stream into a single response. Content deltas are handed to
 * `onContent` as they arrive; tool-call fragments are stitched together by index.
 */
export async function collectStream(
    stream: AsyncIterable<ChatChunk>,
    onContent?: (delta: string) => void
): Promise<ChatResponse> {
    let content = ''
    let reasoning = ''
    let finishReason: string | undefined
    let usage = { promptTokens: 0, completionTokens: 0 }
    const calls = new Map<number, ToolCall>()

    for await (const chunk of stream) {
        if (chunk.content) {
            content += chunk.content
            onContent?.(chunk.content)
        }
        if (chunk.reasoning) reasoning += chunk.reasoning
        for (const delta of chunk.toolCalls ?? []) {
            const call = calls.get(delta.index) ?? { id: '', type: 'function', function: { name: '', arguments: '' } }
            if (delta.id) call.id = delta.id
            if (delta.name) call.function.name += delta.name
            if (delta.arguments) call.function.arguments += delta.arguments
            calls.set(delta.index, call)
        }
        if (chunk.finishReason) finishReason = chunk.finishReason
        if (chunk.usage) usage = chunk.usage
    }

    const toolCalls = [...calls.entries()].sort(([a], [b]) => a - b).map(([, call]) => call)
    return {
        content: content || null,
        reasoning: reasoning || null,
        toolCalls,
        finishReason: toFinishReason(finishReason, toolCalls.length > 0),
        usage,
    }
}
