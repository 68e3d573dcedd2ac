import { describe, expect, it } from 'vitest'
import { collectStream } from '../../../src/llm/stream.js'
import type { ChatChunk } from '../../../src/llm/types.js'

async function* chunks(items: ChatChunk[]): AsyncIterable<ChatChunk> {
    for (const item of items) yield item
}

describe('collectStream', () => {
    it('joins content and forwards each delta', async () => {
        const deltas: string[] = []
        const response = await collectStream(
            chunks([{ content: 'I wake ' }, { content: 'up.' }, { finishReason: 'stop', usage: { promptTokens: 5, completionTokens: 2 } }]),
            (delta) => deltas.push(delta)
        )
        expect(deltas).toEqual(['I wake ', 'up.'])
        expect(response).toEqual({
            content: 'I wake up.',
            reasoning: null,
            toolCalls: [],
            finishReason: 'stop',
            usage: { promptTokens: 5, completionTokens: 2 },
        })
    })

    it('stitches tool call fragments by index', async () => {
        const response = await collectStream(
            chunks([
                { toolCalls: [{ index: 1, id: 'b', name: 'read_file', arguments: '{"path":' }] },
                { toolCalls: [{ index: 0, id: 'a', name: 'shell_', arguments: '{"command"' }] },
                { toolCalls: [{ index: 0, name: 'execute', arguments: ':"ls"}' }] },
                { toolCalls: [{ index: 1, arguments: '"notes.md"}' }] },
            ])
        )
        expect(response.toolCalls).toEqual([
            { id: 'a', type: 'function', function: { name: 'shell_execute', arguments: '{"command":"ls"}' } },
            { id: 'b', type: 'function', function: { name: 'read_file', arguments: '{"path":"notes.md"}' } },
        ])
        expect(response.finishReason).toBe('tool_calls')
        expect(response.content).toBeNull()
    })

    it('collects reasoning separately from content', async () => {
        const response = await collectStream(chunks([{ reasoning: 'thinking' }, { content: 'answer' }]))
        expect(response.reasoning).toBe('thinking')
        expect(response.content).toBe('answer')
    })
})
