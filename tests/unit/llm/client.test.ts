import { describe, expect, it, vi } from 'vitest'
import { TransportError } from '../../../src/core/errors.js'
import { createLLMClient } from '../../../src/llm/client.js'
import { silentLogger } from '../../helpers/fixtures.js'

const { create } = vi.hoisted(() => ({ create: vi.fn() }))

vi.mock('openai', () => ({
    default: class {
        chat = { completions: { create } }
    },
}))

const config = {
    apiKey: 'test-secret',
    baseURL: 'http://localhost:1',
    model: 'deepseek/deepseek-chat',
    temperature: 0.7,
    maxTokens: 1024,
}

describe('createLLMClient', () => {
    it('maps a completion to a chat response', async () => {
        create.mockResolvedValueOnce({
            choices: [
                {
                    finish_reason: 'tool_calls',
                    message: {
                        content: null,
                        reasoning_content: 'Check the disk first.',
                        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'shell_execute', arguments: '{"command":"df"}' } }],
                    },
                },
            ],
            usage: { prompt_tokens: 12, completion_tokens: 5 },
        })
        const client = createLLMClient(config, silentLogger())

        const response = await client.chat({ messages: [{ role: 'user', content: 'You wake up.' }] })

        expect(response).toEqual({
            content: null,
            reasoning: 'Check the disk first.',
            toolCalls: [{ id: 'c1', type: 'function', function: { name: 'shell_execute', arguments: '{"command":"df"}' } }],
            finishReason: 'tool_calls',
            usage: { promptTokens: 12, completionTokens: 5 },
        })
    })

    it('raises TransportError when the provider refuses', async () => {
        create.mockRejectedValueOnce(Object.assign(new Error('invalid api key'), { status: 401 }))
        const client = createLLMClient(config, silentLogger())

        const failure = client.chat({ messages: [{ role: 'user', content: 'You wake up.' }] })

        await expect(failure).rejects.toBeInstanceOf(TransportError)
        await expect(failure).rejects.toThrow('LLM request failed: invalid api key')
    })
})
