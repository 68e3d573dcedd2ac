import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, isAbortError, TransportError, WakeloopError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, withRetry } from './retry.js'
import type { ChatChunk, ChatMessage, ChatParams, ChatResponse, FinishReason, LLMClient, ToolCall } from './types.js'

type ClientConfig = Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature' | 'maxTokens'>

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.tool_call_id }
        case 'assistant':
            return message.tool_calls && message.tool_calls.length > 0
                ? { role: 'assistant', content: message.content, tool_calls: message.tool_calls }
                : { role: 'assistant', content: message.content ?? '' }
    }
}

/** DeepSeek-style providers attach `reasoning_content`, which the SDK types do not declare. */
function reasoningOf(value: object): string | undefined {
    if ('reasoning_content' in value && typeof value.reasoning_content === 'string') return value.reasoning_content
    return undefined
}

/** Failures that survive retries and the breaker surface as TransportError; aborts pass through. */
async function transport<T>(fn: () => Promise<T>): Promise<T> {
    try {
        return await fn()
    } catch (error) {
        if (isAbortError(error) || error instanceof WakeloopError) throw error
        throw new TransportError(`LLM request failed: ${errorMessage(error)}`, { cause: error })
    }
}

export function createLLMClient(config: ClientConfig, logger: Logger): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        defaultHeaders: { 'X-Title': 'wakeloop' },
    })

    const breaker = new CircuitBreaker()

    function request(params: ChatParams) {
        return {
            model: params.model ?? config.model,
            messages: params.messages.map(toOpenAIMessage),
            tools: params.tools && params.tools.length > 0 ? params.tools : undefined,
            temperature: params.temperature ?? config.temperature,
            max_tokens: params.maxTokens ?? config.maxTokens,
        }
    }

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const body = request(params)
            const result = await transport(() =>
                breaker.execute(() =>
                    withRetry(async () => {
                        const response = await openai.chat.completions.create(body, { signal: params.signal })

                        const choice = response.choices[0]
                        if (!choice) throw new Error('No response from LLM')

                        const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
                            id: tc.id,
                            type: 'function' as const,
                            function: { name: tc.function.name, arguments: tc.function.arguments },
                        }))

                        let finishReason: FinishReason = 'stop'
                        if (choice.finish_reason === 'tool_calls') finishReason = 'tool_calls'
                        else if (choice.finish_reason === 'length') finishReason = 'length'
                        else if (toolCalls.length > 0) finishReason = 'tool_calls'

                        return {
                            content: choice.message.content,
                            reasoning: reasoningOf(choice.message) ?? null,
                            toolCalls,
                            finishReason,
                            usage: {
                                promptTokens: response.usage?.prompt_tokens ?? 0,
                                completionTokens: response.usage?.completion_tokens ?? 0,
                            },
                        }
                    })
                )
            )

            logger.debug({ model: body.model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },

        async *chatStream(params: ChatParams): AsyncIterable<ChatChunk> {
            const body = request(params)
            const stream = await transport(() =>
                breaker.execute(() =>
                    withRetry(() => openai.chat.completions.create({ ...body, stream: true }, { signal: params.signal }))
                )
            )

            for await (const chunk of stream) {
                const choice = chunk.choices[0]
                const delta = choice?.delta
                if (!delta) continue

                yield {
                    content: delta.content ?? undefined,
                    reasoning: reasoningOf(delta),
                    toolCalls: delta.tool_calls?.map((tc) => ({
                        index: tc.index,
                        id: tc.id,
                        name: tc.function?.name,
                        arguments: tc.function?.arguments,
                    })),
                    finishReason: choice.finish_reason ?? undefined,
                }
            }
        },
    }
}
