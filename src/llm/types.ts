export interface ToolCall {
    id: string
    type: 'function'
    function: {
        name: string
        arguments: string
    }
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[]; reasoning_content?: string }
    | { role: 'tool'; content: string; tool_call_id: string }

export interface ToolDefinition {
    type: 'function'
    function: {
        name: string
        description: string
        parameters: Record<string, unknown>
    }
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    tools?: ToolDefinition[]
    temperature?: number
    maxTokens?: number
    signal?: AbortSignal
}

export type FinishReason = 'stop' | 'tool_calls' | 'length'

export interface ChatResponse {
    content: string | null
    /** Reasoning text from thinking models, when the provider exposes it. */
    reasoning?: string | null
    toolCalls: ToolCall[]
    finishReason: FinishReason
    usage: { promptTokens: number; completionTokens: number }
}

export interface ToolCallDelta {
    index: number
    id?: string
    name?: string
    arguments?: string
}

export interface ChatChunk {
    content?: string
    reasoning?: string
    toolCalls?: ToolCallDelta[]
    finishReason?: string
    usage?: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
    chatStream(params: ChatParams): AsyncIterable<ChatChunk>
}
