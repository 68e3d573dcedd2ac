import type { ResolvedConfig } from './schema.js'

export const CONFIG_FILE = 'wakeloop.json'
export const DATA_DIR = 'data'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'installDir' | 'dataDir'> = {
    model: 'deepseek/deepseek-chat',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0.7,
    maxTokens: 4096,
    logLevel: 'info',
    agentHome: '/home/agent',
    persona: 'default',
    port: 8080,
    interval: 60,
    maxToolCalls: 20,
    shellTimeout: 120,
    fileTimeout: 15,
    maxOutputChars: 4000,
    notebookInject: 3,
    malformedRetries: 2,
    summaryMaxChars: 500,
    knowledgeIndexMaxChars: 2000,
    promptTokenBudget: 12000,
    streaming: true,
    envPassthrough: [],
}

/** Provider prefix of a `provider/model` id to the env var holding its key. */
export const PROVIDER_KEY_ENV: Record<string, string> = {
    openrouter: 'OPENROUTER_API_KEY',
    openai: 'OPENAI_API_KEY',
    deepseek: 'DEEPSEEK_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY',
    google: 'GOOGLE_API_KEY',
}
