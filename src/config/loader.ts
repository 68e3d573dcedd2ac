import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_FILE, DATA_DIR, DEFAULT_CONFIG, PROVIDER_KEY_ENV } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    installDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        Object.assign(
            merged,
            Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined))
        )
    }
    return merged
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.WAKELOOP_API_KEY) config.apiKey = env.WAKELOOP_API_KEY
    if (env.WAKELOOP_MODEL) config.model = env.WAKELOOP_MODEL
    if (env.WAKELOOP_AGENT_HOME) config.agentHome = env.WAKELOOP_AGENT_HOME
    const level = ConfigSchema.shape.logLevel.safeParse(env.WAKELOOP_LOG_LEVEL)
    if (level.success && level.data) config.logLevel = level.data
    const port = Number.parseInt(env.WAKELOOP_PORT ?? '', 10)
    if (Number.isInteger(port) && port > 0) config.port = port
    return config
}

export function resolveApiKey(model: string, env: NodeJS.ProcessEnv): string {
    if (env.OPENROUTER_API_KEY) return env.OPENROUTER_API_KEY
    const provider = model.includes('/') ? model.split('/')[0] : model
    const envName = provider ? PROVIDER_KEY_ENV[provider.toLowerCase()] : undefined
    return (envName && env[envName]) || ''
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, installDir = process.cwd(), env = process.env } = options

    const fileConfig = await loadJsonConfig(fs, path.join(installDir, CONFIG_FILE))

    // Priority: CLI flags > env vars > config file > defaults
    const merged = mergeConfigs(fileConfig, envConfig(env), cliFlags)
    const model = merged.model ?? DEFAULT_CONFIG.model

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        model,
        apiKey: merged.apiKey ?? resolveApiKey(model, env),
        installDir: path.resolve(installDir),
        dataDir: path.resolve(installDir, merged.dataDir ?? DATA_DIR),
        agentHome: path.resolve(merged.agentHome ?? DEFAULT_CONFIG.agentHome),
        envPassthrough: merged.envPassthrough ?? DEFAULT_CONFIG.envPassthrough,
    }
}
