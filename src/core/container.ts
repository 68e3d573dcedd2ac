import path from 'node:path'
import { ensureAgentHome } from '../activation/home.js'
import { ActivationLoop } from '../activation/loop.js'
import { RoundRunner } from '../activation/round.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { OperatorLog } from '../logger/operator-log.js'
import { MemoryStore } from '../memory/store.js'
import { buildAgentEnv } from '../security/environment.js'
import { StealthFilter, type StealthProfile } from '../security/stealth.js'
import { ActivityStream } from '../service/activity-stream.js'
import { AgentService } from '../service/agent-service.js'
import { SkillCatalog } from '../skills/catalog.js'
import { SnapshotAuditor } from '../snapshot/auditor.js'
import { SnapshotStore } from '../snapshot/store.js'
import type { ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolExecutor, createToolRegistry } from '../tools/setup.js'
import { type CommandRunner, ExecaRunner } from '../tools/shell/runner.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    llmClient: LLMClient
    stealth: StealthFilter
    toolRegistry: ToolRegistry
    toolExecutor: ToolExecutor
    memory: MemoryStore
    skills: SkillCatalog
    snapshots: SnapshotStore
    operatorLog: OperatorLog
    loop: ActivationLoop
    activity: ActivityStream
    service: AgentService
    shutdown(): Promise<void>
}

/** Replaceable collaborators; tests swap in fakes. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    llmClient?: LLMClient
    runner?: CommandRunner
    profile?: StealthProfile
    hostEnv?: NodeJS.ProcessEnv
    now?: () => Date
}

export function defaultStealthProfile(config: ResolvedConfig): StealthProfile {
    return {
        installDir: config.installDir,
        hiddenDirs: [config.dataDir],
        pid: process.pid,
        port: config.port,
    }
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const stealth = new StealthFilter(overrides.profile ?? defaultStealthProfile(config), config.agentHome)
    const toolRegistry = createToolRegistry()
    const toolExecutor = createToolExecutor(toolRegistry, config, logger)
    const operatorLog = new OperatorLog(fs, path.join(config.dataDir, 'logs'), logger, overrides.now)
    const memory = new MemoryStore({ fs, dataDir: config.dataDir, logger, sections: operatorLog, now: overrides.now })
    const skills = new SkillCatalog(fs, path.join(config.dataDir, 'skills'), logger)
    const snapshots = new SnapshotStore(fs, config.dataDir, logger)
    const auditor = new SnapshotAuditor({
        llm: llmClient,
        store: snapshots,
        logger,
        model: config.model,
        snapshotModel: config.snapshotModel,
        now: overrides.now,
    })
    const rounds = new RoundRunner({
        config,
        llm: llmClient,
        registry: toolRegistry,
        executor: toolExecutor,
        memory,
        skills,
        snapshots,
        stealth,
        runner: overrides.runner ?? new ExecaRunner(),
        fs,
        env: buildAgentEnv(overrides.hostEnv ?? process.env, config.agentHome, config.envPassthrough),
        events: eventBus,
        logger,
        now: overrides.now,
    })
    const loop = new ActivationLoop({
        rounds,
        memory,
        auditor,
        events: eventBus,
        logger,
        interval: config.interval,
        async prepare() {
            await memory.init()
            await ensureAgentHome(fs, config.agentHome)
        },
    })
    const detachLog = operatorLog.attach(eventBus)
    const activity = new ActivityStream(eventBus, overrides.now)
    const service = new AgentService({ loop, memory, snapshots, skills, operatorLog, fs, config, logger })

    return {
        config,
        logger,
        eventBus,
        fs,
        llmClient,
        stealth,
        toolRegistry,
        toolExecutor,
        memory,
        skills,
        snapshots,
        operatorLog,
        loop,
        activity,
        service,

        async shutdown() {
            loop.stop()
            await loop.settled()
            await operatorLog.flush()
            activity.close()
            detachLog()
            eventBus.removeAll()
        },
    }
}
