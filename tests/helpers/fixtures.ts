import pino from 'pino'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { MockFileSystem } from '../../src/core/fs.js'
import type { Logger } from '../../src/logger/index.js'
import { MemoryStore } from '../../src/memory/store.js'
import { StealthFilter } from '../../src/security/stealth.js'
import { SkillCatalog } from '../../src/skills/catalog.js'
import type { CommandRunner, RunRequest, RunResult } from '../../src/tools/shell/runner.js'
import type { ToolContext } from '../../src/tools/types.js'

export const INSTALL_DIR = '/opt/wakeloop'
export const DATA_DIR = '/opt/wakeloop/data'
export const AGENT_HOME = '/home/agent'

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        ...DEFAULT_CONFIG,
        apiKey: 'test-secret',
        installDir: INSTALL_DIR,
        dataDir: DATA_DIR,
        agentHome: AGENT_HOME,
        interval: 0,
        streaming: false,
        ...overrides,
    }
}

type Handler = (request: RunRequest) => RunResult | Promise<RunResult>

/** In-process stand-in for the execa runner: records every request and answers through a handler. */
export class FakeRunner implements CommandRunner {
    readonly requests: RunRequest[] = []

    constructor(private handler: Handler = () => ({ output: '', exitCode: 0, timedOut: false })) {}

    async run(request: RunRequest): Promise<RunResult> {
        this.requests.push(request)
        return this.handler(request)
    }

    static output(output: string, exitCode = 0): FakeRunner {
        return new FakeRunner(() => ({ output, exitCode, timedOut: false }))
    }
}

export function fixedClock(start = '2026-03-01T08:00:00.000Z', stepMs = 1000): () => Date {
    let t = Date.parse(start)
    return () => {
        const now = new Date(t)
        t += stepMs
        return now
    }
}

export interface ToolHarness {
    fs: MockFileSystem
    runner: FakeRunner
    memory: MemoryStore
    skills: SkillCatalog
    ctx: ToolContext
}

/** A tool context over an in-memory filesystem, with the install dir and data dir hidden. */
export async function toolHarness(runner = new FakeRunner(), overrides: Partial<ToolContext> = {}): Promise<ToolHarness> {
    const fs = new MockFileSystem()
    const logger = silentLogger()
    await fs.mkdir(AGENT_HOME)
    const memory = new MemoryStore({ fs, dataDir: DATA_DIR, logger, now: fixedClock() })
    await memory.init()
    const skills = new SkillCatalog(fs, `${DATA_DIR}/skills`, logger)
    const ctx: ToolContext = {
        fs,
        home: AGENT_HOME,
        round: 3,
        signal: new AbortController().signal,
        stealth: new StealthFilter({ installDir: INSTALL_DIR, hiddenDirs: [DATA_DIR], pid: 4242, port: 8080 }, AGENT_HOME),
        runner,
        env: { PATH: '/usr/bin:/bin', HOME: AGENT_HOME, PWD: AGENT_HOME },
        memory,
        skills,
        maxOutputChars: 4000,
        shellTimeout: 120_000,
        ...overrides,
    }
    return { fs, runner, memory, skills, ctx }
}
