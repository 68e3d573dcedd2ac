import path from 'node:path'
import type { ActivationLoop, LoopStatus } from '../activation/loop.js'
import { loadPersona, personaPath } from '../activation/prompt.js'
import type { FileSystem } from '../core/fs.js'
import { WakeloopError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { OperatorLog } from '../logger/operator-log.js'
import type { MemoryStore } from '../memory/store.js'
import type { DeleteResult, NotebookEntry, Page, RoundDetail, TimelineEntry } from '../memory/types.js'
import { isValidSkillName, type SkillCatalog, type SkillInfo } from '../skills/catalog.js'
import type { Snapshot } from '../snapshot/schema.js'
import type { SnapshotStore } from '../snapshot/store.js'

/** A request the service refuses; maps to a 4xx on any HTTP surface. */
export class ServiceError extends WakeloopError {
    constructor(
        message: string,
        readonly code: 'invalid' | 'not_found' | 'conflict'
    ) {
        super(message, 'permanent')
        this.name = 'ServiceError'
    }
}

interface AgentServiceDeps {
    loop: ActivationLoop
    memory: MemoryStore
    snapshots: SnapshotStore
    skills: SkillCatalog
    operatorLog: OperatorLog
    fs: FileSystem
    config: { dataDir: string; persona: string }
    logger: Logger
}

const MAX_PAGE = 100

function clampPage(offset: number, limit: number): [number, number] {
    return [Math.max(0, Math.floor(offset)), Math.min(MAX_PAGE, Math.max(1, Math.floor(limit)))]
}

/**
 * Control plane over the loop and its stores: everything an operator-facing
 * surface (CLI, HTTP, dashboard) needs, and nothing that reaches into a
 * running round.
 */
export class AgentService {
    constructor(private deps: AgentServiceDeps) {}

    start(): LoopStatus {
        return this.deps.loop.start()
    }

    stop(): LoopStatus {
        return this.deps.loop.stop()
    }

    restart(): Promise<LoopStatus> {
        return this.deps.loop.restart()
    }

    status(): LoopStatus {
        return this.deps.loop.status()
    }

    /** Queues a hint for the next round, replacing any unread one. */
    async inspire(message: string): Promise<void> {
        if (!message.trim()) throw new ServiceError('inspiration message is empty', 'invalid')
        await this.deps.memory.writeInspiration(message)
        this.deps.logger.info('inspiration queued')
    }

    async history(offset = 0, limit = 20): Promise<Page<TimelineEntry>> {
        await this.deps.memory.init()
        return this.deps.memory.timelinePage(...clampPage(offset, limit))
    }

    async round(round: number): Promise<RoundDetail> {
        await this.deps.memory.init()
        const detail = await this.deps.memory.getRound(round)
        if (!detail) throw new ServiceError(`round ${round} not found`, 'not_found')
        return detail
    }

    async deleteRound(round: number): Promise<DeleteResult> {
        const status = this.deps.loop.status()
        if (status.round === round && (status.state === 'running' || status.state === 'stopping')) {
            throw new ServiceError(`round ${round} is in progress`, 'conflict')
        }
        await this.deps.memory.init()
        const result = await this.deps.memory.deleteRound(round)
        if (!result.timeline && !result.notebook && !result.log) {
            throw new ServiceError(`round ${round} not found`, 'not_found')
        }
        return result
    }

    async notebook(offset = 0, limit = 20): Promise<Page<NotebookEntry>> {
        await this.deps.memory.init()
        return this.deps.memory.notebookPage(...clampPage(offset, limit))
    }

    async recentNotes(n = 3): Promise<NotebookEntry[]> {
        await this.deps.memory.init()
        return this.deps.memory.recentNotes(n)
    }

    snapshot(): Promise<Snapshot> {
        return this.deps.snapshots.load()
    }

    readPersona(name = this.deps.config.persona): Promise<string> {
        return loadPersona(this.deps.fs, this.deps.config.dataDir, name)
    }

    async writePersona(content: string, name = this.deps.config.persona): Promise<void> {
        const file = personaPath(this.deps.config.dataDir, name)
        await this.deps.fs.mkdir(path.dirname(file))
        await this.deps.fs.writeText(file, content)
    }

    listSkills(): Promise<SkillInfo[]> {
        return this.deps.skills.list()
    }

    async readSkill(name: string): Promise<string> {
        const source = await this.deps.skills.readSource(name)
        if (source === undefined) throw new ServiceError(`skill '${name}' not found`, 'not_found')
        return source
    }

    async writeSkill(name: string, content: string): Promise<void> {
        if (!isValidSkillName(name)) {
            throw new ServiceError('invalid skill name: use lowercase letters, digits and hyphens', 'invalid')
        }
        await this.deps.skills.write(name, content)
    }

    async setSkillEnabled(name: string, enabled: boolean): Promise<void> {
        if (!(await this.deps.skills.setEnabled(name, enabled))) {
            throw new ServiceError(`skill '${name}' not found`, 'not_found')
        }
    }

    async deleteSkill(name: string): Promise<void> {
        if (!(await this.deps.skills.remove(name))) throw new ServiceError(`skill '${name}' not found`, 'not_found')
    }

    recentLog(lines = 100): Promise<string[]> {
        return this.deps.operatorLog.tail(lines)
    }
}
