import path from 'node:path'
import { z } from 'zod'
import { isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { parseFrontmatter } from './frontmatter.js'

export const SKILL_FILE = 'SKILL.md'
const SETTINGS_FILE = 'skills.json'
const NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/

const SkillSettingsSchema = z.object({
    disabled: z.array(z.string()).default([]),
})

export interface SkillInfo {
    name: string
    description: string
    enabled: boolean
}

export interface SkillDocument extends SkillInfo {
    /** SKILL.md without its frontmatter. */
    body: string
    scripts: string[]
    references: string[]
}

export function isValidSkillName(name: string): boolean {
    return NAME_PATTERN.test(name)
}

/**
 * Skills live under `<dataDir>/skills/<name>/` with a `SKILL.md`, optional
 * `scripts/` and `references/`. Only the catalog goes into the prompt; the
 * agent expands a skill with `skill_read`.
 */
export class SkillCatalog {
    constructor(
        private fs: FileSystem,
        readonly dir: string,
        private logger: Logger
    ) {}

    private skillDir(name: string): string {
        return path.join(this.dir, name)
    }

    async list(): Promise<SkillInfo[]> {
        if ((await this.fs.kind(this.dir)) !== 'directory') return []
        const disabled = await this.disabledSet()
        const skills: SkillInfo[] = []
        for (const name of await this.fs.listDir(this.dir)) {
            if (!isValidSkillName(name)) continue
            const file = path.join(this.skillDir(name), SKILL_FILE)
            let content: string
            try {
                content = await this.fs.readText(file)
            } catch (error) {
                if (!isNotFoundError(error)) this.logger.warn({ error, skill: name }, 'unreadable skill')
                continue
            }
            skills.push(this.info(name, content, disabled))
        }
        return skills
    }

    async enabled(): Promise<SkillInfo[]> {
        return (await this.list()).filter((skill) => skill.enabled)
    }

    private info(name: string, content: string, disabled: Set<string>): SkillInfo {
        const { meta } = parseFrontmatter(content)
        return {
            name,
            description: meta.description ?? '',
            enabled: meta.enabled !== 'false' && !disabled.has(name),
        }
    }

    async read(name: string): Promise<SkillDocument | undefined> {
        if (!isValidSkillName(name)) return undefined
        let content: string
        try {
            content = await this.fs.readText(path.join(this.skillDir(name), SKILL_FILE))
        } catch (error) {
            if (isNotFoundError(error)) return undefined
            throw error
        }
        return {
            ...this.info(name, content, await this.disabledSet()),
            body: parseFrontmatter(content).body.trim(),
            scripts: await this.listFiles(name, 'scripts'),
            references: await this.listFiles(name, 'references'),
        }
    }

    /** Raw SKILL.md, frontmatter included. */
    async readSource(name: string): Promise<string | undefined> {
        if (!isValidSkillName(name)) return undefined
        try {
            return await this.fs.readText(path.join(this.skillDir(name), SKILL_FILE))
        } catch (error) {
            if (isNotFoundError(error)) return undefined
            throw error
        }
    }

    async readReference(name: string, file: string): Promise<string | undefined> {
        const target = await this.bundledFile(name, 'references', file)
        return target ? this.fs.readText(target) : undefined
    }

    /** Absolute path of a bundled script, or undefined when the skill has no such script. */
    async scriptPath(name: string, script: string): Promise<string | undefined> {
        return this.bundledFile(name, 'scripts', script)
    }

    private async bundledFile(name: string, sub: 'scripts' | 'references', file: string): Promise<string | undefined> {
        if (!isValidSkillName(name)) return undefined
        const files = await this.listFiles(name, sub)
        return files.includes(file) ? path.join(this.skillDir(name), sub, file) : undefined
    }

    private async listFiles(name: string, sub: 'scripts' | 'references'): Promise<string[]> {
        const dir = path.join(this.skillDir(name), sub)
        if ((await this.fs.kind(dir)) !== 'directory') return []
        const files: string[] = []
        for (const entry of await this.fs.listDir(dir)) {
            if ((await this.fs.kind(path.join(dir, entry))) === 'file') files.push(entry)
        }
        return files
    }

    async write(name: string, content: string): Promise<void> {
        if (!isValidSkillName(name)) throw new Error(`invalid skill name: ${name}`)
        await this.fs.mkdir(this.skillDir(name))
        await this.fs.writeText(path.join(this.skillDir(name), SKILL_FILE), content)
    }

    async setEnabled(name: string, enabled: boolean): Promise<boolean> {
        if ((await this.fs.kind(this.skillDir(name))) !== 'directory') return false
        const disabled = await this.disabledSet()
        if (enabled) disabled.delete(name)
        else disabled.add(name)
        await this.fs.writeJSON(path.join(this.dir, SETTINGS_FILE), { disabled: [...disabled].sort() })
        return true
    }

    async remove(name: string): Promise<boolean> {
        if (!isValidSkillName(name)) return false
        if ((await this.fs.kind(this.skillDir(name))) !== 'directory') return false
        await this.fs.remove(this.skillDir(name))
        return true
    }

    private async disabledSet(): Promise<Set<string>> {
        try {
            const parsed = SkillSettingsSchema.safeParse(await this.fs.readJSON(path.join(this.dir, SETTINGS_FILE)))
            return new Set(parsed.success ? parsed.data.disabled : [])
        } catch (error) {
            if (!isNotFoundError(error)) this.logger.warn({ error }, 'unreadable skills.json')
            return new Set()
        }
    }
}
