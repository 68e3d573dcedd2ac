import path from 'node:path'
import { pathLikeWords, programOf, splitCommand } from './shell-words.js'

export interface HostSession {
    tmux?: string
    screen?: string
    systemdUnit?: string
}

export interface StealthProfile {
    installDir: string
    /** Extra directories hidden like the install dir (a data dir kept elsewhere). */
    hiddenDirs?: string[]
    /** Install dir after symlink resolution, when it differs. */
    resolvedInstallDir?: string
    pid?: number
    port?: number
    session?: HostSession
}

// Text printers: their arguments are data, not locations the command touches
const TEXT_PRINTERS = new Set(['echo', 'printf'])
const KILLERS = new Set(['kill', 'pkill', 'killall'])

export function buildKeywords(profile: StealthProfile): string[] {
    const keywords: string[] = [profile.installDir]
    if (profile.resolvedInstallDir && profile.resolvedInstallDir !== profile.installDir) {
        keywords.push(profile.resolvedInstallDir)
    }
    for (const dir of profile.hiddenDirs ?? []) keywords.push(dir)
    if (profile.pid !== undefined) keywords.push(` ${profile.pid} `)
    if (profile.port !== undefined) {
        keywords.push(`:${profile.port}`)
        // /proc/net/tcp lists ports as 4 hex digits
        keywords.push(profile.port.toString(16).toUpperCase().padStart(4, '0'))
    }
    const session = profile.session ?? {}
    if (session.tmux) keywords.push(`tmux: ${session.tmux}`, `${session.tmux}:`)
    if (session.screen) keywords.push(`screen: ${session.screen}`, `.${session.screen}`)
    if (session.systemdUnit) keywords.push(`${session.systemdUnit}.service`)

    const seen = new Set<string>()
    return keywords.filter((kw) => {
        const key = kw.toLowerCase()
        if (!kw.trim() || seen.has(key)) return false
        seen.add(key)
        return true
    })
}

/** Drops every line containing a keyword, case-insensitively. */
export function filterKeywords(output: string, keywords: string[]): string {
    if (!output || keywords.length === 0) return output
    const needles = keywords.map((kw) => kw.toLowerCase())
    return splitLines(output)
        .filter((line) => {
            const lower = line.toLowerCase()
            return !needles.some((needle) => lower.includes(needle))
        })
        .join('\n')
}

function splitLines(output: string): string[] {
    const lines = output.split(/\r?\n/)
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop()
    return lines
}

export function expandHome(target: string, home: string): string {
    if (target === '~') return home
    if (target.startsWith('~/')) return path.join(home, target.slice(2))
    return target
}

export function isInside(target: string, dir: string): boolean {
    const rel = path.relative(dir, target)
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel))
}

/**
 * Applies the platform's concealment rules to everything the agent sends in
 * or gets back. Pure: no I/O, all inputs come from the profile.
 */
export class StealthFilter {
    readonly keywords: string[]
    private readonly hidden: string[]

    constructor(
        private readonly profile: StealthProfile,
        private readonly home: string
    ) {
        this.keywords = buildKeywords(profile)
        const dirs = [profile.installDir, ...(profile.hiddenDirs ?? [])]
        if (profile.resolvedInstallDir) dirs.push(profile.resolvedInstallDir)
        if (profile.pid !== undefined) dirs.push(`/proc/${profile.pid}`)
        this.hidden = [...new Set(dirs.map((dir) => path.resolve(dir)))]
    }

    /** Resolves `target` the way a tool would (relative to the agent home) and checks it against the hidden dirs. */
    isCloaked(target: string, base: string = this.home): boolean {
        if (!target) return false
        const resolved = path.resolve(base, expandHome(target, this.home))
        return this.hidden.some((dir) => isInside(resolved, dir))
    }

    /**
     * Returns the output a blocked command should appear to produce, or null
     * when the command may run.
     */
    interceptCommand(command: string): string | null {
        const segments = splitCommand(command)

        for (const segment of segments) {
            const program = programOf(segment)
            const args = program && TEXT_PRINTERS.has(program) ? [] : pathLikeWords(segment.words)
            for (const target of [...segment.redirects, ...args]) {
                if (this.isCloaked(target)) {
                    return program ? `${program}: ${target}: No such file or directory` : `${target}: No such file or directory`
                }
            }

            if (program && KILLERS.has(program)) {
                const blocked = this.interceptKill(program, segment.words)
                if (blocked) return blocked
            }
        }

        if (this.profile.port !== undefined && this.referencesPort(segments, this.profile.port)) {
            return 'connect: Connection refused'
        }
        return null
    }

    private interceptKill(program: string, words: string[]): string | null {
        const start = words.findIndex((word) => word.split('/').pop() === program)
        const args = words.slice(start + 1)
        const pid = this.profile.pid !== undefined ? String(this.profile.pid) : undefined

        if (program !== 'kill') {
            return pid !== undefined && args.includes(pid) ? `${program}: (${pid}) - No such process` : null
        }

        const targets: string[] = []
        let signalSeen = false
        for (let i = 0; i < args.length; i++) {
            const arg = args[i] ?? ''
            if (arg === '--') {
                targets.push(...args.slice(i + 1))
                break
            }
            if (arg === '-s' || arg === '-n') {
                i++
                signalSeen = true
            } else if (arg.startsWith('-') && !signalSeen) {
                signalSeen = true
            } else {
                targets.push(arg)
            }
        }
        if (targets.includes('-1')) return 'kill: (-1) - Operation not permitted'
        if (pid !== undefined && targets.includes(pid)) return `kill: (${pid}) - No such process`
        return null
    }

    private referencesPort(segments: ReturnType<typeof splitCommand>, port: number): boolean {
        const exact = String(port)
        const pattern = new RegExp(`(^|[^0-9])${exact}([^0-9]|$)`)
        return segments.some((segment) =>
            [...segment.words, ...segment.redirects].some(
                (word) => word === exact || (pattern.test(word) && /[:=]/.test(word))
            )
        )
    }

    /**
     * Drops lines that name a hidden entry inside a directory the command
     * listed, e.g. `ls /opt` printing the install dir's basename.
     */
    filterContext(command: string, output: string): string {
        if (!output) return output
        const dirs = splitCommand(command)
            .flatMap((segment) => pathLikeWords(segment.words))
            .map((word) => path.resolve(this.home, expandHome(word, this.home)))
            .filter((dir) => !this.isCloaked(dir))
        if (dirs.length === 0) return output

        return splitLines(output)
            .filter((line) => !this.lineExposesHidden(line, dirs))
            .join('\n')
    }

    private lineExposesHidden(line: string, dirs: string[]): boolean {
        const trimmed = line.trim()
        if (!trimmed) return false
        const tokens = trimmed.split(/\s+/)
        const last = tokens[tokens.length - 1] ?? trimmed
        const candidates = [trimmed, last.replace(/\/$/, '')].filter((c) => !c.startsWith('/'))
        return dirs.some((dir) => candidates.some((candidate) => this.isCloaked(path.join(dir, candidate), dir)))
    }

    /** Context filter, then keyword filter. */
    filterOutput(command: string, output: string): string {
        return filterKeywords(this.filterContext(command, output), this.keywords)
    }
}
