import { readFile, realpath } from 'node:fs/promises'
import { execa } from 'execa'
import type { HostSession } from './stealth.js'

const ALLOWED_ENV = ['PATH', 'LANG', 'LC_ALL', 'LC_CTYPE', 'TERM', 'TZ', 'SHELL', 'USER', 'LOGNAME', 'TMPDIR']
const FALLBACK_PATH = '/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin'

/**
 * Environment for agent commands: an allow-list of the host's variables plus
 * configured passthroughs. Session markers (TMUX, STY, INVOCATION_ID), API keys
 * and the platform's own variables never reach the agent.
 */
export function buildAgentEnv(
    source: NodeJS.ProcessEnv,
    home: string,
    passthrough: readonly string[] = []
): Record<string, string> {
    const env: Record<string, string> = {}
    for (const name of [...ALLOWED_ENV, ...passthrough]) {
        const value = source[name]
        if (value !== undefined) env[name] = value
    }
    env.PATH ??= FALLBACK_PATH
    env.HOME = home
    env.PWD = home
    return env
}

export async function resolveRealDir(dir: string): Promise<string | undefined> {
    try {
        const real = await realpath(dir)
        return real === dir ? undefined : real
    } catch {
        return undefined
    }
}

/** Detects the tmux/screen/systemd session hosting this process, best effort. */
export async function detectHostSession(env: NodeJS.ProcessEnv = process.env): Promise<HostSession> {
    const session: HostSession = {}

    if (env.STY) {
        // STY is "<pid>.<name>"
        const dot = env.STY.indexOf('.')
        session.screen = dot >= 0 ? env.STY.slice(dot + 1) : env.STY
    }

    if (env.TMUX) {
        const result = await execa('tmux', ['display-message', '-p', '#S'], { reject: false, timeout: 2000 })
        const name = typeof result.stdout === 'string' ? result.stdout.trim() : ''
        if (result.exitCode === 0 && name) session.tmux = name
    }

    if (env.INVOCATION_ID) {
        const cgroup = await readFile('/proc/self/cgroup', 'utf-8').catch(() => '')
        const unit = cgroup.match(/([^/\s]+)\.service/)
        if (unit?.[1]) session.systemdUnit = unit[1]
    }

    return session
}
