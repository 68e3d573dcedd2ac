import path from 'node:path'
import { execaCommand } from 'execa'
import type { ResolvedConfig } from '../../config/schema.js'
import type { FileSystem } from '../../core/fs.js'
import { colors } from '../ui.js'

export interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

async function probe(command: string): Promise<string | null> {
    try {
        const { stdout } = await execaCommand(command)
        return stdout.split('\n')[0]?.trim() ?? ''
    } catch {
        return null
    }
}

export async function runChecks(config: ResolvedConfig, fs: FileSystem): Promise<Check[]> {
    const checks: Check[] = []

    const major = Number.parseInt(process.versions.node.split('.')[0] ?? '0', 10)
    checks.push({
        name: 'Node.js',
        status: major >= 20 ? 'ok' : 'error',
        message: major >= 20 ? `v${process.versions.node}` : `v${process.versions.node} (20 or newer required)`,
    })

    checks.push(
        config.apiKey
            ? { name: 'API key', status: 'ok', message: 'Configured' }
            : { name: 'API key', status: 'error', message: 'Not configured (set OPENROUTER_API_KEY or apiKey)' }
    )

    const homeKind = await fs.kind(config.agentHome)
    checks.push(
        homeKind === 'directory'
            ? { name: 'Agent home', status: 'ok', message: config.agentHome }
            : { name: 'Agent home', status: 'warn', message: `${config.agentHome} missing (created on first round)` }
    )

    if (path.relative(config.installDir, config.agentHome).split(path.sep)[0] !== '..') {
        checks.push({ name: 'Isolation', status: 'error', message: 'agent home lies inside the install directory' })
    }

    const persona = path.join(config.dataDir, 'prompts', `${config.persona}.md`)
    checks.push(
        (await fs.exists(persona))
            ? { name: 'Persona', status: 'ok', message: config.persona }
            : { name: 'Persona', status: 'warn', message: `${persona} not found (built-in default used)` }
    )

    const shell = await probe('sh -c "echo ok"')
    checks.push(shell === 'ok' ? { name: 'Shell', status: 'ok', message: 'sh' } : { name: 'Shell', status: 'error', message: 'sh not usable' })

    const python = await probe('python3 --version')
    checks.push(python ? { name: 'python3', status: 'ok', message: python } : { name: 'python3', status: 'warn', message: 'Not found (.py skills unavailable)' })

    return checks
}

export async function doctorCommand(config: ResolvedConfig, fs: FileSystem): Promise<void> {
    console.log(colors.brand('wakeloop doctor\n'))

    const checks = await runChecks(config, fs)
    for (const check of checks) {
        const icon = check.status === 'ok' ? colors.success('✓') : check.status === 'warn' ? colors.warn('!') : colors.error('✗')
        console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`)
    }

    const errors = checks.filter((c) => c.status === 'error')
    console.log('')
    if (errors.length === 0) {
        console.log(colors.success('All good.'))
    } else {
        console.log(colors.warn(`${errors.length} problem(s) found.`))
        process.exitCode = 1
    }
}
