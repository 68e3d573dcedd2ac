import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { type Container, createContainer, defaultStealthProfile } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { detectHostSession, resolveRealDir } from '../security/environment.js'
import { doctorCommand } from './commands/doctor.js'
import {
    deleteRoundCommand,
    historyCommand,
    inspireCommand,
    notebookCommand,
    type PageOptions,
    roundCommand,
    skillsCommand,
    snapshotCommand,
} from './commands/records.js'
import { onceCommand, runCommand } from './commands/run.js'
import { banner, formatError } from './ui.js'

export const VERSION = '0.1.0'

type GlobalOptions = {
    dir?: string
    model?: string
    key?: string
    interval?: number
    debug?: boolean
}

function parseSeconds(value: string): number {
    const seconds = Number(value)
    if (!Number.isFinite(seconds) || seconds < 0) throw new InvalidArgumentError('expected a non-negative number of seconds')
    return seconds
}

async function resolveConfig(options: GlobalOptions): Promise<ResolvedConfig> {
    const cliFlags: Partial<Config> = {
        model: options.model,
        apiKey: options.key,
        interval: options.interval,
        logLevel: options.debug ? 'debug' : undefined,
    }
    return loadConfig({ fs: new NodeFileSystem(), cliFlags, installDir: options.dir })
}

/** Builds the container with a stealth profile that also covers the host session and symlinked install paths. */
async function openContainer(config: ResolvedConfig): Promise<Container> {
    const [session, resolvedInstallDir] = await Promise.all([detectHostSession(), resolveRealDir(config.installDir)])
    return createContainer(config, {
        profile: { ...defaultStealthProfile(config), session, resolvedInstallDir },
    })
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('wakeloop')
        .description('Autonomous agent activation loop')
        .version(VERSION)
        .option('-d, --dir <path>', 'Install directory holding wakeloop.json and data/')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key')
        .option('-i, --interval <seconds>', 'Seconds between rounds', parseSeconds)
        .option('--debug', 'Enable debug logging')

    /** Wraps an action so errors print once and set a failing exit code. */
    const withContainer =
        <A extends unknown[]>(action: (container: Container, ...args: A) => Promise<void>) =>
        async (...args: A): Promise<void> => {
            let container: Container | undefined
            try {
                const config = await resolveConfig(program.opts<GlobalOptions>())
                container = await openContainer(config)
                await action(container, ...args)
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exitCode = 1
            } finally {
                await container?.shutdown()
            }
        }

    program
        .command('run')
        .description('Run the activation loop in the foreground (Ctrl+C stops gracefully)')
        .action(
            withContainer(async (container) => {
                console.log(banner(VERSION))
                await runCommand(container)
            })
        )

    program.command('once').description('Run a single round and exit').action(withContainer(onceCommand))

    program
        .command('history')
        .description('List past rounds, newest first')
        .option('--offset <n>', 'Rounds to skip', '0')
        .option('--limit <n>', 'Rounds to show', '20')
        .action(withContainer((container, options: PageOptions) => historyCommand(container, options)))

    program
        .command('round <n>')
        .description('Show one round: timeline entry, note and actions')
        .action(withContainer((container, n: string) => roundCommand(container, n)))

    program
        .command('delete-round <n>')
        .description('Delete a round from every store')
        .action(withContainer((container, n: string) => deleteRoundCommand(container, n)))

    program
        .command('notebook')
        .description('List notebook entries, newest first')
        .option('--offset <n>', 'Entries to skip', '0')
        .option('--limit <n>', 'Entries to show', '20')
        .action(withContainer((container, options: PageOptions) => notebookCommand(container, options)))

    program
        .command('snapshot')
        .description('Show the current system snapshot')
        .option('--json', 'Print the raw snapshot')
        .action(withContainer((container, options: { json?: boolean }) => snapshotCommand(container, options)))

    program
        .command('inspire <message>')
        .description('Queue a one-shot hint for the next round')
        .action(withContainer((container, message: string) => inspireCommand(container, message)))

    program.command('skills').description('List installed skills').action(withContainer(skillsCommand))

    program
        .command('doctor')
        .description('Environment diagnostics')
        .action(async () => {
            try {
                const config = await resolveConfig(program.opts<GlobalOptions>())
                await doctorCommand(config, new NodeFileSystem())
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exitCode = 1
            }
        })

    return program
}
