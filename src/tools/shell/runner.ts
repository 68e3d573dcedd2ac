import { execa } from 'execa'

export interface RunRequest {
    /** A shell command line when `args` is absent, otherwise an executable. */
    command: string
    args?: string[]
    cwd: string
    env: Record<string, string>
    /** Milliseconds. */
    timeout: number
    signal?: AbortSignal
}

export interface RunResult {
    /** stdout and stderr interleaved. */
    output: string
    exitCode: number | undefined
    timedOut: boolean
}

export interface CommandRunner {
    run(request: RunRequest): Promise<RunResult>
}

export class ExecaRunner implements CommandRunner {
    async run(request: RunRequest): Promise<RunResult> {
        const result = await execa(request.command, request.args ?? [], {
            shell: request.args === undefined,
            cwd: request.cwd,
            env: request.env,
            extendEnv: false,
            stdin: 'ignore',
            all: true,
            reject: false,
            timeout: request.timeout,
            forceKillAfterDelay: 2000,
            cancelSignal: request.signal,
        })
        return {
            output: result.all ?? '',
            exitCode: result.exitCode,
            timedOut: result.timedOut || result.isCanceled,
        }
    }
}
