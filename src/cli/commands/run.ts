import type { Container } from '../../core/container.js'
import type { TimelineEntry } from '../../memory/types.js'
import { colors, formatActivity, formatTimelineEntry } from '../ui.js'

function printActivity(container: Container): () => void {
    return container.activity.subscribe((message) => {
        const line = formatActivity(message)
        if (line !== null) console.log(line)
    })
}

/**
 * Runs the loop in the foreground until SIGINT or SIGTERM. The first signal
 * asks for a graceful stop; a second one exits without waiting.
 */
export async function runCommand(container: Container): Promise<void> {
    const unsubscribe = printActivity(container)
    let signals = 0

    const onSignal = () => {
        signals++
        if (signals > 1) {
            console.log(colors.error('\nForced exit'))
            process.exit(130)
        }
        console.log(colors.warn('\nStopping after the current step... (Ctrl+C again to force)'))
        container.loop.stop()
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)

    try {
        container.loop.start()
        await container.loop.settled()
    } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
        unsubscribe()
    }

    const status = container.loop.status()
    if (status.state === 'error') {
        throw new Error(status.lastError ?? 'loop failed')
    }
}

export async function onceCommand(container: Container): Promise<void> {
    const unsubscribe = printActivity(container)
    const onSignal = () => {
        console.log(colors.warn('\nStopping the round...'))
        container.loop.stop()
    }
    process.on('SIGINT', onSignal)

    let entry: TimelineEntry | undefined
    try {
        entry = await container.loop.runOnce()
    } finally {
        process.off('SIGINT', onSignal)
        unsubscribe()
    }

    if (!entry) {
        throw new Error(container.loop.status().lastError ?? 'round did not run')
    }
    console.log(`\n${formatTimelineEntry(entry)}`)
}
