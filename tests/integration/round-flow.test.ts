import { describe, expect, it } from 'vitest'
import { BUDGET_REFUSAL, SUMMARY_REQUEST } from '../../src/activation/summary.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { AUDIT_OK, loopHarness } from '../helpers/container.js'
import { DATA_DIR, FakeRunner } from '../helpers/fixtures.js'
import { makeRawToolCall, makeToolCall, makeToolCallResponse } from '../helpers/scripted-llm-client.js'

describe('round flow', () => {
    it('runs a round that saves its note', async () => {
        const h = loopHarness([
            makeToolCallResponse([makeToolCall('notebook_write', { content: 'Set up a blog.' })]),
            { content: 'Built a blog.' },
            AUDIT_OK,
        ])

        const entry = await h.container.loop.runOnce()

        expect(entry).toMatchObject({ round: 1, status: 'completed', toolsUsed: 1, notebookSaved: true, summary: 'Built a blog.' })
        expect(h.container.memory.getNote(1)?.content).toBe('Set up a blog.')
        expect(h.llm.getCall(1).params.messages[3]).toEqual({
            role: 'tool',
            tool_call_id: h.ofType('tool:call')[0]?.id,
            content: '[System: 1 tool calls used, 19 remaining]\nOK: note saved for round 1 (14 chars)',
        })
        expect(h.container.loop.status().state).toBe('idle')
    })

    it('offers the tools and wakes the agent with its prompt', async () => {
        const h = loopHarness([{ content: 'Nothing to do.' }, AUDIT_OK])

        await h.container.loop.runOnce()

        expect(h.llm.toolNames(0)).toEqual([
            'shell_execute',
            'read_file',
            'write_file',
            'edit_file',
            'notebook_write',
            'notebook_read',
            'skill_read',
            'skill_exec',
        ])
        const [system, user] = h.llm.getCall(0).params.messages
        expect(system?.content).toContain('## Available Tools')
        expect(user?.content).toContain('Round 1 (tool budget: 20)')
        expect(user?.content?.endsWith('You wake up.')).toBe(true)
    })

    it('creates the agent home before the first round', async () => {
        const h = loopHarness([{ content: 'Hello.' }, AUDIT_OK])

        await h.container.loop.runOnce()

        expect(await h.fs.exists('/home/agent/WAKE-UP-NOTE.md')).toBe(true)
        expect(await h.fs.exists('/home/agent/knowledge/index.md')).toBe(true)
    })

    it('refuses calls past the budget and asks for a summary', async () => {
        const calls = ['one', 'two', 'three', 'four'].map((word) => makeToolCall('shell_execute', { command: `echo ${word}` }))
        const h = loopHarness([makeToolCallResponse(calls), { content: 'Did three things.' }, AUDIT_OK], {
            config: { maxToolCalls: 3 },
        })

        const entry = await h.container.loop.runOnce()

        expect(h.runner.requests.map((r) => r.command)).toEqual(['echo one', 'echo two', 'echo three'])
        expect(entry).toMatchObject({ status: 'completed', toolsUsed: 3, summary: 'Did three things.' })

        const messages = h.llm.getCall(1).params.messages
        expect(h.llm.getCall(1).params.tools).toBeUndefined()
        expect(messages.at(-1)).toEqual({ role: 'user', content: SUMMARY_REQUEST })
        expect(messages.at(-2)).toEqual({ role: 'tool', tool_call_id: calls[3]?.id, content: BUDGET_REFUSAL })
        expect(messages.at(-3)).toEqual({
            role: 'tool',
            tool_call_id: calls[2]?.id,
            content: '[System: 3 tool calls used, 0 remaining. Budget exhausted: finish with your summary.]\nok',
        })
    })

    it('refuses a call in a later turn once the budget is spent', async () => {
        const fs = new MockFileSystem()
        const earlier = [1, 2, 3, 4].map((round) => ({
            round,
            timestamp: '2026-02-28T08:00:00.000Z',
            status: 'completed',
            toolsUsed: 0,
            duration: 1,
            summary: `round ${round}`,
            notebookSaved: true,
        }))
        fs.setFile(`${DATA_DIR}/timeline.jsonl`, earlier.map((e) => `${JSON.stringify(e)}\n`).join(''))
        const fourth = makeToolCall('shell_execute', { command: 'curl localhost:3000' })
        const h = loopHarness(
            [
                makeToolCallResponse([
                    makeToolCall('write_file', { path: 'site/index.html', content: '<h1>hi</h1>' }),
                    makeToolCall('shell_execute', { command: 'node serve.js &' }),
                    makeToolCall('write_file', { path: 'site/about.html', content: 'about' }),
                ]),
                makeToolCallResponse([fourth]),
                { content: 'Site is up.' },
                AUDIT_OK,
            ],
            { config: { maxToolCalls: 3 }, fs }
        )

        const entry = await h.container.loop.runOnce()

        expect(entry).toMatchObject({ round: 5, status: 'completed', toolsUsed: 3, notebookSaved: false })
        expect(h.runner.requests.map((r) => r.command)).toEqual(['node serve.js &'])
        expect(await fs.readText('/home/agent/site/about.html')).toBe('about')
        expect(h.llm.getCall(1).params.tools).toBeDefined()
        expect(h.llm.getCall(2).params.tools).toBeUndefined()
        const messages = h.llm.getCall(2).params.messages
        expect(messages.at(-1)).toEqual({ role: 'user', content: SUMMARY_REQUEST })
        expect(messages.at(-2)).toEqual({ role: 'tool', tool_call_id: fourth.id, content: BUDGET_REFUSAL })
        expect(h.ofType('log')).toEqual([{ text: 'Round 5: notebook not saved', level: 'warn' }])
    })

    it('hides the install directory from shell commands', async () => {
        const h = loopHarness([
            makeToolCallResponse([makeToolCall('shell_execute', { command: 'ls /opt/wakeloop' })]),
            { content: 'Empty.' },
            AUDIT_OK,
        ])

        await h.container.loop.runOnce()

        expect(h.runner.requests).toHaveLength(0)
        expect(h.ofType('tool:result')[0]).toMatchObject({
            name: 'shell_execute',
            ok: true,
            result: 'ls: /opt/wakeloop: No such file or directory',
        })
    })

    it('asks again after malformed tool arguments', async () => {
        const h = loopHarness([
            makeToolCallResponse([makeRawToolCall('notebook_write', '{"content": "half')]),
            makeToolCallResponse([makeToolCall('notebook_write', { content: 'Second try.' })]),
            { content: 'Saved.' },
            AUDIT_OK,
        ])

        const entry = await h.container.loop.runOnce()

        expect(entry).toMatchObject({ status: 'completed', toolsUsed: 1, notebookSaved: true })
        expect(h.llm.totalCalls).toBe(4)
    })

    it('takes the text as final once malformed retries run out', async () => {
        const h = loopHarness([makeToolCallResponse([makeRawToolCall('shell_execute', '{oops')], 'I tried.'), AUDIT_OK], {
            config: { malformedRetries: 0 },
        })

        const entry = await h.container.loop.runOnce()

        expect(entry).toMatchObject({ status: 'completed', toolsUsed: 0, summary: 'I tried.' })
        expect(h.runner.requests).toHaveLength(0)
    })

    it('reports a tool that runs past its timeout', async () => {
        const runner = new FakeRunner(
            (request) =>
                new Promise((resolve) => {
                    request.signal?.addEventListener('abort', () => resolve({ output: '', exitCode: undefined, timedOut: true }))
                })
        )
        const h = loopHarness(
            [makeToolCallResponse([makeToolCall('shell_execute', { command: 'sleep 100' })]), { content: 'Gave up.' }, AUDIT_OK],
            { config: { shellTimeout: 1 }, runner }
        )

        await h.container.loop.runOnce()

        const detail = await h.container.service.round(1)
        expect(detail.log?.actions[0]).toMatchObject({ name: 'shell_execute', ok: false, result: '(error: timed out after 1s)' })
    })

    it('marks the round failed when the model cannot be reached', async () => {
        const h = loopHarness([new Error('503 upstream unavailable')])

        const entry = await h.container.loop.runOnce()

        expect(entry).toMatchObject({ round: 1, status: 'error', toolsUsed: 0, error: '503 upstream unavailable' })
        expect(h.ofType('error')).toEqual([{ round: 1, message: 'Round 1 failed: 503 upstream unavailable' }])
        // no actions to audit
        expect(h.llm.totalCalls).toBe(1)
        expect(h.container.loop.status()).toMatchObject({ state: 'idle', lastError: '503 upstream unavailable' })
    })

    it('warns when the round ends without a note', async () => {
        const h = loopHarness([{ content: 'Forgot.' }, AUDIT_OK])

        const entry = await h.container.loop.runOnce()

        expect(entry?.notebookSaved).toBe(false)
        expect(h.ofType('log')).toEqual([{ text: 'Round 1: notebook not saved', level: 'warn' }])
    })

    it('delivers a queued inspiration once', async () => {
        const h = loopHarness([{ content: 'Inspired.' }, AUDIT_OK])
        await h.container.service.inspire('try a cron job')

        await h.container.loop.runOnce()

        expect(h.llm.getCall(0).params.messages[1]?.content).toContain(
            'A sudden spark of inspiration crosses your mind: "try a cron job"'
        )
        expect(await h.container.memory.peekInspiration()).toBeUndefined()
    })

    it('streams thoughts when streaming is on', async () => {
        const h = loopHarness([{ content: 'abcdef' }, AUDIT_OK], { config: { streaming: true } })

        await h.container.loop.runOnce()

        expect(h.ofType('thought:chunk').map((c) => c.text)).toEqual(['ab', 'cd', 'ef'])
        expect(h.ofType('thought:done')).toEqual([{ round: 1, text: 'abcdef' }])
    })

    it('updates the snapshot after the round', async () => {
        const h = loopHarness([
            makeToolCallResponse([makeToolCall('shell_execute', { command: 'node blog.js &' })]),
            { content: 'Blog is up.' },
            { content: '{"services": [{"name": "blog", "port": 3000}]}' },
        ])

        await h.container.loop.runOnce()

        const snapshot = await h.container.service.snapshot()
        expect(snapshot.meta.round).toBe(1)
        expect(snapshot.services.map((s) => [s.name, s.port])).toEqual([['blog', 3000]])
    })

    it('keeps the round when the snapshot update fails', async () => {
        const h = loopHarness([{ content: 'Hello.' }, { content: 'not json' }])

        const entry = await h.container.loop.runOnce()

        expect(entry?.status).toBe('completed')
        expect(h.container.memory.totalRounds()).toBe(1)
        const errors = h.ofType('error')
        expect(errors).toHaveLength(1)
        expect(errors[0]?.round).toBe(1)
        expect(errors[0]?.message.startsWith('snapshot update failed on all models: ')).toBe(true)
        const order = h.events.map((e) => e.type).filter((t) => t === 'round:complete' || t === 'error')
        expect(order).toEqual(['round:complete', 'error'])
    })
})
