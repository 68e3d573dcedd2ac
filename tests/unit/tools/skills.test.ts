import { describe, expect, it } from 'vitest'
import { skillExecTool, skillReadTool } from '../../../src/tools/skills/skills.js'
import { DATA_DIR, FakeRunner, toolHarness } from '../../helpers/fixtures.js'

const SKILLS = `${DATA_DIR}/skills`

async function withSkills(runner = FakeRunner.output('42% used\n')) {
    const harness = await toolHarness(runner)
    harness.fs.setFile(`${SKILLS}/disk-report/SKILL.md`, '---\ndescription: Disk usage\n---\nRun report.sh.\n')
    harness.fs.setFile(`${SKILLS}/disk-report/scripts/report.sh`, 'df -h /')
    harness.fs.setFile(`${SKILLS}/disk-report/scripts/raw`, '#!/bin/sh')
    harness.fs.setFile(`${SKILLS}/disk-report/references/limits.md`, 'warn at 80%')
    harness.fs.setFile(`${SKILLS}/off/SKILL.md`, '---\nenabled: false\n---\nhidden')
    return harness
}

describe('skill_read', () => {
    it('shows instructions and bundled files', async () => {
        const { ctx } = await withSkills()
        expect(await skillReadTool.execute({ name: 'disk-report' }, ctx)).toBe(
            '# Skill: disk-report\n\nRun report.sh.\n\nScripts: raw, report.sh\nReferences: limits.md'
        )
    })

    it('reads a reference file', async () => {
        const { ctx } = await withSkills()
        expect(await skillReadTool.execute({ name: 'disk-report', file: 'limits.md' }, ctx)).toBe('warn at 80%')
    })

    it('fails for unknown references and disabled skills', async () => {
        const { ctx } = await withSkills()
        await expect(skillReadTool.execute({ name: 'disk-report', file: 'nope.md' }, ctx)).rejects.toThrow(
            'reference not found: nope.md'
        )
        await expect(skillReadTool.execute({ name: 'off' }, ctx)).rejects.toThrow('skill not found: off')
    })
})

describe('skill_exec', () => {
    it('runs a script through the interpreter for its extension', async () => {
        const { ctx, runner } = await withSkills()
        expect(await skillExecTool.execute({ name: 'disk-report', script: 'report.sh', args: ['/'] }, ctx)).toBe('42% used')
        expect(runner.requests[0]?.command).toBe('sh')
        expect(runner.requests[0]?.args).toEqual([`${SKILLS}/disk-report/scripts/report.sh`, '/'])
        expect(runner.requests[0]?.cwd).toBe('/home/agent')
    })

    it('runs a script without a known extension directly', async () => {
        const { ctx, runner } = await withSkills()
        await skillExecTool.execute({ name: 'disk-report', script: 'raw' }, ctx)
        expect(runner.requests[0]?.command).toBe(`${SKILLS}/disk-report/scripts/raw`)
        expect(runner.requests[0]?.args).toEqual([])
    })

    it('refuses scripts the skill does not bundle', async () => {
        const { ctx } = await withSkills()
        await expect(skillExecTool.execute({ name: 'disk-report', script: '../SKILL.md' }, ctx)).rejects.toThrow(
            'script not found: ../SKILL.md'
        )
    })

    it('answers hidden path arguments as missing', async () => {
        const { ctx, runner } = await withSkills()
        expect(
            await skillExecTool.execute({ name: 'disk-report', script: 'report.sh', args: ['/opt/wakeloop'] }, ctx)
        ).toBe('report.sh: /opt/wakeloop: No such file or directory')
        expect(runner.requests).toEqual([])
    })
})
