import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { NodeFileSystem } from '../../../src/core/fs.js'
import { StealthFilter } from '../../../src/security/stealth.js'
import { editFileTool } from '../../../src/tools/filesystem/edit.js'
import { readFileTool } from '../../../src/tools/filesystem/read.js'
import { writeFileTool } from '../../../src/tools/filesystem/write.js'
import { toolHarness } from '../../helpers/fixtures.js'

describe('read_file', () => {
    it('reads relative paths from the agent home', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/notes.md', 'line 1\nline 2\nline 3')
        expect(await readFileTool.execute({ path: 'notes.md' }, ctx)).toBe('line 1\nline 2\nline 3')
    })

    it('reads a line window', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/notes.md', 'a\nb\nc\nd')
        expect(await readFileTool.execute({ path: '~/notes.md', offset: 1, limit: 2 }, ctx)).toBe('b\nc')
    })

    it('reads files outside the home', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/etc/hostname', 'box')
        expect(await readFileTool.execute({ path: '/etc/hostname' }, ctx)).toBe('box')
    })

    it('marks empty files', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/empty.txt', '')
        expect(await readFileTool.execute({ path: 'empty.txt' }, ctx)).toBe('(file is empty)')
    })

    it('truncates long files', async () => {
        const { fs, ctx } = await toolHarness(undefined, { maxOutputChars: 5 })
        fs.setFile('/home/agent/long.txt', 'abcdefghij')
        expect(await readFileTool.execute({ path: 'long.txt' }, ctx)).toBe('abcde\n... (truncated, total 10 chars)')
    })

    it('fails for missing files and directories', async () => {
        const { ctx } = await toolHarness()
        await expect(readFileTool.execute({ path: 'missing.txt' }, ctx)).rejects.toThrow('file not found: missing.txt')
        await expect(readFileTool.execute({ path: '/home' }, ctx)).rejects.toThrow("'/home' is a directory, not a file")
    })

    it('reports hidden files as missing even when they exist', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/opt/wakeloop/wakeloop.json', '{"apiKey":"test-secret"}')
        await expect(readFileTool.execute({ path: '/opt/wakeloop/wakeloop.json' }, ctx)).rejects.toThrow(
            'file not found: /opt/wakeloop/wakeloop.json'
        )
    })
})

describe('write_file', () => {
    it('creates files and parent directories', async () => {
        const { fs, ctx } = await toolHarness()
        expect(await writeFileTool.execute({ path: 'projects/site/index.html', content: '<h1>hi</h1>' }, ctx)).toBe(
            'OK: wrote 11 chars to projects/site/index.html'
        )
        expect(await fs.readText('/home/agent/projects/site/index.html')).toBe('<h1>hi</h1>')
        expect(await fs.kind('/home/agent/projects/site')).toBe('directory')
    })

    it('appends when asked', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/log.txt', 'a\n')
        expect(await writeFileTool.execute({ path: 'log.txt', content: 'b\n', append: true }, ctx)).toBe(
            'OK: appended 2 chars to log.txt'
        )
        expect(await fs.readText('/home/agent/log.txt')).toBe('a\nb\n')
    })

    it('denies writes into hidden directories', async () => {
        const { fs, ctx } = await toolHarness()
        await expect(writeFileTool.execute({ path: '/opt/wakeloop/data/x', content: 'x' }, ctx)).rejects.toThrow(
            'permission denied: /opt/wakeloop/data/x'
        )
        expect(await fs.exists('/opt/wakeloop/data/x')).toBe(false)
    })
})

describe('edit_file', () => {
    it('replaces a unique match', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/app.conf', 'port=3000\nhost=localhost\n')
        expect(await editFileTool.execute({ path: 'app.conf', find: 'port=3000', replace: 'port=3001' }, ctx)).toBe(
            'OK: edited app.conf'
        )
        expect(await fs.readText('/home/agent/app.conf')).toBe('port=3001\nhost=localhost\n')
    })

    it('refuses an ambiguous match and leaves the file alone', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/app.conf', 'x=1\nx=1\n')
        await expect(editFileTool.execute({ path: 'app.conf', find: 'x=1', replace: 'x=2' }, ctx)).rejects.toThrow(
            'text to replace occurs 2 times in app.conf; include more context so it matches once'
        )
        expect(await fs.readText('/home/agent/app.conf')).toBe('x=1\nx=1\n')
    })

    it('fails when the text is missing', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/app.conf', 'a')
        await expect(editFileTool.execute({ path: 'app.conf', find: 'b', replace: 'c' }, ctx)).rejects.toThrow(
            'text to replace not found in app.conf'
        )
    })

    it('counts overlapping matches as ambiguous', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/home/agent/a.txt', 'aaa')
        await expect(editFileTool.execute({ path: 'a.txt', find: 'aa', replace: 'b' }, ctx)).rejects.toThrow(
            'text to replace occurs 2 times in a.txt; include more context so it matches once'
        )
        expect(await fs.readText('/home/agent/a.txt')).toBe('aaa')
    })

    it('fails for a missing file', async () => {
        const { ctx } = await toolHarness()
        await expect(editFileTool.execute({ path: 'nope.txt', find: 'a', replace: 'b' }, ctx)).rejects.toThrow(
            'file not found: nope.txt'
        )
    })

    it('denies edits to hidden files', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/opt/wakeloop/wakeloop.json', '{}')
        await expect(editFileTool.execute({ path: '/opt/wakeloop/wakeloop.json', find: '{}', replace: '[]' }, ctx)).rejects.toThrow(
            'permission denied: /opt/wakeloop/wakeloop.json'
        )
    })
})

describe('symlinks into hidden directories', () => {
    it('hides files reached through a link in the home', async () => {
        const { fs, ctx } = await toolHarness()
        fs.setFile('/opt/wakeloop/wakeloop.json', '{"apiKey":"test-secret"}')
        fs.setLink('/home/agent/tools', '/opt/wakeloop')

        await expect(readFileTool.execute({ path: 'tools/wakeloop.json' }, ctx)).rejects.toThrow(
            'file not found: tools/wakeloop.json'
        )
        await expect(writeFileTool.execute({ path: 'tools/new.txt', content: 'x' }, ctx)).rejects.toThrow(
            'permission denied: tools/new.txt'
        )
        await expect(editFileTool.execute({ path: 'tools/wakeloop.json', find: 'test', replace: 'x' }, ctx)).rejects.toThrow(
            'permission denied: tools/wakeloop.json'
        )
        expect(await fs.exists('/opt/wakeloop/new.txt')).toBe(false)
    })

    describe('on disk', () => {
        let root = ''

        afterEach(async () => {
            if (root) await rm(root, { recursive: true, force: true })
            root = ''
        })

        it('follows a real symlink before checking', async () => {
            root = await realpath(await mkdtemp(path.join(os.tmpdir(), 'wakeloop-link-')))
            const installDir = path.join(root, 'install')
            const home = path.join(root, 'home')
            await mkdir(installDir)
            await mkdir(home)
            await writeFile(path.join(installDir, 'wakeloop.json'), '{"apiKey":"test-secret"}')
            await symlink(installDir, path.join(home, 'tools'))

            const { ctx } = await toolHarness(undefined, {
                fs: new NodeFileSystem(),
                home,
                stealth: new StealthFilter({ installDir }, home),
            })

            await expect(readFileTool.execute({ path: 'tools/wakeloop.json' }, ctx)).rejects.toThrow(
                'file not found: tools/wakeloop.json'
            )
            await expect(writeFileTool.execute({ path: 'tools/sub/new.txt', content: 'x' }, ctx)).rejects.toThrow(
                'permission denied: tools/sub/new.txt'
            )
        })
    })
})
