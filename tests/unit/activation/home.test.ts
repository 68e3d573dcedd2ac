import { describe, expect, it } from 'vitest'
import { ensureAgentHome, loadKnowledgeIndex } from '../../../src/activation/home.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const HOME = '/home/agent'

describe('ensureAgentHome', () => {
    it('creates the wake-up note and knowledge index', async () => {
        const fs = new MockFileSystem()
        await ensureAgentHome(fs, HOME)
        expect(await fs.kind(HOME)).toBe('directory')
        expect(await fs.readText(`${HOME}/WAKE-UP-NOTE.md`)).toContain('Your home is `/home/agent`.')
        expect((await fs.readText(`${HOME}/knowledge/index.md`)).startsWith('# Knowledge Base\n')).toBe(true)
    })

    it('never overwrites what the agent wrote', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${HOME}/WAKE-UP-NOTE.md`, 'my own note')
        fs.setFile(`${HOME}/knowledge/index.md`, '- blog: ~/blog')
        await ensureAgentHome(fs, HOME)
        expect(await fs.readText(`${HOME}/WAKE-UP-NOTE.md`)).toBe('my own note')
        expect(await fs.readText(`${HOME}/knowledge/index.md`)).toBe('- blog: ~/blog')
    })
})

describe('loadKnowledgeIndex', () => {
    it('returns the index as written', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${HOME}/knowledge/index.md`, '- blog: ~/blog')
        expect(await loadKnowledgeIndex(fs, HOME, 100)).toBe('- blog: ~/blog')
    })

    it('is empty when the index is missing or blank', async () => {
        const fs = new MockFileSystem()
        expect(await loadKnowledgeIndex(fs, HOME, 100)).toBe('')
        fs.setFile(`${HOME}/knowledge/index.md`, '  \n')
        expect(await loadKnowledgeIndex(fs, HOME, 100)).toBe('')
    })

    it('cuts an oversized index with a notice', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${HOME}/knowledge/index.md`, 'abcdefghij')
        expect(await loadKnowledgeIndex(fs, HOME, 4)).toBe(
            'abcd\n\n[TRUNCATED: index.md exceeds the 4-character limit. Trim it to avoid losing information.]'
        )
    })
})
