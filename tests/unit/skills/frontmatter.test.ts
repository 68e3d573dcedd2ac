import { describe, expect, it } from 'vitest'
import { parseFrontmatter } from '../../../src/skills/frontmatter.js'

describe('parseFrontmatter', () => {
    it('splits flat key/value pairs from the body', () => {
        const doc = '---\nname: disk-report\ndescription: "Summarise disk usage"\nenabled: false\n---\n# Disk report\n'
        expect(parseFrontmatter(doc)).toEqual({
            meta: { name: 'disk-report', description: 'Summarise disk usage', enabled: 'false' },
            body: '# Disk report\n',
        })
    })

    it('keeps colons inside values', () => {
        expect(parseFrontmatter('---\ndescription: use it: often\n---\nbody').meta.description).toBe('use it: often')
    })

    it('ignores comments and indented lines', () => {
        const { meta } = parseFrontmatter("---\n# comment\nname: x\n  nested: y\n---\n")
        expect(meta).toEqual({ name: 'x' })
    })

    it('returns the whole document when there is no header', () => {
        expect(parseFrontmatter('# Title\ntext')).toEqual({ meta: {}, body: '# Title\ntext' })
    })
})
