export interface Frontmatter {
    meta: Record<string, string>
    body: string
}

/**
 * Splits a `---` delimited header of flat `key: value` pairs from a Markdown
 * document. Quotes around values are dropped; nested YAML is not supported.
 */
export function parseFrontmatter(content: string): Frontmatter {
    const match = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/.exec(content)
    if (!match) return { meta: {}, body: content }

    const meta: Record<string, string> = {}
    for (const line of (match[1] ?? '').split(/\r?\n/)) {
        const colon = line.indexOf(':')
        if (colon <= 0 || line.startsWith(' ') || line.startsWith('#')) continue
        const key = line.slice(0, colon).trim()
        const value = line
            .slice(colon + 1)
            .trim()
            .replace(/^(['"])(.*)\1$/, '$2')
        meta[key] = value
    }
    return { meta, body: content.slice(match[0].length) }
}
