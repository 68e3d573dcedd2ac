export interface CommandSegment {
    /** Words of one simple command, quotes removed. */
    words: string[]
    /** Targets of `>`, `>>` and `<` redirections in this segment. */
    redirects: string[]
}

const SEPARATORS = new Set([';', '|', '&', '\n'])
const PREFIX_WORDS = new Set(['sudo', 'env', 'nohup', 'time', 'command', 'builtin', 'exec', 'nice'])

/**
 * Splits a shell command line into simple commands. Understands quoting,
 * backslash escapes, `;` `&&` `||` `|` `&` separators and redirections, which
 * is enough to find the words a command operates on. Substitutions are not
 * expanded.
 */
export function splitCommand(command: string): CommandSegment[] {
    const segments: CommandSegment[] = []
    let current: CommandSegment = { words: [], redirects: [] }
    let word = ''
    let inWord = false
    let quote: "'" | '"' | null = null
    let redirectNext = false

    const endWord = () => {
        if (!inWord) return
        if (redirectNext) {
            current.redirects.push(word)
            redirectNext = false
        } else {
            current.words.push(word)
        }
        word = ''
        inWord = false
    }

    const endSegment = () => {
        endWord()
        if (current.words.length > 0 || current.redirects.length > 0) segments.push(current)
        current = { words: [], redirects: [] }
        redirectNext = false
    }

    for (let i = 0; i < command.length; i++) {
        const ch = command.charAt(i)

        if (quote) {
            if (ch === quote) {
                quote = null
            } else if (ch === '\\' && quote === '"' && i + 1 < command.length) {
                word += command.charAt(++i)
            } else {
                word += ch
            }
            continue
        }

        if (ch === "'" || ch === '"') {
            quote = ch
            inWord = true
        } else if (ch === '\\' && i + 1 < command.length) {
            word += command.charAt(++i)
            inWord = true
        } else if (SEPARATORS.has(ch)) {
            endSegment()
        } else if (ch === '>' || ch === '<') {
            // `2>` and `1>>`: the digits are a file descriptor, not a word
            if (inWord && /^\d+$/.test(word)) {
                word = ''
                inWord = false
            }
            endWord()
            if (command.charAt(i + 1) === ch) i++
            if (command.charAt(i + 1) === '&') {
                i++
                while (/[0-9-]/.test(command.charAt(i + 1))) i++
                continue
            }
            redirectNext = true
        } else if (ch === ' ' || ch === '\t') {
            endWord()
        } else {
            word += ch
            inWord = true
        }
    }
    endSegment()
    return segments
}

/** The program a segment runs, skipping `VAR=value` assignments and wrappers such as `sudo`. */
export function programOf(segment: CommandSegment): string | undefined {
    for (const word of segment.words) {
        if (/^[A-Za-z_][A-Za-z0-9_]*=/.test(word)) continue
        if (PREFIX_WORDS.has(word)) continue
        if (word.startsWith('-')) continue
        return word.split('/').pop()
    }
    return undefined
}

/** Words that name a filesystem location: absolute, home-relative, or the value side of `--opt=/path`. */
export function pathLikeWords(words: string[]): string[] {
    const paths: string[] = []
    for (const word of words) {
        const value = word.startsWith('-') && word.includes('=') ? word.slice(word.indexOf('=') + 1) : word
        if (value.startsWith('/') || value.startsWith('~')) {
            const trimmed = value.replace(/[;,|&]+$/, '')
            if (trimmed) paths.push(trimmed)
        }
    }
    return paths
}
