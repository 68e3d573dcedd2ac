import { estimateTokens } from './token-counter.js'

export type PromptSectionKey = 'persona' | 'tools' | 'skills' | 'snapshot'

interface SectionRule {
    /** Rendered as `## heading` above the content; null when the content carries its own. */
    heading: string | null
    priority: number // higher = dropped later
    /** Kept even past the budget: the agent cannot act without it. */
    required: boolean
}

const RULES: Record<PromptSectionKey, SectionRule> = {
    persona: { heading: null, priority: 100, required: true },
    tools: { heading: 'Available Tools', priority: 90, required: true },
    skills: { heading: 'Skills', priority: 60, required: false },
    snapshot: { heading: null, priority: 40, required: false },
}

// Order in the rendered prompt
const ORDER: PromptSectionKey[] = ['persona', 'tools', 'skills', 'snapshot']

export interface PromptManifest {
    sections: { key: PromptSectionKey; tokens: number; included: boolean }[]
    totalTokens: number
    budget: number
}

interface RenderedSection {
    key: PromptSectionKey
    text: string
    tokens: number
}

function render(key: PromptSectionKey, content: string): string {
    const { heading } = RULES[key]
    return heading === null ? content : `## ${heading}\n\n${content}`
}

/**
 * Assembles the agent's system prompt under a token budget. Optional sections
 * are dropped lowest priority first; a smaller one further down can still fit.
 */
export class SystemPromptBuilder {
    private contents = new Map<PromptSectionKey, string>()

    set(key: PromptSectionKey, content: string): this {
        const text = content.trim()
        if (text) this.contents.set(key, text)
        else this.contents.delete(key)
        return this
    }

    build(budget: number): { prompt: string; manifest: PromptManifest } {
        const sections: RenderedSection[] = []
        for (const key of ORDER) {
            const content = this.contents.get(key)
            if (content === undefined) continue
            const text = render(key, content)
            sections.push({ key, text, tokens: estimateTokens(text) })
        }

        const ranked = [...sections].sort((a, b) => {
            const required = Number(RULES[b.key].required) - Number(RULES[a.key].required)
            return required !== 0 ? required : RULES[b.key].priority - RULES[a.key].priority
        })
        const kept = new Set<PromptSectionKey>()
        let totalTokens = 0
        for (const section of ranked) {
            if (!RULES[section.key].required && totalTokens + section.tokens > budget) continue
            kept.add(section.key)
            totalTokens += section.tokens
        }

        return {
            prompt: sections
                .filter((s) => kept.has(s.key))
                .map((s) => s.text)
                .join('\n\n'),
            manifest: {
                sections: sections.map((s) => ({ key: s.key, tokens: s.tokens, included: kept.has(s.key) })),
                totalTokens,
                budget,
            },
        }
    }
}
