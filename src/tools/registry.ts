import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ToolName } from '../core/types.js'
import type { ToolDefinition } from '../llm/types.js'
import type { AnyTool } from './types.js'

function toRecord(schema: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(schema))
}

export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private definitionCache: ToolDefinition[] | null = null

    register(tool: AnyTool): void {
        this.tools.set(tool.name, tool)
        this.definitionCache = null
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    names(): ToolName[] {
        return [...this.tools.values()].map((tool) => tool.name)
    }

    getToolDefinitions(): ToolDefinition[] {
        if (this.definitionCache) return this.definitionCache

        this.definitionCache = [...this.tools.values()].map((tool) => {
            const parameters = toRecord(zodToJsonSchema(tool.parameters))
            delete parameters.$schema
            return {
                type: 'function' as const,
                function: {
                    name: tool.name,
                    description: tool.description,
                    parameters,
                },
            }
        })
        return this.definitionCache
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }
}
