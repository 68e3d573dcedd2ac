import type { Logger } from '../logger/index.js'
import { ToolExecutor } from './executor.js'
import { editFileTool } from './filesystem/edit.js'
import { readFileTool } from './filesystem/read.js'
import { writeFileTool } from './filesystem/write.js'
import { notebookReadTool, notebookWriteTool } from './notebook/notebook.js'
import { ToolRegistry } from './registry.js'
import { shellExecuteTool } from './shell/shell-execute.js'
import { skillExecTool, skillReadTool } from './skills/skills.js'

export function createToolRegistry(): ToolRegistry {
    const registry = new ToolRegistry()

    registry.register(shellExecuteTool)
    registry.register(readFileTool)
    registry.register(writeFileTool)
    registry.register(editFileTool)
    registry.register(notebookWriteTool)
    registry.register(notebookReadTool)
    registry.register(skillReadTool)
    registry.register(skillExecTool)

    return registry
}

/** Timeouts in seconds, as configured. */
export function createToolExecutor(
    registry: ToolRegistry,
    timeouts: { shellTimeout: number; fileTimeout: number },
    logger: Logger
): ToolExecutor {
    return new ToolExecutor(registry, { shell: timeouts.shellTimeout * 1000, file: timeouts.fileTimeout * 1000 }, logger)
}
