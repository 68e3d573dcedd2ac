export type LoopState = 'idle' | 'running' | 'waiting' | 'stopping' | 'error'

export type RoundStatus = 'running' | 'completed' | 'stopped' | 'error'

export type ToolName =
    | 'shell_execute'
    | 'read_file'
    | 'write_file'
    | 'edit_file'
    | 'notebook_write'
    | 'notebook_read'
    | 'skill_read'
    | 'skill_exec'
