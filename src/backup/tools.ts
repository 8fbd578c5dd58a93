export type ToolCategory =
  | 'file-op'
  | 'shell'
  | 'web'
  | 'task-note'
  | 'todo'
  | 'other'

export type ToolIconMap = Record<ToolCategory, string>

export const TOOL_ICONS: ToolIconMap = {
  'file-op': '📁',
  shell: '🔧',
  web: '🌐',
  todo: '📝',
  'task-note': '🤖',
  other: '⚙️',
}

export const DEFAULT_PREVIEW_LENGTH = 100

const TOOL_CATEGORIES: Record<string, ToolCategory> = {
  Read: 'file-op',
  Write: 'file-op',
  Edit: 'file-op',
  MultiEdit: 'file-op',
  NotebookEdit: 'file-op',
  Glob: 'file-op',
  Grep: 'file-op',
  LS: 'file-op',
  Bash: 'shell',
  BashOutput: 'shell',
  KillShell: 'shell',
  WebFetch: 'web',
  WebSearch: 'web',
  TodoWrite: 'todo',
  TodoRead: 'todo',
  Task: 'task-note',
  Agent: 'task-note',
}

// Checked in order; the first string-valued key wins.
const SALIENT_INPUT_KEYS = [
  'file_path',
  'path',
  'file',
  'notebook_path',
  'pattern',
  'command',
  'url',
  'query',
  'description',
  'prompt',
] as const

export function categorizeTool(toolName: string): ToolCategory {
  return TOOL_CATEGORIES[toolName] ?? 'other'
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function flattenToolInput(toolName: string, input: unknown): string {
  if (input === undefined || input === null) return ''
  if (typeof input === 'string') return input
  if (!isPlainObject(input)) return stringifyValue(input)

  const record = input
  if (categorizeTool(toolName) === 'todo') {
    const todos = record.todos
    if (Array.isArray(todos)) {
      return `${todos.length} ${todos.length === 1 ? 'item' : 'items'}`
    }
  }

  for (const key of SALIENT_INPUT_KEYS) {
    const value = record[key]
    if (typeof value === 'string' && value.trim()) {
      return value
    }
  }

  return Object.keys(record).length > 0 ? stringifyValue(record) : ''
}

export function stringifyValue(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

export function truncatePreview(value: string, maxLength: number): string {
  const collapsed = value.replace(/\s+/g, ' ').trim()
  if (maxLength <= 0) return ''
  const chars = Array.from(collapsed)
  if (chars.length <= maxLength) return collapsed
  if (maxLength === 1) return '…'
  return `${chars.slice(0, maxLength - 1).join('').trimEnd()}…`
}
