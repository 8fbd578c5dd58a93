import { z } from 'zod'
import { describeError } from './errors'
import { flattenToolInput, isPlainObject, stringifyValue } from './tools'

export type RecordKind = 'user' | 'assistant' | 'tool-call' | 'tool-result' | 'other'

type RecordBase = {
  line: number
  timestamp: number | null
}

export type UserRecord = RecordBase & { kind: 'user'; text: string }

export type AssistantRecord = RecordBase & { kind: 'assistant'; text: string }

export type ToolCallRecord = RecordBase & {
  kind: 'tool-call'
  toolName: string
  toolUseId: string | null
  input: string
}

export type ToolResultRecord = RecordBase & {
  kind: 'tool-result'
  toolName: string | null
  toolUseId: string | null
  output: string
  isError: boolean
}

export type OtherRecord = RecordBase & {
  kind: 'other'
  label: string
  text: string
}

export type RawRecord =
  | UserRecord
  | AssistantRecord
  | ToolCallRecord
  | ToolResultRecord
  | OtherRecord

export type RecordWarning = {
  line: number
  code: 'MALFORMED_RECORD'
  message: string
}

export type ParsedSessionFile = {
  records: RawRecord[]
  malformedLines: number
  ignoredLines: number
  warnings: RecordWarning[]
  sessionId: string | null
  cwd: string | null
}

// Wrong-typed optional fields fall back to undefined instead of rejecting the line.
const optionalString = z.string().optional().catch(undefined)
const optionalBoolean = z.boolean().optional().catch(undefined)

const sessionLineSchema = z
  .object({
    type: optionalString,
    role: optionalString,
    timestamp: z.union([z.string(), z.number()]).optional().catch(undefined),
    message: z.unknown().optional(),
    content: z.unknown().optional(),
    summary: optionalString,
    tool_name: optionalString,
    name: optionalString,
    tool_input: z.unknown().optional(),
    input: z.unknown().optional(),
    tool_output: z.unknown().optional(),
    output: z.unknown().optional(),
    tool_use_id: optionalString,
    id: optionalString,
    is_error: optionalBoolean,
    isMeta: optionalBoolean,
    sessionId: optionalString,
    session_id: optionalString,
    cwd: optionalString,
  })
  .passthrough()

type SessionLine = z.infer<typeof sessionLineSchema>

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: optionalString,
    content: z.unknown().optional(),
    id: optionalString,
    name: optionalString,
    input: z.unknown().optional(),
    tool_use_id: optionalString,
    is_error: optionalBoolean,
  })
  .passthrough()

type ContentBlock = z.infer<typeof contentBlockSchema>

const COMMAND_MARKUP_PREFIXES = [
  '<command-name>',
  '<command-message>',
  '<local-command',
]

const KIND_ALIASES: Record<string, RecordKind> = {
  user: 'user',
  human: 'user',
  assistant: 'assistant',
  tool_use: 'tool-call',
  'tool-use': 'tool-call',
  tool_call: 'tool-call',
  'tool-call': 'tool-call',
  tool_result: 'tool-result',
  'tool-result': 'tool-result',
  other: 'other',
}

type LineContext = {
  line: number
  timestamp: number | null
  toolNames: Map<string, string>
}

type ExpandedLine = {
  records: RawRecord[]
  ignored: boolean
}

export function parseSessionRecords(content: string): ParsedSessionFile {
  const records: RawRecord[] = []
  const warnings: RecordWarning[] = []
  const toolNames = new Map<string, string>()
  let ignoredLines = 0
  let sessionId: string | null = null
  let cwd: string | null = null

  const lines = content.split(/\r?\n/)
  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1
    if (!rawLine.trim()) continue

    const decoded = decodeLine(rawLine)
    if (!decoded.ok) {
      warnings.push({
        line: lineNumber,
        code: 'MALFORMED_RECORD',
        message: `line ${lineNumber}: ${decoded.reason}`,
      })
      continue
    }

    const entry = decoded.entry
    sessionId = sessionId ?? nonEmpty(entry.sessionId ?? entry.session_id)
    cwd = cwd ?? nonEmpty(entry.cwd)

    const expanded = expandLine(entry, {
      line: lineNumber,
      timestamp: parseTimestamp(entry.timestamp),
      toolNames,
    })
    if (expanded.ignored) {
      ignoredLines += 1
    }
    records.push(...expanded.records)
  }

  return {
    records,
    malformedLines: warnings.length,
    ignoredLines,
    warnings,
    sessionId,
    cwd,
  }
}

export function readSessionCwd(content: string): string | null {
  for (const rawLine of content.split(/\r?\n/)) {
    if (!rawLine.trim()) continue
    const decoded = decodeLine(rawLine)
    if (!decoded.ok) continue
    const cwd = nonEmpty(decoded.entry.cwd)
    if (cwd) return cwd
  }
  return null
}

export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? normalizeEpoch(value) : null
  }
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  if (!trimmed) return null
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return normalizeEpoch(Number(trimmed))
  }
  const parsed = Date.parse(trimmed)
  return Number.isNaN(parsed) ? null : parsed
}

function normalizeEpoch(value: number): number {
  // Anything below 1e12 is too small to be milliseconds since 2001.
  return Math.abs(value) < 1e12 ? Math.round(value * 1000) : Math.round(value)
}

function decodeLine(
  rawLine: string,
): { ok: true; entry: SessionLine } | { ok: false; reason: string } {
  let value: unknown
  try {
    value = JSON.parse(rawLine)
  } catch (error) {
    return { ok: false, reason: `invalid JSON (${describeError(error)})` }
  }
  if (!isPlainObject(value)) {
    return { ok: false, reason: 'expected a JSON object' }
  }
  const parsed = sessionLineSchema.safeParse(value)
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues[0]?.message ?? 'invalid record' }
  }
  return { ok: true, entry: parsed.data }
}

function expandLine(entry: SessionLine, context: LineContext): ExpandedLine {
  if (entry.isMeta) {
    return { records: [], ignored: true }
  }

  const kindName = resolveKindName(entry)
  const kind = aliasKind(kindName)
  const body = resolveBody(entry)

  switch (kind) {
    case 'user':
    case 'assistant':
      return expandMessage(kind, body, context)
    case 'tool-call': {
      const toolName = entry.tool_name ?? entry.name ?? 'unknown'
      const toolUseId = entry.tool_use_id ?? entry.id ?? null
      if (toolUseId) context.toolNames.set(toolUseId, toolName)
      return {
        records: [
          {
            kind: 'tool-call',
            line: context.line,
            timestamp: context.timestamp,
            toolName,
            toolUseId,
            input: flattenToolInput(toolName, entry.tool_input ?? entry.input),
          },
        ],
        ignored: false,
      }
    }
    case 'tool-result': {
      const toolUseId = entry.tool_use_id ?? entry.id ?? null
      const output = entry.tool_output ?? entry.output ?? body
      return {
        records: [
          {
            kind: 'tool-result',
            line: context.line,
            timestamp: context.timestamp,
            toolName:
              entry.tool_name ??
              entry.name ??
              (toolUseId ? (context.toolNames.get(toolUseId) ?? null) : null),
            toolUseId,
            output: flattenContent(output),
            isError: entry.is_error ?? false,
          },
        ],
        ignored: false,
      }
    }
    default:
      return {
        records: [
          {
            kind: 'other',
            line: context.line,
            timestamp: context.timestamp,
            label: kindName,
            text: flattenContent(body) || (entry.summary ?? ''),
          },
        ],
        ignored: false,
      }
  }
}

function resolveKindName(entry: SessionLine): string {
  const declared = entry.type?.trim()
  if (declared && aliasKind(declared)) return declared
  const nestedRole = readMessageRole(entry.message)
  if (nestedRole && aliasKind(nestedRole)) return nestedRole
  const role = entry.role?.trim()
  if (role && aliasKind(role)) return role
  return declared || role || 'unknown'
}

function aliasKind(name: string): RecordKind | null {
  return Object.hasOwn(KIND_ALIASES, name) ? KIND_ALIASES[name] : null
}

function readMessageRole(message: unknown): string | null {
  if (!isPlainObject(message)) return null
  return typeof message.role === 'string' ? message.role : null
}

function resolveBody(entry: SessionLine): unknown {
  const message = entry.message
  if (isPlainObject(message)) {
    return message.content
  }
  return message ?? entry.content
}

function expandMessage(
  kind: 'user' | 'assistant',
  body: unknown,
  context: LineContext,
): ExpandedLine {
  const records: RawRecord[] = []
  let ignored = false
  let texts: string[] = []

  const flushText = (force: boolean) => {
    if (texts.length === 0 && !force) return
    const text = texts.join('\n')
    texts = []
    if (kind === 'user' && isCommandMarkup(text)) {
      ignored = true
      return
    }
    records.push({ kind, line: context.line, timestamp: context.timestamp, text })
  }

  if (!Array.isArray(body)) {
    texts.push(typeof body === 'string' ? body : stringifyValue(body))
    flushText(true)
    return { records, ignored }
  }

  for (const item of body) {
    if (typeof item === 'string') {
      texts.push(item)
      continue
    }
    const parsed = contentBlockSchema.safeParse(item)
    if (!parsed.success) continue
    const block = parsed.data
    if (block.type === 'text') {
      const text = block.text ?? (typeof block.content === 'string' ? block.content : '')
      if (text) texts.push(text)
      continue
    }
    if (block.type === 'tool_use') {
      flushText(false)
      records.push(toolCallFromBlock(block, context))
      continue
    }
    if (block.type === 'tool_result') {
      flushText(false)
      records.push(toolResultFromBlock(block, context))
    }
  }
  flushText(false)

  return { records, ignored }
}

function toolCallFromBlock(block: ContentBlock, context: LineContext): ToolCallRecord {
  const toolName = block.name ?? 'unknown'
  const toolUseId = block.id ?? null
  if (toolUseId) context.toolNames.set(toolUseId, toolName)
  return {
    kind: 'tool-call',
    line: context.line,
    timestamp: context.timestamp,
    toolName,
    toolUseId,
    input: flattenToolInput(toolName, block.input),
  }
}

function toolResultFromBlock(
  block: ContentBlock,
  context: LineContext,
): ToolResultRecord {
  const toolUseId = block.tool_use_id ?? null
  return {
    kind: 'tool-result',
    line: context.line,
    timestamp: context.timestamp,
    toolName: toolUseId ? (context.toolNames.get(toolUseId) ?? null) : null,
    toolUseId,
    output: flattenContent(block.content),
    isError: block.is_error ?? false,
  }
}

export function flattenContent(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (!Array.isArray(value)) return stringifyValue(value)
  return value
    .map((item) => {
      if (typeof item === 'string') return item
      const parsed = contentBlockSchema.safeParse(item)
      if (!parsed.success) return ''
      if (parsed.data.type === 'text') return parsed.data.text ?? ''
      return ''
    })
    .filter((text) => text.length > 0)
    .join('\n')
}

function isCommandMarkup(text: string): boolean {
  const trimmed = text.trimStart()
  return COMMAND_MARKUP_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim() ? value : null
}
