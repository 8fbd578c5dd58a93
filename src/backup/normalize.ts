import type { RawRecord, ToolResultRecord } from './records'
import {
  categorizeTool,
  DEFAULT_PREVIEW_LENGTH,
  truncatePreview,
  type ToolCategory,
} from './tools'

export type ToolNote = {
  origin: 'tool' | 'record'
  category: ToolCategory
  label: string
  preview: string
  toolUseId: string | null
  results: number
}

export type UserTurn = {
  kind: 'user'
  timestamp: number | null
  text: string
}

export type AssistantTurn = {
  kind: 'assistant'
  timestamp: number | null
  text: string
  notes: ToolNote[]
}

export type Turn = UserTurn | AssistantTurn

export type NormalizeOptions = {
  previewLength?: number
}

/**
 * Folds an ordered record stream into display turns.
 *
 * Assistant text, tool calls, tool results and unknown records that arrive
 * between two user messages all land in a single assistant turn.
 */
export function normalizeConversation(
  records: RawRecord[],
  options: NormalizeOptions = {},
): Turn[] {
  const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH
  const turns: Turn[] = []
  let open: AssistantTurn | null = null

  const ensureOpen = (timestamp: number | null): AssistantTurn => {
    if (!open) {
      open = { kind: 'assistant', timestamp, text: '', notes: [] }
    } else if (open.timestamp === null && timestamp !== null) {
      open.timestamp = timestamp
    }
    return open
  }

  const flush = () => {
    if (open) {
      turns.push(open)
      open = null
    }
  }

  for (const record of records) {
    switch (record.kind) {
      case 'user': {
        if (!record.text.trim()) break
        flush()
        turns.push({ kind: 'user', timestamp: record.timestamp, text: record.text })
        break
      }
      case 'assistant': {
        const text = record.text.trim()
        if (!text) break
        const turn = ensureOpen(record.timestamp)
        turn.text = turn.text ? `${turn.text}\n\n${text}` : text
        break
      }
      case 'tool-call': {
        ensureOpen(record.timestamp).notes.push({
          origin: 'tool',
          category: categorizeTool(record.toolName),
          label: record.toolName,
          preview: truncatePreview(record.input, previewLength),
          toolUseId: record.toolUseId,
          results: 0,
        })
        break
      }
      case 'tool-result': {
        const turn = ensureOpen(record.timestamp)
        const target = findResultTarget(turn.notes, record)
        if (target) {
          target.results += 1
          break
        }
        const label = record.toolName ?? 'Result'
        turn.notes.push({
          origin: 'tool',
          category: record.toolName ? categorizeTool(record.toolName) : 'other',
          label,
          preview: truncatePreview(record.output, previewLength),
          toolUseId: record.toolUseId,
          results: 1,
        })
        break
      }
      case 'other': {
        ensureOpen(record.timestamp).notes.push({
          origin: 'record',
          category: 'other',
          label: record.label,
          preview: truncatePreview(record.text, previewLength),
          toolUseId: null,
          results: 0,
        })
        break
      }
    }
  }

  flush()
  return turns
}

function findResultTarget(
  notes: ToolNote[],
  record: ToolResultRecord,
): ToolNote | null {
  for (let index = notes.length - 1; index >= 0; index -= 1) {
    const note = notes[index]
    if (note.origin !== 'tool') continue
    if (record.toolUseId && note.toolUseId) {
      if (note.toolUseId === record.toolUseId) return note
      continue
    }
    if (!record.toolName || note.label === record.toolName) return note
  }
  return null
}
