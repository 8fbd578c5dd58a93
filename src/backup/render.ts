import { serializeFrontmatter } from '../utils/frontmatter'
import { getLabels, type DocumentLabels, type Language } from './labels'
import type { AssistantTurn, ToolNote, Turn, UserTurn } from './normalize'
import { formatDateTime, formatTime, toIso } from './time'
import { TOOL_ICONS, type ToolIconMap } from './tools'

export const DEFAULT_MAX_TEXT_LENGTH = 10_000

const SEPARATOR = '---'

export type SessionDocumentMeta = {
  projectName: string
  sessionId: string
  startedAt: number | null
  title?: string | null
}

export type RenderOptions = {
  language?: Language
  icons?: ToolIconMap
  timeZone?: string
  maxTextLength?: number
}

type ResolvedRenderOptions = {
  labels: DocumentLabels
  icons: ToolIconMap
  timeZone?: string
  maxTextLength: number
}

export function renderSessionDocument(
  meta: SessionDocumentMeta,
  turns: Turn[],
  options: RenderOptions = {},
): string {
  const resolved: ResolvedRenderOptions = {
    labels: getLabels(options.language ?? 'en'),
    icons: options.icons ?? TOOL_ICONS,
    timeZone: options.timeZone,
    maxTextLength: options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH,
  }

  const blocks = [
    renderHeader(meta, resolved),
    ...turns.map((turn) =>
      turn.kind === 'user'
        ? renderUserTurn(turn, resolved)
        : renderAssistantTurn(turn, resolved),
    ),
  ]

  return blocks.join(`\n\n${SEPARATOR}\n\n`) + '\n'
}

export function abbreviateSessionId(sessionId: string): string {
  return `${sessionId.slice(0, 8)}...`
}

export function renderToolNote(note: ToolNote, icons: ToolIconMap = TOOL_ICONS): string {
  const label = note.preview
    ? `${icons[note.category]} ${note.label}: ${note.preview}`
    : `${icons[note.category]} ${note.label}`
  return formatInlineCode(label)
}

function renderHeader(meta: SessionDocumentMeta, options: ResolvedRenderOptions): string {
  const { labels } = options
  const frontmatter = serializeFrontmatter({
    session_id: meta.sessionId,
    project: meta.projectName,
    title: meta.title ?? null,
    started_at: toIso(meta.startedAt),
  })

  const lines = [frontmatter, '', `# ${meta.projectName}`, '']
  lines.push(`> ${labels.session}: \`${abbreviateSessionId(meta.sessionId)}\``)
  if (meta.startedAt !== null) {
    lines.push(`> ${labels.started}: ${formatDateTime(meta.startedAt, options.timeZone)}`)
  }
  return lines.join('\n')
}

function renderUserTurn(turn: UserTurn, options: ResolvedRenderOptions): string {
  const heading = buildHeading('🧑', options.labels.user, turn.timestamp, options)
  const body = limitText(turn.text.trim(), options.maxTextLength, `\n\n${options.labels.truncated}`)
  const quoted = body
    .split('\n')
    .map((line) => (line ? `> ${line}` : '>'))
    .join('\n')
  return `${heading}\n\n${quoted}`
}

function renderAssistantTurn(
  turn: AssistantTurn,
  options: ResolvedRenderOptions,
): string {
  const heading = buildHeading('🤖', options.labels.assistant, turn.timestamp, options)
  const sections = [heading]
  if (turn.text) {
    sections.push(
      limitText(turn.text, options.maxTextLength, `\n\n> ${options.labels.truncated}`),
    )
  }
  if (turn.notes.length > 0) {
    sections.push(turn.notes.map((note) => renderToolNote(note, options.icons)).join('\n'))
  }
  return sections.join('\n\n')
}

function buildHeading(
  icon: string,
  label: string,
  timestamp: number | null,
  options: ResolvedRenderOptions,
): string {
  if (timestamp === null) return `## ${icon} ${label}`
  return `## ${icon} ${label} (${formatTime(timestamp, options.timeZone)})`
}

function limitText(text: string, maxLength: number, suffix: string): string {
  if (text.length <= maxLength) return text
  const chars = Array.from(text)
  if (chars.length <= maxLength) return text
  return chars.slice(0, maxLength).join('').trimEnd() + suffix
}

function formatInlineCode(text: string): string {
  if (!text.includes('`')) return `\`${text}\``
  return `\`\` ${text} \`\``
}
