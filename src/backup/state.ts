import { parseFrontmatter } from '../utils/frontmatter'
import { listSessionDocuments, type BackupDestination } from './store'

export type ProjectBackupState = {
  /** Full session id → document file name. */
  sessions: Map<string, string>
  /** Abbreviated ids from documents that carry no frontmatter. */
  prefixes: Map<string, string>
  files: string[]
}

export type BackupState = Map<string, ProjectBackupState>

const ABBREVIATED_SESSION_LINE = /^>\s*[^:\n]+:\s*`([^`.]{8})\.\.\.`/m

export function scanBackupState(destination: BackupDestination): BackupState {
  const state: BackupState = new Map()
  for (const project of destination.listProjects()) {
    state.set(project, scanProjectState(destination, project))
  }
  return state
}

export function scanProjectState(
  destination: BackupDestination,
  project: string,
): ProjectBackupState {
  const sessions = new Map<string, string>()
  const prefixes = new Map<string, string>()
  const files = listSessionDocuments(destination, project)

  for (const fileName of files) {
    const content = destination.readProjectFile(project, fileName)
    if (content === null) continue
    const sessionId = readDocumentSessionId(content)
    if (sessionId) {
      if (!sessions.has(sessionId)) sessions.set(sessionId, fileName)
      continue
    }
    const prefix = ABBREVIATED_SESSION_LINE.exec(content)?.[1]
    if (prefix && !prefixes.has(prefix)) prefixes.set(prefix, fileName)
  }

  return { sessions, prefixes, files }
}

export function readDocumentSessionId(content: string): string | null {
  const { frontmatter, hasFrontmatter } = parseFrontmatter(content)
  if (!hasFrontmatter) return null
  const value = frontmatter.session_id
  if (typeof value === 'string' && value.trim()) return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return null
}

/** The document file that already backs up `sessionId`, if any. */
export function findBackedUpFile(
  projectState: ProjectBackupState | undefined,
  sessionId: string,
): string | null {
  if (!projectState) return null
  return (
    projectState.sessions.get(sessionId) ??
    projectState.prefixes.get(sessionId.slice(0, 8)) ??
    null
  )
}
