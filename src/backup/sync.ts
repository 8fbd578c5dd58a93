import { describeError, type BackupErrorCode } from './errors'
import type { Language } from './labels'
import {
  FALLBACK_PROJECT,
  resolveUniqueFileName,
  sanitizeProjectName,
  SUMMARY_FILE,
} from './layout'
import { normalizeConversation } from './normalize'
import {
  buildSummary,
  collectProjectSummaries,
  updateProjectIndex,
  type BackupIndexEntry,
} from './project-index'
import { parseSessionRecords, type RawRecord } from './records'
import { renderSessionDocument } from './render'
import { findBackedUpFile, scanBackupState, type ProjectBackupState } from './state'
import type { BackupDestination, SourceSession } from './store'
import { formatDate } from './time'
import { deriveTitle } from './title'

export type BackupMode = 'incremental' | 'full'

export type SessionAction = 'write' | 'skip' | 'rewrite'

export type BackupRunOptions = {
  sessions: Iterable<SourceSession>
  destination: BackupDestination
  mode: BackupMode
  language: Language
  now?: number
  timeZone?: string
  previewLength?: number
  titleLength?: number
  maxTextLength?: number
}

export type BackupFailure = {
  project: string | null
  sessionId: string | null
  code: BackupErrorCode
  message: string
}

export type BackupRunResult = {
  mode: BackupMode
  outputPath: string
  processed: number
  skipped: number
  failed: number
  empty: number
  projects: number
  malformedLines: number
  written: string[]
  failures: BackupFailure[]
  warnings: string[]
}

type PreparedSession = {
  source: SourceSession
  project: string
  records: RawRecord[]
  startedAt: number
}

type RunCounters = Omit<BackupRunResult, 'mode' | 'outputPath'>

/** `unseen` sessions are written; `seen` ones are skipped, or rewritten in full mode. */
export function decideSessionAction(backedUp: boolean, mode: BackupMode): SessionAction {
  if (!backedUp) return 'write'
  return mode === 'full' ? 'rewrite' : 'skip'
}

export function runBackup(options: BackupRunOptions): BackupRunResult {
  const { destination, mode, language } = options
  const counters: RunCounters = {
    processed: 0,
    skipped: 0,
    failed: 0,
    empty: 0,
    projects: 0,
    malformedLines: 0,
    written: [],
    failures: [],
    warnings: [],
  }

  const state = scanBackupState(destination)
  const grouped = groupByProject(prepareSessions(options.sessions, counters))

  for (const [project, sessions] of grouped) {
    const entries = backupProject(project, sessions, state.get(project), options, counters)
    if (entries.length > 0) counters.projects += 1
  }

  // Every project on disk, so an index lost in an earlier run is rebuilt.
  for (const project of destination.listProjects()) {
    try {
      updateProjectIndex(destination, project, {
        language,
        merge: mode === 'incremental',
      })
    } catch (error) {
      counters.failures.push({
        project,
        sessionId: null,
        code: 'DESTINATION_WRITE_ERROR',
        message: `Failed to write index: ${describeError(error)}`,
      })
    }
  }

  try {
    const summary = buildSummary(collectProjectSummaries(destination), {
      language,
      generatedAt: options.now ?? Date.now(),
      timeZone: options.timeZone,
    })
    destination.writeRootFile(SUMMARY_FILE, summary)
  } catch (error) {
    counters.failures.push({
      project: null,
      sessionId: null,
      code: 'DESTINATION_WRITE_ERROR',
      message: `Failed to write summary: ${describeError(error)}`,
    })
  }

  return { mode, outputPath: destination.root, ...counters }
}

function prepareSessions(
  sessions: Iterable<SourceSession>,
  counters: RunCounters,
): PreparedSession[] {
  const prepared: PreparedSession[] = []
  for (const source of sessions) {
    const project = sanitizeProjectName(source.project) || FALLBACK_PROJECT
    try {
      const parsed = parseSessionRecords(source.content)
      counters.malformedLines += parsed.malformedLines
      for (const warning of parsed.warnings) {
        counters.warnings.push(`${project}/${source.sessionId}: ${warning.message}`)
      }
      if (parsed.records.length === 0) {
        counters.empty += 1
        continue
      }
      const firstTimestamp = parsed.records.find((record) => record.timestamp !== null)
      prepared.push({
        source,
        project,
        records: parsed.records,
        startedAt: firstTimestamp?.timestamp ?? source.modifiedAt,
      })
    } catch (error) {
      recordSessionFailure(counters, project, source, 'SESSION_PROCESSING_FAILED', error)
    }
  }
  return prepared
}

function groupByProject(sessions: PreparedSession[]): Map<string, PreparedSession[]> {
  const grouped = new Map<string, PreparedSession[]>()
  const ordered = [...sessions].sort(
    (left, right) =>
      compareText(left.project, right.project) ||
      left.startedAt - right.startedAt ||
      compareText(left.source.sessionId, right.source.sessionId),
  )
  for (const session of ordered) {
    const bucket = grouped.get(session.project)
    if (bucket) {
      bucket.push(session)
    } else {
      grouped.set(session.project, [session])
    }
  }
  return grouped
}

function backupProject(
  project: string,
  sessions: PreparedSession[],
  projectState: ProjectBackupState | undefined,
  options: BackupRunOptions,
  counters: RunCounters,
): BackupIndexEntry[] {
  const { destination } = options
  const taken = new Set(projectState?.files ?? [])
  const entries: BackupIndexEntry[] = []

  for (const session of sessions) {
    const { source } = session
    const existingFile = findBackedUpFile(projectState, source.sessionId)
    const action = decideSessionAction(existingFile !== null, options.mode)
    if (action === 'skip') {
      counters.skipped += 1
      continue
    }

    let entry: BackupIndexEntry
    let document: string
    try {
      const turns = normalizeConversation(session.records, {
        previewLength: options.previewLength,
      })
      const firstUser = turns.find((turn) => turn.kind === 'user')
      const title = deriveTitle(firstUser?.text ?? null, source.sessionId, {
        maxLength: options.titleLength,
      })
      const date = formatDate(session.startedAt, options.timeZone)
      entry = {
        title,
        date,
        fileName: resolveUniqueFileName(date, title, taken, existingFile),
      }
      document = renderSessionDocument(
        {
          projectName: project,
          sessionId: source.sessionId,
          startedAt: session.startedAt,
          title,
        },
        turns,
        {
          language: options.language,
          timeZone: options.timeZone,
          maxTextLength: options.maxTextLength,
        },
      )
    } catch (error) {
      recordSessionFailure(counters, project, source, 'SESSION_PROCESSING_FAILED', error)
      continue
    }

    try {
      destination.writeProjectFile(project, entry.fileName, document)
      if (existingFile && existingFile !== entry.fileName) {
        destination.removeProjectFile(project, existingFile)
        taken.delete(existingFile)
      }
    } catch (error) {
      recordSessionFailure(counters, project, source, 'DESTINATION_WRITE_ERROR', error)
      continue
    }

    taken.add(entry.fileName)
    entries.push(entry)
    counters.processed += 1
    counters.written.push(`${project}/${entry.fileName}`)
  }

  return entries
}

function recordSessionFailure(
  counters: RunCounters,
  project: string,
  source: SourceSession,
  code: BackupErrorCode,
  error: unknown,
): void {
  counters.failed += 1
  counters.failures.push({
    project,
    sessionId: source.sessionId,
    code,
    message: describeError(error),
  })
}

function compareText(left: string, right: string): number {
  if (left === right) return 0
  return left < right ? -1 : 1
}
