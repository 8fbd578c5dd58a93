/**
 * `_INDEX.md` (one per project) and `_SUMMARY.md` (one per backup root).
 */
import { getLabels, type Language } from './labels'
import { fileStem, INDEX_FILE, readFileDate } from './layout'
import { listSessionDocuments, type BackupDestination } from './store'
import { formatDateTime } from './time'

export type BackupIndexEntry = {
  title: string
  fileName: string
  date: string
}

export type ProjectSummaryRow = {
  project: string
  sessions: number
  lastBackup: string | null
}

const WIKILINK = /\[\[([^\]|]+)(?:\|[^\]]*)?\]\]/g

export function parseIndexLinks(content: string): string[] {
  const links: string[] = []
  for (const match of content.matchAll(WIKILINK)) {
    const target = match[1].trim()
    if (target) links.push(target)
  }
  return links
}

/**
 * Merges link targets, dropping duplicates, newest first. File stems start
 * with `YYYY-MM-DD_`, so a descending sort is chronological.
 */
export function mergeIndexLinks(existing: string[], added: string[]): string[] {
  return [...new Set([...existing, ...added])].sort((left, right) =>
    left < right ? 1 : left > right ? -1 : 0,
  )
}

export function buildProjectIndex(
  project: string,
  links: string[],
  language: Language,
): string {
  const labels = getLabels(language)
  const lines = [
    `# ${project}`,
    '',
    `**${labels.indexSessions}:** ${links.length}`,
    '',
    `## ${labels.indexSessionList}`,
    '',
    ...links.map((link) => `- [[${link}]]`),
  ]
  return lines.join('\n') + '\n'
}

/**
 * Rebuilds a project's `_INDEX.md` from the session documents on disk,
 * keeping links already in the index when `merge` is set. The file is only
 * written when its content changes.
 */
export function updateProjectIndex(
  destination: BackupDestination,
  project: string,
  options: { language: Language; merge: boolean },
): { links: string[]; written: boolean } {
  const documents = listSessionDocuments(destination, project).map(fileStem)
  const current = destination.readProjectFile(project, INDEX_FILE)
  const existing = options.merge && current ? parseIndexLinks(current) : []
  const links = mergeIndexLinks(existing, documents)
  if (links.length === 0) return { links, written: false }

  const content = buildProjectIndex(project, links, options.language)
  if (content === current) return { links, written: false }
  destination.writeProjectFile(project, INDEX_FILE, content)
  return { links, written: true }
}

export function collectProjectSummaries(
  destination: BackupDestination,
): ProjectSummaryRow[] {
  return destination
    .listProjects()
    .map((project) => {
      const documents = listSessionDocuments(destination, project)
      const dates = documents
        .map((fileName) => readFileDate(fileName))
        .filter((date): date is string => date !== null)
        .sort()
      return {
        project,
        sessions: documents.length,
        lastBackup: dates.length > 0 ? dates[dates.length - 1] : null,
      }
    })
    .filter((row) => row.sessions > 0)
    .sort((left, right) =>
      right.sessions !== left.sessions
        ? right.sessions - left.sessions
        : left.project.localeCompare(right.project),
    )
}

export function buildSummary(
  rows: ProjectSummaryRow[],
  options: { language: Language; generatedAt: number; timeZone?: string },
): string {
  const labels = getLabels(options.language)
  const totalSessions = rows.reduce((sum, row) => sum + row.sessions, 0)
  const lines = [
    `# ${labels.summaryTitle}`,
    '',
    `**${labels.summaryGenerated}:** ${formatDateTime(options.generatedAt, options.timeZone)}`,
    `**${labels.summaryProjects}:** ${rows.length} | **${labels.summarySessions}:** ${totalSessions}`,
    '',
    `| ${labels.summaryProjectColumn} | ${labels.summarySessionsColumn} | ${labels.summaryLastBackupColumn} |`,
    '|---|---|---|',
    ...rows.map(
      (row) =>
        `| [[${row.project}/_INDEX\\|${row.project}]] | ${row.sessions} | ${row.lastBackup ?? '-'} |`,
    ),
  ]
  return lines.join('\n') + '\n'
}
