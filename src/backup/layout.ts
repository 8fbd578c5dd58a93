import { basename } from 'node:path'

export const INDEX_FILE = '_INDEX.md'
export const SUMMARY_FILE = '_SUMMARY.md'
export const FALLBACK_PROJECT = '00-misc'

const MAX_PROJECT_NAME_LENGTH = 60
const NUMBERED_FOLDER = /^\d{2,3}\s*-/
const SESSION_FILE_DATE = /^(\d{4}-\d{2}-\d{2})_/

/**
 * Picks a project name from a working directory: the nearest numbered folder
 * ("017 - my-project"), otherwise the deepest folder that is not a common
 * system folder.
 */
export function resolveProjectName(cwd: string | null, homeName: string): string {
  if (!cwd) return FALLBACK_PROJECT
  const parts = cwd
    .split(/[/\\]+/)
    .filter((part) => part.length > 0)
    .reverse()

  const skip = new Set(['Users', 'home', homeName, 'Documents', 'Desktop'])
  const candidate =
    parts.find((part) => NUMBERED_FOLDER.test(part)) ??
    parts.find(
      (part) =>
        !skip.has(part) && !/^[A-Za-z]:$/.test(part) && sanitizeProjectName(part).length > 0,
    )

  return candidate ? sanitizeProjectName(candidate) : FALLBACK_PROJECT
}

/** Project folders never start with `.` or `_`; those are not listed as projects. */
export function sanitizeProjectName(name: string): string {
  return name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '')
    .replace(/^[\s._]+/, '')
    .slice(0, MAX_PROJECT_NAME_LENGTH)
    .trim()
}

export function buildSessionFileName(date: string, title: string, attempt = 1): string {
  const suffix = attempt > 1 ? `_${attempt}` : ''
  return `${date}_${title}${suffix}.md`
}

/**
 * First `YYYY-MM-DD_<title>[_n].md` name not in `taken`. A name already owned
 * by the same session (`ownName`) is reused.
 */
export function resolveUniqueFileName(
  date: string,
  title: string,
  taken: ReadonlySet<string>,
  ownName: string | null = null,
): string {
  for (let attempt = 1; ; attempt += 1) {
    const candidate = buildSessionFileName(date, title, attempt)
    if (candidate === ownName || !taken.has(candidate)) return candidate
  }
}

export function fileStem(fileName: string): string {
  return fileName.replace(/\.md$/, '')
}

export function readFileDate(fileName: string): string | null {
  return SESSION_FILE_DATE.exec(basename(fileName))?.[1] ?? null
}

export function isSessionDocumentName(fileName: string): boolean {
  return fileName.endsWith('.md') && !fileName.startsWith('_') && !fileName.startsWith('.')
}
