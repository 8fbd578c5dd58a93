import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs'
import { homedir } from 'node:os'
import { basename, join } from 'node:path'
import { BackupError } from './errors'
import { isSessionDocumentName, resolveProjectName } from './layout'
import { readSessionCwd } from './records'

export type SourceSession = {
  project: string
  sessionId: string
  modifiedAt: number
  content: string
  sourcePath: string
}

export type ListSourceOptions = {
  minBytes?: number
  homeName?: string
}

/** Write side of a backup: one directory per project plus root-level files. */
export interface BackupDestination {
  readonly root: string
  listProjects(): string[]
  listProjectFiles(project: string): string[]
  readProjectFile(project: string, fileName: string): string | null
  writeProjectFile(project: string, fileName: string, content: string): void
  removeProjectFile(project: string, fileName: string): void
  writeRootFile(fileName: string, content: string): void
}

export function listSourceSessions(
  sourceRoot: string,
  options: ListSourceOptions = {},
): SourceSession[] {
  if (!existsSync(sourceRoot) || !statSync(sourceRoot).isDirectory()) {
    throw new BackupError(
      'SOURCE_UNAVAILABLE',
      `Session source directory not found: ${sourceRoot}`,
      ['Pass --source <path> or set source_path in the config file.'],
    )
  }

  const minBytes = options.minBytes ?? 0
  const homeName = options.homeName ?? basename(homedir())
  const sessions: SourceSession[] = []

  const projectDirs = readdirSync(sourceRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()

  for (const projectDir of projectDirs) {
    const dirPath = join(sourceRoot, projectDir)
    const files = readdirSync(dirPath)
      .filter((fileName) => fileName.endsWith('.jsonl'))
      .sort()
    for (const fileName of files) {
      const sourcePath = join(dirPath, fileName)
      const stat = statSync(sourcePath)
      if (!stat.isFile() || stat.size < minBytes) continue
      const content = readFileSync(sourcePath, 'utf-8')
      sessions.push({
        project: resolveProjectName(readSessionCwd(content), homeName),
        sessionId: fileName.replace(/\.jsonl$/, ''),
        modifiedAt: stat.mtimeMs,
        content,
        sourcePath,
      })
    }
  }

  return sessions
}

export function createDirectoryDestination(root: string): BackupDestination {
  const projectDir = (project: string) => join(root, project)

  return {
    root,
    listProjects: () => {
      if (!existsSync(root)) return []
      return readdirSync(root, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .filter((name) => !name.startsWith('_') && !name.startsWith('.'))
        .sort()
    },
    listProjectFiles: (project) => {
      const dir = projectDir(project)
      if (!existsSync(dir)) return []
      return readdirSync(dir)
        .filter((fileName) => fileName.endsWith('.md'))
        .sort()
    },
    readProjectFile: (project, fileName) => {
      const filePath = join(projectDir(project), fileName)
      if (!existsSync(filePath)) return null
      return readFileSync(filePath, 'utf-8')
    },
    writeProjectFile: (project, fileName, content) => {
      mkdirSync(projectDir(project), { recursive: true })
      writeFileSync(join(projectDir(project), fileName), content, 'utf-8')
    },
    removeProjectFile: (project, fileName) => {
      const filePath = join(projectDir(project), fileName)
      if (existsSync(filePath)) unlinkSync(filePath)
    },
    writeRootFile: (fileName, content) => {
      mkdirSync(root, { recursive: true })
      writeFileSync(join(root, fileName), content, 'utf-8')
    },
  }
}

export function listSessionDocuments(
  destination: BackupDestination,
  project: string,
): string[] {
  return destination.listProjectFiles(project).filter(isSessionDocumentName)
}
