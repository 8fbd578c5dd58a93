import { describe, expect, test } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { isBackupError } from '../src/backup/errors'
import {
  readFileDate,
  isSessionDocumentName,
  resolveProjectName,
  resolveUniqueFileName,
} from '../src/backup/layout'
import { findBackedUpFile, readDocumentSessionId, scanBackupState } from '../src/backup/state'
import {
  createDirectoryDestination,
  listSessionDocuments,
  listSourceSessions,
} from '../src/backup/store'

function withTempDir(run: (root: string) => void): void {
  const root = mkdtempSync(join(tmpdir(), 'convo-backup-store-'))
  try {
    run(root)
  } finally {
    rmSync(root, { recursive: true, force: true })
  }
}

describe('listSourceSessions', () => {
  test('fails with SOURCE_UNAVAILABLE when the directory is missing', () => {
    withTempDir((root) => {
      let caught: unknown = null
      try {
        listSourceSessions(join(root, 'missing'))
      } catch (error) {
        caught = error
      }
      expect(isBackupError(caught) ? caught.code : null).toBe('SOURCE_UNAVAILABLE')
    })
  })

  test('lists session logs with their project and id', () => {
    withTempDir((root) => {
      const dir = join(root, '-Users-me-code-webapp')
      mkdirSync(dir, { recursive: true })
      writeFileSync(
        join(dir, 's1.jsonl'),
        JSON.stringify({ type: 'user', cwd: '/Users/me/code/webapp', message: 'hi' }),
        'utf-8',
      )
      writeFileSync(join(dir, 's2.jsonl'), '{}', 'utf-8')
      writeFileSync(join(dir, 's3.jsonl'), JSON.stringify({ type: 'user', message: 'hello there' }), 'utf-8')
      writeFileSync(join(dir, 'notes.txt'), 'not a session', 'utf-8')

      const sessions = listSourceSessions(root, { minBytes: 10, homeName: 'me' })

      expect(sessions.map((session) => [session.project, session.sessionId])).toEqual([
        ['webapp', 's1'],
        ['00-misc', 's3'],
      ])
      expect(sessions[0]?.sourcePath).toBe(join(dir, 's1.jsonl'))
    })
  })
})

describe('resolveProjectName', () => {
  const cases: Array<[string | null, string]> = [
    ['/Users/me/work/017 - shop/src', '017 - shop'],
    ['/Users/me/Documents/notes', 'notes'],
    ['/home/me/code/api/', 'api'],
    ['C:\\Users\\me\\proj', 'proj'],
    ['/Users/me/.claude', 'claude'],
    ['/srv/_build', 'build'],
    ['/home/me/code/...', 'code'],
    ['/home/me', '00-misc'],
    ['C:\\Users\\me', '00-misc'],
    [null, '00-misc'],
  ]

  test.each(cases)('%j resolves to %j', (cwd, expected) => {
    expect(resolveProjectName(cwd, 'me')).toBe(expected)
  })
})

describe('file names', () => {
  test('picks the first free suffix and keeps a name the session already owns', () => {
    const taken = new Set(['2025-03-01_Fix.md', '2025-03-01_Fix_2.md'])
    expect(resolveUniqueFileName('2025-03-01', 'Fix', taken)).toBe('2025-03-01_Fix_3.md')
    expect(resolveUniqueFileName('2025-03-01', 'Fix', taken, '2025-03-01_Fix_2.md')).toBe(
      '2025-03-01_Fix_2.md',
    )
    expect(resolveUniqueFileName('2025-03-02', 'Fix', taken)).toBe('2025-03-02_Fix.md')
  })

  test('reads the date prefix and recognises session documents', () => {
    expect(readFileDate('2025-03-01_Fix.md')).toBe('2025-03-01')
    expect(readFileDate('notes.md')).toBeNull()
    expect(isSessionDocumentName('2025-03-01_Fix.md')).toBe(true)
    expect(isSessionDocumentName('_INDEX.md')).toBe(false)
    expect(isSessionDocumentName('.draft.md')).toBe(false)
    expect(isSessionDocumentName('2025-03-01_Fix.txt')).toBe(false)
  })
})

describe('createDirectoryDestination', () => {
  test('lists project folders and their session documents', () => {
    withTempDir((root) => {
      const destination = createDirectoryDestination(root)
      destination.writeProjectFile('webapp', '2025-03-01_Fix.md', '# webapp\n')
      destination.writeProjectFile('webapp', '_INDEX.md', '# webapp\n')
      mkdirSync(join(root, '_archive'))
      mkdirSync(join(root, '.obsidian'))
      destination.writeRootFile('_SUMMARY.md', '# summary\n')

      expect(destination.listProjects()).toEqual(['webapp'])
      expect(listSessionDocuments(destination, 'webapp')).toEqual(['2025-03-01_Fix.md'])
      expect(destination.readProjectFile('webapp', 'missing.md')).toBeNull()

      destination.removeProjectFile('webapp', '2025-03-01_Fix.md')
      expect(destination.listProjectFiles('webapp')).toEqual(['_INDEX.md'])
    })
  })

  test('treats a missing root as empty', () => {
    withTempDir((root) => {
      const destination = createDirectoryDestination(join(root, 'not-yet'))
      expect(destination.listProjects()).toEqual([])
      expect(destination.listProjectFiles('webapp')).toEqual([])
    })
  })
})

describe('backup state', () => {
  test('reads the session id from document frontmatter', () => {
    expect(readDocumentSessionId('---\nsession_id: "0123"\n---\n\n# p\n')).toBe('0123')
    expect(readDocumentSessionId('# p\n\n> Session: `01234567...`\n')).toBeNull()
  })

  test('finds documents by full id or by abbreviated id', () => {
    withTempDir((root) => {
      const destination = createDirectoryDestination(root)
      destination.writeProjectFile(
        'webapp',
        '2025-03-01_New.md',
        '---\nsession_id: "session-new"\n---\n\n# webapp\n',
      )
      destination.writeProjectFile(
        'webapp',
        '2024-01-01_Old.md',
        '# webapp\n\n> Session: `abcdef12...`\n',
      )

      const state = scanBackupState(destination).get('webapp')

      expect(findBackedUpFile(state, 'session-new')).toBe('2025-03-01_New.md')
      expect(findBackedUpFile(state, 'abcdef12-3456-7890')).toBe('2024-01-01_Old.md')
      expect(findBackedUpFile(state, 'unknown-session')).toBeNull()
      expect(findBackedUpFile(undefined, 'session-new')).toBeNull()
    })
  })
})
