import { describe, expect, test } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'

import { defaultBackupConfig, loadBackupConfig, normalizeConfig } from '../src/backup/config'

function withTempDir(run: (root: string) => void): void {
  const root = mkdtempSync(join(tmpdir(), 'convo-backup-config-'))
  try {
    run(root)
  } finally {
    rmSync(root, { recursive: true, force: true })
  }
}

describe('loadBackupConfig', () => {
  test('falls back to defaults when the file is missing', () => {
    withTempDir((root) => {
      const loaded = loadBackupConfig(join(root, 'config.yml'))

      expect(loaded.found).toBe(false)
      expect(loaded.warning).toBeNull()
      expect(loaded.config).toEqual(defaultBackupConfig())
    })
  })

  test('reads and normalizes YAML values', () => {
    withTempDir((root) => {
      const filePath = join(root, 'config.yml')
      writeFileSync(
        filePath,
        [
          'output_path: ~/notes/backup',
          'language: ko',
          'source_path: /data/sessions',
          'min_session_bytes: 1000',
          'preview_length: 80',
          'title_length: 0',
        ].join('\n'),
        'utf-8',
      )

      const loaded = loadBackupConfig(filePath)

      expect(loaded.found).toBe(true)
      expect(loaded.config).toEqual({
        output_path: join(homedir(), 'notes/backup'),
        language: 'ko',
        source_path: '/data/sessions',
        min_session_bytes: 1000,
        preview_length: 80,
        title_length: 50,
      })
    })
  })

  test('warns and keeps defaults when the YAML cannot be parsed', () => {
    withTempDir((root) => {
      const filePath = join(root, 'config.yml')
      writeFileSync(filePath, 'output_path: [unclosed\n', 'utf-8')

      const loaded = loadBackupConfig(filePath)

      expect(loaded.config).toEqual(defaultBackupConfig())
      expect(loaded.warning?.startsWith(`Ignoring unreadable config ${filePath}:`)).toBe(true)
    })
  })

  test('ignores a document that is not a mapping', () => {
    withTempDir((root) => {
      const filePath = join(root, 'config.yml')
      writeFileSync(filePath, '- one\n- two\n', 'utf-8')

      const loaded = loadBackupConfig(filePath)

      expect(loaded.config).toEqual(defaultBackupConfig())
      expect(loaded.warning).toBeNull()
    })
  })
})

describe('normalizeConfig', () => {
  test('keeps defaults for values of the wrong type', () => {
    const defaults = defaultBackupConfig()
    expect(
      normalizeConfig(
        {
          output_path: 42,
          language: 'fr',
          min_session_bytes: -1,
          preview_length: 'long',
        },
        defaults,
      ),
    ).toEqual(defaults)
  })
})
