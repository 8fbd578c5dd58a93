import { BackupError } from '../../backup/errors'
import { isLanguage, LANGUAGES, type Language } from '../../backup/labels'
import type { BackupMode } from '../../backup/sync'

export function parseLanguage(value: string): Language {
  const normalized = value.trim().toLowerCase()
  if (isLanguage(normalized)) return normalized
  throw new BackupError(
    'INVALID_OPTION',
    `Invalid language: ${value}. Use: ${LANGUAGES.join(', ')}.`,
  )
}

export function resolveMode(options: { incremental?: boolean; full?: boolean }): BackupMode {
  if (options.full && options.incremental) {
    throw new BackupError(
      'INVALID_OPTION',
      'Choose either --incremental or --full, not both.',
    )
  }
  return options.full ? 'full' : 'incremental'
}
