import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { isLanguage, type Language } from './labels'
import { defaultOutputRoot, defaultSourceRoot, expandPath } from './paths'
import { DEFAULT_TITLE_LENGTH } from './title'
import { DEFAULT_PREVIEW_LENGTH, isPlainObject } from './tools'

export type BackupConfig = {
  output_path: string
  language: Language
  source_path: string
  min_session_bytes: number
  preview_length: number
  title_length: number
}

export type LoadedConfig = {
  config: BackupConfig
  filePath: string
  found: boolean
  warning: string | null
}

export function defaultBackupConfig(): BackupConfig {
  return {
    output_path: defaultOutputRoot(),
    language: 'en',
    source_path: defaultSourceRoot(),
    min_session_bytes: 0,
    preview_length: DEFAULT_PREVIEW_LENGTH,
    title_length: DEFAULT_TITLE_LENGTH,
  }
}

export function loadBackupConfig(filePath: string): LoadedConfig {
  const defaults = defaultBackupConfig()
  if (!existsSync(filePath)) {
    return { config: defaults, filePath, found: false, warning: null }
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(filePath, 'utf-8'))
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return {
      config: defaults,
      filePath,
      found: true,
      warning: `Ignoring unreadable config ${filePath}: ${detail}`,
    }
  }

  if (!isPlainObject(raw)) {
    return { config: defaults, filePath, found: true, warning: null }
  }
  return {
    config: normalizeConfig(raw, defaults),
    filePath,
    found: true,
    warning: null,
  }
}

export function normalizeConfig(
  raw: Record<string, unknown>,
  defaults: BackupConfig = defaultBackupConfig(),
): BackupConfig {
  return {
    output_path: readPath(raw.output_path, defaults.output_path),
    language: isLanguage(raw.language) ? raw.language : defaults.language,
    source_path: readPath(raw.source_path, defaults.source_path),
    min_session_bytes: readNonNegativeInt(raw.min_session_bytes, defaults.min_session_bytes),
    preview_length: readPositiveInt(raw.preview_length, defaults.preview_length),
    title_length: readPositiveInt(raw.title_length, defaults.title_length),
  }
}

function readPath(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim()) {
    return expandPath(value.trim())
  }
  return fallback
}

function readPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const rounded = Math.round(value)
    if (rounded > 0) {
      return rounded
    }
  }
  return fallback
}

function readNonNegativeInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return Math.round(value)
  }
  return fallback
}
