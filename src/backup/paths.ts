import { homedir } from 'node:os'
import { isAbsolute, join, resolve } from 'node:path'

export const APP_DIR_NAME = 'convo-backup'

export function defaultSourceRoot(): string {
  return join(homedir(), '.claude', 'projects')
}

export function defaultOutputRoot(): string {
  return join(homedir(), 'claude-backup')
}

export function resolveConfigFile(value?: string | null): string {
  if (value) return expandPath(value)
  const configHome = process.env.XDG_CONFIG_HOME
  return join(configHome ?? join(homedir(), '.config'), APP_DIR_NAME, 'config.yml')
}

export function resolveSyncLogFile(value?: string | null): string {
  if (value) return expandPath(value)
  const dataHome = process.env.XDG_DATA_HOME
  return join(
    dataHome ?? join(homedir(), '.local', 'share'),
    APP_DIR_NAME,
    'sync-log.jsonl',
  )
}

/** Resolves `~`, `~/…` and relative paths against the home and working directories. */
export function expandPath(value: string, base?: string): string {
  if (value === '~') return homedir()
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return join(homedir(), value.slice(2))
  }
  if (isAbsolute(value)) return value
  return resolve(base ?? process.cwd(), value)
}
