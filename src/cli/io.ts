import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Command } from 'commander'
import { describeError, isBackupError } from '../backup/errors'

export type GlobalCliOptions = {
  json: boolean
  silent: boolean
}

type JsonSuccess<T> = {
  ok: true
  data: T
  meta: { cwd: string; durationMs: number }
}

type JsonError = {
  ok: false
  error: { code: string; message: string; suggestions?: string[] }
  meta: { cwd: string; durationMs: number }
}

export function getGlobalOptions(command: Command): GlobalCliOptions {
  let root: Command = command
  while (root.parent) {
    root = root.parent
  }
  const options = root.opts<{ json?: boolean; silent?: boolean }>()
  return {
    json: Boolean(options.json),
    silent: Boolean(options.silent),
  }
}

export async function runCommand<T>(
  command: Command,
  executor: () => Promise<T> | T,
  render: (data: T) => void,
): Promise<void> {
  const options = getGlobalOptions(command)
  const startedAt = Date.now()
  try {
    const data = await executor()
    if (options.json) {
      const payload: JsonSuccess<T> = {
        ok: true,
        data,
        meta: { cwd: process.cwd(), durationMs: Date.now() - startedAt },
      }
      console.log(JSON.stringify(payload, null, 2))
      return
    }
    if (!options.silent) {
      render(data)
    }
  } catch (error) {
    if (options.json) {
      const payload: JsonError = {
        ok: false,
        error: formatError(error),
        meta: { cwd: process.cwd(), durationMs: Date.now() - startedAt },
      }
      console.log(JSON.stringify(payload, null, 2))
      process.exitCode = 1
      return
    }
    throw error
  }
}

export function formatError(error: unknown): JsonError['error'] {
  if (isBackupError(error)) {
    return {
      code: error.code,
      message: error.message,
      suggestions: error.suggestions,
    }
  }
  return { code: 'UNKNOWN_ERROR', message: describeError(error) }
}

export function appendJsonLine(filePath: string, payload: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true })
  appendFileSync(filePath, `${JSON.stringify(payload)}\n`, 'utf-8')
}
