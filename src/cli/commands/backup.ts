import { basename } from 'node:path'
import { homedir } from 'node:os'
import type { Command } from 'commander'
import { loadBackupConfig } from '../../backup/config'
import { describeError } from '../../backup/errors'
import { expandPath, resolveConfigFile, resolveSyncLogFile } from '../../backup/paths'
import { createDirectoryDestination, listSourceSessions } from '../../backup/store'
import { runBackup, type BackupRunResult } from '../../backup/sync'
import { appendJsonLine, runCommand } from '../io'
import { parseLanguage, resolveMode } from './shared'

export type BackupCliOptions = {
  incremental?: boolean
  full?: boolean
  output?: string
  source?: string
  lang?: string
  config?: string
  log?: string | false
  silent?: boolean
  json?: boolean
  verbose?: boolean
}

export type BackupCommandResult = {
  sourcePath: string
  configFile: string
  logFile: string | null
  result: BackupRunResult
}

export function registerBackupOptions(command: Command): Command {
  return command
    .option('-i, --incremental', 'Back up only sessions without an existing document (default)')
    .option('--full', 'Re-render every session and overwrite existing documents')
    .option('-o, --output <path>', 'Backup directory (default: config output_path or ~/claude-backup)')
    .option('--source <path>', 'Session log directory (default: ~/.claude/projects)')
    .option('--lang <language>', 'Document language: en, ko')
    .option('--config <path>', 'Config file (default: $XDG_CONFIG_HOME/convo-backup/config.yml)')
    .option('--log <path>', 'Append run log to file (default: $XDG_DATA_HOME/convo-backup/sync-log.jsonl)')
    .option('--no-log', 'Skip writing the run log')
    .option('-s, --silent', 'Suppress output messages')
    .option('--json', 'Print the run result as JSON')
    .option('--verbose', 'List written documents and parser warnings')
}

export async function handleBackup(
  command: Command,
  options: BackupCliOptions,
): Promise<void> {
  await runCommand(
    command,
    () => executeBackup(options),
    (data) => printBackupResult(data, Boolean(options.verbose)),
  )
}

export function executeBackup(options: BackupCliOptions): BackupCommandResult {
  const mode = resolveMode(options)
  const loaded = loadBackupConfig(resolveConfigFile(options.config ?? null))
  const { config } = loaded
  const language = options.lang ? parseLanguage(options.lang) : config.language
  const sourcePath = options.source ? expandPath(options.source) : config.source_path
  const outputPath = options.output ? expandPath(options.output) : config.output_path

  const sessions = listSourceSessions(sourcePath, {
    minBytes: config.min_session_bytes,
    homeName: basename(homedir()),
  })
  const result = runBackup({
    sessions,
    destination: createDirectoryDestination(outputPath),
    mode,
    language,
    previewLength: config.preview_length,
    titleLength: config.title_length,
  })
  if (loaded.warning) {
    result.warnings.unshift(loaded.warning)
  }

  const logFile = options.log === false ? null : resolveSyncLogFile(options.log ?? null)
  if (logFile) {
    try {
      appendJsonLine(logFile, {
        generated_at: new Date().toISOString(),
        mode,
        language,
        source_path: sourcePath,
        output_path: outputPath,
        config_file: loaded.found ? loaded.filePath : null,
        processed: result.processed,
        skipped: result.skipped,
        failed: result.failed,
        empty: result.empty,
        projects: result.projects,
        malformed_lines: result.malformedLines,
        failures: result.failures,
      })
    } catch (error) {
      result.warnings.push(`Failed to append run log ${logFile}: ${describeError(error)}`)
    }
  }

  if (result.failed > 0 && result.processed === 0) {
    process.exitCode = 1
  }

  return { sourcePath, configFile: loaded.filePath, logFile, result }
}

export function printBackupResult(data: BackupCommandResult, verbose: boolean): void {
  const { result } = data
  const modeLabel = result.mode === 'full' ? 'Full' : 'Incremental'
  console.log(`${modeLabel} backup complete.`)
  console.log(`  Source: ${data.sourcePath}`)
  console.log(`  Output: ${result.outputPath}`)
  console.log(`  Processed: ${result.processed} sessions`)
  if (result.skipped > 0) {
    console.log(`  Skipped: ${result.skipped} (already backed up)`)
  }
  if (result.empty > 0) {
    console.log(`  Empty: ${result.empty}`)
  }
  if (result.malformedLines > 0) {
    console.log(`  Malformed lines: ${result.malformedLines}`)
  }
  console.log(`  Failed: ${result.failed}`)
  console.log(`  Projects: ${result.projects}`)

  for (const failure of result.failures) {
    const target = [failure.project, failure.sessionId].filter(Boolean).join('/') || 'backup'
    console.log(`- ${failure.code}: ${target}: ${failure.message}`)
  }

  if (!verbose) return
  for (const written of result.written) {
    console.log(`+ ${written}`)
  }
  for (const warning of result.warnings) {
    console.log(`Warning: ${warning}`)
  }
  if (data.logFile) {
    console.log(`Run log: ${data.logFile}`)
  }
}
