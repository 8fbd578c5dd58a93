import { Command, CommanderError } from 'commander'
import { handleBackup, registerBackupOptions, type BackupCliOptions } from './cli/commands/backup'
import { describeError, isBackupError } from './backup/errors'

export function createProgram(): Command {
  const program = new Command('convo-backup')
    .description('Back up chat session logs to Markdown documents')
    .version('0.1.0')
    .showHelpAfterError()
    .exitOverride()

  registerBackupOptions(program).action(async (options: BackupCliOptions, command: Command) => {
    await handleBackup(command, options)
  })

  return program
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram()
  try {
    await program.parseAsync(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or its own message.
      process.exitCode = error.exitCode
      return
    }
    if (!program.opts<{ silent?: boolean }>().silent) {
      console.error(`Error: ${describeError(error)}`)
      if (isBackupError(error)) {
        for (const suggestion of error.suggestions ?? []) {
          console.error(`  ${suggestion}`)
        }
      }
    }
    process.exitCode = 1
  }
}
