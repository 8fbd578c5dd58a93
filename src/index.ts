export { BackupError, isBackupError, type BackupErrorCode } from './backup/errors'
export {
  parseSessionRecords,
  parseTimestamp,
  readSessionCwd,
  type ParsedSessionFile,
  type RawRecord,
} from './backup/records'
export {
  normalizeConversation,
  type AssistantTurn,
  type ToolNote,
  type Turn,
  type UserTurn,
} from './backup/normalize'
export { deriveTitle } from './backup/title'
export { renderSessionDocument, type SessionDocumentMeta } from './backup/render'
export { TOOL_ICONS, categorizeTool, type ToolCategory } from './backup/tools'
export {
  decideSessionAction,
  runBackup,
  type BackupMode,
  type BackupRunOptions,
  type BackupRunResult,
} from './backup/sync'
export { scanBackupState, type BackupState } from './backup/state'
export {
  createDirectoryDestination,
  listSourceSessions,
  type BackupDestination,
  type SourceSession,
} from './backup/store'
export { resolveProjectName } from './backup/layout'
export { loadBackupConfig, type BackupConfig } from './backup/config'
export type { Language } from './backup/labels'
