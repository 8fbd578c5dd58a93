export type Language = 'en' | 'ko'

export const LANGUAGES: readonly Language[] = ['en', 'ko']

export type DocumentLabels = {
  session: string
  started: string
  user: string
  assistant: string
  truncated: string
  indexSessions: string
  indexSessionList: string
  summaryTitle: string
  summaryGenerated: string
  summaryProjects: string
  summarySessions: string
  summaryProjectColumn: string
  summarySessionsColumn: string
  summaryLastBackupColumn: string
}

const LABELS: Record<Language, DocumentLabels> = {
  en: {
    session: 'Session',
    started: 'Started',
    user: 'User',
    assistant: 'Claude',
    truncated: '[Truncated due to length]',
    indexSessions: 'Sessions',
    indexSessionList: 'Session List',
    summaryTitle: 'Conversation Backup',
    summaryGenerated: 'Generated',
    summaryProjects: 'Projects',
    summarySessions: 'Sessions',
    summaryProjectColumn: 'Project',
    summarySessionsColumn: 'Sessions',
    summaryLastBackupColumn: 'Last Backup',
  },
  ko: {
    session: '세션',
    started: '시작',
    user: '사용자',
    assistant: 'Claude',
    truncated: '[길이 제한으로 잘림]',
    indexSessions: '세션 수',
    indexSessionList: '세션 목록',
    summaryTitle: '대화 백업',
    summaryGenerated: '생성 시각',
    summaryProjects: '프로젝트',
    summarySessions: '세션',
    summaryProjectColumn: '프로젝트',
    summarySessionsColumn: '세션 수',
    summaryLastBackupColumn: '마지막 백업',
  },
}

export function getLabels(language: Language): DocumentLabels {
  return LABELS[language]
}

export function isLanguage(value: unknown): value is Language {
  return value === 'en' || value === 'ko'
}
