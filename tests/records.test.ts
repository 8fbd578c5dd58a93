import { describe, expect, test } from 'vitest'

import {
  parseSessionRecords,
  parseTimestamp,
  readSessionCwd,
} from '../src/backup/records'

const toContent = (lines: unknown[]): string =>
  lines.map((line) => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n')

describe('parseSessionRecords', () => {
  test('reads flat user and assistant records in line order', () => {
    const parsed = parseSessionRecords(
      toContent([
        { type: 'user', timestamp: '2025-03-01T09:00:00Z', message: 'Fix login bug' },
        { role: 'assistant', timestamp: '2025-03-01T09:01:00Z', content: 'Fixed it' },
      ]),
    )

    expect(parsed.records).toEqual([
      {
        kind: 'user',
        line: 1,
        timestamp: Date.UTC(2025, 2, 1, 9, 0),
        text: 'Fix login bug',
      },
      {
        kind: 'assistant',
        line: 2,
        timestamp: Date.UTC(2025, 2, 1, 9, 1),
        text: 'Fixed it',
      },
    ])
    expect(parsed.malformedLines).toBe(0)
  })

  test('skips lines that fail to decode and counts them', () => {
    const parsed = parseSessionRecords(
      toContent([
        { type: 'user', message: 'hello' },
        '{not json',
        '[1, 2]',
        '',
        { type: 'assistant', message: 'hi' },
      ]),
    )

    expect(parsed.records.map((record) => record.kind)).toEqual(['user', 'assistant'])
    expect(parsed.malformedLines).toBe(2)
    expect(parsed.warnings.map((warning) => warning.line)).toEqual([2, 3])
    expect(parsed.warnings[0]?.code).toBe('MALFORMED_RECORD')
    expect(parsed.warnings[0]?.message.startsWith('line 2: invalid JSON')).toBe(true)
    expect(parsed.warnings[1]?.message).toBe('line 3: expected a JSON object')
  })

  test('expands native content blocks into text and tool records', () => {
    const parsed = parseSessionRecords(
      toContent([
        {
          type: 'assistant',
          sessionId: 'ses-1',
          cwd: '/Users/me/code/webapp',
          timestamp: '2025-03-01T09:01:00Z',
          message: {
            role: 'assistant',
            content: [
              { type: 'thinking', thinking: 'hmm' },
              { type: 'text', text: 'Looking at the file.' },
              {
                type: 'tool_use',
                id: 'tu_1',
                name: 'Read',
                input: { file_path: '/repo/a.py' },
              },
            ],
          },
        },
        {
          type: 'user',
          timestamp: '2025-03-01T09:02:00Z',
          message: {
            role: 'user',
            content: [
              {
                type: 'tool_result',
                tool_use_id: 'tu_1',
                content: [{ type: 'text', text: 'print(1)' }],
              },
            ],
          },
        },
      ]),
    )

    expect(parsed.sessionId).toBe('ses-1')
    expect(parsed.cwd).toBe('/Users/me/code/webapp')
    expect(parsed.records).toEqual([
      {
        kind: 'assistant',
        line: 1,
        timestamp: Date.UTC(2025, 2, 1, 9, 1),
        text: 'Looking at the file.',
      },
      {
        kind: 'tool-call',
        line: 1,
        timestamp: Date.UTC(2025, 2, 1, 9, 1),
        toolName: 'Read',
        toolUseId: 'tu_1',
        input: '/repo/a.py',
      },
      {
        kind: 'tool-result',
        line: 2,
        timestamp: Date.UTC(2025, 2, 1, 9, 2),
        toolName: 'Read',
        toolUseId: 'tu_1',
        output: 'print(1)',
        isError: false,
      },
    ])
  })

  test('keeps several tool results after a single call', () => {
    const parsed = parseSessionRecords(
      toContent([
        { type: 'tool_use', tool_name: 'Bash', tool_input: { command: 'npm test' } },
        { type: 'tool_result', tool_name: 'Bash', tool_output: 'ok' },
        { type: 'tool_result', output: { exitCode: 0 } },
      ]),
    )

    expect(parsed.records.map((record) => record.kind)).toEqual([
      'tool-call',
      'tool-result',
      'tool-result',
    ])
    const last = parsed.records[2]
    expect(last?.kind === 'tool-result' ? last.output : null).toBe('{"exitCode":0}')
  })

  test('maps unknown record kinds to other', () => {
    const parsed = parseSessionRecords(
      toContent([{ type: 'summary', summary: 'Login work' }]),
    )

    expect(parsed.records).toEqual([
      { kind: 'other', line: 1, timestamp: null, label: 'summary', text: 'Login work' },
    ])
  })

  test('ignores meta lines and slash-command markup', () => {
    const parsed = parseSessionRecords(
      toContent([
        { type: 'user', isMeta: true, message: { role: 'user', content: 'Caveat' } },
        {
          type: 'user',
          message: { role: 'user', content: '<command-name>/clear</command-name>' },
        },
      ]),
    )

    expect(parsed.records).toEqual([])
    expect(parsed.ignoredLines).toBe(2)
    expect(parsed.malformedLines).toBe(0)
  })

  test('defaults optional fields with the wrong type', () => {
    const parsed = parseSessionRecords(
      toContent([{ type: 'user', timestamp: { at: 1 }, message: 'hi' }]),
    )

    expect(parsed.records).toEqual([
      { kind: 'user', line: 1, timestamp: null, text: 'hi' },
    ])
  })
})

describe('parseTimestamp', () => {
  test('accepts ISO strings and epoch values', () => {
    expect(parseTimestamp('2025-03-01T09:00:00Z')).toBe(Date.UTC(2025, 2, 1, 9, 0))
    expect(parseTimestamp(1740819600)).toBe(1740819600000)
    expect(parseTimestamp(1740819600000)).toBe(1740819600000)
    expect(parseTimestamp('1740819600')).toBe(1740819600000)
  })

  test('returns null for missing or unparseable values', () => {
    expect(parseTimestamp(undefined)).toBeNull()
    expect(parseTimestamp('')).toBeNull()
    expect(parseTimestamp('soon')).toBeNull()
    expect(parseTimestamp(Number.NaN)).toBeNull()
  })
})

describe('readSessionCwd', () => {
  test('returns the first working directory in the file', () => {
    const content = toContent([
      'garbage',
      { type: 'summary', summary: 'x' },
      { type: 'user', cwd: '/Users/me/code/webapp', message: 'hi' },
      { type: 'user', cwd: '/tmp/other', message: 'again' },
    ])

    expect(readSessionCwd(content)).toBe('/Users/me/code/webapp')
  })
})
