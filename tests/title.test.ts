import { describe, expect, test } from 'vitest'

import { deriveTitle, sanitizeTitle } from '../src/backup/title'

const SESSION_ID = 'abcdef1234567890'

describe('deriveTitle', () => {
  const cases: Array<[string | null, string]> = [
    ['Fix login bug', 'Fix login bug'],
    ['Fix it.', 'Fix it'],
    ['First line\nsecond line', 'First line'],
    ['로그인 버그 수정', '로그인 버그 수정'],
    ['What is: the <best> way?', 'What is the best way'],
    ['git push the fix', 'git push the fix'],
    [null, 'abcdef12'],
    ['   ', 'abcdef12'],
    ['ls -la', 'abcdef12'],
    ['/clear', 'abcdef12'],
    ['$ npm test', 'abcdef12'],
    ['! git status', 'abcdef12'],
    ['!ls -la', 'abcdef12'],
    ['!! urgent: login broken', '!! urgent login broken'],
    ['!important fix needed', '!important fix needed'],
    ['<command-name>review</command-name>', 'abcdef12'],
    ['?!...', 'abcdef12'],
    ['https://github.com/acme/widgets', 'GitHub repo widgets'],
    ['https://github.com/acme/widgets/issues/12 please look', 'GitHub issue widgets 12'],
    ['https://github.com/acme/widgets/pull/7', 'GitHub PR widgets 7'],
    ['https://gitlab.com/team/api/-/merge_requests/5', 'GitLab PR api 5'],
    ['https://gist.github.com/someone/0123456789abcdef', 'GitHub gist 01234567'],
    ['/Users/me/notes/plan.md', 'plan'],
    ['src/app.ts', 'app'],
    ['/tmp', 'tmp'],
    ['/Users', 'Users'],
  ]

  test.each(cases)('%j becomes %j', (input, expected) => {
    expect(deriveTitle(input, SESSION_ID)).toBe(expected)
  })

  test('cuts long titles at a word boundary', () => {
    expect(
      deriveTitle(
        'Refactor the authentication middleware so that tokens are refreshed automatically',
        SESSION_ID,
      ),
    ).toBe('Refactor the authentication middleware so that')
  })

  test('honours a custom maximum length', () => {
    expect(deriveTitle('alpha beta gamma delta', SESSION_ID, { maxLength: 12 })).toBe(
      'alpha beta',
    )
    expect(deriveTitle('supercalifragilistic word', SESSION_ID, { maxLength: 12 })).toBe(
      'supercalifra',
    )
  })
})

describe('sanitizeTitle', () => {
  test('replaces characters that are illegal in file names', () => {
    expect(sanitizeTitle('a/b\\c:d*e?f"g<h>i|j')).toBe('a b c d e f g h i j')
    expect(sanitizeTitle('tab\there\u0007')).toBe('tab here')
  })
})
