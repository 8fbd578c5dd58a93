export const DEFAULT_TITLE_LENGTH = 50

const MIN_WORD_CUT_LENGTH = 10

const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g

const SHELL_COMMANDS = new Set([
  'ls', 'll', 'cd', 'pwd', 'cat', 'echo', 'rm', 'mkdir', 'rmdir', 'cp', 'mv',
  'touch', 'chmod', 'chown', 'grep', 'rg', 'find', 'head', 'tail', 'less',
  'git', 'npm', 'npx', 'yarn', 'pnpm', 'bun', 'node', 'python', 'python3',
  'pip', 'pip3', 'make', 'docker', 'kubectl', 'curl', 'wget', 'ssh', 'sudo',
  'brew', 'apt', 'clear', 'exit', 'code', 'open', 'tree', 'which', 'env',
])

// A bare `/tmp` is a path, not a slash command.
const ROOT_DIRECTORIES = new Set([
  'bin', 'boot', 'dev', 'etc', 'home', 'lib', 'mnt', 'opt', 'private', 'proc',
  'root', 'run', 'sbin', 'srv', 'sys', 'tmp', 'usr', 'var', 'Applications',
  'Library', 'System', 'Users', 'Volumes',
])

type HostedResource = {
  host: string
  describe: (segments: string[]) => string | null
}

const HOSTED_RESOURCES: HostedResource[] = [
  {
    host: 'gist.github.com',
    describe: (segments) => {
      const id = segments[1] ?? segments[0]
      return id ? `GitHub gist ${id.slice(0, 8)}` : null
    },
  },
  {
    host: 'github.com',
    describe: (segments) => describeRepoPath('GitHub', segments),
  },
  {
    host: 'gitlab.com',
    describe: (segments) => describeRepoPath('GitLab', segments),
  },
  {
    host: 'bitbucket.org',
    describe: (segments) => describeRepoPath('Bitbucket', segments),
  },
]

export type DeriveTitleOptions = {
  maxLength?: number
}

/**
 * Short, filesystem-safe title for a session, taken from its first user
 * message. Falls back to the first 8 characters of the session id.
 */
export function deriveTitle(
  text: string | null,
  sessionId: string,
  options: DeriveTitleOptions = {},
): string {
  const fallback = sessionId.slice(0, 8)
  const maxLength = options.maxLength ?? DEFAULT_TITLE_LENGTH
  const firstLine = text?.trim().split(/\r?\n/)[0]?.trim() ?? ''
  if (!firstLine || isCommandLike(firstLine)) return fallback

  const hosted = describeHostedUrl(firstLine)
  if (hosted) return finalizeTitle(hosted, maxLength) || fallback

  if (isPathLike(firstLine)) {
    return finalizeTitle(stripExtension(lastPathComponent(firstLine)), maxLength) || fallback
  }

  return finalizeTitle(firstLine, maxLength) || fallback
}

export function sanitizeTitle(value: string): string {
  return value.replace(ILLEGAL_FILENAME_CHARS, ' ').replace(/\s+/g, ' ').trim()
}

function finalizeTitle(value: string, maxLength: number): string {
  const cleaned = cutAtWordBoundary(sanitizeTitle(value), maxLength)
    .replace(/[.\s]+$/, '')
    .trim()
  return /[\p{L}\p{N}]/u.test(cleaned) ? cleaned : ''
}

function cutAtWordBoundary(value: string, maxLength: number): string {
  const chars = Array.from(value)
  if (chars.length <= maxLength) return value
  const hardCut = chars.slice(0, maxLength).join('')
  const boundary = hardCut.lastIndexOf(' ')
  if (boundary < MIN_WORD_CUT_LENGTH) return hardCut
  return hardCut.slice(0, boundary)
}

function isCommandLike(line: string): boolean {
  if (line.startsWith('<')) return true
  if (/^\/[A-Za-z][\w:-]*$/.test(line) && !ROOT_DIRECTORIES.has(line.slice(1))) return true
  if (/^\$\s*\S/.test(line)) return true
  const escaped = /^!\s*([^\s!]+)/.exec(line)?.[1]
  if (escaped && SHELL_COMMANDS.has(escaped)) return true

  const [command, ...args] = line.split(/\s+/)
  if (!SHELL_COMMANDS.has(command)) return false
  return args.every((arg) => /^-|[/.=~$*|&>]/.test(arg))
}

function describeHostedUrl(line: string): string | null {
  const token = line.split(/\s+/)[0]
  if (!/^https?:\/\//i.test(token)) return null

  let url: URL
  try {
    url = new URL(token)
  } catch {
    return null
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '')
  const resource = HOSTED_RESOURCES.find((candidate) => candidate.host === host)
  if (!resource) return null
  const segments = url.pathname.split('/').filter((segment) => segment.length > 0)
  return resource.describe(segments)
}

function describeRepoPath(label: string, segments: string[]): string | null {
  const repo = segments[1]?.replace(/\.git$/, '')
  if (!repo) return null
  const kind = segments[2] === '-' ? segments[3] : segments[2]
  const number = segments[2] === '-' ? segments[4] : segments[3]
  if ((kind === 'issues' || kind === 'issue') && number) {
    return `${label} issue ${repo} ${number}`
  }
  if ((kind === 'pull' || kind === 'pulls' || kind === 'merge_requests') && number) {
    return `${label} PR ${repo} ${number}`
  }
  return `${label} repo ${repo}`
}

function isPathLike(line: string): boolean {
  if (/\s/.test(line)) return false
  if (/^(~|\.{1,2})?[/\\]/.test(line)) return true
  if (/^[A-Za-z]:[/\\]/.test(line)) return true
  return /[/\\]/.test(line) && /\.[A-Za-z0-9]+$/.test(line)
}

function lastPathComponent(path: string): string {
  const parts = path.split(/[/\\]/).filter((part) => part.length > 0)
  return parts[parts.length - 1] ?? ''
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot > 0 ? name.slice(0, dot) : name
}
