export type Frontmatter = Record<string, unknown>

export type FrontmatterParseResult = {
  frontmatter: Frontmatter
  body: string
  hasFrontmatter: boolean
}

const FRONTMATTER_DELIMITER = '---'

export function parseFrontmatter(text: string): FrontmatterParseResult {
  const normalized = text.replace(/\r\n/g, '\n')
  if (!normalized.startsWith(`${FRONTMATTER_DELIMITER}\n`)) {
    return { frontmatter: {}, body: text, hasFrontmatter: false }
  }

  const endIndex = normalized.indexOf(`\n${FRONTMATTER_DELIMITER}\n`, 3)
  if (endIndex === -1) {
    return { frontmatter: {}, body: text, hasFrontmatter: false }
  }

  const block = normalized.slice(4, endIndex)
  const body = normalized.slice(endIndex + FRONTMATTER_DELIMITER.length + 2)
  const frontmatter: Frontmatter = {}

  for (const line of block.split('\n')) {
    const separatorIndex = line.indexOf(':')
    if (separatorIndex === -1) continue
    const key = line.slice(0, separatorIndex).trim()
    if (!key) continue
    frontmatter[key] = parseValue(line.slice(separatorIndex + 1).trim())
  }

  return { frontmatter, body: body.replace(/^\n/, ''), hasFrontmatter: true }
}

export function serializeFrontmatter(frontmatter: Frontmatter): string {
  const lines = Object.entries(frontmatter)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
  return `${FRONTMATTER_DELIMITER}\n${lines.join('\n')}\n${FRONTMATTER_DELIMITER}`
}

function parseValue(raw: string): unknown {
  if (raw === 'null' || raw === '') return null
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2) {
    try {
      const parsed: unknown = JSON.parse(raw)
      return typeof parsed === 'string' ? parsed : raw
    } catch {
      return raw.slice(1, -1)
    }
  }
  if (raw.startsWith("'") && raw.endsWith("'") && raw.length >= 2) {
    return raw.slice(1, -1).replace(/''/g, "'")
  }
  const numeric = Number(raw)
  if (!Number.isNaN(numeric)) return numeric
  return raw
}

// Strings are always double-quoted so ids such as `0123` or `true` survive a round trip.
function formatValue(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(String(value))
}
