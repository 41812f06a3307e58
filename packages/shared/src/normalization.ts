// Text cleanup for fetched pages and SERP fragments. Output stays ASCII-friendly
// so reader prompts are stable across sources.
const SMART_CHAR_MAP: Record<string, string> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201C': '"',
  '\u201D': '"',
  '\u2014': '--',
  '\u2013': '-',
  '\u2026': '...',
  '\u00A0': ' ',
  '\u2009': ' ',
  '\u200A': ' ',
  '\u200B': ''
}

const ENTITY_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
}

const SENTENCE_SPLIT_REGEX = /(?<=[.!?])\s+/g
const HTML_COMMENT_REGEX = /<!--([\s\S]*?)-->/g

const TAGS_TO_STRIP = ['script', 'style', 'noscript', 'template', 'iframe', 'svg']
const BOILERPLATE_TAGS = ['nav', 'header', 'footer', 'aside', 'form']
const RESIDUAL_KEYWORDS = ['navigation', 'menu', 'advertisement']

export const DEFAULT_EXCERPT_CHARS = 8_000
const NEAR_DUPLICATE_OVERLAP = 0.8

export function replaceSmartCharacters(input: string): string {
  return input.replace(/[\u2018\u2019\u201C\u201D\u2014\u2013\u2026\u00A0\u2009\u200A\u200B]/g, (match) => SMART_CHAR_MAP[match] ?? '')
}

export function decodeEntities(input: string): string {
  return input
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => {
      const codePoint = Number.parseInt(hex, 16)
      return Number.isFinite(codePoint) ? String.fromCodePoint(codePoint) : ''
    })
    .replace(/&#(\d+);/g, (_, num: string) => {
      const codePoint = Number.parseInt(num, 10)
      return Number.isFinite(codePoint) ? String.fromCodePoint(codePoint) : ''
    })
    .replace(/&([a-z]+);/gi, (_, entity: string) => ENTITY_MAP[entity.toLowerCase()] ?? `&${entity};`)
}

function stripTags(html: string, tagNames: string[]): string {
  return tagNames.reduce((acc, tag) => acc.replace(new RegExp(`<${tag}[^>]*>[\\s\\S]*?<\\/${tag}>`, 'gi'), ' '), html)
}

function stripBoilerplate(html: string): string {
  let output = html.replace(HTML_COMMENT_REGEX, ' ')
  output = stripTags(output, TAGS_TO_STRIP)
  output = stripTags(output, BOILERPLATE_TAGS)
  return output
}

/** Collapses runs of whitespace and maps typographic characters to ASCII. */
export function normalizeText(input: string): string {
  return replaceSmartCharacters(decodeEntities(input))
    .replace(/[\t\r\f\v\n]+/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim()
}

export function htmlToText(html: string): string {
  const withoutTags = stripBoilerplate(html)
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/?(?:p|div|li|h[1-6]|tr|section|article)[^>]*>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
  return replaceSmartCharacters(decodeEntities(withoutTags))
    .replace(/[\t\r\f\v]+/g, ' ')
    .replace(/ *\n[\s]*/g, '\n')
    .replace(/ {2,}/g, ' ')
    .trim()
}

export function truncatePreservingSentences(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text
  }

  const sentences = text.split(SENTENCE_SPLIT_REGEX)
  const pieces: string[] = []
  let total = 0

  for (const sentence of sentences) {
    const candidate = sentence.trim()
    if (!candidate) continue
    const addedLength = candidate.length + (pieces.length > 0 ? 1 : 0)
    if (total + addedLength > maxLength) {
      break
    }
    pieces.push(candidate)
    total += addedLength
  }

  if (!pieces.length) {
    return text.slice(0, maxLength).trimEnd()
  }

  return pieces.join(' ')
}

function stripResidualBoilerplate(text: string): string {
  let trimmed = text.trimStart()
  for (const keyword of RESIDUAL_KEYWORDS) {
    const pattern = new RegExp(`^${keyword}(?:\\s+[A-Za-z][^\\s]*)*?\\n`, 'i')
    const match = trimmed.match(pattern)
    if (match) {
      trimmed = trimmed.slice(match[0].length).trimStart()
    }
  }
  return trimmed
}

function wordSet(sentence: string): Set<string> {
  return new Set(sentence.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [])
}

function wordOverlap(a: Set<string>, b: Set<string>): number {
  let shared = 0
  for (const word of a) {
    if (b.has(word)) shared += 1
  }
  return shared / (a.size + b.size - shared)
}

/**
 * Drops sentences sharing more than 80% of their words with an earlier one.
 * Line breaks between the remaining sentences are kept.
 */
export function removeRepeatedSentences(text: string): string {
  const seen: Array<Set<string>> = []
  return text
    .split('\n')
    .map((line) =>
      line
        .split(SENTENCE_SPLIT_REGEX)
        .filter((sentence) => {
          const words = wordSet(sentence)
          if (words.size === 0) return sentence.trim().length > 0
          if (seen.some((earlier) => wordOverlap(earlier, words) > NEAR_DUPLICATE_OVERLAP)) return false
          seen.push(words)
          return true
        })
        .join(' ')
    )
    .filter((line) => line.length > 0)
    .join('\n')
}

/**
 * Turns an HTML fragment into plain text for a reader agent, truncated at a
 * sentence boundary to `maxLength` characters.
 */
export function sanitizeHtmlContent(html: string, maxLength = DEFAULT_EXCERPT_CHARS): string {
  const text = removeRepeatedSentences(stripResidualBoilerplate(htmlToText(html)))
  return truncatePreservingSentences(text, maxLength)
}

export function normalizeTitle(rawTitle: string | null | undefined): string | null {
  if (!rawTitle) return null
  return normalizeText(rawTitle) || null
}

const RELATIVE_TIME_REGEX = /(\d+)\s*(seconds?|secs?|minutes?|mins?|hours?|hrs?|days?|weeks?|months?|years?)\s+ago\b/i

const UNIT_MS: Record<string, number> = {
  sec: 1_000,
  second: 1_000,
  min: 60_000,
  minute: 60_000,
  hr: 3_600_000,
  hour: 3_600_000,
  day: 86_400_000,
  week: 7 * 86_400_000,
  month: 30 * 86_400_000,
  year: 365 * 86_400_000
}

const ABSOLUTE_DATE_PATTERNS = [
  /\b(\d{4}-\d{2}-\d{2})\b/,
  /\b((?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*\.? \d{1,2},? \d{4})\b/,
  /\b(\d{1,2} (?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*\.? \d{4})\b/
]

export function parseRelativeTime(text: string, now: Date): Date | null {
  const match = RELATIVE_TIME_REGEX.exec(text)
  if (!match) return null
  const amount = Number.parseInt(match[1] ?? '', 10)
  const unit = (match[2] ?? '').toLowerCase().replace(/s$/, '')
  const unitMs = UNIT_MS[unit]
  if (!Number.isFinite(amount) || unitMs === undefined) return null
  // Geological ages ("300000 years ago") fall outside the Date range.
  const parsed = new Date(now.getTime() - amount * unitMs)
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

export function parseAbsoluteDate(text: string): Date | null {
  for (const pattern of ABSOLUTE_DATE_PATTERNS) {
    const match = pattern.exec(text)
    if (!match?.[1]) continue
    const parsed = new Date(match[1].replace('.', ''))
    if (!Number.isNaN(parsed.getTime())) return parsed
  }
  return null
}

/** Best-effort publication time from a SERP attribution line or snippet. */
export function guessPublishedHint(text: string, now: Date = new Date()): string | null {
  if (!text.trim()) return null
  const guessed = parseRelativeTime(text, now) ?? parseAbsoluteDate(text)
  if (!guessed || Number.isNaN(guessed.getTime())) return null
  return guessed.toISOString()
}
