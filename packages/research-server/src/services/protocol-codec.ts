import type { z } from 'zod'

export type DecodeFailureReason =
  | 'no_block'
  | 'multiple_blocks'
  | 'invalid_json'
  | 'missing_field'
  | 'wrong_type'
  | 'invalid_value'

export class DecodeError extends Error {
  constructor(
    public readonly reason: DecodeFailureReason,
    public readonly detail: string,
    public readonly rawText: string
  ) {
    super(`${reason}: ${detail}`)
    this.name = 'DecodeError'
  }
}

export type DecodeResult<T> = { ok: true; message: T } | { ok: false; error: DecodeError }

// A fence opens at the start of a line and closes at the end of one. JSON string
// values cannot span lines, so backticks inside them never delimit a block.
const FENCE_OPEN_REGEX = /^[^\S\n]*```([A-Za-z0-9_-]*)[^\S\n]*(.*)$/
const FENCE = '```'

const REASON_TEXT: Record<DecodeFailureReason, string> = {
  no_block: 'it contained no ```json block',
  multiple_blocks: 'it contained more than one ```json block',
  invalid_json: 'the block was not valid JSON',
  missing_field: 'a required field was missing',
  wrong_type: 'a field had the wrong type',
  invalid_value: 'a field had a value outside the allowed range or set'
}

type BlockExtraction = { ok: true; block: string } | { ok: false; reason: 'no_block' | 'multiple_blocks'; detail: string }

type FencedBlock = { language: string; body: string }

function collectFencedBlocks(rawText: string): FencedBlock[] {
  const blocks: FencedBlock[] = []
  let open: { language: string; lines: string[] } | null = null

  for (const line of rawText.split(/\r?\n/)) {
    if (!open) {
      const match = FENCE_OPEN_REGEX.exec(line)
      if (!match) continue
      const language = (match[1] ?? '').toLowerCase()
      const rest = (match[2] ?? '').trimEnd()
      if (rest.endsWith(FENCE)) {
        blocks.push({ language, body: rest.slice(0, -FENCE.length) })
      } else {
        open = { language, lines: rest ? [rest] : [] }
      }
      continue
    }

    const trimmed = line.trimEnd()
    if (trimmed.endsWith(FENCE)) {
      open.lines.push(trimmed.slice(0, -FENCE.length))
      blocks.push({ language: open.language, body: open.lines.join('\n') })
      open = null
    } else {
      open.lines.push(line)
    }
  }
  return blocks
}

function extractBlock(rawText: string): BlockExtraction {
  const blocks = collectFencedBlocks(rawText)
    .filter((block) => !block.language || block.language === 'json')
    .map((block) => block.body.trim())

  if (blocks.length > 1) {
    return { ok: false, reason: 'multiple_blocks', detail: `found ${blocks.length} fenced blocks, expected exactly one` }
  }
  const [block] = blocks
  if (block !== undefined) {
    return { ok: true, block }
  }

  const trimmed = rawText.trim()
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return { ok: true, block: trimmed }
  }
  return {
    ok: false,
    reason: 'no_block',
    detail: trimmed ? 'output has no fenced JSON block' : 'output was empty'
  }
}

function valueAtPath(root: unknown, path: Array<string | number>): unknown {
  let current: unknown = root
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined
    current = Reflect.get(current, key)
  }
  return current
}

function formatPath(path: Array<string | number>): string {
  return path.length ? path.join('.') : '<root>'
}

function classifyIssue(issue: z.ZodIssue, parsed: unknown): DecodeFailureReason {
  if (issue.path.length > 0 && valueAtPath(parsed, issue.path) === undefined) return 'missing_field'
  if (issue.code === 'invalid_type') return 'wrong_type'
  return 'invalid_value'
}

/**
 * Extracts the single structured block from an agent reply and validates it.
 * Pure: the same input always yields the same result.
 */
export function decode<S extends z.ZodTypeAny>(rawText: string, schema: S): DecodeResult<z.output<S>> {
  const extraction = extractBlock(rawText)
  if (!extraction.ok) {
    return { ok: false, error: new DecodeError(extraction.reason, extraction.detail, rawText) }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(extraction.block)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return { ok: false, error: new DecodeError('invalid_json', detail, rawText) }
  }

  const result = schema.safeParse(parsed)
  if (result.success) {
    return { ok: true, message: result.data }
  }

  const [issue] = result.error.issues
  if (!issue) {
    return { ok: false, error: new DecodeError('invalid_value', 'validation failed', rawText) }
  }
  const reason = classifyIssue(issue, parsed)
  const extra = result.error.issues.length > 1 ? ` (+${result.error.issues.length - 1} more)` : ''
  return {
    ok: false,
    error: new DecodeError(reason, `${formatPath(issue.path)}: ${issue.message}${extra}`, rawText)
  }
}

export function buildRepairInstruction(error: DecodeError): string {
  return [
    `Your previous output was invalid because ${REASON_TEXT[error.reason]} (${error.detail}).`,
    'Reissue your answer as strictly valid output: exactly one ```json fenced block matching the required schema, and nothing else.'
  ].join(' ')
}
