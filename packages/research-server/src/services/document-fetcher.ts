import { load } from 'cheerio'
import { DEFAULT_EXCERPT_CHARS, normalizeText, sanitizeHtmlContent, type CandidateDocument } from '@deepseeker/shared'
import { DEFAULT_SEARCH_HEADERS } from './search-gateway'

export type FetchFailureReason =
  | 'network_error'
  | 'http_4xx'
  | 'http_5xx'
  | 'timeout'
  | 'unsupported_content'
  | 'empty_content'

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly reason: FetchFailureReason,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FetchError'
  }
}

export type ExtractedDocument = {
  text: string
  title: string | null
  contentType: string | null
  finalUrl: string
}

export type FetchResult = ({ ok: true } & ExtractedDocument) | { ok: false; error: FetchError }

export interface DocumentFetcher {
  fetchAndExtract(document: CandidateDocument, options?: { signal?: AbortSignal }): Promise<FetchResult>
}

// Failures a reader cannot work around: no content was retrieved at all.
export function isTransportFailure(reason: FetchFailureReason) {
  return reason === 'network_error' || reason === 'http_4xx' || reason === 'http_5xx' || reason === 'timeout'
}

const TEXT_CONTENT_TYPES = ['text/html', 'application/xhtml+xml', 'text/plain']
const CONTENT_SELECTORS = ['article', 'main', '[role="main"]']
const MIN_MAIN_CONTENT_CHARS = 200

/** Picks the `<article>`/`<main>` region when it carries enough text, else the whole body. */
export function selectMainContent(html: string): { html: string; title: string | null } {
  const $ = load(html)
  const title = normalizeText($('meta[property="og:title"]').attr('content') ?? $('title').first().text()) || null
  for (const selector of CONTENT_SELECTORS) {
    const node = $(selector).first()
    if (node.length && normalizeText(node.text()).length >= MIN_MAIN_CONTENT_CHARS) {
      return { html: node.html() ?? '', title }
    }
  }
  return { html: $('body').html() ?? html, title }
}

type HttpDocumentFetcherOptions = {
  fetch?: typeof globalThis.fetch
  timeoutMs?: number
  maxChars?: number
  headers?: Record<string, string>
}

export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly fetcher: typeof globalThis.fetch
  private readonly timeoutMs: number
  private readonly maxChars: number
  private readonly headers: Record<string, string>

  constructor(options?: HttpDocumentFetcherOptions) {
    this.fetcher = options?.fetch ?? globalThis.fetch
    this.timeoutMs = options?.timeoutMs ?? Number(process.env.DEEPSEEKER_FETCH_TIMEOUT_MS || 20000)
    this.maxChars = options?.maxChars ?? DEFAULT_EXCERPT_CHARS
    this.headers = { ...DEFAULT_SEARCH_HEADERS, ...(options?.headers ?? {}) }
  }

  async fetchAndExtract(document: CandidateDocument, options?: { signal?: AbortSignal }): Promise<FetchResult> {
    const timeoutSignal = AbortSignal.timeout(Math.max(this.timeoutMs, 1000))
    const signal = options?.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal

    let response: Response
    let body: string
    try {
      response = await this.fetcher(document.url, { headers: this.headers, signal, redirect: 'follow' })
      if (!response.ok) {
        const reason = response.status >= 500 ? 'http_5xx' : 'http_4xx'
        return { ok: false, error: new FetchError(`Document responded with ${response.status}`, reason, response.status) }
      }
      const contentType = response.headers.get('content-type')
      if (contentType && !TEXT_CONTENT_TYPES.some((type) => contentType.toLowerCase().includes(type))) {
        return {
          ok: false,
          error: new FetchError(`Unsupported content type ${contentType}`, 'unsupported_content', response.status)
        }
      }
      body = await response.text()
    } catch (error) {
      const timedOut = timeoutSignal.aborted && !options?.signal?.aborted
      const message = error instanceof Error ? error.message : String(error)
      return {
        ok: false,
        error: new FetchError(
          timedOut ? `Document fetch timed out after ${this.timeoutMs}ms` : `Document fetch failed: ${message}`,
          timedOut ? 'timeout' : 'network_error',
          null,
          { cause: error }
        )
      }
    }

    const contentType = response.headers.get('content-type')
    const isPlainText = contentType?.toLowerCase().includes('text/plain') ?? false
    const extracted = isPlainText ? { html: '', title: null } : selectMainContent(body)
    const text = isPlainText
      ? sanitizeHtmlContent(body.replace(/</g, '&lt;'), this.maxChars)
      : sanitizeHtmlContent(extracted.html, this.maxChars)

    if (!text) {
      return { ok: false, error: new FetchError('No readable text after extraction', 'empty_content', response.status) }
    }

    return {
      ok: true,
      text,
      title: extracted.title,
      contentType,
      finalUrl: response.url || document.url
    }
  }
}
