import { load } from 'cheerio'
import {
  dedupeByUrl,
  extractDomain,
  filterCandidates,
  guessPublishedHint,
  normalizeText,
  type CandidateDocument,
  type Recency,
  type SearchQuery
} from '@deepseeker/shared'

export type SearchFailureReason = 'network_error' | 'http_4xx' | 'http_5xx' | 'timeout' | 'parse_error'

export class SearchError extends Error {
  constructor(
    message: string,
    public readonly reason: SearchFailureReason,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SearchError'
  }
}

export type SearchResult = { ok: true; documents: CandidateDocument[] } | { ok: false; error: SearchError }

export interface SearchGateway {
  search(query: SearchQuery, options?: { signal?: AbortSignal }): Promise<SearchResult>
}

export type SerpRow = {
  title: string
  url: string
  domain: string | null
  displayUrl: string | null
  snippet: string
  attribution: string | null
  publishedHint: string | null
}

const BING_SEARCH_URL = 'https://www.bing.com/search'

const RECENCY_MINUTES: Record<Exclude<Recency, 'any'>, number> = {
  day: 1440,
  week: 10080,
  month: 43200
}

export const DEFAULT_SEARCH_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-GB,en;q=0.9',
  'Cache-Control': 'no-cache'
}

export function buildBingSearchUrl(query: string, when: Recency, options?: { market?: string | null }): string {
  const url = new URL(BING_SEARCH_URL)
  url.searchParams.set('q', query)
  if (when !== 'any') {
    url.searchParams.set('qft', `+filterui:age-lt${RECENCY_MINUTES[when]}`)
  }
  if (options?.market) {
    url.searchParams.set('mkt', options.market)
  }
  return url.toString()
}

function resolveFailureReason(status: number): SearchFailureReason {
  return status >= 500 ? 'http_5xx' : 'http_4xx'
}

const RETRYABLE_REASONS: ReadonlySet<SearchFailureReason> = new Set(['http_5xx', 'timeout', 'network_error'])

/** Resolves after `ms`, or as soon as `signal` aborts. */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve()
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

/** Organic results from a Bing SERP, in page order. Rows without an http(s) link are skipped. */
export function parseBingResults(html: string, now: Date = new Date()): SerpRow[] {
  const $ = load(html)
  const rows: SerpRow[] = []

  $('#b_results li.b_algo').each((_, element) => {
    const item = $(element)
    const anchor = item.find('h2 a').first()
    const url = (anchor.attr('href') ?? '').trim()
    if (!/^https?:\/\//i.test(url)) return

    const snippetNode = item.find('.b_caption p').first()
    const snippet = normalizeText((snippetNode.length ? snippetNode : item.find('p').first()).text())
    const displayUrl = normalizeText(item.find('cite').first().text()) || null
    const attributionNode = item.find('.b_attribution').first()
    const attribution =
      normalizeText((attributionNode.length ? attributionNode : item.find('.b_tpcn').first()).text()) || null

    rows.push({
      title: normalizeText(anchor.text()) || url,
      url,
      domain: extractDomain(url),
      displayUrl,
      snippet,
      attribution,
      publishedHint: guessPublishedHint(`${attribution ?? ''} ${snippet}`, now)
    })
  })

  return rows
}

/** Applies filters, drops duplicate URLs, caps the list and assigns round-local ids. */
export function toCandidates(rows: SerpRow[], query: SearchQuery): CandidateDocument[] {
  const filtered = filterCandidates(rows, {
    include: query.include,
    exclude: query.exclude,
    allowDomains: query.allowDomains,
    denyDomains: query.denyDomains
  })
  return dedupeByUrl(filtered)
    .slice(0, query.maxResults)
    .map((row, index) => ({
      id: `r${index + 1}`,
      url: row.url,
      title: row.title,
      snippet: row.snippet,
      source: {
        domain: row.domain,
        displayUrl: row.displayUrl,
        attribution: row.attribution,
        publishedHint: row.publishedHint
      }
    }))
}

type BingSearchGatewayOptions = {
  fetch?: typeof globalThis.fetch
  headers?: Record<string, string>
  timeoutMs?: number
  /** Extra attempts after a 5xx, timeout or transport failure */
  retries?: number
  /** Base delay between attempts; attempt n waits n times this */
  retryDelayMs?: number
  market?: string | null
  now?: () => Date
}

export class BingSearchGateway implements SearchGateway {
  private readonly fetcher: typeof globalThis.fetch
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly market: string | null
  private readonly now: () => Date

  constructor(options?: BingSearchGatewayOptions) {
    this.fetcher = options?.fetch ?? globalThis.fetch
    this.headers = { ...DEFAULT_SEARCH_HEADERS, ...(options?.headers ?? {}) }
    this.timeoutMs = options?.timeoutMs ?? Number(process.env.DEEPSEEKER_SEARCH_TIMEOUT_MS || 15000)
    this.retries = Math.max(0, options?.retries ?? Number(process.env.DEEPSEEKER_SEARCH_RETRIES || 2))
    this.retryDelayMs = Math.max(0, options?.retryDelayMs ?? Number(process.env.DEEPSEEKER_SEARCH_RETRY_DELAY_MS || 1000))
    this.market = options?.market ?? process.env.DEEPSEEKER_SEARCH_MARKET ?? null
    this.now = options?.now ?? (() => new Date())
  }

  async search(query: SearchQuery, options?: { signal?: AbortSignal }): Promise<SearchResult> {
    const url = buildBingSearchUrl(query.query, query.when, { market: this.market })
    const callerSignal = options?.signal

    let page = await this.fetchPage(url, callerSignal)
    for (let attempt = 1; attempt <= this.retries; attempt++) {
      if (page.ok || !RETRYABLE_REASONS.has(page.error.reason) || callerSignal?.aborted) break
      await pause(this.retryDelayMs * attempt, callerSignal)
      if (callerSignal?.aborted) break
      page = await this.fetchPage(url, callerSignal)
    }
    if (!page.ok) return page

    return this.toResult(page.body, query)
  }

  private async fetchPage(
    url: string,
    callerSignal?: AbortSignal
  ): Promise<{ ok: true; body: string } | { ok: false; error: SearchError }> {
    const timeoutSignal = AbortSignal.timeout(Math.max(this.timeoutMs, 1000))
    const signal = callerSignal ? AbortSignal.any([callerSignal, timeoutSignal]) : timeoutSignal

    try {
      const response = await this.fetcher(url, { headers: this.headers, signal })
      if (!response.ok) {
        return {
          ok: false,
          error: new SearchError(
            `Search responded with ${response.status}`,
            resolveFailureReason(response.status),
            response.status
          )
        }
      }
      return { ok: true, body: await response.text() }
    } catch (error) {
      const timedOut = timeoutSignal.aborted && !callerSignal?.aborted
      const message = error instanceof Error ? error.message : String(error)
      return {
        ok: false,
        error: new SearchError(
          timedOut ? `Search timed out after ${this.timeoutMs}ms` : `Search request failed: ${message}`,
          timedOut ? 'timeout' : 'network_error',
          null,
          { cause: error }
        )
      }
    }
  }

  private toResult(body: string, query: SearchQuery): SearchResult {
    let rows: SerpRow[]
    try {
      rows = parseBingResults(body, this.now())
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return { ok: false, error: new SearchError(`Search page could not be parsed: ${message}`, 'parse_error', null, { cause: error }) }
    }

    return { ok: true, documents: toCandidates(rows, query) }
  }
}
