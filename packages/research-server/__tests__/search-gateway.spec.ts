// @vitest-environment node
import { readFileSync } from 'node:fs'
import { describe, expect, it, vi } from 'vitest'
import type { SearchQuery } from '@deepseeker/shared'
import {
  BingSearchGateway,
  buildBingSearchUrl,
  parseBingResults,
  SearchError,
  toCandidates
} from '../src/services/search-gateway'

const SERP_HTML = readFileSync(new URL('./fixtures/bing-serp.html', import.meta.url), 'utf8')
const NOW = new Date('2025-06-10T12:00:00.000Z')

function query(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return {
    query: 'node 20 release',
    when: 'any',
    include: [],
    exclude: [],
    allowDomains: [],
    denyDomains: [],
    maxResults: 10,
    ...overrides
  }
}

describe('buildBingSearchUrl', () => {
  it('encodes the query and maps recency to an age filter', () => {
    expect(buildBingSearchUrl('node 20 release', 'week', { market: 'en-GB' })).toBe(
      'https://www.bing.com/search?q=node+20+release&qft=%2Bfilterui%3Aage-lt10080&mkt=en-GB'
    )
  })

  it('omits the filter for any recency', () => {
    expect(buildBingSearchUrl('x', 'any')).toBe('https://www.bing.com/search?q=x')
  })
})

describe('parseBingResults', () => {
  it('reads organic results in page order and skips non-http links', () => {
    const rows = parseBingResults(SERP_HTML, NOW)

    expect(rows.map((row) => row.url)).toEqual([
      'https://nodejs.org/en/blog/release/v20.0.0',
      'https://example.com/news/',
      'https://example.com/news#top',
      'https://docs.example.org/guide'
    ])
    expect(rows[0]).toEqual({
      title: 'Node.js 20 is now available!',
      url: 'https://nodejs.org/en/blog/release/v20.0.0',
      domain: 'nodejs.org',
      displayUrl: 'nodejs.org/en/blog',
      snippet: '2023-04-18 - Node.js 20 ships a stable test runner.',
      attribution: 'nodejs.org/en/blog',
      publishedHint: '2023-04-18T00:00:00.000Z'
    })
  })

  it('decodes titles and guesses relative publication times', () => {
    const rows = parseBingResults(SERP_HTML, NOW)
    expect(rows[1]?.title).toBe('Example & News')
    expect(rows[1]?.publishedHint).toBe('2025-06-08T12:00:00.000Z')
    expect(rows[1]?.attribution).toBeNull()
    expect(rows[2]?.snippet).toBe('Duplicate entry.')
    expect(rows[3]?.attribution).toBe('docs.example.org')
  })

  it('keeps every row when a snippet mentions an age beyond the date range', () => {
    const html = `<ol id="b_results">
      <li class="b_algo"><h2><a href="https://example.org/human-origins">Human origins</a></h2>
        <div class="b_caption"><p>Homo sapiens appeared about 300000 years ago in Africa.</p></div></li>
      <li class="b_algo"><h2><a href="https://example.net/fossils">Fossil record</a></h2>
        <div class="b_caption"><p>3 days ago - New finds were dated.</p></div></li>
    </ol>`
    const rows = parseBingResults(html, NOW)
    expect(rows.map((row) => [row.url, row.publishedHint])).toEqual([
      ['https://example.org/human-origins', null],
      ['https://example.net/fossils', '2025-06-07T12:00:00.000Z']
    ])
  })

  it('returns nothing for a page without results', () => {
    expect(parseBingResults('<html><body><p>No results</p></body></html>', NOW)).toEqual([])
  })
})

describe('toCandidates', () => {
  const rows = parseBingResults(SERP_HTML, NOW)

  it('drops duplicate URLs and assigns ids in order', () => {
    const candidates = toCandidates(rows, query())
    expect(candidates.map((c) => [c.id, c.url])).toEqual([
      ['r1', 'https://nodejs.org/en/blog/release/v20.0.0'],
      ['r2', 'https://example.com/news/'],
      ['r3', 'https://docs.example.org/guide']
    ])
    expect(candidates[0]?.source).toEqual({
      domain: 'nodejs.org',
      displayUrl: 'nodejs.org/en/blog',
      attribution: 'nodejs.org/en/blog',
      publishedHint: '2023-04-18T00:00:00.000Z'
    })
  })

  it('applies domain filters before numbering', () => {
    const candidates = toCandidates(rows, query({ denyDomains: ['example.com'] }))
    expect(candidates.map((c) => [c.id, c.source.domain])).toEqual([
      ['r1', 'nodejs.org'],
      ['r2', 'docs.example.org']
    ])
  })

  it('caps the list at maxResults', () => {
    expect(toCandidates(rows, query({ maxResults: 1 })).map((c) => c.id)).toEqual(['r1'])
  })
})

describe('BingSearchGateway', () => {
  it('fetches the results page and returns candidates', async () => {
    const requested: string[] = []
    const fetchStub: typeof fetch = async (input) => {
      requested.push(String(input))
      return new Response(SERP_HTML, { status: 200, headers: { 'content-type': 'text/html' } })
    }
    const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, now: () => NOW })

    const result = await gateway.search(query({ when: 'day' }))

    expect(requested).toEqual(['https://www.bing.com/search?q=node+20+release&qft=%2Bfilterui%3Aage-lt1440'])
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.documents).toHaveLength(3)
  })

  it('retries transient server errors with an escalating delay', async () => {
    vi.useFakeTimers()
    try {
      const statuses = [503, 502, 200]
      let calls = 0
      const fetchStub: typeof fetch = async () => {
        const status = statuses[calls++] ?? 200
        return status === 200 ? new Response(SERP_HTML, { status }) : new Response('busy', { status })
      }
      const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, retries: 2, retryDelayMs: 100, now: () => NOW })

      const pending = gateway.search(query())
      await vi.advanceTimersByTimeAsync(99)
      expect(calls).toBe(1)
      await vi.advanceTimersByTimeAsync(1)
      expect(calls).toBe(2)
      await vi.advanceTimersByTimeAsync(199)
      expect(calls).toBe(2)
      await vi.advanceTimersByTimeAsync(1)
      const result = await pending

      expect(calls).toBe(3)
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.documents).toHaveLength(3)
    } finally {
      vi.useRealTimers()
    }
  })

  it('gives up after the configured retries', async () => {
    let calls = 0
    const fetchStub: typeof fetch = async () => {
      calls += 1
      return new Response('busy', { status: 503 })
    }
    const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, retries: 2, retryDelayMs: 0 })

    const result = await gateway.search(query())

    expect(calls).toBe(3)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SearchError)
      expect(result.error.reason).toBe('http_5xx')
      expect(result.error.status).toBe(503)
    }
  })

  it('does not retry client errors', async () => {
    let calls = 0
    const fetchStub: typeof fetch = async () => {
      calls += 1
      return new Response('blocked', { status: 429 })
    }
    const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, retries: 2, retryDelayMs: 0 })

    const result = await gateway.search(query())

    expect(calls).toBe(1)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.reason).toBe('http_4xx')
  })

  it('does not retry once the caller has aborted', async () => {
    const controller = new AbortController()
    let calls = 0
    const fetchStub: typeof fetch = async () => {
      calls += 1
      controller.abort()
      throw new DOMException('This operation was aborted', 'AbortError')
    }
    const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, retries: 2, retryDelayMs: 0 })

    const result = await gateway.search(query(), { signal: controller.signal })

    expect(calls).toBe(1)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.reason).toBe('network_error')
  })

  it('reports transport errors without throwing', async () => {
    let calls = 0
    const fetchStub: typeof fetch = async () => {
      calls += 1
      throw new TypeError('fetch failed')
    }
    const gateway = new BingSearchGateway({ fetch: fetchStub, market: null, retries: 1, retryDelayMs: 0 })

    const result = await gateway.search(query())

    expect(calls).toBe(2)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.reason).toBe('network_error')
      expect(result.error.message).toBe('Search request failed: fetch failed')
    }
  })
})
