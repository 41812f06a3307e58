// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { ResearchRunConfigSchema, type ResearchRunConfigInput, type ResearchRunResult } from '@deepseeker/shared'
import { PlannerStage } from '../src/services/planner-stage'
import { ABANDONED_NOTE, ReaderDispatcher } from '../src/services/reader-dispatcher'
import { canTransition, ResearchLoopController } from '../src/services/research-loop-controller'
import { FetchError } from '../src/services/document-fetcher'
import { SearchError, type SearchGateway } from '../src/services/search-gateway'
import { candidate, FakeDocumentFetcher, FakeSearchGateway, fenced, ScriptedInvoker } from './helpers/fakes'

const NOW = new Date('2025-06-10T12:00:00.000Z')

const searchPlan = (query: string) => fenced({ action: 'search_then_answer', search: { query } })
const selectFirst = fenced({ selected_ids: ['r1'] })
const readerReply = fenced({ title: 'Doc', summary: 'Useful facts.', key_points: ['fact'], relevance_score: 0.7, notes: null })
const concluded = fenced({ action: 'direct_answer', notes: 'enough evidence' })
const synthesis = fenced({ answer: 'The answer [1:r1].', key_points: ['fact'], used_results: ['1:r1'], notes: null })

function twoResultsPerCall() {
  return new FakeSearchGateway((_query, call) => ({
    ok: true,
    documents: [candidate('r1', `https://example.com/${call}/a`), candidate('r2', `https://example.com/${call}/b`)]
  }))
}

function buildController(
  invoker: ScriptedInvoker,
  search: SearchGateway,
  options: { fetcher?: FakeDocumentFetcher; now?: () => number } = {}
) {
  return new ResearchLoopController({
    planner: new PlannerStage(invoker, { now: () => NOW }),
    search,
    dispatcher: new ReaderDispatcher({ invoker, fetcher: options.fetcher ?? new FakeDocumentFetcher() }),
    now: options.now
  })
}

function config(overrides: Partial<ResearchRunConfigInput> = {}) {
  return ResearchRunConfigSchema.parse(overrides)
}

function transitions(result: ResearchRunResult) {
  return result.trace.flatMap((event) => (event.type === 'transition' ? [`${event.from}->${event.to}`] : []))
}

describe('ResearchLoopController', () => {
  it('answers simple questions directly without searching', async () => {
    const invoker = new ScriptedInvoker().enqueue(
      'plan',
      fenced({ action: 'direct_answer', direct_answer: '391', notes: null })
    )
    const search = twoResultsPerCall()

    const result = await buildController(invoker, search).run({ question: 'What is 17 * 23?', config: config() })

    expect(result.kind).toBe('direct_answer')
    expect(result.terminationReason).toBe('direct_answer')
    expect(result.answer).toEqual({
      answer: '391',
      keyPoints: [],
      usedResults: [],
      notes: 'Answered directly without web search.'
    })
    expect(result.rounds).toBe(0)
    expect(result.ledger).toEqual([])
    expect(search.queries).toHaveLength(0)
    expect(transitions(result)).toEqual(['init->planning', 'planning->direct_answer', 'direct_answer->done'])
    expect(result.usage.agentCalls).toBe(1)
  })

  it('stops at the round cap when the planner keeps searching', async () => {
    const invoker = new ScriptedInvoker({
      select: selectFirst,
      read: readerReply,
      reflect: searchPlan('follow-up'),
      synthesize: synthesis
    }).enqueue('plan', searchPlan('first query'))
    const search = twoResultsPerCall()

    const result = await buildController(invoker, search).run({ question: 'What changed?', config: config({ maxRounds: 3 }) })

    expect(result.kind).toBe('synthesized')
    expect(result.terminationReason).toBe('round_cap')
    expect(result.rounds).toBe(3)
    expect(search.queries.map((query) => query.query)).toEqual(['first query', 'follow-up', 'follow-up'])
    expect(result.ledger.map((entry) => entry.entryId)).toEqual(['1:r1', '2:r1', '3:r1'])
    expect(invoker.callsFor('reflect')).toHaveLength(3)
    expect(result.usage.agentCalls).toBe(11)
    expect(result.trace.find((event) => event.type === 'budget_exceeded')).toMatchObject({
      kind: 'rounds',
      limit: 3,
      observed: 3
    })
    expect(transitions(result).slice(0, 6)).toEqual([
      'init->planning',
      'planning->searching',
      'searching->selecting',
      'selecting->reading',
      'reading->reflecting',
      'reflecting->searching'
    ])
    expect(transitions(result).slice(-2)).toEqual(['reflecting->synthesizing', 'synthesizing->done'])
    expect(result.answer?.usedResults).toEqual(['1:r1'])
  })

  it('orders trace events and closes with a completion record', async () => {
    const invoker = new ScriptedInvoker({ select: selectFirst, read: readerReply, reflect: concluded, synthesize: synthesis })
      .enqueue('plan', searchPlan('q'))

    const result = await buildController(invoker, twoResultsPerCall()).run({ question: 'q?', config: config() })

    expect(result.trace.map((event) => event.seq)).toEqual(result.trace.map((_, index) => index + 1))
    expect(result.trace[result.trace.length - 1]).toMatchObject({
      type: 'run_completed',
      kind: 'synthesized',
      terminationReason: 'planner_concluded',
      ledgerSize: 1
    })
    expect(result.trace.find((event) => event.type === 'selection')).toMatchObject({
      candidateCount: 2,
      selectedIds: ['r1'],
      rejectedIds: [],
      skipped: false
    })
  })

  it('records one ledger entry per selected document even when a fetch fails', async () => {
    const invoker = new ScriptedInvoker({
      select: fenced({ selected_ids: ['r2', 'r5', 'r9'] }),
      read: readerReply,
      reflect: concluded,
      synthesize: synthesis
    }).enqueue('plan', searchPlan('q'))
    const search = new FakeSearchGateway(() => ({
      ok: true,
      documents: Array.from({ length: 10 }, (_, index) => candidate(`r${index + 1}`, `https://example.com/doc-${index + 1}`))
    }))
    const fetcher = new FakeDocumentFetcher({
      'https://example.com/doc-5': { ok: false, error: new FetchError('Document fetch failed: reset', 'network_error') }
    })

    const result = await buildController(invoker, search, { fetcher }).run({ question: 'q?', config: config() })

    expect(result.ledger.map((entry) => [entry.entryId, entry.status, entry.relevanceScore])).toEqual([
      ['1:r2', 'ok', 0.7],
      ['1:r5', 'fetch_failed', 0],
      ['1:r9', 'ok', 0.7]
    ])
    expect(result.trace.filter((event) => event.type === 'reader_report')).toHaveLength(3)
    expect(result.trace.find((event) => event.type === 'round_timing')).toMatchObject({ reports: 3, round: 1 })
  })

  it('synthesizes without research when the plan stays invalid after repair', async () => {
    const invoker = new ScriptedInvoker({
      plan: 'I think we should search.',
      synthesize: fenced({ answer: 'From general knowledge.', key_points: [], used_results: [], notes: null })
    })
    const search = twoResultsPerCall()

    const result = await buildController(invoker, search).run({ question: 'q?', config: config() })

    expect(result.kind).toBe('fallback_synthesized')
    expect(result.terminationReason).toBe('planner_failure')
    expect(result.rounds).toBe(0)
    expect(result.ledger).toEqual([])
    expect(search.queries).toHaveLength(0)
    expect(invoker.callsFor('plan')).toHaveLength(2)
    expect(transitions(result)).toEqual(['init->planning', 'planning->synthesizing', 'synthesizing->done'])
    expect(result.answer?.answer).toBe('From general knowledge.')
  })

  it('keeps earlier evidence when selection output stays invalid', async () => {
    const invoker = new ScriptedInvoker({
      select: 'Both look good.',
      read: readerReply,
      reflect: searchPlan('follow-up'),
      synthesize: synthesis
    })
      .enqueue('plan', searchPlan('q'))
      .enqueue('select', selectFirst)
    const search = twoResultsPerCall()

    const result = await buildController(invoker, search).run({ question: 'q?', config: config({ maxRounds: 3 }) })

    expect(result.kind).toBe('fallback_synthesized')
    expect(result.terminationReason).toBe('planner_failure')
    expect(result.rounds).toBe(2)
    expect(search.queries.map((query) => query.query)).toEqual(['q', 'follow-up'])
    expect(invoker.callsFor('select')).toHaveLength(3)
    expect(result.ledger.map((entry) => entry.entryId)).toEqual(['1:r1'])
    expect(transitions(result).slice(-3)).toEqual(['searching->selecting', 'selecting->synthesizing', 'synthesizing->done'])
    expect(result.answer?.usedResults).toEqual(['1:r1'])
  })

  it('falls back to synthesis when the planner provider is unavailable', async () => {
    const invoker = new ScriptedInvoker({
      plan: new Error('upstream 502'),
      synthesize: fenced({ answer: 'Partial answer.', key_points: [], used_results: [], notes: null })
    })

    const result = await buildController(invoker, twoResultsPerCall()).run({ question: 'q?', config: config() })

    expect(result.kind).toBe('fallback_synthesized')
    expect(result.terminationReason).toBe('planner_failure')
    expect(invoker.callsFor('plan')).toHaveLength(1)
    expect(result.trace.find((event) => event.type === 'error')).toMatchObject({
      kind: 'agent',
      stage: 'plan',
      reason: 'provider_error',
      message: 'upstream 502'
    })
    expect(result.answer?.answer).toBe('Partial answer.')
  })

  it('reports synthesis failure when the provider stays down', async () => {
    const invoker = new ScriptedInvoker({ plan: new Error('upstream 502'), synthesize: new Error('upstream 502') })

    const result = await buildController(invoker, twoResultsPerCall()).run({ question: 'q?', config: config() })

    expect(result.kind).toBe('synthesis_failed')
    expect(result.terminationReason).toBe('planner_failure')
    expect(result.failure).toEqual({ rawText: '', reason: 'provider_error', detail: 'upstream 502' })
    expect(result.answer).toBeUndefined()
  })

  it('falls back to synthesis when reflection output stays invalid', async () => {
    const invoker = new ScriptedInvoker({
      select: selectFirst,
      read: readerReply,
      reflect: 'Let me think about that.',
      synthesize: synthesis
    }).enqueue('plan', searchPlan('q'))

    const result = await buildController(invoker, twoResultsPerCall()).run({ question: 'q?', config: config({ maxRounds: 3 }) })

    expect(result.kind).toBe('fallback_synthesized')
    expect(result.terminationReason).toBe('planner_failure')
    expect(result.rounds).toBe(1)
    expect(invoker.callsFor('reflect')).toHaveLength(2)
    expect(result.trace.filter((event) => event.type === 'decode_failure')).toHaveLength(2)
    expect(result.answer?.answer).toBe('The answer [1:r1].')
  })

  it('returns the ledger with the raw output when synthesis fails', async () => {
    const invoker = new ScriptedInvoker({
      select: selectFirst,
      read: readerReply,
      reflect: concluded,
      synthesize: 'no json here'
    }).enqueue('plan', searchPlan('q'))

    const result = await buildController(invoker, twoResultsPerCall()).run({ question: 'q?', config: config() })

    expect(result.kind).toBe('synthesis_failed')
    expect(result.terminationReason).toBe('planner_concluded')
    expect(result.answer).toBeUndefined()
    expect(result.failure).toEqual({ rawText: 'no json here', reason: 'no_block', detail: 'output has no fenced JSON block' })
    expect(result.ledger).toHaveLength(1)
  })

  it('stops researching once the deadline has passed', async () => {
    let clock = NOW.getTime()
    const invoker = new ScriptedInvoker({ select: selectFirst, read: readerReply, reflect: concluded, synthesize: synthesis })
      .enqueue('plan', searchPlan('q'))
    const search = new FakeSearchGateway(() => {
      clock += 2_000
      return { ok: true, documents: [candidate('r1', 'https://example.com/a')] }
    })

    const result = await buildController(invoker, search, { now: () => clock }).run({
      question: 'q?',
      config: config({ runTimeoutMs: 1_000 })
    })

    expect(result.kind).toBe('fallback_synthesized')
    expect(result.terminationReason).toBe('deadline')
    expect(invoker.callsFor('reflect')).toHaveLength(0)
    expect(result.trace.find((event) => event.type === 'budget_exceeded')).toMatchObject({
      kind: 'deadline',
      limit: 1_000,
      observed: 2_000
    })
    expect(result.startedAt).toBe('2025-06-10T12:00:00.000Z')
    expect(result.durationMs).toBe(2_000)
    expect(result.answer).toBeDefined()
  })

  it('stops researching once the token budget is spent', async () => {
    const invoker = new ScriptedInvoker({ select: selectFirst, read: readerReply, reflect: concluded, synthesize: synthesis })
      .enqueue('plan', searchPlan('q'))

    const result = await buildController(invoker, twoResultsPerCall()).run({
      question: 'q?',
      config: config({ maxTotalTokens: 40 })
    })

    expect(result.terminationReason).toBe('token_budget')
    expect(result.kind).toBe('fallback_synthesized')
    expect(result.trace.find((event) => event.type === 'budget_exceeded')).toMatchObject({
      kind: 'tokens',
      limit: 40,
      observed: 45
    })
    expect(result.usage).toEqual({ inputTokens: 40, outputTokens: 20, totalTokens: 60, agentCalls: 4 })
  })

  it('keeps going with no evidence when the search fails', async () => {
    const invoker = new ScriptedInvoker({ reflect: concluded, synthesize: fenced({ answer: 'Unknown.', key_points: [], used_results: [] }) })
      .enqueue('plan', searchPlan('q'))
    const search = new FakeSearchGateway(() => ({
      ok: false,
      error: new SearchError('Search responded with 429', 'http_4xx', 429)
    }))

    const result = await buildController(invoker, search).run({ question: 'q?', config: config() })

    expect(result.kind).toBe('synthesized')
    expect(result.ledger).toEqual([])
    expect(invoker.callsFor('select')).toHaveLength(0)
    expect(result.trace.find((event) => event.type === 'error')).toMatchObject({ kind: 'search', reason: 'http_4xx' })
    expect(result.trace.find((event) => event.type === 'selection')).toMatchObject({ skipped: true, candidateCount: 0 })
    expect(transitions(result)).toContain('selecting->reflecting')
  })

  it('abandons reading and reports cancellation when the caller aborts', async () => {
    const controller = new AbortController()
    const invoker = new ScriptedInvoker({ select: selectFirst, read: readerReply, reflect: concluded, synthesize: synthesis })
      .enqueue('plan', searchPlan('q'))
    const search = new FakeSearchGateway(() => {
      controller.abort()
      return { ok: true, documents: [candidate('r1', 'https://example.com/a')] }
    })
    const fetcher = new FakeDocumentFetcher()

    const result = await buildController(invoker, search, { fetcher }).run({
      question: 'q?',
      config: config(),
      signal: controller.signal
    })

    expect(result.terminationReason).toBe('cancelled')
    expect(fetcher.requested).toEqual([])
    expect(result.ledger.map((entry) => [entry.status, entry.notes])).toEqual([['fetch_failed', ABANDONED_NOTE]])
    expect(result.trace.some((event) => event.type === 'error' && event.kind === 'cancelled')).toBe(true)
  })

  it('keeps the question and config it was started with', async () => {
    const invoker = new ScriptedInvoker().enqueue('plan', fenced({ action: 'direct_answer', direct_answer: 'yes' }))

    const result = await buildController(invoker, twoResultsPerCall()).run({
      question: 'Is water wet?',
      config: config({ maxRounds: 2 }),
      runId: 'run_fixed'
    })

    expect(result.runId).toBe('run_fixed')
    expect(result.question).toBe('Is water wet?')
    expect(result.config.maxRounds).toBe(2)
  })
})

describe('canTransition', () => {
  it('only allows the documented edges', () => {
    expect(canTransition('init', 'planning')).toBe(true)
    expect(canTransition('selecting', 'reflecting')).toBe(true)
    expect(canTransition('searching', 'done')).toBe(false)
    expect(canTransition('done', 'planning')).toBe(false)
  })
})
