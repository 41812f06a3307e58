import type {
  CandidateDocument,
  FinalAnswer,
  ResearchResultKind,
  ResearchRunConfig,
  ResearchRunResult,
  ResearchState,
  SearchQuery,
  SynthesisFailure,
  TerminationReason
} from '@deepseeker/shared'
import { describeError, genCorrelationId, getRunLogger } from './logger'
import type { PlannerStage } from './planner-stage'
import type { ReaderDispatcher } from './reader-dispatcher'
import { ResearchRunContext, type BudgetStop } from './research-run-context'
import type { SearchGateway } from './search-gateway'

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: ResearchState,
    public readonly to: ResearchState
  ) {
    super(`Invalid research state transition ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export const RESEARCH_TRANSITIONS: Readonly<Record<ResearchState, readonly ResearchState[]>> = {
  init: ['planning'],
  planning: ['direct_answer', 'searching', 'synthesizing'],
  direct_answer: ['done'],
  searching: ['selecting'],
  selecting: ['reading', 'reflecting', 'synthesizing'],
  reading: ['reflecting'],
  reflecting: ['searching', 'synthesizing'],
  synthesizing: ['done'],
  done: []
}

export function canTransition(from: ResearchState, to: ResearchState) {
  return RESEARCH_TRANSITIONS[from].includes(to)
}

export type ResearchRunOptions = {
  question: string
  config: ResearchRunConfig
  runId?: string
  correlationId?: string
  /** Caller cancellation; the run still returns a result */
  signal?: AbortSignal
}

type ResearchLoopDeps = {
  planner: PlannerStage
  search: SearchGateway
  dispatcher: ReaderDispatcher
  now?: () => number
}

type Termination = { reason: TerminationReason; kind: ResearchResultKind }

const FALLBACK_REASONS: Record<BudgetStop, TerminationReason> = {
  deadline: 'deadline',
  token_budget: 'token_budget',
  cancelled: 'cancelled'
}

/** Drives one question through plan, search, select, read, reflect and synthesize. */
export class ResearchLoopController {
  private readonly now: () => number

  constructor(private readonly deps: ResearchLoopDeps) {
    this.now = deps.now ?? Date.now
  }

  async run(options: ResearchRunOptions): Promise<ResearchRunResult> {
    const runId = options.runId ?? `run_${genCorrelationId()}`
    const correlationId = options.correlationId ?? genCorrelationId()
    const ctx = new ResearchRunContext({
      runId,
      correlationId,
      question: options.question,
      config: options.config,
      signal: options.signal,
      now: this.now
    })
    const log = getRunLogger({ runId, correlationId })
    log.info('research_run_start', {
      question: options.question.slice(0, 200),
      maxRounds: ctx.config.maxRounds,
      concurrency: ctx.config.concurrency
    })

    try {
      const result = await new ResearchRun(ctx, this.deps).execute()
      log.info('research_run_complete', {
        kind: result.kind,
        terminationReason: result.terminationReason,
        rounds: result.rounds,
        ledgerSize: result.ledger.length,
        totalTokens: result.usage.totalTokens,
        durationMs: result.durationMs,
        ...ctx.trace.counters()
      })
      return result
    } finally {
      ctx.dispose()
    }
  }
}

class ResearchRun {
  private state: ResearchState = 'init'

  constructor(
    private readonly ctx: ResearchRunContext,
    private readonly deps: ResearchLoopDeps
  ) {}

  async execute(): Promise<ResearchRunResult> {
    const { ctx } = this
    this.transition('planning')
    const planned = await this.deps.planner.plan(ctx)

    if (!planned.ok) {
      return this.synthesize(this.fallbackTermination())
    }

    const decision = planned.value
    if (decision.action === 'direct_answer') {
      this.transition('direct_answer')
      const answer: FinalAnswer = {
        answer: decision.directAnswer ?? '',
        keyPoints: [],
        usedResults: [],
        notes: decision.notes ?? 'Answered directly without web search.'
      }
      this.transition('done')
      return this.finish({ reason: 'direct_answer', kind: 'direct_answer' }, answer)
    }

    let query: SearchQuery = decision.search
    for (;;) {
      const step = await this.runRound(query)
      if (step.kind === 'stop') {
        return this.synthesize(step.termination)
      }
      query = step.next
    }
  }

  private async runRound(
    query: SearchQuery
  ): Promise<{ kind: 'stop'; termination: Termination } | { kind: 'continue'; next: SearchQuery }> {
    const { ctx } = this
    this.transition('searching')
    const round = ctx.startRound()
    const roundStarted = ctx.elapsedMs
    ctx.searchHistory.push(query.query)
    const candidates = await this.search(query)

    this.transition('selecting')
    const selection = await this.deps.planner.select(ctx, candidates, ctx.config.perRoundSelectionCap)
    if (!selection.ok) {
      this.recordRoundTiming(roundStarted, 0)
      return { kind: 'stop', termination: this.fallbackTermination() }
    }

    const { selectedIds, rejectedIds, truncated, skipped } = selection.value
    ctx.trace.record({
      type: 'selection',
      candidateCount: candidates.length,
      selectedIds,
      rejectedIds,
      truncated,
      skipped
    })

    const byId = new Map(candidates.map((candidate) => [candidate.id, candidate]))
    const documents = selectedIds.flatMap((id) => {
      const candidate = byId.get(id)
      return candidate ? [candidate] : []
    })

    let reportCount = 0
    if (documents.length > 0) {
      this.transition('reading')
      const reports = await this.deps.dispatcher.dispatch(
        {
          question: ctx.question,
          round,
          documents,
          concurrency: ctx.config.concurrency,
          signal: ctx.signal
        },
        ctx
      )
      for (const report of reports) {
        const appended = ctx.ledger.append(report)
        if (!appended.ok) {
          ctx.trace.record({
            type: 'error',
            kind: 'ledger',
            documentId: report.documentId,
            reason: 'duplicate_ledger_entry',
            message: `Ledger already holds ${appended.existingEntryId} for ${report.url}`
          })
          continue
        }
        reportCount += 1
        ctx.trace.record({
          type: 'reader_report',
          entryId: report.entryId,
          documentId: report.documentId,
          url: report.url,
          status: report.status,
          relevanceScore: report.relevanceScore,
          ledgerIndex: appended.index
        })
      }
    }
    this.recordRoundTiming(roundStarted, reportCount)

    this.transition('reflecting')
    const stopBeforeReflect = ctx.budgetStop()
    if (stopBeforeReflect) {
      this.recordBudgetStop(stopBeforeReflect)
      return { kind: 'stop', termination: { reason: FALLBACK_REASONS[stopBeforeReflect], kind: 'fallback_synthesized' } }
    }

    const reflection = await this.deps.planner.reflect(ctx)
    if (!reflection.ok) {
      return { kind: 'stop', termination: this.fallbackTermination() }
    }
    if (reflection.value.action === 'direct_answer') {
      return { kind: 'stop', termination: { reason: 'planner_concluded', kind: 'synthesized' } }
    }
    if (round >= ctx.config.maxRounds) {
      ctx.trace.record({ type: 'budget_exceeded', kind: 'rounds', limit: ctx.config.maxRounds, observed: round })
      return { kind: 'stop', termination: { reason: 'round_cap', kind: 'synthesized' } }
    }
    const stopAfterReflect = ctx.budgetStop()
    if (stopAfterReflect) {
      this.recordBudgetStop(stopAfterReflect)
      return { kind: 'stop', termination: { reason: FALLBACK_REASONS[stopAfterReflect], kind: 'fallback_synthesized' } }
    }
    return { kind: 'continue', next: reflection.value.search }
  }

  private async search(query: SearchQuery): Promise<CandidateDocument[]> {
    const { ctx } = this
    const started = ctx.elapsedMs
    let documents: CandidateDocument[] = []
    try {
      const result = await this.deps.search.search(query, { signal: ctx.signal })
      if (result.ok) {
        documents = result.documents
      } else {
        ctx.trace.record({
          type: 'error',
          kind: 'search',
          stage: 'search',
          reason: result.error.reason,
          message: result.error.message
        })
      }
    } catch (error) {
      ctx.trace.record({ type: 'error', kind: 'search', stage: 'search', reason: 'network_error', message: describeError(error) })
    }
    ctx.trace.record({
      type: 'search',
      query: query.query,
      when: query.when,
      resultCount: documents.length,
      durationMs: ctx.elapsedMs - started
    })
    return documents
  }

  private async synthesize(termination: Termination): Promise<ResearchRunResult> {
    const { ctx } = this
    this.transition('synthesizing', termination.reason)
    const synthesis = await this.deps.planner.synthesize(ctx, ctx.externalSignal)

    if (!synthesis.ok) {
      const { failure } = synthesis
      const rawText = failure.rawTexts[failure.rawTexts.length - 1] ?? ''
      this.transition('done')
      return this.finish(
        { reason: termination.reason, kind: 'synthesis_failed' },
        undefined,
        { rawText, reason: failure.reason, detail: failure.detail }
      )
    }

    const { answer, unknownUsedResults } = synthesis.value
    if (unknownUsedResults.length > 0) {
      ctx.trace.record({
        type: 'error',
        kind: 'agent',
        stage: 'synthesize',
        reason: 'unknown_used_results',
        message: `Dropped used_results not in the ledger: ${unknownUsedResults.join(', ')}`
      })
    }
    this.transition('done')
    return this.finish(termination, answer)
  }

  /** After a planner stage failed: a passed budget explains it better than the failure itself. */
  private fallbackTermination(): Termination {
    const stop = this.ctx.budgetStop()
    if (stop) {
      this.recordBudgetStop(stop)
      return { reason: FALLBACK_REASONS[stop], kind: 'fallback_synthesized' }
    }
    return { reason: 'planner_failure', kind: 'fallback_synthesized' }
  }

  private recordBudgetStop(stop: BudgetStop) {
    const { ctx } = this
    if (stop === 'cancelled') {
      ctx.trace.record({ type: 'error', kind: 'cancelled', reason: 'cancelled', message: 'Run cancelled by caller' })
    } else if (stop === 'deadline') {
      ctx.trace.record({ type: 'budget_exceeded', kind: 'deadline', limit: ctx.config.runTimeoutMs, observed: ctx.elapsedMs })
    } else {
      ctx.trace.record({
        type: 'budget_exceeded',
        kind: 'tokens',
        limit: ctx.usage.budget ?? 0,
        observed: ctx.usage.totalTokens
      })
    }
  }

  private recordRoundTiming(startedAt: number, reports: number) {
    this.ctx.trace.record({ type: 'round_timing', durationMs: this.ctx.elapsedMs - startedAt, reports })
  }

  private transition(to: ResearchState, reason?: string) {
    const from = this.state
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to)
    }
    this.state = to
    this.ctx.trace.record({ type: 'transition', from, to, reason })
  }

  private finish(termination: Termination, answer?: FinalAnswer, failure?: SynthesisFailure): ResearchRunResult {
    const { ctx } = this
    ctx.trace.record({
      type: 'run_completed',
      kind: termination.kind,
      terminationReason: termination.reason,
      ledgerSize: ctx.ledger.size
    })
    const finishedMs = ctx.startedAtMs + ctx.elapsedMs
    return {
      runId: ctx.runId,
      question: ctx.question,
      config: { ...ctx.config },
      kind: termination.kind,
      terminationReason: termination.reason,
      ...(answer ? { answer } : {}),
      ...(failure ? { failure } : {}),
      ledger: ctx.ledger.list(),
      rounds: ctx.currentRound,
      usage: ctx.usage.summary(),
      trace: ctx.trace.list(),
      startedAt: new Date(ctx.startedAtMs).toISOString(),
      finishedAt: new Date(finishedMs).toISOString(),
      durationMs: ctx.elapsedMs
    }
  }
}
