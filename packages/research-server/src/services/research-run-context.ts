import { ResearchRunConfigSchema, type BudgetKind, type ResearchRunConfig } from '@deepseeker/shared'
import { EvidenceLedger } from './evidence-ledger'
import { RunTrace } from './run-trace'
import { UsageTracker } from './usage-tracker'

export type ResearchRunContextInit = {
  runId: string
  correlationId: string
  question: string
  config: ResearchRunConfig
  /** Caller-owned cancellation */
  signal?: AbortSignal
  trace?: RunTrace
  now?: () => number
}

export type BudgetStop = 'deadline' | 'token_budget' | 'cancelled'

export class BudgetExceededError extends Error {
  constructor(
    public readonly kind: BudgetKind,
    public readonly limit: number,
    public readonly observed: number
  ) {
    super(`Run budget exceeded: ${kind} (limit ${limit}, observed ${observed})`)
    this.name = 'BudgetExceededError'
  }
}

/**
 * Everything a research run carries between stages. The question and config
 * are fixed at construction; the round only moves forward.
 */
export class ResearchRunContext {
  readonly runId: string
  readonly correlationId: string
  readonly question: string
  readonly config: Readonly<ResearchRunConfig>
  readonly ledger = new EvidenceLedger()
  readonly usage: UsageTracker
  readonly trace: RunTrace
  readonly startedAtMs: number
  /** Queries already issued, oldest first */
  readonly searchHistory: string[] = []
  /** Aborts on caller cancellation or when the run deadline passes */
  readonly signal: AbortSignal
  readonly externalSignal: AbortSignal | undefined

  private readonly deadlineController = new AbortController()
  private readonly deadlineTimer: ReturnType<typeof setTimeout>
  private readonly now: () => number
  private round = 0

  constructor(init: ResearchRunContextInit) {
    this.runId = init.runId
    this.correlationId = init.correlationId
    this.question = init.question
    this.config = Object.freeze(ResearchRunConfigSchema.parse(init.config))
    this.now = init.now ?? Date.now
    this.startedAtMs = this.now()
    this.usage = new UsageTracker(this.config.maxTotalTokens)
    this.trace = init.trace ?? new RunTrace(init.runId, init.correlationId, { now: this.now })
    this.externalSignal = init.signal
    this.signal = init.signal
      ? AbortSignal.any([init.signal, this.deadlineController.signal])
      : this.deadlineController.signal
    this.deadlineTimer = setTimeout(() => this.deadlineController.abort(), this.config.runTimeoutMs)
    this.deadlineTimer.unref()
  }

  get currentRound() {
    return this.round
  }

  get elapsedMs() {
    return this.now() - this.startedAtMs
  }

  /** Moves to the next round; refuses to pass the configured cap. */
  startRound(): number {
    if (this.round >= this.config.maxRounds) {
      throw new BudgetExceededError('rounds', this.config.maxRounds, this.round + 1)
    }
    this.round += 1
    this.trace.setRound(this.round)
    return this.round
  }

  get cancelled() {
    return this.externalSignal?.aborted ?? false
  }

  get deadlineReached() {
    if (!this.deadlineController.signal.aborted && this.elapsedMs >= this.config.runTimeoutMs) {
      this.deadlineController.abort()
    }
    return this.deadlineController.signal.aborted
  }

  /** First budget that forbids further research, if any. Cancellation wins over the others. */
  budgetStop(): BudgetStop | null {
    if (this.cancelled) return 'cancelled'
    if (this.deadlineReached) return 'deadline'
    if (!this.usage.withinBudget()) return 'token_budget'
    return null
  }

  dispose() {
    clearTimeout(this.deadlineTimer)
  }
}
