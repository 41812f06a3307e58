import type { AgentStage, RunUsageSummary, TokenUsage } from '@deepseeker/shared'

export type StageUsageRecord = {
  stage: AgentStage
  calls: number
  usage: TokenUsage
}

/**
 * Token accounting per agent stage. Repeated records for a stage (repairs,
 * later rounds, one per reader) accumulate into the same entry.
 */
export class UsageTracker {
  private readonly stageRecords = new Map<AgentStage, StageUsageRecord>()

  constructor(private readonly maxTotalTokens?: number) {}

  record(stage: AgentStage, usage: TokenUsage): void {
    const existing = this.stageRecords.get(stage)
    this.stageRecords.set(stage, {
      stage,
      calls: (existing?.calls ?? 0) + 1,
      usage: {
        inputTokens: (existing?.usage.inputTokens ?? 0) + usage.inputTokens,
        outputTokens: (existing?.usage.outputTokens ?? 0) + usage.outputTokens
      }
    })
  }

  get totalInputTokens(): number {
    let total = 0
    for (const record of this.stageRecords.values()) total += record.usage.inputTokens
    return total
  }

  get totalOutputTokens(): number {
    let total = 0
    for (const record of this.stageRecords.values()) total += record.usage.outputTokens
    return total
  }

  get totalTokens(): number {
    return this.totalInputTokens + this.totalOutputTokens
  }

  get agentCalls(): number {
    let total = 0
    for (const record of this.stageRecords.values()) total += record.calls
    return total
  }

  get budget(): number | null {
    return this.maxTotalTokens ?? null
  }

  /** False once total spend reaches the configured budget; always true without one. */
  withinBudget(): boolean {
    return this.maxTotalTokens === undefined || this.totalTokens < this.maxTotalTokens
  }

  summary(): RunUsageSummary {
    return {
      inputTokens: this.totalInputTokens,
      outputTokens: this.totalOutputTokens,
      totalTokens: this.totalTokens,
      agentCalls: this.agentCalls
    }
  }
}
