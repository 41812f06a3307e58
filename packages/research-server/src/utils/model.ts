import type { AgentRole } from '@deepseeker/shared'

/**
 * Model resolution per agent role.
 *
 * Precedence:
 *  1) DEEPSEEKER_PLANNER_MODEL / DEEPSEEKER_READER_MODEL
 *  2) OPENAI_DEFAULT_MODEL
 *  3) OPENAI_MODEL (legacy)
 *  4) role fallback
 */
export const PLANNER_MODEL_FALLBACK = 'gpt-4o'
export const READER_MODEL_FALLBACK = 'gpt-4o-mini'

const DEFAULT_MAX_OUTPUT_TOKENS: Record<AgentRole, number> = {
  planner: 4096,
  reader: 1536
}

export function getModelName(role: AgentRole): string {
  const roleSpecific = role === 'planner' ? process.env.DEEPSEEKER_PLANNER_MODEL : process.env.DEEPSEEKER_READER_MODEL
  const m =
    roleSpecific ||
    process.env.OPENAI_DEFAULT_MODEL ||
    process.env.OPENAI_MODEL ||
    (role === 'planner' ? PLANNER_MODEL_FALLBACK : READER_MODEL_FALLBACK)
  return m.trim()
}

export function getMaxOutputTokens(role: AgentRole): number {
  const raw = role === 'planner' ? process.env.DEEPSEEKER_PLANNER_MAX_TOKENS : process.env.DEEPSEEKER_READER_MAX_TOKENS
  const parsed = Number.parseInt(raw || '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_OUTPUT_TOKENS[role]
}

export function getAgentTimeoutMs(): number {
  const parsed = Number(process.env.DEEPSEEKER_AGENT_TIMEOUT_MS || 120000)
  return Number.isFinite(parsed) && parsed >= 1000 ? parsed : 120000
}
