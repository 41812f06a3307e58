import {
  ResearchRunConfigSchema,
  type ResearchRunConfig,
  type ResearchRunConfigInput
} from '@deepseeker/shared'
import { getLogger } from '../services/logger'

type ConfigKey = keyof ResearchRunConfigInput

const ENV_KEYS: Array<{ env: string; key: ConfigKey; kind: 'number' | 'string' }> = [
  { env: 'DEEPSEEKER_MAX_ROUNDS', key: 'maxRounds', kind: 'number' },
  { env: 'DEEPSEEKER_CONCURRENCY', key: 'concurrency', kind: 'number' },
  { env: 'DEEPSEEKER_SEARCH_MAX_RESULTS', key: 'perRoundResultCap', kind: 'number' },
  { env: 'DEEPSEEKER_SELECTION_CAP', key: 'perRoundSelectionCap', kind: 'number' },
  { env: 'DEEPSEEKER_RUN_TIMEOUT_MS', key: 'runTimeoutMs', kind: 'number' },
  { env: 'DEEPSEEKER_MAX_TOTAL_TOKENS', key: 'maxTotalTokens', kind: 'number' },
  { env: 'DEEPSEEKER_MIN_RELEVANCE', key: 'minRelevanceForSynthesis', kind: 'number' },
  { env: 'DEEPSEEKER_SEARCH_FRESHNESS', key: 'defaultRecency', kind: 'string' }
]

/**
 * Run config defaults taken from the environment. Values that fail validation
 * are dropped (and logged) so the schema default applies instead.
 */
export function resolveEnvRunConfig(env: NodeJS.ProcessEnv = process.env): Partial<ResearchRunConfigInput> {
  const out: Partial<Record<ConfigKey, unknown>> = {}
  for (const { env: name, key, kind } of ENV_KEYS) {
    const raw = env[name]?.trim()
    if (!raw) continue
    const value = kind === 'number' ? Number(raw) : raw.toLowerCase()
    const checked = ResearchRunConfigSchema.shape[key].safeParse(value)
    if (checked.success) {
      out[key] = checked.data
    } else {
      getLogger().warn('run_config_env_ignored', { variable: name, value: raw })
    }
  }
  return ResearchRunConfigSchema.partial().parse(out)
}

/** Environment defaults overlaid with per-request overrides. Throws ZodError on invalid overrides. */
export function buildRunConfig(
  overrides: Partial<ResearchRunConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): ResearchRunConfig {
  const merged: Partial<ResearchRunConfigInput> = { ...resolveEnvRunConfig(env) }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value })
  }
  return ResearchRunConfigSchema.parse(merged)
}
