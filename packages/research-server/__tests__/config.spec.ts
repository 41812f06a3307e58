// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { buildRunConfig, resolveEnvRunConfig } from '../src/utils/config'

describe('resolveEnvRunConfig', () => {
  it('reads run limits from the environment', () => {
    expect(
      resolveEnvRunConfig({
        DEEPSEEKER_MAX_ROUNDS: '4',
        DEEPSEEKER_CONCURRENCY: '2',
        DEEPSEEKER_MAX_TOTAL_TOKENS: '50000',
        DEEPSEEKER_SEARCH_FRESHNESS: 'Week'
      })
    ).toEqual({ maxRounds: 4, concurrency: 2, maxTotalTokens: 50000, defaultRecency: 'week' })
  })

  it('drops values that fail validation', () => {
    expect(resolveEnvRunConfig({ DEEPSEEKER_MAX_ROUNDS: '99', DEEPSEEKER_CONCURRENCY: 'many', DEEPSEEKER_SELECTION_CAP: '3' })).toEqual({
      perRoundSelectionCap: 3
    })
  })
})

describe('buildRunConfig', () => {
  it('lets request overrides win over the environment', () => {
    const config = buildRunConfig({ maxRounds: 1 }, { DEEPSEEKER_MAX_ROUNDS: '4', DEEPSEEKER_RUN_TIMEOUT_MS: '60000' })
    expect(config).toEqual({
      maxRounds: 1,
      concurrency: 5,
      perRoundResultCap: 10,
      perRoundSelectionCap: 5,
      runTimeoutMs: 60000,
      minRelevanceForSynthesis: 0,
      defaultRecency: 'any'
    })
  })

  it('ignores overrides left undefined', () => {
    expect(buildRunConfig({ maxRounds: undefined }, { DEEPSEEKER_MAX_ROUNDS: '4' }).maxRounds).toBe(4)
  })

  it('throws on invalid overrides', () => {
    expect(() => buildRunConfig({ concurrency: 0 }, {})).toThrow(ZodError)
  })
})
