import { describe, it, expect } from 'vitest'
import { configFromEnv, defaultConfig } from './config'

describe('configFromEnv', () => {
  it('falls back to the defaults', () => {
    expect(configFromEnv({})).toEqual({ baselineWeighting: 'weightBase', scenarioSuffix: ' scenario' })
    expect(configFromEnv({ PATH: '/usr/bin' })).toEqual(defaultConfig)
  })

  it('reads overrides', () => {
    expect(configFromEnv({ DICTIONARY_BASELINE_WEIGHTING: ' base ', DICTIONARY_SCENARIO_SUFFIX: ' (alt)' })).toEqual({
      baselineWeighting: 'base',
      scenarioSuffix: ' (alt)',
    })
  })

  it('rejects a blank baseline tag', () => {
    expect(() => configFromEnv({ DICTIONARY_BASELINE_WEIGHTING: '   ' })).toThrow()
  })
})
