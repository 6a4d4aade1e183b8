import { z } from 'zod'

export interface DictionaryConfig {
  /** Weighting tag of baseline results; those get no weighting suffix */
  baselineWeighting: string
  /** Appended to descriptions of results weighted to anything but the baseline */
  scenarioSuffix: string
}

export const defaultConfig: Readonly<DictionaryConfig> = Object.freeze({
  baselineWeighting: 'weightBase',
  scenarioSuffix: ' scenario',
})

const EnvSchema = z.object({
  DICTIONARY_BASELINE_WEIGHTING: z.string().trim().min(1).optional(),
  DICTIONARY_SCENARIO_SUFFIX: z.string().optional(),
})

/** Read overrides from the environment, e.g. DICTIONARY_BASELINE_WEIGHTING=weightBaseline. */
export function configFromEnv(env: Record<string, string | undefined> = process.env): DictionaryConfig {
  const parsed = EnvSchema.parse(env)
  return {
    baselineWeighting: parsed.DICTIONARY_BASELINE_WEIGHTING ?? defaultConfig.baselineWeighting,
    scenarioSuffix: parsed.DICTIONARY_SCENARIO_SUFFIX ?? defaultConfig.scenarioSuffix,
  }
}
