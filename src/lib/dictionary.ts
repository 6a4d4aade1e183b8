/**
 * Data dictionary: variable descriptions and category codings, and the lookups that
 * turn raw simulation output into labels people can read.
 *
 * A Dictionary is built once and never mutated; pass it to whatever needs labels
 * rather than keeping one in module state, so several studies can coexist.
 */

import type { Code, CodingEvaluator, CodingRow, Describable, DescriptionRow, ResultMeta } from '../types'
import { createCodeTable, type CodeTable } from './codeTable'
import { evaluateCodingExpr } from './codingExpr'
import { defaultConfig, type DictionaryConfig } from './config'
import { UnknownVariableError, VarnameResolutionFailure } from './errors'
import { parseFlattenedCodes } from './flattenedCode'

export type Logger = Pick<Console, 'debug' | 'warn'>

export interface DictionaryOptions {
  /** Evaluates CodingsExpr; defaults to the literal c(...) evaluator */
  evaluate?: CodingEvaluator
  logger?: Logger
  config?: Partial<DictionaryConfig>
}

export interface Dictionary {
  readonly descriptions: ReadonlyMap<string, string>
  readonly codeTables: ReadonlyMap<string, CodeTable>
  readonly config: Readonly<DictionaryConfig>

  /**
   * Category labels for coded values. Values come back unchanged when varname is
   * missing or has no coding; an unmatched value becomes undefined.
   */
  matchCodes<T extends Code>(values: readonly T[], varname?: string | null): readonly (T | string | undefined)[]

  /**
   * Labels for flattened codes. With a grpbyTag each entry is "<group code> <code>" and
   * resolves to "<group label> <label>"; without one entries are plain codes.
   */
  matchFlattenedCodes(
    flatCodes: readonly string[],
    varname?: string | null,
    grpbyTag?: string | null
  ): readonly (string | undefined)[]

  /**
   * Ordered category labels per variable, undefined for variables without a coding.
   * Keyed by varname, so a name asked for twice appears once.
   */
  codingLabelsFor(varnames: readonly string[]): Map<string, readonly string[] | undefined>

  /**
   * Human-readable description of a result: its variable's description plus any
   * grouping, weighting and set qualifiers from its metadata.
   * `argument` names the value in errors (defaults to "result").
   */
  resolveDescription(result: Describable, argument?: string): string

  /** Results sorted by resolved description (stable). */
  orderByDescription<T extends Describable>(...items: T[]): T[]
}

/** Where the variable name of a result comes from, checked in this order. */
type VarnameSource =
  | { shape: 'metadataTagged'; varname: string }
  | { shape: 'labeledMultiDim'; varname: string }
  | { shape: 'textSequence'; varname: string }
  | { shape: 'unrecognized'; seen: string }

function isTextArray(x: Describable): x is readonly string[] {
  return Array.isArray(x)
}

function metaOf(x: Describable): ResultMeta | undefined {
  if (typeof x === 'string' || isTextArray(x)) return undefined
  return x.meta
}

function hasText(s: string | null | undefined): s is string {
  return s != null && s !== ''
}

function varnameSource(x: Describable): VarnameSource {
  const varname = metaOf(x)?.varname
  if (hasText(varname)) return { shape: 'metadataTagged', varname }

  if (typeof x === 'string') return { shape: 'textSequence', varname: x }
  if (isTextArray(x)) {
    return x.length > 0 ? { shape: 'textSequence', varname: x[0] } : { shape: 'unrecognized', seen: 'empty text sequence' }
  }

  switch (x.kind) {
    case 'table': {
      const names = x.dimensions.map((d) => d.name).filter(hasText)
      return names.length > 0
        ? { shape: 'labeledMultiDim', varname: names[names.length - 1] }
        : { shape: 'unrecognized', seen: 'table without dimension names' }
    }
    case 'text':
      return x.values.length > 0
        ? { shape: 'textSequence', varname: x.values[0] }
        : { shape: 'unrecognized', seen: 'empty text sequence' }
    case 'value':
      return { shape: 'unrecognized', seen: 'value without metadata' }
    default: {
      const _exhaustive: never = x
      return { shape: 'unrecognized', seen: String(_exhaustive) }
    }
  }
}

function buildDescriptions(rows: readonly DescriptionRow[], logger: Logger): Map<string, string> {
  const descriptions = new Map<string, string>()
  let dropped = 0
  for (const row of rows) {
    if (!hasText(row.Varname)) {
      dropped++
      continue
    }
    if (descriptions.has(row.Varname)) {
      logger.warn(`dictionary: duplicate description for '${row.Varname}', keeping the first`)
      continue
    }
    descriptions.set(row.Varname, row.Description)
  }
  if (dropped > 0) logger.debug(`dictionary: dropped ${dropped} description rows without Varname`)
  return descriptions
}

function buildCodeTables(rows: readonly CodingRow[], evaluate: CodingEvaluator, logger: Logger): Map<string, CodeTable> {
  const tables = new Map<string, CodeTable>()
  let dropped = 0
  for (const row of rows) {
    if (!hasText(row.Varname) || !hasText(row.CodingsExpr)) {
      dropped++
      continue
    }
    if (tables.has(row.Varname)) {
      logger.warn(`dictionary: duplicate coding for '${row.Varname}', keeping the first`)
      continue
    }
    tables.set(row.Varname, createCodeTable(row.Varname, evaluate(row.CodingsExpr)))
  }
  if (dropped > 0) logger.debug(`dictionary: dropped ${dropped} coding rows without Varname or CodingsExpr`)
  return tables
}

export function createDictionary(
  descriptionRows: readonly DescriptionRow[],
  codingRows?: readonly CodingRow[] | null,
  options: DictionaryOptions = {}
): Dictionary {
  const logger = options.logger ?? console
  const config: Readonly<DictionaryConfig> = Object.freeze({
    baselineWeighting: options.config?.baselineWeighting ?? defaultConfig.baselineWeighting,
    scenarioSuffix: options.config?.scenarioSuffix ?? defaultConfig.scenarioSuffix,
  })
  const descriptions = buildDescriptions(descriptionRows, logger)
  const codeTables = codingRows
    ? buildCodeTables(codingRows, options.evaluate ?? evaluateCodingExpr, logger)
    : new Map<string, CodeTable>()

  for (const varname of codeTables.keys()) {
    if (!descriptions.has(varname)) logger.warn(`dictionary: coding for '${varname}' has no description`)
  }

  function matchCodes<T extends Code>(values: readonly T[], varname?: string | null): readonly (T | string | undefined)[] {
    if (!hasText(varname)) return values
    const table = codeTables.get(varname)
    if (!table) return values
    return table.labelsFor(values)
  }

  function matchFlattenedCodes(
    flatCodes: readonly string[],
    varname?: string | null,
    grpbyTag?: string | null
  ): readonly (string | undefined)[] {
    if (!hasText(grpbyTag)) return matchCodes(flatCodes, varname)

    return parseFlattenedCodes(flatCodes).map(({ groupCode, varCode }) => {
      const [groupLabel] = matchCodes([groupCode], grpbyTag)
      const [label] = matchCodes([varCode], varname)
      if (groupLabel === undefined || label === undefined) return undefined
      return `${groupLabel} ${label}`
    })
  }

  function codingLabelsFor(varnames: readonly string[]): Map<string, readonly string[] | undefined> {
    return new Map(varnames.map((v): [string, readonly string[] | undefined] => [v, codeTables.get(v)?.labels]))
  }

  function resolveDescription(result: Describable, argument = 'result'): string {
    const meta: ResultMeta = metaOf(result) ?? {}
    const source = varnameSource(result)
    if (source.shape === 'unrecognized') throw new VarnameResolutionFailure(argument, source.seen)

    const description = descriptions.get(source.varname)
    if (!hasText(description)) throw new UnknownVariableError(source.varname)

    const { grouping: groupingText, grpbyTag, weighting: weightingTag, set: setText } = meta
    let grouping = ''
    if (hasText(groupingText)) grouping = ` by ${groupingText}`
    else if (hasText(grpbyTag)) grouping = ` by ${resolveDescription(grpbyTag, 'grpbyTag')}`

    const weighting =
      weightingTag === undefined || weightingTag === config.baselineWeighting ? '' : config.scenarioSuffix
    const set = hasText(setText) ? ` (${setText})` : ''

    return description + grouping + weighting + set
  }

  function orderByDescription<T extends Describable>(...items: T[]): T[] {
    const keyed = items.map((item, i) => ({ item, i, key: resolveDescription(item, `items[${i}]`) }))
    keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : a.i - b.i))
    return keyed.map((k) => k.item)
  }

  return Object.freeze({
    descriptions,
    codeTables,
    config,
    matchCodes,
    matchFlattenedCodes,
    codingLabelsFor,
    resolveDescription,
    orderByDescription,
  })
}
