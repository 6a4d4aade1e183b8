/**
 * Labelled summary tables of simulated variables. Each table carries `meta.varname`
 * so a Dictionary can describe it later.
 */

import { mean, quantile, sum } from 'simple-statistics'
import type { Code, LabeledTable, ResultMeta, ResultValue } from '../types'
import type { CodeTable } from './codeTable'
import { ResultShapeError } from './errors'

/** Label used for values that fall outside every bin. */
export const NA_LABEL = 'NA'

function compareCodes(a: Code, b: Code): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  const sa = String(a)
  const sb = String(b)
  return sa < sb ? -1 : sa > sb ? 1 : 0
}

function percentages(counts: number[], total: number): (number | null)[] {
  return counts.map((c) => (total > 0 ? (c / total) * 100 : null))
}

/**
 * Percentage frequency table of a categorical variable, one entry per distinct value
 * (ascending), labelled "<category> (%)". Missing values are not counted.
 */
export function tableCatvar(values: readonly (Code | null | undefined)[], codeTable: CodeTable): LabeledTable {
  const counts = new Map<string, { code: Code; n: number }>()
  for (const v of values) {
    if (v == null || v === '') continue
    const entry = counts.get(String(v))
    if (entry) entry.n++
    else counts.set(String(v), { code: v, n: 1 })
  }
  const entries = Array.from(counts.values()).sort((a, b) => compareCodes(a.code, b.code))
  const n = entries.map((e) => e.n)

  return {
    kind: 'table',
    dimensions: [
      {
        name: codeTable.varname,
        labels: entries.map((e) => `${codeTable.label(e.code) ?? String(e.code)} (%)`),
      },
    ],
    values: percentages(n, sum(n)),
    meta: { varname: codeTable.varname },
  }
}

/**
 * Percentage table of a continuous variable binned by `breaks` into right-closed
 * intervals (lo,hi]. The first break must sit below the smallest value; values outside
 * every bin are counted under NA, which only appears when there are some.
 */
export function tableContvar(values: readonly (number | null)[], breaks: readonly number[], varname: string): LabeledTable {
  if (breaks.length < 2) throw new ResultShapeError(`breaks for '${varname}' need at least two cut points`)
  for (let i = 1; i < breaks.length; i++) {
    if (!(breaks[i] > breaks[i - 1])) throw new ResultShapeError(`breaks for '${varname}' must be strictly increasing`)
  }

  const counts = Array<number>(breaks.length - 1).fill(0)
  let outside = 0
  for (const v of values) {
    const bin = v == null || Number.isNaN(v) ? -1 : breaks.findIndex((lo, i) => i < breaks.length - 1 && v > lo && v <= breaks[i + 1])
    if (bin < 0) outside++
    else counts[bin]++
  }

  const labels = counts.map((_, i) => `(${breaks[i]},${breaks[i + 1]}]`)
  if (outside > 0) {
    labels.push(NA_LABEL)
    counts.push(outside)
  }

  return {
    kind: 'table',
    dimensions: [{ name: varname, labels }],
    values: percentages(counts, values.length),
    meta: { varname },
  }
}

function percentLabel(p: number): string {
  return `${Number((p * 100).toFixed(6))}%`
}

/** Quantiles of a continuous variable, labelled "0%", "25%", ... */
export function quantileTable(values: readonly number[], probs: readonly number[], varname: string): LabeledTable {
  if (values.length === 0) throw new ResultShapeError(`no values to take quantiles of for '${varname}'`)
  const bad = probs.find((p) => !(p >= 0 && p <= 1))
  if (bad !== undefined) throw new ResultShapeError(`quantile probability ${bad} is outside [0, 1]`)

  const sample = values.slice()
  return {
    kind: 'table',
    dimensions: [{ name: varname, labels: probs.map(percentLabel) }],
    values: probs.map((p) => quantile(sample, p)),
    meta: { varname },
  }
}

/** Mean of a continuous variable, tagged with the supplied metadata. */
export function meanResult(values: readonly number[], meta: ResultMeta): ResultValue {
  if (values.length === 0) throw new ResultShapeError(`no values to average for '${meta.varname ?? 'result'}'`)
  return { kind: 'value', value: mean(values.slice()), meta }
}

export interface MeansAndErrs {
  means: Record<string, number>
  errs: Record<string, number>
}

/**
 * Split a collated result row into means and error amounts.
 * A row such as { '0% Mean': 5, '0% Lower': 4, '0% Upper': 6 } gives means { '0%': 5 }
 * and errs { '0%': 1 } (Mean minus Lower, paired by position). A row without any Lower
 * entries is all means, with zero errors.
 */
export function resultAsMeansAndErrs(row: Readonly<Record<string, number>>): MeansAndErrs {
  const keys = Object.keys(row)
  const meanKeys = keys.filter((k) => k.includes('Mean'))
  const lowerKeys = keys.filter((k) => k.includes('Lower'))

  if (meanKeys.length !== lowerKeys.length) {
    throw new ResultShapeError(`result row has ${meanKeys.length} Mean and ${lowerKeys.length} Lower values`)
  }

  if (lowerKeys.length === 0) {
    return {
      means: { ...row },
      errs: Object.fromEntries(keys.map((k) => [k, 0])),
    }
  }

  const means: Record<string, number> = {}
  const errs: Record<string, number> = {}
  meanKeys.forEach((k, i) => {
    const name = k.replace(/Mean/g, '').trim()
    means[name] = row[k]
    errs[name] = row[k] - row[lowerKeys[i]]
  })
  return { means, errs }
}
