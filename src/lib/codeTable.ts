/**
 * Per-variable coding: ordered code → label pairs for one categorical variable.
 * Entries keep the order they were specified in (ascending code order by convention).
 */

import type { Code, ValueLabel } from '../types'
import { DuplicateCodeError } from './errors'

export interface CodeTable {
  readonly varname: string
  readonly entries: readonly ValueLabel[]
  readonly codes: readonly Code[]
  readonly labels: readonly string[]
  /** Label for a code, or undefined when the code is not in the table. */
  label(code: Code): string | undefined
  /** Labels for each code; unmatched codes come back undefined. */
  labelsFor(codes: readonly Code[]): (string | undefined)[]
}

/** Codes compare by string form so "1" read from a flattened code matches numeric 1. */
function codeKey(code: Code): string {
  return String(code)
}

export function createCodeTable(varname: string, entries: readonly ValueLabel[]): CodeTable {
  const byCode = new Map<string, string>()
  for (const { code, label } of entries) {
    const key = codeKey(code)
    if (byCode.has(key)) throw new DuplicateCodeError(varname, code)
    byCode.set(key, label)
  }

  const frozen = Object.freeze(entries.map((e) => Object.freeze({ code: e.code, label: e.label })))
  const codes = Object.freeze(frozen.map((e) => e.code))
  const labels = Object.freeze(frozen.map((e) => e.label))

  const label = (code: Code) => byCode.get(codeKey(code))

  return Object.freeze({
    varname,
    entries: frozen,
    codes,
    labels,
    label,
    labelsFor: (values: readonly Code[]) => values.map(label),
  })
}

/** Swap codes and labels: the reverse table maps each label back to its code. */
export function reverseCodeTable(table: CodeTable): Map<string, Code> {
  return new Map(table.entries.map((e) => [e.label, e.code]))
}
