/**
 * Flattened codes come from cross-tabulated frequency tables: "2 1" is group code 2,
 * variable code 1. The group code is a single whitespace-free token; everything after
 * the first whitespace belongs to the variable code.
 */

import { MalformedFlattenedCodeError } from './errors'

export interface FlattenedCode {
  groupCode: string
  varCode: string
}

const FLATTENED = /^(\S+)\s+(.*\S)$/

export function parseFlattenedCode(entry: string, index = 0): FlattenedCode {
  const m = FLATTENED.exec(entry.trim())
  if (!m) throw new MalformedFlattenedCodeError(entry, index)
  return { groupCode: m[1], varCode: m[2] }
}

export function parseFlattenedCodes(entries: readonly string[]): FlattenedCode[] {
  return entries.map((entry, i) => parseFlattenedCode(entry, i))
}
