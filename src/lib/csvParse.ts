import Papa from 'papaparse'
import { z } from 'zod'
import type { CodingRow, DescriptionRow } from '../types'
import { InvalidTableError } from './errors'

type TableName = 'descriptions' | 'codings'

const cell = z.string().default('')

const DescriptionRowSchema = z.object({
  Varname: cell,
  Description: cell,
})

const CodingRowSchema = z
  .object({
    Varname: cell,
    CodingsExpr: z.string().optional(),
    Codings_Expr: z.string().optional(),
  })
  .transform((r): CodingRow => ({ Varname: r.Varname, CodingsExpr: r.CodingsExpr ?? r.Codings_Expr ?? '' }))

/** Parse a headed CSV into trimmed records; blank lines are skipped, rows of empty cells are kept. */
function parseRecords(csvText: string, table: TableName, required: string[][]): Record<string, unknown>[] {
  const parsed = Papa.parse<Record<string, unknown>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
    transform: (v) => v.trim(),
  })

  const quoteError = parsed.errors.find((e) => e.type === 'Quotes')
  if (quoteError) throw new InvalidTableError(table, (quoteError.row ?? -1) + 1, [quoteError.message])

  const fields = parsed.meta.fields ?? []
  const missing = required
    .filter((alternatives) => !alternatives.some((f) => fields.includes(f)))
    .map((alternatives) => `missing column ${alternatives.join(' or ')}`)
  if (missing.length > 0) throw new InvalidTableError(table, 0, missing)

  return parsed.data
}

function validateRows<S extends z.ZodTypeAny>(records: Record<string, unknown>[], table: TableName, schema: S): z.output<S>[] {
  return records.map((record, i) => {
    const result = schema.safeParse(record)
    if (!result.success) {
      throw new InvalidTableError(
        table,
        i + 1,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      )
    }
    return result.data
  })
}

/** Descriptions table: Varname, Description; other columns are ignored. */
export function parseDescriptionsCsv(csvText: string): DescriptionRow[] {
  const records = parseRecords(csvText, 'descriptions', [['Varname'], ['Description']])
  return validateRows(records, 'descriptions', DescriptionRowSchema)
}

/** Codings table: Varname, CodingsExpr (Codings_Expr also accepted); other columns are ignored. */
export function parseCodingsCsv(csvText: string): CodingRow[] {
  const records = parseRecords(csvText, 'codings', [['Varname'], ['CodingsExpr', 'Codings_Expr']])
  return validateRows(records, 'codings', CodingRowSchema)
}
