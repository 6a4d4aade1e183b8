/** Raw category value as it appears in simulation output */
export type Code = number | string

export type ValueLabel = { code: Code; label: string }

/** Row of the descriptions table; additional columns are ignored */
export interface DescriptionRow {
  Varname: string
  Description: string
}

/** Row of the codings table; CodingsExpr is evaluated into value labels */
export interface CodingRow {
  Varname: string
  CodingsExpr: string
}

/** Turns a coding expression into ordered value labels */
export type CodingEvaluator = (expr: string) => ValueLabel[]

/** Metadata statistics functions attach to their results */
export interface ResultMeta {
  varname?: string
  /** Free-text grouping, rendered as " by <grouping>" */
  grouping?: string
  /** Variable the result is cross-tabulated by */
  grpbyTag?: string
  /** Subset qualifier, rendered as " (<set>)" */
  set?: string
  weighting?: string
}

export interface TableDimension {
  name?: string | null
  labels: string[]
}

/** Frequency, mean or quantile table with named dimensions (row-major values) */
export interface LabeledTable {
  kind: 'table'
  dimensions: TableDimension[]
  values: (number | null)[]
  meta?: ResultMeta
}

export interface TextSequence {
  kind: 'text'
  values: string[]
  meta?: ResultMeta
}

/** Scalar, vector or named row without dimension names */
export interface ResultValue {
  kind: 'value'
  value: number | number[] | Record<string, number>
  meta?: ResultMeta
}

export type AnnotatedResult = LabeledTable | TextSequence | ResultValue

/** Anything resolveDescription accepts; plain strings behave as text sequences */
export type Describable = AnnotatedResult | string | readonly string[]
