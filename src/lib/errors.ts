/**
 * Dictionary error types.
 * Each error carries the offending variable name or raw value as typed fields so
 * callers can branch on `code` instead of parsing messages.
 */

import type { Code } from '../types'

export type DictionaryErrorCode =
  | 'VARNAME_RESOLUTION_FAILURE'
  | 'UNKNOWN_VARIABLE'
  | 'MALFORMED_FLATTENED_CODE'
  | 'DUPLICATE_CODE'
  | 'CODING_EXPRESSION'
  | 'INVALID_TABLE'
  | 'RESULT_SHAPE'

/** Base class for all errors raised by this package. */
export class DictionaryError extends Error {
  readonly code: DictionaryErrorCode

  constructor(code: DictionaryErrorCode, message: string) {
    super(message)
    this.name = 'DictionaryError'
    this.code = code
  }
}

/** No metadata varname, and the result shape offers no usable name. */
export class VarnameResolutionFailure extends DictionaryError {
  readonly argument: string
  readonly shape: string

  constructor(argument: string, shape: string) {
    super('VARNAME_RESOLUTION_FAILURE', `cannot determine varname from ${argument}: no meta or names (${shape})`)
    this.name = 'VarnameResolutionFailure'
    this.argument = argument
    this.shape = shape
  }
}

export class UnknownVariableError extends DictionaryError {
  readonly varname: string

  constructor(varname: string) {
    super('UNKNOWN_VARIABLE', `'${varname}' does not exist in the data dictionary`)
    this.name = 'UnknownVariableError'
    this.varname = varname
  }
}

export class MalformedFlattenedCodeError extends DictionaryError {
  readonly entry: string
  readonly index: number

  constructor(entry: string, index: number) {
    super('MALFORMED_FLATTENED_CODE', `flattened code ${JSON.stringify(entry)} at index ${index} is not "<group code> <code>"`)
    this.name = 'MalformedFlattenedCodeError'
    this.entry = entry
    this.index = index
  }
}

export class DuplicateCodeError extends DictionaryError {
  readonly varname: string
  readonly duplicate: Code

  constructor(varname: string, duplicate: Code) {
    super('DUPLICATE_CODE', `coding for '${varname}' repeats code ${String(duplicate)}`)
    this.name = 'DuplicateCodeError'
    this.varname = varname
    this.duplicate = duplicate
  }
}

export class CodingExpressionError extends DictionaryError {
  readonly expr: string
  readonly position: number

  constructor(expr: string, position: number, reason: string) {
    super('CODING_EXPRESSION', `${reason} at position ${position} in ${JSON.stringify(expr)}`)
    this.name = 'CodingExpressionError'
    this.expr = expr
    this.position = position
  }
}

/** A descriptions or codings table row failed validation. */
export class InvalidTableError extends DictionaryError {
  readonly table: 'descriptions' | 'codings'
  /** 1-based data row, or 0 for the header */
  readonly row: number
  readonly issues: string[]

  constructor(table: 'descriptions' | 'codings', row: number, issues: string[]) {
    super('INVALID_TABLE', `${table} table row ${row}: ${issues.join('; ')}`)
    this.name = 'InvalidTableError'
    this.table = table
    this.row = row
    this.issues = issues
  }
}

export class ResultShapeError extends DictionaryError {
  readonly reason: string

  constructor(reason: string) {
    super('RESULT_SHAPE', reason)
    this.name = 'ResultShapeError'
    this.reason = reason
  }
}
