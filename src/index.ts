export type {
  AnnotatedResult,
  Code,
  CodingEvaluator,
  CodingRow,
  Describable,
  DescriptionRow,
  LabeledTable,
  ResultMeta,
  ResultValue,
  TableDimension,
  TextSequence,
  ValueLabel,
} from './types'
export { createCodeTable, reverseCodeTable, type CodeTable } from './lib/codeTable'
export { evaluateCodingExpr } from './lib/codingExpr'
export { configFromEnv, defaultConfig, type DictionaryConfig } from './lib/config'
export { parseCodingsCsv, parseDescriptionsCsv } from './lib/csvParse'
export { createDictionary, type Dictionary, type DictionaryOptions, type Logger } from './lib/dictionary'
export {
  CodingExpressionError,
  DictionaryError,
  DuplicateCodeError,
  InvalidTableError,
  MalformedFlattenedCodeError,
  ResultShapeError,
  UnknownVariableError,
  VarnameResolutionFailure,
  type DictionaryErrorCode,
} from './lib/errors'
export { parseFlattenedCode, parseFlattenedCodes, type FlattenedCode } from './lib/flattenedCode'
export { loadDictionary } from './lib/loadDictionary'
export {
  NA_LABEL,
  meanResult,
  quantileTable,
  resultAsMeansAndErrs,
  tableCatvar,
  tableContvar,
  type MeansAndErrs,
} from './lib/statsTables'
