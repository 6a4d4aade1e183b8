/**
 * Evaluate the literal coding vectors written in codings tables, e.g.
 *   c("Professional"=1, "Clerical"=2, "Semi-skilled"=3)
 *   c(No=0, Yes=1)
 * Names are labels, values are codes; order is kept as written.
 */

import type { Code, ValueLabel } from '../types'
import { CodingExpressionError } from './errors'

type Token =
  | { type: 'name'; value: string; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'number'; value: number; pos: number }
  | { type: 'punct'; value: '(' | ')' | ',' | '=' | '-' | '+'; pos: number }
  | { type: 'eof'; pos: number }

const NAME_START = /[A-Za-z.]/
const NAME_PART = /[A-Za-z0-9._]/
const NUMBER = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?L?/

function tokenize(expr: string): Token[] {
  const tokens: Token[] = []
  let i = 0
  function fail(reason: string, pos: number): never {
    throw new CodingExpressionError(expr, pos, reason)
  }

  while (i < expr.length) {
    const ch = expr[i]
    if (/\s/.test(ch)) {
      i++
      continue
    }
    if (ch === '(' || ch === ')' || ch === ',' || ch === '=' || ch === '-' || ch === '+') {
      tokens.push({ type: 'punct', value: ch, pos: i })
      i++
      continue
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      const start = i
      let value = ''
      i++
      while (i < expr.length && expr[i] !== ch) {
        if (expr[i] === '\\' && i + 1 < expr.length) {
          const next = expr[i + 1]
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next
          i += 2
          continue
        }
        value += expr[i]
        i++
      }
      if (i >= expr.length) fail('unterminated string', start)
      i++
      // backtick-quoted text is a name, never a code
      tokens.push(ch === '`' ? { type: 'name', value, pos: start } : { type: 'string', value, pos: start })
      continue
    }
    const num = NUMBER.exec(expr.slice(i))
    if (num) {
      tokens.push({ type: 'number', value: Number(num[0].replace(/L$/, '')), pos: i })
      i += num[0].length
      continue
    }
    if (NAME_START.test(ch)) {
      const start = i
      while (i < expr.length && NAME_PART.test(expr[i])) i++
      tokens.push({ type: 'name', value: expr.slice(start, i), pos: start })
      continue
    }
    fail(`unexpected character '${ch}'`, i)
  }
  tokens.push({ type: 'eof', pos: expr.length })
  return tokens
}

function describe(tok: Token): string {
  switch (tok.type) {
    case 'eof':
      return 'end of expression'
    case 'punct':
      return `'${tok.value}'`
    case 'name':
      return `name ${tok.value}`
    case 'string':
      return `string ${JSON.stringify(tok.value)}`
    case 'number':
      return `number ${tok.value}`
    default: {
      const _exhaustive: never = tok
      return String(_exhaustive)
    }
  }
}

/** Default CodingEvaluator. Throws CodingExpressionError on anything but a named literal vector. */
export function evaluateCodingExpr(expr: string): ValueLabel[] {
  const tokens = tokenize(expr)
  let at = 0

  function peek(): Token {
    return tokens[at]
  }
  function next(): Token {
    const tok = tokens[at]
    if (tok.type !== 'eof') at++
    return tok
  }
  function fail(tok: Token, expected: string): never {
    throw new CodingExpressionError(expr, tok.pos, `expected ${expected}, found ${describe(tok)}`)
  }
  function expectPunct(value: string): void {
    const tok = next()
    if (tok.type !== 'punct' || tok.value !== value) fail(tok, `'${value}'`)
  }
  function parseCode(): Code {
    let tok = next()
    if (tok.type === 'punct' && (tok.value === '-' || tok.value === '+')) {
      const sign = tok.value === '-' ? -1 : 1
      tok = next()
      if (tok.type !== 'number') fail(tok, 'a number')
      return sign * tok.value
    }
    if (tok.type === 'number') return tok.value
    if (tok.type === 'string') return tok.value
    return fail(tok, 'a code')
  }

  const head = next()
  if (head.type !== 'name' || head.value !== 'c') fail(head, "'c('")
  expectPunct('(')

  const out: ValueLabel[] = []
  const first = peek()
  if (first.type === 'punct' && first.value === ')') {
    next()
  } else {
    for (;;) {
      const nameTok = next()
      if (nameTok.type !== 'name' && nameTok.type !== 'string') fail(nameTok, 'a label')
      expectPunct('=')
      out.push({ label: nameTok.value, code: parseCode() })

      const sep = next()
      if (sep.type === 'punct' && sep.value === ')') break
      if (sep.type !== 'punct' || sep.value !== ',') fail(sep, "',' or ')'")
    }
  }

  const tail = peek()
  if (tail.type !== 'eof') fail(tail, 'end of expression')
  return out
}
