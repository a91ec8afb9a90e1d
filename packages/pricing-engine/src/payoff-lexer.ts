/**
 * Tokenizer for payoff expressions.
 *
 * Only arithmetic tokens exist in this language: numbers, allowlisted
 * names, + - * / **, parentheses and commas. Any other character, and
 * any name outside the allowlist, is rejected while scanning, so the
 * error points at the first offending construct in the source.
 */

import { PayoffParseError } from './errors'

export const VARIABLE_NAMES = ['s', 'S', 'S_T'] as const
export const FUNCTION_NAMES = ['max', 'min', 'abs'] as const

export type VariableName = (typeof VARIABLE_NAMES)[number]
export type FunctionName = (typeof FUNCTION_NAMES)[number]

export type TokenKind =
  | 'number'
  | 'variable'
  | 'function'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'end'

export interface Token {
  kind: TokenKind
  text: string
  /** Zero-based offset into the source */
  position: number
}

const NUMBER = /\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?/y
const NAME = /[A-Za-z_][A-Za-z0-9_]*/y
const WHITESPACE = /\s/

export function isVariableName(name: string): name is VariableName {
  return (VARIABLE_NAMES as readonly string[]).includes(name)
}

export function isFunctionName(name: string): name is FunctionName {
  return (FUNCTION_NAMES as readonly string[]).includes(name)
}

/** Split a payoff expression into tokens, terminated by an `end` token. */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let pos = 0

  while (pos < source.length) {
    const ch = source[pos]!

    if (WHITESPACE.test(ch)) {
      pos++
      continue
    }

    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(source[pos + 1] ?? ''))) {
      NUMBER.lastIndex = pos
      const match = NUMBER.exec(source)
      const next = match ? source[pos + match[0].length] : undefined
      if (!match || (next !== undefined && /[A-Za-z0-9_.]/.test(next))) {
        const end = scanWord(source, pos)
        const text = source.slice(pos, end)
        throw new PayoffParseError(`Malformed number "${text}" at position ${pos}`, text, pos)
      }
      tokens.push({ kind: 'number', text: match[0], position: pos })
      pos += match[0].length
      continue
    }

    if (/[A-Za-z_]/.test(ch)) {
      NAME.lastIndex = pos
      const name = NAME.exec(source)?.[0] ?? ch
      if (isVariableName(name)) {
        tokens.push({ kind: 'variable', text: name, position: pos })
      } else if (isFunctionName(name)) {
        tokens.push({ kind: 'function', text: name, position: pos })
      } else {
        throw new PayoffParseError(
          `Name "${name}" is not allowed; use ${VARIABLE_NAMES.join(', ')} ` +
          `or the functions ${FUNCTION_NAMES.join(', ')}`,
          name,
          pos,
        )
      }
      pos += name.length
      continue
    }

    if (ch === '*' && source[pos + 1] === '*') {
      tokens.push({ kind: 'operator', text: '**', position: pos })
      pos += 2
      continue
    }

    switch (ch) {
      case '+':
      case '-':
      case '*':
      case '/':
        tokens.push({ kind: 'operator', text: ch, position: pos })
        break
      case '(':
        tokens.push({ kind: 'lparen', text: ch, position: pos })
        break
      case ')':
        tokens.push({ kind: 'rparen', text: ch, position: pos })
        break
      case ',':
        tokens.push({ kind: 'comma', text: ch, position: pos })
        break
      default:
        throw new PayoffParseError(`Unexpected character "${ch}" at position ${pos}`, ch, pos)
    }
    pos++
  }

  tokens.push({ kind: 'end', text: '', position: source.length })
  return tokens
}

function scanWord(source: string, start: number): number {
  let end = start
  while (end < source.length && /[A-Za-z0-9_.+-]/.test(source[end]!)) {
    // A sign only continues the word right after an exponent marker
    if ((source[end] === '+' || source[end] === '-') && !/[eE]/.test(source[end - 1] ?? '')) break
    end++
  }
  return end
}
