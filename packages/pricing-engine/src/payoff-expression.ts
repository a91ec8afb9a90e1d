/**
 * Payoff Expressions
 *
 * A user-authored formula such as `max(s - 100, 0)` is parsed into a small
 * syntax tree and interpreted directly. The grammar only admits numbers,
 * the terminal price (s, S or S_T), + - * / **, parentheses, and calls to
 * max, min and abs, so text arriving from an untrusted caller can never
 * reach the host runtime.
 *
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('**' unary)?
 *   primary := NUMBER | VARIABLE | FUNCTION '(' expr (',' expr)* ')' | '(' expr ')'
 *
 * `**` binds tighter than a leading sign and is right associative, so
 * -2**2 = -4 and 2**3**2 = 512.
 */

import { PayoffEvaluationError, PayoffParseError } from './errors'
import { tokenize } from './payoff-lexer'
import type { FunctionName, Token, VariableName } from './payoff-lexer'

// ---------------------------------------------------------------------------
// Syntax tree
// ---------------------------------------------------------------------------

export type BinaryOperator = '+' | '-' | '*' | '/' | '**'

export type PayoffNode =
  | { type: 'number'; value: number }
  | { type: 'variable'; name: VariableName }
  | { type: 'unary'; operator: '+' | '-'; operand: PayoffNode }
  | { type: 'binary'; operator: BinaryOperator; left: PayoffNode; right: PayoffNode }
  | { type: 'call'; fn: FunctionName; args: PayoffNode[] }

/** Argument count bounds per function: [min, max] */
const ARITY: Record<FunctionName, [number, number]> = {
  abs: [1, 1],
  max: [2, Infinity],
  min: [2, Infinity],
}

const MAX_DEPTH = 100

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class Parser {
  private index = 0
  private depth = 0

  constructor(private readonly tokens: Token[]) {}

  parse(): PayoffNode {
    const root = this.expr()
    const next = this.peek()
    if (next.kind !== 'end') {
      throw unexpected(next)
    }
    return root
  }

  // Each chained operator adds a level to the left spine of the tree, so
  // chains spend the same depth budget as parentheses and calls.
  private expr(): PayoffNode {
    const depth = this.depth
    let left = this.term()
    while (this.isOperator('+') || this.isOperator('-')) {
      this.descend()
      const operator = this.advance().text === '+' ? '+' : '-'
      left = { type: 'binary', operator, left, right: this.term() }
    }
    this.depth = depth
    return left
  }

  private term(): PayoffNode {
    const depth = this.depth
    let left = this.unary()
    while (this.isOperator('*') || this.isOperator('/')) {
      this.descend()
      const operator = this.advance().text === '*' ? '*' : '/'
      left = { type: 'binary', operator, left, right: this.unary() }
    }
    this.depth = depth
    return left
  }

  private unary(): PayoffNode {
    if (this.isOperator('+') || this.isOperator('-')) {
      const operator = this.advance().text === '+' ? '+' : '-'
      return this.nested(() => ({ type: 'unary', operator, operand: this.unary() }))
    }
    return this.power()
  }

  private power(): PayoffNode {
    const base = this.primary()
    if (this.isOperator('**')) {
      this.advance()
      return this.nested(() => ({ type: 'binary', operator: '**', left: base, right: this.unary() }))
    }
    return base
  }

  private primary(): PayoffNode {
    const token = this.advance()

    switch (token.kind) {
      case 'number': {
        const value = Number(token.text)
        if (!Number.isFinite(value)) {
          throw new PayoffParseError(
            `Number "${token.text}" at position ${token.position} is out of range`,
            token.text,
            token.position,
          )
        }
        return { type: 'number', value }
      }

      case 'variable': {
        const name = token.text
        if (name !== 's' && name !== 'S' && name !== 'S_T') throw unexpected(token)
        if (this.peek().kind === 'lparen') {
          throw new PayoffParseError(
            `"${name}" is the terminal price and cannot be called`,
            name,
            token.position,
          )
        }
        return { type: 'variable', name }
      }

      case 'function':
        return this.call(token)

      case 'lparen': {
        const inner = this.nested(() => this.expr())
        this.expect('rparen', ')')
        return inner
      }

      default:
        throw unexpected(token)
    }
  }

  private call(token: Token): PayoffNode {
    const fn = token.text
    if (fn !== 'max' && fn !== 'min' && fn !== 'abs') throw unexpected(token)
    if (this.peek().kind !== 'lparen') {
      throw new PayoffParseError(
        `Function "${fn}" at position ${token.position} must be called with arguments`,
        fn,
        token.position,
      )
    }
    this.advance()

    const args: PayoffNode[] = []
    if (this.peek().kind !== 'rparen') {
      args.push(this.nested(() => this.expr()))
      while (this.peek().kind === 'comma') {
        this.advance()
        args.push(this.nested(() => this.expr()))
      }
    }
    this.expect('rparen', ')')

    const [min, max] = ARITY[fn]
    if (args.length < min || args.length > max) {
      const expected = min === max ? `exactly ${min}` : `at least ${min}`
      throw new PayoffParseError(
        `${fn}() takes ${expected} argument${min === 1 ? '' : 's'}, got ${args.length}`,
        fn,
        token.position,
      )
    }

    return { type: 'call', fn, args }
  }

  private nested(build: () => PayoffNode): PayoffNode {
    this.descend()
    const node = build()
    this.depth--
    return node
  }

  private descend(): void {
    if (++this.depth > MAX_DEPTH) {
      const token = this.peek()
      throw new PayoffParseError(
        `Expression nests deeper than ${MAX_DEPTH} levels`,
        token.text,
        token.position,
      )
    }
  }

  private expect(kind: Token['kind'], text: string): void {
    const token = this.advance()
    if (token.kind !== kind) {
      throw new PayoffParseError(
        token.kind === 'end'
          ? `Expected "${text}" but the expression ended`
          : `Expected "${text}" but found "${token.text}" at position ${token.position}`,
        token.text,
        token.position,
      )
    }
  }

  private isOperator(text: string): boolean {
    const token = this.peek()
    return token.kind === 'operator' && token.text === text
  }

  private peek(): Token {
    return this.tokens[this.index]!
  }

  private advance(): Token {
    const token = this.tokens[this.index]!
    if (token.kind !== 'end') this.index++
    return token
  }
}

function unexpected(token: Token): PayoffParseError {
  if (token.kind === 'end') {
    return new PayoffParseError('Unexpected end of expression', '', token.position)
  }
  return new PayoffParseError(
    `Unexpected "${token.text}" at position ${token.position}`,
    token.text,
    token.position,
  )
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function evaluateNode(node: PayoffNode, s: number): number {
  switch (node.type) {
    case 'number':
      return node.value

    case 'variable':
      return s

    case 'unary': {
      const value = evaluateNode(node.operand, s)
      return node.operator === '-' ? -value : value
    }

    case 'binary':
      return checked(applyBinary(node.operator, evaluateNode(node.left, s), evaluateNode(node.right, s), s), s)

    case 'call': {
      const args = node.args.map((arg) => evaluateNode(arg, s))
      switch (node.fn) {
        case 'abs':
          return Math.abs(args[0]!)
        case 'max':
          return Math.max(...args)
        case 'min':
          return Math.min(...args)
      }
    }
  }
}

function applyBinary(operator: BinaryOperator, left: number, right: number, s: number): number {
  switch (operator) {
    case '+':
      return left + right
    case '-':
      return left - right
    case '*':
      return left * right
    case '/':
      if (right === 0) throw new PayoffEvaluationError('Division by zero', s)
      return left / right
    case '**':
      if (left === 0 && right < 0) {
        throw new PayoffEvaluationError('Zero raised to a negative power', s)
      }
      if (left < 0 && !Number.isInteger(right)) {
        throw new PayoffEvaluationError('Negative number raised to a fractional power', s)
      }
      return left ** right
  }
}

function checked(value: number, s: number): number {
  if (!Number.isFinite(value)) {
    throw new PayoffEvaluationError('Numeric overflow', s)
  }
  return value
}

function collectVariables(node: PayoffNode, into: Set<VariableName>): Set<VariableName> {
  switch (node.type) {
    case 'variable':
      into.add(node.name)
      break
    case 'unary':
      collectVariables(node.operand, into)
      break
    case 'binary':
      collectVariables(node.left, into)
      collectVariables(node.right, into)
      break
    case 'call':
      for (const arg of node.args) collectVariables(arg, into)
      break
  }
  return into
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** A parsed, validated payoff formula over the terminal price. */
export class PayoffExpression {
  /** Names of the terminal price the formula references, in first-use order */
  readonly variables: readonly VariableName[]

  private constructor(
    readonly source: string,
    readonly root: PayoffNode,
  ) {
    this.variables = [...collectVariables(root, new Set())]
  }

  /**
   * @throws PayoffParseError naming the offending token when the source is
   *   empty, malformed, or uses anything outside the allowlist
   */
  static parse(source: string): PayoffExpression {
    if (source.trim() === '') {
      throw new PayoffParseError('Payoff expression must not be empty', '', 0)
    }
    const root = new Parser(tokenize(source)).parse()
    return new PayoffExpression(source, root)
  }

  /**
   * Payoff at one terminal price.
   *
   * @throws PayoffEvaluationError on division by zero, an undefined power,
   *   or a non-finite intermediate result
   */
  evaluate(terminalPrice: number): number {
    return evaluateNode(this.root, terminalPrice)
  }
}

export function parsePayoff(source: string): PayoffExpression {
  return PayoffExpression.parse(source)
}
