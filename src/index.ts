// Public API for the infix expression parser.
// Usage: import { parse } from 'infix-parser-ts';

import { Scanner } from './lexer/scanner'
import type { Token } from './lexer/token'
import { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
import { NodeBuilder } from './ast/builders'
import { DEFAULT_PRECEDENCE_TABLE, PrecedenceTable } from './parser/precedence'
import * as AST from './ast/nodes'

// Import parser extensions to register prototype methods
import './parser/expressions'

export interface ParseOptions {
  // Operator precedences and associativities. Default: DEFAULT_PRECEDENCE_TABLE.
  table?: PrecedenceTable
  // Compute loc { line, column } for each node. Default: false.
  loc?: boolean
  // Deepest nesting of groups, unary operands and right operands. Default: 1000.
  maxDepth?: number
}

export function tokenize(source: string): Token[] {
  return new Scanner(source).scan()
}

/**
 * Parse one infix expression into an AST.
 * Throws ParseError on malformed input; never returns a partial tree.
 */
export function parse(source: string, options?: ParseOptions): AST.Expression {
  const table = options?.table ?? DEFAULT_PRECEDENCE_TABLE
  const includeLoc = options?.loc ?? false
  const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH
  const builder = new NodeBuilder(source, includeLoc)
  const parser = new Parser(tokenize(source), table, builder, maxDepth)
  return parser.parseExpression()
}

// Re-export types for consumers
export { AST }
export { TokenKind, tokenKindName } from './lexer/token'
export type { Token } from './lexer/token'
export { Scanner } from './lexer/scanner'
export { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
export {
  DEFAULT_PRECEDENCE_TABLE,
  PrecedenceTable,
  createPrecedenceTable,
} from './parser/precedence'
export type {
  Associativity,
  PrecedenceEntry,
  PrecedenceTableInput,
} from './parser/precedence'
export { ParseError, OperatorTableError } from './errors'
export { astEquals } from './ast/equality'
export { printParenthesized, printSExpr } from './ast/printer'
