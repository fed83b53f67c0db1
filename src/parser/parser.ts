// Core Parser class: token cursor helpers and per-parse state.
// Expression methods are added to the prototype by expressions.ts.

import { Token, TokenKind, eofToken } from '../lexer/token'
import { ParseError } from '../errors'
import { NodeBuilder } from '../ast/builders'
import { DEFAULT_PRECEDENCE_TABLE, PrecedenceTable } from './precedence'

// Deepest chain of nested subexpressions a parse accepts. Keeps recursion well
// inside the default call stack.
export const DEFAULT_MAX_DEPTH = 1000

export class Parser {
  tokens: Token[]
  pos: number
  table: PrecedenceTable
  builder: NodeBuilder
  depth: number
  maxDepth: number
  private eof: Token

  constructor(
    tokens: Token[],
    table: PrecedenceTable = DEFAULT_PRECEDENCE_TABLE,
    builder: NodeBuilder = new NodeBuilder(''),
    maxDepth: number = DEFAULT_MAX_DEPTH,
  ) {
    this.tokens = tokens
    this.pos = 0
    this.table = table
    this.builder = builder
    this.depth = 0
    this.maxDepth = maxDepth
    this.eof = eofToken(tokens.length > 0 ? tokens[tokens.length - 1].end : 0)
  }

  // --- Token access helpers ---
  get position(): number {
    return this.pos
  }

  atEof(): boolean {
    return this.pos >= this.tokens.length
  }

  peek(): TokenKind {
    return this.peekToken().kind
  }

  peekToken(): Token {
    if (this.pos < this.tokens.length) {
      return this.tokens[this.pos]
    }
    return this.eof
  }

  advance(): Token {
    if (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos]
      this.pos++
      return tok
    }
    return this.eof
  }

  expect(expected: TokenKind): Token {
    if (this.peek() === expected) {
      return this.advance()
    }
    throw ParseError.mismatch(expected, this.peekToken(), this.pos)
  }

  // --- Nesting depth ---
  enterNested(): void {
    this.depth++
    if (this.depth > this.maxDepth) {
      throw new ParseError(
        `expression nested too deeply at token ${this.pos}`,
        this.pos,
        this.peekToken(),
      )
    }
  }

  leaveNested(): void {
    this.depth--
  }

  unexpected(): ParseError {
    return ParseError.unexpected(this.peekToken(), this.pos)
  }
}
