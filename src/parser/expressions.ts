// Expression parsing by precedence climbing.
//
// One routine, parseClimb(minPrec), replaces a grammar rule per precedence
// level:
//   expression -> climb(0)
//   climb(p)   -> primary { binop climb(q) }   while prec(binop) >= p
//   primary    -> unop climb(prec(unop)) | "(" expression ")" | value
//
// q is prec(binop) + 1 for left-associative operators and prec(binop) for
// right-associative ones.

import { Parser } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import {
  binaryEntry,
  isBinaryOperator,
  isUnaryOperator,
  nextMinPrecedence,
  unaryEntry,
} from './precedence'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseExpression(): AST.Expression
    parseExpr(): AST.Expression
    parseClimb(minPrec: number): AST.Expression
    parsePrimary(): AST.Expression
  }
}

// === parseExpression ===
// Whole input: one expression followed by end of input.
Parser.prototype.parseExpression = function (this: Parser): AST.Expression {
  const expr = this.parseExpr()
  this.expect(TokenKind.Eof)
  return expr
}

// === parseExpr ===
Parser.prototype.parseExpr = function (this: Parser): AST.Expression {
  return this.parseClimb(0)
}

// === parseClimb ===
// Every recursive path (unary operand, parenthesized group, right operand)
// re-enters here, so the depth check bounds the whole recursion.
Parser.prototype.parseClimb = function (this: Parser, minPrec: number): AST.Expression {
  this.enterNested()
  let left = this.parsePrimary()
  while (isBinaryOperator(this.table, this.peekToken())) {
    const entry = binaryEntry(this.table, this.peekToken(), this.pos)
    if (entry.precedence < minPrec) break
    const op = this.advance()
    const right = this.parseClimb(nextMinPrecedence(entry))
    left = this.builder.binaryOp(op, left, right)
  }
  this.leaveNested()
  return left
}

// === parsePrimary ===
Parser.prototype.parsePrimary = function (this: Parser): AST.Expression {
  const tok = this.peekToken()

  if (isUnaryOperator(this.table, tok)) {
    const entry = unaryEntry(this.table, tok, this.pos)
    this.advance()
    const operand = this.parseClimb(entry.precedence)
    return this.builder.unaryOp(tok, operand)
  }

  switch (tok.kind) {
    case TokenKind.ParenOpen: {
      this.advance()
      const expr = this.parseExpr()
      this.expect(TokenKind.ParenClose)
      return expr
    }
    case TokenKind.Value:
      this.advance()
      return this.builder.value(tok)
    default:
      throw this.unexpected()
  }
}
