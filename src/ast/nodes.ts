// ---------------------------------------------------------------------------
// Expression AST Node Types
// ---------------------------------------------------------------------------

import type { Token } from '../lexer/token'

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

export interface SourceLocation {
  start: SourcePosition
  end: SourcePosition
}

export interface BaseNode {
  readonly type: string
  readonly start: number
  readonly end: number
  // Present only when parsing with `loc: true`.
  readonly loc?: SourceLocation
}

// ---- Expressions ----
export type Expression = Value | UnaryOp | BinaryOp

export interface Value extends BaseNode {
  readonly type: 'Value'
  readonly token: Token
}

export interface UnaryOp extends BaseNode {
  readonly type: 'UnaryOp'
  readonly operator: Token
  readonly operand: Expression
}

export interface BinaryOp extends BaseNode {
  readonly type: 'BinaryOp'
  readonly operator: Token
  readonly left: Expression
  readonly right: Expression
}
