// AST printers. Neither is needed for parsing; they render trees for tests,
// the demo and tooling.
//
// Both walk an explicit stack of pending nodes and literal fragments, since a
// long left-associative chain nests as deep as it is long.

import type { BinaryOp, Expression, UnaryOp } from './nodes'

type Piece = Expression | string

function render(root: Expression, expand: (node: UnaryOp | BinaryOp) => Piece[]): string {
  const out: string[] = []
  const stack: Piece[] = [root]
  for (let piece = stack.pop(); piece !== undefined; piece = stack.pop()) {
    if (typeof piece === 'string') {
      out.push(piece)
    } else if (piece.type === 'Value') {
      out.push(piece.token.text)
    } else {
      const pieces = expand(piece)
      for (let i = pieces.length - 1; i >= 0; i--) stack.push(pieces[i])
    }
  }
  return out.join('')
}

/**
 * Fully parenthesized infix form, e.g. `(1 + (2 * 3))` or `(-2)`.
 * Parsing the output again yields a structurally equal tree.
 */
export function printParenthesized(expr: Expression): string {
  return render(expr, (node) =>
    node.type === 'UnaryOp'
      ? ['(' + node.operator.text, node.operand, ')']
      : ['(', node.left, ` ${node.operator.text} `, node.right, ')'],
  )
}

/** Prefix S-expression form, e.g. `(+ 1 (* 2 3))` or `(- 2)`. */
export function printSExpr(expr: Expression): string {
  return render(expr, (node) =>
    node.type === 'UnaryOp'
      ? [`(${node.operator.text} `, node.operand, ')']
      : [`(${node.operator.text} `, node.left, ' ', node.right, ')'],
  )
}
