import type { Token } from '../lexer/token'
import type { Expression } from './nodes'

function sameToken(a: Token, b: Token): boolean {
  return a.kind === b.kind && a.text === b.text
}

/**
 * Structural equality: same shape, same token kinds and texts, recursively.
 * Spans and locations are ignored, so `1+2` equals `(1) + (2)`.
 */
export function astEquals(a: Expression, b: Expression): boolean {
  // Explicit work list: long operator chains are as deep as they are wide.
  const pending: [Expression, Expression][] = [[a, b]]
  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [x, y] = pair
    switch (x.type) {
      case 'Value':
        if (y.type !== 'Value' || !sameToken(x.token, y.token)) return false
        break
      case 'UnaryOp':
        if (y.type !== 'UnaryOp' || !sameToken(x.operator, y.operator)) return false
        pending.push([x.operand, y.operand])
        break
      case 'BinaryOp':
        if (y.type !== 'BinaryOp' || !sameToken(x.operator, y.operator)) return false
        pending.push([x.right, y.right], [x.left, y.left])
        break
    }
  }
  return true
}
