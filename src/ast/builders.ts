// ---------------------------------------------------------------------------
// NodeBuilder -- factory for creating AST nodes with source locations
// ---------------------------------------------------------------------------

import type { Token } from '../lexer/token'
import type { BinaryOp, Expression, SourceLocation, SourcePosition, UnaryOp, Value } from './nodes'

// Offset of the first character of every line.
function lineStarts(source: string): number[] {
  const starts = [0]
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 0x0a /* \n */) starts.push(i + 1)
  }
  return starts
}

export class NodeBuilder {
  private lineStarts: number[] | null

  /**
   * @param source - the parsed input, used to map offsets to lines and columns
   * @param includeLoc - attach `loc` to every node built
   */
  constructor(source: string, includeLoc: boolean = false) {
    this.lineStarts = includeLoc ? lineStarts(source) : null
  }

  // Token offsets always lie within the source, so no clamping is needed.
  private position(offset: number, starts: number[]): SourcePosition {
    let lo = 0
    let hi = starts.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (starts[mid] <= offset) lo = mid
      else hi = mid - 1
    }
    return { line: lo + 1, column: offset - starts[lo] }
  }

  private loc(start: number, end: number): { loc?: SourceLocation } {
    const starts = this.lineStarts
    if (starts === null) return {}
    return { loc: { start: this.position(start, starts), end: this.position(end, starts) } }
  }

  value(token: Token): Value {
    const { start, end } = token
    return { type: 'Value', start, end, ...this.loc(start, end), token }
  }

  unaryOp(operator: Token, operand: Expression): UnaryOp {
    const start = operator.start
    const end = operand.end
    return { type: 'UnaryOp', start, end, ...this.loc(start, end), operator, operand }
  }

  binaryOp(operator: Token, left: Expression, right: Expression): BinaryOp {
    const start = left.start
    const end = right.end
    return { type: 'BinaryOp', start, end, ...this.loc(start, end), operator, left, right }
  }
}
