// Precedence Climbing Parser Demo
// Prints the AST of each input, then checks that flat inputs parse to the
// same tree as their fully parenthesized equivalents.

import { parse, astEquals, printSExpr, ParseError } from '../src/index'
import type { AST } from '../src/index'

// AST Printer
function printAST(expr: AST.Expression, indent = 0): string {
  const spaces = '  '.repeat(indent)
  switch (expr.type) {
    case 'Value':
      return `${spaces}Value(${expr.token.text})`
    case 'UnaryOp':
      return `${spaces}UnaryOp(${expr.operator.text})\n${printAST(expr.operand, indent + 1)}`
    case 'BinaryOp':
      return `${spaces}BinaryOp(${expr.operator.text})\n${printAST(expr.left, indent + 1)}\n${printAST(expr.right, indent + 1)}`
  }
}

const tests = ['1 + 2', '1 + 2 * 3', '(1 + 2) * 3', '1 - 2 - 3', '1 ^ 2 ^ 3', '-2 ^ 3', 'x = y + z * w']

const equivalences: [string, string][] = [
  ['1^-2^3*4 + -5*6*-7', '((1^((-2)^3))*4) + (((-5)*6)*-7)'],
  ['1*2 + 3*(4+5)', '(1*2) + (3*(4+5))'],
]

const malformed = ['(1 + 2', '1 ++ 2', '', '1 + 2)']

console.log('=== Precedence Climbing Parser Demo ===\n')

for (const test of tests) {
  console.log(`Input: ${test}`)
  const ast = parse(test)
  console.log('AST:')
  console.log(printAST(ast))
  console.log('')
}

console.log('=== Self-check ===\n')

for (const [flat, grouped] of equivalences) {
  const a = parse(flat)
  const b = parse(grouped)
  console.log(`${flat.padEnd(34)} => ${printSExpr(a)}`)
  console.log(`${grouped.padEnd(34)} => ${printSExpr(b)}`)
  console.log(astEquals(a, b) ? 'identical\n' : 'MISMATCH\n')
}

console.log('=== Rejected inputs ===\n')

for (const input of malformed) {
  try {
    parse(input)
    console.log(`${JSON.stringify(input)}: unexpectedly accepted`)
  } catch (err) {
    if (!(err instanceof ParseError)) throw err
    console.log(`${JSON.stringify(input)}: ${err.message}`)
  }
}
