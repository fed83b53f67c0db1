import { Token, TokenKind, describeToken, tokenKindName } from './lexer/token'

/**
 * Syntax error raised while parsing an expression.
 * `position` is the index of the offending token in the token sequence, not a
 * character offset; the token itself carries its character span.
 */
export class ParseError extends Error {
  readonly position: number
  readonly token: Token
  readonly expected: TokenKind | undefined

  constructor(message: string, position: number, token: Token, expected?: TokenKind) {
    super(message)
    this.name = 'ParseError'
    this.position = position
    this.token = token
    this.expected = expected
  }

  static unexpected(token: Token, position: number): ParseError {
    return new ParseError(`unexpected ${describeToken(token)} at token ${position}`, position, token)
  }

  static mismatch(expected: TokenKind, token: Token, position: number): ParseError {
    return new ParseError(
      `expected ${tokenKindName(expected)} but found ${describeToken(token)} at token ${position}`,
      position,
      token,
      expected,
    )
  }
}

/**
 * An operator precedence table that cannot drive the parser:
 * a malformed entry, a duplicate symbol, or a non-associative binary operator.
 */
export class OperatorTableError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`invalid operator table: ${issues.join('; ')}`)
    this.name = 'OperatorTableError'
    this.issues = issues
  }
}
