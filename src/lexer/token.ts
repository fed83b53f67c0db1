/**
 * Token kinds recognized by the expression lexer.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 */
export const enum TokenKind {
  // Literals
  Value = 0,

  // Operators
  Equals = 1,
  Plus = 2,
  Minus = 3,
  Times = 4,
  Divide = 5,
  Exponent = 6,

  // Punctuation
  ParenOpen = 7,
  ParenClose = 8,

  // Special
  Eof = 9,
}

/**
 * A token with its kind, exact lexeme and source location.
 * The synthetic end-of-input token has empty text.
 */
export interface Token {
  readonly kind: TokenKind
  readonly text: string
  readonly start: number
  readonly end: number
}

export function eofToken(offset: number): Token {
  return { kind: TokenKind.Eof, text: '', start: offset, end: offset }
}

/**
 * Convert an operator character code to its token kind.
 * Returns undefined for anything that belongs in a value token.
 */
export function operatorKindFromChar(c: number): TokenKind | undefined {
  switch (c) {
    case 0x3d /* = */:
      return TokenKind.Equals
    case 0x2b /* + */:
      return TokenKind.Plus
    case 0x2d /* - */:
      return TokenKind.Minus
    case 0x2a /* * */:
      return TokenKind.Times
    case 0x2f /* / */:
      return TokenKind.Divide
    case 0x5e /* ^ */:
      return TokenKind.Exponent
    case 0x28 /* ( */:
      return TokenKind.ParenOpen
    case 0x29 /* ) */:
      return TokenKind.ParenClose
    default:
      return undefined
  }
}

// Display name used in diagnostics.
export function tokenKindName(kind: TokenKind): string {
  switch (kind) {
    case TokenKind.Value:
      return 'value'
    case TokenKind.Equals:
      return 'equals'
    case TokenKind.Plus:
      return 'plus'
    case TokenKind.Minus:
      return 'minus'
    case TokenKind.Times:
      return 'times'
    case TokenKind.Divide:
      return 'divide'
    case TokenKind.Exponent:
      return 'exponent'
    case TokenKind.ParenOpen:
      return 'paren-open'
    case TokenKind.ParenClose:
      return 'paren-close'
    case TokenKind.Eof:
      return 'end-of-input'
  }
}

/**
 * Describe a token for an error message: its kind, plus the quoted lexeme
 * unless it is the end-of-input marker.
 */
export function describeToken(token: Token): string {
  if (token.kind === TokenKind.Eof) return tokenKindName(token.kind)
  return `${tokenKindName(token.kind)} '${token.text}'`
}
