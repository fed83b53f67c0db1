import { Token, TokenKind, operatorKindFromChar } from './token'

// Character code constants
const CH_SPACE = 0x20 // ' '
const CH_TAB = 0x09
const CH_NEWLINE = 0x0a // '\n'
const CH_VTAB = 0x0b
const CH_FORMFEED = 0x0c
const CH_RETURN = 0x0d

function isWhitespace(c: number): boolean {
  return (
    c === CH_SPACE ||
    c === CH_TAB ||
    c === CH_NEWLINE ||
    c === CH_RETURN ||
    c === CH_FORMFEED ||
    c === CH_VTAB
  )
}

function isValueChar(c: number): boolean {
  return !isWhitespace(c) && operatorKindFromChar(c) === undefined
}

/**
 * Expression lexer that tokenizes input with source locations.
 * Operates on the source string via charCodeAt() for performance.
 *
 * Values are not validated: any maximal run of characters that are neither
 * whitespace nor operator symbols becomes one value token, verbatim.
 */
export class Scanner {
  private src: string
  private len: number
  private pos: number

  constructor(source: string) {
    this.src = source
    this.len = source.length
    this.pos = 0
  }

  /**
   * Eagerly scan the entire source and return all tokens.
   * The end-of-input marker is not included; the parser synthesizes it.
   */
  scan(): Token[] {
    const tokens: Token[] = []
    for (;;) {
      const tok = this.nextToken()
      if (tok === null) {
        break
      }
      tokens.push(tok)
    }
    return tokens
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private skipWhitespace(): void {
    while (this.pos < this.len && isWhitespace(this.ch())) {
      this.pos++
    }
  }

  private nextToken(): Token | null {
    this.skipWhitespace()
    if (this.pos >= this.len) {
      return null
    }

    const start = this.pos
    const kind = operatorKindFromChar(this.ch())
    if (kind !== undefined) {
      this.pos++
      return { kind, text: this.src.slice(start, this.pos), start, end: this.pos }
    }

    while (this.pos < this.len && isValueChar(this.ch())) {
      this.pos++
    }
    return { kind: TokenKind.Value, text: this.src.slice(start, this.pos), start, end: this.pos }
  }
}
