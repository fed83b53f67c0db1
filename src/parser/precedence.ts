// Operator precedence tables consulted by the precedence-climbing parser.
//
// Higher precedence binds tighter. Unary and binary operators live in
// separate tables, so `-` can be both negation and subtraction.

import { z } from 'zod'
import { Token, TokenKind } from '../lexer/token'
import { OperatorTableError, ParseError } from '../errors'

export type Associativity = 'none' | 'left' | 'right'

export interface PrecedenceEntry {
  readonly symbol: string
  readonly precedence: number
  readonly associativity: Associativity
}

export interface PrecedenceTableInput {
  unary: readonly PrecedenceEntry[]
  binary: readonly PrecedenceEntry[]
}

// Parentheses are grouping punctuation, never operators.
const operatorSymbol = z.enum(['=', '+', '-', '*', '/', '^'])

const entrySchema = z.object({
  symbol: operatorSymbol,
  precedence: z.number().int().nonnegative(),
  associativity: z.enum(['none', 'left', 'right']),
})

const binaryEntrySchema = entrySchema.extend({
  associativity: z.enum(['left', 'right'], {
    errorMap: () => ({ message: 'binary operators must be left- or right-associative' }),
  }),
})

function rejectDuplicates(
  entries: readonly { symbol: string }[],
  table: 'unary' | 'binary',
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>()
  entries.forEach((entry, i) => {
    if (seen.has(entry.symbol)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [table, i, 'symbol'],
        message: `duplicate symbol '${entry.symbol}'`,
      })
    }
    seen.add(entry.symbol)
  })
}

const tableSchema = z
  .object({
    unary: z.array(entrySchema),
    binary: z.array(binaryEntrySchema),
  })
  .superRefine((table, ctx) => {
    rejectDuplicates(table.unary, 'unary', ctx)
    rejectDuplicates(table.binary, 'binary', ctx)
  })

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.')
  return path === '' ? issue.message : `${path}: ${issue.message}`
}

function indexBySymbol(entries: readonly PrecedenceEntry[]): Map<string, PrecedenceEntry> {
  return new Map(entries.map((e) => [e.symbol, Object.freeze({ ...e })]))
}

/**
 * Validated operator table. Entries are only reachable through lookups, so a
 * table cannot change after it is created.
 */
export class PrecedenceTable {
  readonly #unary: Map<string, PrecedenceEntry>
  readonly #binary: Map<string, PrecedenceEntry>

  private constructor(unary: readonly PrecedenceEntry[], binary: readonly PrecedenceEntry[]) {
    this.#unary = indexBySymbol(unary)
    this.#binary = indexBySymbol(binary)
    Object.freeze(this)
  }

  /**
   * Validate a precedence table description and index it by symbol.
   * Throws OperatorTableError listing every problem found.
   */
  static create(input: PrecedenceTableInput): PrecedenceTable {
    const result = tableSchema.safeParse(input)
    if (!result.success) {
      throw new OperatorTableError(result.error.issues.map(formatIssue))
    }
    return new PrecedenceTable(result.data.unary, result.data.binary)
  }

  unaryEntry(symbol: string): PrecedenceEntry | undefined {
    return this.#unary.get(symbol)
  }

  binaryEntry(symbol: string): PrecedenceEntry | undefined {
    return this.#binary.get(symbol)
  }

  // Fresh copies, in declaration order.
  unaryEntries(): PrecedenceEntry[] {
    return [...this.#unary.values()]
  }

  binaryEntries(): PrecedenceEntry[] {
    return [...this.#binary.values()]
  }
}

export function createPrecedenceTable(input: PrecedenceTableInput): PrecedenceTable {
  return PrecedenceTable.create(input)
}

// Unary minus deliberately outranks `^`: `-2^3` parses as `(-2)^3`.
export const DEFAULT_PRECEDENCE_TABLE: PrecedenceTable = createPrecedenceTable({
  unary: [{ symbol: '-', precedence: 4, associativity: 'none' }],
  binary: [
    { symbol: '=', precedence: 0, associativity: 'left' },
    { symbol: '+', precedence: 1, associativity: 'left' },
    { symbol: '-', precedence: 1, associativity: 'left' },
    { symbol: '*', precedence: 2, associativity: 'left' },
    { symbol: '/', precedence: 2, associativity: 'left' },
    { symbol: '^', precedence: 3, associativity: 'right' },
  ],
})

function isOperatorToken(token: Token): boolean {
  return token.kind !== TokenKind.Value && token.kind !== TokenKind.Eof
}

export function isUnaryOperator(table: PrecedenceTable, token: Token): boolean {
  return isOperatorToken(token) && table.unaryEntry(token.text) !== undefined
}

export function isBinaryOperator(table: PrecedenceTable, token: Token): boolean {
  return isOperatorToken(token) && table.binaryEntry(token.text) !== undefined
}

export function unaryEntry(table: PrecedenceTable, token: Token, position: number): PrecedenceEntry {
  const entry = table.unaryEntry(token.text)
  if (entry === undefined) {
    throw new ParseError(`invalid unary operator '${token.text}' at token ${position}`, position, token)
  }
  return entry
}

export function binaryEntry(table: PrecedenceTable, token: Token, position: number): PrecedenceEntry {
  const entry = table.binaryEntry(token.text)
  if (entry === undefined) {
    throw new ParseError(`invalid binary operator '${token.text}' at token ${position}`, position, token)
  }
  return entry
}

/**
 * Minimum precedence for the right operand of a binary operator.
 * Left-associative operators raise the floor so an equal-precedence operator
 * ends the operand; right-associative ones keep it so the operand absorbs it.
 */
export function nextMinPrecedence(entry: PrecedenceEntry): number {
  switch (entry.associativity) {
    case 'left':
      return entry.precedence + 1
    case 'right':
      return entry.precedence
    case 'none':
      throw new OperatorTableError([
        `binary operator '${entry.symbol}' has no associativity`,
      ])
  }
}
