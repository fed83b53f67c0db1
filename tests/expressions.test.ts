import { parse, printSExpr, createPrecedenceTable, ParseError, TokenKind } from '../src/index'
import type { ParseOptions, PrecedenceEntry } from '../src/index'

/** Helper: parse and render as an S-expression */
function sexpr(source: string, options?: ParseOptions) {
  return printSExpr(parse(source, options))
}

/** Helper: capture the ParseError thrown for an input */
function parseError(source: string, options?: ParseOptions): ParseError {
  try {
    parse(source, options)
  } catch (err) {
    if (err instanceof ParseError) return err
    throw err
  }
  throw new Error(`expected ${JSON.stringify(source)} to be rejected`)
}

const defaultBinary: PrecedenceEntry[] = [
  { symbol: '=', precedence: 0, associativity: 'left' },
  { symbol: '+', precedence: 1, associativity: 'left' },
  { symbol: '-', precedence: 1, associativity: 'left' },
  { symbol: '*', precedence: 2, associativity: 'left' },
  { symbol: '/', precedence: 2, associativity: 'left' },
  { symbol: '^', precedence: 3, associativity: 'right' },
]

describe('expressions', () => {
  describe('primaries', () => {
    it('parses a single value', () => {
      const expr = parse('42')
      expect(expr.type).toBe('Value')
      if (expr.type === 'Value') {
        expect(expr.token.kind).toBe(TokenKind.Value)
        expect(expr.token.text).toBe('42')
      }
    })

    it('drops redundant parentheses', () => {
      expect(sexpr('((a))')).toBe('a')
    })

    it('parses a parenthesized subexpression', () => {
      expect(sexpr('(1+2)*3')).toBe('(* (+ 1 2) 3)')
    })
  })

  describe('associativity', () => {
    it('groups exponentiation to the right', () => {
      expect(sexpr('1^2^3')).toBe('(^ 1 (^ 2 3))')
    })

    it('groups subtraction to the left', () => {
      expect(sexpr('1-2-3')).toBe('(- (- 1 2) 3)')
    })

    it('groups division to the left', () => {
      expect(sexpr('1/2/3')).toBe('(/ (/ 1 2) 3)')
    })

    it('groups assignment to the left', () => {
      expect(sexpr('a = b = c')).toBe('(= (= a b) c)')
    })

    it('groups mixed same-precedence operators to the left', () => {
      expect(sexpr('1+2-3+4')).toBe('(+ (- (+ 1 2) 3) 4)')
    })
  })

  describe('precedence', () => {
    it('binds multiplication tighter than addition', () => {
      expect(sexpr('1+2*3')).toBe('(+ 1 (* 2 3))')
      expect(sexpr('1*2+3')).toBe('(+ (* 1 2) 3)')
    })

    it('binds exponentiation tighter than multiplication', () => {
      expect(sexpr('2*3^2')).toBe('(* 2 (^ 3 2))')
    })

    it('binds assignment loosest', () => {
      expect(sexpr('x = 1 + 2')).toBe('(= x (+ 1 2))')
    })
  })

  describe('unary minus', () => {
    it('binds tighter than exponentiation on its operand', () => {
      expect(sexpr('-2^3')).toBe('(^ (- 2) 3)')
    })

    it('applies to a parenthesized operand', () => {
      expect(sexpr('-(2^3)')).toBe('(- (^ 2 3))')
    })

    it('applies to the right operand of exponentiation', () => {
      expect(sexpr('2^-3')).toBe('(^ 2 (- 3))')
    })

    it('nests', () => {
      expect(sexpr('--1')).toBe('(- (- 1))')
    })

    it('follows a binary minus', () => {
      expect(sexpr('1 - -1')).toBe('(- 1 (- 1))')
    })

    it('binds tighter than multiplication and addition', () => {
      expect(sexpr('-a*b')).toBe('(* (- a) b)')
      expect(sexpr('-a+b')).toBe('(+ (- a) b)')
    })
  })

  describe('whitespace', () => {
    it('parses the same tree with or without spaces', () => {
      expect(sexpr('1+2')).toBe(sexpr('1 + 2'))
      expect(sexpr('\t1\n+\r\n2 ')).toBe('(+ 1 2)')
    })
  })

  describe('spans', () => {
    it('spans a binary operation from left to right operand', () => {
      const expr = parse('1 + 2*3')
      expect(expr.start).toBe(0)
      expect(expr.end).toBe(7)
      if (expr.type === 'BinaryOp') {
        expect(expr.right.start).toBe(4)
        expect(expr.right.end).toBe(7)
      }
    })

    it('spans a unary operation from the operator', () => {
      const expr = parse(' -x')
      expect(expr.type).toBe('UnaryOp')
      expect([expr.start, expr.end]).toEqual([1, 3])
    })

    it('excludes grouping parentheses', () => {
      const expr = parse('(1+2)')
      expect([expr.start, expr.end]).toEqual([1, 4])
    })
  })

  describe('locations', () => {
    it('omits loc by default', () => {
      expect(parse('a + b').loc).toBeUndefined()
    })

    it('computes line and column when requested', () => {
      const expr = parse('a +\n  b', { loc: true })
      expect(expr.loc).toEqual({ start: { line: 1, column: 0 }, end: { line: 2, column: 3 } })
      if (expr.type === 'BinaryOp') {
        expect(expr.right.loc).toEqual({
          start: { line: 2, column: 2 },
          end: { line: 2, column: 3 },
        })
      }
    })

    it('finds the line of a node past several line breaks', () => {
      const expr = parse('1\n*\n-x', { loc: true })
      expect(expr.loc).toEqual({ start: { line: 1, column: 0 }, end: { line: 3, column: 2 } })
      if (expr.type === 'BinaryOp') {
        expect(expr.right.loc).toEqual({
          start: { line: 3, column: 0 },
          end: { line: 3, column: 2 },
        })
      }
    })
  })

  describe('malformed input', () => {
    it('rejects an unbalanced parenthesis', () => {
      const err = parseError('(1+2')
      expect(err.message).toBe('expected paren-close but found end-of-input at token 4')
      expect(err.expected).toBe(TokenKind.ParenClose)
      expect(err.position).toBe(4)
    })

    it('rejects a missing operand', () => {
      const err = parseError('1++2')
      expect(err.message).toBe("unexpected plus '+' at token 2")
      expect(err.expected).toBeUndefined()
    })

    it('rejects empty input', () => {
      expect(parseError('').message).toBe('unexpected end-of-input at token 0')
      expect(parseError('   ').message).toBe('unexpected end-of-input at token 0')
    })

    it('rejects trailing tokens', () => {
      expect(parseError('1+2)').message).toBe(
        "expected end-of-input but found paren-close ')' at token 3",
      )
      expect(parseError('1 2').message).toBe(
        "expected end-of-input but found value '2' at token 1",
      )
    })

    it('rejects empty parentheses', () => {
      expect(parseError('()').message).toBe("unexpected paren-close ')' at token 1")
    })

    it('rejects a dangling operator', () => {
      expect(parseError('1+').message).toBe('unexpected end-of-input at token 2')
      expect(parseError('-').message).toBe('unexpected end-of-input at token 1')
      expect(parseError('*1').message).toBe("unexpected times '*' at token 0")
    })
  })

  describe('nesting depth', () => {
    it('rejects deeply nested parentheses with a ParseError', () => {
      const source = '('.repeat(3000) + '1' + ')'.repeat(3000)
      const err = parseError(source)
      expect(err.message).toBe('expression nested too deeply at token 1000')
      expect(err.position).toBe(1000)
      expect(err.token.kind).toBe(TokenKind.ParenOpen)
    })

    it('rejects a long run of unary minuses', () => {
      const err = parseError('-'.repeat(5000) + '1')
      expect(err.message).toBe('expression nested too deeply at token 1000')
      expect(err.token.kind).toBe(TokenKind.Minus)
    })

    it('rejects a long right-associative chain', () => {
      const err = parseError(Array(20000).fill('1').join('^'))
      expect(err.message).toBe('expression nested too deeply at token 2000')
      expect(err.token.kind).toBe(TokenKind.Value)
    })

    it('accepts nesting up to the default limit', () => {
      const source = '('.repeat(999) + '1' + ')'.repeat(999)
      expect(sexpr(source)).toBe('1')
    })

    it('accepts a long left-associative chain at constant depth', () => {
      const ast = parse(Array(100000).fill('1').join('+'))
      expect(ast.type).toBe('BinaryOp')
      expect(ast.end).toBe(199999)
    })

    it('honors a custom limit', () => {
      expect(sexpr('(1)', { maxDepth: 2 })).toBe('1')
      const err = parseError('((1))', { maxDepth: 2 })
      expect(err.message).toBe('expression nested too deeply at token 2')
      expect(err.position).toBe(2)
    })
  })

  describe('custom tables', () => {
    it('groups subtraction to the right when configured', () => {
      const table = createPrecedenceTable({
        unary: [],
        binary: [{ symbol: '-', precedence: 1, associativity: 'right' }],
      })
      expect(sexpr('1-2-3', { table })).toBe('(- 1 (- 2 3))')
    })

    it('groups exponentiation to the left when configured', () => {
      const table = createPrecedenceTable({
        unary: [],
        binary: [{ symbol: '^', precedence: 3, associativity: 'left' }],
      })
      expect(sexpr('1^2^3', { table })).toBe('(^ (^ 1 2) 3)')
    })

    it('lets unary minus take a whole product when it binds loosest', () => {
      const table = createPrecedenceTable({
        unary: [{ symbol: '-', precedence: 0, associativity: 'none' }],
        binary: defaultBinary,
      })
      expect(sexpr('-2*3', { table })).toBe('(- (* 2 3))')
      expect(sexpr('-2*3')).toBe('(* (- 2) 3)')
    })

    it('supports a unary plus', () => {
      const table = createPrecedenceTable({
        unary: [{ symbol: '+', precedence: 4, associativity: 'none' }],
        binary: defaultBinary,
      })
      expect(sexpr('+1 + 2', { table })).toBe('(+ (+ 1) 2)')
    })

    it('rejects a leading minus without a unary table entry', () => {
      const table = createPrecedenceTable({ unary: [], binary: defaultBinary })
      expect(() => parse('-1', { table })).toThrow("unexpected minus '-' at token 0")
    })

    it('stops at operators missing from the binary table', () => {
      const table = createPrecedenceTable({
        unary: [],
        binary: [{ symbol: '+', precedence: 0, associativity: 'left' }],
      })
      expect(() => parse('1*2', { table })).toThrow(
        "expected end-of-input but found times '*' at token 1",
      )
    })
  })
})
