import { Effect, Either } from "effect"
import type { IToken, TokenType } from "chevrotain"
import {
  At,
  BooleanFalse,
  BooleanTrue,
  Caret,
  Colon,
  Comma,
  Dot,
  DoubleSlash,
  DoubleStar,
  ExpressionLexer,
  Identifier,
  LBrace,
  LBracket,
  LParen,
  Minus,
  NumberLiteral,
  Percent,
  Plus,
  RBrace,
  RBracket,
  RParen,
  Slash,
  Star,
  StringLiteral,
  Unknown,
} from "./tokens.js"
import type { BinaryOp, Expr, IndexArg, NodeId, RecordEntry, Span, UnaryOp } from "./Ast.js"
import { ExpressionDiagnosticError, snippet, type ExpressionDiagnostic } from "./Diagnostic.js"

interface BinaryInfo {
  readonly precedence: number
  readonly rightAssociative?: boolean
  readonly op: BinaryOp
}

const BinaryOperators = new Map<TokenType, BinaryInfo>([
  [Plus, { precedence: 6, op: "+" }],
  [Minus, { precedence: 6, op: "-" }],
  [Star, { precedence: 7, op: "*" }],
  [Slash, { precedence: 7, op: "/" }],
  [DoubleSlash, { precedence: 7, op: "//" }],
  [Percent, { precedence: 7, op: "%" }],
  [At, { precedence: 7, op: "@" }],
  [Caret, { precedence: 9, op: "^", rightAssociative: true }],
  [DoubleStar, { precedence: 9, op: "^", rightAssociative: true }],
])

// A sign binds looser than a power: -2^2 is -(2^2).
const UNARY_OPERAND_PRECEDENCE = 9

const createDiagnostic = (
  source: string,
  token: IToken | undefined,
  code: ExpressionDiagnostic["code"],
  message: string,
): ExpressionDiagnostic => {
  if (!token) {
    return { phase: "parse", code, message }
  }
  const span = spanFromToken(token)
  return { phase: "parse", code, message, span, snippet: snippet(source, span) }
}

const spanFromToken = (token: IToken): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line: token.startLine ?? 1,
  column: token.startColumn ?? 1,
})

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

const makeId = (span: Span): NodeId => `n:${span.start}:${span.end}`

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
}

// Decodes the escapes JSON.stringify writes as well as \x and \v.
const unquote = (image: string): string =>
  image
    .slice(1, -1)
    .replace(/\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[\s\S])/g, (_, escape: string) =>
      escape.length > 1 ? String.fromCharCode(Number.parseInt(escape.slice(1), 16)) : (ESCAPES[escape] ?? escape),
    )

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  previous(offset = 1): IToken | undefined {
    return this.#tokens[this.#index - offset]
  }

  check(tokenType: TokenType): boolean {
    return this.peek()?.tokenType === tokenType
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw new ExpressionDiagnosticError({
        diagnostic: { phase: "parse", code: "UnexpectedEnd", message: "Unexpected end of input" },
      })
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    if (this.check(tokenType)) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, message: string, code: ExpressionDiagnostic["code"] = "UnexpectedToken"): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(this.#source, token, token ? code : "UnexpectedEnd", message),
      })
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const lex = (source: string): ReadonlyArray<IToken> => {
  const result = ExpressionLexer.tokenize(source)
  const lexError = result.errors[0]
  if (lexError) {
    throw new ExpressionDiagnosticError({
      diagnostic: {
        phase: "lex",
        code: "UnknownToken",
        message: lexError.message,
        span: {
          start: lexError.offset,
          end: lexError.offset + lexError.length,
          line: lexError.line ?? 1,
          column: lexError.column ?? 1,
        },
      },
    })
  }
  for (const token of result.tokens) {
    if (token.tokenType === Unknown) {
      throw new ExpressionDiagnosticError({
        diagnostic: {
          ...createDiagnostic(source, token, "UnknownToken", `Unexpected character "${token.image}"`),
          phase: "lex",
        },
      })
    }
  }
  return result.tokens
}

class ExpressionPrattParser {
  readonly #stream: TokenStream
  readonly #source: string

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parseRoot(): Expr {
    const expr = this.parseExpression(0)
    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(
          this.#source,
          token,
          "TrailingInput",
          `Unexpected token ${token?.image ?? "<eof>"} after expression`,
        ),
      })
    }
    return expr
  }

  parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary()
    while (true) {
      const token = this.#stream.peek()
      if (!token) {
        break
      }
      const info = BinaryOperators.get(token.tokenType)
      if (!info || info.precedence < minPrecedence) {
        break
      }
      this.#stream.consume()
      const nextPrecedence = info.rightAssociative ? info.precedence : info.precedence + 1
      const right = this.parseExpression(nextPrecedence)
      const span = combineSpans(left.span, right.span)
      left = { _tag: "Binary", id: makeId(span), op: info.op, left, right, span }
    }
    return left
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (token && (token.tokenType === Plus || token.tokenType === Minus)) {
      this.#stream.consume()
      const op: UnaryOp = token.tokenType === Plus ? "Pos" : "Neg"
      const expr = this.parseExpression(UNARY_OPERAND_PRECEDENCE)
      const span = combineSpans(spanFromToken(token), expr.span)
      return { _tag: "Unary", id: makeId(span), op, expr, span }
    }
    return this.parsePostfix(this.parsePrimary())
  }

  parsePostfix(target: Expr): Expr {
    let expr = target
    while (true) {
      if (this.#stream.match(LBracket)) {
        const args: Array<IndexArg> = []
        do {
          args.push(this.parseIndexArg())
        } while (this.#stream.match(Comma))
        const close = this.#stream.expect(RBracket, "Expected ']' closing index", "UnclosedBracket")
        const span = combineSpans(expr.span, spanFromToken(close))
        expr = { _tag: "Index", id: makeId(span), target: expr, args, span }
        continue
      }
      if (this.#stream.match(Dot)) {
        const member = this.#stream.expect(Identifier, "Expected member name after '.'")
        if (member.image !== "T") {
          throw new ExpressionDiagnosticError({
            diagnostic: createDiagnostic(this.#source, member, "InvalidMember", `Unsupported member ".${member.image}"`),
          })
        }
        const span = combineSpans(expr.span, spanFromToken(member))
        expr = { _tag: "Transpose", id: makeId(span), target: expr, span }
        continue
      }
      return expr
    }
  }

  parseIndexArg(): IndexArg {
    const start = this.#stream.check(Colon) ? undefined : this.parseExpression(0)
    if (!this.#stream.match(Colon)) {
      if (!start) {
        throw new ExpressionDiagnosticError({
          diagnostic: createDiagnostic(this.#source, this.#stream.peek(), "UnexpectedToken", "Expected index"),
        })
      }
      return { _tag: "Point", expr: start }
    }
    const bounded = (): Expr | undefined =>
      this.#stream.check(Colon) || this.#stream.check(Comma) || this.#stream.check(RBracket)
        ? undefined
        : this.parseExpression(0)
    const stop = bounded()
    const step = this.#stream.match(Colon) ? bounded() : undefined
    return {
      _tag: "Slice",
      ...(start ? { start } : {}),
      ...(stop ? { stop } : {}),
      ...(step ? { step } : {}),
    }
  }

  parsePrimary(): Expr {
    const token = this.#stream.consume()
    const span = spanFromToken(token)
    switch (token.tokenType) {
      case NumberLiteral: {
        const value = Number(token.image)
        if (Number.isNaN(value)) {
          throw new ExpressionDiagnosticError({
            diagnostic: createDiagnostic(this.#source, token, "InvalidNumber", `Invalid number literal: ${token.image}`),
          })
        }
        return { _tag: "NumberLiteral", id: makeId(span), value, span }
      }
      case BooleanTrue:
      case BooleanFalse:
        return { _tag: "BooleanLiteral", id: makeId(span), value: token.tokenType === BooleanTrue, span }
      case StringLiteral:
        return { _tag: "StringLiteral", id: makeId(span), value: unquote(token.image), span }
      case Identifier:
        return this.parseIdentifierOrCall(token)
      case LParen: {
        const expr = this.parseExpression(0)
        this.#stream.expect(RParen, "Expected ')' to close group", "UnclosedBracket")
        return expr
      }
      case LBracket:
        return this.parseList(token)
      case LBrace:
        return this.parseRecord(token)
      default:
        throw new ExpressionDiagnosticError({
          diagnostic: createDiagnostic(this.#source, token, "UnexpectedToken", `Unexpected token ${token.image}`),
        })
    }
  }

  parseIdentifierOrCall(token: IToken): Expr {
    if (this.#stream.match(LParen)) {
      const args: Array<Expr> = []
      if (!this.#stream.match(RParen)) {
        do {
          args.push(this.parseExpression(0))
        } while (this.#stream.match(Comma))
        this.#stream.expect(RParen, "Expected ')' closing function arguments", "UnclosedBracket")
      }
      const span = combineSpans(spanFromToken(token), spanFromToken(this.#stream.previous() ?? token))
      return { _tag: "Call", id: makeId(span), name: token.image, args, span }
    }
    const span = spanFromToken(token)
    return { _tag: "Ref", id: makeId(span), name: token.image, span }
  }

  parseList(open: IToken): Expr {
    const items: Array<Expr> = []
    while (!this.#stream.check(RBracket)) {
      items.push(this.parseExpression(0))
      if (!this.#stream.match(Comma)) {
        break
      }
    }
    const close = this.#stream.expect(RBracket, "Expected ']' closing list", "UnclosedBracket")
    const span = combineSpans(spanFromToken(open), spanFromToken(close))
    return { _tag: "ListLiteral", id: makeId(span), items, span }
  }

  parseRecord(open: IToken): Expr {
    const entries: Array<RecordEntry> = []
    while (!this.#stream.check(RBrace)) {
      const keyToken = this.#stream.consume()
      const key =
        keyToken.tokenType === Identifier
          ? keyToken.image
          : keyToken.tokenType === StringLiteral
            ? unquote(keyToken.image)
            : undefined
      if (key === undefined) {
        throw new ExpressionDiagnosticError({
          diagnostic: createDiagnostic(this.#source, keyToken, "UnexpectedToken", "Expected field name"),
        })
      }
      this.#stream.expect(Colon, "Expected ':' after field name")
      entries.push({ key, value: this.parseExpression(0) })
      if (!this.#stream.match(Comma)) {
        break
      }
    }
    const close = this.#stream.expect(RBrace, "Expected '}' closing record", "UnclosedBracket")
    const span = combineSpans(spanFromToken(open), spanFromToken(close))
    return { _tag: "RecordLiteral", id: makeId(span), entries, span }
  }
}

export const parseExpressionAst = (source: string): Expr => {
  const tokens = lex(source)
  return new ExpressionPrattParser(tokens, source).parseRoot()
}

export const parseExpressionEither = (source: string): Either.Either<Expr, ExpressionDiagnosticError> =>
  Either.try({
    try: () => parseExpressionAst(source),
    catch: (error) =>
      error instanceof ExpressionDiagnosticError
        ? error
        : new ExpressionDiagnosticError({
            diagnostic: {
              phase: "parse",
              code: "UnexpectedToken",
              message: error instanceof Error ? error.message : String(error),
            },
          }),
  })

export const parseExpressionEffect = (source: string): Effect.Effect<Expr, ExpressionDiagnosticError> =>
  Effect.suspend(() => parseExpressionEither(source))
