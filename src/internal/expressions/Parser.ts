import { Either } from "effect"
import type { ILexingError, IToken, TokenType } from "chevrotain"
import {
  And,
  Bang,
  BangEq,
  BooleanFalse,
  BooleanTrue,
  Caret,
  Comma,
  Dot,
  DoubleAmpersand,
  DoublePipe,
  DoubleStar,
  Else,
  ElseIf,
  End,
  EqEq,
  ExpressionLexer,
  Gt,
  GtEq,
  Identifier,
  If,
  LParen,
  Lt,
  LtEq,
  Minus,
  Not,
  NumberLiteral,
  Or,
  Percent,
  Plus,
  RParen,
  ReferenceLiteral,
  Slash,
  Star,
  Then,
  TimeKeyword,
} from "./tokens.js"
import type {
  BinaryNode,
  BinaryOp,
  CallNode,
  Expr,
  ExpressionNode,
  IfBranch,
  IfChainNode,
  NodeId,
  Span,
  UnaryNode,
  UnaryOp,
} from "./Ast.js"
import { ExpressionDiagnosticError, type ExpressionDiagnostic } from "./Diagnostic.js"
import { allowedFunctionNames, lookupFunction } from "./Functions.js"

interface BinaryInfo {
  readonly precedence: number
  readonly rightAssociative?: boolean
  readonly op: BinaryOp
}

const BinaryOperators = new Map<TokenType, BinaryInfo>([
  [Or, { precedence: 1, op: "OR" }],
  [DoublePipe, { precedence: 1, op: "OR" }],
  [And, { precedence: 2, op: "AND" }],
  [DoubleAmpersand, { precedence: 2, op: "AND" }],
  [EqEq, { precedence: 4, op: "==" }],
  [BangEq, { precedence: 4, op: "!=" }],
  [Lt, { precedence: 5, op: "<" }],
  [LtEq, { precedence: 5, op: "<=" }],
  [Gt, { precedence: 5, op: ">" }],
  [GtEq, { precedence: 5, op: ">=" }],
  [Plus, { precedence: 6, op: "+" }],
  [Minus, { precedence: 6, op: "-" }],
  [Star, { precedence: 7, op: "*" }],
  [Slash, { precedence: 7, op: "/" }],
  [Percent, { precedence: 7, op: "%" }],
  [Caret, { precedence: 8, op: "^", rightAssociative: true }],
  [DoubleStar, { precedence: 8, op: "^", rightAssociative: true }],
])

// Operand binding of prefix operators: `-x ^ 2` is `-(x ^ 2)`, `not a == b` is `not (a == b)`.
const NEGATION_PRECEDENCE = 8
const NOT_PRECEDENCE = 3

const spanFromToken = (token: IToken): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line: token.startLine ?? 1,
  column: token.startColumn ?? 1,
})

const snippet = (source: string, span: Span): string => {
  const lines = source.split(/\r?\n/)
  const line = lines[span.line - 1] ?? ""
  const caretLine = `${" ".repeat(Math.max(0, span.column - 1))}^`
  return `${line}\n${caretLine}`
}

const createDiagnostic = (
  source: string,
  token: IToken | undefined,
  code: ExpressionDiagnostic["code"],
  message: string,
): ExpressionDiagnostic => {
  if (!token) {
    return { code, message }
  }
  const span = spanFromToken(token)
  return { code, message, span, snippet: snippet(source, span) }
}

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

const makeId = (span: Span): NodeId => `n:${span.start}:${span.end}`

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

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw new ExpressionDiagnosticError({
        diagnostic: { code: "UnexpectedToken", message: "Unexpected end of input" },
      })
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    if (this.peek()?.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, message: string, code: ExpressionDiagnostic["code"] = "UnexpectedToken"): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(this.#source, token, code, token ? message : `${message}, found end of input`),
      })
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const referenceName = (token: IToken): string => token.image.slice(1, -1).trim()

const parseNumber = (token: IToken, source: string): number => {
  const value = Number(token.image)
  if (!Number.isFinite(value)) {
    throw new ExpressionDiagnosticError({
      diagnostic: createDiagnostic(source, token, "InvalidNumber", `Invalid number literal: ${token.image}`),
    })
  }
  return value
}

const lexingDiagnostic = (source: string, error: ILexingError): ExpressionDiagnostic => {
  const span: Span = {
    start: error.offset,
    end: error.offset + error.length,
    line: error.line ?? 1,
    column: error.column ?? 1,
  }
  const character = source.slice(error.offset, error.offset + 1)
  return {
    code: "UnexpectedCharacter",
    message: `Unexpected character "${character}"`,
    span,
    snippet: snippet(source, span),
  }
}

class ExpressionParser {
  readonly #stream: TokenStream
  readonly #source: string

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parseRoot(): ExpressionNode {
    if (this.#stream.done) {
      throw new ExpressionDiagnosticError({
        diagnostic: { code: "EmptyExpression", message: "Expression is empty" },
      })
    }
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
    return {
      _tag: "Expression",
      id: makeId(expr.span),
      expr,
      span: expr.span,
    }
  }

  parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary()
    // Pratt loop
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
      left = this.makeBinaryNode(info.op, left, right)
    }
    return left
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (!token) {
      throw new ExpressionDiagnosticError({
        diagnostic: { code: "UnexpectedToken", message: "Unexpected end of input" },
      })
    }

    if (token.tokenType === Plus || token.tokenType === Minus) {
      this.#stream.consume()
      const op: UnaryOp = token.tokenType === Plus ? "Pos" : "Neg"
      return this.makeUnaryNode(op, this.parseExpression(NEGATION_PRECEDENCE), token)
    }

    if (token.tokenType === Not || token.tokenType === Bang) {
      this.#stream.consume()
      return this.makeUnaryNode("Not", this.parseExpression(NOT_PRECEDENCE), token)
    }

    return this.parsePostfix(this.parsePrimary())
  }

  parsePostfix(expr: Expr): Expr {
    const token = this.#stream.peek()
    if (token?.tokenType === Dot) {
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(
          this.#source,
          token,
          "MemberAccess",
          "Attribute or member access is not allowed in rate expressions",
        ),
      })
    }
    return expr
  }

  parsePrimary(): Expr {
    const token = this.#stream.consume()

    switch (token.tokenType) {
      case NumberLiteral: {
        const span = spanFromToken(token)
        return {
          _tag: "NumberLiteral",
          id: makeId(span),
          value: parseNumber(token, this.#source),
          span,
        }
      }
      case BooleanTrue:
      case BooleanFalse: {
        const span = spanFromToken(token)
        return {
          _tag: "BooleanLiteral",
          id: makeId(span),
          value: token.tokenType === BooleanTrue,
          span,
        }
      }
      case ReferenceLiteral: {
        const span = spanFromToken(token)
        return {
          _tag: "Ref",
          id: makeId(span),
          name: referenceName(token),
          span,
        }
      }
      case Identifier: {
        return this.parseIdentifierOrCall(token)
      }
      case LParen: {
        const expr = this.parseExpression(0)
        this.#stream.expect(RParen, "Expected ')' to close group", "UnclosedBlock")
        return expr
      }
      case If: {
        return this.parseIfExpression(token)
      }
      case TimeKeyword: {
        const span = spanFromToken(token)
        return { _tag: "Time", id: makeId(span), span }
      }
      default: {
        throw new ExpressionDiagnosticError({
          diagnostic: createDiagnostic(this.#source, token, "UnexpectedToken", `Unexpected token ${token.image}`),
        })
      }
    }
  }

  parseIdentifierOrCall(token: IToken): Expr {
    if (!this.#stream.match(LParen)) {
      const span = spanFromToken(token)
      return {
        _tag: "Ref",
        id: makeId(span),
        name: token.image,
        span,
      }
    }

    const builtin = lookupFunction(token.image)
    if (!builtin) {
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(
          this.#source,
          token,
          "DisallowedFunction",
          `Function "${token.image}" is not allowed; available functions: ${allowedFunctionNames().join(", ")}`,
        ),
      })
    }

    const args: Array<Expr> = []
    if (!this.#stream.match(RParen)) {
      do {
        args.push(this.parseExpression(0))
      } while (this.#stream.match(Comma))
      this.#stream.expect(RParen, "Expected ')' closing function arguments", "UnclosedBlock")
    }

    if (args.length < builtin.minArity || args.length > builtin.maxArity) {
      const expected = builtin.minArity === builtin.maxArity
        ? `${builtin.minArity}`
        : builtin.maxArity === Number.POSITIVE_INFINITY
          ? `at least ${builtin.minArity}`
          : `${builtin.minArity} to ${builtin.maxArity}`
      throw new ExpressionDiagnosticError({
        diagnostic: createDiagnostic(
          this.#source,
          token,
          "ArityMismatch",
          `Function "${token.image}" expects ${expected} argument(s) but received ${args.length}`,
        ),
      })
    }

    const span = combineSpans(spanFromToken(token), spanFromToken(this.#stream.previous() ?? token))
    const call: CallNode = {
      _tag: "Call",
      id: makeId(span),
      name: token.image.toLowerCase(),
      args,
      span,
    }
    return call
  }

  parseIfExpression(ifToken: IToken): IfChainNode {
    const branches: Array<IfBranch> = []
    const condition = this.parseExpression(0)
    this.#stream.expect(Then, "Expected THEN keyword")
    branches.push({ cond: condition, then: this.parseExpression(0) })

    while (this.#stream.match(ElseIf)) {
      const elifCondition = this.parseExpression(0)
      this.#stream.expect(Then, "Expected THEN after ELSEIF condition")
      branches.push({ cond: elifCondition, then: this.parseExpression(0) })
    }

    const elseBranch = this.#stream.match(Else) ? this.parseExpression(0) : undefined

    this.#stream.expect(End, "Expected END to terminate IF expression", "UnclosedBlock")
    this.#stream.expect(If, "Expected IF after END", "UnclosedBlock")
    const endToken = this.#stream.previous()
    const span = combineSpans(spanFromToken(ifToken), spanFromToken(endToken ?? ifToken))

    const base: IfChainNode = {
      _tag: "IfChain",
      id: makeId(span),
      branches,
      span,
    }
    return elseBranch ? { ...base, elseBranch } : base
  }

  makeUnaryNode(op: UnaryOp, expr: Expr, token: IToken): UnaryNode {
    const span = combineSpans(spanFromToken(token), expr.span)
    return {
      _tag: "Unary",
      id: makeId(span),
      op,
      expr,
      span,
    }
  }

  makeBinaryNode(op: BinaryOp, left: Expr, right: Expr): BinaryNode {
    const span = combineSpans(left.span, right.span)
    return {
      _tag: "Binary",
      id: makeId(span),
      op,
      left,
      right,
      span,
    }
  }
}

/**
 * Parse a rate expression into its tree. Throws `ExpressionDiagnosticError`.
 */
export const parseExpressionAst = (source: string): ExpressionNode => {
  const { tokens, errors } = ExpressionLexer.tokenize(source)
  const lexingError = errors[0]
  if (lexingError) {
    throw new ExpressionDiagnosticError({ diagnostic: lexingDiagnostic(source, lexingError) })
  }
  return new ExpressionParser(tokens, source).parseRoot()
}

export const parseExpressionEither = (source: string): Either.Either<ExpressionNode, ExpressionDiagnosticError> =>
  Either.try({
    try: () => parseExpressionAst(source),
    catch: (error) =>
      error instanceof ExpressionDiagnosticError
        ? error
        : new ExpressionDiagnosticError({
            diagnostic: {
              code: "UnexpectedToken",
              message: error instanceof Error ? error.message : String(error),
            },
          }),
  })
