import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import { parseExpressionAst, parseExpressionEither } from "../src/internal/expressions/Parser.js"

const diagnosticOf = (source: string) =>
  Either.match(parseExpressionEither(source), {
    onLeft: (error) => error,
    onRight: () => undefined,
  })

describe("rate expression parser", () => {
  it("parses arithmetic with precedence", () => {
    const expression = parseExpressionAst("1 + 2 * 3")
    expect(expression.expr).toMatchObject({
      _tag: "Binary",
      op: "+",
      left: { _tag: "NumberLiteral", value: 1 },
      right: {
        _tag: "Binary",
        op: "*",
        left: { _tag: "NumberLiteral", value: 2 },
        right: { _tag: "NumberLiteral", value: 3 },
      },
    })
  })

  it("treats ^ and ** as the same right-associative operator", () => {
    const expression = parseExpressionAst("2 ** 3 ^ 2")
    expect(expression.expr).toMatchObject({
      _tag: "Binary",
      op: "^",
      left: { _tag: "NumberLiteral", value: 2 },
      right: { _tag: "Binary", op: "^" },
    })
  })

  it("binds negation looser than exponentiation", () => {
    const expression = parseExpressionAst("-x ^ 2")
    expect(expression.expr).toMatchObject({
      _tag: "Unary",
      op: "Neg",
      expr: { _tag: "Binary", op: "^", left: { _tag: "Ref", name: "x" } },
    })
  })

  it("parses conditional chains", () => {
    const expression = parseExpressionAst("IF S0 > 0 THEN 1 ELSEIF S0 < -5 THEN 2 ELSE 3 END IF")
    expect(expression.expr).toMatchObject({
      _tag: "IfChain",
      branches: [
        { cond: { _tag: "Binary", op: ">" }, then: { _tag: "NumberLiteral", value: 1 } },
        { cond: { _tag: "Binary", op: "<" }, then: { _tag: "NumberLiteral", value: 2 } },
      ],
      elseBranch: { _tag: "NumberLiteral", value: 3 },
    })
  })

  it("reads bracketed names with their surrounding space trimmed", () => {
    const expression = parseExpressionAst("[ Birth Rate ]")
    expect(expression.expr).toMatchObject({ _tag: "Ref", name: "Birth Rate" })
  })

  it("keeps keyword prefixes inside identifiers", () => {
    const expression = parseExpressionAst("orders + endowment")
    expect(expression.expr).toMatchObject({
      _tag: "Binary",
      left: { _tag: "Ref", name: "orders" },
      right: { _tag: "Ref", name: "endowment" },
    })
  })

  it("stores allow-listed call names in lower case", () => {
    const expression = parseExpressionAst("MAX(a, 1)")
    expect(expression.expr).toMatchObject({ _tag: "Call", name: "max" })
  })

  it("parses TIME as the simulation clock and time as a name", () => {
    expect(parseExpressionAst("TIME").expr).toMatchObject({ _tag: "Time" })
    expect(parseExpressionAst("time").expr).toMatchObject({ _tag: "Ref", name: "time" })
  })

  it("rejects member access", () => {
    const error = diagnosticOf("np.exp(S)")
    expect(error?.diagnostic.code).toBe("MemberAccess")
    expect(error?.isDisallowed).toBe(true)
  })

  it("rejects calls outside the allow-list", () => {
    const error = diagnosticOf("eval(1)")
    expect(error?.diagnostic.code).toBe("DisallowedFunction")
    expect(error?.diagnostic.span?.column).toBe(1)
  })

  it("rejects a wrong number of arguments", () => {
    const error = diagnosticOf("clip(S0, 0)")
    expect(error?.diagnostic.code).toBe("ArityMismatch")
    expect(error?.diagnostic.message).toBe(`Function "clip" expects 3 argument(s) but received 2`)
  })

  it("reports characters the lexer does not know", () => {
    const error = diagnosticOf("S0 @ 2")
    expect(error?.diagnostic).toMatchObject({
      code: "UnexpectedCharacter",
      message: `Unexpected character "@"`,
      span: { line: 1, column: 4 },
    })
    expect(error?.isDisallowed).toBe(false)
  })

  it("reports trailing tokens", () => {
    const error = diagnosticOf("1 2")
    expect(error?.diagnostic.code).toBe("TrailingInput")
    expect(error?.diagnostic.message).toBe("Unexpected token 2 after expression")
  })

  it("reports an unclosed group", () => {
    const error = diagnosticOf("(1 + 2")
    expect(error?.diagnostic.code).toBe("UnclosedBlock")
  })

  it("reports empty input", () => {
    expect(diagnosticOf("   ")?.diagnostic.code).toBe("EmptyExpression")
  })

  it("points a caret at the offending token", () => {
    const error = diagnosticOf("k + )")
    expect(error?.diagnostic.snippet).toBe("k + )\n    ^")
  })
})
