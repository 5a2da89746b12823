import { describe, expect, it } from "@effect/vitest"
import { Effect, Either } from "effect"
import { ExpressionError } from "../src/Errors.js"
import { allowedFunctions, compileExpression, evaluateCompiled, evaluateExpression, parseExpression } from "../src/Expressions.js"

const evaluate = (source: string, namespace: Record<string, number> = {}, time = 0) =>
  evaluateExpression(source, namespace, time)

describe("evaluateExpression", () => {
  it.effect("evaluates a rate against stocks and parameters", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("k * S0", { k: 0.1, S0: 1000 })).toBe(100)
    }))

  it.effect("follows arithmetic precedence", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("2 + 3 * 4")).toBe(14)
      expect(yield* evaluate("(2 + 3) * 4")).toBe(20)
      expect(yield* evaluate("-2 ^ 2")).toBe(-4)
      expect(yield* evaluate("2 ^ 3 ^ 2")).toBe(512)
      expect(yield* evaluate("2 ** 3")).toBe(8)
      expect(yield* evaluate("7 % 4")).toBe(3)
      expect(yield* evaluate("10 - 4 - 3")).toBe(3)
    }))

  it.effect("yields 1 and 0 for comparisons and logic", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("3 > 2")).toBe(1)
      expect(yield* evaluate("3 <= 2")).toBe(0)
      expect(yield* evaluate("0.5 == 0.5")).toBe(1)
      expect(yield* evaluate("0.1 + 0.2 == 0.3")).toBe(0)
      expect(yield* evaluate("1e-13 != 0")).toBe(1)
      expect(yield* evaluate("1 != 1")).toBe(0)
      expect(yield* evaluate("not 1 == 2")).toBe(1)
      expect(yield* evaluate("1 and 0")).toBe(0)
      expect(yield* evaluate("0 or 2")).toBe(1)
      expect(yield* evaluate("!0 && true")).toBe(1)
    }))

  it.effect("calls allow-listed functions case-insensitively", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("max(a, b, 3)", { a: 1, b: 5 })).toBe(5)
      expect(yield* evaluate("MIN(4, 2)")).toBe(2)
      expect(yield* evaluate("clip(15, 0, 10)")).toBe(10)
      expect(yield* evaluate("pow(2, 10)")).toBe(1024)
      expect(yield* evaluate("abs(-3) + sign(-7)")).toBe(2)
      expect(yield* evaluate("max(T - floor_, 0)", { T: 10, floor_: 20 })).toBe(0)
    }))

  it.effect("chooses the first matching IF branch", () =>
    Effect.gen(function*() {
      const source = "IF x > 5 THEN 1 ELSEIF x > 2 THEN 2 ELSE 3 END IF"
      expect(yield* evaluate(source, { x: 4 })).toBe(2)
      expect(yield* evaluate(source, { x: 9 })).toBe(1)
      expect(yield* evaluate(source, { x: 0 })).toBe(3)
    }))

  it.effect("reads TIME from the evaluation time", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("TIME * 2", {}, 3)).toBe(6)
      expect(yield* evaluate("TIME")).toBe(0)
    }))

  it.effect("resolves bracketed names", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("[Birth Rate] * 2", { "Birth Rate": 0.5 })).toBe(1)
    }))

  it.effect("returns non-finite results as values", () =>
    Effect.gen(function*() {
      expect(yield* evaluate("log(0)")).toBe(Number.NEGATIVE_INFINITY)
      expect(yield* evaluate("10 ^ 400")).toBe(Number.POSITIVE_INFINITY)
    }))

  it.effect("fails on an unknown identifier", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(evaluate("k * S1", { k: 1 }))
      expect(error).toBeInstanceOf(ExpressionError)
      expect(error.reason).toBe("unknown-identifier")
      expect(error.problem).toBe(`Identifier "S1" is not defined`)
      expect(error.expression).toBe("k * S1")
    }))

  it.effect("never reads inherited properties of the namespace", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(evaluate("toString + 1"))
      expect(error.reason).toBe("unknown-identifier")
    }))

  it.effect("fails on division and modulo by zero", () =>
    Effect.gen(function*() {
      const division = yield* Effect.flip(evaluate("1 / x", { x: 0 }))
      expect(division.reason).toBe("runtime-evaluation-error")
      expect(division.problem).toBe("Division by zero")
      const modulo = yield* Effect.flip(evaluate("5 % 0"))
      expect(modulo.problem).toBe("Modulo by zero")
    }))

  it.effect("fails when an IF without ELSE matches nothing", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(evaluate("IF x > 5 THEN 1 END IF", { x: 0 }))
      expect(error.reason).toBe("runtime-evaluation-error")
      expect(error.problem).toBe("IF expression did not match any branch")
    }))

  it.effect("rejects operations outside the allow-list", () =>
    Effect.gen(function*() {
      const call = yield* Effect.flip(evaluate("__import__(1)"))
      expect(call.reason).toBe("disallowed-operation")
      const member = yield* Effect.flip(evaluate("np.exp(S)", { S: 1 }))
      expect(member.reason).toBe("disallowed-operation")
    }))

  it.effect("reports syntax errors with their position", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(evaluate("k + )", { k: 1 }))
      expect(error.reason).toBe("syntax-error")
      expect(error.problem).toBe("Unexpected token )")
      expect(error.line).toBe(1)
      expect(error.column).toBe(5)
      expect(error.message).toBe("Expression syntax-error at line 1, column 5: Unexpected token ) (expression: k + ))")
    }))

  it.effect("rejects a call with the wrong number of arguments when parsing", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(parseExpression("pow(2)"))
      expect(error.reason).toBe("syntax-error")
      expect(error.problem).toBe(`Function "pow" expects 2 argument(s) but received 1`)
    }))
})

describe("compiled expressions", () => {
  it.effect("lists referenced identifiers once, in order", () =>
    Effect.gen(function*() {
      const compiled = yield* parseExpression("beta * S * I / N + 0 * S")
      expect(compiled.references).toStrictEqual(["beta", "S", "I", "N"])
      expect(compiled.source).toBe("beta * S * I / N + 0 * S")
    }))

  it("evaluates a compiled tree repeatedly", () => {
    const compiled = compileExpression("k * S0")
    expect(Either.isRight(compiled)).toBe(true)
    if (Either.isRight(compiled)) {
      expect(evaluateCompiled(compiled.right, { k: 2, S0: 3 })).toStrictEqual(Either.right(6))
      expect(evaluateCompiled(compiled.right, { k: 2, S0: 5 })).toStrictEqual(Either.right(10))
    }
  })

  it("exposes the allow-listed functions", () => {
    expect(allowedFunctions).toContain("clip")
    expect(allowedFunctions).toContain("log10")
    expect(allowedFunctions).not.toContain("eval")
  })
})
