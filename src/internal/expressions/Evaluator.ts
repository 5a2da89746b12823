import { ExpressionError } from "../../Errors.js"
import type { BinaryNode, CallNode, Expr, ExpressionNode, IfChainNode, UnaryNode } from "./Ast.js"
import { lookupFunction } from "./Functions.js"

/**
 * Values visible to an expression. Only own properties are looked up.
 */
export type Scope = Readonly<Record<string, number>>

interface EvalContext {
  readonly scope: Scope
  readonly source: string
  readonly time: number
}

const fail = (ctx: EvalContext, reason: ExpressionError["reason"], problem: string): never => {
  throw new ExpressionError({ reason, expression: ctx.source, problem })
}

const truthy = (value: number): boolean => value !== 0

const fromBoolean = (value: boolean): number => (value ? 1 : 0)

const lookupReference = (name: string, ctx: EvalContext): number => {
  if (!Object.hasOwn(ctx.scope, name)) {
    return fail(ctx, "unknown-identifier", `Identifier "${name}" is not defined`)
  }
  const value = ctx.scope[name]
  return value === undefined ? fail(ctx, "unknown-identifier", `Identifier "${name}" is not defined`) : value
}

const evaluateCall = (node: CallNode, ctx: EvalContext): number => {
  const builtin = lookupFunction(node.name)
  if (!builtin) {
    return fail(ctx, "disallowed-operation", `Function "${node.name}" is not allowed`)
  }
  if (node.args.length < builtin.minArity || node.args.length > builtin.maxArity) {
    return fail(
      ctx,
      "runtime-evaluation-error",
      `Function "${node.name}" received ${node.args.length} argument(s)`,
    )
  }
  return builtin.apply(node.args.map((arg) => evaluateExpr(arg, ctx)))
}

const evaluateBinary = (node: BinaryNode, ctx: EvalContext): number => {
  const left = evaluateExpr(node.left, ctx)
  const right = () => evaluateExpr(node.right, ctx)

  switch (node.op) {
    case "+":
      return left + right()
    case "-":
      return left - right()
    case "*":
      return left * right()
    case "/": {
      const divisor = right()
      return divisor === 0 ? fail(ctx, "runtime-evaluation-error", "Division by zero") : left / divisor
    }
    case "%": {
      const divisor = right()
      return divisor === 0 ? fail(ctx, "runtime-evaluation-error", "Modulo by zero") : left % divisor
    }
    case "^":
      return Math.pow(left, right())
    case "<":
      return fromBoolean(left < right())
    case "<=":
      return fromBoolean(left <= right())
    case ">":
      return fromBoolean(left > right())
    case ">=":
      return fromBoolean(left >= right())
    case "==":
      return fromBoolean(left === right())
    case "!=":
      return fromBoolean(left !== right())
    case "AND":
      return fromBoolean(truthy(left) && truthy(right()))
    case "OR":
      return fromBoolean(truthy(left) || truthy(right()))
  }
}

const evaluateUnary = (node: UnaryNode, ctx: EvalContext): number => {
  const value = evaluateExpr(node.expr, ctx)
  switch (node.op) {
    case "Neg":
      return -value
    case "Pos":
      return value
    case "Not":
      return fromBoolean(!truthy(value))
  }
}

const evaluateIfChain = (node: IfChainNode, ctx: EvalContext): number => {
  for (const branch of node.branches) {
    if (truthy(evaluateExpr(branch.cond, ctx))) {
      return evaluateExpr(branch.then, ctx)
    }
  }
  if (node.elseBranch) {
    return evaluateExpr(node.elseBranch, ctx)
  }
  return fail(ctx, "runtime-evaluation-error", "IF expression did not match any branch")
}

const evaluateExpr = (expr: Expr, ctx: EvalContext): number => {
  switch (expr._tag) {
    case "NumberLiteral":
      return expr.value
    case "BooleanLiteral":
      return fromBoolean(expr.value)
    case "Ref":
      return lookupReference(expr.name, ctx)
    case "Unary":
      return evaluateUnary(expr, ctx)
    case "Binary":
      return evaluateBinary(expr, ctx)
    case "Call":
      return evaluateCall(expr, ctx)
    case "IfChain":
      return evaluateIfChain(expr, ctx)
    case "Time":
      return ctx.time
  }
}

/**
 * Evaluate a parsed expression. Throws `ExpressionError`.
 */
export const evaluateExpressionAst = (
  expression: ExpressionNode,
  scope: Scope,
  source: string,
  time = 0,
): number => evaluateExpr(expression.expr, { scope, source, time })
