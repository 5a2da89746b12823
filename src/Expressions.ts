/**
 * Rate expressions.
 *
 * A rate is a small arithmetic language over stock and parameter ids. Text is
 * compiled once into a tree that is then evaluated against a namespace any
 * number of times; nothing in user text is ever dispatched to the host
 * language.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import { ExpressionError, type ExpressionErrorReason } from "./Errors.js"
import { collectReferences, type ExpressionNode } from "./internal/expressions/Ast.js"
import type { ExpressionDiagnosticError } from "./internal/expressions/Diagnostic.js"
import { evaluateExpressionAst, type Scope } from "./internal/expressions/Evaluator.js"
import { allowedFunctionNames } from "./internal/expressions/Functions.js"
import { parseExpressionEither } from "./internal/expressions/Parser.js"
import { KeywordTokens } from "./internal/expressions/tokens.js"

/**
 * Namespace an expression is evaluated against.
 *
 * @category Models
 * @since 0.1.0
 */
export type Namespace = Scope

/**
 * A parsed rate expression.
 *
 * @category Models
 * @since 0.1.0
 */
export interface CompiledExpression {
  readonly source: string
  readonly ast: ExpressionNode
  /** Identifiers the expression reads, in first-occurrence order. */
  readonly references: ReadonlyArray<string>
}

/**
 * Functions a rate expression may call.
 *
 * @category Constants
 * @since 0.1.0
 */
export const allowedFunctions: ReadonlyArray<string> = allowedFunctionNames()

/**
 * Whether the lexer reads `name` as a keyword (`TIME`, `true`, `end`, ...)
 * rather than an identifier.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const isReservedWord = (name: string): boolean =>
  KeywordTokens.some(({ PATTERN }) =>
    PATTERN instanceof RegExp && new RegExp(`^(?:${PATTERN.source})$`, PATTERN.flags).test(name)
  )

const toExpressionError = (source: string, error: ExpressionDiagnosticError): ExpressionError => {
  const reason: ExpressionErrorReason = error.isDisallowed ? "disallowed-operation" : "syntax-error"
  const span = error.diagnostic.span
  return new ExpressionError({
    reason,
    expression: source,
    problem: error.diagnostic.message,
    line: span?.line,
    column: span?.column,
  })
}

/**
 * Compile expression text. Syntax errors carry the line and column of the
 * offending token.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const compileExpression = (source: string): Either.Either<CompiledExpression, ExpressionError> =>
  Either.match(parseExpressionEither(source), {
    onLeft: (error) => Either.left(toExpressionError(source, error)),
    onRight: (ast) => Either.right({ source, ast, references: collectReferences(ast.expr) }),
  })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const parseExpression = (source: string): Effect.Effect<CompiledExpression, ExpressionError> =>
  compileExpression(source)

/**
 * Evaluate a compiled expression. `TIME` reads `time`, which defaults to 0.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluateCompiled = (
  compiled: CompiledExpression,
  namespace: Namespace,
  time = 0,
): Either.Either<number, ExpressionError> =>
  Either.try({
    try: () => evaluateExpressionAst(compiled.ast, namespace, compiled.source, time),
    catch: (error) =>
      error instanceof ExpressionError
        ? error
        : new ExpressionError({
            reason: "runtime-evaluation-error",
            expression: compiled.source,
            problem: error instanceof Error ? error.message : String(error),
          }),
  })

/**
 * Parse and evaluate in one go.
 *
 * @category Evaluation
 * @since 0.1.0
 * @example
 * ```ts
 * const rate = evaluateExpression("k * S0", { k: 0.1, S0: 1000 })
 * // Effect succeeding with 100
 * ```
 */
export const evaluateExpression = (
  source: string,
  namespace: Namespace,
  time = 0,
): Effect.Effect<number, ExpressionError> =>
  Effect.flatMap(parseExpression(source), (compiled) => evaluateCompiled(compiled, namespace, time))
