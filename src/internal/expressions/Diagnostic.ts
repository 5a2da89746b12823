import { Data } from "effect"
import type { Span } from "./Ast.js"

/**
 * Structured diagnostic raised by the expression lexer and parser. The public
 * `ExpressionError` is derived from it once the failing expression is known.
 */
export type ExpressionErrorCode =
  | "UnexpectedToken"
  | "UnexpectedCharacter"
  | "UnclosedBlock"
  | "TrailingInput"
  | "EmptyExpression"
  | "InvalidNumber"
  | "ArityMismatch"
  | "DisallowedFunction"
  | "MemberAccess"

export interface ExpressionDiagnostic {
  readonly code: ExpressionErrorCode
  readonly message: string
  readonly span?: Span
  readonly snippet?: string
}

export class ExpressionDiagnosticError extends Data.TaggedError("ExpressionDiagnosticError")<{
  readonly diagnostic: ExpressionDiagnostic
}> {
  override get message(): string {
    return this.diagnostic.message
  }

  /**
   * Whether the diagnostic describes an attempt to escape the allow-listed
   * operations rather than plain malformed text.
   */
  get isDisallowed(): boolean {
    return this.diagnostic.code === "DisallowedFunction" || this.diagnostic.code === "MemberAccess"
  }
}
