/**
 * Error hierarchy for stockflow.
 *
 * Every failure mode of the core is a tagged error so callers can pattern match
 * with `Effect.catchTag`. Each error names its case through `reason` and carries
 * the ids and expression text a host needs to render a precise message without
 * re-deriving it. Divergence of a simulation is not an error; it is reported
 * through warnings on a successful result.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Cases of {@link ExpressionError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ExpressionErrorReason =
  | "syntax-error"
  | "unknown-identifier"
  | "disallowed-operation"
  | "runtime-evaluation-error"

/**
 * Raised when a single rate expression is malformed, references an unknown
 * identifier, attempts an operation outside the allow-list, or fails while
 * being evaluated (division by zero, an IF with no matching branch).
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ExpressionError({
 *   reason: "unknown-identifier",
 *   expression: "k * S1",
 *   problem: `Identifier "S1" is not defined`,
 * })
 * ```
 */
export class ExpressionError extends Data.TaggedError("ExpressionError")<{
  readonly reason: ExpressionErrorReason
  readonly expression: string
  readonly problem: string
  readonly flowId?: string | undefined
  readonly line?: number | undefined
  readonly column?: number | undefined
}> {
  override get message(): string {
    const location = this.line !== undefined && this.column !== undefined
      ? ` at line ${this.line}, column ${this.column}`
      : ""
    const owner = this.flowId !== undefined ? ` in flow "${this.flowId}"` : ""
    return `Expression ${this.reason}${owner}${location}: ${this.problem} (expression: ${this.expression})`
  }

  /**
   * Copy of this error attributed to the flow that owns the expression.
   */
  forFlow(flowId: string): ExpressionError {
    return new ExpressionError({
      reason: this.reason,
      expression: this.expression,
      problem: this.problem,
      flowId,
      line: this.line,
      column: this.column,
    })
  }
}

/**
 * Cases of {@link SchemaError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SchemaErrorReason =
  | "malformed-schema"
  | "duplicate-id"
  | "unknown-stock-reference"
  | "unknown-identifier"
  | "invalid-rate-expression"
  | "reserved-identifier"

/**
 * Structural problem with a model: a duplicate id, a flow pointing at a stock
 * that does not exist, a rate naming an undeclared identifier, or input that
 * does not decode at all. Always raised before any numeric work starts.
 *
 * @category Errors
 * @since 0.1.0
 */
export class SchemaError extends Data.TaggedError("SchemaError")<{
  readonly reason: SchemaErrorReason
  readonly detail: string
  readonly entityId?: string | undefined
  readonly expressionError?: ExpressionError | undefined
}> {
  override get message(): string {
    const subject = this.entityId !== undefined ? ` (${this.entityId})` : ""
    return `Invalid schema, ${this.reason}${subject}: ${this.detail}`
  }
}

/**
 * Cases of {@link SimulationError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SimulationErrorReason = "rate-evaluation-failed" | "invalid-horizon"

/**
 * Raised when a rate cannot be evaluated during integration. Integration is
 * aborted; no partial series is returned.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * Effect.catchTag("SimulationError", (error) =>
 *   Effect.logWarning(`flow ${error.flowId} failed near t=${error.time}`),
 * )
 * ```
 */
export class SimulationError extends Data.TaggedError("SimulationError")<{
  readonly reason: SimulationErrorReason
  readonly detail: string
  readonly flowId?: string | undefined
  readonly time?: number | undefined
  readonly expressionError?: ExpressionError | undefined
}> {
  override get message(): string {
    if (this.reason === "rate-evaluation-failed") {
      return `Rate of flow "${this.flowId ?? "?"}" could not be evaluated at t=${this.time ?? Number.NaN}: ${this.detail}`
    }
    return `Simulation rejected: ${this.detail}`
  }
}

/**
 * Cases of {@link PatchError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type PatchErrorReason = "missing-id" | "missing-required-field" | "malformed-fragment"

/**
 * Collections a patch can address.
 *
 * @category Errors
 * @since 0.1.0
 */
export type PatchCollection = "stocks" | "flows" | "parameters"

/**
 * Raised for a malformed patch fragment: no `id`, a field of the wrong type,
 * or a new entity that lacks a field it cannot exist without.
 *
 * @category Errors
 * @since 0.1.0
 */
export class PatchError extends Data.TaggedError("PatchError")<{
  readonly reason: PatchErrorReason
  readonly collection?: PatchCollection | undefined
  readonly detail: string
  readonly entityId?: string | undefined
  readonly field?: string | undefined
}> {
  override get message(): string {
    const subject = this.entityId !== undefined ? ` "${this.entityId}"` : ""
    const target = this.collection !== undefined ? ` for ${this.collection}${subject}` : ""
    return `Invalid patch${target}, ${this.reason}: ${this.detail}`
  }
}

/**
 * Cases of {@link BatchError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type BatchErrorReason = "duplicate-label" | "too-many-variants" | "malformed-variants"

/**
 * Raised before any integration work when a batch request is unusable.
 *
 * @category Errors
 * @since 0.1.0
 */
export class BatchError extends Data.TaggedError("BatchError")<{
  readonly reason: BatchErrorReason
  readonly labels?: ReadonlyArray<string> | undefined
  readonly count?: number | undefined
  readonly limit?: number | undefined
  readonly detail?: string | undefined
}> {
  override get message(): string {
    switch (this.reason) {
      case "duplicate-label":
        return `Batch variant labels must be unique; repeated: ${(this.labels ?? []).join(", ")}`
      case "too-many-variants":
        return `Batch of ${this.count ?? "?"} variants exceeds the limit of ${this.limit ?? "?"}`
      case "malformed-variants":
        return `Batch variants could not be read: ${this.detail ?? ""}`
    }
  }
}

/**
 * Cases of {@link CatalogError}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type CatalogErrorReason = "not-found" | "malformed-catalog"

/**
 * Raised by the model catalog for an unknown model id or a catalog file that
 * cannot be read or decoded.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CatalogError extends Data.TaggedError("CatalogError")<{
  readonly reason: CatalogErrorReason
  readonly detail: string
  readonly modelId?: string | undefined
}> {
  override get message(): string {
    return this.reason === "not-found"
      ? `Unknown model "${this.modelId ?? ""}"`
      : `Model catalog is unusable: ${this.detail}`
  }
}
