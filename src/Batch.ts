/**
 * Batched scenario runs: one model, many labelled parameter overrides.
 *
 * Every variant patches its own copy of the model and simulates it on its own
 * integrator, so variants can run in any order or concurrently and still give
 * the results of separate {@link simulate} calls.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import { BatchError, type PatchError, type SchemaError, type SimulationError } from "./Errors.js"
import { checkUniqueIds, type ModelSchema } from "./Model.js"
import { applyPatch, decodePatch } from "./Patch.js"
import { simulate, SimulationResult, type SimulateOptions } from "./Simulation.js"

/**
 * Default cap on variants per batch.
 *
 * @since 0.1.0
 * @category Constants
 */
export const DEFAULT_MAX_VARIANTS = 50

/**
 * A labelled set of parameter overrides.
 *
 * @category Models
 * @since 0.1.0
 */
export class BatchVariant extends Schema.Class<BatchVariant>("BatchVariant")({
  label: Schema.String,
  params: Schema.optionalWith(
    Schema.Record({ key: Schema.String, value: Schema.Number.pipe(Schema.finite()) }),
    { default: () => ({}) },
  ),
}) {}

/**
 * Result of one variant, labelled. Encodes to
 * `{ label, t, stock_ids, Y, warnings }`.
 *
 * @category Models
 * @since 0.1.0
 */
export class BatchRun extends SimulationResult.extend<BatchRun>("BatchRun")({
  label: Schema.String,
}) {}

/**
 * @since 0.1.0
 * @category Models
 */
export type BatchRunWire = typeof BatchRun.Encoded

/**
 * @since 0.1.0
 * @category Models
 */
export interface BatchOptions extends SimulateOptions {
  readonly variants: ReadonlyArray<BatchVariant>
  readonly maxVariants?: number
  readonly concurrency?: number | "unbounded"
}

const checkVariants = (
  variants: ReadonlyArray<BatchVariant>,
  limit: number,
): Effect.Effect<void, BatchError> => {
  if (variants.length > limit) {
    return Effect.fail(new BatchError({ reason: "too-many-variants", count: variants.length, limit }))
  }
  const seen = new Set<string>()
  const repeated = new Set<string>()
  for (const { label } of variants) {
    if (seen.has(label)) {
      repeated.add(label)
    }
    seen.add(label)
  }
  return repeated.size > 0
    ? Effect.fail(new BatchError({ reason: "duplicate-label", labels: [...repeated] }))
    : Effect.void
}

/**
 * The model with a variant's overrides merged in. An override for an id the
 * model does not have appends a new parameter.
 *
 * @since 0.1.0
 * @category Combinators
 */
export const applyVariant = (model: ModelSchema, variant: BatchVariant): Effect.Effect<ModelSchema, PatchError> =>
  decodePatch({
    parameters: Object.entries(variant.params).map(([id, value]) => ({ id, value })),
  }).pipe(Effect.flatMap((patch) => applyPatch(model, patch)))

/**
 * Simulate every variant. Limits and label uniqueness are checked before any
 * integration starts; results keep the order of `variants`.
 *
 * @since 0.1.0
 * @category Simulation
 * @example
 * ```ts
 * const runs = yield* runBatch(model, {
 *   horizon: 10,
 *   variants: [
 *     new BatchVariant({ label: "slow", params: { k: 0.1 } }),
 *     new BatchVariant({ label: "fast", params: { k: 0.5 } }),
 *   ],
 * })
 * ```
 */
export const runBatch = (
  model: ModelSchema,
  options: BatchOptions,
): Effect.Effect<ReadonlyArray<BatchRun>, SchemaError | SimulationError | PatchError | BatchError> => {
  const { concurrency = 1, maxVariants = DEFAULT_MAX_VARIANTS, variants, ...simulateOptions } = options
  return checkVariants(variants, maxVariants).pipe(
    Effect.zipRight(
      Effect.forEach(
        variants,
        (variant) =>
          applyVariant(model, variant).pipe(
            Effect.flatMap(checkUniqueIds),
            Effect.flatMap((patched) => simulate(patched, simulateOptions)),
            Effect.map((result) => new BatchRun({ ...result, label: variant.label })),
          ),
        { concurrency },
      ),
    ),
  )
}

/**
 * @since 0.1.0
 * @category Encoding
 */
export const encodeRun = (run: BatchRun): BatchRunWire => Schema.encodeSync(BatchRun)(run)
