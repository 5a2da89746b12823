/**
 * Wire-level facade over the core operations.
 *
 * Inputs are untrusted records as a host receives them; outputs are the
 * encoded snake_case records a host sends back. Settings come from
 * {@link SimulationConfig}.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, ParseResult, Schema } from "effect"
import { BatchVariant, encodeRun, runBatch, type BatchRunWire } from "./Batch.js"
import { SimulationConfig, type SimulationSettings } from "./Config.js"
import { BatchError, type PatchError, type SchemaError, type SimulationError } from "./Errors.js"
import { checkUniqueIds, decodeModel, encodeModel, type ModelSchemaWire } from "./Model.js"
import { applyPatch, decodePatch } from "./Patch.js"
import { encodeResult, simulate, type SimulationResultWire } from "./Simulation.js"

/**
 * @category Services
 * @since 0.1.0
 */
export interface SimulationEngineService {
  readonly simulate: (
    schema: unknown,
    horizon: number,
    excludedMechanisms?: ReadonlyArray<string>,
  ) => Effect.Effect<SimulationResultWire, SchemaError | SimulationError>
  readonly simulateBatch: (
    schema: unknown,
    horizon: number,
    variants: unknown,
  ) => Effect.Effect<ReadonlyArray<BatchRunWire>, SchemaError | SimulationError | PatchError | BatchError>
  readonly applyPatch: (schema: unknown, patch: unknown) => Effect.Effect<ModelSchemaWire, SchemaError | PatchError>
}

const decodeVariants = (input: unknown): Effect.Effect<ReadonlyArray<BatchVariant>, BatchError> =>
  Schema.decodeUnknown(Schema.Array(BatchVariant))(input).pipe(
    Effect.mapError(
      (error) =>
        new BatchError({
          reason: "malformed-variants",
          detail: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    ),
  )

const logWarnings = (warnings: ReadonlyArray<string>) =>
  Effect.forEach(warnings, (warning) => Effect.logWarning(warning), { discard: true })

/**
 * Build the engine around explicit settings.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const makeSimulationEngine = (settings: SimulationSettings): SimulationEngineService => {
  const simulateOptions = {
    sampleCount: settings.sampleCount,
    divergenceThreshold: settings.divergenceThreshold,
    solver: settings.solver,
  }

  return {
    simulate: (schema, horizon, excludedMechanisms) =>
      Effect.gen(function*() {
        const model = yield* decodeModel(schema)
        const result = yield* simulate(model, {
          ...simulateOptions,
          horizon,
          excludedMechanisms: excludedMechanisms ?? [],
        })
        yield* Effect.logDebug("Simulation finished").pipe(
          Effect.annotateLogs({ stocks: model.stocks.length, samples: result.time.length }),
        )
        yield* logWarnings(result.warnings)
        return encodeResult(result)
      }).pipe(
        Effect.annotateLogs({ operation: "simulate", horizon }),
        Effect.withLogSpan("simulate"),
      ),

    simulateBatch: (schema, horizon, variantsInput) =>
      Effect.gen(function*() {
        const model = yield* decodeModel(schema)
        const variants = yield* decodeVariants(variantsInput)
        const runs = yield* runBatch(model, {
          ...simulateOptions,
          horizon,
          variants,
          maxVariants: settings.maxBatchVariants,
          concurrency: settings.batchConcurrency,
        })
        yield* Effect.logDebug("Batch finished").pipe(
          Effect.annotateLogs({ stocks: model.stocks.length, variants: variants.length }),
        )
        yield* Effect.forEach(
          runs,
          (run) => logWarnings(run.warnings).pipe(Effect.annotateLogs("variant", run.label)),
          { discard: true },
        )
        return runs.map(encodeRun)
      }).pipe(
        Effect.annotateLogs({ operation: "simulate-batch", horizon }),
        Effect.withLogSpan("simulate-batch"),
      ),

    applyPatch: (schema, patchInput) =>
      Effect.gen(function*() {
        const model = yield* decodeModel(schema)
        const patch = yield* decodePatch(patchInput)
        const patched = yield* applyPatch(model, patch).pipe(Effect.flatMap(checkUniqueIds))
        yield* Effect.logDebug("Patch applied").pipe(
          Effect.annotateLogs({
            stocks: patch.stocks.length,
            flows: patch.flows.length,
            parameters: patch.parameters.length,
          }),
        )
        return encodeModel(patched)
      }).pipe(
        Effect.annotateLogs({ operation: "apply-patch" }),
        Effect.withLogSpan("apply-patch"),
      ),
  }
}

/**
 * @category Services
 * @since 0.1.0
 */
export class SimulationEngine extends Context.Tag("stockflow/SimulationEngine")<
  SimulationEngine,
  SimulationEngineService
>() {
  static readonly layer = Layer.effect(
    this,
    Effect.map(SimulationConfig, makeSimulationEngine),
  )
}
