/**
 * Simulation of a model over `[0, horizon]`.
 *
 * The model is compiled once, integrated across a regular grid of
 * `sampleCount` points, and the sampled series is scanned for divergence.
 * Results are a pure function of the model and the options: the same inputs
 * produce bit-identical time points and values.
 *
 * @since 0.1.0
 */

import { Chunk, Effect, Either, Option, Schema, Stream } from "effect"
import { DEFAULT_DIVERGENCE_THRESHOLD, scanDivergence } from "./Divergence.js"
import { SimulationError, type SchemaError } from "./Errors.js"
import type { ModelSchema } from "./Model.js"
import { buildDerivative, type BuildOptions } from "./Ode.js"
import { integrateOnGrid, integratorFor, type AdaptiveSolverOptions, type SolverName } from "./Solver.js"
import { regularGrid } from "./internal/pure.js"
import { StockId } from "./Types.js"

/**
 * Number of reported grid points when none is given.
 *
 * @since 0.1.0
 * @category Constants
 */
export const DEFAULT_SAMPLE_COUNT = 200

/**
 * @since 0.1.0
 * @category Models
 */
export interface SimulateOptions extends BuildOptions {
  readonly horizon: number
  /** Grid points reported over `[0, horizon]`, both ends included. At least 2. */
  readonly sampleCount?: number
  readonly solver?: SolverName
  readonly divergenceThreshold?: number
  readonly adaptive?: AdaptiveSolverOptions
}

/**
 * Outcome of one simulation. `values[i][j]` is stock `stockIds[i]` at
 * `time[j]`. Encodes to `{ t, stock_ids, Y, warnings }`.
 *
 * @since 0.1.0
 * @category Models
 */
export class SimulationResult extends Schema.Class<SimulationResult>("SimulationResult")({
  time: Schema.propertySignature(Schema.Array(Schema.Number)).pipe(Schema.fromKey("t")),
  stockIds: Schema.propertySignature(Schema.Array(StockId)).pipe(Schema.fromKey("stock_ids")),
  values: Schema.propertySignature(Schema.Array(Schema.Array(Schema.Number))).pipe(Schema.fromKey("Y")),
  warnings: Schema.Array(Schema.String),
}) {}

/**
 * Wire form of a {@link SimulationResult}.
 *
 * @since 0.1.0
 * @category Models
 */
export type SimulationResultWire = typeof SimulationResult.Encoded

/**
 * State of every stock at one grid point.
 *
 * @since 0.1.0
 * @category Models
 */
export interface Sample {
  readonly time: number
  readonly values: ReadonlyArray<number>
}

interface Cursor {
  readonly index: number
  readonly sample: Sample
}

const resolveSampleCount = (sampleCount: number | undefined): number =>
  sampleCount === undefined || !Number.isFinite(sampleCount)
    ? DEFAULT_SAMPLE_COUNT
    : Math.max(2, Math.floor(sampleCount))

const validateHorizon = (horizon: number): Effect.Effect<number, SimulationError> =>
  Number.isFinite(horizon) && horizon > 0
    ? Effect.succeed(horizon)
    : Effect.fail(
        new SimulationError({
          reason: "invalid-horizon",
          detail: `Horizon must be a positive finite number, received ${horizon}`,
        }),
      )

const transpose = (states: ReadonlyArray<ReadonlyArray<number>>, width: number): Array<Array<number>> =>
  Array.from({ length: width }, (_, row) => states.map((state) => state[row] ?? Number.NaN))

/**
 * Simulate a model and attach divergence warnings.
 *
 * @since 0.1.0
 * @category Simulation
 * @example
 * ```ts
 * const result = yield* simulate(model, { horizon: 10 })
 * result.warnings // => []
 * ```
 */
export const simulate = (
  model: ModelSchema,
  options: SimulateOptions,
): Effect.Effect<SimulationResult, SchemaError | SimulationError> =>
  Effect.gen(function*() {
    const horizon = yield* validateHorizon(options.horizon)
    const system = yield* buildDerivative(model, options)
    const time = regularGrid(horizon, resolveSampleCount(options.sampleCount))
    const integrator = integratorFor(options.solver ?? "dormand-prince", options.adaptive)
    const states = yield* integrateOnGrid(integrator, system.derivative, system.initial, time)
    const values = transpose(states, system.stockIds.length)
    const warnings = scanDivergence(
      system.stockIds,
      time,
      values,
      options.divergenceThreshold ?? DEFAULT_DIVERGENCE_THRESHOLD,
    )
    return new SimulationResult({ time, stockIds: system.stockIds, values, warnings })
  })

/**
 * Lazily simulate a model, emitting one {@link Sample} per grid point,
 * starting with the initial state. Every run of the stream integrates afresh.
 * No divergence scan is applied.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const simulateStream = (
  model: ModelSchema,
  options: SimulateOptions,
): Effect.Effect<Stream.Stream<Sample, SimulationError>, SchemaError | SimulationError> =>
  Effect.gen(function*() {
    const horizon = yield* validateHorizon(options.horizon)
    const system = yield* buildDerivative(model, options)
    const time = regularGrid(horizon, resolveSampleCount(options.sampleCount))
    const integrator = integratorFor(options.solver ?? "dormand-prince", options.adaptive)

    return Stream.suspend(() => {
      const stepper = integrator.start(system.derivative)
      const initial: Sample = { time: 0, values: system.initial }
      const rest = Stream.unfoldEffect(
        { index: 0, sample: initial },
        ({ index, sample }): Effect.Effect<Option.Option<readonly [Sample, Cursor]>, SimulationError> => {
          const target = time[index + 1]
          if (target === undefined) {
            return Effect.succeed(Option.none())
          }
          return Either.match(stepper(sample.time, sample.values, target), {
            onLeft: (error) => Effect.fail(error),
            onRight: (values) => {
              const next: Sample = { time: target, values }
              return Effect.succeed(Option.some([next, { index: index + 1, sample: next }] as const))
            },
          })
        },
      )
      return Stream.prepend(rest, Chunk.of(initial))
    })
  })

/**
 * Last value of every stock, keyed by stock id.
 *
 * @since 0.1.0
 * @category Getters
 */
export const finalValues = (result: SimulationResult): Readonly<Record<string, number>> => {
  const record: Record<string, number> = Object.create(null)
  result.stockIds.forEach((id, row) => {
    const series = result.values[row] ?? []
    record[id] = series[series.length - 1] ?? Number.NaN
  })
  return record
}

/**
 * @since 0.1.0
 * @category Encoding
 */
export const encodeResult = (result: SimulationResult): SimulationResultWire =>
  Schema.encodeSync(SimulationResult)(result)
