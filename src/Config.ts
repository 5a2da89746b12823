/**
 * Runtime settings for the service layer, read from the environment.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"
import { DEFAULT_MAX_VARIANTS } from "./Batch.js"
import { DEFAULT_DIVERGENCE_THRESHOLD } from "./Divergence.js"
import { DEFAULT_SAMPLE_COUNT } from "./Simulation.js"
import type { SolverName } from "./Solver.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface SimulationSettings {
  readonly sampleCount: number
  readonly divergenceThreshold: number
  readonly maxBatchVariants: number
  readonly batchConcurrency: number
  readonly solver: SolverName
}

/**
 * Settings used when no environment variable overrides them.
 *
 * @since 0.1.0
 * @category Constants
 */
export const defaultSettings: SimulationSettings = {
  sampleCount: DEFAULT_SAMPLE_COUNT,
  divergenceThreshold: DEFAULT_DIVERGENCE_THRESHOLD,
  maxBatchVariants: DEFAULT_MAX_VARIANTS,
  batchConcurrency: 1,
  solver: "dormand-prince",
}

const atLeast = (name: string, minimum: number) =>
  Config.integer(name).pipe(
    Config.validate({
      message: `Expected an integer of at least ${minimum}`,
      validation: (value) => value >= minimum,
    }),
  )

/**
 * `STOCKFLOW_*` variables, each with its default.
 *
 * @since 0.1.0
 * @category Config
 */
export const simulationSettings: Config.Config<SimulationSettings> = Config.all({
  sampleCount: atLeast("STOCKFLOW_SAMPLE_COUNT", 2).pipe(Config.withDefault(defaultSettings.sampleCount)),
  divergenceThreshold: Config.number("STOCKFLOW_DIVERGENCE_THRESHOLD").pipe(
    Config.validate({
      message: "Expected a positive number",
      validation: (value) => value > 0,
    }),
    Config.withDefault(defaultSettings.divergenceThreshold),
  ),
  maxBatchVariants: atLeast("STOCKFLOW_MAX_BATCH_VARIANTS", 1).pipe(
    Config.withDefault(defaultSettings.maxBatchVariants),
  ),
  batchConcurrency: atLeast("STOCKFLOW_BATCH_CONCURRENCY", 1).pipe(
    Config.withDefault(defaultSettings.batchConcurrency),
  ),
  solver: Config.literal("dormand-prince", "rk4", "euler")("STOCKFLOW_SOLVER").pipe(
    Config.withDefault(defaultSettings.solver),
  ),
})

/**
 * @category Services
 * @since 0.1.0
 */
export class SimulationConfig extends Context.Tag("stockflow/SimulationConfig")<
  SimulationConfig,
  SimulationSettings
>() {
  /** Reads the settings from the current `ConfigProvider`. */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function*() {
      const settings = yield* simulationSettings
      yield* Effect.logDebug("Simulation settings loaded").pipe(
        Effect.annotateLogs({
          sampleCount: settings.sampleCount,
          solver: settings.solver,
          batchConcurrency: settings.batchConcurrency,
        }),
      )
      return settings
    }),
  )

  static make(overrides: Partial<SimulationSettings> = {}) {
    return Layer.succeed(this, { ...defaultSettings, ...overrides })
  }
}
