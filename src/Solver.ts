/**
 * Numerical integrators for compiled models.
 *
 * Each integrator advances a state vector across one output interval
 * `[t0, t1]` and lands exactly on `t1`. The adaptive Dormand–Prince integrator
 * carries its step size from one interval to the next; Euler and RK4 take a
 * single fixed step per interval and exist for comparison.
 *
 * Divergence is never an integration failure. When the error estimate cannot
 * be brought under tolerance, or the state has stopped being finite, the step
 * is taken anyway so the blow-up shows in the reported series.
 *
 * @since 0.1.0
 */

import { Either } from "effect"
import type { SimulationError } from "./Errors.js"
import type { Derivative } from "./Ode.js"
import {
  adaptiveErrorNorm,
  allFinite,
  blendRK4Rates,
  clampNumber,
  combineRates,
  pureEulerStep,
  type Vector,
} from "./internal/pure.js"

const DORMAND_PRINCE_C = [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1] as const

const DORMAND_PRINCE_A: ReadonlyArray<ReadonlyArray<number>> = [
  [],
  [1 / 5],
  [3 / 40, 9 / 40],
  [44 / 45, -56 / 15, 32 / 9],
  [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729],
  [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656],
  [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84],
]

const DORMAND_PRINCE_B5 = [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0] as const
const DORMAND_PRINCE_B4 = [5179 / 57600, 0, 7571 / 16695, 393 / 640, -92097 / 339200, 187 / 2100, 1 / 40] as const

const ADAPTIVE_ERROR_EXPONENT = -0.2 // -1/5 power used for Dormand–Prince controller

const TIME_EPSILON = 1e-12

/**
 * @since 0.1.0
 * @category Models
 */
export type SolverName = "dormand-prince" | "rk4" | "euler"

/**
 * @since 0.1.0
 * @category Constants
 */
export const solverNames: ReadonlyArray<SolverName> = ["dormand-prince", "rk4", "euler"]

/**
 * @since 0.1.0
 * @category Models
 */
export interface AdaptiveSolverOptions {
  readonly initialStep?: number
  readonly minStep?: number
  readonly maxStep?: number
  readonly safetyFactor?: number
  readonly growthLimit?: number
  readonly shrinkLimit?: number
  readonly absoluteTolerance?: number
  readonly relativeTolerance?: number
  readonly maxAttemptsPerStep?: number
}

interface ResolvedAdaptiveOptions {
  readonly initialStep: number
  readonly minStep: number
  readonly maxStep: number
  readonly safetyFactor: number
  readonly growthLimit: number
  readonly shrinkLimit: number
  readonly absoluteTolerance: number
  readonly relativeTolerance: number
  readonly maxAttemptsPerStep: number
}

const defaultAdaptiveOptions: ResolvedAdaptiveOptions = {
  initialStep: 0.1,
  minStep: 1e-6,
  maxStep: 1.0,
  safetyFactor: 0.9,
  growthLimit: 5.0,
  shrinkLimit: 0.2,
  absoluteTolerance: 1e-6,
  relativeTolerance: 1e-3,
  maxAttemptsPerStep: 12,
}

const resolveAdaptiveOptions = (overrides?: AdaptiveSolverOptions): ResolvedAdaptiveOptions => {
  if (!overrides) {
    return { ...defaultAdaptiveOptions }
  }

  const minStep = overrides.minStep ?? defaultAdaptiveOptions.minStep
  const maxStep = overrides.maxStep ?? defaultAdaptiveOptions.maxStep
  const safeMin = Math.min(minStep, maxStep)
  const safeMax = Math.max(minStep, maxStep)

  const initialRequested = overrides.initialStep ?? defaultAdaptiveOptions.initialStep
  const safetyFactor = overrides.safetyFactor ?? defaultAdaptiveOptions.safetyFactor
  const growthLimit = overrides.growthLimit ?? defaultAdaptiveOptions.growthLimit
  const shrinkLimit = overrides.shrinkLimit ?? defaultAdaptiveOptions.shrinkLimit
  const maxAttemptsPerStep = overrides.maxAttemptsPerStep ?? defaultAdaptiveOptions.maxAttemptsPerStep

  return {
    initialStep: clampNumber(initialRequested, safeMin, safeMax),
    minStep: safeMin,
    maxStep: safeMax,
    safetyFactor: Math.max(1e-3, safetyFactor),
    growthLimit: Math.max(1, growthLimit),
    shrinkLimit: Math.min(1, Math.max(1e-3, shrinkLimit)),
    absoluteTolerance: overrides.absoluteTolerance ?? defaultAdaptiveOptions.absoluteTolerance,
    relativeTolerance: overrides.relativeTolerance ?? defaultAdaptiveOptions.relativeTolerance,
    maxAttemptsPerStep: Math.max(1, maxAttemptsPerStep),
  }
}

/**
 * Advances the state from `t0` to `t1`.
 *
 * @since 0.1.0
 * @category Models
 */
export type Stepper = (t0: number, y0: Vector, t1: number) => Either.Either<ReadonlyArray<number>, SimulationError>

/**
 * @since 0.1.0
 * @category Models
 */
export interface Integrator {
  readonly name: SolverName
  /** A fresh stepper for one run; adaptive state never leaks between runs. */
  readonly start: (derivative: Derivative) => Stepper
}

/**
 * Baseline explicit Euler integrator.
 *
 * @since 0.1.0
 * @category Integrators
 */
export const Euler: Integrator = {
  name: "euler",
  start: (derivative) => (t0, y0, t1) =>
    Either.map(derivative(t0, y0), (rates) => pureEulerStep(y0, rates, t1 - t0)),
}

/**
 * Classical fourth-order Runge–Kutta integrator.
 *
 * @since 0.1.0
 * @category Integrators
 */
export const RK4: Integrator = {
  name: "rk4",
  start: (derivative) => (t0, y0, t1) =>
    Either.gen(function*() {
      const dt = t1 - t0
      const halfStep = dt / 2
      const k1 = yield* derivative(t0, y0)
      const k2 = yield* derivative(t0 + halfStep, pureEulerStep(y0, k1, halfStep))
      const k3 = yield* derivative(t0 + halfStep, pureEulerStep(y0, k2, halfStep))
      const k4 = yield* derivative(t1, pureEulerStep(y0, k3, dt))
      return pureEulerStep(y0, blendRK4Rates(k1, k2, k3, k4), dt)
    }),
}

interface TrialStep {
  readonly high: ReadonlyArray<number>
  readonly error: number
}

const dormandPrinceTrial = (
  derivative: Derivative,
  t: number,
  y: Vector,
  h: number,
  options: ResolvedAdaptiveOptions,
): Either.Either<TrialStep, SimulationError> =>
  Either.gen(function*() {
    const rates: Array<Vector> = []
    for (const [stage, fraction] of DORMAND_PRINCE_C.entries()) {
      const stageState = stage === 0 ? y : combineRates(y, rates, DORMAND_PRINCE_A[stage] ?? [], h)
      rates.push(yield* derivative(t + fraction * h, stageState))
    }
    const high = combineRates(y, rates, DORMAND_PRINCE_B5, h)
    const low = combineRates(y, rates, DORMAND_PRINCE_B4, h)
    const error = adaptiveErrorNorm(y, high, low, options.absoluteTolerance, options.relativeTolerance)
    return { high, error }
  })

const nextStepFactor = (error: number, options: ResolvedAdaptiveOptions): number => {
  if (!Number.isFinite(error)) {
    return options.shrinkLimit
  }
  if (error === 0) {
    return options.growthLimit
  }
  const proposed = options.safetyFactor * Math.pow(Math.max(error, 1e-12), ADAPTIVE_ERROR_EXPONENT)
  return clampNumber(proposed, options.shrinkLimit, options.growthLimit)
}

/**
 * Adaptive Dormand–Prince RK5(4) integrator.
 *
 * @since 0.1.0
 * @category Integrators
 * @example
 * ```ts
 * const integrator = DormandPrince({ relativeTolerance: 1e-6 })
 * ```
 */
export const DormandPrince = (options?: AdaptiveSolverOptions): Integrator => {
  const resolved = resolveAdaptiveOptions(options)
  return {
    name: "dormand-prince",
    start: (derivative) => {
      let nextStep = resolved.initialStep
      return (t0, y0, t1) =>
        Either.gen(function*() {
          let t = t0
          let y: Vector = y0

          while (t1 - t > TIME_EPSILON * Math.max(1, Math.abs(t1))) {
            const remaining = t1 - t

            if (!allFinite(y)) {
              // Nothing left to resolve once the state is non-finite.
              const rates = yield* derivative(t, y)
              y = pureEulerStep(y, rates, remaining)
              t = t1
              break
            }

            let step = clampNumber(nextStep, resolved.minStep, Math.min(resolved.maxStep, remaining))
            let attempts = 0

            while (true) {
              attempts += 1
              const trial = yield* dormandPrinceTrial(derivative, t, y, step, resolved)
              const factor = nextStepFactor(trial.error, resolved)
              const exhausted = attempts >= resolved.maxAttemptsPerStep || step <= resolved.minStep
              if (trial.error <= 1 || exhausted) {
                y = trial.high
                t = step >= remaining ? t1 : t + step
                nextStep = clampNumber(step * factor, resolved.minStep, resolved.maxStep)
                break
              }
              step = clampNumber(step * factor, resolved.minStep, Math.min(resolved.maxStep, remaining))
            }
          }

          return y
        })
    },
  }
}

/**
 * Integrator registered under `name`; `adaptive` only affects Dormand–Prince.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const integratorFor = (name: SolverName, adaptive?: AdaptiveSolverOptions): Integrator => {
  switch (name) {
    case "dormand-prince":
      return DormandPrince(adaptive)
    case "rk4":
      return RK4
    case "euler":
      return Euler
  }
}

/**
 * Integrate across the given time grid, returning one state vector per grid
 * point. The first vector is `initial`.
 *
 * @since 0.1.0
 * @category Integration
 */
export const integrateOnGrid = (
  integrator: Integrator,
  derivative: Derivative,
  initial: Vector,
  grid: ReadonlyArray<number>,
): Either.Either<ReadonlyArray<ReadonlyArray<number>>, SimulationError> =>
  Either.gen(function*() {
    const stepper = integrator.start(derivative)
    const states: Array<ReadonlyArray<number>> = [initial]
    let y = initial
    for (let index = 1; index < grid.length; index += 1) {
      y = yield* stepper(grid[index - 1] ?? 0, y, grid[index] ?? 0)
      states.push(y)
    }
    return states
  })
