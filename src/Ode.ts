/**
 * Compiles a model into the right-hand side of `dY/dt = f(t, Y)`.
 *
 * Structural checks run here, once, before any numeric work: flow endpoints
 * must name stocks, every active rate must parse, and every identifier a rate
 * reads must be a stock or a parameter. The derivative itself only evaluates.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import { SchemaError, SimulationError } from "./Errors.js"
import { compileExpression, evaluateCompiled, type CompiledExpression } from "./Expressions.js"
import { checkReservedIds, checkUniqueIds, type Flow, type ModelSchema } from "./Model.js"
import type { StockId } from "./Types.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface BuildOptions {
  /** Flows whose `mechanism` is listed here are dropped before compiling. */
  readonly excludedMechanisms?: ReadonlyArray<string>
}

/**
 * An active flow with its rate compiled and its endpoints resolved to
 * state-vector slots (`-1` for an external source or sink).
 *
 * @since 0.1.0
 * @category Models
 */
export interface CompiledFlow {
  readonly flow: Flow
  readonly rate: CompiledExpression
  readonly fromIndex: number
  readonly toIndex: number
}

/**
 * @since 0.1.0
 * @category Models
 */
export type Derivative = (t: number, y: ReadonlyArray<number>) => Either.Either<ReadonlyArray<number>, SimulationError>

/**
 * @since 0.1.0
 * @category Models
 */
export interface OdeSystem {
  readonly stockIds: ReadonlyArray<StockId>
  readonly initial: ReadonlyArray<number>
  readonly flows: ReadonlyArray<CompiledFlow>
  readonly derivative: Derivative
}

/**
 * Flows left after removing every flow tagged with an excluded mechanism.
 *
 * @since 0.1.0
 * @category Utils
 */
export const activeFlows = (model: ModelSchema, excludedMechanisms: ReadonlyArray<string> = []): ReadonlyArray<Flow> => {
  if (excludedMechanisms.length === 0) {
    return model.flows
  }
  const excluded = new Set(excludedMechanisms)
  return model.flows.filter((flow) => flow.mechanism === undefined || !excluded.has(flow.mechanism))
}

const resolveEndpoint = (
  flow: Flow,
  endpoint: "from" | "to",
  slots: ReadonlyMap<string, number>,
): Either.Either<number, SchemaError> => {
  const stockId = flow[endpoint]
  if (stockId === null) {
    return Either.right(-1)
  }
  const slot = slots.get(stockId)
  return slot === undefined
    ? Either.left(
        new SchemaError({
          reason: "unknown-stock-reference",
          entityId: flow.id,
          detail: `Flow "${flow.id}" has ${endpoint} "${stockId}", which is not a stock`,
        }),
      )
    : Either.right(slot)
}

const compileFlow = (
  flow: Flow,
  slots: ReadonlyMap<string, number>,
  known: ReadonlySet<string>,
): Either.Either<CompiledFlow, SchemaError> =>
  Either.gen(function*() {
    const fromIndex = yield* resolveEndpoint(flow, "from", slots)
    const toIndex = yield* resolveEndpoint(flow, "to", slots)
    const rate = yield* Either.mapLeft(
      compileExpression(flow.rate),
      (error) =>
        new SchemaError({
          reason: "invalid-rate-expression",
          entityId: flow.id,
          detail: error.problem,
          expressionError: error.forFlow(flow.id),
        }),
    )
    const unknown = rate.references.filter((name) => !known.has(name))
    if (unknown.length > 0) {
      return yield* Either.left(
        new SchemaError({
          reason: "unknown-identifier",
          entityId: flow.id,
          detail: `Rate of flow "${flow.id}" reads ${unknown.map((name) => `"${name}"`).join(", ")}, not a stock or parameter`,
        }),
      )
    }
    return { flow, rate, fromIndex, toIndex }
  })

const makeDerivative = (
  stockIds: ReadonlyArray<StockId>,
  parameters: Readonly<Record<string, number>>,
  flows: ReadonlyArray<CompiledFlow>,
): Derivative =>
(t, y) => {
  const namespace: Record<string, number> = Object.create(null)
  for (const id of Object.keys(parameters)) {
    namespace[id] = parameters[id] ?? Number.NaN
  }
  stockIds.forEach((id, index) => {
    namespace[id] = y[index] ?? Number.NaN
  })
  const dydt = new Array<number>(stockIds.length).fill(0)
  for (const { flow, rate, fromIndex, toIndex } of flows) {
    const value = evaluateCompiled(rate, namespace, t)
    if (Either.isLeft(value)) {
      return Either.left(
        new SimulationError({
          reason: "rate-evaluation-failed",
          flowId: flow.id,
          time: t,
          detail: value.left.problem,
          expressionError: value.left.forFlow(flow.id),
        }),
      )
    }
    if (toIndex >= 0) {
      dydt[toIndex] = (dydt[toIndex] ?? 0) + value.right
    }
    if (fromIndex >= 0) {
      dydt[fromIndex] = (dydt[fromIndex] ?? 0) - value.right
    }
  }
  return Either.right(dydt)
}

/**
 * Validate a model and compile its derivative function.
 *
 * Excluded flows are neither validated nor evaluated: the result is the
 * derivative of the model with those flows deleted.
 *
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```typescript
 * const system = yield* buildDerivative(model, { excludedMechanisms: ["backlash"] })
 * const slope = system.derivative(0, system.initial)
 * ```
 */
export const buildDerivative = (
  model: ModelSchema,
  options: BuildOptions = {},
): Effect.Effect<OdeSystem, SchemaError> =>
  Effect.gen(function*() {
    yield* checkUniqueIds(model)
    yield* checkReservedIds(model)
    const stockIds = model.stocks.map((stock) => stock.id)
    const slots = new Map<string, number>(stockIds.map((id, index) => [id, index]))
    const parameters: Record<string, number> = Object.create(null)
    for (const parameter of model.parameters) {
      parameters[parameter.id] = parameter.value
    }
    const known = new Set<string>([...stockIds, ...Object.keys(parameters)])

    const flows: Array<CompiledFlow> = []
    for (const flow of activeFlows(model, options.excludedMechanisms)) {
      flows.push(yield* compileFlow(flow, slots, known))
    }

    return {
      stockIds,
      initial: model.stocks.map((stock) => stock.initial),
      flows,
      derivative: makeDerivative(stockIds, parameters, flows),
    }
  })
