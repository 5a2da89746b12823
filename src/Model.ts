/**
 * Core Domain Schemas for stock/flow models
 *
 * This module defines the building blocks of a model:
 * - Stock: an accumulator; its position in the model fixes its slot in the state vector
 * - Flow: a rate expression moving quantity into, out of or between stocks
 * - Parameter: a named constant read by rate expressions
 * - Loop / Cluster: descriptive groupings carried as metadata only
 * - ModelSchema: the complete model
 *
 * The wire format uses snake_case keys (`loop_type`, `loop_ids`, `flow_ids`,
 * `stock_ids`); the decoded classes use camelCase.
 *
 * @since 0.1.0
 */

import { Effect, ParseResult, Schema } from "effect"
import { SchemaError } from "./Errors.js"
import { isReservedWord } from "./Expressions.js"
import { FlowId, LoopId, ParameterId, StockId } from "./Types.js"

/**
 * Feedback polarity annotation: reinforcing, balancing, or unset.
 *
 * @since 0.1.0
 * @category Models
 */
export const LoopType = Schema.Literal("R", "B", "")

/**
 * @since 0.1.0
 * @category Models
 */
export type LoopType = typeof LoopType.Type

const FiniteNumber = Schema.Number.pipe(Schema.finite())

/**
 * Stock: an accumulator whose value at t=0 is `initial`.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const susceptible = new Stock({
 *   id: StockId.make("S"),
 *   name: "Susceptible",
 *   initial: 990,
 * })
 * ```
 */
export class Stock extends Schema.Class<Stock>("Stock")({
  id: StockId,
  name: Schema.String,
  initial: FiniteNumber,
  unit: Schema.optional(Schema.String),
  source: Schema.optional(Schema.String), // provenance, e.g. "ai"
  loopType: Schema.optional(LoopType).pipe(Schema.fromKey("loop_type")),
}) {}

/**
 * Flow: a rate that drains `from` and fills `to`.
 *
 * A null `from` is an external source and a null `to` an external sink. The
 * `mechanism` tag groups flows so one feedback story can be switched off.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const recovery = new Flow({
 *   id: FlowId.make("recovery"),
 *   name: "Recovery",
 *   from: StockId.make("I"),
 *   to: StockId.make("R"),
 *   rate: "gamma * I",
 * })
 * ```
 */
export class Flow extends Schema.Class<Flow>("Flow")({
  id: FlowId,
  name: Schema.String,
  from: Schema.optionalWith(Schema.NullOr(StockId), { default: () => null }),
  to: Schema.optionalWith(Schema.NullOr(StockId), { default: () => null }),
  rate: Schema.String,
  source: Schema.optional(Schema.String),
  loopType: Schema.optional(LoopType).pipe(Schema.fromKey("loop_type")),
  mechanism: Schema.optional(Schema.String),
  delay: Schema.optional(Schema.String),
  unit: Schema.optional(Schema.String),
  loopIds: Schema.optional(Schema.Array(LoopId)).pipe(Schema.fromKey("loop_ids")),
}) {}

/**
 * Parameter: a constant visible to every rate expression under its id.
 *
 * @since 0.1.0
 * @category Models
 */
export class Parameter extends Schema.Class<Parameter>("Parameter")({
  id: ParameterId,
  name: Schema.String,
  value: FiniteNumber,
  unit: Schema.optional(Schema.String),
}) {}

/**
 * Loop: an authored feedback loop annotation. Not read by the solver.
 *
 * @since 0.1.0
 * @category Models
 */
export class Loop extends Schema.Class<Loop>("Loop")({
  id: LoopId,
  name: Schema.String,
  type: Schema.Literal("R", "B"),
  description: Schema.optional(Schema.String),
  flowIds: Schema.optionalWith(Schema.Array(FlowId), { default: () => [] }).pipe(Schema.fromKey("flow_ids")),
  delay: Schema.optional(Schema.String),
}) {}

/**
 * Cluster: a named group of stocks, used for both `clusters` and
 * `alternatives`.
 *
 * @since 0.1.0
 * @category Models
 */
export class Cluster extends Schema.Class<Cluster>("Cluster")({
  id: Schema.NonEmptyTrimmedString,
  name: Schema.String,
  stockIds: Schema.optionalWith(Schema.Array(StockId), { default: () => [] }).pipe(Schema.fromKey("stock_ids")),
}) {}

/**
 * ModelSchema: a complete model. Stock order is the state-vector order.
 *
 * Instances are never mutated; patches and edits return new instances.
 *
 * @since 0.1.0
 * @category Models
 */
export class ModelSchema extends Schema.Class<ModelSchema>("ModelSchema")({
  stocks: Schema.Array(Stock),
  flows: Schema.Array(Flow),
  parameters: Schema.Array(Parameter),
  loops: Schema.optionalWith(Schema.Array(Loop), { default: () => [] }),
  clusters: Schema.optionalWith(Schema.Array(Cluster), { default: () => [] }),
  alternatives: Schema.optionalWith(Schema.Array(Cluster), { default: () => [] }),
  meta: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Schema.Unknown }), {
    default: () => ({}),
  }),
}) {}

// Wire records may omit `name`; it falls back to the id.

const StockWire = Schema.Struct({ ...Stock.fields, name: Schema.optional(Schema.String) })

const StockFromWire = Schema.transform(StockWire, Schema.typeSchema(Stock), {
  strict: true,
  decode: ({ name, ...fields }) => new Stock({ ...fields, name: name ?? fields.id }),
  encode: (stock) => stock,
})

const FlowWire = Schema.Struct({ ...Flow.fields, name: Schema.optional(Schema.String) })

const FlowFromWire = Schema.transform(FlowWire, Schema.typeSchema(Flow), {
  strict: true,
  decode: ({ name, ...fields }) => new Flow({ ...fields, name: name ?? fields.id }),
  encode: (flow) => flow,
})

const ParameterWire = Schema.Struct({ ...Parameter.fields, name: Schema.optional(Schema.String) })

const ParameterFromWire = Schema.transform(ParameterWire, Schema.typeSchema(Parameter), {
  strict: true,
  decode: ({ name, ...fields }) => new Parameter({ ...fields, name: name ?? fields.id }),
  encode: (parameter) => parameter,
})

const LoopWire = Schema.Struct({ ...Loop.fields, name: Schema.optional(Schema.String) })

const LoopFromWire = Schema.transform(LoopWire, Schema.typeSchema(Loop), {
  strict: true,
  decode: ({ name, ...fields }) => new Loop({ ...fields, name: name ?? fields.id }),
  encode: (loop) => loop,
})

const ClusterWire = Schema.Struct({ ...Cluster.fields, name: Schema.optional(Schema.String) })

const ClusterFromWire = Schema.transform(ClusterWire, Schema.typeSchema(Cluster), {
  strict: true,
  decode: ({ name, ...fields }) => new Cluster({ ...fields, name: name ?? fields.id }),
  encode: (cluster) => cluster,
})

const ModelWire = Schema.Struct({
  stocks: Schema.optionalWith(Schema.Array(StockFromWire), { default: () => [] }),
  flows: Schema.optionalWith(Schema.Array(FlowFromWire), { default: () => [] }),
  parameters: Schema.optionalWith(Schema.Array(ParameterFromWire), { default: () => [] }),
  loops: Schema.optionalWith(Schema.Array(LoopFromWire), { default: () => [] }),
  clusters: Schema.optionalWith(Schema.Array(ClusterFromWire), { default: () => [] }),
  alternatives: Schema.optionalWith(Schema.Array(ClusterFromWire), { default: () => [] }),
  meta: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Schema.Unknown }), {
    default: () => ({}),
  }),
})

/**
 * Schema between the serialized record form of a model and {@link ModelSchema}.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const ModelSchemaFromWire = Schema.transform(ModelWire, Schema.typeSchema(ModelSchema), {
  strict: true,
  decode: (wire) => new ModelSchema(wire),
  encode: (model) => model,
})

/**
 * Serialized record form of a model.
 *
 * @since 0.1.0
 * @category Schemas
 */
export type ModelSchemaWire = typeof ModelSchemaFromWire.Encoded

const findDuplicate = (ids: ReadonlyArray<string>): string | undefined => {
  const seen = new Set<string>()
  for (const id of ids) {
    if (seen.has(id)) {
      return id
    }
    seen.add(id)
  }
  return undefined
}

/**
 * Check id uniqueness. Stocks and parameters share the namespace rate
 * expressions are evaluated in, so an id used by both is a duplicate too.
 *
 * @since 0.1.0
 * @category Validation
 */
export const checkUniqueIds = (model: ModelSchema): Effect.Effect<ModelSchema, SchemaError> => {
  const collections: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
    ["stocks", model.stocks.map((stock) => stock.id)],
    ["flows", model.flows.map((flow) => flow.id)],
    ["parameters", model.parameters.map((parameter) => parameter.id)],
    [
      "stocks and parameters",
      [...model.stocks.map((stock) => stock.id), ...model.parameters.map((parameter) => parameter.id)],
    ],
  ]
  for (const [collection, ids] of collections) {
    const duplicate = findDuplicate(ids)
    if (duplicate !== undefined) {
      return Effect.fail(
        new SchemaError({
          reason: "duplicate-id",
          entityId: duplicate,
          detail: `Id "${duplicate}" appears more than once in ${collection}`,
        }),
      )
    }
  }
  return Effect.succeed(model)
}

/**
 * Reject stock and parameter ids that rate expressions would read as a
 * keyword, such as `TIME`, `true` or `end`.
 *
 * @since 0.1.0
 * @category Validation
 */
export const checkReservedIds = (model: ModelSchema): Effect.Effect<ModelSchema, SchemaError> => {
  const reserved = [...model.stocks, ...model.parameters].find((entity) => isReservedWord(entity.id))
  return reserved === undefined
    ? Effect.succeed(model)
    : Effect.fail(
        new SchemaError({
          reason: "reserved-identifier",
          entityId: reserved.id,
          detail: `Id "${reserved.id}" is a reserved word in rate expressions; choose another id`,
        }),
      )
}

/**
 * Decode a serialized model and check its ids.
 *
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```typescript
 * const model = yield* decodeModel({
 *   stocks: [{ id: "S0", initial: 100 }],
 *   flows: [{ id: "f1", from: "S0", to: null, rate: "k * S0" }],
 *   parameters: [{ id: "k", value: 0.1 }],
 * })
 * ```
 */
export const decodeModel = (input: unknown): Effect.Effect<ModelSchema, SchemaError> =>
  Schema.decodeUnknown(ModelSchemaFromWire)(input).pipe(
    Effect.mapError(
      (error) =>
        new SchemaError({
          reason: "malformed-schema",
          detail: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    ),
    Effect.flatMap(checkUniqueIds),
    Effect.flatMap(checkReservedIds),
  )

/**
 * Encode a model back to its serialized record form.
 *
 * @since 0.1.0
 * @category Encoding
 */
export const encodeModel = (model: ModelSchema): ModelSchemaWire => Schema.encodeSync(ModelSchemaFromWire)(model)

/**
 * Consistency report for authored metadata: dangling flow endpoints, loop
 * memberships naming unknown flows, flows naming unknown loops. Empty when the
 * model is consistent. The ODE builder enforces the endpoint checks on its own.
 *
 * @since 0.1.0
 * @category Validation
 */
export const validateModel = (model: ModelSchema): ReadonlyArray<string> => {
  const stockIds = new Set<string>(model.stocks.map((stock) => stock.id))
  const flowIds = new Set<string>(model.flows.map((flow) => flow.id))
  const loopIds = new Set<string>(model.loops.map((loop) => loop.id))
  const issues: Array<string> = []

  for (const flow of model.flows) {
    if (flow.from !== null && !stockIds.has(flow.from)) {
      issues.push(`Flow "${flow.id}": from "${flow.from}" is not a stock id`)
    }
    if (flow.to !== null && !stockIds.has(flow.to)) {
      issues.push(`Flow "${flow.id}": to "${flow.to}" is not a stock id`)
    }
    for (const loopId of flow.loopIds ?? []) {
      if (!loopIds.has(loopId)) {
        issues.push(`Flow "${flow.id}": loop_ids contains unknown loop "${loopId}"`)
      }
    }
  }

  for (const loop of model.loops) {
    for (const flowId of loop.flowIds) {
      if (!flowIds.has(flowId)) {
        issues.push(`Loop "${loop.id}": flow_ids contains unknown flow "${flowId}"`)
      }
    }
  }

  return issues
}

/**
 * Plain-text listing of a model's structure.
 *
 * @since 0.1.0
 * @category Formatting
 */
export const describeModel = (model: ModelSchema): string => {
  const lines: Array<string> = ["Stocks (id: name = initial)"]
  for (const stock of model.stocks) {
    lines.push(`  ${stock.id}: ${stock.name} = ${stock.initial}`)
  }
  lines.push("", "Flows (id: from -> to, rate)")
  for (const flow of model.flows) {
    const tag = flow.mechanism ? ` [${flow.mechanism}]` : ""
    lines.push(`  ${flow.id}: ${flow.from ?? "source"} -> ${flow.to ?? "sink"}, rate = ${flow.rate}${tag}`)
  }
  lines.push("", "Parameters (id: name = value)")
  for (const parameter of model.parameters) {
    lines.push(`  ${parameter.id}: ${parameter.name} = ${parameter.value}`)
  }
  return lines.join("\n")
}
