/**
 * Patches: partial, id-keyed updates of a model.
 *
 * A fragment overwrites only the fields it carries on the entity with the same
 * id; a fragment for an unknown id appends a new entity. Everything the patch
 * does not name stays exactly as it was, so two patches applied to the same base
 * never interfere and re-applying a patch is a no-op.
 *
 * Patches proposed by an external suggestion mechanism go through the same
 * decoding as hand-written ones.
 *
 * @since 0.1.0
 */

import { Effect, Either, ParseResult, Schema } from "effect"
import { PatchError, type PatchCollection } from "./Errors.js"
import { Flow, LoopType, ModelSchema, Parameter, Stock } from "./Model.js"
import { LoopId, ParameterId, StockId, FlowId } from "./Types.js"

const FiniteNumber = Schema.Number.pipe(Schema.finite())

/**
 * @since 0.1.0
 * @category Schemas
 */
export const StockPatch = Schema.Struct({
  id: StockId,
  name: Schema.optionalWith(Schema.String, { exact: true }),
  initial: Schema.optionalWith(FiniteNumber, { exact: true }),
  unit: Schema.optionalWith(Schema.String, { exact: true }),
  source: Schema.optionalWith(Schema.String, { exact: true }),
  loopType: Schema.optionalWith(LoopType, { exact: true }).pipe(Schema.fromKey("loop_type")),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export type StockPatch = typeof StockPatch.Type

/**
 * @since 0.1.0
 * @category Schemas
 */
export const FlowPatch = Schema.Struct({
  id: FlowId,
  name: Schema.optionalWith(Schema.String, { exact: true }),
  from: Schema.optionalWith(Schema.NullOr(StockId), { exact: true }),
  to: Schema.optionalWith(Schema.NullOr(StockId), { exact: true }),
  rate: Schema.optionalWith(Schema.String, { exact: true }),
  source: Schema.optionalWith(Schema.String, { exact: true }),
  loopType: Schema.optionalWith(LoopType, { exact: true }).pipe(Schema.fromKey("loop_type")),
  mechanism: Schema.optionalWith(Schema.String, { exact: true }),
  delay: Schema.optionalWith(Schema.String, { exact: true }),
  unit: Schema.optionalWith(Schema.String, { exact: true }),
  loopIds: Schema.optionalWith(Schema.Array(LoopId), { exact: true }).pipe(Schema.fromKey("loop_ids")),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export type FlowPatch = typeof FlowPatch.Type

/**
 * @since 0.1.0
 * @category Schemas
 */
export const ParameterPatch = Schema.Struct({
  id: ParameterId,
  name: Schema.optionalWith(Schema.String, { exact: true }),
  value: Schema.optionalWith(FiniteNumber, { exact: true }),
  unit: Schema.optionalWith(Schema.String, { exact: true }),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export type ParameterPatch = typeof ParameterPatch.Type

/**
 * A decoded patch. Collections the patch does not touch are empty.
 *
 * @since 0.1.0
 * @category Models
 */
export class Patch extends Schema.Class<Patch>("Patch")({
  stocks: Schema.optionalWith(Schema.Array(StockPatch), { default: () => [] }),
  flows: Schema.optionalWith(Schema.Array(FlowPatch), { default: () => [] }),
  parameters: Schema.optionalWith(Schema.Array(ParameterPatch), { default: () => [] }),
}) {}

const PatchShape = Schema.Struct({
  stocks: Schema.optionalWith(Schema.Array(Schema.Unknown), { default: () => [] }),
  flows: Schema.optionalWith(Schema.Array(Schema.Unknown), { default: () => [] }),
  parameters: Schema.optionalWith(Schema.Array(Schema.Unknown), { default: () => [] }),
})

const FragmentId = Schema.Struct({ id: Schema.NonEmptyTrimmedString })

const decodeFragments = <A, I>(
  collection: PatchCollection,
  fragments: ReadonlyArray<unknown>,
  schema: Schema.Schema<A, I>,
): Either.Either<ReadonlyArray<A>, PatchError> =>
  Either.all(
    fragments.map((fragment, index) =>
      Either.flatMap(
        Either.mapLeft(
          Schema.decodeUnknownEither(FragmentId)(fragment),
          () =>
            new PatchError({
              reason: "missing-id",
              collection,
              detail: `Fragment #${index} has no id`,
            }),
        ),
        ({ id }) =>
          Either.mapLeft(
            Schema.decodeUnknownEither(schema)(fragment),
            (error) =>
              new PatchError({
                reason: "malformed-fragment",
                collection,
                entityId: id,
                detail: ParseResult.TreeFormatter.formatErrorSync(error),
              }),
          ),
      )
    ),
  )

/**
 * Decode an untrusted patch value.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const decodePatch = (input: unknown): Effect.Effect<Patch, PatchError> =>
  Effect.gen(function*() {
    const shape = yield* Schema.decodeUnknown(PatchShape)(input).pipe(
      Effect.mapError(
        (error) =>
          new PatchError({
            reason: "malformed-fragment",
            detail: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      ),
    )
    const stocks = yield* decodeFragments("stocks", shape.stocks, StockPatch)
    const flows = yield* decodeFragments("flows", shape.flows, FlowPatch)
    const parameters = yield* decodeFragments("parameters", shape.parameters, ParameterPatch)
    return new Patch({ stocks, flows, parameters })
  })

const missingField = (collection: PatchCollection, entityId: string, field: string): PatchError =>
  new PatchError({
    reason: "missing-required-field",
    collection,
    entityId,
    field,
    detail: `New entity "${entityId}" needs a "${field}"`,
  })

const construct = <A>(collection: PatchCollection, entityId: string, make: () => A): Either.Either<A, PatchError> =>
  Either.try({
    try: make,
    catch: (error) =>
      new PatchError({
        reason: "malformed-fragment",
        collection,
        entityId,
        detail: error instanceof Error ? error.message : String(error),
      }),
  })

interface Merger<E, F> {
  readonly update: (entity: E, fragment: F) => Either.Either<E, PatchError>
  readonly create: (fragment: F) => Either.Either<E, PatchError>
}

const mergeCollection = <E extends { readonly id: string }, F extends { readonly id: string }>(
  entities: ReadonlyArray<E>,
  fragments: ReadonlyArray<F>,
  merger: Merger<E, F>,
): Either.Either<ReadonlyArray<E>, PatchError> => {
  if (fragments.length === 0) {
    return Either.right(entities)
  }
  const result = [...entities]
  const positions = new Map<string, number>(result.map((entity, index) => [entity.id, index]))
  for (const fragment of fragments) {
    const position = positions.get(fragment.id)
    const existing = position === undefined ? undefined : result[position]
    const merged = existing === undefined ? merger.create(fragment) : merger.update(existing, fragment)
    if (Either.isLeft(merged)) {
      return Either.left(merged.left)
    }
    if (position === undefined) {
      positions.set(fragment.id, result.length)
      result.push(merged.right)
    } else {
      result[position] = merged.right
    }
  }
  return Either.right(result)
}

const stockMerger: Merger<Stock, StockPatch> = {
  update: (stock, { id, ...fields }) => construct("stocks", id, () => new Stock({ ...stock, ...fields })),
  create: ({ id, initial, name, ...fields }) =>
    initial === undefined
      ? Either.left(missingField("stocks", id, "initial"))
      : construct("stocks", id, () => new Stock({ ...fields, id, initial, name: name ?? id })),
}

const flowMerger: Merger<Flow, FlowPatch> = {
  update: (flow, { id, ...fields }) => construct("flows", id, () => new Flow({ ...flow, ...fields })),
  create: ({ id, rate, name, from, to, ...fields }) =>
    rate === undefined
      ? Either.left(missingField("flows", id, "rate"))
      : construct("flows", id, () =>
          new Flow({ ...fields, id, rate, name: name ?? id, from: from ?? null, to: to ?? null })),
}

const parameterMerger: Merger<Parameter, ParameterPatch> = {
  update: (parameter, { id, ...fields }) =>
    construct("parameters", id, () => new Parameter({ ...parameter, ...fields })),
  create: ({ id, value, name, ...fields }) =>
    value === undefined
      ? Either.left(missingField("parameters", id, "value"))
      : construct("parameters", id, () => new Parameter({ ...fields, id, value, name: name ?? id })),
}

/**
 * Merge a patch into a model, returning a new model. The input model is left
 * untouched.
 *
 * @since 0.1.0
 * @category Combinators
 * @example
 * ```typescript
 * const faster = yield* applyPatch(model, new Patch({
 *   parameters: [{ id: ParameterId.make("k"), value: 0.5 }],
 * }))
 * ```
 */
export const applyPatch = (model: ModelSchema, patch: Patch): Effect.Effect<ModelSchema, PatchError> =>
  Effect.gen(function*() {
    const stocks = yield* mergeCollection(model.stocks, patch.stocks, stockMerger)
    const flows = yield* mergeCollection(model.flows, patch.flows, flowMerger)
    const parameters = yield* mergeCollection(model.parameters, patch.parameters, parameterMerger)
    if (stocks === model.stocks && flows === model.flows && parameters === model.parameters) {
      return model
    }
    return new ModelSchema({ ...model, stocks, flows, parameters })
  })

/**
 * Remove a stock together with every flow that drains or fills it.
 *
 * @since 0.1.0
 * @category Combinators
 */
export const removeStock = (model: ModelSchema, stockId: string): ModelSchema =>
  new ModelSchema({
    ...model,
    stocks: model.stocks.filter((stock) => stock.id !== stockId),
    flows: model.flows.filter((flow) => flow.from !== stockId && flow.to !== stockId),
  })

/**
 * @since 0.1.0
 * @category Combinators
 */
export const removeFlow = (model: ModelSchema, flowId: string): ModelSchema =>
  new ModelSchema({
    ...model,
    flows: model.flows.filter((flow) => flow.id !== flowId),
  })
