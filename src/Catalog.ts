/**
 * Read-only registry of ready-made models, loaded once when its layer is
 * built. The simulation core never consults it.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { Context, Effect, Layer, ParseResult, Schema } from "effect"
import { CatalogError } from "./Errors.js"
import { decodeModel, validateModel, type ModelSchema } from "./Model.js"

/**
 * @since 0.1.0
 * @category Models
 */
export class CatalogEntry extends Schema.Class<CatalogEntry>("CatalogEntry")({
  id: Schema.NonEmptyTrimmedString,
  name: Schema.String,
  description: Schema.optionalWith(Schema.String, { default: () => "" }),
}) {}

const CatalogFile = Schema.parseJson(
  Schema.Struct({
    models: Schema.Array(
      Schema.Struct({
        id: Schema.NonEmptyTrimmedString,
        name: Schema.String,
        description: Schema.optionalWith(Schema.String, { default: () => "" }),
        schema: Schema.Unknown,
      }),
    ),
  }),
)

/**
 * @category Services
 * @since 0.1.0
 */
export interface ModelCatalogService {
  readonly list: () => ReadonlyArray<CatalogEntry>
  readonly get: (id: string) => Effect.Effect<ModelSchema, CatalogError>
}

const malformed = (detail: string) => new CatalogError({ reason: "malformed-catalog", detail })

/**
 * Build a catalog from the text of a catalog file.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const parseCatalog = (text: string): Effect.Effect<ModelCatalogService, CatalogError> =>
  Effect.gen(function*() {
    const file = yield* Schema.decodeUnknown(CatalogFile)(text).pipe(
      Effect.mapError((error) => malformed(ParseResult.TreeFormatter.formatErrorSync(error))),
    )

    const entries: Array<CatalogEntry> = []
    const models = new Map<string, ModelSchema>()
    for (const { id, name, description, schema } of file.models) {
      if (models.has(id)) {
        return yield* Effect.fail(malformed(`Model id "${id}" appears more than once`))
      }
      const model = yield* decodeModel(schema).pipe(
        Effect.mapError((error) => malformed(`Model "${id}": ${error.message}`)),
      )
      const issues = validateModel(model)
      if (issues.length > 0) {
        yield* Effect.logWarning("Catalog model has consistency issues").pipe(
          Effect.annotateLogs({ model: id, issues: issues.join("; ") }),
        )
      }
      entries.push(new CatalogEntry({ id, name, description }))
      models.set(id, model)
    }

    return {
      list: () => entries,
      get: (id) => {
        const model = models.get(id)
        return model === undefined
          ? Effect.fail(new CatalogError({ reason: "not-found", modelId: id, detail: `No model with id "${id}"` }))
          : Effect.succeed(model)
      },
    }
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class ModelCatalog extends Context.Tag("stockflow/ModelCatalog")<ModelCatalog, ModelCatalogService>() {
  static fromFile(path: string | URL) {
    return Layer.effect(
      this,
      Effect.try({
        try: () => readFileSync(path, "utf8"),
        catch: (error) => malformed(`Cannot read ${String(path)}: ${error instanceof Error ? error.message : String(error)}`),
      }).pipe(Effect.flatMap(parseCatalog)),
    )
  }

  /** The catalog bundled with the package. */
  static readonly layer = ModelCatalog.fromFile(new URL("../data/catalog.json", import.meta.url))
}
