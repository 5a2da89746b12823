import { describe, expect, it } from "@effect/vitest"
import { Effect, Schema } from "effect"
import { applyVariant, BatchRun, BatchVariant, encodeRun, runBatch } from "../src/Batch.js"
import { BatchError } from "../src/Errors.js"
import { applyPatch, decodePatch } from "../src/Patch.js"
import { simulate } from "../src/Simulation.js"
import { decodeFixture, transferRecord } from "./fixtures.js"

const variant = (label: string, params: Record<string, number> = {}) => new BatchVariant({ label, params })

describe("BatchVariant", () => {
  it("defaults params to an empty record", () => {
    expect(Schema.decodeUnknownSync(BatchVariant)({ label: "base" }).params).toStrictEqual({})
  })

  it("rejects a non-finite override", () => {
    expect(() => Schema.decodeUnknownSync(BatchVariant)({ label: "x", params: { k: Number.NaN } })).toThrow()
  })
})

describe("runBatch", () => {
  it.effect("gives each variant the result of a separate run", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const runs = yield* runBatch(model, {
        horizon: 10,
        variants: [variant("slow", { k: 0.1 }), variant("fast", { k: 0.5 })],
      })

      const patched = yield* applyPatch(model, yield* decodePatch({ parameters: [{ id: "k", value: 0.5 }] }))
      const separate = yield* simulate(patched, { horizon: 10 })

      expect(runs.map((run) => run.label)).toStrictEqual(["slow", "fast"])
      expect(runs[1]).toBeInstanceOf(BatchRun)
      expect(runs[1]?.values).toStrictEqual(separate.values)
      expect(runs[1]?.time).toStrictEqual(separate.time)
      expect(model.parameters[0]?.value).toBe(0.2)
    }))

  it.effect("keeps variant order when running concurrently", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const labels = ["a", "b", "c", "d", "e"]
      const runs = yield* runBatch(model, {
        horizon: 5,
        variants: labels.map((label, index) => variant(label, { k: 0.1 * (index + 1) })),
        concurrency: "unbounded",
      })
      const sequential = yield* runBatch(model, {
        horizon: 5,
        variants: labels.map((label, index) => variant(label, { k: 0.1 * (index + 1) })),
      })

      expect(runs.map((run) => run.label)).toStrictEqual(labels)
      expect(runs.map((run) => run.values)).toStrictEqual(sequential.map((run) => run.values))
    }))

  it.effect("runs the unchanged model for a variant without overrides", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const [run] = yield* runBatch(model, { horizon: 4, variants: [variant("base")] })
      const plain = yield* simulate(model, { horizon: 4 })
      expect(run?.values).toStrictEqual(plain.values)
    }))

  it.effect("appends an override for an unknown parameter", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const patched = yield* applyVariant(model, variant("extra", { boost: 2 }))
      expect(patched.parameters.map((parameter) => parameter.id)).toStrictEqual(["k", "inflow", "boost"])
      expect(patched.parameters[2]?.value).toBe(2)
    }))

  it.effect("rejects an override that collides with a stock id", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const error = yield* Effect.flip(runBatch(model, { horizon: 4, variants: [variant("clash", { A: 1 })] }))
      expect(error._tag).toBe("SchemaError")
      if (error._tag === "SchemaError") {
        expect(error.reason).toBe("duplicate-id")
        expect(error.entityId).toBe("A")
      }
    }))

  it.effect("rejects repeated labels", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const error = yield* Effect.flip(runBatch(model, {
        horizon: 4,
        variants: [variant("a"), variant("b"), variant("a")],
      }))

      expect(error).toBeInstanceOf(BatchError)
      if (error._tag === "BatchError") {
        expect(error.reason).toBe("duplicate-label")
        expect(error.labels).toStrictEqual(["a"])
        expect(error.message).toBe("Batch variant labels must be unique; repeated: a")
      }
    }))

  it.effect("checks the variant limit before anything else", () =>
    Effect.gen(function*() {
      const broken = yield* decodeFixture({
        stocks: [{ id: "S0", initial: 1 }],
        flows: [{ id: "f1", from: "S0", rate: "missing * S0" }],
      })
      const error = yield* Effect.flip(runBatch(broken, {
        horizon: 4,
        variants: [variant("a"), variant("a")],
        maxVariants: 1,
      }))

      expect(error._tag).toBe("BatchError")
      if (error._tag === "BatchError") {
        expect(error.reason).toBe("too-many-variants")
        expect(error.message).toBe("Batch of 2 variants exceeds the limit of 1")
      }
    }))

  it.effect("validates labels before integrating", () =>
    Effect.gen(function*() {
      const broken = yield* decodeFixture({
        stocks: [{ id: "S0", initial: 1 }],
        flows: [{ id: "f1", from: "S0", rate: "missing * S0" }],
      })
      const error = yield* Effect.flip(runBatch(broken, { horizon: 4, variants: [variant("a"), variant("a")] }))
      expect(error._tag).toBe("BatchError")
    }))
})

describe("encodeRun", () => {
  it.effect("adds the label to the result wire keys", () =>
    Effect.gen(function*() {
      const model = yield* decodeFixture(transferRecord)
      const [run] = yield* runBatch(model, { horizon: 1, sampleCount: 2, variants: [variant("only")] })
      if (run === undefined) {
        return yield* Effect.die("expected one run")
      }
      const wire = encodeRun(run)

      expect(Object.keys(wire).sort()).toStrictEqual(["Y", "label", "stock_ids", "t", "warnings"])
      expect(wire.label).toBe("only")
      expect(wire.stock_ids).toStrictEqual(["A", "B"])
      expect(wire.t).toStrictEqual([0, 1])
    }))
})
