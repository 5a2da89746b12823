import { describe, expect, it } from "@effect/vitest"
import { Effect, HashMap, Layer, Logger, Option } from "effect"
import { SimulationConfig, type SimulationSettings } from "../src/Config.js"
import { SimulationEngine } from "../src/Engine.js"
import { decayRecord, runawayRecord, transferRecord } from "./fixtures.js"

interface LogEntry {
  readonly level: string
  readonly message: string
  readonly variant: string | undefined
}

const engineLayer = (overrides: Partial<SimulationSettings> = {}) =>
  SimulationEngine.layer.pipe(Layer.provide(SimulationConfig.make(overrides)))

const captureLogs = (entries: Array<LogEntry>) =>
  Logger.replace(
    Logger.defaultLogger,
    Logger.make(({ annotations, logLevel, message }) => {
      entries.push({
        level: logLevel.label,
        message: Array.isArray(message) ? message.map(String).join(" ") : String(message),
        variant: Option.getOrUndefined(HashMap.get(annotations, "variant").pipe(Option.map(String))),
      })
    }),
  )

describe("SimulationEngine", () => {
  it.effect("simulates a serialized model into wire form", () =>
    Effect.gen(function*() {
      const engine = yield* SimulationEngine
      const wire = yield* engine.simulate(decayRecord, 10)

      expect(wire.t).toHaveLength(200)
      expect(wire.stock_ids).toStrictEqual(["S0"])
      expect(wire.Y[0]?.[199]).toBeCloseTo(36.79, 1)
      expect(wire.warnings).toStrictEqual([])
    }).pipe(Effect.provide(engineLayer())))

  it.effect("uses the configured sample count and solver", () =>
    Effect.gen(function*() {
      const engine = yield* SimulationEngine
      const wire = yield* engine.simulate(decayRecord, 10, [])

      expect(wire.t).toHaveLength(11)
      expect(wire.t[1]).toBe(1)
      // one Euler step of 100 * (1 - 0.1)
      expect(wire.Y[0]?.[1]).toBeCloseTo(90, 12)
    }).pipe(Effect.provide(engineLayer({ sampleCount: 11, solver: "euler" }))))

  it.effect("passes excluded mechanisms through", () =>
    Effect.gen(function*() {
      const engine = yield* SimulationEngine
      const wire = yield* engine.simulate(transferRecord, 10, ["supply"])
      const total = (wire.Y[0]?.[199] ?? 0) + (wire.Y[1]?.[199] ?? 0)
      expect(total).toBeCloseTo(60, 9)
    }).pipe(Effect.provide(engineLayer())))

  it.effect("rejects a schema that does not decode", () =>
    Effect.gen(function*() {
      const engine = yield* SimulationEngine
      const error = yield* Effect.flip(engine.simulate({ stocks: "S0" }, 10))
      expect(error._tag).toBe("SchemaError")
      expect(error.reason).toBe("malformed-schema")
    }).pipe(Effect.provide(engineLayer())))

  it.effect("logs divergence warnings", () => {
    const entries: Array<LogEntry> = []
    return Effect.gen(function*() {
      const engine = yield* SimulationEngine
      const wire = yield* engine.simulate(runawayRecord, 10)

      const warnings = entries.filter((entry) => entry.level === "WARN")
      expect(warnings.map((entry) => entry.message)).toStrictEqual(wire.warnings)
      expect(wire.warnings).toHaveLength(1)
    }).pipe(Effect.provide(Layer.merge(engineLayer(), captureLogs(entries))))
  })

  describe("simulateBatch", () => {
    it.effect("returns one labelled run per variant", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const runs = yield* engine.simulateBatch(transferRecord, 5, [
          { label: "low", params: { k: 0.1 } },
          { label: "high", params: { k: 0.4 } },
        ])

        expect(runs.map((run) => run.label)).toStrictEqual(["low", "high"])
        expect(runs[0]?.stock_ids).toStrictEqual(["A", "B"])
        expect(runs[1]?.t).toHaveLength(200)
      }).pipe(Effect.provide(engineLayer({ batchConcurrency: 2 }))))

    it.effect("rejects variants that do not decode", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const error = yield* Effect.flip(engine.simulateBatch(transferRecord, 5, [{ params: { k: 1 } }]))

        expect(error._tag).toBe("BatchError")
        if (error._tag === "BatchError") {
          expect(error.reason).toBe("malformed-variants")
          expect(error.message.startsWith("Batch variants could not be read: ")).toBe(true)
        }
      }).pipe(Effect.provide(engineLayer())))

    it.effect("enforces the configured variant limit", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const error = yield* Effect.flip(engine.simulateBatch(transferRecord, 5, [{ label: "a" }, { label: "b" }]))

        expect(error._tag).toBe("BatchError")
        if (error._tag === "BatchError") {
          expect(error.reason).toBe("too-many-variants")
          expect(error.limit).toBe(1)
        }
      }).pipe(Effect.provide(engineLayer({ maxBatchVariants: 1 }))))

    it.effect("annotates warnings with their variant", () => {
      const entries: Array<LogEntry> = []
      return Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const runs = yield* engine.simulateBatch(runawayRecord, 10, [
          { label: "still", params: { k: 0 } },
          { label: "hot" },
        ])

        expect(runs[0]?.warnings).toStrictEqual([])
        expect(runs[1]?.warnings).toHaveLength(1)
        const warnings = entries.filter((entry) => entry.level === "WARN")
        expect(warnings.map((entry) => entry.variant)).toStrictEqual(["hot"])
      }).pipe(Effect.provide(Layer.merge(engineLayer(), captureLogs(entries))))
    })
  })

  describe("applyPatch", () => {
    it.effect("returns the patched schema in wire form", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const wire = yield* engine.applyPatch(decayRecord, { parameters: [{ id: "k", value: 0.5 }] })

        expect(wire.parameters).toEqual([{ id: "k", name: "Rate", value: 0.5 }])
        expect(wire.flows?.[0]?.rate).toBe("k * S0")
      }).pipe(Effect.provide(engineLayer())))

    it.effect("rejects a patch that makes ids collide", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const error = yield* Effect.flip(engine.applyPatch(decayRecord, { parameters: [{ id: "S0", value: 1 }] }))

        expect(error._tag).toBe("SchemaError")
        if (error._tag === "SchemaError") {
          expect(error.reason).toBe("duplicate-id")
        }
      }).pipe(Effect.provide(engineLayer())))

    it.effect("rejects a fragment without id", () =>
      Effect.gen(function*() {
        const engine = yield* SimulationEngine
        const error = yield* Effect.flip(engine.applyPatch(decayRecord, { stocks: [{ initial: 1 }] }))
        expect(error._tag).toBe("PatchError")
      }).pipe(Effect.provide(engineLayer())))
  })
})
