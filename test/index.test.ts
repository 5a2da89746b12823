import { describe, it, expect } from "vitest"
import * as Stockflow from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    for (
      const name of [
        "evaluateExpression",
        "decodeModel",
        "encodeModel",
        "applyPatch",
        "buildDerivative",
        "simulate",
        "simulateStream",
        "scanDivergence",
        "runBatch",
        "SimulationEngine",
        "SimulationConfig",
        "ModelCatalog",
        "SchemaError",
        "SimulationError",
        "StockId",
      ]
    ) {
      expect(Stockflow).toHaveProperty(name)
    }
  })
})
