import { Effect } from "effect"
import { decodeModel, type ModelSchema } from "../src/Model.js"

/**
 * Single stock draining at `k * S0`; S0(t) = 100 e^(-k t).
 */
export const decayRecord = {
  stocks: [{ id: "S0", name: "Stock", initial: 100 }],
  flows: [{ id: "f1", name: "Outflow", from: "S0", to: null, rate: "k * S0" }],
  parameters: [{ id: "k", name: "Rate", value: 0.1 }],
}

/**
 * Closed SIR epidemic; total population stays at N.
 */
export const sirRecord = {
  stocks: [
    { id: "S", name: "Susceptible", initial: 990 },
    { id: "I", name: "Infected", initial: 10 },
    { id: "R", name: "Recovered", initial: 0 },
  ],
  flows: [
    { id: "infection", from: "S", to: "I", rate: "beta * S * I / N" },
    { id: "recovery", from: "I", to: "R", rate: "gamma * I" },
  ],
  parameters: [
    { id: "N", value: 1000 },
    { id: "beta", value: 0.3 },
    { id: "gamma", value: 0.1 },
  ],
}

/**
 * Self-reinforcing inflow S0' = k S0^2 with S0(0) = 1000, which reaches
 * infinity at t = 1 / (k * 1000) = 0.1.
 */
export const runawayRecord = {
  stocks: [{ id: "S0", name: "Runaway", initial: 1000 }],
  flows: [{ id: "f1", from: null, to: "S0", rate: "k * S0 * S0" }],
  parameters: [{ id: "k", value: 0.01 }],
}

/**
 * Two stocks exchanging quantity, plus a tagged external inflow.
 */
export const transferRecord = {
  stocks: [
    { id: "A", initial: 50 },
    { id: "B", initial: 10 },
  ],
  flows: [
    { id: "move", from: "A", to: "B", rate: "k * A" },
    { id: "supply", from: null, to: "A", rate: "inflow", mechanism: "supply" },
  ],
  parameters: [
    { id: "k", value: 0.2 },
    { id: "inflow", value: 3 },
  ],
}

export const decodeFixture = (record: unknown): Effect.Effect<ModelSchema, never> =>
  decodeModel(record).pipe(Effect.orDie)
