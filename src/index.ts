/**
 * @since 0.1.0
 */

export * from "./Batch.js"
export * from "./Catalog.js"
export * from "./Config.js"
export * from "./Divergence.js"
export * from "./Engine.js"
export * from "./Errors.js"
export * from "./Expressions.js"
export * from "./Model.js"
export * from "./Ode.js"
export * from "./Patch.js"
export * from "./Simulation.js"
export * from "./Solver.js"
export * from "./Types.js"
