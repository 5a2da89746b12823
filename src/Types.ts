/**
 * Type Foundations & Branded IDs
 *
 * Entity ids are user-authored strings such as `"S0"` or `"k_rd"`; rate
 * expressions refer to stocks and parameters by id. Brands keep a StockId from
 * being passed where a FlowId is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded identifier for Stock entities
 *
 * @since 0.1.0
 * @category IDs
 */
export const StockId = Schema.NonEmptyTrimmedString.pipe(Schema.brand("StockId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type StockId = typeof StockId.Type

/**
 * Branded identifier for Flow entities
 *
 * @since 0.1.0
 * @category IDs
 */
export const FlowId = Schema.NonEmptyTrimmedString.pipe(Schema.brand("FlowId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type FlowId = typeof FlowId.Type

/**
 * Branded identifier for Parameter entities
 *
 * @since 0.1.0
 * @category IDs
 */
export const ParameterId = Schema.NonEmptyTrimmedString.pipe(Schema.brand("ParameterId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type ParameterId = typeof ParameterId.Type

/**
 * Branded identifier for feedback loop annotations
 *
 * @since 0.1.0
 * @category IDs
 */
export const LoopId = Schema.NonEmptyTrimmedString.pipe(Schema.brand("LoopId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type LoopId = typeof LoopId.Type
