/**
 * Array arithmetic shared by the integrators. Every function allocates its
 * result and leaves its inputs untouched; vectors are aligned to stock order.
 */

export type Vector = ReadonlyArray<number>

/**
 * `y + rates * dt`, treating missing rates as zero.
 */
export const pureEulerStep = (y: Vector, rates: Vector, dt: number): Array<number> =>
  y.map((value, index) => value + (rates[index] ?? 0) * dt)

/**
 * Classical RK4 weighting `(k1 + 2 k2 + 2 k3 + k4) / 6`.
 */
export const blendRK4Rates = (k1: Vector, k2: Vector, k3: Vector, k4: Vector): Array<number> =>
  k1.map((rate, index) => (rate + 2 * (k2[index] ?? 0) + 2 * (k3[index] ?? 0) + (k4[index] ?? 0)) / 6)

/**
 * `base + dt * Σ coefficients[j] * rates[j]`. Stage rates without a matching
 * coefficient are ignored.
 */
export const combineRates = (
  base: Vector,
  rates: ReadonlyArray<Vector>,
  coefficients: ReadonlyArray<number>,
  dt: number,
): Array<number> =>
  base.map((value, index) => {
    let result = value
    for (let stage = 0; stage < rates.length; stage += 1) {
      const coefficient = coefficients[stage]
      if (coefficient === undefined || coefficient === 0) {
        continue
      }
      result += dt * coefficient * (rates[stage]?.[index] ?? 0)
    }
    return result
  })

export const allFinite = (values: Vector): boolean => values.every(Number.isFinite)

/**
 * RMS of `|high - low| / (atol + rtol * max(|base|, |high|))` over all stocks.
 * A value at or below 1 means the step meets the tolerances.
 */
export const adaptiveErrorNorm = (
  base: Vector,
  high: Vector,
  low: Vector,
  absoluteTolerance: number,
  relativeTolerance: number,
): number => {
  if (high.length === 0) {
    return 0
  }
  let sum = 0
  for (let index = 0; index < high.length; index += 1) {
    const highValue = high[index] ?? 0
    const lowValue = low[index] ?? highValue
    const baseValue = base[index] ?? highValue
    const scale = absoluteTolerance + relativeTolerance * Math.max(Math.abs(baseValue), Math.abs(highValue))
    const ratio = scale === 0 ? 0 : Math.abs(highValue - lowValue) / scale
    sum += ratio * ratio
  }
  return Math.sqrt(sum / high.length)
}

export const clampNumber = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)

/**
 * `count` evenly spaced points from 0 to `end`, both included. The last point
 * is exactly `end`.
 */
export const regularGrid = (end: number, count: number): Array<number> =>
  Array.from({ length: count }, (_, index) => (index === count - 1 ? end : (end * index) / (count - 1)))
