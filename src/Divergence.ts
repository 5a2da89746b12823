/**
 * Post-integration divergence scan.
 *
 * A stock diverges at its first sample that is NaN, infinite, or larger in
 * magnitude than the threshold. Each diverging stock yields exactly one
 * warning; the series itself is never altered.
 *
 * @since 0.1.0
 */

/**
 * Magnitude above which a finite value is reported as runaway.
 *
 * @since 0.1.0
 * @category Constants
 */
export const DEFAULT_DIVERGENCE_THRESHOLD = 1e10

/**
 * @since 0.1.0
 * @category Models
 */
export type DivergenceKind = "nan" | "infinite" | "threshold"

/**
 * @since 0.1.0
 * @category Models
 */
export interface DivergenceFinding {
  readonly stockId: string
  readonly kind: DivergenceKind
  /** Time of the earliest offending sample. */
  readonly time: number
  readonly value: number
}

const classify = (value: number, threshold: number): DivergenceKind | undefined => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return "infinite"
  }
  return Math.abs(value) > threshold ? "threshold" : undefined
}

/**
 * Earliest offending sample of every diverging stock, in stock order.
 *
 * @since 0.1.0
 * @category Scanning
 */
export const findDivergence = (
  stockIds: ReadonlyArray<string>,
  time: ReadonlyArray<number>,
  values: ReadonlyArray<ReadonlyArray<number>>,
  threshold: number = DEFAULT_DIVERGENCE_THRESHOLD,
): ReadonlyArray<DivergenceFinding> => {
  const findings: Array<DivergenceFinding> = []
  stockIds.forEach((stockId, row) => {
    const series = values[row] ?? []
    const sample = series.findIndex((value) => classify(value, threshold) !== undefined)
    const value = series[sample]
    if (sample < 0 || value === undefined) {
      return
    }
    const kind = classify(value, threshold)
    if (kind !== undefined) {
      findings.push({ stockId, kind, time: time[sample] ?? Number.NaN, value })
    }
  })
  return findings
}

/**
 * Human-readable form of a finding, e.g. `Stock "S0" exceeded 1e+10 at t≈0.10`.
 *
 * @since 0.1.0
 * @category Formatting
 */
export const formatFinding = (finding: DivergenceFinding, threshold: number = DEFAULT_DIVERGENCE_THRESHOLD): string => {
  const at = `at t≈${finding.time.toFixed(2)}`
  switch (finding.kind) {
    case "nan":
      return `Stock "${finding.stockId}" diverged (NaN) ${at}`
    case "infinite":
      return `Stock "${finding.stockId}" diverged (${finding.value > 0 ? "Infinity" : "-Infinity"}) ${at}`
    case "threshold":
      return `Stock "${finding.stockId}" exceeded ${threshold.toExponential()} ${at}`
  }
}

/**
 * Warning strings for every diverging stock. Empty when nothing diverged.
 *
 * @since 0.1.0
 * @category Scanning
 */
export const scanDivergence = (
  stockIds: ReadonlyArray<string>,
  time: ReadonlyArray<number>,
  values: ReadonlyArray<ReadonlyArray<number>>,
  threshold: number = DEFAULT_DIVERGENCE_THRESHOLD,
): ReadonlyArray<string> =>
  findDivergence(stockIds, time, values, threshold).map((finding) => formatFinding(finding, threshold))
