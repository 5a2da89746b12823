/**
 * The complete set of functions a rate expression may call. Anything else is
 * rejected by the parser, so the evaluator never dispatches on user text.
 */

export interface BuiltinFunction {
  readonly minArity: number
  readonly maxArity: number
  readonly apply: (args: ReadonlyArray<number>) => number
}

const unary = (fn: (x: number) => number): BuiltinFunction => ({
  minArity: 1,
  maxArity: 1,
  apply: (args) => fn(args[0] ?? Number.NaN),
})

const variadic = (fn: (...values: Array<number>) => number): BuiltinFunction => ({
  minArity: 1,
  maxArity: Number.POSITIVE_INFINITY,
  apply: (args) => fn(...args),
})

const BUILTIN_FUNCTIONS: ReadonlyMap<string, BuiltinFunction> = new Map([
  ["abs", unary(Math.abs)],
  ["ceil", unary(Math.ceil)],
  ["cos", unary(Math.cos)],
  ["exp", unary(Math.exp)],
  ["floor", unary(Math.floor)],
  ["log", unary(Math.log)],
  ["log10", unary(Math.log10)],
  ["round", unary(Math.round)],
  ["sign", unary(Math.sign)],
  ["sin", unary(Math.sin)],
  ["sqrt", unary(Math.sqrt)],
  ["tan", unary(Math.tan)],
  ["max", variadic(Math.max)],
  ["min", variadic(Math.min)],
  [
    "pow",
    {
      minArity: 2,
      maxArity: 2,
      apply: ([base = Number.NaN, exponent = Number.NaN]) => Math.pow(base, exponent),
    },
  ],
  [
    "clip",
    {
      minArity: 3,
      maxArity: 3,
      apply: ([value = Number.NaN, lower = Number.NaN, upper = Number.NaN]) =>
        Math.min(Math.max(value, lower), upper),
    },
  ],
])

export const lookupFunction = (name: string): BuiltinFunction | undefined =>
  BUILTIN_FUNCTIONS.get(name.toLowerCase())

export const allowedFunctionNames = (): ReadonlyArray<string> => Array.from(BUILTIN_FUNCTIONS.keys())
