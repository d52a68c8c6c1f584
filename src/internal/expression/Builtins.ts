import type { FieldValue, Numeric } from "../../Types.js"
import { det, eig, inv, transpose } from "../array/LinearAlgebra.js"
import { ArrayError, NdArray } from "../array/NdArray.js"
import { combine, describeType, flatten, mapNumeric, matmulValues, toNumeric } from "./Arithmetic.js"

type Builtin = (args: ReadonlyArray<FieldValue>) => FieldValue

const arity = (name: string, args: ReadonlyArray<FieldValue>, min: number, max = min): void => {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`
    throw new ArrayError({ operation: name, problem: `expects ${expected} arguments but received ${args.length}` })
  }
}

const numericArg = (name: string, args: ReadonlyArray<FieldValue>, index: number): Numeric =>
  toNumeric(args[index] ?? null, name)

const integerArg = (name: string, args: ReadonlyArray<FieldValue>, index: number): number => {
  const value = numericArg(name, args, index)
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ArrayError({ operation: name, problem: `argument ${index + 1} must be a non-negative integer` })
  }
  return value
}

export const MAX_ELEMENTS = 10_000_000

const checkedCount = (name: string, count: number): number => {
  if (count > MAX_ELEMENTS) {
    throw new ArrayError({ operation: name, problem: `${count} elements exceed the limit of ${MAX_ELEMENTS}` })
  }
  return count
}

const matrixArg = (name: string, args: ReadonlyArray<FieldValue>): NdArray => {
  const value = numericArg(name, args, 0)
  if (!(value instanceof NdArray)) {
    throw new ArrayError({ operation: name, problem: `expects a matrix, got ${describeType(args[0] ?? null)}` })
  }
  return value
}

const elementwise = (name: string, f: (x: number) => number): Builtin => (args) => {
  arity(name, args, 1)
  return mapNumeric(numericArg(name, args, 0), f)
}

const pairwise = (name: string, f: (x: number, y: number) => number): Builtin => (args) => {
  arity(name, args, 2)
  return combine(numericArg(name, args, 0), numericArg(name, args, 1), f, name)
}

const reduction = (name: string, f: (values: ReadonlyArray<number>) => number, allowEmpty = false): Builtin =>
  (args) => {
    const values = args.flatMap((_, i) => [...flatten(numericArg(name, args, i))])
    if (values.length === 0 && !allowEmpty) {
      throw new ArrayError({ operation: name, problem: "requires at least one value" })
    }
    return f(values)
  }

const filled = (name: string, fill: number): Builtin => (args) => {
  arity(name, args, 1, 2)
  const rows = integerArg(name, args, 0)
  if (args.length === 1) {
    return new Array<number>(checkedCount(name, rows)).fill(fill)
  }
  const cols = integerArg(name, args, 1)
  return new NdArray([rows, cols], new Array<number>(checkedCount(name, rows * cols)).fill(fill))
}

const roundTo = (x: number, digits: number): number => {
  const scale = 10 ** digits
  return Math.round(x * scale) / scale
}

export const BUILTIN_FUNCTIONS: Readonly<Record<string, Builtin>> = {
  abs: elementwise("abs", Math.abs),
  sqrt: elementwise("sqrt", Math.sqrt),
  exp: elementwise("exp", Math.exp),
  log10: elementwise("log10", Math.log10),
  log2: elementwise("log2", Math.log2),
  sin: elementwise("sin", Math.sin),
  cos: elementwise("cos", Math.cos),
  tan: elementwise("tan", Math.tan),
  asin: elementwise("asin", Math.asin),
  acos: elementwise("acos", Math.acos),
  atan: elementwise("atan", Math.atan),
  sinh: elementwise("sinh", Math.sinh),
  cosh: elementwise("cosh", Math.cosh),
  tanh: elementwise("tanh", Math.tanh),
  floor: elementwise("floor", Math.floor),
  ceil: elementwise("ceil", Math.ceil),
  trunc: elementwise("trunc", Math.trunc),
  sign: elementwise("sign", Math.sign),
  degrees: elementwise("degrees", (x) => (x * 180) / Math.PI),
  radians: elementwise("radians", (x) => (x * Math.PI) / 180),
  log: (args) => {
    arity("log", args, 1, 2)
    const x = numericArg("log", args, 0)
    return args.length === 1
      ? mapNumeric(x, Math.log)
      : combine(x, numericArg("log", args, 1), (v, base) => Math.log(v) / Math.log(base), "log")
  },
  atan2: pairwise("atan2", Math.atan2),
  hypot: pairwise("hypot", Math.hypot),
  pow: pairwise("pow", (x, y) => x ** y),
  fmod: pairwise("fmod", (x, y) => x % y),
  round: (args) => {
    arity("round", args, 1, 2)
    const digits = args.length === 2 ? integerArg("round", args, 1) : 0
    return mapNumeric(numericArg("round", args, 0), (x) => roundTo(x, digits))
  },
  min: reduction("min", (values) => values.reduce((acc, x) => Math.min(acc, x), Number.POSITIVE_INFINITY)),
  max: reduction("max", (values) => values.reduce((acc, x) => Math.max(acc, x), Number.NEGATIVE_INFINITY)),
  sum: reduction("sum", (values) => values.reduce((acc, x) => acc + x, 0), true),
  prod: reduction("prod", (values) => values.reduce((acc, x) => acc * x, 1), true),
  mean: reduction("mean", (values) => values.reduce((acc, x) => acc + x, 0) / values.length),
  zeros: filled("zeros", 0),
  ones: filled("ones", 1),
  eye: (args) => {
    arity("eye", args, 1)
    const n = integerArg("eye", args, 0)
    return new NdArray([n, n], Array.from({ length: checkedCount("eye", n * n) }, (_, k) => (k % (n + 1) === 0 ? 1 : 0)))
  },
  linspace: (args) => {
    arity("linspace", args, 3)
    const start = numericArg("linspace", args, 0)
    const stop = numericArg("linspace", args, 1)
    const count = integerArg("linspace", args, 2)
    if (typeof start !== "number" || typeof stop !== "number") {
      throw new ArrayError({ operation: "linspace", problem: "bounds must be numbers" })
    }
    if (count === 1) {
      return [start]
    }
    return Array.from({ length: checkedCount("linspace", count) }, (_, k) => start + ((stop - start) * k) / (count - 1))
  },
  array: (args) => {
    arity("array", args, 1)
    const value = numericArg("array", args, 0)
    if (typeof value === "number") {
      return new NdArray([1, 1], [value])
    }
    return value instanceof NdArray ? value.atLeast2d() : NdArray.row(value)
  },
  shape: (args) => {
    arity("shape", args, 1)
    const value = numericArg("shape", args, 0)
    if (typeof value === "number") {
      return []
    }
    return value instanceof NdArray ? [...value.shape] : [value.length]
  },
  numel: (args) => {
    arity("numel", args, 1)
    return flatten(numericArg("numel", args, 0)).length
  },
  transpose: (args) => {
    arity("transpose", args, 1)
    const value = numericArg("transpose", args, 0)
    return value instanceof NdArray ? transpose(value) : value
  },
  matmul: (args) => {
    arity("matmul", args, 2)
    return matmulValues(numericArg("matmul", args, 0), numericArg("matmul", args, 1))
  },
  dot: (args) => {
    arity("dot", args, 2)
    return matmulValues(numericArg("dot", args, 0), numericArg("dot", args, 1))
  },
  det: (args) => {
    arity("det", args, 1)
    return det(matrixArg("det", args))
  },
  inv: (args) => {
    arity("inv", args, 1)
    return inv(matrixArg("inv", args))
  },
  eig: (args) => {
    arity("eig", args, 1)
    return [...eig(matrixArg("eig", args)).values]
  },
  eigvec: (args) => {
    arity("eigvec", args, 1)
    return eig(matrixArg("eigvec", args)).vectors
  },
}

export const BUILTIN_CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
  inf: Number.POSITIVE_INFINITY,
  nan: Number.NaN,
}

export const isBuiltinName = (name: string): boolean =>
  name === "None" || Object.hasOwn(BUILTIN_FUNCTIONS, name) || Object.hasOwn(BUILTIN_CONSTANTS, name)
