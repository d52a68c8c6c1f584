import { Data } from "effect"

export class ArrayError extends Data.TaggedError("ArrayError")<{
  readonly operation: string
  readonly problem: string
}> {
  override get message(): string {
    return `${this.operation}: ${this.problem}`
  }
}

export type NestedNumbers = number | ReadonlyArray<NestedNumbers>

export const MAX_RANK = 4

const product = (shape: ReadonlyArray<number>): number => shape.reduce((acc, n) => acc * n, 1)

export const stridesOf = (shape: ReadonlyArray<number>): ReadonlyArray<number> => {
  const strides = new Array<number>(shape.length).fill(1)
  for (let axis = shape.length - 2; axis >= 0; axis -= 1) {
    strides[axis] = (strides[axis + 1] ?? 1) * (shape[axis + 1] ?? 1)
  }
  return strides
}

/**
 * Dense row-major numeric array of rank 1 to 4. Instances are immutable; every
 * operation returns a new array.
 */
export class NdArray {
  readonly shape: ReadonlyArray<number>
  readonly data: ReadonlyArray<number>

  constructor(shape: ReadonlyArray<number>, data: ReadonlyArray<number>) {
    if (shape.length === 0 || shape.length > MAX_RANK) {
      throw new ArrayError({ operation: "array", problem: `rank ${shape.length} is outside 1..${MAX_RANK}` })
    }
    if (product(shape) !== data.length) {
      throw new ArrayError({
        operation: "array",
        problem: `shape [${shape.join(",")}] does not hold ${data.length} elements`,
      })
    }
    this.shape = [...shape]
    this.data = [...data]
  }

  get rank(): number {
    return this.shape.length
  }

  get size(): number {
    return this.data.length
  }

  static row(values: ReadonlyArray<number>): NdArray {
    return new NdArray([1, values.length], values)
  }

  static fromNested(value: NestedNumbers): NdArray {
    if (typeof value === "number") {
      return new NdArray([1, 1], [value])
    }
    const shape: Array<number> = []
    let level: NestedNumbers = value
    while (typeof level !== "number") {
      shape.push(level.length)
      const first: NestedNumbers | undefined = level[0]
      if (first === undefined) {
        break
      }
      level = first
    }
    const data: Array<number> = []
    const walk = (node: NestedNumbers, depth: number): void => {
      if (typeof node === "number") {
        if (depth !== shape.length) {
          throw new ArrayError({ operation: "array", problem: "nested lists are not rectangular" })
        }
        data.push(node)
        return
      }
      if (node.length !== shape[depth]) {
        throw new ArrayError({ operation: "array", problem: "nested lists are not rectangular" })
      }
      for (const child of node) {
        walk(child, depth + 1)
      }
    }
    walk(value, 0)
    return new NdArray(shape, data)
  }

  /** Promotes to at least two dimensions; a vector becomes a single row. */
  atLeast2d(): NdArray {
    return this.rank >= 2 ? this : new NdArray([1, this.size], this.data)
  }

  get(indices: ReadonlyArray<number>): number {
    const strides = stridesOf(this.shape)
    let offset = 0
    for (let axis = 0; axis < indices.length; axis += 1) {
      offset += (indices[axis] ?? 0) * (strides[axis] ?? 0)
    }
    const value = this.data[offset]
    if (value === undefined) {
      throw new ArrayError({ operation: "index", problem: `index [${indices.join(",")}] is out of bounds` })
    }
    return value
  }

  map(f: (value: number) => number): NdArray {
    return new NdArray(this.shape, this.data.map(f))
  }

  toNested(): NestedNumbers {
    const build = (axis: number, offset: number): NestedNumbers => {
      const extent = this.shape[axis] ?? 0
      if (axis === this.rank - 1) {
        return this.data.slice(offset, offset + extent)
      }
      const stride = product(this.shape.slice(axis + 1))
      return Array.from({ length: extent }, (_, i) => build(axis + 1, offset + i * stride))
    }
    return build(0, 0)
  }

  equals(other: NdArray): boolean {
    return (
      this.shape.length === other.shape.length &&
      this.shape.every((n, i) => n === other.shape[i]) &&
      this.data.every((v, i) => Object.is(v, other.data[i]) || v === other.data[i])
    )
  }
}

export const isNestedNumbers = (value: unknown): value is NestedNumbers => {
  if (typeof value === "number") {
    return true
  }
  return Array.isArray(value) && value.every(isNestedNumbers)
}

/**
 * Element-wise combination with trailing-axis broadcasting: axes are aligned
 * from the right and each pair must match or contain a 1.
 */
export const broadcast = (a: NdArray, b: NdArray, f: (x: number, y: number) => number): NdArray => {
  const rank = Math.max(a.rank, b.rank)
  const padA = [...new Array<number>(rank - a.rank).fill(1), ...a.shape]
  const padB = [...new Array<number>(rank - b.rank).fill(1), ...b.shape]
  const shape: Array<number> = []
  for (let axis = 0; axis < rank; axis += 1) {
    const x = padA[axis] ?? 1
    const y = padB[axis] ?? 1
    if (x !== y && x !== 1 && y !== 1) {
      throw new ArrayError({
        operation: "broadcast",
        problem: `shapes [${a.shape.join(",")}] and [${b.shape.join(",")}] are not compatible`,
      })
    }
    shape.push(Math.max(x, y))
  }
  const stridesA = stridesOf(padA).map((s, axis) => ((padA[axis] ?? 1) === 1 ? 0 : s))
  const stridesB = stridesOf(padB).map((s, axis) => ((padB[axis] ?? 1) === 1 ? 0 : s))
  const size = product(shape)
  const data = new Array<number>(size)
  const index = new Array<number>(rank).fill(0)
  for (let flat = 0; flat < size; flat += 1) {
    let offsetA = 0
    let offsetB = 0
    for (let axis = 0; axis < rank; axis += 1) {
      offsetA += (index[axis] ?? 0) * (stridesA[axis] ?? 0)
      offsetB += (index[axis] ?? 0) * (stridesB[axis] ?? 0)
    }
    data[flat] = f(a.data[offsetA] ?? Number.NaN, b.data[offsetB] ?? Number.NaN)
    for (let axis = rank - 1; axis >= 0; axis -= 1) {
      const next = (index[axis] ?? 0) + 1
      if (next < (shape[axis] ?? 1)) {
        index[axis] = next
        break
      }
      index[axis] = 0
    }
  }
  return new NdArray(shape, data)
}
