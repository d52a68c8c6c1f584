import { ArrayError, NdArray, stridesOf } from "./NdArray.js"

const JACOBI_TOLERANCE = 1e-12
const JACOBI_MAX_SWEEPS = 100
const SYMMETRY_TOLERANCE = 1e-9

type Matrix = Array<Array<number>>

const toMatrix = (a: NdArray, operation: string): Matrix => {
  if (a.rank !== 2) {
    throw new ArrayError({ operation, problem: `expected a matrix, got rank ${a.rank}` })
  }
  const [rows = 0, cols = 0] = a.shape
  return Array.from({ length: rows }, (_, i) => a.data.slice(i * cols, (i + 1) * cols))
}

const fromMatrix = (m: Matrix): NdArray => new NdArray([m.length, m[0]?.length ?? 0], m.flat())

const requireSquare = (m: Matrix, operation: string): number => {
  const n = m.length
  if (m.some((row) => row.length !== n)) {
    throw new ArrayError({ operation, problem: "matrix must be square" })
  }
  return n
}

/** Reverses all axes; for matrices this is the usual transpose. */
export const transpose = (a: NdArray): NdArray => {
  const shape = [...a.shape].reverse()
  const sourceStrides = stridesOf(a.shape)
  const targetStrides = stridesOf(shape)
  const data = new Array<number>(a.size)
  for (let flat = 0; flat < a.size; flat += 1) {
    let remainder = flat
    let sourceOffset = 0
    for (let axis = 0; axis < shape.length; axis += 1) {
      const stride = targetStrides[axis] ?? 1
      const coordinate = Math.floor(remainder / stride)
      remainder -= coordinate * stride
      sourceOffset += coordinate * (sourceStrides[a.rank - 1 - axis] ?? 0)
    }
    data[flat] = a.data[sourceOffset] ?? Number.NaN
  }
  return new NdArray(shape, data)
}

export const matmul = (a: NdArray, b: NdArray): NdArray => {
  const left = toMatrix(a, "matmul")
  const right = toMatrix(b, "matmul")
  const inner = left[0]?.length ?? 0
  if (inner !== right.length) {
    throw new ArrayError({
      operation: "matmul",
      problem: `inner dimensions ${inner} and ${right.length} differ`,
    })
  }
  const cols = right[0]?.length ?? 0
  return fromMatrix(
    left.map((row) =>
      Array.from({ length: cols }, (_, j) => row.reduce((acc, x, k) => acc + x * (right[k]?.[j] ?? 0), 0)),
    ),
  )
}

const decompose = (m: Matrix, operation: string): { lu: Matrix; pivots: Array<number>; sign: number } => {
  const n = requireSquare(m, operation)
  const lu = m.map((row) => [...row])
  const pivots = Array.from({ length: n }, (_, i) => i)
  let sign = 1
  for (let k = 0; k < n; k += 1) {
    let best = k
    for (let i = k + 1; i < n; i += 1) {
      if (Math.abs(lu[i]?.[k] ?? 0) > Math.abs(lu[best]?.[k] ?? 0)) {
        best = i
      }
    }
    if (best !== k) {
      const swap = lu[k] ?? []
      lu[k] = lu[best] ?? []
      lu[best] = swap
      const p = pivots[k] ?? k
      pivots[k] = pivots[best] ?? best
      pivots[best] = p
      sign = -sign
    }
    const pivotRow = lu[k] ?? []
    const pivot = pivotRow[k] ?? 0
    if (pivot === 0) {
      continue
    }
    for (let i = k + 1; i < n; i += 1) {
      const row = lu[i] ?? []
      const factor = (row[k] ?? 0) / pivot
      row[k] = factor
      for (let j = k + 1; j < n; j += 1) {
        row[j] = (row[j] ?? 0) - factor * (pivotRow[j] ?? 0)
      }
    }
  }
  return { lu, pivots, sign }
}

export const det = (a: NdArray): number => {
  const { lu, sign } = decompose(toMatrix(a, "det"), "det")
  return lu.reduce((acc, row, i) => acc * (row[i] ?? 0), sign)
}

export const inv = (a: NdArray): NdArray => {
  const m = toMatrix(a, "inv")
  const n = requireSquare(m, "inv")
  const { lu, pivots } = decompose(m, "inv")
  if (lu.some((row, i) => (row[i] ?? 0) === 0)) {
    throw new ArrayError({ operation: "inv", problem: "matrix is singular" })
  }
  const result: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0))
  for (let col = 0; col < n; col += 1) {
    const y = pivots.map<number>((p) => (p === col ? 1 : 0))
    for (let i = 0; i < n; i += 1) {
      for (let k = 0; k < i; k += 1) {
        y[i] = (y[i] ?? 0) - (lu[i]?.[k] ?? 0) * (y[k] ?? 0)
      }
    }
    for (let i = n - 1; i >= 0; i -= 1) {
      for (let k = i + 1; k < n; k += 1) {
        y[i] = (y[i] ?? 0) - (lu[i]?.[k] ?? 0) * (y[k] ?? 0)
      }
      y[i] = (y[i] ?? 0) / (lu[i]?.[i] ?? 1)
    }
    for (let i = 0; i < n; i += 1) {
      const row = result[i] ?? []
      row[col] = y[i] ?? 0
    }
  }
  return fromMatrix(result)
}

export interface EigenDecomposition {
  readonly values: ReadonlyArray<number>
  readonly vectors: NdArray
}

/**
 * Cyclic Jacobi rotations for real symmetric matrices. Eigenvalues are sorted
 * ascending and eigenvectors are returned as the matching columns.
 */
export const eig = (a: NdArray): EigenDecomposition => {
  const m = toMatrix(a, "eig").map((row) => [...row])
  const n = requireSquare(m, "eig")
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) {
      const upper = m[i]?.[j] ?? 0
      const lower = m[j]?.[i] ?? 0
      if (Math.abs(upper - lower) > SYMMETRY_TOLERANCE * Math.max(1, Math.abs(upper))) {
        throw new ArrayError({ operation: "eig", problem: "matrix must be symmetric" })
      }
    }
  }
  const v: Matrix = Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)))
  const at = (i: number, j: number): number => m[i]?.[j] ?? 0
  const put = (target: Matrix, i: number, j: number, value: number): void => {
    const row = target[i]
    if (row) {
      row[j] = value
    }
  }
  for (let sweep = 0; sweep < JACOBI_MAX_SWEEPS; sweep += 1) {
    let off = 0
    for (let i = 0; i < n; i += 1) {
      for (let j = i + 1; j < n; j += 1) {
        off += at(i, j) ** 2
      }
    }
    if (off < JACOBI_TOLERANCE) {
      break
    }
    for (let p = 0; p < n; p += 1) {
      for (let q = p + 1; q < n; q += 1) {
        const apq = at(p, q)
        if (Math.abs(apq) < Number.EPSILON) {
          continue
        }
        const theta = (at(q, q) - at(p, p)) / (2 * apq)
        const t = Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1))
        const c = 1 / Math.sqrt(t * t + 1)
        const s = t * c
        for (let k = 0; k < n; k += 1) {
          const akp = at(k, p)
          const akq = at(k, q)
          put(m, k, p, c * akp - s * akq)
          put(m, k, q, s * akp + c * akq)
        }
        for (let k = 0; k < n; k += 1) {
          const apk = at(p, k)
          const aqk = at(q, k)
          put(m, p, k, c * apk - s * aqk)
          put(m, q, k, s * apk + c * aqk)
        }
        for (let k = 0; k < n; k += 1) {
          const vkp = v[k]?.[p] ?? 0
          const vkq = v[k]?.[q] ?? 0
          put(v, k, p, c * vkp - s * vkq)
          put(v, k, q, s * vkp + c * vkq)
        }
      }
    }
  }
  const order = Array.from({ length: n }, (_, i) => i).sort((x, y) => at(x, x) - at(y, y))
  return {
    values: order.map((i) => at(i, i)),
    vectors: fromMatrix(v.map((row) => order.map((i) => row[i] ?? 0))),
  }
}
