/**
 * Human-readable tables of records and their evaluated values.
 *
 * @since 0.1.0
 */

import type { Snapshot } from "./Evaluator.js"
import { NdArray } from "./internal/array/NdArray.js"
import { renderNumber, renderText } from "./internal/render.js"
import { OrderedRecord, isList } from "./OrderedRecord.js"
import { PathValue } from "./PathValue.js"
import { type FieldValue, type RecordKind, RecordLabels } from "./Types.js"

/**
 * @category Display
 * @since 0.1.0
 */
export interface DescribeOptions {
  readonly precision?: number
  readonly maxDisplay?: number
  readonly kind?: RecordKind
}

const MAX_ELEMENTS = 10

/**
 * Number rounded to `precision` significant digits.
 *
 * @category Display
 * @since 0.1.0
 */
export const formatNumber = (value: number, precision = 4): string =>
  Number.isFinite(value) ? renderNumber(Number(value.toPrecision(precision))) : renderNumber(value)

/**
 * Shortens long text to its head and tail around ` [...] `.
 *
 * @category Display
 * @since 0.1.0
 */
export const truncate = (text: string, maxDisplay = 40): string => {
  if (text.length <= maxDisplay) {
    return text
  }
  const half = Math.round(maxDisplay / 2)
  return `${text.slice(0, half)} [...] ${text.slice(-half)}`
}

const elements = (values: ReadonlyArray<number>, precision: number): string =>
  `[${values.map((value) => formatNumber(value, precision)).join(" ")}]`

/**
 * Compact Matlab-style view of a numeric array: short vectors are listed,
 * larger arrays are summarised by their shape.
 *
 * @category Display
 * @since 0.1.0
 * @example
 * ```ts
 * formatArray([1, 2.5, 3]) // "[1 2.5 3] (double)"
 * formatArray(new NdArray([3, 1], [1, 2, 3])) // "[1 2 3]T (double)"
 * formatArray(new NdArray([4, 4], new Array(16).fill(0))) // "[4×4 double]"
 * ```
 */
export const formatArray = (value: NdArray | ReadonlyArray<number>, precision = 4): string => {
  if (!(value instanceof NdArray)) {
    return value.length === 0 ? "[]" : formatArray(new NdArray([value.length], value), precision)
  }
  const array = value
  if (array.size === 1) {
    return `${formatNumber(array.data[0] ?? Number.NaN, precision)} (double)`
  }
  const [rows = 1, cols = 1] = array.shape
  if (array.rank === 1) {
    return rows <= MAX_ELEMENTS ? `${elements(array.data, precision)} (double)` : `[${rows}×1 double]`
  }
  if (array.rank === 2 && cols === 1) {
    return rows <= MAX_ELEMENTS ? `${elements(array.data, precision)}T (double)` : `[${rows}×1 double]`
  }
  if (array.rank === 2 && rows === 1) {
    return cols <= MAX_ELEMENTS ? `${elements(array.data, precision)} (double)` : `[1×${cols} double]`
  }
  return `[${array.shape.join("×")} double]`
}

const isNumberList = (value: FieldValue): value is ReadonlyArray<number> =>
  isList(value) && value.length > 0 && value.every((item) => typeof item === "number")

const displayValue = (value: FieldValue, precision: number, maxDisplay: number): string => {
  if (typeof value === "number") {
    return formatNumber(value, precision)
  }
  if (value instanceof NdArray || isNumberList(value)) {
    return formatArray(value, precision)
  }
  if (value instanceof PathValue) {
    return `p"${truncate(value.value, maxDisplay)}"`
  }
  if (value === "") {
    return "<empty string>"
  }
  if (value instanceof OrderedRecord) {
    return truncate(`${RecordLabels.structure.noun} with ${value.length} ${RecordLabels.structure.item}s`, maxDisplay)
  }
  return truncate(renderText(value), maxDisplay)
}

const isComputed = (value: FieldValue): boolean =>
  (typeof value === "string" && value.trim().length > 0) || value instanceof PathValue

/**
 * Fixed-width table with one line per field and, below each computed field,
 * its value taken from `snapshot`.
 *
 * @category Display
 * @since 0.1.0
 */
export const describe = (record: OrderedRecord, snapshot?: Snapshot, options: DescribeOptions = {}): string => {
  const { precision = 4, maxDisplay = 40, kind = "structure" } = options
  const labels = RecordLabels[kind]
  if (record.isEmpty) {
    return `empty ${labels.noun}`
  }
  const width = Math.max(10, ...record.keys().map((name) => name.length + 2))
  const rule = `${"-".repeat(width - 2).padStart(width)}:${"-".repeat(Math.min(40, width * 5))}`
  const lines = [rule]
  for (const [name, value] of record) {
    lines.push(`${name.padStart(width)}: ${displayValue(value, precision, maxDisplay)}`)
    if (snapshot && isComputed(value) && snapshot.has(name)) {
      lines.push(`${"".padStart(width)}= ${displayValue(snapshot.get(name), precision, maxDisplay)}`)
    }
  }
  lines.push(rule)
  lines.push(`${labels.noun} with ${record.length} ${labels.item}s`)
  return lines.join("\n")
}
