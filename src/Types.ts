/**
 * Value domain shared by records, snapshots and the arithmetic evaluator.
 *
 * @since 0.1.0
 */

import type { ErrorMarker } from "./Errors.js"
import type { NdArray } from "./internal/array/NdArray.js"
import type { OrderedRecord } from "./OrderedRecord.js"
import type { PathValue } from "./PathValue.js"

/**
 * Anything a field may hold. Strings may be literal text or expressions;
 * numeric sequences are plain arrays of numbers and rectangular arrays of two
 * or more dimensions are {@link NdArray} instances. `null` marks an absent
 * value.
 *
 * @since 0.1.0
 * @category Values
 */
export type FieldValue =
  | number
  | boolean
  | string
  | null
  | PathValue
  | NdArray
  | ErrorMarker
  | OrderedRecord
  | ReadonlyArray<FieldValue>

/**
 * Numeric view of a value once booleans and numeric lists are coerced.
 *
 * @since 0.1.0
 * @category Values
 */
export type Numeric = number | ReadonlyArray<number> | NdArray

/**
 * Whether a record was built as a plain structure or as a parameter list;
 * only affects headers and labels in text output.
 *
 * @since 0.1.0
 * @category Values
 */
export type RecordKind = "structure" | "parameters"

/**
 * @since 0.1.0
 * @category Values
 */
export const RecordLabels: Readonly<Record<RecordKind, { readonly noun: string; readonly item: string }>> = {
  structure: { noun: "structure", item: "field" },
  parameters: { noun: "parameter list", item: "definition" },
}
