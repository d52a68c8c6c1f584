import { ErrorMarker } from "../Errors.js"
import { OrderedRecord, isList } from "../OrderedRecord.js"
import { PathValue } from "../PathValue.js"
import type { FieldValue } from "../Types.js"
import { NdArray, type NestedNumbers } from "./array/NdArray.js"

export const renderNumber = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf"
  }
  return String(value)
}

const renderNested = (value: NestedNumbers): string =>
  typeof value === "number" ? renderNumber(value) : `[${value.map(renderNested).join(",")}]`

export interface RenderOptions {
  /** Wrap arrays of rank two or more in `array(...)`; vectors stay plain lists. */
  readonly tagArrays?: boolean
}

/**
 * Text that the arithmetic parser reads back as the same value. Strings nested
 * in containers are quoted; a top-level string is returned verbatim unless
 * `quoteStrings` is set.
 */
export const renderLiteral = (value: FieldValue, options: RenderOptions = {}, quoteStrings = true): string => {
  if (value === null) {
    return "None"
  }
  if (typeof value === "number") {
    return renderNumber(value)
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false"
  }
  if (typeof value === "string") {
    return quoteStrings ? JSON.stringify(value) : value
  }
  if (value instanceof PathValue || value instanceof ErrorMarker) {
    return quoteStrings ? JSON.stringify(value.toString()) : value.toString()
  }
  if (value instanceof NdArray) {
    const nested = renderNested(value.toNested())
    return options.tagArrays && value.rank > 1 ? `array(${nested})` : nested
  }
  if (value instanceof OrderedRecord) {
    const entries = value.entries().map(([name, item]) => `${name}: ${renderLiteral(item, options)}`)
    return `{${entries.join(", ")}}`
  }
  if (isList(value)) {
    return `[${value.map((item) => renderLiteral(item, options)).join(",")}]`
  }
  return String(value)
}

/** Textual form substituted for an interpolation marker. */
export const renderText = (value: FieldValue): string => renderLiteral(value, {}, false)
