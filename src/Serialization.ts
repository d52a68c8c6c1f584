/**
 * Plain-text `name=value` format for records.
 *
 * ```text
 * # parameter list with 3 definitions
 *
 * a=1
 * b="${a}+1"
 * out=p"results/run1/"
 * ```
 *
 * Expression fields are written as their source text, so reading a file back
 * yields the record that was written, not its evaluation.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import { readFileSync, writeFileSync } from "node:fs"
import { ErrorMarker, SerializationError } from "./Errors.js"
import { evaluateExpression } from "./internal/expression/Evaluator.js"
import { renderLiteral } from "./internal/render.js"
import { OrderedRecord } from "./OrderedRecord.js"
import { PathValue } from "./PathValue.js"
import { type FieldValue, type RecordKind, RecordLabels } from "./Types.js"

const IN_MEMORY = "<text>"

const writeValue = (name: string, value: FieldValue, path: string): string => {
  const text = typeof value === "string" || value instanceof ErrorMarker ? value.toString() : undefined
  if (text !== undefined) {
    if (/[\r\n]/.test(text)) {
      throw new SerializationError({ path, line: 0, problem: `the field "${name}" contains a line break` })
    }
    return `"${text}"`
  }
  if (value instanceof PathValue) {
    return `p"${value.value}"`
  }
  return renderLiteral(value, { tagArrays: true })
}

/**
 * @category Serialization
 * @since 0.1.0
 */
export const toText = (record: OrderedRecord, kind: RecordKind = "parameters", path = IN_MEMORY): string => {
  const labels = RecordLabels[kind]
  const lines = [`# ${labels.noun} with ${record.length} ${labels.item}s`, ""]
  for (const [name, value] of record) {
    lines.push(`${name}=${writeValue(name, value, path)}`)
  }
  return `${lines.join("\n")}\n`
}

const QUOTED = /^"(.*)"$/s
const PATH = /^p"(.*)"$/s

const readValue = (raw: string, path: string, line: number): FieldValue => {
  const text = raw.trim()
  if (text.length === 0 || text === "None") {
    return null
  }
  const quoted = QUOTED.exec(text)
  if (quoted) {
    return quoted[1] ?? ""
  }
  const pathValue = PATH.exec(text)
  if (pathValue) {
    return PathValue.of(pathValue[1] ?? "")
  }
  const parsed = Either.try({
    try: () => evaluateExpression(text),
    catch: (error) =>
      new SerializationError({ path, line, problem: error instanceof Error ? error.message : String(error) }),
  })
  if (Either.isLeft(parsed)) {
    throw parsed.left
  }
  return parsed.right
}

/**
 * Reads the text format. Blank lines and `#` comments are skipped and each
 * remaining line is split at its first `=`.
 *
 * @category Serialization
 * @since 0.1.0
 */
export const fromText = (text: string, path = IN_MEMORY): OrderedRecord => {
  const record = new OrderedRecord()
  text.split(/\r?\n/).forEach((content, index) => {
    const line = index + 1
    const trimmed = content.trim()
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      return
    }
    const separator = trimmed.indexOf("=")
    if (separator <= 0) {
      throw new SerializationError({ path, line, problem: `expected name=value, got "${trimmed}"` })
    }
    record.set(trimmed.slice(0, separator).trim(), readValue(trimmed.slice(separator + 1), path, line))
  })
  return record
}

const ioFailure = (path: string) => (error: unknown): SerializationError =>
  error instanceof SerializationError
    ? new SerializationError({ path, line: error.line, problem: error.problem })
    : new SerializationError({ path, line: 0, problem: error instanceof Error ? error.message : String(error) })

/**
 * @category Serialization
 * @since 0.1.0
 */
export const writeRecord = (
  path: string,
  record: OrderedRecord,
  kind: RecordKind = "parameters",
): Effect.Effect<void, SerializationError> =>
  Effect.try({
    try: () => writeFileSync(path, toText(record, kind, path), "utf8"),
    catch: ioFailure(path),
  })

/**
 * @category Serialization
 * @since 0.1.0
 */
export const readRecord = (path: string): Effect.Effect<OrderedRecord, SerializationError> =>
  Effect.try({
    try: () => fromText(readFileSync(path, "utf8"), path),
    catch: ioFailure(path),
  })
