/**
 * Rules of the embedded template language.
 *
 * A field value is read in this order: trailing comments are dropped, the
 * value is classified by its prefix (`!` literal list, `$` literal text,
 * anything else an expression), Matlab-style `$[...]` literals are rewritten
 * as nested lists, and `${...}` / `@{...}` markers are substituted. A
 * backslash in front of a marker defers it by one pass.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { isBuiltinName } from "./internal/expression/Builtins.js"
import { renderNumber } from "./internal/render.js"
import type { OrderedRecord } from "./OrderedRecord.js"
import type { FieldValue } from "./Types.js"

/**
 * Raised for malformed array literals and ranges.
 *
 * @category Errors
 * @since 0.1.0
 */
export class GrammarError extends Data.TaggedError("GrammarError")<{
  readonly text: string
  readonly problem: string
}> {
  override get message(): string {
    return this.problem
  }
}

/**
 * @category Grammar
 * @since 0.1.0
 */
export type Sigil = "$" | "@"

/**
 * Piece of a template: plain text, a live marker, or an escaped marker whose
 * `raw` text (without the backslash) is emitted as is.
 *
 * @category Grammar
 * @since 0.1.0
 */
export type Segment =
  | { readonly _tag: "Text"; readonly text: string }
  | { readonly _tag: "Marker"; readonly sigil: Sigil; readonly content: string; readonly raw: string }
  | { readonly _tag: "Escaped"; readonly raw: string }

/**
 * @category Grammar
 * @since 0.1.0
 */
export type ValueClass = "empty" | "literal-list" | "literal" | "expression"

const isSigil = (char: string | undefined): char is Sigil => char === "$" || char === "@"

/**
 * Splits a template into text and marker segments.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const scanSegments = (text: string): ReadonlyArray<Segment> => {
  const segments: Array<Segment> = []
  let buffer = ""
  let i = 0
  const flush = (): void => {
    if (buffer.length > 0) {
      segments.push({ _tag: "Text", text: buffer })
      buffer = ""
    }
  }
  while (i < text.length) {
    const char = text[i]
    const escaped = char === "\\" && isSigil(text[i + 1]) && text[i + 2] === "{"
    const sigil = escaped ? text[i + 1] : char
    const open = escaped ? i + 1 : i
    if (isSigil(sigil) && text[open + 1] === "{") {
      const close = text.indexOf("}", open + 2)
      if (close !== -1) {
        flush()
        const raw = text.slice(open, close + 1)
        segments.push(
          escaped
            ? { _tag: "Escaped", raw }
            : { _tag: "Marker", sigil, content: text.slice(open + 2, close).trim(), raw },
        )
        i = close + 1
        continue
      }
    }
    buffer += char
    i += 1
  }
  flush()
  return segments
}

/**
 * Drops an unescaped `#` and the rest of its line, unless `#` is the first
 * non-blank character of the line. `\#` stands for a literal `#`.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const stripComment = (text: string): string =>
  text
    .split("\n")
    .map((line) => {
      const first = line.search(/\S/)
      let out = ""
      for (let i = 0; i < line.length; i += 1) {
        const char = line[i]
        if (char === "\\" && line[i + 1] === "#") {
          out += "#"
          i += 1
          continue
        }
        if (char === "#" && i > first) {
          return out.trimEnd()
        }
        out += char
      }
      return out
    })
    .join("\n")

/**
 * @category Grammar
 * @since 0.1.0
 */
export const classify = (text: string): ValueClass => {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    return "empty"
  }
  if (trimmed.startsWith("!")) {
    return "literal-list"
  }
  if (trimmed.startsWith("$") && trimmed[1] !== "{" && trimmed[1] !== "[") {
    return "literal"
  }
  return "expression"
}

/**
 * Whether the text carries a backslash-deferred marker.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const hasEscapedMarker = (text: string): boolean =>
  scanSegments(text).some((segment) => segment._tag === "Escaped")

const IDENTIFIER = /(?<![.\w])[A-Za-z_][A-Za-z0-9_]*/g
const SIMPLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

const markerNames = (content: string): ReadonlyArray<string> => {
  if (SIMPLE_NAME.test(content)) {
    return [content]
  }
  const unquoted = content.replace(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g, "")
  return [...unquoted.matchAll(IDENTIFIER)].map((match) => match[0]).filter((name) => !isBuiltinName(name))
}

/**
 * Unique names referenced by live markers, in order of first appearance.
 *
 * @category Grammar
 * @since 0.1.0
 * @example
 * ```ts
 * scanReferences("${a}+${b[1]}*sqrt(${a})") // ["a", "b"]
 * ```
 */
export const scanReferences = (text: string): ReadonlyArray<string> => {
  const names = new Set<string>()
  for (const segment of scanSegments(text)) {
    if (segment._tag === "Marker") {
      for (const name of markerNames(segment.content)) {
        names.add(name)
      }
    }
  }
  return [...names]
}

/**
 * A value is an expression when it is a string with at least one live marker.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const isExpression = (value: FieldValue): value is string =>
  typeof value === "string" && scanSegments(value).some((segment) => segment._tag === "Marker")

/**
 * Whether every name referenced by `text` is among `defined`.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const isDefined = (text: string, defined: Iterable<string>): boolean => {
  const known = new Set(defined)
  return scanReferences(text).every((name) => known.has(name))
}

/**
 * Per-field expression flags, in record order.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const expressionFlags = (record: OrderedRecord): ReadonlyArray<readonly [string, boolean]> =>
  record.entries().map(([name, value]) => [name, isExpression(value)] as const)

/**
 * Names each expression field refers to.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const dependencies = (record: OrderedRecord): ReadonlyMap<string, ReadonlyArray<string>> =>
  new Map(
    record
      .entries()
      .flatMap(([name, value]) => (isExpression(value) ? [[name, scanReferences(value)] as const] : [])),
  )

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")

/**
 * Rewrites bare `$name` into `${name}` for the given names, longest first, so
 * that a shorter name never captures the prefix of a longer one.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const protect = (text: string, names: Iterable<string>): string =>
  [...names]
    .filter((name) => name.length > 0)
    .sort((a, b) => b.length - a.length)
    .reduce(
      (acc, name) => acc.replace(new RegExp(`(?<!\\\\)\\$${escapeRegExp(name)}(?![\\w{\\[])`, "g"), `\${${name}}`),
      text,
    )

/**
 * Outcome of resolving one marker. `Unresolved` names the missing field.
 *
 * @category Grammar
 * @since 0.1.0
 */
export type MarkerFailure =
  | { readonly _tag: "Unresolved"; readonly raw: string; readonly name: string }
  | { readonly _tag: "Failed"; readonly raw: string; readonly problem: string }

/**
 * @category Grammar
 * @since 0.1.0
 */
export type MarkerResolution = { readonly _tag: "Resolved"; readonly text: string } | MarkerFailure

/**
 * @category Grammar
 * @since 0.1.0
 */
export interface Interpolation {
  readonly text: string
  readonly escaped: boolean
  readonly failures: ReadonlyArray<MarkerFailure>
}

/**
 * Substitutes live markers through `resolve`. Escaped markers lose their
 * backslash; markers that fail to resolve are left in place and reported.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const interpolate = (
  text: string,
  resolve: (content: string, sigil: Sigil, raw: string) => MarkerResolution,
): Interpolation => {
  let escaped = false
  const failures: Array<MarkerFailure> = []
  const parts = scanSegments(text).map((segment) => {
    switch (segment._tag) {
      case "Text":
        return segment.text
      case "Escaped":
        escaped = true
        return segment.raw
      case "Marker": {
        const resolution = resolve(segment.content, segment.sigil, segment.raw)
        if (resolution._tag === "Resolved") {
          return resolution.text
        }
        failures.push(resolution)
        return segment.raw
      }
    }
  })
  return { text: parts.join(""), escaped, failures }
}

// Array literals --------------------------------------------------------------

type Item = string | Group

interface Group {
  readonly rows: Array<Array<Item>>
}

const NUMBER = String.raw`-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?`
const RANGE = new RegExp(`^(${NUMBER}):(?:(${NUMBER}):)?(${NUMBER})$`)

const BINARY_LEFT = "+-*/^%@(,"
const BINARY_RIGHT = "*/^%@)"

/**
 * Expands `a:b` or `a:step:b` into its elements, at most `limit` of them.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const expandRange = (token: string, limit: number): ReadonlyArray<string> | undefined => {
  const match = RANGE.exec(token)
  if (!match) {
    return undefined
  }
  const start = Number(match[1])
  const step = match[2] === undefined ? 1 : Number(match[2])
  const stop = Number(match[3])
  if (step === 0) {
    throw new GrammarError({ text: token, problem: `range ${token}: step cannot be zero` })
  }
  const count = Math.floor((stop - start) / step + 1e-10) + 1
  if (count > limit) {
    throw new GrammarError({ text: token, problem: `range ${token} expands to more than ${limit} elements` })
  }
  return Array.from({ length: Math.max(0, count) }, (_, k) => renderNumber(Number((start + k * step).toPrecision(12))))
}

const nextNonBlank = (text: string, from: number): number => {
  let i = from
  while (i < text.length && /\s/.test(text[i] ?? "")) {
    i += 1
  }
  return i
}

const parseGroup = (
  body: string,
  from: number,
  nested: boolean,
  limit: number,
): { readonly group: Group; readonly end: number } => {
  const group: Group = { rows: [[]] }
  let token = ""
  let parens = 0
  const row = (): Array<Item> => {
    const current = group.rows[group.rows.length - 1]
    if (current) {
      return current
    }
    const created: Array<Item> = []
    group.rows.push(created)
    return created
  }
  const flush = (): void => {
    const trimmed = token.trim()
    token = ""
    if (trimmed.length > 0) {
      row().push(...(expandRange(trimmed, limit) ?? [trimmed]))
    }
  }
  let i = from
  while (i < body.length) {
    const char = body[i] ?? ""
    if (isSigil(char) && body[i + 1] === "{") {
      const close = body.indexOf("}", i)
      if (close === -1) {
        throw new GrammarError({ text: body, problem: "unterminated marker inside array literal" })
      }
      token += body.slice(i, close + 1)
      i = close + 1
      continue
    }
    if (char === "(" || char === ")" || parens > 0) {
      parens += char === "(" ? 1 : char === ")" ? -1 : 0
      token += char
      i += 1
      continue
    }
    if (char === "[") {
      flush()
      const inner = parseGroup(body, i + 1, true, limit)
      row().push(inner.group)
      i = inner.end + 1
      continue
    }
    if (char === "]") {
      if (!nested) {
        throw new GrammarError({ text: body, problem: "unmatched ']' in array literal" })
      }
      flush()
      return { group, end: i }
    }
    if (char === ";") {
      flush()
      group.rows.push([])
      i += 1
      continue
    }
    if (char === ",") {
      flush()
      i += 1
      continue
    }
    if (/\s/.test(char)) {
      const last = token.trimEnd().slice(-1)
      const ahead = nextNonBlank(body, i)
      const next = body[ahead] ?? ""
      const binaryNext =
        BINARY_RIGHT.includes(next) || ((next === "+" || next === "-") && /\s/.test(body[ahead + 1] ?? ""))
      if (token.trim().length > 0 && !BINARY_LEFT.includes(last) && !binaryNext) {
        flush()
      } else {
        token += " "
      }
      i = ahead
      continue
    }
    token += char
    i += 1
  }
  if (nested) {
    throw new GrammarError({ text: body, problem: "unmatched '[' in array literal" })
  }
  flush()
  return { group, end: i }
}

const depthOf = (item: Item): number =>
  typeof item === "string" ? 0 : 1 + Math.max(0, ...item.rows.flat().map(depthOf)) + (item.rows.length > 1 ? 1 : 0)

const renderItem = (item: Item): string => (typeof item === "string" ? item : renderGroup(item, false))

const renderGroup = (group: Group, top: boolean): string => {
  const rows = group.rows.filter((row, i) => row.length > 0 || i < group.rows.length - 1)
  if (rows.length > 1) {
    return `[${rows.map((row) => `[${row.map(renderItem).join(",")}]`).join(",")}]`
  }
  const items = rows[0] ?? []
  if (top && items.every((item) => typeof item === "string")) {
    return `[[${items.join(",")}]]`
  }
  return `[${items.map(renderItem).join(",")}]`
}

/**
 * Rewrites one Matlab-style array body (the text between `$[` and its closing
 * bracket) as a nested list with at least two levels.
 *
 * @category Grammar
 * @since 0.1.0
 * @example
 * ```ts
 * convertArrayBody("1 2;3 4", 100) // "[[1,2],[3,4]]"
 * convertArrayBody("1:0.5:2", 100) // "[[1,1.5,2]]"
 * ```
 */
export const convertArrayBody = (body: string, limit: number): string => {
  const { group } = parseGroup(body, 0, false, limit)
  if (depthOf(group) > 4) {
    throw new GrammarError({ text: body, problem: "array literals are limited to 4 dimensions" })
  }
  return renderGroup(group, true)
}

/**
 * Replaces every unescaped `$[...]` in `text` by its nested-list form.
 *
 * @category Grammar
 * @since 0.1.0
 */
export const convertArrayLiterals = (text: string, limit: number): string => {
  let out = ""
  let i = 0
  while (i < text.length) {
    const start = text.indexOf("$[", i)
    if (start === -1) {
      out += text.slice(i)
      break
    }
    if (text[start - 1] === "\\") {
      out += text.slice(i, start - 1) + "$["
      i = start + 2
      continue
    }
    let depth = 0
    let end = -1
    for (let j = start + 1; j < text.length; j += 1) {
      const char = text[j]
      if (char === "[") {
        depth += 1
      } else if (char === "]") {
        depth -= 1
        if (depth === 0) {
          end = j
          break
        }
      }
    }
    if (end === -1) {
      throw new GrammarError({ text, problem: "unmatched or improperly formatted brackets" })
    }
    out += text.slice(i, start) + convertArrayBody(text.slice(start + 2, end), limit)
    i = end + 1
  }
  return out
}
