/**
 * POSIX-normalised path values.
 *
 * Field values flagged as paths keep forward slashes whatever platform
 * produced them, so generated scripts stay portable.
 *
 * @since 0.1.0
 */

/**
 * Normalises separators: backslashes become `/`, repeated separators and `.`
 * segments collapse, and a trailing separator is kept.
 *
 * @category Paths
 * @since 0.1.0
 */
export const normalizePath = (raw: string): string => {
  const text = raw.replace(/\\/g, "/")
  if (text.length === 0) {
    return "."
  }
  const absolute = text.startsWith("/")
  const trailing = text.length > 1 && text.endsWith("/")
  const segments = text.split("/").filter((segment) => segment.length > 0 && segment !== ".")
  const body = segments.join("/")
  if (body.length === 0) {
    return absolute ? "/" : "."
  }
  return `${absolute ? "/" : ""}${body}${trailing ? "/" : ""}`
}

/**
 * A string flagged as a filesystem path.
 *
 * @category Paths
 * @since 0.1.0
 * @example
 * ```ts
 * PathValue.of("this/is").join("mypath//").toString() // "this/is/mypath/"
 * ```
 */
export class PathValue {
  readonly value: string

  private constructor(value: string) {
    this.value = value
  }

  static of(raw: string): PathValue {
    return new PathValue(normalizePath(raw))
  }

  get endsWithSeparator(): boolean {
    return this.value.length > 1 && this.value.endsWith("/")
  }

  /**
   * Joins with exactly one separator. A trailing separator on the right
   * operand survives; one on the left operand is absorbed by the join.
   */
  join(other: PathValue | string): PathValue {
    const right = typeof other === "string" ? other.replace(/\\/g, "/") : other.value
    const left = this.value === "." ? "" : this.value.replace(/\/+$/, "")
    const tail = right.replace(/^\/+/, "")
    if (tail.length === 0 || tail === ".") {
      return left.length > 0 ? new PathValue(`${left}/`) : this
    }
    return PathValue.of(left.length > 0 || this.value.startsWith("/") ? `${left}/${tail}` : tail)
  }

  /** Plain text concatenation followed by normalisation. */
  append(text: string): PathValue {
    return PathValue.of(`${this.value}${text}`)
  }

  get segments(): ReadonlyArray<string> {
    return this.value.split("/").filter((segment) => segment.length > 0)
  }

  equals(other: PathValue): boolean {
    return this.value === other.value
  }

  toString(): string {
    return this.value
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isPathValue = (value: unknown): value is PathValue => value instanceof PathValue
