/**
 * Parameter list wrapper.
 *
 * `Definitions` owns an {@link OrderedRecord} and forwards field access to it
 * explicitly, adding evaluation switches on top: plain interpolation instead
 * of arithmetic, `$name` protection and automatic dependency sorting.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { describe } from "./Display.js"
import { type EngineOptions, Snapshot, evaluate, format, formatEval } from "./Evaluator.js"
import { protect } from "./Grammar.js"
import { type FieldEntry, OrderedRecord, type RecordInput } from "./OrderedRecord.js"
import { sortDefinitions } from "./Resolver.js"
import type { FieldValue } from "./Types.js"

/**
 * @category Definitions
 * @since 0.1.0
 */
export interface DefinitionsOptions {
  /** When false, values are interpolated but never computed. */
  readonly evaluation?: boolean
  /** Rewrite bare `$name` references to `${name}` before evaluating. */
  readonly protection?: boolean
  /** Sort by dependencies before evaluating and after concatenation. */
  readonly autoSort?: boolean
  readonly engine?: EngineOptions
  /** Significant digits used by {@link Definitions.describe}. */
  readonly precision?: number
}

const defaults = {
  evaluation: true,
  protection: false,
  autoSort: false,
  engine: {},
  precision: 4,
} satisfies Required<DefinitionsOptions>

/**
 * @category Definitions
 * @since 0.1.0
 * @example
 * ```ts
 * const defs = new Definitions({ b: "${a}*2", a: 3 }, { autoSort: true })
 * defs.getValue("b") // 6
 * defs.format("b is ${b}") // "b is 6"
 * ```
 */
export class Definitions implements Iterable<FieldEntry> {
  readonly #record: OrderedRecord
  readonly options: Required<DefinitionsOptions>

  constructor(input: RecordInput = [], options: DefinitionsOptions = {}) {
    this.#record = OrderedRecord.from(input)
    this.options = { ...defaults, ...options }
  }

  get length(): number {
    return this.#record.length
  }

  set(name: string, value: FieldValue): this {
    this.#record.set(name, value)
    return this
  }

  get(name: string): FieldValue {
    return this.#record.get(name)
  }

  has(name: string): boolean {
    return this.#record.has(name)
  }

  delete(name: string): this {
    this.#record.delete(name)
    return this
  }

  keys(): ReadonlyArray<string> {
    return this.#record.keys()
  }

  [Symbol.iterator](): Iterator<FieldEntry> {
    return this.#record[Symbol.iterator]()
  }

  /** Copy of the raw, unevaluated fields. */
  toRecord(): OrderedRecord {
    return this.#record.clone()
  }

  #prepared(): OrderedRecord {
    const names = this.#record.keys()
    const record = this.options.protection
      ? new OrderedRecord(
          this.#record.entries().map(([name, value]) => [name, typeof value === "string" ? protect(value, names) : value] as const),
        )
      : this.#record
    return this.options.autoSort ? Effect.runSync(sortDefinitions(record)) : record
  }

  evaluate(): Snapshot {
    const record = this.#prepared()
    if (this.options.evaluation) {
      return evaluate(record, this.options.engine)
    }
    const snapshot = new Snapshot()
    for (const [name, value] of record) {
      snapshot.set(name, typeof value === "string" ? format(value, snapshot) : value)
    }
    return snapshot
  }

  getValue(name: string): FieldValue {
    return this.evaluate().get(name)
  }

  /** Evaluated values of the named fields only. */
  select(...names: ReadonlyArray<string>): OrderedRecord {
    return this.evaluate().select(...names)
  }

  /** Evaluated values as a plain record that no longer carries expressions. */
  toStatic(): OrderedRecord {
    return OrderedRecord.from(this.evaluate())
  }

  format(template: string): string {
    const text = this.options.protection ? protect(template, this.#record.keys()) : template
    return format(text, this.evaluate())
  }

  formatEval(template: string): string {
    return formatEval(template, this.#prepared(), this.options.engine)
  }

  concat(other: Definitions | OrderedRecord): Definitions {
    const right = other instanceof Definitions ? other.#record : other
    const combined = this.#record.concat(right)
    return new Definitions(
      this.options.autoSort ? Effect.runSync(sortDefinitions(combined)) : combined,
      this.options,
    )
  }

  difference(other: Definitions | OrderedRecord): Definitions {
    const right = other instanceof Definitions ? other.#record : other
    return new Definitions(this.#record.difference(right), this.options)
  }

  describe(): string {
    return describe(this.#record, this.evaluate(), { kind: "parameters", precision: this.options.precision })
  }

  toString(): string {
    return `parameter list with ${this.length} definitions`
  }
}
