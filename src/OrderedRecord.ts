/**
 * Ordered named-field container.
 *
 * Names keep their insertion order; a name→position map gives constant-time
 * lookup next to the ordered name list used for iteration. Reassigning a name
 * replaces its value in place without moving it.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import { FieldIndexError, FieldNotFoundError, ReservedFieldError } from "./Errors.js"
import type { FieldValue } from "./Types.js"

/**
 * Names that can never be fields. They cannot be assigned and deleting them
 * reports {@link FieldNotFoundError}.
 *
 * @category Records
 * @since 0.1.0
 */
export const ReservedNames: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"])

/**
 * @category Records
 * @since 0.1.0
 */
export type FieldEntry = readonly [string, FieldValue]

/**
 * Anything a record can be built from.
 *
 * @category Records
 * @since 0.1.0
 */
export type RecordInput =
  | OrderedRecord
  | ReadonlyArray<FieldEntry>
  | ReadonlyMap<string, FieldValue>
  | Readonly<Record<string, FieldValue>>

const isEntryList = (input: RecordInput): input is ReadonlyArray<FieldEntry> => Array.isArray(input)

const isFieldMap = (input: RecordInput): input is ReadonlyMap<string, FieldValue> => input instanceof Map

export const isList = (value: FieldValue): value is ReadonlyArray<FieldValue> => Array.isArray(value)

const isEmptyList = (value: FieldValue): boolean => isList(value) && value.length === 0

const copyValue = (value: FieldValue): FieldValue => (value instanceof OrderedRecord ? value.clone() : value)

const entriesOf = (input: RecordInput): ReadonlyArray<FieldEntry> => {
  if (input instanceof OrderedRecord) {
    return input.entries()
  }
  if (isEntryList(input)) {
    return input
  }
  if (isFieldMap(input)) {
    return [...input.entries()]
  }
  return Object.entries(input)
}

/**
 * @category Records
 * @since 0.1.0
 * @example
 * ```ts
 * const a = OrderedRecord.from({ a: 1, b: 2 })
 * const c = a.concat(OrderedRecord.from({ c: 3 })).difference(OrderedRecord.from({ a: 1 }))
 * c.keys() // ["b", "c"]
 * ```
 */
export class OrderedRecord implements Iterable<FieldEntry> {
  readonly #names: Array<string> = []
  readonly #values: Array<FieldValue> = []
  readonly #positions = new Map<string, number>()

  constructor(entries: Iterable<FieldEntry> = []) {
    for (const [name, value] of entries) {
      this.set(name, value)
    }
  }

  static from(input: RecordInput): OrderedRecord {
    return new OrderedRecord(entriesOf(input).map(([name, value]) => [name, copyValue(value)] as const))
  }

  /**
   * Pairs keys with values. Surplus keys reuse the last value; surplus values
   * are stored under `key<i>` where `i` is their position.
   */
  static fromKeysValues(keys: ReadonlyArray<string>, values: ReadonlyArray<FieldValue>): OrderedRecord {
    const record = new OrderedRecord()
    if (keys.length === 0 || values.length === 0) {
      return record
    }
    keys.forEach((key, i) => {
      record.set(key, values[Math.min(i, values.length - 1)] ?? null)
    })
    for (let i = keys.length; i < values.length; i += 1) {
      record.set(`key${i}`, values[i] ?? null)
    }
    return record
  }

  static fromKeys(keys: ReadonlyArray<string>, value: FieldValue = null): OrderedRecord {
    return new OrderedRecord(keys.map((key) => [key, value] as const))
  }

  get length(): number {
    return this.#names.length
  }

  get isEmpty(): boolean {
    return this.#names.length === 0
  }

  has(name: string): boolean {
    return this.#positions.has(name)
  }

  get(name: string): FieldValue {
    const position = this.#positions.get(name)
    if (position === undefined) {
      throw new FieldNotFoundError({ name })
    }
    return this.#values[position] ?? null
  }

  getOption(name: string): Option.Option<FieldValue> {
    const position = this.#positions.get(name)
    return position === undefined ? Option.none() : Option.some(this.#values[position] ?? null)
  }

  /**
   * Assigns a field. An empty list assigned to an existing name deletes it.
   */
  set(name: string, value: FieldValue): this {
    if (ReservedNames.has(name)) {
      throw new ReservedFieldError({ name })
    }
    if (isEmptyList(value) && this.has(name)) {
      return this.delete(name)
    }
    this.#assign(name, value)
    return this
  }

  delete(name: string): this {
    const position = this.#positions.get(name)
    if (position === undefined || ReservedNames.has(name)) {
      throw new FieldNotFoundError({ name })
    }
    this.#names.splice(position, 1)
    this.#values.splice(position, 1)
    this.#positions.delete(name)
    for (let i = position; i < this.#names.length; i += 1) {
      this.#positions.set(this.#names[i] ?? "", i)
    }
    return this
  }

  update(input: RecordInput): this {
    for (const [name, value] of entriesOf(input)) {
      this.set(name, copyValue(value))
    }
    return this
  }

  /** Fills fields that are missing, `null` or empty lists from `defaults`. */
  check(defaults: RecordInput): this {
    for (const [name, value] of entriesOf(defaults)) {
      if (ReservedNames.has(name)) {
        throw new ReservedFieldError({ name })
      }
      const current = this.getOption(name)
      if (Option.isNone(current) || current.value === null || isEmptyList(current.value)) {
        this.#assign(name, copyValue(value))
      }
    }
    return this
  }

  clear(): this {
    this.#names.length = 0
    this.#values.length = 0
    this.#positions.clear()
    return this
  }

  keys(): ReadonlyArray<string> {
    return [...this.#names]
  }

  values(): ReadonlyArray<FieldValue> {
    return [...this.#values]
  }

  entries(): ReadonlyArray<FieldEntry> {
    return this.#names.map((name, i) => [name, this.#values[i] ?? null] as const)
  }

  [Symbol.iterator](): Iterator<FieldEntry> {
    return this.entries()[Symbol.iterator]()
  }

  keyAt(index: number): string {
    const position = index < 0 ? this.length + index : index
    const name = this.#names[position]
    if (name === undefined) {
      throw new FieldIndexError({ index, length: this.length })
    }
    return name
  }

  at(index: number): FieldValue {
    return this.get(this.keyAt(index))
  }

  slice(start?: number, end?: number): OrderedRecord {
    return new OrderedRecord(this.entries().slice(start, end).map(([name, value]) => [name, copyValue(value)] as const))
  }

  pick(indices: ReadonlyArray<number>): OrderedRecord {
    return new OrderedRecord(indices.map((index) => {
      const name = this.keyAt(index)
      return [name, copyValue(this.get(name))] as const
    }))
  }

  select(...names: ReadonlyArray<string>): OrderedRecord {
    return new OrderedRecord(names.map((name) => [name, copyValue(this.get(name))] as const))
  }

  /**
   * New record with this record's fields followed by `other`'s; on a shared
   * name the right-hand value wins and keeps the left-hand position.
   */
  concat(other: OrderedRecord): OrderedRecord {
    return this.clone().concatInPlace(other)
  }

  concatInPlace(other: OrderedRecord): this {
    for (const [name, value] of other) {
      this.#assign(name, copyValue(value))
    }
    return this
  }

  difference(other: OrderedRecord): OrderedRecord {
    return this.clone().differenceInPlace(other)
  }

  differenceInPlace(other: OrderedRecord): this {
    for (const name of other.keys()) {
      if (this.has(name)) {
        this.delete(name)
      }
    }
    return this
  }

  clone(): OrderedRecord {
    return OrderedRecord.from(this)
  }

  /** Plain object view; nested records become nested objects. */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {}
    for (const [name, value] of this) {
      result[name] = value instanceof OrderedRecord ? value.toObject() : value
    }
    return result
  }

  toString(): string {
    return `{${this.entries().map(([name, value]) => `${name}=${String(value)}`).join(", ")}}`
  }

  #assign(name: string, value: FieldValue): void {
    const position = this.#positions.get(name)
    if (position !== undefined) {
      this.#values[position] = value
      return
    }
    this.#positions.set(name, this.#names.length)
    this.#names.push(name)
    this.#values.push(value)
  }
}
