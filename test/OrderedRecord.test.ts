import { describe, expect, it } from "@effect/vitest"
import { Option } from "effect"
import { FieldIndexError, FieldNotFoundError, ReservedFieldError } from "../src/Errors.js"
import { OrderedRecord } from "../src/OrderedRecord.js"

describe("OrderedRecord", () => {
  it("keeps insertion order and replaces values in place", () => {
    const record = OrderedRecord.from({ a: 1, b: 2, c: 3 })
    record.set("b", 20)
    record.set("d", 4)

    expect(record.keys()).toEqual(["a", "b", "c", "d"])
    expect(record.values()).toEqual([1, 20, 3, 4])
    expect(record.length).toBe(4)
  })

  it("raises FieldNotFoundError for missing names", () => {
    const record = OrderedRecord.from({ a: 1 })

    expect(() => record.get("b")).toThrow(FieldNotFoundError)
    expect(() => record.get("b")).toThrow('the field "b" does not exist')
    expect(Option.isNone(record.getOption("b"))).toBe(true)
    expect(() => record.delete("b")).toThrow(FieldNotFoundError)
  })

  it("deletes a field when an empty list is assigned to it", () => {
    const record = OrderedRecord.from({ a: 1, b: 2, c: 3 })
    record.set("b", [])

    expect(record.keys()).toEqual(["a", "c"])
    expect(record.get("c")).toBe(3)
    expect(record.at(1)).toBe(3)
  })

  it("stores an empty list under a new name", () => {
    const record = new OrderedRecord().set("empty", [])

    expect(record.has("empty")).toBe(true)
    expect(record.get("empty")).toEqual([])
  })

  it("rejects reserved names", () => {
    const record = new OrderedRecord()

    expect(() => record.set("__proto__", 1)).toThrow(ReservedFieldError)
    expect(() => record.delete("constructor")).toThrow(FieldNotFoundError)
    expect(record.isEmpty).toBe(true)
  })

  it("supports positional access with negative indices", () => {
    const record = OrderedRecord.from([
      ["x", 1],
      ["y", 2],
      ["z", 3],
    ])

    expect(record.at(0)).toBe(1)
    expect(record.at(-1)).toBe(3)
    expect(record.keyAt(-2)).toBe("y")
    expect(() => record.at(3)).toThrow(FieldIndexError)
    expect(() => record.at(-4)).toThrow("index -4 is out of range for a record of 3 fields")
  })

  it("slices, picks and selects sub-records", () => {
    const record = OrderedRecord.from({ a: 1, b: 2, c: 3, d: 4 })

    expect(record.slice(1, 3).toObject()).toEqual({ b: 2, c: 3 })
    expect(record.pick([3, 0]).keys()).toEqual(["d", "a"])
    expect(record.select("c", "a").entries()).toEqual([
      ["c", 3],
      ["a", 1],
    ])
    expect(() => record.select("q")).toThrow(FieldNotFoundError)
  })

  it("concatenates with right-hand values winning", () => {
    const a = OrderedRecord.from({ x: 1, y: 2 })
    const b = OrderedRecord.from({ y: 20, z: 30 })
    const c = a.concat(b)

    expect(c.entries()).toEqual([
      ["x", 1],
      ["y", 20],
      ["z", 30],
    ])
    expect(c.length).toBe(a.length + b.length - 1)
    expect(a.get("y")).toBe(2)
    expect(b.length).toBe(2)
  })

  it("computes differences and chains with concat", () => {
    const result = OrderedRecord.from({ a: 1, b: 2 })
      .concat(OrderedRecord.from({ c: 3 }))
      .difference(OrderedRecord.from({ a: 1 }))

    expect(result.entries()).toEqual([
      ["b", 2],
      ["c", 3],
    ])
  })

  it("offers in-place variants", () => {
    const record = OrderedRecord.from({ a: 1 })
    record.concatInPlace(OrderedRecord.from({ b: 2 }))
    record.differenceInPlace(OrderedRecord.from({ a: 0 }))

    expect(record.toObject()).toEqual({ b: 2 })
  })

  it("clones nested records deeply", () => {
    const inner = OrderedRecord.from({ k: 1 })
    const outer = OrderedRecord.from({ inner })
    const copy = outer.clone()
    inner.set("k", 2)

    const copied = copy.get("inner")
    expect(copied instanceof OrderedRecord ? copied.get("k") : undefined).toBe(1)
    expect(outer.toObject()).toEqual({ inner: { k: 2 } })
  })

  it("pairs keys and values", () => {
    expect(OrderedRecord.fromKeysValues(["a", "b", "c"], [1, 2]).toObject()).toEqual({ a: 1, b: 2, c: 2 })
    expect(OrderedRecord.fromKeysValues(["a"], [1, 2, 3]).toObject()).toEqual({ a: 1, key1: 2, key2: 3 })
    expect(OrderedRecord.fromKeys(["p", "q"]).values()).toEqual([null, null])
  })

  it("fills missing, null and empty fields from defaults", () => {
    const record = OrderedRecord.from({ a: null, b: 2 })
    record.check({ a: 10, b: 20, c: 30 })

    expect(record.toObject()).toEqual({ a: 10, b: 2, c: 30 })
  })

  it("refuses reserved names among the defaults", () => {
    const record = new OrderedRecord()

    expect(() => record.check([["constructor", 1]])).toThrow(ReservedFieldError)
    expect(() => record.check(new Map([["prototype", 1]]))).toThrow('"prototype" is a reserved name and cannot be assigned')
    expect(record.keys()).toEqual([])
  })

  it("iterates entries in order", () => {
    const seen: Array<string> = []
    for (const [name, value] of OrderedRecord.from({ one: 1, two: 2 })) {
      seen.push(`${name}=${String(value)}`)
    }

    expect(seen).toEqual(["one=1", "two=2"])
    expect(OrderedRecord.from({ one: 1, two: "x" }).toString()).toBe("{one=1, two=x}")
  })

  it("clears all fields", () => {
    const record = OrderedRecord.from({ a: 1, b: 2 }).clear()

    expect(record.length).toBe(0)
    expect(record.has("a")).toBe(false)
    record.set("a", 5)
    expect(record.at(0)).toBe(5)
  })
})
