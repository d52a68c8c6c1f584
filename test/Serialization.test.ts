import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterAll } from "vitest"
import { ErrorMarker, SerializationError } from "../src/Errors.js"
import { NdArray } from "../src/internal/array/NdArray.js"
import { OrderedRecord } from "../src/OrderedRecord.js"
import { PathValue } from "../src/PathValue.js"
import { fromText, readRecord, toText, writeRecord } from "../src/Serialization.js"

const sample = (): OrderedRecord =>
  OrderedRecord.from({
    a: 1,
    b: "${a}+1",
    flag: true,
    none: null,
    v: [1, 2, 3],
    m: new NdArray([2, 2], [1, 2, 3, 4]),
    out: PathValue.of("results/run1/"),
  })

const SAMPLE_TEXT = [
  "# parameter list with 7 definitions",
  "",
  "a=1",
  'b="${a}+1"',
  "flag=true",
  "none=None",
  "v=[1,2,3]",
  "m=array([[1,2],[3,4]])",
  'out=p"results/run1/"',
  "",
].join("\n")

describe("toText", () => {
  it("writes a header and one line per field", () => {
    expect(toText(sample())).toBe(SAMPLE_TEXT)
  })

  it("labels structures", () => {
    expect(toText(OrderedRecord.from({ k: 1 }), "structure")).toBe("# structure with 1 fields\n\nk=1\n")
  })

  it("writes markers as their text", () => {
    const record = OrderedRecord.from({ c: ErrorMarker.unresolved("c", "d") })

    expect(toText(record)).toBe('# parameter list with 1 definitions\n\nc="< undef definition "${d}" >"\n')
  })

  it("refuses strings with line breaks", () => {
    expect(() => toText(OrderedRecord.from({ s: "a\nb" }))).toThrow('<text>: the field "s" contains a line break')
  })
})

describe("fromText", () => {
  it("reads back what was written", () => {
    const restored = fromText(toText(sample()))

    expect(restored.entries()).toEqual(sample().entries())
  })

  it("reads nested records", () => {
    const restored = fromText(toText(OrderedRecord.from({ inner: OrderedRecord.from({ k: 1, s: "x" }) })))
    const inner = restored.get("inner")

    expect(inner instanceof OrderedRecord ? inner.toObject() : undefined).toEqual({ k: 1, s: "x" })
  })

  it("reads back escaped strings inside lists and records", () => {
    const list = ["\u0001x", "a\"b", "tab\there", "cr\rlf", "back\\slash"]
    const text = toText(OrderedRecord.from({ l: list, r: OrderedRecord.from({ s: "c:\\dir\f" }) }))
    const restored = fromText(text)
    const record = restored.get("r")

    expect(text.split("\n")[2]).toBe('l=["\\u0001x","a\\"b","tab\\there","cr\\rlf","back\\\\slash"]')
    expect(restored.get("l")).toEqual(list)
    expect(record instanceof OrderedRecord ? record.toObject() : undefined).toEqual({ s: "c:\\dir\f" })
  })

  it("writes vectors as plain lists", () => {
    const text = toText(OrderedRecord.from({ v: new NdArray([3], [1, 2, 3]) }))

    expect(text).toBe("# parameter list with 1 definitions\n\nv=[1,2,3]\n")
    expect(fromText(text).get("v")).toEqual([1, 2, 3])
  })

  it("skips comments and blank lines and trims around the separator", () => {
    const record = fromText('a = 2\n# comment\n\nb="x"\nc=')

    expect(record.entries()).toEqual([
      ["a", 2],
      ["b", "x"],
      ["c", null],
    ])
  })

  it("reports the line of a malformed entry", () => {
    expect(() => fromText("a=1\noops")).toThrow('<text>:2: expected name=value, got "oops"')
    expect(() => fromText("a=1 +", "params.txt")).toThrow(SerializationError)
  })
})

describe("files", () => {
  const directory = mkdtempSync(join(tmpdir(), "param-templates-"))
  afterAll(() => rmSync(directory, { recursive: true, force: true }))

  it.effect("writes and reads a record", () =>
    Effect.gen(function* () {
      const path = join(directory, "params.txt")
      yield* writeRecord(path, sample())

      expect(readFileSync(path, "utf8")).toBe(SAMPLE_TEXT)
      const restored = yield* readRecord(path)
      expect(restored.keys()).toEqual(sample().keys())
      expect(restored.get("b")).toBe("${a}+1")
    }),
  )

  it.effect("fails with the path when the file is missing", () =>
    Effect.gen(function* () {
      const path = join(directory, "missing.txt")
      const error = yield* readRecord(path).pipe(Effect.flip)

      expect(error._tag).toBe("SerializationError")
      expect(error.path).toBe(path)
      expect(error.line).toBe(0)
    }),
  )
})
