import { describe, expect, it } from "@effect/vitest"
import {
  GrammarError,
  classify,
  convertArrayBody,
  convertArrayLiterals,
  dependencies,
  expandRange,
  expressionFlags,
  interpolate,
  isDefined,
  isExpression,
  protect,
  scanReferences,
  scanSegments,
  stripComment,
} from "../src/Grammar.js"
import { OrderedRecord } from "../src/OrderedRecord.js"

describe("stripComment", () => {
  it("drops trailing comments", () => {
    expect(stripComment("1+2 # three")).toBe("1+2")
  })

  it("keeps a leading hash", () => {
    expect(stripComment("# Title")).toBe("# Title")
    expect(stripComment("  # indented title")).toBe("  # indented title")
  })

  it("turns an escaped hash into a literal one", () => {
    expect(stripComment("color \\#ff0000")).toBe("color #ff0000")
  })

  it("works line by line", () => {
    expect(stripComment("x # c\n  # keep\ny")).toBe("x\n  # keep\ny")
  })
})

describe("scanSegments", () => {
  it("splits text, markers and escaped markers", () => {
    expect(scanSegments("a ${x} \\${y} @{z}")).toEqual([
      { _tag: "Text", text: "a " },
      { _tag: "Marker", sigil: "$", content: "x", raw: "${x}" },
      { _tag: "Text", text: " " },
      { _tag: "Escaped", raw: "${y}" },
      { _tag: "Text", text: " " },
      { _tag: "Marker", sigil: "@", content: "z", raw: "@{z}" },
    ])
  })

  it("leaves an unterminated marker as text", () => {
    expect(scanSegments("cost ${x")).toEqual([{ _tag: "Text", text: "cost ${x" }])
  })
})

describe("classify", () => {
  it("orders the prefixes", () => {
    expect(classify("   ")).toBe("empty")
    expect(classify("![1, 'a']")).toBe("literal-list")
    expect(classify("$hello")).toBe("literal")
    expect(classify("${a}+1")).toBe("expression")
    expect(classify("$[1 2]")).toBe("expression")
    expect(classify("3*4")).toBe("expression")
  })
})

describe("references", () => {
  it("collects unique names from live markers", () => {
    expect(scanReferences("${a}+${b[1]}*sqrt(${a})")).toEqual(["a", "b"])
  })

  it("skips builtins, members, strings and escaped markers", () => {
    expect(scanReferences("${a + sqrt(b)} ${m.T} ${'q'} \\${hidden}")).toEqual(["a", "b", "m"])
  })

  it("always treats a bare name as a reference", () => {
    expect(scanReferences("${pi}")).toEqual(["pi"])
  })

  it("detects expressions and defined names", () => {
    expect(isExpression("${a}")).toBe(true)
    expect(isExpression("\\${a}")).toBe(false)
    expect(isExpression("plain text")).toBe(false)
    expect(isExpression(3)).toBe(false)
    expect(isDefined("${a}+${b}", ["a"])).toBe(false)
    expect(isDefined("${a}+${b}", ["a", "b"])).toBe(true)
  })

  it("summarises a record", () => {
    const record = OrderedRecord.from({ a: 1, b: "${a}+1", c: "${b}*${a}" })

    expect(expressionFlags(record)).toEqual([
      ["a", false],
      ["b", true],
      ["c", true],
    ])
    expect([...dependencies(record).entries()]).toEqual([
      ["b", ["a"]],
      ["c", ["b", "a"]],
    ])
  })
})

describe("protect", () => {
  it("wraps bare names, longest first", () => {
    expect(protect("$a + $ab + ${a} + \\$a", ["a", "ab"])).toBe("${a} + ${ab} + ${a} + \\$a")
  })

  it("ignores names followed by more identifier characters", () => {
    expect(protect("$alpha", ["a"])).toBe("$alpha")
  })
})

describe("interpolate", () => {
  it("substitutes resolved markers and reports the rest", () => {
    const result = interpolate("x=${a}, y=${b}", (content, _sigil, raw) =>
      content === "a" ? { _tag: "Resolved", text: "1" } : { _tag: "Unresolved", raw, name: content },
    )

    expect(result.text).toBe("x=1, y=${b}")
    expect(result.escaped).toBe(false)
    expect(result.failures).toEqual([{ _tag: "Unresolved", raw: "${b}", name: "b" }])
  })

  it("consumes the escape without resolving", () => {
    const result = interpolate("\\${a}", () => ({ _tag: "Resolved", text: "never" }))

    expect(result.text).toBe("${a}")
    expect(result.escaped).toBe(true)
  })
})

describe("array literals", () => {
  it("renders rows as two-dimensional lists", () => {
    expect(convertArrayBody("1 2 3", 100)).toBe("[[1,2,3]]")
    expect(convertArrayBody("1;2;3", 100)).toBe("[[1],[2],[3]]")
    expect(convertArrayBody("1 2;3 4", 100)).toBe("[[1,2],[3,4]]")
    expect(convertArrayBody("1, 2, 3", 100)).toBe("[[1,2,3]]")
  })

  it("expands ranges", () => {
    expect(convertArrayBody("1:0.5:2", 100)).toBe("[[1,1.5,2]]")
    expect(convertArrayBody("1:3", 100)).toBe("[[1,2,3]]")
    expect(expandRange("0:0.1:0.3", 100)).toEqual(["0", "0.1", "0.2", "0.3"])
    expect(expandRange("3:1", 100)).toEqual([])
    expect(expandRange("x:1", 100)).toBeUndefined()
  })

  it("tells signs from binary operators", () => {
    expect(convertArrayBody("1 -2", 100)).toBe("[[1,-2]]")
    expect(convertArrayBody("1 - 2", 100)).toBe("[[1 - 2]]")
    expect(convertArrayBody("2 *3", 100)).toBe("[[2 *3]]")
  })

  it("nests bracket groups up to four levels", () => {
    expect(convertArrayBody("[1 2] [3 4]", 100)).toBe("[[1,2],[3,4]]")
    expect(convertArrayBody("[1 2;3 4] [5 6;7 8]", 100)).toBe("[[[1,2],[3,4]],[[5,6],[7,8]]]")
    expect(() => convertArrayBody("[[[[1]]]]", 100)).toThrow("array literals are limited to 4 dimensions")
  })

  it("keeps markers as elements", () => {
    expect(convertArrayLiterals("$[${a} ${b}]", 100)).toBe("[[${a},${b}]]")
  })

  it("rewrites every literal in a text", () => {
    expect(convertArrayLiterals("$[1 2]*2 + $[3 4]", 100)).toBe("[[1,2]]*2 + [[3,4]]")
    expect(convertArrayLiterals("\\$[1 2]", 100)).toBe("$[1 2]")
  })

  it("reports malformed literals", () => {
    expect(() => convertArrayLiterals("$[1 2", 100)).toThrow(GrammarError)
    expect(() => convertArrayLiterals("$[1 2", 100)).toThrow("unmatched or improperly formatted brackets")
    expect(() => convertArrayBody("1 ]", 100)).toThrow("unmatched ']' in array literal")
    expect(() => convertArrayBody("1:0:3", 100)).toThrow("range 1:0:3: step cannot be zero")
    expect(() => convertArrayBody("1:200", 100)).toThrow("range 1:200 expands to more than 100 elements")
  })
})
