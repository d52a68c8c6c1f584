import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as FastCheck from "effect/FastCheck"
import { evaluate } from "../src/Evaluator.js"
import { OrderedRecord } from "../src/OrderedRecord.js"
import { sortDefinitions } from "../src/Resolver.js"

const names = FastCheck.constantFrom("a", "b", "c", "d", "e", "f")

const recordArbitrary = FastCheck.dictionary(names, FastCheck.integer({ min: -1_000, max: 1_000 })).map((fields) =>
  OrderedRecord.from(fields),
)

const chainArbitrary = FastCheck.array(FastCheck.integer({ min: -100, max: 100 }), { minLength: 1, maxLength: 6 }).chain(
  (steps) =>
    FastCheck.shuffledSubarray(
      steps.map((_, index) => index),
      { minLength: steps.length, maxLength: steps.length },
    ).map((order) => ({ steps, order })),
)

describe("record properties", () => {
  it("concatenation keeps left order and takes right values", () => {
    FastCheck.assert(
      FastCheck.property(recordArbitrary, recordArbitrary, (left, right) => {
        const combined = left.concat(right)
        const union = new Set([...left.keys(), ...right.keys()])

        expect(combined.length).toBe(union.size)
        expect(combined.keys().slice(0, left.length)).toEqual(left.keys())
        for (const [name, value] of right) {
          expect(combined.get(name)).toBe(value)
        }
      }),
      { numRuns: 100 },
    )
  })

  it("difference removes exactly the right-hand names", () => {
    FastCheck.assert(
      FastCheck.property(recordArbitrary, recordArbitrary, (left, right) => {
        const remaining = left.difference(right)

        expect(remaining.keys()).toEqual(left.keys().filter((name) => !right.has(name)))
      }),
      { numRuns: 100 },
    )
  })

  it("evaluating a record without expressions changes nothing", () => {
    FastCheck.assert(
      FastCheck.property(recordArbitrary, (record) => {
        expect(evaluate(record).entries()).toEqual(record.entries())
      }),
      { numRuns: 100 },
    )
  })
})

describe("ordering properties", () => {
  it.effect("sorted evaluation does not depend on declaration order", () =>
    Effect.sync(() =>
      FastCheck.assert(
        FastCheck.property(chainArbitrary, ({ order, steps }) => {
          const fields = steps.map((step, index) =>
            index === 0 ? (["x0", step] as const) : ([`x${index}`, `\${x${index - 1}}+${step}`] as const),
          )
          const shuffled = new OrderedRecord(order.flatMap((index) => fields.slice(index, index + 1)))
          const snapshot = evaluate(Effect.runSync(sortDefinitions(shuffled, { strict: true })))

          let total = 0
          steps.forEach((step, index) => {
            total += step
            expect(snapshot.get(`x${index}`)).toBe(total)
          })
        }),
        { numRuns: 50 },
      ),
    ),
  )
})
