import { describe, expect, it } from "@effect/vitest"
import { Effect, Exit, HashMap, Layer, Logger, LogLevel, Option } from "effect"
import { ErrorMarker, OrderingFailureError } from "../src/Errors.js"
import { evaluate } from "../src/Evaluator.js"
import { OrderedRecord } from "../src/OrderedRecord.js"
import { applyOrder, planOrder, sortDefinitions } from "../src/Resolver.js"

interface CapturedLog {
  readonly level: string
  readonly message: string
  readonly module: Option.Option<unknown>
}

const captureLogs = (): { readonly logs: Array<CapturedLog>; readonly layer: Layer.Layer<never> } => {
  const logs: Array<CapturedLog> = []
  const logger = Logger.make(({ annotations, logLevel, message }) => {
    logs.push({
      level: logLevel.label,
      message: Array.isArray(message) ? message.map(String).join(" ") : String(message),
      module: HashMap.get(annotations, "module"),
    })
  })
  return { logs, layer: Logger.replace(Logger.defaultLogger, logger) }
}

describe("planOrder", () => {
  it("keeps static fields first and moves expressions after their references", () => {
    const plan = planOrder(OrderedRecord.from({ b: "${a}+1", a: 1 }))

    expect(plan).toEqual({ order: ["a", "b"], forced: [], stalled: 0 })
  })

  it("prefers the leftmost ready expression", () => {
    const plan = planOrder(OrderedRecord.from({ x: "${y}+1", z: "${w}", y: 2, w: 3 }))

    expect(plan.order).toEqual(["y", "w", "x", "z"])
  })

  it("forces the leftmost pending field when nothing is ready", () => {
    const plan = planOrder(OrderedRecord.from({ a: "${b}", b: "${a}", c: 1 }))

    expect(plan).toEqual({ order: ["c", "a", "b"], forced: ["a"], stalled: 2 })
  })
})

describe("applyOrder", () => {
  it("returns a reordered copy", () => {
    const record = OrderedRecord.from({ a: 1, b: 2 })
    const reordered = applyOrder(record, ["b", "a"])

    expect(reordered.keys()).toEqual(["b", "a"])
    expect(record.keys()).toEqual(["a", "b"])
  })
})

describe("sortDefinitions", () => {
  it.effect("fails in strict mode when a reference is never defined", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(sortDefinitions(OrderedRecord.from({ b: "${a}" }), { strict: true }))

      expect(Exit.isFailure(exit)).toBe(true)
      const error = yield* sortDefinitions(OrderedRecord.from({ b: "${a}" }), { strict: true }).pipe(Effect.flip)
      expect(error).toBeInstanceOf(OrderingFailureError)
      expect(error.message).toBe("could not order 1/1 expressions")
      expect(error.names).toEqual(["b"])
    }),
  )

  it.effect("logs one warning and keeps going in lenient mode", () =>
    Effect.gen(function* () {
      const { layer, logs } = captureLogs()
      const sorted = yield* sortDefinitions(OrderedRecord.from({ b: "${a}" })).pipe(
        Effect.provide(layer),
        Logger.withMinimumLogLevel(LogLevel.Debug),
      )

      expect(sorted.keys()).toEqual(["b"])
      const value = evaluate(sorted).get("b")
      expect(value instanceof ErrorMarker ? value.missing : undefined).toBe("a")
      expect(logs).toEqual([
        { level: "WARN", message: "could not order 1/1 expressions", module: Option.some("Resolver") },
      ])
    }),
  )

  it.effect("reports cycles against the record size", () =>
    Effect.gen(function* () {
      const error = yield* sortDefinitions(OrderedRecord.from({ a: "${b}", b: "${a}", c: 1 }), {
        strict: true,
      }).pipe(Effect.flip)

      expect(error.message).toBe("could not order 2/3 expressions")
    }),
  )

  it.effect("logs nothing for an orderable record", () =>
    Effect.gen(function* () {
      const { layer, logs } = captureLogs()
      const sorted = yield* sortDefinitions(OrderedRecord.from({ c: "${a}*${b}", b: "${a}+1", a: 1 })).pipe(
        Effect.provide(layer),
      )

      expect(sorted.keys()).toEqual(["a", "b", "c"])
      expect(evaluate(sorted).get("c")).toBe(2)
      expect(logs).toEqual([])
    }),
  )
})
