/**
 * Dependency ordering of record fields.
 *
 * Static fields keep their place at the front. Expression fields follow, each
 * placed as soon as every name it references is already placed; among the
 * ready fields the leftmost wins.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { OrderingFailureError } from "./Errors.js"
import { isExpression, scanReferences } from "./Grammar.js"
import { OrderedRecord } from "./OrderedRecord.js"

/**
 * Outcome of planning an order. `forced` lists the fields that were appended
 * although some of their references were never placed; `stalled` is the
 * number of expressions still pending when the first scan made no progress.
 *
 * @category Ordering
 * @since 0.1.0
 */
export interface OrderPlan {
  readonly order: ReadonlyArray<string>
  readonly forced: ReadonlyArray<string>
  readonly stalled: number
}

interface PendingField {
  readonly name: string
  readonly references: ReadonlyArray<string>
}

/**
 * Computes the evaluation order without touching the record. When no pending
 * field is ready the leftmost one is forced in and the scan resumes, so the
 * plan always covers every field.
 *
 * @category Ordering
 * @since 0.1.0
 */
export const planOrder = (record: OrderedRecord): OrderPlan => {
  const order: Array<string> = []
  const placed = new Set<string>()
  const forced: Array<string> = []
  const pending: Array<PendingField> = []
  let stalled = 0
  for (const [name, value] of record) {
    if (isExpression(value)) {
      pending.push({ name, references: scanReferences(value) })
    } else {
      order.push(name)
      placed.add(name)
    }
  }
  while (pending.length > 0) {
    const readyIndex = pending.findIndex((field) => field.references.every((name) => placed.has(name)))
    const index = readyIndex === -1 ? 0 : readyIndex
    const [next] = pending.splice(index, 1)
    if (!next) {
      break
    }
    if (readyIndex === -1) {
      stalled = stalled === 0 ? pending.length + 1 : stalled
      forced.push(next.name)
    }
    order.push(next.name)
    placed.add(next.name)
  }
  return { order, forced, stalled }
}

/**
 * @category Ordering
 * @since 0.1.0
 */
export interface SortOptions {
  readonly strict?: boolean
}

/**
 * Copy of `record` with its fields in the given order.
 *
 * @category Ordering
 * @since 0.1.0
 */
export const applyOrder = (record: OrderedRecord, order: ReadonlyArray<string>): OrderedRecord =>
  new OrderedRecord(order.map((name) => [name, record.get(name)] as const)).clone()

/**
 * Reorders a record so that every expression follows the fields it refers to.
 *
 * In strict mode a record that cannot be fully ordered fails with
 * {@link OrderingFailureError}. Otherwise the unorderable fields are forced
 * in one at a time and a single warning is logged for the call.
 *
 * @category Ordering
 * @since 0.1.0
 * @example
 * ```ts
 * const sorted = Effect.runSync(sortDefinitions(OrderedRecord.from({ b: "${a}+1", a: 1 })))
 * sorted.keys() // ["a", "b"]
 * ```
 */
export const sortDefinitions = (
  record: OrderedRecord,
  options: SortOptions = {},
): Effect.Effect<OrderedRecord, OrderingFailureError> =>
  Effect.gen(function* () {
    const plan = planOrder(record)
    if (plan.forced.length > 0) {
      const failure = new OrderingFailureError({
        pending: plan.stalled,
        total: record.length,
        names: plan.forced,
      })
      if (options.strict) {
        return yield* Effect.fail(failure)
      }
      yield* Effect.logWarning(failure.message).pipe(
        Effect.annotateLogs({ module: "Resolver", forced: plan.forced.join(",") }),
      )
    }
    return applyOrder(record, plan.order)
  })
