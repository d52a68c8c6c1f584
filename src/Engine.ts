/**
 * Effect service bundling evaluation, formatting and ordering behind the
 * current {@link EngineConfig}.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect"
import { EngineConfig, type EngineSettings } from "./Config.js"
import { describe } from "./Display.js"
import { EngineTypeId, type OrderingFailureError } from "./Errors.js"
import { type EngineOptions, type Snapshot, evaluate, format, formatEval } from "./Evaluator.js"
import type { OrderedRecord } from "./OrderedRecord.js"
import { sortDefinitions } from "./Resolver.js"
import type { RecordKind } from "./Types.js"

const engineIdentifier = Symbol.keyFor(EngineTypeId) ?? "effect-param-templates/ParamEngine"

/**
 * @category Services
 * @since 0.1.0
 */
export interface ParamEngineService {
  readonly settings: EngineSettings
  readonly evaluate: (record: OrderedRecord) => Effect.Effect<Snapshot>
  readonly format: (template: string, record: OrderedRecord) => Effect.Effect<string>
  readonly formatEval: (template: string, record: OrderedRecord) => Effect.Effect<string>
  readonly sort: (record: OrderedRecord) => Effect.Effect<OrderedRecord, OrderingFailureError>
  /** Sorts, then evaluates the sorted record. */
  readonly evaluateSorted: (record: OrderedRecord) => Effect.Effect<Snapshot, OrderingFailureError>
  readonly describe: (record: OrderedRecord, kind?: RecordKind) => Effect.Effect<string>
}

const logMarkers = (snapshot: Snapshot): Effect.Effect<void> =>
  Effect.forEach(
    snapshot.errors(),
    ([name, marker]) => Effect.logDebug(`${name}: ${marker.toString()}`),
    { discard: true },
  ).pipe(Effect.annotateLogs({ module: "Evaluator" }))

/**
 * Builds the service for fixed settings.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeParamEngine = (settings: EngineSettings): ParamEngineService => {
  const options: EngineOptions = {
    strictArithmetic: settings.strictArithmetic,
    rangeLimit: settings.rangeLimit,
  }

  const evaluateRecord = (record: OrderedRecord): Effect.Effect<Snapshot> =>
    Effect.gen(function* () {
      const snapshot = evaluate(record, options)
      if (settings.debug) {
        yield* logMarkers(snapshot)
      }
      return snapshot
    })

  const sort = (record: OrderedRecord) => sortDefinitions(record, { strict: settings.strictOrdering })

  return {
    settings,
    evaluate: evaluateRecord,
    format: (template, record) => Effect.sync(() => format(template, record)),
    formatEval: (template, record) => Effect.sync(() => formatEval(template, record, options)),
    sort,
    evaluateSorted: (record) => Effect.flatMap(sort(record), evaluateRecord),
    describe: (record, kind = "parameters") =>
      Effect.map(evaluateRecord(record), (snapshot) =>
        describe(record, snapshot, { precision: settings.precision, kind }),
      ),
  }
}

/**
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const engine = yield* ParamEngine
 *   return yield* engine.evaluateSorted(OrderedRecord.from({ b: "${a}*2", a: 3 }))
 * })
 * const snapshot = Effect.runSync(program.pipe(Effect.provide(ParamEngine.Default)))
 * snapshot.get("b") // 6
 * ```
 */
export class ParamEngine extends Context.Tag(engineIdentifier)<ParamEngine, ParamEngineService>() {
  /** Engine reading its settings from {@link EngineConfig}. */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* EngineConfig
      return makeParamEngine(settings)
    }),
  )

  static readonly Default = Layer.provide(this.layer, EngineConfig.Default)
}
