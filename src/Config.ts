/**
 * Engine configuration service.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"

/**
 * @category Configuration
 * @since 0.1.0
 */
export interface EngineSettings {
  /** Fail instead of warning when fields cannot be ordered. */
  readonly strictOrdering: boolean
  /** Turn text that fails arithmetic into an error marker. */
  readonly strictArithmetic: boolean
  readonly rangeLimit: number
  /** Significant digits used by `describe`. */
  readonly precision: number
  /** Log every error marker at debug level after evaluation. */
  readonly debug: boolean
}

/**
 * @category Configuration
 * @since 0.1.0
 */
export const DefaultEngineSettings: EngineSettings = {
  strictOrdering: false,
  strictArithmetic: false,
  rangeLimit: 100,
  precision: 4,
  debug: false,
}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (value) => value > 0 }),
    Config.withDefault(fallback),
  )

/**
 * Reads the settings from `PARAM_*` environment variables.
 *
 * @category Configuration
 * @since 0.1.0
 */
export const engineSettingsConfig: Config.Config<EngineSettings> = Config.all({
  strictOrdering: Config.boolean("PARAM_STRICT_ORDERING").pipe(Config.withDefault(DefaultEngineSettings.strictOrdering)),
  strictArithmetic: Config.boolean("PARAM_STRICT_ARITHMETIC").pipe(
    Config.withDefault(DefaultEngineSettings.strictArithmetic),
  ),
  rangeLimit: positiveInteger("PARAM_RANGE_LIMIT", DefaultEngineSettings.rangeLimit),
  precision: positiveInteger("PARAM_PRECISION", DefaultEngineSettings.precision),
  debug: Config.boolean("PARAM_DEBUG").pipe(Config.withDefault(DefaultEngineSettings.debug)),
})

/**
 * @category Configuration
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const config = yield* EngineConfig
 *   return config.rangeLimit
 * })
 * Effect.runSync(program.pipe(Effect.provide(EngineConfig.make({ rangeLimit: 10 })))) // 10
 * ```
 */
export class EngineConfig extends Context.Tag("effect-param-templates/EngineConfig")<
  EngineConfig,
  EngineSettings
>() {
  /** Settings from the environment, falling back to the defaults. */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      return yield* engineSettingsConfig
    }),
  )

  static readonly Default = Layer.succeed(this, DefaultEngineSettings)

  static make(overrides: Partial<EngineSettings> = {}) {
    return Layer.succeed(this, { ...DefaultEngineSettings, ...overrides })
  }
}
