/**
 * Application configuration, read from the environment with Effect Config.
 *
 * TERMKEYS_PROBE_TIMEOUT_MS  wait for a capability reply (default 100)
 * TERMKEYS_ENHANCEMENTS      comma-separated enhancement names to request
 * TERMKEYS_PENDING_LIMIT     longest incomplete input sequence kept between chunks
 * TERMKEYS_LOG_LEVEL         minimum log level (default Info)
 */
import { Config, ConfigError, Context, Duration, Either, Layer, LogLevel } from "effect"
import {
  DEFAULT_PENDING_LIMIT,
  encodeEnhancements,
  parseEnhancementNames,
  type EnhancementFlags,
} from "../terminal/kitty-keyboard"

export const DEFAULT_PROBE_TIMEOUT_MS = 100
export const DEFAULT_ENHANCEMENTS = "disambiguate-escape-codes"

export interface AppConfigShape {
  /** How long a capability query waits for the terminal */
  readonly probeTimeout: Duration.Duration
  /** Flags pushed when the keyboard protocol is enabled */
  readonly requestedEnhancements: EnhancementFlags
  /** Longest incomplete sequence the input decoder holds back */
  readonly pendingLimit: number
  readonly logLevel: LogLevel.LogLevel
}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: "Expected a positive integer",
      validation: (value) => value > 0,
    })
  )

const enhancements = Config.string("TERMKEYS_ENHANCEMENTS").pipe(
  Config.withDefault(DEFAULT_ENHANCEMENTS),
  Config.mapOrFail((raw) =>
    Either.match(parseEnhancementNames(raw), {
      onLeft: (name) =>
        Either.left(
          ConfigError.InvalidData(["TERMKEYS_ENHANCEMENTS"], `Unknown enhancement "${name}"`)
        ),
      onRight: (names) => Either.right(encodeEnhancements(names)),
    })
  )
)

/** Config descriptor for the whole application configuration */
export const appConfig: Config.Config<AppConfigShape> = Config.all({
  probeTimeout: positiveInteger("TERMKEYS_PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS).pipe(
    Config.map(Duration.millis)
  ),
  requestedEnhancements: enhancements,
  pendingLimit: positiveInteger("TERMKEYS_PENDING_LIMIT", DEFAULT_PENDING_LIMIT),
  logLevel: Config.logLevel("TERMKEYS_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})

export class AppConfig extends Context.Tag("@termkeys/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - loads from the environment */
  static readonly layer = Layer.effect(AppConfig, appConfig)

  /** Test layer - fixed values, no environment access */
  static readonly testLayer = Layer.succeed(AppConfig, {
    probeTimeout: Duration.millis(DEFAULT_PROBE_TIMEOUT_MS),
    requestedEnhancements: encodeEnhancements(["disambiguate-escape-codes"]),
    pendingLimit: DEFAULT_PENDING_LIMIT,
    logLevel: LogLevel.Info,
  })

  /** Layer with explicit values */
  static readonly fromValues = (config: AppConfigShape) => Layer.succeed(AppConfig, config)
}
