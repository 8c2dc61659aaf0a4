/**
 * Layer composition and runtime for applications embedding termkeys.
 */
import { ConfigError, Effect, Layer, Logger, ManagedRuntime } from "effect"
import { AppConfig } from "./Config"
import { CapabilityProber, KeyboardProtocol, TerminalTransport } from "./services"

/** Minimum log level taken from the configuration */
export const LoggingLive = Layer.unwrapEffect(
  Effect.map(AppConfig, (config) => Logger.minimumLogLevel(config.logLevel))
)

/**
 * All services over the given transport (default: the process's terminal)
 * with configuration from the environment.
 */
export const makeAppLayer = (
  transport: Layer.Layer<TerminalTransport> = TerminalTransport.layer,
  config: Layer.Layer<AppConfig, ConfigError.ConfigError> = AppConfig.layer
) =>
  KeyboardProtocol.layer.pipe(
    Layer.provideMerge(CapabilityProber.layer),
    Layer.provideMerge(LoggingLive),
    Layer.provideMerge(Layer.merge(transport, config))
  )

export const makeRuntime = (transport?: Layer.Layer<TerminalTransport>) =>
  ManagedRuntime.make(makeAppLayer(transport))
