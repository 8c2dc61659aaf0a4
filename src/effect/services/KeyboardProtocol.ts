/**
 * KeyboardProtocol service
 * Turns the Kitty keyboard protocol on and off for the session, pushing
 * enhancement flags only when the terminal has proven it understands them.
 */

import { Context, Effect, Layer, Option, Ref, Scope } from "effect"
import { AppConfig } from "../Config"
import type { TransportError } from "../errors"
import {
  popEnhancementsSequence,
  pushEnhancementsSequence,
  type EnhancementFlags,
} from "../../terminal/kitty-keyboard"
import { CapabilityProber } from "./CapabilityProber"
import { TerminalTransport } from "./TerminalTransport"

// =============================================================================
// Types
// =============================================================================

export interface KeyboardProtocolStatus {
  /** Terminal answered the support probe */
  readonly supported: boolean
  /** This service has flags pushed on the terminal's stack */
  readonly active: boolean
  /** Flags most recently pushed (or configured, before the first push) */
  readonly requested: EnhancementFlags
  /** Stack entries this service owns */
  readonly pushed: number
  /** Live flags from the terminal while active */
  readonly enabled: Option.Option<EnhancementFlags>
}

// =============================================================================
// Service Definition
// =============================================================================

export class KeyboardProtocol extends Context.Tag("@termkeys/KeyboardProtocol")<
  KeyboardProtocol,
  {
    /**
     * Push `flags` (default: configured enhancements) if the terminal
     * supports the protocol. Returns whether anything was pushed.
     */
    readonly enable: (flags?: EnhancementFlags) => Effect.Effect<boolean, TransportError>

    /** Pop every entry this service pushed */
    readonly disable: () => Effect.Effect<void, TransportError>

    readonly status: () => Effect.Effect<KeyboardProtocolStatus>

    /** enable() now, disable() when the scope closes */
    readonly scoped: (
      flags?: EnhancementFlags
    ) => Effect.Effect<boolean, TransportError, Scope.Scope>
  }
>() {
  static readonly layer = Layer.effect(
    KeyboardProtocol,
    Effect.gen(function* () {
      const prober = yield* CapabilityProber
      const transport = yield* TerminalTransport
      const config = yield* AppConfig

      const pushedRef = yield* Ref.make(0)
      const requestedRef = yield* Ref.make(config.requestedEnhancements)

      const enable = Effect.fn("KeyboardProtocol.enable")(function* (flags?: EnhancementFlags) {
        const requested = flags ?? config.requestedEnhancements
        const supported = yield* prober.probeSupport()
        if (!supported) {
          yield* Effect.logInfo("Keyboard protocol not supported; leaving legacy input")
          return false
        }

        yield* transport.send(pushEnhancementsSequence(requested))
        yield* Ref.update(pushedRef, (count) => count + 1)
        yield* Ref.set(requestedRef, requested)
        yield* Effect.logDebug("Keyboard protocol enabled").pipe(
          Effect.annotateLogs({ flags: requested })
        )
        return true
      })

      const disable = Effect.fn("KeyboardProtocol.disable")(function* () {
        const pushed = yield* Ref.get(pushedRef)
        if (pushed === 0) {
          return
        }
        yield* transport.send(popEnhancementsSequence(pushed))
        yield* Ref.set(pushedRef, 0)
        yield* Effect.logDebug("Keyboard protocol disabled").pipe(
          Effect.annotateLogs({ popped: pushed })
        )
      })

      const status = Effect.fn("KeyboardProtocol.status")(function* () {
        const supported = yield* prober.probeSupport()
        const pushed = yield* Ref.get(pushedRef)
        const requested = yield* Ref.get(requestedRef)
        const enabled =
          pushed > 0
            ? yield* prober.queryEnabledEnhancements().pipe(
                Effect.tapError((error) => Effect.logWarning("Could not read enabled flags", error)),
                Effect.option
              )
            : Option.none<EnhancementFlags>()
        return { supported, active: pushed > 0, requested, pushed, enabled }
      })

      const scoped = (flags?: EnhancementFlags) =>
        Effect.acquireRelease(enable(flags), (enabled) =>
          enabled
            ? disable().pipe(
                Effect.catchAll((error) =>
                  Effect.logWarning("Failed to restore keyboard mode", error)
                )
              )
            : Effect.void
        )

      return KeyboardProtocol.of({ enable, disable, status, scoped })
    })
  )
}
