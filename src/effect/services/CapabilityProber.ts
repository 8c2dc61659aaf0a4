/**
 * CapabilityProber service - asks the terminal whether it implements the
 * Kitty keyboard protocol and which enhancement flags it has enabled.
 *
 * Replies are validated byte for byte against `ESC [ ? flags u`; nothing is
 * trimmed. Probes run one at a time, and the support probe is answered once
 * per prober: an unanswered probe is not retried.
 */
import { Context, Effect, Layer, Option } from "effect"
import { AppConfig } from "../Config"
import { MalformedReplyError, TerminalUnresponsiveError } from "../errors"
import {
  bytesToString,
  decodeEnhancements,
  describeSequence,
  parseFlagsReply,
  type EnhancementFlags,
} from "../../terminal/kitty-keyboard"
import {
  ENABLED_FLAGS_QUERY,
  SUPPORT_QUERY,
  TerminalTransport,
  TransportReply,
} from "./TerminalTransport"

// =============================================================================
// Reply Classification
// =============================================================================

/** Whether a reply proves KKP support. Empty and Absent never do. */
export const replySupportsKkp = TransportReply.$match({
  Received: ({ bytes }) => Option.isSome(parseFlagsReply(bytes)),
  Empty: () => false,
  Absent: () => false,
})

// =============================================================================
// CapabilityProber Service
// =============================================================================

export class CapabilityProber extends Context.Tag("@termkeys/CapabilityProber")<
  CapabilityProber,
  {
    /** True only for an exact `ESC [ ? D{1,2} u` reply. Never fails. */
    readonly probeSupport: () => Effect.Effect<boolean>

    /** The terminal's current enhancement flags, read fresh on every call */
    readonly queryEnabledEnhancements: () => Effect.Effect<
      EnhancementFlags,
      TerminalUnresponsiveError | MalformedReplyError
    >
  }
>() {
  static readonly layer = Layer.effect(
    CapabilityProber,
    Effect.gen(function* () {
      const transport = yield* TerminalTransport
      const config = yield* AppConfig

      // Both probes read the same input stream; never let them interleave
      const lock = yield* Effect.makeSemaphore(1)

      const supportProbe = Effect.gen(function* () {
        const reply = yield* transport.request(SUPPORT_QUERY, config.probeTimeout)
        const supported = replySupportsKkp(reply)
        yield* Effect.logDebug("Keyboard protocol support probed").pipe(
          Effect.annotateLogs({ reply: reply._tag, supported })
        )
        return supported
      }).pipe(lock.withPermits(1))

      const cachedSupport = yield* Effect.cached(supportProbe)

      const probeSupport = Effect.fn("CapabilityProber.probeSupport")(function* () {
        return yield* cachedSupport
      })

      const queryEnabledEnhancements = Effect.fn("CapabilityProber.queryEnabledEnhancements")(
        function* () {
          const reply = yield* transport
            .request(ENABLED_FLAGS_QUERY, config.probeTimeout)
            .pipe(lock.withPermits(1))

          const query = describeSequence(ENABLED_FLAGS_QUERY.sequence)

          if (reply._tag === "Absent") {
            return yield* new TerminalUnresponsiveError({ query, reason: reply.reason })
          }

          const bytes = reply._tag === "Received" ? reply.bytes : new Uint8Array()
          const flags = parseFlagsReply(bytes)
          if (Option.isNone(flags)) {
            return yield* new MalformedReplyError({
              query,
              reply: describeSequence(bytesToString(bytes)),
            })
          }

          yield* Effect.logDebug("Enabled enhancements read").pipe(
            Effect.annotateLogs({
              flags: flags.value,
              enhancements: decodeEnhancements(flags.value).join(","),
            })
          )
          return flags.value
        },
        Effect.tapError((error) => Effect.logWarning("Enhancement flags query failed", error))
      )

      return CapabilityProber.of({ probeSupport, queryEnabledEnhancements })
    })
  )

  /** Test layer - a terminal without keyboard protocol support */
  static readonly testLayer = Layer.succeed(CapabilityProber, {
    probeSupport: () => Effect.succeed(false),
    queryEnabledEnhancements: () =>
      Effect.fail(
        new TerminalUnresponsiveError({
          query: describeSequence(ENABLED_FLAGS_QUERY.sequence),
          reason: "test terminal",
        })
      ),
  })
}
