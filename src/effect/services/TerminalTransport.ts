/**
 * TerminalTransport service - the single boundary through which the
 * library talks to a real terminal. Capability probing depends on it as an
 * injected service, so tests can script any reply a terminal might give.
 */
import { Context, Effect, Layer, Ref } from "effect"
import { makeTtyTransport, type TtyStreams } from "./transport/node-tty"
import {
  TransportReply,
  type Query,
  type TerminalTransportShape,
} from "./transport/types"

export {
  TransportReply,
  replyFromBytes,
  SUPPORT_QUERY,
  ENABLED_FLAGS_QUERY,
} from "./transport/types"
export type { Query, QueryKind, TerminalTransportShape } from "./transport/types"
export type { TtyInput, TtyStreams } from "./transport/node-tty"

/** What a scripted transport was asked to do, in order */
export interface TransportLog {
  readonly requests: Query[]
  readonly sent: string[]
}

// =============================================================================
// TerminalTransport Service
// =============================================================================

export class TerminalTransport extends Context.Tag("@termkeys/TerminalTransport")<
  TerminalTransport,
  TerminalTransportShape
>() {
  /** Production layer - the process's own terminal */
  static readonly layer = Layer.sync(TerminalTransport, () =>
    makeTtyTransport({ input: process.stdin, output: process.stdout })
  )

  /** Layer over explicit streams (a pty, a socket pair, ...) */
  static readonly fromStreams = (streams: TtyStreams) =>
    Layer.sync(TerminalTransport, () => makeTtyTransport(streams))

  /**
   * Replies are handed out in order, one per request; once they run out every
   * request gets Absent. Requests and sent data are recorded in `log`.
   */
  static readonly scripted = (
    replies: ReadonlyArray<TransportReply>,
    log: TransportLog = { requests: [], sent: [] }
  ) =>
    Layer.effect(
      TerminalTransport,
      Effect.gen(function* () {
        const remaining = yield* Ref.make<ReadonlyArray<TransportReply>>(replies)

        const request = Effect.fn("TerminalTransport.request")(function* (query: Query) {
          log.requests.push(query)
          const [next, ...rest] = yield* Ref.get(remaining)
          yield* Ref.set(remaining, rest)
          return next ?? TransportReply.Absent({ reason: "no scripted reply" })
        })

        const send = Effect.fn("TerminalTransport.send")(function* (data: string) {
          log.sent.push(data)
        })

        return TerminalTransport.of({ request, send })
      })
    )

  /** Test layer - a terminal that never answers */
  static readonly testLayer = TerminalTransport.scripted([])
}
