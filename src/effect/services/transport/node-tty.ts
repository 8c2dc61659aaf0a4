/**
 * TerminalTransport over Node streams (process.stdin / process.stdout).
 *
 * A request writes the query, switches the input to raw mode and listens
 * until one reply frame is complete, the input ends, or the timeout elapses.
 * Raw mode, listeners and the flowing state are restored afterwards, also
 * when the request is interrupted.
 */
import { Duration, Effect, Option, identity } from "effect"
import { TransportError } from "../../errors"
import { ReplyFramer, DEFAULT_REPLY_LIMIT } from "./reply-framer"
import { TransportReply, type Query, type TerminalTransportShape } from "./types"

/** The subset of tty.ReadStream the transport relies on */
export interface TtyInput extends NodeJS.ReadableStream {
  readonly isTTY?: boolean
  readonly isRaw?: boolean
  readonly readableFlowing?: boolean | null
  readonly readableEncoding?: BufferEncoding | null
  setRawMode?(mode: boolean): unknown
}

export interface TtyStreams {
  readonly input: TtyInput
  readonly output: NodeJS.WritableStream
  /** Longest reply frame collected before giving up on it */
  readonly replyLimit?: number
}

/**
 * Write `data` and report the outcome once. A failed write reaches both the
 * callback and an 'error' event, so the listener stays attached until the
 * write has succeeded or the event has fired.
 */
function writeChecked(
  output: NodeJS.WritableStream,
  data: string,
  done: (error: Error | undefined) => void
): void {
  let reported = false
  const report = (error: Error | undefined) => {
    if (reported) return
    reported = true
    done(error)
  }
  const onError = (error: Error) => report(error)

  output.once("error", onError)
  output.write(data, (error?: Error | null) => {
    if (!error) output.removeListener("error", onError)
    report(error ?? undefined)
  })
}

export function makeTtyTransport(streams: TtyStreams): TerminalTransportShape {
  const { input, output } = streams
  const replyLimit = streams.replyLimit ?? DEFAULT_REPLY_LIMIT

  // String chunks are turned back into the bytes they were decoded from
  const chunkToBytes = (chunk: string | Buffer): Uint8Array =>
    typeof chunk === "string" ? Buffer.from(chunk, input.readableEncoding ?? "latin1") : chunk

  const awaitReply = (query: Query) =>
    Effect.async<TransportReply>((resume) => {
      if (input.isTTY !== true) {
        resume(Effect.succeed(TransportReply.Absent({ reason: "input is not a terminal" })))
        return
      }

      const framer = new ReplyFramer(replyLimit)
      const wasRaw = input.isRaw === true
      const wasFlowing = input.readableFlowing === true
      let settled = false

      const cleanup = () => {
        input.removeListener("data", onData)
        input.removeListener("end", onEnd)
        input.removeListener("error", onError)
        if (!wasRaw) input.setRawMode?.(false)
        if (!wasFlowing) input.pause()
      }

      const settle = (reply: TransportReply) => {
        if (settled) return
        settled = true
        cleanup()
        resume(Effect.succeed(reply))
      }

      function onData(chunk: string | Buffer) {
        const frame = framer.push(chunkToBytes(chunk))
        if (Option.isSome(frame)) {
          settle(TransportReply.Received({ bytes: frame.value }))
        }
      }

      function onEnd() {
        settle(
          framer.isEmpty
            ? TransportReply.Empty()
            : TransportReply.Absent({ reason: "input ended mid-reply" })
        )
      }

      function onError(error: Error) {
        settle(TransportReply.Absent({ reason: `input error: ${error.message}` }))
      }

      if (!wasRaw) input.setRawMode?.(true)
      input.on("data", onData)
      input.on("end", onEnd)
      input.on("error", onError)
      input.resume()

      writeChecked(output, query.sequence, (error) => {
        if (error) {
          settle(TransportReply.Absent({ reason: `write failed: ${error.message}` }))
        }
      })

      return Effect.sync(() => {
        if (!settled) {
          settled = true
          cleanup()
        }
      })
    })

  const request = (query: Query, timeout: Duration.DurationInput) =>
    awaitReply(query).pipe(
      Effect.timeoutTo({
        duration: timeout,
        onSuccess: identity,
        onTimeout: () => TransportReply.Absent({ reason: "timed out" }),
      })
    )

  const send = (data: string) =>
    Effect.async<void, TransportError>((resume) => {
      writeChecked(output, data, (error) => {
        resume(
          error
            ? Effect.fail(new TransportError({ operation: "send", cause: error }))
            : Effect.void
        )
      })
    })

  return { request, send }
}
