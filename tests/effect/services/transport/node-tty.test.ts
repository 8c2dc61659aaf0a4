/**
 * Tests for the Node stream transport, driven by in-process streams.
 */
import { Effect } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { PassThrough, Writable } from "node:stream"
import { makeTtyTransport } from "../../../../src/effect/services/transport/node-tty"
import { SUPPORT_QUERY, type TransportReply } from "../../../../src/effect/services/transport/types"
import { bytesToString } from "../../../../src/terminal/kitty-keyboard"

/** A PassThrough that looks like a terminal */
class FakeTty extends PassThrough {
  isTTY = true
  isRaw = false
  readonly rawModes: boolean[] = []

  setRawMode(mode: boolean): this {
    this.isRaw = mode
    this.rawModes.push(mode)
    return this
  }
}

/** Output stream that records writes and lets the test answer them */
function terminalOutput(onWrite: (data: string) => void = () => {}) {
  const written: string[] = []
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const data = chunk.toString("latin1")
      written.push(data)
      callback()
      onWrite(data)
    },
  })
  return { output, written }
}

/** Output stream whose every write fails */
function brokenOutput() {
  return new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback(new Error("EPIPE"))
    },
  })
}

const describeReply = (reply: TransportReply): string => {
  switch (reply._tag) {
    case "Received":
      return `Received ${JSON.stringify(bytesToString(reply.bytes))}`
    case "Empty":
      return "Empty"
    case "Absent":
      return `Absent ${reply.reason}`
  }
}

describe("makeTtyTransport", () => {
  describe("request", () => {
    it.live("returns the terminal's reply", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output, written } = terminalOutput(() => input.write("\x1b[?1u"))
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(describeReply(reply)).toBe('Received "\\u001b[?1u"')
        expect(written).toEqual(["\x1b[?u"])
      })
    )

    it.live("restores raw mode afterwards", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput(() => input.write("\x1b[?1u"))
        const transport = makeTtyTransport({ input, output })

        yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(input.rawModes).toEqual([true, false])
        expect(input.isRaw).toBe(false)
        expect(input.listenerCount("data")).toBe(0)
      })
    )

    it.live("leaves raw mode alone when it was already on", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        input.isRaw = true
        const { output } = terminalOutput(() => input.write("\x1b[?1u"))
        const transport = makeTtyTransport({ input, output })

        yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(input.rawModes).toEqual([])
      })
    )

    it.live("collects a reply that arrives in pieces", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput(() => {
          input.write("\x1b[")
          input.write("?3")
          input.write("1u")
        })
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(describeReply(reply)).toBe('Received "\\u001b[?31u"')
      })
    )

    it.live("pauses an input that was not flowing before", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput(() => input.write("\x1b[?1u"))
        const transport = makeTtyTransport({ input, output })

        expect(input.readableFlowing).toBeNull()
        yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(input.readableFlowing).toBe(false)
      })
    )

    it.live("leaves a flowing input flowing", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        input.resume()
        const { output } = terminalOutput(() => input.write("\x1b[?1u"))
        const transport = makeTtyTransport({ input, output })

        yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(input.readableFlowing).toBe(true)
      })
    )

    it.live("keeps the bytes of a reply read through an encoding", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        input.setEncoding("utf8")
        const { output } = terminalOutput(() => input.write(Buffer.from("é\x1b[?1u", "utf8")))
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(reply._tag).toBe("Received")
        if (reply._tag === "Received") {
          expect(Array.from(reply.bytes)).toEqual([0xc3, 0xa9, 0x1b, 0x5b, 0x3f, 0x31, 0x75])
        }
      })
    )

    it.live("is Absent when the query cannot be written", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const output = brokenOutput()
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")
        // The stream reports the failure as an 'error' event after the callback
        yield* Effect.sleep("20 millis")

        expect(describeReply(reply)).toBe("Absent write failed: EPIPE")
        expect(output.listenerCount("error")).toBe(0)
        expect(input.listenerCount("data")).toBe(0)
      })
    )

    it.live("is Absent when the terminal stays silent", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput()
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "20 millis")

        expect(describeReply(reply)).toBe("Absent timed out")
        expect(input.listenerCount("data")).toBe(0)
        expect(input.rawModes).toEqual([true, false])
      })
    )

    it.live("is Absent when input is not a terminal", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        input.isTTY = false
        const { output, written } = terminalOutput()
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(describeReply(reply)).toBe("Absent input is not a terminal")
        expect(written).toEqual([])
      })
    )

    it.live("is Empty when input ends without a byte", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput(() => input.end())
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(describeReply(reply)).toBe("Empty")
      })
    )

    it.live("is Absent when input ends mid-reply", () =>
      Effect.gen(function* () {
        const input = new FakeTty()
        const { output } = terminalOutput(() => input.end("\x1b[?"))
        const transport = makeTtyTransport({ input, output })

        const reply = yield* transport.request(SUPPORT_QUERY, "1 second")

        expect(describeReply(reply)).toBe("Absent input ended mid-reply")
      })
    )
  })

  describe("send", () => {
    it.live("writes control sequences", () =>
      Effect.gen(function* () {
        const { output, written } = terminalOutput()
        const transport = makeTtyTransport({ input: new FakeTty(), output })

        yield* transport.send("\x1b[>1u")

        expect(written).toEqual(["\x1b[>1u"])
      })
    )

    it.live("fails with TransportError when the write fails", () =>
      Effect.gen(function* () {
        const output = brokenOutput()
        const transport = makeTtyTransport({ input: new FakeTty(), output })

        const error = yield* Effect.flip(transport.send("\x1b[<1u"))
        yield* Effect.sleep("20 millis")

        expect(error._tag).toBe("TransportError")
        expect(error.operation).toBe("send")
        expect(error.cause).toBeInstanceOf(Error)
        expect(output.listenerCount("error")).toBe(0)
      })
    )
  })
})
