/**
 * Tests for ReplyFramer.
 */
import { Option } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { ReplyFramer } from "../../../../src/effect/services/transport/reply-framer"
import { bytesToString, stringToBytes } from "../../../../src/terminal/kitty-keyboard"

const framed = (frame: Option.Option<Uint8Array>) => Option.getOrNull(Option.map(frame, bytesToString))

describe("ReplyFramer", () => {
  it("waits for the final byte of a CSI reply", () => {
    const framer = new ReplyFramer()

    expect(framed(framer.push(stringToBytes("\x1b[?1")))).toBeNull()
    expect(framer.isEmpty).toBe(false)
    expect(framed(framer.push(stringToBytes("u")))).toBe("\x1b[?1u")
    expect(framer.isEmpty).toBe(true)
  })

  it("keeps stray bytes in the frame", () => {
    const framer = new ReplyFramer()
    expect(framed(framer.push(stringToBytes("xx\x1b[?0u")))).toBe("xx\x1b[?0u")
  })

  it("ends a sequence at a byte that cannot continue it", () => {
    const framer = new ReplyFramer()
    expect(framed(framer.push(stringToBytes("\x1b[1\x07")))).toBe("\x1b[1\x07")
  })

  it("does not treat a lone ESC as a reply", () => {
    const framer = new ReplyFramer()
    expect(framed(framer.push(stringToBytes("\x1b")))).toBeNull()
    expect(framed(framer.push(stringToBytes("O")))).toBeNull()
  })

  it("hands over the buffer once it reaches the limit", () => {
    const framer = new ReplyFramer(4)
    expect(framed(framer.push(stringToBytes("abc")))).toBeNull()
    expect(framed(framer.push(stringToBytes("d")))).toBe("abcd")
    expect(framer.isEmpty).toBe(true)
  })
})
