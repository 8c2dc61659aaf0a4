/**
 * Frames a capability reply out of raw terminal input.
 *
 * Bytes arrive in arbitrary chunks. A frame is complete once a CSI sequence
 * (`ESC [`, parameter bytes, final byte) has fully arrived. The frame is the
 * whole buffer, stray bytes included: validating its shape is the caller's job.
 */
import { Option } from "effect"

const ESC = 0x1b
const LEFT_BRACKET = 0x5b

/** Frames never grow past this; an overflowing buffer is handed over as is */
export const DEFAULT_REPLY_LIMIT = 64

export class ReplyFramer {
  private buffer: number[] = []

  constructor(private readonly limit: number = DEFAULT_REPLY_LIMIT) {}

  /** Add a chunk; returns the frame once complete (and resets) */
  push(chunk: Uint8Array): Option.Option<Uint8Array> {
    for (const byte of chunk) {
      this.buffer.push(byte)
    }
    if (this.hasCompleteCsi() || this.buffer.length >= this.limit) {
      return Option.some(this.take())
    }
    return Option.none()
  }

  get isEmpty(): boolean {
    return this.buffer.length === 0
  }

  private take(): Uint8Array {
    const frame = Uint8Array.from(this.buffer)
    this.buffer = []
    return frame
  }

  private hasCompleteCsi(): boolean {
    const bytes = this.buffer
    for (let start = 0; start < bytes.length - 1; start++) {
      if (bytes[start] !== ESC || bytes[start + 1] !== LEFT_BRACKET) continue
      for (let i = start + 2; i < bytes.length; i++) {
        const byte = bytes[i]
        if (byte >= 0x20 && byte <= 0x3f) continue
        // Final byte, or a byte that cannot be part of a CSI: either way the sequence is over
        return true
      }
    }
    return false
  }
}
