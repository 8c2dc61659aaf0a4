/**
 * Transport types shared by the TerminalTransport implementations
 */
import { Data, Duration, Effect } from "effect"
import type { TransportError } from "../../errors"
import { KITTY_KEYBOARD_QUERY } from "../../../terminal/kitty-keyboard"

// =============================================================================
// Queries
// =============================================================================

export type QueryKind = "support" | "enabled-flags"

export interface Query {
  readonly kind: QueryKind
  /** Bytes written to the terminal */
  readonly sequence: string
}

/** Does the terminal speak the keyboard protocol at all */
export const SUPPORT_QUERY: Query = { kind: "support", sequence: KITTY_KEYBOARD_QUERY }

/** Which enhancement flags are active right now */
export const ENABLED_FLAGS_QUERY: Query = { kind: "enabled-flags", sequence: KITTY_KEYBOARD_QUERY }

// =============================================================================
// Replies
// =============================================================================

/**
 * Outcome of one request. Empty (the wait ended with zero bytes) and Absent
 * (no reply / communication failure) are deliberately distinct.
 */
export type TransportReply = Data.TaggedEnum<{
  Received: { readonly bytes: Uint8Array }
  Empty: {}
  Absent: { readonly reason: string }
}>

export const TransportReply = Data.taggedEnum<TransportReply>()

/** Received for non-empty bytes, Empty otherwise */
export const replyFromBytes = (bytes: Uint8Array | ReadonlyArray<number>): TransportReply =>
  bytes.length === 0
    ? TransportReply.Empty()
    : TransportReply.Received({ bytes: Uint8Array.from(bytes) })

// =============================================================================
// Service Shape
// =============================================================================

export interface TerminalTransportShape {
  /** Send a query and wait up to `timeout` for its reply */
  readonly request: (
    query: Query,
    timeout: Duration.DurationInput
  ) => Effect.Effect<TransportReply>

  /** Write control sequences to the terminal */
  readonly send: (data: string) => Effect.Effect<void, TransportError>
}
