/**
 * Tagged errors for terminal negotiation.
 * Discriminate with Effect.catchTag("TerminalUnresponsiveError", ...).
 */
import { Schema } from "effect"

// =============================================================================
// Capability Query Errors
// =============================================================================

/** The transport reported no reply at all to a flags query */
export class TerminalUnresponsiveError extends Schema.TaggedError<TerminalUnresponsiveError>()(
  "TerminalUnresponsiveError",
  {
    query: Schema.String,
    reason: Schema.String,
  }
) {}

/** A reply arrived but is not exactly `ESC [ ? flags u` */
export class MalformedReplyError extends Schema.TaggedError<MalformedReplyError>()(
  "MalformedReplyError",
  {
    query: Schema.String,
    /** Reply with control characters made visible */
    reply: Schema.String,
  }
) {}

// =============================================================================
// Transport Errors
// =============================================================================

/** Writing to the terminal failed */
export class TransportError extends Schema.TaggedError<TransportError>()(
  "TransportError",
  {
    operation: Schema.String,
    cause: Schema.Defect,
  }
) {}
