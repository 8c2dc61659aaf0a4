/**
 * Constants for the Kitty keyboard protocol
 * See: https://sw.kovidgoyal.net/kitty/keyboard-protocol/
 */

// =============================================================================
// Escape Sequence Building Blocks
// =============================================================================

export const ESC = '\x1b';
export const CSI = `${ESC}[`;

// =============================================================================
// Progressive Enhancement Queries
// =============================================================================

/** Query the currently enabled enhancement flags (also used as the support probe) */
export const KITTY_KEYBOARD_QUERY = `${CSI}?u`;

/** Prefix of the terminal's reply to KITTY_KEYBOARD_QUERY */
export const KITTY_KEYBOARD_REPLY_PREFIX = `${CSI}?`;

/** Final byte of both the query and its reply */
export const KITTY_KEYBOARD_REPLY_SUFFIX = 'u';

/** Digits allowed in a flags reply */
export const KITTY_KEYBOARD_REPLY_MIN_DIGITS = 1;
export const KITTY_KEYBOARD_REPLY_MAX_DIGITS = 2;

// =============================================================================
// Key Report Terminators
// =============================================================================

export const UNICODE_TERMINATOR = 'u';
export const LEGACY_FUNCTION_TERMINATOR = '~';

// =============================================================================
// Field Separators
// =============================================================================

export const FIELD_SEPARATOR = ';';
export const SUBFIELD_SEPARATOR = ':';

// =============================================================================
// Input Buffering
// =============================================================================

/** Default upper bound for an incomplete sequence held between input chunks */
export const DEFAULT_PENDING_LIMIT = 8192;
