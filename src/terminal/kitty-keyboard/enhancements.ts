/**
 * Progressive enhancement flags: bit codec, control sequences and the
 * strict parser for the terminal's `CSI ? flags u` reply.
 */

import { Either, Option } from 'effect';
import {
  CSI,
  KITTY_KEYBOARD_REPLY_MAX_DIGITS,
  KITTY_KEYBOARD_REPLY_MIN_DIGITS,
  KITTY_KEYBOARD_REPLY_PREFIX,
  KITTY_KEYBOARD_REPLY_SUFFIX,
} from './constants';
import { ENHANCEMENT_NAMES, EnhancementFlags, type EnhancementName } from './types';
import { bytesToString } from './bytes';

// =============================================================================
// Bit Codec
// =============================================================================

export const ENHANCEMENT_BITS: Readonly<Record<EnhancementName, number>> = {
  'disambiguate-escape-codes': 0b1,
  'report-event-types': 0b10,
  'report-alternate-keys': 0b100,
  'report-all-keys-as-escape-codes': 0b1000,
  'report-associated-text': 0b10000,
};

export function encodeEnhancements(names: Iterable<EnhancementName>): EnhancementFlags {
  let flags = 0;
  for (const name of names) {
    flags |= ENHANCEMENT_BITS[name];
  }
  return EnhancementFlags.make(flags);
}

/** Names of the bits set in `flags`, in bit order. Unknown bits are ignored. */
export function decodeEnhancements(flags: number): EnhancementName[] {
  return ENHANCEMENT_NAMES.filter((name) => (flags & ENHANCEMENT_BITS[name]) !== 0);
}

function isEnhancementName(value: string): value is EnhancementName {
  return (ENHANCEMENT_NAMES as ReadonlyArray<string>).includes(value);
}

/**
 * Parse a comma-separated list of enhancement names (e.g. from the environment).
 * Blank entries are skipped; the first unknown name is returned as the error.
 */
export function parseEnhancementNames(raw: string): Either.Either<EnhancementName[], string> {
  const names: EnhancementName[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (name.length === 0) continue;
    if (!isEnhancementName(name)) {
      return Either.left(name);
    }
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return Either.right(names);
}

// =============================================================================
// Control Sequences
// =============================================================================

export type EnhancementSetMode = 'replace' | 'merge' | 'clear';

const SET_MODE_CODES: Readonly<Record<EnhancementSetMode, number>> = {
  replace: 1,
  merge: 2,
  clear: 3,
};

/** Push flags onto the terminal's enhancement stack: CSI > flags u */
export function pushEnhancementsSequence(flags: EnhancementFlags): string {
  return `${CSI}>${flags}u`;
}

/** Pop entries off the terminal's enhancement stack: CSI < count u */
export function popEnhancementsSequence(count: number = 1): string {
  return `${CSI}<${Math.max(1, Math.trunc(count))}u`;
}

/** Alter the current stack entry in place: CSI = flags ; mode u */
export function setEnhancementsSequence(
  flags: EnhancementFlags,
  mode: EnhancementSetMode = 'replace'
): string {
  return `${CSI}=${flags};${SET_MODE_CODES[mode]}u`;
}

// =============================================================================
// Reply Parsing
// =============================================================================

function isAsciiDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

/**
 * Parse a reply to the flags query. The whole reply must be exactly
 * `ESC [ ? D u` or `ESC [ ? D D u`; any leading or trailing byte, a third
 * digit or a different prefix/terminator rejects it.
 */
export function parseFlagsReply(reply: Uint8Array | string): Option.Option<EnhancementFlags> {
  const text = typeof reply === 'string' ? reply : bytesToString(reply);
  const prefixLength = KITTY_KEYBOARD_REPLY_PREFIX.length;

  if (!text.startsWith(KITTY_KEYBOARD_REPLY_PREFIX) || !text.endsWith(KITTY_KEYBOARD_REPLY_SUFFIX)) {
    return Option.none();
  }

  const digits = text.slice(prefixLength, text.length - KITTY_KEYBOARD_REPLY_SUFFIX.length);
  if (
    digits.length < KITTY_KEYBOARD_REPLY_MIN_DIGITS ||
    digits.length > KITTY_KEYBOARD_REPLY_MAX_DIGITS
  ) {
    return Option.none();
  }

  for (let i = 0; i < digits.length; i++) {
    if (!isAsciiDigit(digits.charCodeAt(i))) {
      return Option.none();
    }
  }

  return Option.some(EnhancementFlags.make(Number.parseInt(digits, 10)));
}
