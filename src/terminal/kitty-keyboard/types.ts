/**
 * Type definitions for Kitty keyboard protocol negotiation and key decoding
 */

import { Data, Option, Schema } from 'effect';

// =============================================================================
// Enhancement Flags
// =============================================================================

export const ENHANCEMENT_NAMES = [
  'disambiguate-escape-codes',
  'report-event-types',
  'report-alternate-keys',
  'report-all-keys-as-escape-codes',
  'report-associated-text',
] as const;

export type EnhancementName = (typeof ENHANCEMENT_NAMES)[number];

/** Progressive enhancement bitmask as reported by the terminal (1-2 decimal digits) */
export const EnhancementFlags = Schema.Int.pipe(
  Schema.between(0, 99),
  Schema.brand('EnhancementFlags')
);
export type EnhancementFlags = typeof EnhancementFlags.Type;

// =============================================================================
// Modifiers and Event Types
// =============================================================================

/** Modifier names in bit order (shift = 1, alt = 2, ctrl = 4, ...) */
export const MODIFIER_NAMES = [
  'shift',
  'alt',
  'ctrl',
  'super',
  'hyper',
  'meta',
  'caps-lock',
  'num-lock',
] as const;

export type Modifier = (typeof MODIFIER_NAMES)[number];

export type KeyEventType = 'press' | 'repeat' | 'release';

// =============================================================================
// Key Identity
// =============================================================================

/**
 * A decoded key: either a printable character or a named special key
 * (`up`, `f5`, `kp-enter`, `left-shift`, ...).
 */
export type KeyIdentity = Data.TaggedEnum<{
  Char: { readonly char: string };
  Named: { readonly name: string };
}>;

export const KeyIdentity = Data.taggedEnum<KeyIdentity>();

/** Printable text of a Char key, or the name of a Named key */
export const keyLabel = KeyIdentity.$match({
  Char: ({ char }) => char,
  Named: ({ name }) => name,
});

// =============================================================================
// Key Event
// =============================================================================

export class KeyEvent extends Data.Class<{
  readonly key: KeyIdentity;
  /** Active modifiers in bit order */
  readonly modifiers: ReadonlyArray<Modifier>;
  readonly eventType: KeyEventType;
  /** Shifted key, reported with report-alternate-keys */
  readonly shiftedKey: Option.Option<KeyIdentity>;
  /** Key in the standard (PC-101) layout, reported with report-alternate-keys */
  readonly baseLayoutKey: Option.Option<KeyIdentity>;
  /** Associated text, reported with report-associated-text */
  readonly text: Option.Option<string>;
}> {
  hasModifier(modifier: Modifier): boolean {
    return this.modifiers.includes(modifier);
  }
}

/** Raw body of one key report: bytes after `ESC [`, terminator included */
export type KeySequenceBody = string | Uint8Array | ReadonlyArray<number>;
