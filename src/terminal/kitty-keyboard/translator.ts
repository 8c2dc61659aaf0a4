/**
 * Key sequence translator - decodes the body of one Kitty keyboard protocol
 * key report into a KeyEvent.
 *
 * Grammar (body = everything after `ESC [`, terminator included):
 *   code[:shifted[:base-layout]] [; mods[:event-type]] [; text-codepoints] u
 *   number [; mods[:event-type]] ~
 *   [1 ;] mods[:event-type] letter      (also a bare letter)
 *
 * Malformed fields degrade to defaults; only a missing key identity or an
 * unknown terminator yields no event. Nothing here throws.
 */

import { Data, Option } from 'effect';
import {
  FIELD_SEPARATOR,
  LEGACY_FUNCTION_TERMINATOR,
  SUBFIELD_SEPARATOR,
  UNICODE_TERMINATOR,
} from './constants';
import { FUNCTIONAL_KEYS, LETTER_KEYS, TILDE_KEYS } from './tables';
import {
  KeyEvent,
  KeyIdentity,
  MODIFIER_NAMES,
  type KeyEventType,
  type KeySequenceBody,
  type Modifier,
} from './types';
import { bytesToString } from './bytes';

const MAX_CODE_POINT = 0x10ffff;
const DECIMAL = /^\d+$/;

// =============================================================================
// Field Decoding
// =============================================================================

function parseDecimal(field: string | undefined): Option.Option<number> {
  if (field === undefined || !DECIMAL.test(field)) {
    return Option.none();
  }
  const value = Number.parseInt(field, 10);
  return Number.isSafeInteger(value) ? Option.some(value) : Option.none();
}

function isScalarValue(code: number): boolean {
  return code >= 0 && code <= MAX_CODE_POINT && !(code >= 0xd800 && code <= 0xdfff);
}

function isPrintableCodePoint(code: number): boolean {
  if (!isScalarValue(code)) return false;
  if (code < 0x20 || code === 0x7f) return false;
  if (code >= 0x80 && code <= 0x9f) return false;
  // Private Use Area codes are reserved for functional keys
  if (code >= 0xe000 && code <= 0xf8ff) return false;
  return true;
}

export function keyFromCode(code: number): Option.Option<KeyIdentity> {
  const name = FUNCTIONAL_KEYS.get(code);
  if (name !== undefined) {
    return Option.some(KeyIdentity.Named({ name }));
  }
  if (isPrintableCodePoint(code)) {
    return Option.some(KeyIdentity.Char({ char: String.fromCodePoint(code) }));
  }
  return Option.none();
}

/**
 * A decimal keycode, or a single non-digit printable character taken as the key itself.
 */
function decodeKeyCode(field: string | undefined): Option.Option<KeyIdentity> {
  if (field === undefined || field.length === 0) {
    return Option.none();
  }
  const code = parseDecimal(field);
  if (Option.isSome(code)) {
    return keyFromCode(code.value);
  }
  const chars = Array.from(field);
  if (chars.length !== 1) {
    return Option.none();
  }
  const literal = chars[0].codePointAt(0);
  return literal !== undefined && isPrintableCodePoint(literal)
    ? Option.some(KeyIdentity.Char({ char: chars[0] }))
    : Option.none();
}

export function decodeModifierBits(bits: number): Modifier[] {
  return MODIFIER_NAMES.filter((_, index) => (bits & (1 << index)) !== 0);
}

function decodeEventType(field: string | undefined): KeyEventType {
  switch (field) {
    case '2':
      return 'repeat';
    case '3':
      return 'release';
    default:
      return 'press';
  }
}

interface ModifierField {
  modifiers: Modifier[];
  eventType: KeyEventType;
}

/**
 * `mods[:event-type]` where mods is 1 + bitmask. Anything unparsable means
 * no modifiers and a press.
 */
function decodeModifierField(field: string | undefined): ModifierField {
  if (field === undefined) {
    return { modifiers: [], eventType: 'press' };
  }
  const [mods, eventType] = field.split(SUBFIELD_SEPARATOR);
  const encoded = parseDecimal(mods);
  const modifiers =
    Option.isSome(encoded) && encoded.value >= 1 ? decodeModifierBits((encoded.value - 1) & 0xff) : [];
  return { modifiers, eventType: decodeEventType(eventType) };
}

function decodeText(field: string | undefined): Option.Option<string> {
  if (field === undefined) {
    return Option.none();
  }
  let text = '';
  for (const part of field.split(SUBFIELD_SEPARATOR)) {
    const code = parseDecimal(part);
    if (Option.isSome(code) && code.value > 0 && isScalarValue(code.value)) {
      text += String.fromCodePoint(code.value);
    }
  }
  return text.length > 0 ? Option.some(text) : Option.none();
}

function makeEvent(
  key: KeyIdentity,
  field: ModifierField,
  extras: Partial<Pick<KeyEvent, 'shiftedKey' | 'baseLayoutKey' | 'text'>> = {}
): KeyEvent {
  return new KeyEvent({
    key,
    modifiers: Data.array(field.modifiers),
    eventType: field.eventType,
    shiftedKey: extras.shiftedKey ?? Option.none(),
    baseLayoutKey: extras.baseLayoutKey ?? Option.none(),
    text: extras.text ?? Option.none(),
  });
}

// =============================================================================
// Sequence Forms
// =============================================================================

function translateUnicode(fields: string[]): Option.Option<KeyEvent> {
  const [codes = '', mods, text] = fields;
  const [base, shifted, baseLayout] = codes.split(SUBFIELD_SEPARATOR);

  return Option.map(decodeKeyCode(base), (key) =>
    makeEvent(key, decodeModifierField(mods), {
      shiftedKey: decodeKeyCode(shifted),
      baseLayoutKey: decodeKeyCode(baseLayout),
      text: decodeText(text),
    })
  );
}

function translateTilde(fields: string[]): Option.Option<KeyEvent> {
  const [index, mods] = fields;
  return parseDecimal(index).pipe(
    Option.flatMap((value) => Option.fromNullable(TILDE_KEYS.get(value))),
    Option.map((name) => makeEvent(KeyIdentity.Named({ name }), decodeModifierField(mods)))
  );
}

function translateLetter(terminator: string, fields: string[]): Option.Option<KeyEvent> {
  const name = LETTER_KEYS.get(terminator);
  if (name === undefined) {
    return Option.none();
  }
  const mods = fields.length >= 2 ? fields[1] : fields[0];
  return Option.some(makeEvent(KeyIdentity.Named({ name }), decodeModifierField(mods)));
}

// =============================================================================
// Entry Point
// =============================================================================

function normalizeBody(body: KeySequenceBody): Option.Option<string> {
  if (typeof body === 'string') {
    return Option.some(body);
  }
  if (body instanceof Uint8Array) {
    return Option.some(bytesToString(body));
  }
  let text = '';
  for (const code of body) {
    if (!Number.isInteger(code) || !isScalarValue(code)) {
      return Option.none();
    }
    text += String.fromCodePoint(code);
  }
  return Option.some(text);
}

/**
 * Decode one key report body. Returns `Option.none()` for empty input, an
 * unrecognized terminator, or a report without a usable key identity.
 */
export function translate(body: KeySequenceBody): Option.Option<KeyEvent> {
  return Option.flatMap(normalizeBody(body), (text) => {
    if (text.length === 0) {
      return Option.none();
    }

    const terminator = text[text.length - 1];
    const rest = text.slice(0, -1);
    const fields = rest.length === 0 ? [] : rest.split(FIELD_SEPARATOR);

    if (terminator === UNICODE_TERMINATOR) {
      return translateUnicode(fields);
    }
    if (terminator === LEGACY_FUNCTION_TERMINATOR) {
      return translateTilde(fields);
    }
    return translateLetter(terminator, fields);
  });
}

/** Whether `char` ends a key report the translator understands */
export function isKeyTerminator(char: string): boolean {
  return char === UNICODE_TERMINATOR || char === LEGACY_FUNCTION_TERMINATOR || LETTER_KEYS.has(char);
}
