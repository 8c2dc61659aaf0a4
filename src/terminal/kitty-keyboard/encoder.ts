/**
 * Key event encoder - the inverse of the translator.
 *
 * Produces the sequence a KKP terminal would send for a KeyEvent, which is
 * what an editor needs when it forwards keys to a child program that has
 * enabled the protocol itself.
 */

import { Option } from 'effect';
import { CSI, LEGACY_FUNCTION_TERMINATOR, UNICODE_TERMINATOR } from './constants';
import { FUNCTIONAL_KEY_CODES, LETTER_KEY_TERMINATORS, TILDE_KEY_NUMBERS } from './tables';
import { MODIFIER_NAMES, type KeyEvent, type KeyEventType, type KeyIdentity, type Modifier } from './types';

const EVENT_TYPE_CODES: Readonly<Record<KeyEventType, number>> = {
  press: 1,
  repeat: 2,
  release: 3,
};

export function encodeModifierBits(modifiers: Iterable<Modifier>): number {
  let bits = 0;
  for (const modifier of modifiers) {
    bits |= 1 << MODIFIER_NAMES.indexOf(modifier);
  }
  return bits;
}

/**
 * `mods[:event-type]`, or '' when there is nothing to report and the field
 * is not forced (a following text field requires it).
 */
function modifierField(event: KeyEvent, force: boolean): string {
  const code = 1 + encodeModifierBits(event.modifiers);
  const type = EVENT_TYPE_CODES[event.eventType];
  if (code === 1 && type === 1 && !force) {
    return '';
  }
  return type === 1 ? `${code}` : `${code}:${type}`;
}

function keyCode(key: KeyIdentity): Option.Option<number> {
  if (key._tag === 'Char') {
    return Option.fromNullable(key.char.codePointAt(0));
  }
  return Option.fromNullable(FUNCTIONAL_KEY_CODES.get(key.name));
}

function encodeUnicode(event: KeyEvent, code: number): string {
  let codes = `${code}`;
  const shifted = Option.flatMap(event.shiftedKey, keyCode);
  const baseLayout = Option.flatMap(event.baseLayoutKey, keyCode);
  if (Option.isSome(shifted) || Option.isSome(baseLayout)) {
    codes += `:${Option.getOrElse(Option.map(shifted, String), () => '')}`;
    if (Option.isSome(baseLayout)) {
      codes += `:${baseLayout.value}`;
    }
  }

  const text = Option.map(event.text, (value) =>
    Array.from(value, (char) => char.codePointAt(0) ?? 0).join(':')
  );
  const mods = modifierField(event, Option.isSome(text));

  let body = codes;
  if (mods.length > 0) body += `;${mods}`;
  if (Option.isSome(text)) body += `;${text.value}`;
  return `${CSI}${body}${UNICODE_TERMINATOR}`;
}

/**
 * Encode a KeyEvent. Arrow-style keys use the `CSI 1;mods letter` form,
 * keys with a KKP code use `CSI code u`, the rest of the legacy function keys
 * `CSI number ~`. Named keys unknown to the protocol give none.
 */
export function encodeKeyEvent(event: KeyEvent): Option.Option<string> {
  const key = event.key;

  if (key._tag === 'Named') {
    const letter = LETTER_KEY_TERMINATORS.get(key.name);
    if (letter !== undefined) {
      const mods = modifierField(event, false);
      return Option.some(mods.length > 0 ? `${CSI}1;${mods}${letter}` : `${CSI}${letter}`);
    }
  }

  const code = keyCode(key);
  if (Option.isSome(code)) {
    return Option.some(encodeUnicode(event, code.value));
  }

  if (key._tag === 'Named') {
    const number = TILDE_KEY_NUMBERS.get(key.name);
    if (number !== undefined) {
      const mods = modifierField(event, false);
      return Option.some(
        mods.length > 0
          ? `${CSI}${number};${mods}${LEGACY_FUNCTION_TERMINATOR}`
          : `${CSI}${number}${LEGACY_FUNCTION_TERMINATOR}`
      );
    }
  }

  return Option.none();
}
