/**
 * Human-readable key identifiers, e.g. "ctrl+shift+a", "alt+up", "f5".
 */

import type { KeyEvent, KeyIdentity, Modifier } from './types';

/** Modifier order used in identifiers; lock modifiers are not part of a key id */
const ID_MODIFIER_ORDER: ReadonlyArray<Modifier> = ['ctrl', 'alt', 'shift', 'super', 'hyper', 'meta'];

function keyIdLabel(key: KeyIdentity): string {
  if (key._tag === 'Named') {
    return key.name;
  }
  return key.char === ' ' ? 'space' : key.char;
}

export function formatKeyId(event: KeyEvent): string {
  const parts = ID_MODIFIER_ORDER.filter((modifier) => event.modifiers.includes(modifier));
  return [...parts, keyIdLabel(event.key)].join('+');
}
