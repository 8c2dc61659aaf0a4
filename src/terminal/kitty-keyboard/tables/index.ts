/**
 * Key lookup tables for the Kitty keyboard protocol.
 *
 * - Functional keys reported in the `CSI code u` form (Private Use Area codes
 *   plus the few legacy C0 keys) are data, loaded from functional-keys.json.
 * - Legacy `CSI number ~` and `CSI 1;mods letter` forms are small fixed tables.
 */

import { Schema } from 'effect';
import functionalKeysJson from './functional-keys.json';

const FunctionalKeyTable = Schema.Record({ key: Schema.String, value: Schema.String });

function buildFunctionalKeys(): ReadonlyMap<number, string> {
  const table = Schema.decodeUnknownSync(FunctionalKeyTable)(functionalKeysJson);
  const map = new Map<number, string>();
  for (const [code, name] of Object.entries(table)) {
    map.set(Number.parseInt(code, 10), name);
  }
  return map;
}

/** `CSI code u` keycodes with no printable representation */
export const FUNCTIONAL_KEYS: ReadonlyMap<number, string> = buildFunctionalKeys();

/** Reverse lookup of FUNCTIONAL_KEYS */
export const FUNCTIONAL_KEY_CODES: ReadonlyMap<string, number> = new Map(
  Array.from(FUNCTIONAL_KEYS, ([code, name]) => [name, code] as const)
);

/** `CSI number ~` legacy function keys */
export const TILDE_KEYS: ReadonlyMap<number, string> = new Map([
  [2, 'insert'],
  [3, 'delete'],
  [5, 'page-up'],
  [6, 'page-down'],
  [7, 'home'],
  [8, 'end'],
  [11, 'f1'],
  [12, 'f2'],
  [13, 'f3'],
  [14, 'f4'],
  [15, 'f5'],
  [17, 'f6'],
  [18, 'f7'],
  [19, 'f8'],
  [20, 'f9'],
  [21, 'f10'],
  [23, 'f11'],
  [24, 'f12'],
  [29, 'menu'],
  [57427, 'kp-begin'],
]);

/**
 * `CSI [1;mods] letter` legacy keys.
 * F3 is only ever sent as `CSI 13 ~`; `CSI R` would clash with cursor position reports.
 */
export const LETTER_KEYS: ReadonlyMap<string, string> = new Map([
  ['A', 'up'],
  ['B', 'down'],
  ['C', 'right'],
  ['D', 'left'],
  ['E', 'kp-begin'],
  ['F', 'end'],
  ['H', 'home'],
  ['P', 'f1'],
  ['Q', 'f2'],
  ['S', 'f4'],
]);

/** Named keys reported as `CSI number ~`, keyed by name (first entry wins) */
export const TILDE_KEY_NUMBERS: ReadonlyMap<string, number> = reverse(TILDE_KEYS);

/** Named keys reported as `CSI [1;mods] letter`, keyed by name */
export const LETTER_KEY_TERMINATORS: ReadonlyMap<string, string> = reverse(LETTER_KEYS);

function reverse<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<V, K> {
  const reversed = new Map<V, K>();
  for (const [key, value] of map) {
    if (!reversed.has(value)) {
      reversed.set(value, key);
    }
  }
  return reversed;
}
