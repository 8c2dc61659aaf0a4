/**
 * Kitty keyboard protocol module exports
 */

export * from './constants';
export * from './types';
export {
  ENHANCEMENT_BITS,
  encodeEnhancements,
  decodeEnhancements,
  parseEnhancementNames,
  pushEnhancementsSequence,
  popEnhancementsSequence,
  setEnhancementsSequence,
  parseFlagsReply,
} from './enhancements';
export type { EnhancementSetMode } from './enhancements';
export { translate, keyFromCode, decodeModifierBits, isKeyTerminator } from './translator';
export { encodeKeyEvent, encodeModifierBits } from './encoder';
export { formatKeyId } from './key-format';
export { KeyInput, KeyInputDecoder } from './input-decoder';
export type { KeyInputDecoderOptions } from './input-decoder';
export { bytesToString, stringToBytes, describeSequence } from './bytes';
export { FUNCTIONAL_KEYS, TILDE_KEYS, LETTER_KEYS } from './tables';
