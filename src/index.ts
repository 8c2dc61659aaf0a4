/**
 * termkeys - Kitty keyboard protocol negotiation and key decoding
 * See: https://sw.kovidgoyal.net/kitty/keyboard-protocol/
 */

export * from './terminal/kitty-keyboard';
export * from './effect';
