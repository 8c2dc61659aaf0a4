/**
 * Byte/string helpers for terminal input
 */

/** Map each byte to the code unit of the same value (latin1) */
export function bytesToString(bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) {
    text += String.fromCharCode(byte);
  }
  return text;
}

/** Inverse of bytesToString; code units above 0xFF are truncated to their low byte */
export function stringToBytes(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Make control characters visible, for logs and error messages.
 * ESC is shown as `ESC`, other C0 controls and DEL as `<hh>`.
 */
export function describeSequence(seq: string): string {
  return seq
    .replace(/\x1b/g, 'ESC')
    .replace(/[\x00-\x1f\x7f]/g, (c) => `<${c.charCodeAt(0).toString(16).padStart(2, '0')}>`);
}
