/**
 * Key input decoder
 *
 * Splits raw terminal input into CSI key reports and plain text, feeding each
 * complete CSI sequence to the translator. Terminal input arrives in arbitrary
 * chunks, so a sequence cut off at the end of a chunk is held back and
 * completed by the next one.
 *
 * The flow:
 * 1. The editor reads a chunk from stdin and calls process(chunk)
 * 2. Complete `ESC [ ... final` sequences become Key (or Unrecognized) items
 * 3. Everything between them is returned as Text
 * 4. An incomplete trailing sequence waits in the pending buffer
 */

import { Data, Option } from 'effect';
import { CSI, DEFAULT_PENDING_LIMIT, ESC } from './constants';
import { isKeyTerminator, translate } from './translator';
import { KeyEvent, KeyIdentity } from './types';

export type KeyInput = Data.TaggedEnum<{
  /** A key report the translator decoded */
  Key: { readonly event: KeyEvent; readonly sequence: string };
  /** Plain input between escape sequences */
  Text: { readonly text: string };
  /** A complete CSI sequence that is not a key report */
  Unrecognized: { readonly sequence: string };
}>;

export const KeyInput = Data.taggedEnum<KeyInput>();

export interface KeyInputDecoderOptions {
  /** Longest incomplete sequence kept between chunks before it is released as text */
  pendingLimit?: number;
}

type CsiScan =
  | { kind: 'complete'; end: number }
  | { kind: 'incomplete' }
  | { kind: 'invalid'; end: number };

/**
 * Scan a CSI sequence whose parameters start at `from`.
 * Parameter and intermediate bytes are 0x20-0x3F; the final byte is 0x40-0x7E.
 */
function scanCsi(input: string, from: number): CsiScan {
  for (let i = from; i < input.length; i++) {
    const code = input.charCodeAt(i);
    if (code >= 0x20 && code <= 0x3f) continue;
    if (code >= 0x40 && code <= 0x7e) {
      return { kind: 'complete', end: i + 1 };
    }
    return { kind: 'invalid', end: i };
  }
  return { kind: 'incomplete' };
}

const escapeKey = (): KeyEvent =>
  new KeyEvent({
    key: KeyIdentity.Named({ name: 'escape' }),
    modifiers: Data.array([]),
    eventType: 'press',
    shiftedKey: Option.none(),
    baseLayoutKey: Option.none(),
    text: Option.none(),
  });

export class KeyInputDecoder {
  private pendingInput = '';
  private utf8 = new TextDecoder('utf-8');
  private readonly pendingLimit: number;

  constructor(options: KeyInputDecoderOptions = {}) {
    this.pendingLimit = options.pendingLimit ?? DEFAULT_PENDING_LIMIT;
  }

  /**
   * Decode a chunk of terminal input. Byte chunks are UTF-8; a character
   * split across chunks is completed by the next one.
   */
  process(data: string | Uint8Array): KeyInput[] {
    const chunk = typeof data === 'string' ? data : this.utf8.decode(data, { stream: true });
    const input = `${this.pendingInput}${chunk}`;
    this.pendingInput = '';

    const output: KeyInput[] = [];
    let textStart = 0;
    let cursor = 0;

    const emitText = (end: number): void => {
      if (end > textStart) {
        output.push(KeyInput.Text({ text: input.slice(textStart, end) }));
      }
    };

    while (cursor < input.length) {
      const escIndex = input.indexOf(ESC, cursor);
      if (escIndex === -1) {
        break;
      }

      // A lone ESC at the end may be the first half of a CSI
      if (escIndex === input.length - 1) {
        emitText(escIndex);
        this.hold(input.slice(escIndex), output);
        return output;
      }

      if (!input.startsWith(CSI, escIndex)) {
        cursor = escIndex + 1;
        continue;
      }

      const scan = scanCsi(input, escIndex + CSI.length);
      if (scan.kind === 'incomplete') {
        emitText(escIndex);
        this.hold(input.slice(escIndex), output);
        return output;
      }

      emitText(escIndex);
      const sequence = input.slice(escIndex, scan.end);
      if (scan.kind === 'invalid') {
        output.push(KeyInput.Unrecognized({ sequence }));
      } else {
        output.push(this.decodeSequence(sequence));
      }
      cursor = scan.end;
      textStart = cursor;
    }

    emitText(input.length);
    return output;
  }

  /**
   * Release whatever is pending. A held lone ESC is the Escape key; anything
   * else, including an unfinished UTF-8 character, comes back as text.
   */
  flush(): KeyInput[] {
    const pending = `${this.pendingInput}${this.utf8.decode()}`;
    this.pendingInput = '';
    if (pending.length === 0) {
      return [];
    }
    if (pending === ESC) {
      return [KeyInput.Key({ event: escapeKey(), sequence: ESC })];
    }
    return [KeyInput.Text({ text: pending })];
  }

  /** Whether an incomplete sequence is waiting for more input */
  get hasPending(): boolean {
    return this.pendingInput.length > 0;
  }

  /**
   * Clean up resources
   */
  dispose(): void {
    this.pendingInput = '';
    this.utf8 = new TextDecoder('utf-8');
  }

  private hold(partial: string, output: KeyInput[]): void {
    if (partial.length > this.pendingLimit) {
      output.push(KeyInput.Text({ text: partial }));
      return;
    }
    this.pendingInput = partial;
  }

  private decodeSequence(sequence: string): KeyInput {
    if (!isKeyTerminator(sequence[sequence.length - 1])) {
      return KeyInput.Unrecognized({ sequence });
    }
    const body = sequence.slice(CSI.length);
    return Option.match(translate(body), {
      onNone: () => KeyInput.Unrecognized({ sequence }),
      onSome: (event) => KeyInput.Key({ event, sequence }),
    });
  }
}
