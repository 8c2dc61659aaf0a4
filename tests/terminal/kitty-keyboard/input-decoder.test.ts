/**
 * Tests for KeyInputDecoder - splitting terminal input into key reports and text.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { KeyInputDecoder, type KeyInput } from '../../../src/terminal/kitty-keyboard/input-decoder';
import { formatKeyId } from '../../../src/terminal/kitty-keyboard/key-format';

/** Compact view of decoder output: key ids, text and unrecognized sequences */
function summarize(items: KeyInput[]): string[] {
  return items.map((item) => {
    switch (item._tag) {
      case 'Key':
        return `key:${formatKeyId(item.event)}:${item.event.eventType}`;
      case 'Text':
        return `text:${JSON.stringify(item.text)}`;
      case 'Unrecognized':
        return `other:${JSON.stringify(item.sequence)}`;
    }
  });
}

describe('KeyInputDecoder', () => {
  let decoder: KeyInputDecoder;

  beforeEach(() => {
    decoder = new KeyInputDecoder();
  });

  it('passes plain text through', () => {
    expect(summarize(decoder.process('hello'))).toEqual(['text:"hello"']);
  });

  it('returns nothing for an empty chunk', () => {
    expect(decoder.process('')).toEqual([]);
  });

  it('splits key reports from surrounding text', () => {
    const items = decoder.process('a\x1b[97;5ub');
    expect(summarize(items)).toEqual(['text:"a"', 'key:ctrl+a:press', 'text:"b"']);
    expect(items[1]).toMatchObject({ _tag: 'Key', sequence: '\x1b[97;5u' });
  });

  it('decodes consecutive reports', () => {
    expect(summarize(decoder.process('\x1b[A\x1b[3;2~\x1b[97;1:3u'))).toEqual([
      'key:up:press',
      'key:shift+delete:press',
      'key:a:release',
    ]);
  });

  it('completes a report split across chunks', () => {
    expect(decoder.process('\x1b[97')).toEqual([]);
    expect(decoder.hasPending).toBe(true);
    expect(summarize(decoder.process(';5u'))).toEqual(['key:ctrl+a:press']);
    expect(decoder.hasPending).toBe(false);
  });

  it('holds a trailing ESC until the next chunk', () => {
    expect(summarize(decoder.process('x\x1b'))).toEqual(['text:"x"']);
    expect(decoder.hasPending).toBe(true);
    expect(summarize(decoder.process('[B'))).toEqual(['key:down:press']);
  });

  it('flushes a held ESC as the Escape key', () => {
    decoder.process('\x1b');
    const items = decoder.flush();
    expect(summarize(items)).toEqual(['key:escape:press']);
    expect(items[0]).toMatchObject({ _tag: 'Key', sequence: '\x1b' });
    expect(decoder.hasPending).toBe(false);
    expect(decoder.flush()).toEqual([]);
  });

  it('flushes an incomplete CSI as text', () => {
    decoder.process('\x1b[1');
    expect(summarize(decoder.flush())).toEqual(['text:"\\u001b[1"']);
  });

  it('decodes byte chunks as UTF-8', () => {
    expect(summarize(decoder.process(Buffer.from('é→', 'utf8')))).toEqual(['text:"é→"']);
  });

  it('completes a UTF-8 character split across chunks', () => {
    const bytes = Buffer.from('é→', 'utf8');
    expect(summarize(decoder.process(bytes.subarray(0, 3)))).toEqual(['text:"é"']);
    expect(summarize(decoder.process(bytes.subarray(3)))).toEqual(['text:"→"']);
  });

  it('keeps UTF-8 text around key reports', () => {
    expect(summarize(decoder.process(Buffer.from('ü\x1b[97;5uß', 'utf8')))).toEqual([
      'text:"ü"',
      'key:ctrl+a:press',
      'text:"ß"',
    ]);
  });

  it('flushes an unfinished UTF-8 character as a replacement character', () => {
    expect(decoder.process(Uint8Array.from([0xe2, 0x86]))).toEqual([]);
    expect(summarize(decoder.flush())).toEqual(['text:"\uFFFD"']);
  });

  it('reports CSI sequences that are not keys', () => {
    expect(summarize(decoder.process('\x1b[?1c'))).toEqual(['other:"\\u001b[?1c"']);
    expect(summarize(decoder.process('\x1b[12;40R'))).toEqual(['other:"\\u001b[12;40R"']);
  });

  it('cuts off a CSI interrupted by a control byte', () => {
    expect(summarize(decoder.process('\x1b[12\x07rest'))).toEqual([
      'other:"\\u001b[12"',
      'text:"\\u0007rest"',
    ]);
  });

  it('keeps other escape sequences in the text', () => {
    expect(summarize(decoder.process('\x1bOA'))).toEqual(['text:"\\u001bOA"']);
  });

  it('decodes byte chunks', () => {
    expect(summarize(decoder.process(Uint8Array.from([0x1b, 0x5b, 0x41])))).toEqual(['key:up:press']);
  });

  it('releases a pending sequence that outgrows the limit', () => {
    const limited = new KeyInputDecoder({ pendingLimit: 4 });
    expect(limited.process('\x1b[1;')).toEqual([]);
    expect(limited.hasPending).toBe(true);
    expect(summarize(limited.process('5'))).toEqual(['text:"\\u001b[1;5"']);
    expect(limited.hasPending).toBe(false);
  });

  it('drops pending input on dispose', () => {
    decoder.process('\x1b[1');
    decoder.dispose();
    expect(decoder.hasPending).toBe(false);
    expect(summarize(decoder.process('A'))).toEqual(['text:"A"']);
  });
});
