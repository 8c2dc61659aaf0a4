#!/usr/bin/env -S npx tsx
/**
 * Manual keyboard protocol tester.
 * Probes the terminal, prints the enabled enhancement flags and, with
 * --watch, enables the protocol and prints every decoded key.
 *
 * Usage: npm run keys -- [--watch]
 */

import { Effect, Option } from 'effect';
import {
  CapabilityProber,
  KeyboardProtocol,
  KeyInputDecoder,
  KeyInput,
  AppConfig,
  decodeEnhancements,
  describeSequence,
  formatKeyId,
  makeRuntime,
} from '../src';

const args = process.argv.slice(2);
const watch = args.includes('--watch');

function formatInput(item: KeyInput): string {
  return KeyInput.$match(item, {
    Key: ({ event, sequence }) => {
      const text = Option.getOrElse(event.text, () => '');
      return `${event.eventType.padEnd(7)} key=${formatKeyId(event)} seq=${describeSequence(sequence)}${text ? ` text=${JSON.stringify(text)}` : ''}`;
    },
    Text: ({ text }) => `text    ${JSON.stringify(text)}`,
    Unrecognized: ({ sequence }) => `other   seq=${describeSequence(sequence)}`,
  });
}

const probe = Effect.gen(function* () {
  const prober = yield* CapabilityProber;
  const supported = yield* prober.probeSupport();
  console.log(`Kitty keyboard protocol: ${supported ? 'supported' : 'not supported'}`);
  if (!supported) {
    return false;
  }

  const flags = yield* prober.queryEnabledEnhancements().pipe(
    Effect.catchTags({
      TerminalUnresponsiveError: (error) =>
        Effect.sync(() => console.log(`Flags query unanswered: ${error.reason}`)).pipe(Effect.as(null)),
      MalformedReplyError: (error) =>
        Effect.sync(() => console.log(`Flags query malformed: ${error.reply}`)).pipe(Effect.as(null)),
    })
  );
  if (flags !== null) {
    const names = decodeEnhancements(flags);
    console.log(`Enabled enhancements: ${flags} (${names.length > 0 ? names.join(', ') : 'none'})`);
  }
  return true;
});

const watchKeys = Effect.scoped(
  Effect.gen(function* () {
    const protocol = yield* KeyboardProtocol;
    const config = yield* AppConfig;
    const enabled = yield* protocol.scoped();
    if (!enabled) {
      return;
    }

    console.log('Press keys to see decoded events. Ctrl+C to quit.\n');
    const decoder = new KeyInputDecoder({ pendingLimit: config.pendingLimit });

    yield* Effect.async<void>((resume) => {
      const cleanup = () => {
        process.stdin.removeListener('data', onData);
        process.stdin.setRawMode?.(false);
        process.stdin.pause();
        decoder.dispose();
      };
      const onData = (chunk: Buffer) => {
        for (const item of decoder.process(chunk)) {
          console.log(formatInput(item));
          const isCtrlC =
            (item._tag === 'Text' && item.text.includes('\x03')) ||
            (item._tag === 'Key' && formatKeyId(item.event) === 'ctrl+c');
          if (isCtrlC) {
            cleanup();
            resume(Effect.void);
            return;
          }
        }
      };
      process.stdin.setRawMode?.(true);
      process.stdin.on('data', onData);
      process.stdin.resume();
      return Effect.sync(cleanup);
    });
  })
);

const program = Effect.gen(function* () {
  const supported = yield* probe;
  if (watch && supported) {
    yield* watchKeys;
  }
});

async function main() {
  const runtime = makeRuntime();
  try {
    await runtime.runPromise(program);
  } catch (error) {
    console.error('Key event tester failed:', error);
    process.exitCode = 1;
  } finally {
    await runtime.dispose();
  }
}

main();
