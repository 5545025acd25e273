import keymapData from '../input/keymap.json';
import { InputEvent, KEY_ENTER, KEY_LEFTSHIFT, KeyState } from '../input/evdev';

const CHAR_TO_KEY = new Map<string, { code: number; shifted: boolean }>();
for (const [code, chars] of Object.entries(keymapData)) {
  CHAR_TO_KEY.set(chars[0], { code: Number(code), shifted: false });
  if (!CHAR_TO_KEY.has(chars[1])) {
    CHAR_TO_KEY.set(chars[1], { code: Number(code), shifted: true });
  }
}

export function press(code: number, state: KeyState = KeyState.Pressed): InputEvent {
  return { code, state, timestamp: 0 };
}

/**
 * Key events a US-layout scanner sends for a line of text, Enter included
 */
export function typeLine(text: string, enter: number = KEY_ENTER): InputEvent[] {
  const events: InputEvent[] = [];
  for (const char of text) {
    const key = CHAR_TO_KEY.get(char);
    if (!key) {
      throw new Error(`No key for "${char}"`);
    }
    if (key.shifted) events.push(press(KEY_LEFTSHIFT));
    events.push(press(key.code), press(key.code, KeyState.Released));
    if (key.shifted) events.push(press(KEY_LEFTSHIFT, KeyState.Released));
  }
  events.push(press(enter), press(enter, KeyState.Released));
  return events;
}

/**
 * Encode events as 64-bit `struct input_event` records
 */
export function encodeEvents(events: Array<{ type?: number; code: number; value: number; seconds?: number; micros?: number }>): Buffer {
  const buffer = Buffer.alloc(events.length * 24);
  events.forEach((event, index) => {
    const offset = index * 24;
    buffer.writeBigInt64LE(BigInt(event.seconds ?? 0), offset);
    buffer.writeBigInt64LE(BigInt(event.micros ?? 0), offset + 8);
    buffer.writeUInt16LE(event.type ?? 1, offset + 16);
    buffer.writeUInt16LE(event.code, offset + 18);
    buffer.writeInt32LE(event.value, offset + 20);
  });
  return buffer;
}
