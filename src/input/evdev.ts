/**
 * Linux evdev helpers
 * Decodes `struct input_event` records read from /dev/input/eventN and parses
 * the kernel's device list (/proc/bus/input/devices).
 */

import * as fs from 'fs/promises';
import keymapData from './keymap.json';

export const EV_KEY = 0x01;

export const KEY_ESC = 1;
export const KEY_ENTER = 28;
export const KEY_Q = 16;
export const KEY_LEFTSHIFT = 42;
export const KEY_RIGHTSHIFT = 54;
export const KEY_KPENTER = 96;

export enum KeyState {
  Released = 0,
  Pressed = 1,
  Repeated = 2,
}

export interface InputEvent {
  code: number;
  state: KeyState;
  // milliseconds, from the kernel timestamp
  timestamp: number;
}

export interface InputDeviceInfo {
  name: string;
  eventPath: string;
  handlers: string[];
  // Raw hex words of the KEY capability bitmap, most significant first
  keyBitmap: string[];
}

// US layout: key code -> [plain, shifted]
const KEYMAP = new Map<number, readonly [string, string]>(
  Object.entries(keymapData).map(([code, chars]) => [Number(code), [chars[0], chars[1]] as const]),
);

export function keyToChar(code: number, shifted: boolean): string | null {
  const chars = KEYMAP.get(code);
  if (!chars) {
    return null;
  }
  return shifted ? chars[1] : chars[0];
}

/**
 * `struct input_event` is a timeval followed by type/code/value:
 * 24 bytes where longs are 64-bit, 16 bytes on 32-bit ARM boards.
 */
export function inputEventSize(arch: string = process.arch): number {
  return ['arm', 'ia32', 'mips', 'mipsel', 'ppc'].includes(arch) ? 16 : 24;
}

/**
 * Decode as many whole records as the buffer holds. Non-key events are skipped.
 * Returns the undecoded tail so the caller can prepend it to the next chunk.
 */
export function decodeInputEvents(buffer: Buffer, recordSize: number = inputEventSize()): { events: InputEvent[]; rest: Buffer } {
  const events: InputEvent[] = [];
  const wordSize = recordSize === 24 ? 8 : 4;
  let offset = 0;

  while (offset + recordSize <= buffer.length) {
    const seconds = wordSize === 8 ? Number(buffer.readBigInt64LE(offset)) : buffer.readInt32LE(offset);
    const micros = wordSize === 8 ? Number(buffer.readBigInt64LE(offset + 8)) : buffer.readInt32LE(offset + 4);
    const type = buffer.readUInt16LE(offset + wordSize * 2);
    const code = buffer.readUInt16LE(offset + wordSize * 2 + 2);
    const value = buffer.readInt32LE(offset + wordSize * 2 + 4);

    if (type === EV_KEY && value >= KeyState.Released && value <= KeyState.Repeated) {
      events.push({ code, state: value, timestamp: seconds * 1000 + Math.floor(micros / 1000) });
    }
    offset += recordSize;
  }

  return { events, rest: buffer.subarray(offset) };
}

/**
 * Parse /proc/bus/input/devices into one entry per device that has an event node
 */
export function parseDeviceList(text: string): InputDeviceInfo[] {
  const devices: InputDeviceInfo[] = [];

  for (const block of text.split(/\n\s*\n/)) {
    let name = '';
    let handlers: string[] = [];
    let keyBitmap: string[] = [];

    for (const line of block.split('\n')) {
      const nameMatch = line.match(/^N: Name="(.*)"\s*$/);
      if (nameMatch) {
        name = nameMatch[1];
        continue;
      }
      const handlerMatch = line.match(/^H: Handlers=(.*)$/);
      if (handlerMatch) {
        handlers = handlerMatch[1].trim().split(/\s+/);
        continue;
      }
      const keyMatch = line.match(/^B: KEY=(.*)$/);
      if (keyMatch) {
        keyBitmap = keyMatch[1].trim().split(/\s+/);
      }
    }

    const eventHandler = handlers.find((handler) => /^event\d+$/.test(handler));
    if (eventHandler) {
      devices.push({ name, eventPath: `/dev/input/${eventHandler}`, handlers, keyBitmap });
    }
  }

  return devices;
}

/**
 * Test a key capability bit. The kernel prints the bitmap as hex words of
 * `wordBits` bits, most significant word first, with leading zero words omitted.
 */
export function hasKey(device: InputDeviceInfo, code: number, wordBits: number = inputEventSize() === 24 ? 64 : 32): boolean {
  const wordIndex = Math.floor(code / wordBits);
  const position = device.keyBitmap.length - 1 - wordIndex;
  if (position < 0) {
    return false;
  }
  const word = BigInt(`0x${device.keyBitmap[position]}`);
  return ((word >> BigInt(code % wordBits)) & 1n) === 1n;
}

export async function listInputDevices(devicesFile: string): Promise<InputDeviceInfo[]> {
  const text = await fs.readFile(devicesFile, 'utf8');
  return parseDeviceList(text);
}
