import { InputEvent, KEY_ENTER, KEY_ESC, KEY_KPENTER, KEY_LEFTSHIFT, KEY_Q, KEY_RIGHTSHIFT, KeyState, keyToChar } from './evdev';

export type ReconstructorOutput = { type: 'token'; text: string } | { type: 'exit'; code: number };

/**
 * Role of the device being read:
 * - 'scanner' builds line tokens; Escape backs out of playback
 * - 'keyboard' only watches for the exit keys (Q, Escape)
 */
export type DeviceRole = 'scanner' | 'keyboard';

const EXIT_KEYS: Record<DeviceRole, ReadonlySet<number>> = {
  scanner: new Set([KEY_ESC]),
  keyboard: new Set([KEY_Q, KEY_ESC]),
};

/**
 * Reassembles "type then Enter" keystrokes from a keyboard-emulating scanner
 * into line tokens. One instance per device; no timeout on partial lines.
 */
export class ScanReconstructor {
  private buffer = '';
  private shift = false;

  constructor(private readonly role: DeviceRole = 'scanner') {}

  feed(event: InputEvent): ReconstructorOutput | null {
    if (event.code === KEY_LEFTSHIFT || event.code === KEY_RIGHTSHIFT) {
      this.shift = event.state !== KeyState.Released;
      return null;
    }

    if (event.state !== KeyState.Pressed) {
      return null;
    }

    if (EXIT_KEYS[this.role].has(event.code)) {
      return { type: 'exit', code: event.code };
    }

    if (this.role === 'keyboard') {
      return null;
    }

    if (event.code === KEY_ENTER || event.code === KEY_KPENTER) {
      const text = this.buffer.trim();
      this.buffer = '';
      return text ? { type: 'token', text } : null;
    }

    const char = keyToChar(event.code, this.shift);
    if (char !== null) {
      this.buffer += char;
    }
    return null;
  }

  /**
   * Drop any partial line and shift state (device lost)
   */
  reset(): void {
    this.buffer = '';
    this.shift = false;
  }

  get pending(): string {
    return this.buffer;
  }
}
