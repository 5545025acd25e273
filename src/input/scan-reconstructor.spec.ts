import { press, typeLine } from '../testing/keyboard.fixture';
import { InputEvent, KEY_ENTER, KEY_ESC, KEY_KPENTER, KEY_Q, KeyState } from './evdev';
import { ReconstructorOutput, ScanReconstructor } from './scan-reconstructor';

function feedAll(reconstructor: ScanReconstructor, events: InputEvent[]): ReconstructorOutput[] {
  const outputs: ReconstructorOutput[] = [];
  for (const event of events) {
    const output = reconstructor.feed(event);
    if (output) {
      outputs.push(output);
    }
  }
  return outputs;
}

describe('ScanReconstructor', () => {
  it('rebuilds a scanned line on Enter', () => {
    const reconstructor = new ScanReconstructor('scanner');

    expect(feedAll(reconstructor, typeLine('bluey-s1e1'))).toEqual([{ type: 'token', text: 'bluey-s1e1' }]);
    expect(reconstructor.pending).toBe('');
  });

  it('applies shift for upper case and symbols', () => {
    const reconstructor = new ScanReconstructor('scanner');

    expect(feedAll(reconstructor, typeLine('CMD:PAUSE'))).toEqual([{ type: 'token', text: 'CMD:PAUSE' }]);
  });

  it('accepts keypad Enter as a line end', () => {
    const reconstructor = new ScanReconstructor('scanner');

    expect(feedAll(reconstructor, typeLine('abc', KEY_KPENTER))).toEqual([{ type: 'token', text: 'abc' }]);
  });

  it('emits nothing for an empty line', () => {
    const reconstructor = new ScanReconstructor('scanner');

    expect(reconstructor.feed(press(KEY_ENTER))).toBeNull();
  });

  it('ignores key repeats and releases', () => {
    const reconstructor = new ScanReconstructor('scanner');

    reconstructor.feed(press(30));
    reconstructor.feed(press(30, KeyState.Repeated));
    reconstructor.feed(press(30, KeyState.Released));

    expect(reconstructor.pending).toBe('a');
  });

  it('treats q as text on the scanner and Escape as exit', () => {
    const reconstructor = new ScanReconstructor('scanner');

    expect(reconstructor.feed(press(KEY_Q))).toBeNull();
    expect(reconstructor.pending).toBe('q');
    expect(reconstructor.feed(press(KEY_ESC))).toEqual({ type: 'exit', code: KEY_ESC });
  });

  it('only reports exit keys for keyboards', () => {
    const reconstructor = new ScanReconstructor('keyboard');

    expect(feedAll(reconstructor, typeLine('hello'))).toEqual([]);
    expect(reconstructor.feed(press(KEY_Q))).toEqual({ type: 'exit', code: KEY_Q });
    expect(reconstructor.feed(press(KEY_ESC))).toEqual({ type: 'exit', code: KEY_ESC });
  });

  it('drops a partial line on reset', () => {
    const reconstructor = new ScanReconstructor('scanner');
    feedAll(reconstructor, typeLine('abc').slice(0, 4));

    reconstructor.reset();

    expect(reconstructor.pending).toBe('');
  });
});
