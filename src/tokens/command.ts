export enum Command {
  Pause = 'pause',
  Stop = 'stop',
  VolumeUp = 'volume-up',
  VolumeDown = 'volume-down',
  Mute = 'mute',
  SeekForward = 'seek-forward',
  SeekBackward = 'seek-backward',
  Exit = 'exit',
}

export const COMMAND_PREFIX = 'CMD:';

// Names printed on the command cards, plus long-form aliases
export const COMMAND_NAMES: Readonly<Record<string, Command>> = {
  PAUSE: Command.Pause,
  STOP: Command.Stop,
  VOLUP: Command.VolumeUp,
  VOLUMEUP: Command.VolumeUp,
  VOLDOWN: Command.VolumeDown,
  VOLUMEDOWN: Command.VolumeDown,
  MUTE: Command.Mute,
  FWD: Command.SeekForward,
  SEEKFORWARD: Command.SeekForward,
  RWD: Command.SeekBackward,
  SEEKBACKWARD: Command.SeekBackward,
  EXIT: Command.Exit,
};

export function parseCommandName(name: string): Command | null {
  const key = name.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(COMMAND_NAMES, key) ? COMMAND_NAMES[key] : null;
}
