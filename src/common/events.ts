// Internal event registry
// Every asynchronous source (input devices, stdin, the engine) publishes on the
// EventEmitter2 bus under one of these names; the playback controller is the
// only subscriber.

export enum InternalEvent {
  // Input
  SCAN_RECEIVED = 'input.scan',
  EXIT_REQUESTED = 'input.exit',

  // Playback engine
  ENGINE_END_OF_FILE = 'engine.end-of-file',
  ENGINE_PROCESS_EXITED = 'engine.process-exited',
  ENGINE_PAUSE_CHANGED = 'engine.pause-changed',
}

export type InputSource = 'scanner' | 'keyboard' | 'stdin';

export interface ScanReceivedPayload {
  text: string;
  source: InputSource;
  // performance.now(), only compared with other scans
  receivedAt: number;
}

export interface ExitRequestedPayload {
  source: InputSource;
  device?: string;
}

export interface EndOfFilePayload {
  sessionId: string;
  mediaPath: string;
}

export interface ProcessExitedPayload {
  sessionId: string;
  mediaPath: string;
  code: number | null;
  signal: NodeJS.Signals | null;
  // true when the exit was requested through terminate() or replacement
  expected: boolean;
  // true when no process actually exited (control channel never became ready)
  synthesized: boolean;
}

export interface PauseChangedPayload {
  sessionId: string;
  paused: boolean;
}
