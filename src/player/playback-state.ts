import { EndOfFilePayload, PauseChangedPayload, ProcessExitedPayload } from '../common/events';
import { Command } from '../tokens/command';

export enum PlaybackState {
  Idle = 'idle',
  // Launch requested, control channel not ready yet
  Loading = 'loading',
  Playing = 'playing',
  Paused = 'paused',
}

export type ControllerEvent =
  | { type: 'media'; reference: string }
  | { type: 'command'; command: Command }
  | { type: 'end-of-file'; payload: EndOfFilePayload }
  | { type: 'process-exited'; payload: ProcessExitedPayload }
  | { type: 'pause-changed'; payload: PauseChangedPayload }
  | { type: 'splash-retry' };

export interface PlaybackSnapshot {
  state: PlaybackState;
  mediaPath: string | null;
  sessionId: string | null;
  splashActive: boolean;
  exited: boolean;
}

// Delay before showing the splash again after it failed or died
export const SPLASH_RETRY_MS = 3000;
