export interface LaunchOptions {
  fullscreen?: boolean;
  startPaused?: boolean;
  // Loop the file forever (used for the splash screen)
  loop?: boolean;
}

export type EngineCommand =
  | { name: 'load'; path: string }
  | { name: 'pause' }
  | { name: 'stop' }
  | { name: 'volume'; delta: number }
  | { name: 'mute' }
  | { name: 'seek'; seconds: number }
  | { name: 'quit' };

export interface EngineLaunchResult {
  sessionId: string;
  success: boolean;
  error?: string;
}

export interface EngineSessionInfo {
  id: string;
  mediaPath: string;
  pid: number | undefined;
  paused: boolean;
  ready: boolean;
  startedAt: number;
}

/**
 * Contract the playback controller drives. Implemented by PlaybackEngineService.
 */
export interface PlaybackEngine {
  launch(mediaPath: string, options?: LaunchOptions): Promise<EngineLaunchResult>;
  command(request: EngineCommand): Promise<unknown>;
  terminate(): Promise<void>;
  getSession(): EngineSessionInfo | null;
}

export const PLAYBACK_ENGINE = Symbol('PLAYBACK_ENGINE');
