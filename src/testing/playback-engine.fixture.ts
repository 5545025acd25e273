import {
  EngineCommand,
  EngineLaunchResult,
  EngineSessionInfo,
  LaunchOptions,
  PlaybackEngine,
} from '../engine/engine.types';

export interface RecordedLaunch {
  mediaPath: string;
  options: LaunchOptions;
  sessionId: string;
}

/**
 * In-memory PlaybackEngine that records what the controller asks of it
 */
export class FakePlaybackEngine implements PlaybackEngine {
  readonly launches: RecordedLaunch[] = [];
  readonly commands: EngineCommand[] = [];
  terminations = 0;

  // Next launch resolves with this failure instead of starting a session
  failNextLaunch: string | null = null;
  // Next launch throws this error
  throwOnNextLaunch: Error | null = null;
  // Every command throws this error while set
  commandError: Error | null = null;
  // Launches wait for this promise before completing
  launchGate: Promise<void> | null = null;

  private session: EngineSessionInfo | null = null;
  private nextId = 1;

  async launch(mediaPath: string, options: LaunchOptions = {}): Promise<EngineLaunchResult> {
    const sessionId = `session-${this.nextId++}`;
    this.launches.push({ mediaPath, options, sessionId });
    this.session = null;

    if (this.launchGate) {
      await this.launchGate;
    }

    if (this.throwOnNextLaunch) {
      const error = this.throwOnNextLaunch;
      this.throwOnNextLaunch = null;
      throw error;
    }

    if (this.failNextLaunch) {
      const error = this.failNextLaunch;
      this.failNextLaunch = null;
      return { sessionId, success: false, error };
    }

    this.session = { id: sessionId, mediaPath, pid: 1000 + this.nextId, paused: false, ready: true, startedAt: Date.now() };
    return { sessionId, success: true };
  }

  async command(request: EngineCommand): Promise<unknown> {
    if (this.commandError) {
      throw this.commandError;
    }
    this.commands.push(request);
    return null;
  }

  async terminate(): Promise<void> {
    this.terminations++;
    this.session = null;
  }

  getSession(): EngineSessionInfo | null {
    return this.session;
  }
}
