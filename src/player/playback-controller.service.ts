import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { PlayerConfigService } from '../config/player-config.service';
import { MediaResolverService } from '../media/media-resolver.service';
import { TokenClassifierService } from '../tokens/token-classifier.service';
import { Command } from '../tokens/command';
import { PLAYBACK_ENGINE, EngineCommand, PlaybackEngine } from '../engine';
import { SerialEventQueue } from '../common/serial-event-queue';
import { PlayerErrorCode, errorMessage } from '../common/errors';
import {
  EndOfFilePayload,
  ExitRequestedPayload,
  InternalEvent,
  PauseChangedPayload,
  ProcessExitedPayload,
  ScanReceivedPayload,
} from '../common/events';
import { ControllerEvent, PlaybackSnapshot, PlaybackState, SPLASH_RETRY_MS } from './playback-state';

/**
 * PlaybackControllerService - the player's state machine
 *
 * Every input (scans, exit keys, engine notifications) is appended to one
 * serial queue, so exactly one transition runs at a time and nothing else
 * mutates the playback state or the engine session.
 *
 * Idle shows the splash. A scan that resolves to a file launches it
 * (Loading -> Playing); end of file, Stop, a crash or a failed launch all
 * fall back to the splash.
 */
@Injectable()
export class PlaybackControllerService implements OnModuleDestroy {
  private readonly logger = new Logger(PlaybackControllerService.name);
  private readonly queue: SerialEventQueue<ControllerEvent>;
  private readonly splashPath: string;
  private readonly volumeStep: number;
  private readonly seekStep: number;

  private state = PlaybackState.Idle;
  private mediaPath: string | null = null;
  // Engine session owned by the current state (a media file or the splash)
  private sessionId: string | null = null;
  private splashActive = false;
  private exited = false;
  private splashRetryTimer: NodeJS.Timeout | null = null;

  private resolveExit: () => void = () => undefined;
  private readonly exitPromise = new Promise<void>((resolve) => {
    this.resolveExit = resolve;
  });

  constructor(
    configService: PlayerConfigService,
    private readonly mediaResolver: MediaResolverService,
    private readonly classifier: TokenClassifierService,
    @Inject(PLAYBACK_ENGINE) private readonly engine: PlaybackEngine,
  ) {
    const { config } = configService;
    this.splashPath = config.splashPath;
    this.volumeStep = config.volumeStep;
    this.seekStep = config.seekStepSeconds;
    this.queue = new SerialEventQueue((event) => this.handle(event), PlaybackControllerService.name);
  }

  getState(): PlaybackState {
    return this.state;
  }

  getSnapshot(): PlaybackSnapshot {
    return {
      state: this.state,
      mediaPath: this.mediaPath,
      sessionId: this.sessionId,
      splashActive: this.splashActive,
      exited: this.exited,
    };
  }

  /**
   * Prepare the media directory and put the splash on screen.
   * Rejects when the engine binary is missing: nothing can be shown without it.
   */
  async start(): Promise<void> {
    await this.mediaResolver.ensureMediaDir();
    const catalog = await this.mediaResolver.listCatalog();
    this.logger.log(`${catalog.size} media file(s) available in ${this.mediaResolver.directory}`);

    await this.showSplash();
  }

  /**
   * Resolves once an Exit command has been handled
   */
  waitForExit(): Promise<void> {
    return this.exitPromise;
  }

  /**
   * Resolves once every event queued so far has been handled
   */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  onModuleDestroy(): void {
    this.cancelSplashRetry();
    this.queue.close();
  }

  // ---------------------------------------------------------------------------
  // Event intake. Tokens are classified (and debounced) on arrival, then queued.
  // ---------------------------------------------------------------------------

  @OnEvent(InternalEvent.SCAN_RECEIVED)
  handleScan(payload: ScanReceivedPayload): void {
    const accepted = this.classifier.accept(payload.text, payload.receivedAt);
    if (!accepted) {
      return;
    }
    if (accepted.kind === 'command') {
      this.queue.push({ type: 'command', command: accepted.command });
    } else {
      this.queue.push({ type: 'media', reference: accepted.reference });
    }
  }

  @OnEvent(InternalEvent.EXIT_REQUESTED)
  handleExitRequest(payload: ExitRequestedPayload): void {
    this.logger.log(`Exit requested from ${payload.device ?? payload.source}`);
    this.queue.push({ type: 'command', command: Command.Exit });
  }

  @OnEvent(InternalEvent.ENGINE_END_OF_FILE)
  handleEndOfFile(payload: EndOfFilePayload): void {
    this.queue.push({ type: 'end-of-file', payload });
  }

  @OnEvent(InternalEvent.ENGINE_PROCESS_EXITED)
  handleProcessExited(payload: ProcessExitedPayload): void {
    this.queue.push({ type: 'process-exited', payload });
  }

  @OnEvent(InternalEvent.ENGINE_PAUSE_CHANGED)
  handlePauseChanged(payload: PauseChangedPayload): void {
    this.queue.push({ type: 'pause-changed', payload });
  }

  // ---------------------------------------------------------------------------
  // Transitions (run one at a time by the queue)
  // ---------------------------------------------------------------------------

  private async handle(event: ControllerEvent): Promise<void> {
    if (this.exited) {
      return;
    }

    switch (event.type) {
      case 'media':
        return this.onMediaReference(event.reference);
      case 'command':
        return this.onCommand(event.command);
      case 'end-of-file':
        return this.onEndOfFile(event.payload);
      case 'process-exited':
        return this.onProcessExited(event.payload);
      case 'pause-changed':
        return this.onPauseChanged(event.payload);
      case 'splash-retry':
        if (this.state === PlaybackState.Idle && !this.splashActive) {
          await this.recoverToSplash();
        }
        return;
    }
  }

  private async onMediaReference(reference: string): Promise<void> {
    const resolution = await this.mediaResolver.resolve(reference);
    if (!resolution.found) {
      this.logger.warn(`[${resolution.code}] No video found for: ${reference} (${resolution.reason})`);
      return;
    }

    // A repeat scan of the playing file restarts it
    await this.playMedia(resolution.path);
  }

  private async playMedia(mediaPath: string): Promise<void> {
    this.cancelSplashRetry();
    this.logger.log(`Playing: ${mediaPath}`);

    this.transition(PlaybackState.Loading);
    this.mediaPath = mediaPath;
    this.sessionId = null;
    this.splashActive = false;

    try {
      const result = await this.engine.launch(mediaPath);
      if (!result.success) {
        this.logger.error(`[${PlayerErrorCode.ENGINE_LAUNCH_FAILED}] ${result.error ?? 'unknown error'}`);
        await this.recoverToSplash();
        return;
      }
      this.sessionId = result.sessionId;
      this.transition(PlaybackState.Playing);
    } catch (error) {
      this.logger.error(`Launch failed for ${mediaPath}: ${errorMessage(error)}`);
      await this.recoverToSplash();
    }
  }

  private async onCommand(command: Command): Promise<void> {
    if (command === Command.Exit) {
      await this.shutdown();
      return;
    }

    if (this.state === PlaybackState.Idle) {
      this.logger.debug(`Ignoring ${command} while idle`);
      return;
    }

    this.logger.log(`Executing command: ${command}`);

    switch (command) {
      case Command.Pause:
        if (await this.sendCommand({ name: 'pause' })) {
          this.transition(this.state === PlaybackState.Paused ? PlaybackState.Playing : PlaybackState.Paused);
        }
        return;
      case Command.Stop:
        await this.engine.terminate();
        await this.recoverToSplash();
        return;
      case Command.VolumeUp:
        await this.sendCommand({ name: 'volume', delta: this.volumeStep });
        return;
      case Command.VolumeDown:
        await this.sendCommand({ name: 'volume', delta: -this.volumeStep });
        return;
      case Command.Mute:
        await this.sendCommand({ name: 'mute' });
        return;
      case Command.SeekForward:
        await this.sendCommand({ name: 'seek', seconds: this.seekStep });
        return;
      case Command.SeekBackward:
        await this.sendCommand({ name: 'seek', seconds: -this.seekStep });
        return;
    }
  }

  private async onEndOfFile(payload: EndOfFilePayload): Promise<void> {
    if (!this.isActiveMediaSession(payload.sessionId)) {
      return;
    }

    this.logger.log(`Finished: ${payload.mediaPath}`);
    await this.engine.terminate();
    await this.recoverToSplash();
  }

  private async onProcessExited(payload: ProcessExitedPayload): Promise<void> {
    if (payload.expected || payload.sessionId !== this.sessionId) {
      this.logger.debug(`Ignoring exit of session ${payload.sessionId}`);
      return;
    }

    if (this.splashActive) {
      this.logger.warn(`Splash session exited (code ${payload.code}), showing it again in ${SPLASH_RETRY_MS}ms`);
      this.sessionId = null;
      this.splashActive = false;
      this.scheduleSplashRetry();
      return;
    }

    const code = payload.synthesized ? PlayerErrorCode.ENGINE_LAUNCH_FAILED : PlayerErrorCode.ENGINE_CRASHED;
    this.logger.error(`[${code}] Engine stopped while playing ${payload.mediaPath} (code ${payload.code}, signal ${payload.signal})`);
    await this.recoverToSplash();
  }

  private onPauseChanged(payload: PauseChangedPayload): void {
    if (!this.isActiveMediaSession(payload.sessionId)) {
      return;
    }
    this.transition(payload.paused ? PlaybackState.Paused : PlaybackState.Playing);
  }

  private async shutdown(): Promise<void> {
    this.logger.log('EXIT command received, shutting down');
    this.exited = true;
    this.cancelSplashRetry();
    this.queue.close();

    try {
      await this.engine.terminate();
    } finally {
      this.sessionId = null;
      this.mediaPath = null;
      this.splashActive = false;
      this.transition(PlaybackState.Idle);
      this.resolveExit();
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private isActiveMediaSession(sessionId: string): boolean {
    return (
      sessionId === this.sessionId && (this.state === PlaybackState.Playing || this.state === PlaybackState.Paused)
    );
  }

  /**
   * Send a control request; failures are logged and reported as false
   */
  private async sendCommand(request: EngineCommand): Promise<boolean> {
    try {
      await this.engine.command(request);
      return true;
    } catch (error) {
      this.logger.warn(`Command ${request.name} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async showSplash(): Promise<void> {
    this.transition(PlaybackState.Idle);
    this.mediaPath = null;
    this.sessionId = null;
    this.splashActive = false;

    const result = await this.engine.launch(this.splashPath, { loop: true });
    if (!result.success) {
      this.logger.error(`Splash failed to start: ${result.error ?? 'unknown error'}`);
      this.scheduleSplashRetry();
      return;
    }

    this.sessionId = result.sessionId;
    this.splashActive = true;
    this.logger.log('Showing splash screen');
  }

  /**
   * Converge on the splash screen whatever went wrong
   */
  private async recoverToSplash(): Promise<void> {
    try {
      await this.showSplash();
    } catch (error) {
      this.logger.error(`Cannot show splash: ${errorMessage(error)}`);
      this.scheduleSplashRetry();
    }
  }

  private scheduleSplashRetry(): void {
    if (this.splashRetryTimer || this.exited) {
      return;
    }
    this.splashRetryTimer = setTimeout(() => {
      this.splashRetryTimer = null;
      this.queue.push({ type: 'splash-retry' });
    }, SPLASH_RETRY_MS);
  }

  private cancelSplashRetry(): void {
    if (this.splashRetryTimer) {
      clearTimeout(this.splashRetryTimer);
      this.splashRetryTimer = null;
    }
  }

  private transition(next: PlaybackState): void {
    if (this.state === next) {
      return;
    }
    this.logger.log(`State: ${this.state} -> ${next}`);
    this.state = next;
  }
}
