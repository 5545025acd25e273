/**
 * Playback Engine Service - NestJS wrapper for MpvBridge
 * Re-publishes engine notifications on the application event bus
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PlayerConfigService } from '../config/player-config.service';
import { EndOfFilePayload, InternalEvent, PauseChangedPayload, ProcessExitedPayload } from '../common/events';
import { MpvBridge } from './mpv-bridge';
import { EngineCommand, EngineLaunchResult, EngineSessionInfo, LaunchOptions, PlaybackEngine } from './engine.types';

@Injectable()
export class PlaybackEngineService implements PlaybackEngine, OnModuleDestroy {
  private readonly logger = new Logger(PlaybackEngineService.name);
  private readonly mpv: MpvBridge;

  constructor(
    configService: PlayerConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.mpv = new MpvBridge(configService.config.engine);

    // Forward engine events from bridge to the bus
    this.mpv.on('end-of-file', (payload: EndOfFilePayload) => {
      this.eventEmitter.emit(InternalEvent.ENGINE_END_OF_FILE, payload);
    });
    this.mpv.on('process-exited', (payload: ProcessExitedPayload) => {
      this.eventEmitter.emit(InternalEvent.ENGINE_PROCESS_EXITED, payload);
    });
    this.mpv.on('pause-changed', (payload: PauseChangedPayload) => {
      this.eventEmitter.emit(InternalEvent.ENGINE_PAUSE_CHANGED, payload);
    });
  }

  launch(mediaPath: string, options?: LaunchOptions): Promise<EngineLaunchResult> {
    return this.mpv.launch(mediaPath, options);
  }

  command(request: EngineCommand): Promise<unknown> {
    return this.mpv.command(request);
  }

  terminate(): Promise<void> {
    return this.mpv.terminate();
  }

  getSession(): EngineSessionInfo | null {
    return this.mpv.getSession();
  }

  /**
   * Cleanup on module destroy (app shutdown)
   */
  async onModuleDestroy(): Promise<void> {
    if (this.mpv.getSession()) {
      this.logger.log('Module destroying - stopping mpv');
    }
    await this.mpv.terminate();
  }
}
