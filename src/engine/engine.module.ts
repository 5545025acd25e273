import { Module } from '@nestjs/common';
import { PlaybackEngineService } from './playback-engine.service';
import { PLAYBACK_ENGINE } from './engine.types';

@Module({
  providers: [
    PlaybackEngineService,
    {
      provide: PLAYBACK_ENGINE,
      useExisting: PlaybackEngineService,
    },
  ],
  exports: [PLAYBACK_ENGINE],
})
export class EngineModule {}
