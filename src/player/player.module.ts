import { Module } from '@nestjs/common';
import { MediaModule } from '../media/media.module';
import { TokensModule } from '../tokens/tokens.module';
import { EngineModule } from '../engine';
import { PlaybackControllerService } from './playback-controller.service';

@Module({
  imports: [MediaModule, TokensModule, EngineModule],
  providers: [PlaybackControllerService],
  exports: [PlaybackControllerService],
})
export class PlayerModule {}
