import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { PlayerConfigModule } from './config/config.module';
import { InputModule } from './input/input.module';
import { PlayerModule } from './player/player.module';

@Module({
  imports: [
    PlayerConfigModule,
    EventEmitterModule.forRoot({
      global: true,
    }),
    InputModule,
    PlayerModule,
  ],
})
export class AppModule {}
