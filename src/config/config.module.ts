import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { environment } from './environment';
import { PlayerConfigService } from './player-config.service';

@Global() // Make this module global so it can be accessed anywhere
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environment],
    }),
  ],
  providers: [PlayerConfigService],
  exports: [PlayerConfigService],
})
export class PlayerConfigModule {}
