import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PLAYER_CONFIG_KEY, PlayerConfig } from './environment';

@Injectable()
export class PlayerConfigService {
  private readonly logger = new Logger(PlayerConfigService.name);
  readonly config: PlayerConfig;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<PlayerConfig>(PLAYER_CONFIG_KEY);
  }

  logSummary(): void {
    const { config } = this;
    this.logger.log(`Media directory: ${config.mediaDir}`);
    this.logger.log(`Splash: ${config.splashPath}`);
    this.logger.log(`Extensions: ${config.mediaExtensions.join(' ')}`);
    this.logger.log(`Scanner device: "${config.scannerDeviceName}"`);
    this.logger.log(`Engine: ${config.engine.binaryPath} (socket ${config.engine.socketPath})`);
    this.logger.log(`Log level: ${config.logLevel}`);
  }
}
