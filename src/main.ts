#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { createAppLogger, getLogDirectory, WinstonLoggerService } from './common/logger';
import { PlayerConfigService } from './config/player-config.service';
import { runPlayer } from './run-player';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const { logLevel } = app.get(PlayerConfigService).config;
  app.useLogger(new WinstonLoggerService(createAppLogger(getLogDirectory(), logLevel)));
  app.enableShutdownHooks(['SIGINT', 'SIGTERM']);

  logger.log('====================================');
  logger.log('SCANPLAY STARTING');
  logger.log(`Process ID: ${process.pid}`);
  logger.log(`Logs: ${getLogDirectory()}`);
  logger.log('====================================');

  await runPlayer(app, {
    keyboardMode: process.argv.includes('--keyboard'),
    exit: (code) => process.exit(code),
  });
}

bootstrap().catch((error: unknown) => {
  logger.error('=== STARTUP ERROR ===');
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exit(1);
});
