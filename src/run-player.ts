import { INestApplicationContext, Logger } from '@nestjs/common';
import { Readable } from 'stream';
import { PlayerConfigService } from './config/player-config.service';
import { ScannerInputService } from './input/scanner-input.service';
import { StdinInputService } from './input/stdin-input.service';
import { PlaybackControllerService } from './player/playback-controller.service';

export interface RunPlayerOptions {
  keyboardMode: boolean;
  // Called with 0 once the context is closed; pending device reads would otherwise hold the process open
  exit: (code: number) => void;
  stdin?: Readable;
}

const logger = new Logger('Bootstrap');

/**
 * Start input and playback on a created context and run until an exit is requested
 */
export async function runPlayer(app: INestApplicationContext, options: RunPlayerOptions): Promise<void> {
  app.get(PlayerConfigService).logSummary();

  const controller = app.get(PlaybackControllerService);
  await controller.start();

  if (options.keyboardMode) {
    app.get(StdinInputService).start(options.stdin);
  } else {
    app.get(ScannerInputService).startScanner();
  }
  app.get(ScannerInputService).startExitWatcher();

  logger.log('Ready - waiting for scans');

  await controller.waitForExit();
  await app.close();
  logger.log('Goodbye');
  options.exit(0);
}
