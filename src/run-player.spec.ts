import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from './app.module';
import { PlayerConfigService } from './config/player-config.service';
import { PLAYBACK_ENGINE } from './engine';
import { runPlayer } from './run-player';
import { createConfigService } from './testing/config.fixture';
import { FakePlaybackEngine } from './testing/playback-engine.fixture';

describe('runPlayer', () => {
  let dir: string;
  let engine: FakePlaybackEngine;
  let moduleRef: TestingModule;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanplay-run-'));
    engine = new FakePlaybackEngine();

    moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PlayerConfigService)
      .useValue(
        createConfigService({
          mediaDir: path.join(dir, 'media'),
          splashPath: '/opt/scanplay/splash.png',
          // no devices file: the exit watcher keeps retrying until shutdown
          inputDevicesFile: path.join(dir, 'devices'),
          scannerReconnectMs: 20,
        }),
      )
      .overrideProvider(PLAYBACK_ENGINE)
      .useValue(engine)
      .compile();
    await moduleRef.init();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('closes the context and exits with 0 after CMD:EXIT', async () => {
    const close = jest.spyOn(moduleRef, 'close');
    const exit = jest.fn();
    const stdin = new PassThrough();

    const running = runPlayer(moduleRef, { keyboardMode: true, exit, stdin });
    stdin.write('CMD:EXIT\n');
    await running;

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(close).toHaveBeenCalledTimes(1);
    expect(close.mock.invocationCallOrder[0]).toBeLessThan(exit.mock.invocationCallOrder[0]);
  });

  it('exits when keyboard input ends', async () => {
    const exit = jest.fn();
    const stdin = new PassThrough();

    const running = runPlayer(moduleRef, { keyboardMode: true, exit, stdin });
    stdin.end();
    await running;

    expect(exit).toHaveBeenCalledWith(0);
  });
});
