/**
 * Engine - the mpv process and its JSON IPC control channel
 *
 * Usage:
 *   const mpv = new MpvBridge(config.engine);
 *   mpv.on('end-of-file', (payload) => ...);
 *   await mpv.launch('/srv/media/intro.mp4');
 *   await mpv.command({ name: 'pause' });
 *   await mpv.terminate();
 */

export { MpvIpcClient, parseMpvMessage, type MpvEventMessage, type MpvMessage, type MpvConnectOptions } from './mpv-ipc-client';

export { MpvBridge, type EngineProcess, type SpawnFunction, type MpvBridgeConfig } from './mpv-bridge';

export {
  PLAYBACK_ENGINE,
  type PlaybackEngine,
  type EngineCommand,
  type EngineLaunchResult,
  type EngineSessionInfo,
  type LaunchOptions,
} from './engine.types';

export { PlaybackEngineService } from './playback-engine.service';

export { EngineModule } from './engine.module';
