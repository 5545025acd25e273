import * as path from 'path';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { PlayerEnvironment } from './player-environment.dto';

export interface EngineConfig {
  binaryPath: string;
  socketPath: string;
  extraArgs: string[];
  startupTimeoutMs: number;
  socketPollMs: number;
  requestTimeoutMs: number;
  killGraceMs: number;
}

export interface PlayerConfig {
  mediaDir: string;
  splashPath: string;
  mediaExtensions: string[];
  scannerDeviceName: string;
  inputDevicesFile: string;
  scannerReconnectMs: number;
  scanDebounceMs: number;
  volumeStep: number;
  seekStepSeconds: number;
  logLevel: string;
  engine: EngineConfig;
}

export const PLAYER_CONFIG_KEY = 'player';

/**
 * Validate raw environment variables and fail fast on anything malformed
 */
export function validateEnvironment(env: Record<string, unknown>): PlayerEnvironment {
  // Drop empty strings so property defaults apply
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const validated = plainToInstance(PlayerEnvironment, present, {
    enableImplicitConversion: false,
    excludeExtraneousValues: false,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }

  return validated;
}

export function parseExtensions(list: string): string[] {
  return list
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

export function toPlayerConfig(env: PlayerEnvironment): PlayerConfig {
  return {
    mediaDir: path.resolve(env.MEDIA_DIR),
    splashPath: path.resolve(env.SPLASH_PATH),
    mediaExtensions: parseExtensions(env.MEDIA_EXTENSIONS),
    scannerDeviceName: env.SCANNER_DEVICE_NAME,
    inputDevicesFile: env.INPUT_DEVICES_FILE,
    scannerReconnectMs: env.SCANNER_RECONNECT_MS,
    scanDebounceMs: env.SCAN_DEBOUNCE_MS,
    volumeStep: env.VOLUME_STEP,
    seekStepSeconds: env.SEEK_STEP_SECONDS,
    logLevel: env.LOG_LEVEL,
    engine: {
      binaryPath: env.MPV_PATH,
      socketPath: env.MPV_SOCKET,
      extraArgs: env.MPV_EXTRA_ARGS.split(/\s+/).filter((arg) => arg.length > 0),
      startupTimeoutMs: env.ENGINE_STARTUP_TIMEOUT_MS,
      socketPollMs: env.ENGINE_SOCKET_POLL_MS,
      requestTimeoutMs: env.ENGINE_REQUEST_TIMEOUT_MS,
      killGraceMs: env.ENGINE_KILL_GRACE_MS,
    },
  };
}

/**
 * ConfigModule loader - `ConfigService.get('player')` returns the PlayerConfig
 */
export const environment = (): { [PLAYER_CONFIG_KEY]: PlayerConfig } => ({
  [PLAYER_CONFIG_KEY]: toPlayerConfig(validateEnvironment(process.env)),
});
