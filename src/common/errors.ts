// Error taxonomy for the player. Everything except a missing engine binary at
// startup is handled inside the process and never terminates it.

export enum PlayerErrorCode {
  DEVICE_UNAVAILABLE = 'DEVICE_UNAVAILABLE',
  MEDIA_NOT_FOUND = 'MEDIA_NOT_FOUND',
  NO_ACTIVE_SESSION = 'NO_ACTIVE_SESSION',
  ENGINE_LAUNCH_FAILED = 'ENGINE_LAUNCH_FAILED',
  ENGINE_CRASHED = 'ENGINE_CRASHED',
  INVALID_COMMAND = 'INVALID_COMMAND',
  ENGINE_COMMAND_FAILED = 'ENGINE_COMMAND_FAILED',
  ENGINE_BINARY_MISSING = 'ENGINE_BINARY_MISSING',
}

export class PlayerError extends Error {
  constructor(
    readonly code: PlayerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DeviceUnavailableError extends PlayerError {
  constructor(readonly deviceName: string) {
    super(PlayerErrorCode.DEVICE_UNAVAILABLE, `Input device matching "${deviceName}" is not available`);
  }
}

export class NoActiveSessionError extends PlayerError {
  constructor(command: string) {
    super(PlayerErrorCode.NO_ACTIVE_SESSION, `Cannot send "${command}": no engine session is running`);
  }
}

export class EngineLaunchFailedError extends PlayerError {
  constructor(mediaPath: string, reason: string) {
    super(PlayerErrorCode.ENGINE_LAUNCH_FAILED, `Engine failed to start for ${mediaPath}: ${reason}`);
  }
}

export class EngineCommandFailedError extends PlayerError {
  constructor(command: string, reason: string) {
    super(PlayerErrorCode.ENGINE_COMMAND_FAILED, `Engine rejected "${command}": ${reason}`);
  }
}

export class EngineBinaryMissingError extends PlayerError {
  constructor(binaryPath: string) {
    super(PlayerErrorCode.ENGINE_BINARY_MISSING, `Playback engine binary not found at: ${binaryPath}`);
  }
}

/**
 * Normalize anything caught into a message for logging
 */
export function errorMessage(error: unknown): string {
  // Node core errors raised in another realm fail instanceof Error
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
