import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';

/**
 * Raw environment variables accepted by the player.
 * Defaults live on the properties; plainToInstance overwrites them when set.
 */
export class PlayerEnvironment {
  @IsString()
  @IsNotEmpty()
  MEDIA_DIR: string = './media';

  @IsString()
  @IsNotEmpty()
  SPLASH_PATH: string = './assets/splash.png';

  @IsString()
  @IsNotEmpty()
  MEDIA_EXTENSIONS: string = '.mp4,.mkv,.avi,.webm,.mov,.m4v,.ts,.flv';

  @IsString()
  @IsNotEmpty()
  MPV_PATH: string = 'mpv';

  @IsString()
  @IsNotEmpty()
  MPV_SOCKET: string = '/tmp/scanplay-mpv.sock';

  @IsOptional()
  @IsString()
  MPV_EXTRA_ARGS: string = '';

  @IsString()
  @IsNotEmpty()
  SCANNER_DEVICE_NAME: string = 'SCANNER';

  @IsString()
  @IsNotEmpty()
  INPUT_DEVICES_FILE: string = '/proc/bus/input/devices';

  @Type(() => Number)
  @IsInt()
  @Min(100)
  SCANNER_RECONNECT_MS: number = 3000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  SCAN_DEBOUNCE_MS: number = 2000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  VOLUME_STEP: number = 5;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  SEEK_STEP_SECONDS: number = 10;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  ENGINE_STARTUP_TIMEOUT_MS: number = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(10)
  ENGINE_SOCKET_POLL_MS: number = 250;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  ENGINE_REQUEST_TIMEOUT_MS: number = 2000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  ENGINE_KILL_GRACE_MS: number = 5000;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.toLowerCase() : value))
  @IsIn(['error', 'warn', 'info', 'verbose', 'debug', 'silly'])
  LOG_LEVEL: string = 'info';
}
