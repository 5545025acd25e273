/**
 * Device Watcher - discovers evdev devices and keeps reading them
 * Re-runs discovery on a fixed interval while the wanted device is missing,
 * and again whenever a device stream ends or errors.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import { Readable } from 'stream';
import { Logger } from '@nestjs/common';
import { DeviceUnavailableError, errorMessage } from '../common/errors';
import { InputDeviceInfo, InputEvent, decodeInputEvents, inputEventSize, listInputDevices } from './evdev';

export type DeviceSelector = (devices: InputDeviceInfo[]) => InputDeviceInfo[];
export type OpenDeviceStream = (eventPath: string) => Readable;

export interface DeviceWatcherOptions {
  // Used in log lines and DeviceUnavailable errors
  label: string;
  devicesFile: string;
  retryMs: number;
  select: DeviceSelector;
  openStream?: OpenDeviceStream;
  recordSize?: number;
  // Keep looking for additional devices while some are open
  rescan?: boolean;
}

const openDeviceFile: OpenDeviceStream = (eventPath) => fs.createReadStream(eventPath);

export class DeviceWatcher extends EventEmitter {
  private readonly logger: Logger;
  private readonly streams = new Map<string, Readable>();
  private retryTimer: NodeJS.Timeout | null = null;
  private running = false;
  private reportedUnavailable = false;

  constructor(private readonly options: DeviceWatcherOptions) {
    super();
    this.logger = new Logger(`DeviceWatcher:${options.label}`);
  }

  get openDevices(): string[] {
    return Array.from(this.streams.keys());
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    void this.discover();
  }

  stop(): void {
    this.running = false;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    for (const stream of this.streams.values()) {
      stream.destroy();
    }
    this.streams.clear();
  }

  /**
   * One discovery pass. Never throws: failures end in a scheduled retry.
   */
  async discover(): Promise<void> {
    if (!this.running) {
      return;
    }

    let selected: InputDeviceInfo[] = [];
    try {
      const devices = await listInputDevices(this.options.devicesFile);
      selected = this.options.select(devices).filter((device) => !this.streams.has(device.eventPath));
    } catch (error) {
      this.logger.warn(`Cannot list input devices from ${this.options.devicesFile}: ${errorMessage(error)}`);
    }

    if (!this.running) {
      return;
    }

    if (selected.length === 0 && this.streams.size === 0) {
      this.reportUnavailable();
      this.scheduleRetry();
      return;
    }

    for (const device of selected) {
      this.open(device);
    }

    if (this.options.rescan) {
      this.scheduleRetry();
    }
  }

  private open(device: InputDeviceInfo): void {
    const openStream = this.options.openStream ?? openDeviceFile;
    const recordSize = this.options.recordSize ?? inputEventSize();
    const stream = openStream(device.eventPath);
    this.streams.set(device.eventPath, stream);

    this.reportedUnavailable = false;
    this.logger.log(`Reading ${device.name} at ${device.eventPath}`);
    this.emit('connected', device);

    let pending: Buffer = Buffer.alloc(0);
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      const { events, rest } = decodeInputEvents(Buffer.concat([pending, bytes]), recordSize);
      pending = rest;
      for (const event of events) {
        this.emit('key', event, device);
      }
    });

    let lost = false;
    const onLost = (reason: string) => {
      if (lost) {
        return;
      }
      lost = true;
      this.streams.delete(device.eventPath);
      stream.destroy();
      if (!this.running) {
        return;
      }
      this.logger.warn(`Lost ${device.name} (${reason}), will reconnect...`);
      this.emit('disconnected', device);
      this.scheduleRetry();
    };

    stream.on('error', (err) => onLost(err.message));
    stream.on('end', () => onLost('end of stream'));
    stream.on('close', () => onLost('closed'));
  }

  private reportUnavailable(): void {
    if (this.reportedUnavailable) {
      return;
    }
    this.reportedUnavailable = true;
    const error = new DeviceUnavailableError(this.options.label);
    this.logger.warn(`[${error.code}] ${error.message}, retrying every ${this.options.retryMs}ms`);
    this.emit('unavailable', error);
  }

  private scheduleRetry(): void {
    if (!this.running || this.retryTimer) {
      return;
    }
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.discover();
    }, this.options.retryMs);
  }
}

