import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PlayerConfigService } from '../config/player-config.service';
import { ExitRequestedPayload, InternalEvent, ScanReceivedPayload } from '../common/events';
import { DeviceWatcher, DeviceWatcherOptions, OpenDeviceStream } from './device-watcher';
import { InputDeviceInfo, InputEvent, KEY_Q, hasKey } from './evdev';
import { DeviceRole, ScanReconstructor } from './scan-reconstructor';

/**
 * ScannerInputService - turns raw evdev key events into bus events
 *
 * Two watchers:
 * - the scanner (first device whose name contains the configured substring),
 *   whose keystrokes are rebuilt into scan tokens
 * - every other keyboard, watched only for the exit keys so a local keyboard
 *   can back out of playback
 */
@Injectable()
export class ScannerInputService implements OnModuleDestroy {
  private readonly logger = new Logger(ScannerInputService.name);
  private readonly reconstructors = new Map<string, ScanReconstructor>();
  private scannerWatcher: DeviceWatcher | null = null;
  private keyboardWatcher: DeviceWatcher | null = null;

  constructor(
    private readonly configService: PlayerConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  startScanner(openStream?: OpenDeviceStream): DeviceWatcher {
    if (this.scannerWatcher) {
      return this.scannerWatcher;
    }

    const { scannerDeviceName, inputDevicesFile, scannerReconnectMs } = this.configService.config;
    this.logger.log(`Looking for scanner matching "${scannerDeviceName}"`);

    this.scannerWatcher = this.createWatcher('scanner', {
      label: scannerDeviceName,
      devicesFile: inputDevicesFile,
      retryMs: scannerReconnectMs,
      select: (devices) => devices.filter((device) => device.name.includes(scannerDeviceName)).slice(0, 1),
      openStream,
    });
    return this.scannerWatcher;
  }

  startExitWatcher(openStream?: OpenDeviceStream): DeviceWatcher {
    if (this.keyboardWatcher) {
      return this.keyboardWatcher;
    }

    const { scannerDeviceName, inputDevicesFile, scannerReconnectMs } = this.configService.config;

    this.keyboardWatcher = this.createWatcher('keyboard', {
      label: 'keyboard',
      devicesFile: inputDevicesFile,
      retryMs: scannerReconnectMs,
      select: (devices) =>
        devices.filter((device) => !device.name.includes(scannerDeviceName) && hasKey(device, KEY_Q)),
      openStream,
      rescan: true,
    });
    return this.keyboardWatcher;
  }

  stop(): void {
    this.scannerWatcher?.stop();
    this.keyboardWatcher?.stop();
    this.scannerWatcher = null;
    this.keyboardWatcher = null;
    this.reconstructors.clear();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  private createWatcher(role: DeviceRole, options: DeviceWatcherOptions): DeviceWatcher {
    const watcher = new DeviceWatcher(options);

    watcher.on('connected', (device: InputDeviceInfo) => {
      const key = `${role}:${device.eventPath}`;
      if (!this.reconstructors.has(key)) {
        this.reconstructors.set(key, new ScanReconstructor(role));
      }
    });
    // A line cut off by an unplug is not completed by the next device on that node
    watcher.on('disconnected', (device: InputDeviceInfo) => {
      this.reconstructors.get(`${role}:${device.eventPath}`)?.reset();
    });
    watcher.on('key', (event: InputEvent, device: InputDeviceInfo) => this.onKey(role, event, device));

    watcher.start();
    return watcher;
  }

  private onKey(role: DeviceRole, event: InputEvent, device: InputDeviceInfo): void {
    const reconstructor = this.reconstructors.get(`${role}:${device.eventPath}`);
    if (!reconstructor) {
      return;
    }

    const output = reconstructor.feed(event);
    if (!output) {
      return;
    }

    if (output.type === 'exit') {
      this.logger.log(`Exit key pressed on ${device.name}`);
      const payload: ExitRequestedPayload = { source: role, device: device.name };
      this.eventEmitter.emit(InternalEvent.EXIT_REQUESTED, payload);
      return;
    }

    this.logger.log(`Scanned: ${output.text}`);
    const payload: ScanReceivedPayload = { text: output.text, source: 'scanner', receivedAt: performance.now() };
    this.eventEmitter.emit(InternalEvent.SCAN_RECEIVED, payload);
  }
}
