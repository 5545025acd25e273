import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as readline from 'readline';
import { Readable } from 'stream';
import { ExitRequestedPayload, InternalEvent, ScanReceivedPayload } from '../common/events';

/**
 * Diagnostic input: every line typed on stdin is treated as a scan
 * (for machines without a scanner attached)
 */
@Injectable()
export class StdinInputService implements OnModuleDestroy {
  private readonly logger = new Logger(StdinInputService.name);
  private rl: readline.Interface | null = null;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  start(input: Readable = process.stdin): void {
    if (this.rl) {
      return;
    }

    this.logger.log('Keyboard mode: type QR code text and press Enter');
    const rl = readline.createInterface({ input, terminal: false });
    this.rl = rl;

    rl.on('line', (line) => {
      const text = line.trim();
      if (!text) {
        return;
      }
      const payload: ScanReceivedPayload = { text, source: 'stdin', receivedAt: performance.now() };
      this.eventEmitter.emit(InternalEvent.SCAN_RECEIVED, payload);
    });

    // End of input requests Exit; a close from stop() finds this.rl already cleared
    rl.on('close', () => {
      if (this.rl !== rl) {
        return;
      }
      this.rl = null;
      this.logger.log('stdin closed, exiting');
      const payload: ExitRequestedPayload = { source: 'stdin' };
      this.eventEmitter.emit(InternalEvent.EXIT_REQUESTED, payload);
    });
  }

  stop(): void {
    const rl = this.rl;
    this.rl = null;
    rl?.close();
  }

  onModuleDestroy(): void {
    this.stop();
  }
}
