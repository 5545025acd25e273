import { Injectable, Logger } from '@nestjs/common';
import { PlayerConfigService } from '../config/player-config.service';
import { PlayerErrorCode } from '../common/errors';
import { COMMAND_PREFIX, Command, parseCommandName } from './command';

export type Classification =
  | { kind: 'command'; command: Command }
  | { kind: 'media'; reference: string }
  | { kind: 'invalid'; token: string; code: PlayerErrorCode.INVALID_COMMAND; reason: string };

export type AcceptedToken = Exclude<Classification, { kind: 'invalid' }>;

interface DebounceSlot {
  key: string;
  acceptedAt: number;
}

/**
 * TokenClassifierService - decides what a scanned line means
 *
 * `CMD:` tokens map to commands, everything else is a media reference.
 * Duplicate scans are suppressed with a single-slot debounce: only a repeat of
 * the *last accepted* token inside the window is dropped, so two different
 * cards scanned back to back always go through.
 */
@Injectable()
export class TokenClassifierService {
  private readonly logger = new Logger(TokenClassifierService.name);
  private readonly debounceMs: number;
  private lastAccepted: DebounceSlot | null = null;

  constructor(configService: PlayerConfigService) {
    this.debounceMs = configService.config.scanDebounceMs;
  }

  classify(token: string): Classification | null {
    const text = token.trim();
    if (!text) {
      return null;
    }

    if (text.startsWith(COMMAND_PREFIX)) {
      const name = text.slice(COMMAND_PREFIX.length);
      const command = parseCommandName(name);
      if (!command) {
        return {
          kind: 'invalid',
          token: text,
          code: PlayerErrorCode.INVALID_COMMAND,
          reason: `Unknown command: ${name}`,
        };
      }
      return { kind: 'command', command };
    }

    return { kind: 'media', reference: text.toLowerCase() };
  }

  /**
   * Classify and debounce. Returns null when the token is empty, invalid or a duplicate.
   */
  accept(token: string, now: number = performance.now()): AcceptedToken | null {
    const classification = this.classify(token);
    if (!classification) {
      return null;
    }

    if (classification.kind === 'invalid') {
      this.logger.warn(`[${classification.code}] ${classification.reason} (token "${classification.token}")`);
      return null;
    }

    const key = this.slotKey(classification);
    if (this.lastAccepted && this.lastAccepted.key === key && now - this.lastAccepted.acceptedAt < this.debounceMs) {
      this.logger.debug(`Debounced duplicate scan: ${key}`);
      return null;
    }

    this.lastAccepted = { key, acceptedAt: now };
    return classification;
  }

  private slotKey(classification: AcceptedToken): string {
    return classification.kind === 'command' ? `command:${classification.command}` : `media:${classification.reference}`;
  }
}
