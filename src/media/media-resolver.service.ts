import { Injectable, Logger } from '@nestjs/common';
import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PlayerConfigService } from '../config/player-config.service';
import { PlayerErrorCode, errorMessage } from '../common/errors';

export type MediaResolution =
  | { found: true; reference: string; path: string }
  | { found: false; reference: string; code: PlayerErrorCode.MEDIA_NOT_FOUND; reason: string };

/**
 * MediaResolverService - maps a scanned reference to a file in the media directory
 *
 * The index is rebuilt from a directory listing on every lookup, so files copied
 * in while the player is running are playable on the next scan.
 * Key: file name without extension, lower-cased.
 */
@Injectable()
export class MediaResolverService {
  private readonly logger = new Logger(MediaResolverService.name);
  private readonly mediaDir: string;
  private readonly extensions: ReadonlySet<string>;

  constructor(configService: PlayerConfigService) {
    this.mediaDir = configService.config.mediaDir;
    this.extensions = new Set(configService.config.mediaExtensions);
  }

  get directory(): string {
    return this.mediaDir;
  }

  /**
   * Create the media directory if it does not exist yet
   */
  async ensureMediaDir(): Promise<void> {
    await fs.mkdir(this.mediaDir, { recursive: true });
  }

  async resolve(reference: string): Promise<MediaResolution> {
    const key = reference.trim().toLowerCase();

    // Reject anything that could escape the media directory
    if (!key || key.includes('/') || key.includes('\\') || key.includes('..')) {
      return this.notFound(reference, 'reference is not a plain file name');
    }

    const index = await this.buildIndex();
    const match = index.get(key);
    if (!match) {
      return this.notFound(reference, `no file in ${this.mediaDir}`);
    }

    return { found: true, reference: key, path: match };
  }

  /**
   * Current index: reference -> absolute path
   */
  async listCatalog(): Promise<Map<string, string>> {
    return this.buildIndex();
  }

  private async buildIndex(): Promise<Map<string, string>> {
    const index = new Map<string, string>();

    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.mediaDir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn(`Cannot read media directory ${this.mediaDir}: ${errorMessage(error)}`);
      return index;
    }

    const files = entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => ({ name: entry.name, link: entry.isSymbolicLink() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const { name: filename, link } of files) {
      const ext = path.extname(filename).toLowerCase();
      if (!this.extensions.has(ext)) {
        continue;
      }
      if (link && !(await this.linksToFile(path.join(this.mediaDir, filename)))) {
        continue;
      }

      const key = path.basename(filename, path.extname(filename)).toLowerCase();
      if (index.has(key)) {
        this.logger.debug(`Ignoring ${filename}: "${key}" already maps to ${index.get(key)}`);
        continue;
      }
      index.set(key, path.join(this.mediaDir, filename));
    }

    return index;
  }

  private async linksToFile(linkPath: string): Promise<boolean> {
    try {
      return (await fs.stat(linkPath)).isFile();
    } catch (error) {
      this.logger.debug(`Ignoring dangling link ${linkPath}: ${errorMessage(error)}`);
      return false;
    }
  }

  private notFound(reference: string, reason: string): MediaResolution {
    return { found: false, reference, code: PlayerErrorCode.MEDIA_NOT_FOUND, reason };
  }
}
