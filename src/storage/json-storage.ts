import { mkdir, readFile, writeFile, access, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { isNotFound } from '../utils/errno.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous version as <key>.backup.json (default: true) */
  createBackup?: boolean;
  /** Logger for recovery warnings */
  logger?: Logger;
}

const EXTENSION = '.json';

/**
 * JSON file-based storage.
 *
 * - Atomic writes (temp file + rename)
 * - Previous version kept as a backup
 * - Self-heals files left with two concatenated documents by an interrupted writer
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  private pathFor(key: string, suffix = ''): string {
    return join(this.basePath, `${key}${suffix}${EXTENSION}`);
  }

  async load(key: string): Promise<unknown> {
    const path = this.pathFor(key);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }

      const recovered = await this.recover(key, path, content);
      if (recovered !== undefined) {
        return recovered;
      }

      const backup = await this.loadBackup(key);
      if (backup !== undefined) {
        this.logger?.warn({ key }, 'Loaded from backup after corruption recovery failed');
        return backup;
      }

      throw error;
    }
  }

  /**
   * Recover the first document from a file where a second write was appended
   * (`}{` or `]{`). Saves the recovered data back and keeps the original as
   * <file>.corrupted. Returns undefined when nothing could be recovered.
   */
  private async recover(key: string, path: string, content: string): Promise<unknown> {
    const objectBreak = content.indexOf('}{');
    const arrayBreak = content.indexOf(']{');
    const cut = objectBreak !== -1 ? objectBreak : arrayBreak;
    if (cut === -1) {
      this.logger?.error({ key }, 'Cannot find corruption pattern for recovery');
      return undefined;
    }

    const truncated = content.slice(0, cut + 1);
    let data: unknown;
    try {
      data = JSON.parse(truncated);
    } catch {
      this.logger?.error({ key }, 'Failed to parse recovered content');
      return undefined;
    }

    const corruptedPath = `${path}.corrupted`;
    await writeFile(corruptedPath, content, 'utf-8');
    await this.save(key, data);

    this.logger?.warn(
      {
        key,
        bytesLost: content.length - truncated.length,
        corruptedBackup: corruptedPath,
      },
      'Self-healed corrupted JSON file'
    );
    return data;
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.pathFor(key, '.backup'), 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      this.logger?.debug(
        { key, error: error instanceof Error ? error.message : String(error) },
        'No usable backup'
      );
      return undefined;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const path = this.pathFor(key);
    const tempPath = this.pathFor(key, '.tmp');

    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.fileExists(path))) {
      try {
        await rename(path, this.pathFor(key, '.backup'));
      } catch (error) {
        // Backup is best effort; the new version is still written
        this.logger?.warn(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Failed to rotate backup'
        );
      }
    }

    await rename(tempPath, path);
  }

  private async fileExists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

/**
 * Factory function for creating JSON storage.
 */
export function createJSONStorage(
  basePath: string,
  options?: Omit<JSONStorageConfig, 'basePath'>
): JSONStorage {
  return new JSONStorage({ basePath, ...options });
}
