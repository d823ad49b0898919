/**
 * Subtitle files next to the media they belong to
 */

import { access, constants, mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { AcquisitionError } from './errors.js';
import type { SubtitleStorage } from './types.js';

/** `/movies/Heat.mkv` + `en` → `/movies/Heat.en.srt` */
export function subtitlePath(mediaPath: string, language: string, forced = false): string {
  const extension = extname(mediaPath);
  const stem = extension ? mediaPath.slice(0, -extension.length) : mediaPath;
  return `${stem}.${language}${forced ? '.forced' : ''}.srt`;
}

export class LocalSubtitleStorage implements SubtitleStorage {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async fileSize(path: string): Promise<number | undefined> {
    try {
      const info = await stat(path);
      return info.isFile() ? info.size : undefined;
    } catch {
      return undefined;
    }
  }

  async write(path: string, content: Buffer): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content);
    } catch (error) {
      throw new AcquisitionError(
        'local-write',
        `Cannot write ${path}: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }

  async canWrite(directory: string): Promise<boolean> {
    try {
      await access(directory, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}
