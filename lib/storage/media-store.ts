/**
 * Local store for images that providers return inline
 *
 * Files live under `<root>/<taskId>/<index>.<ext>` and are served from
 * `/media/<taskId>/<index>.<ext>`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { InlineImage } from '../providers/types.js';

export const MEDIA_ROUTE = '/media';

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
};

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
};

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;

export interface MediaStore {
  saveImage(taskId: string, index: number, image: InlineImage): Promise<string>;
  readImage(url: string): Promise<InlineImage | null>;
  removeTask(taskId: string): Promise<void>;
}

export class LocalMediaStore implements MediaStore {
  constructor(private rootDir: string) {}

  private taskDir(taskId: string): string {
    if (!SAFE_SEGMENT.test(taskId)) {
      throw new Error(`Unsafe task id for media path: ${taskId}`);
    }
    return path.join(this.rootDir, taskId);
  }

  async saveImage(taskId: string, index: number, image: InlineImage): Promise<string> {
    const extension = Object.hasOwn(EXTENSIONS, image.mimeType) ? EXTENSIONS[image.mimeType] : 'png';
    const dir = this.taskDir(taskId);
    await fs.mkdir(dir, { recursive: true });
    const fileName = `${index}.${extension}`;
    await fs.writeFile(path.join(dir, fileName), Buffer.from(image.data, 'base64'));
    return `${MEDIA_ROUTE}/${taskId}/${fileName}`;
  }

  /**
   * Load an image previously saved by this store; null for foreign or missing URLs
   */
  async readImage(url: string): Promise<InlineImage | null> {
    const match = /^\/media\/([A-Za-z0-9_-]+)\/(\d+)\.([a-z]+)$/.exec(url);
    if (!match || !Object.hasOwn(MIME_TYPES, match[3])) return null;

    try {
      const data = await fs.readFile(path.join(this.taskDir(match[1]), `${match[2]}.${match[3]}`));
      return { mimeType: MIME_TYPES[match[3]], data: data.toString('base64') };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  async removeTask(taskId: string): Promise<void> {
    await fs.rm(this.taskDir(taskId), { recursive: true, force: true });
  }
}

/**
 * In-process store (tests and ephemeral runs)
 */
export class MemoryMediaStore implements MediaStore {
  private files = new Map<string, InlineImage>();

  async saveImage(taskId: string, index: number, image: InlineImage): Promise<string> {
    const extension = Object.hasOwn(EXTENSIONS, image.mimeType) ? EXTENSIONS[image.mimeType] : 'png';
    const url = `${MEDIA_ROUTE}/${taskId}/${index}.${extension}`;
    this.files.set(url, { ...image });
    return url;
  }

  async readImage(url: string): Promise<InlineImage | null> {
    return this.files.get(url) ?? null;
  }

  async removeTask(taskId: string): Promise<void> {
    for (const url of this.files.keys()) {
      if (url.startsWith(`${MEDIA_ROUTE}/${taskId}/`)) {
        this.files.delete(url);
      }
    }
  }
}
