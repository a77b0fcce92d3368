/**
 * Unit tests for storage/media-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { LocalMediaStore, MemoryMediaStore } from '../../lib/storage/media-store.js';

const PNG = { mimeType: 'image/png', data: 'aW1hZ2U=' };

describe('storage/media-store', () => {
  describe('LocalMediaStore', () => {
    let root: string;
    let store: LocalMediaStore;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'media-'));
      store = new LocalMediaStore(root);
    });

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('should write the decoded image under the task directory', async () => {
      const url = await store.saveImage('banana-1', 0, PNG);

      expect(url).toBe('/media/banana-1/0.png');
      await expect(fs.readFile(path.join(root, 'banana-1', '0.png'), 'utf8')).resolves.toBe('image');
    });

    it('should name the file after the MIME type', async () => {
      await expect(store.saveImage('banana-1', 2, { mimeType: 'image/jpeg', data: 'QUJD' })).resolves.toBe(
        '/media/banana-1/2.jpg'
      );
    });

    it('should read back a saved image', async () => {
      const url = await store.saveImage('banana-1', 0, PNG);
      await expect(store.readImage(url)).resolves.toEqual(PNG);
    });

    it('should return null for foreign and missing URLs', async () => {
      await expect(store.readImage('https://cdn.test/0.png')).resolves.toBeNull();
      await expect(store.readImage('/media/banana-9/0.png')).resolves.toBeNull();
    });

    it('should refuse task ids that escape the root', async () => {
      await expect(store.saveImage('../outside', 0, PNG)).rejects.toThrow('Unsafe task id for media path: ../outside');
    });

    it('should remove every file of a task', async () => {
      const url = await store.saveImage('banana-1', 0, PNG);
      await store.removeTask('banana-1');

      await expect(store.readImage(url)).resolves.toBeNull();
    });
  });

  describe('MemoryMediaStore', () => {
    it('should keep images per task', async () => {
      const store = new MemoryMediaStore();
      const first = await store.saveImage('banana-1', 0, PNG);
      const other = await store.saveImage('banana-2', 0, PNG);

      await store.removeTask('banana-1');

      await expect(store.readImage(first)).resolves.toBeNull();
      await expect(store.readImage(other)).resolves.toEqual(PNG);
    });
  });
});
