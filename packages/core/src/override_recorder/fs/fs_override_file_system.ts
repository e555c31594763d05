/**
 * FsOverrideFileSystem - node fs/promises implementation of OverrideFileSystem
 *
 * Every node error is rethrown as FilesystemError carrying the path and the
 * operation that failed.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type { OverrideFileSystem } from '../override_recorder.types';
import { FilesystemError } from '../errors';
import type { FilesystemOperation } from '../errors';

export type FsOverrideFileSystemOptions = {
  /** Directory for scratch files (default: os.tmpdir()) */
  tempDir?: string;
};

async function wrap<T>(operation: FilesystemOperation, filePath: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new FilesystemError(operation, filePath, error instanceof Error ? error.message : String(error));
  }
}

export class FsOverrideFileSystem implements OverrideFileSystem {
  private readonly tempDir: string;

  constructor(options: FsOverrideFileSystemOptions = {}) {
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await wrap('write', filePath, () => fs.writeFile(filePath, content, 'utf-8'));
  }

  /**
   * Opens the file in append mode, so entries written by other processes
   * in between are kept.
   */
  async appendFile(filePath: string, content: string): Promise<void> {
    await wrap('append', filePath, () => fs.appendFile(filePath, content, { encoding: 'utf-8', flag: 'a' }));
  }

  async createTempFile(content: string): Promise<string> {
    const filePath = path.join(this.tempDir, `pushgate-msg-${randomUUID()}.txt`);
    await wrap('create-temp', filePath, async () => {
      try {
        // wx: never reuse an existing file
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        // a file that already existed is not ours to remove
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          await fs.rm(filePath, { force: true });
        }
        throw error;
      }
    });
    return filePath;
  }

  async removeTempFile(filePath: string): Promise<void> {
    await wrap('remove-temp', filePath, () => fs.rm(filePath, { force: true }));
  }
}
