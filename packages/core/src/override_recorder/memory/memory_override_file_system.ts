/**
 * MemoryOverrideFileSystem - in-memory OverrideFileSystem for tests
 *
 * Test Helpers:
 * - getFile(path): current content or undefined
 * - getTempFiles(): scratch files not yet removed
 * - failOn(operation): make an operation reject with FilesystemError
 */

import type { OverrideFileSystem } from '../override_recorder.types';
import { FilesystemError } from '../errors';
import type { FilesystemOperation } from '../errors';

export class MemoryOverrideFileSystem implements OverrideFileSystem {
  private files = new Map<string, string>();
  private tempFiles = new Set<string>();
  private failures = new Set<FilesystemOperation>();
  private tempCounter = 0;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  getFile(filePath: string): string | undefined {
    return this.files.get(filePath);
  }

  /** Reader suitable for MemoryGitModule's message file */
  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new FilesystemError('read', filePath, 'no such file');
    }
    return content;
  }

  getTempFiles(): string[] {
    return [...this.tempFiles];
  }

  failOn(operation: FilesystemOperation): void {
    this.failures.add(operation);
  }

  private assertAvailable(operation: FilesystemOperation, filePath: string): void {
    if (this.failures.has(operation)) {
      throw new FilesystemError(operation, filePath, 'simulated filesystem failure');
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // OverrideFileSystem
  // ═══════════════════════════════════════════════════════════════════════

  async writeFile(filePath: string, content: string): Promise<void> {
    this.assertAvailable('write', filePath);
    this.files.set(filePath, content);
  }

  async appendFile(filePath: string, content: string): Promise<void> {
    this.assertAvailable('append', filePath);
    this.files.set(filePath, (this.files.get(filePath) ?? '') + content);
  }

  async createTempFile(content: string): Promise<string> {
    this.tempCounter += 1;
    const filePath = `/tmp/pushgate-msg-${this.tempCounter}.txt`;
    this.assertAvailable('create-temp', filePath);
    this.files.set(filePath, content);
    this.tempFiles.add(filePath);
    return filePath;
  }

  async removeTempFile(filePath: string): Promise<void> {
    this.assertAvailable('remove-temp', filePath);
    this.files.delete(filePath);
    this.tempFiles.delete(filePath);
  }
}
