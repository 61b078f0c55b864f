/**
 * Output Store
 * Generated CSV exports on local disk, with age-based retention.
 */
import { constants } from 'fs';
import { access, mkdir, readdir, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import type { OutputSink } from '@tariffline/core';
import { ExportFilenameSchema } from '@tariffline/shared';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CleanupResult {
  filesRemoved: number;
  bytesRemoved: number;
}

export class FileSystemOutputStore implements OutputSink {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async ensureDirectory(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  async write(filename: string, content: string): Promise<string> {
    const target = this.resolve(filename);
    if (!target) {
      throw new Error(`Refusing to write outside the output directory: ${filename}`);
    }
    await this.ensureDirectory();
    await writeFile(target, content, 'utf8');
    return target;
  }

  /** Absolute path of a generated export, or null for anything that is not one */
  resolve(filename: string): string | null {
    const parsed = ExportFilenameSchema.safeParse(filename);
    if (!parsed.success) return null;
    const target = path.resolve(this.directory, parsed.data);
    return path.dirname(target) === this.directory ? target : null;
  }

  async exists(filename: string): Promise<boolean> {
    const target = this.resolve(filename);
    if (!target) return false;
    try {
      return (await stat(target)).isFile();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async isWritable(): Promise<boolean> {
    try {
      await this.ensureDirectory();
      await access(this.directory, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  /** Remove CSV exports last modified more than `days` days before `now` */
  async cleanup(days: number, now: Date = new Date()): Promise<CleanupResult> {
    const cutoff = now.getTime() - days * DAY_MS;
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) return { filesRemoved: 0, bytesRemoved: 0 };
      throw error;
    }

    let filesRemoved = 0;
    let bytesRemoved = 0;
    for (const entry of entries) {
      const target = this.resolve(entry);
      if (!target) continue;
      const info = await stat(target);
      if (!info.isFile() || info.mtimeMs >= cutoff) continue;
      await unlink(target);
      filesRemoved++;
      bytesRemoved += info.size;
    }

    return { filesRemoved, bytesRemoved };
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
