// File store for generated checks, metadata files and template updates

import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageError } from '../../core/errors.js';

/**
 * Options for writing a check script
 */
export interface WriteCheckOptions {
  /** Add execute bits for user, group and others */
  executable: boolean;
}

/**
 * Thin wrapper over the filesystem for every write the kit makes
 */
export class CheckFileStore {
  /**
   * Checks whether a file or directory exists at the path
   */
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Writes a check script, creating parent directories
   */
  async writeCheck(filePath: string, content: string, options: WriteCheckOptions): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf-8');

      if (options.executable) {
        const stats = await fs.stat(filePath);
        await fs.chmod(filePath, stats.mode | 0o111);
      }
    } catch (error) {
      throw new StorageError(`Failed to write check ${filePath}: ${(error as Error).message}`, { path: filePath });
    }
  }

  /**
   * Writes pretty-printed JSON, creating parent directories
   */
  async writeJson(filePath: string, data: unknown): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to write ${filePath}: ${(error as Error).message}`, { path: filePath });
    }
  }

  /**
   * Replaces the target with a copy of the source through a temporary file
   * in the target directory, so readers never see a half-written template.
   */
  async replaceFile(sourcePath: string, targetPath: string): Promise<void> {
    const dir = path.dirname(targetPath);
    const tempPath = path.join(dir, `.${path.basename(targetPath)}.${process.pid}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.copyFile(sourcePath, tempPath);
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StorageError(`Failed to replace ${targetPath}: ${(error as Error).message}`, {
        source: sourcePath,
        target: targetPath
      });
    }
  }
}
