/**
 * Filesystem File Reader
 *
 * Reads configuration files from disk. Unlike a secret lookup, a missing or
 * unreadable file is not "not found": the error propagates so the caller can
 * abort credential resolution.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { IFileReader } from '../IFileReader.js';

export class FsFileReader implements IFileReader {
  private readonly baseDir: string;

  /**
   * @param baseDir - Directory relative paths are resolved against (default: cwd)
   */
  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  async read(filePath: string): Promise<Uint8Array> {
    return fs.readFile(path.resolve(this.baseDir, filePath));
  }
}
