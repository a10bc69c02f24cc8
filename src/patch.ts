/**
 * One incremental patch: the archive pair that moves the client from
 * version - 1 to version.
 */
import { open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { ResolvedPatchEngineConfig } from './config.js';
import { ARCHIVE_SIGNATURE, SIGNATURE_SIZE } from './constants/archive-format.js';
import { isMissingFile, pathExists } from './utils/fs.js';

export class Patch {
  readonly fileStem: string;
  readonly headerUrl: string;
  readonly dataUrl: string;
  readonly headerPath: string;
  readonly dataPath: string;

  constructor(public readonly version: number, config: Pick<ResolvedPatchEngineConfig, 'patchBaseUrl' | 'patchDirectory' | 'files'>) {
    this.fileStem = `${config.files.patchPrefix}${String(version).padStart(4, '0')}`;
    this.headerUrl = `${config.patchBaseUrl}/${this.fileStem}.sah`;
    this.dataUrl = `${config.patchBaseUrl}/${this.fileStem}.saf`;
    this.headerPath = path.join(config.patchDirectory, `${this.fileStem}.sah`);
    this.dataPath = path.join(config.patchDirectory, `${this.fileStem}.saf`);
  }

  /** Local paths of the pair that are not on disk. */
  async missingFiles(): Promise<string[]> {
    const missing: string[] = [];
    for (const filePath of [this.headerPath, this.dataPath]) {
      if (!(await pathExists(filePath))) {
        missing.push(filePath);
      }
    }
    return missing;
  }

  async exists(): Promise<boolean> {
    return (await this.missingFiles()).length === 0;
  }

  /**
   * Both files are present and the header starts with the archive signature.
   */
  async isValid(): Promise<boolean> {
    if (!(await this.exists())) {
      return false;
    }
    let handle: FileHandle;
    try {
      handle = await open(this.headerPath, 'r');
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
    try {
      const signature = Buffer.alloc(SIGNATURE_SIZE);
      const { bytesRead } = await handle.read(signature, 0, SIGNATURE_SIZE, 0);
      return bytesRead === SIGNATURE_SIZE && signature.toString('ascii') === ARCHIVE_SIGNATURE;
    } finally {
      await handle.close();
    }
  }

  async delete(): Promise<void> {
    await rm(this.headerPath, { force: true });
    await rm(this.dataPath, { force: true });
  }
}
