/**
 * Patch Extractor
 *
 * Writes every node of a patch tree onto the destination root. Writes are
 * unconditional overwrites keyed by path, so applying the same patch again
 * converges to the same contents.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { ArchiveCodec } from './archive-codec.js';
import type { RetryPolicy } from './config.js';
import { DEFAULT_RETRY } from './config.js';
import { FileLockedError } from './errors.js';
import type { FileTree } from './file-tree.js';
import { errorCode } from './utils/fs.js';
import { safeJoin } from './utils/paths.js';

/** Error codes raised while another process holds the file open. */
const LOCK_ERROR_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EPERM', 'EACCES', 'ETXTBSY', 'EAGAIN']);

export type FileWriter = (filePath: string, data: Buffer) => Promise<void>;

export interface ExtractorOptions {
  retry?: RetryPolicy;
  /** Replaces fs.writeFile for destination writes. */
  writeFile?: FileWriter;
}

export interface ExtractRequest {
  readonly tree: FileTree;
  readonly dataFilePath: string;
  readonly destinationRoot: string;
  readonly onProgress?: (completed: number, total: number) => void;
}

export interface ExtractResult {
  readonly filesWritten: number;
  readonly foldersCreated: number;
  readonly bytesWritten: number;
}

export class PatchExtractor {
  private readonly retry: Required<RetryPolicy>;
  private readonly writer: FileWriter;

  constructor(options: ExtractorOptions = {}) {
    this.retry = {
      attempts: options.retry?.attempts ?? DEFAULT_RETRY.attempts,
      delayMs: options.retry?.delayMs ?? DEFAULT_RETRY.delayMs,
      backoffFactor: options.retry?.backoffFactor ?? DEFAULT_RETRY.backoffFactor,
    };
    this.writer = options.writeFile ?? ((filePath, data) => writeFile(filePath, data));
  }

  /**
   * Applies a patch tree to the destination root.
   *
   * @throws {FileLockedError} If a destination stays locked through every attempt
   * @throws {TruncatedDataError} If the data file is shorter than an entry claims
   * @throws {UnsafePathError} If a node resolves outside the destination root
   */
  async apply(request: ExtractRequest): Promise<ExtractResult> {
    const { tree, dataFilePath, destinationRoot, onProgress } = request;
    await mkdir(destinationRoot, { recursive: true });

    let foldersCreated = 0;
    for (const folder of tree.folders()) {
      await mkdir(safeJoin(destinationRoot, folder.path), { recursive: true });
      foldersCreated += 1;
    }

    const total = tree.fileCount;
    let filesWritten = 0;
    let bytesWritten = 0;
    const dataFile = await ArchiveCodec.openDataFile({ dataPath: dataFilePath });
    try {
      for (const file of tree.files()) {
        const target = safeJoin(destinationRoot, file.path);
        const bytes = await ArchiveCodec.readEntryBytes({
          dataFile,
          entry: { relativePath: file.path, dataOffset: file.dataOffset, dataLength: file.dataLength },
        });
        await mkdir(path.dirname(target), { recursive: true });
        await this.writeWithRetry(target, bytes);
        filesWritten += 1;
        bytesWritten += bytes.length;
        onProgress?.(filesWritten, total);
      }
    } finally {
      await dataFile.handle.close();
    }

    return { filesWritten, foldersCreated, bytesWritten };
  }

  private async writeWithRetry(target: string, bytes: Buffer): Promise<void> {
    let delay = this.retry.delayMs;
    for (let attempt = 1; ; attempt++) {
      try {
        await this.writer(target, bytes);
        return;
      } catch (error) {
        const code = errorCode(error);
        if (code === undefined || !LOCK_ERROR_CODES.has(code)) {
          throw error;
        }
        if (attempt >= this.retry.attempts) {
          throw new FileLockedError(target, attempt, error);
        }
        console.warn(`${target} is locked (${code}), retrying in ${delay}ms (attempt ${attempt}/${this.retry.attempts})`);
        await sleep(delay);
        delay *= this.retry.backoffFactor;
      }
    }
  }
}
