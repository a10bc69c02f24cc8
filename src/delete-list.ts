/**
 * Delete list: newline-separated relative paths a patch removes.
 */
import { readFile, rm } from 'node:fs/promises';
import { isMissingFile, pathExists } from './utils/fs.js';
import { safeJoin, toPosixPath } from './utils/paths.js';

export interface DeleteResult {
  readonly removed: readonly string[];
  readonly missing: readonly string[];
}

export class DeleteList {
  private constructor(public readonly paths: readonly string[]) {}

  static readonly EMPTY: DeleteList = new DeleteList([]);

  get size(): number {
    return this.paths.length;
  }

  /**
   * Parses delete-list lines. Blank lines are noise; order and duplicates are kept.
   */
  static parse(lines: string | readonly string[]): DeleteList {
    const rawLines = typeof lines === 'string' ? lines.split(/\r?\n/) : lines;
    const paths: string[] = [];
    for (const rawLine of rawLines) {
      const line = rawLine.trim();
      if (line) {
        paths.push(toPosixPath(line));
      }
    }
    return new DeleteList(paths);
  }

  /**
   * Reads a UTF-8 delete list; an absent file is an empty list.
   */
  static async read(filePath: string): Promise<DeleteList> {
    try {
      return DeleteList.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      if (isMissingFile(error)) {
        return DeleteList.EMPTY;
      }
      throw error;
    }
  }

  /**
   * Removes every listed path under root. Missing paths are recorded, not errors.
   *
   * @throws {UnsafePathError} If a listed path escapes the root
   */
  static async apply(
    list: DeleteList,
    root: string,
    onProgress?: (completed: number, total: number) => void,
  ): Promise<DeleteResult> {
    const targets = list.paths.map(relPath => ({ relPath, absolute: safeJoin(root, relPath) }));
    const removed: string[] = [];
    const missing: string[] = [];

    for (const [index, { relPath, absolute }] of targets.entries()) {
      if (await pathExists(absolute)) {
        await rm(absolute, { recursive: true, force: true });
        removed.push(relPath);
      } else {
        missing.push(relPath);
      }
      onProgress?.(index + 1, targets.length);
    }
    return { removed, missing };
  }
}
