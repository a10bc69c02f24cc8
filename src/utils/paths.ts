import path from 'node:path';
import { UnsafePathError } from '../errors.js';

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, '/');
}

/**
 * Normalises an archive or delete-list path to '/'-separated form without
 * leading or trailing separators. Returns null when the path is empty,
 * absolute, drive-qualified or contains '.', '..' or empty segments.
 */
export function normalizeRelativePath(rawPath: string): string | null {
  let posixPath = toPosixPath(rawPath);
  while (posixPath.endsWith('/')) {
    posixPath = posixPath.slice(0, -1);
  }
  if (!posixPath || posixPath.includes('\0')) {
    return null;
  }
  if (posixPath.startsWith('/') || /^[a-zA-Z]:/.test(posixPath)) {
    return null;
  }
  for (const segment of posixPath.split('/')) {
    if (!segment || segment === '.' || segment === '..') {
      return null;
    }
  }
  return posixPath;
}

/**
 * Case-insensitive lookup key for a path or name.
 */
export function pathKey(relPath: string): string {
  return relPath.toLowerCase();
}

/**
 * Resolves a relative path under rootDir.
 * @throws {UnsafePathError} If the path is unsafe or escapes the root
 */
export function safeJoin(rootDir: string, relPath: string): string {
  const normalized = normalizeRelativePath(relPath);
  if (normalized === null) {
    throw new UnsafePathError(relPath, rootDir);
  }
  const rootResolved = path.resolve(rootDir);
  const targetResolved = path.resolve(rootResolved, ...normalized.split('/'));
  const relative = path.relative(rootResolved, targetResolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new UnsafePathError(relPath, rootDir);
  }
  return targetResolved;
}
