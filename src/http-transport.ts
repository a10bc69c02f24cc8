/**
 * HTTP collaborators: patch downloads and the server's version document.
 */
import { mkdir, open, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { VersionUnavailableError } from './errors.js';
import type { PatchTransport, VersionSource } from './types/collaborators.js';
import { parseIni } from './utils/ini.js';

const DEFAULT_TIMEOUT = 5 * 60 * 1000; // 5 minutes

export interface HttpTransportOptions {
  timeoutMs?: number;
}

/**
 * Streams a URL into `<destination>.part`, renaming it into place once complete,
 * so an interrupted download never leaves a file at the destination path.
 */
export class HttpTransport implements PatchTransport {
  private readonly timeoutMs: number;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
  }

  async download(url: string, destinationPath: string): Promise<boolean> {
    const partPath = `${destinationPath}.part`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { method: 'GET', signal: controller.signal });
      if (!response.ok) {
        console.error(`Download of ${url} failed: ${response.status} ${response.statusText}`);
        return false;
      }
      if (!response.body) {
        console.error(`Download of ${url} failed: no response body`);
        return false;
      }

      await mkdir(path.dirname(destinationPath), { recursive: true });
      const handle = await open(partPath, 'w');
      const reader = response.body.getReader();
      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          await handle.write(value);
        }
        await handle.sync();
      } finally {
        reader.releaseLock();
        await handle.close();
      }

      await rename(partPath, destinationPath);
      return true;
    } catch (error) {
      console.error(`Download of ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
      await rm(partPath, { force: true });
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export interface HttpVersionSourceOptions {
  timeoutMs?: number;
  /** Flattened INI key holding the version. */
  key?: string;
}

/**
 * Reads the published patch version from a server document that is either a
 * bare integer or an INI file with a `[Version] PatchFileVersion=N` entry.
 */
export class HttpVersionSource implements VersionSource {
  private readonly timeoutMs: number;
  private readonly key: string;

  constructor(private readonly url: string, options: HttpVersionSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.key = options.key ?? 'Version.PatchFileVersion';
  }

  async targetVersion(): Promise<number> {
    let body: string;
    try {
      const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new VersionUnavailableError(`Version lookup failed: ${response.status} ${response.statusText}`);
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof VersionUnavailableError) {
        throw error;
      }
      throw new VersionUnavailableError(`Version lookup at ${this.url} failed`, error);
    }
    return parseVersionDocument(body, this.key);
  }
}

/**
 * @throws {VersionUnavailableError} If the document holds no non-negative integer version
 */
export function parseVersionDocument(body: string, key = 'Version.PatchFileVersion'): number {
  const trimmed = body.trim();
  const raw = /^\d+$/.test(trimmed) ? trimmed : parseIni(body).get(key);
  if (raw === undefined || !/^\d+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
    throw new VersionUnavailableError(`Version document has no valid ${key}`);
  }
  return Number(raw);
}
