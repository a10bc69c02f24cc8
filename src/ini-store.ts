/**
 * KeyValueStore backed by an INI file.
 *
 * Every write rewrites the whole file through a synced temporary file and a
 * rename, so a process kill leaves either the previous or the new contents.
 */
import { readFileSync } from 'node:fs';
import type { KeyValueStore } from './types/collaborators.js';
import { isMissingFile, writeFileDurableSync } from './utils/fs.js';
import { parseIni, serializeIni } from './utils/ini.js';

export class IniKeyValueStore implements KeyValueStore {
  constructor(public readonly filePath: string) {}

  get(key: string): string | undefined {
    return this.load().get(key);
  }

  set(key: string, value: string): void {
    this.setMany({ [key]: value });
  }

  setMany(entries: Readonly<Record<string, string>>): void {
    const values = this.load();
    for (const [key, value] of Object.entries(entries)) {
      values.set(key, value);
    }
    writeFileDurableSync(this.filePath, serializeIni(values));
  }

  private load(): Map<string, string> {
    try {
      return parseIni(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      throw error;
    }
  }
}
