/**
 * Interfaces of the services the patch engine consumes and produces.
 */
import type { SequencerState } from './sequencer-state.js';

/**
 * Fetches a URL to a local file.
 */
export interface PatchTransport {
  /** Resolves false when the file could not be fetched. */
  download(url: string, destinationPath: string): Promise<boolean>;
}

/**
 * Reports the newest patch version published by the server.
 */
export interface VersionSource {
  targetVersion(): Promise<number>;
}

/**
 * Synchronous string key-value persistence. Keys are "Section.Key".
 */
export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  /** Writes every pair in one durable step. */
  setMany(entries: Readonly<Record<string, string>>): void;
}

/**
 * Observer of sequencer progress. Return values are ignored.
 */
export interface ProgressListener {
  onPhaseChanged(phase: SequencerState, current: number, total: number): void;
  onItemProgress?(phase: SequencerState, completed: number, total: number): void;
}
