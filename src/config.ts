/**
 * Patch engine configuration
 */
import path from 'node:path';
import { InvalidConfigError } from './errors.js';

// ========== Retry ==========

/**
 * Bounded retry for destination writes that hit a locked file.
 */
export interface RetryPolicy {
  /** Total write attempts, including the first. */
  attempts?: number;
  /** Wait before the second attempt. */
  delayMs?: number;
  /** Multiplier applied to the wait after each failed attempt. */
  backoffFactor?: number;
}

// ========== File names ==========

export interface PatchFileNames {
  /** Client data archive header, relative to the destination root. */
  dataHeader?: string;
  dataFile?: string;
  /** Update archive pair a patch may ship for merging into the data archive. */
  updateHeader?: string;
  updateFile?: string;
  deleteList?: string;
  /** Prefix of downloaded patch archives; the version follows, zero-padded. */
  patchPrefix?: string;
}

// ========== Config ==========

export interface PatchEngineConfig {
  destinationRoot: string;
  /** Base URL the per-version patch archives are served from. */
  patchBaseUrl: string;
  /** Directory downloaded patches are written to. Defaults to the destination root. */
  patchDirectory?: string;
  /** INI file holding the version and checkpoint keys. Defaults to Version.ini in the root. */
  storeFile?: string;
  retry?: RetryPolicy;
  files?: PatchFileNames;
}

// ========== Defaults ==========

export const DEFAULT_RETRY = {
  attempts: 5,
  delayMs: 200,
  backoffFactor: 2,
} as const;

export const DEFAULT_FILE_NAMES = {
  dataHeader: 'data.sah',
  dataFile: 'data.saf',
  updateHeader: 'update.sah',
  updateFile: 'update.saf',
  deleteList: 'delete.lst',
  patchPrefix: 'ps',
} as const;

export const DEFAULT_STORE_FILE = 'Version.ini';

// ========== Resolved ==========

export interface ResolvedPatchEngineConfig {
  destinationRoot: string;
  patchBaseUrl: string;
  patchDirectory: string;
  storeFile: string;
  retry: Required<RetryPolicy>;
  files: Required<PatchFileNames>;
}

function requireInteger(value: number, name: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

/**
 * Fills defaults and validates a configuration.
 * @throws {InvalidConfigError} On a missing root or URL, or an out-of-range retry setting
 */
export function resolvePatchEngineConfig(config: PatchEngineConfig): ResolvedPatchEngineConfig {
  if (!config.destinationRoot) {
    throw new InvalidConfigError('destinationRoot is required');
  }
  if (!config.patchBaseUrl) {
    throw new InvalidConfigError('patchBaseUrl is required');
  }
  const destinationRoot = path.resolve(config.destinationRoot);

  const backoffFactor = config.retry?.backoffFactor ?? DEFAULT_RETRY.backoffFactor;
  if (!Number.isFinite(backoffFactor) || backoffFactor < 1) {
    throw new InvalidConfigError(`retry.backoffFactor must be >= 1, got ${backoffFactor}`);
  }

  return {
    destinationRoot,
    patchBaseUrl: config.patchBaseUrl.replace(/\/+$/, ''),
    patchDirectory: path.resolve(destinationRoot, config.patchDirectory ?? '.'),
    storeFile: path.resolve(destinationRoot, config.storeFile ?? DEFAULT_STORE_FILE),
    retry: {
      attempts: requireInteger(config.retry?.attempts ?? DEFAULT_RETRY.attempts, 'retry.attempts', 1),
      delayMs: requireInteger(config.retry?.delayMs ?? DEFAULT_RETRY.delayMs, 'retry.delayMs', 0),
      backoffFactor,
    },
    files: {
      dataHeader: config.files?.dataHeader ?? DEFAULT_FILE_NAMES.dataHeader,
      dataFile: config.files?.dataFile ?? DEFAULT_FILE_NAMES.dataFile,
      updateHeader: config.files?.updateHeader ?? DEFAULT_FILE_NAMES.updateHeader,
      updateFile: config.files?.updateFile ?? DEFAULT_FILE_NAMES.updateFile,
      deleteList: config.files?.deleteList ?? DEFAULT_FILE_NAMES.deleteList,
      patchPrefix: config.files?.patchPrefix ?? DEFAULT_FILE_NAMES.patchPrefix,
    },
  };
}
