/**
 * Checkpoint Store
 *
 * Durable four-phase progress marker for the patch in flight, plus the last
 * committed version. All writes go straight to the KeyValueStore, which
 * persists them synchronously; there is a single writer per destination root.
 */
import { CheckpointCorruptError } from './errors.js';
import { CheckpointPhase } from './types/checkpoint.js';
import type { Checkpoint, ResumePoint } from './types/checkpoint.js';
import type { KeyValueStore } from './types/collaborators.js';

export const CHECKPOINT_KEYS = {
  phase: 'Version.StartUpdate',
  currentVersion: 'Version.CurrentVersion',
  phaseVersion: 'Version.UpdateVersion',
} as const;

const PHASES: readonly string[] = Object.values(CheckpointPhase);

function isCheckpointPhase(value: string): value is CheckpointPhase {
  return PHASES.includes(value);
}

function parseVersion(raw: string, key: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CheckpointCorruptError(`${key} is not a non-negative integer: "${raw}"`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new CheckpointCorruptError(`${key} is out of range: "${raw}"`);
  }
  return value;
}

/**
 * Decides where the next patch starts from the last durable checkpoint.
 *
 * - no marker, or UPDATE_END: the previous patch is committed, fetch the next
 * - EXTRACT_START: extraction may be partial, redo it from scratch
 * - EXTRACT_END, UPDATE_START: extraction is done, redo only the update step
 */
export function resumePointFor(checkpoint: Checkpoint): ResumePoint {
  switch (checkpoint.phase) {
    case undefined:
    case CheckpointPhase.UPDATE_END:
      return 'fetch';
    case CheckpointPhase.EXTRACT_START:
      return 'extract';
    case CheckpointPhase.EXTRACT_END:
    case CheckpointPhase.UPDATE_START:
      return 'update';
  }
}

export class CheckpointStore {
  constructor(private readonly store: KeyValueStore) {}

  /**
   * Reads and validates the persisted checkpoint.
   * @throws {CheckpointCorruptError} If a value is unreadable or the keys disagree
   */
  read(): Checkpoint {
    const rawVersion = this.store.get(CHECKPOINT_KEYS.currentVersion);
    const version = rawVersion === undefined || rawVersion === ''
      ? 0
      : parseVersion(rawVersion, CHECKPOINT_KEYS.currentVersion);

    const rawPhase = this.store.get(CHECKPOINT_KEYS.phase);
    if (rawPhase === undefined || rawPhase === '') {
      return { phase: undefined, version, phaseVersion: undefined };
    }
    if (!isCheckpointPhase(rawPhase)) {
      throw new CheckpointCorruptError(`${CHECKPOINT_KEYS.phase} holds unknown phase "${rawPhase}"`);
    }

    const inFlight = rawPhase !== CheckpointPhase.UPDATE_END;
    const expected = inFlight ? version + 1 : version;
    const rawPhaseVersion = this.store.get(CHECKPOINT_KEYS.phaseVersion);
    // Stores written before UpdateVersion existed only ever mark the next version.
    if (rawPhaseVersion === undefined || rawPhaseVersion === '') {
      return { phase: rawPhase, version, phaseVersion: expected };
    }
    const phaseVersion = parseVersion(rawPhaseVersion, CHECKPOINT_KEYS.phaseVersion);
    if (phaseVersion !== expected) {
      throw new CheckpointCorruptError(
        `${rawPhase} marker refers to version ${phaseVersion} but current version is ${version} (expected ${expected})`,
      );
    }
    return { phase: rawPhase, version, phaseVersion };
  }

  /**
   * Records an in-flight phase for `version`.
   */
  mark(phase: Exclude<CheckpointPhase, 'UPDATE_END'>, version: number): void {
    this.store.setMany({
      [CHECKPOINT_KEYS.phase]: phase,
      [CHECKPOINT_KEYS.phaseVersion]: String(version),
    });
  }

  /**
   * Records UPDATE_END for `version` and advances the current version in one write.
   */
  commit(version: number): void {
    this.store.setMany({
      [CHECKPOINT_KEYS.phase]: CheckpointPhase.UPDATE_END,
      [CHECKPOINT_KEYS.phaseVersion]: String(version),
      [CHECKPOINT_KEYS.currentVersion]: String(version),
    });
  }
}
