/**
 * Durable phase markers written around each risky step of a patch.
 */
export const CheckpointPhase = {
  EXTRACT_START: 'EXTRACT_START',
  EXTRACT_END: 'EXTRACT_END',
  UPDATE_START: 'UPDATE_START',
  UPDATE_END: 'UPDATE_END',
} as const;

export type CheckpointPhase = typeof CheckpointPhase[keyof typeof CheckpointPhase];

export interface Checkpoint {
  /** Last recorded phase; undefined when no patch was ever started. */
  readonly phase: CheckpointPhase | undefined;
  /** Last fully committed version. */
  readonly version: number;
  /** Version the phase marker refers to. */
  readonly phaseVersion: number | undefined;
}

/** Where an interrupted or fresh run picks up the next patch. */
export type ResumePoint = 'fetch' | 'extract' | 'update';
