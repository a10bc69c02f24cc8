/**
 * States of the patch sequencer.
 */
export const SequencerState = {
  IDLE: 'Idle',
  FETCHING_PATCH: 'FetchingPatch',
  EXTRACTING: 'Extracting',
  DELETING: 'Deleting',
  MERGING: 'Merging',
  COMMITTED: 'Committed',
  COMPACTING: 'Compacting',
  UP_TO_DATE: 'UpToDate',
  STOPPED: 'Stopped',
  FAILED: 'Failed',
} as const;

export type SequencerState = typeof SequencerState[keyof typeof SequencerState];
