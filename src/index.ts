/**
 * Archive Patcher - Main entry point
 *
 * Resumable, crash-safe application of versioned archive patches.
 */

// Archive format
export { ArchiveCodec } from './archive-codec.js';
export type { ArchiveDataFile, ArchiveInput, ArchivePair } from './archive-codec.js';
export { FileTree } from './file-tree.js';
export type { FileNode, FolderNode, NodeId, TreeNode } from './file-tree.js';
export { ArchiveMerger } from './archive-merger.js';
export type { CompactRequest, CompactResult, MergeRequest, MergeResult } from './archive-merger.js';
export type { ArchiveEntry } from './types/archive-entry.js';
export type { ArchiveHeader, ArchivePairPaths } from './types/archive-header.js';

// Patch application
export { PatchSequencer, isTerminalSequencerState, isValidSequencerTransition } from './patch-sequencer.js';
export type { PatchSequencerDeps, RunOptions, RunOutcome } from './patch-sequencer.js';
export { PatchExtractor } from './patch-extractor.js';
export type { ExtractRequest, ExtractResult, ExtractorOptions, FileWriter } from './patch-extractor.js';
export { DeleteList } from './delete-list.js';
export type { DeleteResult } from './delete-list.js';
export { CheckpointStore, CHECKPOINT_KEYS, resumePointFor } from './checkpoint-store.js';
export { Patch } from './patch.js';
export { RootLock } from './root-lock.js';
export { CheckpointPhase } from './types/checkpoint.js';
export type { Checkpoint, ResumePoint } from './types/checkpoint.js';
export { SequencerState } from './types/sequencer-state.js';

// Collaborators
export type { KeyValueStore, PatchTransport, ProgressListener, VersionSource } from './types/collaborators.js';
export { IniKeyValueStore } from './ini-store.js';
export { HttpTransport, HttpVersionSource, parseVersionDocument } from './http-transport.js';
export { ConsoleProgressListener } from './console-progress.js';

// Configuration and errors
export { resolvePatchEngineConfig, DEFAULT_RETRY, DEFAULT_FILE_NAMES } from './config.js';
export type { PatchEngineConfig, ResolvedPatchEngineConfig, RetryPolicy, PatchFileNames } from './config.js';
export * from './errors.js';
export { toInt32, toUInt32 } from './utils/convert.js';
