/**
 * Patch Sequencer
 *
 * Applies patches currentVersion + 1 .. targetVersion strictly in order. Each
 * patch moves through FetchingPatch → Extracting → Deleting → Merging →
 * Committed, with a durable checkpoint around every risky step so the process
 * can be killed at any point and restarted from cold.
 */
import { rm } from 'node:fs/promises';
import { ArchiveCodec } from './archive-codec.js';
import { ArchiveMerger } from './archive-merger.js';
import type { CompactResult, MergeResult } from './archive-merger.js';
import { CheckpointStore, resumePointFor } from './checkpoint-store.js';
import type { ResolvedPatchEngineConfig } from './config.js';
import { DeleteList } from './delete-list.js';
import { DownloadIncompleteError, ErrorCodes, PatchError, PatchRunError, VersionUnavailableError } from './errors.js';
import { Patch } from './patch.js';
import { PatchExtractor } from './patch-extractor.js';
import type { ExtractResult } from './patch-extractor.js';
import { RootLock } from './root-lock.js';
import { CheckpointPhase } from './types/checkpoint.js';
import type { Checkpoint, ResumePoint } from './types/checkpoint.js';
import type { KeyValueStore, PatchTransport, ProgressListener, VersionSource } from './types/collaborators.js';
import { SequencerState } from './types/sequencer-state.js';
import { safeJoin } from './utils/paths.js';

// ========== Transition Table ==========

const SEQUENCER_TRANSITIONS: Record<SequencerState, SequencerState[]> = {
  Idle: ['FetchingPatch', 'Extracting', 'Deleting', 'UpToDate', 'Stopped', 'Failed'],
  FetchingPatch: ['Extracting', 'Failed'],
  Extracting: ['Deleting', 'Failed'],
  Deleting: ['Merging', 'Failed'],
  Merging: ['Committed', 'Failed'],
  Committed: ['FetchingPatch', 'Compacting', 'UpToDate', 'Stopped', 'Failed'],
  Compacting: ['UpToDate', 'Failed'],
  UpToDate: [],
  Stopped: [],
  Failed: [],
};

export function isTerminalSequencerState(state: SequencerState): boolean {
  return SEQUENCER_TRANSITIONS[state].length === 0;
}

export function isValidSequencerTransition(from: SequencerState, to: SequencerState): boolean {
  return SEQUENCER_TRANSITIONS[from].includes(to);
}

// ========== Outcome ==========

interface RunSummary {
  /** Committed version when the run started. */
  readonly fromVersion: number;
  /** Committed version when the run ended. */
  readonly version: number;
  /** Versions committed by this run, in order. */
  readonly applied: readonly number[];
}

/**
 * Versions are undefined when the run failed before the checkpoint could be read.
 */
interface FailedRunSummary {
  readonly fromVersion: number | undefined;
  readonly version: number | undefined;
  readonly applied: readonly number[];
}

export type RunOutcome =
  | (RunSummary & { readonly status: 'up-to-date' | 'updated' | 'stopped' })
  | (FailedRunSummary & { readonly status: 'failed'; readonly error: PatchRunError });

/** Codes that mean the downloaded patch itself is unusable. */
const ARCHIVE_ERROR_CODES: ReadonlySet<string> = new Set([
  ErrorCodes.MALFORMED_ARCHIVE,
  ErrorCodes.TRUNCATED_DATA,
  ErrorCodes.DUPLICATE_ENTRY,
  ErrorCodes.OVERFLOW,
  ErrorCodes.UNSAFE_PATH,
]);

function isArchiveError(error: unknown): error is PatchError {
  return error instanceof PatchError && ARCHIVE_ERROR_CODES.has(error.code);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

export interface RunOptions {
  /** Honoured only between patches. */
  signal?: AbortSignal;
}

export interface PatchSequencerDeps {
  config: ResolvedPatchEngineConfig;
  store: KeyValueStore;
  transport: PatchTransport;
  versionSource: VersionSource;
  listener?: ProgressListener;
  extractor?: PatchExtractor;
}

/**
 * Outcome of the deletion pass and data-archive merge.
 */
interface UpdateStepResult {
  readonly deleted: number;
  readonly merge: MergeResult | null;
}

export class PatchSequencer {
  private state: SequencerState = SequencerState.IDLE;
  private readonly config: ResolvedPatchEngineConfig;
  private readonly checkpoints: CheckpointStore;
  private readonly transport: PatchTransport;
  private readonly versionSource: VersionSource;
  private readonly listener?: ProgressListener;
  private readonly extractor: PatchExtractor;
  private progress = { current: 0, total: 0 };

  constructor(deps: PatchSequencerDeps) {
    this.config = deps.config;
    this.checkpoints = new CheckpointStore(deps.store);
    this.transport = deps.transport;
    this.versionSource = deps.versionSource;
    this.listener = deps.listener;
    this.extractor = deps.extractor ?? new PatchExtractor({ retry: deps.config.retry });
  }

  getState(): SequencerState {
    return this.state;
  }

  /**
   * Brings the destination root up to the server's target version.
   * Fatal conditions are returned as a 'failed' outcome rather than thrown.
   */
  async run(options: RunOptions = {}): Promise<RunOutcome> {
    if (this.state !== SequencerState.IDLE) {
      throw new Error(`PatchSequencer.run() called in state ${this.state}; create a new sequencer per run`);
    }

    let lock: RootLock;
    try {
      lock = await RootLock.acquire(this.config.destinationRoot);
    } catch (error) {
      return this.fail({ fromVersion: undefined, version: undefined, applied: [] }, 'Idle', undefined, error);
    }

    try {
      return await this.runLocked(options);
    } finally {
      await lock.release();
    }
  }

  private async runLocked(options: RunOptions): Promise<RunOutcome> {
    let checkpoint: Checkpoint;
    try {
      checkpoint = this.checkpoints.read();
    } catch (error) {
      return this.fail({ fromVersion: undefined, version: undefined, applied: [] }, 'Idle', undefined, error);
    }

    const fromVersion = checkpoint.version;
    const applied: number[] = [];
    const summary = (): RunSummary => ({ fromVersion, version: checkpoint.version, applied: [...applied] });

    let targetVersion: number;
    try {
      targetVersion = await this.versionSource.targetVersion();
      if (!Number.isSafeInteger(targetVersion) || targetVersion < 0) {
        throw new VersionUnavailableError(`Server reported invalid target version ${targetVersion}`);
      }
    } catch (error) {
      return this.fail(summary(), 'Idle', undefined, error);
    }

    if (checkpoint.version >= targetVersion) {
      console.log(`Version ${checkpoint.version} is up to date (server: ${targetVersion})`);
      this.transition(SequencerState.UP_TO_DATE);
      return { status: 'up-to-date', ...summary() };
    }

    console.log(`Updating from version ${checkpoint.version} to ${targetVersion}`);
    this.progress = { current: 0, total: targetVersion - checkpoint.version };

    while (checkpoint.version < targetVersion) {
      if (options.signal?.aborted) {
        console.log(`Stop requested; halting at version ${checkpoint.version}`);
        this.transition(SequencerState.STOPPED);
        return { status: 'stopped', ...summary() };
      }

      const version = checkpoint.version + 1;
      this.progress.current += 1;
      try {
        await this.applyPatch(version, resumePointFor(checkpoint));
      } catch (error) {
        return this.fail(summary(), this.state, version, error);
      }
      checkpoint = { phase: CheckpointPhase.UPDATE_END, version, phaseVersion: version };
      applied.push(version);
    }

    try {
      await this.compact();
    } catch (error) {
      return this.fail(summary(), this.state, undefined, error);
    }

    this.transition(SequencerState.UP_TO_DATE);
    console.log(`Updated to version ${checkpoint.version}`);
    return { status: 'updated', ...summary() };
  }

  /**
   * Runs one patch from its resume point through commit.
   */
  private async applyPatch(version: number, resumeAt: ResumePoint): Promise<void> {
    const patch = new Patch(version, this.config);

    if (resumeAt === 'update') {
      console.log(`Resuming patch ${version} at the update step`);
      await patch.delete();
    } else {
      if (resumeAt === 'extract' && (await patch.isValid())) {
        console.log(`Resuming patch ${version}: re-extracting ${patch.fileStem}`);
      } else {
        this.transition(SequencerState.FETCHING_PATCH);
        await this.fetch(patch);
      }

      this.transition(SequencerState.EXTRACTING);
      this.checkpoints.mark(CheckpointPhase.EXTRACT_START, version);
      let extracted: ExtractResult;
      try {
        extracted = await this.extract(patch);
      } catch (error) {
        // A corrupt local copy would otherwise be reused by every later run.
        if (isArchiveError(error)) {
          console.warn(`Discarding patch ${version}: ${error.message}`);
          await patch.delete();
        }
        throw error;
      }
      this.checkpoints.mark(CheckpointPhase.EXTRACT_END, version);
      console.log(`Patch ${version}: extracted ${extracted.filesWritten} files (${extracted.bytesWritten} bytes)`);
      await patch.delete();
    }

    this.checkpoints.mark(CheckpointPhase.UPDATE_START, version);
    const result = await this.update();
    this.checkpoints.commit(version);
    console.log(
      `Patch ${version}: deleted ${result.deleted} paths` +
      (result.merge ? `, merged ${result.merge.added} new and ${result.merge.replaced} replaced entries` : ''),
    );
    this.transition(SequencerState.COMMITTED);
  }

  private async fetch(patch: Patch): Promise<void> {
    console.log(`Downloading patch ${patch.version} from ${patch.headerUrl}`);
    const headerOk = await this.transport.download(patch.headerUrl, patch.headerPath);
    const dataOk = headerOk && (await this.transport.download(patch.dataUrl, patch.dataPath));
    if (!dataOk || !(await patch.isValid())) {
      const missing = await patch.missingFiles();
      throw new DownloadIncompleteError(patch.version, missing.length > 0 ? missing : [patch.headerPath]);
    }
  }

  private async extract(patch: Patch): Promise<ExtractResult> {
    const header = await ArchiveCodec.readHeader({ headerPath: patch.headerPath });
    const tree = ArchiveCodec.buildTree({ header });
    return this.extractor.apply({
      tree,
      dataFilePath: patch.dataPath,
      destinationRoot: this.config.destinationRoot,
      onProgress: (completed, total) => this.itemProgress(completed, total),
    });
  }

  /**
   * Deletion pass, then the data-archive merge, then removal of the consumed files.
   * Every step tolerates being repeated after a crash.
   */
  private async update(): Promise<UpdateStepResult> {
    const root = this.config.destinationRoot;
    const { files } = this.config;
    const deleteListPath = safeJoin(root, files.deleteList);

    this.transition(SequencerState.DELETING);
    const list = await DeleteList.read(deleteListPath);
    const deleted = await DeleteList.apply(list, root, (completed, total) => this.itemProgress(completed, total));
    if (deleted.missing.length > 0) {
      console.log(`Delete list: ${deleted.missing.length} paths were already absent`);
    }

    this.transition(SequencerState.MERGING);
    const updatePair = {
      headerPath: safeJoin(root, files.updateHeader),
      dataPath: safeJoin(root, files.updateFile),
    };
    const merge = await ArchiveMerger.merge({
      data: { headerPath: safeJoin(root, files.dataHeader), dataPath: safeJoin(root, files.dataFile) },
      update: updatePair,
      removePaths: list.paths,
      onProgress: (completed, total) => this.itemProgress(completed, total),
    });

    await removeFiles([updatePair.headerPath, updatePair.dataPath, deleteListPath]);
    return { deleted: deleted.removed.length, merge };
  }

  /**
   * Rewrites the data archive with only the bytes its index references.
   */
  private async compact(): Promise<CompactResult | null> {
    const root = this.config.destinationRoot;
    const { files } = this.config;
    this.transition(SequencerState.COMPACTING);
    const result = await ArchiveMerger.compact({
      data: { headerPath: safeJoin(root, files.dataHeader), dataPath: safeJoin(root, files.dataFile) },
      onProgress: (completed, total) => this.itemProgress(completed, total),
    });
    if (result && result.bytesAfter < result.bytesBefore) {
      console.log(`Compacted ${files.dataFile}: ${result.bytesBefore} -> ${result.bytesAfter} bytes`);
    }
    return result;
  }

  private transition(to: SequencerState): void {
    if (!isValidSequencerTransition(this.state, to)) {
      throw new Error(`Invalid sequencer transition from ${this.state} to ${to}`);
    }
    this.state = to;
    this.notify(listener => listener.onPhaseChanged(to, this.progress.current, this.progress.total));
  }

  private itemProgress(completed: number, total: number): void {
    this.notify(listener => listener.onItemProgress?.(this.state, completed, total));
  }

  /**
   * Delivers an event. A throwing or rejecting listener is reported and otherwise ignored.
   */
  private notify(deliver: (listener: ProgressListener) => unknown): void {
    if (!this.listener) {
      return;
    }
    try {
      const result = deliver(this.listener);
      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch(reportListenerError);
      }
    } catch (error) {
      reportListenerError(error);
    }
  }

  private fail(summary: FailedRunSummary, phase: string, version: number | undefined, cause: unknown): RunOutcome {
    const error = PatchRunError.from(phase, version, cause);
    console.error(error.message);
    this.state = SequencerState.FAILED;
    this.notify(listener => listener.onPhaseChanged(SequencerState.FAILED, this.progress.current, this.progress.total));
    return { status: 'failed', ...summary, error };
  }
}

function reportListenerError(error: unknown): void {
  console.warn(`Progress listener threw: ${error instanceof Error ? error.message : String(error)}`);
}

async function removeFiles(filePaths: readonly string[]): Promise<void> {
  for (const filePath of filePaths) {
    await rm(filePath, { force: true });
  }
}
