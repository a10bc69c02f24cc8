import { describe, it, before, after, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { appendFile, copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ArchiveCodec } from '../src/archive-codec.js';
import type { ArchiveInput } from '../src/archive-codec.js';
import { resolvePatchEngineConfig } from '../src/config.js';
import { VersionUnavailableError } from '../src/errors.js';
import { PatchSequencer, isTerminalSequencerState, isValidSequencerTransition } from '../src/patch-sequencer.js';
import { LOCK_FILE_NAME } from '../src/root-lock.js';
import type { KeyValueStore, PatchTransport, ProgressListener, VersionSource } from '../src/types/collaborators.js';
import type { SequencerState } from '../src/types/sequencer-state.js';
import { pathExists } from '../src/utils/fs.js';

const PATCH_URL = 'http://patch.test/files';

class MemoryStore implements KeyValueStore {
  readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  setMany(entries: Readonly<Record<string, string>>): void {
    for (const [key, value] of Object.entries(entries)) {
      this.values.set(key, value);
    }
  }
}

/** Serves files from a local directory by the last segment of the URL. */
class DirectoryTransport implements PatchTransport {
  readonly requested: string[] = [];

  constructor(private readonly serverDir: string) {}

  async download(url: string, destinationPath: string): Promise<boolean> {
    this.requested.push(url);
    const source = join(this.serverDir, url.slice(url.lastIndexOf('/') + 1));
    if (!(await pathExists(source))) {
      return false;
    }
    await copyFile(source, destinationPath);
    return true;
  }
}

class FixedVersion implements VersionSource {
  constructor(private readonly version: number) {}

  async targetVersion(): Promise<number> {
    return this.version;
  }
}

class RecordingListener implements ProgressListener {
  readonly phases: SequencerState[] = [];

  onPhaseChanged(phase: SequencerState): void {
    this.phases.push(phase);
  }
}

const PATCH_CYCLE: SequencerState[] = ['FetchingPatch', 'Extracting', 'Deleting', 'Merging', 'Committed'];

async function writePatch(serverDir: string, stem: string, entries: ArchiveInput[]): Promise<void> {
  const pair = ArchiveCodec.build({ entries });
  await ArchiveCodec.writeArchive({
    pair,
    headerPath: join(serverDir, `${stem}.sah`),
    dataPath: join(serverDir, `${stem}.saf`),
  });
}

describe('PatchSequencer', () => {
  let tmp: string;
  let serverDir: string;
  let root: string;
  let patch6UpdatePair: { header: Buffer; data: Buffer };

  before(async () => {
    tmp = await mkdtemp(join(tmpdir(), 'patch-sequencer-test-'));
    serverDir = join(tmp, 'server');
    await mkdir(serverDir);

    patch6UpdatePair = ArchiveCodec.build({ entries: [{ relativePath: 'maps/m1.bin', data: Buffer.from('M6') }] });
    await writePatch(serverDir, 'ps0006', [
      { relativePath: 'readme.txt', data: Buffer.from('v6') },
      { relativePath: 'delete.lst', data: Buffer.from('old/map.bin\n') },
      { relativePath: 'update.sah', data: patch6UpdatePair.header },
      { relativePath: 'update.saf', data: patch6UpdatePair.data },
    ]);
    await writePatch(serverDir, 'ps0007', [
      { relativePath: 'readme.txt', data: Buffer.from('v7') },
      { relativePath: 'extra' },
      { relativePath: 'extra/new.txt', data: Buffer.from('N') },
    ]);
  });

  after(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmp, 'client-'));
    await mkdir(join(root, 'old'));
    await writeFile(join(root, 'old', 'map.bin'), 'OLD');
    await writePatch(root, 'data', [
      { relativePath: 'old/map.bin', data: Buffer.from('OLD') },
      { relativePath: 'keep.bin', data: Buffer.from('K') },
    ]);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createSequencer(options: {
    store: KeyValueStore;
    target: number | VersionSource;
    transport?: PatchTransport;
    listener?: ProgressListener;
  }): PatchSequencer {
    return new PatchSequencer({
      config: resolvePatchEngineConfig({ destinationRoot: root, patchBaseUrl: PATCH_URL, retry: { attempts: 2, delayMs: 1 } }),
      store: options.store,
      transport: options.transport ?? new DirectoryTransport(serverDir),
      versionSource: typeof options.target === 'number' ? new FixedVersion(options.target) : options.target,
      listener: options.listener,
    });
  }

  it('should apply each pending patch in order', async () => {
    const store = new MemoryStore({ 'Version.CurrentVersion': '5' });
    const transport = new DirectoryTransport(serverDir);
    const listener = new RecordingListener();

    const outcome = await createSequencer({ store, target: 7, transport, listener }).run();

    assert.deepStrictEqual(outcome, { status: 'updated', fromVersion: 5, version: 7, applied: [6, 7] });
    assert.deepStrictEqual(transport.requested, [
      `${PATCH_URL}/ps0006.sah`,
      `${PATCH_URL}/ps0006.saf`,
      `${PATCH_URL}/ps0007.sah`,
      `${PATCH_URL}/ps0007.saf`,
    ]);
    assert.deepStrictEqual(listener.phases, [...PATCH_CYCLE, ...PATCH_CYCLE, 'Compacting', 'UpToDate']);
    assert.deepStrictEqual(Object.fromEntries(store.values), {
      'Version.CurrentVersion': '7',
      'Version.StartUpdate': 'UPDATE_END',
      'Version.UpdateVersion': '7',
    });
  });

  it('should leave the root with the patched contents and no leftovers', async () => {
    await createSequencer({ store: new MemoryStore({ 'Version.CurrentVersion': '5' }), target: 7 }).run();

    assert.strictEqual(await readFile(join(root, 'readme.txt'), 'utf8'), 'v7');
    assert.strictEqual(await readFile(join(root, 'extra', 'new.txt'), 'utf8'), 'N');
    assert.strictEqual(await pathExists(join(root, 'old', 'map.bin')), false);
    for (const leftover of ['ps0006.sah', 'ps0006.saf', 'ps0007.sah', 'ps0007.saf', 'update.sah', 'update.saf', 'delete.lst', LOCK_FILE_NAME]) {
      assert.strictEqual(await pathExists(join(root, leftover)), false, `${leftover} should be gone`);
    }
  });

  it('should merge the update archive into the data archive and compact it', async () => {
    await createSequencer({ store: new MemoryStore({ 'Version.CurrentVersion': '5' }), target: 6 }).run();

    assert.strictEqual(await readFile(join(root, 'data.saf'), 'utf8'), 'KM6');
    const header = await ArchiveCodec.readHeader({ headerPath: join(root, 'data.sah') });
    assert.deepStrictEqual(header.entries, [
      { relativePath: 'keep.bin', dataOffset: 0, dataLength: 1, isDirectory: false },
      { relativePath: 'maps/m1.bin', dataOffset: 1, dataLength: 2, isDirectory: false },
    ]);
  });

  it('should do nothing when already at the target version', async () => {
    const transport = new DirectoryTransport(serverDir);
    const listener = new RecordingListener();

    const outcome = await createSequencer({
      store: new MemoryStore({ 'Version.CurrentVersion': '7' }),
      target: 7,
      transport,
      listener,
    }).run();

    assert.deepStrictEqual(outcome, { status: 'up-to-date', fromVersion: 7, version: 7, applied: [] });
    assert.deepStrictEqual(transport.requested, []);
    assert.deepStrictEqual(listener.phases, ['UpToDate']);
  });

  it('should stop at the first failed patch without trying later ones', async () => {
    const partialServer = join(tmp, 'partial-server');
    await mkdir(partialServer, { recursive: true });
    for (const name of ['ps0006.sah', 'ps0006.saf', 'ps0007.sah']) {
      await copyFile(join(serverDir, name), join(partialServer, name));
    }
    const store = new MemoryStore({ 'Version.CurrentVersion': '5' });
    const transport = new DirectoryTransport(partialServer);
    const listener = new RecordingListener();

    const outcome = await createSequencer({ store, target: 8, transport, listener }).run();

    assert.strictEqual(outcome.status, 'failed');
    assert.strictEqual(outcome.version, 6);
    assert.deepStrictEqual(outcome.applied, [6]);
    if (outcome.status === 'failed') {
      assert.strictEqual(outcome.error.code, 'DOWNLOAD_INCOMPLETE');
      assert.strictEqual(outcome.error.phase, 'FetchingPatch');
      assert.strictEqual(outcome.error.version, 7);
    }
    assert.ok(transport.requested.every(url => !url.includes('ps0008')));
    assert.deepStrictEqual(listener.phases, [...PATCH_CYCLE, 'FetchingPatch', 'Failed']);
    assert.strictEqual(store.get('Version.CurrentVersion'), '6');
    assert.strictEqual(store.get('Version.StartUpdate'), 'UPDATE_END');
    assert.strictEqual(await pathExists(join(root, LOCK_FILE_NAME)), false);
  });

  it('should re-extract a downloaded patch after a crash during extraction', async () => {
    await copyFile(join(serverDir, 'ps0006.sah'), join(root, 'ps0006.sah'));
    await copyFile(join(serverDir, 'ps0006.saf'), join(root, 'ps0006.saf'));
    await writeFile(join(root, 'readme.txt'), 'par');
    const transport = new DirectoryTransport(serverDir);
    const listener = new RecordingListener();

    const outcome = await createSequencer({
      store: new MemoryStore({
        'Version.CurrentVersion': '5',
        'Version.StartUpdate': 'EXTRACT_START',
        'Version.UpdateVersion': '6',
      }),
      target: 6,
      transport,
      listener,
    }).run();

    assert.strictEqual(outcome.status, 'updated');
    assert.deepStrictEqual(transport.requested, []);
    assert.deepStrictEqual(listener.phases, ['Extracting', 'Deleting', 'Merging', 'Committed', 'Compacting', 'UpToDate']);
    assert.strictEqual(await readFile(join(root, 'readme.txt'), 'utf8'), 'v6');
  });

  it('should download again when the interrupted patch is no longer on disk', async () => {
    const transport = new DirectoryTransport(serverDir);

    const outcome = await createSequencer({
      store: new MemoryStore({ 'Version.CurrentVersion': '5', 'Version.StartUpdate': 'EXTRACT_START' }),
      target: 6,
      transport,
    }).run();

    assert.strictEqual(outcome.status, 'updated');
    assert.deepStrictEqual(transport.requested, [`${PATCH_URL}/ps0006.sah`, `${PATCH_URL}/ps0006.saf`]);
  });

  it('should redo only the update step after a crash during the merge', async () => {
    await writeFile(join(root, 'update.sah'), patch6UpdatePair.header);
    await writeFile(join(root, 'update.saf'), patch6UpdatePair.data);
    await writeFile(join(root, 'delete.lst'), 'old/map.bin\n');
    await writeFile(join(root, 'readme.txt'), 'v6');
    await appendFile(join(root, 'data.saf'), 'XXXX');
    const transport = new DirectoryTransport(serverDir);
    const listener = new RecordingListener();
    const store = new MemoryStore({
      'Version.CurrentVersion': '5',
      'Version.StartUpdate': 'UPDATE_START',
      'Version.UpdateVersion': '6',
    });

    const outcome = await createSequencer({ store, target: 6, transport, listener }).run();

    assert.deepStrictEqual(outcome, { status: 'updated', fromVersion: 5, version: 6, applied: [6] });
    assert.deepStrictEqual(transport.requested, []);
    assert.deepStrictEqual(listener.phases, ['Deleting', 'Merging', 'Committed', 'Compacting', 'UpToDate']);
    assert.strictEqual(await readFile(join(root, 'data.saf'), 'utf8'), 'KM6');
    assert.strictEqual(await pathExists(join(root, 'old', 'map.bin')), false);
    assert.strictEqual(store.get('Version.CurrentVersion'), '6');
  });

  it('should delete a still-present patch pair when resuming after extraction finished', async () => {
    await copyFile(join(serverDir, 'ps0006.sah'), join(root, 'ps0006.sah'));
    await copyFile(join(serverDir, 'ps0006.saf'), join(root, 'ps0006.saf'));
    await writeFile(join(root, 'update.sah'), patch6UpdatePair.header);
    await writeFile(join(root, 'update.saf'), patch6UpdatePair.data);
    await writeFile(join(root, 'delete.lst'), 'old/map.bin\n');
    await writeFile(join(root, 'readme.txt'), 'extracted earlier');
    const transport = new DirectoryTransport(serverDir);
    const listener = new RecordingListener();

    const outcome = await createSequencer({
      store: new MemoryStore({
        'Version.CurrentVersion': '5',
        'Version.StartUpdate': 'EXTRACT_END',
        'Version.UpdateVersion': '6',
      }),
      target: 6,
      transport,
      listener,
    }).run();

    assert.deepStrictEqual(outcome, { status: 'updated', fromVersion: 5, version: 6, applied: [6] });
    assert.deepStrictEqual(transport.requested, []);
    assert.deepStrictEqual(listener.phases, ['Deleting', 'Merging', 'Committed', 'Compacting', 'UpToDate']);
    assert.strictEqual(await readFile(join(root, 'readme.txt'), 'utf8'), 'extracted earlier');
    assert.strictEqual(await pathExists(join(root, 'ps0006.sah')), false);
    assert.strictEqual(await pathExists(join(root, 'ps0006.saf')), false);
  });

  it('should download again after a patch fails to extract', async () => {
    const brokenServer = join(tmp, 'broken-server');
    await mkdir(brokenServer, { recursive: true });
    await copyFile(join(serverDir, 'ps0006.sah'), join(brokenServer, 'ps0006.sah'));
    await writeFile(join(brokenServer, 'ps0006.saf'), (await readFile(join(serverDir, 'ps0006.saf'))).subarray(0, 3));
    const store = new MemoryStore({ 'Version.CurrentVersion': '5' });

    const first = await createSequencer({ store, target: 6, transport: new DirectoryTransport(brokenServer) }).run();

    assert.strictEqual(first.status, 'failed');
    if (first.status === 'failed') {
      assert.strictEqual(first.error.code, 'TRUNCATED_DATA');
      assert.strictEqual(first.error.phase, 'Extracting');
      assert.strictEqual(first.error.version, 6);
    }
    assert.strictEqual(store.get('Version.StartUpdate'), 'EXTRACT_START');
    assert.strictEqual(await pathExists(join(root, 'ps0006.sah')), false);
    assert.strictEqual(await pathExists(join(root, 'ps0006.saf')), false);

    await copyFile(join(serverDir, 'ps0006.saf'), join(brokenServer, 'ps0006.saf'));
    const transport = new DirectoryTransport(brokenServer);
    const second = await createSequencer({ store, target: 6, transport }).run();

    assert.deepStrictEqual(second, { status: 'updated', fromVersion: 5, version: 6, applied: [6] });
    assert.deepStrictEqual(transport.requested, [`${PATCH_URL}/ps0006.sah`, `${PATCH_URL}/ps0006.saf`]);
    assert.strictEqual(await readFile(join(root, 'readme.txt'), 'utf8'), 'v6');
  });

  it('should report a rejecting listener without leaving the rejection unhandled', async () => {
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown): void => {
      unhandled.push(reason);
    };
    process.on('unhandledRejection', onUnhandled);
    const warn = mock.method(console, 'warn', () => {});
    try {
      const outcome = await createSequencer({
        store: new MemoryStore({ 'Version.CurrentVersion': '5' }),
        target: 6,
        listener: {
          onPhaseChanged: async () => {
            throw new Error('async listener boom');
          },
        },
      }).run();
      await new Promise<void>(resolve => setImmediate(resolve));

      assert.strictEqual(outcome.status, 'updated');
      assert.deepStrictEqual(unhandled, []);
      assert.ok(warn.mock.calls.some(call => call.arguments[0] === 'Progress listener threw: async listener boom'));
    } finally {
      warn.mock.restore();
      process.off('unhandledRejection', onUnhandled);
    }
  });

  it('should keep running when the listener throws', async () => {
    const listener: ProgressListener = {
      onPhaseChanged() {
        throw new Error('listener exploded');
      },
      onItemProgress() {
        throw new Error('listener exploded');
      },
    };

    const outcome = await createSequencer({ store: new MemoryStore({ 'Version.CurrentVersion': '5' }), target: 7, listener }).run();

    assert.strictEqual(outcome.status, 'updated');
    assert.strictEqual(outcome.version, 7);
  });

  it('should stop between patches when aborted', async () => {
    const controller = new AbortController();
    const phases: SequencerState[] = [];
    const listener: ProgressListener = {
      onPhaseChanged(phase) {
        phases.push(phase);
        if (phase === 'Committed') {
          controller.abort();
        }
      },
    };
    const store = new MemoryStore({ 'Version.CurrentVersion': '5' });

    const outcome = await createSequencer({ store, target: 7, listener }).run({ signal: controller.signal });

    assert.deepStrictEqual(outcome, { status: 'stopped', fromVersion: 5, version: 6, applied: [6] });
    assert.deepStrictEqual(phases, [...PATCH_CYCLE, 'Stopped']);
    assert.strictEqual(store.get('Version.CurrentVersion'), '6');
  });

  it('should fail on a corrupt checkpoint without touching the root', async () => {
    const transport = new DirectoryTransport(serverDir);

    const outcome = await createSequencer({
      store: new MemoryStore({ 'Version.CurrentVersion': 'five' }),
      target: 7,
      transport,
    }).run();

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status === 'failed') {
      assert.strictEqual(outcome.error.code, 'CHECKPOINT_CORRUPT');
      assert.strictEqual(outcome.error.phase, 'Idle');
      assert.strictEqual(outcome.error.version, undefined);
      assert.strictEqual(outcome.error.message.startsWith('Patch run failed during Idle: '), true);
    }
    assert.strictEqual(outcome.version, undefined);
    assert.deepStrictEqual(transport.requested, []);
  });

  it('should fail when the target version is unavailable', async () => {
    const outcome = await createSequencer({
      store: new MemoryStore({ 'Version.CurrentVersion': '5' }),
      target: {
        async targetVersion(): Promise<number> {
          throw new VersionUnavailableError('server unreachable');
        },
      },
    }).run();

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status === 'failed') {
      assert.strictEqual(outcome.error.code, 'VERSION_UNAVAILABLE');
      assert.strictEqual(outcome.error.version, undefined);
      assert.strictEqual(outcome.fromVersion, 5);
    }
  });

  it('should refuse a root locked by a live process', async () => {
    await writeFile(join(root, LOCK_FILE_NAME), String(process.pid));

    const outcome = await createSequencer({ store: new MemoryStore(), target: 7 }).run();

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status === 'failed') {
      assert.strictEqual(outcome.error.code, 'DESTINATION_BUSY');
    }
    assert.strictEqual(await pathExists(join(root, LOCK_FILE_NAME)), true);
  });

  it('should allow only one run per sequencer', async () => {
    const sequencer = createSequencer({ store: new MemoryStore({ 'Version.CurrentVersion': '7' }), target: 7 });
    await sequencer.run();

    await assert.rejects(sequencer.run(), /create a new sequencer per run/);
  });

  describe('transition table', () => {
    it('should allow resuming straight into extraction or the update step', () => {
      assert.strictEqual(isValidSequencerTransition('Idle', 'Extracting'), true);
      assert.strictEqual(isValidSequencerTransition('Idle', 'Deleting'), true);
      assert.strictEqual(isValidSequencerTransition('Extracting', 'Merging'), false);
    });

    it('should treat the end states as terminal', () => {
      assert.strictEqual(isTerminalSequencerState('UpToDate'), true);
      assert.strictEqual(isTerminalSequencerState('Failed'), true);
      assert.strictEqual(isTerminalSequencerState('Committed'), false);
    });
  });
});
