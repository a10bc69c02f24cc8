#!/usr/bin/env node
/**
 * Archive Patcher - CLI Interface
 *
 * Command-line interface for updating a client directory and working with
 * header/data archive pairs.
 */

import { Command } from 'commander';
import { readdir, readFile } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';
import { ArchiveCodec } from './archive-codec.js';
import type { ArchiveInput } from './archive-codec.js';
import { resolvePatchEngineConfig } from './config.js';
import { ConsoleProgressListener } from './console-progress.js';
import { HttpTransport, HttpVersionSource } from './http-transport.js';
import { IniKeyValueStore } from './ini-store.js';
import { PatchSequencer } from './patch-sequencer.js';
import { toPosixPath } from './utils/paths.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Lists a directory tree as archive inputs, folders before their contents.
 */
async function collectInputs(inputDir: string, dir = inputDir): Promise<ArchiveInput[]> {
  const inputs: ArchiveInput[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    const relativePath = toPosixPath(relative(inputDir, fullPath));
    if (entry.isDirectory()) {
      inputs.push({ relativePath });
      inputs.push(...(await collectInputs(inputDir, fullPath)));
    } else if (entry.isFile()) {
      inputs.push({ relativePath, data: await readFile(fullPath) });
    }
  }
  return inputs;
}

program
  .name('archive-patcher')
  .description('Resumable patching of header/data archive clients')
  .version(version);

program
  .command('update')
  .description('Apply every pending patch to a client directory')
  .argument('<root>', 'Client directory to update')
  .requiredOption('--patch-url <url>', 'Base URL the patch archives are served from')
  .requiredOption('--version-url <url>', 'URL of the server version document')
  .option('--store <file>', 'Version/checkpoint INI file, relative to the root')
  .option('--retry-attempts <n>', 'Write attempts for locked files', parseInteger)
  .option('--retry-delay <ms>', 'Initial wait between write attempts', parseInteger)
  .option('--timeout <ms>', 'Download timeout', parseInteger)
  .action(async (root: string, options: {
    patchUrl: string;
    versionUrl: string;
    store?: string;
    retryAttempts?: number;
    retryDelay?: number;
    timeout?: number;
  }) => {
    try {
      const config = resolvePatchEngineConfig({
        destinationRoot: resolve(root),
        patchBaseUrl: options.patchUrl,
        storeFile: options.store,
        retry: { attempts: options.retryAttempts, delayMs: options.retryDelay },
      });
      console.log(`Updating: ${config.destinationRoot}`);
      console.log('');

      const controller = new AbortController();
      process.once('SIGINT', () => {
        console.log('Stopping after the current patch...');
        controller.abort();
      });

      const sequencer = new PatchSequencer({
        config,
        store: new IniKeyValueStore(config.storeFile),
        transport: new HttpTransport({ timeoutMs: options.timeout }),
        versionSource: new HttpVersionSource(options.versionUrl, { timeoutMs: options.timeout }),
        listener: new ConsoleProgressListener(),
      });
      const outcome = await sequencer.run({ signal: controller.signal });

      console.log('');
      switch (outcome.status) {
        case 'up-to-date':
          console.log(`✅ Already up to date at version ${outcome.version}`);
          break;
        case 'updated':
          console.log(`✅ Updated from version ${outcome.fromVersion} to ${outcome.version}`);
          break;
        case 'stopped':
          console.log(`✅ Stopped at version ${outcome.version}`);
          break;
        case 'failed':
          console.error(`❌ Update failed [${outcome.error.code}]:`, outcome.error.message);
          process.exit(1);
      }
    } catch (error) {
      console.error('❌ Update failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('inspect')
  .description('List the entries of an archive header')
  .argument('<header-file>', 'Path to the .sah header')
  .action(async (headerFile: string) => {
    try {
      const header = await ArchiveCodec.readHeader({ headerPath: resolve(headerFile) });
      console.log(`Signature: ${header.signature}  format: ${header.formatVersion}  entries: ${header.entryCount}`);
      for (const entry of header.entries) {
        console.log(entry.isDirectory
          ? `  [dir]  ${entry.relativePath}/`
          : `  ${String(entry.dataOffset).padStart(10)} ${String(entry.dataLength).padStart(10)}  ${entry.relativePath}`);
      }
    } catch (error) {
      console.error('❌ Inspect failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('pack')
  .description('Pack a directory into a header/data archive pair')
  .argument('<input-dir>', 'Directory to pack')
  .argument('<header-file>', 'Path where the .sah header will be written')
  .argument('<data-file>', 'Path where the .saf data file will be written')
  .action(async (inputDir: string, headerFile: string, dataFile: string) => {
    try {
      console.log(`Packing: ${inputDir}`);
      const entries = await collectInputs(resolve(inputDir));
      const pair = ArchiveCodec.build({ entries });
      await ArchiveCodec.writeArchive({ pair, headerPath: resolve(headerFile), dataPath: resolve(dataFile) });
      console.log(`✅ Packed ${entries.length} entries (${pair.data.length} data bytes)`);
    } catch (error) {
      console.error('❌ Pack failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program.parse();
