import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { UnsafePathError } from '../src/errors.js';
import { normalizeRelativePath, pathKey, safeJoin, toPosixPath } from '../src/utils/paths.js';

describe('paths', () => {
  it('should convert backslashes to forward slashes', () => {
    assert.strictEqual(toPosixPath('data\\maps\\a.bin'), 'data/maps/a.bin');
  });

  it('should normalise separators and strip trailing slashes', () => {
    assert.strictEqual(normalizeRelativePath('Data\\Maps\\'), 'Data/Maps');
    assert.strictEqual(normalizeRelativePath('a/b.txt'), 'a/b.txt');
  });

  it('should reject paths that are empty, absolute or traverse upwards', () => {
    for (const raw of ['', '/', '/etc/passwd', 'C:/game/a.txt', '../a', 'a/../b', 'a//b', './a', 'a\0b']) {
      assert.strictEqual(normalizeRelativePath(raw), null, `expected null for ${JSON.stringify(raw)}`);
    }
  });

  it('should lower-case lookup keys', () => {
    assert.strictEqual(pathKey('Data/MAP.bin'), 'data/map.bin');
  });

  it('should join safe paths under the root', () => {
    const root = join(tmpdir(), 'patch-root');
    assert.strictEqual(safeJoin(root, 'a\\b.txt'), resolve(root, 'a', 'b.txt'));
  });

  it('should throw for paths that escape the root', () => {
    const root = join(tmpdir(), 'patch-root');
    assert.throws(() => safeJoin(root, '../outside.txt'), UnsafePathError);
    assert.throws(() => safeJoin(root, '/etc/passwd'), UnsafePathError);
  });
});
