/**
 * Unit Tests for FileStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileStore } from '../src/workspace.js';
import { WorkspaceIOError } from '../src/errors.js';

describe('FileStore', () => {
  let root: string;
  let store: FileStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'curlgen-store-'));
    store = new FileStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('isInside', () => {
    it.each([
      ['a.txt', true],
      ['a/../b.txt', true],
      ['', false],
      ['a/..', false],
      ['../outside.txt', false],
      ['/etc/passwd', false],
    ])('%s → %s', (relPath, expected) => {
      expect(store.isInside(relPath)).toBe(expected);
    });
  });

  it('writes nested files and reads them back', async () => {
    await store.write('com/example/User.java', 'class User {}');

    expect(await store.read('com/example/User.java')).toBe('class User {}');
    expect(await store.exists('com/example/User.java')).toBe(true);
    expect(await store.exists('com/example/Missing.java')).toBe(false);
  });

  it('rejects paths that escape the root', async () => {
    await expect(store.write('../escape.txt', 'x')).rejects.toBeInstanceOf(WorkspaceIOError);
  });

  it('wraps read failures', async () => {
    await expect(store.read('missing.txt')).rejects.toThrow('Cannot read missing.txt');
  });

  it('lists files sorted, including dot-directories', async () => {
    await store.write('b.txt', 'b');
    await store.write('a/c.txt', 'c');
    await store.write('.build/X.class', 'x');

    expect(await store.list()).toEqual(['.build/X.class', 'a/c.txt', 'b.txt']);
    expect(await store.list('a')).toEqual(['a/c.txt']);
  });

  it('removes trees and tolerates missing paths', async () => {
    await store.write('.build/classes/A.class', 'a');
    await store.remove('.build');
    await store.remove('never-existed');

    expect(await store.list()).toEqual([]);
  });

  it('writes pretty-printed JSON', async () => {
    await store.writeJson('status.json', { success: true });
    expect(await store.read('status.json')).toBe('{\n  "success": true\n}');
  });
});
