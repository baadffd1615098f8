/**
 * File Store
 *
 * Read, write and list operations scoped to one workspace directory.
 * Every path is relative to the root; anything that resolves outside it is
 * rejected. Failures surface as WorkspaceIOError so the session can abort.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { WorkspaceIOError, errorMessage } from './errors.js';

export class FileStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Whether a relative path stays inside the root once resolved.
   */
  isInside(relPath: string): boolean {
    if (relPath.length === 0 || path.isAbsolute(relPath)) return false;
    const resolved = path.resolve(this.root, relPath);
    const relative = path.relative(this.root, resolved);
    return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  resolve(relPath: string): string {
    if (!this.isInside(relPath)) {
      throw new WorkspaceIOError(`Path escapes workspace: ${relPath}`, relPath);
    }
    return path.resolve(this.root, relPath);
  }

  async ensureRoot(): Promise<void> {
    try {
      await fs.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new WorkspaceIOError(
        `Cannot create workspace ${this.root}: ${errorMessage(error)}`,
        this.root,
        { cause: error }
      );
    }
  }

  /**
   * Write text, creating intermediate directories.
   */
  async write(relPath: string, text: string): Promise<string> {
    const target = this.resolve(relPath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, text, 'utf-8');
      return target;
    } catch (error) {
      throw new WorkspaceIOError(`Cannot write ${relPath}: ${errorMessage(error)}`, relPath, {
        cause: error,
      });
    }
  }

  async read(relPath: string): Promise<string> {
    const target = this.resolve(relPath);
    try {
      return await fs.readFile(target, 'utf-8');
    } catch (error) {
      throw new WorkspaceIOError(`Cannot read ${relPath}: ${errorMessage(error)}`, relPath, {
        cause: error,
      });
    }
  }

  async exists(relPath: string): Promise<boolean> {
    const target = this.resolve(relPath);
    return fs.access(target).then(() => true).catch(() => false);
  }

  /**
   * Remove a file or directory tree. Missing paths are fine.
   */
  async remove(relPath: string): Promise<void> {
    const target = this.resolve(relPath);
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      throw new WorkspaceIOError(`Cannot remove ${relPath}: ${errorMessage(error)}`, relPath, {
        cause: error,
      });
    }
  }

  /**
   * Files under a directory (default: the root), recursive, as sorted
   * root-relative POSIX paths. Dot-directories are included.
   */
  async list(relDir?: string): Promise<string[]> {
    const cwd = relDir ? this.resolve(relDir) : this.root;
    try {
      const files = await glob('**/*', { cwd, nodir: true, dot: true, posix: true });
      const prefix = relDir ? path.posix.normalize(relDir.split(path.sep).join('/')) : '';
      return files
        .map((file) => (prefix ? path.posix.join(prefix, file) : file))
        .sort();
    } catch (error) {
      throw new WorkspaceIOError(
        `Cannot list ${relDir ?? this.root}: ${errorMessage(error)}`,
        relDir ?? this.root,
        { cause: error }
      );
    }
  }

  async writeJson(relPath: string, value: unknown): Promise<string> {
    return this.write(relPath, JSON.stringify(value, null, 2));
  }
}

export function createFileStore(root: string): FileStore {
  return new FileStore(root);
}
