import fs from 'node:fs/promises';
import path from 'node:path';
import { comparePaths } from '@roster/shared';

/**
 * Resolves a repository path to its canonical absolute form.
 * Symlinks are resolved when the path exists; otherwise the lexically
 * resolved path is returned so stale entries can still be compared.
 */
export async function canonicalizeRepoPath(p: string): Promise<string> {
  const absolute = path.resolve(p);
  try {
    return await fs.realpath(absolute);
  } catch {
    return absolute;
  }
}

/**
 * A set of canonical repository roots.
 *
 * Membership is by exact path string; callers canonicalize before adding.
 * Enumeration is always in lexicographic path order.
 */
export class RepoSet implements Iterable<string> {
  private readonly paths = new Set<string>();

  constructor(paths: Iterable<string> = []) {
    for (const p of paths) {
      this.add(p);
    }
  }

  static async canonical(paths: Iterable<string>): Promise<RepoSet> {
    const resolved = await Promise.all([...paths].map((p) => canonicalizeRepoPath(p)));
    return new RepoSet(resolved);
  }

  get size(): number {
    return this.paths.size;
  }

  add(p: string): this {
    if (!path.isAbsolute(p)) {
      throw new TypeError(`Repository paths must be absolute: ${p}`);
    }
    this.paths.add(path.resolve(p));
    return this;
  }

  has(p: string): boolean {
    return this.paths.has(path.resolve(p));
  }

  delete(p: string): boolean {
    return this.paths.delete(path.resolve(p));
  }

  union(other: Iterable<string>): RepoSet {
    const result = new RepoSet(this.paths);
    for (const p of other) {
      result.add(p);
    }
    return result;
  }

  equals(other: RepoSet): boolean {
    if (other.size !== this.size) return false;
    for (const p of this.paths) {
      if (!other.has(p)) return false;
    }
    return true;
  }

  toSortedArray(): string[] {
    return [...this.paths].sort(comparePaths);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.toSortedArray()[Symbol.iterator]();
  }
}
