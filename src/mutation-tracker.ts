import { posix } from 'path';
import { FileNotFoundError, PathOutsideProjectError } from './errors.js';
import type { FileSystem, MutationKind, MutationSnapshot } from './types.js';

/**
 * Normalize a tool path so `./a.txt`, `a.txt` and `dir/../a.txt` share one key
 */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

/**
 * Records which paths a task created or modified.
 * The first classification of a path is final for the life of the task;
 * insertion order carries no meaning, listings are sorted.
 */
export class MutationTracker {
  private kinds = new Map<string, MutationKind>();

  constructor(private readonly fs: Pick<FileSystem, 'read'>) {}

  /**
   * Classify a path about to be written by probing it first.
   * Not found means created, anything else means modified.
   */
  async record(path: string): Promise<MutationKind> {
    const key = normalizePath(path);
    const existing = this.kinds.get(key);
    if (existing) {
      return existing;
    }

    let kind: MutationKind;
    try {
      await this.fs.read(path);
      kind = 'modified';
    } catch (error) {
      if (error instanceof PathOutsideProjectError) {
        throw error;
      }
      kind = error instanceof FileNotFoundError ? 'created' : 'modified';
    }

    if (!this.kinds.has(key)) {
      this.kinds.set(key, kind);
    }
    return this.kinds.get(key) ?? kind;
  }

  kindOf(path: string): MutationKind | undefined {
    return this.kinds.get(normalizePath(path));
  }

  created(): string[] {
    return this.pathsOf('created');
  }

  modified(): string[] {
    return this.pathsOf('modified');
  }

  createdCount(): number {
    return this.created().length;
  }

  modifiedCount(): number {
    return this.modified().length;
  }

  snapshot(): MutationSnapshot {
    return Object.freeze({
      created: Object.freeze(this.created()),
      modified: Object.freeze(this.modified()),
    });
  }

  private pathsOf(kind: MutationKind): string[] {
    return [...this.kinds.entries()]
      .filter(([, k]) => k === kind)
      .map(([path]) => path)
      .sort();
  }
}
