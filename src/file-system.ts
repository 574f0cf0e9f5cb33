import type { Stats } from 'fs';
import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { FileNotFoundError, PathOutsideProjectError, isNotFound } from './errors.js';
import type { FileSystem } from './types.js';

/**
 * Directory names never listed to the model
 */
export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  '.git',
  '__pycache__',
  '.venv',
  '.pytest_cache',
  'node_modules',
  'dist',
  '.devbot',
];

/**
 * True when any directory segment of a relative posix path is excluded
 */
export function isExcludedPath(path: string, excludeDirs: readonly string[]): boolean {
  const segments = path.split('/');
  // The last segment is the file itself
  return segments.slice(0, -1).some((segment) => excludeDirs.includes(segment));
}

/**
 * FileSystem rooted at the project directory.
 * Paths are resolved against the root and may not escape it.
 */
export class NodeFileSystem implements FileSystem {
  private rootDir: string;

  constructor(rootDir: string = '.') {
    this.rootDir = resolve(rootDir);
  }

  async read(path: string): Promise<string> {
    const absolute = this.resolvePath(path);
    try {
      return await readFile(absolute, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new FileNotFoundError(path, { cause: error });
      }
      throw error;
    }
  }

  async write(path: string, content: string): Promise<void> {
    const absolute = this.resolvePath(path);
    await mkdir(dirname(absolute), { recursive: true });
    await writeFile(absolute, content, 'utf-8');
  }

  /**
   * Recursively list files under `path`, relative to the project root with
   * posix separators, sorted. Excluded directory names are pruned at any depth.
   */
  async list(path: string, options: { excludeDirs?: readonly string[] } = {}): Promise<string[]> {
    const excludeDirs = options.excludeDirs ?? [];
    const absolute = this.resolvePath(path);

    let info: Stats;
    try {
      info = await stat(absolute);
    } catch (error) {
      if (isNotFound(error)) {
        throw new FileNotFoundError(path, { cause: error });
      }
      throw error;
    }

    const start = this.toProjectPath(absolute);
    if (start && isExcludedPath(`${start}/`, excludeDirs)) {
      return [];
    }
    if (!info.isDirectory()) {
      return [start];
    }

    const files: string[] = [];
    await this.walk(absolute, excludeDirs, files);
    return files.sort();
  }

  private async walk(dir: string, excludeDirs: readonly string[], files: string[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const child = resolve(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excludeDirs.includes(entry.name)) {
          await this.walk(child, excludeDirs, files);
        }
      } else if (entry.isFile()) {
        files.push(this.toProjectPath(child));
      }
    }
  }

  private resolvePath(path: string): string {
    const absolute = resolve(this.rootDir, path);
    const rel = relative(this.rootDir, absolute);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new PathOutsideProjectError(path);
    }
    return absolute;
  }

  private toProjectPath(absolute: string): string {
    return relative(this.rootDir, absolute).split(sep).join('/');
  }
}
