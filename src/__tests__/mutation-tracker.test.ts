import { describe, it, expect, beforeEach } from 'vitest';
import { MutationTracker, normalizePath } from '../mutation-tracker.js';
import { PathOutsideProjectError } from '../errors.js';
import { MemoryFileSystem } from './fakes.js';

describe('MutationTracker', () => {
  let fs: MemoryFileSystem;
  let tracker: MutationTracker;

  beforeEach(() => {
    fs = new MemoryFileSystem({ 'src/app.ts': 'export {};\n' });
    tracker = new MutationTracker(fs);
  });

  it('should classify a missing path as created', async () => {
    expect(await tracker.record('hello.txt')).toBe('created');
    expect(tracker.created()).toEqual(['hello.txt']);
    expect(tracker.createdCount()).toBe(1);
    expect(tracker.modifiedCount()).toBe(0);
  });

  it('should classify an existing path as modified', async () => {
    expect(await tracker.record('src/app.ts')).toBe('modified');
    expect(tracker.modified()).toEqual(['src/app.ts']);
  });

  it('should keep a created path created after it is written again', async () => {
    await tracker.record('hello.txt');
    await fs.write('hello.txt', 'world');

    expect(await tracker.record('hello.txt')).toBe('created');
    expect(tracker.createdCount()).toBe(1);
    expect(tracker.modifiedCount()).toBe(0);
  });

  it('should not probe a path that is already classified', async () => {
    await tracker.record('hello.txt');
    await tracker.record('./hello.txt');

    expect(fs.reads).toEqual(['hello.txt']);
    expect(tracker.kindOf('hello.txt')).toBe('created');
  });

  it('should classify any probe failure other than not-found as modified', async () => {
    const failing = new MutationTracker({
      read: async () => {
        throw new Error('EACCES: permission denied');
      },
    });

    expect(await failing.record('secret.txt')).toBe('modified');
  });

  it('should not record paths outside the project', async () => {
    const outside = new MutationTracker({
      read: async (path: string) => {
        throw new PathOutsideProjectError(path);
      },
    });

    await expect(outside.record('../etc/passwd')).rejects.toBeInstanceOf(PathOutsideProjectError);
    expect(outside.kindOf('../etc/passwd')).toBeUndefined();
  });

  it('should return sorted, frozen snapshots', async () => {
    await tracker.record('b.txt');
    await tracker.record('a.txt');
    await tracker.record('src/app.ts');

    const snapshot = tracker.snapshot();
    expect(snapshot).toEqual({ created: ['a.txt', 'b.txt'], modified: ['src/app.ts'] });
    expect(Object.isFrozen(snapshot.created)).toBe(true);
  });
});

describe('normalizePath', () => {
  it('should collapse equivalent spellings', () => {
    expect(normalizePath('./a.txt')).toBe('a.txt');
    expect(normalizePath('dir/../a.txt')).toBe('a.txt');
    expect(normalizePath('src\\lib\\x.ts')).toBe('src/lib/x.ts');
  });
});
