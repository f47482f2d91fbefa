import { writeFile } from 'node:fs/promises';

/**
 * Abstract base class for the file system the stand-ins write through.
 *
 * Concrete subclasses:
 *   - NodeFileSystemAdapter (real disk)
 *   - InMemoryFileSystemAdapter (tests)
 */
export abstract class FileSystemAdapter {
  /**
   * Create `path` with `contents` unless something already exists there.
   * Returns true when the file was created, false when it was left alone.
   */
  public abstract createIfAbsent(path: string, contents: string): Promise<boolean>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class NodeFileSystemAdapter extends FileSystemAdapter {
  public async createIfAbsent(path: string, contents: string): Promise<boolean> {
    try {
      // 'wx' fails with EEXIST instead of truncating, so check and write are one step.
      await writeFile(path, contents, { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }
}

export class InMemoryFileSystemAdapter extends FileSystemAdapter {
  private readonly files = new Map<string, string>();
  private writes = 0;

  constructor(initialFiles: Readonly<Record<string, string>> = {}) {
    super();
    for (const [path, contents] of Object.entries(initialFiles)) {
      this.files.set(path, contents);
    }
  }

  /** Number of writes performed through `createIfAbsent`. */
  public get writeCount(): number {
    return this.writes;
  }

  public read(path: string): string | undefined {
    return this.files.get(path);
  }

  public async createIfAbsent(path: string, contents: string): Promise<boolean> {
    if (this.files.has(path)) {
      return false;
    }
    this.files.set(path, contents);
    this.writes += 1;
    return true;
  }
}
