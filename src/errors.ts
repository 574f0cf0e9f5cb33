/**
 * Raised by a FileSystem when the requested path does not exist
 */
export class FileNotFoundError extends Error {
  readonly code = 'ENOENT';

  constructor(
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(`No such file: ${path}`, options);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Raised when a tool path resolves outside the project root
 */
export class PathOutsideProjectError extends Error {
  constructor(readonly path: string) {
    super(`Path ${path} is outside the project directory`);
    this.name = 'PathOutsideProjectError';
  }
}

/**
 * A git or GitHub CLI command failed
 */
export class VersionControlError extends Error {
  constructor(
    readonly command: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${command} failed: ${message}`, options);
    this.name = 'VersionControlError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof FileNotFoundError || (error as NodeJS.ErrnoException)?.code === 'ENOENT';
}
