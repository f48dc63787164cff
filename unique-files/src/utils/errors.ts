/**
 * Returns the message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * A directory argument that does not exist or is not a directory.
 * The run continues with the remaining roots.
 */
export class InvalidRootError extends Error {
  constructor(
    public readonly root: string,
    public readonly reason: string
  ) {
    super(`'${root}' is not a directory or does not exist (${reason})`);
    this.name = 'InvalidRootError';
  }
}

/**
 * A file that could not be opened or read while hashing.
 * The file is left out of content comparison.
 */
export class ReadError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Could not read ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'ReadError';
  }
}

export class NotEnoughRootsError extends Error {
  constructor(public readonly usable: number) {
    super(`Please provide at least 2 directories to compare (${usable} usable)`);
    this.name = 'NotEnoughRootsError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
