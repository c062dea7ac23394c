/**
 * Error taxonomy for CPK archive operations.
 */

/**
 * Base class of every error raised by this package.
 */
export class CpkArchiveError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'CpkArchiveError';
  }
}

/**
 * The header failed validation. The archive cannot be used.
 */
export class FormatError extends CpkArchiveError {
  constructor(message: string = 'not a valid archive', cause?: unknown) {
    super(message, cause);
    this.name = 'FormatError';
  }
}

/**
 * A read came up short, ran past the source, or a codec failed.
 */
export class ArchiveIOError extends CpkArchiveError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ArchiveIOError';
  }
}

/**
 * No live record matches the requested path or id.
 */
export class NotFoundError extends CpkArchiveError {
  constructor(public readonly target: string | number) {
    super(`<${String(target)}> does not exist in the archive.`);
    this.name = 'NotFoundError';
  }
}

/**
 * Content was requested for a directory record.
 */
export class IsADirectoryError extends CpkArchiveError {
  constructor(public readonly target: string | number) {
    super(`Cannot open <${String(target)}> since it is a directory.`);
    this.name = 'IsADirectoryError';
  }
}

/**
 * A directory listing was requested for a file record.
 */
export class NotADirectoryError extends CpkArchiveError {
  constructor(public readonly target: string | number) {
    super(`Cannot list <${String(target)}> since it is not a directory.`);
    this.name = 'NotADirectoryError';
  }
}

/**
 * A query ran before the archive finished loading.
 */
export class NotLoadedError extends CpkArchiveError {
  constructor() {
    super('Archive not loaded yet. Call load() before using it.');
    this.name = 'NotLoadedError';
  }
}

/**
 * Formats an unknown thrown value for inclusion in a message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
