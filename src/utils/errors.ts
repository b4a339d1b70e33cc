/**
 * Error types raised by mountwatch
 *
 * Only setup failures are thrown. Once a watch is running, terminal
 * conditions are reported by closing the handle instead.
 */

export type MountwatchErrorCode =
  | 'FILE_NOT_FOUND'
  | 'WATCHER_SETUP_FAILED'
  | 'EMPTY_CONTENT'
  | 'INVALID_CONFIG';

export class MountwatchError extends Error {
  readonly code: MountwatchErrorCode;

  constructor(code: MountwatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MountwatchError';
    this.code = code;
  }
}

export class FileNotFoundError extends MountwatchError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super('FILE_NOT_FOUND', `file does not exist: ${filePath}`, options);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

export class WatcherSetupError extends MountwatchError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super('WATCHER_SETUP_FAILED', `failed to watch file: ${filePath}`, options);
    this.name = 'WatcherSetupError';
    this.filePath = filePath;
  }
}

export class ContentValidationError extends MountwatchError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super('EMPTY_CONTENT', `invalid content in ${filePath}: ${reason}`);
    this.name = 'ContentValidationError';
    this.filePath = filePath;
  }
}

export class ConfigError extends MountwatchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('INVALID_CONFIG', issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
