/**
 * Error kinds raised by the monitoring pipeline
 *
 * Local failures (one target, one channel) are contained by the caller;
 * only FatalStartupError stops the daemon.
 */

export type SourceUnavailableReason = 'NotFound' | 'PermissionDenied' | 'ReadFailed';

export type NotifierErrorKind = 'Unreachable' | 'AuthFailed' | 'InvalidResponse' | 'Timeout';

/**
 * Malformed JSON, bad regex, unknown severity or channel
 */
export class ConfigInvalidError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigInvalidError';
  }
}

/**
 * A log target that cannot be opened or read right now
 */
export class SourceUnavailableError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: SourceUnavailableReason,
    message: string,
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }

  static fromFsError(path: string, error: unknown): SourceUnavailableError {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return new SourceUnavailableError(path, 'NotFound', `Log source not found: ${path}`);
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new SourceUnavailableError(path, 'PermissionDenied', `Permission denied: ${path}`);
    }
    return new SourceUnavailableError(path, 'ReadFailed', `Failed to read ${path}: ${errorMessage(error)}`);
  }
}

/**
 * The persisted offset state could not be understood
 */
export class StateCorruptError extends Error {
  constructor(
    public readonly statePath: string,
    message: string,
  ) {
    super(message);
    this.name = 'StateCorruptError';
  }
}

/**
 * A channel transport rejected or could not deliver a notification
 */
export class NotifierError extends Error {
  constructor(
    public readonly kind: NotifierErrorKind,
    message: string,
    public readonly retryable: boolean = kind === 'Unreachable',
  ) {
    super(message);
    this.name = 'NotifierError';
  }
}

/**
 * Monitoring cannot start at all
 */
export class FatalStartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalStartupError';
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
