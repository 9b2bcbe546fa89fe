/**
 * Read position of an opened log target
 */
export interface LogSourceHandle {
  readonly path: string;
  /** Byte offset for files, last record number for platform logs */
  offset: number;
  fingerprint: string | null;
}

/**
 * Lines appended to a target since the previous read
 */
export interface ReadBatch {
  lines: string[];
  /** The target shrank below the stored offset and was re-read from the start */
  truncated: boolean;
}

/**
 * A readable, appendable log target
 */
export interface LogSource {
  /**
   * @throws {SourceUnavailableError} NotFound or PermissionDenied
   */
  openAt(path: string, offset: number, fingerprint?: string | null): Promise<LogSourceHandle>;

  /**
   * Returns complete lines appended since the handle's offset and advances it
   *
   * @throws {SourceUnavailableError}
   */
  readNewLines(handle: LogSourceHandle): Promise<ReadBatch>;

  close(handle: LogSourceHandle): Promise<void>;
}

/**
 * Structured record of a platform event log
 */
export interface PlatformLogRecord {
  recordNumber: number;
  timeGenerated: Date;
  source: string;
  eventId: number;
  level: string;
  inserts: string[];
}

/**
 * Records of a platform log newer than a given record number
 */
export interface PlatformLogPage {
  records: PlatformLogRecord[];
  /** Highest record number currently held by the log */
  latestRecordNumber: number;
}

/**
 * OS-specific access to a platform event log
 */
export interface PlatformLogReader {
  /**
   * @throws when the log does not exist or cannot be opened; an error `code` of
   * `EACCES` or `EPERM` marks a permission failure
   */
  open(logName: string): Promise<void>;

  readAfter(logName: string, recordNumber: number): Promise<PlatformLogPage>;

  close(logName: string): Promise<void>;
}
