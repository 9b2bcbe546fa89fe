import fs from 'fs';
import * as fsp from 'fs/promises';
import {
  LogSource,
  LogSourceHandle,
  PlatformLogPage,
  PlatformLogReader,
  PlatformLogRecord,
  ReadBatch,
} from '../common/interfaces/log-source.interface';
import { SourceUnavailableError, SourceUnavailableReason, errorCode, errorMessage } from '../common/errors';

export const DEFAULT_MAX_BATCH_BYTES = 1024 * 1024;

/** Targets named `eventlog:<name>` are platform event logs */
export const PLATFORM_LOG_PREFIX = 'eventlog:';

const NEWLINE = 0x0a;

export function isPlatformLog(target: string): boolean {
  return target.startsWith(PLATFORM_LOG_PREFIX);
}

function fingerprintOf(stats: fs.Stats): string {
  return `${stats.ino}:${stats.size}:${Math.trunc(stats.mtimeMs)}`;
}

/**
 * Length of the chunk without a trailing, incomplete UTF-8 sequence
 */
function completeUtf8Length(chunk: Buffer): number {
  let lead = chunk.length - 1;
  while (lead >= 0 && chunk.length - lead <= 3 && (chunk.readUInt8(lead) & 0xc0) === 0x80) {
    lead--;
  }
  if (lead < 0) return chunk.length;

  const first = chunk.readUInt8(lead);
  const expected = first >= 0xf0 ? 4 : first >= 0xe0 ? 3 : first >= 0xc0 ? 2 : 1;
  return chunk.length - lead < expected ? lead : chunk.length;
}

function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .filter(line => line.trim().length > 0);
}

/**
 * Plain text log file read by byte offset.
 *
 * Only complete lines are consumed: a trailing line without its newline stays
 * unread until the writer finishes it, unless it alone exceeds the batch size.
 */
export class FileLogSource implements LogSource {
  constructor(private readonly maxBatchBytes: number = DEFAULT_MAX_BATCH_BYTES) {}

  async openAt(filePath: string, offset: number, fingerprint: string | null = null): Promise<LogSourceHandle> {
    try {
      await fsp.access(filePath, fs.constants.R_OK);
      const stats = await fsp.stat(filePath);
      if (!stats.isFile()) {
        throw new SourceUnavailableError(filePath, 'NotFound', `Not a regular file: ${filePath}`);
      }
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw SourceUnavailableError.fromFsError(filePath, error);
    }

    return { path: filePath, offset: Math.max(0, offset), fingerprint };
  }

  async readNewLines(handle: LogSourceHandle): Promise<ReadBatch> {
    let stats: fs.Stats;
    try {
      stats = await fsp.stat(handle.path);
    } catch (error) {
      throw SourceUnavailableError.fromFsError(handle.path, error);
    }

    let truncated = false;
    if (stats.size < handle.offset) {
      handle.offset = 0;
      truncated = true;
    }

    if (stats.size === handle.offset) {
      if (truncated) handle.fingerprint = fingerprintOf(stats);
      return { lines: [], truncated };
    }

    const length = Math.min(stats.size - handle.offset, this.maxBatchBytes);
    const buffer = Buffer.alloc(length);
    let bytesRead = 0;
    let file: fsp.FileHandle | undefined;
    try {
      file = await fsp.open(handle.path, 'r');
      ({ bytesRead } = await file.read(buffer, 0, length, handle.offset));
    } catch (error) {
      throw SourceUnavailableError.fromFsError(handle.path, error);
    } finally {
      await file?.close();
    }

    const chunk = buffer.subarray(0, bytesRead);
    let consumed = chunk.lastIndexOf(NEWLINE) + 1;
    if (consumed === 0 && bytesRead === this.maxBatchBytes) {
      // A single line fills the batch: cut it on a character boundary.
      consumed = completeUtf8Length(chunk) || bytesRead;
    }

    if (consumed === 0) {
      if (truncated) handle.fingerprint = fingerprintOf(stats);
      return { lines: [], truncated };
    }

    handle.offset += consumed;
    handle.fingerprint = fingerprintOf(stats);
    return { lines: splitLines(chunk.subarray(0, consumed).toString('utf8')), truncated };
  }

  async close(_handle: LogSourceHandle): Promise<void> {
    // Files are opened per read; nothing is held between sweeps.
  }
}

/**
 * Translates a structured platform record into its line form
 */
export function formatPlatformRecord(record: PlatformLogRecord): string {
  const message = record.inserts.join(' ').replace(/\s*\r?\n\s*/g, ' ');
  return `${record.timeGenerated.toISOString()} ${record.level} ${record.source}[${record.eventId}]: ${message}`;
}

function readerFailureReason(error: unknown, fallback: SourceUnavailableReason): SourceUnavailableReason {
  const code = errorCode(error);
  if (code === 'EACCES' || code === 'EPERM') return 'PermissionDenied';
  if (code === 'ENOENT') return 'NotFound';
  return fallback;
}

/**
 * Platform event log exposed through the line-oriented LogSource contract.
 * The handle offset is the last record number processed.
 */
export class PlatformLogSource implements LogSource {
  constructor(private readonly reader: PlatformLogReader | null) {}

  private logName(identifier: string): string {
    return isPlatformLog(identifier) ? identifier.slice(PLATFORM_LOG_PREFIX.length) : identifier;
  }

  async openAt(identifier: string, offset: number, fingerprint: string | null = null): Promise<LogSourceHandle> {
    if (!this.reader) {
      throw new SourceUnavailableError(identifier, 'NotFound', `No platform log reader available for ${identifier}`);
    }

    try {
      await this.reader.open(this.logName(identifier));
    } catch (error) {
      const reason = readerFailureReason(error, 'NotFound');
      throw new SourceUnavailableError(identifier, reason, `Failed to open ${identifier}: ${errorMessage(error)}`);
    }

    return { path: identifier, offset: Math.max(0, offset), fingerprint };
  }

  async readNewLines(handle: LogSourceHandle): Promise<ReadBatch> {
    if (!this.reader) {
      throw new SourceUnavailableError(handle.path, 'NotFound', `No platform log reader available for ${handle.path}`);
    }

    const logName = this.logName(handle.path);
    let page: PlatformLogPage;
    let truncated = false;
    try {
      page = await this.reader.readAfter(logName, handle.offset);
      if (page.latestRecordNumber < handle.offset) {
        // The log was cleared; record numbering restarted.
        truncated = true;
        handle.offset = 0;
        page = await this.reader.readAfter(logName, 0);
      }
    } catch (error) {
      const reason = readerFailureReason(error, 'ReadFailed');
      throw new SourceUnavailableError(handle.path, reason, `Failed to read ${handle.path}: ${errorMessage(error)}`);
    }

    const records = page.records
      .filter(record => record.recordNumber > handle.offset)
      .sort((a, b) => a.recordNumber - b.recordNumber);

    const last = records[records.length - 1];
    if (last) {
      handle.offset = last.recordNumber;
    }
    handle.fingerprint = String(page.latestRecordNumber);

    return { lines: records.map(formatPlatformRecord), truncated };
  }

  async close(handle: LogSourceHandle): Promise<void> {
    await this.reader?.close(this.logName(handle.path));
  }
}

export interface LogSourceResolverOptions {
  maxBatchBytes?: number;
  platformReader?: PlatformLogReader | null;
}

export type LogSourceResolver = (target: string) => LogSource;

/**
 * Picks the LogSource serving a configured target
 */
export function createLogSourceResolver(options: LogSourceResolverOptions = {}): LogSourceResolver {
  const fileSource = new FileLogSource(options.maxBatchBytes);
  const platformSource = new PlatformLogSource(options.platformReader ?? null);

  return (target: string) => (isPlatformLog(target) ? platformSource : fileSource);
}
