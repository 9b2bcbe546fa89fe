import fs from 'fs';
import path from 'path';
import Joi from 'joi';
import { OffsetRecord } from '../common/interfaces/monitor.interfaces';
import { StateCorruptError, errorCode, errorMessage } from '../common/errors';

interface PersistedOffset {
  offset: number;
  fingerprint: string | null;
}

const persistedOffsetSchema = Joi.object<PersistedOffset>({
  offset: Joi.number().integer().min(0).required(),
  fingerprint: Joi.string().allow(null).default(null),
}).unknown(true);

/**
 * Persists per-target read offsets in a JSON state file.
 *
 * Writes go to a temporary file that is renamed over the state file, so a
 * crash mid-write leaves the previous checkpoint intact. Writes are
 * synchronous: a shutdown never abandons a checkpoint half written.
 */
export class OffsetStore {
  constructor(private readonly statePath: string) {}

  get path(): string {
    return this.statePath;
  }

  private ensureDirectory(): void {
    const dir = path.dirname(this.statePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Restores the persisted offsets.
   *
   * A missing state file yields an empty mapping. A corrupt one is reported
   * as a warning and also yields an empty mapping, so every target restarts
   * from offset 0 instead of blocking startup.
   */
  load(): Map<string, OffsetRecord> {
    try {
      return this.readState();
    } catch (error) {
      if (error instanceof StateCorruptError) {
        console.warn(`⚠️  ${error.message} - starting from empty offset state`);
        return new Map();
      }
      throw error;
    }
  }

  /**
   * Reads and validates the state file.
   *
   * @throws {StateCorruptError} when the file cannot be parsed or is not an offset mapping
   */
  readState(): Map<string, OffsetRecord> {
    let raw: string;
    try {
      raw = fs.readFileSync(this.statePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return new Map();
      }
      throw new StateCorruptError(this.statePath, `Failed to read offset state ${this.statePath}: ${errorMessage(error)}`);
    }

    if (!raw.trim()) {
      return new Map();
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new StateCorruptError(this.statePath, `Offset state ${this.statePath} is not valid JSON: ${errorMessage(error)}`);
    }

    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw new StateCorruptError(this.statePath, `Offset state ${this.statePath} is not a mapping of paths to offsets`);
    }

    const records = new Map<string, OffsetRecord>();
    for (const [targetPath, entry] of Object.entries(document)) {
      const { error, value } = persistedOffsetSchema.validate(entry, { convert: false });
      if (error || !value) {
        console.warn(`⚠️  Ignoring invalid offset entry for ${targetPath}: ${error?.message ?? 'empty entry'}`);
        continue;
      }
      records.set(targetPath, { path: targetPath, offset: value.offset, fingerprint: value.fingerprint });
    }

    return records;
  }

  /**
   * Persists the given offsets atomically (write to temp, then rename)
   */
  save(records: ReadonlyMap<string, OffsetRecord>): void {
    this.ensureDirectory();

    const document: Record<string, PersistedOffset> = {};
    for (const [targetPath, record] of records) {
      document[targetPath] = { offset: record.offset, fingerprint: record.fingerprint };
    }

    const tempPath = `${this.statePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2));
      fs.renameSync(tempPath, this.statePath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
      throw error;
    }
  }
}
