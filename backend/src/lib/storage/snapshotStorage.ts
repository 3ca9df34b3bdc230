/**
 * Snapshot Storage
 * Whole-collection load/save contract used by the directory and ticket stores
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StoreUnavailableError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('snapshotStorage');

// =============================================================================
// Contract
// =============================================================================

export interface SnapshotStorage<T> {
  /** Human-readable location, used in errors and logs */
  readonly name: string;
  /** Returns null when nothing has been saved yet */
  load(): T | null;
  /** Durable when it returns; throws StoreUnavailableError otherwise */
  save(data: T): void;
}

// =============================================================================
// JSON File Implementation
// =============================================================================

/**
 * Synchronous JSON file storage. Writes go to a temp file which is fsynced
 * and renamed over the target, so readers never see a half-written snapshot.
 */
export class JsonFileStorage<T> implements SnapshotStorage<T> {
  readonly name: string;

  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    this.name = filePath;
  }

  load(): T | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StoreUnavailableError(this.name, 'could not be read', error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreUnavailableError(this.name, 'is not valid JSON', error);
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      log.error({ file: this.name, issues: parsed.error.issues }, 'Snapshot failed validation');
      throw new StoreUnavailableError(this.name, 'does not match the expected format', parsed.error);
    }

    return parsed.data;
  }

  save(data: T): void {
    const tmp = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const fd = fs.openSync(tmp, 'w');
      try {
        fs.writeFileSync(fd, JSON.stringify(data, null, 2), 'utf8');
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.filePath);
    } catch (error) {
      log.error({ file: this.name, error }, 'Snapshot flush failed');
      throw new StoreUnavailableError(this.name, 'could not be written', error);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
