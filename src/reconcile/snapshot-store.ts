// snapshot-store.ts - Persisted identifier sets from the previous run
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LogSink } from '../common/logger';
import { PersistenceFailureError, SnapshotCorruptError } from '../common/errors';
import { CanonicalIdentifierSet } from '../inventory/identifier-set';
import { atomicWriteFileSync, errorMessage, safeReadJSONFile } from '../security';
import { SnapshotPurpose } from '../types';

const SNAPSHOT_VERSION = 1;

const SnapshotFileSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  purpose: z.enum(['bloatware', 'essential-apps']),
  savedAt: z.string(),
  identifiers: z.array(z.string()),
  /** Requirements attempted without success; retried only on a full scan. */
  pendingRequirements: z.array(z.string()).optional(),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export type SaveResult =
  | { ok: true; path: string; count: number }
  | { ok: false; error: PersistenceFailureError };

export function snapshotFileName(purpose: SnapshotPurpose): string {
  return `snapshot-${purpose}.json`;
}

/**
 * One logical snapshot per purpose. Bloatware and essential-app identifiers
 * live in separate files and are never mixed.
 */
export class SnapshotStore {
  readonly filePath: string;

  constructor(
    readonly purpose: SnapshotPurpose,
    dataDir: string,
    private logger: LogSink
  ) {
    this.filePath = path.join(dataDir, snapshotFileName(purpose));
  }

  /**
   * Previous run's identifiers, or null when there is no usable snapshot.
   * A corrupt file is treated the same as a missing one.
   */
  load(): CanonicalIdentifierSet | null {
    const record = this.loadRecord();
    return record ? new CanonicalIdentifierSet(record.identifiers) : null;
  }

  /** The whole snapshot file, validated; null under the same rules as load(). */
  loadRecord(): SnapshotFile | null {
    if (!fs.existsSync(this.filePath)) {
      this.logger.info('No previous snapshot found', { purpose: this.purpose });
      return null;
    }

    const result = safeReadJSONFile(this.filePath, SnapshotFileSchema);
    if (!result.success) {
      this.logger.warn('Ignoring unreadable snapshot, all items will be processed', { purpose: this.purpose },
        new SnapshotCorruptError(this.filePath, result.error));
      return null;
    }

    if (result.data.purpose !== this.purpose) {
      this.logger.warn('Ignoring snapshot written for another purpose', { purpose: this.purpose },
        new SnapshotCorruptError(this.filePath, `purpose is ${result.data.purpose}`));
      return null;
    }

    this.logger.info('Previous snapshot loaded', {
      purpose: this.purpose,
      identifiers: result.data.identifiers.length,
      savedAt: result.data.savedAt,
    });
    return result.data;
  }

  /**
   * Write through a temp file and rename. When anything fails the previous
   * snapshot is left as it was.
   */
  save(set: CanonicalIdentifierSet, savedAt: Date = new Date(), pendingRequirements?: readonly string[]): SaveResult {
    const file: SnapshotFile = {
      version: SNAPSHOT_VERSION,
      purpose: this.purpose,
      savedAt: savedAt.toISOString(),
      identifiers: set.toSortedArray(),
      ...(pendingRequirements ? { pendingRequirements: [...pendingRequirements] } : {}),
    };

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      atomicWriteFileSync(this.filePath, JSON.stringify(file, null, 2));
      return { ok: true, path: this.filePath, count: set.size };
    } catch (error) {
      return {
        ok: false,
        error: new PersistenceFailureError(this.filePath, errorMessage(error), { cause: error }),
      };
    }
  }
}
