/**
 * Persisted upload state — which source files have been published, keyed by
 * resolved path, with the (size, mtime) fingerprint seen at publish time.
 *
 * On-disk layout:
 *   {"uploaded": {"<resolved path>": {"size", "mtime", "video_id", "uploaded_at"}}}
 *
 * The whole file is rewritten after every successful publish (temp file +
 * rename), never batched.
 */
import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { StateFileError } from '../utils/errors.js';
import { writeJsonAtomic } from '../utils/fs.js';
import type { Fingerprint, SourceFile } from '../types.js';

// ── Schema ────────────────────────────────────────────────────────────────────

const UploadRecordSchema = z.object({
  size:        z.number(),
  mtime:       z.number(),
  video_id:    z.string(),
  uploaded_at: z.number().int(),
});

const StateFileSchema = z.object({
  uploaded: z.record(UploadRecordSchema).default({}),
});

export type UploadRecord = z.infer<typeof UploadRecordSchema>;

// ── Fingerprints ──────────────────────────────────────────────────────────────

export function fingerprintOf(file: SourceFile): Fingerprint {
  return { size: file.size, mtime: file.mtime };
}

// ── Store ─────────────────────────────────────────────────────────────────────

export class StateStore {
  private constructor(
    readonly filePath: string,
    private readonly uploaded: Map<string, UploadRecord>,
  ) {}

  static load(filePath: string): StateStore {
    if (!existsSync(filePath)) {
      logger.debug('State: no state file yet — starting empty', { filePath });
      return new StateStore(filePath, new Map());
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new StateFileError(`State file ${filePath} is not valid JSON`, err);
    }

    const result = StateFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(i => i.path.join('.')).join(', ');
      throw new StateFileError(`State file ${filePath} has unexpected shape at: ${issues}`);
    }

    const store = new StateStore(filePath, new Map(Object.entries(result.data.uploaded)));
    logger.debug('State: loaded', { filePath, records: store.size });
    return store;
  }

  get size(): number {
    return this.uploaded.size;
  }

  get(resolvedPath: string): UploadRecord | undefined {
    return this.uploaded.get(resolvedPath);
  }

  entries(): Array<[string, UploadRecord]> {
    return [...this.uploaded.entries()];
  }

  /**
   * True iff a record exists and both size and mtime match the snapshot.
   * Content is not hashed: a rewrite that preserves size and mtime is not seen.
   */
  isUnchanged(file: SourceFile): boolean {
    const prev = this.uploaded.get(file.resolvedPath);
    if (!prev) return false;
    const current = fingerprintOf(file);
    return prev.size === current.size && prev.mtime === current.mtime;
  }

  record(file: SourceFile, videoId: string, now: Date = new Date()): UploadRecord {
    const { size, mtime } = fingerprintOf(file);
    const entry: UploadRecord = {
      size,
      mtime,
      video_id:    videoId,
      uploaded_at: Math.floor(now.getTime() / 1000),
    };
    this.uploaded.set(file.resolvedPath, entry);
    return entry;
  }

  flush(): void {
    writeJsonAtomic(this.filePath, { uploaded: Object.fromEntries(this.uploaded) });
    logger.debug('State: flushed', { filePath: this.filePath, records: this.uploaded.size });
  }
}
