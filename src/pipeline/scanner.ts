/**
 * Change detection — enumerates source recordings and decides which ones
 * still need publishing. Read-only against the filesystem and the state store.
 */
import { existsSync, realpathSync, statSync } from 'node:fs';
import * as path from 'node:path';
import { AUDIO_EXTENSION } from '../config.js';
import type { StateStore } from '../db/state.js';
import { PreconditionError } from '../utils/errors.js';
import { listFilesByExtension } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import type { SourceFile } from '../types.js';

const NS_PER_SECOND = 1_000_000_000n;

/**
 * Whole seconds plus the nanosecond remainder scaled by 1e-9, summed as
 * doubles. This is the float already stored in existing state files;
 * `mtimeMs / 1000` rounds differently for a fair share of timestamps.
 */
export function secondsFromNs(ns: bigint): number {
  return Number(ns / NS_PER_SECOND) + Number(ns % NS_PER_SECOND) * 1e-9;
}

export function snapshotSourceFile(filePath: string): SourceFile {
  const stats = statSync(filePath, { bigint: true });
  const name = path.basename(filePath);
  return {
    path:         filePath,
    resolvedPath: realpathSync(filePath),
    name,
    stem:         path.parse(name).name,
    size:         Number(stats.size),
    mtime:        secondsFromNs(stats.mtimeNs),
    mtimeMs:      Number(stats.mtimeNs) / 1e6,
    // Node reports 0 when the filesystem has no birth time
    birthtimeMs:  stats.birthtimeNs > 0n ? Number(stats.birthtimeNs) / 1e6 : null,
  };
}

/** Source files in `dir`, oldest modification first (ties broken by name). */
export function findSourceFiles(dir: string, extension: string = AUDIO_EXTENSION): SourceFile[] {
  if (!existsSync(dir)) {
    throw new PreconditionError(`Audio directory not found: ${dir}`);
  }
  return listFilesByExtension(dir, [extension])
    .map(snapshotSourceFile)
    .sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name));
}

export function selectNewWork(files: SourceFile[], state: StateStore): SourceFile[] {
  const fresh = files.filter((f) => !state.isUnchanged(f));
  logger.info('Scanner: change detection complete', {
    scanned:   files.length,
    unchanged: files.length - fresh.length,
    eligible:  fresh.length,
  });
  return fresh;
}
