import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../utils/logger.js';

export function makeTempDir(prefix = 'tapecast-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write a file and pin its mtime (seconds since epoch). */
export function writeFileAt(filePath: string, content: string, mtimeSeconds: number): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  fs.utimesSync(filePath, mtimeSeconds, mtimeSeconds);
  return filePath;
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Logger whose methods are spies; child() returns the same instance. */
export function spyLogger() {
  const spies = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const log: Logger & typeof spies = { ...spies, child: () => log };
  return log;
}
