/**
 * ffmpeg / ffprobe process wrappers.
 *
 * runEncoder throws EncoderMissingError when the binary cannot be spawned
 * (fatal for the run) and RenderError on a non-zero exit (the item is skipped).
 * probeAudioBitrate never throws.
 */
import { spawnSync } from 'node:child_process';
import { env } from '../config.js';
import { EncoderMissingError, RenderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RenderPlan } from '../types.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

const STDERR_TAIL_LINES = 20;
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

function tail(text: string, lines: number): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}

function isSpawnNotFound(err: Error | undefined): boolean {
  return err !== undefined && 'code' in err && err.code === 'ENOENT';
}

// ── Public API ─────────────────────────────────────────────────────────────────

export type EncoderRunner = (plan: RenderPlan) => void;
export type BitrateProbe = (filePath: string) => number | null;

/** Run ffmpeg with the planned arguments, blocking until it exits. */
export const runEncoder: EncoderRunner = (plan) => {
  const binary = env.FFMPEG_PATH;
  logger.debug('FFmpeg: spawning encoder', { binary, args: plan.args });

  const result = spawnSync(binary, plan.args, {
    stdio:     ['ignore', 'ignore', 'pipe'],
    encoding:  'utf-8',
    maxBuffer: MAX_BUFFER_BYTES,
  });

  if (result.error) {
    if (isSpawnNotFound(result.error)) throw new EncoderMissingError(binary, result.error);
    throw new RenderError(`FFmpeg failed to run: ${result.error.message}`, null, '');
  }

  if (result.status !== 0) {
    const stderrTail = tail(result.stderr ?? '', STDERR_TAIL_LINES);
    const reason = result.signal ? `killed by ${result.signal}` : `exit code ${result.status}`;
    throw new RenderError(`FFmpeg render failed (${reason})`, result.status, stderrTail);
  }

  logger.debug('FFmpeg: render complete', { outputPath: plan.outputPath });
};

/**
 * Read the first audio stream's bit rate in bits/s.
 * Returns null on any failure: missing binary, non-zero exit, empty or
 * non-numeric output, or a value <= 0.
 */
export const probeAudioBitrate: BitrateProbe = (filePath) => {
  const args = [
    '-v', 'error',
    '-select_streams', 'a:0',
    '-show_entries', 'stream=bit_rate',
    '-of', 'default=noprint_wrappers=1:nokey=1',
    filePath,
  ];
  const result = spawnSync(env.FFPROBE_PATH, args, {
    stdio:    ['ignore', 'pipe', 'pipe'],
    encoding: 'utf-8',
  });

  if (result.error || result.status !== 0) {
    logger.warn('FFprobe: bitrate probe failed', {
      filePath,
      error: result.error ? result.error.message : tail(result.stderr ?? '', 3),
    });
    return null;
  }

  return parseBitrate(result.stdout ?? '');
};

export function parseBitrate(output: string): number | null {
  const first = output.trim().split(/\s+/)[0] ?? '';
  if (!/^\d+(\.\d+)?$/.test(first)) return null;
  const value = Number(first);
  return value > 0 ? value : null;
}
