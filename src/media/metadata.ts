/**
 * Per-file template context: names, calendar dates and the probed bitrate.
 * Nothing here throws — unavailable fields degrade to ''.
 */
import { logger } from '../utils/logger.js';
import type { SourceFile, TemplateContext } from '../types.js';
import type { BitrateProbe } from './ffmpeg.js';

/** Local-time calendar date as YYYY-MM-DD */
export function formatCalendarDate(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Bits/s → whole kbit/s as a string, '' when unknown */
export function formatBitrate(bitsPerSecond: number | null): string {
  if (bitsPerSecond === null || bitsPerSecond <= 0) return '';
  return String(Math.round(bitsPerSecond / 1000));
}

function probeSafely(probe: BitrateProbe, filePath: string): number | null {
  try {
    return probe(filePath);
  } catch (err) {
    logger.warn('Metadata: bitrate probe threw — leaving mp3_rate empty', { filePath, err });
    return null;
  }
}

export function buildTemplateContext(file: SourceFile, probe: BitrateProbe): TemplateContext {
  const updateDate = formatCalendarDate(new Date(file.mtimeMs));
  const creationDate = file.birthtimeMs === null ? '' : formatCalendarDate(new Date(file.birthtimeMs));

  return {
    filename:      file.name,
    basename:      file.stem,
    creation_date: creationDate,
    update_date:   updateDate,
    filedate:      creationDate || updateDate,
    mp3_rate:      formatBitrate(probeSafely(probe, file.path)),
  };
}
