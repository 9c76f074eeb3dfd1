/**
 * Title / description assembly for a rendered recording.
 *
 * A non-empty rendered template wins outright; otherwise the prefix-based
 * fallback is used. The fixed `description` suffix is appended either way.
 */
import { YOUTUBE_LIMITS, type AppConfig } from '../config.js';
import type { SourceFile, TemplateContext, VideoMetadata } from '../types.js';
import { renderTemplate, templateValues, type TemplateRenderer } from './template.js';

export type MetadataOptions = Pick<
  AppConfig,
  | 'titlePrefix'
  | 'titleTemplate'
  | 'description'
  | 'descriptionPrefix'
  | 'descriptionTemplate'
  | 'tags'
  | 'categoryId'
  | 'privacyStatus'
>;

// YouTube rejects angle brackets in titles and descriptions
const stripAngleBrackets = (s: string) => s.replace(/[<>]/g, '');

/** First `max` code points of `s`; never splits a surrogate pair. */
export function truncateCodePoints(s: string, max: number): string {
  return Array.from(s).slice(0, max).join('');
}

export function fallbackTitle(file: Pick<SourceFile, 'stem'>, opts: Pick<MetadataOptions, 'titlePrefix'>): string {
  return `${opts.titlePrefix}${file.stem}`;
}

export function fallbackDescription(
  file: Pick<SourceFile, 'stem'>,
  context: Pick<TemplateContext, 'update_date'>,
  opts: Pick<MetadataOptions, 'descriptionPrefix'>,
): string {
  return `${opts.descriptionPrefix}${file.stem}\nRecorded on ${context.update_date}`;
}

export function buildVideoMetadata(
  file: SourceFile,
  context: TemplateContext,
  opts: MetadataOptions,
  render: TemplateRenderer = renderTemplate,
): VideoMetadata {
  const values = templateValues(context);

  const title = render(opts.titleTemplate, values) || fallbackTitle(file, opts);

  let description = render(opts.descriptionTemplate, values) || fallbackDescription(file, context, opts);
  if (opts.description) {
    description = `${description}\n\n${opts.description}`;
  }

  return {
    title:         truncateCodePoints(stripAngleBrackets(title), YOUTUBE_LIMITS.titleMaxChars),
    description:   truncateCodePoints(stripAngleBrackets(description), YOUTUBE_LIMITS.descriptionMaxChars),
    tags:          [...opts.tags],
    categoryId:    opts.categoryId,
    privacyStatus: opts.privacyStatus,
  };
}
