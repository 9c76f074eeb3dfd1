/**
 * Publish pipeline — renders, uploads, records and (optionally) files each
 * eligible recording under a playlist, strictly one at a time.
 *
 * Collaborators (encoder, probe, publish capability, state store, randomness,
 * clock) are injected so the failure branches can be exercised in tests.
 *
 * Partial failures: render and upload errors skip the item, playlist errors
 * are logged and ignored. The upload is recorded and flushed before the
 * playlist attach is attempted, so a crash in between never leaves a
 * published-but-unrecorded item.
 */
import type { AppConfig } from '../config.js';
import type { StateStore } from '../db/state.js';
import type { BitrateProbe, EncoderRunner } from '../media/ffmpeg.js';
import { buildTemplateContext } from '../media/metadata.js';
import { buildRenderPlan } from '../media/render-plan.js';
import { RenderError, PreconditionError, StateFileError, errorMessage, isFatal } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { PublishCapability, SourceFile, UploadProgress } from '../types.js';
import {
  INITIAL_STATE,
  transition,
  type ItemEffect,
  type ItemEvent,
  type ItemState,
} from './item-state.js';
import { buildVideoMetadata, type MetadataOptions } from './metadata.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type PipelineOptions = MetadataOptions &
  Pick<AppConfig, 'outDir' | 'videoSize' | 'waveform' | 'playlistId'>;

export interface PipelineDeps {
  options: PipelineOptions;
  images: string[];
  state: StateStore;
  publisher: PublishCapability;
  runEncoder: EncoderRunner;
  probeBitrate: BitrateProbe;
  /** Uniform [0, 1) — defaults to Math.random */
  random?: () => number;
  now?: () => Date;
  logger?: Logger;
}

export interface ItemResult {
  file: SourceFile;
  state: ItemState;
}

export interface RunSummary {
  processed: number;
  published: number;
  skipped: number;
  playlistFailures: number;
  items: ItemResult[];
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function pickRandomImage(images: readonly string[], random: () => number = Math.random): string {
  if (images.length === 0) {
    throw new PreconditionError('No .jpg/.jpeg files found in images dir');
  }
  const index = Math.min(Math.floor(random() * images.length), images.length - 1);
  const image = images[index];
  if (image === undefined) throw new PreconditionError('Image pool index out of range');
  return image;
}

/** Progress callback that logs each whole percentage once. */
export function createProgressReporter(log: Logger): (p: UploadProgress) => void {
  let last = -1;
  return ({ bytesSent, totalBytes }) => {
    const pct = totalBytes > 0 ? Math.floor((bytesSent * 100) / totalBytes) : 100;
    if (pct === last) return;
    last = pct;
    log.info(`Upload progress: ${pct}%`);
  };
}

// ── Effect execution ──────────────────────────────────────────────────────────

async function runEffect(
  effect: ItemEffect,
  file: SourceFile,
  deps: PipelineDeps,
  log: Logger,
): Promise<ItemEvent> {
  switch (effect.kind) {
    case 'render': {
      const plan = buildRenderPlan({
        source:    file,
        imagePath: effect.imagePath,
        outDir:    deps.options.outDir,
        videoSize: deps.options.videoSize,
        waveform:  deps.options.waveform,
      });
      log.info('Rendering', { image: effect.imagePath, outputPath: plan.outputPath });
      try {
        deps.runEncoder(plan);
        return { type: 'render_succeeded', videoPath: plan.outputPath };
      } catch (err) {
        if (isFatal(err)) throw err;
        log.error('Render failed — skipping', {
          error:  errorMessage(err),
          stderr: err instanceof RenderError ? err.stderrTail : undefined,
        });
        return { type: 'render_failed', reason: errorMessage(err) };
      }
    }

    case 'build_metadata': {
      const context = buildTemplateContext(file, deps.probeBitrate);
      const metadata = buildVideoMetadata(file, context, deps.options);
      log.debug('Metadata built', { title: metadata.title, mp3_rate: context.mp3_rate });
      return { type: 'metadata_built', metadata };
    }

    case 'publish': {
      log.info('Uploading', { videoPath: effect.videoPath, title: effect.metadata.title });
      try {
        const videoId = await deps.publisher.uploadVideo(
          effect.videoPath,
          effect.metadata,
          createProgressReporter(log),
        );
        log.info('Uploaded', { videoId });
        return { type: 'publish_succeeded', videoId };
      } catch (err) {
        log.error('Upload failed — skipping', { error: errorMessage(err) });
        return { type: 'publish_failed', reason: errorMessage(err) };
      }
    }

    case 'record': {
      deps.state.record(file, effect.videoId, (deps.now ?? (() => new Date()))());
      try {
        deps.state.flush();
      } catch (err) {
        throw new StateFileError(
          `Published ${effect.videoId} but could not write state file ${deps.state.filePath}`,
          err,
        );
      }
      log.debug('Recorded upload', { videoId: effect.videoId });
      return { type: 'recorded' };
    }

    case 'attach_playlist': {
      log.info('Adding to playlist', { playlistId: effect.playlistId, videoId: effect.videoId });
      try {
        await deps.publisher.addToPlaylist(effect.videoId, effect.playlistId);
        return { type: 'playlist_attached' };
      } catch (err) {
        log.warn('Playlist attach failed (upload kept)', {
          playlistId: effect.playlistId,
          videoId:    effect.videoId,
          error:      errorMessage(err),
        });
        return { type: 'playlist_failed', reason: errorMessage(err) };
      }
    }
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** Drive one file from `pending` to a terminal state. Fatal errors propagate. */
export async function processItem(file: SourceFile, deps: PipelineDeps): Promise<ItemResult> {
  const log = (deps.logger ?? rootLogger).child({ file: file.name });
  const opts = { playlistId: deps.options.playlistId };

  const imagePath = pickRandomImage(deps.images, deps.random);
  let { state, effect } = transition(INITIAL_STATE, { type: 'begin', imagePath }, opts);

  while (effect) {
    const event = await runEffect(effect, file, deps, log);
    ({ state, effect } = transition(state, event, opts));
  }

  return { file, state };
}

export async function runPipeline(queue: SourceFile[], deps: PipelineDeps): Promise<RunSummary> {
  const summary: RunSummary = { processed: 0, published: 0, skipped: 0, playlistFailures: 0, items: [] };

  for (const file of queue) {
    const result = await processItem(file, deps);
    summary.items.push(result);
    summary.processed++;

    if (result.state.kind === 'done') {
      summary.published++;
      if (result.state.playlist === 'failed') summary.playlistFailures++;
    } else if (result.state.kind === 'skipped') {
      summary.skipped++;
    }
  }

  (deps.logger ?? rootLogger).info('Pipeline: run complete', {
    processed:        summary.processed,
    published:        summary.published,
    skipped:          summary.skipped,
    playlistFailures: summary.playlistFailures,
  });
  return summary;
}
