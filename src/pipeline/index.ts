/**
 * Run orchestrator for tapecast.
 *
 * Loads config and state, builds the work queue (change detection or a single
 * --only file), applies --limit, honours --dry-run, checks run preconditions,
 * then hands the queue to the publish pipeline.
 */
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { IMAGE_EXTENSIONS, loadConfig, type AppConfig } from '../config.js';
import { StateStore } from '../db/state.js';
import { probeAudioBitrate, runEncoder, type BitrateProbe, type EncoderRunner } from '../media/ffmpeg.js';
import { GoogleCredentials } from '../platforms/google-auth.js';
import { YouTubeClient } from '../platforms/youtube.js';
import { PreconditionError } from '../utils/errors.js';
import { ensureDir, listFilesByExtension } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import type { PublishCapability, SourceFile } from '../types.js';
import { runPipeline, type RunSummary } from './publisher.js';
import { findSourceFiles, selectNewWork, snapshotSourceFile } from './scanner.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  configPath: string;
  audioDir?: string;
  imagesDir?: string;
  /** File name (relative to the audio dir) or path */
  only?: string;
  dryRun?: boolean;
  /** 0 or undefined = no cap */
  limit?: number;
}

/** Substitutable collaborators; production defaults are used when omitted. */
export interface RunDeps {
  createPublisher?: (config: AppConfig) => PublishCapability | Promise<PublishCapability>;
  runEncoder?: EncoderRunner;
  probeBitrate?: BitrateProbe;
  random?: () => number;
  now?: () => Date;
}

export type RunOutcome =
  | { kind: 'nothing_to_do' }
  | { kind: 'dry_run'; queue: SourceFile[] }
  | { kind: 'completed'; summary: RunSummary };

// ── Queue building ────────────────────────────────────────────────────────────

export function resolveOnlyFile(audioDir: string, only: string): SourceFile {
  const onlyPath = path.isAbsolute(only) ? only : path.join(audioDir, only);
  if (!existsSync(onlyPath)) {
    throw new PreconditionError(`Requested MP3 not found: ${onlyPath}`);
  }
  return snapshotSourceFile(onlyPath);
}

export function buildQueue(config: AppConfig, state: StateStore, options: Pick<RunOptions, 'only' | 'limit'>): SourceFile[] {
  // --only bypasses change detection: an explicitly named file is always processed
  const queue = options.only
    ? [resolveOnlyFile(config.audioDir, options.only)]
    : selectNewWork(findSourceFiles(config.audioDir), state);

  return options.limit && options.limit > 0 ? queue.slice(0, options.limit) : queue;
}

function listImages(imagesDir: string): string[] {
  if (!existsSync(imagesDir)) {
    throw new PreconditionError(`Images directory not found: ${imagesDir}`);
  }
  const images = listFilesByExtension(imagesDir, IMAGE_EXTENSIONS).sort();
  if (images.length === 0) {
    throw new PreconditionError(`No .jpg/.jpeg files found in images dir ${imagesDir}`);
  }
  return images;
}

/** Credentials are refreshed (or consented) here, before anything is rendered. */
async function defaultPublisher(config: AppConfig): Promise<PublishCapability> {
  const credentials = GoogleCredentials.fromFiles(config.clientSecretsPath, config.tokenPath);
  await credentials.getAccessToken();
  logger.info('Auth: YouTube credentials ready');
  return new YouTubeClient(credentials);
}

// ── Main run ──────────────────────────────────────────────────────────────────

export async function runOnce(options: RunOptions, deps: RunDeps = {}): Promise<RunOutcome> {
  const config = loadConfig(options.configPath, {
    audioDir:  options.audioDir,
    imagesDir: options.imagesDir,
  });
  logger.info('Run: starting', {
    config:   config.configPath,
    audioDir: config.audioDir,
    dryRun:   options.dryRun ?? false,
    limit:    options.limit ?? 0,
  });

  const state = StateStore.load(config.statePath);
  const queue = buildQueue(config, state, options);

  if (queue.length === 0) {
    logger.info('No new MP3s found');
    return { kind: 'nothing_to_do' };
  }

  if (options.dryRun) {
    logger.info(`Dry run: ${queue.length} new MP3(s) would be processed`);
    for (const file of queue) logger.info(`- ${file.name}`);
    return { kind: 'dry_run', queue };
  }

  // Checked once up front: without credentials no item could ever publish
  if (!existsSync(config.clientSecretsPath)) {
    throw new PreconditionError(`Missing client secrets file at ${config.clientSecretsPath}`);
  }
  const publisher = await (deps.createPublisher ?? defaultPublisher)(config);

  const images = listImages(config.imagesDir);
  ensureDir(config.outDir);

  const summary = await runPipeline(queue, {
    options:      config,
    images,
    state,
    publisher,
    runEncoder:   deps.runEncoder ?? runEncoder,
    probeBitrate: deps.probeBitrate ?? probeAudioBitrate,
    random:       deps.random,
    now:          deps.now,
  });

  return { kind: 'completed', summary };
}
