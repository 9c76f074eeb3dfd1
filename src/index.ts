#!/usr/bin/env node
/**
 * tapecast — entry point.
 *
 * One batch run per invocation: scan the audio dir, render and publish every
 * new recording, exit. Exit status 0 on success (including "nothing to do"
 * and dry runs), 1 on a fatal error.
 */
import { Command, InvalidArgumentError } from 'commander';
import { runOnce, type RunOptions } from './pipeline/index.js';
import { errorMessage, isFatal } from './utils/errors.js';
import { logger } from './utils/logger.js';

interface CliOptions {
  config: string;
  audioDir?: string;
  imagesDir?: string;
  only?: string;
  dryRun?: boolean;
  limit: number;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return n;
}

const program = new Command()
  .name('tapecast')
  .description('Upload MP3s as static-image YouTube videos')
  .version('0.1.0')
  .option('--config <path>', 'config file', 'config.json')
  .option('--audio-dir <dir>', 'override audio_dir from the config')
  .option('--images-dir <dir>', 'override images_dir from the config')
  .option('--only <file>', 'process only this MP3 filename (or path)')
  .option('--dry-run', 'list eligible files without rendering or uploading')
  .option('--limit <n>', 'process at most n files this run (0 = no cap)', parseLimit, 0);

async function main(): Promise<number> {
  program.parse();
  const opts = program.opts<CliOptions>();

  const runOptions: RunOptions = {
    configPath: opts.config,
    audioDir:   opts.audioDir,
    imagesDir:  opts.imagesDir,
    only:       opts.only,
    dryRun:     opts.dryRun ?? false,
    limit:      opts.limit,
  };

  try {
    await runOnce(runOptions);
    return 0;
  } catch (err) {
    logger.error(isFatal(err) ? errorMessage(err) : 'Unexpected error — aborting run', { err });
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('Fatal startup error', { err });
    process.exit(1);
  });
