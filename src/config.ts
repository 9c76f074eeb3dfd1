import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './utils/errors.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL:    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:   z.enum(['text', 'json']).default('text'),

  // External binaries (PATH lookup when unset)
  FFMPEG_PATH:  z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── File extensions ───────────────────────────────────────────────────────────

export const AUDIO_EXTENSION = '.mp3';
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg'] as const;
export const VIDEO_EXTENSION = '.mp4';

// ── YouTube ───────────────────────────────────────────────────────────────────

export const YOUTUBE_SCOPES = [
  'https://www.googleapis.com/auth/youtube.upload',
  'https://www.googleapis.com/auth/youtube',
] as const;

export const YOUTUBE_LIMITS = {
  titleMaxChars:       100,
  descriptionMaxChars: 5000,
  uploadChunkBytes:    8 * 1024 * 1024, // must be a multiple of 256 KiB
} as const;

// ── Config file schema ────────────────────────────────────────────────────────

export const WAVEFORM_LINE_MODES = ['point', 'line', 'p2p', 'cline'] as const;
export const WAVEFORM_SPECTRUM_MODES = ['spectrum', 'showspectrum'] as const;

const WaveformSchema = z.object({
  enabled:        z.boolean().default(false),
  fps:            z.coerce.number().int().positive().default(30),
  height:         z.coerce.number().int().positive().default(200),
  mode:           z.enum([...WAVEFORM_LINE_MODES, ...WAVEFORM_SPECTRUM_MODES]).default('line'),
  color:          z.string().min(1).default('white@0.8'),
  spectrum_mode:  z.enum(['combined', 'separate']).default('combined'),
  spectrum_slide: z.coerce.number().int().min(0).max(4).default(1),
  spectrum_scale: z.enum(['lin', 'sqrt', 'cbrt', 'log', '4thrt', '5thrt']).default('lin'),
});

const ConfigFileSchema = z.object({
  // Work directories and state
  audio_dir:            z.string().min(1).default('./audio'),
  images_dir:           z.string().min(1).default('./images'),
  out_dir:              z.string().min(1).default('./out'),
  state_path:           z.string().min(1).default('./state.json'),

  // Credentials
  client_secrets:       z.string().min(1).default('./client_secrets.json'),
  token_path:           z.string().min(1).default('./token.json'),

  // Video metadata
  title_prefix:         z.string().default(''),
  description:          z.string().default(''),
  description_prefix:   z.string().default('pocket operator tinkering - '),
  title_template:       z.string().default(''),
  description_template: z.string().default(''),
  tags:                 z.array(z.string()).default([]),
  category_id:          z.union([z.string(), z.number()]).transform(String).default('10'),
  privacy_status:       z.enum(['public', 'unlisted', 'private']).default('unlisted'),
  playlist_id:          z.string().default(''),

  // Rendering
  video_size:           z.string().regex(/^\d+x\d+$/, 'expected WIDTHxHEIGHT').default('1280x720'),
  waveform:             WaveformSchema.default({}),
});

export type WaveformConfig = z.infer<typeof WaveformSchema>;
export type PrivacyStatus = z.infer<typeof ConfigFileSchema>['privacy_status'];

export interface AppConfig {
  configPath: string;
  audioDir: string;
  imagesDir: string;
  outDir: string;
  statePath: string;
  clientSecretsPath: string;
  tokenPath: string;
  titlePrefix: string;
  description: string;
  descriptionPrefix: string;
  titleTemplate: string;
  descriptionTemplate: string;
  tags: string[];
  categoryId: string;
  privacyStatus: PrivacyStatus;
  playlistId: string;
  videoSize: string;
  waveform: WaveformConfig;
}

export interface ConfigOverrides {
  audioDir?: string;
  imagesDir?: string;
}

// ── Loading ───────────────────────────────────────────────────────────────────

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) return {};
  try {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, err);
  }
}

/**
 * Load and validate the JSON config file. A missing file yields all defaults.
 *
 * Relative paths in the file resolve against the file's own directory;
 * relative CLI overrides resolve against the working directory.
 */
export function loadConfig(configPath: string, overrides: ConfigOverrides = {}): AppConfig {
  const absConfigPath = path.resolve(configPath);
  const baseDir = path.dirname(absConfigPath);

  const result = ConfigFileSchema.safeParse(readConfigFile(absConfigPath));
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${absConfigPath}: ${issues}`);
  }
  const cfg = result.data;
  const fromConfig = (p: string) => path.resolve(baseDir, p);

  return {
    configPath:          absConfigPath,
    audioDir:            overrides.audioDir ? path.resolve(overrides.audioDir) : fromConfig(cfg.audio_dir),
    imagesDir:           overrides.imagesDir ? path.resolve(overrides.imagesDir) : fromConfig(cfg.images_dir),
    outDir:              fromConfig(cfg.out_dir),
    statePath:           fromConfig(cfg.state_path),
    clientSecretsPath:   fromConfig(cfg.client_secrets),
    tokenPath:           fromConfig(cfg.token_path),
    titlePrefix:         cfg.title_prefix,
    description:         cfg.description,
    descriptionPrefix:   cfg.description_prefix,
    titleTemplate:       cfg.title_template,
    descriptionTemplate: cfg.description_template,
    tags:                cfg.tags,
    categoryId:          cfg.category_id,
    privacyStatus:       cfg.privacy_status,
    playlistId:          cfg.playlist_id,
    videoSize:           cfg.video_size,
    waveform:            cfg.waveform,
  };
}

/** Parse a standalone `waveform` section, filling in defaults. */
export function parseWaveformConfig(raw: unknown): WaveformConfig {
  return WaveformSchema.parse(raw ?? {});
}
