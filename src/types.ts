import type { PrivacyStatus } from './config.js';

// ── Source files ──────────────────────────────────────────────────────────────

/** Immutable snapshot of an audio file, taken once per processing pass. */
export interface SourceFile {
  path: string;
  /** Real path with symlinks resolved; the state-store key */
  resolvedPath: string;
  name: string;
  stem: string;
  size: number;
  /** Seconds since epoch as `sec + nsec * 1e-9`; the fingerprint mtime */
  mtime: number;
  mtimeMs: number;
  /** null where the filesystem cannot report creation time */
  birthtimeMs: number | null;
}

export interface Fingerprint {
  size: number;
  /** Seconds since epoch, fractional */
  mtime: number;
}

// ── Templates ─────────────────────────────────────────────────────────────────

export interface TemplateContext {
  filename: string;
  basename: string;
  creation_date: string;
  update_date: string;
  filedate: string;
  mp3_rate: string;
}

// ── Rendering ─────────────────────────────────────────────────────────────────

export interface RenderPlan {
  /** ffmpeg arguments, without the binary itself */
  args: string[];
  outputPath: string;
}

// ── Publishing ────────────────────────────────────────────────────────────────

export interface VideoMetadata {
  title: string;
  description: string;
  tags: string[];
  categoryId: string;
  privacyStatus: PrivacyStatus;
}

export interface UploadProgress {
  bytesSent: number;
  totalBytes: number;
}

/**
 * What the pipeline needs from a video host: submit a file and get a stable
 * identifier back, then optionally file it under a playlist.
 */
export interface PublishCapability {
  uploadVideo(
    videoPath: string,
    metadata: VideoMetadata,
    onProgress?: (progress: UploadProgress) => void,
  ): Promise<string>;
  addToPlaylist(videoId: string, playlistId: string): Promise<string>;
}
