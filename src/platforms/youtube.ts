/**
 * YouTube Data API v3 client — the pipeline's publish capability.
 *
 * uploadVideo   — resumable upload: open a session, then PUT the file in
 *                 fixed-size chunks, reporting progress after each one.
 * addToPlaylist — insert a playlistItems resource for an uploaded video.
 *
 * No retries: a failed upload surfaces as an error and the next run picks
 * the still-unrecorded file up again.
 */
import { open, stat } from 'node:fs/promises';
import { z } from 'zod';
import { YOUTUBE_LIMITS } from '../config.js';
import { YouTubeApiError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { PublishCapability, UploadProgress, VideoMetadata } from '../types.js';
import type { AccessTokenProvider } from './google-auth.js';

// ── Constants ─────────────────────────────────────────────────────────────────

const UPLOAD_URL   = 'https://www.googleapis.com/upload/youtube/v3/videos';
const PLAYLIST_URL = 'https://www.googleapis.com/youtube/v3/playlistItems';

const ResourceSchema = z.object({ id: z.string().min(1) });

// ── Helpers ───────────────────────────────────────────────────────────────────

async function apiError(label: string, res: Response): Promise<YouTubeApiError> {
  const text = await res.text().catch(() => '');
  return new YouTubeApiError(`YouTube ${label} failed: HTTP ${res.status} — ${text}`, res.status, text);
}

async function parseResource(label: string, res: Response): Promise<string> {
  const parsed = ResourceSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new YouTubeApiError(`YouTube ${label} returned no resource id`, res.status, '');
  }
  return parsed.data.id;
}

/** Offset to resume from, given a 308 response's `Range: bytes=0-N` header. */
export function nextOffsetFromRange(range: string | null): number {
  if (!range) return 0;
  const match = /bytes=\d+-(\d+)/.exec(range);
  return match?.[1] ? Number(match[1]) + 1 : 0;
}

export function videoResourceBody(metadata: VideoMetadata): Record<string, unknown> {
  return {
    snippet: {
      title:       metadata.title,
      description: metadata.description,
      tags:        metadata.tags,
      categoryId:  metadata.categoryId,
    },
    status: {
      privacyStatus: metadata.privacyStatus,
    },
  };
}

// ── Client ────────────────────────────────────────────────────────────────────

export class YouTubeClient implements PublishCapability {
  constructor(
    private readonly auth: AccessTokenProvider,
    private readonly chunkBytes: number = YOUTUBE_LIMITS.uploadChunkBytes,
  ) {}

  async uploadVideo(
    videoPath: string,
    metadata: VideoMetadata,
    onProgress?: (progress: UploadProgress) => void,
  ): Promise<string> {
    const totalBytes = (await stat(videoPath)).size;
    if (totalBytes === 0) throw new Error(`Refusing to upload empty file ${videoPath}`);

    const sessionUrl = await this.startSession(metadata, totalBytes);
    logger.debug('YouTube: upload session opened', { videoPath, totalBytes });

    const handle = await open(videoPath, 'r');
    try {
      let offset = 0;
      for (;;) {
        const length = Math.min(this.chunkBytes, totalBytes - offset);
        const chunk = Buffer.alloc(length);
        const { bytesRead } = await handle.read(chunk, 0, length, offset);
        if (bytesRead !== length) {
          throw new Error(`${videoPath} changed during upload: read ${bytesRead} of ${length} bytes at offset ${offset}`);
        }

        const res = await fetch(sessionUrl, {
          method:  'PUT',
          headers: {
            'Authorization': `Bearer ${await this.auth.getAccessToken()}`,
            'Content-Type':  'video/mp4',
            'Content-Range': `bytes ${offset}-${offset + length - 1}/${totalBytes}`,
          },
          body:     chunk,
          // 308 here means "resume incomplete", not a redirect
          redirect: 'manual',
        });

        if (res.status === 308) {
          const next = nextOffsetFromRange(res.headers.get('range'));
          if (next <= offset) {
            throw new YouTubeApiError(`YouTube upload stalled at byte ${offset}`, 308, '');
          }
          offset = next;
          onProgress?.({ bytesSent: offset, totalBytes });
          continue;
        }

        if (!res.ok) throw await apiError('upload', res);

        const videoId = await parseResource('upload', res);
        onProgress?.({ bytesSent: totalBytes, totalBytes });
        logger.info('YouTube: upload complete', { videoId });
        return videoId;
      }
    } finally {
      await handle.close();
    }
  }

  async addToPlaylist(videoId: string, playlistId: string): Promise<string> {
    const res = await fetch(`${PLAYLIST_URL}?part=snippet`, {
      method:  'POST',
      headers: {
        'Authorization': `Bearer ${await this.auth.getAccessToken()}`,
        'Content-Type':  'application/json; charset=UTF-8',
      },
      body: JSON.stringify({
        snippet: {
          playlistId,
          resourceId: { kind: 'youtube#video', videoId },
        },
      }),
    });

    if (!res.ok) throw await apiError('playlist insert', res);
    const itemId = await parseResource('playlist insert', res);
    logger.info('YouTube: added to playlist', { videoId, playlistId, itemId });
    return itemId;
  }

  private async startSession(metadata: VideoMetadata, totalBytes: number): Promise<string> {
    const res = await fetch(`${UPLOAD_URL}?uploadType=resumable&part=snippet,status`, {
      method:  'POST',
      headers: {
        'Authorization':           `Bearer ${await this.auth.getAccessToken()}`,
        'Content-Type':            'application/json; charset=UTF-8',
        'X-Upload-Content-Type':   'video/mp4',
        'X-Upload-Content-Length': String(totalBytes),
      },
      body: JSON.stringify(videoResourceBody(metadata)),
    });

    if (!res.ok) throw await apiError('upload session', res);

    const location = res.headers.get('location');
    if (!location) {
      throw new YouTubeApiError('YouTube upload session response had no Location header', res.status, '');
    }
    return location;
  }
}
