/**
 * Per-item publish lifecycle as a tagged state and a pure transition function.
 *
 *   pending → rendering → rendered → publishing → published
 *           → playlist_attach (only with a playlist) → done
 *
 * Render and publish failures end in `skipped`. A playlist failure still ends
 * in `done`: by then the upload is already recorded in the state store.
 *
 * transition() performs no I/O. It returns the next state and the effect the
 * driver must run; the effect's outcome is fed back in as the next event.
 */
import type { VideoMetadata } from '../types.js';

// ── States ────────────────────────────────────────────────────────────────────

export type PlaylistOutcome = 'not_configured' | 'attached' | 'failed';

export type ItemState =
  | { kind: 'pending' }
  | { kind: 'rendering'; imagePath: string }
  | { kind: 'rendered'; videoPath: string }
  | { kind: 'publishing'; videoPath: string; metadata: VideoMetadata }
  | { kind: 'published'; videoPath: string; videoId: string }
  | { kind: 'playlist_attach'; videoId: string; playlistId: string }
  | { kind: 'done'; videoId: string; playlist: PlaylistOutcome }
  | { kind: 'skipped'; stage: 'render' | 'publish'; reason: string };

// ── Events ────────────────────────────────────────────────────────────────────

export type ItemEvent =
  | { type: 'begin'; imagePath: string }
  | { type: 'render_succeeded'; videoPath: string }
  | { type: 'render_failed'; reason: string }
  | { type: 'metadata_built'; metadata: VideoMetadata }
  | { type: 'publish_succeeded'; videoId: string }
  | { type: 'publish_failed'; reason: string }
  | { type: 'recorded' }
  | { type: 'playlist_attached' }
  | { type: 'playlist_failed'; reason: string };

// ── Effects ───────────────────────────────────────────────────────────────────

export type ItemEffect =
  | { kind: 'render'; imagePath: string }
  | { kind: 'build_metadata'; videoPath: string }
  | { kind: 'publish'; videoPath: string; metadata: VideoMetadata }
  | { kind: 'record'; videoId: string }
  | { kind: 'attach_playlist'; videoId: string; playlistId: string };

export interface Transition {
  state: ItemState;
  effect: ItemEffect | null;
}

export interface TransitionOptions {
  /** Empty string means no playlist is configured */
  playlistId: string;
}

// ── Transition ────────────────────────────────────────────────────────────────

export const INITIAL_STATE: ItemState = { kind: 'pending' };

export function isTerminal(state: ItemState): boolean {
  return state.kind === 'done' || state.kind === 'skipped';
}

function invalid(state: ItemState, event: ItemEvent): never {
  throw new Error(`Invalid event "${event.type}" in state "${state.kind}"`);
}

export function transition(state: ItemState, event: ItemEvent, opts: TransitionOptions): Transition {
  switch (state.kind) {
    case 'pending':
      if (event.type !== 'begin') return invalid(state, event);
      return {
        state:  { kind: 'rendering', imagePath: event.imagePath },
        effect: { kind: 'render', imagePath: event.imagePath },
      };

    case 'rendering':
      if (event.type === 'render_succeeded') {
        return {
          state:  { kind: 'rendered', videoPath: event.videoPath },
          effect: { kind: 'build_metadata', videoPath: event.videoPath },
        };
      }
      if (event.type === 'render_failed') {
        return { state: { kind: 'skipped', stage: 'render', reason: event.reason }, effect: null };
      }
      return invalid(state, event);

    case 'rendered':
      if (event.type !== 'metadata_built') return invalid(state, event);
      return {
        state:  { kind: 'publishing', videoPath: state.videoPath, metadata: event.metadata },
        effect: { kind: 'publish', videoPath: state.videoPath, metadata: event.metadata },
      };

    case 'publishing':
      if (event.type === 'publish_succeeded') {
        return {
          state:  { kind: 'published', videoPath: state.videoPath, videoId: event.videoId },
          effect: { kind: 'record', videoId: event.videoId },
        };
      }
      if (event.type === 'publish_failed') {
        return { state: { kind: 'skipped', stage: 'publish', reason: event.reason }, effect: null };
      }
      return invalid(state, event);

    case 'published':
      if (event.type !== 'recorded') return invalid(state, event);
      if (!opts.playlistId) {
        return { state: { kind: 'done', videoId: state.videoId, playlist: 'not_configured' }, effect: null };
      }
      return {
        state:  { kind: 'playlist_attach', videoId: state.videoId, playlistId: opts.playlistId },
        effect: { kind: 'attach_playlist', videoId: state.videoId, playlistId: opts.playlistId },
      };

    case 'playlist_attach':
      if (event.type === 'playlist_attached') {
        return { state: { kind: 'done', videoId: state.videoId, playlist: 'attached' }, effect: null };
      }
      if (event.type === 'playlist_failed') {
        return { state: { kind: 'done', videoId: state.videoId, playlist: 'failed' }, effect: null };
      }
      return invalid(state, event);

    case 'done':
    case 'skipped':
      return invalid(state, event);
  }
}
