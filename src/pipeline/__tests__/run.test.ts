import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { runOnce, type RunDeps } from '../index.js';
import { AuthError, PreconditionError } from '../../utils/errors.js';
import type { PublishCapability, RenderPlan } from '../../types.js';
import { makeTempDir, removeDir, writeFileAt } from '../../__tests__/helpers.js';

describe('runOnce', () => {
  let root: string;
  let configPath: string;
  let uploads: string[];
  let publisher: PublishCapability;
  let createPublisher: RunDeps['createPublisher'];
  let deps: RunDeps;

  function writeConfig(extra: Record<string, unknown> = {}): void {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ audio_dir: 'audio', images_dir: 'images', out_dir: 'out', ...extra }),
    );
  }

  beforeEach(() => {
    root = makeTempDir();
    configPath = path.join(root, 'config.json');
    writeConfig();
    fs.writeFileSync(path.join(root, 'client_secrets.json'), JSON.stringify({
      installed: { client_id: 'test-client', client_secret: 'test-secret' },
    }));
    writeFileAt(path.join(root, 'images', 'cover.jpg'), 'jpg', 1_000);
    writeFileAt(path.join(root, 'audio', 'c.mp3'), 'ccc', 3_000);
    writeFileAt(path.join(root, 'audio', 'a.mp3'), 'a', 1_000);
    writeFileAt(path.join(root, 'audio', 'b.mp3'), 'bb', 2_000);

    uploads = [];
    publisher = {
      uploadVideo: vi.fn(async (videoPath: string) => {
        uploads.push(path.basename(videoPath));
        return `vid-${uploads.length}`;
      }),
      addToPlaylist: vi.fn(async () => 'item'),
    };
    createPublisher = vi.fn(() => publisher);
    deps = {
      createPublisher,
      runEncoder:   (plan: RenderPlan) => fs.writeFileSync(plan.outputPath, 'mp4'),
      probeBitrate: () => 128_000,
      random:       () => 0,
    };
  });

  afterEach(() => removeDir(root));

  it('publishes new files oldest first and does nothing on the next run', async () => {
    const first = await runOnce({ configPath }, deps);

    expect(first.kind).toBe('completed');
    expect(uploads).toEqual(['a.mp4', 'b.mp4', 'c.mp4']);
    expect(fs.existsSync(path.join(root, 'out', 'a.mp4'))).toBe(true);

    const state = JSON.parse(fs.readFileSync(path.join(root, 'state.json'), 'utf-8'));
    expect(Object.keys(state.uploaded)).toHaveLength(3);

    const second = await runOnce({ configPath }, deps);
    expect(second).toEqual({ kind: 'nothing_to_do' });
    expect(uploads).toHaveLength(3);
  });

  it('caps the run with limit and leaves the rest for later', async () => {
    writeFileAt(path.join(root, 'audio', 'e.mp3'), 'eeeee', 5_000);
    writeFileAt(path.join(root, 'audio', 'd.mp3'), 'dddd', 4_000);

    await runOnce({ configPath, limit: 2 }, deps);
    expect(uploads).toEqual(['a.mp4', 'b.mp4']);

    await runOnce({ configPath, limit: 2 }, deps);
    expect(uploads).toEqual(['a.mp4', 'b.mp4', 'c.mp4', 'd.mp4']);
  });

  it('lists the queue on a dry run without rendering or uploading', async () => {
    const outcome = await runOnce({ configPath, dryRun: true, limit: 2 }, deps);

    expect(outcome.kind).toBe('dry_run');
    if (outcome.kind === 'dry_run') {
      expect(outcome.queue.map((f) => f.name)).toEqual(['a.mp3', 'b.mp3']);
    }
    expect(createPublisher).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(root, 'out'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'state.json'))).toBe(false);
  });

  it('republishes a file whose mtime changed', async () => {
    await runOnce({ configPath }, deps);
    writeFileAt(path.join(root, 'audio', 'b.mp3'), 'bb', 4_000);

    await runOnce({ configPath }, deps);
    expect(uploads).toEqual(['a.mp4', 'b.mp4', 'c.mp4', 'b.mp4']);
  });

  it('processes an --only file even when already published', async () => {
    await runOnce({ configPath }, deps);
    await runOnce({ configPath, only: 'a.mp3' }, deps);
    expect(uploads).toEqual(['a.mp4', 'b.mp4', 'c.mp4', 'a.mp4']);
  });

  it('fails when the --only file does not exist', async () => {
    await expect(runOnce({ configPath, only: 'missing.mp3' }, deps)).rejects.toThrow(
      `Requested MP3 not found: ${path.join(root, 'audio', 'missing.mp3')}`,
    );
  });

  it('fails before publishing when the client secrets file is missing', async () => {
    fs.rmSync(path.join(root, 'client_secrets.json'));

    await expect(runOnce({ configPath }, deps)).rejects.toBeInstanceOf(PreconditionError);
    expect(createPublisher).not.toHaveBeenCalled();
  });

  it('does not need client secrets when there is nothing to do', async () => {
    fs.rmSync(path.join(root, 'client_secrets.json'));
    fs.rmSync(path.join(root, 'audio'), { recursive: true });
    fs.mkdirSync(path.join(root, 'audio'));

    expect(await runOnce({ configPath }, deps)).toEqual({ kind: 'nothing_to_do' });
  });

  it('aborts before rendering when the stored credentials cannot be refreshed', async () => {
    fs.writeFileSync(path.join(root, 'token.json'), JSON.stringify({ refresh_token: 'test-refresh' }));
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('invalid_grant', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);
    const runEncoder = vi.fn((plan: RenderPlan) => fs.writeFileSync(plan.outputPath, 'mp4'));

    try {
      const run = runOnce({ configPath }, { runEncoder, probeBitrate: () => 128_000, random: () => 0 });

      await expect(run).rejects.toBeInstanceOf(AuthError);
      await expect(run).rejects.toThrow('Token request (refresh_token) failed: HTTP 400 — invalid_grant');
      expect(runEncoder).not.toHaveBeenCalled();
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fs.existsSync(path.join(root, 'state.json'))).toBe(false);
    } finally {
      vi.unstubAllGlobals();
    }
  });

  it('fails when the image pool is empty', async () => {
    fs.rmSync(path.join(root, 'images', 'cover.jpg'));

    await expect(runOnce({ configPath }, deps)).rejects.toThrow(
      `No .jpg/.jpeg files found in images dir ${path.join(root, 'images')}`,
    );
    expect(uploads).toEqual([]);
  });

  it('keeps an upload recorded when the playlist attach fails', async () => {
    writeConfig({ playlist_id: 'PL1' });
    vi.mocked(publisher.addToPlaylist).mockRejectedValue(new Error('playlistNotFound'));

    const outcome = await runOnce({ configPath, limit: 1 }, deps);
    expect(outcome.kind === 'completed' && outcome.summary.playlistFailures).toBe(1);

    const next = await runOnce({ configPath, dryRun: true }, deps);
    expect(next.kind === 'dry_run' && next.queue.map((f) => f.name)).toEqual(['b.mp3', 'c.mp3']);
  });

  it('resolves CLI directory overrides against the working directory', async () => {
    const elsewhere = path.join(root, 'elsewhere');
    writeFileAt(path.join(elsewhere, 'z.mp3'), 'z', 500);

    const outcome = await runOnce(
      { configPath, audioDir: path.relative(process.cwd(), elsewhere), dryRun: true },
      deps,
    );
    expect(outcome.kind === 'dry_run' && outcome.queue.map((f) => f.path)).toEqual([path.join(elsewhere, 'z.mp3')]);
  });
});
