/**
 * Builds the ffmpeg invocation that turns one recording plus one background
 * image into a video. Pure: nothing is spawned here.
 *
 * Plain mode loops the image at 1 fps for the length of the audio. Overlay
 * mode scales the image to the frame size and centres an audio-driven
 * visual (showwaves or showspectrum) on top of it.
 */
import * as path from 'node:path';
import { VIDEO_EXTENSION, WAVEFORM_SPECTRUM_MODES, type WaveformConfig } from '../config.js';
import type { RenderPlan, SourceFile } from '../types.js';

export interface RenderRequest {
  source: Pick<SourceFile, 'path' | 'stem'>;
  imagePath: string;
  outDir: string;
  /** WIDTHxHEIGHT */
  videoSize: string;
  waveform: WaveformConfig;
}

const AUDIO_ARGS = ['-c:a', 'aac', '-b:a', '192k'];

export function outputPathFor(outDir: string, stem: string): string {
  return path.join(outDir, stem + VIDEO_EXTENSION);
}

export function isSpectrumMode(mode: WaveformConfig['mode']): boolean {
  return WAVEFORM_SPECTRUM_MODES.some((m) => m === mode);
}

/** The `-filter_complex` graph for overlay mode. */
export function buildOverlayFilter(videoSize: string, waveform: WaveformConfig): string {
  const [width = ''] = videoSize.split('x');
  const visualSize = `${width}x${waveform.height}`;

  const visual = isSpectrumMode(waveform.mode)
    ? `showspectrum=s=${visualSize}:color=${waveform.color}:slide=${waveform.spectrum_slide}` +
      `:mode=${waveform.spectrum_mode}:scale=${waveform.spectrum_scale}`
    : `showwaves=s=${visualSize}:mode=${waveform.mode}:colors=${waveform.color}`;

  return (
    `[0:v]scale=${videoSize},format=yuv420p[bg];` +
    `[1:a]${visual}[sw];` +
    `[bg][sw]overlay=(W-w)/2:(H-h)/2`
  );
}

export function buildRenderPlan(req: RenderRequest): RenderPlan {
  const outputPath = outputPathFor(req.outDir, req.source.stem);
  const inputs = ['-i', req.imagePath, '-i', req.source.path];

  if (!req.waveform.enabled) {
    return {
      outputPath,
      args: [
        '-y', '-loop', '1', '-framerate', '1',
        ...inputs,
        '-c:v', 'libx264', '-tune', 'stillimage',
        ...AUDIO_ARGS,
        '-shortest', '-pix_fmt', 'yuv420p',
        outputPath,
      ],
    };
  }

  const fps = String(req.waveform.fps);
  return {
    outputPath,
    args: [
      '-y', '-loop', '1', '-framerate', fps,
      ...inputs,
      '-filter_complex', buildOverlayFilter(req.videoSize, req.waveform),
      '-c:v', 'libx264', '-tune', 'stillimage', '-r', fps,
      ...AUDIO_ARGS,
      '-shortest',
      outputPath,
    ],
  };
}
