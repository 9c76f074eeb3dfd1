#!/usr/bin/env tsx
/**
 * Pre-flight check for tapecast.
 * Validates the environment, the config file, the work directories, the OAuth
 * files, and the ffmpeg/ffprobe binaries before a real run.
 * Run: npm run check-env [-- path/to/config.json]
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { listFilesByExtension } from '../src/utils/fs.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail = '') =>
  console.log(`  ${YELLOW}○${RESET} ${label}${detail ? `  ${detail}` : ''}`);

let anyRequiredFailed = false;

function failRequired(label: string, hint: string): void {
  fail(label, hint);
  anyRequiredFailed = true;
}

function finish(): never {
  console.log('');
  if (anyRequiredFailed) {
    console.error(`${RED}${BOLD}Pre-flight failed.${RESET} Fix the items marked ✗ above.\n`);
    process.exit(1);
  }
  console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
  process.exit(0);
}

const configArg = process.argv[2] ?? 'config.json';

console.log(`\n${BOLD}=== tapecast — Pre-flight Check ===${RESET}\n`);

// ── Section: Environment ──────────────────────────────────────────────────────

console.log(`${BOLD}[ 1 ] Environment${RESET}`);

// The env schema is enforced when the config module loads
let configModule: typeof import('../src/config.js');
try {
  configModule = await import('../src/config.js');
} catch (err) {
  failRequired('environment variables', err instanceof Error ? err.message : String(err));
  finish();
}

const { env, loadConfig, IMAGE_EXTENSIONS, AUDIO_EXTENSION } = configModule;
pass('LOG_LEVEL', env.LOG_LEVEL);
pass('LOG_FORMAT', env.LOG_FORMAT);
note('FFMPEG_PATH', env.FFMPEG_PATH);
note('FFPROBE_PATH', env.FFPROBE_PATH);

// ── Section: Config file ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Config file${RESET}`);

if (!existsSync(configArg)) note(configArg, '(not found — defaults apply)');

let config: ReturnType<typeof loadConfig>;
try {
  config = loadConfig(configArg);
  pass('config parsed', config.configPath);
} catch (err) {
  failRequired('config file', err instanceof Error ? err.message : String(err));
  finish();
}

pass('privacy_status', config.privacyStatus);
note('playlist_id', config.playlistId || '(none — playlist attach disabled)');
note('waveform overlay', config.waveform.enabled ? config.waveform.mode : 'off');

// ── Section: Directories ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Directories${RESET}`);

function checkDir(label: string, dirPath: string, extensions: readonly string[]): void {
  if (!existsSync(dirPath)) {
    failRequired(label, `Create: mkdir -p "${dirPath}"`);
    return;
  }
  const count = listFilesByExtension(dirPath, extensions).length;
  pass(label, `${dirPath} (${count} ${extensions.join('/')} file(s))`);
}

checkDir('audio_dir',  config.audioDir,  [AUDIO_EXTENSION]);
checkDir('images_dir', config.imagesDir, IMAGE_EXTENSIONS);
if (existsSync(config.imagesDir) && listFilesByExtension(config.imagesDir, IMAGE_EXTENSIONS).length === 0) {
  failRequired('image pool', `Add at least one .jpg/.jpeg to ${config.imagesDir}`);
}
if (existsSync(config.outDir)) pass('out_dir', config.outDir);
else note('out_dir', `${config.outDir} (created on first run)`);

// ── Section: YouTube credentials ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] YouTube credentials${RESET}`);

if (existsSync(config.clientSecretsPath)) {
  pass('client secrets', config.clientSecretsPath);
} else {
  failRequired('client secrets', `Download an OAuth client JSON from Google Cloud console to ${config.clientSecretsPath}`);
}

if (existsSync(config.tokenPath)) pass('token file', config.tokenPath);
else note('token file', '(missing — the first run prints a consent URL)');

// ── Section: Binaries ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Binaries${RESET}`);

function checkBinary(label: string, binary: string): void {
  const result = spawnSync(binary, ['-version'], { encoding: 'utf-8' });
  if (result.error || result.status !== 0) {
    failRequired(label, `Install ffmpeg or set ${label.toUpperCase()}_PATH (tried "${binary}")`);
    return;
  }
  pass(label, result.stdout.split('\n')[0] ?? '');
}

checkBinary('ffmpeg',  env.FFMPEG_PATH);
checkBinary('ffprobe', env.FFPROBE_PATH);

finish();
