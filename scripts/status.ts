#!/usr/bin/env tsx
/**
 * Status summary for tapecast: published count, most recent uploads, and how
 * many recordings in audio_dir are still waiting to be published.
 * Run: npm run status [-- path/to/config.json]
 */
import { existsSync } from 'node:fs';
import { loadConfig } from '../src/config.js';
import { StateStore } from '../src/db/state.js';
import { findSourceFiles } from '../src/pipeline/scanner.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function green(s: string)  { return `${GREEN}${s}${RESET}`; }
function yellow(s: string) { return `${YELLOW}${s}${RESET}`; }
function cyan(s: string)   { return `${CYAN}${s}${RESET}`; }
function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

const RECENT_LIMIT = 10;

// ── Helpers ───────────────────────────────────────────────────────────────────

function timeAgo(epochSeconds: number): string {
  const diff    = Date.now() - epochSeconds * 1000;
  const minutes = Math.floor(diff / 60_000);
  const hours   = Math.floor(diff / 3_600_000);
  const days    = Math.floor(diff / 86_400_000);
  if (days > 0)    return `${days}d ago`;
  if (hours > 0)   return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

// ── Main ──────────────────────────────────────────────────────────────────────

const config = loadConfig(process.argv[2] ?? 'config.json');
const state  = StateStore.load(config.statePath);

console.log(`\n${bold('=== tapecast — Status ===')}  ${dim(new Date().toLocaleString())}\n`);
console.log(`  State file   ${config.statePath}${existsSync(config.statePath) ? '' : dim('  (not created yet)')}`);
console.log(`  Published    ${green(String(state.size))}`);

if (existsSync(config.audioDir)) {
  const files   = findSourceFiles(config.audioDir);
  const pending = files.filter((f) => !state.isUnchanged(f));
  const label   = pending.length > 0 ? yellow(String(pending.length)) : green('0');
  console.log(`  Pending      ${label} of ${files.length} in ${config.audioDir}`);
  for (const file of pending.slice(0, RECENT_LIMIT)) console.log(`    ${dim('-')} ${file.name}`);
} else {
  console.log(`  Pending      ${yellow('audio_dir not found')}  ${config.audioDir}`);
}

const recent = state
  .entries()
  .sort(([, a], [, b]) => b.uploaded_at - a.uploaded_at)
  .slice(0, RECENT_LIMIT);

if (recent.length > 0) {
  console.log(`\n${bold('Recent uploads')}`);
  for (const [sourcePath, record] of recent) {
    console.log(`  ${cyan(`https://youtu.be/${record.video_id}`)}  ${dim(timeAgo(record.uploaded_at))}  ${sourcePath}`);
  }
}
console.log('');
