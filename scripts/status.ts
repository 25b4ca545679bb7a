#!/usr/bin/env tsx
/**
 * Operational status for voiceguard: backend, thresholds, users, verdict
 * counts and the most recent attempt per active profile.
 * Run: npm run status
 */
import { env, VOICE_MATCH } from '../src/config.js';
import { createVoiceIdService } from '../src/service.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

function timeAgo(dateStr: string): string {
  const diff = Date.now() - new Date(dateStr).getTime();
  const minutes = Math.floor(diff / 60_000);
  const hours   = Math.floor(diff / 3_600_000);
  const days    = Math.floor(diff / 86_400_000);
  if (days > 0)    return `${days}d ago`;
  if (hours > 0)   return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

function rateColor(rate: number): string {
  const color = rate >= 0.8 ? GREEN : rate >= 0.5 ? YELLOW : RED;
  return `${color}${(rate * 100).toFixed(1)}%${RESET}`;
}

// ── Main ──────────────────────────────────────────────────────────────────────

const svc = createVoiceIdService();

try {
  console.log(`\n${bold('=== voiceguard: Status ===')}\n`);

  console.log(bold('Configuration'));
  console.log(`  backend      ${env.STORE_BACKEND}${env.STORE_BACKEND === 'sqlite' ? dim(`  ${env.DATABASE_PATH}`) : ''}`);
  console.log(`  analysis     ${env.ANALYSIS_PROVIDER}`);
  console.log(`  thresholds   similarity ≥ ${VOICE_MATCH.similarityThreshold}, fused ≥ ${VOICE_MATCH.minConfidenceScore}`);
  console.log(`  fusion       ${VOICE_MATCH.similarityWeight} × similarity + ${VOICE_MATCH.aiWeight} × AI (${VOICE_MATCH.aggregation})`);

  const stats = await svc.systemStats();
  console.log(`\n${bold('Users')}`);
  console.log(`  ${stats.activeUsers} active / ${stats.totalUsers} total, ${stats.enrolledUsers} fully enrolled`);

  console.log(`\n${bold('Attempts')}`);
  console.log(`  ${stats.total} total: ${stats.accepted} accept, ${stats.rejected} reject, ${stats.unknown} unknown`);
  console.log(`  success rate ${rateColor(stats.successRate)}`);

  const profiles = await svc.store.listProfiles({ activeOnly: true });
  if (profiles.length > 0) {
    console.log(`\n${bold('Last attempt per profile')}`);
    for (const p of profiles) {
      const [last] = await svc.history(p.username, 1);
      const when = last ? `${last.verdict.padEnd(7)} ${timeAgo(last.timestamp)}` : dim('never');
      console.log(`  ${p.username.padEnd(20)} ${when}`);
    }
  }
  console.log('');
} finally {
  await svc.close();
}
