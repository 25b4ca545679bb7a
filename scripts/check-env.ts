#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for voiceguard.
 * Checks env vars, the selected storage backend and optional Telegram alerts.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0  all required checks pass
 *   1  one or more required checks failed
 */
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

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

const skip = (label: string, note: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${note})`);

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value || defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

const get = (key: string): string | undefined => process.env[key];

// ── Section: Configuration schema ─────────────────────────────────────────────

console.log(`\n${BOLD}=== voiceguard: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration schema${RESET}`);

try {
  await import('../src/config.js');
  pass('Environment parses');
} catch (err) {
  fail('Environment parses', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: AI services ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] AI services${RESET}`);

const provider = get('ANALYSIS_PROVIDER') || 'ai';
if (provider === 'none') {
  skip('AI analysis', 'ANALYSIS_PROVIDER=none, signal-only scoring');
} else {
  const openai = get('OPENAI_API_KEY');
  const anthropic = get('ANTHROPIC_API_KEY');
  if (anthropic) pass('ANTHROPIC_API_KEY', 'Claude primary');
  else skip('ANTHROPIC_API_KEY', 'not set, comparisons run on GPT-4o');
  if (openai) pass('OPENAI_API_KEY', 'Whisper transcription, GPT-4o fallback');
  else skip('OPENAI_API_KEY', 'not set, transcription degrades to an empty transcript and there is no fallback');
  if (!openai && !anthropic) skip('AI analysis', 'no API keys, signal-only scoring');
}

// ── Section: Decision thresholds ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Decision thresholds${RESET}`);

checkOptional('SIMILARITY_THRESHOLD',    get('SIMILARITY_THRESHOLD'),    '0.8');
checkOptional('MIN_CONFIDENCE_SCORE',    get('MIN_CONFIDENCE_SCORE'),    '0.7');
checkOptional('MIN_SAMPLE_COUNT',        get('MIN_SAMPLE_COUNT'),        '3');
checkOptional('MIN_SAMPLE_DURATION_SEC', get('MIN_SAMPLE_DURATION_SEC'), '3');
checkOptional('MIN_RMS_ENERGY',          get('MIN_RMS_ENERGY'),          '0.01');
checkOptional('AI_WEIGHT',               get('AI_WEIGHT'),               '0.4');
checkOptional('SCORE_AGGREGATION',       get('SCORE_AGGREGATION'),       'max');
checkOptional('ANALYSIS_TIMEOUT_MS',     get('ANALYSIS_TIMEOUT_MS'),     '15000');
checkOptional('LOG_LEVEL',               get('LOG_LEVEL'),               'info');

// ── Section: Storage ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Storage${RESET}`);

const backend = get('STORE_BACKEND') || 'sqlite';
if (backend === 'supabase') {
  const url = get('SUPABASE_URL');
  const key = get('SUPABASE_SERVICE_KEY');
  checkRequired('SUPABASE_URL', url, 'Get from Supabase project settings → API');
  checkRequired('SUPABASE_SERVICE_KEY', key, 'Get from Supabase project settings → API → service_role key');
  if (url && key) {
    process.stdout.write('  Testing Supabase connection… ');
    const { error } = await createClient(url, key).from('users').select('user_id').limit(1);
    if (error) {
      console.log(`${RED}✗${RESET}`);
      fail('Supabase query on users', error.message.includes('does not exist')
        ? 'Tables missing. Run: npm run setup-db'
        : error.message);
      anyRequiredFailed = true;
    } else {
      console.log(`${GREEN}✓${RESET}  connected`);
    }
  }
} else {
  pass('SQLite backend', get('DATABASE_PATH') || 'data/voice_profiles.db');
}

// ── Section: Telegram ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Telegram alerts${RESET}`);

if (get('TELEGRAM_BOT_TOKEN') && get('TELEGRAM_CHAT_ID')) {
  pass('Telegram configured');
} else {
  skip('Telegram', 'not configured, alerts are logged only');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight failed. Fix the items above.${RESET}\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
