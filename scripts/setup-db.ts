#!/usr/bin/env tsx
/**
 * Database setup for voiceguard.
 *
 * sqlite:   opens DATABASE_PATH, which creates tables and triggers.
 * supabase: runs migrations/*.sql in order through the exec_sql RPC,
 *           tracking applied files in a `_migrations` table.
 *
 * Run: npm run setup-db
 */
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { env } from '../src/config.js';
import { SqliteProfileStore } from '../src/db/sqlite.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const projectRoot   = join(dirname(fileURLToPath(import.meta.url)), '..');
const migrationsDir = join(projectRoot, 'migrations');

const MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS _migrations (
    id         SERIAL PRIMARY KEY,
    name       TEXT NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

const AppliedRowSchema = z.object({ name: z.string() });

// ── SQLite ────────────────────────────────────────────────────────────────────

async function setupSqlite(): Promise<void> {
  const store = new SqliteProfileStore({ path: env.DATABASE_PATH });
  const tables = store.db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all();
  await store.close();
  console.log(`  ${GREEN}✓${RESET} ${env.DATABASE_PATH}`);
  for (const t of tables) console.log(`    ${CYAN}${String(t)}${RESET}`);
}

// ── Supabase ──────────────────────────────────────────────────────────────────

async function executeSql(sb: SupabaseClient, sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

async function getAppliedMigrations(sb: SupabaseClient): Promise<Set<string>> {
  const { data, error } = await sb.from('_migrations').select('name');
  if (error) {
    if (error.message.includes('does not exist')) return new Set<string>();
    throw new Error(`Could not query _migrations: ${error.message}`);
  }
  return new Set(z.array(AppliedRowSchema).parse(data ?? []).map(r => r.name));
}

async function setupSupabase(url: string, key: string): Promise<number> {
  const sb = createClient(url, key);

  if (!existsSync(migrationsDir)) {
    console.error(`${RED}migrations/ directory not found at ${migrationsDir}${RESET}`);
    return 1;
  }
  const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();
  console.log(`Found ${files.length} migration file(s)\n`);

  try {
    await executeSql(sb, MIGRATIONS_TABLE_SQL);
  } catch (err) {
    console.warn(`${YELLOW}  Could not create _migrations via exec_sql: ${err instanceof Error ? err.message : String(err)}`);
    console.warn(`  Tip: apply migrations/ with the Supabase CLI instead:  supabase db push${RESET}`);
    return 1;
  }

  const applied = await getAppliedMigrations(sb);
  let failed = 0;

  for (const file of files) {
    process.stdout.write(`  ${file.replace('.sql', '')}… `);
    if (applied.has(file)) {
      console.log(`${YELLOW}skipped${RESET}  (already applied)`);
      continue;
    }
    try {
      await executeSql(sb, readFileSync(join(migrationsDir, file), 'utf-8'));
      const { error } = await sb.from('_migrations').insert({ name: file });
      if (error) console.warn(`\n    ${YELLOW}could not record ${file}: ${error.message}${RESET}`);
      console.log(`${GREEN}✓ applied${RESET}`);
    } catch (err) {
      console.error(`${RED}✗ FAILED${RESET}`);
      console.error(`    Error: ${err instanceof Error ? err.message : String(err)}`);
      failed++;
    }
  }
  return failed;
}

// ── Main ──────────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== voiceguard: Database Setup (${env.STORE_BACKEND}) ===${RESET}\n`);

if (env.STORE_BACKEND === 'supabase') {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
    console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set. Run: npm run check-env${RESET}`);
    process.exit(1);
  }
  const failed = await setupSupabase(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY);
  if (failed > 0) {
    console.error(`\n${RED}${BOLD}Setup had failures. Fix errors above, then re-run.${RESET}\n`);
    process.exit(1);
  }
} else {
  await setupSqlite();
}

console.log(`\n${GREEN}${BOLD}Database ready.${RESET}\n`);
