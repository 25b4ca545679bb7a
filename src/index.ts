#!/usr/bin/env node
/**
 * voiceguard CLI.
 *
 * Operates on feature-vector JSON files produced by an external extractor.
 * When `sample.json` has a sibling `sample.wav`, the audio is sent for
 * transcription as well.
 *
 *   voiceguard enroll alice a1.json a2.json a3.json --full-name "Alice Example"
 *   voiceguard verify alice probe.json
 *   voiceguard identify probe.json
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from '@commander-js/extra-typings';
import type { SampleSubmission } from './enrollment/service.js';
import { VoiceMatchError } from './errors.js';
import { createVoiceIdService, type VoiceIdService } from './service.js';
import { logger } from './utils/logger.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

async function loadSubmission(path: string): Promise<SampleSubmission> {
  const features: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const audioPath = path.replace(/\.json$/i, '.wav');
  if (audioPath !== path && existsSync(audioPath)) {
    return { features, audio: await readFile(audioPath) };
  }
  return { features };
}

async function withService(fn: (svc: VoiceIdService) => Promise<void>): Promise<void> {
  const svc = createVoiceIdService();
  try {
    await fn(svc);
  } finally {
    await svc.close();
  }
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

const pct = (x: number) => `${(x * 100).toFixed(1)}%`;

// ── Commands ──────────────────────────────────────────────────────────────────

const program = new Command()
  .name('voiceguard')
  .description('Voice-match enrollment and authentication')
  .version('0.1.0');

program
  .command('enroll')
  .description('Create a profile and enroll it from feature files')
  .argument('<username>')
  .argument('<features...>', 'feature-vector JSON files, one per sample')
  .option('--full-name <name>')
  .option('--email <email>')
  .option('--required <n>', 'samples required to complete enrollment', positiveInt)
  .action(async (username, files, opts) => withService(async svc => {
    const { profile, session } = await svc.enrollment.begin({
      username,
      fullName: opts.fullName,
      email: opts.email,
      requiredSamples: opts.required,
    });
    console.log(`Created profile ${profile.username} (${profile.userId})`);
    for (const file of files) {
      const progress = await svc.enrollment.submitSample(session.sessionId, await loadSubmission(file));
      console.log(`  ${file}: sample ${progress.samplesCollected}/${progress.requiredSamples} ` +
        `(quality ${progress.sample.qualityScore.toFixed(2)})`);
      if (progress.complete) {
        const consistency = progress.consistency === null ? 'n/a' : pct(progress.consistency);
        console.log(`Enrollment complete. Consistency ${consistency}`);
        return;
      }
    }
    console.log(`Enrollment incomplete; add more with: voiceguard add-sample ${username} <features>`);
  }));

program
  .command('add-sample')
  .description('Append a sample to an existing profile')
  .argument('<username>')
  .argument('<features>')
  .action(async (username, file) => withService(async svc => {
    const profile = await svc.requireProfile(username);
    const result = await svc.enrollment.addSample(profile.userId, await loadSubmission(file));
    console.log(`Stored sample #${result.sample.sampleIndex} for ${username} ` +
      `(${result.totalSamples} total, enrollment ${result.enrollmentComplete ? 'complete' : 'incomplete'})`);
  }));

program
  .command('verify')
  .description('Check a sample against one claimed profile')
  .argument('<username>')
  .argument('<features>')
  .action(async (username, file) => withService(async svc => {
    const sub = await loadSubmission(file);
    const result = await svc.authenticate({ ...sub, claimedUsername: username });
    printVerdict(result.verdict, result.attempt.similarityScore, result.attempt.fusedScore, result.attempt.commentary);
    if (result.verdict !== 'accept') process.exitCode = 2;
  }));

program
  .command('identify')
  .description('Find the enrolled speaker of a sample')
  .argument('<features>')
  .action(async file => withService(async svc => {
    const result = await svc.authenticate(await loadSubmission(file));
    printVerdict(result.verdict, result.attempt.similarityScore, result.attempt.fusedScore, result.attempt.commentary);
    for (const c of result.ranking.slice(0, 5)) {
      console.log(`  ${c.username.padEnd(20)} fused ${c.fused.toFixed(3)}  similarity ${c.similarity.toFixed(3)}` +
        `${c.aiSkipped ? '  (AI skipped)' : ''}`);
    }
    if (result.verdict !== 'accept') process.exitCode = 2;
  }));

program
  .command('users')
  .description('List profiles')
  .option('--all', 'include deactivated profiles')
  .action(async opts => withService(async svc => {
    const profiles = await svc.store.listProfiles({ activeOnly: !opts.all });
    if (profiles.length === 0) {
      console.log('No profiles.');
      return;
    }
    for (const p of profiles) {
      console.log(`${p.username.padEnd(20)} ${String(p.samples.length).padStart(3)} samples  ` +
        `${p.isActive ? 'active' : 'inactive'}  ${p.fullName}`);
    }
  }));

program
  .command('info')
  .description('Show a profile and its authentication record')
  .argument('<username>')
  .action(async username => withService(async svc => {
    const info = await svc.userInfo(username);
    console.log(`${info.profile.username} (${info.profile.userId})`);
    console.log(`  name:        ${info.profile.fullName || '-'}`);
    console.log(`  email:       ${info.profile.email || '-'}`);
    console.log(`  status:      ${info.profile.isActive ? 'active' : 'inactive'}`);
    console.log(`  samples:     ${info.sampleCount} (${info.enrollmentComplete ? 'enrolled' : 'enrollment incomplete'})`);
    console.log(`  attempts:    ${info.totalAttempts} (${info.acceptedAttempts} accepted)`);
    console.log(`  last:        ${info.lastAttemptAt ?? 'never'}`);
  }));

program
  .command('deactivate')
  .description('Soft-delete a profile')
  .argument('<username>')
  .action(async username => withService(async svc => {
    await svc.deactivateUser(username);
    console.log(`Deactivated ${username}`);
  }));

program
  .command('history')
  .description('Recent authentication attempts for a profile')
  .argument('<username>')
  .option('--limit <n>', 'maximum attempts to show', positiveInt, 20)
  .action(async (username, opts) => withService(async svc => {
    const attempts = await svc.history(username, opts.limit);
    if (attempts.length === 0) {
      console.log('No attempts.');
      return;
    }
    for (const a of attempts) {
      console.log(`${a.timestamp}  ${a.mode.padEnd(14)} ${a.verdict.padEnd(7)} fused ${a.fusedScore.toFixed(3)}` +
        `${a.aiSkipped ? '  (AI skipped)' : ''}`);
    }
  }));

program
  .command('stats')
  .description('System-wide statistics')
  .action(async () => withService(async svc => {
    const s = await svc.systemStats();
    console.log(`users:    ${s.activeUsers} active / ${s.totalUsers} total (${s.enrolledUsers} enrolled)`);
    console.log(`attempts: ${s.total} (${s.accepted} accept, ${s.rejected} reject, ${s.unknown} unknown)`);
    console.log(`success:  ${pct(s.successRate)}`);
  }));

function printVerdict(verdict: string, similarity: number, fused: number, commentary: string): void {
  console.log(`${verdict.toUpperCase()}  similarity ${similarity.toFixed(3)}  fused ${fused.toFixed(3)}`);
  if (commentary) console.log(`  ${commentary}`);
}

// ── Entrypoint ────────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof VoiceMatchError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    logger.error('Fatal error', { err });
  }
  process.exit(1);
});
