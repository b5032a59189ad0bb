#!/usr/bin/env node
/**
 * podqueue CLI — operate the scheduling queue from the command line
 */

import dotenv from 'dotenv';
import { Command } from 'commander';
import { join } from 'path';
import { addSeconds } from 'date-fns';
import { loadConfig } from './config.js';
import { ALL_DAYS, isPlatform, type Platform, type SchedulingFailure } from './core/types.js';
import { openDatabase, schedulerDbPath } from './core/storage/database.js';
import { DAY_NAMES, dayLabel } from './core/storage/time-slot-store.js';
import type { StoredToken } from './core/storage/token-store.js';
import { createLogger } from './services/logger.js';
import { createScheduler, type Scheduler } from './services/scheduler/index.js';

dotenv.config();

const program = new Command();

program
  .name('podqueue')
  .description('Multi-platform post scheduling queue')
  .version('0.1.0');

async function withScheduler(task: (scheduler: Scheduler) => Promise<void> | void): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(join(config.dataDir, 'logs'), { level: config.logLevel, quiet: true });
  const db = openDatabase(schedulerDbPath(config.dataDir));
  try {
    const scheduler = createScheduler({
      db,
      logger,
      tokenSecret: config.tokenSecret,
      linkedin: config.linkedin,
    });
    await task(scheduler);
  } finally {
    db.close();
  }
}

function requirePlatform(raw: string): Platform {
  const value = raw.trim().toLowerCase();
  if (!isPlatform(value)) {
    throw new Error(`Unknown platform "${raw}". Use linkedin or threads`);
  }
  return value;
}

/** "all", 0-6 (Monday = 0) or a day name such as "mon" / "Tuesday". */
function parseDay(raw: string): number {
  const value = raw.trim().toLowerCase();
  if (value === 'all' || value === 'every' || value === 'daily') return ALL_DAYS;
  if (/^-?\d+$/.test(value)) return Number(value);
  const index = DAY_NAMES.findIndex(name => value.length >= 3 && name.toLowerCase().startsWith(value));
  if (index < 0) throw new Error(`Unknown day "${raw}"`);
  return index;
}

function reportFailure(failure: SchedulingFailure): void {
  console.error(`❌ ${failure.message} (${failure.code})`);
  process.exitCode = 1;
}

// ─── Time slots ───────────────────────────────────────────────

const slots = program.command('slots').description('Manage posting time slots');

slots
  .command('list')
  .description('List configured time slots')
  .action(() => withScheduler((scheduler) => {
    const all = scheduler.service.listSlots();
    if (all.length === 0) {
      console.log('No time slots configured. Add one with: podqueue slots add <day> <HH:MM>');
      return;
    }
    for (const slot of all) {
      console.log(`  ${slot.id}  ${dayLabel(slot.dayOfWeek).padEnd(10)} ${slot.timeOfDay}${slot.enabled ? '' : '  (disabled)'}`);
    }
  }));

slots
  .command('add <day> <time>')
  .description('Add a slot; day is "all", 0-6 (Monday = 0) or a day name')
  .option('--disabled', 'Create the slot disabled')
  .action((day: string, time: string, opts: { disabled?: boolean }) => withScheduler(async (scheduler) => {
    const result = await scheduler.service.addSlot({ dayOfWeek: parseDay(day), timeOfDay: time, enabled: !opts.disabled });
    if (!result.ok) return reportFailure(result);
    console.log(`✅ Added ${result.value.slot.id} (${dayLabel(result.value.slot.dayOfWeek)} ${result.value.slot.timeOfDay})`);
  }));

slots
  .command('toggle <id>')
  .description('Enable or disable a slot')
  .action((id: string) => withScheduler(async (scheduler) => {
    const result = await scheduler.service.toggleSlot(id);
    if (!result.ok) return reportFailure(result);
    console.log(`✅ ${id} is now ${result.value.slot.enabled ? 'enabled' : 'disabled'}`);
  }));

slots
  .command('remove <id>')
  .description('Delete a slot')
  .action((id: string) => withScheduler(async (scheduler) => {
    const result = await scheduler.service.deleteSlot(id);
    if (!result.ok) return reportFailure(result);
    console.log(`✅ Removed ${id}`);
  }));

// ─── Daily limits ─────────────────────────────────────────────

const limits = program.command('limits').description('Per-platform daily post caps');

limits
  .command('show')
  .description('Show daily limits (0 = unlimited)')
  .action(() => withScheduler((scheduler) => {
    for (const [platform, max] of Object.entries(scheduler.service.getLimits())) {
      console.log(`  ${platform.padEnd(10)} ${max === 0 ? 'unlimited' : `${max}/day`}`);
    }
  }));

limits
  .command('set <platform> <max>')
  .description('Set a daily limit; 0 removes the cap')
  .action((platform: string, max: string) => withScheduler(async (scheduler) => {
    const result = await scheduler.service.setLimit(requirePlatform(platform), Number(max));
    if (!result.ok) return reportFailure(result);
    console.log(`✅ ${result.value.platform} limit set to ${result.value.maxPerDay}; ${result.value.redistributed} post(s) rescheduled`);
  }));

// ─── Queue ────────────────────────────────────────────────────

program
  .command('next-slot <platform>')
  .description('Show the next free slot for a platform')
  .action((platform: string) => withScheduler((scheduler) => {
    const result = scheduler.service.nextSlotPreview(requirePlatform(platform));
    if (!result.ok) return reportFailure(result);
    console.log(result.value);
  }));

program
  .command('queue')
  .description('List scheduled posts')
  .option('-s, --status <status>', 'pending, posted, failed or cancelled', 'pending')
  .option('-p, --platform <platform>', 'Only one platform')
  .action((opts: { status: string; platform?: string }) => withScheduler((scheduler) => {
    const status = (['pending', 'posted', 'failed', 'cancelled'] as const).find(s => s === opts.status);
    if (!status) throw new Error(`Unknown status "${opts.status}"`);
    const rows = scheduler.service.list({
      status,
      platform: opts.platform ? requirePlatform(opts.platform) : undefined,
    });
    if (rows.length === 0) {
      console.log(`No ${status} posts.`);
      return;
    }
    for (const post of rows) {
      const when = post.parked ? 'parked' : post.scheduledFor;
      const suffix = post.errorMessage ? `  ${post.errorMessage}` : post.publishResult?.postUrl ? `  ${post.publishResult.postUrl}` : '';
      console.log(`  ${post.id}  ${post.platform.padEnd(9)} ${when}  ${post.content.kind}${suffix}`);
    }
  }));

program
  .command('redistribute [platform]')
  .description('Re-pack pending posts into the earliest free slots')
  .action((platform: string | undefined) => withScheduler(async (scheduler) => {
    if (platform) {
      const count = await scheduler.service.redistribute(requirePlatform(platform));
      console.log(`✅ ${count} post(s) rescheduled`);
      return;
    }
    const counts = await scheduler.service.redistributeAll();
    console.log(`✅ Rescheduled ${Object.entries(counts).map(([p, n]) => `${p}: ${n}`).join(', ')}`);
  }));

program
  .command('tick')
  .description('Publish every due post once, then exit')
  .action(() => withScheduler(async (scheduler) => {
    const summary = await scheduler.worker.tick();
    console.log(`Due ${summary.due}: ${summary.posted} posted, ${summary.failed} failed, ${summary.skipped} skipped`);
    if (summary.failed > 0) process.exitCode = 1;
  }));

// ─── Platform connections ─────────────────────────────────────

program
  .command('connect <platform>')
  .description('Store an OAuth token for a platform (encrypted at rest)')
  .requiredOption('-a, --access-token <token>', 'Access token')
  .option('-r, --refresh-token <token>', 'Refresh token')
  .option('-e, --expires-in <seconds>', 'Seconds until the access token expires')
  .option('--account-id <id>', 'LinkedIn person URN or Threads user id')
  .action((platform: string, opts: { accessToken: string; refreshToken?: string; expiresIn?: string; accountId?: string }) =>
    withScheduler((scheduler) => {
      const target = requirePlatform(platform);
      const token: StoredToken = { accessToken: opts.accessToken };
      if (opts.refreshToken) token.refreshToken = opts.refreshToken;
      if (opts.accountId) token.accountId = opts.accountId;
      if (opts.expiresIn) {
        const seconds = Number.parseInt(opts.expiresIn, 10);
        if (!Number.isFinite(seconds) || seconds <= 0) throw new Error('--expires-in must be a positive number of seconds');
        token.expiresAt = addSeconds(new Date(), seconds).toISOString();
      }
      scheduler.tokens.save(target, token);
      const status = scheduler.credentials.status(target);
      console.log(`✅ ${target} connected${status.expiresAt ? ` (expires ${status.expiresAt})` : ''}`);
      if (!status.connected) console.warn('⚠️  Token stored but the platform still reports it unusable; check --account-id');
    }));

program
  .command('disconnect <platform>')
  .description('Remove the stored token for a platform')
  .action((platform: string) => withScheduler((scheduler) => {
    const target = requirePlatform(platform);
    console.log(scheduler.tokens.delete(target) ? `✅ ${target} disconnected` : `${target} was not connected`);
  }));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
