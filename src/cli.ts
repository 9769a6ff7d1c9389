#!/usr/bin/env node

/**
 * RTM mirror CLI
 *
 * Pull a remote RTM project into the local mirror and push local edits back
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import inquirer from 'inquirer';
import path from 'path';
import { config as loadEnv } from 'dotenv';
import { ConfigError, RtmConfig, loadConfig } from './lib/config';
import { ConflictResolver } from './lib/conflict-resolver';
import { errorMessage } from './lib/errors';
import { FieldMapper } from './lib/field-mapper';
import { createLogger } from './lib/logger';
import { RecordStore } from './lib/record-store';
import { RtmClient } from './lib/rtm-client';
import { SyncEngine } from './lib/sync-engine';
import { ConflictPolicy, ISSUE_KINDS, IssueKind, ProjectRecord, SyncReport, isIssueKind } from './lib/types';

// Load environment variables from the working directory
loadEnv({ path: path.join(process.cwd(), '.env.local') });
loadEnv({ path: path.join(process.cwd(), '.env') });

interface PullCommandOptions {
  structureOnly?: boolean;
  kind?: string[];
  onConflict: string;
}

interface Session {
  store: RecordStore;
  engine: SyncEngine;
  project: ProjectRecord;
}

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

/**
 * Accepts `TEST_CASE`, `test-case` or `test_case`
 */
function parseKind(value: string): IssueKind | null {
  const normalized = value.trim().toUpperCase().replace(/-/g, '_');
  return isIssueKind(normalized) ? normalized : null;
}

function parseKinds(values: string[] | undefined): IssueKind[] {
  if (!values || values.length === 0) {
    return [...ISSUE_KINDS];
  }
  const kinds: IssueKind[] = [];
  for (const value of values) {
    const kind = parseKind(value);
    if (!kind) {
      console.error(chalk.red(`Error: Unknown issue kind "${value}"`));
      console.error(chalk.gray(`Expected one of: ${ISSUE_KINDS.join(', ')}`));
      process.exit(1);
    }
    kinds.push(kind);
  }
  return kinds;
}

/**
 * Load config, open the mirror and wire the engine
 */
function openSession(): Session {
  let config: RtmConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.error(chalk.gray('Set the RTM_* variables in the environment, .env.local or .env'));
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger(config.logLevel);
  const store = new RecordStore(config.dbPath);
  const client = new RtmClient({
    baseUrl: config.baseUrl,
    username: config.username,
    token: config.token,
    projectId: config.projectId,
    retry: config.retry,
    logger,
  });
  const engine = new SyncEngine(client, store, new FieldMapper(), logger);
  const project = store.ensureProject(config.projectKey, config.projectId);

  return { store, engine, project };
}

/**
 * Abort the running pass on Ctrl-C instead of killing the process mid-write
 */
function cancelOnInterrupt(spinner: Ora): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    spinner.text = 'Cancelling after the current item...';
    controller.abort();
  });
  return controller;
}

function fail(spinner: Ora, title: string, error: unknown): void {
  spinner.fail(title);
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exitCode = 1;
}

/**
 * Print run report summary
 */
function printReport(title: string, report: SyncReport, tombstoneLabel = 'Tombstoned'): void {
  console.log(chalk.bold(`\n${RULE}`));
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold(`${RULE}\n`));

  if (report.cancelled) {
    console.log(chalk.yellow('⚠ Cancelled before completion'));
  }
  if (report.created > 0) {
    console.log(chalk.green(`✓ Created: ${report.created}`));
  }
  if (report.updated > 0) {
    console.log(chalk.blue(`✓ Updated: ${report.updated}`));
  }
  if (report.tombstoned > 0) {
    console.log(chalk.magenta(`✗ ${tombstoneLabel}: ${report.tombstoned}`));
  }
  if (report.unchanged > 0) {
    console.log(chalk.gray(`⊘ Unchanged: ${report.unchanged}`));
  }
  if (report.conflicts.length > 0) {
    console.log(chalk.yellow(`⚠ Conflicts: ${report.conflicts.length}`));
    console.log(chalk.gray(`  ${report.conflicts.map((c) => c.key).join(', ')}`));
  }
  if (report.warnings.length > 0) {
    console.log(chalk.yellow(`⚠ Warnings: ${report.warnings.length}`));
    for (const warning of report.warnings) {
      console.log(chalk.gray(`  ${warning}`));
    }
  }
  if (report.failed.length > 0) {
    console.log(chalk.red(`✗ Errors: ${report.failed.length}`));
    for (const failure of report.failed) {
      console.log(chalk.red(`  ${failure.key}: ${failure.error}`));
    }
  }

  console.log();
}

/**
 * Walk the user through conflicts left by a keep-local pull
 */
async function resolveInteractively(session: Session, report: SyncReport): Promise<void> {
  const resolver = new ConflictResolver();
  const resolutions = await resolver.resolveConflicts(report.conflicts);
  const keys = new Map(report.conflicts.map((c) => [c.issueId, c.key]));

  for (const conflict of report.conflicts) {
    const resolution = resolutions.get(conflict.issueId) ?? 'skip';
    if (resolution === 'skip') {
      continue;
    }
    try {
      await session.engine.resolveConflict(session.project, conflict, resolution);
      report.updated++;
    } catch (error) {
      report.failed.push({ key: conflict.key, kind: conflict.kind, error: errorMessage(error) });
    }
  }

  report.conflicts = report.conflicts.filter((c) => resolutions.get(c.issueId) === 'skip');
  resolver.showSummary(resolutions, keys);
}

const program = new Command();

program
  .name('rtm-mirror')
  .description('Mirror an RTM project into a local SQLite store and push local edits back')
  .version('0.1.0');

program
  .command('pull')
  .description('Pull the remote trees (and issue details) into the mirror')
  .option('--structure-only', 'Only mirror folders, placement and summaries')
  .option('--kind <kinds...>', `Kinds to pull (${ISSUE_KINDS.join('|')})`)
  .option('--on-conflict <policy>', 'overwrite | keep-local | prompt', 'overwrite')
  .action(async (options: PullCommandOptions) => {
    const kinds = parseKinds(options.kind);
    const onConflict = options.onConflict;
    if (onConflict !== 'overwrite' && onConflict !== 'keep-local' && onConflict !== 'prompt') {
      console.error(chalk.red(`Error: Unknown conflict policy "${onConflict}"`));
      process.exit(1);
    }
    const conflictPolicy: ConflictPolicy = onConflict === 'overwrite' ? 'overwrite' : 'keep-local';

    const session = openSession();
    const spinner = ora(`Pulling ${session.project.key}...`).start();
    const controller = cancelOnInterrupt(spinner);

    try {
      const report = await session.engine.pull(session.project, {
        kinds,
        mode: options.structureOnly ? 'structure' : 'full',
        conflictPolicy,
        signal: controller.signal,
      });
      spinner.succeed('Pull complete');

      if (onConflict === 'prompt' && report.conflicts.length > 0) {
        await resolveInteractively(session, report);
      }

      printReport('Pull Results', report);
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(spinner, 'Pull failed', error);
    } finally {
      session.store.close();
    }
  });

program
  .command('pull-issue <kind> <key>')
  .description('Pull a single issue by key, overwriting the local copy')
  .action(async (kindArg: string, key: string) => {
    const kind = parseKind(kindArg);
    if (!kind) {
      console.error(chalk.red(`Error: Unknown issue kind "${kindArg}"`));
      process.exit(1);
    }

    const session = openSession();
    const spinner = ora(`Pulling ${key}...`).start();

    try {
      const report = await session.engine.pullIssue(session.project, kind, key);
      if (report.failed.length > 0) {
        spinner.fail(`Could not pull ${key}`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`Pulled ${key}`);
      }
      printReport('Pull Results', report);
    } catch (error) {
      fail(spinner, 'Pull failed', error);
    } finally {
      session.store.close();
    }
  });

program
  .command('push')
  .description('Push dirty records to the remote')
  .action(async () => {
    const session = openSession();
    const spinner = ora(`Pushing ${session.project.key}...`).start();
    const controller = cancelOnInterrupt(spinner);

    try {
      const report = await session.engine.push(session.project, { signal: controller.signal });
      spinner.succeed('Push complete');
      printReport('Push Results', report, 'Deleted remotely');
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(spinner, 'Push failed', error);
    } finally {
      session.store.close();
    }
  });

program
  .command('status')
  .description('Show mirror status without contacting the remote')
  .action(() => {
    const session = openSession();

    try {
      const { counts, checkpoint, dirty } = session.engine.status(session.project);

      console.log(chalk.bold(`\n${RULE}`));
      console.log(chalk.bold.cyan(`Mirror Status: ${session.project.key}`));
      console.log(chalk.bold(`${RULE}\n`));

      console.log(`Issues:      ${counts.total}`);
      console.log(`Local-only:  ${counts.localOnly}`);
      console.log(`Tombstoned:  ${counts.tombstoned}`);
      console.log();
      console.log(chalk.gray(`Last full pull:    ${checkpoint.lastFullSyncAt ?? 'never'}`));
      console.log(chalk.gray(`Last tree pull:    ${checkpoint.lastTreeSyncAt ?? 'never'}`));
      console.log(chalk.gray(`Last issue pull:   ${checkpoint.lastIssueSyncAt ?? 'never'}`));
      console.log();

      if (dirty.length === 0) {
        console.log(chalk.green('✓ Nothing to push'));
      } else {
        console.log(chalk.yellow(`${dirty.length} record(s) need pushing:`));
        for (const header of dirty) {
          const label = header.remoteKey ?? `(new ${header.kind.toLowerCase()} #${header.id})`;
          console.log(chalk.gray(`  ${label}${header.deleted ? ' [delete]' : ''}`));
        }
      }
      console.log();
    } finally {
      session.store.close();
    }
  });

program
  .command('purge')
  .description('Physically remove tombstoned records')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: { yes?: boolean }) => {
    const session = openSession();

    try {
      const { tombstoned } = session.store.countIssues(session.project.id);
      if (!options.yes) {
        const { confirmPurge } = await inquirer.prompt<{ confirmPurge: boolean }>([
          {
            type: 'confirm',
            name: 'confirmPurge',
            message: `Remove ${tombstoned} tombstoned issue(s) and deleted folders from ${session.project.key}?`,
            default: false,
          },
        ]);
        if (!confirmPurge) {
          console.log(chalk.gray('Skipped purge'));
          return;
        }
      }

      const purged = session.store.purgeTombstones(session.project.id);
      console.log(chalk.red(`✗ Purged ${purged.issues} issue(s) and ${purged.folders} folder(s)`));
    } catch (error) {
      console.error(chalk.red(`\nPurge failed: ${errorMessage(error)}`));
      process.exitCode = 1;
    } finally {
      session.store.close();
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
