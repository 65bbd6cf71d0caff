#!/usr/bin/env node

/**
 * Plane → CalDAV Sync CLI
 *
 * One-way sync of dated Plane issues into one CalDAV calendar per project
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import fs from 'fs';
import { config as loadEnv } from 'dotenv';
import { isEngineCalendar } from './lib/calendar-directory';
import { AppConfig, describeConfig, loadConfig } from './lib/config';
import { AuthenticationError, ConfigError, errorKind, errorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { PlanViewer } from './lib/plan-viewer';
import { createRuntime, Runtime } from './lib/runtime';
import { SyncScheduler } from './lib/scheduler';
import { emptySyncState, mergeSyncStates, ProjectRef } from './lib/types';

// Load environment variables from the working directory; earlier files win
loadEnv({ path: path.join(process.cwd(), '.env.local') });
loadEnv({ path: path.join(process.cwd(), '.env') });

const viewer = new PlanViewer();

/**
 * Validate configuration and build the engine, or exit
 */
function initialize(): Runtime {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.error(chalk.gray('Set the variables in .env.local, .env or the environment'));
      process.exit(1);
    }
    throw error;
  }

  return createRuntime(config, createLogger(config.logLevel));
}

function parseSeconds(value: string): number {
  const seconds = Number.parseInt(value, 10);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid interval: ${value}`);
  }
  return seconds;
}

async function selectProjects(runtime: Runtime, projectId?: string): Promise<ProjectRef[]> {
  if (!projectId) {
    return runtime.plane.listProjects();
  }
  const project = await runtime.plane.getProject(projectId);
  if (!project) {
    throw new Error(`Project ${projectId} not found`);
  }
  return [project];
}

// Create CLI
const program = new Command();

program
  .name('plane-caldav-sync')
  .description('Mirror Plane issues with a target date into CalDAV calendars')
  .version('1.0.0');

// Sync command (default)
program
  .command('sync', { isDefault: true })
  .description('Run one full reconciliation')
  .option('--project <id>', 'Reconcile only the given project')
  .option('--dry-run', 'Show what would change without writing to the calendar')
  .action(async (options: { project?: string; dryRun?: boolean }) => {
    const runtime = initialize();

    if (options.dryRun) {
      const spinner = ora('Planning...').start();
      try {
        const plans = await runtime.engine.plan(options.project);
        spinner.stop();
        viewer.showPlans(plans);
        console.log();
      } catch (error) {
        spinner.fail('Planning failed');
        console.error(chalk.red(`\nError: ${errorMessage(error)}`));
        process.exit(1);
      }
      return;
    }

    const spinner = ora('Syncing issues...').start();
    try {
      const state = await runtime.engine.runFullReconciliation(options.project);
      if (state.errors.length > 0) {
        spinner.warn('Sync finished with errors');
        process.exitCode = 1;
      } else {
        spinner.succeed('Sync complete');
      }
      viewer.showResult('Sync Results', state);
      console.log();
    } catch (error) {
      spinner.fail('Sync failed');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// Watch command
program
  .command('watch')
  .description('Reconcile on a fixed interval until interrupted')
  .option('--interval <seconds>', 'Seconds between runs', parseSeconds)
  .option('--no-initial-sync', 'Wait one interval before the first run')
  .action(async (options: { interval?: number; initialSync: boolean }) => {
    const runtime = initialize();

    const scheduler =
      options.interval === undefined && options.initialSync === runtime.config.sync.runOnStartup
        ? runtime.scheduler
        : new SyncScheduler(runtime.engine, {
            intervalMs: options.interval !== undefined ? options.interval * 1000 : runtime.config.sync.intervalMs,
            runOnStartup: options.initialSync && runtime.config.sync.runOnStartup,
            logger: runtime.logger,
          });

    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      console.log(chalk.gray(`\nReceived ${signal}, finishing the current item...`));
      await scheduler.stop();
      process.exit(0);
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    await scheduler.start();
    const status = scheduler.getStatus();
    console.log(chalk.cyan(`Watching; next run at ${status.nextTickAt ?? 'the next interval'} (Ctrl+C to stop)`));
  });

// Webhook replay command
program
  .command('webhook <file>')
  .description('Process a saved webhook delivery')
  .option('--signature <hex>', 'Value of the X-Plane-Signature header')
  .action(async (file: string, options: { signature?: string }) => {
    const runtime = initialize();
    const filepath = path.resolve(process.cwd(), file);

    if (!fs.existsSync(filepath)) {
      console.error(chalk.red(`Error: File not found: ${filepath}`));
      process.exit(1);
    }

    try {
      const state = await runtime.webhooks.handle(fs.readFileSync(filepath), options.signature);
      viewer.showResult('Webhook Result', state);
      console.log();
      if (state.errors.length > 0) process.exitCode = 1;
    } catch (error) {
      const reason = error instanceof AuthenticationError ? 'Signature rejected' : errorMessage(error);
      console.error(chalk.red(`Error: ${reason}`));
      process.exit(1);
    }
  });

// Calendars command
program
  .command('calendars')
  .description('List calendars on the CalDAV server')
  .action(async () => {
    const runtime = initialize();
    const spinner = ora('Fetching calendars...').start();

    try {
      const calendars = await runtime.caldav.listCalendars();
      spinner.succeed(`${calendars.length} calendar(s)`);

      for (const calendar of calendars) {
        const marker = isEngineCalendar(calendar) ? chalk.green('●') : chalk.gray('○');
        console.log(`${marker} ${calendar.name}`);
        console.log(chalk.gray(`  ${calendar.url}`));
      }
      console.log(chalk.gray(`\n${chalk.green('●')} managed by plane-caldav-sync`));
    } catch (error) {
      spinner.fail('Could not list calendars');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// Check command
program
  .command('check')
  .description('Verify Plane and CalDAV access')
  .action(async () => {
    const runtime = initialize();

    console.log(chalk.bold.cyan('Configuration'));
    for (const line of describeConfig(runtime.config)) {
      console.log(chalk.gray(`  ${line}`));
    }
    console.log();

    let failed = false;

    const planeSpinner = ora('Verifying Plane access...').start();
    const access = await runtime.plane.verifyAccess();
    if (access.ok) {
      planeSpinner.succeed(`Plane access verified (${access.projects} project(s))`);
    } else {
      planeSpinner.fail(`Plane access failed: ${access.error}`);
      failed = true;
    }

    const caldavSpinner = ora('Verifying CalDAV access...').start();
    try {
      const calendars = await runtime.caldav.listCalendars();
      caldavSpinner.succeed(`CalDAV access verified (${calendars.length} calendar(s))`);
    } catch (error) {
      caldavSpinner.fail(`CalDAV access failed: ${errorMessage(error)}`);
      failed = true;
    }

    if (failed) process.exit(1);
  });

// Clean command
program
  .command('clean')
  .description('Delete every event this tool created')
  .option('--project <id>', 'Clean only the given project')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (options: { project?: string; yes?: boolean }) => {
    const runtime = initialize();

    let projects: ProjectRef[];
    try {
      projects = await selectProjects(runtime, options.project);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }

    if (!options.yes) {
      const names = projects.map((project) => project.identifier).join(', ');
      const proceed = await viewer.confirm(`Delete all synced events of ${projects.length} project(s) (${names})?`);
      if (!proceed) {
        console.log(chalk.gray('Skipped cleanup'));
        return;
      }
    }

    const spinner = ora('Cleaning calendars...').start();
    const state = emptySyncState();
    for (const project of projects) {
      spinner.text = `Cleaning ${project.identifier}...`;
      try {
        mergeSyncStates(state, await runtime.engine.cleanProject(project));
      } catch (error) {
        state.errors.push({ kind: errorKind(error), error: errorMessage(error), projectId: project.id });
      }
    }
    spinner.stop();

    viewer.showResult('Cleanup Results', state);
    console.log();
    if (state.errors.length > 0) process.exitCode = 1;
  });

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
