#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { starCommand } from './commands/star.js';
import { queueCommand, queuedCommand } from './commands/queue.js';
import { purgeCommand } from './commands/purge.js';
import { usageCommand } from './commands/usage.js';
import { storageCommand } from './commands/storage.js';
import { cleanupCommand } from './commands/cleanup.js';
import { configCommand } from './commands/config.js';
import { tuiCommand } from './commands/tui.js';
import { errorMessage } from './types/errors.js';

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function fail(error: unknown): never {
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  process.exit(1);
}

const program = new Command();

program
  .name('modelshelf')
  .description('Browse, star and clean up locally installed Ollama models')
  .version('1.0.0');

// List models
program
  .command('ls')
  .description('List installed models with capabilities, age and flags')
  .option('-s, --search <text>', 'Match name or capability tag (case-insensitive)')
  .option('-f, --filter <selector>', 'all, recent, moderate, old, starred, liberated, queued, duplicates, variants, used, unused, large, small, frequent, recently-used')
  .option('--sort <key>', 'name, size or modified', 'name')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await listCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// Show model details
program
  .command('show')
  .description('Show details, usage and family of a model')
  .argument('<model>', 'Model name (tag defaults to latest)')
  .action(async (model: string) => {
    try {
      await showCommand(model);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('star')
  .description('Toggle the star on a model')
  .argument('<model>', 'Model name')
  .action(async (model: string) => {
    try {
      await starCommand(model);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('queue')
  .description('Toggle a model in the deletion queue')
  .argument('<model>', 'Model name')
  .action(async (model: string) => {
    try {
      await queueCommand(model);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('queued')
  .description('List models queued for deletion')
  .option('--clear', 'Empty the queue without deleting anything')
  .action(async (options) => {
    try {
      await queuedCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// Delete every queued model
program
  .command('purge')
  .description('Delete all queued models after confirmation')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options) => {
    try {
      await purgeCommand(options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('usage')
  .description('Record one use of a model')
  .argument('<model>', 'Model name')
  .option('--tokens <count>', 'Tokens generated by this use', parseNumber)
  .option('--latency <ms>', 'Response time in milliseconds', parseNumber)
  .action(async (model: string, options) => {
    try {
      await usageCommand(model, options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('storage')
  .description('Show disk space used by models and free space on the device')
  .action(async () => {
    try {
      await storageCommand();
    } catch (error) {
      fail(error);
    }
  });

program
  .command('cleanup')
  .description('Remove usage records for models that are no longer installed')
  .action(async () => {
    try {
      await cleanupCommand();
    } catch (error) {
      fail(error);
    }
  });

// Configuration
program
  .command('config')
  .description('View or change configuration')
  .option('--runner <binary>', 'Runner executable (default: ollama)')
  .option('--timeout <ms>', 'Runner command timeout in milliseconds', parseNumber)
  .option('--models-dir <path>', 'Directory holding model blobs')
  .option('--verbose', 'Write debug logs to ~/.modelshelf/logs')
  .option('--no-verbose', 'Disable debug logs')
  .action(async (options) => {
    try {
      await configCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// Interactive browser
program
  .command('tui')
  .description('Open the interactive model browser')
  .action(async () => {
    try {
      await tuiCommand();
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
