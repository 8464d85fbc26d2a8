import chalk from 'chalk';
import * as readline from 'readline';
import { configManager } from '../lib/config-manager.js';
import { ConsoleLogger, Logger } from '../lib/logger.js';
import { ModelViewer, createModelViewer } from '../lib/model-viewer.js';
import { EnrichedModel } from '../types/enriched-model.js';
import { describeFailure } from '../types/errors.js';

export interface ViewerSession {
  viewer: ModelViewer;
  logger: Logger;
}

/**
 * Load config and usage data, then fetch the inventory.
 * Throws when the runner cannot be reached (commands need a live inventory).
 */
export async function openViewer(options: { echoLogs?: boolean } = {}): Promise<ViewerSession> {
  const config = await configManager.loadConfig();
  const logger = new ConsoleLogger(config.verboseLogging, undefined, options.echoLogs ?? true);
  const { viewer, loaded } = await createModelViewer(config, logger);

  if (!loaded.ok) {
    logger.warn(describeFailure(loaded.error));
  }

  const refreshed = await viewer.refresh();
  if (!refreshed.ok) {
    throw new Error(`${describeFailure(refreshed.error)}\n\nIs ${config.runnerBinary} installed and running?`);
  }

  return { viewer, logger };
}

/**
 * Resolve an installed model by exact name, falling back to the ':latest' tag
 */
export function findInstalledModel(viewer: ModelViewer, name: string): EnrichedModel {
  const model = viewer.engine.findModel(name) || viewer.engine.findModel(`${name}:latest`);
  if (!model) {
    throw new Error(`Model not found: ${name}\n\nRun: modelshelf ls`);
  }
  return model;
}

/**
 * Prompt user for confirmation
 */
export function confirmWithYes(): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(chalk.yellow("   Type 'yes' to confirm: "), (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'yes');
    });
  });
}
