import blessed from 'blessed';
import { configManager } from '../lib/config-manager.js';
import { ConsoleLogger } from '../lib/logger.js';
import { createModelViewer } from '../lib/model-viewer.js';
import { describeFailure } from '../types/errors.js';
import { createModelsUI } from '../tui/ModelsApp.js';

export async function tuiCommand(): Promise<void> {
  const config = await configManager.loadConfig();

  // Console output would corrupt the screen; log to file only
  const logger = new ConsoleLogger(config.verboseLogging, undefined, false);
  const { viewer, loaded } = await createModelViewer(config, logger);
  if (!loaded.ok) {
    logger.warn(describeFailure(loaded.error));
  }

  const screen = blessed.screen({
    smartCSR: true,
    title: 'modelshelf',
    fullUnicode: true,
  });

  await createModelsUI(screen, viewer);
}
