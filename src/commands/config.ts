import chalk from 'chalk';
import { configManager } from '../lib/config-manager.js';
import { ViewerConfig } from '../types/viewer-config.js';
import { expandHome } from '../utils/file-utils.js';

interface ConfigOptions {
  runner?: string;
  timeout?: number;
  modelsDir?: string;
  verbose?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const updates: Partial<ViewerConfig> = {};
  if (options.runner !== undefined) updates.runnerBinary = options.runner;
  if (options.timeout !== undefined) updates.commandTimeoutMs = options.timeout;
  if (options.modelsDir !== undefined) updates.modelsDirectory = expandHome(options.modelsDir);
  if (options.verbose !== undefined) updates.verboseLogging = options.verbose;

  // If no options provided, show current config
  if (Object.keys(updates).length === 0) {
    const config = await configManager.loadConfig();

    console.log(chalk.blue('⚙️  Configuration\n'));
    console.log(`  Runner binary:   ${config.runnerBinary}`);
    console.log(`  Command timeout: ${config.commandTimeoutMs}ms`);
    console.log(`  Models dir:      ${config.modelsDirectory}`);
    console.log(`  Recent / old:    < ${config.recentDays} days / ≥ ${config.oldDays} days`);
    console.log(`  Verbose logging: ${config.verboseLogging ? 'on' : 'off'}`);
    if (config.extraLiberationKeywords.length > 0) {
      console.log(`  Extra liberation keywords: ${config.extraLiberationKeywords.join(', ')}`);
    }
    if (config.extraVariantTags.length > 0) {
      console.log(`  Extra variant tags: ${config.extraVariantTags.join(', ')}`);
    }
    console.log();
    console.log(chalk.dim(`File: ${configManager.getConfigPath()}`));
    console.log(chalk.dim('Change settings: modelshelf config --runner <bin> --timeout <ms> --models-dir <path>'));
    return;
  }

  await configManager.updateConfig(updates);
  console.log(chalk.green('✅ Configuration updated'));
  for (const [key, value] of Object.entries(updates)) {
    console.log(chalk.dim(`   ${key}: ${String(value)}`));
  }
}
