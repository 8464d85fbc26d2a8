import chalk from 'chalk';
import { confirmWithYes, openViewer } from './session.js';
import { EnrichedModel } from '../types/enriched-model.js';
import { describeFailure } from '../types/errors.js';
import { formatBytes } from '../utils/format-utils.js';

interface PurgeOptions {
  yes?: boolean;
}

export async function purgeCommand(options: PurgeOptions): Promise<void> {
  const { viewer } = await openViewer();

  const confirm = async (models: EnrichedModel[]): Promise<boolean> => {
    const total = models.reduce((sum, m) => sum + m.sizeBytes, 0);
    console.log(chalk.yellow(`⚠️  Delete ${models.length} model(s), freeing ${formatBytes(total)}:`));
    for (const model of models) {
      console.log(chalk.yellow(`   - ${model.name} (${formatBytes(model.sizeBytes)})`));
    }
    console.log();

    if (options.yes) return true;
    return confirmWithYes();
  };

  const report = await viewer.executeDeletions(confirm, (progress) => {
    const position = chalk.dim(`[${progress.index}/${progress.total}]`);
    switch (progress.status) {
      case 'deleting':
        console.log(`${position} 🗑️  Deleting ${progress.name}...`);
        break;
      case 'deleted':
        console.log(`${position} ${chalk.green('✓')} Deleted ${progress.name}`);
        break;
      case 'failed':
        console.log(`${position} ${chalk.red('✗')} ${progress.name}: ${progress.reason}`);
        break;
    }
  });

  switch (report.outcome) {
    case 'empty':
      console.log(chalk.dim('Nothing to delete. Queue models with: modelshelf queue <model>'));
      return;
    case 'cancelled':
      console.log(chalk.dim('Cancelled'));
      return;
    case 'busy':
      console.log(chalk.yellow('A deletion batch is already running'));
      return;
    case 'completed':
      break;
  }

  console.log();
  if (report.failed.length === 0) {
    console.log(chalk.green(`✅ Deleted all ${report.succeeded.length} model(s), freed ${formatBytes(report.freedBytes)}`));
  } else {
    console.log(chalk.yellow(`✅ Deleted ${report.succeeded.length} model(s), freed ${formatBytes(report.freedBytes)}`));
    console.log(chalk.red(`❌ Failed to delete ${report.failed.length} model(s); they remain queued:`));
    for (const failure of report.failed) {
      console.log(chalk.red(`   - ${failure.name}: ${failure.reason}`));
    }
    process.exitCode = 1;
  }

  for (const warning of report.warnings) {
    console.log(chalk.yellow(`⚠️  ${describeFailure(warning)}`));
  }
}
