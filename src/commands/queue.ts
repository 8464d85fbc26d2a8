import chalk from 'chalk';
import Table from 'cli-table3';
import { findInstalledModel, openViewer } from './session.js';
import { describeFailure } from '../types/errors.js';
import { formatBytes } from '../utils/format-utils.js';

export async function queueCommand(name: string): Promise<void> {
  const { viewer } = await openViewer();
  const model = findInstalledModel(viewer, name);

  const result = await viewer.toggleQueued(model.name);
  if (!result.ok) {
    console.log(chalk.yellow(`⚠️  ${describeFailure(result.error)}`));
    return;
  }

  const queuedCount = viewer.queue.listQueued().length;
  if (result.value) {
    console.log(chalk.yellow(`🗑️  Queued ${model.name} for deletion`));
  } else {
    console.log(chalk.dim(`Removed ${model.name} from the deletion queue`));
  }
  console.log(chalk.dim(`   ${queuedCount} model(s) queued. Delete them with: modelshelf purge`));
}

export async function queuedCommand(options: { clear?: boolean }): Promise<void> {
  const { viewer } = await openViewer();

  if (options.clear) {
    const cleared = await viewer.queue.clearQueue();
    if (!cleared.ok) {
      console.log(chalk.yellow(`⚠️  ${describeFailure(cleared.error)}`));
      return;
    }
    console.log(chalk.green(`✅ Cleared ${cleared.value} model(s) from the deletion queue`));
    return;
  }

  const queued = viewer.queue.listQueued();
  if (queued.length === 0) {
    console.log(chalk.dim('The deletion queue is empty.'));
    return;
  }

  const table = new Table({
    head: ['MODEL', 'SIZE', 'ID'],
    colWidths: [50, 12, 16],
  });
  for (const model of queued) {
    table.push([model.name, formatBytes(model.sizeBytes), model.id]);
  }

  console.log(chalk.blue(`🗑️  Deletion queue (${queued.length})\n`));
  console.log(table.toString());
  console.log(chalk.dim(`\nReclaimable: ${formatBytes(viewer.queue.estimateReclaimBytes())}`));
  console.log(chalk.dim('Delete them with: modelshelf purge'));
}
