import chalk from 'chalk';
import { openViewer } from './session.js';
import { formatBytes } from '../utils/format-utils.js';

export async function storageCommand(): Promise<void> {
  const { viewer } = await openViewer();
  const info = await viewer.getStorageInfo();

  console.log(chalk.blue('💾 Storage\n'));
  console.log(`  ${chalk.bold('Models directory:')} ${info.modelsDirectory}`);
  console.log(`  ${chalk.bold('Models total:')}     ${formatBytes(info.modelsTotalBytes)}`);

  if (info.deviceTotalBytes === null || info.deviceFreeBytes === null) {
    console.log(chalk.dim('  Device capacity unavailable'));
    return;
  }

  const share = info.deviceTotalBytes > 0 ? (info.modelsTotalBytes / info.deviceTotalBytes) * 100 : 0;
  console.log(`  ${chalk.bold('Device total:')}     ${formatBytes(info.deviceTotalBytes)}`);
  console.log(`  ${chalk.bold('Device free:')}      ${formatBytes(info.deviceFreeBytes)}`);
  console.log(chalk.dim(`\n  Models use ${share.toFixed(1)}% of the device`));

  const reclaimable = viewer.queue.estimateReclaimBytes();
  if (reclaimable > 0) {
    console.log(chalk.dim(`  Queued deletions would free ${formatBytes(reclaimable)}`));
  }
}
