import chalk from 'chalk';
import { openViewer } from './session.js';
import { describeFailure } from '../types/errors.js';

export async function cleanupCommand(): Promise<void> {
  const { viewer } = await openViewer();
  const result = await viewer.cleanup();

  if (!result.ok) {
    throw new Error(`Cleanup refused. ${describeFailure(result.error)}`);
  }

  if (result.value.length === 0) {
    console.log(chalk.dim('No stale usage records.'));
    return;
  }

  console.log(chalk.green(`✅ Removed ${result.value.length} record(s) for models no longer installed:`));
  for (const name of result.value) {
    console.log(chalk.dim(`   - ${name}`));
  }
}
