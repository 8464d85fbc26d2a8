import chalk from 'chalk';
import { findInstalledModel, openViewer } from './session.js';
import { describeFailure } from '../types/errors.js';

export async function starCommand(name: string): Promise<void> {
  const { viewer } = await openViewer();
  const model = findInstalledModel(viewer, name);

  const result = await viewer.toggleStar(model.name);
  if (!result.ok) {
    console.log(chalk.yellow(`⚠️  ${describeFailure(result.error)}`));
    return;
  }

  if (result.value) {
    console.log(chalk.green(`⭐ Starred ${model.name}`));
  } else {
    console.log(chalk.dim(`Unstarred ${model.name}`));
  }
}
