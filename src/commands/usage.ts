import chalk from 'chalk';
import { findInstalledModel, openViewer } from './session.js';
import { describeFailure } from '../types/errors.js';

interface UsageOptions {
  tokens?: number;
  latency?: number;
}

/**
 * Record one use of a model (for scripts and chat front ends to call)
 */
export async function usageCommand(name: string, options: UsageOptions): Promise<void> {
  if (options.tokens !== undefined && (!Number.isInteger(options.tokens) || options.tokens < 0)) {
    throw new Error('--tokens must be a non-negative integer');
  }
  if (options.latency !== undefined && (!Number.isFinite(options.latency) || options.latency < 0)) {
    throw new Error('--latency must be a non-negative number of milliseconds');
  }

  const { viewer } = await openViewer();
  const model = findInstalledModel(viewer, name);

  const result = await viewer.recordUsage(model.name, {
    at: new Date(),
    tokens: options.tokens,
    responseTimeMs: options.latency,
  });
  if (!result.ok) {
    console.log(chalk.yellow(`⚠️  ${describeFailure(result.error)}`));
    return;
  }

  console.log(chalk.green(`📊 Recorded use of ${model.name} (${result.value.usage.count} total)`));
}
