import chalk from 'chalk';
import { findInstalledModel, openViewer } from './session.js';
import { describeFailure } from '../types/errors.js';
import { formatBytes, formatDateShort, formatRelativeTime } from '../utils/format-utils.js';

export async function showCommand(name: string): Promise<void> {
  const { viewer } = await openViewer();
  const model = findInstalledModel(viewer, name);
  const now = new Date();

  console.log(chalk.blue(`📋 ${model.name}\n`));
  console.log(`  ${chalk.bold('ID:')}           ${model.id}`);
  console.log(`  ${chalk.bold('Size:')}         ${formatBytes(model.sizeBytes)}`);
  console.log(`  ${chalk.bold('Modified:')}     ${formatDateShort(model.modifiedAt)} (${model.ageCategory}, ${model.ageDays} days)`);
  console.log(`  ${chalk.bold('Capabilities:')} ${model.capabilities.join(', ')}`);
  console.log(`  ${chalk.bold('Base name:')}    ${model.baseName}`);

  const flags: string[] = [];
  if (model.isStarred) flags.push('starred');
  if (model.isQueuedForDeletion) flags.push('queued for deletion');
  if (model.isLiberated) flags.push('liberated');
  if (model.isDuplicate) flags.push('duplicate');
  if (model.isSpecialVariant) flags.push('special variant');
  if (flags.length > 0) {
    console.log(`  ${chalk.bold('Flags:')}        ${flags.join(', ')}`);
  }

  if (model.usageInfo) {
    const usage = model.usageInfo;
    console.log();
    console.log(chalk.bold('Usage:'));
    console.log(`  Uses:        ${usage.count}`);
    if (usage.lastUsed) console.log(`  Last used:   ${formatRelativeTime(usage.lastUsed, now)}`);
    if (usage.firstUsed) console.log(`  First used:  ${formatRelativeTime(usage.firstUsed, now)}`);
    if (usage.totalTokens !== undefined) console.log(`  Tokens:      ${usage.totalTokens}`);
    if (usage.avgResponseTimeMs !== undefined) {
      console.log(`  Avg latency: ${Math.round(usage.avgResponseTimeMs)}ms`);
    }
  }

  const family = viewer.engine.getFamily(model.name);
  if (family.length > 1) {
    console.log();
    console.log(chalk.bold(`Family ${model.baseName} (${family.length} models):`));
    for (const member of family) {
      console.log(`  ${member === model.name ? chalk.cyan('►') : ' '} ${member}`);
    }
  }

  const details = await viewer.getModelInfo(model.name);
  console.log();
  if (!details.ok) {
    console.log(chalk.yellow(`⚠️  ${describeFailure(details.error)}`));
    return;
  }

  const info = details.value;
  console.log(chalk.bold('Runner details:'));
  if (info.architecture) console.log(`  Architecture:   ${info.architecture}`);
  if (info.parameters) console.log(`  Parameters:     ${info.parameters}`);
  if (info.quantization) console.log(`  Quantization:   ${info.quantization}`);
  if (info.contextLength) console.log(`  Context length: ${info.contextLength}`);
  if (info.embeddingLength) console.log(`  Embedding:      ${info.embeddingLength}`);
  if (info.capabilities.length > 0) console.log(`  Reported caps:  ${info.capabilities.join(', ')}`);
  if (info.license) console.log(`  License:        ${info.license}`);
  if (info.template) {
    console.log();
    console.log(chalk.bold('Template:'));
    console.log(chalk.dim(info.template));
  }
}
