import chalk from 'chalk';
import Table from 'cli-table3';
import { openViewer } from './session.js';
import {
  AgeCategory,
  EnrichedModel,
  FILTER_SELECTORS,
  SORT_KEYS,
  isFilterSelector,
  isSortKey,
} from '../types/enriched-model.js';
import { formatBytes, formatDateShort, truncate } from '../utils/format-utils.js';

interface ListOptions {
  search?: string;
  filter?: string;
  sort?: string;
  json?: boolean;
}

const AGE_COLORS: Record<AgeCategory, (text: string) => string> = {
  recent: chalk.green,
  moderate: chalk.yellow,
  old: chalk.red,
};

export function formatFlags(model: EnrichedModel): string {
  const flags: string[] = [];
  if (model.isStarred) flags.push('⭐');
  if (model.isQueuedForDeletion) flags.push('🗑️');
  if (model.isLiberated) flags.push('🔓');
  if (model.isDuplicate) flags.push('🔄');
  if (model.isSpecialVariant) flags.push('🔀');
  return flags.join(' ');
}

export async function listCommand(options: ListOptions): Promise<void> {
  const filter = options.filter ?? 'all';
  const sort = options.sort ?? 'name';
  if (!isFilterSelector(filter)) {
    throw new Error(`Unknown filter: ${filter}\n\nAvailable filters: ${FILTER_SELECTORS.join(', ')}`);
  }
  if (!isSortKey(sort)) {
    throw new Error(`Unknown sort key: ${sort}\n\nAvailable keys: ${SORT_KEYS.join(', ')}`);
  }

  const { viewer } = await openViewer();
  const models = viewer.getModels({ search: options.search ?? '', filter, sort });

  if (options.json) {
    console.log(JSON.stringify(models, null, 2));
    return;
  }

  const installed = viewer.engine.getRecords().length;
  if (models.length === 0) {
    console.log(chalk.yellow(installed === 0 ? 'No models installed.' : 'No models match the current search and filter.'));
    return;
  }

  const table = new Table({
    head: ['MODEL', 'SIZE', 'MODIFIED', 'CAPABILITIES', 'FLAGS'],
    colWidths: [44, 10, 16, 30, 14],
  });

  for (const model of models) {
    const age = AGE_COLORS[model.ageCategory];
    table.push([
      truncate(model.name, 42),
      formatBytes(model.sizeBytes),
      age(`${formatDateShort(model.modifiedAt)} (${model.ageDays}d)`),
      model.capabilities.join(', '),
      formatFlags(model),
    ]);
  }

  console.log(table.toString());

  const totalSize = models.reduce((sum, m) => sum + m.sizeBytes, 0);
  const duplicates = models.filter((m) => m.isDuplicate).length;
  let summary = `\nShowing ${models.length} of ${installed} models (${formatBytes(totalSize)})`;
  if (duplicates > 0) {
    summary += ` · ${duplicates} in duplicate families`;
  }
  console.log(chalk.dim(summary));
  console.log(chalk.dim('⭐ starred  🗑️ queued  🔓 liberated  🔄 duplicate  🔀 variant'));
}
