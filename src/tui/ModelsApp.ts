import blessed from 'blessed';
import { ModelViewer } from '../lib/model-viewer.js';
import {
  AgeCategory,
  EnrichedModel,
  FILTER_SELECTORS,
  SORT_KEYS,
} from '../types/enriched-model.js';
import { describeFailure } from '../types/errors.js';
import { formatBytes, formatDateShort, formatRelativeTime, truncate } from '../utils/format-utils.js';
import { promptText, showConfirm, showMessage } from './shared/dialogs.js';

const AGE_TAGS: Record<AgeCategory, string> = {
  recent: 'green-fg',
  moderate: 'yellow-fg',
  old: 'red-fg',
};

function nextOf<T>(values: readonly T[], current: T): T {
  return values[(values.indexOf(current) + 1) % values.length];
}

function flagText(model: EnrichedModel): string {
  return [
    model.isStarred ? '★' : ' ',
    model.isQueuedForDeletion ? 'D' : ' ',
    model.isLiberated ? 'L' : ' ',
    model.isDuplicate ? '2' : ' ',
    model.isSpecialVariant ? 'V' : ' ',
  ].join('');
}

/**
 * Interactive model browser: search, filter, sort, star, queue and batch delete
 */
export async function createModelsUI(screen: blessed.Widgets.Screen, viewer: ModelViewer): Promise<void> {
  let models: EnrichedModel[] = [];
  let selectedIndex = 0;
  let statusMessage = '';
  let modalOpen = false;

  const contentBox = blessed.box({
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    tags: true,
  });
  screen.append(contentBox);

  function render(): void {
    models = viewer.getModels();
    selectedIndex = Math.min(selectedIndex, Math.max(0, models.length - 1));

    const termWidth = typeof screen.width === 'number' ? screen.width : 80;
    const termHeight = typeof screen.height === 'number' ? screen.height : 24;
    const divider = '─'.repeat(termWidth - 2);
    const state = viewer.engine.getState();
    const query = state.query;
    let content = '';

    // Header
    content += '{bold}{blue-fg}═══ Installed Models{/blue-fg}{/bold}';
    if (state.refreshing) {
      content += '  {cyan-fg}⏳ refreshing...{/cyan-fg}';
    }
    if (state.stale) {
      content += `  {yellow-fg}⚠ showing last known inventory${state.lastError ? `: ${state.lastError.message}` : ''}{/yellow-fg}`;
    }
    if (state.skippedRows > 0) {
      content += `  {yellow-fg}⚠ ${state.skippedRows} unreadable row(s) skipped{/yellow-fg}`;
    }
    content += '\n';
    content += `Search: {bold}${query.search || '(none)'}{/bold}   Filter: {bold}${query.filter}{/bold}   Sort: {bold}${query.sort}{/bold}\n`;

    const totalSize = models.reduce((sum, m) => sum + m.sizeBytes, 0);
    content += `{bold}${models.length} of ${state.modelCount} models{/bold} - ${formatBytes(totalSize)}`;
    const queued = viewer.queue.listQueued();
    if (queued.length > 0) {
      content += `   {red-fg}${queued.length} queued (${formatBytes(viewer.queue.estimateReclaimBytes())}){/red-fg}`;
    }
    content += '\n' + divider + '\n';

    const nameWidth = Math.max(20, Math.min(48, termWidth - 60));
    content += `{bold}  │ Flags │ ${'Model'.padEnd(nameWidth)} │ Size       │ Modified   │ Capabilities{/bold}\n`;
    content += divider + '\n';

    if (models.length === 0) {
      content += state.modelCount === 0
        ? '{yellow-fg}No models installed{/yellow-fg}\n'
        : '{yellow-fg}No models match the current search and filter{/yellow-fg}\n';
    }

    // Keep the selection inside the visible window
    const visibleRows = Math.max(1, termHeight - 10);
    const start = Math.max(0, Math.min(selectedIndex - Math.floor(visibleRows / 2), models.length - visibleRows));
    const end = Math.min(models.length, start + visibleRows);

    for (let i = start; i < end; i++) {
      const model = models[i];
      const isSelected = i === selectedIndex;
      const indicator = isSelected ? '►' : ' ';
      const name = truncate(model.name, nameWidth).padEnd(nameWidth);
      const size = formatBytes(model.sizeBytes).padStart(10);
      const modified = formatDateShort(model.modifiedAt).padStart(10);
      const caps = model.capabilities.filter((tag) => tag !== 'text').join(',');

      if (isSelected) {
        content += `{cyan-bg}{15-fg}${indicator} │ ${flagText(model)} │ ${name} │ ${size} │ ${modified} │ ${caps}{/15-fg}{/cyan-bg}\n`;
      } else {
        const ageTag = AGE_TAGS[model.ageCategory];
        const nameText = model.isQueuedForDeletion ? `{red-fg}${name}{/red-fg}` : name;
        content += `${indicator} │ ${flagText(model)} │ ${nameText} │ ${size} │ {${ageTag}}${modified}{/${ageTag}} │ {gray-fg}${caps}{/gray-fg}\n`;
      }
    }

    // Footer
    content += '\n' + divider + '\n';
    if (statusMessage) {
      content += `${statusMessage}\n`;
    }
    content += '{gray-fg}[↑/↓] Navigate [/] Search [F]ilter s[O]rt [S]tar [Space] Queue [X] Delete queued [I]nfo [R]efresh [Q]uit{/gray-fg}';

    contentBox.setContent(content);
    screen.render();
  }

  async function refresh(): Promise<void> {
    statusMessage = '{cyan-fg}⏳ Loading models...{/cyan-fg}';
    render();
    const result = await viewer.refresh();
    if (!result.ok) {
      statusMessage = `{red-fg}❌ ${describeFailure(result.error)}{/red-fg}`;
    } else if (result.value.skipped.length > 0) {
      statusMessage = `{yellow-fg}⚠ Skipped ${result.value.skipped.length} unreadable row(s){/yellow-fg}`;
    } else {
      statusMessage = '';
    }
    render();
  }

  async function runModal(action: () => Promise<void>): Promise<void> {
    modalOpen = true;
    try {
      await action();
    } finally {
      modalOpen = false;
      render();
    }
  }

  function selected(): EnrichedModel | undefined {
    return models[selectedIndex];
  }

  async function toggleStar(): Promise<void> {
    const model = selected();
    if (!model) return;
    const result = await viewer.toggleStar(model.name);
    statusMessage = result.ok
      ? `${result.value ? '⭐ Starred' : 'Unstarred'} ${model.name}`
      : `{yellow-fg}⚠ ${describeFailure(result.error)}{/yellow-fg}`;
    render();
  }

  async function toggleQueued(): Promise<void> {
    const model = selected();
    if (!model) return;
    const result = await viewer.toggleQueued(model.name);
    statusMessage = result.ok
      ? `${result.value ? '🗑️  Queued' : 'Unqueued'} ${model.name}`
      : `{yellow-fg}⚠ ${describeFailure(result.error)}{/yellow-fg}`;
    render();
  }

  async function executeDeletions(): Promise<void> {
    const report = await viewer.executeDeletions(
      (queued) => {
        const total = queued.reduce((sum, m) => sum + m.sizeBytes, 0);
        let body = `{bold}Delete ${queued.length} model(s), freeing ${formatBytes(total)}?{/bold}\n\n`;
        for (const model of queued) {
          body += `   - ${model.name} (${formatBytes(model.sizeBytes)})\n`;
        }
        return showConfirm(screen, 'Delete Queued Models', body);
      },
      (progress) => {
        if (progress.status === 'deleting') {
          statusMessage = `{cyan-fg}⏳ Deleting ${progress.name} (${progress.index}/${progress.total})...{/cyan-fg}`;
          render();
        }
      }
    );

    switch (report.outcome) {
      case 'empty':
        statusMessage = 'Nothing to delete. Queue models with [Space]';
        return;
      case 'cancelled':
        statusMessage = 'Deletion cancelled';
        return;
      case 'busy':
        statusMessage = '{yellow-fg}A deletion batch is already running{/yellow-fg}';
        return;
      case 'completed':
        break;
    }

    statusMessage = `{green-fg}✅ Deleted ${report.succeeded.length} model(s), freed ${formatBytes(report.freedBytes)}{/green-fg}`;
    if (report.failed.length > 0) {
      const lines = report.failed.map((failure) => `  {bold}${failure.name}{/bold}: ${failure.reason}`);
      await showMessage(
        screen,
        'Some deletions failed',
        `  ${report.failed.length} model(s) remain queued:\n\n${lines.join('\n')}`,
        'red'
      );
    }
  }

  async function showDetails(): Promise<void> {
    const model = selected();
    if (!model) return;

    statusMessage = `{cyan-fg}⏳ Loading details for ${model.name}...{/cyan-fg}`;
    render();

    const details = await viewer.getModelInfo(model.name);
    statusMessage = '';
    let body = `  {bold}${model.name}{/bold}\n`;
    body += `  ID: ${model.id}   Size: ${formatBytes(model.sizeBytes)}   Age: ${model.ageDays} days (${model.ageCategory})\n`;
    body += `  Capabilities: ${model.capabilities.join(', ')}\n`;
    body += `  Base name: ${model.baseName}\n`;

    const family = viewer.engine.getFamily(model.name);
    if (family.length > 1) {
      body += `  Family: ${family.join(', ')}\n`;
    }
    if (model.usageInfo) {
      const usage = model.usageInfo;
      body += `  Uses: ${usage.count}`;
      if (usage.lastUsed) body += `   Last used: ${formatRelativeTime(usage.lastUsed, new Date())}`;
      body += '\n';
    }

    if (details.ok) {
      const info = details.value;
      body += '\n';
      if (info.architecture) body += `  Architecture: ${info.architecture}\n`;
      if (info.parameters) body += `  Parameters: ${info.parameters}\n`;
      if (info.quantization) body += `  Quantization: ${info.quantization}\n`;
      if (info.contextLength) body += `  Context length: ${info.contextLength}\n`;
    } else {
      body += `\n  {yellow-fg}${describeFailure(details.error)}{/yellow-fg}\n`;
    }

    await showMessage(screen, 'Model Details', body);
  }

  // Re-render on snapshot, flag or query changes
  const unsubscribe = viewer.engine.subscribe(() => {
    if (!modalOpen) render();
  });

  const keyHandlers = {
    up: () => {
      if (modalOpen || models.length === 0) return;
      selectedIndex = Math.max(0, selectedIndex - 1);
      render();
    },
    down: () => {
      if (modalOpen || models.length === 0) return;
      selectedIndex = Math.min(models.length - 1, selectedIndex + 1);
      render();
    },
    search: () => {
      if (modalOpen) return;
      void runModal(async () => {
        const value = await promptText(screen, 'Search name or capability', viewer.engine.getQuery().search);
        if (value !== null) {
          selectedIndex = 0;
          viewer.engine.setQuery({ search: value });
        }
      });
    },
    filter: () => {
      if (modalOpen) return;
      selectedIndex = 0;
      viewer.engine.setQuery({ filter: nextOf(FILTER_SELECTORS, viewer.engine.getQuery().filter) });
    },
    sort: () => {
      if (modalOpen) return;
      viewer.engine.setQuery({ sort: nextOf(SORT_KEYS, viewer.engine.getQuery().sort) });
    },
    star: () => {
      if (modalOpen) return;
      void toggleStar();
    },
    queue: () => {
      if (modalOpen) return;
      void toggleQueued();
    },
    execute: () => {
      if (modalOpen) return;
      void runModal(executeDeletions);
    },
    info: () => {
      if (modalOpen) return;
      void runModal(showDetails);
    },
    refresh: () => {
      if (modalOpen) return;
      void refresh();
    },
    quit: () => {
      if (modalOpen) return;
      unsubscribe();
      screen.destroy();
      process.exit(0);
    },
  };

  screen.key(['up', 'k'], keyHandlers.up);
  screen.key(['down', 'j'], keyHandlers.down);
  screen.key(['/'], keyHandlers.search);
  screen.key(['f', 'F'], keyHandlers.filter);
  screen.key(['o', 'O'], keyHandlers.sort);
  screen.key(['s', 'S'], keyHandlers.star);
  screen.key(['space'], keyHandlers.queue);
  screen.key(['x', 'X'], keyHandlers.execute);
  screen.key(['i', 'I', 'enter'], keyHandlers.info);
  screen.key(['r', 'R'], keyHandlers.refresh);
  screen.key(['q', 'Q', 'C-c'], keyHandlers.quit);

  await refresh();
}
