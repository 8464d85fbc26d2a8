import blessed from 'blessed';

/**
 * Transparent overlay that blocks interaction with the screen behind a modal
 */
export function createOverlay(screen: blessed.Widgets.Screen): blessed.Widgets.BoxElement {
  return blessed.box({
    parent: screen,
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    style: {
      bg: 'gray',
      transparent: true,
    },
  });
}

function createDialog(
  screen: blessed.Widgets.Screen,
  title: string,
  borderColor: string
): blessed.Widgets.BoxElement {
  return blessed.box({
    parent: screen,
    top: 'center',
    left: 'center',
    width: '60%',
    height: 'shrink',
    border: { type: 'line' },
    style: {
      border: { fg: borderColor },
      fg: 'white',
    },
    tags: true,
    keys: true,
    label: ` ${title} `,
  });
}

/**
 * Ask the user to type 'yes'. Resolves false on anything else or escape.
 */
export function showConfirm(screen: blessed.Widgets.Screen, title: string, body: string): Promise<boolean> {
  return new Promise((resolve) => {
    const overlay = createOverlay(screen);
    const dialog = createDialog(screen, title, 'red');

    const text = `\n${body}\n`;
    const contentLines = text.split('\n').length;
    dialog.setContent(text);

    blessed.text({
      parent: dialog,
      top: contentLines,
      left: 2,
      content: `Type 'yes' to confirm:`,
      tags: true,
    });

    const input = blessed.textbox({
      parent: dialog,
      top: contentLines + 1,
      left: 2,
      right: 2,
      height: 3,
      inputOnFocus: true,
      border: { type: 'line' },
      style: {
        border: { fg: 'cyan' },
        focus: { border: { fg: 'green' } },
      },
    });

    const close = (confirmed: boolean) => {
      screen.remove(dialog);
      screen.remove(overlay);
      dialog.destroy();
      overlay.destroy();
      screen.render();
      resolve(confirmed);
    };

    input.on('submit', (value: string) => close(value.trim().toLowerCase() === 'yes'));
    input.on('cancel', () => close(false));

    input.focus();
    screen.render();
  });
}

/**
 * Single-line text prompt. Resolves null when cancelled.
 */
export function promptText(
  screen: blessed.Widgets.Screen,
  title: string,
  initial: string
): Promise<string | null> {
  return new Promise((resolve) => {
    const overlay = createOverlay(screen);
    const input = blessed.textbox({
      parent: screen,
      top: 'center',
      left: 'center',
      width: '50%',
      height: 3,
      inputOnFocus: true,
      border: { type: 'line' },
      label: ` ${title} `,
      style: {
        border: { fg: 'cyan' },
      },
    });
    input.setValue(initial);

    const close = (value: string | null) => {
      screen.remove(input);
      screen.remove(overlay);
      input.destroy();
      overlay.destroy();
      screen.render();
      resolve(value);
    };

    input.on('submit', (value: string) => close(value));
    input.on('cancel', () => close(null));

    input.focus();
    screen.render();
  });
}

/**
 * Informational or error message; any key closes it
 */
export function showMessage(
  screen: blessed.Widgets.Screen,
  title: string,
  body: string,
  borderColor: string = 'cyan'
): Promise<void> {
  return new Promise((resolve) => {
    const overlay = createOverlay(screen);
    const dialog = createDialog(screen, title, borderColor);
    dialog.setContent(`\n${body}\n\n  {gray-fg}Press any key to continue{/gray-fg}`);
    dialog.focus();
    screen.render();

    dialog.once('keypress', () => {
      screen.remove(dialog);
      screen.remove(overlay);
      dialog.destroy();
      overlay.destroy();
      screen.render();
      resolve();
    });
  });
}
