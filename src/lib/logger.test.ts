import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConsoleLogger } from './logger.js';

describe('ConsoleLogger', () => {
  let tempDir: string;
  let logFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modelshelf-logs-'));
    logFile = path.join(tempDir, 'logs', 'modelshelf.log');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should print warnings to stderr and skip debug lines by default', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(false, logFile);

    logger.debug('hidden');
    logger.warn('Inventory refresh failed', { attempt: 2 });

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(String(consoleError.mock.calls[0][0])).toContain('Inventory refresh failed');
  });

  it('should append JSON lines in verbose mode', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(true, logFile);

    logger.info('Deleted llava:13b');
    logger.debug('Listed 4 models', { skipped: 0 });
    await logger.flush();

    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n').map((line) => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 'info', message: 'Deleted llava:13b' });
    expect(lines[1]).toMatchObject({ level: 'debug', message: 'Listed 4 models', context: { skipped: 0 } });
  });

  it('should keep the console quiet when echo is off', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(true, logFile, false);

    logger.error('Failed to delete x');
    await logger.flush();

    expect(consoleError).not.toHaveBeenCalled();
    expect(await fs.readFile(logFile, 'utf-8')).toContain('Failed to delete x');
  });
});
