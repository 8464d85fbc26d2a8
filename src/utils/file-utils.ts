import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

/**
 * Node error code (ENOENT, EEXIST, ...) of a thrown value, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
  } catch (error) {
    // Ignore error if directory already exists
    if (errnoCode(error) !== 'EEXIST') {
      throw error;
    }
  }
}

/**
 * Write a file atomically (write to temp, then rename).
 * The temp file sits next to the target so the rename never crosses devices.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Write JSON to a file atomically.
 * Serialization happens before any file is touched.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const content = JSON.stringify(data, null, 2) + '\n';
  await writeFileAtomic(filePath, content);
}

/**
 * Read and parse JSON file
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Read a text file, returning null when it does not exist
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the modelshelf config directory (~/.modelshelf)
 */
export function getConfigDir(): string {
  return process.env.MODELSHELF_HOME || path.join(os.homedir(), '.modelshelf');
}

/**
 * Get the logs directory (~/.modelshelf/logs)
 */
export function getLogsDir(): string {
  return path.join(getConfigDir(), 'logs');
}

/**
 * Get the usage store document path
 */
export function getUsagePath(): string {
  return path.join(getConfigDir(), 'usage.json');
}

/**
 * Get the runner's model store directory ($OLLAMA_MODELS or ~/.ollama/models)
 */
export function getDefaultModelsDir(): string {
  return process.env.OLLAMA_MODELS || path.join(os.homedir(), '.ollama', 'models');
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandHome(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
