import * as path from 'path';
import { ViewerConfig, ViewerConfigSchema, DEFAULT_VIEWER_CONFIG } from '../types/viewer-config.js';
import {
  ensureDir,
  writeJsonAtomic,
  readJson,
  fileExists,
  getConfigDir,
  getDefaultModelsDir,
} from '../utils/file-utils.js';

export class ConfigManager {
  private configDir: string;
  private configPath: string;

  constructor(configDir: string = getConfigDir()) {
    this.configDir = configDir;
    this.configPath = path.join(configDir, 'config.json');
  }

  /**
   * Create the config directory and a default config file if missing
   */
  async initialize(): Promise<void> {
    await ensureDir(this.configDir);

    if (!(await fileExists(this.configPath))) {
      await this.saveConfig({
        ...DEFAULT_VIEWER_CONFIG,
        modelsDirectory: getDefaultModelsDir(),
      });
    }
  }

  /**
   * Load and validate the viewer configuration. Missing keys take defaults.
   */
  async loadConfig(): Promise<ViewerConfig> {
    await this.initialize();

    const parsed = ViewerConfigSchema.safeParse(await readJson(this.configPath));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new Error(`Invalid configuration in ${this.configPath}\n  ${issues.join('\n  ')}`);
    }

    const config = parsed.data;
    return { ...config, modelsDirectory: config.modelsDirectory || getDefaultModelsDir() };
  }

  async saveConfig(config: ViewerConfig): Promise<void> {
    await ensureDir(this.configDir);
    await writeJsonAtomic(this.configPath, config);
  }

  /**
   * Apply partial changes, validating the merged result before saving
   */
  async updateConfig(updates: Partial<ViewerConfig>): Promise<ViewerConfig> {
    const current = await this.loadConfig();
    const parsed = ViewerConfigSchema.safeParse({ ...current, ...updates });
    if (!parsed.success) {
      throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    await this.saveConfig(parsed.data);
    return parsed.data;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

// Export singleton instance
export const configManager = new ConfigManager();
