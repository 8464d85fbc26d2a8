import { ModelDetails, ModelRecord } from '../types/model-record.js';
import {
  DeleteFailed,
  InventoryUnavailable,
  ParseError,
  Result,
  errorMessage,
  fail,
  ok,
} from '../types/errors.js';
import { runCommand, CommandResult } from '../utils/process-utils.js';
import { parseListOutput, parseShowOutput } from './inventory-parser.js';
import { Logger, silentLogger } from './logger.js';

export interface InventorySnapshot {
  records: ModelRecord[];
  skipped: ParseError[];
  fetchedAt: Date;
}

/**
 * Narrow boundary to the external model runner.
 * The core never shells out directly, so tests can supply a fake.
 */
export interface InventoryAdapter {
  listModels(): Promise<Result<InventorySnapshot, InventoryUnavailable>>;
  getModelInfo(name: string): Promise<Result<ModelDetails, InventoryUnavailable>>;
  deleteModel(name: string): Promise<Result<void, DeleteFailed>>;
}

export interface RunnerAdapterOptions {
  binary: string;
  timeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Inventory adapter backed by the runner CLI (`list`, `show`, `rm`)
 */
export class RunnerInventoryAdapter implements InventoryAdapter {
  private binary: string;
  private timeoutMs: number;
  private logger: Logger;
  private now: () => Date;

  constructor(options: RunnerAdapterOptions) {
    this.binary = options.binary;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger || silentLogger;
    this.now = options.now || (() => new Date());
  }

  /**
   * List installed models. Unparsable rows are logged and skipped.
   */
  async listModels(): Promise<Result<InventorySnapshot, InventoryUnavailable>> {
    const result = await this.run(['list']);
    if (!result.ok) return result;

    const { exitCode, stdout } = result.value;
    if (exitCode !== 0) {
      return fail({ kind: 'inventory-unavailable', message: diagnostic(result.value, exitCode) });
    }

    const fetchedAt = this.now();
    const { records, skipped } = parseListOutput(stdout, fetchedAt);
    for (const failure of skipped) {
      this.logger.warn(`Skipped unreadable inventory row: ${failure.message}`, { line: failure.line });
    }
    this.logger.debug(`Listed ${records.length} models`, { skipped: skipped.length });

    return ok({ records, skipped, fetchedAt });
  }

  /**
   * Fetch details for one model. The template is best-effort.
   */
  async getModelInfo(name: string): Promise<Result<ModelDetails, InventoryUnavailable>> {
    const result = await this.run(['show', name]);
    if (!result.ok) return result;

    if (result.value.exitCode !== 0) {
      return fail({
        kind: 'inventory-unavailable',
        message: `Failed to get details for ${name}: ${diagnostic(result.value, result.value.exitCode)}`,
      });
    }

    const details = parseShowOutput(name, result.value.stdout);

    const template = await this.run(['show', '--template', name]);
    if (template.ok && template.value.exitCode === 0 && template.value.stdout.trim() !== '') {
      details.template = template.value.stdout.trim();
    } else {
      this.logger.debug(`No template available for ${name}`);
    }

    return ok(details);
  }

  /**
   * Delete one model. Diagnostics from the runner are surfaced verbatim.
   */
  async deleteModel(name: string): Promise<Result<void, DeleteFailed>> {
    const result = await this.run(['rm', name]);
    if (!result.ok) {
      return fail({ kind: 'delete-failed', name, reason: result.error.message });
    }

    if (result.value.exitCode !== 0) {
      return fail({ kind: 'delete-failed', name, reason: diagnostic(result.value, result.value.exitCode) });
    }

    return ok(undefined);
  }

  /**
   * Check the runner binary responds at all
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.run(['--version']);
    return result.ok && result.value.exitCode === 0;
  }

  private async run(args: string[]): Promise<Result<CommandResult, InventoryUnavailable>> {
    try {
      return ok(await runCommand(this.binary, args, this.timeoutMs));
    } catch (error) {
      this.logger.error(`Failed to run ${this.binary} ${args.join(' ')}`, { error: errorMessage(error) });
      return fail({ kind: 'inventory-unavailable', message: errorMessage(error) });
    }
  }
}

function diagnostic(result: CommandResult, exitCode: number): string {
  return result.stderr.trim() || result.stdout.trim() || `exit code ${exitCode}`;
}
