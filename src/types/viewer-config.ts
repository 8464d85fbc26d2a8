import { z } from 'zod';

export const RECENT_DAYS = 14;
export const OLD_DAYS = 30;
export const DEFAULT_COMMAND_TIMEOUT_MS = 15000;

// Filter thresholds
export const LARGE_MODEL_BYTES = 10 * 1024 ** 3;  // 'large' is strictly above
export const SMALL_MODEL_BYTES = 5 * 1024 ** 3;   // 'small' is strictly below
export const FREQUENT_USE_COUNT = 10;             // 'frequent' is strictly above
export const RECENT_USE_DAYS = 7;                 // 'recently-used' includes the 7th day

export const ViewerConfigSchema = z
  .object({
    version: z.string().default('1.0.0'),
    runnerBinary: z.string().min(1).default('ollama'),
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS),
    modelsDirectory: z.string().default(''), // Resolved at runtime when empty
    recentDays: z.number().int().positive().default(RECENT_DAYS),
    oldDays: z.number().int().positive().default(OLD_DAYS),
    extraLiberationKeywords: z.array(z.string().min(1)).default([]),
    extraVariantTags: z.array(z.string().min(1)).default([]),
    verboseLogging: z.boolean().default(false),
  })
  .refine((config) => config.oldDays > config.recentDays, {
    message: 'oldDays must be greater than recentDays',
    path: ['oldDays'],
  });

export type ViewerConfig = z.output<typeof ViewerConfigSchema>;

/**
 * Default viewer configuration
 */
export const DEFAULT_VIEWER_CONFIG: ViewerConfig = ViewerConfigSchema.parse({});
