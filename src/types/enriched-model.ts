import { ModelRecord } from './model-record.js';

export const CAPABILITY_TAGS = ['text', 'vision', 'code', 'embeddings', 'tools', 'reasoning'] as const;
export type CapabilityTag = (typeof CAPABILITY_TAGS)[number];

export type AgeCategory = 'recent' | 'moderate' | 'old';

export const FILTER_SELECTORS = [
  'all',
  'recent',
  'moderate',
  'old',
  'starred',
  'liberated',
  'queued',
  'duplicates',
  'variants',
  'used',
  'unused',
  'large',
  'small',
  'frequent',
  'recently-used',
] as const;
export type FilterSelector = (typeof FILTER_SELECTORS)[number];

export const SORT_KEYS = ['name', 'size', 'modified'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export interface UsageInfo {
  count: number;
  lastUsed?: Date;
  firstUsed?: Date;
  totalTokens?: number;
  avgResponseTimeMs?: number;
}

/**
 * Model record with derived annotations and store overlays
 */
export interface EnrichedModel extends ModelRecord {
  capabilities: CapabilityTag[];  // Never empty, always contains 'text'
  ageCategory: AgeCategory;
  ageDays: number;
  baseName: string;
  isLiberated: boolean;
  isDuplicate: boolean;
  isSpecialVariant: boolean;
  isStarred: boolean;
  isQueuedForDeletion: boolean;
  usageInfo?: UsageInfo;
  lastUsedDays?: number;          // Whole days since usageInfo.lastUsed
}

export interface ViewQuery {
  search: string;
  filter: FilterSelector;
  sort: SortKey;
}

export const DEFAULT_VIEW_QUERY: ViewQuery = {
  search: '',
  filter: 'all',
  sort: 'name',
};

export function isFilterSelector(value: string): value is FilterSelector {
  const selectors: readonly string[] = FILTER_SELECTORS;
  return selectors.includes(value);
}

export function isSortKey(value: string): value is SortKey {
  const keys: readonly string[] = SORT_KEYS;
  return keys.includes(value);
}
