import { CapabilityTag } from '../types/enriched-model.js';

/**
 * Keyword table: a name containing any keyword (case-insensitive) gets the tag.
 * 'text' is not listed because every model carries it.
 */
export const CAPABILITY_KEYWORDS: ReadonlyArray<readonly [CapabilityTag, readonly string[]]> = [
  ['vision', ['vision', 'vl', 'visual', 'llava', 'clip']],
  ['code', ['code', 'coder', 'coding']],
  ['embeddings', ['embed']],
  ['tools', ['tool', 'function', 'agent']],
  ['reasoning', ['r1', 'reasoning', 'think']],
];

/**
 * Derive capability tags from a model name.
 * Always non-empty; 'text' comes first, the rest follow table order.
 */
export function classifyCapabilities(
  modelName: string,
  table: ReadonlyArray<readonly [CapabilityTag, readonly string[]]> = CAPABILITY_KEYWORDS
): CapabilityTag[] {
  const nameLower = modelName.toLowerCase();
  const tags: CapabilityTag[] = ['text'];

  for (const [tag, keywords] of table) {
    if (tags.includes(tag)) continue;
    if (keywords.some((keyword) => nameLower.includes(keyword))) {
      tags.push(tag);
    }
  }

  return tags;
}
