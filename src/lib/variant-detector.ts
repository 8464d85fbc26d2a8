/**
 * Name-pattern heuristics for liberated variants, base-name families and
 * special (quantized / tuned) variants. All vocabulary lives in tables so it
 * can be extended from configuration without touching control flow.
 */

export interface VariantVocabulary {
  /** Substrings that mark a model as uncensored / abliterated */
  liberationKeywords: readonly string[];
  /** Tag segments that denote a quantization level */
  quantizationPatterns: readonly RegExp[];
  /** Tag segments that denote a tuning or packaging variant */
  tuningMarkers: readonly string[];
}

export const LIBERATION_KEYWORDS: readonly string[] = [
  'uncensored',
  'abliterated',
  'unfiltered',
  'unleashed',
  'unlocked',
  'nsfw',
  'libre',
];

export const QUANTIZATION_PATTERNS: readonly RegExp[] = [
  /^q\d+(_[0-9a-z]+)*$/,  // q4, q4_0, q4_k_m, q8_0
  /^iq\d+(_[0-9a-z]+)*$/, // iq3_xxs
  /^(fp|f|bf)(16|32)$/,   // fp16, f16, bf16, f32
];

export const TUNING_MARKERS: readonly string[] = [
  'instruct',
  'chat',
  'text',
  'base',
  'it',
  'sft',
  'dpo',
  'rlhf',
  'ift',
  'qat',
];

export const DEFAULT_VARIANT_VOCABULARY: VariantVocabulary = {
  liberationKeywords: LIBERATION_KEYWORDS,
  quantizationPatterns: QUANTIZATION_PATTERNS,
  tuningMarkers: TUNING_MARKERS,
};

/**
 * Add user-configured keywords and tuning markers to a vocabulary
 */
export function extendVocabulary(
  vocabulary: VariantVocabulary,
  extraLiberationKeywords: readonly string[] = [],
  extraVariantTags: readonly string[] = []
): VariantVocabulary {
  return {
    liberationKeywords: [
      ...vocabulary.liberationKeywords,
      ...extraLiberationKeywords.map((keyword) => keyword.toLowerCase()),
    ],
    quantizationPatterns: vocabulary.quantizationPatterns,
    tuningMarkers: [...vocabulary.tuningMarkers, ...extraVariantTags.map((tag) => tag.toLowerCase())],
  };
}

export interface ParsedModelName {
  family: string;         // Part before the first ':'
  baseName: string;       // family:tag with variant segments removed
  variantTags: string[];  // Removed segments, in order
}

export interface VariantFlags {
  baseName: string;
  variantTags: string[];
  isLiberated: boolean;
  isDuplicate: boolean;
  isSpecialVariant: boolean;
}

export function isVariantTag(segment: string, vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY): boolean {
  return (
    vocabulary.tuningMarkers.includes(segment) ||
    vocabulary.quantizationPatterns.some((pattern) => pattern.test(segment))
  );
}

/**
 * Split a runner name into family, base name and variant tags.
 *
 * The tag (after the first ':') is split on '-' and every segment matching the
 * vocabulary is removed wherever it appears; a tag left empty becomes 'latest',
 * which is what the runner assumes for an untagged name.
 *
 * @example parseModelName('llama3:8b-instruct-q4_K_M') → base 'llama3:8b', tags ['instruct', 'q4_k_m']
 */
export function parseModelName(
  modelName: string,
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): ParsedModelName {
  const nameLower = modelName.trim().toLowerCase();
  const colonIndex = nameLower.indexOf(':');
  const family = colonIndex >= 0 ? nameLower.slice(0, colonIndex) : nameLower;
  const tag = colonIndex >= 0 ? nameLower.slice(colonIndex + 1) : '';

  const kept: string[] = [];
  const variantTags: string[] = [];
  for (const segment of tag.split('-')) {
    if (segment === '') continue;
    if (isVariantTag(segment, vocabulary)) {
      variantTags.push(segment);
    } else {
      kept.push(segment);
    }
  }

  return {
    family,
    baseName: `${family}:${kept.length > 0 ? kept.join('-') : 'latest'}`,
    variantTags,
  };
}

export function extractBaseName(
  modelName: string,
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): string {
  return parseModelName(modelName, vocabulary).baseName;
}

export function isLiberatedModel(
  modelName: string,
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): boolean {
  const nameLower = modelName.toLowerCase();
  return vocabulary.liberationKeywords.some((keyword) => nameLower.includes(keyword));
}

export function isSpecialVariant(
  modelName: string,
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): boolean {
  return parseModelName(modelName, vocabulary).variantTags.length > 0;
}

/**
 * Group model names by base name, preserving input order within each family
 */
export function groupFamilies(
  modelNames: readonly string[],
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): Map<string, string[]> {
  const families = new Map<string, string[]>();
  for (const name of modelNames) {
    const baseName = extractBaseName(name, vocabulary);
    const members = families.get(baseName);
    if (members) {
      members.push(name);
    } else {
      families.set(baseName, [name]);
    }
  }
  return families;
}

/**
 * Flag every model in an inventory. Duplicate detection is relational:
 * all members of a family with two or more models are flagged, none is primary.
 */
export function detectVariants(
  models: ReadonlyArray<{ name: string }>,
  vocabulary: VariantVocabulary = DEFAULT_VARIANT_VOCABULARY
): Map<string, VariantFlags> {
  const parsed = models.map((model) => ({ name: model.name, ...parseModelName(model.name, vocabulary) }));

  const familySizes = new Map<string, number>();
  for (const entry of parsed) {
    familySizes.set(entry.baseName, (familySizes.get(entry.baseName) ?? 0) + 1);
  }

  const flags = new Map<string, VariantFlags>();
  for (const entry of parsed) {
    flags.set(entry.name, {
      baseName: entry.baseName,
      variantTags: entry.variantTags,
      isLiberated: isLiberatedModel(entry.name, vocabulary),
      isDuplicate: (familySizes.get(entry.baseName) ?? 0) > 1,
      isSpecialVariant: entry.variantTags.length > 0,
    });
  }

  return flags;
}
