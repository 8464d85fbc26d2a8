import { describe, it, expect } from 'vitest';
import {
  DEFAULT_VARIANT_VOCABULARY,
  detectVariants,
  extendVocabulary,
  extractBaseName,
  groupFamilies,
  isLiberatedModel,
  isSpecialVariant,
  isVariantTag,
  parseModelName,
} from './variant-detector.js';

describe('parseModelName', () => {
  it('should strip tuning and quantization segments from the tag', () => {
    expect(parseModelName('llama3:8b-instruct-q4_K_M')).toEqual({
      family: 'llama3',
      baseName: 'llama3:8b',
      variantTags: ['instruct', 'q4_k_m'],
    });
  });

  it('should default an untagged name to latest', () => {
    expect(parseModelName('llama3')).toEqual({ family: 'llama3', baseName: 'llama3:latest', variantTags: [] });
  });

  it('should map a tag made only of variant segments to latest', () => {
    expect(parseModelName('mistral:instruct')).toEqual({
      family: 'mistral',
      baseName: 'mistral:latest',
      variantTags: ['instruct'],
    });
  });

  it('should keep size and context segments wherever variants appear', () => {
    expect(extractBaseName('phi3:3.8b-mini-128k-instruct-q8_0')).toBe('phi3:3.8b-mini-128k');
    expect(extractBaseName('gemma2:9b-it-fp16')).toBe('gemma2:9b');
  });

  it('should lowercase the base name', () => {
    expect(extractBaseName('Llama3:8B')).toBe('llama3:8b');
  });
});

describe('isVariantTag', () => {
  it.each(['q4_0', 'q4_k_m', 'q8_0', 'iq3_xxs', 'fp16', 'f16', 'bf16', 'f32', 'instruct', 'it', 'qat'])(
    'should recognize %s',
    (segment) => {
      expect(isVariantTag(segment)).toBe(true);
    }
  );

  it.each(['8b', '70b', 'latest', 'mini', '128k', 'v2'])('should not treat %s as a variant', (segment) => {
    expect(isVariantTag(segment)).toBe(false);
  });
});

describe('isLiberatedModel', () => {
  it('should match liberation keywords anywhere in the name', () => {
    expect(isLiberatedModel('dolphin-mistral:7b-uncensored')).toBe(true);
    expect(isLiberatedModel('llama3-abliterated:8b')).toBe(true);
    expect(isLiberatedModel('Qwen-NSFW:7b')).toBe(true);
  });

  it('should not flag ordinary models', () => {
    expect(isLiberatedModel('llama3:8b')).toBe(false);
  });
});

describe('isSpecialVariant', () => {
  it('should be true only when a variant segment was removed', () => {
    expect(isSpecialVariant('qwen2:7b-q8_0')).toBe(true);
    expect(isSpecialVariant('qwen2:7b')).toBe(false);
  });
});

describe('groupFamilies', () => {
  it('should group by base name preserving input order', () => {
    const families = groupFamilies(['llama3:8b-q8_0', 'mistral:7b', 'llama3:8b', 'llama3:8b-instruct']);

    expect([...families.entries()]).toEqual([
      ['llama3:8b', ['llama3:8b-q8_0', 'llama3:8b', 'llama3:8b-instruct']],
      ['mistral:7b', ['mistral:7b']],
    ]);
  });
});

describe('detectVariants', () => {
  it('should flag every member of a multi-model family as duplicate', () => {
    const flags = detectVariants([
      { name: 'llama3:8b' },
      { name: 'llama3:8b-instruct-q4_K_M' },
      { name: 'mistral:7b' },
      { name: 'qwen2:7b-q8_0' },
    ]);

    expect(flags.get('llama3:8b')).toEqual({
      baseName: 'llama3:8b',
      variantTags: [],
      isLiberated: false,
      isDuplicate: true,
      isSpecialVariant: false,
    });
    expect(flags.get('llama3:8b-instruct-q4_K_M')).toEqual({
      baseName: 'llama3:8b',
      variantTags: ['instruct', 'q4_k_m'],
      isLiberated: false,
      isDuplicate: true,
      isSpecialVariant: true,
    });
    expect(flags.get('mistral:7b')?.isDuplicate).toBe(false);
    expect(flags.get('qwen2:7b-q8_0')).toEqual({
      baseName: 'qwen2:7b',
      variantTags: ['q8_0'],
      isLiberated: false,
      isDuplicate: false,
      isSpecialVariant: true,
    });
  });

  it('should pair a model with its quantized build', () => {
    const flags = detectVariants([{ name: 'llama3:8b' }, { name: 'llama3:8b-q4' }]);

    expect(flags.get('llama3:8b')?.isDuplicate).toBe(true);
    expect(flags.get('llama3:8b-q4')?.isDuplicate).toBe(true);
    expect(flags.get('llama3:8b-q4')?.baseName).toBe('llama3:8b');
  });

  it('should treat an untagged name and its latest tag as one family', () => {
    const flags = detectVariants([{ name: 'mistral' }, { name: 'mistral:latest' }]);

    expect(flags.get('mistral')?.isDuplicate).toBe(true);
    expect(flags.get('mistral:latest')?.isDuplicate).toBe(true);
  });

  it('should not flag a lone model', () => {
    expect(detectVariants([{ name: 'llama3:8b' }]).get('llama3:8b')?.isDuplicate).toBe(false);
  });
});

describe('extendVocabulary', () => {
  it('should add configured keywords and tags in lowercase', () => {
    const vocabulary = extendVocabulary(DEFAULT_VARIANT_VOCABULARY, ['Dolphin'], ['GGUF']);

    expect(isLiberatedModel('dolphin-mixtral:8x7b')).toBe(false);
    expect(isLiberatedModel('dolphin-mixtral:8x7b', vocabulary)).toBe(true);
    expect(parseModelName('custom:7b-gguf', vocabulary)).toEqual({
      family: 'custom',
      baseName: 'custom:7b',
      variantTags: ['gguf'],
    });
  });

  it('should leave the default vocabulary untouched', () => {
    extendVocabulary(DEFAULT_VARIANT_VOCABULARY, ['extra'], ['extra']);
    expect(DEFAULT_VARIANT_VOCABULARY.tuningMarkers).not.toContain('extra');
  });
});
