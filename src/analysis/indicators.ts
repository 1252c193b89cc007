/**
 * Language indicator vocabularies and text scoring
 *
 * Vocabularies are loaded from data/indicators.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const VocabularyFileSchema = z.object({
  frenchAccents: z.string(),
  french: z.array(z.string()),
  english: z.array(z.string()),
});

export interface IndicatorVocabulary {
  frenchAccents: Set<string>;
  french: Set<string>;
  english: Set<string>;
}

export interface IndicatorCounts {
  french: number;
  english: number;
  total: number;
}

const DEFAULT_VOCABULARY_PATH = path.join(__dirname, '..', '..', 'data', 'indicators.json');

let defaultVocabulary: IndicatorVocabulary | null = null;

export function loadVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): IndicatorVocabulary {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed = VocabularyFileSchema.parse(JSON.parse(content));

  return {
    frenchAccents: new Set(Array.from(parsed.frenchAccents)),
    french: new Set(parsed.french.map(w => w.toLowerCase())),
    english: new Set(parsed.english.map(w => w.toLowerCase())),
  };
}

/**
 * Bundled vocabulary, loaded once
 */
export function getDefaultVocabulary(): IndicatorVocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = loadVocabulary();
  }
  return defaultVocabulary;
}

/**
 * Maximal letter runs, lower-cased
 */
export function tokenizeWords(text: string): string[] {
  return Array.from(text.matchAll(/\p{L}+/gu), m => m[0].toLowerCase());
}

export function isFrenchWord(word: string, vocabulary: IndicatorVocabulary): boolean {
  if (vocabulary.french.has(word)) return true;
  for (const char of word) {
    if (vocabulary.frenchAccents.has(char)) return true;
  }
  return false;
}

export function isEnglishWord(word: string, vocabulary: IndicatorVocabulary): boolean {
  return vocabulary.english.has(word);
}

export function countIndicators(words: string[], vocabulary: IndicatorVocabulary): IndicatorCounts {
  let french = 0;
  let english = 0;
  for (const word of words) {
    if (isFrenchWord(word, vocabulary)) {
      french++;
    } else if (isEnglishWord(word, vocabulary)) {
      english++;
    }
  }
  return { french, english, total: words.length };
}

/**
 * Likelihood (0..1) that a printable run is natural-language text:
 * 70% share of indicator words, 30% share of letters
 */
export function scoreText(text: string, vocabulary: IndicatorVocabulary): number {
  const chars = Array.from(text);
  if (chars.length === 0) return 0;

  const words = tokenizeWords(text);
  const counts = countIndicators(words, vocabulary);
  const indicatorRatio = counts.total > 0 ? (counts.french + counts.english) / counts.total : 0;
  const letters = chars.filter(c => /\p{L}/u.test(c)).length;
  const letterRatio = letters / chars.length;

  return 0.7 * indicatorRatio + 0.3 * letterRatio;
}
