/**
 * FileAnalyzer - classifies a file's text as Translated, PartiallyTranslated,
 * Untranslated or NoText from French and English indicator words
 */

import { UnsupportedFormatError } from '../core/errors';
import { Extractor } from '../core/extractor';
import { ClassificationStatus, FileClassification, TextSpan } from '../core/types';
import { log } from '../ipc/protocol';
import { countIndicators, IndicatorVocabulary, isEnglishWord, isFrenchWord, tokenizeWords } from './indicators';

export interface AnalysisThresholds {
  translatedMinFrenchRatio: number;
  translatedMaxEnglishRatio: number;
  partialMinRatio: number;
  /** Longest unknown trailing word still read as a cut-off fragment */
  truncationFragmentMaxLength: number;
}

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  translatedMinFrenchRatio: 0.6,
  translatedMaxEnglishRatio: 0.1,
  partialMinRatio: 0.1,
  truncationFragmentMaxLength: 3,
};

const TERMINATORS = new Set(['.', '!', '?', '…', ':', ';', '"', "'", ')', ']', '»', '」', '』']);

const NO_TEXT: FileClassification = {
  status: 'NoText',
  confidenceScore: 1,
  frenchIndicatorCount: 0,
  englishIndicatorCount: 0,
  totalWords: 0,
  suspectedTruncation: false,
};

export class FileAnalyzer {
  constructor(
    private extractor: Extractor,
    private vocabulary: IndicatorVocabulary,
    private thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS
  ) {}

  analyze(filePath: string, bytes: Buffer): FileClassification {
    let spans: TextSpan[];
    try {
      spans = this.extractor.extract(filePath, bytes, undefined, { minScore: 0 });
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        log(`[FileAnalyzer] ${error.message}`);
        return { ...NO_TEXT };
      }
      throw error;
    }

    return this.classifyTexts(spans.map(s => s.decodedText));
  }

  /**
   * Classify already extracted strings
   */
  classifyTexts(texts: string[]): FileClassification {
    const words = texts.flatMap(tokenizeWords);
    if (words.length === 0) {
      return { ...NO_TEXT };
    }

    const counts = countIndicators(words, this.vocabulary);
    const frenchRatio = counts.french / counts.total;
    const englishRatio = counts.english / counts.total;
    const { translatedMinFrenchRatio, translatedMaxEnglishRatio, partialMinRatio } = this.thresholds;

    let status: ClassificationStatus;
    let confidenceScore: number;
    if (frenchRatio >= translatedMinFrenchRatio && englishRatio <= translatedMaxEnglishRatio) {
      status = 'Translated';
      confidenceScore = frenchRatio;
    } else if (frenchRatio >= partialMinRatio && englishRatio >= partialMinRatio) {
      status = 'PartiallyTranslated';
      confidenceScore = 1 - Math.abs(frenchRatio - englishRatio);
    } else {
      status = 'Untranslated';
      confidenceScore = 1 - frenchRatio;
    }

    return {
      status,
      confidenceScore: Math.min(1, Math.max(0, confidenceScore)),
      frenchIndicatorCount: counts.french,
      englishIndicatorCount: counts.english,
      totalWords: counts.total,
      suspectedTruncation: texts.some(text => this.looksTruncated(text)),
    };
  }

  /**
   * A multi-word string that stops mid-word: no terminator, and a trailing
   * hyphen, replacement character or short unknown fragment
   */
  looksTruncated(text: string): boolean {
    const trimmed = text.trimEnd();
    const words = tokenizeWords(trimmed);
    if (words.length < 2) return false;

    const lastChar = Array.from(trimmed).pop() ?? '';
    if (TERMINATORS.has(lastChar)) return false;
    if (lastChar === '-' || lastChar === '�') return true;
    if (!/\p{L}$/u.test(trimmed)) return false;

    const lastWord = words[words.length - 1];
    const known = isFrenchWord(lastWord, this.vocabulary) || isEnglishWord(lastWord, this.vocabulary);
    return !known && Array.from(lastWord).length <= this.thresholds.truncationFragmentMaxLength;
  }
}
