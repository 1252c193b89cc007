import * as fs from 'fs';
import * as path from 'path';
import { encodeText } from './encoding';
import { TokenRestoreError } from './errors';
import { ByteRange, TextEncodingName } from './types';

/**
 * Kinds of protected tokens, in matching priority order
 */
export type ProtectedTokenKind = 'control' | 'placeholder' | 'escape' | 'keyword' | 'term';

/**
 * Character range [start, end) of a protected token in the unmasked text
 */
export type CharRange = [start: number, end: number];

export interface ProtectedToken {
  kind: ProtectedTokenKind;
  original: string;
  start: number;
  end: number;
}

export interface MaskResult {
  maskedText: string;
  protectedRanges: CharRange[];
  /** Original token values, indexed by sentinel ordinal */
  originals: string[];
}

const SENTINEL_OPEN = '⟦';
const SENTINEL_CLOSE = '⟧';
const SENTINEL_PATTERN = /⟦(\d+)⟧/g;

const TOKEN_PATTERNS: Array<{ kind: Exclude<ProtectedTokenKind, 'term'>; pattern: RegExp }> = [
  // [VAR1], {F2 08 FF FF}, {NAME1}, <color=red>
  { kind: 'control', pattern: /\[[^\[\]\n]{1,64}\]|\{[^{}\n]{1,64}\}|<[^<>\n]{1,64}>/g },
  // %s, %5.2f, %1$d, %%
  { kind: 'placeholder', pattern: /%(?:\d+\$)?[-+0#]*(?:\d+|\*)?(?:\.(?:\d+|\*))?(?:hh|h|ll|l|L|z|j|t)?[diuoxXfFeEgGaAcspn%]/g },
  // Literal and real line breaks, tabs, dialogue brackets
  { kind: 'escape', pattern: /\\[nrt]|[\n\r\t「」『』]/g },
  // START, MSG_01, HP
  { kind: 'keyword', pattern: /\b[A-Z][A-Z0-9_]+\b/g },
];

const DEFAULT_TERMS_PATH = path.join(__dirname, '..', '..', 'data', 'protected-terms.json');

/**
 * Load the default proper noun / game term list
 */
export function loadDefaultProtectedTerms(filePath: string = DEFAULT_TERMS_PATH): string[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error(`Protected terms file ${filePath} must contain a JSON array`);
  }
  return parsed.filter((term): term is string => typeof term === 'string' && term.length > 0);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sentinel(index: number): string {
  return `${SENTINEL_OPEN}${index}${SENTINEL_CLOSE}`;
}

/**
 * Protects non-translatable sub-strings (control codes, placeholders, engine
 * keywords, proper nouns) by swapping them for sentinels before translation and
 * restoring them afterwards.
 *
 * @example
 * ```typescript
 * const guard = new TokenGuard(['Tartarus']);
 * const masked = guard.mask('Enter [NAME1] Tartarus now');
 * // masked.maskedText === 'Enter ⟦0⟧ ⟦1⟧ now'
 * guard.unmask('Entre ⟦0⟧ ⟦1⟧ maintenant', masked.protectedRanges, masked.originals);
 * // 'Entre [NAME1] Tartarus maintenant'
 * ```
 */
export class TokenGuard {
  private termPattern: RegExp | null;
  private terms: Set<string>;

  constructor(protectedTerms: Iterable<string> = []) {
    this.terms = new Set(Array.from(protectedTerms).filter(t => t.trim().length > 0));

    // Longest first so "Velvet Room" wins over "Velvet"
    const alternatives = Array.from(this.terms)
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);

    this.termPattern = alternatives.length > 0
      ? new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives.join('|')})(?![\\p{L}\\p{N}_])`, 'gu')
      : null;
  }

  /**
   * Checks if a text is exactly one of the configured terms
   */
  isProtectedTerm(text: string): boolean {
    return this.terms.has(text.trim());
  }

  /**
   * Find all protected tokens, non-overlapping and sorted by position.
   * On overlap the earlier pattern class wins.
   */
  findTokens(text: string): ProtectedToken[] {
    const tokens: ProtectedToken[] = [];
    const classes: Array<{ kind: ProtectedTokenKind; pattern: RegExp }> = [...TOKEN_PATTERNS];
    if (this.termPattern) {
      classes.push({ kind: 'term', pattern: this.termPattern });
    }

    for (const { kind, pattern } of classes) {
      const regex = new RegExp(pattern.source, pattern.flags);
      let match: RegExpExecArray | null;
      while ((match = regex.exec(text)) !== null) {
        const start = match.index;
        const end = start + match[0].length;
        if (end === start) {
          regex.lastIndex++;
          continue;
        }
        const overlaps = tokens.some(t => start < t.end && end > t.start);
        if (!overlaps) {
          tokens.push({ kind, original: match[0], start, end });
        }
      }
    }

    return tokens.sort((a, b) => a.start - b.start);
  }

  /**
   * Replace each protected token with a numbered sentinel
   */
  mask(text: string): MaskResult {
    const tokens = this.findTokens(text);
    if (tokens.length === 0) {
      return { maskedText: text, protectedRanges: [], originals: [] };
    }

    let maskedText = '';
    let lastEnd = 0;
    tokens.forEach((token, i) => {
      maskedText += text.slice(lastEnd, token.start) + sentinel(i);
      lastEnd = token.end;
    });
    maskedText += text.slice(lastEnd);

    return {
      maskedText,
      protectedRanges: tokens.map(t => [t.start, t.end]),
      originals: tokens.map(t => t.original),
    };
  }

  /**
   * Put the original tokens back in place of their sentinels.
   * @throws TokenRestoreError when a sentinel was dropped, duplicated or invented
   */
  unmask(translatedText: string, protectedRanges: CharRange[], originals: string[]): string {
    if (protectedRanges.length !== originals.length) {
      throw new TokenRestoreError(
        protectedRanges.length,
        originals.length,
        `Protected range count ${protectedRanges.length} does not match ${originals.length} recorded values`
      );
    }

    const found = Array.from(translatedText.matchAll(SENTINEL_PATTERN), m => Number(m[1]));
    if (found.length !== originals.length) {
      throw new TokenRestoreError(originals.length, found.length);
    }

    const seen = new Set(found);
    if (seen.size !== found.length || found.some(n => n >= originals.length)) {
      throw new TokenRestoreError(
        originals.length,
        found.length,
        `Protected token sentinels were duplicated or renumbered: ${found.join(', ')}`
      );
    }

    return translatedText.replace(SENTINEL_PATTERN, (match, n: string) => originals[Number(n)] ?? match);
  }

  /**
   * Protected token ranges expressed as byte offsets in the encoded text
   */
  protectedByteRanges(text: string, encoding: TextEncodingName): ByteRange[] {
    return this.findTokens(text).map(token => {
      const start = encodeText(text.slice(0, token.start), encoding).length;
      const end = start + encodeText(token.original, encoding).length;
      return [start, end];
    });
  }

  /**
   * Remove sentinels from masked text, leaving only translatable words
   */
  static stripSentinels(maskedText: string): string {
    return maskedText.replace(SENTINEL_PATTERN, ' ').replace(/\s+/g, ' ').trim();
  }
}
