/**
 * Decides whether a string is worth sending to the translator
 */

import { TokenGuard } from '../core/tokenGuard';

// Skipped outright: numbers, technical codes, lone words, bare proper names
const SKIP_PATTERNS: RegExp[] = [
  /^[\d\s.,:+%-]+$/,
  /^[A-Z0-9_]+$/,
  /^\p{Ll}+$/u,
  /^\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+){0,3}$/u,
];

const SPECIAL_CHAR = /[^\p{L}\p{N}\s.,!?;:'"-]/gu;
const MAX_SPECIAL_RATIO = 0.3;
const PUNCTUATION = /[.!?,;:]/;

/**
 * @param maskedText - Text with protected tokens already replaced by sentinels
 * @param guard - Supplies the protected term list
 */
export function shouldTranslate(maskedText: string, guard: TokenGuard): boolean {
  const text = TokenGuard.stripSentinels(maskedText);
  if (text.length === 0) return false;

  if (SKIP_PATTERNS.some(pattern => pattern.test(text))) return false;
  if (guard.isProtectedTerm(text)) return false;

  const words = text.split(/\s+/);
  if (words.length < 2) return false;

  const specials = text.match(SPECIAL_CHAR)?.length ?? 0;
  if (specials > Array.from(text).length * MAX_SPECIAL_RATIO) return false;

  const hasPunctuation = PUNCTUATION.test(text);
  const hasMixedCase = /\p{Lu}/u.test(text) && text !== text.toUpperCase();

  return hasPunctuation || hasMixedCase;
}
