import * as iconv from 'iconv-lite';
import { TextEncodingName } from './types';

export const SUPPORTED_ENCODINGS: readonly TextEncodingName[] = ['utf8', 'latin1', 'shift_jis'];

/**
 * A printable run found by scanPrintableRuns
 */
export interface PrintableRun {
  offset: number;
  byteLength: number;
  text: string;
}

/**
 * Result of fitting a string into a byte budget
 */
export interface TruncatedText {
  bytes: Buffer;
  text: string;
  truncated: boolean;
}

interface DecodedChar {
  codePoint: number;
  length: number;
}

export function encodeText(text: string, encoding: TextEncodingName): Buffer {
  if (encoding === 'utf8') {
    return Buffer.from(text, 'utf8');
  }
  return iconv.encode(text, encoding);
}

export function decodeText(bytes: Buffer, encoding: TextEncodingName): string {
  if (encoding === 'utf8') {
    return bytes.toString('utf8');
  }
  return iconv.decode(bytes, encoding);
}

/**
 * Shift_JIS lead byte of a double-byte character
 */
function isSjisLead(byte: number): boolean {
  return (byte >= 0x81 && byte <= 0x9f) || (byte >= 0xe0 && byte <= 0xfc);
}

function isSjisTrail(byte: number): boolean {
  return (byte >= 0x40 && byte <= 0x7e) || (byte >= 0x80 && byte <= 0xfc);
}

/**
 * Decode one UTF-8 character at `index`, rejecting overlong forms, surrogates
 * and truncated sequences
 */
function readUtf8Char(bytes: Buffer, index: number): DecodedChar | null {
  const b0 = bytes[index];
  if (b0 < 0x80) return { codePoint: b0, length: 1 };

  let length: number;
  let codePoint: number;
  let min: number;
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    length = 2; codePoint = b0 & 0x1f; min = 0x80;
  } else if (b0 >= 0xe0 && b0 <= 0xef) {
    length = 3; codePoint = b0 & 0x0f; min = 0x800;
  } else if (b0 >= 0xf0 && b0 <= 0xf4) {
    length = 4; codePoint = b0 & 0x07; min = 0x10000;
  } else {
    return null;
  }

  if (index + length > bytes.length) return null;

  for (let i = 1; i < length; i++) {
    const b = bytes[index + i];
    if ((b & 0xc0) !== 0x80) return null;
    codePoint = (codePoint << 6) | (b & 0x3f);
  }

  if (codePoint < min || codePoint > 0x10ffff) return null;
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return null;

  return { codePoint, length };
}

function readSjisChar(bytes: Buffer, index: number): DecodedChar | null {
  const b0 = bytes[index];
  if (b0 < 0x80) return { codePoint: b0, length: 1 };
  // Half-width katakana
  if (b0 >= 0xa1 && b0 <= 0xdf) return { codePoint: 0xff61 + (b0 - 0xa1), length: 1 };
  if (!isSjisLead(b0) || index + 1 >= bytes.length) return null;

  const b1 = bytes[index + 1];
  if (!isSjisTrail(b1)) return null;

  const decoded = iconv.decode(bytes.subarray(index, index + 2), 'shift_jis');
  const codePoint = decoded.codePointAt(0);
  if (codePoint === undefined) return null;
  return { codePoint, length: 2 };
}

function readChar(bytes: Buffer, index: number, encoding: TextEncodingName): DecodedChar | null {
  switch (encoding) {
    case 'utf8':
      return readUtf8Char(bytes, index);
    case 'shift_jis':
      return readSjisChar(bytes, index);
    case 'latin1':
      return { codePoint: bytes[index], length: 1 };
  }
}

function isPrintable(codePoint: number): boolean {
  if (codePoint < 0x20 || codePoint === 0x7f) return false;
  if (codePoint >= 0x80 && codePoint < 0xa0) return false;
  return codePoint !== 0xfffd;
}

/**
 * Check that `index` does not fall inside a multi-byte character
 */
export function isCharBoundary(bytes: Buffer, index: number, encoding: TextEncodingName): boolean {
  if (index <= 0 || index >= bytes.length) return true;

  switch (encoding) {
    case 'latin1':
      return true;
    case 'utf8':
      return (bytes[index] & 0xc0) !== 0x80;
    case 'shift_jis': {
      // Trail bytes overlap the ASCII range, so walk from the start
      let i = 0;
      while (i < index) {
        i += isSjisLead(bytes[i]) ? 2 : 1;
      }
      return i === index;
    }
  }
}

/**
 * Check that the last character of `bytes` is complete
 */
export function endsOnCharBoundary(bytes: Buffer, encoding: TextEncodingName): boolean {
  if (bytes.length === 0) return true;

  switch (encoding) {
    case 'latin1':
      return true;
    case 'utf8': {
      let start = bytes.length - 1;
      while (start > 0 && bytes.length - start < 4 && (bytes[start] & 0xc0) === 0x80) {
        start--;
      }
      const lead = bytes[start];
      if ((lead & 0xc0) === 0x80) return false;
      const expected = lead < 0x80 ? 1 : lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : 2;
      return start + expected === bytes.length;
    }
    case 'shift_jis': {
      let i = 0;
      while (i < bytes.length) {
        i += isSjisLead(bytes[i]) ? 2 : 1;
      }
      return i === bytes.length;
    }
  }
}

/**
 * Keep the longest prefix of whole characters whose encoding fits in `maxBytes`
 */
export function truncateToBytes(text: string, maxBytes: number, encoding: TextEncodingName): TruncatedText {
  const full = encodeText(text, encoding);
  if (full.length <= maxBytes) {
    return { bytes: full, text, truncated: false };
  }

  let kept = '';
  let used = 0;
  for (const char of text) {
    const size = encodeText(char, encoding).length;
    if (used + size > maxBytes) break;
    kept += char;
    used += size;
  }

  return { bytes: encodeText(kept, encoding), text: kept, truncated: true };
}

/**
 * Find maximal runs of printable characters of at least `minChars` characters.
 * Runs are returned in ascending offset order.
 */
export function scanPrintableRuns(bytes: Buffer, encoding: TextEncodingName, minChars: number): PrintableRun[] {
  const runs: PrintableRun[] = [];
  let runStart = -1;
  let runChars = 0;
  let i = 0;

  const closeRun = (end: number) => {
    if (runStart >= 0 && runChars >= minChars) {
      const slice = bytes.subarray(runStart, end);
      runs.push({ offset: runStart, byteLength: end - runStart, text: decodeText(slice, encoding) });
    }
    runStart = -1;
    runChars = 0;
  };

  while (i < bytes.length) {
    const char = readChar(bytes, i, encoding);
    if (char && isPrintable(char.codePoint)) {
      if (runStart < 0) runStart = i;
      runChars++;
      i += char.length;
    } else {
      closeRun(i);
      i += 1;
    }
  }
  closeRun(bytes.length);

  return runs;
}

export function isSupportedEncoding(value: string): value is TextEncodingName {
  return SUPPORTED_ENCODINGS.some(encoding => encoding === value);
}
