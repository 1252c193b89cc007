/**
 * PM1 message container
 *
 * Layout (little endian):
 *   0   "PM1\0"
 *   4   u32 version
 *   8   u32 data offset (>= 16)
 *   12  u32 padding
 *   data offset..end  NUL-delimited strings
 *
 * There is no offset table; strings are found by their delimiters, so they may
 * change length freely.
 */

import { scanPrintableRuns } from '../core/encoding';
import { TextEncodingName } from '../core/types';
import { FormatParser, ParsedString } from './types';

export const PM1_MAGIC = Buffer.from('PM1\0', 'latin1');
export const PM1_HEADER_SIZE = 16;

// Tab, line feed and carriage return may appear inside dialogue
const LINE_CONTROLS = new Set([0x09, 0x0a, 0x0d]);

/**
 * True when the segment is printable text, line controls allowed
 */
function isTextSegment(segment: Buffer, encoding: TextEncodingName): boolean {
  let hasText = false;
  let start = 0;

  for (let i = 0; i <= segment.length; i++) {
    if (i < segment.length && !LINE_CONTROLS.has(segment[i])) continue;

    const piece = segment.subarray(start, i);
    if (piece.length > 0) {
      const runs = scanPrintableRuns(piece, encoding, 1);
      if (runs.length !== 1 || runs[0].byteLength !== piece.length) return false;
      hasText = true;
    }
    start = i + 1;
  }

  return hasText;
}

export function readPm1DataOffset(bytes: Buffer): number {
  if (bytes.length < PM1_HEADER_SIZE || !bytes.subarray(0, 4).equals(PM1_MAGIC)) {
    throw new Error('missing PM1 header');
  }
  const dataOffset = bytes.readUInt32LE(8);
  if (dataOffset < PM1_HEADER_SIZE || dataOffset > bytes.length) {
    throw new Error(`invalid data offset ${dataOffset}`);
  }
  return dataOffset;
}

export const pm1Format: FormatParser = {
  name: 'pm1',
  extensions: ['.pm1'],
  supportsSafeGrowth: true,
  padByte: 0x00,

  detect(bytes: Buffer): boolean {
    return bytes.length >= PM1_HEADER_SIZE && bytes.subarray(0, 4).equals(PM1_MAGIC);
  },

  parse(bytes: Buffer, encoding: TextEncodingName): ParsedString[] {
    const dataOffset = readPm1DataOffset(bytes);
    const strings: ParsedString[] = [];

    let start = dataOffset;
    while (start < bytes.length) {
      let end = bytes.indexOf(0x00, start);
      if (end < 0) end = bytes.length;

      // Binary segments between strings are skipped
      if (end > start && isTextSegment(bytes.subarray(start, end), encoding)) {
        strings.push({ offset: start, byteLength: end - start });
      }
      start = end + 1;
    }

    return strings;
  },
};
