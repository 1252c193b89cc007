/**
 * Offset-table string container
 *
 * Layout (little endian):
 *   0  "STBL"
 *   4  u8  offset width, 2 or 4
 *   5  u8  reserved
 *   6  u16 entry count
 *   8  count * width  absolute offsets to NUL-terminated strings
 */

import { TextEncodingName } from '../core/types';
import { FormatParser, OffsetAdjustment, ParsedString } from './types';

export const STRING_TABLE_MAGIC = Buffer.from('STBL', 'ascii');
export const STRING_TABLE_HEADER_SIZE = 8;

type OffsetWidth = 2 | 4;

interface TableHeader {
  width: OffsetWidth;
  count: number;
  tableEnd: number;
}

function readHeader(bytes: Buffer): TableHeader {
  if (bytes.length < STRING_TABLE_HEADER_SIZE || !bytes.subarray(0, 4).equals(STRING_TABLE_MAGIC)) {
    throw new Error('missing STBL header');
  }

  const rawWidth = bytes.readUInt8(4);
  if (rawWidth !== 2 && rawWidth !== 4) {
    throw new Error(`invalid offset width ${rawWidth}`);
  }

  const count = bytes.readUInt16LE(6);
  const tableEnd = STRING_TABLE_HEADER_SIZE + count * rawWidth;
  if (tableEnd > bytes.length) {
    throw new Error(`offset table of ${count} entries exceeds file size`);
  }

  return { width: rawWidth, count, tableEnd };
}

function readEntry(bytes: Buffer, header: TableHeader, i: number): number {
  const at = STRING_TABLE_HEADER_SIZE + i * header.width;
  return header.width === 2 ? bytes.readUInt16LE(at) : bytes.readUInt32LE(at);
}

function writeEntry(bytes: Buffer, header: TableHeader, i: number, value: number): void {
  const at = STRING_TABLE_HEADER_SIZE + i * header.width;
  if (header.width === 2) {
    bytes.writeUInt16LE(value, at);
  } else {
    bytes.writeUInt32LE(value, at);
  }
}

function maxEntryValue(width: OffsetWidth): number {
  return width === 2 ? 0xffff : 0xffffffff;
}

/**
 * Offsets stored in the table, in table order
 */
export function readStringTableOffsets(bytes: Buffer): number[] {
  const header = readHeader(bytes);
  return Array.from({ length: header.count }, (_, i) => readEntry(bytes, header, i));
}

export const stringTableFormat: FormatParser = {
  name: 'string-table',
  extensions: ['.tbl', '.stbl'],
  supportsSafeGrowth: true,
  padByte: 0x00,

  detect(bytes: Buffer): boolean {
    return bytes.length >= STRING_TABLE_HEADER_SIZE && bytes.subarray(0, 4).equals(STRING_TABLE_MAGIC);
  },

  parse(bytes: Buffer, _encoding: TextEncodingName): ParsedString[] {
    const header = readHeader(bytes);
    const offsets = new Set<number>();

    for (let i = 0; i < header.count; i++) {
      const offset = readEntry(bytes, header, i);
      if (offset < header.tableEnd || offset >= bytes.length) {
        throw new Error(`entry ${i} points outside the string area (${offset})`);
      }
      offsets.add(offset);
    }

    const strings: ParsedString[] = [];
    let lastEnd = -1;
    for (const offset of Array.from(offsets).sort((a, b) => a - b)) {
      const terminator = bytes.indexOf(0x00, offset);
      if (terminator < 0) {
        throw new Error(`string at ${offset} is not NUL-terminated`);
      }
      // Entries pointing into the middle of another string are aliases
      if (offset < lastEnd || terminator === offset) continue;

      strings.push({ offset, byteLength: terminator - offset });
      lastEnd = terminator;
    }

    return strings;
  },

  adjustOffsets(bytes: Buffer, slotStart: number, slotEnd: number, delta: number): OffsetAdjustment {
    const out = Buffer.from(bytes);
    const header = readHeader(out);
    const max = maxEntryValue(header.width);
    let violations = 0;

    for (let i = 0; i < header.count; i++) {
      const value = readEntry(out, header, i);
      // An alias into the resized string would point at unrelated bytes
      if (value > slotStart && value < slotEnd) {
        violations++;
        continue;
      }
      if (value < slotEnd) continue;

      const shifted = value + delta;
      if (shifted < 0 || shifted > max || shifted >= out.length) {
        violations++;
        continue;
      }
      writeEntry(out, header, i, shifted);
    }

    return { bytes: out, violations };
  },
};
