import { TextEncodingName } from '../core/types';

/**
 * Location of one string found by a format parser
 */
export interface ParsedString {
  offset: number;
  byteLength: number;
}

export interface OffsetAdjustment {
  bytes: Buffer;
  /** Entries that could not be shifted (overflowed the entry width, left the buffer or aliased the resized string) */
  violations: number;
}

/**
 * What the Reinjector needs to know about a file format
 */
export interface FormatDescriptor {
  readonly name: string;
  readonly extensions: readonly string[];
  /** Strings may grow or shrink without corrupting the file */
  readonly supportsSafeGrowth: boolean;
  /** Byte used to fill the unused tail of a slot */
  readonly padByte: number;
  /**
   * Patch structural offsets after the string at [slotStart, slotEnd) of an
   * already spliced buffer changed length by `delta`. Offsets at or after
   * `slotEnd` move; offsets strictly inside the old string cannot follow it
   * and are violations.
   */
  adjustOffsets?(bytes: Buffer, slotStart: number, slotEnd: number, delta: number): OffsetAdjustment;
}

/**
 * A registered format: predicate plus parser
 */
export interface FormatParser extends FormatDescriptor {
  detect(bytes: Buffer): boolean;
  /** @throws Error when the bytes do not follow the format */
  parse(bytes: Buffer, encoding: TextEncodingName): ParsedString[];
}
