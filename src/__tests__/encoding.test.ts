/**
 * Tests for byte-level text helpers
 */

import {
  decodeText,
  encodeText,
  endsOnCharBoundary,
  isCharBoundary,
  isSupportedEncoding,
  scanPrintableRuns,
  truncateToBytes,
} from '../core/encoding';

describe('encoding', () => {
  describe('encodeText / decodeText', () => {
    it('should encode Shift_JIS as two bytes per kana', () => {
      const bytes = encodeText('こんにちは', 'shift_jis');
      expect(bytes.length).toBe(10);
      expect(decodeText(bytes, 'shift_jis')).toBe('こんにちは');
    });

    it('should encode latin1 accents as one byte', () => {
      expect(encodeText('café', 'latin1')).toEqual(Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    });
  });

  describe('truncateToBytes', () => {
    it('should return the text unchanged when it fits', () => {
      const result = truncateToBytes('abc', 10, 'utf8');
      expect(result.truncated).toBe(false);
      expect(result.text).toBe('abc');
    });

    it('should never split a UTF-8 character', () => {
      const result = truncateToBytes('héllo', 2, 'utf8');
      expect(result.text).toBe('h');
      expect(result.bytes.length).toBe(1);
      expect(result.truncated).toBe(true);
    });

    it('should never split a Shift_JIS character', () => {
      const result = truncateToBytes('こんにちは', 5, 'shift_jis');
      expect(result.text).toBe('こん');
      expect(result.bytes.length).toBe(4);
    });

    it('should keep every prefix on a character boundary', () => {
      const text = 'Épée légendaire';
      for (let max = 0; max <= Buffer.byteLength(text); max++) {
        const { bytes, text: kept } = truncateToBytes(text, max, 'utf8');
        expect(bytes.length).toBeLessThanOrEqual(max);
        expect(endsOnCharBoundary(bytes, 'utf8')).toBe(true);
        expect(text.startsWith(kept)).toBe(true);
      }
    });
  });

  describe('isCharBoundary', () => {
    it('should detect UTF-8 continuation bytes', () => {
      const bytes = Buffer.from('aé', 'utf8');
      expect(isCharBoundary(bytes, 1, 'utf8')).toBe(true);
      expect(isCharBoundary(bytes, 2, 'utf8')).toBe(false);
    });

    it('should detect Shift_JIS trail bytes', () => {
      const bytes = Buffer.from([0x82, 0xa0, 0x41]);
      expect(isCharBoundary(bytes, 1, 'shift_jis')).toBe(false);
      expect(isCharBoundary(bytes, 2, 'shift_jis')).toBe(true);
    });
  });

  describe('endsOnCharBoundary', () => {
    it('should reject a dangling UTF-8 lead byte', () => {
      expect(endsOnCharBoundary(Buffer.from([0x61, 0xc3]), 'utf8')).toBe(false);
      expect(endsOnCharBoundary(Buffer.from('aé', 'utf8'), 'utf8')).toBe(true);
    });

    it('should reject a dangling Shift_JIS lead byte', () => {
      expect(endsOnCharBoundary(Buffer.from([0x41, 0x82]), 'shift_jis')).toBe(false);
    });
  });

  describe('scanPrintableRuns', () => {
    it('should find runs of at least the minimum length', () => {
      const bytes = Buffer.concat([
        Buffer.from([0x00, 0x01]),
        Buffer.from('Hello'),
        Buffer.from([0x00]),
        Buffer.from('ab'),
        Buffer.from([0xff]),
        Buffer.from('World!'),
      ]);

      expect(scanPrintableRuns(bytes, 'utf8', 4)).toEqual([
        { offset: 2, byteLength: 5, text: 'Hello' },
        { offset: 11, byteLength: 6, text: 'World!' },
      ]);
    });

    it('should reject overlong UTF-8 sequences', () => {
      const bytes = Buffer.concat([Buffer.from('abcd'), Buffer.from([0xc0, 0x80]), Buffer.from('efgh')]);
      expect(scanPrintableRuns(bytes, 'utf8', 4).map(r => r.text)).toEqual(['abcd', 'efgh']);
    });

    it('should count multi-byte characters once', () => {
      const bytes = Buffer.from('ça va', 'utf8');
      expect(scanPrintableRuns(bytes, 'utf8', 5)).toEqual([{ offset: 0, byteLength: 6, text: 'ça va' }]);
    });

    it('should read latin1 accents as printable', () => {
      const bytes = Buffer.from([0x00, 0x63, 0x61, 0x66, 0xe9, 0x00]);
      expect(scanPrintableRuns(bytes, 'latin1', 4)).toEqual([{ offset: 1, byteLength: 4, text: 'café' }]);
    });

    it('should read Shift_JIS double-byte characters', () => {
      const bytes = Buffer.concat([Buffer.from([0x00]), encodeText('こんにちは', 'shift_jis'), Buffer.from([0x00])]);
      expect(scanPrintableRuns(bytes, 'shift_jis', 4)).toEqual([{ offset: 1, byteLength: 10, text: 'こんにちは' }]);
    });
  });

  it('should recognise supported encodings', () => {
    expect(isSupportedEncoding('shift_jis')).toBe(true);
    expect(isSupportedEncoding('ascii')).toBe(false);
  });
});
