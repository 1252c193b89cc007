/**
 * Tests for Extractor format detection and the printable-run scanner
 */

import { getDefaultVocabulary } from '../analysis/indicators';
import { UnsupportedFormatError } from '../core/errors';
import { Extractor } from '../core/extractor';
import { TokenGuard } from '../core/tokenGuard';
import { buildPm1, buildStringTable, buildStringTableRaw } from './helpers/assets';

describe('Extractor', () => {
  const extractor = new Extractor(getDefaultVocabulary(), {}, new TokenGuard());

  describe('string-table', () => {
    it('should read every entry of the offset table', () => {
      const bytes = buildStringTable(['Hello there', 'Game Over']);
      const { format, spans } = extractor.extractWithFormat('menu.tbl', bytes);

      expect(format.name).toBe('string-table');
      expect(spans.map(s => [s.offset, s.byteLength, s.decodedText])).toEqual([
        [12, 11, 'Hello there'],
        [24, 9, 'Game Over'],
      ]);
    });

    it('should drop duplicate entries and entries aliasing another string', () => {
      const bytes = buildStringTableRaw(2, [14, 14, 16], [{ offset: 14, text: 'Hello there' }]);
      const spans = extractor.extract('alias.tbl', bytes);

      expect(spans.map(s => s.offset)).toEqual([14]);
    });

    it('should fall back to the scanner when the table is corrupt', () => {
      const bytes = Buffer.concat([
        Buffer.from('STBL', 'ascii'),
        Buffer.from([0x02, 0x00, 0x01, 0x00, 0xff, 0xff]),
        Buffer.from('Hello world, welcome to the game', 'utf8'),
      ]);
      const { format, spans } = extractor.extractWithFormat('broken.tbl', bytes);

      expect(format.name).toBe('heuristic');
      expect(spans.map(s => [s.offset, s.decodedText])).toEqual([[10, 'Hello world, welcome to the game']]);
    });
  });

  describe('pm1', () => {
    it('should read NUL-delimited strings after the header', () => {
      const bytes = buildPm1(['Welcome to the game', 'Press START to continue']);
      const { format, spans } = extractor.extractWithFormat('menu.pm1', bytes);

      expect(format.name).toBe('pm1');
      expect(spans.map(s => [s.offset, s.decodedText])).toEqual([
        [16, 'Welcome to the game'],
        [36, 'Press START to continue'],
      ]);
      expect(spans[1].protectedRanges).toEqual([[6, 11]]);
    });

    it('should keep strings that contain line breaks', () => {
      const spans = extractor.extract('dialog.pm1', buildPm1(['Hello there\nfriend', 'Game Over']));

      expect(spans.map(s => [s.offset, s.decodedText])).toEqual([
        [16, 'Hello there\nfriend'],
        [35, 'Game Over'],
      ]);
      expect(spans[0].protectedRanges).toEqual([[11, 12]]);
    });

    it('should skip segments mixing text and binary bytes', () => {
      const bytes = Buffer.concat([buildPm1(['Welcome to the game']), Buffer.from([0x41, 0x42, 0x01, 0x43, 0x44, 0x00])]);

      expect(extractor.extract('menu.pm1', bytes).map(s => s.decodedText)).toEqual(['Welcome to the game']);
    });
  });

  describe('heuristic scanner', () => {
    const bytes = Buffer.concat([
      Buffer.from([0x00, 0x01, 0x02]),
      Buffer.from('Press start to try again', 'utf8'),
      Buffer.from([0x00, 0xff, 0xfe]),
      Buffer.from('xQzv', 'utf8'),
      Buffer.from([0x00]),
    ]);

    it('should keep runs that read as language', () => {
      const spans = extractor.extract('data.bin', bytes);

      expect(spans).toHaveLength(1);
      expect(spans[0].offset).toBe(3);
      expect(spans[0].decodedText).toBe('Press start to try again');
      expect(spans[0].score).toBeCloseTo(0.95, 5);
    });

    it('should keep every run with a zero minimum score', () => {
      const spans = extractor.extract('data.bin', bytes, undefined, { minScore: 0 });

      expect(spans.map(s => s.decodedText)).toEqual(['Press start to try again', 'xQzv']);
      expect(spans.map(s => s.index)).toEqual([0, 1]);
    });

    it('should keep a run scoring exactly the minimum', () => {
      const spans = extractor.extract('data.bin', bytes, undefined, { minScore: 0.3 });

      expect(spans.map(s => s.decodedText)).toEqual(['Press start to try again', 'xQzv']);
      expect(spans[1].score).toBeCloseTo(0.3, 5);
    });

    it('should return no spans for low-scoring content', () => {
      const junk = Buffer.concat([Buffer.from([0x00]), Buffer.from('qXzvBwK', 'utf8'), Buffer.from([0x00])]);

      expect(extractor.extract('junk.bin', junk)).toEqual([]);
    });

    it('should be forced by the heuristic hint', () => {
      const table = buildStringTable(['Hello there, welcome to the game']);
      const { format } = extractor.extractWithFormat('menu.tbl', table, 'heuristic');

      expect(format.name).toBe('heuristic');
    });
  });

  describe('format hints', () => {
    it('should reject an unknown format name', () => {
      expect(() => extractor.extract('a.bin', Buffer.alloc(4), 'zip')).toThrow(UnsupportedFormatError);
    });

    it('should reject bytes the hinted parser does not accept', () => {
      const bytes = buildStringTable(['Hello there']);

      expect(() => extractor.extract('a.pm1', bytes, 'pm1')).toThrow(UnsupportedFormatError);
    });

    it('should reject a corrupt file when its format is hinted', () => {
      const bytes = buildStringTableRaw(2, [0x7fff], []);

      expect(() => extractor.extract('a.tbl', bytes, 'string-table')).toThrow(UnsupportedFormatError);
    });
  });

  it('should copy span bytes out of the input buffer', () => {
    const bytes = buildStringTable(['Hello there']);
    const [span] = extractor.extract('menu.tbl', bytes);

    bytes.fill(0x41);
    expect(span.rawBytes.toString('utf8')).toBe('Hello there');
  });

  it('should decode with the requested encoding', () => {
    const bytes = Buffer.from([0x00, 0x63, 0x61, 0x66, 0xe9, 0x20, 0x62, 0x69, 0x65, 0x6e, 0x00]);
    const spans = extractor.extract('fr.bin', bytes, undefined, { encoding: 'latin1', minScore: 0 });

    expect(spans.map(s => s.decodedText)).toEqual(['café bien']);
  });
});
