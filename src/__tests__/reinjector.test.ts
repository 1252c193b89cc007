/**
 * Tests for the Reinjector strategies
 */

import { getDefaultVocabulary } from '../analysis/indicators';
import { encodeText } from '../core/encoding';
import { Extractor } from '../core/extractor';
import { ReinjectionContext, Reinjector } from '../core/reinjector';
import { heuristicFormat, pm1Format, readStringTableOffsets, stringTableFormat } from '../formats';
import { buildPm1, buildStringTable, buildStringTableRaw, embedText } from './helpers/assets';

describe('Reinjector', () => {
  const extractor = new Extractor(getDefaultVocabulary());
  const reinjector = new Reinjector(extractor);

  const heuristic: ReinjectionContext = { format: heuristicFormat, encoding: 'utf8' };
  const table: ReinjectionContext = { format: stringTableFormat, encoding: 'utf8' };
  const pm1: ReinjectionContext = { format: pm1Format, encoding: 'utf8' };

  describe('conservative', () => {
    it('should truncate to the slot and keep the file length', () => {
      const bytes = embedText('Game Over!');
      const result = reinjector.reinject(
        bytes,
        [{ offset: 1, oldText: 'Game Over!', newText: 'Bonjour tout le monde' }],
        'conservative',
        heuristic
      );

      if (!result.success) throw result.error;
      expect(result.data.bytes.length).toBe(13);
      expect(result.data.bytes.subarray(1, 11).toString('utf8')).toBe('Bonjour to');
      expect(result.data.bytes[11]).toBe(0x00);
      expect(result.data.truncations).toEqual([
        { offset: 1, originalText: 'Bonjour tout le monde', keptText: 'Bonjour to', capacity: 10 },
      ]);
    });

    it('should never split a multi-byte character', () => {
      const result = reinjector.reinject(
        embedText('abcd'),
        [{ offset: 1, oldText: 'abcd', newText: 'aéé' }],
        'conservative',
        heuristic
      );

      if (!result.success) throw result.error;
      expect(Array.from(result.data.bytes.subarray(1, 5))).toEqual([0x61, 0xc3, 0xa9, 0x20]);
      expect(result.data.plan.edits[0].writtenText).toBe('aé');
    });

    it('should truncate Shift_JIS at a double-byte boundary', () => {
      const sjis: ReinjectionContext = { format: heuristicFormat, encoding: 'shift_jis' };
      const result = reinjector.reinject(
        embedText('abcde'),
        [{ offset: 1, oldText: 'abcde', newText: 'こんにちは' }],
        'conservative',
        sjis
      );

      if (!result.success) throw result.error;
      const expected = Buffer.concat([encodeText('こん', 'shift_jis'), Buffer.from([0x20])]);
      expect(result.data.bytes.subarray(1, 6).equals(expected)).toBe(true);
    });

    it('should pad shorter text with the format pad byte', () => {
      const bytes = buildStringTable(['Hello there', 'Game Over']);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 12, oldText: 'Hello there', newText: 'Salut' }],
        'conservative',
        table
      );

      if (!result.success) throw result.error;
      expect(result.data.bytes.length).toBe(bytes.length);
      expect(result.data.bytes.subarray(12, 23).equals(Buffer.from('Salut\0\0\0\0\0\0', 'utf8'))).toBe(true);
      expect(result.data.truncations).toEqual([]);
    });

    it('should leave the input buffer untouched', () => {
      const bytes = embedText('Game Over!');
      const before = Buffer.from(bytes);
      reinjector.reinject(bytes, [{ offset: 1, oldText: 'Game Over!', newText: 'Perdu' }], 'conservative', heuristic);

      expect(bytes.equals(before)).toBe(true);
    });
  });

  describe('aggressive', () => {
    it('should grow and shrink strings and patch the offset table', () => {
      const bytes = buildStringTable(['Hello there', 'Game Over']);
      const result = reinjector.reinject(
        bytes,
        [
          { offset: 24, oldText: 'Game Over', newText: 'Fin' },
          { offset: 12, oldText: 'Hello there', newText: 'Bonjour tout le monde' },
        ],
        'aggressive',
        table
      );

      if (!result.success) throw result.error;
      expect(result.data.bytes.length).toBe(38);
      expect(readStringTableOffsets(result.data.bytes)).toEqual([12, 34]);
      expect(result.data.plan.edits.map(e => e.offset)).toEqual([12, 34]);
      expect(result.data.bytes.subarray(34, 37).toString('utf8')).toBe('Fin');
    });

    it('should change the file length by the sum of the edit deltas', () => {
      const formats = [
        { build: buildStringTable, context: table },
        { build: buildPm1, context: pm1 },
      ];

      for (const { build, context } of formats) {
        for (const count of [1, 2, 3, 5]) {
          const texts = Array.from({ length: count }, (_, i) => `Line number ${i}`);
          const replacements = texts.map((_, i) => (i % 2 === 0 ? `Ligne numéro ${i}, un peu plus longue` : `L${i}`));
          const bytes = build(texts);
          const spans = extractor.extract('', bytes);
          const edits = spans.map((span, i) => ({ offset: span.offset, oldText: span.decodedText, newText: replacements[i] }));

          const result = reinjector.reinject(bytes, edits, 'aggressive', context);

          if (!result.success) throw result.error;
          const delta = edits.reduce((sum, e) => sum + Buffer.byteLength(e.newText) - Buffer.byteLength(e.oldText), 0);
          expect(result.data.bytes.length).toBe(bytes.length + delta);
          expect(extractor.extract('', result.data.bytes).map(s => s.decodedText)).toEqual(replacements);
        }
      }
    });

    it('should count entries aliasing the inside of a resized string as violations', () => {
      const bytes = buildStringTableRaw(2, [14, 18, 26], [
        { offset: 14, text: 'Hello there' },
        { offset: 26, text: 'Game Over' },
      ]);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 14, oldText: 'Hello there', newText: 'Bonjour tout le monde' }],
        'aggressive',
        table
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe('OffsetOutOfBounds');
    });

    it('should refuse formats that cannot grow', () => {
      const result = reinjector.reinject(
        embedText('Game Over!'),
        [{ offset: 1, oldText: 'Game Over!', newText: 'Partie terminée' }],
        'aggressive',
        heuristic
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe('GrowthUnsupported');
      expect(result.error.fatal).toBe(false);
    });

    it('should fail when a table entry would overflow', () => {
      const bytes = buildStringTableRaw(2, [12, 0xfff0], [
        { offset: 12, text: 'Hi there' },
        { offset: 0xfff0, text: 'Bye' },
      ]);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 12, oldText: 'Hi there', newText: 'Bonjour a vous tous mes amis' }],
        'aggressive',
        table
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe('OffsetOutOfBounds');
      expect(result.error.fatal).toBe(true);
    });
  });

  describe('validation', () => {
    const bytes = embedText('Game Over!');

    it.each([
      ['offset past the end', { offset: 100, oldText: 'Game', newText: 'Jeu' }],
      ['bytes that do not match', { offset: 1, oldText: 'Game Ovar!', newText: 'Perdu' }],
      ['empty slot', { offset: 1, oldText: '', newText: 'Perdu' }],
    ])('should reject an %s', (_label, edit) => {
      const result = reinjector.reinject(bytes, [edit], 'conservative', heuristic);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe('OffsetOutOfBounds');
    });

    it('should reject overlapping edits', () => {
      const result = reinjector.reinject(
        bytes,
        [
          { offset: 1, oldText: 'Game', newText: 'Jeu' },
          { offset: 3, oldText: 'me', newText: 'xx' },
        ],
        'conservative',
        heuristic
      );

      expect(result.success).toBe(false);
    });
  });

  describe('validation with non round-tripping encodings', () => {
    it('should accept a Shift_JIS span whose text encodes to different bytes', () => {
      const bytes = Buffer.concat([
        Buffer.from([0x00]),
        Buffer.from('Hello ', 'ascii'),
        Buffer.from([0x87, 0x90]),
        Buffer.from(' world', 'ascii'),
        Buffer.from([0x00]),
      ]);
      const [span] = extractor.extract('nec.bin', bytes, 'heuristic', { encoding: 'shift_jis', minScore: 0 });
      const sjis: ReinjectionContext = { format: heuristicFormat, encoding: 'shift_jis' };

      const result = reinjector.reinject(
        bytes,
        [{ offset: span.offset, oldText: span.decodedText, newText: 'Bonjour le monde', oldByteLength: span.byteLength }],
        'conservative',
        sjis
      );

      if (!result.success) throw result.error;
      expect(span.byteLength).toBe(14);
      expect(result.data.bytes.subarray(1, 15).toString('ascii')).toBe('Bonjour le mon');
    });
  });

  describe('safe', () => {
    it('should fail verification when the written text does not parse back', () => {
      const bytes = buildPm1(['Welcome to the game']);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 16, oldText: 'Welcome to the game', newText: 'Bien\u0001venue' }],
        'safe',
        pm1
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe('VerificationFailed');
      expect(result.error.fatal).toBe(false);
    });

    it('should verify the written text by re-parsing', () => {
      const bytes = buildPm1(['Welcome to the game', 'Press START to continue']);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 16, oldText: 'Welcome to the game', newText: 'Bienvenue dans le jeu' }],
        'safe',
        pm1
      );

      if (!result.success) throw result.error;
      expect(result.data.strategy).toBe('safe');
      expect(result.data.verified).toBe(true);
      expect(result.data.bytes.subarray(16, 37).toString('utf8')).toBe('Bienvenue dans le jeu');
      expect(result.data.bytes[37]).toBe(0x00);
    });
  });

  describe('test-first', () => {
    it('should pick conservative when growth would overflow the table', () => {
      const bytes = buildStringTableRaw(2, [12, 0xfff0], [
        { offset: 12, text: 'Hi there' },
        { offset: 0xfff0, text: 'Bye' },
      ]);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 12, oldText: 'Hi there', newText: 'Bonjour a vous tous mes amis' }],
        'test-first',
        table
      );

      if (!result.success) throw result.error;
      expect(result.data.strategy).toBe('conservative');
      expect(result.data.bytes.length).toBe(0xfff4);
      expect(result.data.bytes.subarray(12, 20).toString('utf8')).toBe('Bonjour ');
      expect(result.data.probe?.scores.map(s => [s.strategy, s.score])).toEqual([
        ['safe', -900],
        ['conservative', 90],
        ['aggressive', -900],
      ]);
    });

    it('should fall back to conservative when an alias points inside the grown string', () => {
      const bytes = buildStringTableRaw(2, [14, 18, 26], [
        { offset: 14, text: 'Hello there' },
        { offset: 26, text: 'Game Over' },
      ]);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 14, oldText: 'Hello there', newText: 'Bonjour tout le monde' }],
        'test-first',
        table
      );

      if (!result.success) throw result.error;
      expect(result.data.strategy).toBe('conservative');
      expect(result.data.bytes.length).toBe(bytes.length);
      expect(readStringTableOffsets(result.data.bytes)).toEqual([14, 18, 26]);
      expect(result.data.probe?.scores.map(s => [s.strategy, s.tableViolations])).toEqual([
        ['safe', 1],
        ['conservative', 0],
        ['aggressive', 1],
      ]);
    });

    it('should report strategies the format refuses', () => {
      const result = reinjector.reinject(
        embedText('Game Over!'),
        [{ offset: 1, oldText: 'Game Over!', newText: 'Bonjour tout le monde' }],
        'test-first',
        heuristic
      );

      if (!result.success) throw result.error;
      expect(result.data.probe?.chosen).toBe('conservative');
      expect(result.data.verified).toBe(true);
      expect(result.data.probe?.scores.map(s => s.refusedBy)).toEqual(['GrowthUnsupported', undefined, 'GrowthUnsupported']);
    });

    it('should prefer safe on a tie', () => {
      const bytes = buildStringTable(['Hello there', 'Game Over']);
      const result = reinjector.reinject(
        bytes,
        [{ offset: 12, oldText: 'Hello there', newText: 'Salut' }],
        'test-first',
        table
      );

      if (!result.success) throw result.error;
      expect(result.data.probe?.scores.map(s => s.score)).toEqual([100, 100, 100]);
      expect(result.data.strategy).toBe('safe');
      expect(result.data.bytes.length).toBe(28);
      expect(readStringTableOffsets(result.data.bytes)).toEqual([12, 18]);
    });
  });
});
