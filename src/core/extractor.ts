/**
 * Text span extraction
 *
 * Structured formats are tried in priority order (predicate + parser); anything
 * no parser claims goes through the printable-run scanner, which keeps runs
 * that score as natural language.
 */

import { IndicatorVocabulary, scoreText } from '../analysis/indicators';
import { DEFAULT_FORMATS, FormatDescriptor, FormatParser, heuristicFormat } from '../formats';
import { log } from '../ipc/protocol';
import { decodeText, scanPrintableRuns } from './encoding';
import { errorMessage, UnsupportedFormatError } from './errors';
import { TokenGuard } from './tokenGuard';
import { TextEncodingName, TextSpan } from './types';

export interface ExtractionDefaults {
  encoding: TextEncodingName;
  /** Scanner runs scoring below this are dropped; a run at exactly this score is kept, so 0 keeps every run */
  minScore: number;
  /** Minimum characters in a scanned run */
  minRunLength: number;
}

export type ExtractOptions = Partial<ExtractionDefaults>;

export interface Extraction {
  format: FormatDescriptor;
  spans: TextSpan[];
}

export const DEFAULT_EXTRACTION: ExtractionDefaults = {
  encoding: 'utf8',
  minScore: 0.35,
  minRunLength: 4,
};

export class Extractor {
  private defaults: ExtractionDefaults;

  constructor(
    private vocabulary: IndicatorVocabulary,
    defaults: ExtractOptions = {},
    private tokenGuard: TokenGuard = new TokenGuard(),
    private formats: readonly FormatParser[] = DEFAULT_FORMATS
  ) {
    this.defaults = { ...DEFAULT_EXTRACTION, ...defaults };
  }

  /**
   * Extract text spans, sorted by offset and non-overlapping.
   *
   * @param formatHint - Name of a registered format, or 'heuristic' to force the scanner
   * @throws UnsupportedFormatError for an unknown hint or bytes the hinted parser rejects
   */
  extract(filePath: string, bytes: Buffer, formatHint?: string, options: ExtractOptions = {}): TextSpan[] {
    return this.extractWithFormat(filePath, bytes, formatHint, options).spans;
  }

  /**
   * Same as extract, also reporting which format produced the spans
   */
  extractWithFormat(filePath: string, bytes: Buffer, formatHint?: string, options: ExtractOptions = {}): Extraction {
    const settings: ExtractionDefaults = { ...this.defaults, ...options };

    if (formatHint !== undefined) {
      return this.extractHinted(filePath, bytes, formatHint, settings);
    }

    const parser = this.formats.find(f => f.detect(bytes));
    if (parser) {
      try {
        return { format: parser, spans: this.parseWith(parser, bytes, settings) };
      } catch (error) {
        log(`[Extractor] ${parser.name} parser rejected ${filePath}, falling back to scanner: ${errorMessage(error)}`);
      }
    }

    return { format: heuristicFormat, spans: this.scan(bytes, settings) };
  }

  private extractHinted(filePath: string, bytes: Buffer, formatHint: string, settings: ExtractionDefaults): Extraction {
    if (formatHint === heuristicFormat.name) {
      return { format: heuristicFormat, spans: this.scan(bytes, settings) };
    }

    const parser = this.formats.find(f => f.name === formatHint);
    if (!parser) {
      throw new UnsupportedFormatError(filePath, `unknown format '${formatHint}'`);
    }
    if (!parser.detect(bytes)) {
      throw new UnsupportedFormatError(filePath, `not a ${parser.name} file`);
    }

    try {
      return { format: parser, spans: this.parseWith(parser, bytes, settings) };
    } catch (error) {
      throw new UnsupportedFormatError(filePath, `${parser.name}: ${errorMessage(error)}`);
    }
  }

  private parseWith(parser: FormatParser, bytes: Buffer, settings: ExtractionDefaults): TextSpan[] {
    const located = parser.parse(bytes, settings.encoding)
      .filter(s => s.byteLength > 0)
      .sort((a, b) => a.offset - b.offset);

    const spans: TextSpan[] = [];
    let lastEnd = 0;
    for (const { offset, byteLength } of located) {
      if (offset < lastEnd) continue;
      spans.push(this.createSpan(spans.length, bytes, offset, byteLength, settings.encoding));
      lastEnd = offset + byteLength;
    }
    return spans;
  }

  private scan(bytes: Buffer, settings: ExtractionDefaults): TextSpan[] {
    const spans: TextSpan[] = [];
    for (const run of scanPrintableRuns(bytes, settings.encoding, settings.minRunLength)) {
      const score = scoreText(run.text, this.vocabulary);
      if (score < settings.minScore) continue;

      const span = this.createSpan(spans.length, bytes, run.offset, run.byteLength, settings.encoding);
      spans.push({ ...span, score });
    }
    return spans;
  }

  private createSpan(
    index: number,
    bytes: Buffer,
    offset: number,
    byteLength: number,
    encoding: TextEncodingName
  ): TextSpan {
    // Copy so spans never alias the caller's buffer
    const rawBytes = Buffer.from(bytes.subarray(offset, offset + byteLength));
    const decodedText = decodeText(rawBytes, encoding);

    return {
      index,
      offset,
      byteLength,
      rawBytes,
      decodedText,
      protectedRanges: this.tokenGuard.protectedByteRanges(decodedText, encoding),
    };
  }
}
