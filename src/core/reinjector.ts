/**
 * Reinjector - writes translated strings back into a file's bytes
 *
 * Strategies:
 * - conservative: every string keeps its slot; longer text is truncated at a
 *   character boundary, shorter text is padded. File length never changes.
 * - aggressive: strings grow or shrink in place; later offsets shift and the
 *   format's offset table is patched. Only for formats that support growth.
 * - safe: aggressive, then the result is re-parsed and every edit checked.
 * - test-first: probe the three strategies in memory, score them, run the best.
 *
 * Nothing here touches the disk; see FileCommitter.
 */

import { FormatDescriptor } from '../formats';
import { log } from '../ipc/protocol';
import { decodeText, encodeText, endsOnCharBoundary, truncateToBytes } from './encoding';
import { errorMessage, ReinjectionError, ReinjectionErrorKind } from './errors';
import { Extractor } from './extractor';
import { ConcreteStrategy, ReinjectionStrategy, Result, TextEdit, TextEncodingName, TextSpan } from './types';

export interface ReinjectionContext {
  format: FormatDescriptor;
  encoding: TextEncodingName;
}

export interface PlannedEdit {
  /** Offset in the output buffer, already shifted by earlier edits */
  offset: number;
  oldByteLength: number;
  newBytes: Buffer;
  writtenText: string;
  truncated: boolean;
}

export interface ReinsertionPlan {
  strategy: ConcreteStrategy;
  edits: PlannedEdit[];
}

export interface TruncationEvent {
  offset: number;
  originalText: string;
  keptText: string;
  capacity: number;
}

export interface StrategyScore {
  strategy: ConcreteStrategy;
  /** null when the strategy refused the edits */
  score: number | null;
  refusedBy?: ReinjectionErrorKind;
  verified: boolean;
  truncations: number;
  tableViolations: number;
}

export interface StrategyProbe {
  chosen: ConcreteStrategy;
  scores: StrategyScore[];
}

export interface ReinjectionOutcome {
  strategy: ConcreteStrategy;
  bytes: Buffer;
  plan: ReinsertionPlan;
  truncations: TruncationEvent[];
  tableViolations: number;
  verified: boolean;
  /** Only set by test-first */
  probe?: StrategyProbe;
}

interface ValidatedEdit {
  offset: number;
  oldByteLength: number;
  oldText: string;
  newText: string;
}

type ReinjectionResult = Result<ReinjectionOutcome, ReinjectionError>;

type StrategyHandler = (bytes: Buffer, edits: ValidatedEdit[], context: ReinjectionContext) => ReinjectionResult;

// Probe scoring
const VERIFIED_BONUS = 100;
const TRUNCATION_PENALTY = 10;
const VIOLATION_PENALTY = 1000;

/** Tie-break order for test-first */
const PROBE_PREFERENCE: readonly ConcreteStrategy[] = ['safe', 'conservative', 'aggressive'];

function fail(kind: ReinjectionErrorKind, detail: string): { success: false; error: ReinjectionError } {
  return { success: false, error: new ReinjectionError(kind, detail) };
}

function hex(offset: number): string {
  return `0x${offset.toString(16)}`;
}

export class Reinjector {
  private handlers: Record<ConcreteStrategy, StrategyHandler> = {
    conservative: (bytes, edits, context) => this.conservative(bytes, edits, context),
    aggressive: (bytes, edits, context) => this.aggressive(bytes, edits, context),
    safe: (bytes, edits, context) => this.safe(bytes, edits, context),
  };

  constructor(private extractor: Extractor) {}

  /**
   * Apply `edits` to a copy of `originalBytes`. The input buffer is never modified.
   */
  reinject(
    originalBytes: Buffer,
    edits: TextEdit[],
    strategy: ReinjectionStrategy,
    context: ReinjectionContext
  ): ReinjectionResult {
    const validated = this.validate(originalBytes, edits, context.encoding);
    if (!validated.success) {
      return validated;
    }

    if (strategy === 'test-first') {
      return this.testFirst(originalBytes, validated.data, context);
    }

    return this.execute(strategy, originalBytes, validated.data, context);
  }

  /**
   * Check the re-parsed output still holds every written string at its offset
   */
  verify(outcome: ReinjectionOutcome, context: ReinjectionContext): boolean {
    let spans: TextSpan[];
    try {
      spans = this.extractor.extract('', outcome.bytes, context.format.name, {
        encoding: context.encoding,
        minScore: 0,
      });
    } catch (error) {
      log(`[Reinjector] Verification could not re-parse output: ${errorMessage(error)}`);
      return false;
    }

    const byOffset = new Map(spans.map(s => [s.offset, s]));
    return outcome.plan.edits.every(edit => {
      if (edit.writtenText.length === 0) return true;
      const span = byOffset.get(edit.offset);
      return span !== undefined && span.decodedText.startsWith(edit.writtenText);
    });
  }

  /**
   * Run a strategy and reject table violations, which would leave dangling offsets
   */
  private execute(
    strategy: ConcreteStrategy,
    bytes: Buffer,
    edits: ValidatedEdit[],
    context: ReinjectionContext
  ): ReinjectionResult {
    const result = this.handlers[strategy](bytes, edits, context);
    if (result.success && result.data.tableViolations > 0) {
      return fail(
        'OffsetOutOfBounds',
        `${result.data.tableViolations} offset table entries would point out of range`
      );
    }
    return result;
  }

  private validate(bytes: Buffer, edits: TextEdit[], encoding: TextEncodingName): Result<ValidatedEdit[], ReinjectionError> {
    // Array.prototype.sort is stable
    const sorted = [...edits].sort((a, b) => a.offset - b.offset);
    const validated: ValidatedEdit[] = [];
    let previousEnd = 0;

    for (const edit of sorted) {
      // Some encodings do not round-trip, so trust the extractor's slot length when given
      const slotLength = edit.oldByteLength ?? encodeText(edit.oldText, encoding).length;
      const end = edit.offset + slotLength;

      if (!Number.isInteger(edit.offset) || edit.offset < 0 || end > bytes.length) {
        return fail('OffsetOutOfBounds', `edit at ${hex(edit.offset)} exceeds buffer of ${bytes.length} bytes`);
      }
      if (slotLength === 0) {
        return fail('OffsetOutOfBounds', `edit at ${hex(edit.offset)} has an empty slot`);
      }
      if (edit.offset < previousEnd) {
        return fail('OffsetOutOfBounds', `edit at ${hex(edit.offset)} overlaps the previous edit`);
      }
      if (decodeText(bytes.subarray(edit.offset, end), encoding) !== edit.oldText) {
        return fail('OffsetOutOfBounds', `bytes at ${hex(edit.offset)} do not match the expected text`);
      }

      validated.push({
        offset: edit.offset,
        oldByteLength: slotLength,
        oldText: edit.oldText,
        newText: edit.newText,
      });
      previousEnd = end;
    }

    return { success: true, data: validated };
  }

  private conservative(bytes: Buffer, edits: ValidatedEdit[], context: ReinjectionContext): ReinjectionResult {
    const out = Buffer.from(bytes);
    const planned: PlannedEdit[] = [];
    const truncations: TruncationEvent[] = [];

    for (const edit of edits) {
      const capacity = edit.oldByteLength;
      const fitted = truncateToBytes(edit.newText, capacity, context.encoding);

      if (!endsOnCharBoundary(fitted.bytes, context.encoding)) {
        return fail('EncodingBoundaryViolation', `slot at ${hex(edit.offset)} would end inside a character`);
      }

      if (fitted.truncated) {
        truncations.push({ offset: edit.offset, originalText: edit.newText, keptText: fitted.text, capacity });
        log(`[Reinjector] Truncated text at ${hex(edit.offset)} to ${fitted.bytes.length}/${capacity} bytes: "${fitted.text}"`);
      }

      const slot = Buffer.alloc(capacity, context.format.padByte);
      fitted.bytes.copy(slot);
      slot.copy(out, edit.offset);

      planned.push({
        offset: edit.offset,
        oldByteLength: capacity,
        newBytes: fitted.bytes,
        writtenText: fitted.text,
        truncated: fitted.truncated,
      });
    }

    return {
      success: true,
      data: {
        strategy: 'conservative',
        bytes: out,
        plan: { strategy: 'conservative', edits: planned },
        truncations,
        tableViolations: 0,
        verified: false,
      },
    };
  }

  private aggressive(bytes: Buffer, edits: ValidatedEdit[], context: ReinjectionContext): ReinjectionResult {
    if (!context.format.supportsSafeGrowth) {
      return fail('GrowthUnsupported', `format '${context.format.name}' cannot grow or shrink strings`);
    }

    let out: Buffer = Buffer.from(bytes);
    let delta = 0;
    let tableViolations = 0;
    const planned: PlannedEdit[] = [];

    for (const edit of edits) {
      const shifted = edit.offset + delta;
      const newBytes = encodeText(edit.newText, context.encoding);
      const change = newBytes.length - edit.oldByteLength;

      out = Buffer.concat([
        out.subarray(0, shifted),
        newBytes,
        out.subarray(shifted + edit.oldByteLength),
      ]);

      if (change !== 0 && context.format.adjustOffsets) {
        const adjusted = context.format.adjustOffsets(out, shifted, shifted + edit.oldByteLength, change);
        out = adjusted.bytes;
        tableViolations += adjusted.violations;
      }

      planned.push({
        offset: shifted,
        oldByteLength: edit.oldByteLength,
        newBytes,
        writtenText: edit.newText,
        truncated: false,
      });
      delta += change;
    }

    if (tableViolations > 0) {
      log(`[Reinjector] ${tableViolations} offset table entries overflowed in ${context.format.name} data`);
    }

    return {
      success: true,
      data: {
        strategy: 'aggressive',
        bytes: out,
        plan: { strategy: 'aggressive', edits: planned },
        truncations: [],
        tableViolations,
        verified: false,
      },
    };
  }

  private safe(bytes: Buffer, edits: ValidatedEdit[], context: ReinjectionContext): ReinjectionResult {
    const grown = this.aggressive(bytes, edits, context);
    if (!grown.success) {
      return grown;
    }

    const outcome: ReinjectionOutcome = {
      ...grown.data,
      strategy: 'safe',
      plan: { ...grown.data.plan, strategy: 'safe' },
    };

    if (!this.verify(outcome, context)) {
      return fail('VerificationFailed', `re-parsed ${context.format.name} output does not contain the written text`);
    }

    return { success: true, data: { ...outcome, verified: true } };
  }

  private testFirst(bytes: Buffer, edits: ValidatedEdit[], context: ReinjectionContext): ReinjectionResult {
    const scores: StrategyScore[] = PROBE_PREFERENCE.map(strategy => {
      const probe = this.handlers[strategy](bytes, edits, context);
      if (!probe.success) {
        return {
          strategy,
          score: null,
          refusedBy: probe.error.kind,
          verified: false,
          truncations: 0,
          tableViolations: 0,
        };
      }

      const verified = probe.data.verified || this.verify(probe.data, context);
      const score = (verified ? VERIFIED_BONUS : 0)
        - TRUNCATION_PENALTY * probe.data.truncations.length
        - VIOLATION_PENALTY * probe.data.tableViolations;

      return {
        strategy,
        score,
        verified,
        truncations: probe.data.truncations.length,
        tableViolations: probe.data.tableViolations,
      };
    });

    // PROBE_PREFERENCE order makes the first maximum the preferred one on ties
    let best: StrategyScore | undefined;
    for (const candidate of scores) {
      if (candidate.score === null) continue;
      if (!best || best.score === null || candidate.score > best.score) {
        best = candidate;
      }
    }

    if (!best) {
      const reasons = scores.map(s => `${s.strategy}: ${s.refusedBy ?? 'unknown'}`).join(', ');
      return fail('OffsetOutOfBounds', `every strategy refused the edits (${reasons})`);
    }

    log(`[Reinjector] test-first chose ${best.strategy}`, scores.map(s => ({ strategy: s.strategy, score: s.score })));

    const chosen = this.execute(best.strategy, bytes, edits, context);
    if (!chosen.success) {
      return chosen;
    }

    return {
      success: true,
      data: {
        ...chosen.data,
        verified: best.verified,
        probe: { chosen: best.strategy, scores },
      },
    };
  }
}
