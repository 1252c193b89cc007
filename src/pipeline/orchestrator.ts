/**
 * Orchestrator - runs the pipeline over a game directory
 *
 * Per file: read → extract → mask → filter → translate → unmask → reinject →
 * commit → record hash. Files run on a bounded worker pool; a file's failure is
 * reported and never aborts the batch.
 */

import * as fs from 'fs';
import * as path from 'path';
import PQueue from 'p-queue';
import { FileAnalyzer } from '../analysis/fileAnalyzer';
import { shouldTranslate } from '../analysis/translatability';
import { errorMessage, ReinjectionError, TokenRestoreError, UnsupportedFormatError } from '../core/errors';
import { Extraction, Extractor } from '../core/extractor';
import { ReinjectionOutcome, Reinjector, StrategyProbe } from '../core/reinjector';
import { TokenGuard } from '../core/tokenGuard';
import { TranslateOutcome, Translator } from '../core/translator';
import {
  ConcreteStrategy,
  FileClassification,
  ReinjectionStrategy,
  TextEdit,
  TextEncodingName,
  TextSpan,
} from '../core/types';
import { log, sendProgress } from '../ipc/protocol';
import { FileCommitter } from './committer';
import { ProcessedFileRegistry } from './registry';

export type OrchestratorMode = 'analyze' | 'extract' | 'translate' | 'test-reinsert';

export interface OrchestratorDeps {
  extractor: Extractor;
  analyzer: FileAnalyzer;
  translator: Translator;
  reinjector: Reinjector;
  tokenGuard: TokenGuard;
  committer: FileCommitter;
}

export interface OrchestratorOptions {
  outputDir: string;
  targetLocale: string;
  strategy: ReinjectionStrategy;
  concurrency: number;
  /** Lower-case, with the leading dot */
  extensions: readonly string[];
  encoding: TextEncodingName;
  /** Re-process files the registry marks as unchanged */
  force?: boolean;
}

export type FileStatus = 'processed' | 'skipped' | 'failed';

export interface FileReport {
  file: string;
  status: FileStatus;
  format?: string;
  classification?: FileClassification;
  spans?: number;
  translated?: number;
  filtered?: number;
  failedSpans?: number;
  strategy?: ConcreteStrategy;
  truncations?: number;
  probe?: StrategyProbe;
  outputPath?: string;
  reason?: string;
}

export interface RunSummary {
  mode: OrchestratorMode;
  processed: number;
  skipped: number;
  failed: number;
  files: FileReport[];
  errors: Array<{ file: string; error: string }>;
  stopped: boolean;
}

interface SpanTranslationRecord {
  offset: number;
  source: string;
  translated?: string;
  usedCache?: boolean;
  confidence?: number;
  error?: string;
}

interface TranslatedSpans {
  edits: TextEdit[];
  records: SpanTranslationRecord[];
  filtered: number;
  failed: number;
}

/**
 * Split leading and trailing whitespace off a string
 */
function splitWhitespace(text: string): { leading: string; core: string; trailing: string } {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
  if (!match) {
    return { leading: '', core: text, trailing: '' };
  }
  return { leading: match[1], core: match[2], trailing: match[3] };
}

/**
 * File-system safe name for per-file reports, unique per relative path
 */
function reportName(relativePath: string): string {
  return relativePath.replace(/[\\/]/g, '__').replace(/[^a-zA-Z0-9._-]/g, '_');
}

export class Orchestrator {
  private stopped = false;
  private queue: PQueue | null = null;

  constructor(private deps: OrchestratorDeps, private options: OrchestratorOptions) {}

  /**
   * Stop dispatching new files of the current run; files already in flight finish
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    log('[Orchestrator] Stop requested, letting in-flight files finish');
    this.queue?.clear();
  }

  /**
   * @param target - A directory to walk, or a single file
   */
  async run(mode: OrchestratorMode, target: string): Promise<RunSummary> {
    this.stopped = false;
    const taskId = `${mode}-${Date.now()}`;
    const root = path.resolve(target);
    const stat = await fs.promises.stat(root);
    const baseDir = stat.isDirectory() ? root : path.dirname(root);
    const files = stat.isDirectory() ? await this.collectFiles(root) : [root];

    await fs.promises.mkdir(this.options.outputDir, { recursive: true });
    const registry = mode === 'translate' ? new ProcessedFileRegistry(this.options.outputDir) : null;

    log(`[Orchestrator] ${mode}: ${files.length} file(s) under ${root}`);
    sendProgress(taskId, `asset-tl ${mode}`, 'started', {
      status: 'scanning',
      statusMessage: `Found ${files.length} file(s)`,
      totalSteps: files.length,
    });

    const reports: FileReport[] = [];
    const queue = new PQueue({ concurrency: this.options.concurrency });
    this.queue = queue;

    for (const filePath of files) {
      queue.add(async () => {
        if (this.stopped) return;

        const relative = path.relative(baseDir, filePath) || path.basename(filePath);
        const report = await this.processFile(mode, filePath, relative, registry);
        reports.push(report);

        sendProgress(taskId, `asset-tl ${mode}`, 'progress', {
          status: 'processing',
          statusMessage: `${report.status}: ${relative}`,
          currentStep: reports.length,
          totalSteps: files.length,
          progress: Math.round((reports.length / Math.max(files.length, 1)) * 100),
        });
      }).catch(error => {
        log(`[Orchestrator] Worker task failed: ${errorMessage(error)}`);
      });
    }

    await queue.onIdle();
    this.queue = null;

    if (registry) {
      await registry.save();
    }

    reports.sort((a, b) => a.file.localeCompare(b.file));
    const summary: RunSummary = {
      mode,
      processed: reports.filter(r => r.status === 'processed').length,
      skipped: reports.filter(r => r.status === 'skipped').length,
      failed: reports.filter(r => r.status === 'failed').length,
      files: reports,
      errors: reports
        .filter(r => r.reason !== undefined && r.status !== 'processed')
        .map(r => ({ file: r.file, error: r.reason ?? '' })),
      stopped: this.stopped,
    };

    await this.writeJson(path.join(this.options.outputDir, `report-${mode}.json`), summary);

    sendProgress(taskId, `asset-tl ${mode}`, 'complete', {
      status: 'complete',
      statusMessage: `${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed`,
      progress: 100,
    });
    log(`[Orchestrator] ${mode} done: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed`);

    return summary;
  }

  private async processFile(
    mode: OrchestratorMode,
    filePath: string,
    relative: string,
    registry: ProcessedFileRegistry | null
  ): Promise<FileReport> {
    try {
      const bytes = await fs.promises.readFile(filePath);

      switch (mode) {
        case 'analyze':
          return {
            file: relative,
            status: 'processed',
            classification: this.deps.analyzer.analyze(filePath, bytes),
          };
        case 'extract':
          return await this.extractFile(filePath, relative, bytes);
        case 'translate':
          return await this.translateFile(filePath, relative, bytes, registry);
        case 'test-reinsert':
          return await this.testReinsertFile(filePath, relative, bytes);
      }
    } catch (error) {
      const recoverable = error instanceof UnsupportedFormatError;
      log(`[Orchestrator] ${recoverable ? 'Skipping' : 'Failed'} ${relative}: ${errorMessage(error)}`);
      return { file: relative, status: recoverable ? 'skipped' : 'failed', reason: errorMessage(error) };
    }
  }

  private async extractFile(filePath: string, relative: string, bytes: Buffer): Promise<FileReport> {
    const extraction = this.extract(filePath, bytes);
    const outputPath = path.join(this.options.outputDir, 'extracted', `${reportName(relative)}.json`);

    await this.writeJson(outputPath, extraction.spans.map(span => ({
      index: span.index,
      offset: span.offset,
      byteLength: span.byteLength,
      text: span.decodedText,
      protectedRanges: span.protectedRanges,
      score: span.score,
    })));

    return {
      file: relative,
      status: 'processed',
      format: extraction.format.name,
      spans: extraction.spans.length,
      outputPath,
    };
  }

  private async translateFile(
    filePath: string,
    relative: string,
    bytes: Buffer,
    registry: ProcessedFileRegistry | null
  ): Promise<FileReport> {
    if (registry && !this.options.force && registry.isUnchanged(filePath, bytes)) {
      return { file: relative, status: 'skipped', reason: 'unchanged since last run' };
    }

    const extraction = this.extract(filePath, bytes);
    const translated = await this.translateSpans(extraction.spans);

    await this.writeJson(
      path.join(this.options.outputDir, 'translated', `${reportName(relative)}.json`),
      translated.records
    );

    const base: FileReport = {
      file: relative,
      status: 'processed',
      format: extraction.format.name,
      spans: extraction.spans.length,
      translated: translated.edits.length,
      filtered: translated.filtered,
      failedSpans: translated.failed,
    };

    if (translated.edits.length === 0) {
      registry?.record(filePath, bytes);
      return base;
    }

    const context = { format: extraction.format, encoding: this.options.encoding };
    const result = this.deps.reinjector.reinject(bytes, translated.edits, this.options.strategy, context);
    if (!result.success) {
      return this.reinjectionFailure(base, result.error);
    }

    const outcome = result.data;
    const reinjectedPath = path.join(this.options.outputDir, 'reinjected', relative);
    await fs.promises.mkdir(path.dirname(reinjectedPath), { recursive: true });
    await fs.promises.writeFile(reinjectedPath, outcome.bytes);

    if (outcome.strategy === 'safe') {
      const committed = await this.deps.committer.commitSafe(filePath, outcome.bytes, written =>
        this.deps.reinjector.verify({ ...outcome, bytes: written }, context)
      );
      if (!committed.success) {
        return this.reinjectionFailure(base, committed.error);
      }
    } else {
      await this.deps.committer.commit(filePath, outcome.bytes);
    }

    registry?.record(filePath, outcome.bytes);
    return this.withOutcome(base, outcome, reinjectedPath);
  }

  private async testReinsertFile(filePath: string, relative: string, bytes: Buffer): Promise<FileReport> {
    const extraction = this.extract(filePath, bytes);
    const translated = await this.translateSpans(extraction.spans);

    const base: FileReport = {
      file: relative,
      status: 'processed',
      format: extraction.format.name,
      spans: extraction.spans.length,
      translated: translated.edits.length,
      filtered: translated.filtered,
      failedSpans: translated.failed,
    };

    if (translated.edits.length === 0) {
      return base;
    }

    const context = { format: extraction.format, encoding: this.options.encoding };
    const result = this.deps.reinjector.reinject(bytes, translated.edits, 'test-first', context);
    if (!result.success) {
      return this.reinjectionFailure(base, result.error);
    }

    return this.withOutcome(base, result.data);
  }

  private extract(filePath: string, bytes: Buffer): Extraction {
    return this.deps.extractor.extractWithFormat(filePath, bytes, undefined, { encoding: this.options.encoding });
  }

  /**
   * Translate the spans worth translating. Any span that fails keeps its original text.
   */
  private async translateSpans(spans: TextSpan[]): Promise<TranslatedSpans> {
    const guard = this.deps.tokenGuard;
    const candidates = spans
      .map(span => {
        const parts = splitWhitespace(span.decodedText);
        return { span, parts, masked: guard.mask(parts.core) };
      })
      .filter(c => shouldTranslate(c.masked.maskedText, guard));

    const outcomes = await this.deps.translator.translateBatch(
      candidates.map(c => c.masked.maskedText),
      this.options.targetLocale
    );

    const edits: TextEdit[] = [];
    const records: SpanTranslationRecord[] = [];
    let failed = 0;

    for (const { span, parts, masked } of candidates) {
      const outcome: TranslateOutcome | undefined = outcomes.get(masked.maskedText);
      if (!outcome || !outcome.success) {
        failed++;
        records.push({
          offset: span.offset,
          source: span.decodedText,
          error: outcome && !outcome.success ? outcome.error.message : 'no translation',
        });
        continue;
      }

      let restored: string;
      try {
        restored = guard.unmask(outcome.data.translatedText, masked.protectedRanges, masked.originals);
      } catch (error) {
        if (!(error instanceof TokenRestoreError)) throw error;
        failed++;
        log(`[Orchestrator] Keeping original at 0x${span.offset.toString(16)}: ${error.message}`);
        records.push({ offset: span.offset, source: span.decodedText, error: error.message });
        continue;
      }

      records.push({
        offset: span.offset,
        source: span.decodedText,
        translated: restored,
        usedCache: outcome.data.usedCache,
        confidence: outcome.data.confidence,
      });

      if (restored !== parts.core) {
        edits.push({
          offset: span.offset,
          oldText: span.decodedText,
          newText: `${parts.leading}${restored}${parts.trailing}`,
          oldByteLength: span.byteLength,
        });
      }
    }

    return { edits, records, filtered: spans.length - candidates.length, failed };
  }

  private withOutcome(base: FileReport, outcome: ReinjectionOutcome, outputPath?: string): FileReport {
    return {
      ...base,
      strategy: outcome.strategy,
      truncations: outcome.truncations.length,
      probe: outcome.probe,
      outputPath,
    };
  }

  private reinjectionFailure(base: FileReport, error: ReinjectionError): FileReport {
    // Refusals leave the file as it was; everything else is a failure
    const recoverable = error.kind === 'GrowthUnsupported' || error.kind === 'VerificationFailed';
    log(`[Orchestrator] Reinjection of ${base.file} ${recoverable ? 'skipped' : 'failed'}: ${error.message}`);
    return { ...base, status: recoverable ? 'skipped' : 'failed', reason: error.message };
  }

  private async collectFiles(dir: string): Promise<string[]> {
    const outputDir = path.resolve(this.options.outputDir);
    const extensions = new Set(this.options.extensions.map(e => e.toLowerCase()));
    const found: string[] = [];

    const walk = async (current: string): Promise<void> => {
      if (path.resolve(current) === outputDir) return;
      const entries = await fs.promises.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
          found.push(full);
        }
      }
    };

    await walk(dir);
    return found.sort();
  }

  private async writeJson(filePath: string, data: unknown): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
  }
}
