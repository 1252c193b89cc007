#!/usr/bin/env node

/**
 * asset-tl
 *
 * Extracts text from binary game assets, translates it and writes it back
 * without breaking the surrounding binary layout.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as dotenv from 'dotenv';
import { loadSettings, Settings } from './config/settings';
import { errorMessage } from './core/errors';
import { REINJECTION_STRATEGIES } from './core/types';
import { flushProgress, log, setTransport } from './ipc/protocol';
import { createPipeline, Orchestrator, OrchestratorMode, orchestratorOptions, RunSummary } from './pipeline';

const VERSION = '1.0.0';

interface CommonOptions {
  config?: string;
  output?: string;
  strategy?: Settings['reinjection']['strategy'];
  target?: string;
  concurrency?: number;
  force?: boolean;
  json?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

/**
 * Settings file plus command-line overrides
 */
function resolveSettings(options: CommonOptions): Settings {
  const settings = loadSettings(options.config);

  return {
    ...settings,
    locales: { ...settings.locales, target: options.target ?? settings.locales.target },
    reinjection: { strategy: options.strategy ?? settings.reinjection.strategy },
    orchestrator: {
      ...settings.orchestrator,
      outputDir: options.output ?? settings.orchestrator.outputDir,
      concurrency: options.concurrency ?? settings.orchestrator.concurrency,
    },
  };
}

function printSummary(summary: RunSummary): void {
  const lines = [
    `${summary.mode}: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed${summary.stopped ? ' (stopped)' : ''}`,
  ];
  for (const file of summary.files) {
    const details = file.classification
      ? `${file.classification.status} (${file.classification.confidenceScore.toFixed(2)})`
      : [file.format, file.strategy, file.reason].filter(Boolean).join(', ');
    lines.push(`  ${file.status.padEnd(9)} ${file.file}${details ? `  ${details}` : ''}`);
  }
  console.error(lines.join('\n'));
}

async function runMode(mode: OrchestratorMode, target: string, options: CommonOptions): Promise<void> {
  if (options.json) {
    setTransport(process.stdout);
  }

  const settings = resolveSettings(options);
  const pipeline = createPipeline(settings);
  const orchestrator = new Orchestrator(pipeline.deps, {
    ...orchestratorOptions(settings),
    force: options.force ?? false,
  });

  const onSigint = () => orchestrator.stop();
  process.once('SIGINT', onSigint);

  try {
    const summary = await orchestrator.run(mode, target);
    printSummary(summary);
    process.exitCode = summary.failed > 0 ? 2 : 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await pipeline.close();
    await flushProgress();
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'config file (default: ~/.asset-translator/config.json)')
    .option('-o, --output <dir>', 'output directory for reports and extracted text')
    .option('-t, --target <locale>', 'target locale, e.g. fr')
    .addOption(new Option('-s, --strategy <strategy>', 'reinjection strategy').choices([...REINJECTION_STRATEGIES]))
    .option('--concurrency <n>', 'files processed in parallel', parsePositiveInt)
    .option('--json', 'emit progress events as JSON lines on stdout');
}

async function main(): Promise<void> {
  dotenv.config();

  const program = new Command();
  program
    .name('asset-tl')
    .description('Extract, translate and reinject text in binary game assets')
    .version(VERSION);

  withCommonOptions(program.command('analyze <dir>'))
    .description('classify files as Translated, PartiallyTranslated, Untranslated or NoText')
    .action((dir: string, options: CommonOptions) => runMode('analyze', dir, options));

  withCommonOptions(program.command('extract <path>'))
    .description('write extracted strings to <output>/extracted')
    .action((target: string, options: CommonOptions) => runMode('extract', target, options));

  withCommonOptions(program.command('translate <dir>'))
    .description('translate and reinject every supported file')
    .option('-f, --force', 'process files even if unchanged since the last run')
    .action((dir: string, options: CommonOptions) => runMode('translate', dir, options));

  withCommonOptions(program.command('test-reinsert <dir>'))
    .description('dry run: probe every reinjection strategy without touching game files')
    .action((dir: string, options: CommonOptions) => runMode('test-reinsert', dir, options));

  await program.parseAsync(process.argv);
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  log(`[Fatal] Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  log(`[Fatal] Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

// Start
main().catch((error: unknown) => {
  log(`[Fatal] ${errorMessage(error)}`);
  process.exit(1);
});
