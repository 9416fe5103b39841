#!/usr/bin/env node

// CLI entry point
// - Command name: `runstat` with subcommands `show`, `stats`, `metadata` and `convert`.
// - Every command reads one or more result files; files sharing benchmark
//   names are merged run by run.
// - `convert` filters and rewrites benchmarks, then dumps them to --output.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  RunstatError,
  isRunstatError,
  type BenchmarkSuite,
} from '@runstat/core';
import {
  renderCLIView,
  renderMetadata,
  renderShow,
  renderStats,
} from './render.js';
import {
  collectList,
  parseMetadataAssignments,
  type ConvertCliOptions,
} from './flags.js';
import { printSuiteDebug } from './debug.js';
import { applyConversion, loadSuites } from './convert.js';

class CliError extends RunstatError {
  constructor(message: string) {
    super({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }
}

const program = new Command();

program
  .name('runstat')
  .description('Inspect and rewrite benchmark result files')
  .version('0.1.0')
  .option('--debug', 'Print loaded files and metadata to stderr', false);

function isDebug(): boolean {
  return program.opts<{ debug?: boolean }>().debug === true;
}

async function loadForCommand(files: string[]): Promise<BenchmarkSuite> {
  const suite = await loadSuites(files);
  if (isDebug()) printSuiteDebug(suite, 'input');
  return suite;
}

function writeLines(lines: readonly string[]): void {
  if (lines.length > 0) process.stdout.write(lines.join('\n') + '\n');
}

program
  .command('show')
  .description('Print median and standard deviation of every benchmark')
  .argument('<files...>', 'Result files (.json or .json.gz)')
  .action(async (files: string[]) => {
    try {
      writeLines(renderShow(await loadForCommand(files)));
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

program
  .command('stats')
  .description('Print detailed statistics of every benchmark')
  .argument('<files...>', 'Result files (.json or .json.gz)')
  .action(async (files: string[]) => {
    try {
      writeLines(renderStats(await loadForCommand(files)));
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

program
  .command('metadata')
  .description('Print common metadata, then metadata of each benchmark')
  .argument('<files...>', 'Result files (.json or .json.gz)')
  .action(async (files: string[]) => {
    try {
      writeLines(renderMetadata(await loadForCommand(files)));
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

program
  .command('convert')
  .description('Filter, rewrite and save benchmark results')
  .argument('<input>', 'Result file to convert')
  .requiredOption('-o, --output <file>', 'Output file (.json or .json.gz)')
  .option('--add <file>', 'Merge runs of another result file', collectList)
  .option(
    '--include-benchmark <names>',
    'Keep only these benchmarks (comma separated, repeatable)',
    collectList
  )
  .option(
    '--exclude-benchmark <names>',
    'Drop these benchmarks (comma separated, repeatable)',
    collectList
  )
  .option(
    '--extract-metadata <name>',
    'Replace samples with the numeric metadata value <name>'
  )
  .option('--remove-all-metadata', 'Keep only name and unit metadata', false)
  .option(
    '--update-metadata <assignments>',
    'Set metadata on every run: key=value[,key=value...]'
  )
  .option('--replace', 'Overwrite the output file if it exists', false)
  .option('--compact', 'Write JSON without indentation', false)
  .action(async (input: string, options: ConvertCliOptions) => {
    try {
      const suite = await loadForCommand([input, ...(options.add ?? [])]);
      const converted = applyConversion(suite, {
        includeBenchmarks: options.includeBenchmark,
        excludeBenchmarks: options.excludeBenchmark,
        extractMetadata: options.extractMetadata,
        removeAllMetadata: options.removeAllMetadata,
        updateMetadata:
          options.updateMetadata === undefined
            ? undefined
            : parseMetadataAssignments(options.updateMetadata),
      });
      await converted.dump(options.output, {
        replace: options.replace,
        compact: options.compact,
      });
      if (isDebug()) printSuiteDebug(converted, 'output');
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: RunstatError;
  if (isRunstatError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new CliError(message);
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
