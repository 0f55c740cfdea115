/**
 * Convert command: MISP galaxy to STIX bundle.
 *
 * Resolves configuration, runs the conversion with a spinner per stage,
 * and prints a summary of what was built and what was skipped.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { loadConverterConfig } from '../../config/loader.js';
import { convert, type ConversionResult } from '../../conversion/index.js';
import type { ConversionStage } from '../../errors.js';
import type { ConverterConfig } from '../../types/config.js';
import { describeError, setLogLevel } from '../../utils/logger.js';
import {
  parseIndent,
  parseLogLevel,
  printError,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConvertCommandOptions {
  input?: string;
  output?: string;
  config?: string;
  logLevel?: string;
  indent?: string;
  dryRun?: boolean;
}

const STAGE_LABELS: Record<ConversionStage, string> = {
  loading: 'Loading MISP galaxy...',
  building: 'Building threat actors and relationships...',
  assembling: 'Assembling STIX bundle...',
  writing: 'Writing STIX bundle...',
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Convert a MISP threat-actor galaxy into a STIX bundle')
    .option('-i, --input <file>', 'MISP galaxy JSON file (default: misp_data.json)')
    .option('-o, --output <file>', 'Output STIX JSON file (default: stix_output_2_0.json)')
    .option('-c, --config <file>', 'YAML config file')
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .option('--indent <spaces>', 'JSON indentation of the output file')
    .option('--dry-run', 'Build the bundle without writing it')
    .action(async (options: ConvertCommandOptions) => {
      await runConvert(options);
    });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export async function runConvert(options: ConvertCommandOptions): Promise<ConversionResult> {
  const startTime = Date.now();

  // --- Resolve configuration ---
  let config: ConverterConfig;
  try {
    config = await loadConverterConfig({
      inputPath: options.input,
      outputPath: options.output,
      configPath: options.config,
      logLevel: options.logLevel !== undefined ? parseLogLevel(options.logLevel) : undefined,
      indent: options.indent !== undefined ? parseIndent(options.indent) : undefined,
      dryRun: options.dryRun,
    });
  } catch (err) {
    printError('Invalid configuration', describeError(err));
    process.exit(1);
  }

  setLogLevel(config.logLevel);

  console.log('');
  console.log(chalk.bold.cyan('  MISP → STIX Conversion'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');

  const inputPath = resolveInputPath(config.inputPath);
  const outputPath = resolve(config.outputPath);

  printInfo(`Input:  ${inputPath}`);
  printInfo(`Output: ${config.dryRun ? '(dry run)' : outputPath}`);
  console.log('');

  // --- Convert ---
  const spinner = ora(STAGE_LABELS.loading).start();
  let result: ConversionResult;
  try {
    result = await convert(
      { inputPath, outputPath, dryRun: config.dryRun, indent: config.indent },
      {
        onStage: (stage) => {
          spinner.text = STAGE_LABELS[stage];
        },
      },
    );
    spinner.succeed(chalk.green(`Bundle ${result.bundle.id} (${result.bundle.objects.length} objects)`));
  } catch (err) {
    spinner.fail(chalk.red('Conversion failed'));
    printError('Conversion error', describeError(err));
    process.exit(1);
  }

  // --- Summary ---
  const { summary } = result;
  const durationMs = Date.now() - startTime;

  console.log('');
  console.log(chalk.bold('  Conversion Summary'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log(`  ${chalk.cyan('Clusters read:')}        ${summary.recordsSeen}`);
  console.log(`  ${chalk.cyan('Threat actors:')}        ${summary.actorsBuilt}`);
  console.log(`  ${chalk.cyan('Relationships:')}        ${summary.relationshipsBuilt}`);
  console.log(`  ${chalk.cyan('Duration:')}             ${(durationMs / 1000).toFixed(1)}s`);
  console.log('');

  if (summary.recordsSkipped > 0 || summary.relationshipsSkipped > 0) {
    printWarning(
      `Skipped ${summary.recordsSkipped} cluster(s) and ${summary.relationshipsSkipped} relationship(s); see log for details`,
    );
  }

  if (result.written) {
    printSuccess(`STIX bundle written: ${result.outputPath}`);
  } else {
    printSuccess('Dry run complete: nothing written');
  }
  console.log('');

  return result;
}
