/**
 * Top-level conversion: galaxy file in, STIX bundle file out.
 *
 * One pass through loading, building, assembling and writing. Bad
 * clusters are skipped along the way; anything that stops the pass is
 * logged and re-thrown as a `ConversionError` naming the stage.
 */

import { ConversionError, type ConversionStage } from '../errors.js';
import { loadGalaxyDocument } from '../ingestion/galaxy-loader.js';
import { DEFAULT_INDENT, writeBundle } from '../output/bundle-writer.js';
import type { ConverterConfig } from '../types/config.js';
import type { MispGalaxyDocument } from '../types/misp.js';
import type { StixBundle } from '../types/stix.js';
import { randomIdGenerator, type IdGenerator } from '../utils/identifiers.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { collectStixObjects, createBundle, type ConversionSummary } from './bundle-assembler.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConvertOptions = Pick<ConverterConfig, 'inputPath' | 'outputPath'> &
  Partial<Pick<ConverterConfig, 'dryRun' | 'indent'>>;

export interface ConvertDependencies {
  generateId?: IdGenerator;
  logger?: Logger;
  loadDocument?: (path: string) => Promise<MispGalaxyDocument>;
  writeBundle?: (bundle: StixBundle, outputPath: string, indent: number) => Promise<void>;
  /** Called as each stage begins. */
  onStage?: (stage: ConversionStage) => void;
}

export interface ConversionResult {
  bundle: StixBundle;
  summary: ConversionSummary;
  outputPath: string;
  written: boolean;
}

const defaultLogger = createLogger('converter');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function convert(
  options: ConvertOptions,
  deps: ConvertDependencies = {},
): Promise<ConversionResult> {
  const logger = deps.logger ?? defaultLogger;
  const generateId = deps.generateId ?? randomIdGenerator;
  const load = deps.loadDocument ?? loadGalaxyDocument;
  const write = deps.writeBundle ?? writeBundle;

  let stage: ConversionStage = 'loading';

  try {
    deps.onStage?.(stage);
    const document = await load(options.inputPath);

    stage = 'building';
    deps.onStage?.(stage);
    const { objects, summary } = collectStixObjects(document.values, {
      generateId,
      logger: deps.logger,
    });

    stage = 'assembling';
    deps.onStage?.(stage);
    const bundle = createBundle(objects, summary.recordsSeen, generateId);

    if (options.dryRun) {
      logger.info(`Dry run: ${bundle.objects.length} object(s) not written`);
      return { bundle, summary, outputPath: options.outputPath, written: false };
    }

    stage = 'writing';
    deps.onStage?.(stage);
    await write(bundle, options.outputPath, options.indent ?? DEFAULT_INDENT);
    logger.info(`STIX 2.0 JSON saved as ${options.outputPath}`);

    return { bundle, summary, outputPath: options.outputPath, written: true };
  } catch (err) {
    logger.error(`Conversion failed: ${describeError(err)}`);
    throw new ConversionError(stage, err);
  }
}
