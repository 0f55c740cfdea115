/**
 * Converter configuration.
 *
 * Layers, lowest precedence first: built-in defaults, an optional YAML
 * config file, environment variables, then explicit overrides (CLI flags).
 * The merged result is validated once with Zod.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../errors.js';
import type { ConverterConfig, ConverterConfigOverrides } from '../types/config.js';
import { describeError } from '../utils/logger.js';

export const DEFAULT_CONFIG: ConverterConfig = {
  inputPath: 'misp_data.json',
  outputPath: 'stix_output_2_0.json',
  logLevel: 'info',
  dryRun: false,
  indent: 4,
};

export const ConverterConfigSchema = z.object({
  inputPath: z.string().min(1, 'inputPath must not be empty'),
  outputPath: z.string().min(1, 'outputPath must not be empty'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  dryRun: z.boolean(),
  indent: z.number().int().min(0).max(10),
});

const ConfigFileSchema = ConverterConfigSchema.partial().strict();

type ConfigLayer = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

/** Read a YAML config file. An empty file is an empty layer. */
export async function readConfigFile(path: string): Promise<ConfigLayer> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${describeError(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Could not parse config file ${path}: ${describeError(err)}`, { cause: err });
  }
  if (data === null || data === undefined) return {};

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    inputPath: env.MISP_STIX_INPUT,
    outputPath: env.MISP_STIX_OUTPUT,
    logLevel: env.LOG_LEVEL?.trim().toLowerCase(),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve the effective configuration.
 *
 * @param overrides - Explicit values; `configPath` selects the YAML file
 *                    (falls back to `MISP_STIX_CONFIG`).
 * @param env       - Environment to read, `process.env` by default.
 */
export async function loadConverterConfig(
  overrides: ConverterConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConverterConfig> {
  const configPath = overrides.configPath ?? env.MISP_STIX_CONFIG;
  const fileLayer = configPath ? await readConfigFile(configPath) : {};

  const merged: ConfigLayer = {
    ...DEFAULT_CONFIG,
    ...withoutUndefined(fileLayer),
    ...withoutUndefined(configFromEnv(env)),
    ...withoutUndefined({ ...overrides, configPath: undefined }),
  };

  const result = ConverterConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function withoutUndefined(layer: ConfigLayer): ConfigLayer {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
