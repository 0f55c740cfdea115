/**
 * Configuration types for the converter.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ConverterConfig {
  inputPath: string;
  outputPath: string;
  logLevel: LogLevel;
  dryRun: boolean;
  indent: number;                // JSON indentation of the written bundle
}

/** Values a caller may set on top of defaults, config file and environment. */
export type ConverterConfigOverrides = Partial<ConverterConfig> & {
  configPath?: string;
};
