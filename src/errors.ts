/**
 * Error types for fatal conversion failures.
 *
 * Per-record problems never surface as errors; they become skipped
 * build results. Everything here aborts the run.
 */

export type ConversionStage = 'loading' | 'building' | 'assembling' | 'writing';

export class InputReadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'InputReadError';
  }
}

export class InputParseError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'InputParseError';
  }
}

export class InputFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'InputFormatError';
  }
}

export class EmptyBundleError extends Error {
  constructor(public readonly recordCount: number) {
    super(`No valid STIX objects created from ${recordCount} record(s)`);
    this.name = 'EmptyBundleError';
  }
}

export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'OutputWriteError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Wraps whatever stopped a conversion, tagged with the stage it failed in. */
export class ConversionError extends Error {
  constructor(
    public readonly stage: ConversionStage,
    cause: unknown,
  ) {
    super(
      `Conversion failed while ${stage}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'ConversionError';
  }
}
