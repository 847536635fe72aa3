import { EXIT_SETUP_FAILURE, EXIT_USAGE } from '../constants.js';

export class RunprofError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RunprofError';
    this.code = code;
  }
}

export class UsageError extends RunprofError {
  public readonly exitCode: number = EXIT_USAGE;

  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

/**
 * Failure before the child command ever ran. Carries the exit code the
 * CLI should terminate with.
 */
export class SetupError extends RunprofError {
  public readonly exitCode: number = EXIT_SETUP_FAILURE;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'SetupError';
  }
}

export class UnsupportedPlatformError extends SetupError {
  constructor(platform: string) {
    super(`Unsupported operating system: ${platform}`, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

export class ConfigValidationError extends SetupError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class LogOpenError extends SetupError {
  constructor(path: string, cause: unknown) {
    super(`Failed to open log file ${path}: ${describeError(cause)}`, 'LOG_OPEN_FAILED', { cause });
    this.name = 'LogOpenError';
  }
}

export class BaselineError extends SetupError {
  constructor(cause: unknown) {
    super(`Failed to get CPU time: ${describeError(cause)}`, 'BASELINE_FAILED', { cause });
    this.name = 'BaselineError';
  }
}

export class SpawnError extends SetupError {
  constructor(command: string, cause: unknown) {
    super(`Failed to start command ${command}: ${describeError(cause)}`, 'SPAWN_FAILED', {
      cause,
    });
    this.name = 'SpawnError';
  }
}

export class CounterReadError extends RunprofError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${describeError(cause)}`, 'COUNTER_READ_FAILED', { cause });
    this.name = 'CounterReadError';
    this.path = path;
  }
}

export class CounterParseError extends RunprofError {
  constructor(source: string, detail: string) {
    super(`Failed to parse ${source}: ${detail}`, 'COUNTER_PARSE_FAILED');
    this.name = 'CounterParseError';
  }
}

export class ProbeError extends RunprofError {
  constructor(command: string, cause: unknown) {
    super(`GPU query via ${command} failed: ${describeError(cause)}`, 'PROBE_FAILED', { cause });
    this.name = 'ProbeError';
  }
}

export class StreamError extends RunprofError {
  constructor(stream: string, cause: unknown) {
    super(`Error reading ${stream}: ${describeError(cause)}`, 'STREAM_READ_FAILED', { cause });
    this.name = 'StreamError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
