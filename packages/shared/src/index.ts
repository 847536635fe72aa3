// Types
export type {
  CpuSnapshot,
  MemorySnapshot,
  MemoryUsage,
  GpuReading,
  Sample,
  AggregateSummary,
  AggregateReport,
  SamplerState,
  StreamName,
  OutputLine,
  ProfilerConfig,
} from './types/index.js';

// Constants
export {
  RUNPROF_NAME,
  RUNPROF_VERSION,
  RUNPROF_LOG_FILE,
  RUNPROF_LOG_LEVEL,
  PROC_STAT_FILE,
  PROC_MEMINFO_FILE,
  SUPPORTED_PLATFORMS,
  NVIDIA_SMI_COMMAND,
  NVIDIA_SMI_QUERY_ARGS,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_BASELINE,
  MIN_SAMPLE_INTERVAL_MS,
  BASELINE_GUARD_MS,
  EXIT_USAGE,
  EXIT_SETUP_FAILURE,
  EXIT_INTERNAL_ERROR,
  EXIT_SIGNAL_BASE,
  RUN_SEPARATOR,
  SUMMARY_SEPARATOR,
  RUN_FINISHED_BANNER,
  WARN_MARKER,
} from './constants.js';

// Schemas
export { profilerConfigSchema, durationSchema, logLevelSchema } from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatElapsed,
  formatBytes,
  formatPercent,
  formatTimestamp,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger, isLogLevel, LOG_LEVELS } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  RunprofError,
  UsageError,
  SetupError,
  UnsupportedPlatformError,
  ConfigValidationError,
  LogOpenError,
  BaselineError,
  SpawnError,
  CounterReadError,
  CounterParseError,
  ProbeError,
  StreamError,
  describeError,
} from './utils/errors.js';
