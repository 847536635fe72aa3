export const RUNPROF_NAME = 'runprof';
export const RUNPROF_VERSION = '0.3.0';

export const RUNPROF_LOG_FILE = process.env.RUNPROF_LOG_FILE || 'runprof.log';
export const RUNPROF_LOG_LEVEL = process.env.RUNPROF_LOG_LEVEL || 'warn';

export const PROC_STAT_FILE = '/proc/stat';
export const PROC_MEMINFO_FILE = '/proc/meminfo';
export const SUPPORTED_PLATFORMS: readonly NodeJS.Platform[] = ['linux'];

export const NVIDIA_SMI_COMMAND = 'nvidia-smi';
export const NVIDIA_SMI_QUERY_ARGS = [
  '--query-gpu=utilization.gpu',
  '--format=csv,noheader,nounits',
] as const;

export const DEFAULT_SAMPLE_INTERVAL = '250ms';
export const DEFAULT_BASELINE = '1s';
export const MIN_SAMPLE_INTERVAL_MS = 10;
// Added on top of one interval so the first delta never spans a short window.
export const BASELINE_GUARD_MS = 10;

export const EXIT_USAGE = 2;
export const EXIT_SETUP_FAILURE = 125;
export const EXIT_INTERNAL_ERROR = 1;
export const EXIT_SIGNAL_BASE = 128;

export const RUN_SEPARATOR = '=========================================';
export const SUMMARY_SEPARATOR = '-----------------------------------------';
export const RUN_FINISHED_BANNER = '=============== FINISHED ================';
export const WARN_MARKER = 'WARN';
