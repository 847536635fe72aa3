import type { LogLevel } from '../utils/logger.js';

export interface ProfilerConfig {
  command: string;
  args: string[];
  logFile: string;
  /** Milliseconds between ticks. */
  interval: number;
  /** Milliseconds of warm-up before the child starts. */
  baseline: number;
  gpu: boolean;
  logLevel: LogLevel;
}
