import { describe, it, expect } from 'vitest';
import {
  RUNPROF_VERSION,
  RUNPROF_LOG_FILE,
  PROC_STAT_FILE,
  PROC_MEMINFO_FILE,
  SUPPORTED_PLATFORMS,
  DEFAULT_SAMPLE_INTERVAL,
  MIN_SAMPLE_INTERVAL_MS,
  EXIT_USAGE,
  EXIT_SETUP_FAILURE,
  EXIT_INTERNAL_ERROR,
  NVIDIA_SMI_QUERY_ARGS,
} from '../constants.js';
import { parseDuration } from '../utils/parser.js';

describe('constants', () => {
  it('should follow semver format for the version', () => {
    expect(RUNPROF_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should default the log file to a relative path', () => {
    if (!process.env.RUNPROF_LOG_FILE) {
      expect(RUNPROF_LOG_FILE).toBe('runprof.log');
    } else {
      expect(RUNPROF_LOG_FILE).toBe(process.env.RUNPROF_LOG_FILE);
    }
  });

  it('should read counters from procfs', () => {
    expect(PROC_STAT_FILE).toBe('/proc/stat');
    expect(PROC_MEMINFO_FILE).toBe('/proc/meminfo');
    expect(SUPPORTED_PLATFORMS).toEqual(['linux']);
  });

  it('should default to an interval above the minimum', () => {
    expect(parseDuration(DEFAULT_SAMPLE_INTERVAL)).toBeGreaterThanOrEqual(MIN_SAMPLE_INTERVAL_MS);
  });

  it('should use distinct exit codes for tool failures', () => {
    const codes = new Set([EXIT_USAGE, EXIT_SETUP_FAILURE, EXIT_INTERNAL_ERROR]);
    expect(codes.size).toBe(3);
    expect(EXIT_SETUP_FAILURE).not.toBe(0);
  });

  it('should query utilization without headers or units', () => {
    expect(NVIDIA_SMI_QUERY_ARGS).toEqual([
      '--query-gpu=utilization.gpu',
      '--format=csv,noheader,nounits',
    ]);
  });
});
