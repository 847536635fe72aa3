import { z } from 'zod';
import {
  DEFAULT_BASELINE,
  DEFAULT_SAMPLE_INTERVAL,
  MIN_SAMPLE_INTERVAL_MS,
  RUNPROF_LOG_FILE,
} from '../constants.js';
import { parseDuration } from '../utils/parser.js';
import { LOG_LEVELS } from '../utils/logger.js';

export const durationSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

export const logLevelSchema = z.enum(LOG_LEVELS);

export const profilerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  logFile: z.string().min(1).default(RUNPROF_LOG_FILE),
  interval: durationSchema
    .default(DEFAULT_SAMPLE_INTERVAL)
    .pipe(z.number().int().min(MIN_SAMPLE_INTERVAL_MS)),
  baseline: durationSchema.default(DEFAULT_BASELINE).pipe(z.number().int().min(0)),
  gpu: z.boolean().default(true),
  logLevel: logLevelSchema.default('warn'),
});
