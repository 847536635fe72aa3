export type {
  CpuSnapshot,
  MemorySnapshot,
  MemoryUsage,
  GpuReading,
  Sample,
  AggregateSummary,
  AggregateReport,
  SamplerState,
} from './metrics.js';

export type { StreamName, OutputLine } from './output.js';

export type { ProfilerConfig } from './config.js';
