/** Cumulative CPU tick totals taken from the first record of the kernel's stat file. */
export interface CpuSnapshot {
  idle: number;
  total: number;
}

/** Instantaneous memory counters, in bytes. */
export interface MemorySnapshot {
  total: number;
  free: number;
  available: number;
  buffers: number;
  cached: number;
}

export interface MemoryUsage {
  used: number;
  total: number;
  percent: number;
}

export interface GpuReading {
  available: boolean;
  percent: number;
  devices: number;
}

export interface Sample {
  cpuPercent: number;
  memPercent: number;
  memUsedBytes: number;
  memTotalBytes: number;
  gpuPercent: number;
  gpuAvailable: boolean;
  timestamp: Date;
}

export interface AggregateSummary {
  min: number;
  max: number;
  range: number;
  avg: number;
  count: number;
}

export interface AggregateReport {
  ticks: number;
  cpu: AggregateSummary | null;
  memory: AggregateSummary | null;
  /** `undefined` when the GPU metric is not tracked for this run. */
  gpu?: AggregateSummary | null;
}

export type SamplerState = 'idle' | 'baseline' | 'running' | 'stopped';
