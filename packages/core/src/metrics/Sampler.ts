import type {
  AggregateReport,
  CpuSnapshot,
  GpuReading,
  MemoryUsage,
  Sample,
  SamplerState,
} from '@runprof/shared';
import {
  BASELINE_GUARD_MS,
  describeError,
  formatBytes,
  formatPercent,
  getLogger,
} from '@runprof/shared';
import type { CounterSource } from '../counters/ProcCounters.js';
import { cpuUtilization, memoryUsage } from '../counters/utilization.js';
import type { GpuProbe } from '../gpu/GpuProbe.js';
import type { RunLog } from '../logs/RunLog.js';
import { sleep } from '../utils/sleep.js';
import { SampleAggregator } from './SampleAggregator.js';

export interface SamplerOptions {
  counters: CounterSource;
  gpu: GpuProbe;
  log: RunLog;
  /** Milliseconds between ticks. */
  interval: number;
  /** Requested warm-up; never shorter than one interval plus a guard. */
  baseline: number;
}

/**
 * Periodic background sampler: idle -> baseline -> running -> stopped.
 *
 * All aggregate state is owned here and only mutated from `tick()`. The
 * abort signal is checked once before every tick; a tick already in flight
 * when `stop()` is called runs to completion and is counted.
 *
 * A tick whose CPU or memory read fails still counts; the affected metric is
 * recorded at its last known value (zero before the first success).
 */
export class Sampler {
  private counters: CounterSource;
  private gpu: GpuProbe;
  private log: RunLog;
  private interval: number;
  private baseline: number;
  private aggregator: SampleAggregator;
  private controller = new AbortController();
  private state: SamplerState = 'idle';
  private loop: Promise<void> | null = null;
  private failure: unknown = null;

  private prevCpu: CpuSnapshot | null = null;
  private lastCpuPercent: number = 0;
  private lastMemory: MemoryUsage = { used: 0, total: 0, percent: 0 };

  constructor(options: SamplerOptions) {
    this.counters = options.counters;
    this.gpu = options.gpu;
    this.log = options.log;
    this.interval = options.interval;
    this.baseline = options.baseline;
    this.aggregator = new SampleAggregator(options.gpu.available);
  }

  getState(): SamplerState {
    return this.state;
  }

  getBaselineWindow(): number {
    return Math.max(this.baseline, this.interval + BASELINE_GUARD_MS);
  }

  getReport(): AggregateReport {
    return this.aggregator.finalize();
  }

  /**
   * Retain `baseline` as the reference snapshot and begin the warm-up window.
   * Resolves when the window has elapsed and ticking has begun, or straight
   * away if the sampler is stopped during it.
   */
  start(baseline: CpuSnapshot): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Sampler cannot start from state "${this.state}"`);
    }

    this.prevCpu = baseline;
    this.state = 'baseline';

    return new Promise<void>((resolve) => {
      this.loop = this.run(resolve).catch((err: unknown) => {
        this.failure = err;
        this.state = 'stopped';
        getLogger().error({ err }, 'Sampler loop failed');
        resolve();
      });
    });
  }

  /** Signal the loop to stop and wait for it to acknowledge. Safe to call more than once. */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) {
      await this.loop;
    }
    this.state = 'stopped';
    if (this.failure) {
      throw this.failure;
    }
  }

  private async run(onRunning: () => void): Promise<void> {
    const { signal } = this.controller;

    if (!(await sleep(this.getBaselineWindow(), signal))) {
      this.state = 'stopped';
      onRunning();
      return;
    }

    this.state = 'running';
    getLogger().debug({ interval: this.interval }, 'Sampler running');
    onRunning();

    let next = Date.now();
    while (!signal.aborted) {
      await this.tick();

      next += this.interval;
      const now = Date.now();
      while (next <= now) next += this.interval;

      if (!(await sleep(next - now, signal))) break;
    }

    this.state = 'stopped';
    getLogger().debug({ ticks: this.aggregator.getTicks() }, 'Sampler stopped');
  }

  private async tick(): Promise<void> {
    const timestamp = this.log.now();
    const cpuPercent = await this.sampleCpu();
    const memory = await this.sampleMemory();
    const gpu = this.gpu.available ? await this.sampleGpu() : null;

    const sample: Sample = {
      cpuPercent,
      memPercent: memory.percent,
      memUsedBytes: memory.used,
      memTotalBytes: memory.total,
      gpuPercent: gpu?.percent ?? 0,
      gpuAvailable: gpu?.available ?? false,
      timestamp,
    };

    this.aggregator.record(sample);
    this.log.info(formatSample(sample));
  }

  private async sampleCpu(): Promise<number> {
    try {
      const curr = await this.counters.readCpu();
      const prev = this.prevCpu;
      this.prevCpu = curr;

      const usage = prev ? cpuUtilization(prev, curr) : null;
      if (usage === null) {
        this.log.warn('CPU sample skipped: no ticks elapsed since the previous sample');
      } else {
        this.lastCpuPercent = usage * 100;
      }
    } catch (err) {
      getLogger().debug({ err }, 'CPU sample failed');
      this.log.warn(`CPU sample failed: ${describeError(err)}`);
    }
    return this.lastCpuPercent;
  }

  private async sampleMemory(): Promise<MemoryUsage> {
    try {
      this.lastMemory = memoryUsage(await this.counters.readMemory());
    } catch (err) {
      getLogger().debug({ err }, 'Memory sample failed');
      this.log.warn(`Memory sample failed: ${describeError(err)}`);
    }
    return this.lastMemory;
  }

  private async sampleGpu(): Promise<GpuReading | null> {
    try {
      return await this.gpu.probe();
    } catch (err) {
      getLogger().debug({ err }, 'GPU probe failed');
      this.log.warn(describeError(err));
      return null;
    }
  }
}

export function formatSample(sample: Sample): string {
  let line =
    `CPU:${formatPercent(sample.cpuPercent)} | ` +
    `Memory:${formatPercent(sample.memPercent)} ` +
    `(${formatBytes(sample.memUsedBytes)}/${formatBytes(sample.memTotalBytes)})`;

  if (sample.gpuAvailable) {
    line += ` | GPU:${formatPercent(sample.gpuPercent)}`;
  }
  return line;
}
