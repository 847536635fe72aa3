import type { AggregateReport, AggregateSummary, Sample } from '@runprof/shared';
import { formatBytes, formatPercent } from '@runprof/shared';
import { RunningAggregate } from './RunningAggregate.js';

export class SampleAggregator {
  private readonly cpu = new RunningAggregate();
  private readonly memory = new RunningAggregate();
  private readonly gpu = new RunningAggregate();
  private readonly trackGpu: boolean;
  private ticks: number = 0;

  constructor(trackGpu: boolean) {
    this.trackGpu = trackGpu;
  }

  record(sample: Sample): void {
    this.ticks++;
    this.cpu.update(sample.cpuPercent);
    this.memory.update(sample.memUsedBytes);
    if (this.trackGpu && sample.gpuAvailable) {
      this.gpu.update(sample.gpuPercent);
    }
  }

  getTicks(): number {
    return this.ticks;
  }

  finalize(): AggregateReport {
    const report: AggregateReport = {
      ticks: this.ticks,
      cpu: this.cpu.finalize(),
      memory: this.memory.finalize(),
    };
    if (this.trackGpu) {
      report.gpu = this.gpu.finalize();
    }
    return report;
  }
}

export function formatReport(report: AggregateReport): string[] {
  const lines = [
    formatSummary('CPU', report.cpu, formatPercent),
    formatSummary('Memory', report.memory, formatBytes),
  ];
  if (report.gpu !== undefined) {
    lines.push(formatSummary('GPU', report.gpu, formatPercent));
  }
  return lines;
}

function formatSummary(
  label: string,
  summary: AggregateSummary | null,
  formatValue: (value: number) => string,
): string {
  if (!summary) return `${label} (no data)`;

  return (
    `${label} (min: ${formatValue(summary.min)}, max: ${formatValue(summary.max)}, ` +
    `range: ${formatValue(summary.range)}, avg: ${formatValue(summary.avg)})`
  );
}
