import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { parse } from 'csv-parse/sync';
import type { GpuReading } from '@runprof/shared';
import { NVIDIA_SMI_COMMAND, NVIDIA_SMI_QUERY_ARGS, ProbeError, getLogger } from '@runprof/shared';

const execFileAsync = promisify(execFile);

const GPU_QUERY_TIMEOUT = 5000;

/**
 * Optional GPU utilization source, capability-checked once at start-up.
 * Callers branch on `available`; when it is false no GPU figure is reported
 * anywhere.
 */
export interface GpuProbe {
  readonly available: boolean;
  probe(): Promise<GpuReading>;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: 'utf-8',
    timeout: GPU_QUERY_TIMEOUT,
  });
  return stdout;
};

const NO_GPU: GpuReading = { available: false, percent: 0, devices: 0 };

export const unavailableGpuProbe: GpuProbe = {
  available: false,
  probe: async () => ({ ...NO_GPU }),
};

/**
 * Mean utilization across devices. A device whose value does not parse
 * counts as 0%; no devices at all means no reading.
 */
export function aggregateGpuUtilization(values: readonly string[]): GpuReading {
  if (values.length === 0) return { ...NO_GPU };

  let total = 0;
  for (const value of values) {
    const util = Number.parseFloat(value.trim());
    total += Number.isFinite(util) ? util : 0;
  }

  return { available: true, percent: total / values.length, devices: values.length };
}

/** First column of each row of `nvidia-smi --query-gpu=... --format=csv,noheader`. */
export function parseNvidiaSmiCsv(text: string): string[] {
  const records: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];

  return records.map((record: unknown) =>
    Array.isArray(record) && record.length > 0 ? String(record[0]) : '',
  );
}

export class NvidiaSmiProbe implements GpuProbe {
  public readonly available = true;
  private command: string;
  private run: CommandRunner;

  constructor(command: string = NVIDIA_SMI_COMMAND, run: CommandRunner = runCommand) {
    this.command = command;
    this.run = run;
  }

  async probe(): Promise<GpuReading> {
    let output: string;
    try {
      output = await this.run(this.command, NVIDIA_SMI_QUERY_ARGS);
    } catch (err) {
      throw new ProbeError(this.command, err);
    }
    return aggregateGpuUtilization(parseNvidiaSmiCsv(output));
  }
}

export interface DetectGpuOptions {
  enabled?: boolean;
  command?: string;
  run?: CommandRunner;
}

export async function detectGpuProbe(options: DetectGpuOptions = {}): Promise<GpuProbe> {
  const { enabled = true, command = NVIDIA_SMI_COMMAND, run = runCommand } = options;
  if (!enabled) return unavailableGpuProbe;

  try {
    await run(command, ['-L']);
  } catch (err) {
    getLogger().debug({ err, command }, 'GPU utility not available, GPU metric disabled');
    return unavailableGpuProbe;
  }

  getLogger().debug({ command }, 'GPU utility detected');
  return new NvidiaSmiProbe(command, run);
}
