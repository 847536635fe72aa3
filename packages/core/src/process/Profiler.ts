import { spawn } from 'node:child_process';
import { once, type EventEmitter } from 'node:events';
import type { CpuSnapshot, ProfilerConfig } from '@runprof/shared';
import {
  BaselineError,
  RUN_FINISHED_BANNER,
  RUN_SEPARATOR,
  SUMMARY_SEPARATOR,
  SUPPORTED_PLATFORMS,
  SpawnError,
  UnsupportedPlatformError,
  formatElapsed,
  getLogger,
} from '@runprof/shared';
import { ProcCounterSource, type CounterSource } from '../counters/ProcCounters.js';
import { detectGpuProbe, type GpuProbe } from '../gpu/GpuProbe.js';
import { LogSink } from '../logs/LogSink.js';
import { RunLog, systemClock, type Clock } from '../logs/RunLog.js';
import {
  multiplexOutput,
  type OutputMirrors,
  type OutputSource,
} from '../logs/OutputMultiplexer.js';
import { formatReport } from '../metrics/SampleAggregator.js';
import { Sampler } from '../metrics/Sampler.js';
import { describeExit, toExitCode, type ExitStatus } from './exitStatus.js';

export interface ChildHandle extends EventEmitter, OutputSource {}

export type SpawnFn = (command: string, args: readonly string[]) => ChildHandle;

export const spawnPiped: SpawnFn = (command, args) =>
  spawn(command, [...args], { stdio: ['inherit', 'pipe', 'pipe'] });

export type ProfilerRunConfig = Pick<
  ProfilerConfig,
  'command' | 'args' | 'logFile' | 'interval' | 'baseline' | 'gpu'
>;

export interface ProfilerOptions {
  platform?: NodeJS.Platform;
  counters?: CounterSource;
  /** Skips detection when given. */
  gpuProbe?: GpuProbe;
  spawn?: SpawnFn;
  mirrors?: OutputMirrors;
  clock?: Clock;
}

interface LaunchedChild {
  child: ChildHandle;
  exited: Promise<ExitStatus>;
}

/**
 * Runs one child command under the sampler and writes the run log.
 *
 * `run()` resolves with the exit code to propagate. Failures before the
 * child is running (platform, log file, baseline counters, spawn) reject
 * with a {@link SetupError}.
 */
export class Profiler {
  private config: ProfilerRunConfig;
  private platform: NodeJS.Platform;
  private counters: CounterSource;
  private gpuProbe: GpuProbe | null;
  private spawn: SpawnFn;
  private mirrors: OutputMirrors;
  private clock: Clock;

  constructor(config: ProfilerRunConfig, options: ProfilerOptions = {}) {
    this.config = config;
    this.platform = options.platform ?? process.platform;
    this.counters = options.counters ?? new ProcCounterSource();
    this.gpuProbe = options.gpuProbe ?? null;
    this.spawn = options.spawn ?? spawnPiped;
    this.mirrors = options.mirrors ?? { stdout: process.stdout, stderr: process.stderr };
    this.clock = options.clock ?? systemClock;
  }

  async run(): Promise<number> {
    if (!SUPPORTED_PLATFORMS.includes(this.platform)) {
      throw new UnsupportedPlatformError(this.platform);
    }

    const sink = await LogSink.open(this.config.logFile);
    try {
      return await this.profile(new RunLog(sink, this.mirrors.stderr, this.clock));
    } finally {
      await sink.close();
    }
  }

  private async profile(log: RunLog): Promise<number> {
    const { command, args } = this.config;

    let baseline: CpuSnapshot;
    try {
      baseline = await this.counters.readCpu();
    } catch (err) {
      throw new BaselineError(err);
    }

    const gpu = this.gpuProbe ?? (await detectGpuProbe({ enabled: this.config.gpu }));
    const sampler = new Sampler({
      counters: this.counters,
      gpu,
      log,
      interval: this.config.interval,
      baseline: this.config.baseline,
    });

    log.blank();
    log.info(RUN_SEPARATOR);
    log.info(`Starting command: ${[command, ...args].join(' ')}`);
    log.info('Collecting baseline...');

    try {
      await sampler.start(baseline);

      const startedAt = this.clock().getTime();
      let launched: LaunchedChild;
      try {
        launched = await this.launch();
      } catch (err) {
        if (err instanceof SpawnError) log.record(err.message);
        throw err;
      }
      log.info('Started command!');

      await multiplexOutput(launched.child, this.mirrors, log);
      const status = await launched.exited;
      await sampler.stop();

      const exitCode = toExitCode(status);
      const elapsed = this.clock().getTime() - startedAt;
      getLogger().debug({ status, exitCode, elapsed }, 'Command finished');

      log.info(`Finished command: exit code ${exitCode}`);
      log.info(SUMMARY_SEPARATOR);
      for (const line of formatReport(sampler.getReport())) {
        log.info(line);
      }
      log.info(`Total Execution Time: ${formatElapsed(elapsed)}`);
      log.info(RUN_FINISHED_BANNER);
      if (exitCode !== 0) {
        log.info(describeExit(status));
      }

      return exitCode;
    } finally {
      await sampler.stop();
    }
  }

  /**
   * Spawn the child with piped output and wait until it is running. The exit
   * listener is attached before anything is awaited so an early exit is
   * never missed.
   */
  private async launch(): Promise<LaunchedChild> {
    const { command, args } = this.config;

    let child: ChildHandle;
    try {
      child = this.spawn(command, args);
    } catch (err) {
      throw new SpawnError(command, err);
    }

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal });
      });
    });

    try {
      await once(child, 'spawn');
    } catch (err) {
      throw new SpawnError(command, err);
    }

    child.on('error', (err: Error) => {
      getLogger().warn({ err, command }, 'Child process error');
    });

    return { child, exited };
  }
}
