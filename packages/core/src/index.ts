// Counters
export {
  parseCpuStat,
  parseMemInfo,
  readCpuCounters,
  readMemoryCounters,
  ProcCounterSource,
} from './counters/ProcCounters.js';
export type { CounterSource } from './counters/ProcCounters.js';
export { cpuUtilization, memoryUsage } from './counters/utilization.js';

// GPU
export {
  aggregateGpuUtilization,
  parseNvidiaSmiCsv,
  NvidiaSmiProbe,
  detectGpuProbe,
  unavailableGpuProbe,
  runCommand,
} from './gpu/GpuProbe.js';
export type { GpuProbe, CommandRunner, DetectGpuOptions } from './gpu/GpuProbe.js';

// Metrics
export { RunningAggregate } from './metrics/RunningAggregate.js';
export { SampleAggregator, formatReport } from './metrics/SampleAggregator.js';
export { Sampler, formatSample } from './metrics/Sampler.js';
export type { SamplerOptions } from './metrics/Sampler.js';

// Logging
export { LogSink } from './logs/LogSink.js';
export type { LineSink, LineWriter } from './logs/LogSink.js';
export { RunLog, systemClock, OUTPUT_ENCODING } from './logs/RunLog.js';
export type { Clock } from './logs/RunLog.js';
export { pipeOutput, multiplexOutput } from './logs/OutputMultiplexer.js';
export type { OutputMirrors, OutputSource } from './logs/OutputMultiplexer.js';

// Lifecycle
export { Profiler, spawnPiped } from './process/Profiler.js';
export type { ChildHandle, SpawnFn, ProfilerOptions, ProfilerRunConfig } from './process/Profiler.js';
export { toExitCode, describeExit } from './process/exitStatus.js';
export type { ExitStatus } from './process/exitStatus.js';

export { sleep } from './utils/sleep.js';
