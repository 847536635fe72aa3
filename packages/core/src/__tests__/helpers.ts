import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { CpuSnapshot, MemorySnapshot } from '@runprof/shared';
import type { CounterSource } from '../counters/ProcCounters.js';
import type { LineSink, LineWriter } from '../logs/LogSink.js';
import type { ChildHandle, SpawnFn } from '../process/Profiler.js';

export const FIXED_DATE = new Date(2024, 0, 2, 3, 4, 5, 6);
export const FIXED_TS = 'Jan 02 03:04:05.006';
export const fixedClock = () => FIXED_DATE;

export const GIB = 1024 * 1024 * 1024;

/** 16 GiB total, 12 GiB available: 4 GiB (25%) used. */
export const QUARTER_USED_MEMORY: MemorySnapshot = {
  total: 16 * GIB,
  free: 2 * GIB,
  available: 12 * GIB,
  buffers: GIB,
  cached: 4 * GIB,
};

/** Lines as written plus the bytes they encode to. */
export class MemorySink implements LineSink {
  public lines: string[] = [];
  private encoded: Buffer[] = [];

  writeLine(line: string, encoding: BufferEncoding = 'utf8'): void {
    this.lines.push(line);
    this.encoded.push(Buffer.from(`${line}\n`, encoding));
  }

  bytes(): Buffer {
    return Buffer.concat(this.encoded);
  }
}

export class MemoryWriter implements LineWriter {
  public chunks: string[] = [];
  private encoded: Buffer[] = [];

  write(chunk: string, encoding: BufferEncoding = 'utf8'): boolean {
    this.chunks.push(chunk);
    this.encoded.push(Buffer.from(chunk, encoding));
    return true;
  }

  bytes(): Buffer {
    return Buffer.concat(this.encoded);
  }
}

type CpuStep = CpuSnapshot | Error | (() => Promise<CpuSnapshot>);
type MemoryStep = MemorySnapshot | Error;

/**
 * Counter source replaying scripted readings. The last CPU step is repeated
 * once the script runs out unless `cpuFallback` generates further readings.
 */
export class ScriptedCounters implements CounterSource {
  public cpuReads: number = 0;
  private cpu: CpuStep[];
  private memory: MemoryStep[];
  private cpuFallback: ((read: number) => CpuSnapshot) | null;

  constructor(
    cpu: CpuStep[],
    memory: MemoryStep[] = [QUARTER_USED_MEMORY],
    cpuFallback: ((read: number) => CpuSnapshot) | null = null,
  ) {
    this.cpu = cpu;
    this.memory = memory;
    this.cpuFallback = cpuFallback;
  }

  async readCpu(): Promise<CpuSnapshot> {
    const read = this.cpuReads++;
    const step =
      read < this.cpu.length
        ? this.cpu[read]
        : this.cpuFallback
          ? this.cpuFallback(read)
          : this.cpu[this.cpu.length - 1];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step();
    return step;
  }

  async readMemory(): Promise<MemorySnapshot> {
    const step = this.memory.length > 1 ? this.memory.shift() : this.memory[0];
    if (step === undefined) throw new Error('no memory readings scripted');
    if (step instanceof Error) throw step;
    return step;
  }
}

/** Steady 50% utilization: every read adds 100 ticks, half of them idle. */
export function halfBusyCounters(): ScriptedCounters {
  return new ScriptedCounters([{ idle: 0, total: 0 }], [QUARTER_USED_MEMORY], (read) => ({
    idle: read * 50,
    total: read * 100,
  }));
}

export class FakeChild extends EventEmitter implements ChildHandle {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    this.emit('exit', code, signal);
  }
}

export interface FakeSpawn {
  spawn: SpawnFn;
  calls: Array<{ command: string; args: readonly string[] }>;
}

/** Spawn stand-in: emits `spawn` on the next turn, then hands the child to `script`. */
export function fakeSpawn(script: (child: FakeChild) => void): FakeSpawn {
  const calls: FakeSpawn['calls'] = [];
  const spawn: SpawnFn = (command, args) => {
    calls.push({ command, args });
    const child = new FakeChild();
    setImmediate(() => {
      child.emit('spawn');
      script(child);
    });
    return child;
  };
  return { spawn, calls };
}

export function failingSpawn(error: Error): SpawnFn {
  return () => {
    const child = new FakeChild();
    setImmediate(() => child.emit('error', error));
    return child;
  };
}
