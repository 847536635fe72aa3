import { readFile } from 'node:fs/promises';
import type { CpuSnapshot, MemorySnapshot } from '@runprof/shared';
import {
  CounterParseError,
  CounterReadError,
  PROC_MEMINFO_FILE,
  PROC_STAT_FILE,
} from '@runprof/shared';

export interface CounterSource {
  readCpu(): Promise<CpuSnapshot>;
  readMemory(): Promise<MemorySnapshot>;
}

// Position of the idle column in the aggregate cpu record, label included.
const IDLE_FIELD_INDEX = 4;

const MEMINFO_FIELDS: Record<string, keyof MemorySnapshot> = {
  'MemTotal:': 'total',
  'MemFree:': 'free',
  'MemAvailable:': 'available',
  'Buffers:': 'buffers',
  'Cached:': 'cached',
};

/**
 * Parse the aggregate `cpu` record (first line) of /proc/stat.
 *
 * Idle ticks come from field 4; total ticks are the sum of every field after
 * the label.
 */
export function parseCpuStat(text: string, source: string = PROC_STAT_FILE): CpuSnapshot {
  const firstLine = text.split('\n', 1)[0] ?? '';
  const fields = firstLine.trim().split(/\s+/);
  const [label, ...values] = fields;

  if (!label || !label.startsWith('cpu')) {
    throw new CounterParseError(source, `unexpected first record "${firstLine}"`);
  }
  if (fields.length <= IDLE_FIELD_INDEX) {
    throw new CounterParseError(source, `expected at least ${IDLE_FIELD_INDEX} tick fields`);
  }

  let total = 0;
  for (const value of values) {
    total += parseCounter(value, source);
  }

  return { idle: parseCounter(fields[IDLE_FIELD_INDEX], source), total };
}

/**
 * Parse /proc/meminfo. Values are reported in kibibytes and returned in bytes.
 * Labels other than the ones in {@link MemorySnapshot} are ignored.
 */
export function parseMemInfo(text: string, source: string = PROC_MEMINFO_FILE): MemorySnapshot {
  const snapshot: MemorySnapshot = { total: 0, free: 0, available: 0, buffers: 0, cached: 0 };
  const seen = new Set<keyof MemorySnapshot>();

  for (const line of text.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 2) continue;

    const key = MEMINFO_FIELDS[fields[0]];
    if (!key) continue;

    snapshot[key] = parseCounter(fields[1], source) * 1024;
    seen.add(key);
  }

  for (const required of ['total', 'available'] as const) {
    if (!seen.has(required)) {
      throw new CounterParseError(source, `missing ${required} memory field`);
    }
  }

  return snapshot;
}

export async function readCpuCounters(path: string = PROC_STAT_FILE): Promise<CpuSnapshot> {
  return parseCpuStat(await readCounterFile(path), path);
}

export async function readMemoryCounters(path: string = PROC_MEMINFO_FILE): Promise<MemorySnapshot> {
  return parseMemInfo(await readCounterFile(path), path);
}

export class ProcCounterSource implements CounterSource {
  private statPath: string;
  private meminfoPath: string;

  constructor(statPath: string = PROC_STAT_FILE, meminfoPath: string = PROC_MEMINFO_FILE) {
    this.statPath = statPath;
    this.meminfoPath = meminfoPath;
  }

  readCpu(): Promise<CpuSnapshot> {
    return readCpuCounters(this.statPath);
  }

  readMemory(): Promise<MemorySnapshot> {
    return readMemoryCounters(this.meminfoPath);
  }
}

async function readCounterFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new CounterReadError(path, err);
  }
}

function parseCounter(value: string, source: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CounterParseError(source, `invalid counter value "${value}"`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new CounterParseError(source, `counter value out of range "${value}"`);
  }
  return parsed;
}
