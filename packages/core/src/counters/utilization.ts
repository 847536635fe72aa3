import type { CpuSnapshot, MemorySnapshot, MemoryUsage } from '@runprof/shared';

/**
 * CPU utilization between two cumulative snapshots, as a fraction in [0, 1].
 *
 * Returns `null` when no tick elapsed between the snapshots (or the counters
 * went backwards); such a pair carries no rate and is rejected.
 */
export function cpuUtilization(prev: CpuSnapshot, curr: CpuSnapshot): number | null {
  const totalDiff = curr.total - prev.total;
  if (totalDiff <= 0) return null;

  const idleDiff = curr.idle - prev.idle;
  const usage = 1 - idleDiff / totalDiff;
  return Math.min(1, Math.max(0, usage));
}

export function memoryUsage(snapshot: MemorySnapshot): MemoryUsage {
  const used = snapshot.total - snapshot.available;
  const percent = snapshot.total > 0 ? (used / snapshot.total) * 100 : 0;
  return { used, total: snapshot.total, percent };
}
