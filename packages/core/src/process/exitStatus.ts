import { constants } from 'node:os';
import { EXIT_INTERNAL_ERROR, EXIT_SIGNAL_BASE } from '@runprof/shared';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Exit code to propagate for a child's exit status, shell style for signals. */
export function toExitCode(status: ExitStatus): number {
  if (status.code !== null) return status.code;
  if (status.signal !== null) {
    return EXIT_SIGNAL_BASE + (SIGNAL_NUMBERS.get(status.signal) ?? 0);
  }
  return EXIT_INTERNAL_ERROR;
}

export function describeExit(status: ExitStatus): string {
  if (status.code !== null) return `Command exited with code ${status.code}`;
  if (status.signal !== null) return `Command terminated by signal ${status.signal}`;
  return 'Command exited without a status';
}
