import { describe, it, expect } from 'vitest';
import { describeExit, toExitCode } from '../process/exitStatus.js';

describe('toExitCode', () => {
  it('should pass through a normal exit code', () => {
    expect(toExitCode({ code: 0, signal: null })).toBe(0);
    expect(toExitCode({ code: 42, signal: null })).toBe(42);
  });

  it('should map signals to 128 plus the signal number', () => {
    expect(toExitCode({ code: null, signal: 'SIGKILL' })).toBe(137);
    expect(toExitCode({ code: null, signal: 'SIGINT' })).toBe(130);
    expect(toExitCode({ code: null, signal: 'SIGTERM' })).toBe(143);
  });

  it('should fall back to 1 without a code or signal', () => {
    expect(toExitCode({ code: null, signal: null })).toBe(1);
  });
});

describe('describeExit', () => {
  it('should describe codes and signals', () => {
    expect(describeExit({ code: 3, signal: null })).toBe('Command exited with code 3');
    expect(describeExit({ code: null, signal: 'SIGKILL' })).toBe('Command terminated by signal SIGKILL');
    expect(describeExit({ code: null, signal: null })).toBe('Command exited without a status');
  });
});
