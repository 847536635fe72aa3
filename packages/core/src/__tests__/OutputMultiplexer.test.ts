import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { multiplexOutput, pipeOutput } from '../logs/OutputMultiplexer.js';
import { RunLog } from '../logs/RunLog.js';
import { FIXED_TS, MemorySink, MemoryWriter, fixedClock } from './helpers.js';

describe('pipeOutput', () => {
  let sink: MemorySink;
  let log: RunLog;

  beforeEach(() => {
    sink = new MemorySink();
    log = new RunLog(sink, new MemoryWriter(), fixedClock);
  });

  it('should copy each line to the mirror and the log in order', async () => {
    const source = new PassThrough();
    const mirror = new MemoryWriter();
    const done = pipeOutput(source, 'stdout', mirror, log);

    source.write('first\nsec');
    source.write('ond\n');
    source.end('last without newline');

    await expect(done).resolves.toBe(3);
    expect(sink.lines).toEqual([
      `[${FIXED_TS}][cmd-stdout] first`,
      `[${FIXED_TS}][cmd-stdout] second`,
      `[${FIXED_TS}][cmd-stdout] last without newline`,
    ]);
    expect(mirror.chunks).toEqual(sink.lines.map((line) => `${line}\n`));
  });

  it('should handle CRLF line endings', async () => {
    const source = new PassThrough();
    const done = pipeOutput(source, 'stderr', new MemoryWriter(), log);
    source.end('one\r\ntwo\r\n');

    await done;
    expect(sink.lines).toEqual([`[${FIXED_TS}][cmd-stderr] one`, `[${FIXED_TS}][cmd-stderr] two`]);
  });

  it('should pass bytes that are not valid UTF-8 through unchanged', async () => {
    const source = new PassThrough();
    const mirror = new MemoryWriter();
    const done = pipeOutput(source, 'stdout', mirror, log);
    source.end(Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    await done;
    const expected = Buffer.concat([
      Buffer.from(`[${FIXED_TS}][cmd-stdout] `),
      Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]),
    ]);
    expect(mirror.bytes()).toEqual(expected);
    expect(sink.bytes()).toEqual(expected);
  });

  it('should keep multi-byte UTF-8 intact, even when split across chunks', async () => {
    const source = new PassThrough();
    const mirror = new MemoryWriter();
    const done = pipeOutput(source, 'stderr', mirror, log);
    const text = Buffer.from('na\u00efve \u2713\n', 'utf8');
    source.write(text.subarray(0, 3));
    source.end(text.subarray(3));

    await done;
    expect(mirror.bytes()).toEqual(
      Buffer.concat([Buffer.from(`[${FIXED_TS}][cmd-stderr] `), text]),
    );
  });

  it('should log a read failure and resolve instead of rejecting', async () => {
    const source = new PassThrough();
    const done = pipeOutput(source, 'stderr', new MemoryWriter(), log);
    source.destroy(new Error('EPIPE'));

    await expect(done).resolves.toBe(0);
    expect(sink.lines).toEqual([`[${FIXED_TS}][runprof] WARN Error reading stderr: EPIPE`]);
  });
});

describe('multiplexOutput', () => {
  it('should keep per-stream order while draining both streams', async () => {
    const sink = new MemorySink();
    const log = new RunLog(sink, new MemoryWriter(), fixedClock);
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const mirrors = { stdout: new MemoryWriter(), stderr: new MemoryWriter() };

    const done = multiplexOutput({ stdout, stderr }, mirrors, log);
    stdout.write('A\n');
    stderr.write('C\n');
    stdout.write('B\n');
    stdout.end();
    stderr.end();
    await done;

    const lines = sink.lines;
    expect(lines).toHaveLength(3);
    expect(lines).toContain(`[${FIXED_TS}][cmd-stderr] C`);
    expect(lines.indexOf(`[${FIXED_TS}][cmd-stdout] A`)).toBeLessThan(
      lines.indexOf(`[${FIXED_TS}][cmd-stdout] B`),
    );
    expect(mirrors.stdout.chunks).toEqual([
      `[${FIXED_TS}][cmd-stdout] A\n`,
      `[${FIXED_TS}][cmd-stdout] B\n`,
    ]);
    expect(mirrors.stderr.chunks).toEqual([`[${FIXED_TS}][cmd-stderr] C\n`]);
  });

  it('should not wait for a stream the child does not have', async () => {
    const sink = new MemorySink();
    const log = new RunLog(sink, new MemoryWriter(), fixedClock);
    const stdout = new PassThrough();

    const done = multiplexOutput(
      { stdout, stderr: null },
      { stdout: new MemoryWriter(), stderr: new MemoryWriter() },
      log,
    );
    stdout.end('only\n');
    await done;

    expect(sink.lines).toEqual([`[${FIXED_TS}][cmd-stdout] only`]);
  });

  it('should finish only after both streams have drained', async () => {
    const log = new RunLog(new MemorySink(), new MemoryWriter(), fixedClock);
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    let finished = false;

    const done = multiplexOutput(
      { stdout, stderr },
      { stdout: new MemoryWriter(), stderr: new MemoryWriter() },
      log,
    ).then(() => {
      finished = true;
    });

    stdout.end('out\n');
    await new Promise((resolve) => setImmediate(resolve));
    expect(finished).toBe(false);

    stderr.end('err\n');
    await done;
    expect(finished).toBe(true);
  });
});
