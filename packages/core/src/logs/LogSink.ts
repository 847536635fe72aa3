import { createWriteStream } from 'node:fs';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { LogOpenError, getLogger } from '@runprof/shared';

/** Anything accepting a newline-terminated line: the log file, a TTY, a test buffer. */
export interface LineWriter {
  write(chunk: string, encoding?: BufferEncoding): boolean;
}

export interface LineSink {
  writeLine(line: string, encoding?: BufferEncoding): void;
}

/**
 * Append-only run log. Every write is one complete line issued as a single
 * `write()`, so concurrent writers interleave at line granularity only.
 */
export class LogSink implements LineSink {
  private stream: Writable;
  private closed: boolean = false;

  constructor(stream: Writable) {
    this.stream = stream;
    this.stream.on('error', (err) => {
      getLogger().error({ err }, 'Run log write failed');
    });
  }

  static async open(path: string): Promise<LogSink> {
    const stream = createWriteStream(path, { flags: 'a' });
    try {
      await once(stream, 'open');
    } catch (err) {
      stream.destroy();
      throw new LogOpenError(path, err);
    }
    return new LogSink(stream);
  }

  writeLine(line: string, encoding: BufferEncoding = 'utf8'): void {
    if (this.closed) return;
    this.stream.write(`${line}\n`, encoding);
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise<void>((resolve) => this.stream.end(resolve));
  }
}
