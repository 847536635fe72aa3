import type { OutputLine } from '@runprof/shared';
import { RUNPROF_NAME, WARN_MARKER, formatTimestamp } from '@runprof/shared';
import type { LineSink, LineWriter } from './LogSink.js';

export type Clock = () => Date;

/** Byte-transparent encoding for child output lines. */
export const OUTPUT_ENCODING: BufferEncoding = 'latin1';

export const systemClock: Clock = () => new Date();

/**
 * Human-readable run log. Tool messages go to the log file and are mirrored
 * to the terminal; child output lines go to the log file and to the mirror
 * matching their stream.
 */
export class RunLog {
  private sink: LineSink;
  private mirror: LineWriter;
  private clock: Clock;

  constructor(sink: LineSink, mirror: LineWriter, clock: Clock = systemClock) {
    this.sink = sink;
    this.mirror = mirror;
    this.clock = clock;
  }

  now(): Date {
    return this.clock();
  }

  info(message: string): void {
    const line = this.format(message);
    this.sink.writeLine(line);
    this.mirror.write(`${line}\n`);
  }

  warn(message: string): void {
    this.info(`${WARN_MARKER} ${message}`);
  }

  /** Write to the log file only. */
  record(message: string): void {
    this.sink.writeLine(this.format(message));
  }

  blank(): void {
    this.sink.writeLine('');
  }

  /**
   * Child output arrives decoded as latin1, one char per byte, and is written
   * back the same way so the original bytes reach the mirror and the file.
   */
  output(line: OutputLine, mirror: LineWriter): void {
    const formatted = `[${formatTimestamp(line.timestamp)}][cmd-${line.stream}] ${line.text}`;
    mirror.write(`${formatted}\n`, OUTPUT_ENCODING);
    this.sink.writeLine(formatted, OUTPUT_ENCODING);
  }

  private format(message: string): string {
    return `[${formatTimestamp(this.clock())}][${RUNPROF_NAME}] ${message}`;
  }
}
