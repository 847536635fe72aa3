import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { StreamName } from '@runprof/shared';
import { StreamError, getLogger } from '@runprof/shared';
import type { LineWriter } from './LogSink.js';
import { OUTPUT_ENCODING, type RunLog } from './RunLog.js';

export interface OutputMirrors {
  stdout: LineWriter;
  stderr: LineWriter;
}

export interface OutputSource {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
}

/**
 * Drain one child stream line by line into its mirror and the run log.
 * Resolves with the number of lines read once the stream ends. A read
 * failure is written to the log and ends this reader only.
 */
export async function pipeOutput(
  source: Readable,
  stream: StreamName,
  mirror: LineWriter,
  log: RunLog,
): Promise<number> {
  // Lines are split on raw bytes; invalid UTF-8 must survive untouched.
  source.setEncoding(OUTPUT_ENCODING);
  const reader = createInterface({ input: source, crlfDelay: Infinity });
  let lines = 0;

  try {
    for await (const text of reader) {
      log.output({ timestamp: log.now(), stream, text }, mirror);
      lines++;
    }
  } catch (err) {
    const error = new StreamError(stream, err);
    getLogger().debug({ err, stream }, 'Output reader stopped');
    log.warn(error.message);
  } finally {
    reader.close();
  }

  return lines;
}

/** Run both readers concurrently and wait until both have drained. */
export async function multiplexOutput(
  child: OutputSource,
  mirrors: OutputMirrors,
  log: RunLog,
): Promise<void> {
  const readers: Promise<number>[] = [];
  if (child.stdout) readers.push(pipeOutput(child.stdout, 'stdout', mirrors.stdout, log));
  if (child.stderr) readers.push(pipeOutput(child.stderr, 'stderr', mirrors.stderr, log));
  await Promise.all(readers);
}
