import { Command, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import type { ProfilerConfig } from '@runprof/shared';
import {
  ConfigValidationError,
  DEFAULT_BASELINE,
  DEFAULT_SAMPLE_INTERVAL,
  EXIT_INTERNAL_ERROR,
  EXIT_USAGE,
  LOG_LEVELS,
  RUNPROF_LOG_FILE,
  RUNPROF_LOG_LEVEL,
  RUNPROF_NAME,
  RUNPROF_VERSION,
  SetupError,
  UsageError,
  createLogger,
  describeError,
  getLogger,
  profilerConfigSchema,
  setDefaultLogger,
} from '@runprof/shared';
import { Profiler } from '@runprof/core';
import type { LineWriter, ProfilerOptions } from '@runprof/core';

export interface CliStreams {
  stdout: LineWriter;
  stderr: LineWriter;
}

export interface CliDependencies extends Partial<CliStreams> {
  /** Passed to the profiler; output mirrors always follow the CLI streams. */
  profiler?: Omit<ProfilerOptions, 'mirrors'>;
}

interface CliOptions {
  logFile: string;
  interval: string;
  baseline: string;
  gpu: boolean;
  logLevel: string;
}

const EXAMPLES = `
Examples:
  $ ${RUNPROF_NAME} make -j8
  $ ${RUNPROF_NAME} -i 100ms -o build.log npm run build
  $ ${RUNPROF_NAME} --no-gpu -- ./train.sh --epochs 3`;

export function createProgram(
  streams: CliStreams,
  onRun: (config: ProfilerConfig) => Promise<void>,
): Command {
  return new Command()
    .name(RUNPROF_NAME)
    .version(RUNPROF_VERSION, '-v, --version')
    .description('Run a command while sampling CPU, memory and GPU usage')
    .argument('<command>', 'Command to run')
    .argument('[args...]', 'Arguments passed to the command untouched')
    .option('-o, --log-file <path>', 'Append the run log to this file', RUNPROF_LOG_FILE)
    .option('-i, --interval <duration>', 'Time between samples (e.g. 250ms)', DEFAULT_SAMPLE_INTERVAL)
    .option('-b, --baseline <duration>', 'Warm-up before the command starts', DEFAULT_BASELINE)
    .option('--no-gpu', 'Skip GPU detection')
    .addOption(
      new Option('--log-level <level>', 'Internal diagnostics level')
        .choices(LOG_LEVELS)
        .default(RUNPROF_LOG_LEVEL),
    )
    .addHelpText('after', EXAMPLES)
    .passThroughOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => streams.stdout.write(str),
      writeErr: (str) => streams.stderr.write(str),
      outputError: (str, write) => write(chalk.red(str)),
    })
    .action(async (command: string, args: string[], options: CliOptions) => {
      if (command.length === 0) {
        throw new UsageError('missing command');
      }

      const parsed = profilerConfigSchema.safeParse({
        command,
        args,
        logFile: options.logFile,
        interval: options.interval,
        baseline: options.baseline,
        gpu: options.gpu,
        logLevel: options.logLevel,
      });
      if (!parsed.success) {
        throw new ConfigValidationError(
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
      }

      setDefaultLogger(
        createLogger({ level: parsed.data.logLevel, pretty: process.stderr.isTTY === true }),
      );
      await onRun(parsed.data);
    });
}

/** Exit code for a failure that ended the CLI before or instead of the child's. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CommanderError) {
    return err.code === 'commander.version' ? 0 : EXIT_USAGE;
  }
  if (err instanceof SetupError || err instanceof UsageError) {
    return err.exitCode;
  }
  return EXIT_INTERNAL_ERROR;
}

/**
 * Parse `argv` (without the node and script entries), run the profiler and
 * resolve with the exit code the process should terminate with.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let exitCode = EXIT_INTERNAL_ERROR;
  const program = createProgram({ stdout, stderr }, async (config) => {
    const profiler = new Profiler(config, { ...deps.profiler, mirrors: { stdout, stderr } });
    exitCode = await profiler.run();
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (err) {
    // commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      if (!(err instanceof SetupError || err instanceof UsageError)) {
        getLogger().error({ err }, 'Unexpected failure');
      }
      stderr.write(`${chalk.red(`${RUNPROF_NAME}: ${describeError(err)}`)}\n`);
    }
    return exitCodeFor(err);
  }
}
