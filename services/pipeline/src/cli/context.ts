import { CommanderError, type Command } from 'commander';
import { EnvConfigError, LOG_FORMATS, LOG_LEVELS, createLogger, type CreateLoggerOptions, type EnvSource, type Logger } from '@wxdata/shared';
import { resolveLoggingConfig, type LoggingOverrides } from '../config/jobConfig';
import { loadServiceConfig, type DatabaseConfig, type ServiceConfig } from '../config/serviceConfig';
import { openWeatherStore, type OpenStoreOptions } from '../db/client';
import { JobConfigError, StoreUnavailableError, describeError } from '../errors';
import { writeMetricsFile, type RunSummary } from '../observability/metrics';
import { systemClock, type Clock } from '../observability/progress';
import type { WeatherStore } from '../store/types';

export const EXIT_OK = 0;
export const EXIT_PARTIAL_FAILURE = 1;
export const EXIT_FATAL = 2;

export type StoreFactory = (config: DatabaseConfig, logger: Logger, options?: OpenStoreOptions) => Promise<WeatherStore>;

export type CliDependencies = {
  env?: EnvSource;
  openStore?: StoreFactory;
  createLogger?: (options: CreateLoggerOptions) => Logger;
  /** Receives the final summary; stdout by default. */
  stdout?: (text: string) => void;
  /** Receives messages that arrive before a logger exists; stderr by default. */
  stderr?: (text: string) => void;
  setExitCode?: (code: number) => void;
  clock?: Clock;
};

export type CliContext = Required<CliDependencies>;

export function resolveContext(deps: CliDependencies = {}): CliContext {
  return {
    env: deps.env ?? process.env,
    openStore: deps.openStore ?? openWeatherStore,
    createLogger: deps.createLogger ?? createLogger,
    stdout:
      deps.stdout ??
      ((text) => {
        process.stdout.write(text);
      }),
    stderr:
      deps.stderr ??
      ((text) => {
        process.stderr.write(text);
      }),
    setExitCode:
      deps.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
    clock: deps.clock ?? systemClock
  };
}

export function isFatalError(err: unknown): boolean {
  return err instanceof JobConfigError || err instanceof EnvConfigError || err instanceof StoreUnavailableError;
}

export function exitCodeForError(err: unknown): number {
  if (err instanceof CommanderError) {
    return err.exitCode === 0 ? EXIT_OK : EXIT_FATAL;
  }
  return isFatalError(err) ? EXIT_FATAL : EXIT_PARTIAL_FAILURE;
}

export type JobSession = {
  config: ServiceConfig;
  logger: Logger;
};

/**
 * Parses the job's options, loads configuration, builds the job logger and
 * runs `body`, translating whatever escapes into an exit code. `body` returns
 * the exit code of a run that reached its summary.
 */
export async function runJob<T extends { logging: LoggingOverrides }>(
  ctx: CliContext,
  job: string,
  parseOptions: () => T,
  body: (session: JobSession, options: T) => Promise<number>
): Promise<void> {
  let logger: Logger | null = null;
  let code: number;
  try {
    const options = parseOptions();
    const config = loadServiceConfig(ctx.env);
    logger = ctx.createLogger({ ...resolveLoggingConfig(config.logging, options.logging), bindings: { job } });
    code = await body({ config, logger }, options);
  } catch (err) {
    code = exitCodeForError(err);
    if (logger) {
      logger.fatal({ err }, `${job} aborted: ${describeError(err)}`);
    } else {
      ctx.stderr(`${describeError(err)}\n`);
    }
  }
  ctx.setExitCode(code);
}

export function printResult(ctx: CliContext, payload: unknown, text: string, asJson: boolean): void {
  ctx.stdout(asJson ? `${JSON.stringify(payload, null, 2)}\n` : `${text}\n`);
}

export type RunReport = {
  run: RunSummary;
  text: string;
  json: boolean;
  metricsFile: string | null;
  /** Set when a store outage cut the run short. */
  aborted: string | null;
  hasFailures: boolean;
};

/**
 * Prints the summary of a run that reached processing, aborted or not, and
 * writes its metrics file. Returns the run's exit code.
 */
export async function reportRun(ctx: CliContext, logger: Logger, report: RunReport): Promise<number> {
  const { run, metricsFile } = report;
  printResult(ctx, run.summary, report.text, report.json);

  let code = report.hasFailures ? EXIT_PARTIAL_FAILURE : EXIT_OK;
  if (report.aborted !== null) {
    logger.fatal(`${run.job} aborted: ${report.aborted}`);
    code = EXIT_FATAL;
  }
  if (metricsFile) {
    try {
      await writeMetricsFile(metricsFile, run, ctx.clock());
      logger.debug({ metricsFile }, 'wrote metrics file');
    } catch (err) {
      logger.error({ err, metricsFile }, 'failed to write metrics file');
      code = Math.max(code, EXIT_PARTIAL_FAILURE);
    }
  }
  return code;
}

export function withLoggingOptions(command: Command): Command {
  return command
    .option('--log-level <level>', `log level (${LOG_LEVELS.join('|')}), overrides WXDATA_LOG_LEVEL`)
    .option('--log-format <format>', `log format (${LOG_FORMATS.join('|')}), overrides WXDATA_LOG_FORMAT`)
    .option('--log-file <path>', 'also write logs to this file');
}
