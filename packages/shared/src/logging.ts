import pino, { stdTimeFunctions, type DestinationStream, type Level, type LevelWithSilent, type Logger } from 'pino';
import pretty from 'pino-pretty';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LevelWithSilent[];
export const LOG_FORMATS = ['json', 'pretty'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

export type CreateLoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Extra file sink; parent directories are created. */
  file?: string | null;
  bindings?: Record<string, unknown>;
  /** Replaces the stderr sink, mostly for tests. */
  stream?: DestinationStream;
};

function formatSink(format: LogFormat, destination: DestinationStream | number, colorize: boolean): DestinationStream {
  if (format === 'json') {
    return typeof destination === 'number' ? pino.destination({ dest: destination, sync: true }) : destination;
  }
  return pretty({
    colorize,
    sync: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination
  });
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const format = options.format ?? 'json';

  const primary = formatSink(format, options.stream ?? 2, !options.stream && Boolean(process.stderr.isTTY));
  let destination: DestinationStream = primary;

  if (options.file) {
    // multistream entries cannot carry 'silent'; the logger level filters first anyway
    const streamLevel: Level = level === 'silent' ? 'fatal' : level;
    const fileSink = formatSink(format, pino.destination({ dest: options.file, mkdir: true, sync: true }), false);
    destination = pino.multistream([
      { level: streamLevel, stream: primary },
      { level: streamLevel, stream: fileSink }
    ]);
  }

  return pino(
    {
      level,
      base: options.bindings ?? null,
      timestamp: stdTimeFunctions.isoTime
    },
    destination
  );
}

export type { Logger };
