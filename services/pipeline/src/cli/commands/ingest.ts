import type { Command } from 'commander';
import { parseIngestionOptions } from '../../config/jobConfig';
import { WeatherIngestor, ingestionHasFailures } from '../../ingestion/ingestor';
import { formatIngestionSummary } from '../../observability/summary';
import { reportRun, runJob, withLoggingOptions, type CliContext } from '../context';

export function registerIngestCommand(program: Command, ctx: CliContext): void {
  const command = program
    .command('ingest')
    .description('Load daily station observations from a directory of text files')
    .option('--data-dir <dir>', 'directory holding one file per station (default: wx_data)')
    .option('--pattern <glob>', 'file name pattern (default: *.txt)')
    .option('--batch-size <n>', 'records per transactional write (default: 1000)')
    .option('--progress-interval <n>', 'log progress every n accepted records (default: 1000)')
    .option('--clear', 'delete all observations and stations before loading')
    .option('--dry-run', 'parse and validate only; the database is never opened')
    .option('--metrics-file <path>', 'write Prometheus metrics for the run to this file')
    .option('--json', 'print the summary as JSON');

  withLoggingOptions(command).action(async (rawOptions: unknown) => {
    await runJob(ctx, 'ingest', () => parseIngestionOptions(rawOptions), async ({ config, logger }, options) => {
      const store = options.dryRun ? null : await ctx.openStore(config.database, logger);
      const summary = await new WeatherIngestor(options, { store, logger, clock: ctx.clock })
        .run()
        .finally(() => store?.close());

      return reportRun(ctx, logger, {
        run: { job: 'ingest', summary },
        text: formatIngestionSummary(summary),
        json: options.json,
        metricsFile: options.metricsFile,
        aborted: summary.aborted,
        hasFailures: ingestionHasFailures(summary)
      });
    });
  });
}
