import type { Command } from 'commander';
import { YearlyStatsAggregator, aggregationHasFailures } from '../../aggregation/aggregator';
import { parseAggregationOptions } from '../../config/jobConfig';
import { formatAggregationSummary } from '../../observability/summary';
import { reportRun, runJob, withLoggingOptions, type CliContext } from '../context';

export function registerAggregateCommand(program: Command, ctx: CliContext): void {
  const command = program
    .command('aggregate')
    .description('Compute yearly statistics per station from stored observations')
    .option('--year <year>', 'only this year')
    .option('--start-year <year>', 'first year of a range (inclusive)')
    .option('--end-year <year>', 'last year of a range (inclusive)')
    .option('--station <id>', 'only this station')
    .option('--batch-size <n>', 'station-years per transactional write (default: 100)')
    .option('--progress-interval <n>', 'log progress every n batches (default: 10)')
    .option('--force-recompute', 'recompute station-years that already have statistics')
    .option('--clear', 'delete matching yearly statistics before computing')
    .option('--dry-run', 'compute without writing or clearing anything')
    .option('--metrics-file <path>', 'write Prometheus metrics for the run to this file')
    .option('--json', 'print the summary as JSON');

  withLoggingOptions(command).action(async (rawOptions: unknown) => {
    await runJob(ctx, 'aggregate', () => parseAggregationOptions(rawOptions), async ({ config, logger }, options) => {
      // a dry run reads only, so it never applies migrations either
      const store = await ctx.openStore(config.database, logger, { migrate: !options.dryRun });
      const summary = await new YearlyStatsAggregator(options, { store, logger, clock: ctx.clock })
        .run()
        .finally(() => store.close());

      return reportRun(ctx, logger, {
        run: { job: 'aggregate', summary },
        text: formatAggregationSummary(summary),
        json: options.json,
        metricsFile: options.metricsFile,
        aborted: summary.aborted,
        hasFailures: aggregationHasFailures(summary)
      });
    });
  });
}
