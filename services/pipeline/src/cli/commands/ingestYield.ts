import type { Command } from 'commander';
import { parseCropYieldOptions } from '../../config/jobConfig';
import { CropYieldIngestor, cropYieldHasFailures } from '../../ingestion/cropYieldIngestor';
import { formatCropYieldSummary } from '../../observability/summary';
import { reportRun, runJob, withLoggingOptions, type CliContext } from '../context';

export function registerIngestYieldCommand(program: Command, ctx: CliContext): void {
  const command = program
    .command('ingest-yield')
    .description('Load a yearly crop yield series from a YEAR<TAB>YIELD text file')
    .option('--data-file <path>', 'yield file (default: yld_data/US_corn_grain_yield.txt)')
    .option('--crop-type <type>', 'crop the series describes (default: corn_grain)')
    .option('--country <code>', 'country the series covers (default: US)')
    .option('--state <code>', 'state the series covers; omit for national figures')
    .option('--unit <unit>', 'unit of the yield values (default: thousand_metric_tons)')
    .option('--batch-size <n>', 'records per transactional write (default: 1000)')
    .option('--progress-interval <n>', 'log progress every n accepted records (default: 1000)')
    .option('--clear', 'delete all crop yields before loading')
    .option('--dry-run', 'parse and validate only; the database is never opened')
    .option('--metrics-file <path>', 'write Prometheus metrics for the run to this file')
    .option('--json', 'print the summary as JSON');

  withLoggingOptions(command).action(async (rawOptions: unknown) => {
    await runJob(ctx, 'ingest-yield', () => parseCropYieldOptions(rawOptions), async ({ config, logger }, options) => {
      const store = options.dryRun ? null : await ctx.openStore(config.database, logger);
      const summary = await new CropYieldIngestor(options, { store, logger, clock: ctx.clock })
        .run()
        .finally(() => store?.close());

      return reportRun(ctx, logger, {
        run: { job: 'ingest-yield', summary },
        text: formatCropYieldSummary(summary),
        json: options.json,
        metricsFile: options.metricsFile,
        aborted: summary.aborted,
        hasFailures: cropYieldHasFailures(summary)
      });
    });
  });
}
