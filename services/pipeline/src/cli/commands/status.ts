import type { Command } from 'commander';
import { parseCommonOptions } from '../../config/jobConfig';
import { formatTotals } from '../../observability/summary';
import { EXIT_OK, printResult, runJob, withLoggingOptions, type CliContext } from '../context';

export function registerStatusCommand(program: Command, ctx: CliContext): void {
  const command = program
    .command('status')
    .description('Show station, observation and yearly statistics counts')
    .option('--json', 'print the totals as JSON');

  withLoggingOptions(command).action(async (rawOptions: unknown) => {
    await runJob(ctx, 'status', () => parseCommonOptions(rawOptions, 'status'), async ({ config, logger }, options) => {
      const store = await ctx.openStore(config.database, logger, { migrate: false });
      const totals = await store.totals().finally(() => store.close());
      printResult(ctx, totals, formatTotals(totals), options.json);
      return EXIT_OK;
    });
  });
}
